import type { z } from 'zod';

import { OutputParseError } from '@core/errors/output-parse.error.js';

export type OutputFormat = 'string' | 'json' | 'label';

export interface OutputParser<T> {
  readonly format: OutputFormat;
  parse(text: string): T;
}

export class StringOutputParser implements OutputParser<string> {
  readonly format = 'string' as const;

  parse(text: string): string {
    return text.trim();
  }
}

const FENCED = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/** Removes a single markdown code fence around the payload, nothing else. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCED.exec(trimmed);
  return match ? match[1] : trimmed;
}

/**
 * Parses model text as JSON and validates it against `schema`. Malformed JSON
 * and shape mismatches both raise `OutputParseError` with the raw text.
 */
export class JsonOutputParser<T> implements OutputParser<T> {
  readonly format = 'json' as const;

  constructor(private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>) {}

  parse(text: string): T {
    let value: unknown;
    try {
      value = JSON.parse(stripCodeFence(text));
    } catch (error) {
      throw new OutputParseError('Model output is not valid JSON', text, error);
    }

    const result = this.schema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new OutputParseError(`Model output does not match the expected shape: ${issues}`, text);
    }
    return result.data;
  }
}

const EDGE_NOISE = /^[\s\p{P}\p{S}]+|[\s\p{P}\p{S}]+$/gu;

export function normalizeLabel(text: string): string {
  return text.replace(EDGE_NOISE, '').toLowerCase();
}

/**
 * Maps model text onto a closed label set. Anything that does not match a
 * member after normalization becomes `fallback`.
 */
export class LabelOutputParser<L extends string> implements OutputParser<L> {
  readonly format = 'label' as const;

  constructor(
    readonly labels: readonly L[],
    readonly fallback: L,
    private readonly onFallback?: (raw: string) => void,
  ) {}

  parse(text: string): L {
    const label = this.match(text);
    if (label !== undefined) return label;
    this.onFallback?.(text);
    return this.fallback;
  }

  match(text: string): L | undefined {
    const normalized = normalizeLabel(text);
    return this.labels.find((label) => label === normalized);
  }
}
