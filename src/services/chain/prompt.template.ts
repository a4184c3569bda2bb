import { ValidationError } from '@core/errors/validation.error.js';
import type { ChatMessage, ChatRole, PromptValue, Variables } from '@core/interfaces/index.js';

type Segment = { kind: 'text'; value: string } | { kind: 'var'; name: string };

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function tokenize(text: string): Segment[] {
  const segments: Segment[] = [];
  let buffer = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === '{' && next === '{') {
      buffer += '{';
      i += 2;
      continue;
    }
    if (ch === '}' && next === '}') {
      buffer += '}';
      i += 2;
      continue;
    }
    if (ch === '}') {
      throw new ValidationError(`Unmatched "}" at position ${i} in prompt template`);
    }
    if (ch === '{') {
      const close = text.indexOf('}', i + 1);
      const name = close === -1 ? '' : text.slice(i + 1, close).trim();
      if (!IDENTIFIER.test(name)) {
        throw new ValidationError(`Invalid placeholder at position ${i} in prompt template`);
      }
      if (buffer) segments.push({ kind: 'text', value: buffer });
      buffer = '';
      segments.push({ kind: 'var', name });
      i = close + 1;
      continue;
    }
    buffer += ch;
    i += 1;
  }

  if (buffer) segments.push({ kind: 'text', value: buffer });
  return segments;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value !== null && typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function missingVariables(required: readonly string[], values: Variables): string[] {
  return required.filter((name) => values[name] === undefined);
}

/** Anything a generate stage can render: plain text or a chat message list. */
export interface Template {
  readonly inputVariables: readonly string[];
  render(values: Variables): PromptValue;
}

/**
 * Text with `{name}` placeholders. `{{` and `}}` produce literal braces, which
 * is how JSON examples are written inside a template.
 */
export class PromptTemplate implements Template {
  readonly inputVariables: readonly string[];
  private readonly segments: readonly Segment[];

  constructor(readonly template: string) {
    this.segments = tokenize(template);
    const names: string[] = [];
    for (const segment of this.segments) {
      if (segment.kind === 'var' && !names.includes(segment.name)) names.push(segment.name);
    }
    this.inputVariables = Object.freeze(names);
  }

  static fromTemplate(template: string): PromptTemplate {
    return new PromptTemplate(template);
  }

  render(values: Variables): string {
    const missing = missingVariables(this.inputVariables, values);
    if (missing.length) {
      throw new ValidationError(
        `Missing value for template variables: ${missing.join(', ')}`,
        missing,
      );
    }
    return this.segments
      .map((segment) => (segment.kind === 'text' ? segment.value : stringify(values[segment.name])))
      .join('');
  }
}

export class ChatPromptTemplate implements Template {
  readonly inputVariables: readonly string[];

  constructor(private readonly messages: ReadonlyArray<{ role: ChatRole; template: PromptTemplate }>) {
    const names: string[] = [];
    for (const message of messages) {
      for (const name of message.template.inputVariables) {
        if (!names.includes(name)) names.push(name);
      }
    }
    this.inputVariables = Object.freeze(names);
  }

  static fromMessages(messages: ReadonlyArray<readonly [ChatRole, string]>): ChatPromptTemplate {
    return new ChatPromptTemplate(
      messages.map(([role, text]) => ({ role, template: new PromptTemplate(text) })),
    );
  }

  render(values: Variables): ChatMessage[] {
    const missing = missingVariables(this.inputVariables, values);
    if (missing.length) {
      throw new ValidationError(
        `Missing value for template variables: ${missing.join(', ')}`,
        missing,
      );
    }
    return this.messages.map(({ role, template }) => ({ role, content: template.render(values) }));
  }
}
