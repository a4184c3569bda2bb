import { ValidationError } from '@core/errors/validation.error.js';
import type { ModelClient, Variables } from '@core/interfaces/index.js';

import { logger as defaultLogger, type Logger } from '@utils/logger.js';

import type { OutputParser } from './output.parser.js';
import type { Template } from './prompt.template.js';

export type StageKind = 'generate' | 'parse' | 'assign';

export interface Stage<I, O> {
  readonly kind: StageKind;
  readonly name: string;
  run(input: I): Promise<O>;
}

export type GenerateInput = Variables | string;

/**
 * A bare string can only feed a template with exactly one placeholder; it is
 * bound to that name.
 */
export function toVariables(input: GenerateInput, template: Template): Variables {
  if (typeof input !== 'string') return input;
  const [only, ...rest] = template.inputVariables;
  if (only === undefined || rest.length > 0) {
    throw new ValidationError(
      `A plain text input needs a template with exactly one variable, got ${template.inputVariables.length}`,
      [...template.inputVariables],
    );
  }
  return { [only]: input };
}

export interface GenerateStageOptions {
  temperature?: number;
  name?: string;
}

export function renderAndGenerate(
  client: ModelClient,
  template: Template,
  options: GenerateStageOptions = {},
): Stage<GenerateInput, string> {
  const { temperature, name = 'generate' } = options;
  return {
    kind: 'generate',
    name,
    run: async (input) => {
      const prompt = template.render(toVariables(input, template));
      return client.generate(prompt, { temperature });
    },
  };
}

export function parseOutput<T>(parser: OutputParser<T>, name = `parse:${parser.format}`): Stage<string, T> {
  return {
    kind: 'parse',
    name,
    run: async (text) => parser.parse(text),
  };
}

/** Runs `chain` and exposes its result under `key` for the next template. */
export function assign<I, O>(key: string, chain: Chain<I, O>): Stage<I, Record<string, O>> {
  return {
    kind: 'assign',
    name: `assign:${key}`,
    run: async (input) => ({ [key]: await chain.invoke(input) }),
  };
}

export interface ChainOptions {
  logger?: Logger;
}

type Runner<I, O> = (input: I) => Promise<O>;

function instrument<I, O>(stage: Stage<I, O>, index: number, logger: Logger): Runner<I, O> {
  return async (input) => {
    logger.debug({ stage: stage.name, kind: stage.kind, index }, '[chain] stage start');
    const output = await stage.run(input);
    logger.debug({ stage: stage.name, index }, '[chain] stage done');
    return output;
  };
}

/**
 * Ordered, branch-free sequence of stages. Immutable: `pipe` returns a new
 * chain, so one instance can serve any number of concurrent invocations.
 */
export class Chain<I, O> {
  private constructor(
    readonly stages: readonly string[],
    private readonly runner: Runner<I, O>,
    private readonly logger: Logger,
  ) {}

  static from<I, O>(stage: Stage<I, O>, options: ChainOptions = {}): Chain<I, O> {
    const logger = options.logger ?? defaultLogger;
    return new Chain([stage.name], instrument(stage, 0, logger), logger);
  }

  pipe<N>(stage: Stage<O, N>): Chain<I, N> {
    const previous = this.runner;
    const next = instrument(stage, this.stages.length, this.logger);
    return new Chain([...this.stages, stage.name], async (input) => next(await previous(input)), this.logger);
  }

  invoke(input: I): Promise<O> {
    return this.runner(input);
  }
}
