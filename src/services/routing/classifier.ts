import { ValidationError } from '@core/errors/validation.error.js';
import type { ModelClient } from '@core/interfaces/index.js';

import { Chain, parseOutput, renderAndGenerate, type GenerateInput } from '@services/chain/chain.js';
import { LabelOutputParser } from '@services/chain/output.parser.js';
import type { Template } from '@services/chain/prompt.template.js';

import { logger as defaultLogger, type Logger } from '@utils/logger.js';

export interface ClassifierOptions<L extends string> {
  labels: readonly L[];
  fallback: L;
  temperature?: number;
  logger?: Logger;
}

/**
 * One generate stage plus a label parse. Off-list model output resolves to the
 * fallback label; only model failures escape `classify`.
 */
export class Classifier<L extends string> {
  readonly labels: readonly L[];
  readonly fallback: L;
  private readonly chain: Chain<GenerateInput, L>;

  constructor(client: ModelClient, template: Template, options: ClassifierOptions<L>) {
    const { labels, fallback, temperature } = options;
    const logger = options.logger ?? defaultLogger;
    if (!labels.includes(fallback)) {
      throw new ValidationError(`Fallback label "${fallback}" is not one of: ${labels.join(', ')}`);
    }
    this.labels = labels;
    this.fallback = fallback;

    const parser = new LabelOutputParser(labels, fallback, (raw) => {
      logger.warn({ raw, fallback }, '[classifier] output outside label set');
    });
    this.chain = Chain.from(renderAndGenerate(client, template, { temperature, name: 'classify' }), {
      logger,
    }).pipe(parseOutput(parser));
  }

  classify(input: GenerateInput): Promise<L> {
    return this.chain.invoke(input);
  }
}
