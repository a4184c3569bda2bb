import { ValidationError } from '@core/errors/validation.error.js';

import type { Classifier } from '@services/routing/classifier.js';
import { Dispatcher } from '@services/routing/dispatcher.js';
import { createHandlerTable, type HandlerTable } from '@services/routing/handler.table.js';

import { logger as defaultLogger, type Logger } from '@utils/logger.js';

import { assertGraphInvariants } from './invariants.js';
import type { GraphState } from './state.types.js';

export interface ClassificationGraphOptions<L extends string> {
  classifier: Classifier<L>;
  /** One terminal node per label; each returns the reply text. */
  nodes: HandlerTable<L, Readonly<GraphState<L>>, string>;
  logger?: Logger;
}

/**
 * START --classify--> CLASSIFIED --terminal node for the label--> RESPONDED.
 * No cycles; every invocation works on its own state object.
 */
export class ClassificationGraph<L extends string> {
  private readonly classifier: Classifier<L>;
  private readonly dispatcher: Dispatcher<L, Readonly<GraphState<L>>, string>;
  private readonly logger: Logger;

  constructor(options: ClassificationGraphOptions<L>) {
    this.classifier = options.classifier;
    this.logger = options.logger ?? defaultLogger;
    const table = createHandlerTable<L, Readonly<GraphState<L>>, string>(
      options.classifier.labels,
      options.nodes,
    );
    this.dispatcher = new Dispatcher(table, options.classifier.fallback, this.logger);
  }

  async invoke(userMessage: string): Promise<GraphState<L>> {
    const start = this.check({ phase: 'START', userMessage });

    const intent = await this.classifier.classify(userMessage);
    const classified = this.check({ ...start, phase: 'CLASSIFIED', intent });
    this.logger.debug({ intent }, '[graph] classified');

    const response = await this.dispatcher.dispatch(intent, classified);
    return this.check({ ...classified, phase: 'RESPONDED', response });
  }

  private check(state: GraphState<L>): GraphState<L> {
    const issues = assertGraphInvariants(state, this.classifier.labels);
    if (issues.length) {
      throw new ValidationError(`Invalid graph state in phase ${state.phase}`, issues);
    }
    return state;
  }
}

export type { GraphState };
