import { logger as defaultLogger, type Logger } from '@utils/logger.js';

import type { HandlerTable } from './handler.table.js';

export class Dispatcher<L extends string, Req, Res> {
  private readonly logger: Logger;

  constructor(
    private readonly table: HandlerTable<L, Req, Res>,
    private readonly fallback: NoInfer<L>,
    logger?: Logger,
  ) {
    this.logger = logger ?? defaultLogger;
  }

  /** Runs the handler for `label` on the original request and returns its output untouched. */
  async dispatch(label: L, request: Req): Promise<Res> {
    const known = Object.hasOwn(this.table, label);
    if (!known) {
      this.logger.warn({ label, fallback: this.fallback }, '[dispatcher] unmapped label');
    }
    const handler = this.table[known ? label : this.fallback];
    this.logger.debug({ label }, '[dispatcher] dispatching');
    return handler(request);
  }
}
