import { ConfigurationError } from '@core/errors/configuration.error.js';
import type { Handler } from '@core/interfaces/index.js';

export type HandlerTable<L extends string, Req, Res> = { readonly [K in L]: Handler<Req, Res> };

/**
 * Freezes `handlers` after checking it covers exactly `labels`. Checked here
 * so that a gap shows up at startup, not on the first unlucky request.
 */
export function createHandlerTable<L extends string, Req, Res>(
  labels: readonly L[],
  handlers: HandlerTable<L, Req, Res>,
): HandlerTable<L, Req, Res> {
  const known = new Set<string>(labels);
  const missing = labels.filter((label) => typeof handlers[label] !== 'function');
  const extra = Object.keys(handlers).filter((key) => !known.has(key));

  const issues: string[] = [];
  if (missing.length) issues.push(`missing handlers for: ${missing.join(', ')}`);
  if (extra.length) issues.push(`handlers for unknown labels: ${extra.join(', ')}`);
  if (issues.length) {
    throw new ConfigurationError(`Invalid handler table (${issues.join('; ')})`);
  }
  return Object.freeze({ ...handlers });
}
