import { setTimeout as sleep } from 'timers/promises';

import { ModelInvocationError } from '@core/errors/model-invocation.error.js';

export interface RetryOptions {
  retries?: number;
  base?: number;
  max?: number;
  onRetry?: (error: ModelInvocationError, attempt: number, delayMs: number) => void;
}

/**
 * Caller-side retry around a whole chain or router invocation. Only transient
 * model failures (408, 429, 5xx) are retried; everything else is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, base = 250, max = 8000, onRetry } = options;
  let attempt = 0;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !(error instanceof ModelInvocationError) || !shouldRetry(error)) {
        throw error;
      }

      const delay = computeDelay(attempt, base, max);
      onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
      attempt += 1;
    }
  }
}

function computeDelay(attempt: number, base: number, max: number): number {
  const exponential = base * 2 ** attempt;
  const capped = Math.min(max, exponential);
  const jitter = capped / 2 + Math.random() * (capped / 2);
  return Math.max(base, Math.min(max, Math.round(jitter)));
}

export function shouldRetry(error: ModelInvocationError): boolean {
  const { status } = error;
  if (status === undefined) return false;
  if (status === 408 || status === 429) return true;
  return status >= 500;
}
