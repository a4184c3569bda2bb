import { ModelInvocationError } from '@core/errors/model-invocation.error.js';

/**
 * Rejects with a 408 `ModelInvocationError` once `ms` elapses. The underlying
 * call is not cancelled; its late result is dropped.
 */
export async function withTimeout<T>(fn: () => Promise<T>, ms: number): Promise<T> {
  if (ms <= 0) return fn();

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ModelInvocationError(`Model call timed out after ${ms}ms`, 408));
    }, ms);
  });

  try {
    return await Promise.race([fn(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
