import { BaseError } from './base-error.js';

/**
 * Transport, auth, quota or timeout failure reported by the model provider.
 * `status` is the HTTP status when the provider returned one.
 */
export class ModelInvocationError extends BaseError {
  constructor(
    message = 'Model invocation failed',
    public readonly status?: number,
    cause?: unknown,
  ) {
    super('MODEL_INVOCATION_ERROR', message, { cause });
  }
}
