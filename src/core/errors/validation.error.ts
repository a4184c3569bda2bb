import { BaseError } from './base-error.js';

export class ValidationError extends BaseError {
  constructor(
    message = 'Validation failed',
    public readonly issues: string[] = [],
  ) {
    super('VALIDATION_ERROR', message);
  }
}
