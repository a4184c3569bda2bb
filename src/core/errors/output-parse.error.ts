import { BaseError } from './base-error.js';

export class OutputParseError extends BaseError {
  constructor(
    message: string,
    public readonly raw: string,
    cause?: unknown,
  ) {
    super('OUTPUT_PARSE_ERROR', message, { cause });
  }
}
