import { BaseError } from './base-error.js';

export class ConfigurationError extends BaseError {
  constructor(message = 'Invalid configuration') {
    super('CONFIGURATION_ERROR', message);
  }
}
