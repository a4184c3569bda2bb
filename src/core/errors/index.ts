export * from './base-error.js';
export * from './configuration.error.js';
export * from './model-invocation.error.js';
export * from './output-parse.error.js';
export * from './validation.error.js';
