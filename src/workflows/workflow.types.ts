import type { Logger } from '@utils/logger.js';

export interface WorkflowOptions {
  /** Overrides the client's configured default for every model call in the workflow. */
  temperature?: number;
  logger?: Logger;
}
