import { InvalidArgumentError } from 'commander';

import { loadConfig, type AppConfig } from '@config/env.config';

import type { ModelClient } from '@core/interfaces/index.js';

import { withRetry } from '@infra/openai/chat.retry.js';
import { createModelClient } from '@infra/openai/openai.client.js';

import { createLogger, type Logger } from '@utils/logger.js';
import { withTimeout } from '@utils/timeout.js';

export type GlobalOptions = {
  retries?: number;
  timeoutMs?: number;
};

export interface CliContext {
  config: Readonly<AppConfig>;
  logger: Logger;
  client: ModelClient;
  /** Applies the caller-side timeout and retry policy around one workflow run. */
  run<T>(fn: () => Promise<T>): Promise<T>;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parseTemperature(value: string): number {
  const parsed = Number.parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return parsed;
}

export function createContext(globals: GlobalOptions, env: NodeJS.ProcessEnv = process.env): CliContext {
  // fails before any client exists when the credential is missing
  const config = loadConfig(env);
  const logger = createLogger(config);
  const client = createModelClient(config, logger);

  const retries = globals.retries ?? config.MODEL_RETRIES;
  const timeoutMs = globals.timeoutMs ?? config.MODEL_TIMEOUT_MS;

  return {
    config,
    logger,
    client,
    run: (fn) =>
      withRetry(() => withTimeout(fn, timeoutMs), {
        retries,
        onRetry: (error, attempt, delayMs) => {
          logger.warn({ attempt, delayMs, status: error.status }, '[cli] retrying model call');
        },
      }),
  };
}
