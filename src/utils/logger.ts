import pino, { type Logger } from 'pino';

import { LogLevel, type AppConfig } from '@config/env.config';

type LoggerConfig = Pick<AppConfig, 'LOG_LEVEL' | 'NODE_ENV'>;

export function createLogger(config: LoggerConfig): Logger {
  return pino({
    level: config.LOG_LEVEL,
    base: { service: 'prompt-workflows', environment: config.NODE_ENV },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(config.NODE_ENV === 'development' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

// fallback for components constructed without an explicit logger; an invalid
// LOG_LEVEL is reported by loadConfig, not here
const fallbackLevel = LogLevel.safeParse(process.env.LOG_LEVEL);

export const logger: Logger = pino({ level: fallbackLevel.success ? fallbackLevel.data : 'info' });

export type { Logger };
