import { z } from 'zod';

import { ConfigurationError } from '@core/errors/configuration.error.js';

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const TEMPERATURE_MIN = 0;
export const TEMPERATURE_MAX = 2;

const toNumber = <T extends z.ZodTypeAny>(fallback: number, schema: T) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), schema);

const toOptionalString = () =>
  z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), z.string().optional());

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: LogLevel.default('info'),

  OPENAI_API_KEY: z
    .string({ required_error: 'OPENAI_API_KEY is required' })
    .trim()
    .min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_BASE_URL: toOptionalString(),
  OPENAI_TEMPERATURE: toNumber(0, z.number().min(TEMPERATURE_MIN).max(TEMPERATURE_MAX)),

  MODEL_RETRIES: toNumber(0, z.number().int().min(0)),
  MODEL_TIMEOUT_MS: toNumber(0, z.number().int().min(0)),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Validates the environment once at startup. The entry point owns the result
 * and passes it to whatever needs it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new ConfigurationError(message);
  }
  return Object.freeze(parsed.data);
}
