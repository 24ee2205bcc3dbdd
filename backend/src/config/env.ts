/**
 * ENVIRONMENT CONFIG
 *
 * Single place that reads process.env. Everything else imports `env`.
 */

import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8002),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  DATA_DIR: z.string().min(1).default('./data'),

  FORECAST_HORIZON: z.coerce.number().int().min(1).max(120).default(6),
  FORECAST_WINDOW: z.coerce.number().int().min(2).max(600).default(12),
  CORRELATION_MIN_OVERLAP: z.coerce.number().int().min(2).default(6),
  SAMPLE_HISTORY_MONTHS: z.coerce.number().int().min(1).max(600).default(24),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment configuration:\n  ${issues.join('\n  ')}`);
  }
  return result.data;
}

export const env: Env = parseEnv(process.env);
