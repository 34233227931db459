import { z } from 'zod';

export const ARCHIVE_ENVIRONMENTS = ['prod', 'at', 'test', 'dev'] as const;
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  // Archive endpoints
  ARCHIVE_ENVIRONMENT: z.enum(ARCHIVE_ENVIRONMENTS).default('prod'),
  ARCHIVE_VO_BASE_URL: z.string().url().optional(),
  ARCHIVE_SODA_BASE_URL: z.string().url().optional(),

  // HTTP
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(1800000),
  STATUS_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),

  // Job polling
  POLL_INTERVAL_MS: z.coerce.number().int().min(0).default(20000),
  POLL_DEADLINE_MS: z.coerce.number().int().positive().default(7200000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
