/**
 * Environment configuration
 *
 * `server.ts` loads `.env` (dotenv) and calls `loadEnv()` once at boot;
 * tests pass their own source object.
 */

import path from 'path';
import { z } from 'zod';

export const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8504),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: LogLevelSchema,
  CORS_ORIGINS: z.string().default('*'),

  // Artifact locations
  INSIGHTS_BASE_DIR: z.string().default('.'),
  INSIGHTS_OUTPUTS_DIR: z.string().optional(),
  INSIGHTS_DATA_DIR: z.string().optional(),

  // Fallback forecast horizon (months)
  FORECAST_DEFAULT_HORIZON: z.coerce.number().int().min(1).default(3),
  FORECAST_MAX_HORIZON: z.coerce.number().int().min(1).default(12),
});

export type Env = z.infer<typeof EnvSchema> & {
  outputsDir: string;
  dataDir: string;
};

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid environment: ${issues}`);
  }

  const cfg = parsed.data;
  if (cfg.FORECAST_DEFAULT_HORIZON > cfg.FORECAST_MAX_HORIZON) {
    throw new Error(
      `[Config] FORECAST_DEFAULT_HORIZON (${cfg.FORECAST_DEFAULT_HORIZON}) exceeds FORECAST_MAX_HORIZON (${cfg.FORECAST_MAX_HORIZON})`
    );
  }

  const base = path.resolve(cfg.INSIGHTS_BASE_DIR);
  return {
    ...cfg,
    outputsDir: path.resolve(base, cfg.INSIGHTS_OUTPUTS_DIR ?? 'outputs'),
    dataDir: path.resolve(base, cfg.INSIGHTS_DATA_DIR ?? 'data'),
  };
}
