/**
 * Runtime Configuration
 *
 * Environment is parsed once at boot and handed to components explicitly.
 * Nothing below reads process.env after loadEnv() returns.
 */

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  API_HOST: z.string().min(1).default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  CORS_ORIGINS: z.string().min(1).default('*'),

  // Record store
  DATA_PATH: z.string().min(1).default('./data'),
  BEHAVIOR_FILE: z.string().min(1).default('behavior_twin_monthly.jsonl'),
  DAILY_INTEL_FILE: z.string().min(1).default('daily_intel_report.jsonl'),
  WEB_INTEL_PATH: z.string().min(1).default('./data'),
  WEB_INTEL_FILE: z.string().min(1).default('daily_web_intel.jsonl'),
  RECORD_SOURCE: z.enum(['jsonl', 'mongo']).default('jsonl'),
  MONGO_URL: z.string().min(1).default('mongodb://localhost:27017/whatif'),

  MODEL_VERSION: z.string().min(1).default('1.0.0'),
});

export type Env = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * CORS_ORIGINS → value accepted by @fastify/cors
 */
export function corsOrigin(env: Pick<Env, 'CORS_ORIGINS'>): true | string[] {
  if (env.CORS_ORIGINS === '*') return true;
  return env.CORS_ORIGINS.split(',').map((o) => o.trim()).filter((o) => o.length > 0);
}
