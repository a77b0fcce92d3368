/**
 * Configuration loader with Zod validation
 *
 * Loads environment variables and validates them at runtime.
 * Throws descriptive errors for missing or invalid configuration.
 */

import { z } from 'zod';

/**
 * Comma-separated list, trimmed, empties dropped
 */
const csv = z
  .string()
  .optional()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

/**
 * Environment variable schema for validation
 */
const envSchema = z.object({
  // Database (empty = in-process repositories)
  DATABASE_URL: z.union([z.literal(''), z.string().url()]).optional().default(''),

  // Redis (Upstash). Empty = in-process quota ledger
  UPSTASH_REDIS_REST_URL: z.union([z.literal(''), z.string().url()]).optional().default(''),
  UPSTASH_REDIS_REST_TOKEN: z.string().optional().default(''),

  // Auth
  AUTH_SECRET: z.union([z.literal(''), z.string().min(16)]).optional().default(''),
  API_KEYS: csv,

  // Providers
  VOLCANO_API_BASE: z.string().url().default('https://ark.cn-beijing.volces.com/api/v3'),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Quota
  DEFAULT_VIDEO_DAILY_LIMIT: z.coerce.number().int().nonnegative().default(1_800_000),
  DEFAULT_IMAGE_DAILY_LIMIT: z.coerce.number().int().nonnegative().default(200),
  QUOTA_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(480),

  // Polling
  POLL_INTERVAL_MS: z.coerce.number().int().min(250).default(5000),
  POLL_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),

  // App
  MEDIA_DIR: z.string().min(1).default('./data/media'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables
 *
 * @throws Error if required variables are missing or invalid
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');

    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

/**
 * Singleton config instance (lazily loaded)
 */
let configInstance: Env | null = null;

/**
 * Get configuration (singleton pattern)
 */
export function getConfig(): Env {
  if (!configInstance) {
    configInstance = loadEnv();
  }
  return configInstance;
}

/**
 * Config object for use in the application
 * Use this instead of directly accessing process.env
 */
export const config = getConfig();
