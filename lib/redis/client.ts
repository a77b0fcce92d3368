/**
 * Redis client and connection utilities
 *
 * Uses @upstash/redis for serverless-compatible Redis operations
 * with built-in support for Lua scripting.
 */

import { Redis } from '@upstash/redis';
import { config } from '../utils/config.js';

let client: Redis | null = null;

/**
 * Whether a Redis endpoint is configured
 */
export function isRedisConfigured(): boolean {
  return config.UPSTASH_REDIS_REST_URL !== '' && config.UPSTASH_REDIS_REST_TOKEN !== '';
}

/**
 * Lazily create the singleton Redis client
 */
export function getRedis(): Redis {
  if (!client) {
    client = new Redis({
      url: config.UPSTASH_REDIS_REST_URL,
      token: config.UPSTASH_REDIS_REST_TOKEN,
      retry: {
        retries: 3,
        backoff: (attempt: number) => Math.min(50 * Math.pow(2, attempt), 1000),
      },
    });
  }
  return client;
}

export type RedisClient = Redis;

/**
 * Check if Redis connection is healthy
 */
export async function isRedisHealthy(): Promise<boolean> {
  try {
    const pong = await getRedis().ping();
    return pong === 'PONG';
  } catch {
    return false;
  }
}
