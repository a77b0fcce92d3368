/**
 * Redis key builders - canonical key patterns
 *
 * All keys use the 'app:' prefix to avoid collisions.
 */

import type { QuotaKind } from '../db/schema.js';

/**
 * Namespace for all app keys
 */
const KEY_PREFIX = 'app';

/**
 * Generate a prefixed key
 */
function prefix(...parts: string[]): string {
  return [KEY_PREFIX, ...parts].join(':');
}

/**
 * Daily quota counter
 *
 * Pattern: app:quota:{account_id}:{kind}:{yyyymmdd}
 * Example: app:quota:3:video_tokens:20250124
 */
export function quotaKey(accountId: number, kind: QuotaKind, dayKey: string): string {
  return prefix('quota', String(accountId), kind, dayKey);
}

/**
 * Day key embedded in a quota key
 */
export function dayOfQuotaKey(key: string): string {
  const parts = key.split(':');
  return parts[parts.length - 1] ?? '';
}

export const keys = {
  quota: quotaKey,
};
