/**
 * Quota day boundaries
 *
 * Daily counters roll over at midnight of a fixed UTC offset (default +08:00).
 */

import { config } from '../utils/config.js';

const MINUTE_MS = 60_000;
const DAY_SECONDS = 86_400;

function shift(date: Date, offsetMinutes: number): Date {
  return new Date(date.getTime() + offsetMinutes * MINUTE_MS);
}

/**
 * Format the quota day key (YYYYMMDD) a moment falls in
 *
 * @param date - Moment to format (defaults to now)
 * @param offsetMinutes - Boundary offset from UTC
 */
export function formatDayKey(
  date: Date = new Date(),
  offsetMinutes: number = config.QUOTA_UTC_OFFSET_MINUTES
): string {
  const local = shift(date, offsetMinutes);
  const year = local.getUTCFullYear();
  const month = String(local.getUTCMonth() + 1).padStart(2, '0');
  const day = String(local.getUTCDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

/**
 * Seconds until the current quota day ends (at least 1)
 */
export function secondsUntilDayEnd(
  date: Date = new Date(),
  offsetMinutes: number = config.QUOTA_UTC_OFFSET_MINUTES
): number {
  const local = shift(date, offsetMinutes);
  const nextMidnight = Date.UTC(local.getUTCFullYear(), local.getUTCMonth(), local.getUTCDate() + 1);
  return Math.max(1, Math.ceil((nextMidnight - local.getTime()) / 1000));
}

/**
 * Counter TTL: the rest of today plus one day, so late refunds against
 * yesterday's debit still find their key
 */
export function quotaCounterTtl(
  date: Date = new Date(),
  offsetMinutes: number = config.QUOTA_UTC_OFFSET_MINUTES
): number {
  return secondsUntilDayEnd(date, offsetMinutes) + DAY_SECONDS;
}
