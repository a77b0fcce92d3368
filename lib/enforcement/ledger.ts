/**
 * Quota ledger contract
 *
 * Per-account, per-kind daily counters. Every mutation goes through
 * tryDebit / credit / charge; nothing reads-modifies-writes a counter.
 */

import { QUOTA_KIND, type QuotaKind } from '../db/schema.js';
import { formatDayKey } from '../billing/quota-day.js';
import { config } from '../utils/config.js';

/**
 * The account fields the ledger needs
 */
export interface QuotaSubject {
  id: number;
  videoDailyLimit: number;
  imageDailyLimit: number;
}

/**
 * Result of a debit attempt
 */
export interface DebitResult {
  success: boolean;
  used: number;
  remaining: number;
  /** Day key the counter belongs to; refunds must name it */
  day: string;
}

export interface LedgerOptions {
  now?: () => Date;
  offsetMinutes?: number;
}

export function limitFor(account: QuotaSubject, kind: QuotaKind): number {
  return kind === QUOTA_KIND.VIDEO_TOKENS ? account.videoDailyLimit : account.imageDailyLimit;
}

function assertAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new RangeError(`Quota amount must be a non-negative integer, got ${amount}`);
  }
}

export abstract class QuotaLedger {
  protected readonly now: () => Date;
  protected readonly offsetMinutes: number;

  constructor(options: LedgerOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.offsetMinutes = options.offsetMinutes ?? config.QUOTA_UTC_OFFSET_MINUTES;
  }

  /**
   * Day key for a moment (defaults to now)
   */
  dayKey(at: Date = this.now()): string {
    return formatDayKey(at, this.offsetMinutes);
  }

  /**
   * Units consumed on a day (defaults to today)
   */
  abstract used(accountId: number, kind: QuotaKind, day?: string): Promise<number>;

  protected abstract debit(account: QuotaSubject, kind: QuotaKind, amount: number, limit: number): Promise<DebitResult>;

  protected abstract adjust(accountId: number, kind: QuotaKind, delta: number, day: string): Promise<number>;

  async remaining(account: QuotaSubject, kind: QuotaKind): Promise<number> {
    const used = await this.used(account.id, kind);
    return Math.max(0, limitFor(account, kind) - used);
  }

  /**
   * Atomically consume `amount` if it fits under today's limit
   */
  async tryDebit(account: QuotaSubject, kind: QuotaKind, amount: number): Promise<DebitResult> {
    assertAmount(amount);
    return this.debit(account, kind, amount, limitFor(account, kind));
  }

  /**
   * Give units back to the day they were debited on. Clamped at zero.
   */
  async credit(accountId: number, kind: QuotaKind, amount: number, day: string): Promise<number> {
    assertAmount(amount);
    if (amount === 0) return this.used(accountId, kind, day);
    return this.adjust(accountId, kind, -amount, day);
  }

  /**
   * Unchecked increase, for actual usage reported above the estimate
   */
  async charge(accountId: number, kind: QuotaKind, amount: number, day: string): Promise<number> {
    assertAmount(amount);
    if (amount === 0) return this.used(accountId, kind, day);
    return this.adjust(accountId, kind, amount, day);
  }
}
