/**
 * In-process quota ledger
 *
 * Each operation reads and writes its counter without awaiting in between,
 * so it is atomic with respect to every other operation in this process.
 */

import { quotaKey, dayOfQuotaKey } from '../redis/keys.js';
import type { QuotaKind } from '../db/schema.js';
import { QuotaLedger, type DebitResult, type QuotaSubject } from './ledger.js';

const DAY_MS = 86_400_000;

export class MemoryQuotaLedger extends QuotaLedger {
  private counters = new Map<string, number>();

  async used(accountId: number, kind: QuotaKind, day: string = this.dayKey()): Promise<number> {
    return this.counters.get(quotaKey(accountId, kind, day)) ?? 0;
  }

  protected async debit(
    account: QuotaSubject,
    kind: QuotaKind,
    amount: number,
    limit: number
  ): Promise<DebitResult> {
    const now = this.now();
    const day = this.dayKey(now);
    this.prune(now);

    const key = quotaKey(account.id, kind, day);
    const current = this.counters.get(key) ?? 0;

    if (current + amount > limit) {
      return { success: false, used: current, remaining: Math.max(0, limit - current), day };
    }

    const used = current + amount;
    this.counters.set(key, used);
    return { success: true, used, remaining: limit - used, day };
  }

  protected async adjust(accountId: number, kind: QuotaKind, delta: number, day: string): Promise<number> {
    const key = quotaKey(accountId, kind, day);
    const updated = Math.max(0, (this.counters.get(key) ?? 0) + delta);
    this.counters.set(key, updated);
    return updated;
  }

  /**
   * Drop counters older than yesterday
   */
  private prune(now: Date): void {
    const keep = new Set([this.dayKey(now), this.dayKey(new Date(now.getTime() - DAY_MS))]);
    for (const key of this.counters.keys()) {
      if (!keep.has(dayOfQuotaKey(key))) {
        this.counters.delete(key);
      }
    }
  }
}
