/**
 * Redis-backed quota ledger
 *
 * Debits run as one Lua script per call, so check-then-increment is atomic
 * per counter key. Each day has its own key; the first debit of a day
 * starts from zero, which is the daily reset.
 */

import { getRedis } from '../redis/client.js';
import { quotaKey } from '../redis/keys.js';
import { LuaScripts, getScript } from '../redis/lua/loader.js';
import { quotaCounterTtl } from '../billing/quota-day.js';
import type { QuotaKind } from '../db/schema.js';
import { QuotaLedger, type DebitResult, type QuotaSubject } from './ledger.js';

export class RedisQuotaLedger extends QuotaLedger {
  async used(accountId: number, kind: QuotaKind, day: string = this.dayKey()): Promise<number> {
    const value = await getRedis().get<number | string>(quotaKey(accountId, kind, day));
    return value === null ? 0 : Number(value);
  }

  protected async debit(
    account: QuotaSubject,
    kind: QuotaKind,
    amount: number,
    limit: number
  ): Promise<DebitResult> {
    const redis = getRedis();
    const script = await getScript(redis, LuaScripts.COUNTER_WITH_LIMIT);
    const now = this.now();
    const day = this.dayKey(now);
    const ttl = quotaCounterTtl(now, this.offsetMinutes);

    try {
      const [allowed, used, remaining] = await redis.evalsha<number[], [number, number, number]>(
        script.sha,
        [quotaKey(account.id, kind, day)],
        [amount, limit, ttl]
      );

      return {
        success: allowed === 1,
        used,
        remaining: remaining >= 0 ? remaining : 0,
        day,
      };
    } catch (error) {
      throw new Error(`Failed to debit ${kind} quota for account ${account.id}: ${String(error)}`);
    }
  }

  protected async adjust(accountId: number, kind: QuotaKind, delta: number, day: string): Promise<number> {
    const redis = getRedis();
    const script = await getScript(redis, LuaScripts.COUNTER_ADJUST);
    const ttl = quotaCounterTtl(this.now(), this.offsetMinutes);

    try {
      return await redis.evalsha<number[], number>(
        script.sha,
        [quotaKey(accountId, kind, day)],
        [delta, ttl]
      );
    } catch (error) {
      throw new Error(`Failed to adjust ${kind} quota for account ${accountId}: ${String(error)}`);
    }
  }
}
