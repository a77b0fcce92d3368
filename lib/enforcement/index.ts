/**
 * Quota enforcement and coordination
 */

import { isRedisConfigured } from '../redis/client.js';
import { QuotaLedger, type LedgerOptions } from './ledger.js';
import { MemoryQuotaLedger } from './memory-ledger.js';
import { RedisQuotaLedger } from './redis-ledger.js';

export { QuotaLedger, limitFor, type QuotaSubject, type DebitResult, type LedgerOptions } from './ledger.js';
export { MemoryQuotaLedger } from './memory-ledger.js';
export { RedisQuotaLedger } from './redis-ledger.js';
export { KeyedMutex, InflightSet } from './locks.js';
export { RefundQueue, type RefundRequest, type DrainSummary } from './refunds.js';

/**
 * Redis ledger when Redis is configured, otherwise the in-process one
 */
export function createQuotaLedger(options: LedgerOptions = {}): QuotaLedger {
  return isRedisConfigured() ? new RedisQuotaLedger(options) : new MemoryQuotaLedger(options);
}
