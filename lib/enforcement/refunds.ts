/**
 * Deferred quota refunds
 *
 * Returns reserved quota that has no task to carry it. A credit that fails
 * is recorded and retried by the polling scheduler instead of being lost.
 */

import { createLogger } from '../observability/logger.js';
import { incrementMetric } from '../observability/metrics.js';
import { describeError } from '../security/errors.js';
import type { QuotaKind } from '../db/schema.js';
import type { QuotaRefundRepository } from '../db/repositories.js';
import type { QuotaLedger } from './ledger.js';

const logger = createLogger({ module: 'refunds' });

export interface RefundRequest {
  accountId: number;
  kind: QuotaKind;
  amount: number;
  day: string;
  reason: string;
}

export interface DrainSummary {
  returned: number;
  failed: number;
}

export class RefundQueue {
  constructor(
    private ledger: QuotaLedger,
    private refunds: QuotaRefundRepository
  ) {}

  /**
   * Credit the ledger now, or record the refund for a later drain.
   * Returns true when the credit landed. Throws only when the refund can be
   * neither credited nor recorded.
   */
  async returnQuota(request: RefundRequest): Promise<boolean> {
    if (request.amount <= 0) return true;
    const log = logger.child({ ...request });

    try {
      await this.ledger.credit(request.accountId, request.kind, request.amount, request.day);
    } catch (error) {
      log.warn({ error: describeError(error) }, 'Quota credit failed, deferring refund');
      await this.refunds.record({
        accountId: request.accountId,
        quotaKind: request.kind,
        amount: request.amount,
        quotaDay: request.day,
        reason: request.reason,
      });
      incrementMetric('refund_deferred');
      return false;
    }

    incrementMetric(`quota_returned_${request.kind}`, request.amount);
    log.info('Reserved quota returned');
    return true;
  }

  /**
   * Retry recorded refunds, oldest first
   */
  async drain(limit: number = 100): Promise<DrainSummary> {
    const summary: DrainSummary = { returned: 0, failed: 0 };

    for (const pending of await this.refunds.listPending(limit)) {
      const refund = await this.refunds.claim(pending.id);
      if (!refund) continue;

      try {
        await this.ledger.credit(refund.accountId, refund.quotaKind, refund.amount, refund.quotaDay);
      } catch (error) {
        summary.failed += 1;
        logger.warn({ refundId: refund.id, error: describeError(error) }, 'Deferred refund failed again');
        await this.refunds.record({
          accountId: refund.accountId,
          quotaKind: refund.quotaKind,
          amount: refund.amount,
          quotaDay: refund.quotaDay,
          reason: refund.reason,
          createdAt: refund.createdAt,
        });
        continue;
      }

      summary.returned += 1;
      incrementMetric(`quota_returned_${refund.quotaKind}`, refund.amount);
      logger.info(
        { refundId: refund.id, accountId: refund.accountId, amount: refund.amount, day: refund.quotaDay },
        'Deferred refund returned'
      );
    }

    return summary;
  }
}
