/**
 * Unit tests for enforcement/refunds.ts
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { QUOTA_KIND, type Account } from '../../lib/db/schema.js';
import { NOON, TODAY, createAccount, createHarness, type Harness } from '../helpers/fixtures.js';

describe('enforcement/refunds', () => {
  let h: Harness;
  let account: Account;

  const imageUsed = () => h.ledger.used(account.id, QUOTA_KIND.IMAGE_COUNT, TODAY);

  function request(amount: number) {
    return { accountId: account.id, kind: QUOTA_KIND.IMAGE_COUNT, amount, day: TODAY, reason: 'submission_failed' };
  }

  function recordPending(amount: number) {
    return h.repos.refunds.record({
      accountId: account.id,
      quotaKind: QUOTA_KIND.IMAGE_COUNT,
      amount,
      quotaDay: TODAY,
      reason: 'submission_failed',
    });
  }

  beforeEach(async () => {
    h = createHarness();
    account = await createAccount(h);
    await h.ledger.tryDebit(account, QUOTA_KIND.IMAGE_COUNT, 5);
  });

  describe('returnQuota', () => {
    it('should credit the ledger', async () => {
      await expect(h.refunds.returnQuota(request(3))).resolves.toBe(true);

      await expect(imageUsed()).resolves.toBe(2);
      await expect(h.repos.refunds.listPending()).resolves.toEqual([]);
    });

    it('should skip an empty refund', async () => {
      const credit = vi.spyOn(h.ledger, 'credit');

      await expect(h.refunds.returnQuota(request(0))).resolves.toBe(true);

      expect(credit).not.toHaveBeenCalled();
    });

    it('should record a refund whose credit failed', async () => {
      vi.spyOn(h.ledger, 'credit').mockRejectedValueOnce(new Error('redis down'));

      await expect(h.refunds.returnQuota(request(3))).resolves.toBe(false);

      await expect(imageUsed()).resolves.toBe(5);
      await expect(h.repos.refunds.listPending()).resolves.toMatchObject([
        { accountId: account.id, quotaKind: QUOTA_KIND.IMAGE_COUNT, amount: 3, quotaDay: TODAY },
      ]);
    });
  });

  describe('drain', () => {
    it('should return recorded refunds', async () => {
      await recordPending(2);
      await recordPending(1);

      await expect(h.refunds.drain()).resolves.toEqual({ returned: 2, failed: 0 });

      await expect(imageUsed()).resolves.toBe(2);
      await expect(h.repos.refunds.listPending()).resolves.toEqual([]);
    });

    it('should keep a refund that fails again', async () => {
      await h.repos.refunds.record({
        accountId: account.id,
        quotaKind: QUOTA_KIND.IMAGE_COUNT,
        amount: 3,
        quotaDay: TODAY,
        reason: 'record_failed',
        createdAt: NOON,
      });
      vi.spyOn(h.ledger, 'credit').mockRejectedValueOnce(new Error('redis down'));

      await expect(h.refunds.drain()).resolves.toEqual({ returned: 0, failed: 1 });
      await expect(h.repos.refunds.listPending()).resolves.toMatchObject([
        { amount: 3, reason: 'record_failed', createdAt: NOON },
      ]);

      await expect(h.refunds.drain()).resolves.toEqual({ returned: 1, failed: 0 });
      await expect(imageUsed()).resolves.toBe(2);
    });
  });
});
