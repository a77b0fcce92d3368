/**
 * Unit tests for workers/poller.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PollingScheduler, type SyncTarget } from '../../lib/workers/poller.js';
import { StatusSynchronizer } from '../../lib/workers/synchronizer.js';
import { GenerationDispatcher } from '../../lib/generation/dispatcher.js';
import { QUOTA_KIND, TASK_STATUS, type Account, type Task } from '../../lib/db/schema.js';
import type { RefundQueue } from '../../lib/enforcement/refunds.js';
import { TODAY, createAccount, createHarness, type Harness } from '../helpers/fixtures.js';

describe('workers/poller', () => {
  let h: Harness;
  let account: Account;
  let dispatcher: GenerationDispatcher;
  let now: number;

  async function submitVideos(videoCount: number): Promise<void> {
    await dispatcher.dispatchVideo({
      prompt: 'a cat on a skateboard',
      ratio: '16:9',
      resolution: '720p',
      duration: 5,
      videoCount,
      generateAudio: true,
      seed: -1,
      watermark: false,
      cameraFixed: false,
    });
  }

  async function loadTask(taskId: string): Promise<Task> {
    const task = await h.repos.tasks.findByTaskId(taskId);
    if (!task) throw new Error(`missing ${taskId}`);
    return task;
  }

  function fakeTarget(sync: SyncTarget['sync']) {
    return {
      sync: vi.fn<SyncTarget['sync']>(sync),
      isBusy: vi.fn<SyncTarget['isBusy']>(() => false),
    };
  }

  function scheduler(
    target: SyncTarget,
    options: { concurrency?: number; maxBackoffMs?: number; refunds?: Pick<RefundQueue, 'drain'> } = {}
  ) {
    return new PollingScheduler(h.repos.tasks, target, {
      intervalMs: 1000,
      concurrency: options.concurrency ?? 4,
      maxBackoffMs: options.maxBackoffMs,
      refunds: options.refunds,
      now: () => now,
    });
  }

  const videoUsed = () => h.ledger.used(account.id, QUOTA_KIND.VIDEO_TOKENS, TODAY);

  beforeEach(async () => {
    h = createHarness();
    account = await createAccount(h);
    dispatcher = new GenerationDispatcher(h.deps);
    now = 0;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should sync every active task', async () => {
    await submitVideos(2);
    const poller = scheduler(new StatusSynchronizer(h.deps));

    await expect(poller.tick()).resolves.toEqual({ active: 2, synced: 2, failed: 0, skipped: 0 });
    await expect(loadTask('cgt-test-1')).resolves.toMatchObject({ status: TASK_STATUS.RUNNING });
    await expect(loadTask('cgt-test-2')).resolves.toMatchObject({ status: TASK_STATUS.RUNNING });
  });

  it('should stop polling tasks once they are terminal', async () => {
    await submitVideos(2);
    h.provider.queryVideo.mockResolvedValue({ status: TASK_STATUS.FAILED, errorMessage: 'timeout' });
    const poller = scheduler(new StatusSynchronizer(h.deps));

    await poller.tick();

    await expect(poller.tick()).resolves.toEqual({ active: 0, synced: 0, failed: 0, skipped: 0 });
    expect(h.provider.queryVideo).toHaveBeenCalledTimes(2);
  });

  it('should skip a task another operation holds', async () => {
    await submitVideos(1);
    const target = fakeTarget(loadTask);
    target.isBusy.mockReturnValue(true);

    await expect(scheduler(target).tick()).resolves.toEqual({ active: 1, synced: 0, failed: 0, skipped: 1 });
    expect(target.sync).not.toHaveBeenCalled();
  });

  it('should back off a task whose sync keeps failing', async () => {
    await submitVideos(1);
    const target = fakeTarget(async () => {
      throw new Error('volcano error 503: busy');
    });
    const poller = scheduler(target);

    await expect(poller.tick()).resolves.toMatchObject({ failed: 1 });
    expect(poller.failuresOf('cgt-test-1')).toBe(1);

    now = 999;
    await expect(poller.tick()).resolves.toMatchObject({ failed: 0, skipped: 1 });

    now = 1000;
    await expect(poller.tick()).resolves.toMatchObject({ failed: 1 });
    expect(poller.failuresOf('cgt-test-1')).toBe(2);

    now = 2999;
    await expect(poller.tick()).resolves.toMatchObject({ skipped: 1 });
    now = 3000;
    await expect(poller.tick()).resolves.toMatchObject({ failed: 1 });
    expect(target.sync).toHaveBeenCalledTimes(3);
  });

  it('should cap the backoff delay', async () => {
    await submitVideos(1);
    const poller = scheduler(
      fakeTarget(async () => {
        throw new Error('volcano error 503: busy');
      }),
      { maxBackoffMs: 1500 }
    );

    await poller.tick();
    now = 1000;
    await poller.tick();
    expect(poller.failuresOf('cgt-test-1')).toBe(2);

    now = 2499;
    await expect(poller.tick()).resolves.toMatchObject({ skipped: 1 });
    now = 2500;
    await expect(poller.tick()).resolves.toMatchObject({ failed: 1 });
  });

  it('should clear the backoff after a successful sync', async () => {
    await submitVideos(1);
    const target = fakeTarget(loadTask);
    target.sync.mockRejectedValueOnce(new Error('volcano error 503: busy'));
    const poller = scheduler(target);

    await poller.tick();
    now = 1000;
    await expect(poller.tick()).resolves.toMatchObject({ synced: 1 });

    expect(poller.failuresOf('cgt-test-1')).toBe(0);
  });

  it('should forget the backoff of tasks that left the active set', async () => {
    await submitVideos(1);
    const poller = scheduler(
      fakeTarget(async () => {
        throw new Error('volcano error 503: busy');
      })
    );
    await poller.tick();

    await new StatusSynchronizer(h.deps).cancel('cgt-test-1');
    await poller.tick();

    expect(poller.failuresOf('cgt-test-1')).toBe(0);
  });

  it('should respect the concurrency limit', async () => {
    await submitVideos(5);
    let running = 0;
    let peak = 0;
    const target = fakeTarget(async (taskId) => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running -= 1;
      return loadTask(taskId);
    });

    await expect(scheduler(target, { concurrency: 2 }).tick()).resolves.toMatchObject({ synced: 5 });
    expect(peak).toBe(2);
  });

  it('should tick on its interval until stopped', async () => {
    vi.useFakeTimers();
    await submitVideos(1);
    const target = fakeTarget(loadTask);
    const poller = scheduler(target);

    poller.start();
    expect(poller.isRunning).toBe(true);
    await vi.advanceTimersByTimeAsync(1000);
    await poller.stop();

    expect(poller.isRunning).toBe(false);
    expect(target.sync).toHaveBeenCalledWith('cgt-test-1');
  });

  it('should keep polling a terminal task until its refund lands', async () => {
    await submitVideos(1);
    h.provider.queryVideo.mockResolvedValue({ status: TASK_STATUS.FAILED, errorMessage: 'timeout' });
    vi.spyOn(h.ledger, 'credit').mockRejectedValueOnce(new Error('redis down'));
    const poller = scheduler(new StatusSynchronizer(h.deps));

    await expect(poller.tick()).resolves.toEqual({ active: 1, synced: 0, failed: 1, skipped: 0 });
    await expect(videoUsed()).resolves.toBe(108000);

    now = 1000;
    await expect(poller.tick()).resolves.toEqual({ active: 1, synced: 1, failed: 0, skipped: 0 });
    await expect(videoUsed()).resolves.toBe(0);

    await expect(poller.tick()).resolves.toEqual({ active: 0, synced: 0, failed: 0, skipped: 0 });
    expect(h.provider.queryVideo).toHaveBeenCalledTimes(1);
  });

  it('should retry deferred refunds on each tick', async () => {
    await h.ledger.tryDebit(account, QUOTA_KIND.VIDEO_TOKENS, 216000);
    await h.repos.refunds.record({
      accountId: account.id,
      quotaKind: QUOTA_KIND.VIDEO_TOKENS,
      amount: 216000,
      quotaDay: TODAY,
      reason: 'submission_failed',
    });
    const poller = scheduler(fakeTarget(loadTask), { refunds: h.refunds });

    await poller.tick();

    await expect(videoUsed()).resolves.toBe(0);
    await expect(h.repos.refunds.listPending()).resolves.toEqual([]);
  });

  it('should still sync tasks when draining refunds fails', async () => {
    await submitVideos(1);
    vi.spyOn(h.refunds, 'drain').mockRejectedValueOnce(new Error('connection terminated'));
    const poller = scheduler(fakeTarget(loadTask), { refunds: h.refunds });

    await expect(poller.tick()).resolves.toEqual({ active: 1, synced: 1, failed: 0, skipped: 0 });
  });
});
