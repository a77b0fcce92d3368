/**
 * Polling scheduler
 *
 * On a fixed interval, syncs every non-terminal task, and every terminal
 * task still owing a refund, with bounded concurrency. A task with a sync
 * already in flight is skipped for the tick; a task whose sync keeps failing
 * backs off exponentially. Deferred refunds are retried at the start of
 * each tick.
 */

import { createLogger } from '../observability/logger.js';
import { incrementMetric } from '../observability/metrics.js';
import { describeError } from '../security/errors.js';
import { InflightSet } from '../enforcement/locks.js';
import type { TaskRepository } from '../db/repositories.js';
import type { Task } from '../db/schema.js';
import type { RefundQueue } from '../enforcement/refunds.js';
import type { StatusSynchronizer } from './synchronizer.js';

const logger = createLogger({ module: 'poller' });

export const MAX_BACKOFF_MS = 60_000;

/** Active tasks examined per tick */
const DEFAULT_BATCH_SIZE = 500;

export interface PollingSchedulerOptions {
  intervalMs: number;
  concurrency: number;
  batchSize?: number;
  maxBackoffMs?: number;
  /** Deferred refunds to retry each tick */
  refunds?: Pick<RefundQueue, 'drain'>;
  now?: () => number;
}

export interface TickSummary {
  active: number;
  synced: number;
  failed: number;
  skipped: number;
}

interface Backoff {
  failures: number;
  notBefore: number;
}

export type SyncTarget = Pick<StatusSynchronizer, 'sync' | 'isBusy'>;

async function eachLimited<T>(items: T[], limit: number, work: (item: T) => Promise<void>): Promise<void> {
  let next = 0;
  const workers = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, async () => {
    while (next < items.length) {
      const item = items[next];
      next += 1;
      await work(item);
    }
  });
  await Promise.all(workers);
}

export class PollingScheduler {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;
  private inflight = new InflightSet();
  private backoff = new Map<string, Backoff>();
  private now: () => number;

  constructor(
    private tasks: TaskRepository,
    private synchronizer: SyncTarget,
    private options: PollingSchedulerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.runTick(), this.options.intervalMs);
    this.timer.unref();
    logger.info(
      { intervalMs: this.options.intervalMs, concurrency: this.options.concurrency },
      'Polling scheduler started'
    );
  }

  /**
   * Stop the timer and wait for the tick in progress
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Polling scheduler stopped');
    }
    await this.current;
  }

  private runTick(): void {
    if (this.current) {
      logger.debug('Previous tick still running, skipping');
      return;
    }
    this.current = this.tick()
      .then((summary) => {
        if (summary.synced + summary.failed > 0) {
          logger.debug(summary, 'Tick complete');
        }
      })
      .catch((error: unknown) => {
        logger.error({ error: describeError(error) }, 'Tick failed');
      })
      .finally(() => {
        this.current = null;
      });
  }

  /**
   * One pass over the active tasks
   */
  async tick(): Promise<TickSummary> {
    await this.drainRefunds();

    const active = await this.candidates();
    const summary: TickSummary = { active: active.length, synced: 0, failed: 0, skipped: 0 };
    const now = this.now();

    const due = active.filter((task) => {
      const ready =
        !this.inflight.has(task.taskId) && !this.synchronizer.isBusy(task.taskId) && this.isDue(task.taskId, now);
      if (!ready) summary.skipped += 1;
      return ready;
    });

    await eachLimited(due, this.options.concurrency, async (task) => {
      if (!this.inflight.acquire(task.taskId)) {
        summary.skipped += 1;
        return;
      }
      try {
        await this.synchronizer.sync(task.taskId);
        this.backoff.delete(task.taskId);
        summary.synced += 1;
      } catch (error) {
        summary.failed += 1;
        const delay = this.recordFailure(task.taskId);
        incrementMetric('sync_failure');
        logger.warn({ taskId: task.taskId, retryInMs: delay, error: describeError(error) }, 'Task sync failed');
      } finally {
        this.inflight.release(task.taskId);
      }
    });

    const activeIds = new Set(active.map((task) => task.taskId));
    for (const taskId of this.backoff.keys()) {
      if (!activeIds.has(taskId)) this.backoff.delete(taskId);
    }

    return summary;
  }

  /**
   * Non-terminal tasks plus terminal ones whose refund has not landed
   */
  private async candidates(): Promise<Task[]> {
    const limit = this.options.batchSize ?? DEFAULT_BATCH_SIZE;
    const [active, owing] = await Promise.all([this.tasks.listActive(limit), this.tasks.listRefundDue(limit)]);
    const seen = new Set(active.map((task) => task.taskId));
    return [...active, ...owing.filter((task) => !seen.has(task.taskId))];
  }

  private async drainRefunds(): Promise<void> {
    if (!this.options.refunds) return;
    try {
      const drained = await this.options.refunds.drain();
      if (drained.returned + drained.failed > 0) {
        logger.info(drained, 'Deferred refunds retried');
      }
    } catch (error) {
      incrementMetric('refund_drain_failure');
      logger.error({ error: describeError(error) }, 'Draining deferred refunds failed');
    }
  }

  private isDue(taskId: string, now: number): boolean {
    const entry = this.backoff.get(taskId);
    return !entry || entry.notBefore <= now;
  }

  /**
   * Register a failed sync; returns the delay before the next attempt
   */
  private recordFailure(taskId: string): number {
    const failures = (this.backoff.get(taskId)?.failures ?? 0) + 1;
    const delay = Math.min(
      this.options.intervalMs * 2 ** (failures - 1),
      this.options.maxBackoffMs ?? MAX_BACKOFF_MS
    );
    this.backoff.set(taskId, { failures, notBefore: this.now() + delay });
    return delay;
  }

  /**
   * Consecutive failures recorded for a task
   */
  failuresOf(taskId: string): number {
    return this.backoff.get(taskId)?.failures ?? 0;
  }
}
