/**
 * Inline provider jobs
 *
 * Image and banana providers answer the request itself instead of handing
 * back a task id. The call runs here, in process, while its task sits in
 * `running`; the synchronizer reads the outcome through `poll` and is still
 * the only writer of the terminal state. Forgetting a job aborts the signal
 * its runner was given.
 */

import { createLogger } from '../observability/logger.js';
import { describeError } from '../security/errors.js';
import { TASK_STATUS } from '../db/schema.js';
import type { ProviderOutcome } from '../providers/types.js';

const logger = createLogger({ module: 'inline-jobs' });

/**
 * How long a task may be missing from the registry before it counts as lost.
 * Longer than any inline provider call can take.
 */
export const LOST_JOB_GRACE_MS = 10 * 60_000;

export type InlineRunner = (signal: AbortSignal) => Promise<ProviderOutcome>;
export type SettledHandler = (taskId: string) => Promise<unknown>;

interface InlineJob {
  outcome: ProviderOutcome | null;
  controller: AbortController;
}

export class InlineJobRegistry {
  private jobs = new Map<string, InlineJob>();
  private unsettled = new Set<Promise<void>>();
  private onSettled: SettledHandler | null = null;

  constructor(private now: () => Date = () => new Date()) {}

  /**
   * Called with the task id once a job has an outcome
   */
  setSettledHandler(handler: SettledHandler): void {
    this.onSettled = handler;
  }

  start(taskId: string, run: InlineRunner): void {
    const job: InlineJob = { outcome: null, controller: new AbortController() };
    this.jobs.set(taskId, job);

    const settled: Promise<void> = run(job.controller.signal)
      .then(
        (outcome) => {
          job.outcome = outcome;
        },
        (error: unknown) => {
          job.outcome = { status: TASK_STATUS.FAILED, errorMessage: describeError(error) };
        }
      )
      .then(() => this.notify(taskId))
      .finally(() => {
        this.unsettled.delete(settled);
      });
    this.unsettled.add(settled);
  }

  private async notify(taskId: string): Promise<void> {
    if (!this.onSettled) return;
    try {
      await this.onSettled(taskId);
    } catch (error) {
      logger.warn({ taskId, error: describeError(error) }, 'Sync after inline job failed, next poll retries');
    }
  }

  /**
   * Current outcome for a task: running while pending, the settled outcome
   * after, expired once a job is missing past the grace period
   */
  poll(taskId: string, createdAt: Date): ProviderOutcome {
    const job = this.jobs.get(taskId);
    if (job) {
      return job.outcome ?? { status: TASK_STATUS.RUNNING };
    }
    if (this.now().getTime() - createdAt.getTime() < LOST_JOB_GRACE_MS) {
      return { status: null };
    }
    return { status: TASK_STATUS.EXPIRED, errorMessage: 'Generation was interrupted before it completed' };
  }

  has(taskId: string): boolean {
    return this.jobs.has(taskId);
  }

  forget(taskId: string): void {
    const job = this.jobs.get(taskId);
    if (!job) return;
    this.jobs.delete(taskId);
    job.controller.abort();
  }

  get size(): number {
    return this.jobs.size;
  }

  /**
   * Wait for every started job (and its follow-up sync) to settle,
   * forgotten ones included
   */
  async drain(): Promise<void> {
    await Promise.all([...this.unsettled]);
  }
}
