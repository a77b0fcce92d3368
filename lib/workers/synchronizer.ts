/**
 * Status synchronizer
 *
 * The only writer of task status after creation. Every operation on a task
 * runs under that task's lock, and every transition is a compare-and-set
 * from an active status, so a task is refunded at most once no matter how
 * many syncs, cancels or deletes race for it. The refund is written as
 * `refundDue` in that same transition and cleared once the ledger takes it,
 * so a credit that fails is retried by the next sync.
 */

import { createLogger } from '../observability/logger.js';
import {
  LIFECYCLE_EVENTS,
  incrementMetric,
  logLifecycleEvent,
  type LifecycleEvent,
} from '../observability/metrics.js';
import { ApiError, ERROR_CODES, describeError } from '../security/errors.js';
import {
  ACTIVE_STATUSES,
  TASK_STATUS,
  TASK_TYPE,
  isTerminal,
  type Task,
  type TaskStatus,
} from '../db/schema.js';
import type { AccountRepository, TaskPatch, TaskRepository } from '../db/repositories.js';
import type { QuotaLedger } from '../enforcement/ledger.js';
import { KeyedMutex } from '../enforcement/locks.js';
import type { ProviderClient, ProviderOutcome } from '../providers/types.js';
import type { InlineJobRegistry } from '../queue/inline-jobs.js';
import type { MediaStore } from '../storage/media-store.js';

const logger = createLogger({ module: 'synchronizer' });

type UnsuccessfulStatus = typeof TASK_STATUS.FAILED | typeof TASK_STATUS.CANCELLED | typeof TASK_STATUS.EXPIRED;

const DEFAULT_MESSAGES: Record<UnsuccessfulStatus, string> = {
  failed: 'Generation failed',
  cancelled: 'Cancelled',
  expired: 'Task expired before completion',
};

const LIFECYCLE_FOR: Record<UnsuccessfulStatus, LifecycleEvent> = {
  failed: LIFECYCLE_EVENTS.FAILED,
  cancelled: LIFECYCLE_EVENTS.CANCELLED,
  expired: LIFECYCLE_EVENTS.EXPIRED,
};

export const CANCELLED_BY_USER = 'Cancelled by user';

export interface SynchronizerDeps {
  accounts: AccountRepository;
  tasks: TaskRepository;
  ledger: QuotaLedger;
  provider: ProviderClient;
  inlineJobs: InlineJobRegistry;
  media: MediaStore;
  now?: () => Date;
}

function isUnsuccessful(status: TaskStatus): status is UnsuccessfulStatus {
  return status === TASK_STATUS.FAILED || status === TASK_STATUS.CANCELLED || status === TASK_STATUS.EXPIRED;
}

function isInline(task: Task): boolean {
  return task.taskType !== TASK_TYPE.VIDEO;
}

export class StatusSynchronizer {
  private locks = new KeyedMutex();
  private now: () => Date;

  constructor(private deps: SynchronizerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * True while an operation holds the task's lock
   */
  isBusy(taskId: string): boolean {
    return this.locks.isLocked(taskId);
  }

  /**
   * Bring a task up to date with its provider. Terminal tasks come back
   * unchanged apart from settling a refund still owed; provider errors
   * propagate and leave the task untouched.
   */
  async sync(taskId: string): Promise<Task> {
    return this.locks.runExclusive(taskId, async () => {
      const task = await this.load(taskId);
      if (isTerminal(task.status)) return this.settleRefund(task);

      const outcome = await this.query(task);
      return this.apply(task, outcome);
    });
  }

  /**
   * User cancel of a queued or running task
   */
  async cancel(taskId: string): Promise<Task> {
    return this.locks.runExclusive(taskId, async () => {
      const task = await this.load(taskId);
      if (isTerminal(task.status)) {
        throw new ApiError(ERROR_CODES.INVALID_STATE, `Task ${taskId} is already ${task.status}`, 409);
      }
      return this.cancelActive(task);
    });
  }

  /**
   * Remove a task. An active task is cancelled and refunded first; waits for
   * any in-flight sync of the same task.
   */
  async delete(taskId: string): Promise<void> {
    await this.locks.runExclusive(taskId, async () => {
      const task = await this.load(taskId);
      if (isTerminal(task.status)) {
        await this.settleRefund(task);
      } else {
        await this.cancelActive(task);
      }

      await this.deps.tasks.delete(taskId);
      await this.deps.media.removeTask(taskId);
      logger.info({ taskId, status: task.status }, 'Task deleted');
    });
  }

  // ----- Internals (caller holds the task lock) -----

  private async load(taskId: string): Promise<Task> {
    const task = await this.deps.tasks.findByTaskId(taskId);
    if (!task) {
      throw new ApiError(ERROR_CODES.NOT_FOUND, `Task ${taskId} not found`, 404);
    }
    return task;
  }

  private async query(task: Task): Promise<ProviderOutcome> {
    if (isInline(task)) {
      return this.deps.inlineJobs.poll(task.taskId, task.createdAt);
    }

    const account = await this.deps.accounts.findById(task.accountId);
    if (!account) {
      throw new ApiError(ERROR_CODES.NOT_FOUND, `Account ${task.accountId} not found`, 404);
    }

    try {
      return await this.deps.provider.queryVideo(account, task.taskId);
    } catch (error) {
      logger.warn({ taskId: task.taskId, error: describeError(error) }, 'Provider status query failed');
      throw error;
    }
  }

  private async apply(task: Task, outcome: ProviderOutcome): Promise<Task> {
    const status = outcome.status;

    if (status === null || status === TASK_STATUS.QUEUED) {
      return task;
    }
    if (status === TASK_STATUS.RUNNING) {
      if (task.status !== TASK_STATUS.QUEUED) return task;
      const updated = await this.deps.tasks.transition(
        task.taskId,
        [TASK_STATUS.QUEUED],
        { status: TASK_STATUS.RUNNING },
        this.now()
      );
      return updated ?? this.load(task.taskId);
    }
    if (status === TASK_STATUS.SUCCEEDED) {
      return this.succeed(task, outcome);
    }
    return this.finishUnsuccessful(task, status, outcome.errorMessage);
  }

  private async succeed(task: Task, outcome: ProviderOutcome): Promise<Task> {
    if (!outcome.result) {
      return this.finishUnsuccessful(task, TASK_STATUS.FAILED, 'Provider reported success without a result');
    }

    const patch: TaskPatch = {
      status: TASK_STATUS.SUCCEEDED,
      result: outcome.result,
      errorMessage: null,
      tokenUsage: outcome.tokenUsage ?? task.tokenUsage,
      imageCount: outcome.imageCount ?? task.imageCount,
      ...(outcome.conversationHistory && { conversationHistory: outcome.conversationHistory }),
    };

    const updated = await this.deps.tasks.transition(task.taskId, ACTIVE_STATUSES, patch, this.now());
    this.deps.inlineJobs.forget(task.taskId);
    if (!updated) return this.load(task.taskId);

    logLifecycleEvent(LIFECYCLE_EVENTS.SUCCEEDED, task.taskId, {
      accountId: task.accountId,
      estimatedCost: task.estimatedCost,
      actualUsage: outcome.usage,
    });
    await this.reconcileUsage(task, outcome.usage);
    return updated;
  }

  /**
   * Move the ledger from the estimate to what the provider reports it used
   */
  private async reconcileUsage(task: Task, actual: number | undefined): Promise<void> {
    if (actual === undefined || !Number.isSafeInteger(actual) || actual < 0) return;
    const delta = actual - task.estimatedCost;
    if (delta === 0) return;

    try {
      if (delta < 0) {
        await this.deps.ledger.credit(task.accountId, task.quotaKind, -delta, task.quotaDay);
      } else {
        await this.deps.ledger.charge(task.accountId, task.quotaKind, delta, task.quotaDay);
      }
    } catch (error) {
      incrementMetric('usage_reconcile_failure');
      logger.error(
        { taskId: task.taskId, delta, day: task.quotaDay, error: describeError(error) },
        'Usage reconciliation failed; ledger keeps the estimate'
      );
      return;
    }

    logger.debug({ taskId: task.taskId, delta, day: task.quotaDay }, 'Usage reconciled');
  }

  /**
   * Terminal transition without a result that also marks the estimate as
   * owed, then the refund. Only the caller whose transition lands owes it.
   */
  private async finishUnsuccessful(task: Task, status: TaskStatus, message?: string): Promise<Task> {
    const terminal: UnsuccessfulStatus = isUnsuccessful(status) ? status : TASK_STATUS.FAILED;
    const errorMessage = message?.trim() || DEFAULT_MESSAGES[terminal];

    const updated = await this.deps.tasks.transition(
      task.taskId,
      ACTIVE_STATUSES,
      { status: terminal, errorMessage, result: null, refundDue: task.estimatedCost },
      this.now()
    );
    this.deps.inlineJobs.forget(task.taskId);
    if (!updated) return this.load(task.taskId);

    logLifecycleEvent(LIFECYCLE_FOR[terminal], task.taskId, { accountId: task.accountId, errorMessage });
    return this.settleRefund(updated);
  }

  /**
   * Credit a refund the task still owes. The claim clears `refundDue` first;
   * a credit that fails puts it back and rethrows, leaving it for the next sync.
   */
  private async settleRefund(task: Task): Promise<Task> {
    const amount = task.refundDue;
    if (amount <= 0) return task;

    const claimed = await this.deps.tasks.claimRefund(task.taskId, amount);
    if (!claimed) return this.load(task.taskId);

    try {
      await this.deps.ledger.credit(task.accountId, task.quotaKind, amount, task.quotaDay);
    } catch (error) {
      incrementMetric('refund_failure');
      logger.error(
        { taskId: task.taskId, amount, day: task.quotaDay, error: describeError(error) },
        'Refund failed, kept for retry'
      );
      await this.deps.tasks.restoreRefund(task.taskId, amount);
      throw error;
    }

    logLifecycleEvent(LIFECYCLE_EVENTS.REFUNDED, task.taskId, {
      accountId: task.accountId,
      kind: task.quotaKind,
      amount,
      day: task.quotaDay,
    });
    return claimed;
  }

  private async cancelActive(task: Task): Promise<Task> {
    if (isInline(task)) {
      this.deps.inlineJobs.forget(task.taskId);
    } else {
      await this.cancelUpstream(task);
    }
    return this.finishUnsuccessful(task, TASK_STATUS.CANCELLED, CANCELLED_BY_USER);
  }

  /**
   * Ask the provider to stop a video task. Best effort: the local cancel
   * goes ahead either way.
   */
  private async cancelUpstream(task: Task): Promise<void> {
    const account = await this.deps.accounts.findById(task.accountId);
    if (!account) return;

    try {
      await this.deps.provider.cancelVideo(account, task.taskId);
    } catch (error) {
      logger.warn({ taskId: task.taskId, error: describeError(error) }, 'Provider cancel failed');
    }
  }
}
