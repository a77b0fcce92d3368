/**
 * In-process repositories
 *
 * Used by the test suite and when no DATABASE_URL is configured. The
 * repositories share one store so account deletes cascade to tasks and
 * pending refunds.
 */

import { config } from '../utils/config.js';
import {
  ACTIVE_STATUSES,
  TASK_STATUS,
  type Account,
  type NewAccount,
  type Task,
  type NewTask,
  type QuotaRefund,
  type NewQuotaRefund,
  type TaskStatus,
} from './schema.js';
import {
  clampLimit,
  type AccountRepository,
  type QuotaRefundRepository,
  type TaskRepository,
  type TaskListFilter,
  type TaskPatch,
} from './repositories.js';

const DEFAULT_BANANA_MODEL = 'gemini-3-pro-image-preview';

export class MemoryStore {
  accounts = new Map<number, Account>();
  tasks = new Map<string, Task>();
  refunds = new Map<number, QuotaRefund>();
  nextAccountId = 1;
  nextTaskRowId = 1;
  nextRefundId = 1;
}

function newestFirst(a: Task, b: Task): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

export class MemoryAccountRepository implements AccountRepository {
  constructor(private store: MemoryStore = new MemoryStore()) {}

  async create(data: NewAccount): Promise<Account> {
    const now = new Date();
    const id = data.id ?? this.store.nextAccountId;
    if (this.store.accounts.has(id)) {
      throw new Error(`Account ${id} already exists`);
    }
    this.store.nextAccountId = Math.max(this.store.nextAccountId, id + 1);

    const account: Account = {
      id,
      name: data.name,
      apiKey: data.apiKey,
      videoModelId: data.videoModelId ?? null,
      imageModelId: data.imageModelId ?? null,
      bananaBaseUrl: data.bananaBaseUrl ?? null,
      bananaApiKey: data.bananaApiKey ?? null,
      bananaModelName: data.bananaModelName ?? DEFAULT_BANANA_MODEL,
      isActive: data.isActive ?? true,
      videoDailyLimit: data.videoDailyLimit ?? config.DEFAULT_VIDEO_DAILY_LIMIT,
      imageDailyLimit: data.imageDailyLimit ?? config.DEFAULT_IMAGE_DAILY_LIMIT,
      createdAt: data.createdAt ?? now,
      updatedAt: data.updatedAt ?? now,
    };
    this.store.accounts.set(id, account);
    return structuredClone(account);
  }

  async findById(id: number): Promise<Account | null> {
    const account = this.store.accounts.get(id);
    return account ? structuredClone(account) : null;
  }

  async list(): Promise<Account[]> {
    return [...this.store.accounts.values()]
      .sort((a, b) => a.id - b.id)
      .map((account) => structuredClone(account));
  }

  async update(id: number, data: Partial<NewAccount>): Promise<Account | null> {
    const existing = this.store.accounts.get(id);
    if (!existing) return null;

    const updated: Account = { ...existing };
    for (const [key, value] of Object.entries(data)) {
      if (value !== undefined && key !== 'id') {
        Object.assign(updated, { [key]: value });
      }
    }
    updated.updatedAt = new Date();
    this.store.accounts.set(id, updated);
    return structuredClone(updated);
  }

  async delete(id: number): Promise<boolean> {
    if (!this.store.accounts.delete(id)) return false;
    for (const [taskId, task] of this.store.tasks) {
      if (task.accountId === id) {
        this.store.tasks.delete(taskId);
      }
    }
    for (const [refundId, refund] of this.store.refunds) {
      if (refund.accountId === id) {
        this.store.refunds.delete(refundId);
      }
    }
    return true;
  }
}

export class MemoryTaskRepository implements TaskRepository {
  constructor(private store: MemoryStore = new MemoryStore()) {}

  async create(data: NewTask): Promise<Task> {
    if (this.store.tasks.has(data.taskId)) {
      throw new Error(`duplicate key value violates unique constraint "tasks_task_id_unique"`);
    }
    if (!this.store.accounts.has(data.accountId)) {
      throw new Error(`insert violates foreign key constraint on account ${data.accountId}`);
    }

    const now = new Date();
    const task: Task = {
      id: this.store.nextTaskRowId++,
      taskId: data.taskId,
      accountId: data.accountId,
      taskType: data.taskType,
      generationType: data.generationType,
      status: data.status ?? TASK_STATUS.QUEUED,
      params: data.params,
      quotaKind: data.quotaKind,
      estimatedCost: data.estimatedCost,
      quotaDay: data.quotaDay,
      batchId: data.batchId ?? null,
      parentTaskId: data.parentTaskId ?? null,
      result: data.result ?? null,
      tokenUsage: data.tokenUsage ?? null,
      imageCount: data.imageCount ?? null,
      errorMessage: data.errorMessage ?? null,
      conversationHistory: data.conversationHistory ?? null,
      refundDue: data.refundDue ?? 0,
      createdAt: data.createdAt ?? now,
      updatedAt: data.updatedAt ?? now,
    };
    this.store.tasks.set(task.taskId, task);
    return structuredClone(task);
  }

  async findByTaskId(taskId: string): Promise<Task | null> {
    const task = this.store.tasks.get(taskId);
    return task ? structuredClone(task) : null;
  }

  async list(filter: TaskListFilter = {}): Promise<Task[]> {
    return [...this.store.tasks.values()]
      .filter((task) => filter.accountId === undefined || task.accountId === filter.accountId)
      .filter((task) => !filter.status || task.status === filter.status)
      .filter((task) => !filter.taskType || task.taskType === filter.taskType)
      .sort(newestFirst)
      .slice(0, clampLimit(filter.limit))
      .map((task) => structuredClone(task));
  }

  async listActive(limit: number = 500): Promise<Task[]> {
    return [...this.store.tasks.values()]
      .filter((task) => ACTIVE_STATUSES.includes(task.status))
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .slice(0, limit)
      .map((task) => structuredClone(task));
  }

  async transition(
    taskId: string,
    from: readonly TaskStatus[],
    patch: TaskPatch,
    at: Date
  ): Promise<Task | null> {
    const existing = this.store.tasks.get(taskId);
    if (!existing || !from.includes(existing.status)) return null;

    const updated: Task = {
      ...existing,
      ...patch,
      updatedAt: new Date(Math.max(existing.updatedAt.getTime(), at.getTime())),
    };
    this.store.tasks.set(taskId, updated);
    return structuredClone(updated);
  }

  async listRefundDue(limit: number = 500): Promise<Task[]> {
    return [...this.store.tasks.values()]
      .filter((task) => task.refundDue > 0)
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .slice(0, limit)
      .map((task) => structuredClone(task));
  }

  async claimRefund(taskId: string, amount: number): Promise<Task | null> {
    const existing = this.store.tasks.get(taskId);
    if (!existing || existing.refundDue !== amount) return null;

    const updated: Task = { ...existing, refundDue: 0 };
    this.store.tasks.set(taskId, updated);
    return structuredClone(updated);
  }

  async restoreRefund(taskId: string, amount: number): Promise<void> {
    const existing = this.store.tasks.get(taskId);
    if (!existing) return;
    this.store.tasks.set(taskId, { ...existing, refundDue: existing.refundDue + amount });
  }

  async delete(taskId: string): Promise<boolean> {
    return this.store.tasks.delete(taskId);
  }
}

export class MemoryQuotaRefundRepository implements QuotaRefundRepository {
  constructor(private store: MemoryStore = new MemoryStore()) {}

  async record(data: NewQuotaRefund): Promise<QuotaRefund> {
    if (!this.store.accounts.has(data.accountId)) {
      throw new Error(`insert violates foreign key constraint on account ${data.accountId}`);
    }

    const refund: QuotaRefund = {
      id: data.id ?? this.store.nextRefundId,
      accountId: data.accountId,
      quotaKind: data.quotaKind,
      amount: data.amount,
      quotaDay: data.quotaDay,
      reason: data.reason,
      createdAt: data.createdAt ?? new Date(),
    };
    this.store.nextRefundId = Math.max(this.store.nextRefundId, refund.id + 1);
    this.store.refunds.set(refund.id, refund);
    return structuredClone(refund);
  }

  async listPending(limit: number = 100): Promise<QuotaRefund[]> {
    return [...this.store.refunds.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id)
      .slice(0, limit)
      .map((refund) => structuredClone(refund));
  }

  async claim(id: number): Promise<QuotaRefund | null> {
    const refund = this.store.refunds.get(id);
    if (!refund) return null;
    this.store.refunds.delete(id);
    return structuredClone(refund);
  }
}

/**
 * Account, task and refund repositories over one shared store
 */
export function createMemoryRepositories(store: MemoryStore = new MemoryStore()): {
  accounts: MemoryAccountRepository;
  tasks: MemoryTaskRepository;
  refunds: MemoryQuotaRefundRepository;
} {
  return {
    accounts: new MemoryAccountRepository(store),
    tasks: new MemoryTaskRepository(store),
    refunds: new MemoryQuotaRefundRepository(store),
  };
}
