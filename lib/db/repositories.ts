/**
 * Database repositories for the data access layer
 *
 * Services depend on the interfaces; the Drizzle classes are the Postgres
 * implementations and memory.ts holds the in-process ones.
 */

import { eq, desc, asc, and, gt, inArray, sql, type SQL } from 'drizzle-orm';
import { getDb, type Database } from './client.js';
import { config } from '../utils/config.js';
import {
  accounts,
  tasks,
  quotaRefunds,
  ACTIVE_STATUSES,
  type Account,
  type NewAccount,
  type Task,
  type NewTask,
  type QuotaRefund,
  type NewQuotaRefund,
  type TaskStatus,
  type TaskType,
  type TaskResult,
  type ConversationTurn,
} from './schema.js';

export interface TaskListFilter {
  accountId?: number;
  status?: TaskStatus;
  taskType?: TaskType;
  limit?: number;
}

/**
 * Fields a status transition may write
 */
export interface TaskPatch {
  status: TaskStatus;
  result?: TaskResult | null;
  errorMessage?: string | null;
  tokenUsage?: number | null;
  imageCount?: number | null;
  conversationHistory?: ConversationTurn[] | null;
  refundDue?: number;
}

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 100;

export interface AccountRepository {
  create(data: NewAccount): Promise<Account>;
  findById(id: number): Promise<Account | null>;
  list(): Promise<Account[]>;
  update(id: number, data: Partial<NewAccount>): Promise<Account | null>;
  /** Deletes the account and, by cascade, its tasks */
  delete(id: number): Promise<boolean>;
}

export interface TaskRepository {
  create(data: NewTask): Promise<Task>;
  findByTaskId(taskId: string): Promise<Task | null>;
  /** Newest first */
  list(filter?: TaskListFilter): Promise<Task[]>;
  /** Queued and running tasks, oldest update first */
  listActive(limit?: number): Promise<Task[]>;
  /**
   * Compare-and-set on status: applies `patch` only while the task is in one
   * of `from`. Returns null when it is not (or no longer) there.
   * updated_at becomes max(stored, at).
   */
  transition(taskId: string, from: readonly TaskStatus[], patch: TaskPatch, at: Date): Promise<Task | null>;
  /** Tasks still owing quota back to the ledger, oldest update first */
  listRefundDue(limit?: number): Promise<Task[]>;
  /**
   * Compare-and-set refund_due from `amount` to 0. Returns the updated task,
   * or null when another caller already took the refund.
   */
  claimRefund(taskId: string, amount: number): Promise<Task | null>;
  /** Puts `amount` back on refund_due after a credit that did not land */
  restoreRefund(taskId: string, amount: number): Promise<void>;
  delete(taskId: string): Promise<boolean>;
}

export interface QuotaRefundRepository {
  record(data: NewQuotaRefund): Promise<QuotaRefund>;
  /** Oldest first */
  listPending(limit?: number): Promise<QuotaRefund[]>;
  /** Removes the refund and returns it; null when someone else claimed it */
  claim(id: number): Promise<QuotaRefund | null>;
}

export function clampLimit(limit?: number): number {
  return Math.min(Math.max(limit ?? DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);
}

/**
 * Account Repository
 */
export class DrizzleAccountRepository implements AccountRepository {
  constructor(private db: Database = getDb()) {}

  async create(data: NewAccount): Promise<Account> {
    const [account] = await this.db
      .insert(accounts)
      .values({
        videoDailyLimit: config.DEFAULT_VIDEO_DAILY_LIMIT,
        imageDailyLimit: config.DEFAULT_IMAGE_DAILY_LIMIT,
        ...data,
      })
      .returning();
    return account;
  }

  async findById(id: number): Promise<Account | null> {
    const [account] = await this.db.select().from(accounts).where(eq(accounts.id, id));
    return account ?? null;
  }

  async list(): Promise<Account[]> {
    return this.db.select().from(accounts).orderBy(asc(accounts.id));
  }

  async update(id: number, data: Partial<NewAccount>): Promise<Account | null> {
    const [account] = await this.db
      .update(accounts)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(accounts.id, id))
      .returning();
    return account ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const deleted = await this.db
      .delete(accounts)
      .where(eq(accounts.id, id))
      .returning({ id: accounts.id });
    return deleted.length > 0;
  }
}

/**
 * Task Repository
 */
export class DrizzleTaskRepository implements TaskRepository {
  constructor(private db: Database = getDb()) {}

  async create(data: NewTask): Promise<Task> {
    const [task] = await this.db.insert(tasks).values(data).returning();
    return task;
  }

  async findByTaskId(taskId: string): Promise<Task | null> {
    const [task] = await this.db.select().from(tasks).where(eq(tasks.taskId, taskId));
    return task ?? null;
  }

  async list(filter: TaskListFilter = {}): Promise<Task[]> {
    const conditions: SQL[] = [];

    if (filter.accountId !== undefined) {
      conditions.push(eq(tasks.accountId, filter.accountId));
    }
    if (filter.status) {
      conditions.push(eq(tasks.status, filter.status));
    }
    if (filter.taskType) {
      conditions.push(eq(tasks.taskType, filter.taskType));
    }

    return this.db
      .select()
      .from(tasks)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(tasks.createdAt), desc(tasks.id))
      .limit(clampLimit(filter.limit));
  }

  async listActive(limit: number = 500): Promise<Task[]> {
    return this.db
      .select()
      .from(tasks)
      .where(inArray(tasks.status, [...ACTIVE_STATUSES]))
      .orderBy(asc(tasks.updatedAt))
      .limit(limit);
  }

  async transition(
    taskId: string,
    from: readonly TaskStatus[],
    patch: TaskPatch,
    at: Date
  ): Promise<Task | null> {
    const [task] = await this.db
      .update(tasks)
      .set({
        ...patch,
        updatedAt: sql`greatest(${tasks.updatedAt}, ${at.toISOString()}::timestamp)`,
      })
      .where(and(eq(tasks.taskId, taskId), inArray(tasks.status, [...from])))
      .returning();
    return task ?? null;
  }

  async listRefundDue(limit: number = 500): Promise<Task[]> {
    return this.db
      .select()
      .from(tasks)
      .where(gt(tasks.refundDue, 0))
      .orderBy(asc(tasks.updatedAt))
      .limit(limit);
  }

  async claimRefund(taskId: string, amount: number): Promise<Task | null> {
    const [task] = await this.db
      .update(tasks)
      .set({ refundDue: 0 })
      .where(and(eq(tasks.taskId, taskId), eq(tasks.refundDue, amount)))
      .returning();
    return task ?? null;
  }

  async restoreRefund(taskId: string, amount: number): Promise<void> {
    await this.db
      .update(tasks)
      .set({ refundDue: sql`${tasks.refundDue} + ${amount}` })
      .where(eq(tasks.taskId, taskId));
  }

  async delete(taskId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(tasks)
      .where(eq(tasks.taskId, taskId))
      .returning({ id: tasks.id });
    return deleted.length > 0;
  }
}

/**
 * Quota Refund Repository
 */
export class DrizzleQuotaRefundRepository implements QuotaRefundRepository {
  constructor(private db: Database = getDb()) {}

  async record(data: NewQuotaRefund): Promise<QuotaRefund> {
    const [refund] = await this.db.insert(quotaRefunds).values(data).returning();
    return refund;
  }

  async listPending(limit: number = 100): Promise<QuotaRefund[]> {
    return this.db
      .select()
      .from(quotaRefunds)
      .orderBy(asc(quotaRefunds.createdAt), asc(quotaRefunds.id))
      .limit(limit);
  }

  async claim(id: number): Promise<QuotaRefund | null> {
    const [refund] = await this.db.delete(quotaRefunds).where(eq(quotaRefunds.id, id)).returning();
    return refund ?? null;
  }
}
