/**
 * Database schema definitions using Drizzle ORM
 */

import {
  pgTable,
  text,
  serial,
  timestamp,
  integer,
  boolean,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

/**
 * Task type enum
 */
export const TASK_TYPE = {
  VIDEO: 'video',
  IMAGE: 'image',
  BANANA: 'banana_image',
} as const;

export type TaskType = (typeof TASK_TYPE)[keyof typeof TASK_TYPE];

/**
 * Generation sub-kind enum
 */
export const GENERATION_TYPE = {
  TEXT_TO_VIDEO: 'text_to_video',
  FIRST_FRAME: 'first_frame',
  FIRST_LAST_FRAME: 'first_last_frame',
  TEXT_TO_IMAGE: 'text_to_image',
  IMAGE_TO_IMAGE: 'image_to_image',
  MULTI_IMAGE: 'multi_image',
  CONTINUE: 'continue',
} as const;

export type GenerationType = (typeof GENERATION_TYPE)[keyof typeof GENERATION_TYPE];

/**
 * Task status enum
 */
export const TASK_STATUS = {
  QUEUED: 'queued',
  RUNNING: 'running',
  SUCCEEDED: 'succeeded',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
  EXPIRED: 'expired',
} as const;

export type TaskStatus = (typeof TASK_STATUS)[keyof typeof TASK_STATUS];

export const ACTIVE_STATUSES: readonly TaskStatus[] = [TASK_STATUS.QUEUED, TASK_STATUS.RUNNING];

export const TERMINAL_STATUSES: readonly TaskStatus[] = [
  TASK_STATUS.SUCCEEDED,
  TASK_STATUS.FAILED,
  TASK_STATUS.CANCELLED,
  TASK_STATUS.EXPIRED,
];

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Metered resource dimension
 */
export const QUOTA_KIND = {
  VIDEO_TOKENS: 'video_tokens',
  IMAGE_COUNT: 'image_count',
} as const;

export type QuotaKind = (typeof QUOTA_KIND)[keyof typeof QUOTA_KIND];

/**
 * One image slot in an image result. Failed slots carry `error` and no url.
 */
export interface ResultImage {
  index: number;
  url: string | null;
  size: string | null;
  error: string | null;
}

export type TaskResult =
  | { kind: 'video'; videoUrl: string; lastFrameUrl: string | null }
  | { kind: 'images'; images: ResultImage[] };

/**
 * Conversation turn stored on banana tasks for multi-turn edits
 */
export type ConversationPart =
  | { type: 'text'; content: string }
  | { type: 'image'; url: string }
  | { type: 'images'; count: number };

export interface ConversationTurn {
  role: 'user' | 'model';
  parts: ConversationPart[];
}

/**
 * Accounts table - one upstream provider account
 */
export const accounts = pgTable(
  'accounts',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    apiKey: text('api_key').notNull(),
    videoModelId: text('video_model_id'),
    imageModelId: text('image_model_id'),
    bananaBaseUrl: text('banana_base_url'),
    bananaApiKey: text('banana_api_key'),
    bananaModelName: text('banana_model_name').notNull().default('gemini-3-pro-image-preview'),
    isActive: boolean('is_active').notNull().default(true),
    videoDailyLimit: integer('video_daily_limit').notNull().default(1_800_000),
    imageDailyLimit: integer('image_daily_limit').notNull().default(200),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
  },
  (table) => [index('accounts_is_active_idx').on(table.isActive)]
);

/**
 * Tasks table - one submitted generation unit
 */
export const tasks = pgTable(
  'tasks',
  {
    id: serial('id').primaryKey(),
    taskId: text('task_id').notNull().unique(),
    accountId: integer('account_id')
      .notNull()
      .references(() => accounts.id, { onDelete: 'cascade' }),
    taskType: text('task_type', {
      enum: [TASK_TYPE.VIDEO, TASK_TYPE.IMAGE, TASK_TYPE.BANANA],
    }).notNull(),
    generationType: text('generation_type', {
      enum: [
        GENERATION_TYPE.TEXT_TO_VIDEO,
        GENERATION_TYPE.FIRST_FRAME,
        GENERATION_TYPE.FIRST_LAST_FRAME,
        GENERATION_TYPE.TEXT_TO_IMAGE,
        GENERATION_TYPE.IMAGE_TO_IMAGE,
        GENERATION_TYPE.MULTI_IMAGE,
        GENERATION_TYPE.CONTINUE,
      ],
    }).notNull(),
    status: text('status', {
      enum: [
        TASK_STATUS.QUEUED,
        TASK_STATUS.RUNNING,
        TASK_STATUS.SUCCEEDED,
        TASK_STATUS.FAILED,
        TASK_STATUS.CANCELLED,
        TASK_STATUS.EXPIRED,
      ],
    })
      .notNull()
      .default(TASK_STATUS.QUEUED),
    params: text('params').notNull(), // superjson, see generation/params.ts
    quotaKind: text('quota_kind', {
      enum: [QUOTA_KIND.VIDEO_TOKENS, QUOTA_KIND.IMAGE_COUNT],
    }).notNull(),
    estimatedCost: integer('estimated_cost').notNull(),
    quotaDay: text('quota_day').notNull(),
    batchId: text('batch_id'),
    parentTaskId: text('parent_task_id'),
    result: jsonb('result').$type<TaskResult>(),
    tokenUsage: integer('token_usage'),
    imageCount: integer('image_count'),
    errorMessage: text('error_message'),
    conversationHistory: jsonb('conversation_history').$type<ConversationTurn[]>(),
    // Quota owed back to the ledger; set with the terminal status, cleared once credited
    refundDue: integer('refund_due').notNull().default(0),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
  },
  (table) => [
    index('tasks_account_id_idx').on(table.accountId),
    index('tasks_status_idx').on(table.status),
    index('tasks_refund_due_idx').on(table.refundDue),
    index('tasks_task_type_idx').on(table.taskType),
    index('tasks_created_at_idx').on(table.createdAt),
    index('tasks_account_created_idx').on(table.accountId, table.createdAt),
  ]
);

/**
 * Quota refunds table - reserved quota that could not be returned when the
 * reservation was released, with no task left to carry it
 */
export const quotaRefunds = pgTable(
  'quota_refunds',
  {
    id: serial('id').primaryKey(),
    accountId: integer('account_id')
      .notNull()
      .references(() => accounts.id, { onDelete: 'cascade' }),
    quotaKind: text('quota_kind', {
      enum: [QUOTA_KIND.VIDEO_TOKENS, QUOTA_KIND.IMAGE_COUNT],
    }).notNull(),
    amount: integer('amount').notNull(),
    quotaDay: text('quota_day').notNull(),
    reason: text('reason').notNull(),
    createdAt: timestamp('created_at').notNull().defaultNow(),
  },
  (table) => [index('quota_refunds_created_at_idx').on(table.createdAt)]
);

// ----- Relations -----

export const accountsRelations = relations(accounts, ({ many }) => ({
  tasks: many(tasks),
  quotaRefunds: many(quotaRefunds),
}));

export const tasksRelations = relations(tasks, ({ one }) => ({
  account: one(accounts, {
    fields: [tasks.accountId],
    references: [accounts.id],
  }),
}));

export const quotaRefundsRelations = relations(quotaRefunds, ({ one }) => ({
  account: one(accounts, {
    fields: [quotaRefunds.accountId],
    references: [accounts.id],
  }),
}));

// ----- Inferred types -----

export type Account = typeof accounts.$inferSelect;
export type NewAccount = typeof accounts.$inferInsert;
export type Task = typeof tasks.$inferSelect;
export type NewTask = typeof tasks.$inferInsert;
export type QuotaRefund = typeof quotaRefunds.$inferSelect;
export type NewQuotaRefund = typeof quotaRefunds.$inferInsert;
