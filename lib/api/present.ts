/**
 * Response shapes for stored records
 */

import type { ConversationTurn, Task, TaskResult } from '../db/schema.js';
import type { DispatchResult } from '../generation/dispatcher.js';
import { parseParams, type TaskParams } from '../generation/params.js';

export interface TaskView {
  taskId: string;
  accountId: number;
  taskType: Task['taskType'];
  generationType: Task['generationType'];
  status: Task['status'];
  quotaKind: Task['quotaKind'];
  estimatedCost: number;
  quotaDay: string;
  batchId: string | null;
  parentTaskId: string | null;
  params: TaskParams | null;
  result: TaskResult | null;
  tokenUsage: number | null;
  imageCount: number | null;
  errorMessage: string | null;
  conversationHistory: ConversationTurn[] | null;
  createdAt: string;
  updatedAt: string;
}

export function presentTask(task: Task): TaskView {
  return {
    taskId: task.taskId,
    accountId: task.accountId,
    taskType: task.taskType,
    generationType: task.generationType,
    status: task.status,
    quotaKind: task.quotaKind,
    estimatedCost: task.estimatedCost,
    quotaDay: task.quotaDay,
    batchId: task.batchId,
    parentTaskId: task.parentTaskId,
    params: parseParams(task.params),
    result: task.result,
    tokenUsage: task.tokenUsage,
    imageCount: task.imageCount,
    errorMessage: task.errorMessage,
    conversationHistory: task.conversationHistory,
    createdAt: task.createdAt.toISOString(),
    updatedAt: task.updatedAt.toISOString(),
  };
}

export function presentDispatch(result: DispatchResult) {
  return {
    account: result.account,
    batchId: result.batchId,
    estimate: result.estimate,
    failedUnits: result.failedUnits,
    ...(result.error !== undefined && { error: result.error }),
    tasks: result.tasks.map(presentTask),
  };
}
