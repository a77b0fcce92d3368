/**
 * Task Handlers
 *
 * Handles GET /api/v1/tasks, GET|DELETE /api/v1/tasks/:taskId and
 * POST /api/v1/tasks/:taskId/{sync,cancel}
 */

import { ApiError, ERROR_CODES } from '../../security/errors.js';
import { validatePath, validateQuery } from '../../security/validation.js';
import { listTasksSchema, taskPathSchema } from '../schemas/requests.js';
import { beginRequest, fail, ok, requireCaller } from '../handler.js';
import { presentTask } from '../present.js';
import type { AppContext } from '../../context.js';

/**
 * Handle GET /api/v1/tasks
 */
export async function handleListTasks(ctx: AppContext, request: Request): Promise<Response> {
  const scope = beginRequest(request, 'listTasks');

  try {
    // 1. Authenticate
    await requireCaller(ctx, request);

    // 2. Validate query
    const query = validateQuery(new URL(request.url).searchParams, listTasksSchema);

    // 3. Fetch, newest first
    const tasks = await ctx.repos.tasks.list(query);

    return ok(scope, { tasks: tasks.map(presentTask), limit: query.limit });
  } catch (error) {
    return fail(scope, error, 'List tasks failed');
  }
}

/**
 * Handle GET /api/v1/tasks/:taskId
 */
export async function handleGetTask(
  ctx: AppContext,
  request: Request,
  params: Record<string, string>
): Promise<Response> {
  const scope = beginRequest(request, 'getTask');

  try {
    await requireCaller(ctx, request);
    const { taskId } = validatePath(params, taskPathSchema);

    const task = await ctx.repos.tasks.findByTaskId(taskId);
    if (!task) {
      throw new ApiError(ERROR_CODES.NOT_FOUND, `Task ${taskId} not found`, 404);
    }

    return ok(scope, presentTask(task));
  } catch (error) {
    return fail(scope, error, 'Get task failed');
  }
}

/**
 * Handle POST /api/v1/tasks/:taskId/sync
 */
export async function handleSyncTask(
  ctx: AppContext,
  request: Request,
  params: Record<string, string>
): Promise<Response> {
  const scope = beginRequest(request, 'syncTask');

  try {
    await requireCaller(ctx, request);
    const { taskId } = validatePath(params, taskPathSchema);

    const task = await ctx.synchronizer.sync(taskId);
    scope.log.info({ taskId, status: task.status }, 'Task synced');

    return ok(scope, presentTask(task));
  } catch (error) {
    return fail(scope, error, 'Sync task failed');
  }
}

/**
 * Handle POST /api/v1/tasks/:taskId/cancel
 */
export async function handleCancelTask(
  ctx: AppContext,
  request: Request,
  params: Record<string, string>
): Promise<Response> {
  const scope = beginRequest(request, 'cancelTask');

  try {
    await requireCaller(ctx, request);
    const { taskId } = validatePath(params, taskPathSchema);

    const task = await ctx.synchronizer.cancel(taskId);
    scope.log.info({ taskId }, 'Task cancelled');

    return ok(scope, presentTask(task));
  } catch (error) {
    return fail(scope, error, 'Cancel task failed');
  }
}

/**
 * Handle DELETE /api/v1/tasks/:taskId
 */
export async function handleDeleteTask(
  ctx: AppContext,
  request: Request,
  params: Record<string, string>
): Promise<Response> {
  const scope = beginRequest(request, 'deleteTask');

  try {
    await requireCaller(ctx, request);
    const { taskId } = validatePath(params, taskPathSchema);

    await ctx.synchronizer.delete(taskId);

    return ok(scope, { taskId, deleted: true });
  } catch (error) {
    return fail(scope, error, 'Delete task failed');
  }
}
