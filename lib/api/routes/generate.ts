/**
 * Generation Handlers
 *
 * Handles POST /api/v1/{video,image,banana}/generate, the two estimate
 * endpoints and POST /api/v1/banana/:taskId/continue
 */

import { validateBody, validatePath } from '../../security/validation.js';
import {
  bananaContinueSchema,
  bananaGenerateSchema,
  imageEstimateSchema,
  imageGenerateSchema,
  taskPathSchema,
  videoEstimateSchema,
  videoGenerateSchema,
} from '../schemas/requests.js';
import { beginRequest, fail, ok, requireCaller } from '../handler.js';
import { presentDispatch } from '../present.js';
import type { DispatchResult } from '../../generation/dispatcher.js';
import type { AppContext } from '../../context.js';

function logAccepted(scope: ReturnType<typeof beginRequest>, result: DispatchResult): void {
  scope.log.info(
    {
      accountId: result.account.id,
      taskIds: result.tasks.map((task) => task.taskId),
      estimate: result.estimate.total,
      failedUnits: result.failedUnits,
    },
    'Generation accepted'
  );
}

/**
 * Handle POST /api/v1/video/generate
 */
export async function handleGenerateVideo(ctx: AppContext, request: Request): Promise<Response> {
  const scope = beginRequest(request, 'generateVideo');

  try {
    // 1. Authenticate
    await requireCaller(ctx, request);

    // 2. Validate request body
    const body = await validateBody(request, videoGenerateSchema);
    scope.log.info(
      { accountId: body.accountId, videoCount: body.videoCount, resolution: body.resolution, ratio: body.ratio },
      'Video generation request'
    );

    // 3. Dispatch (validates, reserves quota, submits, records)
    const result = await ctx.dispatcher.dispatchVideo(body);
    logAccepted(scope, result);

    return ok(scope, presentDispatch(result), 201);
  } catch (error) {
    return fail(scope, error, 'Video generation failed');
  }
}

/**
 * Handle POST /api/v1/video/estimate
 */
export async function handleEstimateVideo(ctx: AppContext, request: Request): Promise<Response> {
  const scope = beginRequest(request, 'estimateVideo');

  try {
    await requireCaller(ctx, request);
    const body = await validateBody(request, videoEstimateSchema);
    return ok(scope, ctx.dispatcher.estimateVideo(body));
  } catch (error) {
    return fail(scope, error, 'Video estimate failed');
  }
}

/**
 * Handle POST /api/v1/image/generate
 */
export async function handleGenerateImage(ctx: AppContext, request: Request): Promise<Response> {
  const scope = beginRequest(request, 'generateImage');

  try {
    await requireCaller(ctx, request);

    const body = await validateBody(request, imageGenerateSchema);
    scope.log.info(
      {
        accountId: body.accountId,
        count: body.count,
        sequential: body.sequentialImageGeneration,
        references: body.images.length,
      },
      'Image generation request'
    );

    const result = await ctx.dispatcher.dispatchImage(body);
    logAccepted(scope, result);

    return ok(scope, presentDispatch(result), 201);
  } catch (error) {
    return fail(scope, error, 'Image generation failed');
  }
}

/**
 * Handle POST /api/v1/image/estimate
 */
export async function handleEstimateImage(ctx: AppContext, request: Request): Promise<Response> {
  const scope = beginRequest(request, 'estimateImage');

  try {
    await requireCaller(ctx, request);
    const body = await validateBody(request, imageEstimateSchema);
    return ok(scope, ctx.dispatcher.estimateImage(body));
  } catch (error) {
    return fail(scope, error, 'Image estimate failed');
  }
}

/**
 * Handle POST /api/v1/banana/generate
 */
export async function handleGenerateBanana(ctx: AppContext, request: Request): Promise<Response> {
  const scope = beginRequest(request, 'generateBanana');

  try {
    await requireCaller(ctx, request);

    const body = await validateBody(request, bananaGenerateSchema);
    scope.log.info(
      { accountId: body.accountId, references: body.images.length, aspectRatio: body.aspectRatio },
      'Banana generation request'
    );

    const result = await ctx.dispatcher.dispatchBanana(body);
    logAccepted(scope, result);

    return ok(scope, presentDispatch(result), 201);
  } catch (error) {
    return fail(scope, error, 'Banana generation failed');
  }
}

/**
 * Handle POST /api/v1/banana/:taskId/continue
 */
export async function handleContinueBanana(
  ctx: AppContext,
  request: Request,
  params: Record<string, string>
): Promise<Response> {
  const scope = beginRequest(request, 'continueBanana');

  try {
    await requireCaller(ctx, request);

    const { taskId } = validatePath(params, taskPathSchema);
    const body = await validateBody(request, bananaContinueSchema);
    scope.log.info({ parentTaskId: taskId }, 'Banana continue request');

    const result = await ctx.dispatcher.continueBanana(taskId, body);
    logAccepted(scope, result);

    return ok(scope, presentDispatch(result), 201);
  } catch (error) {
    return fail(scope, error, 'Banana continue failed');
  }
}
