/**
 * Generation dispatcher
 *
 * Accepts a generation request and turns it into task records:
 * 1. Validate (no side effects on failure)
 * 2. Estimate the cost in the kind's quota unit
 * 3. Reserve: pick an account and debit the whole batch once
 * 4. Submit each unit to the provider and record it
 *
 * Units that never get a record are credited back to the reservation's day.
 */

import { randomBytes } from 'node:crypto';
import { createLogger } from '../observability/logger.js';
import {
  LIFECYCLE_EVENTS,
  logLifecycleEvent,
  trackQuotaRejection,
} from '../observability/metrics.js';
import { ApiError, ERROR_CODES, ProviderError, describeError } from '../security/errors.js';
import {
  GENERATION_TYPE,
  TASK_STATUS,
  TASK_TYPE,
  type Account,
  type ConversationPart,
  type ConversationTurn,
  type GenerationType,
  type QuotaKind,
  type ResultImage,
  type Task,
  type TaskStatus,
  type TaskType,
} from '../db/schema.js';
import type { AccountRepository, TaskRepository } from '../db/repositories.js';
import type { QuotaLedger } from '../enforcement/ledger.js';
import type { RefundQueue } from '../enforcement/refunds.js';
import {
  CAPABILITY,
  quotaKindFor,
  rankAccounts,
  resolveExplicitAccount,
  type Capability,
  type RankedAccount,
} from '../accounts/selector.js';
import {
  calculateImagePrice,
  calculateTokens,
  calculateVideoPrice,
  estimateImageCount,
} from '../billing/pricing.js';
import { toInlinePart } from '../providers/gemini.js';
import type {
  BananaSubmission,
  GeminiContent,
  GeminiPart,
  ImageSubmission,
  ProviderClient,
  ProviderOutcome,
  VideoSubmission,
} from '../providers/types.js';
import type { InlineJobRegistry, InlineRunner } from '../queue/inline-jobs.js';
import type { MediaStore } from '../storage/media-store.js';
import { isUrl, serializeParams, type TaskParams } from './params.js';

const logger = createLogger({ module: 'dispatcher' });

/** Outcome of an inline job whose task was cancelled or deleted mid-call */
const ABANDONED: ProviderOutcome = { status: TASK_STATUS.CANCELLED, errorMessage: 'Generation was abandoned' };

export const LIMITS = {
  maxVideoCount: 10,
  maxReferenceImages: 14,
  maxImageCount: 9,
  maxGroupImages: 15,
} as const;

// ----- Requests -----

export interface VideoGenerateRequest {
  accountId?: number;
  prompt?: string;
  firstFrame?: string;
  lastFrame?: string;
  ratio: string;
  resolution: string;
  duration: number;
  videoCount: number;
  generateAudio: boolean;
  seed: number;
  watermark: boolean;
  cameraFixed: boolean;
}

export type VideoEstimateRequest = Pick<VideoGenerateRequest, 'ratio' | 'resolution' | 'duration' | 'videoCount'>;

export interface ImageGenerateRequest {
  accountId?: number;
  prompt: string;
  images: string[];
  size: string;
  count: number;
  sequentialImageGeneration: 'auto' | 'disabled';
  maxImages: number;
  watermark: boolean;
  optimizePrompt: boolean;
}

export type ImageEstimateRequest = Pick<ImageGenerateRequest, 'count' | 'sequentialImageGeneration' | 'maxImages'>;

export interface BananaGenerateRequest {
  accountId?: number;
  prompt: string;
  images: string[];
  aspectRatio?: string;
  resolution?: string;
}

export interface BananaContinueRequest {
  prompt: string;
}

// ----- Results -----

export interface VideoEstimate {
  tokens: number;
  videoCount: number;
  totalTokens: number;
  priceWithAudio: number;
  priceWithoutAudio: number;
}

export interface ImageEstimate {
  count: number;
  price: number;
}

export interface CostEstimate {
  kind: QuotaKind;
  units: number;
  perUnit: number;
  total: number;
  /** Informational price; null where the provider publishes none */
  price: number | null;
}

export interface DispatchResult {
  account: { id: number; name: string };
  batchId: string | null;
  tasks: Task[];
  estimate: CostEstimate;
  /** Units whose submission failed after earlier units went through */
  failedUnits: number;
  error?: string;
}

export interface DispatcherDeps {
  accounts: AccountRepository;
  tasks: TaskRepository;
  ledger: QuotaLedger;
  refunds: RefundQueue;
  provider: ProviderClient;
  inlineJobs: InlineJobRegistry;
  media: MediaStore;
  now?: () => Date;
}

interface Reservation {
  account: Account;
  kind: QuotaKind;
  day: string;
  amount: number;
}

interface UnitPlan {
  units: number;
  perUnit: number;
  price: number | null;
  taskType: TaskType;
  generationType: GenerationType;
  status: TaskStatus;
  params: TaskParams;
  parentTaskId?: string;
  conversationHistory?: ConversationTurn[];
  /** Submit one unit and return its task id */
  submit: () => Promise<string>;
  /** Runs once the unit's record exists */
  started?: (task: Task) => void;
}

type SubmitAttempt = { ok: true; taskId: string } | { ok: false; error: ApiError };

// ----- Validation -----

function validationError(message: string): ApiError {
  return new ApiError(ERROR_CODES.VALIDATION_ERROR, message, 400);
}

function present(value: string | undefined): boolean {
  return value !== undefined && value.trim() !== '';
}

function requirePrompt(prompt: string | undefined): string {
  if (prompt === undefined || prompt.trim() === '') {
    throw validationError('Prompt is required');
  }
  return prompt.trim();
}

function requireIntegerIn(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw validationError(`${name} must be an integer between ${min} and ${max}`);
  }
}

/**
 * Generation sub-kind implied by which frames are present
 *
 * @throws ApiError MISSING_FIRST_FRAME for a last frame without a first frame
 * @throws ApiError VALIDATION_ERROR for text-to-video without a prompt
 */
export function resolveVideoGenerationType(request: VideoGenerateRequest): GenerationType {
  const hasFirst = present(request.firstFrame);
  const hasLast = present(request.lastFrame);

  if (hasLast && !hasFirst) {
    throw new ApiError(ERROR_CODES.MISSING_FIRST_FRAME, 'A last frame requires a first frame', 400);
  }
  if (hasFirst && hasLast) return GENERATION_TYPE.FIRST_LAST_FRAME;
  if (hasFirst) return GENERATION_TYPE.FIRST_FRAME;
  if (!present(request.prompt)) {
    throw validationError('Text-to-video requires a prompt');
  }
  return GENERATION_TYPE.TEXT_TO_VIDEO;
}

export function validateVideoRequest(request: VideoGenerateRequest): GenerationType {
  const generationType = resolveVideoGenerationType(request);
  requireIntegerIn('videoCount', request.videoCount, 1, LIMITS.maxVideoCount);
  if (!Number.isInteger(request.duration) || request.duration < 1) {
    throw validationError('duration must be a positive integer');
  }
  return generationType;
}

function referenceGenerationType(referenceCount: number): GenerationType {
  if (referenceCount === 0) return GENERATION_TYPE.TEXT_TO_IMAGE;
  return referenceCount === 1 ? GENERATION_TYPE.IMAGE_TO_IMAGE : GENERATION_TYPE.MULTI_IMAGE;
}

function validateReferences(images: string[]): void {
  if (images.length > LIMITS.maxReferenceImages) {
    throw validationError(`At most ${LIMITS.maxReferenceImages} reference images are allowed`);
  }
}

export function validateImageRequest(request: ImageGenerateRequest): GenerationType {
  requirePrompt(request.prompt);
  validateReferences(request.images);

  if (request.sequentialImageGeneration === 'auto') {
    requireIntegerIn('maxImages', request.maxImages, 1, LIMITS.maxGroupImages);
    const room = LIMITS.maxGroupImages - request.images.length;
    if (request.maxImages > room) {
      throw validationError(
        `${request.images.length} reference images leave room for at most ${room} generated images`
      );
    }
  } else {
    requireIntegerIn('count', request.count, 1, LIMITS.maxImageCount);
  }

  return referenceGenerationType(request.images.length);
}

export function validateBananaRequest(request: BananaGenerateRequest): GenerationType {
  requirePrompt(request.prompt);
  validateReferences(request.images);
  return referenceGenerationType(request.images.length);
}

// ----- Estimates -----

export function estimateVideo(request: VideoEstimateRequest): VideoEstimate {
  const tokens = calculateTokens(request.resolution, request.ratio, request.duration);
  const totalTokens = tokens * request.videoCount;
  return {
    tokens,
    videoCount: request.videoCount,
    totalTokens,
    priceWithAudio: calculateVideoPrice(totalTokens, true),
    priceWithoutAudio: calculateVideoPrice(totalTokens, false),
  };
}

export function estimateImage(request: ImageEstimateRequest): ImageEstimate {
  const count = estimateImageCount({
    sequential: request.sequentialImageGeneration === 'auto',
    count: request.count,
    maxImages: request.maxImages,
  });
  return { count, price: calculateImagePrice(count) };
}

function localId(prefix: string): string {
  return `${prefix}-${randomBytes(8).toString('hex')}`;
}

function asSubmissionError(error: unknown): ApiError {
  if (error instanceof ApiError) return error;
  return new ProviderError(describeError(error), true);
}

export class GenerationDispatcher {
  private now: () => Date;

  constructor(private deps: DispatcherDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  estimateVideo(request: VideoEstimateRequest): VideoEstimate {
    return estimateVideo(request);
  }

  estimateImage(request: ImageEstimateRequest): ImageEstimate {
    return estimateImage(request);
  }

  // ----- Video -----

  async dispatchVideo(request: VideoGenerateRequest): Promise<DispatchResult> {
    // 1. Validate
    const generationType = validateVideoRequest(request);

    // 2. Estimate
    const perUnit = calculateTokens(request.resolution, request.ratio, request.duration);
    const total = perUnit * request.videoCount;

    // 3. Reserve
    const reservation = await this.reserve(CAPABILITY.VIDEO, total, request.accountId);

    // 4. Submit and record
    const submission: VideoSubmission = {
      prompt: request.prompt?.trim() ?? '',
      firstFrame: present(request.firstFrame) ? request.firstFrame : undefined,
      lastFrame: present(request.lastFrame) ? request.lastFrame : undefined,
      ratio: request.ratio,
      resolution: request.resolution,
      duration: request.duration,
      generateAudio: request.generateAudio,
      watermark: request.watermark,
      cameraFixed: request.cameraFixed,
      seed: request.seed,
    };

    return this.fanOut(reservation, {
      units: request.videoCount,
      perUnit,
      price: calculateVideoPrice(total, request.generateAudio),
      taskType: TASK_TYPE.VIDEO,
      generationType,
      status: TASK_STATUS.QUEUED,
      params: {
        kind: 'video',
        prompt: submission.prompt,
        ratio: request.ratio,
        resolution: request.resolution,
        duration: request.duration,
        generateAudio: request.generateAudio,
        seed: request.seed,
        watermark: request.watermark,
        cameraFixed: request.cameraFixed,
        firstFrameUrl: isUrl(submission.firstFrame) ? submission.firstFrame : undefined,
        lastFrameUrl: isUrl(submission.lastFrame) ? submission.lastFrame : undefined,
        hasFirstFrame: submission.firstFrame !== undefined,
        hasLastFrame: submission.lastFrame !== undefined,
      },
      submit: () => this.deps.provider.submitVideo(reservation.account, submission),
    });
  }

  // ----- Image -----

  async dispatchImage(request: ImageGenerateRequest): Promise<DispatchResult> {
    const generationType = validateImageRequest(request);

    // A group is one provider call; otherwise one call per requested image
    const sequential = request.sequentialImageGeneration === 'auto';
    const units = sequential ? 1 : request.count;
    const perUnit = sequential ? request.maxImages : 1;
    const total = perUnit * units;

    const reservation = await this.reserve(CAPABILITY.IMAGE, total, request.accountId);

    const submission: ImageSubmission = {
      prompt: request.prompt.trim(),
      images: request.images,
      size: request.size,
      sequential,
      maxImages: request.maxImages,
      watermark: request.watermark,
      optimizePrompt: request.optimizePrompt,
    };

    return this.fanOut(reservation, {
      units,
      perUnit,
      price: calculateImagePrice(total),
      taskType: TASK_TYPE.IMAGE,
      generationType,
      status: TASK_STATUS.RUNNING,
      params: {
        kind: 'image',
        prompt: submission.prompt,
        size: request.size,
        sequential,
        maxImages: request.maxImages,
        referenceCount: request.images.length,
        watermark: request.watermark,
        optimizePrompt: request.optimizePrompt,
      },
      submit: async () => localId('img'),
      started: (task) => this.deps.inlineJobs.start(task.taskId, this.imageRunner(reservation.account, submission)),
    });
  }

  private imageRunner(account: Account, submission: ImageSubmission): InlineRunner {
    return async (): Promise<ProviderOutcome> => {
      const output = await this.deps.provider.generateImages(account, submission);
      const tokenUsage = output.totalTokens ?? undefined;

      if (output.generatedImages === 0) {
        const reason = output.images.find((image) => image.error !== null)?.error;
        return { status: TASK_STATUS.FAILED, errorMessage: reason ?? 'No images were generated', tokenUsage };
      }

      return {
        status: TASK_STATUS.SUCCEEDED,
        result: { kind: 'images', images: output.images },
        usage: output.generatedImages,
        imageCount: output.generatedImages,
        tokenUsage,
      };
    };
  }

  // ----- Banana -----

  async dispatchBanana(request: BananaGenerateRequest): Promise<DispatchResult> {
    const generationType = validateBananaRequest(request);
    const prompt = request.prompt.trim();

    const reservation = await this.reserve(CAPABILITY.BANANA, 1, request.accountId);

    const userParts: ConversationPart[] = [{ type: 'text', content: prompt }];
    if (request.images.length > 0) {
      userParts.push({ type: 'images', count: request.images.length });
    }
    const history: ConversationTurn[] = [{ role: 'user', parts: userParts }];

    const submission: BananaSubmission = {
      contents: [{ role: 'user', parts: [{ text: prompt }, ...request.images.map(toInlinePart)] }],
      aspectRatio: request.aspectRatio,
      resolution: request.resolution,
    };

    return this.fanOut(reservation, {
      units: 1,
      perUnit: 1,
      price: null,
      taskType: TASK_TYPE.BANANA,
      generationType,
      status: TASK_STATUS.RUNNING,
      params: {
        kind: 'banana',
        prompt,
        aspectRatio: request.aspectRatio,
        resolution: request.resolution,
        referenceCount: request.images.length,
      },
      conversationHistory: history,
      submit: async () => localId('banana'),
      started: (task) =>
        this.deps.inlineJobs.start(task.taskId, this.bananaRunner(reservation.account, task.taskId, submission, history)),
    });
  }

  /**
   * Follow-up edit on a finished banana task, on the same account
   */
  async continueBanana(parentTaskId: string, request: BananaContinueRequest): Promise<DispatchResult> {
    const parent = await this.deps.tasks.findByTaskId(parentTaskId);
    if (!parent) {
      throw new ApiError(ERROR_CODES.NOT_FOUND, `Task ${parentTaskId} not found`, 404);
    }
    if (parent.taskType !== TASK_TYPE.BANANA) {
      throw validationError('Only banana image tasks can be continued');
    }
    if (parent.status !== TASK_STATUS.SUCCEEDED) {
      throw new ApiError(ERROR_CODES.INVALID_STATE, `Task ${parentTaskId} is ${parent.status}, not succeeded`, 409);
    }
    const prompt = requirePrompt(request.prompt);

    const previous = parent.conversationHistory ?? [];
    const contents = await this.replayConversation(previous);
    contents.push({ role: 'user', parts: [{ text: prompt }] });
    const history: ConversationTurn[] = [...previous, { role: 'user', parts: [{ type: 'text', content: prompt }] }];

    const reservation = await this.reserve(CAPABILITY.BANANA, 1, parent.accountId);
    const submission: BananaSubmission = { contents };

    return this.fanOut(reservation, {
      units: 1,
      perUnit: 1,
      price: null,
      taskType: TASK_TYPE.BANANA,
      generationType: GENERATION_TYPE.CONTINUE,
      status: TASK_STATUS.RUNNING,
      params: { kind: 'banana', prompt, referenceCount: 0, parentTaskId },
      parentTaskId,
      conversationHistory: history,
      submit: async () => localId('banana'),
      started: (task) =>
        this.deps.inlineJobs.start(task.taskId, this.bananaRunner(reservation.account, task.taskId, submission, history)),
    });
  }

  /**
   * Stored turns back into request contents. Images the media store no
   * longer has are left out.
   */
  private async replayConversation(history: ConversationTurn[]): Promise<GeminiContent[]> {
    const contents: GeminiContent[] = [];
    for (const turn of history) {
      const parts: GeminiPart[] = [];
      for (const part of turn.parts) {
        if (part.type === 'text') {
          parts.push({ text: part.content });
        } else if (part.type === 'image') {
          const image = await this.deps.media.readImage(part.url);
          if (image) parts.push({ inlineData: image });
        }
      }
      if (parts.length > 0) contents.push({ role: turn.role, parts });
    }
    return contents;
  }

  private bananaRunner(
    account: Account,
    taskId: string,
    submission: BananaSubmission,
    history: ConversationTurn[]
  ): InlineRunner {
    return async (signal): Promise<ProviderOutcome> => {
      const output = await this.deps.provider.generateBanana(account, submission);
      if (signal.aborted) return ABANDONED;
      if (output.images.length === 0) {
        return {
          status: TASK_STATUS.FAILED,
          errorMessage: output.texts.join('\n').trim() || 'No images were generated',
        };
      }

      const images: ResultImage[] = [];
      const modelParts: ConversationPart[] = output.texts.map(
        (content): ConversationPart => ({ type: 'text', content })
      );
      for (const [index, image] of output.images.entries()) {
        const url = await this.deps.media.saveImage(taskId, index, image);
        if (signal.aborted) {
          // Cancelled or deleted while saving; its media was already cleared
          await this.deps.media.removeTask(taskId);
          return ABANDONED;
        }
        images.push({ index, url, size: null, error: null });
        modelParts.push({ type: 'image', url });
      }

      return {
        status: TASK_STATUS.SUCCEEDED,
        result: { kind: 'images', images },
        usage: images.length,
        imageCount: images.length,
        conversationHistory: [...history, { role: 'model', parts: modelParts }],
      };
    };
  }

  // ----- Reservation -----

  private async candidates(capability: Capability, amount: number, accountId?: number): Promise<RankedAccount[]> {
    if (accountId !== undefined) {
      return [await resolveExplicitAccount(this.deps, capability, accountId, amount)];
    }
    return rankAccounts(this.deps, capability, amount);
  }

  /**
   * Debit `amount` from the chosen account, or from the best ranked account
   * that still has room once the debit is attempted
   */
  private async reserve(capability: Capability, amount: number, accountId?: number): Promise<Reservation> {
    const kind = quotaKindFor(capability);
    const ranked = await this.candidates(capability, amount, accountId).catch((error: unknown) => {
      if (error instanceof ApiError && error.code === ERROR_CODES.QUOTA_EXCEEDED) {
        trackQuotaRejection(kind, { capability, amount, accountId });
      }
      throw error;
    });

    for (const { account } of ranked) {
      const debit = await this.deps.ledger.tryDebit(account, kind, amount);
      if (debit.success) {
        return { account, kind, day: debit.day, amount };
      }
    }

    trackQuotaRejection(kind, { capability, amount, accountId, lostRace: true });
    throw new ApiError(ERROR_CODES.QUOTA_EXCEEDED, `Daily ${kind} quota exhausted, ${amount} required`, 429);
  }

  /**
   * Return unused reservation. A credit that fails is kept for the poller to
   * retry; only a refund that can be neither credited nor recorded throws.
   */
  private async refund(reservation: Reservation, amount: number, reason: string): Promise<void> {
    const { account, kind, day } = reservation;
    await this.deps.refunds.returnQuota({ accountId: account.id, kind, amount, day, reason });
  }

  // ----- Fan-out -----

  private async attemptSubmit(plan: UnitPlan): Promise<SubmitAttempt> {
    try {
      return { ok: true, taskId: await plan.submit() };
    } catch (error) {
      return { ok: false, error: asSubmissionError(error) };
    }
  }

  private async fanOut(reservation: Reservation, plan: UnitPlan): Promise<DispatchResult> {
    const { account } = reservation;
    const batchId = plan.units > 1 ? localId('batch') : null;
    const log = logger.child({ accountId: account.id, taskType: plan.taskType, batchId });
    const params = serializeParams(plan.params);
    const created: Task[] = [];
    let submissionError: ApiError | null = null;

    for (let unit = 0; unit < plan.units; unit++) {
      const attempt = await this.attemptSubmit(plan);
      if (!attempt.ok) {
        submissionError = attempt.error;
        break;
      }

      const at = this.now();
      let task: Task;
      try {
        task = await this.deps.tasks.create({
          taskId: attempt.taskId,
          accountId: account.id,
          taskType: plan.taskType,
          generationType: plan.generationType,
          status: plan.status,
          params,
          quotaKind: reservation.kind,
          estimatedCost: plan.perUnit,
          quotaDay: reservation.day,
          batchId,
          parentTaskId: plan.parentTaskId ?? null,
          conversationHistory: plan.conversationHistory ?? null,
          createdAt: at,
          updatedAt: at,
        });
      } catch (error) {
        log.error({ taskId: attempt.taskId, error: describeError(error) }, 'Recording a submitted task failed');
        await this.refund(reservation, plan.perUnit * (plan.units - created.length), 'record_failed');
        throw new ApiError(ERROR_CODES.INTERNAL_ERROR, 'Failed to record the submitted task', 500);
      }

      created.push(task);
      logLifecycleEvent(LIFECYCLE_EVENTS.SUBMITTED, task.taskId, {
        accountId: account.id,
        generationType: plan.generationType,
        estimatedCost: plan.perUnit,
        batchId,
      });
      plan.started?.(task);
    }

    const failedUnits = plan.units - created.length;
    if (submissionError) {
      await this.refund(reservation, plan.perUnit * failedUnits, 'submission_failed');
      if (created.length === 0) {
        throw submissionError;
      }
      log.warn({ failedUnits, error: submissionError.message }, 'Batch partially submitted');
    }

    return {
      account: { id: account.id, name: account.name },
      batchId,
      tasks: created,
      estimate: {
        kind: reservation.kind,
        units: plan.units,
        perUnit: plan.perUnit,
        total: reservation.amount,
        price: plan.price,
      },
      failedUnits,
      ...(submissionError !== null && { error: submissionError.message }),
    };
  }
}
