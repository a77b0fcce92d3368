/**
 * Volcano Ark client: asynchronous video tasks and synchronous image generation
 */

import { z } from 'zod';
import { ProviderError } from '../security/errors.js';
import { TASK_STATUS, type Account, type ResultImage, type TaskStatus } from '../db/schema.js';
import { requestJson } from './http.js';
import type {
  FetchLike,
  ImageGenerationOutput,
  ImageSubmission,
  ProviderOutcome,
  VideoSubmission,
} from './types.js';

const PROVIDER = 'volcano';

/** Inline image calls render several images and take far longer than a submit */
const IMAGE_TIMEOUT_FACTOR = 6;

export interface VolcanoClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

// ----- Payload schemas -----

const submitResponseSchema = z.object({ id: z.string().min(1) });

const videoTaskSchema = z.object({
  id: z.string(),
  status: z.string(),
  content: z
    .object({
      video_url: z.string().optional(),
      last_frame_url: z.string().optional(),
    })
    .nullish(),
  usage: z
    .object({
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .nullish(),
  error: z
    .object({
      code: z.string().optional(),
      message: z.string().optional(),
    })
    .nullish(),
});

const imageResponseSchema = z.object({
  data: z
    .array(
      z.object({
        url: z.string().optional(),
        b64_json: z.string().optional(),
        size: z.string().optional(),
        error: z.object({ message: z.string().optional() }).optional(),
      })
    )
    .default([]),
  usage: z
    .object({
      generated_images: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export type VideoTaskPayload = z.infer<typeof videoTaskSchema>;

// ----- Request builders -----

export type VideoContentItem =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string }; role?: 'first_frame' | 'last_frame' };

/**
 * Prompt text with the generation flags appended
 */
export function buildVideoPrompt(submission: VideoSubmission): string {
  const flags = [
    `--rs ${submission.resolution}`,
    `--rt ${submission.ratio}`,
    `--dur ${submission.duration}`,
    `--wm ${submission.watermark}`,
    `--cf ${submission.cameraFixed}`,
  ];
  if (submission.seed !== -1) {
    flags.push(`--seed ${submission.seed}`);
  }
  return `${submission.prompt} ${flags.join(' ')}`.trim();
}

export function buildVideoContent(submission: VideoSubmission): VideoContentItem[] {
  const content: VideoContentItem[] = [{ type: 'text', text: buildVideoPrompt(submission) }];

  if (submission.firstFrame) {
    content.push(
      submission.lastFrame
        ? { type: 'image_url', image_url: { url: submission.firstFrame }, role: 'first_frame' }
        : { type: 'image_url', image_url: { url: submission.firstFrame } }
    );
  }
  if (submission.lastFrame) {
    content.push({ type: 'image_url', image_url: { url: submission.lastFrame }, role: 'last_frame' });
  }

  return content;
}

export function buildImageRequest(model: string, submission: ImageSubmission): Record<string, unknown> {
  const body: Record<string, unknown> = {
    model,
    prompt: submission.prompt,
    size: submission.size,
    watermark: submission.watermark,
    response_format: 'url',
  };

  if (submission.optimizePrompt) {
    body.optimize_prompt_options = { mode: 'standard' };
  }
  if (submission.images.length === 1) {
    body.image = submission.images[0];
  } else if (submission.images.length > 1) {
    body.image = submission.images;
  }
  if (submission.sequential) {
    body.sequential_image_generation = 'auto';
    body.sequential_image_generation_options = { max_images: submission.maxImages };
  } else {
    body.sequential_image_generation = 'disabled';
  }

  return body;
}

// ----- Response mapping -----

const STATUS_MAP: Record<string, TaskStatus> = {
  queued: TASK_STATUS.QUEUED,
  running: TASK_STATUS.RUNNING,
  succeeded: TASK_STATUS.SUCCEEDED,
  failed: TASK_STATUS.FAILED,
  cancelled: TASK_STATUS.CANCELLED,
  expired: TASK_STATUS.EXPIRED,
};

export function mapVideoTask(payload: VideoTaskPayload): ProviderOutcome {
  const status = Object.hasOwn(STATUS_MAP, payload.status) ? STATUS_MAP[payload.status] : null;
  const tokenUsage = payload.usage?.total_tokens ?? payload.usage?.completion_tokens;

  switch (status) {
    case TASK_STATUS.SUCCEEDED: {
      const videoUrl = payload.content?.video_url;
      if (!videoUrl) {
        return { status: TASK_STATUS.FAILED, errorMessage: 'Provider reported success without a video URL' };
      }
      return {
        status,
        result: { kind: 'video', videoUrl, lastFrameUrl: payload.content?.last_frame_url ?? null },
        usage: tokenUsage,
        tokenUsage,
      };
    }
    case TASK_STATUS.FAILED:
      return { status, errorMessage: payload.error?.message ?? 'Generation failed' };
    case TASK_STATUS.CANCELLED:
      return { status, errorMessage: payload.error?.message ?? 'Cancelled by provider' };
    case TASK_STATUS.EXPIRED:
      return { status, errorMessage: payload.error?.message ?? 'Task expired before completion' };
    default:
      return { status };
  }
}

export function mapImageResponse(payload: z.infer<typeof imageResponseSchema>): ImageGenerationOutput {
  const images: ResultImage[] = payload.data.map((item, index) => {
    if (item.url) {
      return { index, url: item.url, size: item.size ?? null, error: null };
    }
    return {
      index,
      url: null,
      size: item.size ?? null,
      error: item.error?.message ?? (item.b64_json ? 'Inline image data is not stored' : 'Generation failed'),
    };
  });

  const generatedImages =
    payload.usage?.generated_images ?? images.filter((image) => image.url !== null).length;

  return { images, generatedImages, totalTokens: payload.usage?.total_tokens ?? null };
}

function requireModel(model: string | null, capability: string, account: Account): string {
  if (!model) {
    throw new ProviderError(`Account ${account.id} has no ${capability} model configured`, false);
  }
  return model;
}

export class VolcanoClient {
  private fetchImpl: FetchLike;

  constructor(private options: VolcanoClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  private headers(account: Account): Record<string, string> {
    return { Authorization: `Bearer ${account.apiKey}` };
  }

  async submitVideo(account: Account, submission: VideoSubmission): Promise<string> {
    const model = requireModel(account.videoModelId, 'video', account);
    const { id } = await requestJson(
      this.fetchImpl,
      {
        provider: PROVIDER,
        url: `${this.options.baseUrl}/contents/generations/tasks`,
        method: 'POST',
        headers: this.headers(account),
        body: {
          model,
          content: buildVideoContent(submission),
          generate_audio: submission.generateAudio,
        },
        timeoutMs: this.options.timeoutMs,
      },
      submitResponseSchema
    );
    return id;
  }

  async queryVideo(account: Account, providerTaskId: string): Promise<ProviderOutcome> {
    const payload = await requestJson(
      this.fetchImpl,
      {
        provider: PROVIDER,
        url: `${this.options.baseUrl}/contents/generations/tasks/${encodeURIComponent(providerTaskId)}`,
        method: 'GET',
        headers: this.headers(account),
        timeoutMs: this.options.timeoutMs,
      },
      videoTaskSchema
    );
    return mapVideoTask(payload);
  }

  async cancelVideo(account: Account, providerTaskId: string): Promise<void> {
    await requestJson(
      this.fetchImpl,
      {
        provider: PROVIDER,
        url: `${this.options.baseUrl}/contents/generations/tasks/${encodeURIComponent(providerTaskId)}`,
        method: 'DELETE',
        headers: this.headers(account),
        timeoutMs: this.options.timeoutMs,
      },
      z.unknown()
    );
  }

  async generateImages(account: Account, submission: ImageSubmission): Promise<ImageGenerationOutput> {
    const model = requireModel(account.imageModelId, 'image', account);
    const payload = await requestJson(
      this.fetchImpl,
      {
        provider: PROVIDER,
        url: `${this.options.baseUrl}/images/generations`,
        method: 'POST',
        headers: this.headers(account),
        body: buildImageRequest(model, submission),
        timeoutMs: this.options.timeoutMs * IMAGE_TIMEOUT_FACTOR,
      },
      imageResponseSchema
    );
    return mapImageResponse(payload);
  }
}
