/**
 * API Request Validation Schemas
 *
 * Zod schemas for validating all API request payloads. Shape and ranges
 * only; rules that depend on several fields live in the dispatcher.
 */

import { z } from 'zod';
import { TASK_STATUS, TASK_TYPE } from '../../db/schema.js';
import { VIDEO_RATIOS, VIDEO_RESOLUTIONS } from '../../billing/pricing.js';
import { MAX_LIST_LIMIT, DEFAULT_LIST_LIMIT } from '../../db/repositories.js';

// ============================================================================
// Common Schemas
// ============================================================================

export const accountIdSchema = z.coerce.number().int().positive();

export const taskIdSchema = z.string().min(1).max(128);

/** Image reference: URL or base64 data URI */
export const imageRefSchema = z.string().min(1);

export const taskStatusSchema = z.enum([
  TASK_STATUS.QUEUED,
  TASK_STATUS.RUNNING,
  TASK_STATUS.SUCCEEDED,
  TASK_STATUS.FAILED,
  TASK_STATUS.CANCELLED,
  TASK_STATUS.EXPIRED,
]);

export const taskTypeSchema = z.enum([TASK_TYPE.VIDEO, TASK_TYPE.IMAGE, TASK_TYPE.BANANA]);

// ============================================================================
// Video
// ============================================================================

const videoShape = {
  ratio: z.enum(VIDEO_RATIOS).default('16:9'),
  resolution: z.enum(VIDEO_RESOLUTIONS).default('720p'),
  duration: z.number().int().min(1).max(12).default(5),
  videoCount: z.number().int().min(1).max(10).default(1),
};

/**
 * POST /api/v1/video/generate request body
 */
export const videoGenerateSchema = z.object({
  /** Omit to let the selector pick the account with the most quota left */
  accountId: accountIdSchema.optional(),
  prompt: z.string().max(5000).optional(),
  firstFrame: imageRefSchema.optional(),
  lastFrame: imageRefSchema.optional(),
  ...videoShape,
  generateAudio: z.boolean().default(true),
  seed: z.number().int().min(-1).default(-1),
  watermark: z.boolean().default(false),
  cameraFixed: z.boolean().default(false),
});

export type VideoGenerateBody = z.infer<typeof videoGenerateSchema>;

/**
 * POST /api/v1/video/estimate request body
 */
export const videoEstimateSchema = z.object(videoShape);

// ============================================================================
// Image
// ============================================================================

const imageCountShape = {
  count: z.number().int().min(1).max(9).default(1),
  sequentialImageGeneration: z.enum(['auto', 'disabled']).default('disabled'),
  maxImages: z.number().int().min(1).max(15).default(15),
};

/**
 * POST /api/v1/image/generate request body
 */
export const imageGenerateSchema = z.object({
  accountId: accountIdSchema.optional(),
  prompt: z.string().max(5000),
  images: z.array(imageRefSchema).max(14).default([]),
  /** 1K / 2K / 4K or WIDTHxHEIGHT */
  size: z
    .string()
    .regex(/^(1K|2K|4K|\d{2,5}x\d{2,5})$/, 'Size must be 1K, 2K, 4K or WIDTHxHEIGHT')
    .default('2K'),
  ...imageCountShape,
  watermark: z.boolean().default(false),
  optimizePrompt: z.boolean().default(false),
});

export type ImageGenerateBody = z.infer<typeof imageGenerateSchema>;

/**
 * POST /api/v1/image/estimate request body
 */
export const imageEstimateSchema = z.object(imageCountShape);

// ============================================================================
// Banana
// ============================================================================

export const BANANA_ASPECT_RATIOS = ['1:1', '2:3', '3:2', '3:4', '4:3', '4:5', '5:4', '9:16', '16:9', '21:9'] as const;

/**
 * POST /api/v1/banana/generate request body
 */
export const bananaGenerateSchema = z.object({
  accountId: accountIdSchema.optional(),
  prompt: z.string().max(5000),
  images: z.array(imageRefSchema).max(14).default([]),
  aspectRatio: z.enum(BANANA_ASPECT_RATIOS).default('1:1'),
  resolution: z.enum(['1K', '2K', '4K']).default('1K'),
});

export type BananaGenerateBody = z.infer<typeof bananaGenerateSchema>;

/**
 * POST /api/v1/banana/:taskId/continue request body
 */
export const bananaContinueSchema = z.object({
  prompt: z.string().max(5000),
});

// ============================================================================
// Tasks
// ============================================================================

/**
 * GET /api/v1/tasks query parameters
 */
export const listTasksSchema = z.object({
  accountId: accountIdSchema.optional(),
  status: taskStatusSchema.optional(),
  taskType: taskTypeSchema.optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT),
});

export type ListTasksQuery = z.infer<typeof listTasksSchema>;

/**
 * Path parameters for /api/v1/tasks/:taskId and /api/v1/banana/:taskId
 */
export const taskPathSchema = z.object({
  taskId: taskIdSchema,
});
