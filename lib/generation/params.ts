/**
 * Stored request parameters
 *
 * The params column is an opaque superjson blob so new fields need no
 * migration, but each kind has a minimal schema for the fields the sync
 * and retry paths read back.
 */

import { z } from 'zod';
import superjson from 'superjson';

export const videoParamsSchema = z.object({
  kind: z.literal('video'),
  prompt: z.string(),
  ratio: z.string(),
  resolution: z.string(),
  duration: z.number(),
  generateAudio: z.boolean(),
  seed: z.number(),
  watermark: z.boolean(),
  cameraFixed: z.boolean(),
  /** Frame references are kept only when they are URLs; inline data is not persisted */
  firstFrameUrl: z.string().optional(),
  lastFrameUrl: z.string().optional(),
  hasFirstFrame: z.boolean(),
  hasLastFrame: z.boolean(),
});

export const imageParamsSchema = z.object({
  kind: z.literal('image'),
  prompt: z.string(),
  size: z.string(),
  sequential: z.boolean(),
  maxImages: z.number(),
  referenceCount: z.number(),
  watermark: z.boolean(),
  optimizePrompt: z.boolean(),
});

export const bananaParamsSchema = z.object({
  kind: z.literal('banana'),
  prompt: z.string(),
  aspectRatio: z.string().optional(),
  resolution: z.string().optional(),
  referenceCount: z.number(),
  parentTaskId: z.string().optional(),
});

export const taskParamsSchema = z.discriminatedUnion('kind', [
  videoParamsSchema,
  imageParamsSchema,
  bananaParamsSchema,
]);

export type VideoParams = z.infer<typeof videoParamsSchema>;
export type ImageParams = z.infer<typeof imageParamsSchema>;
export type BananaParams = z.infer<typeof bananaParamsSchema>;
export type TaskParams = z.infer<typeof taskParamsSchema>;

export function serializeParams(params: TaskParams): string {
  return superjson.stringify(params);
}

/**
 * Read params back; null when the blob predates the schema or is corrupt
 */
export function parseParams(raw: string): TaskParams | null {
  let value: unknown;
  try {
    value = superjson.parse(raw);
  } catch {
    return null;
  }
  const result = taskParamsSchema.safeParse(value);
  return result.success ? result.data : null;
}

export function isUrl(value: string | undefined): value is string {
  return value !== undefined && /^https?:\/\//i.test(value);
}
