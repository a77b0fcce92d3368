/**
 * Gemini generateContent client for conversational image generation
 */

import { z } from 'zod';
import { ProviderError } from '../security/errors.js';
import type { Account } from '../db/schema.js';
import { requestJson } from './http.js';
import type {
  BananaGenerationOutput,
  BananaSubmission,
  FetchLike,
  GeminiPart,
  InlineImage,
} from './types.js';

const PROVIDER = 'gemini';
const IMAGE_TIMEOUT_FACTOR = 6;

export interface GeminiClientOptions {
  timeoutMs: number;
  fetch?: FetchLike;
}

const partSchema = z.object({
  text: z.string().optional(),
  thought: z.boolean().optional(),
  inlineData: z
    .object({
      mimeType: z.string(),
      data: z.string(),
    })
    .optional(),
});

const generateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(partSchema).default([]) }).optional(),
        finishReason: z.string().optional(),
      })
    )
    .default([]),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

/**
 * Turn a reference image (data URI or bare base64) into an inline part
 */
export function toInlinePart(image: string): GeminiPart {
  const match = /^data:([^;,]+);base64,(.*)$/s.exec(image);
  if (match) {
    return { inlineData: { mimeType: match[1], data: match[2] } };
  }
  return { inlineData: { mimeType: 'image/png', data: image } };
}

export function buildGenerateContentRequest(submission: BananaSubmission): Record<string, unknown> {
  const imageConfig: Record<string, string> = {};
  if (submission.aspectRatio) imageConfig.aspectRatio = submission.aspectRatio;
  if (submission.resolution) imageConfig.imageSize = submission.resolution;

  return {
    contents: submission.contents,
    generationConfig: {
      responseModalities: ['TEXT', 'IMAGE'],
      ...(Object.keys(imageConfig).length > 0 && { imageConfig }),
    },
  };
}

export function mapGenerateContent(payload: z.infer<typeof generateContentSchema>): BananaGenerationOutput {
  const parts = payload.candidates[0]?.content?.parts ?? [];
  const images: InlineImage[] = [];
  const texts: string[] = [];

  for (const part of parts) {
    if (part.inlineData?.mimeType.startsWith('image/') && part.inlineData.data) {
      images.push({ mimeType: part.inlineData.mimeType, data: part.inlineData.data });
    } else if (part.text && !part.thought) {
      texts.push(part.text);
    }
  }

  if (images.length === 0 && payload.promptFeedback?.blockReason) {
    throw new ProviderError(`Prompt blocked: ${payload.promptFeedback.blockReason}`, false);
  }

  return { images, texts };
}

export class GeminiClient {
  private fetchImpl: FetchLike;

  constructor(private options: GeminiClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generateBanana(account: Account, submission: BananaSubmission): Promise<BananaGenerationOutput> {
    if (!account.bananaBaseUrl || !account.bananaApiKey) {
      throw new ProviderError(`Account ${account.id} has no banana endpoint configured`, false);
    }

    const baseUrl = account.bananaBaseUrl.replace(/\/+$/, '');
    const payload = await requestJson(
      this.fetchImpl,
      {
        provider: PROVIDER,
        url: `${baseUrl}/v1beta/models/${encodeURIComponent(account.bananaModelName)}:generateContent`,
        method: 'POST',
        headers: { 'x-goog-api-key': account.bananaApiKey },
        body: buildGenerateContentRequest(submission),
        timeoutMs: this.options.timeoutMs * IMAGE_TIMEOUT_FACTOR,
      },
      generateContentSchema
    );
    return mapGenerateContent(payload);
  }
}
