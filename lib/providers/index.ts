/**
 * Provider collaborator: Volcano for video and images, Gemini for banana
 */

import type { Account } from '../db/schema.js';
import { GeminiClient } from './gemini.js';
import { VolcanoClient } from './volcano.js';
import type {
  BananaGenerationOutput,
  BananaSubmission,
  FetchLike,
  ImageGenerationOutput,
  ImageSubmission,
  ProviderClient,
  ProviderOutcome,
  VideoSubmission,
} from './types.js';

export * from './types.js';
export { isTransientStatus } from './http.js';
export { buildVideoContent, buildVideoPrompt, buildImageRequest, mapVideoTask } from './volcano.js';
export { toInlinePart, buildGenerateContentRequest } from './gemini.js';

export interface HttpProviderOptions {
  volcanoBaseUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

export class HttpProviderClient implements ProviderClient {
  private volcano: VolcanoClient;
  private gemini: GeminiClient;

  constructor(options: HttpProviderOptions) {
    this.volcano = new VolcanoClient({
      baseUrl: options.volcanoBaseUrl.replace(/\/+$/, ''),
      timeoutMs: options.timeoutMs,
      fetch: options.fetch,
    });
    this.gemini = new GeminiClient({ timeoutMs: options.timeoutMs, fetch: options.fetch });
  }

  submitVideo(account: Account, submission: VideoSubmission): Promise<string> {
    return this.volcano.submitVideo(account, submission);
  }

  queryVideo(account: Account, providerTaskId: string): Promise<ProviderOutcome> {
    return this.volcano.queryVideo(account, providerTaskId);
  }

  cancelVideo(account: Account, providerTaskId: string): Promise<void> {
    return this.volcano.cancelVideo(account, providerTaskId);
  }

  generateImages(account: Account, submission: ImageSubmission): Promise<ImageGenerationOutput> {
    return this.volcano.generateImages(account, submission);
  }

  generateBanana(account: Account, submission: BananaSubmission): Promise<BananaGenerationOutput> {
    return this.gemini.generateBanana(account, submission);
  }
}
