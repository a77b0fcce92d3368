/**
 * Provider collaborator contract
 */

import type {
  Account,
  ConversationTurn,
  ResultImage,
  TaskResult,
  TaskStatus,
} from '../db/schema.js';

/**
 * Provider-reported state of a task, mapped to local vocabulary.
 * `status: null` means the provider said something we do not recognise;
 * the task is left as it is.
 */
export interface ProviderOutcome {
  status: TaskStatus | null;
  result?: TaskResult;
  /** Actual cost in the task's quota unit, when reported */
  usage?: number;
  tokenUsage?: number;
  imageCount?: number;
  errorMessage?: string;
  conversationHistory?: ConversationTurn[];
}

export interface VideoSubmission {
  prompt: string;
  firstFrame?: string;
  lastFrame?: string;
  ratio: string;
  resolution: string;
  duration: number;
  generateAudio: boolean;
  watermark: boolean;
  cameraFixed: boolean;
  seed: number;
}

export interface ImageSubmission {
  prompt: string;
  images: string[];
  size: string;
  sequential: boolean;
  maxImages: number;
  watermark: boolean;
  optimizePrompt: boolean;
}

export interface ImageGenerationOutput {
  images: ResultImage[];
  generatedImages: number;
  totalTokens: number | null;
}

export type GeminiPart =
  | { text: string }
  | { inlineData: { mimeType: string; data: string } };

export interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

export interface BananaSubmission {
  contents: GeminiContent[];
  aspectRatio?: string;
  resolution?: string;
}

export interface InlineImage {
  mimeType: string;
  data: string;
}

export interface BananaGenerationOutput {
  images: InlineImage[];
  texts: string[];
}

export interface ProviderClient {
  submitVideo(account: Account, submission: VideoSubmission): Promise<string>;
  queryVideo(account: Account, providerTaskId: string): Promise<ProviderOutcome>;
  cancelVideo(account: Account, providerTaskId: string): Promise<void>;
  generateImages(account: Account, submission: ImageSubmission): Promise<ImageGenerationOutput>;
  generateBanana(account: Account, submission: BananaSubmission): Promise<BananaGenerationOutput>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
