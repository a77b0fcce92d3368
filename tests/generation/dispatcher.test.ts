/**
 * Unit tests for generation/dispatcher.ts
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  GenerationDispatcher,
  estimateImage,
  estimateVideo,
  type ImageGenerateRequest,
  type VideoGenerateRequest,
} from '../../lib/generation/dispatcher.js';
import { parseParams, serializeParams } from '../../lib/generation/params.js';
import { ERROR_CODES, ProviderError } from '../../lib/security/errors.js';
import { GENERATION_TYPE, QUOTA_KIND, TASK_STATUS, TASK_TYPE, type Account } from '../../lib/db/schema.js';
import { NOON, TODAY, createAccount, createHarness, type Harness } from '../helpers/fixtures.js';

function videoRequest(overrides: Partial<VideoGenerateRequest> = {}): VideoGenerateRequest {
  return {
    prompt: 'a cat on a skateboard',
    ratio: '16:9',
    resolution: '720p',
    duration: 5,
    videoCount: 1,
    generateAudio: true,
    seed: -1,
    watermark: false,
    cameraFixed: false,
    ...overrides,
  };
}

function imageRequest(overrides: Partial<ImageGenerateRequest> = {}): ImageGenerateRequest {
  return {
    prompt: 'a lighthouse at dusk',
    images: [],
    size: '2K',
    count: 1,
    sequentialImageGeneration: 'disabled',
    maxImages: 15,
    watermark: false,
    optimizePrompt: false,
    ...overrides,
  };
}

describe('generation/dispatcher', () => {
  let h: Harness;
  let dispatcher: GenerationDispatcher;

  beforeEach(() => {
    h = createHarness();
    dispatcher = new GenerationDispatcher(h.deps);
  });

  describe('estimates', () => {
    it('should estimate a video batch with both prices', () => {
      expect(estimateVideo({ ratio: '16:9', resolution: '720p', duration: 5, videoCount: 2 })).toEqual({
        tokens: 108000,
        videoCount: 2,
        totalTokens: 216000,
        priceWithAudio: 3.456,
        priceWithoutAudio: 1.728,
      });
    });

    it('should estimate images by count or group ceiling', () => {
      expect(estimateImage({ count: 3, sequentialImageGeneration: 'disabled', maxImages: 15 })).toEqual({
        count: 3,
        price: 0.75,
      });
      expect(estimateImage({ count: 3, sequentialImageGeneration: 'auto', maxImages: 6 })).toEqual({
        count: 6,
        price: 1.5,
      });
    });
  });

  describe('dispatchVideo', () => {
    let account: Account;

    beforeEach(async () => {
      account = await createAccount(h);
    });

    it('should debit the estimate and record a queued task', async () => {
      const result = await dispatcher.dispatchVideo(videoRequest());

      expect(result.account).toEqual({ id: account.id, name: 'primary' });
      expect(result.batchId).toBeNull();
      expect(result.failedUnits).toBe(0);
      expect(result.error).toBeUndefined();
      expect(result.estimate).toEqual({
        kind: QUOTA_KIND.VIDEO_TOKENS,
        units: 1,
        perUnit: 108000,
        total: 108000,
        price: 1.728,
      });
      expect(result.tasks).toHaveLength(1);
      expect(result.tasks[0]).toMatchObject({
        taskId: 'cgt-test-1',
        accountId: account.id,
        taskType: TASK_TYPE.VIDEO,
        generationType: GENERATION_TYPE.TEXT_TO_VIDEO,
        status: TASK_STATUS.QUEUED,
        quotaKind: QUOTA_KIND.VIDEO_TOKENS,
        estimatedCost: 108000,
        quotaDay: TODAY,
        createdAt: NOON,
      });
      await expect(h.ledger.used(account.id, QUOTA_KIND.VIDEO_TOKENS)).resolves.toBe(108000);
    });

    it('should reject without side effects when the quota cannot cover the estimate', async () => {
      await h.ledger.tryDebit(account, QUOTA_KIND.VIDEO_TOKENS, 1_780_000);

      await expect(dispatcher.dispatchVideo(videoRequest())).rejects.toMatchObject({
        code: ERROR_CODES.QUOTA_EXCEEDED,
        status: 429,
      });
      await expect(h.ledger.used(account.id, QUOTA_KIND.VIDEO_TOKENS)).resolves.toBe(1_780_000);
      expect(h.provider.submitVideo).not.toHaveBeenCalled();
      await expect(h.repos.tasks.list()).resolves.toEqual([]);
    });

    it('should name the shortfall for an explicit account', async () => {
      await h.ledger.tryDebit(account, QUOTA_KIND.VIDEO_TOKENS, 1_780_000);

      await expect(dispatcher.dispatchVideo(videoRequest({ accountId: account.id }))).rejects.toThrow(
        `Account ${account.id} has 20000 video_tokens left today, 108000 required`
      );
    });

    it('should reject a last frame without a first frame before picking an account', async () => {
      const empty = createHarness();

      await expect(
        new GenerationDispatcher(empty.deps).dispatchVideo(videoRequest({ lastFrame: 'https://img.test/last.png' }))
      ).rejects.toMatchObject({ code: ERROR_CODES.MISSING_FIRST_FRAME, status: 400 });
    });

    it('should require a prompt for text-to-video', async () => {
      await expect(dispatcher.dispatchVideo(videoRequest({ prompt: '  ' }))).rejects.toThrow(
        'Text-to-video requires a prompt'
      );
      await expect(h.ledger.used(account.id, QUOTA_KIND.VIDEO_TOKENS)).resolves.toBe(0);
    });

    it('should bound the batch size', async () => {
      await expect(dispatcher.dispatchVideo(videoRequest({ videoCount: 11 }))).rejects.toThrow(
        'videoCount must be an integer between 1 and 10'
      );
    });

    it('should keep frame URLs but not inline frame data in params', async () => {
      const result = await dispatcher.dispatchVideo(
        videoRequest({ firstFrame: 'https://img.test/first.png', lastFrame: 'data:image/png;base64,QUJD' })
      );

      const [task] = result.tasks;
      expect(task.generationType).toBe(GENERATION_TYPE.FIRST_LAST_FRAME);
      expect(parseParams(task.params)).toMatchObject({
        kind: 'video',
        firstFrameUrl: 'https://img.test/first.png',
        hasFirstFrame: true,
        hasLastFrame: true,
      });
      const params = parseParams(task.params);
      expect(params?.kind === 'video' ? params.lastFrameUrl : 'not video').toBeUndefined();
      expect(h.provider.submitVideo).toHaveBeenCalledWith(
        expect.objectContaining({ id: account.id }),
        expect.objectContaining({
          firstFrame: 'https://img.test/first.png',
          lastFrame: 'data:image/png;base64,QUJD',
        })
      );
    });

    it('should fan a batch out under one batch id', async () => {
      const result = await dispatcher.dispatchVideo(videoRequest({ videoCount: 3 }));

      expect(result.batchId).toMatch(/^batch-[0-9a-f]{16}$/);
      expect(result.tasks.map((task) => task.taskId)).toEqual(['cgt-test-1', 'cgt-test-2', 'cgt-test-3']);
      expect(result.tasks.every((task) => task.batchId === result.batchId)).toBe(true);
      expect(result.estimate.total).toBe(324000);
      expect(result.estimate.price).toBe(5.184);
      await expect(h.ledger.used(account.id, QUOTA_KIND.VIDEO_TOKENS)).resolves.toBe(324000);
    });

    it('should refund the units that were never submitted', async () => {
      h.provider.submitVideo
        .mockResolvedValueOnce('cgt-a')
        .mockRejectedValueOnce(new ProviderError('volcano error 503: busy', true, 503));

      const result = await dispatcher.dispatchVideo(videoRequest({ videoCount: 3 }));

      expect(result.tasks.map((task) => task.taskId)).toEqual(['cgt-a']);
      expect(result.failedUnits).toBe(2);
      expect(result.error).toBe('volcano error 503: busy');
      await expect(h.ledger.used(account.id, QUOTA_KIND.VIDEO_TOKENS)).resolves.toBe(108000);
    });

    it('should refund everything when the first submission fails', async () => {
      h.provider.submitVideo.mockRejectedValueOnce(new Error('socket hang up'));

      await expect(dispatcher.dispatchVideo(videoRequest({ videoCount: 2 }))).rejects.toMatchObject({
        code: ERROR_CODES.PROVIDER_ERROR,
        message: 'socket hang up',
        transient: true,
      });
      await expect(h.ledger.used(account.id, QUOTA_KIND.VIDEO_TOKENS)).resolves.toBe(0);
      await expect(h.repos.tasks.list()).resolves.toEqual([]);
    });

    it('should refund the remaining units when a record cannot be written', async () => {
      vi.spyOn(h.repos.tasks, 'create').mockRejectedValueOnce(new Error('connection terminated'));

      await expect(dispatcher.dispatchVideo(videoRequest({ videoCount: 2 }))).rejects.toMatchObject({
        code: ERROR_CODES.INTERNAL_ERROR,
        message: 'Failed to record the submitted task',
        status: 500,
      });
      await expect(h.ledger.used(account.id, QUOTA_KIND.VIDEO_TOKENS)).resolves.toBe(0);
    });

    it('should keep a refund whose credit failed for a later retry', async () => {
      h.provider.submitVideo
        .mockResolvedValueOnce('cgt-a')
        .mockRejectedValueOnce(new ProviderError('volcano error 503: busy', true, 503));
      vi.spyOn(h.ledger, 'credit').mockRejectedValueOnce(new Error('redis down'));

      const result = await dispatcher.dispatchVideo(videoRequest({ videoCount: 3 }));

      expect(result.failedUnits).toBe(2);
      await expect(h.ledger.used(account.id, QUOTA_KIND.VIDEO_TOKENS)).resolves.toBe(324000);
      await expect(h.repos.refunds.listPending()).resolves.toMatchObject([
        {
          accountId: account.id,
          quotaKind: QUOTA_KIND.VIDEO_TOKENS,
          amount: 216000,
          quotaDay: TODAY,
          reason: 'submission_failed',
        },
      ]);

      await expect(h.refunds.drain()).resolves.toEqual({ returned: 1, failed: 0 });
      await expect(h.ledger.used(account.id, QUOTA_KIND.VIDEO_TOKENS)).resolves.toBe(108000);
      await expect(h.repos.refunds.listPending()).resolves.toEqual([]);
    });

    it('should fail when a refund can be neither credited nor recorded', async () => {
      h.provider.submitVideo.mockRejectedValueOnce(new Error('socket hang up'));
      vi.spyOn(h.ledger, 'credit').mockRejectedValueOnce(new Error('redis down'));
      vi.spyOn(h.repos.refunds, 'record').mockRejectedValueOnce(new Error('connection terminated'));

      await expect(dispatcher.dispatchVideo(videoRequest())).rejects.toThrow('connection terminated');
    });

    it('should prefer the account with the most quota left', async () => {
      const second = await createAccount(h, { name: 'secondary' });
      await h.ledger.tryDebit(account, QUOTA_KIND.VIDEO_TOKENS, 500_000);

      const result = await dispatcher.dispatchVideo(videoRequest());

      expect(result.account).toEqual({ id: second.id, name: 'secondary' });
    });

    it('should fall through to the next account when a debit loses a race', async () => {
      const second = await createAccount(h, { name: 'secondary' });
      vi.spyOn(h.ledger, 'tryDebit').mockResolvedValueOnce({ success: false, used: 1_800_000, remaining: 0, day: TODAY });

      const result = await dispatcher.dispatchVideo(videoRequest());

      expect(result.account.id).toBe(second.id);
      await expect(h.ledger.used(second.id, QUOTA_KIND.VIDEO_TOKENS)).resolves.toBe(108000);
    });
  });

  describe('dispatchImage', () => {
    let account: Account;

    beforeEach(async () => {
      account = await createAccount(h);
    });

    it('should create one running task per requested image', async () => {
      const result = await dispatcher.dispatchImage(imageRequest({ count: 3 }));

      expect(result.tasks).toHaveLength(3);
      for (const task of result.tasks) {
        expect(task.taskId).toMatch(/^img-[0-9a-f]{16}$/);
        expect(task).toMatchObject({ status: TASK_STATUS.RUNNING, estimatedCost: 1, quotaKind: QUOTA_KIND.IMAGE_COUNT });
      }
      expect(result.estimate).toEqual({ kind: QUOTA_KIND.IMAGE_COUNT, units: 3, perUnit: 1, total: 3, price: 0.75 });
      expect(h.provider.generateImages).toHaveBeenCalledTimes(3);
      await expect(h.ledger.used(account.id, QUOTA_KIND.IMAGE_COUNT)).resolves.toBe(3);
    });

    it('should run the provider call in the background and keep its outcome', async () => {
      const result = await dispatcher.dispatchImage(imageRequest());
      const [task] = result.tasks;
      await h.inlineJobs.drain();

      expect(h.inlineJobs.poll(task.taskId, task.createdAt)).toEqual({
        status: TASK_STATUS.SUCCEEDED,
        result: {
          kind: 'images',
          images: [{ index: 0, url: 'https://cdn.test/image-0.png', size: '2048x2048', error: null }],
        },
        usage: 1,
        imageCount: 1,
        tokenUsage: 16384,
      });
    });

    it('should reserve the group ceiling for sequential generation', async () => {
      const result = await dispatcher.dispatchImage(
        imageRequest({ sequentialImageGeneration: 'auto', maxImages: 4, images: ['https://img.test/ref.png'] })
      );

      expect(result.tasks).toHaveLength(1);
      expect(result.tasks[0]).toMatchObject({
        generationType: GENERATION_TYPE.IMAGE_TO_IMAGE,
        estimatedCost: 4,
      });
      await expect(h.ledger.used(account.id, QUOTA_KIND.IMAGE_COUNT)).resolves.toBe(4);
    });

    it('should keep group output within the reference budget', async () => {
      const images = Array.from({ length: 12 }, (_, i) => `https://img.test/${i}.png`);

      await expect(
        dispatcher.dispatchImage(imageRequest({ sequentialImageGeneration: 'auto', maxImages: 4, images }))
      ).rejects.toThrow('12 reference images leave room for at most 3 generated images');
    });

    it('should report a failure when no image came back', async () => {
      h.provider.generateImages.mockResolvedValueOnce({
        images: [{ index: 0, url: null, size: null, error: 'content filtered' }],
        generatedImages: 0,
        totalTokens: null,
      });

      const [task] = (await dispatcher.dispatchImage(imageRequest())).tasks;
      await h.inlineJobs.drain();

      expect(h.inlineJobs.poll(task.taskId, task.createdAt)).toMatchObject({
        status: TASK_STATUS.FAILED,
        errorMessage: 'content filtered',
      });
    });
  });

  describe('dispatchBanana', () => {
    it('should send the prompt and references and store the conversation', async () => {
      const account = await createAccount(h);

      const result = await dispatcher.dispatchBanana({
        prompt: ' a red bicycle ',
        images: ['data:image/jpeg;base64,QUJD'],
        aspectRatio: '1:1',
        resolution: '1K',
      });

      const [task] = result.tasks;
      expect(task.taskId).toMatch(/^banana-[0-9a-f]{16}$/);
      expect(task).toMatchObject({
        taskType: TASK_TYPE.BANANA,
        generationType: GENERATION_TYPE.IMAGE_TO_IMAGE,
        estimatedCost: 1,
        conversationHistory: [
          {
            role: 'user',
            parts: [
              { type: 'text', content: 'a red bicycle' },
              { type: 'images', count: 1 },
            ],
          },
        ],
      });
      expect(h.provider.generateBanana).toHaveBeenCalledWith(expect.objectContaining({ id: account.id }), {
        contents: [
          {
            role: 'user',
            parts: [{ text: 'a red bicycle' }, { inlineData: { mimeType: 'image/jpeg', data: 'QUJD' } }],
          },
        ],
        aspectRatio: '1:1',
        resolution: '1K',
      });
    });

    it('should save returned images and append the model turn', async () => {
      await createAccount(h);
      const [task] = (await dispatcher.dispatchBanana({ prompt: 'a red bicycle', images: [] })).tasks;
      await h.inlineJobs.drain();

      const url = `/media/${task.taskId}/0.png`;
      expect(h.inlineJobs.poll(task.taskId, task.createdAt)).toEqual({
        status: TASK_STATUS.SUCCEEDED,
        result: { kind: 'images', images: [{ index: 0, url, size: null, error: null }] },
        usage: 1,
        imageCount: 1,
        conversationHistory: [
          { role: 'user', parts: [{ type: 'text', content: 'a red bicycle' }] },
          {
            role: 'model',
            parts: [
              { type: 'text', content: 'Here is the image' },
              { type: 'image', url },
            ],
          },
        ],
      });
      await expect(h.media.readImage(url)).resolves.toEqual({ mimeType: 'image/png', data: 'aW1hZ2U=' });
    });

    it('should fail with the model text when no image is returned', async () => {
      await createAccount(h);
      h.provider.generateBanana.mockResolvedValueOnce({ images: [], texts: ['I cannot draw that.'] });

      const [task] = (await dispatcher.dispatchBanana({ prompt: 'a red bicycle', images: [] })).tasks;
      await h.inlineJobs.drain();

      expect(h.inlineJobs.poll(task.taskId, task.createdAt)).toEqual({
        status: TASK_STATUS.FAILED,
        errorMessage: 'I cannot draw that.',
      });
    });

    it('should reject when no account has a banana endpoint', async () => {
      await createAccount(h, { bananaBaseUrl: null });

      await expect(dispatcher.dispatchBanana({ prompt: 'a red bicycle', images: [] })).rejects.toThrow(
        'No active account supports banana generation'
      );
    });
  });

  describe('continueBanana', () => {
    let account: Account;

    async function createParent(overrides: { status?: 'running' | 'succeeded'; taskType?: 'video' | 'banana_image' } = {}) {
      await h.media.saveImage('parent-1', 0, { mimeType: 'image/png', data: 'cGFyZW50' });
      return h.repos.tasks.create({
        taskId: 'parent-1',
        accountId: account.id,
        taskType: overrides.taskType ?? TASK_TYPE.BANANA,
        generationType: GENERATION_TYPE.TEXT_TO_IMAGE,
        status: overrides.status ?? TASK_STATUS.SUCCEEDED,
        params: serializeParams({ kind: 'banana', prompt: 'a red bicycle', referenceCount: 0 }),
        quotaKind: QUOTA_KIND.IMAGE_COUNT,
        estimatedCost: 1,
        quotaDay: TODAY,
        conversationHistory: [
          { role: 'user', parts: [{ type: 'text', content: 'a red bicycle' }] },
          {
            role: 'model',
            parts: [
              { type: 'text', content: 'Here it is' },
              { type: 'image', url: '/media/parent-1/0.png' },
              { type: 'image', url: '/media/removed/0.png' },
            ],
          },
        ],
      });
    }

    beforeEach(async () => {
      account = await createAccount(h);
      await createAccount(h, { name: 'secondary' });
    });

    it('should replay the conversation on the parent account', async () => {
      await createParent();

      const result = await dispatcher.continueBanana('parent-1', { prompt: 'make it blue' });

      expect(result.account.id).toBe(account.id);
      expect(result.tasks[0]).toMatchObject({
        parentTaskId: 'parent-1',
        generationType: GENERATION_TYPE.CONTINUE,
      });
      expect(result.tasks[0].conversationHistory).toHaveLength(3);
      expect(h.provider.generateBanana).toHaveBeenCalledWith(expect.objectContaining({ id: account.id }), {
        contents: [
          { role: 'user', parts: [{ text: 'a red bicycle' }] },
          {
            role: 'model',
            parts: [{ text: 'Here it is' }, { inlineData: { mimeType: 'image/png', data: 'cGFyZW50' } }],
          },
          { role: 'user', parts: [{ text: 'make it blue' }] },
        ],
      });
    });

    it('should reject an unknown parent', async () => {
      await expect(dispatcher.continueBanana('missing', { prompt: 'make it blue' })).rejects.toMatchObject({
        code: ERROR_CODES.NOT_FOUND,
        message: 'Task missing not found',
      });
    });

    it('should reject a parent that has not succeeded', async () => {
      await createParent({ status: TASK_STATUS.RUNNING });

      await expect(dispatcher.continueBanana('parent-1', { prompt: 'make it blue' })).rejects.toMatchObject({
        code: ERROR_CODES.INVALID_STATE,
        message: 'Task parent-1 is running, not succeeded',
        status: 409,
      });
    });

    it('should only continue banana tasks', async () => {
      await createParent({ taskType: TASK_TYPE.VIDEO });

      await expect(dispatcher.continueBanana('parent-1', { prompt: 'make it blue' })).rejects.toThrow(
        'Only banana image tasks can be continued'
      );
    });
  });
});
