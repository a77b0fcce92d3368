/**
 * In-process stand-ins shared by the service and route tests
 */

import { vi } from 'vitest';
import { createMemoryRepositories, MemoryStore } from '../../lib/db/memory.js';
import type { Account, NewAccount } from '../../lib/db/schema.js';
import { MemoryQuotaLedger } from '../../lib/enforcement/memory-ledger.js';
import { RefundQueue } from '../../lib/enforcement/refunds.js';
import { InlineJobRegistry } from '../../lib/queue/inline-jobs.js';
import { MemoryMediaStore } from '../../lib/storage/media-store.js';
import { TASK_STATUS } from '../../lib/db/schema.js';
import type { ProviderClient } from '../../lib/providers/types.js';

/** 12:00 on 2025-01-24 at +08:00 */
export const NOON = new Date('2025-01-24T04:00:00.000Z');
export const TODAY = '20250124';

export interface Clock {
  current: Date;
  now: () => Date;
  advance: (ms: number) => void;
}

export function createClock(start: Date = NOON): Clock {
  const clock: Clock = {
    current: start,
    now: () => clock.current,
    advance: (ms) => {
      clock.current = new Date(clock.current.getTime() + ms);
    },
  };
  return clock;
}

export function createFakeProvider() {
  let submitted = 0;
  return {
    submitVideo: vi.fn<ProviderClient['submitVideo']>(async () => {
      submitted += 1;
      return `cgt-test-${submitted}`;
    }),
    queryVideo: vi.fn<ProviderClient['queryVideo']>(async () => ({ status: TASK_STATUS.RUNNING })),
    cancelVideo: vi.fn<ProviderClient['cancelVideo']>(async () => undefined),
    generateImages: vi.fn<ProviderClient['generateImages']>(async () => ({
      images: [{ index: 0, url: 'https://cdn.test/image-0.png', size: '2048x2048', error: null }],
      generatedImages: 1,
      totalTokens: 16384,
    })),
    generateBanana: vi.fn<ProviderClient['generateBanana']>(async () => ({
      images: [{ mimeType: 'image/png', data: 'aW1hZ2U=' }],
      texts: ['Here is the image'],
    })),
  } satisfies ProviderClient;
}

export type FakeProvider = ReturnType<typeof createFakeProvider>;

export function createHarness(clock: Clock = createClock()) {
  const store = new MemoryStore();
  const repos = createMemoryRepositories(store);
  const ledger = new MemoryQuotaLedger({ now: clock.now, offsetMinutes: 480 });
  const refunds = new RefundQueue(ledger, repos.refunds);
  const provider = createFakeProvider();
  const inlineJobs = new InlineJobRegistry(clock.now);
  const media = new MemoryMediaStore();

  return {
    clock,
    store,
    repos,
    ledger,
    refunds,
    provider,
    inlineJobs,
    media,
    deps: {
      accounts: repos.accounts,
      tasks: repos.tasks,
      ledger,
      refunds,
      provider,
      inlineJobs,
      media,
      now: clock.now,
    },
  };
}

export type Harness = ReturnType<typeof createHarness>;

export function accountData(overrides: Partial<NewAccount> = {}): NewAccount {
  return {
    name: 'primary',
    apiKey: 'test-api-key',
    videoModelId: 'ep-video-test',
    imageModelId: 'ep-image-test',
    bananaBaseUrl: 'https://banana.test',
    bananaApiKey: 'test-banana-key',
    videoDailyLimit: 1_800_000,
    imageDailyLimit: 200,
    ...overrides,
  };
}

export function createAccount(harness: Harness, overrides: Partial<NewAccount> = {}): Promise<Account> {
  return harness.repos.accounts.create(accountData(overrides));
}
