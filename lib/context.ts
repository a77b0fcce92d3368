/**
 * Application wiring
 *
 * Builds every service once and hands the same instances to the HTTP layer
 * and the scheduler. Anything passed in replaces the configured default,
 * which is how tests run the whole stack in process.
 */

import { config } from './utils/config.js';
import { createRepositories, checkConnection, isDatabaseConfigured, type Repositories } from './db/index.js';
import { RefundQueue, createQuotaLedger, type QuotaLedger } from './enforcement/index.js';
import { isRedisConfigured, isRedisHealthy } from './redis/client.js';
import { HttpProviderClient, type ProviderClient } from './providers/index.js';
import { InlineJobRegistry } from './queue/inline-jobs.js';
import { LocalMediaStore, type MediaStore } from './storage/media-store.js';
import { GenerationDispatcher } from './generation/dispatcher.js';
import { StatusSynchronizer } from './workers/synchronizer.js';
import { PollingScheduler } from './workers/poller.js';
import type { AuthOptions } from './security/auth.js';

export interface HealthProbes {
  database: (() => Promise<boolean>) | null;
  redis: (() => Promise<boolean>) | null;
}

export interface AppContext {
  auth: AuthOptions;
  repos: Repositories;
  ledger: QuotaLedger;
  refunds: RefundQueue;
  provider: ProviderClient;
  inlineJobs: InlineJobRegistry;
  media: MediaStore;
  dispatcher: GenerationDispatcher;
  synchronizer: StatusSynchronizer;
  scheduler: PollingScheduler;
  probes: HealthProbes;
}

export interface AppContextOptions {
  auth?: AuthOptions;
  repos?: Repositories;
  ledger?: QuotaLedger;
  provider?: ProviderClient;
  inlineJobs?: InlineJobRegistry;
  media?: MediaStore;
  probes?: HealthProbes;
  now?: () => Date;
  polling?: { intervalMs: number; concurrency: number };
}

export function createAppContext(options: AppContextOptions = {}): AppContext {
  const now = options.now ?? (() => new Date());

  const repos = options.repos ?? createRepositories();
  const ledger = options.ledger ?? createQuotaLedger({ now });
  const provider =
    options.provider ??
    new HttpProviderClient({ volcanoBaseUrl: config.VOLCANO_API_BASE, timeoutMs: config.PROVIDER_TIMEOUT_MS });
  const inlineJobs = options.inlineJobs ?? new InlineJobRegistry(now);
  const media = options.media ?? new LocalMediaStore(config.MEDIA_DIR);
  const refunds = new RefundQueue(ledger, repos.refunds);

  const deps = { accounts: repos.accounts, tasks: repos.tasks, ledger, refunds, provider, inlineJobs, media, now };
  const dispatcher = new GenerationDispatcher(deps);
  const synchronizer = new StatusSynchronizer(deps);
  const scheduler = new PollingScheduler(repos.tasks, synchronizer, {
    intervalMs: options.polling?.intervalMs ?? config.POLL_INTERVAL_MS,
    concurrency: options.polling?.concurrency ?? config.POLL_CONCURRENCY,
    refunds,
    now: () => now().getTime(),
  });

  // A finished inline call is synced right away instead of on the next tick
  inlineJobs.setSettledHandler((taskId) => synchronizer.sync(taskId));

  return {
    auth: options.auth ?? { secret: config.AUTH_SECRET, apiKeys: config.API_KEYS },
    repos,
    ledger,
    refunds,
    provider,
    inlineJobs,
    media,
    dispatcher,
    synchronizer,
    scheduler,
    probes: options.probes ?? {
      database: options.repos === undefined && isDatabaseConfigured() ? checkConnection : null,
      redis: options.ledger === undefined && isRedisConfigured() ? isRedisHealthy : null,
    },
  };
}
