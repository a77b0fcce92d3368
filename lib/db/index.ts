/**
 * Database module - schema, clients and repositories
 */

import { isDatabaseConfigured } from './client.js';
import {
  DrizzleAccountRepository,
  DrizzleQuotaRefundRepository,
  DrizzleTaskRepository,
  type AccountRepository,
  type QuotaRefundRepository,
  type TaskRepository,
} from './repositories.js';
import { createMemoryRepositories } from './memory.js';

export * from './schema.js';
export * from './client.js';
export * from './repositories.js';
export * from './memory.js';

export interface Repositories {
  accounts: AccountRepository;
  tasks: TaskRepository;
  refunds: QuotaRefundRepository;
}

/**
 * Postgres repositories when DATABASE_URL is set, otherwise in-process ones
 */
export function createRepositories(): Repositories {
  if (isDatabaseConfigured()) {
    return {
      accounts: new DrizzleAccountRepository(),
      tasks: new DrizzleTaskRepository(),
      refunds: new DrizzleQuotaRefundRepository(),
    };
  }
  return createMemoryRepositories();
}
