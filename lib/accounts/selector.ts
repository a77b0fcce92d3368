/**
 * Account selection under daily quota
 *
 * An explicit account id is honoured or rejected; otherwise capable accounts
 * are ranked by remaining quota (greatest first, lowest id on ties).
 */

import { ApiError, ERROR_CODES } from '../security/errors.js';
import { QUOTA_KIND, type Account, type QuotaKind } from '../db/schema.js';
import type { AccountRepository } from '../db/repositories.js';
import { limitFor, type QuotaLedger } from '../enforcement/ledger.js';

export const CAPABILITY = {
  VIDEO: 'video',
  IMAGE: 'image',
  BANANA: 'banana',
} as const;

export type Capability = (typeof CAPABILITY)[keyof typeof CAPABILITY];

export interface SelectorDeps {
  accounts: AccountRepository;
  ledger: QuotaLedger;
}

export interface RankedAccount {
  account: Account;
  remaining: number;
}

export interface AccountCapabilities {
  hasVideo: boolean;
  hasImage: boolean;
  hasBanana: boolean;
}

export function capabilitiesOf(account: Account): AccountCapabilities {
  return {
    hasVideo: Boolean(account.videoModelId),
    hasImage: Boolean(account.imageModelId),
    hasBanana: Boolean(account.bananaBaseUrl && account.bananaApiKey),
  };
}

export function hasCapability(account: Account, capability: Capability): boolean {
  const caps = capabilitiesOf(account);
  switch (capability) {
    case CAPABILITY.VIDEO:
      return caps.hasVideo;
    case CAPABILITY.IMAGE:
      return caps.hasImage;
    case CAPABILITY.BANANA:
      return caps.hasBanana;
  }
}

export function quotaKindFor(capability: Capability): QuotaKind {
  return capability === CAPABILITY.VIDEO ? QUOTA_KIND.VIDEO_TOKENS : QUOTA_KIND.IMAGE_COUNT;
}

function byRemainingThenId(a: RankedAccount, b: RankedAccount): number {
  return b.remaining - a.remaining || a.account.id - b.account.id;
}

/**
 * Capable active accounts with at least `estimate` remaining, best first
 *
 * @throws ApiError NOT_FOUND when no account has the capability
 * @throws ApiError QUOTA_EXCEEDED when every capable account is exhausted
 */
export async function rankAccounts(
  deps: SelectorDeps,
  capability: Capability,
  estimate: number = 1
): Promise<RankedAccount[]> {
  const kind = quotaKindFor(capability);
  const capable = (await deps.accounts.list()).filter(
    (account) => account.isActive && hasCapability(account, capability)
  );

  if (capable.length === 0) {
    throw new ApiError(ERROR_CODES.NOT_FOUND, `No active account supports ${capability} generation`, 404);
  }

  const ranked = await Promise.all(
    capable.map(async (account) => ({ account, remaining: await deps.ledger.remaining(account, kind) }))
  );
  const eligible = ranked.filter((entry) => entry.remaining >= Math.max(1, estimate));

  if (eligible.length === 0) {
    throw new ApiError(
      ERROR_CODES.QUOTA_EXCEEDED,
      `Daily ${kind} quota exhausted on every ${capability} account`,
      429
    );
  }

  return eligible.sort(byRemainingThenId);
}

/**
 * Validate a caller-chosen account
 */
export async function resolveExplicitAccount(
  deps: SelectorDeps,
  capability: Capability,
  accountId: number,
  estimate: number
): Promise<RankedAccount> {
  const account = await deps.accounts.findById(accountId);
  if (!account) {
    throw new ApiError(ERROR_CODES.NOT_FOUND, `Account ${accountId} not found`, 404);
  }
  if (!account.isActive) {
    throw new ApiError(ERROR_CODES.INVALID_STATE, `Account ${accountId} is disabled`, 409);
  }
  if (!hasCapability(account, capability)) {
    throw new ApiError(ERROR_CODES.NOT_FOUND, `Account ${accountId} has no ${capability} endpoint configured`, 404);
  }

  const kind = quotaKindFor(capability);
  const remaining = await deps.ledger.remaining(account, kind);
  if (remaining < estimate) {
    throw new ApiError(
      ERROR_CODES.QUOTA_EXCEEDED,
      `Account ${accountId} has ${remaining} ${kind} left today, ${estimate} required`,
      429
    );
  }

  return { account, remaining };
}

/**
 * Pick one account for a request
 */
export async function selectAccount(
  deps: SelectorDeps,
  request: { capability: Capability; accountId?: number; estimate?: number }
): Promise<Account> {
  const estimate = request.estimate ?? 1;
  if (request.accountId !== undefined) {
    return (await resolveExplicitAccount(deps, request.capability, request.accountId, estimate)).account;
  }
  const [best] = await rankAccounts(deps, request.capability, estimate);
  return best.account;
}

export interface QuotaSnapshot {
  limit: number;
  used: number;
  remaining: number;
}

export interface AccountQuotaSnapshot extends AccountCapabilities {
  id: number;
  name: string;
  isActive: boolean;
  quotaDay: string;
  video: QuotaSnapshot;
  image: QuotaSnapshot;
}

async function snapshotOf(ledger: QuotaLedger, account: Account, kind: QuotaKind): Promise<QuotaSnapshot> {
  const limit = limitFor(account, kind);
  const used = await ledger.used(account.id, kind);
  return { limit, used, remaining: Math.max(0, limit - used) };
}

/**
 * Every account with today's usage
 */
export async function listAccountsWithQuota(deps: SelectorDeps): Promise<AccountQuotaSnapshot[]> {
  const all = await deps.accounts.list();
  const quotaDay = deps.ledger.dayKey();

  return Promise.all(
    all.map(async (account) => ({
      id: account.id,
      name: account.name,
      isActive: account.isActive,
      ...capabilitiesOf(account),
      quotaDay,
      video: await snapshotOf(deps.ledger, account, QUOTA_KIND.VIDEO_TOKENS),
      image: await snapshotOf(deps.ledger, account, QUOTA_KIND.IMAGE_COUNT),
    }))
  );
}
