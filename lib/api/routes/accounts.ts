/**
 * Accounts Handler
 *
 * Handles GET /api/v1/accounts
 */

import { listAccountsWithQuota } from '../../accounts/selector.js';
import { beginRequest, fail, ok, requireCaller } from '../handler.js';
import type { AppContext } from '../../context.js';

/**
 * Handle GET /api/v1/accounts
 *
 * Every account with its capabilities and today's usage per quota kind.
 * Credentials are never returned.
 */
export async function handleListAccounts(ctx: AppContext, request: Request): Promise<Response> {
  const scope = beginRequest(request, 'listAccounts');

  try {
    await requireCaller(ctx, request);

    const accounts = await listAccountsWithQuota({ accounts: ctx.repos.accounts, ledger: ctx.ledger });

    return ok(scope, { accounts });
  } catch (error) {
    return fail(scope, error, 'List accounts failed');
  }
}
