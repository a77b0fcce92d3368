/**
 * Shared pieces of every API handler: request scope, caller check and the
 * `{ success, data | error }` envelope
 */

import { logger, type Logger } from '../observability/logger.js';
import { getRequestId, REQUEST_ID_HEADER } from '../observability/request-id.js';
import { ApiError, ERROR_CODES, sanitizeError, statusOf } from '../security/errors.js';
import { authenticate, type Principal } from '../security/auth.js';
import type { AppContext } from '../context.js';

export interface RequestScope {
  requestId: string;
  log: Logger;
}

export function beginRequest(request: Request, handler: string): RequestScope {
  const requestId = getRequestId(request);
  return { requestId, log: logger.child({ requestId, handler }) };
}

/**
 * @throws ApiError UNAUTHORIZED without a valid bearer token or API key
 */
export async function requireCaller(ctx: AppContext, request: Request): Promise<Principal> {
  const principal = await authenticate(request.headers, ctx.auth);
  if (!principal) {
    throw new ApiError(ERROR_CODES.UNAUTHORIZED, 'Authentication required', 401);
  }
  return principal;
}

export function ok<T>(scope: RequestScope, data: T, status: number = 200): Response {
  return Response.json(
    { success: true, data },
    { status, headers: { [REQUEST_ID_HEADER]: scope.requestId } }
  );
}

/**
 * Error envelope; server faults are logged at error level, the rest at warn
 */
export function fail(scope: RequestScope, error: unknown, message: string): Response {
  const status = statusOf(error);
  if (status >= 500) {
    scope.log.error({ error }, message);
  } else {
    scope.log.warn({ status, error: error instanceof Error ? error.message : error }, message);
  }

  return Response.json(sanitizeError(error), {
    status,
    headers: { [REQUEST_ID_HEADER]: scope.requestId },
  });
}
