/**
 * Request ID utilities
 */

import { randomUUID } from 'node:crypto';

/**
 * Request ID header name
 */
export const REQUEST_ID_HEADER = 'X-Request-ID';

/**
 * Generate a new request ID
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Take the caller's request ID when it is usable, otherwise mint one
 */
export function getRequestId(request?: Request): string {
  const incoming = request?.headers.get(REQUEST_ID_HEADER)?.trim();
  if (incoming && incoming.length <= 128) {
    return incoming;
  }
  return generateRequestId();
}
