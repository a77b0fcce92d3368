/**
 * JSON-over-HTTP calls to upstream providers
 */

import { z } from 'zod';
import { ProviderError, describeError } from '../security/errors.js';
import { trackProviderError, trackProviderSuccess } from '../observability/metrics.js';
import type { FetchLike } from './types.js';

export interface ProviderRequest {
  provider: string;
  url: string;
  method: 'GET' | 'POST' | 'DELETE';
  headers: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

const errorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

/**
 * 408, 429 and 5xx are worth retrying; other 4xx are not
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

type JsonParse = { ok: true; value: unknown } | { ok: false };

function parseJson(text: string): JsonParse {
  if (text.length === 0) return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Best human-readable message from an error body
 */
export function extractErrorMessage(text: string): string {
  const json = parseJson(text);
  if (json.ok) {
    const parsed = errorBodySchema.safeParse(json.value);
    if (parsed.success) return parsed.data.error.message;
  }
  return text.slice(0, 300) || 'empty response';
}

export async function requestJson<T>(
  fetchImpl: FetchLike,
  request: ProviderRequest,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const { provider } = request;
  let response: Response;
  let text: string;

  try {
    response = await fetchImpl(request.url, {
      method: request.method,
      headers: { 'Content-Type': 'application/json', ...request.headers },
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: AbortSignal.timeout(request.timeoutMs),
    });
    text = await response.text();
  } catch (error) {
    trackProviderError(provider);
    throw new ProviderError(`${provider} request failed: ${describeError(error)}`, true);
  }

  if (!response.ok) {
    trackProviderError(provider, response.status);
    throw new ProviderError(
      `${provider} error ${response.status}: ${extractErrorMessage(text)}`,
      isTransientStatus(response.status),
      response.status
    );
  }

  const json = parseJson(text);
  if (!json.ok) {
    trackProviderError(provider, response.status);
    throw new ProviderError(`${provider} returned invalid JSON`, true, response.status);
  }

  const parsed = schema.safeParse(json.value);
  if (!parsed.success) {
    trackProviderError(provider, response.status);
    throw new ProviderError(`${provider} returned an unexpected payload`, false, response.status);
  }

  trackProviderSuccess(provider);
  return parsed.data;
}
