/**
 * Caller authentication: bearer JWT or static API key
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { SignJWT, jwtVerify } from 'jose';

export const API_KEY_HEADER = 'X-API-Key';

export type Principal =
  | { kind: 'token'; subject: string }
  | { kind: 'api_key'; keyId: string };

export interface AuthOptions {
  secret: string;
  apiKeys: readonly string[];
}

function encodeSecret(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Create a JWT for a subject (used by tests and operator tooling)
 */
export async function createToken(subject: string, secret: string, expiresIn = '7d'): Promise<string> {
  return new SignJWT({})
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(subject)
    .setIssuedAt()
    .setExpirationTime(expiresIn)
    .sign(encodeSecret(secret));
}

/**
 * Verify a JWT and return its subject
 */
export async function verifyToken(token: string, secret: string): Promise<string | null> {
  try {
    const { payload } = await jwtVerify(token, encodeSecret(secret), { algorithms: ['HS256'] });
    return payload.sub ?? null;
  } catch {
    return null;
  }
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Match an API key against the configured list in constant time
 */
export function matchApiKey(candidate: string, apiKeys: readonly string[]): string | null {
  const candidateDigest = digest(candidate);
  let matched: string | null = null;
  for (const key of apiKeys) {
    if (timingSafeEqual(candidateDigest, digest(key))) {
      matched = key;
    }
  }
  return matched ? digest(matched).toString('hex').slice(0, 12) : null;
}

/**
 * Resolve the caller from request headers
 */
export async function authenticate(headers: Headers, options: AuthOptions): Promise<Principal | null> {
  const authHeader = headers.get('Authorization');
  if (authHeader?.startsWith('Bearer ') && options.secret) {
    const subject = await verifyToken(authHeader.slice(7), options.secret);
    if (subject) return { kind: 'token', subject };
  }

  const apiKey = headers.get(API_KEY_HEADER);
  if (apiKey && options.apiKeys.length > 0) {
    const keyId = matchApiKey(apiKey, options.apiKeys);
    if (keyId) return { kind: 'api_key', keyId };
  }

  return null;
}
