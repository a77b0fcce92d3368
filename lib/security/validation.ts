/**
 * Request validation utilities using Zod
 */

import { z, ZodError } from 'zod';
import { handleValidationError, ApiError, ERROR_CODES } from './errors.js';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Parse and validate request body
 */
export async function validateBody<T>(
  request: Request,
  schema: Schema<T>
): Promise<T> {
  let body: unknown;
  try {
    const text = await request.text();
    body = text.length === 0 ? {} : JSON.parse(text);
  } catch {
    throw new ApiError(
      ERROR_CODES.INVALID_REQUEST,
      'Invalid JSON in request body',
      400
    );
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw handleValidationError(result.error);
  }
  return result.data;
}

/**
 * Parse and validate query parameters
 */
export function validateQuery<T>(
  searchParams: URLSearchParams,
  schema: Schema<T>
): T {
  const obj: Record<string, string> = {};
  searchParams.forEach((value, key) => {
    obj[key] = value;
  });

  return parseOrThrow(obj, schema);
}

/**
 * Parse and validate path parameters
 */
export function validatePath<T>(
  params: Record<string, string>,
  schema: Schema<T>
): T {
  return parseOrThrow(params, schema);
}

function parseOrThrow<T>(input: unknown, schema: Schema<T>): T {
  try {
    return schema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw handleValidationError(error);
    }
    throw error;
  }
}
