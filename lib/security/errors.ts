/**
 * Standard error response shapes and error handling utilities
 */

import { ZodError } from 'zod';
import superjson from 'superjson';

/**
 * Error codes returned by the API
 */
export const ERROR_CODES = {
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_REQUEST: 'INVALID_REQUEST',
  MISSING_FIRST_FRAME: 'MISSING_FIRST_FRAME',
  INVALID_STATE: 'INVALID_STATE',
  QUOTA_EXCEEDED: 'QUOTA_EXCEEDED',
  PROVIDER_ERROR: 'PROVIDER_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Standard error response shape
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
  };
}

/**
 * Create a standard error response
 */
export function errorResponse(
  code: ErrorCode,
  message: string,
  details?: Record<string, string[]>
): ErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}

/**
 * Custom API error class
 */
export class ApiError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public status: number = 400,
    public details?: Record<string, string[]>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Upstream provider failure. `transient` faults are worth retrying later.
 */
export class ProviderError extends ApiError {
  constructor(
    message: string,
    public transient: boolean,
    public upstreamStatus?: number
  ) {
    super(ERROR_CODES.PROVIDER_ERROR, message, 502);
    this.name = 'ProviderError';
  }
}

/**
 * Collect Zod issues into a field → messages map
 */
export function zodDetails(error: ZodError): Record<string, string[]> {
  const details: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const path = issue.path.join('.') || '_';
    const messages = details[path] ?? [];
    messages.push(issue.message);
    details[path] = messages;
  }
  return details;
}

/**
 * Convert Zod validation errors into an ApiError
 */
export function handleValidationError(error: ZodError): ApiError {
  return new ApiError(
    ERROR_CODES.VALIDATION_ERROR,
    'Request validation failed',
    400,
    zodDetails(error)
  );
}

/**
 * Safe JSON stringify that handles Dates, Maps and circular-free class instances
 */
export function safeStringify(obj: unknown): string {
  return superjson.stringify(obj);
}

/**
 * Describe any thrown value in one line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return safeStringify(error);
}

/**
 * HTTP status for a thrown value
 */
export function statusOf(error: unknown): number {
  if (error instanceof ApiError) return error.status;
  if (error instanceof ZodError) return 400;
  return 500;
}

/**
 * Never leak internal details in production
 */
export function sanitizeError(error: unknown): ErrorResponse {
  if (error instanceof ApiError) {
    return errorResponse(error.code, error.message, error.details);
  }

  if (error instanceof ZodError) {
    return errorResponse(ERROR_CODES.VALIDATION_ERROR, 'Request validation failed', zodDetails(error));
  }

  if (process.env.NODE_ENV === 'production') {
    return errorResponse(
      ERROR_CODES.INTERNAL_ERROR,
      'An unexpected error occurred'
    );
  }

  return errorResponse(ERROR_CODES.INTERNAL_ERROR, describeError(error));
}
