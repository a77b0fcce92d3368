/**
 * Metrics utilities for observability
 *
 * Tracks:
 * - Quota rejections per kind
 * - Provider error rates
 * - Task lifecycle events (submitted → terminal, refunds)
 */

import { createLogger } from './logger.js';
import type { QuotaKind } from '../db/schema.js';

const logger = createLogger({ module: 'metrics' });

// -----------------------------
// Metric Counters (in-memory, for basic observability)
// -----------------------------

interface MetricCounter {
  value: number;
  lastUpdated: string;
}

const metrics: Record<string, MetricCounter> = {};

/**
 * Increment a metric counter
 */
export function incrementMetric(name: string, value: number = 1): void {
  const current = metrics[name] ?? { value: 0, lastUpdated: new Date().toISOString() };
  const next = { value: current.value + value, lastUpdated: new Date().toISOString() };
  metrics[name] = next;

  logger.debug({ metric: name, value: next.value }, 'Metric incremented');
}

/**
 * Get a metric counter value
 */
export function getMetric(name: string): number {
  return metrics[name]?.value ?? 0;
}

/**
 * Reset all counters
 */
export function resetMetrics(): void {
  for (const name of Object.keys(metrics)) {
    delete metrics[name];
  }
}

// -----------------------------
// Quota Rejection Tracking
// -----------------------------

/**
 * Track a dispatch refused for lack of quota
 */
export function trackQuotaRejection(
  kind: QuotaKind,
  details?: Record<string, unknown>
): void {
  incrementMetric(`quota_rejection_${kind}`);
  logger.warn({ event: 'quota_rejection', kind, ...details }, 'Quota rejection tracked');
}

// -----------------------------
// Provider Error Tracking
// -----------------------------

const providerErrorCounts: Record<string, number> = {};
const providerCallTotals: Record<string, number> = {};

/**
 * Track a failed provider call
 */
export function trackProviderError(provider: string, status?: number): void {
  providerErrorCounts[provider] = (providerErrorCounts[provider] ?? 0) + 1;
  providerCallTotals[provider] = (providerCallTotals[provider] ?? 0) + 1;
  incrementMetric(`provider_error_${provider}`);
  logger.warn({ event: 'provider_error', provider, status }, 'Provider error tracked');
}

/**
 * Track a successful provider call
 */
export function trackProviderSuccess(provider: string): void {
  providerCallTotals[provider] = (providerCallTotals[provider] ?? 0) + 1;
}

/**
 * Get all provider error rates as percentages
 */
export function getProviderErrorRates(): Record<string, { rate: number; total: number; errors: number }> {
  const rates: Record<string, { rate: number; total: number; errors: number }> = {};
  for (const [provider, total] of Object.entries(providerCallTotals)) {
    const errors = providerErrorCounts[provider] ?? 0;
    rates[provider] = {
      rate: total > 0 ? (errors / total) * 100 : 0,
      total,
      errors,
    };
  }
  return rates;
}

// -----------------------------
// Task Lifecycle Events
// -----------------------------

export const LIFECYCLE_EVENTS = {
  SUBMITTED: 'lifecycle_submitted',
  SUCCEEDED: 'lifecycle_succeeded',
  FAILED: 'lifecycle_failed',
  CANCELLED: 'lifecycle_cancelled',
  EXPIRED: 'lifecycle_expired',
  REFUNDED: 'lifecycle_refunded',
} as const;

export type LifecycleEvent = (typeof LIFECYCLE_EVENTS)[keyof typeof LIFECYCLE_EVENTS];

/**
 * Log a task lifecycle event
 */
export function logLifecycleEvent(
  event: LifecycleEvent,
  taskId: string,
  details?: Record<string, unknown>
): void {
  const logData = {
    event,
    taskId,
    timestamp: new Date().toISOString(),
    ...details,
  };

  switch (event) {
    case LIFECYCLE_EVENTS.FAILED:
    case LIFECYCLE_EVENTS.EXPIRED:
      logger.warn(logData, 'Task ended without a result');
      break;
    case LIFECYCLE_EVENTS.REFUNDED:
      logger.info(logData, 'Task quota refunded');
      break;
    default:
      logger.info(logData, 'Task lifecycle event');
  }

  incrementMetric(event);
}

// -----------------------------
// Dashboard Data
// -----------------------------

/**
 * Snapshot of all counters for the metrics endpoint
 */
export function getObservabilityMetrics(): {
  counters: Record<string, number>;
  providers: Record<string, { rate: number; total: number; errors: number }>;
} {
  const counters: Record<string, number> = {};
  for (const [name, counter] of Object.entries(metrics)) {
    counters[name] = counter.value;
  }
  return { counters, providers: getProviderErrorRates() };
}
