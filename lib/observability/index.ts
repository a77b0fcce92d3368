/**
 * Observability module exports
 */

export { logger, createLogger, getLogger, type Logger } from './logger.js';
export { generateRequestId, getRequestId, REQUEST_ID_HEADER } from './request-id.js';
export {
  incrementMetric,
  getMetric,
  resetMetrics,
  trackQuotaRejection,
  trackProviderError,
  trackProviderSuccess,
  getProviderErrorRates,
  logLifecycleEvent,
  getObservabilityMetrics,
  LIFECYCLE_EVENTS,
  type LifecycleEvent,
} from './metrics.js';
