/**
 * GET /api/health and GET /api/metrics
 */

import { config } from '../../utils/config.js';
import { getObservabilityMetrics } from '../../observability/metrics.js';
import { REQUEST_ID_HEADER } from '../../observability/request-id.js';
import { beginRequest, fail, ok, requireCaller } from '../handler.js';
import type { AppContext } from '../../context.js';

type CheckResult = 'ok' | 'down' | 'in-process';

/**
 * Health check response
 */
interface HealthResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  version: string;
  checks: {
    database: CheckResult;
    redis: CheckResult;
  };
  scheduler: { running: boolean; inlineJobs: number };
  environment: string;
}

async function runCheck(probe: (() => Promise<boolean>) | null): Promise<CheckResult> {
  if (!probe) return 'in-process';
  return (await probe()) ? 'ok' : 'down';
}

/**
 * GET /api/health - public liveness and backend reachability
 */
export async function handleHealth(ctx: AppContext, request: Request): Promise<Response> {
  const scope = beginRequest(request, 'health');
  const startTime = Date.now();

  const checks = {
    database: await runCheck(ctx.probes.database),
    redis: await runCheck(ctx.probes.redis),
  };
  const status = checks.database === 'down' || checks.redis === 'down' ? 'degraded' : 'healthy';

  const response: HealthResponse = {
    status,
    timestamp: new Date().toISOString(),
    version: process.env.npm_package_version || '0.1.0',
    checks,
    scheduler: { running: ctx.scheduler.isRunning, inlineJobs: ctx.inlineJobs.size },
    environment: config.NODE_ENV,
  };

  scope.log.info({ status, checks, durationMs: Date.now() - startTime }, 'Health check completed');

  return Response.json(response, {
    status: status === 'healthy' ? 200 : 503,
    headers: {
      'Cache-Control': 'no-cache, no-store, must-revalidate',
      [REQUEST_ID_HEADER]: scope.requestId,
    },
  });
}

/**
 * GET /api/metrics - in-process counters and provider error rates
 */
export async function handleMetrics(ctx: AppContext, request: Request): Promise<Response> {
  const scope = beginRequest(request, 'metrics');

  try {
    await requireCaller(ctx, request);
    return ok(scope, getObservabilityMetrics());
  } catch (error) {
    return fail(scope, error, 'Metrics request failed');
  }
}
