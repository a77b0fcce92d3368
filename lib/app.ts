/**
 * HTTP application
 *
 * Routes map onto the handlers in lib/api/routes; each handler does its own
 * authentication, validation and error envelope.
 */

import { Hono } from 'hono';
import { serveStatic } from '@hono/node-server/serve-static';
import { createLogger } from './observability/logger.js';
import { REQUEST_ID_HEADER } from './observability/request-id.js';
import { ERROR_CODES, errorResponse, sanitizeError } from './security/errors.js';
import { MEDIA_ROUTE } from './storage/media-store.js';
import { handleHealth, handleMetrics } from './api/routes/health.js';
import { handleListAccounts } from './api/routes/accounts.js';
import {
  handleContinueBanana,
  handleEstimateImage,
  handleEstimateVideo,
  handleGenerateBanana,
  handleGenerateImage,
  handleGenerateVideo,
} from './api/routes/generate.js';
import {
  handleCancelTask,
  handleDeleteTask,
  handleGetTask,
  handleListTasks,
  handleSyncTask,
} from './api/routes/tasks.js';
import type { AppContext } from './context.js';

const logger = createLogger({ module: 'http' });

export interface AppOptions {
  /** Directory served read-only under /media; omitted, nothing is served */
  mediaDir?: string;
}

export function createApp(ctx: AppContext, options: AppOptions = {}): Hono {
  const app = new Hono();

  app.use('*', async (c, next) => {
    const startTime = Date.now();
    await next();
    logger.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        requestId: c.res.headers.get(REQUEST_ID_HEADER),
        durationMs: Date.now() - startTime,
      },
      'Request handled'
    );
  });

  app.get('/api/health', (c) => handleHealth(ctx, c.req.raw));
  app.get('/api/metrics', (c) => handleMetrics(ctx, c.req.raw));

  const v1 = new Hono();

  v1.get('/accounts', (c) => handleListAccounts(ctx, c.req.raw));

  v1.post('/video/generate', (c) => handleGenerateVideo(ctx, c.req.raw));
  v1.post('/video/estimate', (c) => handleEstimateVideo(ctx, c.req.raw));
  v1.post('/image/generate', (c) => handleGenerateImage(ctx, c.req.raw));
  v1.post('/image/estimate', (c) => handleEstimateImage(ctx, c.req.raw));
  v1.post('/banana/generate', (c) => handleGenerateBanana(ctx, c.req.raw));
  v1.post('/banana/:taskId/continue', (c) => handleContinueBanana(ctx, c.req.raw, c.req.param()));

  v1.get('/tasks', (c) => handleListTasks(ctx, c.req.raw));
  v1.get('/tasks/:taskId', (c) => handleGetTask(ctx, c.req.raw, c.req.param()));
  v1.post('/tasks/:taskId/sync', (c) => handleSyncTask(ctx, c.req.raw, c.req.param()));
  v1.post('/tasks/:taskId/cancel', (c) => handleCancelTask(ctx, c.req.raw, c.req.param()));
  v1.delete('/tasks/:taskId', (c) => handleDeleteTask(ctx, c.req.raw, c.req.param()));

  app.route('/api/v1', v1);

  if (options.mediaDir) {
    app.use(
      `${MEDIA_ROUTE}/*`,
      serveStatic({
        root: options.mediaDir,
        rewriteRequestPath: (path) => path.slice(MEDIA_ROUTE.length),
      })
    );
  }

  app.notFound((c) => c.json(errorResponse(ERROR_CODES.NOT_FOUND, 'Route not found'), 404));

  app.onError((error, c) => {
    logger.error({ error, path: c.req.path }, 'Unhandled request error');
    return c.json(sanitizeError(error), 500);
  });

  return app;
}
