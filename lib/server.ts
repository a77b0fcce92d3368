/**
 * Process entry point: HTTP server plus the polling scheduler
 */

import { serve } from '@hono/node-server';
import { config } from './utils/config.js';
import { logger } from './observability/logger.js';
import { describeError } from './security/errors.js';
import { createAppContext } from './context.js';
import { createApp } from './app.js';

const ctx = createAppContext();
const app = createApp(ctx, { mediaDir: config.MEDIA_DIR });

const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  logger.info({ port: info.port, environment: config.NODE_ENV }, 'Server listening');
});

ctx.scheduler.start();

function closeServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down');
  await ctx.scheduler.stop();
  await closeServer();
  // In-flight inline jobs settle and sync before exit
  await ctx.inlineJobs.drain();
  logger.info('Shutdown complete');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error: describeError(error) }, 'Shutdown failed');
      process.exitCode = 1;
    });
  });
}
