/**
 * server.ts — HTTP entry point
 *
 * Boots Sentry (when configured), starts the Express app and preloads every
 * region whose dataset file exists so the first request is served from cache.
 */
import { env } from './config/env.ts';
import { initSentry, flushSentry, captureException } from './config/sentry.ts';
import { logger } from './shared/logger.ts';
import { isAppError } from './shared/errors.ts';
import { createApp } from './app.ts';
import { getDatasetCache } from './services/dataset-cache.ts';

const BOOT_TIME = Date.now();

function preloadDatasets(): void {
  const cache = getDatasetCache();
  for (const { region, available } of cache.regions()) {
    if (!available) {
      logger.warn({ region }, 'No dataset file for region');
      continue;
    }
    try {
      const t0 = Date.now();
      const dataset = cache.get(region);
      logger.info({ region, records: dataset.records.length, skippedRows: dataset.skippedRows, ms: Date.now() - t0 }, 'Region preloaded');
    } catch (err) {
      if (!isAppError(err)) captureException(err, { context: 'preload', region });
      logger.error({ err, region }, 'Region preload failed');
    }
  }
}

await initSentry();

const app = createApp();

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, env: env.NODE_ENV, bootMs: Date.now() - BOOT_TIME }, 'Server started');
  preloadDatasets();
  logger.info({ totalMs: Date.now() - BOOT_TIME, cache: getDatasetCache().stats() }, 'Data ready');
});

// ─── Graceful shutdown ───

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down...');
  server.close(() => logger.info('HTTP server closed'));

  try {
    await flushSentry(2000);
  } catch (err) {
    logger.warn({ err }, 'Cleanup error');
  }

  setTimeout(() => { logger.warn('Forced exit (10s timeout)'); process.exit(1); }, 10000).unref();
  process.exit(0);
}

process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });
process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); });
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
  captureException(reason instanceof Error ? reason : new Error(String(reason)));
});
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  captureException(err);
  setTimeout(() => process.exit(1), 1000).unref();
});
