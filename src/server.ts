/**
 * Server entry point
 *
 * Loads the environment and configuration, builds the cover pipeline,
 * starts the HTTP server and, when configured, a library backfill.
 */

import { loadedFrom } from './env.js';

import { ensureAppDirectories, getAllPaths } from './services/app-paths.service.js';
import { loadConfig } from './services/config.service.js';
import { createCoverPipeline } from './services/cover-pipeline.service.js';
import type { CoverPipeline } from './services/cover-pipeline.service.js';
import { createApp } from './app.js';
import { logger, logError, logInfo } from './services/logger.service.js';

const SHUTDOWN_TIMEOUT_MS = 10_000;

async function trimDiskCache(pipeline: CoverPipeline): Promise<void> {
  const maxBytes = pipeline.config.cache.diskMaxSizeMb * 1024 * 1024;
  try {
    await pipeline.diskCache.enforceSizeLimit(maxBytes);
  } catch (error) {
    logError('startup', error, { action: 'trim-disk-cache' });
  }
}

async function startServer(): Promise<void> {
  try {
    if (loadedFrom) {
      logInfo('startup', `Environment loaded from ${loadedFrom}`);
    }

    logInfo('startup', 'Initializing application directories');
    ensureAppDirectories();

    const config = loadConfig();
    logInfo('startup', `Configuration loaded (version ${config.version})`, { paths: getAllPaths() });

    const pipeline = createCoverPipeline({ config });
    await trimDiskCache(pipeline);

    // Keep the disk cache bounded after every pass
    pipeline.backfill.on('complete', () => {
      void trimDiskCache(pipeline);
    });

    const app = createApp(pipeline, { clientUrl: process.env.CLIENT_URL });
    const port = config.server.port;

    const server = app.listen(port, () => {
      logger.info({ port }, `Libris covers running at http://localhost:${port}/api`);

      if (config.backfill.runOnStartup) {
        pipeline.backfill.runOnce().catch((error: unknown) => {
          logError('startup', error, { action: 'backfill' });
        });
      }
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
      logInfo('shutdown', `${signal} received. Shutting down gracefully...`);
      pipeline.backfill.cancel();

      server.close(() => {
        logInfo('shutdown', 'HTTP server closed');
        process.exit(0);
      });

      // Force exit after timeout
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logError('startup', error, { action: 'start-server' });
    process.exit(1);
  }
}

void startServer();
