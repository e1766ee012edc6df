/**
 * Express application
 *
 * Built from an already-constructed cover pipeline so tests can mount the
 * real routes over temp directories and a fake network.
 */

import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import type { CoverPipeline } from './services/cover-pipeline.service.js';
import { getAllPaths } from './services/app-paths.service.js';
import { requestLogger } from './services/logger.service.js';
import { createCoverRoutes } from './routes/covers.routes.js';
import { errorHandler, notFoundHandler, sendSuccess } from './middleware/response.middleware.js';

export interface CreateAppOptions {
  /** Allowed CORS origin (default: any) */
  clientUrl?: string;
  /** Log every request (default: true) */
  logRequests?: boolean;
}

export function createApp(pipeline: CoverPipeline, options: CreateAppOptions = {}): Express {
  const app = express();

  // ===========================================================================
  // Middleware
  // ===========================================================================

  app.use(cors(options.clientUrl ? { origin: options.clientUrl } : undefined));
  app.use(express.json({ limit: '1mb' }));
  if (options.logRequests ?? true) {
    app.use(requestLogger());
  }

  // ===========================================================================
  // API Routes
  // ===========================================================================

  app.get('/api/health', (_req, res) => {
    sendSuccess(res, {
      status: 'ok',
      timestamp: new Date().toISOString(),
      backfill: pipeline.backfill.getState().status,
    });
  });

  // Application paths (for debugging)
  app.get('/api/paths', (_req, res) => {
    sendSuccess(res, getAllPaths());
  });

  app.use('/api/books', createCoverRoutes(pipeline));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
