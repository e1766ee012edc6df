/**
 * Logger Service
 *
 * Structured logging with Pino.
 *
 * Log Levels:
 * - fatal: Application crash
 * - error: Error conditions
 * - warn: Warning conditions
 * - info: Informational messages (default)
 * - debug: Debug information (candidate failures, cache misses)
 * - trace: Very detailed tracing
 */

import pino from 'pino';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

// =============================================================================
// Configuration
// =============================================================================

const nodeEnv = process.env.NODE_ENV;
const isDevelopment = nodeEnv !== 'production' && nodeEnv !== 'test';
const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// =============================================================================
// Logger Instance
// =============================================================================

export const logger = pino({
  level: logLevel,
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    app: 'libris-covers',
  },
});

// =============================================================================
// Child Loggers for Services
// =============================================================================

/**
 * Create a child logger with service context
 */
export function createServiceLogger(service: string) {
  return logger.child({ service });
}

// Pre-configured service loggers
export const fetcherLogger = createServiceLogger('image-fetcher');
export const cacheLogger = createServiceLogger('image-cache');
export const resolutionLogger = createServiceLogger('cover-resolution');
export const coverLogger = createServiceLogger('cover');
export const backfillLogger = createServiceLogger('cover-backfill');
export const storeLogger = createServiceLogger('book-store');

// =============================================================================
// Express Middleware Logger
// =============================================================================

/**
 * Express request logging middleware
 */
export function requestLogger(): RequestHandler {
  const httpLogger = createServiceLogger('http');

  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';

      httpLogger[level]({
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration,
      }, `${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`);
    });

    next();
  };
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Log an error with context
 */
export function logError(context: string, error: unknown, metadata?: Record<string, unknown>) {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  logger.error({
    context,
    error: errorMessage,
    stack,
    ...metadata,
  }, `[${context}] ${errorMessage}`);
}

/**
 * Log a warning with context
 */
export function logWarn(context: string, message: string, metadata?: Record<string, unknown>) {
  logger.warn({
    context,
    ...metadata,
  }, `[${context}] ${message}`);
}

/**
 * Log info with context
 */
export function logInfo(context: string, message: string, metadata?: Record<string, unknown>) {
  logger.info({
    context,
    ...metadata,
  }, `[${context}] ${message}`);
}
