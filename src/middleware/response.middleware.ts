/**
 * Response Middleware
 *
 * Standardized API response formatting and error handling.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { logError } from '../services/logger.service.js';
import { isRequestValidationError } from './validation.middleware.js';
import { isCoverError } from '../types/errors.js';
import type { CoverErrorCode } from '../types/errors.js';

// =============================================================================
// Types
// =============================================================================

export interface ApiSuccessResponse<T = unknown> {
  success: true;
  data: T;
  meta?: Record<string, unknown>;
}

export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export type ApiResponse<T = unknown> = ApiSuccessResponse<T> | ApiErrorResponse;

const STATUS_BY_CODE: Record<CoverErrorCode, number> = {
  BOOK_NOT_FOUND: 404,
  INVALID_URL: 400,
  INVALID_IMAGE: 400,
  STORAGE_FAILED: 500,
  INVALID_CONFIG: 500,
};

// =============================================================================
// Response Helpers
// =============================================================================

/**
 * Send a successful response
 */
export function sendSuccess<T>(res: Response, data: T, meta?: ApiSuccessResponse<T>['meta'], status = 200): void {
  const response: ApiSuccessResponse<T> = {
    success: true,
    data,
  };
  if (meta) {
    response.meta = meta;
  }
  res.status(status).json(response);
}

/**
 * Send an error response
 */
export function sendError(
  res: Response,
  code: string,
  message: string,
  status = 500,
  details?: unknown
): void {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
    },
  };
  if (details !== undefined) {
    response.error.details = details;
  }
  res.status(status).json(response);
}

export function sendBadRequest(res: Response, message: string, details?: unknown): void {
  sendError(res, 'BAD_REQUEST', message, 400, details);
}

export function sendNotFound(res: Response, message: string, code = 'NOT_FOUND'): void {
  sendError(res, code, message, 404);
}

// =============================================================================
// Error Handling Middleware
// =============================================================================

/**
 * Async handler wrapper - catches errors and passes to error middleware
 */
export function asyncHandler(fn: RequestHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Global error handler middleware.
 * Validation, upload and cover errors keep their code; anything else is an internal error.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isRequestValidationError(err)) {
    sendError(res, 'VALIDATION_ERROR', err.message, 400, err.issues);
    return;
  }

  if (err instanceof multer.MulterError) {
    sendBadRequest(res, err.message, { code: err.code, field: err.field });
    return;
  }

  if (isCoverError(err)) {
    const status = STATUS_BY_CODE[err.code];
    if (status >= 500) {
      logError(`${req.method} ${req.path}`, err, { code: err.code });
    }
    sendError(res, err.code, err.message, status, err.details);
    return;
  }

  logError(`${req.method} ${req.path}`, err, {
    method: req.method,
    path: req.path,
    query: req.query,
  });

  // Don't expose internals in production
  const isDevelopment = process.env.NODE_ENV !== 'production';
  const message = isDevelopment ? err.message : 'An unexpected error occurred';

  sendError(res, 'INTERNAL_ERROR', message, 500);
}

// =============================================================================
// Not Found Handler
// =============================================================================

/**
 * 404 handler for undefined routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  sendNotFound(res, `Route not found: ${req.method} ${req.path}`);
}
