/**
 * Error types for contract violations.
 *
 * Expected failures (dead candidate URLs, undecodable bytes, network errors)
 * are never thrown; they are returned as result values. CoverError is reserved
 * for callers that break a contract, e.g. acting on a book that does not exist.
 */

export type CoverErrorCode =
  | 'BOOK_NOT_FOUND'
  | 'INVALID_URL'
  | 'INVALID_IMAGE'
  | 'STORAGE_FAILED'
  | 'INVALID_CONFIG';

export class CoverError extends Error {
  readonly code: CoverErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: CoverErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CoverError';
    this.code = code;
    this.details = details;
  }
}

export function isCoverError(error: unknown): error is CoverError {
  return error instanceof CoverError;
}
