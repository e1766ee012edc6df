/**
 * Validation Middleware
 *
 * Request validation using Zod schemas. Handlers parse body, query and
 * params through these helpers and get typed values back; a failed parse
 * becomes a 400 VALIDATION_ERROR response in the error handler.
 */

import type { Request } from 'express';
import { z } from 'zod';

// =============================================================================
// Types
// =============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
}

export class RequestValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super('Request validation failed');
    this.name = 'RequestValidationError';
    this.issues = issues;
  }
}

export function isRequestValidationError(error: unknown): error is RequestValidationError {
  return error instanceof RequestValidationError;
}

// =============================================================================
// Parsers
// =============================================================================

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export function parseBody<T extends z.ZodTypeAny>(schema: T, req: Request): z.infer<T> {
  return parseWith(schema, req.body);
}

export function parseQuery<T extends z.ZodTypeAny>(schema: T, req: Request): z.infer<T> {
  return parseWith(schema, req.query);
}

export function parseParams<T extends z.ZodTypeAny>(schema: T, req: Request): z.infer<T> {
  return parseWith(schema, req.params);
}
