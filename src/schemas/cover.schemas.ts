/**
 * Cover Validation Schemas
 *
 * Zod schemas for the cover API endpoints.
 */

import { z } from 'zod';

// =============================================================================
// Params
// =============================================================================

export const BookIdParamsSchema = z.object({
  id: z.string().trim().min(1, 'Book id is required'),
});

// =============================================================================
// Rendering
// =============================================================================

const dimension = (fallback: number) =>
  z.coerce.number().int().min(1).max(8192).default(fallback);

/**
 * Size of the surface the cover is drawn on, in pixels. Defaults to a list row.
 */
export const CoverQuerySchema = z.object({
  w: dimension(60),
  h: dimension(90),
});

// =============================================================================
// User Actions
// =============================================================================

export const ApplyRemoteCoverSchema = z.object({
  url: z.string().trim().min(1, 'Cover URL is required').max(2048, 'Cover URL too long'),
});

export type CoverQuery = z.infer<typeof CoverQuerySchema>;
export type ApplyRemoteCoverInput = z.infer<typeof ApplyRemoteCoverSchema>;
