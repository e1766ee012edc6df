/**
 * Cover Routes
 *
 * API endpoints for rendering book covers, the user's cover actions,
 * the library backfill and cache management. Mounted under /api/books.
 */

import { Router } from 'express';
import type { Request } from 'express';
import multer from 'multer';
import type { CoverPipeline } from '../services/cover-pipeline.service.js';
import type { Book } from '../types/cover.types.js';
import { CoverError } from '../types/errors.js';
import { logError, logInfo } from '../services/logger.service.js';
import {
  asyncHandler,
  sendBadRequest,
  sendNotFound,
  sendSuccess,
} from '../middleware/response.middleware.js';
import { parseBody, parseParams, parseQuery } from '../middleware/validation.middleware.js';
import {
  ApplyRemoteCoverSchema,
  BookIdParamsSchema,
  CoverQuerySchema,
} from '../schemas/cover.schemas.js';

const PHOTO_MAX_BYTES = 25 * 1024 * 1024;
const PHOTO_TYPES = ['image/jpeg', 'image/png', 'image/webp', 'image/heic', 'image/heif', 'image/tiff', 'image/gif'];

// Configure multer for cover photo uploads
const photoUpload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: PHOTO_MAX_BYTES, files: 1 },
  fileFilter: (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
    if (PHOTO_TYPES.includes(file.mimetype)) {
      cb(null, true);
    } else {
      cb(new CoverError('INVALID_IMAGE', `Unsupported image type: ${file.mimetype}`));
    }
  },
});

// =============================================================================
// Router
// =============================================================================

export function createCoverRoutes(pipeline: CoverPipeline): Router {
  const router = Router();
  const { store, covers, codec, backfill, memoryCache, diskCache, fetcher } = pipeline;

  async function requireBook(req: Request): Promise<Book> {
    const { id } = parseParams(BookIdParamsSchema, req);
    const book = await store.fetchById(id);
    if (!book) {
      throw new CoverError('BOOK_NOT_FOUND', `Book not found: ${id}`, { bookId: id });
    }
    return book;
  }

  async function describeCover(book: Book) {
    const thumbnail = book.cover.syncedThumbnail;
    const size = thumbnail ? await codec.probe(thumbnail) : null;

    return {
      bookId: book.id,
      primaryCoverURL: book.cover.primaryCoverURL ?? null,
      candidateURLs: book.cover.candidateURLs,
      hasUserPhoto: Boolean(book.cover.userPhotoFileRef),
      thumbnail: thumbnail
        ? {
            bytes: thumbnail.length,
            width: size?.width ?? null,
            height: size?.height ?? null,
            lowResolution: await covers.needsThumbnailRefresh(book.cover),
          }
        : null,
      refreshing: covers.isRefreshing(book.id),
    };
  }

  // ===========================================================================
  // Library-wide Operations
  // ===========================================================================

  /**
   * GET /api/books/covers/backfill
   * Current backfill state and the last result.
   */
  router.get('/covers/backfill', (_req, res) => {
    sendSuccess(res, { running: backfill.isRunning, ...backfill.getState() });
  });

  /**
   * POST /api/books/covers/backfill
   * Start a backfill pass. Joins the running pass if there is one.
   */
  router.post('/covers/backfill', (_req, res) => {
    const alreadyRunning = backfill.isRunning;

    backfill.runOnce().catch((error: unknown) => {
      logError('covers', error, { action: 'backfill' });
    });

    if (!alreadyRunning) {
      logInfo('covers', 'Cover backfill started from API');
    }
    sendSuccess(res, { started: !alreadyRunning, ...backfill.getState() }, undefined, 202);
  });

  /**
   * DELETE /api/books/covers/backfill
   * Cancel the running pass before its next batch.
   */
  router.delete('/covers/backfill', (_req, res) => {
    sendSuccess(res, { cancelled: backfill.cancel() });
  });

  /**
   * GET /api/books/covers/cache
   * Memory and disk cache statistics.
   */
  router.get(
    '/covers/cache',
    asyncHandler(async (_req, res) => {
      sendSuccess(res, {
        memory: memoryCache.getStats(),
        disk: await diskCache.getSummary(),
        fetcher: fetcher.getStats(),
      });
    })
  );

  /**
   * DELETE /api/books/covers/cache
   * Empty both byte caches. Synced thumbnails and user photos are untouched.
   */
  router.delete(
    '/covers/cache',
    asyncHandler(async (_req, res) => {
      memoryCache.clear();
      await diskCache.clear();
      logInfo('covers', 'Cover caches cleared');
      sendSuccess(res, { cleared: true });
    })
  );

  // ===========================================================================
  // Per-book Rendering
  // ===========================================================================

  /**
   * GET /api/books/:id/cover?w=&h=
   * Best cover bytes for a surface of w x h pixels. Large surfaces without a
   * user photo get a display-quality remote cover when one resolves.
   * X-Cover-Source tells which source won; X-Cover-Refreshing is set when a
   * better thumbnail is being resolved in the background.
   */
  router.get(
    '/:id/cover',
    asyncHandler(async (req, res) => {
      const book = await requireBook(req);
      const { w, h } = parseQuery(CoverQuerySchema, req);

      const cover = await covers.getDisplayCover(book, { width: w, height: h });

      res.set('X-Cover-Source', cover.source);
      if (cover.refreshing) {
        res.set('X-Cover-Refreshing', '1');
      }

      if (cover.source === 'placeholder') {
        sendNotFound(res, 'No cover available for this book', 'NO_COVER');
        return;
      }

      res.set({
        'Content-Type': 'image/jpeg',
        'Content-Length': cover.data.length.toString(),
        'Cache-Control': 'no-cache',
      });
      res.send(cover.data);
    })
  );

  /**
   * GET /api/books/:id/cover/state
   * Cover record summary.
   */
  router.get(
    '/:id/cover/state',
    asyncHandler(async (req, res) => {
      const book = await requireBook(req);
      sendSuccess(res, await describeCover(book));
    })
  );

  // ===========================================================================
  // User Actions
  // ===========================================================================

  /**
   * POST /api/books/:id/cover/remote
   * Use a remote cover. Removes any user photo.
   */
  router.post(
    '/:id/cover/remote',
    asyncHandler(async (req, res) => {
      const { id } = parseParams(BookIdParamsSchema, req);
      const { url } = parseBody(ApplyRemoteCoverSchema, req);

      const book = await covers.applyRemoteCover(id, url);
      sendSuccess(res, await describeCover(book));
    })
  );

  /**
   * PUT /api/books/:id/cover/photo
   * Upload the user's own photo (multipart field "image").
   */
  router.put(
    '/:id/cover/photo',
    photoUpload.single('image'),
    asyncHandler(async (req, res) => {
      const { id } = parseParams(BookIdParamsSchema, req);
      if (!req.file) {
        sendBadRequest(res, 'No image uploaded (expected multipart field "image")');
        return;
      }

      const book = await covers.applyUserPhoto(id, req.file.buffer);
      sendSuccess(res, await describeCover(book));
    })
  );

  /**
   * DELETE /api/books/:id/cover/photo
   * Remove the user's photo.
   */
  router.delete(
    '/:id/cover/photo',
    asyncHandler(async (req, res) => {
      const { id } = parseParams(BookIdParamsSchema, req);
      const book = await covers.removeUserPhoto(id);
      sendSuccess(res, await describeCover(book));
    })
  );

  return router;
}
