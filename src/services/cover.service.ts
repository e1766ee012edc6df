/**
 * Cover Service
 *
 * The on-demand side of the cover pipeline:
 * - decides what a UI surface should render right now
 * - refreshes missing or low-resolution synced thumbnails in the background
 * - applies the user's explicit choices (remote cover, own photo, removal)
 *
 * A book has at most one refresh in flight; concurrent requests for the same
 * book share it. Refreshes and user actions on one book run one after another,
 * each starting from the stored record. Listeners are told about every change
 * through the 'cover-updated' event.
 */

import { EventEmitter } from 'events';
import type { Book, CoverRecord, DisplaySize } from '../types/cover.types.js';
import { CoverError } from '../types/errors.js';
import { coverLogger as logger, logError } from './logger.service.js';
import type { BookStore } from './book-store.service.js';
import { cloneBook } from './book-store.service.js';
import { candidatePool, pinResolvedCoverUrl } from './cover-candidates.service.js';
import { isLocalFileUrl, isRemoteHttpUrl, toHttps } from './cover-url-utils.js';
import type { CoverResolutionEngine } from './cover-resolution.service.js';
import type { ThumbnailCodec } from './thumbnail-codec.service.js';
import type { UserCoverStore } from './user-cover-store.service.js';

// =============================================================================
// Types
// =============================================================================

export type RenderableCover =
  | { source: 'user-photo'; data: Buffer; refreshing: boolean }
  | { source: 'synced-thumbnail'; data: Buffer; refreshing: boolean }
  | { source: 'remote-display'; data: Buffer; refreshing: boolean }
  | { source: 'placeholder'; refreshing: boolean };

export type RenderableCoverSource = RenderableCover['source'];

/**
 * - current: thumbnail was already good, nothing fetched
 * - refreshed: a new thumbnail was stored
 * - unresolved: every source failed, the record is unchanged
 * - missing: the book is not in the store
 */
export type ThumbnailRefreshStatus = 'current' | 'refreshed' | 'unresolved' | 'missing';

export interface ThumbnailRefreshResult {
  status: ThumbnailRefreshStatus;
  book: Book | null;
  /** Winning remote URL when the thumbnail came from the network */
  url?: string;
}

export type CoverUpdateReason = 'refresh' | 'remote-cover' | 'user-photo' | 'user-photo-removed';

export interface CoverUpdatedEvent {
  bookId: string;
  reason: CoverUpdateReason;
  book: Book;
}

export interface CoverServiceOptions {
  store: BookStore;
  engine: CoverResolutionEngine;
  codec: ThumbnailCodec;
  userCovers: UserCoverStore;
  /** Surfaces whose longer side reaches this get the user photo or a display-quality remote cover (default: 110) */
  fullResolutionMinSide?: number;
}

const DEFAULT_FULL_RESOLUTION_MIN_SIDE = 110;

// =============================================================================
// Cover Service
// =============================================================================

export class CoverService extends EventEmitter {
  private readonly store: BookStore;
  private readonly engine: CoverResolutionEngine;
  private readonly codec: ThumbnailCodec;
  private readonly userCovers: UserCoverStore;
  private readonly fullResolutionMinSide: number;

  /** Refreshes in flight, keyed by book id */
  private readonly inFlight = new Map<string, Promise<ThumbnailRefreshResult>>();

  /** Tail of each book's queue of record mutations */
  private readonly bookChains = new Map<string, Promise<void>>();

  constructor(options: CoverServiceOptions) {
    super();
    this.store = options.store;
    this.engine = options.engine;
    this.codec = options.codec;
    this.userCovers = options.userCovers;
    this.fullResolutionMinSide = options.fullResolutionMinSide ?? DEFAULT_FULL_RESOLUTION_MIN_SIDE;
  }

  // ===========================================================================
  // Rendering
  // ===========================================================================

  /**
   * Best cover to show now for a surface of the given size.
   * Large surfaces prefer the user photo, everything else the synced
   * thumbnail. A missing or low-resolution thumbnail starts a background
   * refresh; the result of that arrives as a 'cover-updated' event.
   */
  async getRenderableCover(book: Book, size: DisplaySize): Promise<RenderableCover> {
    const { cover } = book;
    const refreshing = await this.needsThumbnailRefresh(cover);
    if (refreshing) {
      this.refreshInBackground(book);
    }

    const wantsFullResolution = this.isLargeSurface(size);
    let userPhoto: Buffer | null | undefined;

    if (wantsFullResolution && cover.userPhotoFileRef) {
      userPhoto = await this.userCovers.read(cover.userPhotoFileRef);
      if (userPhoto) {
        return { source: 'user-photo', data: userPhoto, refreshing };
      }
    }

    if (cover.syncedThumbnail && cover.syncedThumbnail.length > 0) {
      return { source: 'synced-thumbnail', data: cover.syncedThumbnail, refreshing };
    }

    // Small surface without a thumbnail yet: the photo still beats a placeholder
    if (userPhoto === undefined && cover.userPhotoFileRef) {
      userPhoto = await this.userCovers.read(cover.userPhotoFileRef);
      if (userPhoto) {
        return { source: 'user-photo', data: userPhoto, refreshing };
      }
    }

    return { source: 'placeholder', refreshing };
  }

  /**
   * Like getRenderableCover, but a large surface without a user photo waits
   * for a display-quality remote cover. The winning URL is pinned; the synced
   * thumbnail is left alone. When no candidate resolves, the immediate cover
   * is returned.
   */
  async getDisplayCover(book: Book, size: DisplaySize): Promise<RenderableCover> {
    const immediate = await this.getRenderableCover(book, size);
    if (immediate.source === 'user-photo' || !this.isLargeSurface(size)) {
      return immediate;
    }

    const resolution = await this.engine.resolveAndThumbnail(candidatePool(book.cover), null, 'display');
    if (!resolution.ok) {
      logger.debug({ bookId: book.id, attempts: resolution.attempts }, 'No display cover, using the immediate one');
      return immediate;
    }

    await this.pinDisplayUrl(book.id, resolution.url);
    return { source: 'remote-display', data: resolution.thumbnail, refreshing: immediate.refreshing };
  }

  /**
   * True when the synced thumbnail is missing or below the resolution floor.
   * Only image metadata is read.
   */
  async needsThumbnailRefresh(cover: CoverRecord): Promise<boolean> {
    if (!cover.syncedThumbnail || cover.syncedThumbnail.length === 0) return true;
    return this.codec.isLowResolution(cover.syncedThumbnail);
  }

  // ===========================================================================
  // Refresh
  // ===========================================================================

  /**
   * Make sure the book has a good synced thumbnail.
   * The user photo file is used first; otherwise remote candidates are tried,
   * with resolvedURL (when given) ahead of the stored ones. The winning URL is
   * pinned on the record.
   */
  refreshSyncedThumbnailIfNeeded(book: Book, resolvedURL?: string | null): Promise<ThumbnailRefreshResult> {
    const pending = this.inFlight.get(book.id);
    if (pending) {
      return pending;
    }

    const run = this.serialize(book.id, () => this.runRefresh(book.id, resolvedURL)).finally(() => {
      this.inFlight.delete(book.id);
    });
    this.inFlight.set(book.id, run);
    return run;
  }

  isRefreshing(bookId: string): boolean {
    return this.inFlight.has(bookId);
  }

  private refreshInBackground(book: Book): void {
    this.refreshSyncedThumbnailIfNeeded(book).catch((error: unknown) => {
      logError('cover', error, { action: 'background-refresh', bookId: book.id });
    });
  }

  private async runRefresh(bookId: string, resolvedURL: string | null | undefined): Promise<ThumbnailRefreshResult> {
    const book = await this.store.fetchById(bookId);
    if (!book) {
      return { status: 'missing', book: null };
    }

    if (!(await this.needsThumbnailRefresh(book.cover))) {
      return { status: 'current', book };
    }

    // 1) Full-resolution user photo
    if (book.cover.userPhotoFileRef) {
      const photo = await this.userCovers.read(book.cover.userPhotoFileRef);
      const thumbnail = photo ? await this.codec.makeThumbnail(photo) : null;
      if (thumbnail) {
        book.cover = { ...book.cover, syncedThumbnail: thumbnail };
        await this.persist(book);
        this.emitUpdated(book, 'refresh');
        return { status: 'refreshed', book };
      }
    }

    // 2) Remote candidates
    const resolution = await this.engine.resolveAndThumbnail(
      candidatePool(book.cover, resolvedURL),
      null,
      'thumbnail'
    );
    if (!resolution.ok) {
      logger.debug({ bookId, attempts: resolution.attempts }, 'Cover refresh found nothing usable');
      return { status: 'unresolved', book };
    }

    book.cover = {
      ...pinResolvedCoverUrl(book.cover, resolution.url),
      syncedThumbnail: resolution.thumbnail,
    };
    await this.persist(book);
    this.emitUpdated(book, 'refresh');
    return { status: 'refreshed', book, url: resolution.url };
  }

  // ===========================================================================
  // User Actions
  // ===========================================================================

  /**
   * The user chose a remote cover. Any user photo is dropped (file included),
   * the URL is pinned and the synced thumbnail regenerated from it.
   */
  async applyRemoteCover(bookId: string, url: string): Promise<Book> {
    const https = toHttps(url);
    if (!https || isLocalFileUrl(https) || !isRemoteHttpUrl(https)) {
      throw new CoverError('INVALID_URL', 'Cover URL must be an http(s) URL', { url });
    }

    return this.serialize(bookId, async () => {
      const book = await this.requireBook(bookId);
      const previousPhoto = book.cover.userPhotoFileRef;

      const resolution = await this.engine.resolveAndThumbnail([https], null, 'thumbnail');

      book.cover = {
        ...pinResolvedCoverUrl(book.cover, https),
        userPhotoFileRef: undefined,
        syncedThumbnail: resolution.ok ? resolution.thumbnail : undefined,
      };
      await this.persist(book);

      if (previousPhoto) {
        await this.userCovers.delete(previousPhoto);
      }

      logger.info({ bookId, url: https, thumbnail: resolution.ok }, 'Remote cover applied');
      this.emitUpdated(book, 'remote-cover');
      return book;
    });
  }

  /**
   * The user supplied their own photo. It is kept at full resolution as a
   * local file (replacing any earlier one) and a synced thumbnail is derived.
   */
  async applyUserPhoto(bookId: string, imageData: Buffer): Promise<Book> {
    await this.requireBook(bookId);

    const fullResolution = await this.codec.makeFullResolution(imageData);
    if (!fullResolution) {
      throw new CoverError('INVALID_IMAGE', 'Uploaded file is not a readable image');
    }
    const thumbnail = await this.codec.makeThumbnail(fullResolution);

    return this.serialize(bookId, async () => {
      const book = await this.requireBook(bookId);

      const previousPhoto = book.cover.userPhotoFileRef;
      const fileRef = await this.userCovers.save(fullResolution);

      book.cover = {
        ...book.cover,
        userPhotoFileRef: fileRef,
        syncedThumbnail: thumbnail ?? undefined,
      };

      try {
        await this.persist(book);
      } catch (error) {
        await this.userCovers.delete(fileRef);
        throw error;
      }

      if (previousPhoto) {
        await this.userCovers.delete(previousPhoto);
      }

      logger.info({ bookId, fileRef }, 'User photo applied');
      this.emitUpdated(book, 'user-photo');
      return book;
    });
  }

  /**
   * Drop the user photo. The synced thumbnail is cleared too, so the next
   * render or backfill resolves a remote cover again.
   */
  removeUserPhoto(bookId: string): Promise<Book> {
    return this.serialize(bookId, async () => {
      const book = await this.requireBook(bookId);
      const fileRef = book.cover.userPhotoFileRef;
      if (!fileRef) {
        return book;
      }

      book.cover = { ...book.cover, userPhotoFileRef: undefined, syncedThumbnail: undefined };
      await this.persist(book);
      await this.userCovers.delete(fileRef);

      this.emitUpdated(book, 'user-photo-removed');
      return book;
    });
  }

  /**
   * Delete a book together with its user photo file.
   */
  deleteBook(bookId: string): Promise<boolean> {
    return this.serialize(bookId, async () => {
      const book = await this.store.fetchById(bookId);
      if (!book) return false;

      const deleted = await this.store.delete(bookId);
      if (deleted && book.cover.userPhotoFileRef) {
        await this.userCovers.delete(book.cover.userPhotoFileRef);
      }
      return deleted;
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private isLargeSurface(size: DisplaySize): boolean {
    return Math.max(size.width, size.height) >= this.fullResolutionMinSide;
  }

  /**
   * Run a task once every earlier task queued for the same book has settled.
   */
  private serialize<T>(bookId: string, task: () => Promise<T>): Promise<T> {
    const run = (this.bookChains.get(bookId) ?? Promise.resolve()).then(task);
    const release = (): void => {
      if (this.bookChains.get(bookId) === tail) {
        this.bookChains.delete(bookId);
      }
    };
    const tail: Promise<void> = run.then(release, release);
    this.bookChains.set(bookId, tail);
    return run;
  }

  /**
   * Move a URL that produced a display cover to the front of the stored record.
   * Only the URL fields change.
   */
  private pinDisplayUrl(bookId: string, url: string): Promise<void> {
    return this.serialize(bookId, async () => {
      const book = await this.store.fetchById(bookId);
      if (!book) return;

      const pinned = pinResolvedCoverUrl(book.cover, url);
      const unchanged =
        pinned.primaryCoverURL === book.cover.primaryCoverURL &&
        pinned.candidateURLs.length === book.cover.candidateURLs.length &&
        pinned.candidateURLs.every((candidate, index) => candidate === book.cover.candidateURLs[index]);
      if (unchanged) return;

      book.cover = pinned;
      await this.persist(book);
      logger.debug({ bookId, url }, 'Display cover URL pinned');
    });
  }

  private async requireBook(bookId: string): Promise<Book> {
    const book = await this.store.fetchById(bookId);
    if (!book) {
      throw new CoverError('BOOK_NOT_FOUND', `Book not found: ${bookId}`, { bookId });
    }
    return book;
  }

  /**
   * Save with one retry. A second failure is reported to the caller.
   */
  private async persist(book: Book): Promise<void> {
    try {
      await this.store.save(book);
    } catch (error) {
      logger.warn({ bookId: book.id, error: String(error) }, 'Saving cover state failed, retrying');
      await this.store.save(book);
    }
  }

  private emitUpdated(book: Book, reason: CoverUpdateReason): void {
    const event: CoverUpdatedEvent = { bookId: book.id, reason, book: cloneBook(book) };
    this.emit('cover-updated', event);
  }
}
