/**
 * Cover Backfill Job
 *
 * One pass over the library that gives every book a usable synced thumbnail.
 * Books whose thumbnail is already good are skipped after a metadata-only
 * check, so running the job again over a healthy library fetches nothing.
 *
 * Features:
 * - Throttled: pauses between batches (default 6 books, 120ms)
 * - Cancellable between batches (cancel(), AbortSignal or shouldCancel)
 * - One run at a time; a second request joins the running pass
 * - Progress events for live status
 */

import { EventEmitter } from 'events';
import { setTimeout as sleep } from 'timers/promises';
import type { Book } from '../types/cover.types.js';
import { backfillLogger as logger, logError } from './logger.service.js';
import type { BookStore } from './book-store.service.js';
import type { CoverService } from './cover.service.js';

// =============================================================================
// Types
// =============================================================================

export type BackfillStatus = 'idle' | 'running' | 'complete' | 'cancelled' | 'failed';

export interface BackfillResult {
  /** Books in the library (or in the list passed in) */
  total: number;
  /** Books whose thumbnail was missing or low resolution */
  eligible: number;
  /** Eligible books that were attempted before the run ended */
  processed: number;
  refreshed: number;
  failed: number;
  /** Books left alone because their thumbnail was already good */
  skipped: number;
  cancelled: boolean;
  durationMs: number;
}

export interface BackfillProgress {
  bookId: string;
  processed: number;
  eligible: number;
  refreshed: number;
  failed: number;
}

export interface BackfillRunOptions {
  /** Books to consider instead of the whole store */
  books?: Book[];
  shouldCancel?: () => boolean;
  signal?: AbortSignal;
}

export interface BackfillState {
  status: BackfillStatus;
  startedAt: Date | null;
  finishedAt: Date | null;
  progress: BackfillProgress | null;
  lastResult: BackfillResult | null;
  error: string | null;
}

export interface CoverBackfillJobOptions {
  store: BookStore;
  covers: CoverService;
  /** Books processed between pauses (default: 6) */
  batchSize?: number;
  /** Pause between batches (default: 120ms) */
  batchDelayMs?: number;
}

const DEFAULT_BATCH_SIZE = 6;
const DEFAULT_BATCH_DELAY_MS = 120;

// =============================================================================
// Job
// =============================================================================

export class CoverBackfillJob extends EventEmitter {
  private readonly store: BookStore;
  private readonly covers: CoverService;
  private readonly batchSize: number;
  private readonly batchDelayMs: number;

  private running: Promise<BackfillResult> | null = null;
  private cancelRequested = false;
  private state: BackfillState = {
    status: 'idle',
    startedAt: null,
    finishedAt: null,
    progress: null,
    lastResult: null,
    error: null,
  };

  constructor(options: CoverBackfillJobOptions) {
    super();
    this.store = options.store;
    this.covers = options.covers;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.batchDelayMs = Math.max(0, options.batchDelayMs ?? DEFAULT_BATCH_DELAY_MS);
  }

  /**
   * Run one backfill pass. While a pass is running, further calls return it.
   */
  runOnce(options: BackfillRunOptions = {}): Promise<BackfillResult> {
    if (this.running) {
      return this.running;
    }

    this.cancelRequested = false;
    this.state = {
      ...this.state,
      status: 'running',
      startedAt: new Date(),
      finishedAt: null,
      progress: null,
      error: null,
    };

    const run = this.execute(options).finally(() => {
      this.running = null;
    });
    this.running = run;
    return run;
  }

  /**
   * Ask the running pass to stop before its next batch.
   * Returns false when nothing is running.
   */
  cancel(): boolean {
    if (!this.running) return false;
    this.cancelRequested = true;
    logger.info('Cover backfill cancellation requested');
    return true;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  getState(): BackfillState {
    return { ...this.state };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async execute(options: BackfillRunOptions): Promise<BackfillResult> {
    const startTime = Date.now();
    const isCancelled = (): boolean =>
      this.cancelRequested || options.signal?.aborted === true || options.shouldCancel?.() === true;

    try {
      const books = options.books ?? (await this.store.fetchAll());

      const eligible: Book[] = [];
      for (const book of books) {
        if (await this.covers.needsThumbnailRefresh(book.cover)) {
          eligible.push(book);
        }
      }

      const result: BackfillResult = {
        total: books.length,
        eligible: eligible.length,
        processed: 0,
        refreshed: 0,
        failed: 0,
        skipped: books.length - eligible.length,
        cancelled: false,
        durationMs: 0,
      };

      logger.info(
        { total: result.total, eligible: result.eligible },
        `Starting cover backfill for ${result.eligible} of ${result.total} books`
      );

      for (let start = 0; start < eligible.length; start += this.batchSize) {
        if (isCancelled()) {
          result.cancelled = true;
          break;
        }

        if (start > 0 && this.batchDelayMs > 0) {
          await sleep(this.batchDelayMs);
          if (isCancelled()) {
            result.cancelled = true;
            break;
          }
        }

        for (const book of eligible.slice(start, start + this.batchSize)) {
          await this.processBook(book, result);
        }
      }

      result.durationMs = Date.now() - startTime;
      this.finish(result.cancelled ? 'cancelled' : 'complete', result, null);

      logger.info(
        { ...result },
        result.cancelled ? 'Cover backfill cancelled' : 'Cover backfill complete'
      );
      return result;
    } catch (error) {
      logError('cover-backfill', error, { action: 'run' });
      this.finish('failed', null, error instanceof Error ? error.message : String(error));
      throw error;
    }
  }

  private async processBook(book: Book, result: BackfillResult): Promise<void> {
    try {
      const outcome = await this.covers.refreshSyncedThumbnailIfNeeded(book);
      if (outcome.status === 'refreshed') {
        result.refreshed++;
      } else if (outcome.status === 'unresolved') {
        result.failed++;
      } else {
        // Fixed or removed since the eligibility check
        result.skipped++;
      }
    } catch (error) {
      result.failed++;
      logError('cover-backfill', error, { action: 'refresh', bookId: book.id });
    }

    result.processed++;
    const progress: BackfillProgress = {
      bookId: book.id,
      processed: result.processed,
      eligible: result.eligible,
      refreshed: result.refreshed,
      failed: result.failed,
    };
    this.state = { ...this.state, progress };
    this.emit('progress', progress);
  }

  private finish(status: BackfillStatus, result: BackfillResult | null, error: string | null): void {
    this.state = {
      ...this.state,
      status,
      finishedAt: new Date(),
      lastResult: result ?? this.state.lastResult,
      error,
    };
    this.emit(status, result);
  }
}
