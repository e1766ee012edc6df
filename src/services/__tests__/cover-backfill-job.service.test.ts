/**
 * Cover Backfill Job Tests
 *
 * Runs the job over a fully wired pipeline: temp directories, an in-memory
 * book store and a fake network.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createCoverPipeline } from '../cover-pipeline.service.js';
import type { CoverPipeline } from '../cover-pipeline.service.js';
import { CoverBackfillJob } from '../cover-backfill-job.service.js';
import type { BackfillProgress, BackfillResult } from '../cover-backfill-job.service.js';
import { DEFAULT_CONFIG } from '../config.service.js';
import type { Book } from '../../types/cover.types.js';
import { createMockNetwork } from './__mocks__/network.mock.js';
import type { MockNetwork } from './__mocks__/network.mock.js';
import { InMemoryBookStore, createTestBook } from './__mocks__/book-store.mock.js';
import { createTestImage } from './__mocks__/images.mock.js';

const coverUrl = (id: string) => `https://images.example.com/${id}.jpg`;

describe('CoverBackfillJob', () => {
  let directory: string;
  let network: MockNetwork;
  let store: InMemoryBookStore;
  let pipeline: CoverPipeline;

  let cover: Buffer;
  let goodThumbnail: Buffer;

  beforeAll(async () => {
    cover = await createTestImage(600, 900);
    goodThumbnail = await createTestImage(400, 600);
  });

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'cover-backfill-test-'));
    network = createMockNetwork();
    store = new InMemoryBookStore();
    pipeline = createCoverPipeline({
      config: { ...DEFAULT_CONFIG, backfill: { ...DEFAULT_CONFIG.backfill, batchDelayMs: 0 } },
      store,
      fetch: network.fetch,
      coverCacheDir: join(directory, 'cover-cache'),
      userCoversDir: join(directory, 'user-covers'),
    });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  /** Book without a thumbnail whose only candidate serves a real cover */
  async function addResolvableBook(id: string): Promise<Book> {
    network.route(coverUrl(id), { body: cover });
    const book = createTestBook(id, { candidateURLs: [coverUrl(id)] });
    await store.save(book);
    return book;
  }

  describe('runOnce', () => {
    it('refreshes eligible books and skips good ones', async () => {
      await addResolvableBook('b1');
      await store.save(createTestBook('b2', { syncedThumbnail: goodThumbnail, candidateURLs: [coverUrl('b2')] }));
      await store.save(createTestBook('b3', { candidateURLs: [coverUrl('b3')] }));

      const result = await pipeline.backfill.runOnce();

      expect(result).toMatchObject({
        total: 3,
        eligible: 2,
        processed: 2,
        refreshed: 1,
        failed: 1,
        skipped: 1,
        cancelled: false,
      });
      expect(store.peek('b1')?.cover.syncedThumbnail).toBeDefined();
      expect(store.peek('b3')?.cover.syncedThumbnail).toBeUndefined();
      expect(network.count(coverUrl('b2'))).toBe(0);
    });

    it('fetches nothing when run again over a healthy library', async () => {
      await addResolvableBook('b1');
      await addResolvableBook('b2');

      const first = await pipeline.backfill.runOnce();
      const requestsAfterFirst = network.calls.length;
      const second = await pipeline.backfill.runOnce();

      expect(first.refreshed).toBe(2);
      expect(requestsAfterFirst).toBe(2);
      expect(second).toMatchObject({ total: 2, eligible: 0, processed: 0, refreshed: 0, skipped: 2 });
      expect(network.calls).toHaveLength(2);
    });

    it('considers only the books passed in', async () => {
      const b1 = await addResolvableBook('b1');
      await addResolvableBook('b2');

      const result = await pipeline.backfill.runOnce({ books: [b1] });

      expect(result).toMatchObject({ total: 1, refreshed: 1 });
      expect(network.count(coverUrl('b2'))).toBe(0);
    });

    it('joins the running pass instead of starting another', async () => {
      await addResolvableBook('b1');

      const first = pipeline.backfill.runOnce();
      const second = pipeline.backfill.runOnce();

      expect(second).toBe(first);
      expect(pipeline.backfill.isRunning).toBe(true);
      await first;
      expect(pipeline.backfill.isRunning).toBe(false);
      expect(network.count(coverUrl('b1'))).toBe(1);
    });

    it('emits progress for every processed book and completes', async () => {
      await addResolvableBook('b1');
      await addResolvableBook('b2');
      const progress: BackfillProgress[] = [];
      const completed: BackfillResult[] = [];
      pipeline.backfill.on('progress', (event: BackfillProgress) => progress.push(event));
      pipeline.backfill.on('complete', (result: BackfillResult) => completed.push(result));

      const result = await pipeline.backfill.runOnce();

      expect(progress).toEqual([
        { bookId: 'b1', processed: 1, eligible: 2, refreshed: 1, failed: 0 },
        { bookId: 'b2', processed: 2, eligible: 2, refreshed: 2, failed: 0 },
      ]);
      expect(completed).toEqual([result]);
      expect(pipeline.backfill.getState()).toMatchObject({
        status: 'complete',
        lastResult: result,
        error: null,
      });
    });

    it('counts a thrown refresh as a failure and keeps going', async () => {
      await addResolvableBook('b1');
      await addResolvableBook('b2');
      const refresh = pipeline.covers.refreshSyncedThumbnailIfNeeded.bind(pipeline.covers);
      vi.spyOn(pipeline.covers, 'refreshSyncedThumbnailIfNeeded').mockImplementation((book) =>
        book.id === 'b1' ? Promise.reject(new Error('boom')) : refresh(book)
      );

      const result = await pipeline.backfill.runOnce();

      expect(result).toMatchObject({ processed: 2, refreshed: 1, failed: 1 });
    });

    it('reports a failed pass when the library cannot be read', async () => {
      vi.spyOn(store, 'fetchAll').mockRejectedValue(new Error('store offline'));

      await expect(pipeline.backfill.runOnce()).rejects.toThrow('store offline');
      expect(pipeline.backfill.getState()).toMatchObject({ status: 'failed', error: 'store offline' });
      expect(pipeline.backfill.isRunning).toBe(false);
    });
  });

  describe('cancellation', () => {
    it('stops before the next batch after cancel()', async () => {
      for (const id of ['b1', 'b2', 'b3', 'b4', 'b5']) {
        await addResolvableBook(id);
      }
      const job = new CoverBackfillJob({ store, covers: pipeline.covers, batchSize: 2, batchDelayMs: 0 });
      const cancelled: BackfillResult[] = [];
      job.on('cancelled', (result: BackfillResult) => cancelled.push(result));
      job.once('progress', () => {
        expect(job.cancel()).toBe(true);
      });

      const result = await job.runOnce();

      // The first batch finishes; nothing after it starts
      expect(result).toMatchObject({ eligible: 5, processed: 2, refreshed: 2, cancelled: true });
      expect(network.calls).toEqual([coverUrl('b1'), coverUrl('b2')]);
      expect(job.getState().status).toBe('cancelled');
      expect(cancelled).toEqual([result]);
    });

    it('honours an aborted signal and a shouldCancel callback', async () => {
      await addResolvableBook('b1');
      const controller = new AbortController();
      controller.abort();

      const aborted = await pipeline.backfill.runOnce({ signal: controller.signal });
      const refused = await pipeline.backfill.runOnce({ shouldCancel: () => true });

      expect(aborted).toMatchObject({ eligible: 1, processed: 0, cancelled: true });
      expect(refused).toMatchObject({ eligible: 1, processed: 0, cancelled: true });
      expect(network.calls).toEqual([]);
    });

    it('returns false when nothing is running', () => {
      expect(pipeline.backfill.cancel()).toBe(false);
    });

    it('starts fresh after a cancelled pass', async () => {
      await addResolvableBook('b1');
      await pipeline.backfill.runOnce({ shouldCancel: () => true });

      const result = await pipeline.backfill.runOnce();

      expect(result).toMatchObject({ processed: 1, refreshed: 1, cancelled: false });
    });
  });

  describe('throttling', () => {
    it('pauses between batches', async () => {
      for (const id of ['b1', 'b2', 'b3']) {
        await addResolvableBook(id);
      }
      const job = new CoverBackfillJob({ store, covers: pipeline.covers, batchSize: 1, batchDelayMs: 40 });

      const result = await job.runOnce();

      expect(result.processed).toBe(3);
      expect(result.durationMs).toBeGreaterThanOrEqual(70);
    });
  });
});
