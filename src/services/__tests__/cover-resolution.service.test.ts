/**
 * Cover Resolution Engine Tests
 */

import { describe, it, expect, beforeAll, vi } from 'vitest';
import { CoverResolutionEngine, buildAttemptList } from '../cover-resolution.service.js';
import { SharpThumbnailCodec } from '../thumbnail-codec.service.js';
import type { ImageBytesSource, ImageFetchResult } from '../image-fetcher.service.js';
import { createTestImage, imageSize } from './__mocks__/images.mock.js';

const PROVIDER_1 = 'https://books.google.com/books/content?id=one&zoom=1';
const PROVIDER_1_UP = 'https://books.google.com/books/content?id=one&zoom=2';
const PROVIDER_2 = 'https://books.google.com/books/content?id=two&zoom=1';
const PROVIDER_2_UP = 'https://books.google.com/books/content?id=two&zoom=2';
const FALLBACK = 'https://covers.openlibrary.org/b/isbn/9780306406157-L.jpg?default=false';

/**
 * Byte source backed by a URL table. Unknown URLs fail with http-status 404.
 */
function createByteSource(table: Record<string, Buffer | Error>) {
  const calls: string[] = [];
  const source: ImageBytesSource = {
    fetch: vi.fn(async (url: string): Promise<ImageFetchResult> => {
      calls.push(url);
      const entry = table[url];
      if (entry instanceof Error) throw entry;
      if (!entry) return { ok: false, reason: 'http-status', status: 404 };
      return { ok: true, data: entry, source: 'network' };
    }),
  };
  return { source, calls };
}

describe('buildAttemptList', () => {
  it('tries each candidate before its upgraded form', () => {
    expect(buildAttemptList([PROVIDER_1, FALLBACK], null, 'thumbnail')).toEqual([
      PROVIDER_1,
      PROVIDER_1_UP,
      FALLBACK,
    ]);
  });

  it('uses the target zoom level', () => {
    expect(buildAttemptList([PROVIDER_1], null, 'display')).toEqual([
      PROVIDER_1,
      'https://books.google.com/books/content?id=one&zoom=3',
    ]);
  });

  it('puts the preferred URL first and removes duplicates ignoring case', () => {
    expect(
      buildAttemptList([FALLBACK, FALLBACK.toUpperCase().replace('HTTPS', 'https')], FALLBACK, 'thumbnail')
    ).toEqual([FALLBACK]);

    expect(buildAttemptList([FALLBACK], PROVIDER_2, 'thumbnail')).toEqual([
      PROVIDER_2,
      PROVIDER_2_UP,
      FALLBACK,
    ]);
  });

  it('skips local files and blank entries', () => {
    expect(buildAttemptList(['', '   ', 'file:///tmp/a.jpg', FALLBACK], undefined, 'thumbnail')).toEqual([
      FALLBACK,
    ]);
  });

  it('does not repeat an upgraded form that is already a candidate', () => {
    expect(buildAttemptList([PROVIDER_1, PROVIDER_1_UP], null, 'thumbnail')).toEqual([
      PROVIDER_1,
      PROVIDER_1_UP,
    ]);
  });
});

describe('CoverResolutionEngine', () => {
  const codec = new SharpThumbnailCodec();
  let realCover: Buffer;
  let placeholder: Buffer;

  beforeAll(async () => {
    realCover = await createTestImage(800, 1200);
    placeholder = await createTestImage(1, 1, { format: 'png' });
  });

  it('keeps the original URL when the upgraded one is a placeholder', async () => {
    const { source, calls } = createByteSource({
      [PROVIDER_1]: realCover,
      [PROVIDER_1_UP]: placeholder,
    });
    const engine = new CoverResolutionEngine({ fetcher: source, codec });

    const result = await engine.resolveAndThumbnail([PROVIDER_1], null, 'thumbnail');

    expect(result.ok).toBe(true);
    expect(result.ok && result.url).toBe(PROVIDER_1);
    expect(calls).toEqual([PROVIDER_1]);
  });

  it('moves past a placeholder to the next candidate', async () => {
    const { source, calls } = createByteSource({
      [PROVIDER_1_UP]: placeholder,
      [FALLBACK]: realCover,
    });
    const engine = new CoverResolutionEngine({ fetcher: source, codec });

    const result = await engine.resolveAndThumbnail([PROVIDER_1, FALLBACK], null, 'thumbnail');

    expect(result.ok && result.url).toBe(FALLBACK);
    expect(result.attempts).toBe(3);
    expect(calls).toEqual([PROVIDER_1, PROVIDER_1_UP, FALLBACK]);
  });

  it('downscales the winner to the thumbnail bound', async () => {
    const { source } = createByteSource({ [FALLBACK]: realCover });
    const engine = new CoverResolutionEngine({ fetcher: source, codec });

    const result = await engine.resolveAndThumbnail([FALLBACK], null, 'thumbnail');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(await imageSize(result.thumbnail)).toEqual({ width: 400, height: 600, format: 'jpeg' });
    }
  });

  it('uses the per-target bound for display covers', async () => {
    const { source } = createByteSource({ [FALLBACK]: realCover });
    const engine = new CoverResolutionEngine({
      fetcher: source,
      codec,
      maxPixelByTarget: { thumbnail: 600, display: 300 },
    });

    const result = await engine.resolveAndThumbnail([FALLBACK], null, 'display');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(await imageSize(result.thumbnail)).toEqual({ width: 200, height: 300, format: 'jpeg' });
    }
  });

  it('tries every attempt exactly once when all fail', async () => {
    const { source, calls } = createByteSource({});
    const engine = new CoverResolutionEngine({ fetcher: source, codec });

    const result = await engine.resolveAndThumbnail([PROVIDER_1, PROVIDER_2, FALLBACK], null, 'thumbnail');

    expect(result).toEqual({ ok: false, attempts: 5 });
    expect(calls).toEqual([PROVIDER_1, PROVIDER_1_UP, PROVIDER_2, PROVIDER_2_UP, FALLBACK]);
  });

  it('counts an unexpected collaborator error as a failed attempt', async () => {
    const { source } = createByteSource({
      [PROVIDER_1]: new Error('socket hang up'),
      [PROVIDER_1_UP]: realCover,
    });
    const engine = new CoverResolutionEngine({ fetcher: source, codec });

    const result = await engine.resolveAndThumbnail([PROVIDER_1], null, 'thumbnail');

    expect(result.ok && result.url).toBe(PROVIDER_1_UP);
    expect(result.attempts).toBe(2);
  });

  it('fails without fetching when there are no candidates', async () => {
    const { source, calls } = createByteSource({});
    const engine = new CoverResolutionEngine({ fetcher: source, codec });

    expect(await engine.resolveAndThumbnail([], null, 'thumbnail')).toEqual({ ok: false, attempts: 0 });
    expect(calls).toEqual([]);
  });
});
