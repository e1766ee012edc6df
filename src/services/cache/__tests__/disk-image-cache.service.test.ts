/**
 * Disk Image Cache Tests
 *
 * Runs against a real temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, utimes, writeFile } from 'fs/promises';
import { createHash } from 'crypto';
import { tmpdir } from 'os';
import { join } from 'path';
import { DiskImageCache, cacheFileExtension, cacheFileName } from '../disk-image-cache.service.js';

describe('DiskImageCache', () => {
  let directory: string;
  let cache: DiskImageCache;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'disk-cache-test-'));
    cache = new DiskImageCache({ directory: join(directory, 'covers') });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  describe('key helpers', () => {
    it('takes the extension from the URL path', () => {
      expect(cacheFileExtension('https://covers.example.org/b/isbn/123-L.jpg?default=false')).toBe('jpg');
      expect(cacheFileExtension('https://example.com/cover.PNG')).toBe('png');
    });

    it('falls back to img when the path has no usable extension', () => {
      expect(cacheFileExtension('https://books.example.com/books/content?id=abc&zoom=1')).toBe('img');
      expect(cacheFileExtension('not a url')).toBe('img');
      expect(cacheFileExtension('https://example.com/file.averyverylongext')).toBe('img');
    });

    it('names files by the SHA-256 of the URL', () => {
      const url = 'https://example.com/a.jpg';
      const hash = createHash('sha256').update(url).digest('hex');
      expect(cacheFileName(url)).toBe(`${hash}.jpg`);
    });
  });

  it('returns null for a URL that was never stored', async () => {
    expect(await cache.get('https://example.com/missing.jpg')).toBeNull();
  });

  it('stores and reads back bytes, creating the directory on demand', async () => {
    const data = Buffer.from('image-bytes');
    await cache.set('https://example.com/a.jpg', data);

    expect(await cache.get('https://example.com/a.jpg')).toEqual(data);
    expect(await readdir(cache.path)).toEqual([cacheFileName('https://example.com/a.jpg')]);
  });

  it('replaces an entry and leaves no temporary files behind', async () => {
    const url = 'https://example.com/a.jpg';
    await cache.set(url, Buffer.from('first'));
    await cache.set(url, Buffer.from('second'));

    expect((await cache.get(url))?.toString()).toBe('second');
    expect(await readdir(cache.path)).toHaveLength(1);
  });

  it('keeps the last write when writers race', async () => {
    const url = 'https://example.com/race.jpg';
    await Promise.all([
      cache.set(url, Buffer.from('one')),
      cache.set(url, Buffer.from('two')),
      cache.set(url, Buffer.from('three')),
    ]);

    const stored = (await cache.get(url))?.toString();
    expect(['one', 'two', 'three']).toContain(stored);
    expect(await readdir(cache.path)).toHaveLength(1);
  });

  it('deletes entries', async () => {
    await cache.set('https://example.com/a.jpg', Buffer.from('x'));

    expect(await cache.delete('https://example.com/a.jpg')).toBe(true);
    expect(await cache.delete('https://example.com/a.jpg')).toBe(false);
    expect(await cache.get('https://example.com/a.jpg')).toBeNull();
  });

  it('clears every entry', async () => {
    await cache.set('https://example.com/a.jpg', Buffer.from('a'));
    await cache.set('https://example.com/b.jpg', Buffer.from('b'));
    await cache.clear();

    expect(await cache.getSummary()).toEqual({ files: 0, bytes: 0 });
    await cache.set('https://example.com/c.jpg', Buffer.from('c'));
    expect(await cache.getSummary()).toEqual({ files: 1, bytes: 1 });
  });

  it('ignores leftover temporary files in the summary', async () => {
    await cache.set('https://example.com/a.jpg', Buffer.from('abc'));
    await writeFile(join(cache.path, 'partial.jpg.1234.tmp'), Buffer.from('zzzz'));

    expect(await cache.getSummary()).toEqual({ files: 1, bytes: 3 });
  });

  it('trims oldest entries first to fit the size limit', async () => {
    const urls = ['https://example.com/1.jpg', 'https://example.com/2.jpg', 'https://example.com/3.jpg'];
    for (const [index, url] of urls.entries()) {
      await cache.set(url, Buffer.alloc(10));
      const time = new Date(Date.UTC(2024, 0, 1 + index));
      await utimes(cache.filePathFor(url), time, time);
    }

    const result = await cache.enforceSizeLimit(20);

    expect(result).toEqual({ deleted: 1, freedBytes: 10 });
    expect(await cache.get(urls[0] ?? '')).toBeNull();
    expect(await cache.get(urls[2] ?? '')).not.toBeNull();
  });

  it('does nothing when already under the limit', async () => {
    await cache.set('https://example.com/a.jpg', Buffer.alloc(5));
    expect(await cache.enforceSizeLimit(100)).toEqual({ deleted: 0, freedBytes: 0 });
  });
});
