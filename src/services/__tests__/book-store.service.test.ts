/**
 * Book Store Service Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonFileBookStore } from '../book-store.service.js';
import { createTestBook } from './__mocks__/book-store.mock.js';

describe('JsonFileBookStore', () => {
  let directory: string;
  let filePath: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'book-store-test-'));
    filePath = join(directory, 'library.json');
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('starts empty when the library file does not exist', async () => {
    const store = new JsonFileBookStore({ filePath });

    expect(await store.fetchAll()).toEqual([]);
    expect(await store.fetchById('b1')).toBeNull();
  });

  it('round-trips books through the file', async () => {
    const thumbnail = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x01, 0x02]);
    const book = createTestBook('b1', {
      primaryCoverURL: 'https://images.example.com/b1.jpg',
      candidateURLs: ['https://images.example.com/b1.jpg', 'https://images.example.com/alt.jpg'],
      userPhotoFileRef: 'photo.jpg',
      syncedThumbnail: thumbnail,
    });
    await new JsonFileBookStore({ filePath }).save({ ...book, isbn13: '9780306406157' });

    const reloaded = await new JsonFileBookStore({ filePath }).fetchById('b1');

    expect(reloaded).toEqual({ ...book, isbn13: '9780306406157' });
    expect(reloaded?.createdAt).toBeInstanceOf(Date);

    const stored = JSON.parse(await readFile(filePath, 'utf-8'));
    expect(stored.version).toBe(1);
    expect(stored.books[0].cover.syncedThumbnail).toBe(thumbnail.toString('base64'));
    expect(stored.books[0].createdAt).toBe('2024-01-15T10:00:00.000Z');
  });

  it('returns copies that do not change the store until saved', async () => {
    const store = new JsonFileBookStore({ filePath });
    await store.save(createTestBook('b1', { candidateURLs: ['https://images.example.com/a.jpg'] }));

    const copy = await store.fetchById('b1');
    copy?.cover.candidateURLs.push('https://images.example.com/b.jpg');

    expect((await store.fetchById('b1'))?.cover.candidateURLs).toEqual(['https://images.example.com/a.jpg']);
  });

  it('filters with fetchWhere', async () => {
    const store = new JsonFileBookStore({ filePath });
    await store.save(createTestBook('b1'));
    await store.save(createTestBook('b2', { userPhotoFileRef: 'photo.jpg' }));

    const withPhoto = await store.fetchWhere((book) => Boolean(book.cover.userPhotoFileRef));

    expect(withPhoto.map((book) => book.id)).toEqual(['b2']);
  });

  it('deletes books', async () => {
    const store = new JsonFileBookStore({ filePath });
    await store.save(createTestBook('b1'));

    expect(await store.delete('b1')).toBe(true);
    expect(await store.delete('b1')).toBe(false);
    expect(await new JsonFileBookStore({ filePath }).fetchAll()).toEqual([]);
  });

  it('keeps fields it does not understand', async () => {
    await writeFile(
      filePath,
      JSON.stringify({
        version: 1,
        books: [
          {
            id: 'b1',
            title: 'Kept',
            createdAt: '2024-02-01T00:00:00.000Z',
            shelf: 'favourites',
            rating: 5,
            cover: { candidateURLs: [] },
          },
        ],
      }),
      'utf-8'
    );
    const store = new JsonFileBookStore({ filePath });
    const book = await store.fetchById('b1');
    expect(book?.author).toBe('');

    await store.save({ ...createTestBook('b1'), title: 'Kept' });

    const stored = JSON.parse(await readFile(filePath, 'utf-8'));
    expect(stored.books[0]).toMatchObject({ id: 'b1', title: 'Kept', shelf: 'favourites', rating: 5 });
  });

  it('serializes concurrent writes and leaves no temp files', async () => {
    const store = new JsonFileBookStore({ filePath });

    await Promise.all(['b1', 'b2', 'b3', 'b4'].map((id) => store.save(createTestBook(id))));

    const reloaded = await new JsonFileBookStore({ filePath }).fetchAll();
    expect(reloaded.map((book) => book.id).sort()).toEqual(['b1', 'b2', 'b3', 'b4']);
    expect(await readdir(directory)).toEqual(['library.json']);
  });

  it('fails with STORAGE_FAILED for a corrupt file', async () => {
    await writeFile(filePath, '{"version":1,"books":[', 'utf-8');

    await expect(new JsonFileBookStore({ filePath }).fetchAll()).rejects.toMatchObject({
      code: 'STORAGE_FAILED',
    });
  });

  it('fails with STORAGE_FAILED for an unexpected shape', async () => {
    await writeFile(filePath, JSON.stringify({ version: 1, books: [{ title: 'no id' }] }), 'utf-8');

    await expect(new JsonFileBookStore({ filePath }).fetchAll()).rejects.toMatchObject({
      code: 'STORAGE_FAILED',
      details: { issues: expect.any(Array) },
    });
  });
});
