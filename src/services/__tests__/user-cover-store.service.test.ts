/**
 * User Cover Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { UserCoverStore } from '../user-cover-store.service.js';

describe('UserCoverStore', () => {
  let directory: string;
  let store: UserCoverStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'user-covers-test-'));
    store = new UserCoverStore({ directory: join(directory, 'user-covers') });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('saves under a generated .jpg name and reads it back', async () => {
    const bytes = Buffer.from([0xff, 0xd8, 0xff, 0xd9]);

    const fileRef = await store.save(bytes);

    expect(fileRef).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\.jpg$/);
    expect(await store.read(fileRef)).toEqual(bytes);
    expect(await readdir(store.path)).toEqual([fileRef]);
  });

  it('never resolves outside its directory', () => {
    expect(store.filePath('../../etc/passwd')).toBe(join(directory, 'user-covers', 'passwd'));
    expect(store.filePath('nested/dir/a.jpg')).toBe(join(directory, 'user-covers', 'a.jpg'));
  });

  it('reads missing files as null', async () => {
    expect(await store.read('missing.jpg')).toBeNull();
  });

  it('deletes files and ignores ones already gone', async () => {
    const fileRef = await store.save(Buffer.from([1, 2, 3]));

    await store.delete(fileRef);
    await store.delete(fileRef);

    expect(await readdir(store.path)).toEqual([]);
  });
});
