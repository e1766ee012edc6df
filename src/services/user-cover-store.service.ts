/**
 * User Cover Store
 *
 * Full-resolution photos the user picked for a book, kept under the
 * app-private user covers directory as <uuid>.jpg. Records reference them by
 * file name only, so the directory can move with the app data root.
 */

import { randomUUID } from 'crypto';
import { mkdir, readFile, unlink, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { coverLogger as logger } from './logger.service.js';

export interface UserCoverStoreOptions {
  directory: string;
}

export class UserCoverStore {
  private readonly directory: string;

  constructor(options: UserCoverStoreOptions) {
    this.directory = options.directory;
  }

  get path(): string {
    return this.directory;
  }

  /**
   * Absolute path for a stored file name. Directory parts in the reference are ignored.
   */
  filePath(fileRef: string): string {
    return join(this.directory, basename(fileRef));
  }

  /**
   * Write JPEG bytes under a new generated name and return that name.
   */
  async save(jpeg: Buffer): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const fileRef = `${randomUUID()}.jpg`;
    await writeFile(this.filePath(fileRef), jpeg);
    return fileRef;
  }

  /**
   * Bytes of a stored photo, or null when the file is missing or unreadable.
   */
  async read(fileRef: string): Promise<Buffer | null> {
    try {
      return await readFile(this.filePath(fileRef));
    } catch (error) {
      logger.debug({ fileRef, error: String(error) }, 'User cover file unreadable');
      return null;
    }
  }

  /**
   * Remove a stored photo. A file that is already gone counts as removed.
   */
  async delete(fileRef: string): Promise<void> {
    try {
      await unlink(this.filePath(fileRef));
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return;
      }
      logger.warn({ fileRef, error: String(error) }, 'Could not delete user cover file');
    }
  }
}
