/**
 * Disk Image Cache Service
 *
 * Persistent tier of the cover byte cache. Each URL maps to one file named
 * {sha256(url)}.{ext} inside the cache directory, where ext comes from the URL
 * path ("img" when it has none).
 *
 * Writes go to a temporary file first and are renamed into place, so a reader
 * either sees the previous entry or the complete new one.
 */

import { createHash, randomUUID } from 'crypto';
import { mkdir, readFile, readdir, rename, rm, stat, unlink, writeFile } from 'fs/promises';
import { extname, join } from 'path';
import { cacheLogger as logger } from '../logger.service.js';
import type { DiskImageCacheSummary, DiskImageCacheTier } from './cache.types.js';

// =============================================================================
// Types
// =============================================================================

export interface DiskImageCacheOptions {
  directory: string;
}

export interface DiskCacheTrimResult {
  deleted: number;
  freedBytes: number;
}

const TEMP_SUFFIX = '.tmp';

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

// =============================================================================
// Key Helpers
// =============================================================================

/**
 * File extension for a cache entry, taken from the URL path.
 */
export function cacheFileExtension(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return 'img';
  }
  const ext = extname(pathname).slice(1).toLowerCase();
  return /^[a-z0-9]{1,5}$/.test(ext) ? ext : 'img';
}

/**
 * Cache file name for a URL.
 */
export function cacheFileName(url: string): string {
  const key = createHash('sha256').update(url).digest('hex');
  return `${key}.${cacheFileExtension(url)}`;
}

// =============================================================================
// Disk Image Cache
// =============================================================================

export class DiskImageCache implements DiskImageCacheTier {
  private readonly directory: string;
  private directoryReady: Promise<void> | null = null;

  constructor(options: DiskImageCacheOptions) {
    this.directory = options.directory;
  }

  get path(): string {
    return this.directory;
  }

  /**
   * Path of the cache file for a URL.
   */
  filePathFor(url: string): string {
    return join(this.directory, cacheFileName(url));
  }

  async get(url: string): Promise<Buffer | null> {
    try {
      return await readFile(this.filePathFor(url));
    } catch (error) {
      if (!isMissingFileError(error)) {
        logger.debug({ url, error: String(error) }, 'Disk cache read failed');
      }
      return null;
    }
  }

  async set(url: string, data: Buffer): Promise<void> {
    await this.ensureDirectory();
    const target = this.filePathFor(url);
    const temp = `${target}.${randomUUID()}${TEMP_SUFFIX}`;

    try {
      await writeFile(temp, data);
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }

  async delete(url: string): Promise<boolean> {
    try {
      await unlink(this.filePathFor(url));
      return true;
    } catch (error) {
      if (isMissingFileError(error)) return false;
      throw error;
    }
  }

  /**
   * Remove every cached file and recreate the directory.
   */
  async clear(): Promise<void> {
    await rm(this.directory, { recursive: true, force: true });
    this.directoryReady = null;
    await this.ensureDirectory();
  }

  async getSummary(): Promise<DiskImageCacheSummary> {
    const entries = await this.listEntries();
    return {
      files: entries.length,
      bytes: entries.reduce((sum, entry) => sum + entry.size, 0),
    };
  }

  /**
   * Delete the oldest entries until the cache fits in maxBytes.
   */
  async enforceSizeLimit(maxBytes: number): Promise<DiskCacheTrimResult> {
    const entries = await this.listEntries();
    const currentSize = entries.reduce((sum, entry) => sum + entry.size, 0);

    if (currentSize <= maxBytes) {
      return { deleted: 0, freedBytes: 0 };
    }

    // Oldest first
    entries.sort((a, b) => a.mtimeMs - b.mtimeMs);

    const targetToFree = currentSize - maxBytes;
    let deleted = 0;
    let freedBytes = 0;

    for (const entry of entries) {
      if (freedBytes >= targetToFree) break;
      try {
        await unlink(entry.path);
        deleted++;
        freedBytes += entry.size;
      } catch (error) {
        logger.debug({ path: entry.path, error: String(error) }, 'Could not trim disk cache entry');
      }
    }

    logger.info({ deleted, freedBytes, maxBytes }, 'Disk cache trimmed');
    return { deleted, freedBytes };
  }

  private ensureDirectory(): Promise<void> {
    if (!this.directoryReady) {
      this.directoryReady = mkdir(this.directory, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.directoryReady = null;
          throw error;
        }
      );
    }
    return this.directoryReady;
  }

  private async listEntries(): Promise<Array<{ path: string; size: number; mtimeMs: number }>> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isMissingFileError(error)) return [];
      throw error;
    }

    const entries: Array<{ path: string; size: number; mtimeMs: number }> = [];
    for (const name of names) {
      if (name.endsWith(TEMP_SUFFIX)) continue;
      const path = join(this.directory, name);
      try {
        const fileStat = await stat(path);
        if (fileStat.isFile()) {
          entries.push({ path, size: fileStat.size, mtimeMs: fileStat.mtimeMs });
        }
      } catch {
        // Removed between readdir and stat
      }
    }
    return entries;
  }
}
