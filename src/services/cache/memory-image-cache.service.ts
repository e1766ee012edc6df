/**
 * Memory Image Cache Service
 *
 * In-process tier of the cover byte cache. Entries are evicted least recently
 * used first once either the entry ceiling or the byte budget is reached.
 */

import { LRUCache } from '../lru-cache.service.js';
import type { MemoryImageCacheStats, MemoryImageCacheTier } from './cache.types.js';

// =============================================================================
// Types
// =============================================================================

export interface MemoryImageCacheOptions {
  /** Byte budget across all entries (default: 64MB) */
  maxBytes?: number;
  /** Entry ceiling (default: 300) */
  maxEntries?: number;
}

const DEFAULT_MAX_BYTES = 64 * 1024 * 1024;
const DEFAULT_MAX_ENTRIES = 300;

// =============================================================================
// Memory Image Cache
// =============================================================================

export class MemoryImageCache implements MemoryImageCacheTier {
  private readonly lru: LRUCache<Buffer>;
  private readonly maxBytes: number;
  private readonly maxEntries: number;

  constructor(options: MemoryImageCacheOptions = {}) {
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.lru = new LRUCache<Buffer>({
      maxEntries: this.maxEntries,
      maxBytes: this.maxBytes,
      sizeOf: (data) => data.length,
    });
  }

  get(url: string): Buffer | undefined {
    return this.lru.get(url);
  }

  /**
   * Store bytes for a URL. Values larger than the whole budget are skipped.
   */
  set(url: string, data: Buffer): void {
    this.lru.set(url, data);
  }

  delete(url: string): boolean {
    return this.lru.delete(url);
  }

  clear(): void {
    this.lru.clear();
  }

  getStats(): MemoryImageCacheStats {
    const stats = this.lru.getStats();
    return {
      entries: stats.entries,
      bytes: stats.bytes,
      maxEntries: this.maxEntries,
      maxBytes: this.maxBytes,
      hits: stats.hits,
      misses: stats.misses,
      evictions: stats.evictions,
      hitRate: Math.round(stats.hitRate * 10000) / 100,
    };
  }
}
