/**
 * Image Cache Types
 *
 * Contracts for the two URL-keyed image byte tiers the fetcher consults
 * before the network. Keys are the exact URL string that was fetched.
 * Writes replace the whole entry; readers never observe a partial value.
 */

/**
 * Fastest tier. Volatile, process lifetime, synchronous.
 */
export interface MemoryImageCacheTier {
  get(url: string): Buffer | undefined;
  set(url: string, data: Buffer): void;
  delete(url: string): boolean;
  clear(): void;
}

/**
 * Persistent tier. Survives restarts.
 */
export interface DiskImageCacheTier {
  get(url: string): Promise<Buffer | null>;
  set(url: string, data: Buffer): Promise<void>;
  delete(url: string): Promise<boolean>;
  clear(): Promise<void>;
}

export interface MemoryImageCacheStats {
  entries: number;
  bytes: number;
  maxEntries: number;
  maxBytes: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

export interface DiskImageCacheSummary {
  files: number;
  bytes: number;
}
