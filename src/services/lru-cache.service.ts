/**
 * LRU Cache Service
 *
 * Generic least-recently-used map bounded two ways: an entry ceiling and an
 * optional budget over the sizes reported by `sizeOf`. Inserting past either
 * bound evicts from the cold end until the new value fits.
 */

// =============================================================================
// Types
// =============================================================================

export interface LRUCacheOptions<T> {
  /** Entry ceiling (default: 100) */
  maxEntries?: number;
  /** Budget over sizeOf(value) across all entries (unbounded if not set) */
  maxBytes?: number;
  /** Size of a value, counted against maxBytes (default: 0) */
  sizeOf?: (value: T) => number;
  /** Called for every entry that leaves the cache other than by replacement */
  onEvict?: (key: string, value: T) => void;
}

interface Entry<T> {
  value: T;
  size: number;
}

export interface LRUCacheStats {
  entries: number;
  bytes: number;
  hits: number;
  misses: number;
  evictions: number;
  /** hits / (hits + misses), 0 before the first lookup */
  hitRate: number;
}

const DEFAULT_MAX_ENTRIES = 100;

// =============================================================================
// LRU Cache
// =============================================================================

/**
 * Map iteration order is insertion order, so the first key is always the
 * least recently used one. Reads re-insert the entry at the warm end.
 */
export class LRUCache<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly maxEntries: number;
  private readonly maxBytes: number | undefined;
  private readonly sizeOf: (value: T) => number;
  private readonly onEvict: ((key: string, value: T) => void) | undefined;

  private totalBytes = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: LRUCacheOptions<T> = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.maxBytes = options.maxBytes;
    this.sizeOf = options.sizeOf ?? (() => 0);
    this.onEvict = options.onEvict;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  /**
   * Insert or replace a value.
   * Returns false, leaving the cache without the key, when the value alone
   * exceeds the byte budget.
   */
  set(key: string, value: T): boolean {
    const size = this.sizeOf(value);
    this.detach(key);

    if (this.maxBytes !== undefined && size > this.maxBytes) {
      return false;
    }

    while (this.entries.size >= this.maxEntries || this.overBudget(size)) {
      this.evictColdest();
    }

    this.entries.set(key, { value, size });
    this.totalBytes += size;
    return true;
  }

  delete(key: string): boolean {
    const entry = this.detach(key);
    if (!entry) return false;
    this.onEvict?.(key, entry.value);
    return true;
  }

  /**
   * Drop every entry and reset the counters.
   */
  clear(): void {
    if (this.onEvict) {
      for (const [key, entry] of this.entries) {
        this.onEvict(key, entry.value);
      }
    }
    this.entries.clear();
    this.totalBytes = 0;
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  get bytes(): number {
    return this.totalBytes;
  }

  getStats(): LRUCacheStats {
    const lookups = this.hits + this.misses;
    return {
      entries: this.entries.size,
      bytes: this.totalBytes,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private overBudget(incoming: number): boolean {
    return this.maxBytes !== undefined && this.entries.size > 0 && this.totalBytes + incoming > this.maxBytes;
  }

  /** Remove without notifying; returns the removed entry */
  private detach(key: string): Entry<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    this.totalBytes -= entry.size;
    return entry;
  }

  private evictColdest(): void {
    const coldest = this.entries.keys().next();
    if (coldest.done) return;

    const entry = this.detach(coldest.value);
    if (entry) {
      this.evictions++;
      this.onEvict?.(coldest.value, entry.value);
    }
  }
}
