/**
 * Image Byte Fetcher
 *
 * Loads raw cover bytes for a URL:
 *   1. file: URLs are read straight from disk (no caching, always current)
 *   2. memory cache
 *   3. disk cache (a hit is promoted to memory)
 *   4. network GET; the bytes are stored in both tiers under the exact URL
 *
 * Failures are results, not exceptions: a dead link or a 404 only means
 * "this candidate did not work".
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { fetcherLogger as logger } from './logger.service.js';
import { isLocalFileUrl } from './cover-url-utils.js';
import type { DiskImageCacheTier, MemoryImageCacheTier } from './cache/cache.types.js';

// =============================================================================
// Types
// =============================================================================

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type ImageFetchSource = 'file' | 'memory' | 'disk' | 'network';

export type ImageFetchFailure =
  | 'invalid-url'
  | 'file-unreadable'
  | 'http-status'
  | 'not-an-image'
  | 'empty-body'
  | 'network-error';

export type ImageFetchResult =
  | { ok: true; data: Buffer; source: ImageFetchSource }
  | { ok: false; reason: ImageFetchFailure; status?: number };

/**
 * Anything that can produce bytes for a URL with the fetcher's result contract.
 */
export interface ImageBytesSource {
  fetch(url: string): Promise<ImageFetchResult>;
}

export interface ImageByteFetcherOptions {
  memoryCache: MemoryImageCacheTier;
  diskCache: DiskImageCacheTier;
  /** Network implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Abort a network request after this long (default: 15s) */
  requestTimeoutMs?: number;
  userAgent?: string;
}

export interface ImageFetcherStats {
  fileReads: number;
  memoryHits: number;
  diskHits: number;
  networkFetches: number;
  failures: number;
}

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_USER_AGENT = 'Libris/1.0';

// =============================================================================
// Fetcher
// =============================================================================

export class ImageByteFetcher implements ImageBytesSource {
  private readonly memoryCache: MemoryImageCacheTier;
  private readonly diskCache: DiskImageCacheTier;
  private readonly fetchImpl: FetchLike;
  private readonly requestTimeoutMs: number;
  private readonly userAgent: string;

  /** Network requests in flight, keyed by URL; concurrent callers share one request */
  private readonly inFlight = new Map<string, Promise<ImageFetchResult>>();

  private stats: ImageFetcherStats = {
    fileReads: 0,
    memoryHits: 0,
    diskHits: 0,
    networkFetches: 0,
    failures: 0,
  };

  constructor(options: ImageByteFetcherOptions) {
    this.memoryCache = options.memoryCache;
    this.diskCache = options.diskCache;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async fetch(url: string): Promise<ImageFetchResult> {
    const trimmed = url.trim();

    if (isLocalFileUrl(trimmed)) {
      return this.readLocalFile(trimmed);
    }

    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      return this.fail(trimmed, { ok: false, reason: 'invalid-url' });
    }
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
      return this.fail(trimmed, { ok: false, reason: 'invalid-url' });
    }

    const cached = this.memoryCache.get(trimmed);
    if (cached) {
      this.stats.memoryHits++;
      return { ok: true, data: cached, source: 'memory' };
    }

    const fromDisk = await this.diskCache.get(trimmed);
    if (fromDisk) {
      this.stats.diskHits++;
      this.memoryCache.set(trimmed, fromDisk);
      return { ok: true, data: fromDisk, source: 'disk' };
    }

    const pending = this.inFlight.get(trimmed);
    if (pending) {
      return pending;
    }

    const request = this.fetchFromNetwork(trimmed).finally(() => {
      this.inFlight.delete(trimmed);
    });
    this.inFlight.set(trimmed, request);
    return request;
  }

  getStats(): ImageFetcherStats {
    return { ...this.stats };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async readLocalFile(url: string): Promise<ImageFetchResult> {
    try {
      const data = await readFile(fileURLToPath(url));
      this.stats.fileReads++;
      if (data.length === 0) {
        return this.fail(url, { ok: false, reason: 'empty-body' });
      }
      return { ok: true, data, source: 'file' };
    } catch (error) {
      logger.debug({ url, error: String(error) }, 'Local cover file unreadable');
      return this.fail(url, { ok: false, reason: 'file-unreadable' });
    }
  }

  private async fetchFromNetwork(url: string): Promise<ImageFetchResult> {
    this.stats.networkFetches++;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.userAgent,
          'Accept': 'image/*,*/*;q=0.8',
        },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      logger.debug({ url, error: String(error) }, 'Cover request failed');
      return this.fail(url, { ok: false, reason: 'network-error' });
    }

    if (!response.ok) {
      await this.discardBody(response);
      return this.fail(url, { ok: false, reason: 'http-status', status: response.status });
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.startsWith('text/')) {
      await this.discardBody(response);
      return this.fail(url, { ok: false, reason: 'not-an-image', status: response.status });
    }

    let data: Buffer;
    try {
      data = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      logger.debug({ url, error: String(error) }, 'Cover body could not be read');
      return this.fail(url, { ok: false, reason: 'network-error' });
    }

    if (data.length === 0) {
      return this.fail(url, { ok: false, reason: 'empty-body', status: response.status });
    }

    try {
      await this.diskCache.set(url, data);
    } catch (error) {
      // The bytes are still good for this session
      logger.warn({ url, error: String(error) }, 'Disk cache write failed');
    }
    this.memoryCache.set(url, data);

    logger.debug({ url, bytes: data.length }, 'Cover fetched from network');
    return { ok: true, data, source: 'network' };
  }

  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      logger.trace({ error: String(error) }, 'Response body already consumed');
    }
  }

  private fail(url: string, result: Extract<ImageFetchResult, { ok: false }>): ImageFetchResult {
    this.stats.failures++;
    logger.debug({ url, reason: result.reason, status: result.status }, 'Cover fetch failed');
    return result;
  }
}
