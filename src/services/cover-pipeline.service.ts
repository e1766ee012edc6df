/**
 * Cover Pipeline
 *
 * Builds the cover services once per process from the loaded configuration.
 * Every collaborator can be replaced, which is how tests run the whole
 * pipeline against temp directories and a fake network.
 */

import type { AppConfig } from './config.service.js';
import { loadConfig } from './config.service.js';
import { getCoverCacheDir, getLibraryStorePath, getUserCoversDir } from './app-paths.service.js';
import { MemoryImageCache } from './cache/memory-image-cache.service.js';
import { DiskImageCache } from './cache/disk-image-cache.service.js';
import { ImageByteFetcher } from './image-fetcher.service.js';
import type { FetchLike } from './image-fetcher.service.js';
import { SharpThumbnailCodec } from './thumbnail-codec.service.js';
import type { ThumbnailCodec } from './thumbnail-codec.service.js';
import { CoverResolutionEngine } from './cover-resolution.service.js';
import { UserCoverStore } from './user-cover-store.service.js';
import { JsonFileBookStore } from './book-store.service.js';
import type { BookStore } from './book-store.service.js';
import { CoverService } from './cover.service.js';
import { CoverBackfillJob } from './cover-backfill-job.service.js';

export interface CoverPipeline {
  config: AppConfig;
  store: BookStore;
  memoryCache: MemoryImageCache;
  diskCache: DiskImageCache;
  fetcher: ImageByteFetcher;
  codec: ThumbnailCodec;
  engine: CoverResolutionEngine;
  userCovers: UserCoverStore;
  covers: CoverService;
  backfill: CoverBackfillJob;
}

export interface CoverPipelineOverrides {
  config?: AppConfig;
  store?: BookStore;
  codec?: ThumbnailCodec;
  fetch?: FetchLike;
  coverCacheDir?: string;
  userCoversDir?: string;
}

export function createCoverPipeline(overrides: CoverPipelineOverrides = {}): CoverPipeline {
  const config = overrides.config ?? loadConfig();

  const store = overrides.store ?? new JsonFileBookStore({ filePath: getLibraryStorePath() });

  const memoryCache = new MemoryImageCache({
    maxBytes: config.cache.memoryMaxBytes,
    maxEntries: config.cache.memoryMaxEntries,
  });
  const diskCache = new DiskImageCache({ directory: overrides.coverCacheDir ?? getCoverCacheDir() });

  const fetcher = new ImageByteFetcher({
    memoryCache,
    diskCache,
    fetch: overrides.fetch,
    requestTimeoutMs: config.network.requestTimeoutMs,
    userAgent: config.network.userAgent,
  });

  const codec =
    overrides.codec ??
    new SharpThumbnailCodec({
      maxPixelDimension: config.thumbnail.maxPixelDimension,
      quality: config.thumbnail.quality,
      fullResolutionQuality: config.thumbnail.fullResolutionQuality,
      lowResolutionFloor: config.thumbnail.lowResolutionFloor,
    });

  const engine = new CoverResolutionEngine({
    fetcher,
    codec,
    maxPixelByTarget: {
      thumbnail: config.thumbnail.maxPixelDimension,
      display: config.display.maxPixelDimension,
    },
  });

  const userCovers = new UserCoverStore({ directory: overrides.userCoversDir ?? getUserCoversDir() });

  const covers = new CoverService({
    store,
    engine,
    codec,
    userCovers,
    fullResolutionMinSide: config.display.fullResolutionMinSide,
  });

  const backfill = new CoverBackfillJob({
    store,
    covers,
    batchSize: config.backfill.batchSize,
    batchDelayMs: config.backfill.batchDelayMs,
  });

  return { config, store, memoryCache, diskCache, fetcher, codec, engine, userCovers, covers, backfill };
}
