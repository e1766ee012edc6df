/**
 * Libris Covers
 *
 * Cover image resolution, caching and thumbnail pipeline for a personal book
 * library. Import the services directly, or createCoverPipeline() for a fully
 * wired set and createApp() for the HTTP surface.
 */

export type {
  Book,
  BookMetadata,
  CoverRecord,
  CoverTarget,
  DisplaySize,
  PixelSize,
  ProviderImageLinks,
} from './types/cover.types.js';
export { CoverError, isCoverError } from './types/errors.js';
export type { CoverErrorCode } from './types/errors.js';

export * from './services/cache/index.js';
export { upgradeCoverUrl, isProviderImageHost, TARGET_ZOOM } from './services/url-upgrader.service.js';
export {
  buildCandidateUrls,
  candidatePool,
  createCoverRecord,
  fallbackCoverUrls,
  normalizeCandidateUrls,
  normalizeIsbn,
  pinResolvedCoverUrl,
} from './services/cover-candidates.service.js';
export { ImageByteFetcher } from './services/image-fetcher.service.js';
export type {
  FetchLike,
  ImageBytesSource,
  ImageFetchFailure,
  ImageFetchResult,
  ImageFetchSource,
} from './services/image-fetcher.service.js';
export {
  SharpThumbnailCodec,
  UnsupportedThumbnailCodec,
} from './services/thumbnail-codec.service.js';
export type { ThumbnailCodec, ThumbnailOptions } from './services/thumbnail-codec.service.js';
export { CoverResolutionEngine, buildAttemptList } from './services/cover-resolution.service.js';
export type { CoverResolution } from './services/cover-resolution.service.js';
export { UserCoverStore } from './services/user-cover-store.service.js';
export { JsonFileBookStore } from './services/book-store.service.js';
export type { BookStore } from './services/book-store.service.js';
export { CoverService } from './services/cover.service.js';
export type {
  CoverUpdatedEvent,
  RenderableCover,
  ThumbnailRefreshResult,
} from './services/cover.service.js';
export { CoverBackfillJob } from './services/cover-backfill-job.service.js';
export type { BackfillResult, BackfillState, BackfillStatus } from './services/cover-backfill-job.service.js';
export { createCoverPipeline } from './services/cover-pipeline.service.js';
export type { CoverPipeline, CoverPipelineOverrides } from './services/cover-pipeline.service.js';
export { loadConfig, updateConfig, DEFAULT_CONFIG } from './services/config.service.js';
export type { AppConfig } from './services/config.service.js';
export { createApp } from './app.js';
