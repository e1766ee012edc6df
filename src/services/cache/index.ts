/**
 * Image Cache Module
 *
 * Re-exports the memory and disk tiers of the cover byte cache.
 */

export * from './cache.types.js';
export { MemoryImageCache, type MemoryImageCacheOptions } from './memory-image-cache.service.js';
export {
  DiskImageCache,
  cacheFileName,
  cacheFileExtension,
  type DiskImageCacheOptions,
  type DiskCacheTrimResult,
} from './disk-image-cache.service.js';
