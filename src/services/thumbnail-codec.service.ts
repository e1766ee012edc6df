/**
 * Thumbnail Codec Service
 *
 * Decodes cover bytes, corrects EXIF orientation, bounds the longer edge and
 * re-encodes to JPEG. Sharp does the work on the libuv thread pool, so none of
 * it blocks the event loop.
 *
 * Size checks use image metadata only (header parse, no pixel decode); they
 * run on every render of a cached thumbnail.
 */

import sharp from 'sharp';
import type { PixelSize } from '../types/cover.types.js';

// =============================================================================
// Types
// =============================================================================

export interface ThumbnailOptions {
  /** Longest edge of the output, in pixels */
  maxPixelDimension: number;
  /** Lossy quality, 0-1 */
  quality: number;
}

export interface ThumbnailCodecOptions extends Partial<ThumbnailOptions> {
  /** Quality for full-resolution re-encodes, 0-1 */
  fullResolutionQuality?: number;
  /** Thumbnails whose longest edge is below this count as low resolution */
  lowResolutionFloor?: number;
}

/**
 * Imaging capability used by the resolution engine and the cover service.
 * Every operation reports failure as null (or `true` for isLowResolution)
 * instead of throwing.
 */
export interface ThumbnailCodec {
  /** Upright pixel size from metadata, or null when unreadable */
  probe(data: Buffer): Promise<PixelSize | null>;
  /** Oriented, downscaled JPEG, or null when the bytes are not a usable image */
  makeThumbnail(data: Buffer, options?: Partial<ThumbnailOptions>): Promise<Buffer | null>;
  /** Oriented JPEG at the original pixel size */
  makeFullResolution(data: Buffer): Promise<Buffer | null>;
  /** True when the longest edge is under the floor, or metadata is unreadable */
  isLowResolution(data: Buffer): Promise<boolean>;
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_THUMBNAIL_MAX_PIXEL = 600;
export const DEFAULT_THUMBNAIL_QUALITY = 0.82;
export const DEFAULT_FULL_RESOLUTION_QUALITY = 0.95;
export const DEFAULT_LOW_RESOLUTION_FLOOR = 420;

/**
 * Images whose longer edge is below this are "no cover" markers
 * (e.g. the 1x1 GIF some cover databases answer with), never real covers.
 */
export const PLACEHOLDER_MAX_EDGE = 10;

/** EXIF orientations 5-8 rotate by 90 degrees */
function swapsDimensions(orientation: number | undefined): boolean {
  return orientation !== undefined && orientation >= 5 && orientation <= 8;
}

function toJpegQuality(quality: number): number {
  return Math.min(100, Math.max(1, Math.round(quality * 100)));
}

// =============================================================================
// Sharp Codec
// =============================================================================

export class SharpThumbnailCodec implements ThumbnailCodec {
  private readonly maxPixelDimension: number;
  private readonly quality: number;
  private readonly fullResolutionQuality: number;
  private readonly lowResolutionFloor: number;

  constructor(options: ThumbnailCodecOptions = {}) {
    this.maxPixelDimension = options.maxPixelDimension ?? DEFAULT_THUMBNAIL_MAX_PIXEL;
    this.quality = options.quality ?? DEFAULT_THUMBNAIL_QUALITY;
    this.fullResolutionQuality = options.fullResolutionQuality ?? DEFAULT_FULL_RESOLUTION_QUALITY;
    this.lowResolutionFloor = options.lowResolutionFloor ?? DEFAULT_LOW_RESOLUTION_FLOOR;
  }

  async probe(data: Buffer): Promise<PixelSize | null> {
    if (data.length === 0) return null;

    try {
      const metadata = await sharp(data).metadata();
      if (!metadata.width || !metadata.height) return null;

      return swapsDimensions(metadata.orientation)
        ? { width: metadata.height, height: metadata.width }
        : { width: metadata.width, height: metadata.height };
    } catch {
      return null;
    }
  }

  async makeThumbnail(data: Buffer, options: Partial<ThumbnailOptions> = {}): Promise<Buffer | null> {
    const maxPixel = options.maxPixelDimension ?? this.maxPixelDimension;
    const quality = options.quality ?? this.quality;

    const size = await this.probe(data);
    if (!size || Math.max(size.width, size.height) < PLACEHOLDER_MAX_EDGE) {
      return null;
    }

    try {
      return await sharp(data)
        .rotate()
        .resize({
          width: maxPixel,
          height: maxPixel,
          fit: 'inside',
          withoutEnlargement: true,
        })
        .flatten({ background: '#ffffff' })
        .jpeg({ quality: toJpegQuality(quality) })
        .toBuffer();
    } catch {
      return null;
    }
  }

  async makeFullResolution(data: Buffer): Promise<Buffer | null> {
    const size = await this.probe(data);
    if (!size) return null;

    try {
      return await sharp(data)
        .rotate()
        .flatten({ background: '#ffffff' })
        .jpeg({ quality: toJpegQuality(this.fullResolutionQuality) })
        .toBuffer();
    } catch {
      return null;
    }
  }

  async isLowResolution(data: Buffer): Promise<boolean> {
    const size = await this.probe(data);
    if (!size) return true;
    return Math.max(size.width, size.height) < this.lowResolutionFloor;
  }
}

// =============================================================================
// Unsupported Codec
// =============================================================================

/**
 * Codec for hosts without imaging support. Nothing decodes, so every
 * resolution ends in the placeholder.
 */
export class UnsupportedThumbnailCodec implements ThumbnailCodec {
  async probe(): Promise<PixelSize | null> {
    return null;
  }

  async makeThumbnail(): Promise<Buffer | null> {
    return null;
  }

  async makeFullResolution(): Promise<Buffer | null> {
    return null;
  }

  async isLowResolution(): Promise<boolean> {
    return true;
  }
}
