/**
 * Cover Resolution Engine
 *
 * Turns a book's candidate URLs into one usable thumbnail. Candidates are
 * tried strictly in order, each in its original form before its upgraded
 * form, and the first one that yields decodable bytes wins.
 *
 * Every per-candidate failure is absorbed. Exhaustion is a normal outcome
 * and the caller renders a placeholder.
 */

import type { CoverTarget } from '../types/cover.types.js';
import { resolutionLogger as logger } from './logger.service.js';
import { normalizeCandidateUrls } from './cover-candidates.service.js';
import { appendUniqueUrls, sameUrlIgnoringCase } from './cover-url-utils.js';
import { upgradeCoverUrl } from './url-upgrader.service.js';
import type { ImageBytesSource } from './image-fetcher.service.js';
import type { ThumbnailCodec } from './thumbnail-codec.service.js';

// =============================================================================
// Types
// =============================================================================

export type CoverResolution =
  | { ok: true; thumbnail: Buffer; url: string; attempts: number }
  | { ok: false; attempts: number };

export interface CoverResolutionEngineOptions {
  fetcher: ImageBytesSource;
  codec: ThumbnailCodec;
  /** Longest edge per target; a missing entry uses the codec default */
  maxPixelByTarget?: Partial<Record<CoverTarget, number>>;
}

// =============================================================================
// Attempt List
// =============================================================================

/**
 * Ordered URLs to try: preferred first, then the candidates, each followed by
 * its upgraded form when that differs.
 */
export function buildAttemptList(
  candidateURLs: readonly string[],
  preferredURL: string | null | undefined,
  target: CoverTarget
): string[] {
  const pool = normalizeCandidateUrls([preferredURL, ...candidateURLs]);

  const attempts: string[] = [];
  for (const candidate of pool) {
    const upgraded = upgradeCoverUrl(candidate, target);
    appendUniqueUrls(
      attempts,
      sameUrlIgnoringCase(upgraded, candidate) ? [candidate] : [candidate, upgraded]
    );
  }
  return attempts;
}

// =============================================================================
// Engine
// =============================================================================

export class CoverResolutionEngine {
  private readonly fetcher: ImageBytesSource;
  private readonly codec: ThumbnailCodec;
  private readonly maxPixelByTarget: Partial<Record<CoverTarget, number>>;

  constructor(options: CoverResolutionEngineOptions) {
    this.fetcher = options.fetcher;
    this.codec = options.codec;
    this.maxPixelByTarget = options.maxPixelByTarget ?? {};
  }

  async resolveAndThumbnail(
    candidateURLs: readonly string[],
    preferredURL: string | null | undefined,
    target: CoverTarget
  ): Promise<CoverResolution> {
    const attemptList = buildAttemptList(candidateURLs, preferredURL, target);
    const maxPixelDimension = this.maxPixelByTarget[target];

    let attempts = 0;
    for (const url of attemptList) {
      attempts++;
      const thumbnail = await this.tryAttempt(url, maxPixelDimension);
      if (thumbnail) {
        logger.debug({ url, attempts, target }, 'Cover resolved');
        return { ok: true, thumbnail, url, attempts };
      }
    }

    logger.debug({ attempts, target }, 'No candidate produced a usable cover');
    return { ok: false, attempts };
  }

  private async tryAttempt(url: string, maxPixelDimension: number | undefined): Promise<Buffer | null> {
    try {
      const fetched = await this.fetcher.fetch(url);
      if (!fetched.ok) return null;

      const thumbnail = await this.codec.makeThumbnail(
        fetched.data,
        maxPixelDimension === undefined ? {} : { maxPixelDimension }
      );
      if (!thumbnail) {
        logger.debug({ url, source: fetched.source }, 'Candidate bytes are not a usable cover');
      }
      return thumbnail;
    } catch (error) {
      logger.debug({ url, error: String(error) }, 'Candidate attempt failed unexpectedly');
      return null;
    }
  }
}
