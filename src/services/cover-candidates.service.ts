/**
 * Cover Candidates Service
 *
 * Builds and maintains the best-first list of remote cover URLs for a book.
 *
 * Sources, in order:
 * 1. Pre-ranked image URLs from the metadata collaborator
 * 2. Provider image links, largest tier first
 * 3. Open fallback database URLs derived from the ISBN (-L, -M, -S)
 *
 * Every entry is HTTPS-normalized, remote (never file:), and unique ignoring case.
 */

import type { BookMetadata, CoverRecord, ProviderImageLinks } from '../types/cover.types.js';
import { appendUniqueUrls, isLocalFileUrl, isRemoteHttpUrl, toHttps } from './cover-url-utils.js';

// =============================================================================
// Constants
// =============================================================================

export const FALLBACK_COVER_HOST = 'covers.openlibrary.org';

/** Fallback sizes, largest first */
const FALLBACK_SIZES = ['L', 'M', 'S'] as const;

/** Provider image-link fields, largest first */
const IMAGE_LINK_ORDER: ReadonlyArray<keyof ProviderImageLinks> = [
  'extraLarge',
  'large',
  'medium',
  'small',
  'thumbnail',
  'smallThumbnail',
];

// =============================================================================
// ISBN Fallback
// =============================================================================

/**
 * Strip separators from an ISBN. Returns null unless 10 or 13 characters remain.
 */
export function normalizeIsbn(isbn: string | null | undefined): string | null {
  if (!isbn) return null;
  const cleaned = isbn.replace(/[^0-9Xx]/g, '').toUpperCase();
  return cleaned.length === 10 || cleaned.length === 13 ? cleaned : null;
}

/**
 * Fallback database URLs for an ISBN, Large then Medium then Small.
 * `default=false` makes the database answer 404 instead of serving its own placeholder.
 */
export function fallbackCoverUrls(isbn: string | null | undefined): string[] {
  const normalized = normalizeIsbn(isbn);
  if (!normalized) return [];
  return FALLBACK_SIZES.map(
    (size) => `https://${FALLBACK_COVER_HOST}/b/isbn/${normalized}-${size}.jpg?default=false`
  );
}

// =============================================================================
// Candidate Lists
// =============================================================================

/**
 * HTTPS-normalize, drop blanks/local/non-http entries and de-duplicate ignoring case.
 */
export function normalizeCandidateUrls(urls: Iterable<string | null | undefined>): string[] {
  const remote: string[] = [];
  for (const url of urls) {
    const https = toHttps(url);
    if (!https || isLocalFileUrl(https) || !isRemoteHttpUrl(https)) continue;
    remote.push(https);
  }
  return appendUniqueUrls([], remote);
}

/**
 * Provider image links, largest tier first.
 */
export function providerImageUrls(links: ProviderImageLinks | undefined): string[] {
  if (!links) return [];
  const urls: string[] = [];
  for (const field of IMAGE_LINK_ORDER) {
    const value = links[field];
    if (value) urls.push(value);
  }
  return urls;
}

/**
 * Full candidate list for a book's metadata, fallback database URLs last.
 */
export function buildCandidateUrls(metadata: BookMetadata): string[] {
  return normalizeCandidateUrls([
    ...(metadata.imageURLs ?? []),
    ...providerImageUrls(metadata.imageLinks),
    ...fallbackCoverUrls(metadata.isbn13),
  ]);
}

/**
 * Cover record seeded at book creation: candidates only, nothing resolved yet.
 */
export function createCoverRecord(metadata: BookMetadata): CoverRecord {
  return { candidateURLs: buildCandidateUrls(metadata) };
}

/**
 * Ordered pool of remote URLs to try for a record.
 * The explicitly preferred URL goes first, then the pinned primary, then the rest.
 */
export function candidatePool(record: CoverRecord, preferredURL?: string | null): string[] {
  return normalizeCandidateUrls([preferredURL, record.primaryCoverURL, ...record.candidateURLs]);
}

/**
 * Pin a confirmed-working URL: it becomes the primary cover URL and moves to
 * the front of the candidate list. Local and unparseable URLs leave the record as is.
 */
export function pinResolvedCoverUrl(record: CoverRecord, url: string): CoverRecord {
  const https = toHttps(url);
  if (!https || isLocalFileUrl(https) || !isRemoteHttpUrl(https)) {
    return record;
  }

  const lower = https.toLowerCase();
  const rest = record.candidateURLs.filter((candidate) => candidate.toLowerCase() !== lower);

  return {
    ...record,
    primaryCoverURL: https,
    candidateURLs: [https, ...rest],
  };
}
