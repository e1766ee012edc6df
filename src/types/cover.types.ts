/**
 * Cover Types
 *
 * Shared shapes for books, their embedded cover records, and the metadata
 * the import/search collaborator hands us.
 */

// =============================================================================
// Book Records
// =============================================================================

/**
 * Per-book cover state, embedded in every library book.
 */
export interface CoverRecord {
  /** Preferred remote cover URL, set once a candidate is confirmed working */
  primaryCoverURL?: string;
  /** Best-first remote cover URLs. HTTPS only, never local files, case-insensitively unique. */
  candidateURLs: string[];
  /** File name of the full-resolution user photo under the user covers directory */
  userPhotoFileRef?: string;
  /** Small JPEG used for sync and offline display */
  syncedThumbnail?: Buffer;
}

export interface Book {
  id: string;
  title: string;
  author: string;
  isbn13?: string;
  createdAt: Date;
  cover: CoverRecord;
}

// =============================================================================
// Metadata Collaborator
// =============================================================================

/**
 * Image links as returned by the metadata provider, one field per size tier.
 */
export interface ProviderImageLinks {
  extraLarge?: string;
  large?: string;
  medium?: string;
  small?: string;
  thumbnail?: string;
  smallThumbnail?: string;
}

export interface BookMetadata {
  isbn13?: string;
  imageLinks?: ProviderImageLinks;
  /** Already-ranked image URLs (largest first), used in addition to imageLinks */
  imageURLs?: string[];
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * What a resolved cover will be used for.
 * - thumbnail: synced thumbnail / list rows
 * - display: large on-screen rendering
 */
export type CoverTarget = 'thumbnail' | 'display';

export interface PixelSize {
  width: number;
  height: number;
}

export interface DisplaySize {
  width: number;
  height: number;
}
