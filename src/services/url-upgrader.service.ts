/**
 * URL Upgrader
 *
 * Best-effort, provider-aware rewrite of a remote cover URL to request a
 * larger variant. Pure string work, no I/O.
 *
 * Only the metadata provider's image hosts are rewritten: their `zoom` query
 * parameter is raised to the target's minimum level and never lowered.
 * Every other host is returned untouched, including the open fallback
 * database, which already encodes the size (-L/-M/-S) in the path.
 */

import type { CoverTarget } from '../types/cover.types.js';
import { isLocalFileUrl } from './cover-url-utils.js';

/** Minimum zoom level per target */
export const TARGET_ZOOM: Record<CoverTarget, number> = {
  thumbnail: 2,
  display: 3,
};

const DEFAULT_ZOOM = 1;

/**
 * True for the metadata provider's cover image hosts.
 */
export function isProviderImageHost(host: string): boolean {
  const lower = host.toLowerCase();
  return lower.includes('books.google') || lower.includes('books.googleusercontent');
}

function parseZoom(value: string | undefined): number {
  if (value === undefined) return DEFAULT_ZOOM;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? DEFAULT_ZOOM : parsed;
}

/**
 * Rewrite a query string so its first `zoom` parameter is at least `minZoom`.
 * Returns null when the query already satisfies the target.
 */
function raiseZoom(query: string, minZoom: number): string | null {
  const segments = query.length > 0 ? query.split('&') : [];
  const zoomIndex = segments.findIndex((segment) => {
    const name = segment.split('=')[0] ?? '';
    return name.toLowerCase() === 'zoom';
  });

  if (zoomIndex === -1) {
    segments.push(`zoom=${minZoom}`);
    return segments.join('&');
  }

  const segment = segments[zoomIndex] ?? '';
  const separator = segment.indexOf('=');
  const name = separator === -1 ? segment : segment.slice(0, separator);
  const current = parseZoom(separator === -1 ? undefined : segment.slice(separator + 1));
  if (current >= minZoom) {
    return null;
  }

  segments[zoomIndex] = `${name}=${minZoom}`;
  return segments.join('&');
}

/**
 * Upgrade a remote cover URL for the given target.
 * Returns the input unchanged when the host is unknown, the URL is local or
 * unparseable, or the URL already requests the target level.
 */
export function upgradeCoverUrl(url: string, target: CoverTarget): string {
  const trimmed = url.trim();
  if (!trimmed || isLocalFileUrl(trimmed)) return url;

  let host: string;
  try {
    host = new URL(trimmed).hostname;
  } catch {
    return url;
  }
  if (!host || !isProviderImageHost(host)) return url;

  const hashIndex = trimmed.indexOf('#');
  const withoutHash = hashIndex === -1 ? trimmed : trimmed.slice(0, hashIndex);
  const hash = hashIndex === -1 ? '' : trimmed.slice(hashIndex);

  const queryIndex = withoutHash.indexOf('?');
  const base = queryIndex === -1 ? withoutHash : withoutHash.slice(0, queryIndex);
  const query = queryIndex === -1 ? '' : withoutHash.slice(queryIndex + 1);

  const rewritten = raiseZoom(query, TARGET_ZOOM[target]);
  if (rewritten === null) return url;

  return `${base}?${rewritten}${hash}`;
}
