/**
 * Cover URL Utilities
 *
 * Small string helpers shared by the candidate builder, the URL upgrader and
 * the resolution engine.
 */

/**
 * True for file: URLs (user photos, bundled assets). Such URLs are read
 * directly and never treated as remote cover candidates.
 */
export function isLocalFileUrl(value: string): boolean {
  return /^file:/i.test(value.trim());
}

/**
 * Upgrade http:// (or a bare http:) prefix to https. Returns null for empty input.
 */
export function toHttps(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;

  if (/^http:\/\//i.test(trimmed)) {
    return `https://${trimmed.slice('http://'.length)}`;
  }
  if (/^http:/i.test(trimmed)) {
    return `https:${trimmed.slice('http:'.length)}`;
  }
  return trimmed;
}

/**
 * True when the string parses as an absolute http(s) URL.
 */
export function isRemoteHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value.trim());
    return parsed.protocol === 'https:' || parsed.protocol === 'http:';
  } catch {
    return false;
  }
}

export function sameUrlIgnoringCase(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Append values to a list, skipping blanks and case-insensitive duplicates.
 * The first spelling of a URL wins.
 */
export function appendUniqueUrls(target: string[], values: Iterable<string | null | undefined>): string[] {
  const seen = new Set(target.map((value) => value.toLowerCase()));
  for (const value of values) {
    const trimmed = value?.trim();
    if (!trimmed) continue;
    const key = trimmed.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    target.push(trimmed);
  }
  return target;
}
