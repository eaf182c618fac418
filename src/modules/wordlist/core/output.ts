/**
 * Wordlist Module - Output Assembly
 *
 * Pure functions that turn generated candidates into the final wordlist:
 * source URL normalisation, relative joining, sorting and JSON rendering.
 */

import { tryParseUrl } from './url-parts.js';

import type { AssembleOptions, GeneratedWordlist } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Source URLs
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reduces a source URL to scheme, authority and path, keeping its spelling.
 */
export const stripQueryAndFragment = (url: string): string => url.split(/[?#]/)[0] ?? '';

/**
 * Trims input lines, drops blank ones, strips query and fragment and
 * deduplicates, keeping first-seen order.
 */
export const normalizeSourceUrls = (urls: readonly string[]): string[] => {
  const normalized = new Set<string>();
  for (const url of urls) {
    const trimmed = url.trim();
    if (trimmed !== '') {
      normalized.add(stripQueryAndFragment(trimmed));
    }
  }
  return Array.from(normalized);
};

// ─────────────────────────────────────────────────────────────────────────────
// Joining
// ─────────────────────────────────────────────────────────────────────────────

const RELATIVE_PROTOCOL = 'resolve:';
const RELATIVE_ORIGIN = `${RELATIVE_PROTOCOL}//relative`;

/** Optional "scheme:" or "scheme://authority" prefix, then the path */
const BASE_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*:(?:\/\/[^/?#]*)?)?([^?#]*)/;
const SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:/;
const DOT_SEGMENT_PATTERN = /(?:^|\/)\.{1,2}(?:\/|$)/;

/**
 * Resolves against a base that is itself a relative reference ("example.com/app").
 * The base is anchored under a placeholder origin, which is removed again.
 */
const joinPath = (base: string, relative: string): string => {
  const rooted = base.startsWith('/');
  const resolved = tryParseUrl(relative, `${RELATIVE_ORIGIN}${rooted ? '' : '/'}${base}`);

  if (resolved === null) {
    return relative;
  }
  if (resolved.protocol !== RELATIVE_PROTOCOL) {
    return resolved.href;
  }

  const path = `${resolved.pathname}${resolved.search}${resolved.hash}`;
  return rooted || relative.startsWith('/') ? path : path.slice(1);
};

/**
 * Full reference resolution with the URL parser. Output is percent-encoded.
 */
const resolveReference = (base: string, relative: string): string => {
  const absoluteBase = tryParseUrl(base);
  if (absoluteBase === null) {
    return joinPath(base, relative);
  }
  return tryParseUrl(relative, absoluteBase)?.href ?? relative;
};

/**
 * A relative path that resolves by plain concatenation: not empty, no scheme,
 * no authority and no "." or ".." segments.
 */
const isPlainPath = (relative: string): boolean =>
  relative !== '' &&
  !relative.startsWith('//') &&
  !SCHEME_PATTERN.test(relative) &&
  !DOT_SEGMENT_PATTERN.test(relative);

/**
 * Resolves a generated path against a source URL.
 *
 * A leading slash replaces the whole path of the source; a bare relative path
 * resolves against the source's directory. The generated text is appended as
 * written, so spaces and non-ASCII letters stay unencoded.
 *
 * @example joinUrl('http://example.com/app/page', '/backup.zip') // 'http://example.com/backup.zip'
 */
export const joinUrl = (base: string, relative: string): string => {
  const match = BASE_PATTERN.exec(base);
  const prefix = match?.[1] ?? '';
  const basePath = match?.[2] ?? '';
  const hasAuthority = prefix.includes('//');

  // Opaque bases ("mailto:") and dot segments need full resolution.
  if (
    !isPlainPath(relative) ||
    DOT_SEGMENT_PATTERN.test(basePath) ||
    (prefix !== '' && !hasAuthority)
  ) {
    return resolveReference(base, relative);
  }

  if (relative.startsWith('/')) {
    return `${prefix}${relative}`;
  }

  const directory = basePath.slice(0, basePath.lastIndexOf('/') + 1);
  return `${prefix}${directory === '' && hasAuthority ? '/' : directory}${relative}`;
};

/**
 * Wordlist-only form of a generated path: one leading slash removed.
 */
export const toWordlistEntry = (path: string): string =>
  path.startsWith('/') ? path.slice(1) : path;

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

const categorySets = (wordlist: GeneratedWordlist): ReadonlySet<string>[] => {
  const dateFormats = wordlist['date-formats'];
  return dateFormats !== undefined ? [wordlist.patterns, dateFormats] : [wordlist.patterns];
};

/**
 * Sorted, deduplicated union of every category for every source URL.
 */
export const assembleLines = (
  urls: readonly string[],
  wordlist: GeneratedWordlist,
  options: AssembleOptions
): string[] => {
  const lines = new Set<string>();
  const sets = categorySets(wordlist);

  for (const url of urls) {
    for (const set of sets) {
      for (const path of set) {
        lines.add(options.wordlistOnly ? toWordlistEntry(path) : joinUrl(url, path));
      }
    }
  }

  return Array.from(lines).sort();
};

/**
 * JSON rendering with four-space indentation.
 * Lists keep set iteration order; `date-formats` appears only in date mode.
 */
export const serializeJson = (wordlist: GeneratedWordlist): string => {
  const payload: Record<string, string[]> = {
    patterns: Array.from(wordlist.patterns),
  };

  const dateFormats = wordlist['date-formats'];
  if (dateFormats !== undefined) {
    payload['date-formats'] = Array.from(dateFormats);
  }

  return JSON.stringify(payload, null, 4);
};

export interface RenderOptions extends AssembleOptions {
  readonly json: boolean;
}

/**
 * Renders the final output text.
 */
export const renderOutput = (
  urls: readonly string[],
  wordlist: GeneratedWordlist,
  options: RenderOptions
): string =>
  options.json ? serializeJson(wordlist) : assembleLines(urls, wordlist, options).join('\n');
