/**
 * Wordlist Module - URL Decomposition
 *
 * Splits an input URL into the components that URL placeholders refer to.
 * Never fails: input the URL parser rejects is read as a schemeless
 * "host/path" reference.
 */

import type { DomainSplitter } from './ports.js';
import type { UrlParts } from './types.js';

/**
 * Parses with the WHATWG URL parser, returning null where it would throw.
 */
export const tryParseUrl = (url: string, base?: string | URL): URL | null => {
  try {
    return new URL(url, base);
  } catch {
    return null;
  }
};

/**
 * Scheme, network location and path as written, up to any query or fragment.
 * The location is only present after "//", as in "http://host/path".
 */
const RAW_URL_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:(?:\/\/([^/?#]*))?([^?#]*)/;

/**
 * Network-path reference without a scheme: "//host/path".
 */
const NETWORK_PATH_PATTERN = /^\/\/([^/]*)(.*)$/;

/**
 * Host of a network location: userinfo and port removed.
 */
const hostOf = (location: string): string =>
  location.slice(location.lastIndexOf('@') + 1).replace(/:\d*$/, '');

/**
 * Returns the last path segment when it looks like a file (contains a dot).
 */
export const extractFileName = (path: string): string => {
  const lastSegment = path.slice(path.lastIndexOf('/') + 1);
  return lastSegment.includes('.') ? lastSegment : '';
};

/**
 * Decomposes a URL into its semantic parts.
 *
 * @param url - Absolute URL, or a schemeless reference such as "example.com/app"
 * @param splitter - Public-suffix-aware host splitter
 */
export const decomposeUrl = (url: string, splitter: DomainSplitter): UrlParts => {
  const parsed = tryParseUrl(url);

  if (parsed === null) {
    // Schemeless input ("example.com/app"): the leading segment is taken as the host.
    const withoutQuery = url.split(/[?#]/)[0] ?? '';
    const networkPath = NETWORK_PATH_PATTERN.exec(withoutQuery);
    const fullDomain = networkPath?.[1] ?? '';
    const path = networkPath?.[2] ?? withoutQuery;
    const host = hostOf(networkPath !== null ? fullDomain : (path.split('/')[0] ?? ''));
    const { subdomain, domain, suffix } =
      host !== '' ? splitter.split(host) : { subdomain: '', domain: '', suffix: '' };

    return {
      url,
      fullDomain,
      subdomain,
      domainName: domain,
      tld: suffix,
      path,
      fullPath: path,
      fileName: extractFileName(path),
    };
  }

  // Location and path keep their original spelling: no case folding, no
  // default-port removal, no percent-encoding.
  const raw = RAW_URL_PATTERN.exec(url);
  const { subdomain, domain, suffix } =
    parsed.hostname !== '' ? splitter.split(parsed.hostname) : { subdomain: '', domain: '', suffix: '' };
  const path = raw?.[2] ?? parsed.pathname;

  return {
    url,
    fullDomain: raw?.[1] ?? '',
    subdomain,
    domainName: domain,
    tld: suffix,
    path,
    fullPath: path,
    fileName: extractFileName(path),
  };
};
