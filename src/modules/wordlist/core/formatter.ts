/**
 * Wordlist Module - Pattern Formatter
 *
 * Substitutes URL placeholders into templates. Word, extension, number and
 * date placeholders are left for the combinator.
 */

import { URL_PLACEHOLDERS, type UrlParts, type UrlPlaceholder } from './types.js';

const placeholderValue = (parts: UrlParts, placeholder: UrlPlaceholder): string => {
  switch (placeholder) {
    case '$domain_name':
      return parts.domainName;
    case '$full_domain':
      return parts.fullDomain;
    case '$subdomain':
      return parts.subdomain;
    case '$tld':
      return parts.tld;
    case '$file_name':
      return parts.fileName;
    case '$full_path':
      return parts.fullPath;
    case '$path':
      return parts.path;
  }
};

/**
 * Replaces every occurrence of a placeholder with a literal value.
 * Replacement patterns such as "$&" in the value are not interpreted.
 */
export const replaceToken = (value: string, token: string, replacement: string): string =>
  value.split(token).join(replacement);

/**
 * Collapses doubled separators left behind by empty substitutions.
 *
 * One left-to-right pass per separator: "..." becomes ".." and "///" becomes
 * "//". Callers rely on this partial collapse, so it is not iterated.
 */
export const collapseSeparators = (value: string): string =>
  value.replaceAll('..', '.').replaceAll('//', '/');

/**
 * Formats one template against a URL's parts.
 */
export const formatPattern = (parts: UrlParts, template: string): string => {
  let formatted = template;
  for (const placeholder of URL_PLACEHOLDERS) {
    formatted = replaceToken(formatted, placeholder, placeholderValue(parts, placeholder));
  }
  return collapseSeparators(formatted);
};

/**
 * Formats every template against a URL's parts, keeping order and length.
 */
export const formatPatterns = (parts: UrlParts, templates: readonly string[]): string[] =>
  templates.map((template) => formatPattern(parts, template));
