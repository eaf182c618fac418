/**
 * Wordlist Module - Domain Types
 *
 * Contains domain types, placeholder vocabulary and the TypeBox schemas for
 * the pattern library and extension catalogue files.
 */

import { type Static, Type } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Placeholder Vocabulary
// ─────────────────────────────────────────────────────────────────────────────

/**
 * URL placeholders in substitution order.
 * `$full_path` must be replaced before `$path`, which is one of its prefixes.
 */
export const URL_PLACEHOLDERS = [
  '$domain_name',
  '$full_domain',
  '$subdomain',
  '$tld',
  '$file_name',
  '$full_path',
  '$path',
] as const;

export type UrlPlaceholder = (typeof URL_PLACEHOLDERS)[number];

export const WORD_PLACEHOLDER = '$word';
export const EXTENSION_PLACEHOLDER = '$ext';
export const NUMBER_PLACEHOLDER = '$num';
export const YEAR_PLACEHOLDER = '%y';
export const MONTH_PLACEHOLDER = '%m';
export const DAY_PLACEHOLDER = '%d';

/** Characters that mark a candidate as still holding an unresolved placeholder */
export const UNRESOLVED_MARKERS = ['$', '%'] as const;

// ─────────────────────────────────────────────────────────────────────────────
// URL Parts
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Semantic components of one input URL.
 */
export interface UrlParts {
  /** Source URL as given */
  readonly url: string;
  /** Network location: [user[:pass]@]host[:port] */
  readonly fullDomain: string;
  /** Labels left of the registrable domain, e.g. "blog" */
  readonly subdomain: string;
  /** Registrable domain without its public suffix, e.g. "example" */
  readonly domainName: string;
  /** Public suffix, e.g. "co.uk" */
  readonly tld: string;
  readonly path: string;
  readonly fullPath: string;
  /** Last path segment when it contains a dot, otherwise empty */
  readonly fileName: string;
}

/**
 * Host split along the public suffix list.
 */
export interface DomainSplit {
  readonly subdomain: string;
  readonly domain: string;
  readonly suffix: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Pattern Library
// ─────────────────────────────────────────────────────────────────────────────

export const PatternLibrarySchema = Type.Object({
  patterns: Type.Array(Type.String()),
  'date-formats': Type.Optional(Type.Array(Type.String())),
});

export type PatternLibraryDTO = Static<typeof PatternLibrarySchema>;

export interface PatternLibrary {
  readonly patterns: readonly string[];
  readonly dateFormats: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Extension Catalogue
// ─────────────────────────────────────────────────────────────────────────────

const LevelMapSchema = Type.Record(Type.String(), Type.Array(Type.String()));

export const ExtensionCatalogueSchema = Type.Object({
  backup: Type.Optional(LevelMapSchema),
  compress: Type.Optional(LevelMapSchema),
});

export type ExtensionCatalogueDTO = Static<typeof ExtensionCatalogueSchema>;

export interface ExtensionCatalogue {
  readonly backup: Readonly<Record<string, readonly string[]>>;
  readonly compress: Readonly<Record<string, readonly string[]>>;
}

/**
 * Which part of the catalogue to draw extensions from.
 * `all` takes backup and compress extensions for every level.
 */
export type ExtensionSelection =
  | { readonly kind: 'backup'; readonly levels: readonly string[] }
  | { readonly kind: 'compress'; readonly levels: readonly string[] }
  | { readonly kind: 'all'; readonly levels: readonly string[] };

// ─────────────────────────────────────────────────────────────────────────────
// Generation
// ─────────────────────────────────────────────────────────────────────────────

export type WordlistCategory = 'patterns' | 'date-formats';

export interface DateRanges {
  readonly years: readonly string[];
  readonly months: readonly string[];
  readonly days: readonly string[];
}

/**
 * Unique candidates per category.
 * `date-formats` is present only when date mode was requested.
 */
export interface GeneratedWordlist {
  readonly patterns: ReadonlySet<string>;
  readonly 'date-formats'?: ReadonlySet<string>;
}

export interface AssembleOptions {
  /** Emit bare relative paths instead of URLs joined onto each source */
  readonly wordlistOnly: boolean;
}
