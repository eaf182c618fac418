/**
 * Generate Wordlist Use Case
 *
 * Runs every source URL through decomposition, formatting and expansion and
 * aggregates the candidates per category.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  candidates,
  dateFormatDimensions,
  patternDimensions,
  type ExpansionDimension,
} from '../combinator.js';
import { createResultLimitExceededError, type GenerateError } from '../errors.js';
import { formatPatterns } from '../formatter.js';
import { decomposeUrl } from '../url-parts.js';

import type { DomainSplitter, WordlistLogger } from '../ports.js';
import type {
  DateRanges,
  GeneratedWordlist,
  PatternLibrary,
  UrlParts,
  WordlistCategory,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface GenerateWordlistDeps {
  splitter: DomainSplitter;
  logger?: WordlistLogger;
}

export interface GenerateWordlistInput {
  /** Normalised source URLs */
  urls: readonly string[];
  words: readonly string[];
  /** Extensions without a leading dot ("tar.gz") */
  extensions: readonly string[];
  numbers: readonly string[];
  library: PatternLibrary;
  /** Enables date mode */
  dates?: DateRanges;
  /** Date templates to use in date mode; defaults to the library's */
  dateFormats?: readonly string[];
  /** Upper bound on unique candidates per category */
  maxResults?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Adds candidates to a category set, stopping once the cap is exceeded.
 * Candidates are consumed lazily, so at most maxResults + 1 are held.
 */
const collect = (
  target: Set<string>,
  source: Iterable<string>,
  category: WordlistCategory,
  maxResults: number | undefined
): Result<void, GenerateError> => {
  for (const candidate of source) {
    target.add(candidate);
    if (maxResults !== undefined && target.size > maxResults) {
      return err(createResultLimitExceededError(maxResults, category));
    }
  }
  return ok(undefined);
};

const expandCategory = (
  allParts: readonly UrlParts[],
  templates: readonly string[],
  dimensions: readonly ExpansionDimension[],
  category: WordlistCategory,
  maxResults: number | undefined,
  logger: WordlistLogger | undefined
): Result<Set<string>, GenerateError> => {
  const results = new Set<string>();

  for (const parts of allParts) {
    const before = results.size;
    const collected = collect(
      results,
      candidates(formatPatterns(parts, templates), dimensions),
      category,
      maxResults
    );
    if (collected.isErr()) {
      return err(collected.error);
    }

    logger?.debug(
      { url: parts.url, category, added: results.size - before },
      'Expanded templates for URL'
    );
  }

  return ok(results);
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Generates the candidate sets for all source URLs.
 *
 * The `patterns` category is always produced. The `date-formats` category is
 * produced only when `dates` is given, even if it ends up empty.
 *
 * @returns The per-category sets, or ResultLimitExceededError when a category
 *   outgrows `maxResults`
 */
export const generateWordlist = (
  deps: GenerateWordlistDeps,
  input: GenerateWordlistInput
): Result<GeneratedWordlist, GenerateError> => {
  const { splitter, logger } = deps;
  const { words, extensions, numbers, library, dates, maxResults } = input;

  const allParts = input.urls.map((url) => decomposeUrl(url, splitter));

  const patterns = expandCategory(
    allParts,
    library.patterns,
    patternDimensions(words, extensions, numbers),
    'patterns',
    maxResults,
    logger
  );
  if (patterns.isErr()) {
    return err(patterns.error);
  }

  if (dates === undefined) {
    logger?.info({ patterns: patterns.value.size }, 'Generated wordlist');
    return ok({ patterns: patterns.value });
  }

  const dateFormats = expandCategory(
    allParts,
    input.dateFormats ?? library.dateFormats,
    dateFormatDimensions(words, extensions, numbers, dates.years, dates.months, dates.days),
    'date-formats',
    maxResults,
    logger
  );
  if (dateFormats.isErr()) {
    return err(dateFormats.error);
  }

  logger?.info(
    { patterns: patterns.value.size, dateFormats: dateFormats.value.size },
    'Generated wordlist'
  );
  return ok({ patterns: patterns.value, 'date-formats': dateFormats.value });
};
