/**
 * Wordlist Module - Combinator
 *
 * Expands word, extension, number and date placeholders over the Cartesian
 * product of their value lists and keeps only fully resolved candidates.
 *
 * Substitution order is fixed: $word, $ext, $num, then %y, %m, %d. A dimension
 * whose token no longer appears in the partially substituted string is not
 * iterated, since every one of its values would render the same candidate.
 * The resulting set equals that of the plain nested loop.
 */

import { replaceToken } from './formatter.js';
import {
  DAY_PLACEHOLDER,
  EXTENSION_PLACEHOLDER,
  MONTH_PLACEHOLDER,
  NUMBER_PLACEHOLDER,
  UNRESOLVED_MARKERS,
  WORD_PLACEHOLDER,
  YEAR_PLACEHOLDER,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One substitution dimension: a token and the values it takes.
 */
export interface ExpansionDimension {
  readonly token: string;
  readonly values: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Dimensions
// ─────────────────────────────────────────────────────────────────────────────

export const patternDimensions = (
  words: readonly string[],
  extensions: readonly string[],
  numbers: readonly string[]
): ExpansionDimension[] => [
  { token: WORD_PLACEHOLDER, values: words },
  { token: EXTENSION_PLACEHOLDER, values: extensions },
  { token: NUMBER_PLACEHOLDER, values: numbers },
];

export const dateFormatDimensions = (
  words: readonly string[],
  extensions: readonly string[],
  numbers: readonly string[],
  years: readonly string[],
  months: readonly string[],
  days: readonly string[]
): ExpansionDimension[] => [
  ...patternDimensions(words, extensions, numbers),
  { token: YEAR_PLACEHOLDER, values: years },
  { token: MONTH_PLACEHOLDER, values: months },
  { token: DAY_PLACEHOLDER, values: days },
];

// ─────────────────────────────────────────────────────────────────────────────
// Expansion
// ─────────────────────────────────────────────────────────────────────────────

/**
 * True when no placeholder marker is left in the candidate.
 */
export const isResolved = (candidate: string): boolean =>
  UNRESOLVED_MARKERS.every((marker) => !candidate.includes(marker));

function* expandFrom(
  current: string,
  dimensions: readonly ExpansionDimension[],
  index: number
): Generator<string> {
  const dimension = dimensions[index];

  if (dimension === undefined) {
    if (isResolved(current)) {
      yield current;
    }
    return;
  }

  if (!current.includes(dimension.token)) {
    yield* expandFrom(current, dimensions, index + 1);
    return;
  }

  for (const value of dimension.values) {
    yield* expandFrom(replaceToken(current, dimension.token, value), dimensions, index + 1);
  }
}

/**
 * Lazily yields resolved candidates for every template.
 *
 * Duplicates are possible; callers deduplicate. An empty value list in any
 * dimension empties the product, so nothing is yielded.
 */
export function* candidates(
  templates: readonly string[],
  dimensions: readonly ExpansionDimension[]
): Generator<string> {
  if (dimensions.some((dimension) => dimension.values.length === 0)) {
    return;
  }

  for (const template of templates) {
    yield* expandFrom(template, dimensions, 0);
  }
}

/**
 * Expands templates over words, extensions and numbers.
 */
export const expandPatterns = (
  templates: readonly string[],
  words: readonly string[],
  extensions: readonly string[],
  numbers: readonly string[]
): Set<string> => new Set(candidates(templates, patternDimensions(words, extensions, numbers)));

/**
 * Expands date templates over words, extensions, numbers, years, months and days.
 */
export const expandDateFormats = (
  templates: readonly string[],
  words: readonly string[],
  extensions: readonly string[],
  numbers: readonly string[],
  years: readonly string[],
  months: readonly string[],
  days: readonly string[]
): Set<string> =>
  new Set(
    candidates(templates, dateFormatDimensions(words, extensions, numbers, years, months, days))
  );
