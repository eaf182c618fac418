/**
 * Wordlist Module - Range Parsers
 *
 * Turns range arguments into ordered token lists. Every parser accepts three
 * forms, checked in this order:
 * - "A-B": inclusive ascending range (reversed bounds give an empty list)
 * - "A,B,C": explicit list, order preserved
 * - "A": single value
 *
 * Year, month and day tokens are validated; number tokens are not.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidRangeError, type InvalidRangeError, type RangeKind } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DIGITS_PATTERN = /^\d+$/;
const YEAR_PATTERN = /^\d{4}$/;

const parseInteger = (token: string): number | null => {
  const trimmed = token.trim();
  return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
};

const inclusiveRange = (start: number, end: number): number[] => {
  const values: number[] = [];
  for (let value = start; value <= end; value++) {
    values.push(value);
  }
  return values;
};

/**
 * Splits "A-B" into its two bounds, or null when there are not exactly two.
 */
const splitBounds = (input: string): [string, string] | null => {
  const parts = input.split('-');
  if (parts.length !== 2) {
    return null;
  }
  const [start, end] = parts;
  return start !== undefined && end !== undefined ? [start, end] : null;
};

const padTwo = (value: number): string => String(value).padStart(2, '0');

/**
 * Shared parser for ranges with inclusive integer bounds, zero-padded to two digits.
 */
const parseBoundedRange = (
  kind: RangeKind,
  input: string,
  min: number,
  max: number
): Result<string[], InvalidRangeError> => {
  const inBounds = (value: number | null): value is number =>
    value !== null && value >= min && value <= max;

  if (input.includes('-')) {
    const bounds = splitBounds(input);
    const start = bounds !== null ? parseInteger(bounds[0]) : null;
    const end = bounds !== null ? parseInteger(bounds[1]) : null;

    if (!inBounds(start) || !inBounds(end)) {
      return err(createInvalidRangeError(kind, input));
    }
    return ok(inclusiveRange(start, end).map(padTwo));
  }

  if (input.includes(',')) {
    const values: number[] = [];
    for (const token of input.split(',')) {
      const value = parseInteger(token);
      if (!inBounds(value)) {
        return err(createInvalidRangeError(kind, input));
      }
      values.push(value);
    }
    return ok(values.map(padTwo));
  }

  const value = DIGITS_PATTERN.test(input) ? Number.parseInt(input, 10) : null;
  if (!inBounds(value)) {
    return err(createInvalidRangeError(kind, input));
  }
  return ok([padTwo(value)]);
};

// ─────────────────────────────────────────────────────────────────────────────
// Parsers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses a year range. Every year must be exactly four digits.
 *
 * @example parseYearRange('2019-2021') // ok(['2019', '2020', '2021'])
 */
export const parseYearRange = (input: string): Result<string[], InvalidRangeError> => {
  if (input.includes('-')) {
    const bounds = splitBounds(input);
    if (bounds === null || !YEAR_PATTERN.test(bounds[0]) || !YEAR_PATTERN.test(bounds[1])) {
      return err(createInvalidRangeError('year', input));
    }

    const start = Number.parseInt(bounds[0], 10);
    const end = Number.parseInt(bounds[1], 10);
    return ok(inclusiveRange(start, end).map((year) => String(year).padStart(4, '0')));
  }

  const years = input.split(',');
  if (!years.every((year) => YEAR_PATTERN.test(year))) {
    return err(createInvalidRangeError('year', input));
  }
  return ok(years);
};

/**
 * Parses a month range in [1, 12], zero-padded to two digits.
 */
export const parseMonthRange = (input: string): Result<string[], InvalidRangeError> =>
  parseBoundedRange('month', input, 1, 12);

/**
 * Parses a day range in [1, 31], zero-padded to two digits.
 * Days are not checked against month lengths.
 */
export const parseDayRange = (input: string): Result<string[], InvalidRangeError> =>
  parseBoundedRange('day', input, 1, 31);

/**
 * Parses the `$num` range.
 *
 * Only the hyphen form is checked (both bounds must be integers). List and
 * single values are taken verbatim, so arbitrary numeric suffixes such as
 * "001" pass through unchanged.
 */
export const parseNumberRange = (input: string): Result<string[], InvalidRangeError> => {
  if (input.includes('-')) {
    const bounds = splitBounds(input);
    const start = bounds !== null ? parseInteger(bounds[0]) : null;
    const end = bounds !== null ? parseInteger(bounds[1]) : null;

    if (start === null || end === null) {
      return err(createInvalidRangeError('number', input));
    }
    return ok(inclusiveRange(start, end).map(String));
  }

  return ok(input.split(','));
};
