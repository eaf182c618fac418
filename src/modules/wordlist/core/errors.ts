/**
 * Wordlist Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { WordlistCategory } from './types.js';
import type { ValueError } from '@sinclair/typebox/errors';

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

export type RangeKind = 'year' | 'month' | 'day' | 'number';

/**
 * A range argument does not follow its grammar or is out of bounds.
 */
export interface InvalidRangeError {
  readonly type: 'InvalidRangeError';
  readonly message: string;
  readonly kind: RangeKind;
  readonly input: string;
}

/**
 * A category grew beyond the configured result cap.
 */
export interface ResultLimitExceededError {
  readonly type: 'ResultLimitExceededError';
  readonly message: string;
  readonly limit: number;
  readonly category: WordlistCategory;
}

export type GenerateError = ResultLimitExceededError;

// ─────────────────────────────────────────────────────────────────────────────
// Source File Errors
// ─────────────────────────────────────────────────────────────────────────────

export type SourceFileError =
  | { readonly type: 'NotFound'; readonly message: string; readonly path: string }
  | { readonly type: 'ReadError'; readonly message: string; readonly path: string }
  | { readonly type: 'ParseError'; readonly message: string; readonly path: string }
  | {
      readonly type: 'SchemaValidationError';
      readonly message: string;
      readonly path: string;
      readonly details: string[];
    };

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A required input (stdin URLs or the word list option) is missing.
 */
export interface CliInputError {
  readonly type: 'CliInputError';
  readonly message: string;
  readonly input: 'stdin' | 'wordlist';
}

/**
 * All possible wordlist module errors.
 */
export type WordlistError = InvalidRangeError | GenerateError | SourceFileError | CliInputError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

const RANGE_GRAMMAR: Record<RangeKind, string> = {
  year: "Use 'YYYY-YYYY' or 'YYYY,YYYY'.",
  month: "Use 'mm-mm' or 'mm,mm' with months between 1 and 12.",
  day: "Use 'dd-dd' or 'dd,dd' with days between 1 and 31.",
  number: "Use 'N-M' or 'N,M'.",
};

export const createInvalidRangeError = (kind: RangeKind, input: string): InvalidRangeError => ({
  type: 'InvalidRangeError',
  message: `Invalid ${kind} range '${input}'. ${RANGE_GRAMMAR[kind]}`,
  kind,
  input,
});

export const createResultLimitExceededError = (
  limit: number,
  category: WordlistCategory
): ResultLimitExceededError => ({
  type: 'ResultLimitExceededError',
  message: `Generated more than ${String(limit)} ${category} candidates. Narrow the inputs or raise the limit.`,
  limit,
  category,
});

export const createCliInputError = (
  input: CliInputError['input'],
  message: string
): CliInputError => ({
  type: 'CliInputError',
  message,
  input,
});

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

/**
 * Renders an error as a single line, including schema details when present.
 */
export const describeError = (error: WordlistError): string => {
  if (error.type === 'SchemaValidationError' && error.details.length > 0) {
    return `${error.message} (${error.details.join('; ')})`;
  }
  return error.message;
};
