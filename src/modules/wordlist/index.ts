/**
 * Wordlist Module - Public API
 *
 * Generates candidate backup-file paths from source URLs and template patterns.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  UrlParts,
  DomainSplit,
  UrlPlaceholder,
  PatternLibrary,
  PatternLibraryDTO,
  ExtensionCatalogue,
  ExtensionCatalogueDTO,
  ExtensionSelection,
  WordlistCategory,
  DateRanges,
  GeneratedWordlist,
  AssembleOptions,
} from './core/types.js';

export {
  URL_PLACEHOLDERS,
  WORD_PLACEHOLDER,
  EXTENSION_PLACEHOLDER,
  NUMBER_PLACEHOLDER,
  YEAR_PLACEHOLDER,
  MONTH_PLACEHOLDER,
  DAY_PLACEHOLDER,
  PatternLibrarySchema,
  ExtensionCatalogueSchema,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  RangeKind,
  InvalidRangeError,
  ResultLimitExceededError,
  GenerateError,
  SourceFileError,
  CliInputError,
  WordlistError,
} from './core/errors.js';

export {
  createInvalidRangeError,
  createResultLimitExceededError,
  createCliInputError,
  describeError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { DomainSplitter, WordlistLogger } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export { decomposeUrl, extractFileName } from './core/url-parts.js';
export { formatPattern, formatPatterns, collapseSeparators } from './core/formatter.js';
export {
  candidates,
  expandPatterns,
  expandDateFormats,
  patternDimensions,
  dateFormatDimensions,
  type ExpansionDimension,
} from './core/combinator.js';
export {
  parseYearRange,
  parseMonthRange,
  parseDayRange,
  parseNumberRange,
} from './core/ranges.js';
export { parseLevels, selectExtensions } from './core/extensions.js';
export {
  normalizeSourceUrls,
  joinUrl,
  toWordlistEntry,
  assembleLines,
  serializeJson,
  renderOutput,
  type RenderOptions,
} from './core/output.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  generateWordlist,
  type GenerateWordlistDeps,
  type GenerateWordlistInput,
} from './core/usecases/generate-wordlist.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Domain Splitting
// ─────────────────────────────────────────────────────────────────────────────

export { tldtsSplitter } from './shell/domain/tldts-splitter.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repositories
// ─────────────────────────────────────────────────────────────────────────────

export { loadPatternLibrary } from './shell/repo/pattern-repo.js';
export { loadExtensionCatalogue } from './shell/repo/extension-repo.js';
export { readWordlist, splitLines } from './shell/repo/wordlist-reader.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - CLI
// ─────────────────────────────────────────────────────────────────────────────

export { createProgram, BANNER, VERSION, type CliOptions } from './shell/cli/program.js';
export {
  runCli,
  resolveExtensionSelection,
  resolveDateFormats,
  type CliIo,
  type RunCliDeps,
} from './shell/cli/run.js';
export { nodeCliIo } from './shell/cli/io.js';
