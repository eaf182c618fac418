/**
 * CLI run flow: option parsing, input loading, generation and output.
 *
 * All failures surface as one "Error: <message>" line on stderr and exit code 1.
 */

import { CommanderError } from 'commander';
import { err, ok, type Result } from 'neverthrow';

import { createProgram, BANNER, type CliOptions } from './program.js';
import {
  createCliInputError,
  describeError,
  type InvalidRangeError,
  type WordlistError,
} from '../../core/errors.js';
import { parseLevels, selectExtensions } from '../../core/extensions.js';
import { normalizeSourceUrls, renderOutput } from '../../core/output.js';
import {
  parseDayRange,
  parseMonthRange,
  parseNumberRange,
  parseYearRange,
} from '../../core/ranges.js';
import { generateWordlist, type GenerateWordlistInput } from '../../core/usecases/generate-wordlist.js';
import { tldtsSplitter } from '../domain/tldts-splitter.js';
import { loadExtensionCatalogue } from '../repo/extension-repo.js';
import { loadPatternLibrary } from '../repo/pattern-repo.js';
import { readWordlist } from '../repo/wordlist-reader.js';

import type { DomainSplitter } from '../../core/ports.js';
import type { DateRanges, ExtensionSelection, PatternLibrary } from '../../core/types.js';
import type { AppConfig } from '../../../../infra/config/env.js';
import type { Logger } from '../../../../infra/logger/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Process boundary the CLI talks to.
 */
export interface CliIo {
  /** Source URL lines from stdin, or CliInputError when stdin is a terminal */
  readInput(): Promise<Result<string[], WordlistError>>;
  writeStdout(text: string): void;
  writeStderr(text: string): void;
  writeFile(path: string, text: string): Promise<void>;
}

export interface RunCliDeps {
  io: CliIo;
  config: AppConfig;
  logger: Logger;
  splitter?: DomainSplitter;
}

interface RunPlan {
  input: GenerateWordlistInput;
  json: boolean;
  wordlistOnly: boolean;
  output: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Extension selection precedence: backup levels, then compress levels, then both.
 */
export const resolveExtensionSelection = (options: CliOptions): ExtensionSelection => {
  if (options.backupLevels !== undefined) {
    return { kind: 'backup', levels: parseLevels(options.backupLevels) };
  }
  if (options.compressLevels !== undefined) {
    return { kind: 'compress', levels: parseLevels(options.compressLevels) };
  }
  return { kind: 'all', levels: parseLevels(options.levels) };
};

/**
 * Date templates in date mode: the library's with --date-default, otherwise
 * the --date-custom list, otherwise none.
 */
export const resolveDateFormats = (
  options: CliOptions,
  library: PatternLibrary
): readonly string[] => {
  if (options.dateDefault) {
    return library.dateFormats;
  }
  if (options.dateCustom !== undefined) {
    return options.dateCustom.split(',');
  }
  return [];
};

const parseDateRanges = (options: CliOptions): Result<DateRanges, InvalidRangeError> =>
  parseYearRange(options.yearRange).andThen((years) =>
    parseMonthRange(options.monthRange).andThen((months) =>
      parseDayRange(options.dayRange).map((days) => ({ years, months, days }))
    )
  );

/**
 * Loads every input the run needs, in the order a user fixes them:
 * stdin, pattern file, extension file, word list, then ranges.
 */
const prepareRun = async (
  options: CliOptions,
  deps: RunCliDeps
): Promise<Result<RunPlan, WordlistError>> => {
  const { io, config, logger } = deps;

  const lines = await io.readInput();
  if (lines.isErr()) {
    return err(lines.error);
  }
  const urls = normalizeSourceUrls(lines.value);

  const library = await loadPatternLibrary(options.pattern ?? config.sources.patternsFile);
  if (library.isErr()) {
    return err(library.error);
  }

  const catalogue = await loadExtensionCatalogue(
    options.extensions ?? config.sources.extensionsFile
  );
  if (catalogue.isErr()) {
    return err(catalogue.error);
  }

  if (options.wordlist === undefined) {
    return err(createCliInputError('wordlist', 'Wordlist file not provided (use --wordlist)'));
  }
  const words = await readWordlist(options.wordlist);
  if (words.isErr()) {
    return err(words.error);
  }

  const numbers = parseNumberRange(options.numberRange);
  if (numbers.isErr()) {
    return err(numbers.error);
  }

  const extensions = selectExtensions(catalogue.value, resolveExtensionSelection(options));

  let dates: DateRanges | undefined;
  if (options.dateMethod) {
    const parsed = parseDateRanges(options);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    dates = parsed.value;
  }

  logger.debug(
    {
      urls: urls.length,
      words: words.value.length,
      extensions: extensions.length,
      numbers: numbers.value.length,
      dateMode: dates !== undefined,
    },
    'Loaded inputs'
  );

  const input: GenerateWordlistInput = {
    urls,
    words: words.value,
    extensions,
    numbers: numbers.value,
    library: library.value,
  };
  if (dates !== undefined) {
    input.dates = dates;
    input.dateFormats = resolveDateFormats(options, library.value);
  }
  const maxResults = options.maxResults ?? config.generation.maxResults;
  if (maxResults !== undefined) {
    input.maxResults = maxResults;
  }

  return ok({
    input,
    json: options.jsonOutput,
    wordlistOnly: options.wordlistOnly,
    output: options.output,
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Entry
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Runs the CLI against the given user arguments.
 *
 * @param args - Arguments without the node and script entries
 * @returns Process exit code
 */
export const runCli = async (args: readonly string[], deps: RunCliDeps): Promise<number> => {
  const { io, logger } = deps;

  const program = createProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        io.writeStdout(text);
      },
      writeErr: (text) => {
        io.writeStderr(text);
      },
    });

  try {
    program.parse([...args], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();

  if (!options.silent && options.output === undefined) {
    io.writeStderr(`${BANNER}\n`);
  }

  const plan = await prepareRun(options, deps);
  if (plan.isErr()) {
    io.writeStderr(`Error: ${describeError(plan.error)}\n`);
    return 1;
  }

  const { input, json, wordlistOnly, output } = plan.value;
  const generated = generateWordlist(
    { splitter: deps.splitter ?? tldtsSplitter, logger },
    input
  );
  if (generated.isErr()) {
    io.writeStderr(`Error: ${describeError(generated.error)}\n`);
    return 1;
  }

  const text = renderOutput(input.urls, generated.value, { json, wordlistOnly });

  if (output !== undefined) {
    await io.writeFile(output, text);
    logger.info({ output }, 'Wrote wordlist');
  } else if (text !== '') {
    io.writeStdout(`${text}\n`);
  }

  return 0;
};
