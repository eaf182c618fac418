/**
 * Command line definition for fback.
 */

import { Command, InvalidArgumentError } from 'commander';

export const VERSION = '1.0.0';

export const BANNER = String.raw`
   __ _                _
  / _| |__   __ _  ___| | __
 | |_| '_ \ / _' |/ __| |/ /
 |  _| |_) | (_| | (__|   <
 |_| |_.__/ \__,_|\___|_|\_\

  backup file wordlist generator v${VERSION}
`;

/**
 * Parsed command line options.
 */
export type CliOptions = {
  pattern?: string;
  extensions?: string;
  output?: string;
  wordlist?: string;
  wordlistOnly: boolean;
  jsonOutput: boolean;
  levels: string;
  backupLevels?: string;
  compressLevels?: string;
  dateMethod: boolean;
  dateCustom?: string;
  dateDefault: boolean;
  yearRange: string;
  monthRange: string;
  dayRange: string;
  numberRange: string;
  maxResults?: number;
  silent: boolean;
};

const parsePositiveInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

/**
 * Builds the commander program. Source URLs are read from stdin.
 */
export const createProgram = (): Command =>
  new Command()
    .name('fback')
    .description(
      'Generates wordlists of candidate backup-file paths from URLs read on stdin.'
    )
    .version(VERSION)
    // Input
    .option('-p, --pattern <file>', 'pattern file, JSON or YAML (default: bundled patterns.json)')
    .option(
      '-e, --extensions <file>',
      'extension catalogue with levels (default: bundled extensions.json)'
    )
    .option('-w, --wordlist <file>', 'word list used for $word, one word per line')
    // Output
    .option('-o, --output <file>', 'write the result to a file instead of stdout')
    .option('--wordlist-only', 'emit bare paths instead of URLs', false)
    .option('-j, --json-output', 'emit the candidates per category as JSON', false)
    // Levels
    .option('-l, --levels <levels>', 'backup and compress extension levels', '1,2')
    .option('--backup-levels <levels>', 'backup extension levels only')
    .option('--compress-levels <levels>', 'compress extension levels only')
    // Dates
    .option('-d, --date-method', 'enable date templates', false)
    .option('--date-custom <formats>', "comma-separated date templates, e.g. '$full_domain.%y-%m-%d.$ext'")
    .option('--date-default', "use the pattern file's date-formats", false)
    .option('--year-range <range>', 'years for %y', '2019-2022')
    .option('--month-range <range>', 'months for %m [1-12]', '2,3')
    .option('--day-range <range>', 'days for %d [1-31]', '1-3')
    // Other
    .option('-n, --number-range <range>', 'values for $num', '1,2')
    .option('--max-results <n>', 'fail when a category exceeds n candidates', parsePositiveInteger)
    .option('-s, --silent', 'do not print the banner', false);
