import { err, ok, type Result } from 'neverthrow';

import { readTextFile } from './source-file.js';

import type { SourceFileError } from '../../core/errors.js';

/**
 * Splits text into trimmed lines. A trailing newline does not add an entry.
 */
export const splitLines = (contents: string): string[] => {
  const lines = contents.split(/\r?\n/).map((line) => line.trim());
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
};

/**
 * Reads a word list, one word per line.
 */
export const readWordlist = async (
  filePath: string
): Promise<Result<string[], SourceFileError>> => {
  const contents = await readTextFile(filePath);
  if (contents.isErr()) {
    return err(contents.error);
  }
  return ok(splitLines(contents.value));
};
