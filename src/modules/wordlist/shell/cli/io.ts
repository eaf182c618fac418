/**
 * Node process implementation of the CLI boundary.
 */

import { writeFile } from 'node:fs/promises';
import { text } from 'node:stream/consumers';

import { err, ok, type Result } from 'neverthrow';

import { createCliInputError, type WordlistError } from '../../core/errors.js';
import { splitLines } from '../repo/wordlist-reader.js';

import type { CliIo } from './run.js';

export const nodeCliIo: CliIo = {
  async readInput(): Promise<Result<string[], WordlistError>> {
    if (process.stdin.isTTY) {
      return err(createCliInputError('stdin', 'No input provided via stdin'));
    }
    return ok(splitLines(await text(process.stdin)));
  },

  writeStdout(output: string): void {
    process.stdout.write(output);
  },

  writeStderr(output: string): void {
    process.stderr.write(output);
  },

  async writeFile(path: string, output: string): Promise<void> {
    await writeFile(path, output, 'utf8');
  },
};
