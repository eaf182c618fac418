/**
 * Shared file loading for pattern, extension and word list sources.
 * Every failure is returned as a SourceFileError.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { formatSchemaErrors, type SourceFileError } from '../../core/errors.js';

import type { Static, TSchema } from '@sinclair/typebox';
import type { TypeCheck } from '@sinclair/typebox/compiler';

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Reads a UTF-8 text file.
 */
export const readTextFile = async (
  filePath: string
): Promise<Result<string, SourceFileError>> => {
  try {
    return ok(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `File not found at ${filePath}`,
        path: filePath,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read ${filePath}: ${errorMessage(error)}`,
      path: filePath,
    });
  }
};

/**
 * Parses file contents as YAML (.yaml/.yml) or JSON (anything else).
 */
export const parseStructured = (
  filePath: string,
  contents: string
): Result<unknown, SourceFileError> => {
  const format = YAML_EXTENSIONS.has(path.extname(filePath).toLowerCase()) ? 'YAML' : 'JSON';

  try {
    const parsed: unknown = format === 'YAML' ? parseYaml(contents) : JSON.parse(contents);
    return ok(parsed);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse ${format} at ${filePath}: ${errorMessage(error)}`,
      path: filePath,
    });
  }
};

/**
 * Reads, parses and validates a structured file against a compiled schema.
 */
export const readValidatedFile = async <T extends TSchema>(
  filePath: string,
  validator: TypeCheck<T>
): Promise<Result<Static<T>, SourceFileError>> => {
  const contents = await readTextFile(filePath);
  if (contents.isErr()) {
    return err(contents.error);
  }

  const parsed = parseStructured(filePath, contents.value);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const value = parsed.value;
  if (!validator.Check(value)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      path: filePath,
      details: formatSchemaErrors(validator.Errors(value)),
    });
  }

  return ok(value);
};
