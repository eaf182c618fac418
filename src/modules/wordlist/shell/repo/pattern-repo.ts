/**
 * Pattern library repository.
 */

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { readValidatedFile } from './source-file.js';
import { PatternLibrarySchema, type PatternLibrary } from '../../core/types.js';

import type { SourceFileError } from '../../core/errors.js';

const validator = TypeCompiler.Compile(PatternLibrarySchema);

/**
 * Loads a pattern library from a JSON or YAML file.
 * A file without `date-formats` yields an empty date template list.
 */
export const loadPatternLibrary = async (
  filePath: string
): Promise<Result<PatternLibrary, SourceFileError>> => {
  const result = await readValidatedFile(filePath, validator);
  if (result.isErr()) {
    return err(result.error);
  }

  return ok({
    patterns: result.value.patterns,
    dateFormats: result.value['date-formats'] ?? [],
  });
};
