/**
 * Extension catalogue repository.
 */

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { readValidatedFile } from './source-file.js';
import { ExtensionCatalogueSchema, type ExtensionCatalogue } from '../../core/types.js';

import type { SourceFileError } from '../../core/errors.js';

const validator = TypeCompiler.Compile(ExtensionCatalogueSchema);

/**
 * Loads the levelled extension catalogue. Missing sections are empty.
 */
export const loadExtensionCatalogue = async (
  filePath: string
): Promise<Result<ExtensionCatalogue, SourceFileError>> => {
  const result = await readValidatedFile(filePath, validator);
  if (result.isErr()) {
    return err(result.error);
  }

  return ok({
    backup: result.value.backup ?? {},
    compress: result.value.compress ?? {},
  });
};
