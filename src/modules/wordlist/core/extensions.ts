/**
 * Wordlist Module - Extension Levels
 *
 * Picks extensions from the levelled catalogue.
 */

import type { ExtensionCatalogue, ExtensionSelection } from './types.js';

/**
 * Splits a comma-separated level list ("1,2") into level names.
 */
export const parseLevels = (input: string): string[] =>
  input
    .split(',')
    .map((level) => level.trim())
    .filter((level) => level !== '');

const levelEntries = (
  levels: Readonly<Record<string, readonly string[]>>,
  level: string
): readonly string[] => levels[`level${level}`] ?? [];

/**
 * Collects extensions for the selected levels, in level order.
 * Levels missing from the catalogue contribute nothing. Duplicates are kept;
 * the combinator's set semantics absorb them.
 */
export const selectExtensions = (
  catalogue: ExtensionCatalogue,
  selection: ExtensionSelection
): string[] => {
  const extensions: string[] = [];

  for (const level of selection.levels) {
    if (selection.kind !== 'compress') {
      extensions.push(...levelEntries(catalogue.backup, level));
    }
    if (selection.kind !== 'backup') {
      extensions.push(...levelEntries(catalogue.compress, level));
    }
  }

  return extensions;
};
