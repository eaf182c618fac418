import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { DEFAULT_EXTENSIONS_FILE, DEFAULT_PATTERNS_FILE } from '@/infra/config/env.js';
import { loadExtensionCatalogue } from '@/modules/wordlist/shell/repo/extension-repo.js';
import { loadPatternLibrary } from '@/modules/wordlist/shell/repo/pattern-repo.js';
import { readWordlist, splitLines } from '@/modules/wordlist/shell/repo/wordlist-reader.js';

const makeTempDir = async (): Promise<string> => {
  return mkdtemp(path.join(tmpdir(), 'fback-'));
};

const writeSourceFile = async (dir: string, name: string, contents: string): Promise<string> => {
  const filePath = path.join(dir, name);
  await writeFile(filePath, contents, 'utf8');
  return filePath;
};

describe('pattern repo', () => {
  it('loads the bundled pattern library', async () => {
    const library = (await loadPatternLibrary(DEFAULT_PATTERNS_FILE))._unsafeUnwrap();

    expect(library.patterns).toHaveLength(21);
    expect(library.patterns[0]).toBe('$domain_name.$ext');
    expect(library.dateFormats).toHaveLength(5);
  });

  it('loads a YAML pattern file without date formats', async () => {
    const dir = await makeTempDir();
    const filePath = await writeSourceFile(dir, 'patterns.yaml', 'patterns:\n  - "$word.$ext"\n');

    const result = await loadPatternLibrary(filePath);

    expect(result._unsafeUnwrap()).toEqual({ patterns: ['$word.$ext'], dateFormats: [] });
  });

  it('reports a missing file', async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, 'missing.json');

    const result = await loadPatternLibrary(filePath);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'NotFound',
      message: `File not found at ${filePath}`,
      path: filePath,
    });
  });

  it('reports malformed JSON', async () => {
    const dir = await makeTempDir();
    const filePath = await writeSourceFile(dir, 'patterns.json', '{"patterns": [');

    const error = (await loadPatternLibrary(filePath))._unsafeUnwrapErr();

    expect(error.type).toBe('ParseError');
    expect(error.message.startsWith(`Failed to parse JSON at ${filePath}: `)).toBe(true);
  });

  it('reports a file that does not match the schema', async () => {
    const dir = await makeTempDir();
    const filePath = await writeSourceFile(dir, 'patterns.json', '{"patterns": [1]}');

    const error = (await loadPatternLibrary(filePath))._unsafeUnwrapErr();

    expect(error.type).toBe('SchemaValidationError');
    expect(error.message).toBe(`Schema validation failed for ${filePath}`);
  });
});

describe('extension repo', () => {
  it('loads the bundled catalogue', async () => {
    const catalogue = (await loadExtensionCatalogue(DEFAULT_EXTENSIONS_FILE))._unsafeUnwrap();

    expect(catalogue.backup['level1']).toEqual(['bak', 'old', 'backup', 'swp', '~']);
    expect(catalogue.compress['level1']).toEqual(['zip', 'tar.gz']);
  });

  it('treats missing sections as empty', async () => {
    const dir = await makeTempDir();
    const filePath = await writeSourceFile(dir, 'ext.json', '{"backup": {"level1": ["bak"]}}');

    const result = await loadExtensionCatalogue(filePath);

    expect(result._unsafeUnwrap()).toEqual({ backup: { level1: ['bak'] }, compress: {} });
  });
});

describe('wordlist reader', () => {
  it('splits trimmed lines without a trailing empty entry', () => {
    expect(splitLines('site\r\n backup \n\nadmin\n')).toEqual(['site', 'backup', '', 'admin']);
  });

  it('reads words from a file', async () => {
    const dir = await makeTempDir();
    const filePath = await writeSourceFile(dir, 'words.txt', 'site\nbackup\n');

    expect((await readWordlist(filePath))._unsafeUnwrap()).toEqual(['site', 'backup']);
  });
});
