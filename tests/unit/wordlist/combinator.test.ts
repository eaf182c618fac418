/**
 * Unit tests for the combinator
 *
 * Tests cover:
 * - Cartesian expansion of $word, $ext and $num
 * - Filtering of unresolved placeholders
 * - Date expansion over years, months and days
 * - Equality with the plain nested loop
 */

import { describe, expect, it } from 'vitest';

import {
  candidates,
  expandDateFormats,
  expandPatterns,
  isResolved,
  patternDimensions,
} from '@/modules/wordlist/core/combinator.js';

/**
 * Reference expansion: every combination, every substitution, then filter.
 */
const naiveExpandPatterns = (
  templates: string[],
  words: string[],
  extensions: string[],
  numbers: string[]
): Set<string> => {
  const results = new Set<string>();
  for (const template of templates) {
    for (const word of words) {
      for (const ext of extensions) {
        for (const num of numbers) {
          const candidate = template
            .split('$word')
            .join(word)
            .split('$ext')
            .join(ext)
            .split('$num')
            .join(num);
          if (!candidate.includes('$') && !candidate.includes('%')) {
            results.add(candidate);
          }
        }
      }
    }
  }
  return results;
};

describe('expandPatterns', () => {
  it('expands every combination of the declared placeholders', () => {
    const result = expandPatterns(['$word.$ext'], ['site', 'db'], ['bak', 'zip'], ['1', '2']);

    expect(result).toEqual(new Set(['site.bak', 'site.zip', 'db.bak', 'db.zip']));
  });

  it('substitutes numbers', () => {
    const result = expandPatterns(['$word$num.$ext'], ['site'], ['bak'], ['1', '2']);

    expect(result).toEqual(new Set(['site1.bak', 'site2.bak']));
  });

  it('is unaffected by dimensions a template does not use', () => {
    const few = expandPatterns(['$word.$ext'], ['site'], ['bak'], ['1']);
    const many = expandPatterns(['$word.$ext'], ['site'], ['bak'], ['1', '2', '3', '4']);

    expect(many).toEqual(few);
  });

  it('drops candidates with unresolved placeholders', () => {
    const result = expandPatterns(['$unknown.$ext', '$word.$ext'], ['site'], ['bak'], ['1']);

    expect(result).toEqual(new Set(['site.bak']));
    expect(result.has('$unknown.bak')).toBe(false);
  });

  it('drops date placeholders outside date mode', () => {
    expect(expandPatterns(['$word.%y.$ext'], ['site'], ['bak'], ['1']).size).toBe(0);
  });

  it('drops candidates whose values introduce a marker', () => {
    expect(expandPatterns(['$word.$ext'], ['100%'], ['bak'], ['1']).size).toBe(0);
  });

  it('substitutes tokens introduced by earlier values', () => {
    expect(expandPatterns(['$word'], ['$ext'], ['bak'], ['1'])).toEqual(new Set(['bak']));
  });

  it('produces nothing when a dimension is empty', () => {
    expect(expandPatterns(['backup.zip'], [], ['bak'], ['1']).size).toBe(0);
  });

  it('keeps literal templates', () => {
    expect(expandPatterns(['backup.zip'], ['site'], ['bak'], ['1'])).toEqual(
      new Set(['backup.zip'])
    );
  });

  it('matches the plain nested loop', () => {
    const templates = [
      '$word.$ext',
      '$word$num.$ext',
      'config.php.$ext.$num',
      '$word~',
      '$unknown.$ext',
      '/app/$word/$word.$ext',
      'static.txt',
    ];
    const words = ['site', 'backup', '$num', ''];
    const extensions = ['bak', 'tar.gz', '~'];
    const numbers = ['1', '2', '01'];

    expect(expandPatterns(templates, words, extensions, numbers)).toEqual(
      naiveExpandPatterns(templates, words, extensions, numbers)
    );
  });
});

describe('expandDateFormats', () => {
  it('expands years, months and days', () => {
    const result = expandDateFormats(
      ['example.%y-%m-%d.$ext'],
      ['site'],
      ['bak'],
      ['1'],
      ['2020', '2021'],
      ['01'],
      ['01', '02']
    );

    expect(result).toEqual(
      new Set([
        'example.2020-01-01.bak',
        'example.2020-01-02.bak',
        'example.2021-01-01.bak',
        'example.2021-01-02.bak',
      ])
    );
  });

  it('collapses templates that use only some date parts', () => {
    const result = expandDateFormats(
      ['example.%y.$ext'],
      ['site'],
      ['bak'],
      ['1'],
      ['2020'],
      ['01', '02', '03'],
      ['01', '02']
    );

    expect(result).toEqual(new Set(['example.2020.bak']));
  });

  it('produces nothing when a date range is empty', () => {
    const result = expandDateFormats(['$word.$ext'], ['site'], ['bak'], ['1'], [], ['01'], ['01']);

    expect(result.size).toBe(0);
  });
});

describe('candidates', () => {
  it('yields duplicates for the caller to absorb', () => {
    const yielded = [
      ...candidates(['x.$ext', 'x.$ext'], patternDimensions(['site'], ['bak'], ['1'])),
    ];

    expect(yielded).toEqual(['x.bak', 'x.bak']);
  });
});

describe('isResolved', () => {
  it('rejects any dollar or percent sign', () => {
    expect(isResolved('site.bak')).toBe(true);
    expect(isResolved('site.$ext')).toBe(false);
    expect(isResolved('50%.bak')).toBe(false);
  });
});
