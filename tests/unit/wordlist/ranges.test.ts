/**
 * Unit tests for range parsers
 */

import { describe, expect, it } from 'vitest';

import {
  parseDayRange,
  parseMonthRange,
  parseNumberRange,
  parseYearRange,
} from '@/modules/wordlist/core/ranges.js';

describe('parseYearRange', () => {
  it('expands an inclusive range', () => {
    expect(parseYearRange('2019-2022')._unsafeUnwrap()).toEqual(['2019', '2020', '2021', '2022']);
  });

  it('returns an empty list for reversed bounds', () => {
    expect(parseYearRange('2020-2019')._unsafeUnwrap()).toEqual([]);
  });

  it('keeps list order', () => {
    expect(parseYearRange('2021,2018')._unsafeUnwrap()).toEqual(['2021', '2018']);
  });

  it('accepts a single year', () => {
    expect(parseYearRange('2021')._unsafeUnwrap()).toEqual(['2021']);
  });

  it('rejects years that are not four digits', () => {
    const result = parseYearRange('21');

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'InvalidRangeError',
      message: "Invalid year range '21'. Use 'YYYY-YYYY' or 'YYYY,YYYY'.",
      kind: 'year',
      input: '21',
    });
  });

  it('rejects malformed ranges and lists', () => {
    expect(parseYearRange('2019-22').isErr()).toBe(true);
    expect(parseYearRange('2019-2020-2021').isErr()).toBe(true);
    expect(parseYearRange('2019,20').isErr()).toBe(true);
    expect(parseYearRange('abcd').isErr()).toBe(true);
  });
});

describe('parseMonthRange', () => {
  it('zero-pads months', () => {
    expect(parseMonthRange('2,3')._unsafeUnwrap()).toEqual(['02', '03']);
    expect(parseMonthRange('1-3')._unsafeUnwrap()).toEqual(['01', '02', '03']);
    expect(parseMonthRange('02')._unsafeUnwrap()).toEqual(['02']);
    expect(parseMonthRange('12')._unsafeUnwrap()).toEqual(['12']);
  });

  it('rejects months out of bounds', () => {
    const result = parseMonthRange('13');

    expect(result._unsafeUnwrapErr().kind).toBe('month');
    expect(parseMonthRange('0').isErr()).toBe(true);
    expect(parseMonthRange('1-13').isErr()).toBe(true);
    expect(parseMonthRange('6,13').isErr()).toBe(true);
  });

  it('rejects non-numeric months', () => {
    expect(parseMonthRange('feb').isErr()).toBe(true);
    expect(parseMonthRange('3-').isErr()).toBe(true);
  });

  it('returns an empty list for reversed bounds', () => {
    expect(parseMonthRange('5-3')._unsafeUnwrap()).toEqual([]);
  });
});

describe('parseDayRange', () => {
  it('accepts day 31 without month context', () => {
    expect(parseDayRange('31')._unsafeUnwrap()).toEqual(['31']);
  });

  it('zero-pads days', () => {
    expect(parseDayRange('1-3')._unsafeUnwrap()).toEqual(['01', '02', '03']);
    expect(parseDayRange('30,31')._unsafeUnwrap()).toEqual(['30', '31']);
  });

  it('rejects days out of bounds', () => {
    const result = parseDayRange('32');

    expect(result._unsafeUnwrapErr().message).toBe(
      "Invalid day range '32'. Use 'dd-dd' or 'dd,dd' with days between 1 and 31."
    );
    expect(parseDayRange('0-5').isErr()).toBe(true);
  });
});

describe('parseNumberRange', () => {
  it('expands an inclusive range without padding', () => {
    expect(parseNumberRange('1-3')._unsafeUnwrap()).toEqual(['1', '2', '3']);
    expect(parseNumberRange('08-10')._unsafeUnwrap()).toEqual(['8', '9', '10']);
  });

  it('returns an empty list for reversed bounds', () => {
    expect(parseNumberRange('3-1')._unsafeUnwrap()).toEqual([]);
  });

  it('takes lists and single values verbatim', () => {
    expect(parseNumberRange('1,2')._unsafeUnwrap()).toEqual(['1', '2']);
    expect(parseNumberRange('001')._unsafeUnwrap()).toEqual(['001']);
  });

  it('rejects non-integer range bounds', () => {
    const result = parseNumberRange('a-b');

    expect(result._unsafeUnwrapErr().kind).toBe('number');
    expect(parseNumberRange('-5').isErr()).toBe(true);
  });
});
