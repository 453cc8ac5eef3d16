import { describe, expect, it } from 'vitest';

import { localDate, localDateTime, localTime } from '../../src/metadata/local-time.js';
import { isAbsent, normalize, valuesMatch } from '../../src/metadata/values.js';

describe('value normalization', () => {
  it('collapses missing and empty values to absent', () => {
    expect(normalize(null)).toEqual({ kind: 'absent' });
    expect(normalize(undefined)).toEqual({ kind: 'absent' });
    expect(normalize('')).toEqual({ kind: 'absent' });
    expect(normalize([])).toEqual({ kind: 'absent' });
    expect(normalize(new Set<string>())).toEqual({ kind: 'absent' });
  });

  it('keeps scalars as scalars', () => {
    expect(normalize('Alice')).toEqual({ kind: 'text', value: 'Alice' });
    expect(normalize(640)).toEqual({ kind: 'integer', value: 640 });
    expect(normalize(0)).toEqual({ kind: 'integer', value: 0 });
  });

  it('turns lists into sets', () => {
    expect(normalize(['a', 'b', 'a'])).toEqual({ kind: 'text-set', values: new Set(['a', 'b']) });
  });

  it('reports absence', () => {
    expect(isAbsent('')).toBe(true);
    expect(isAbsent(' ')).toBe(false);
    expect(isAbsent(0)).toBe(false);
  });
});

describe('valuesMatch', () => {
  it('treats empty and missing as equal', () => {
    expect(valuesMatch('', undefined)).toBe(true);
    expect(valuesMatch([], null)).toBe(true);
    expect(valuesMatch(new Set<string>(), [])).toBe(true);
  });

  it('ignores list order', () => {
    expect(valuesMatch(['beach', 'sunset'], ['sunset', 'beach'])).toBe(true);
    expect(valuesMatch(new Set(['beach', 'sunset']), ['sunset', 'beach'])).toBe(true);
  });

  it('compares list contents', () => {
    expect(valuesMatch(['beach'], ['beach', 'sunset'])).toBe(false);
    expect(valuesMatch(['Beach'], ['beach'])).toBe(false);
  });

  it('does not equate a scalar with a one-item list', () => {
    expect(valuesMatch('beach', ['beach'])).toBe(false);
  });

  it('compares scalars by kind and value', () => {
    expect(valuesMatch('Alice', 'Alice')).toBe(true);
    expect(valuesMatch('Alice', 'Bob')).toBe(false);
    expect(valuesMatch(640, 640)).toBe(true);
    expect(valuesMatch(640, '640')).toBe(false);
    expect(valuesMatch('x', null)).toBe(false);
  });

  it('compares calendar values field by field', () => {
    expect(valuesMatch(localDateTime(2020, 1, 2, 3, 4, 5), localDateTime(2020, 1, 2, 3, 4, 5))).toBe(
      true
    );
    expect(valuesMatch(localDateTime(2020, 1, 2, 3, 4, 5), localDateTime(2020, 1, 2, 3, 4, 6))).toBe(
      false
    );
    expect(valuesMatch(localDate(2020, 1, 2), localDate(2020, 1, 2))).toBe(true);
    expect(valuesMatch(localTime(3, 4, 5), localTime(3, 4, 5))).toBe(true);
    expect(valuesMatch(localDate(2020, 1, 2), localDateTime(2020, 1, 2))).toBe(false);
  });
});
