/**
 * Aggregate Helper Tests
 */

import { describe, it, expect } from 'vitest';
import {
  GROUP_SEPARATOR,
  decadeLabel,
  decadeOf,
  groupBy,
  groupConcat,
  maxBy,
  roundedMean,
} from '../aggregates.js';

describe('groupBy', () => {
  it('should keep first-appearance order of keys and items', () => {
    const groups = groupBy(['b1', 'a1', 'b2', 'c1', 'a2'], value => value[0]);

    expect(Array.from(groups.keys())).toEqual(['b', 'a', 'c']);
    expect(groups.get('b')).toEqual(['b1', 'b2']);
    expect(groups.get('a')).toEqual(['a1', 'a2']);
  });

  it('should return an empty map for no items', () => {
    expect(groupBy([], () => 0).size).toBe(0);
  });
});

describe('groupConcat', () => {
  it('should join with comma and space', () => {
    expect(GROUP_SEPARATOR).toBe(', ');
    expect(groupConcat(['Tom Hanks', 'Meryl Streep'])).toBe('Tom Hanks, Meryl Streep');
  });

  it('should accept a custom separator', () => {
    expect(groupConcat(['a', 'b'], '|')).toBe('a|b');
  });
});

describe('roundedMean', () => {
  it('should round to one decimal', () => {
    expect(roundedMean([67, 74, 49, 39, 58])).toBe(57.4);
  });

  it('should round half away from zero', () => {
    expect(roundedMean([57, 57, 57, 58])).toBe(57.3);
    expect(roundedMean([1, 2])).toBe(1.5);
    expect(roundedMean([-57, -57, -57, -58])).toBe(-57.3);
  });

  it('should honour the decimals argument', () => {
    expect(roundedMean([1, 2], 0)).toBe(2);
    expect(roundedMean([1, 1, 2], 2)).toBe(1.33);
  });

  it('should return null for no values', () => {
    expect(roundedMean([])).toBeNull();
  });
});

describe('decadeOf', () => {
  it.each([
    [1994, 1990],
    [1990, 1990],
    [1999, 1990],
    [2000, 2000],
    [2019, 2010],
  ])('should map %i to %i', (year, decade) => {
    expect(decadeOf(year)).toBe(decade);
  });

  it('should label decades', () => {
    expect(decadeLabel(1990)).toBe('1990s');
  });
});

describe('maxBy', () => {
  it('should keep the earliest item on ties', () => {
    const items = [
      { name: 'first', key: 5 },
      { name: 'second', key: 9 },
      { name: 'third', key: 9 },
    ];

    expect(maxBy(items, item => item.key)?.name).toBe('second');
  });

  it('should skip null keys', () => {
    const items = [
      { name: 'unknown', key: null },
      { name: 'known', key: 1 },
    ];

    expect(maxBy(items, item => item.key)?.name).toBe('known');
  });

  it('should return null when no item has a key', () => {
    expect(maxBy([{ key: null }], item => item.key)).toBeNull();
    expect(maxBy([], () => 1)).toBeNull();
  });
});
