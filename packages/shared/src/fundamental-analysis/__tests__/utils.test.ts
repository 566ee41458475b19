import { describe, expect, it } from 'vitest';
import {
  GapCollector,
  getFirstAvailable,
  getLatestValue,
  getReportedValues,
  safeDivide,
  toFiniteOrUndefined,
} from '../utils';

describe('toFiniteOrUndefined', () => {
  it('keeps finite numbers and numeric strings', () => {
    expect(toFiniteOrUndefined(42)).toBe(42);
    expect(toFiniteOrUndefined(0)).toBe(0);
    expect(toFiniteOrUndefined('1.5e3')).toBe(1500);
  });

  it('reads null, NaN, infinities and junk as undefined', () => {
    expect(toFiniteOrUndefined(null)).toBeUndefined();
    expect(toFiniteOrUndefined(undefined)).toBeUndefined();
    expect(toFiniteOrUndefined('')).toBeUndefined();
    expect(toFiniteOrUndefined(Number.NaN)).toBeUndefined();
    expect(toFiniteOrUndefined(Number.NEGATIVE_INFINITY)).toBeUndefined();
    expect(toFiniteOrUndefined('n/a')).toBeUndefined();
    expect(toFiniteOrUndefined({})).toBeUndefined();
  });
});

describe('statement access', () => {
  const table = { EBIT: [null, 10], 'Total Revenue': [200, 180], Empty: [] };

  it('reads the most recent period only', () => {
    expect(getLatestValue(table, 'Total Revenue')).toBe(200);
    expect(getLatestValue(table, 'EBIT')).toBeUndefined();
    expect(getLatestValue(table, 'Empty')).toBeUndefined();
    expect(getLatestValue(table, 'Missing')).toBeUndefined();
  });

  it('ignores inherited keys', () => {
    expect(getLatestValue(table, 'toString')).toBeUndefined();
  });

  it('returns the first line item with a latest value', () => {
    expect(getFirstAvailable(table, ['EBIT', 'Total Revenue'])).toBe(200);
    expect(getFirstAvailable(table, ['EBIT', 'Missing'])).toBeUndefined();
  });

  it('drops unreported periods', () => {
    expect(getReportedValues([3, null, 1])).toEqual([3, 1]);
    expect(getReportedValues(undefined)).toEqual([]);
  });
});

describe('safeDivide', () => {
  it('divides defined operands', () => {
    expect(safeDivide(10, 4)).toBe(2.5);
    expect(safeDivide(0, 4)).toBe(0);
  });

  it('returns undefined for a zero denominator or missing operand', () => {
    expect(safeDivide(10, 0)).toBeUndefined();
    expect(safeDivide(undefined, 4)).toBeUndefined();
    expect(safeDivide(10, undefined)).toBeUndefined();
  });
});

describe('GapCollector', () => {
  it('prefers a missing operand over a zero denominator', () => {
    const gaps = new GapCollector();
    gaps.ratio('a', { name: 'x', value: undefined }, { name: 'y', value: 0 });
    gaps.ratio('b', { name: 'x', value: 1 }, { name: 'y', value: undefined });
    gaps.ratio('c', { name: 'x', value: 1 }, { name: 'y', value: 0 });
    gaps.ratio('d', { name: 'x', value: 1 }, { name: 'y', value: 2 });

    expect(gaps.toArray()).toEqual([
      { metric: 'a', reason: 'missing_field', input: 'x' },
      { metric: 'b', reason: 'missing_field', input: 'y' },
      { metric: 'c', reason: 'zero_denominator', input: 'y' },
    ]);
  });

  it('records a quotient beyond the finite range as an overflow', () => {
    const gaps = new GapCollector();
    gaps.ratio('r', { name: 'x', value: 1e308 }, { name: 'y', value: 1e-10 });

    expect(gaps.toArray()).toEqual([{ metric: 'r', reason: 'overflow', input: 'x / y' }]);
  });
});
