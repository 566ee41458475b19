import { describe, expect, it } from 'vitest';
import { createEmptySnapshot, createSnapshot, defaultParameters } from '../../test-utils/fixtures';
import { deriveMetrics } from '../derive';
import {
  formatDerivedMetrics,
  formatNumber,
  formatPercent,
  formatValue,
  METRIC_COLUMNS,
  NOT_AVAILABLE,
  parseNumber,
  parsePercent,
} from '../format';

describe('Metric Formatting', () => {
  describe('formatNumber', () => {
    it('uses two fixed decimals', () => {
      expect(formatNumber(12.3456)).toBe('12.35');
      expect(formatNumber(100)).toBe('100.00');
      expect(formatNumber(-0.5)).toBe('-0.50');
    });

    it('marks undefined and non-finite values as not available', () => {
      expect(formatNumber(undefined)).toBe(NOT_AVAILABLE);
      expect(formatNumber(Number.NaN)).toBe('N/A');
      expect(formatNumber(Number.POSITIVE_INFINITY)).toBe('N/A');
    });
  });

  describe('formatPercent', () => {
    it('scales fractions to percent with a suffix', () => {
      expect(formatPercent(0.0685)).toBe('6.85%');
      expect(formatPercent(0.1)).toBe('10.00%');
      expect(formatPercent(-0.25)).toBe('-25.00%');
      expect(formatPercent(0)).toBe('0.00%');
    });

    it('marks undefined as not available', () => {
      expect(formatPercent(undefined)).toBe('N/A');
    });
  });

  describe('parsing', () => {
    it('parses percent strings back to fractions', () => {
      expect(parsePercent('6.85%')).toBeCloseTo(0.0685, 12);
      expect(parsePercent(' 10.00% ')).toBeCloseTo(0.1, 12);
      expect(parsePercent('N/A')).toBeUndefined();
      expect(parsePercent('abc%')).toBeUndefined();
    });

    it('recovers a fraction from its formatted form within rounding', () => {
      for (const value of [0.0766833333, 0.0948, -0.123456, 0.5]) {
        const parsed = parsePercent(formatPercent(value));
        expect(parsed).toBeDefined();
        expect(Math.abs((parsed ?? Number.NaN) - value)).toBeLessThanOrEqual(0.00005);
      }
    });

    it('parses fixed-point numbers', () => {
      expect(parseNumber('12.50')).toBe(12.5);
      expect(parseNumber('')).toBeUndefined();
      expect(parseNumber('N/A')).toBeUndefined();
    });
  });

  describe('formatValue', () => {
    it('passes text through and formats by kind', () => {
      expect(formatValue('Technology', 'text')).toBe('Technology');
      expect(formatValue(0.25, 'percent')).toBe('25.00%');
      expect(formatValue(0.25, 'number')).toBe('0.25');
      expect(formatValue(undefined, 'text')).toBe('N/A');
    });
  });

  describe('formatDerivedMetrics', () => {
    it('formats every column of a complete record', () => {
      const formatted = formatDerivedMetrics(deriveMetrics(createSnapshot(), defaultParameters));

      expect(Object.keys(formatted)).toEqual(METRIC_COLUMNS.map((column) => column.key));
      expect(formatted.ticker).toBe('TEST');
      expect(formatted.name).toBe('Test Industries Inc.');
      expect(formatted.price).toBe('100.00');
      expect(formatted.pfcf).toBe('12.50');
      expect(formatted.dividend).toBe('1.50');
      expect(formatted.payout).toBe('25.00%');
      expect(formatted.costOfEquity).toBe('9.33%');
      expect(formatted.wacc).toBe('7.67%');
      expect(formatted.roic).toBe('9.48%');
      expect(formatted.eva).toBe('1811.67');
      expect(formatted.investedCapital).toBe('100000.00');
      expect(formatted.revenueGrowth).toBe('10.00%');
      expect(formatted.fcfGrowth).toBe('60.00%');
      expect(formatted.cashFlowRatio).toBe('0.50');
    });

    it('uses the not-available marker for missing values', () => {
      const formatted = formatDerivedMetrics(deriveMetrics(createEmptySnapshot(), defaultParameters));

      expect(formatted.name).toBe('EMPTY');
      expect(formatted.sector).toBe('N/A');
      expect(formatted.wacc).toBe('N/A');
      expect(formatted.roic).toBe('N/A');
      expect(formatted.costOfEquity).toBe('8.50%');
      expect(formatted.totalDebt).toBe('0.00');
    });
  });
});
