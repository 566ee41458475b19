/**
 * Statement Access Utilities
 *
 * Shared "missing" convention for every calculator: a value is either a finite
 * number or undefined. Null cells, NaN and infinities all read as undefined.
 */

import type { StatementSeries, StatementTable } from '../types/snapshot';
import type { MetricGap } from './types';

/**
 * Safely convert a value to a finite number or undefined.
 * Providers sometimes send large numbers as strings.
 */
export function toFiniteOrUndefined(value: unknown): number | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function isDefinedNumber(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value);
}

/**
 * Get the series of a line item, or undefined when the table does not report it
 */
export function getSeries(table: StatementTable, lineItem: string): StatementSeries | undefined {
  return Object.hasOwn(table, lineItem) ? table[lineItem] : undefined;
}

/**
 * Most recent value of a line item (first period of the series)
 */
export function getLatestValue(table: StatementTable, lineItem: string): number | undefined {
  const series = getSeries(table, lineItem);
  if (!series || series.length === 0) return undefined;
  return toFiniteOrUndefined(series[0]);
}

/**
 * First line item of the list that has a latest value
 */
export function getFirstAvailable(table: StatementTable, lineItems: readonly string[]): number | undefined {
  for (const lineItem of lineItems) {
    const value = getLatestValue(table, lineItem);
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Reported (finite) values of a series, most recent first
 */
export function getReportedValues(series: StatementSeries | undefined): number[] {
  if (!series) return [];
  return series.map(toFiniteOrUndefined).filter(isDefinedNumber);
}

/**
 * Divide, returning undefined for a missing operand, a zero denominator
 * or a non-finite quotient
 */
export function safeDivide(numerator: number | undefined, denominator: number | undefined): number | undefined {
  if (numerator === undefined || denominator === undefined || denominator === 0) {
    return undefined;
  }
  const quotient = numerator / denominator;
  return Number.isFinite(quotient) ? quotient : undefined;
}

/**
 * Collects MetricGap entries while a calculator runs
 */
export class GapCollector {
  private readonly entries: MetricGap[] = [];

  missing(metric: string, input: string): void {
    this.entries.push({ metric, reason: 'missing_field', input });
  }

  zeroDenominator(metric: string, input: string): void {
    this.entries.push({ metric, reason: 'zero_denominator', input });
  }

  overflow(metric: string, expression: string): void {
    this.entries.push({ metric, reason: 'overflow', input: expression });
  }

  /**
   * Record why a ratio is undefined: a missing operand wins over a zero
   * denominator, which wins over a quotient out of the finite range
   */
  ratio(
    metric: string,
    numerator: { name: string; value: number | undefined },
    denominator: { name: string; value: number | undefined }
  ): void {
    if (numerator.value === undefined) {
      this.missing(metric, numerator.name);
    } else if (denominator.value === undefined) {
      this.missing(metric, denominator.name);
    } else if (denominator.value === 0) {
      this.zeroDenominator(metric, denominator.name);
    } else if (!Number.isFinite(numerator.value / denominator.value)) {
      this.overflow(metric, `${numerator.name} / ${denominator.name}`);
    }
  }

  toArray(): MetricGap[] {
    return [...this.entries];
  }
}
