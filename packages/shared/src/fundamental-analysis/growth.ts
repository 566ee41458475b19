/**
 * Historical Growth Module
 * Compound annual growth rates over the most recent reported periods
 */

import { LINE_ITEMS, type RawFinancialSnapshot, type StatementSeries } from '../types/snapshot';
import type { FreeCashFlowGrowthSource, GrowthResult } from './types';
import { GapCollector, getReportedValues, getSeries } from './utils';

/** Periods considered by default (latest plus three earlier years) */
export const DEFAULT_GROWTH_PERIODS = 4;

/**
 * Calculate CAGR of a most-recent-first series.
 *
 * Unreported cells are dropped first, then at most `maxPeriods` values are kept.
 * CAGR = (latest / earliest)^(1/n) − 1 with n = kept values − 1.
 *
 * @returns undefined with fewer than two values, a zero earliest value, or a
 *   non-real result (sign change between the end points)
 */
export function calculateCAGR(
  series: StatementSeries | undefined,
  maxPeriods = DEFAULT_GROWTH_PERIODS
): number | undefined {
  const values = getReportedValues(series).slice(0, maxPeriods);
  if (values.length < 2) return undefined;

  const latest = values[0];
  const earliest = values[values.length - 1];
  if (latest === undefined || earliest === undefined || earliest === 0) return undefined;

  const periods = values.length - 1;
  const cagr = (latest / earliest) ** (1 / periods) - 1;
  return Number.isFinite(cagr) ? cagr : undefined;
}

/**
 * Free cash flow growth, falling back to operating cash flow when the
 * free cash flow series has no reported value at all
 */
export function calculateFreeCashFlowGrowth(snapshot: RawFinancialSnapshot): {
  growth: number | undefined;
  source: FreeCashFlowGrowthSource | undefined;
} {
  const items = LINE_ITEMS.cashFlow;
  const freeCashFlow = getSeries(snapshot.cashFlow, items.freeCashFlow);

  if (getReportedValues(freeCashFlow).length > 0) {
    const growth = calculateCAGR(freeCashFlow);
    return { growth, source: growth === undefined ? undefined : 'free-cash-flow' };
  }

  const growth = calculateCAGR(getSeries(snapshot.cashFlow, items.operatingCashFlow));
  return { growth, source: growth === undefined ? undefined : 'operating-cash-flow' };
}

/**
 * Calculate revenue, earnings and free cash flow growth. Never throws.
 */
export function calculateGrowth(snapshot: RawFinancialSnapshot): GrowthResult {
  const gaps = new GapCollector();
  const items = LINE_ITEMS.incomeStatement;

  const revenueGrowth = calculateCAGR(getSeries(snapshot.incomeStatement, items.totalRevenue));
  const earningsGrowth = calculateCAGR(getSeries(snapshot.incomeStatement, items.netIncome));
  const freeCashFlow = calculateFreeCashFlowGrowth(snapshot);

  if (revenueGrowth === undefined) gaps.missing('revenueGrowth', items.totalRevenue);
  if (earningsGrowth === undefined) gaps.missing('earningsGrowth', items.netIncome);
  if (freeCashFlow.growth === undefined) gaps.missing('freeCashFlowGrowth', LINE_ITEMS.cashFlow.freeCashFlow);

  return {
    revenueGrowth,
    earningsGrowth,
    freeCashFlowGrowth: freeCashFlow.growth,
    freeCashFlowGrowthSource: freeCashFlow.source,
    gaps: gaps.toArray(),
  };
}
