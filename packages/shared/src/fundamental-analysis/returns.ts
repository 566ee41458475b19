/**
 * Return on Invested Capital Module
 * NOPAT, ROIC, EVA and the value-creation verdict
 */

import type { AnalysisParameters } from '../config';
import { LINE_ITEMS, type RawFinancialSnapshot, type StatementTable } from '../types/snapshot';
import type { CostOfCapitalResult, ReturnInputs, ReturnMetrics, ReturnResult } from './types';
import { GapCollector, getFirstAvailable, getLatestValue, safeDivide, toFiniteOrUndefined } from './utils';

/**
 * Get EBIT from the income statement.
 * Falls back to EBT + interest expense when EBIT itself is not reported.
 */
export function getEBIT(incomeStatement: StatementTable): number | undefined {
  const items = LINE_ITEMS.incomeStatement;
  const ebit = getLatestValue(incomeStatement, items.ebit);
  if (ebit !== undefined) return ebit;

  const ebt = getLatestValue(incomeStatement, items.ebt);
  const interestExpense = getLatestValue(incomeStatement, items.interestExpense);
  if (ebt === undefined || interestExpense === undefined) return undefined;

  // Some providers report interest expense as a negative number
  return ebt + Math.abs(interestExpense);
}

/**
 * Get shareholders' equity (book value), preferring Total Stockholder Equity
 */
export function getEquityBookValue(balanceSheet: StatementTable): number | undefined {
  const items = LINE_ITEMS.balanceSheet;
  return getFirstAvailable(balanceSheet, [items.totalStockholderEquity, items.commonStockEquity]);
}

/**
 * Invested capital = total debt + equity, not netted against cash
 */
export function calculateInvestedCapital(
  totalDebt: number | undefined,
  equity: number | undefined
): number | undefined {
  if (totalDebt === undefined || equity === undefined) return undefined;
  return toFiniteOrUndefined(totalDebt + equity);
}

/**
 * NOPAT = EBIT × (1 − Tc)
 */
export function calculateNOPAT(ebit: number | undefined, taxRate: number): number | undefined {
  return ebit === undefined ? undefined : ebit * (1 - taxRate);
}

/**
 * Compute NOPAT, ROIC, EVA and the value-creation flag from plain inputs
 *
 * ROIC = NOPAT / invested capital
 * EVA  = (ROIC − WACC) × invested capital
 */
export function computeReturnMetrics(inputs: ReturnInputs): ReturnMetrics {
  const nopat = calculateNOPAT(inputs.ebit, inputs.taxRate);
  const roic = safeDivide(nopat, inputs.investedCapital);

  if (roic === undefined || inputs.wacc === undefined || inputs.investedCapital === undefined) {
    return { nopat, roic, eva: undefined, createsValue: undefined, valueCreation: 'insufficient-data' };
  }

  const createsValue = roic > inputs.wacc;
  return {
    nopat,
    roic,
    eva: (roic - inputs.wacc) * inputs.investedCapital,
    createsValue,
    valueCreation: createsValue ? 'creating' : 'destroying',
  };
}

/**
 * Calculate return metrics for a snapshot, reusing the cost of capital result. Never throws.
 */
export function calculateReturns(
  snapshot: RawFinancialSnapshot,
  costOfCapital: Pick<CostOfCapitalResult, 'totalDebt' | 'wacc'>,
  parameters: AnalysisParameters
): ReturnResult {
  const gaps = new GapCollector();
  const ebit = getEBIT(snapshot.incomeStatement);
  const equityBookValue = getEquityBookValue(snapshot.balanceSheet);
  const investedCapital = calculateInvestedCapital(costOfCapital.totalDebt, equityBookValue);

  const metrics = computeReturnMetrics({
    ebit,
    investedCapital,
    wacc: costOfCapital.wacc,
    taxRate: parameters.taxRate,
  });

  if (ebit === undefined) gaps.missing('nopat', 'ebit');
  if (equityBookValue === undefined) gaps.missing('investedCapital', 'equityBookValue');
  else if (costOfCapital.totalDebt === undefined) gaps.missing('investedCapital', 'totalDebt');
  else if (investedCapital === undefined) gaps.overflow('investedCapital', 'totalDebt + equityBookValue');
  gaps.ratio('roic', { name: 'nopat', value: metrics.nopat }, { name: 'investedCapital', value: investedCapital });
  if (metrics.eva === undefined) {
    if (metrics.roic !== undefined) gaps.missing('eva', 'wacc');
    else if (metrics.nopat !== undefined && investedCapital === 0) gaps.zeroDenominator('eva', 'investedCapital');
    else gaps.missing('eva', 'roic');
  }

  return {
    ebit,
    equityBookValue,
    investedCapital,
    ...metrics,
    gaps: gaps.toArray(),
  };
}
