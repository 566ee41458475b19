/**
 * Cost of Capital Calculation Module
 * CAPM cost of equity, cost of debt and WACC
 */

import type { AnalysisParameters } from '../config';
import { LINE_ITEMS, type RawFinancialSnapshot, type StatementTable } from '../types/snapshot';
import type { CostOfCapitalResult } from './types';
import { GapCollector, getLatestValue, toFiniteOrUndefined } from './utils';

/** Beta assumed when the provider does not report one */
export const DEFAULT_BETA = 1.0;

/**
 * Calculate cost of equity with CAPM
 * Re = Rf + beta × (Rm − Rf)
 */
export function calculateCostOfEquity(beta: number, riskFreeRate: number, marketReturn: number): number {
  return riskFreeRate + beta * (marketReturn - riskFreeRate);
}

/**
 * Calculate total debt from the latest balance sheet.
 *
 * Long-term plus short-term debt, a missing item counting as zero. When neither
 * is reported the consolidated Total Debt item is used, and when that is absent
 * too the company is treated as debt-free (0, not undefined).
 *
 * @returns undefined only when the sum overflows
 */
export function calculateTotalDebt(balanceSheet: StatementTable): number | undefined {
  const items = LINE_ITEMS.balanceSheet;
  const longTerm = getLatestValue(balanceSheet, items.longTermDebt);
  const shortTerm = getLatestValue(balanceSheet, items.shortTermDebt);

  if (longTerm === undefined && shortTerm === undefined) {
    return getLatestValue(balanceSheet, items.totalDebt) ?? 0;
  }

  return toFiniteOrUndefined((longTerm ?? 0) + (shortTerm ?? 0));
}

/**
 * Calculate pre-tax cost of debt: the assumed rate for indebted companies, 0 otherwise
 */
export function calculateCostOfDebt(totalDebt: number | undefined, assumedCostOfDebt: number): number | undefined {
  if (totalDebt === undefined) return undefined;
  return totalDebt > 0 ? assumedCostOfDebt : 0;
}

/**
 * Calculate WACC
 * WACC = E/(E+D) × Re + D/(E+D) × Rd × (1 − Tc)
 *
 * @returns undefined when an input is unknown, or E + D is zero or overflows
 */
export function calculateWACC(
  marketValueOfEquity: number | undefined,
  totalDebt: number | undefined,
  costOfEquity: number,
  costOfDebt: number | undefined,
  taxRate: number
): number | undefined {
  if (marketValueOfEquity === undefined || totalDebt === undefined || costOfDebt === undefined) {
    return undefined;
  }

  const capital = marketValueOfEquity + totalDebt;
  if (capital === 0 || !Number.isFinite(capital)) {
    return undefined;
  }

  const wacc =
    (marketValueOfEquity / capital) * costOfEquity + (totalDebt / capital) * costOfDebt * (1 - taxRate);
  return Number.isFinite(wacc) ? wacc : undefined;
}

/**
 * Calculate WACC and its components from a snapshot. Never throws.
 */
export function calculateCostOfCapital(
  snapshot: RawFinancialSnapshot,
  parameters: AnalysisParameters
): CostOfCapitalResult {
  const gaps = new GapCollector();
  const beta = toFiniteOrUndefined(snapshot.info.beta) ?? DEFAULT_BETA;
  const price = toFiniteOrUndefined(snapshot.info.currentPrice);
  const shares = toFiniteOrUndefined(snapshot.info.sharesOutstanding);

  const costOfEquity = calculateCostOfEquity(beta, parameters.riskFreeRate, parameters.marketReturn);

  let marketValueOfEquity: number | undefined;
  if (price === undefined) {
    gaps.missing('marketValueOfEquity', 'currentPrice');
  } else if (shares === undefined) {
    gaps.missing('marketValueOfEquity', 'sharesOutstanding');
  } else {
    marketValueOfEquity = toFiniteOrUndefined(price * shares);
    if (marketValueOfEquity === undefined) gaps.overflow('marketValueOfEquity', 'currentPrice × sharesOutstanding');
  }

  const totalDebt = calculateTotalDebt(snapshot.balanceSheet);
  if (totalDebt === undefined) {
    gaps.overflow('totalDebt', 'longTermDebt + shortTermDebt');
    gaps.missing('costOfDebt', 'totalDebt');
  }
  const costOfDebt = calculateCostOfDebt(totalDebt, parameters.assumedCostOfDebt);
  const wacc = calculateWACC(marketValueOfEquity, totalDebt, costOfEquity, costOfDebt, parameters.taxRate);

  if (wacc === undefined) {
    if (marketValueOfEquity === undefined) {
      gaps.missing('wacc', 'marketValueOfEquity');
    } else if (totalDebt === undefined) {
      gaps.missing('wacc', 'totalDebt');
    } else if (marketValueOfEquity + totalDebt === 0) {
      gaps.zeroDenominator('wacc', 'marketValueOfEquity + totalDebt');
    } else {
      gaps.overflow('wacc', 'marketValueOfEquity + totalDebt');
    }
  }

  return {
    costOfEquity,
    costOfDebt,
    wacc,
    marketValueOfEquity,
    totalDebt,
    gaps: gaps.toArray(),
  };
}
