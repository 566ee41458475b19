/**
 * Cash Flow Metrics Module
 * P/FCF, operating cash flow ratio, net debt and effective tax rate
 */

import { LINE_ITEMS, type RawFinancialSnapshot } from '../types/snapshot';
import type { CashFlowResult } from './types';
import { GapCollector, getLatestValue, safeDivide, toFiniteOrUndefined } from './utils';

/**
 * Price to free cash flow
 * P/FCF = price / (FCF / shares outstanding)
 */
export function calculatePriceToFreeCashFlow(
  price: number | undefined,
  freeCashFlow: number | undefined,
  sharesOutstanding: number | undefined
): number | undefined {
  return safeDivide(price, safeDivide(freeCashFlow, sharesOutstanding));
}

/**
 * Calculate cash-flow based metrics for a snapshot. Never throws.
 *
 * @param totalDebt total debt from the cost of capital calculation
 */
export function calculateCashFlowMetrics(
  snapshot: RawFinancialSnapshot,
  totalDebt: number | undefined
): CashFlowResult {
  const gaps = new GapCollector();
  const price = toFiniteOrUndefined(snapshot.info.currentPrice);
  const shares = toFiniteOrUndefined(snapshot.info.sharesOutstanding);

  const freeCashFlow = getLatestValue(snapshot.cashFlow, LINE_ITEMS.cashFlow.freeCashFlow);
  const operatingCashFlow = getLatestValue(snapshot.cashFlow, LINE_ITEMS.cashFlow.operatingCashFlow);
  const currentLiabilities = getLatestValue(snapshot.balanceSheet, LINE_ITEMS.balanceSheet.totalCurrentLiabilities);
  const cash = getLatestValue(snapshot.balanceSheet, LINE_ITEMS.balanceSheet.cash);
  const ebt = getLatestValue(snapshot.incomeStatement, LINE_ITEMS.incomeStatement.ebt);
  const incomeTaxExpense = getLatestValue(snapshot.incomeStatement, LINE_ITEMS.incomeStatement.incomeTaxExpense);

  const priceToFreeCashFlow = calculatePriceToFreeCashFlow(price, freeCashFlow, shares);
  if (priceToFreeCashFlow === undefined) {
    if (price === undefined) {
      gaps.missing('priceToFreeCashFlow', 'currentPrice');
    } else if (freeCashFlow === undefined || shares === undefined) {
      gaps.missing('priceToFreeCashFlow', freeCashFlow === undefined ? 'freeCashFlow' : 'sharesOutstanding');
    } else if (shares === 0 || freeCashFlow === 0) {
      gaps.zeroDenominator('priceToFreeCashFlow', shares === 0 ? 'sharesOutstanding' : 'freeCashFlow');
    } else {
      gaps.overflow('priceToFreeCashFlow', 'currentPrice / (freeCashFlow / sharesOutstanding)');
    }
  }

  const cashFlowRatio = safeDivide(operatingCashFlow, currentLiabilities);
  gaps.ratio(
    'cashFlowRatio',
    { name: 'operatingCashFlow', value: operatingCashFlow },
    { name: 'currentLiabilities', value: currentLiabilities }
  );

  const netDebt = totalDebt !== undefined && cash !== undefined ? toFiniteOrUndefined(totalDebt - cash) : undefined;
  if (cash === undefined) gaps.missing('netDebt', 'cash');
  else if (totalDebt === undefined) gaps.missing('netDebt', 'totalDebt');
  else if (netDebt === undefined) gaps.overflow('netDebt', 'totalDebt - cash');

  const effectiveTaxRate = safeDivide(incomeTaxExpense, ebt);
  gaps.ratio('effectiveTaxRate', { name: 'incomeTaxExpense', value: incomeTaxExpense }, { name: 'ebt', value: ebt });

  return {
    freeCashFlow,
    priceToFreeCashFlow,
    operatingCashFlow,
    currentLiabilities,
    cashFlowRatio,
    netDebt,
    effectiveTaxRate,
    gaps: gaps.toArray(),
  };
}
