import type { AnalysisParameters } from '../config';
import type { RawFinancialSnapshot } from '../types/snapshot';

export const defaultParameters: AnalysisParameters = Object.freeze({
  riskFreeRate: 0.0435,
  marketReturn: 0.085,
  taxRate: 0.21,
  assumedCostOfDebt: 0.055,
});

/**
 * Fully populated snapshot with round numbers.
 * With defaultParameters: Re = 0.0933, E = 100000, D = 50000, invested capital = 100000.
 */
export function createSnapshot(overrides: Partial<RawFinancialSnapshot> = {}): RawFinancialSnapshot {
  return {
    ticker: 'TEST',
    info: {
      longName: 'Test Industries Inc.',
      sector: 'Technology',
      industry: 'Software',
      country: 'United States',
      currentPrice: 100,
      sharesOutstanding: 1000,
      beta: 1.2,
      trailingPE: 20,
      priceToBook: 2,
      dividendRate: 1.5,
      payoutRatio: 0.25,
      returnOnAssets: 0.08,
      returnOnEquity: 0.18,
      currentRatio: 1.6,
      quickRatio: 1.1,
      cashRatio: 0.4,
      longTermDebtToEquity: 80,
      debtToEquity: 100,
      operatingMargins: 0.12,
      profitMargins: 0.09,
      marketCap: 100000,
    },
    balanceSheet: {
      'Long Term Debt': [40000, 38000],
      'Short Term Debt': [10000, 9000],
      'Cash And Cash Equivalents': [5000, 4000],
      'Total Stockholder Equity': [50000, 47000],
      'Total Current Liabilities': [20000, 18000],
    },
    incomeStatement: {
      EBIT: [12000, 11000],
      Ebt: [11000, 10000],
      'Interest Expense': [1000, 1000],
      'Income Tax Expense': [2200, 2000],
      'Total Revenue': [133.1, 121, 110, 100],
      'Net Income': [1210, 1100, 1000],
    },
    cashFlow: {
      'Free Cash Flow': [8000, null, 5000],
      'Operating Cash Flow': [10000, 9000],
    },
    ...overrides,
  };
}

/**
 * Snapshot that reports nothing at all
 */
export function createEmptySnapshot(ticker = 'EMPTY'): RawFinancialSnapshot {
  return { ticker, info: {}, balanceSheet: {}, incomeStatement: {}, cashFlow: {} };
}
