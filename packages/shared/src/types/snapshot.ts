/**
 * Raw financial snapshot as delivered by a SnapshotProvider.
 *
 * Statement tables map a line-item name to its values, most recent period first.
 * A missing key, an empty series and a null cell all mean "not reported".
 */

export type StatementSeries = ReadonlyArray<number | null>;

export type StatementTable = Readonly<Record<string, StatementSeries>>;

/**
 * Company info fields. Rates and margins are fractions (0.25 = 25%).
 */
export interface CompanyInfo {
  longName?: string;
  sector?: string;
  industry?: string;
  country?: string;
  currentPrice?: number;
  sharesOutstanding?: number;
  beta?: number;
  trailingPE?: number;
  priceToBook?: number;
  dividendRate?: number;
  payoutRatio?: number;
  returnOnAssets?: number;
  returnOnEquity?: number;
  currentRatio?: number;
  quickRatio?: number;
  cashRatio?: number;
  longTermDebtToEquity?: number;
  debtToEquity?: number;
  operatingMargins?: number;
  profitMargins?: number;
  marketCap?: number;
}

export interface RawFinancialSnapshot {
  ticker: string;
  info: CompanyInfo;
  balanceSheet: StatementTable;
  incomeStatement: StatementTable;
  cashFlow: StatementTable;
}

/**
 * Line items read by the calculators
 */
export const LINE_ITEMS = {
  balanceSheet: {
    longTermDebt: 'Long Term Debt',
    shortTermDebt: 'Short Term Debt',
    totalDebt: 'Total Debt',
    cash: 'Cash And Cash Equivalents',
    totalStockholderEquity: 'Total Stockholder Equity',
    commonStockEquity: 'Common Stock Equity',
    totalCurrentLiabilities: 'Total Current Liabilities',
  },
  incomeStatement: {
    ebit: 'EBIT',
    ebt: 'Ebt',
    interestExpense: 'Interest Expense',
    incomeTaxExpense: 'Income Tax Expense',
    totalRevenue: 'Total Revenue',
    netIncome: 'Net Income',
  },
  cashFlow: {
    freeCashFlow: 'Free Cash Flow',
    operatingCashFlow: 'Operating Cash Flow',
  },
} as const;

/**
 * Source of snapshots for the batch orchestrator.
 * Implementations throw on failure; the orchestrator converts the error into an ErrorRecord.
 */
export interface SnapshotProvider {
  fetchSnapshot(ticker: string): Promise<RawFinancialSnapshot>;
}
