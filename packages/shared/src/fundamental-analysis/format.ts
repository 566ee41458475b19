/**
 * Metric Formatting
 *
 * Output contract consumed by table and chart code:
 * - numbers: fixed point with two decimals ("12.35")
 * - percentages: fraction × 100 with two decimals and a "%" suffix ("6.85%")
 * - undefined values: NOT_AVAILABLE
 * Percent strings parse back with parsePercent().
 */

import type { DerivedMetrics } from './types';

export const NOT_AVAILABLE = 'N/A';
export const PERCENT_SUFFIX = '%';

export type MetricKind = 'percent' | 'number' | 'text';

export function formatNumber(value: number | undefined): string {
  return value === undefined || !Number.isFinite(value) ? NOT_AVAILABLE : value.toFixed(2);
}

export function formatPercent(value: number | undefined): string {
  return value === undefined || !Number.isFinite(value)
    ? NOT_AVAILABLE
    : `${(value * 100).toFixed(2)}${PERCENT_SUFFIX}`;
}

/**
 * Parse a fixed-point string back to a number
 */
export function parseNumber(text: string): number | undefined {
  const trimmed = text.trim();
  if (trimmed === '' || trimmed === NOT_AVAILABLE) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Parse a percent string back to a fraction ("6.85%" → 0.0685)
 */
export function parsePercent(text: string): number | undefined {
  const trimmed = text.trim();
  const withoutSuffix = trimmed.endsWith(PERCENT_SUFFIX) ? trimmed.slice(0, -PERCENT_SUFFIX.length) : trimmed;
  const parsed = parseNumber(withoutSuffix);
  return parsed === undefined ? undefined : parsed / 100;
}

export interface MetricColumn {
  key: string;
  label: string;
  kind: MetricKind;
  read: (metrics: DerivedMetrics) => number | string | undefined;
}

/**
 * Summary table columns, in display order
 */
export const METRIC_COLUMNS: readonly MetricColumn[] = [
  { key: 'ticker', label: 'Ticker', kind: 'text', read: (m) => m.ticker },
  { key: 'name', label: 'Name', kind: 'text', read: (m) => m.profile.name },
  { key: 'sector', label: 'Sector', kind: 'text', read: (m) => m.profile.sector },
  { key: 'price', label: 'Price', kind: 'number', read: (m) => m.reported.price },
  { key: 'pe', label: 'P/E', kind: 'number', read: (m) => m.reported.trailingPE },
  { key: 'pb', label: 'P/B', kind: 'number', read: (m) => m.reported.priceToBook },
  { key: 'pfcf', label: 'P/FCF', kind: 'number', read: (m) => m.priceToFreeCashFlow },
  { key: 'dividend', label: 'Dividend Est.', kind: 'number', read: (m) => m.reported.dividendRate },
  { key: 'payout', label: 'Payout Ratio', kind: 'percent', read: (m) => m.reported.payoutRatio },
  { key: 'roa', label: 'ROA', kind: 'percent', read: (m) => m.reported.returnOnAssets },
  { key: 'roe', label: 'ROE', kind: 'percent', read: (m) => m.reported.returnOnEquity },
  { key: 'currentRatio', label: 'Current Ratio', kind: 'number', read: (m) => m.reported.currentRatio },
  { key: 'quickRatio', label: 'Quick Ratio', kind: 'number', read: (m) => m.reported.quickRatio },
  { key: 'cashRatio', label: 'Cash Ratio', kind: 'number', read: (m) => m.reported.cashRatio },
  { key: 'ltDebtToEquity', label: 'LtDebt/Eq', kind: 'number', read: (m) => m.reported.longTermDebtToEquity },
  { key: 'debtToEquity', label: 'Debt/Eq', kind: 'number', read: (m) => m.reported.debtToEquity },
  { key: 'operatingMargin', label: 'Oper Margin', kind: 'percent', read: (m) => m.reported.operatingMargin },
  { key: 'profitMargin', label: 'Profit Margin', kind: 'percent', read: (m) => m.reported.profitMargin },
  { key: 'costOfEquity', label: 'Cost of Equity', kind: 'percent', read: (m) => m.costOfEquity },
  { key: 'costOfDebt', label: 'Cost of Debt', kind: 'percent', read: (m) => m.costOfDebt },
  { key: 'wacc', label: 'WACC', kind: 'percent', read: (m) => m.wacc },
  { key: 'roic', label: 'ROIC', kind: 'percent', read: (m) => m.roic },
  { key: 'eva', label: 'EVA', kind: 'number', read: (m) => m.eva },
  { key: 'totalDebt', label: 'Total Debt', kind: 'number', read: (m) => m.totalDebt },
  { key: 'equity', label: 'Equity', kind: 'number', read: (m) => m.equityBookValue },
  { key: 'investedCapital', label: 'Invested Capital', kind: 'number', read: (m) => m.investedCapital },
  { key: 'revenueGrowth', label: 'Revenue Growth', kind: 'percent', read: (m) => m.revenueGrowth },
  { key: 'earningsGrowth', label: 'EPS Growth', kind: 'percent', read: (m) => m.earningsGrowth },
  { key: 'fcfGrowth', label: 'FCF Growth', kind: 'percent', read: (m) => m.freeCashFlowGrowth },
  { key: 'cashFlowRatio', label: 'Cash Flow Ratio', kind: 'number', read: (m) => m.cashFlowRatio },
];

export function formatValue(value: number | string | undefined, kind: MetricKind): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return NOT_AVAILABLE;
  return kind === 'percent' ? formatPercent(value) : formatNumber(value);
}

export type FormattedMetrics = Readonly<Record<string, string>>;

/**
 * Format every column of METRIC_COLUMNS, keyed by column key
 */
export function formatDerivedMetrics(metrics: DerivedMetrics): FormattedMetrics {
  const formatted: Record<string, string> = {};
  for (const column of METRIC_COLUMNS) {
    formatted[column.key] = formatValue(column.read(metrics), column.kind);
  }
  return formatted;
}
