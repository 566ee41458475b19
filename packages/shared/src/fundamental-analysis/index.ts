// Fundamental Analysis Module
// Cost of capital, returns, growth and cash-flow metrics derived from raw statement data

export { calculateCashFlowMetrics, calculatePriceToFreeCashFlow } from './cash-flow';
export {
  calculateCostOfCapital,
  calculateCostOfDebt,
  calculateCostOfEquity,
  calculateTotalDebt,
  calculateWACC,
  DEFAULT_BETA,
} from './cost-of-capital';
export { deriveMetrics, extractProfile, extractReportedRatios } from './derive';
export type { FormattedMetrics, MetricColumn, MetricKind } from './format';
export {
  formatDerivedMetrics,
  formatNumber,
  formatPercent,
  formatValue,
  METRIC_COLUMNS,
  NOT_AVAILABLE,
  PERCENT_SUFFIX,
  parseNumber,
  parsePercent,
} from './format';
export { calculateCAGR, calculateFreeCashFlowGrowth, calculateGrowth, DEFAULT_GROWTH_PERIODS } from './growth';
export {
  calculateInvestedCapital,
  calculateNOPAT,
  calculateReturns,
  computeReturnMetrics,
  getEBIT,
  getEquityBookValue,
} from './returns';
export type {
  BatchResult,
  CashFlowResult,
  CompanyProfile,
  CostOfCapitalResult,
  DerivedMetrics,
  ErrorRecord,
  FreeCashFlowGrowthSource,
  GrowthResult,
  MetricGap,
  MetricGapReason,
  ReportedRatios,
  ReturnInputs,
  ReturnMetrics,
  ReturnResult,
  TickerOutcome,
  ValueCreationVerdict,
} from './types';
export {
  GapCollector,
  getFirstAvailable,
  getLatestValue,
  getReportedValues,
  getSeries,
  isDefinedNumber,
  safeDivide,
  toFiniteOrUndefined,
} from './utils';
