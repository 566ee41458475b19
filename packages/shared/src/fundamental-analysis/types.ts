import type { ErrorType } from '../errors';

/**
 * Why a metric came out undefined
 */
export type MetricGapReason = 'missing_field' | 'zero_denominator' | 'overflow';

/**
 * Soft failure recorded instead of thrown
 */
export interface MetricGap {
  /** Metric that could not be computed */
  metric: string;
  reason: MetricGapReason;
  /** Input that was missing or zero, or the expression that overflowed */
  input: string;
}

/**
 * Result of the cost of capital calculation
 */
export interface CostOfCapitalResult {
  /** CAPM cost of equity (fraction) */
  costOfEquity: number | undefined;
  /** Pre-tax cost of debt (fraction) */
  costOfDebt: number | undefined;
  wacc: number | undefined;
  /** price × shares outstanding */
  marketValueOfEquity: number | undefined;
  totalDebt: number | undefined;
  gaps: MetricGap[];
}

/**
 * Inputs of the ROIC/EVA arithmetic
 */
export interface ReturnInputs {
  ebit: number | undefined;
  investedCapital: number | undefined;
  wacc: number | undefined;
  taxRate: number;
}

export type ValueCreationVerdict = 'creating' | 'destroying' | 'insufficient-data';

export interface ReturnMetrics {
  nopat: number | undefined;
  roic: number | undefined;
  eva: number | undefined;
  /** ROIC > WACC; undefined unless both are defined */
  createsValue: boolean | undefined;
  valueCreation: ValueCreationVerdict;
}

export interface ReturnResult extends ReturnMetrics {
  ebit: number | undefined;
  equityBookValue: number | undefined;
  investedCapital: number | undefined;
  gaps: MetricGap[];
}

export type FreeCashFlowGrowthSource = 'free-cash-flow' | 'operating-cash-flow';

export interface GrowthResult {
  revenueGrowth: number | undefined;
  earningsGrowth: number | undefined;
  freeCashFlowGrowth: number | undefined;
  freeCashFlowGrowthSource: FreeCashFlowGrowthSource | undefined;
  gaps: MetricGap[];
}

export interface CashFlowResult {
  freeCashFlow: number | undefined;
  priceToFreeCashFlow: number | undefined;
  operatingCashFlow: number | undefined;
  currentLiabilities: number | undefined;
  /** Operating cash flow / current liabilities */
  cashFlowRatio: number | undefined;
  /** Total debt less cash and equivalents */
  netDebt: number | undefined;
  /** Income tax expense / EBT, informational only */
  effectiveTaxRate: number | undefined;
  gaps: MetricGap[];
}

export interface CompanyProfile {
  /** Long name, falling back to the ticker */
  name: string;
  sector: string | undefined;
  industry: string | undefined;
  country: string | undefined;
}

/**
 * Ratios reported by the provider and passed through unchanged
 */
export interface ReportedRatios {
  price: number | undefined;
  trailingPE: number | undefined;
  priceToBook: number | undefined;
  dividendRate: number | undefined;
  payoutRatio: number | undefined;
  returnOnAssets: number | undefined;
  returnOnEquity: number | undefined;
  currentRatio: number | undefined;
  quickRatio: number | undefined;
  cashRatio: number | undefined;
  longTermDebtToEquity: number | undefined;
  debtToEquity: number | undefined;
  operatingMargin: number | undefined;
  profitMargin: number | undefined;
  marketCap: number | undefined;
}

/**
 * Metrics derived for one ticker. Frozen once built.
 */
export interface DerivedMetrics {
  kind: 'metrics';
  ticker: string;
  profile: CompanyProfile;
  reported: ReportedRatios;

  costOfEquity: number | undefined;
  costOfDebt: number | undefined;
  wacc: number | undefined;
  marketValueOfEquity: number | undefined;
  totalDebt: number | undefined;

  ebit: number | undefined;
  equityBookValue: number | undefined;
  investedCapital: number | undefined;
  nopat: number | undefined;
  roic: number | undefined;
  eva: number | undefined;
  createsValue: boolean | undefined;
  valueCreation: ValueCreationVerdict;

  revenueGrowth: number | undefined;
  earningsGrowth: number | undefined;
  freeCashFlowGrowth: number | undefined;
  freeCashFlowGrowthSource: FreeCashFlowGrowthSource | undefined;

  freeCashFlow: number | undefined;
  priceToFreeCashFlow: number | undefined;
  operatingCashFlow: number | undefined;
  currentLiabilities: number | undefined;
  cashFlowRatio: number | undefined;
  netDebt: number | undefined;
  effectiveTaxRate: number | undefined;

  gaps: readonly MetricGap[];
}

/**
 * Failure for one ticker of a batch
 */
export interface ErrorRecord {
  kind: 'error';
  ticker: string;
  reason: string;
  errorType: ErrorType;
  /** Whether the snapshot fetch or the metric derivation failed */
  stage: 'fetch' | 'compute';
}

export type TickerOutcome = DerivedMetrics | ErrorRecord;

/**
 * One entry per requested ticker, in request order
 */
export type BatchResult = ReadonlyMap<string, TickerOutcome>;
