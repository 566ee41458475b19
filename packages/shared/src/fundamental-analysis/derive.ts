/**
 * Derives the full metric set for one snapshot.
 * Pure: the same snapshot and parameters always give an equal result.
 */

import type { AnalysisParameters } from '../config';
import type { CompanyInfo, RawFinancialSnapshot } from '../types/snapshot';
import { calculateCashFlowMetrics } from './cash-flow';
import { calculateCostOfCapital } from './cost-of-capital';
import { calculateGrowth } from './growth';
import { calculateReturns } from './returns';
import type { CompanyProfile, DerivedMetrics, ReportedRatios } from './types';
import { toFiniteOrUndefined } from './utils';

function textOrUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function extractProfile(ticker: string, info: CompanyInfo): CompanyProfile {
  return {
    name: textOrUndefined(info.longName) ?? ticker,
    sector: textOrUndefined(info.sector),
    industry: textOrUndefined(info.industry),
    country: textOrUndefined(info.country),
  };
}

export function extractReportedRatios(info: CompanyInfo): ReportedRatios {
  return {
    price: toFiniteOrUndefined(info.currentPrice),
    trailingPE: toFiniteOrUndefined(info.trailingPE),
    priceToBook: toFiniteOrUndefined(info.priceToBook),
    dividendRate: toFiniteOrUndefined(info.dividendRate),
    payoutRatio: toFiniteOrUndefined(info.payoutRatio),
    returnOnAssets: toFiniteOrUndefined(info.returnOnAssets),
    returnOnEquity: toFiniteOrUndefined(info.returnOnEquity),
    currentRatio: toFiniteOrUndefined(info.currentRatio),
    quickRatio: toFiniteOrUndefined(info.quickRatio),
    cashRatio: toFiniteOrUndefined(info.cashRatio),
    longTermDebtToEquity: toFiniteOrUndefined(info.longTermDebtToEquity),
    debtToEquity: toFiniteOrUndefined(info.debtToEquity),
    operatingMargin: toFiniteOrUndefined(info.operatingMargins),
    profitMargin: toFiniteOrUndefined(info.profitMargins),
    marketCap: toFiniteOrUndefined(info.marketCap),
  };
}

/**
 * Run every calculator over a snapshot and assemble a frozen DerivedMetrics record
 */
export function deriveMetrics(snapshot: RawFinancialSnapshot, parameters: AnalysisParameters): DerivedMetrics {
  const costOfCapital = calculateCostOfCapital(snapshot, parameters);
  const returns = calculateReturns(snapshot, costOfCapital, parameters);
  const growth = calculateGrowth(snapshot);
  const cashFlow = calculateCashFlowMetrics(snapshot, costOfCapital.totalDebt);

  const gaps = [...costOfCapital.gaps, ...returns.gaps, ...growth.gaps, ...cashFlow.gaps].map((gap) =>
    Object.freeze(gap)
  );

  return Object.freeze({
    kind: 'metrics' as const,
    ticker: snapshot.ticker,
    profile: Object.freeze(extractProfile(snapshot.ticker, snapshot.info)),
    reported: Object.freeze(extractReportedRatios(snapshot.info)),

    costOfEquity: costOfCapital.costOfEquity,
    costOfDebt: costOfCapital.costOfDebt,
    wacc: costOfCapital.wacc,
    marketValueOfEquity: costOfCapital.marketValueOfEquity,
    totalDebt: costOfCapital.totalDebt,

    ebit: returns.ebit,
    equityBookValue: returns.equityBookValue,
    investedCapital: returns.investedCapital,
    nopat: returns.nopat,
    roic: returns.roic,
    eva: returns.eva,
    createsValue: returns.createsValue,
    valueCreation: returns.valueCreation,

    revenueGrowth: growth.revenueGrowth,
    earningsGrowth: growth.earningsGrowth,
    freeCashFlowGrowth: growth.freeCashFlowGrowth,
    freeCashFlowGrowthSource: growth.freeCashFlowGrowthSource,

    freeCashFlow: cashFlow.freeCashFlow,
    priceToFreeCashFlow: cashFlow.priceToFreeCashFlow,
    operatingCashFlow: cashFlow.operatingCashFlow,
    currentLiabilities: cashFlow.currentLiabilities,
    cashFlowRatio: cashFlow.cashFlowRatio,
    netDebt: cashFlow.netDebt,
    effectiveTaxRate: cashFlow.effectiveTaxRate,

    gaps: Object.freeze(gaps),
  });
}
