/**
 * Application configuration with environment variable support
 *
 * The process-wide config only holds defaults. A batch run takes its rates from
 * createAnalysisParameters(), whose frozen result is passed explicitly to the
 * calculators and never written back here.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';

export interface AnalysisDefaults {
  riskFreeRate: number;
  marketReturn: number;
  taxRate: number;
  assumedCostOfDebt: number;
}

export interface BatchConfig {
  maxTickers: number;
  fetchIntervalMs: number;
}

export interface AppConfig {
  analysis: AnalysisDefaults;
  batch: BatchConfig;
}

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: AppConfig = {
  analysis: {
    riskFreeRate: 0.0435,
    marketReturn: 0.085,
    taxRate: 0.21,
    assumedCostOfDebt: 0.055,
  },
  batch: {
    maxTickers: 10,
    fetchIntervalMs: 1000,
  },
};

/** Upper bound on the number of tickers a single run accepts */
export const MAX_TICKERS_LIMIT = 50;

/**
 * Rates are fractions: 0.0435 means 4.35%
 */
export const analysisParametersSchema = z.object({
  riskFreeRate: z.number().min(0).max(0.2),
  marketReturn: z.number().min(0).max(0.3),
  taxRate: z.number().min(0).max(0.5),
  assumedCostOfDebt: z.number().min(0).max(1),
});

export type AnalysisParameters = Readonly<z.infer<typeof analysisParametersSchema>>;

/**
 * Parse numeric environment variable with fallback
 */
function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Load configuration from environment variables with defaults
 */
function loadConfig(): AppConfig {
  return {
    analysis: {
      riskFreeRate: parseNumber(process.env.VALUESCOPE_RISK_FREE_RATE, DEFAULT_CONFIG.analysis.riskFreeRate),
      marketReturn: parseNumber(process.env.VALUESCOPE_MARKET_RETURN, DEFAULT_CONFIG.analysis.marketReturn),
      taxRate: parseNumber(process.env.VALUESCOPE_TAX_RATE, DEFAULT_CONFIG.analysis.taxRate),
      assumedCostOfDebt: parseNumber(
        process.env.VALUESCOPE_COST_OF_DEBT,
        DEFAULT_CONFIG.analysis.assumedCostOfDebt
      ),
    },
    batch: {
      maxTickers: parseNumber(process.env.VALUESCOPE_MAX_TICKERS, DEFAULT_CONFIG.batch.maxTickers),
      fetchIntervalMs: parseNumber(process.env.VALUESCOPE_FETCH_INTERVAL_MS, DEFAULT_CONFIG.batch.fetchIntervalMs),
    },
  };
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (mainly for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Override specific configuration values (mainly for testing)
 */
export function setConfig(overrides: Partial<AppConfig>): void {
  configInstance = {
    ...getConfig(),
    ...overrides,
  };
}

/**
 * Build the immutable rate set for one analysis run.
 * Missing overrides fall back to the configured defaults.
 *
 * @throws ConfigurationError when a rate is outside its accepted range
 */
export function createAnalysisParameters(overrides: Partial<AnalysisDefaults> = {}): AnalysisParameters {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const result = analysisParametersSchema.safeParse({ ...getConfig().analysis, ...defined });

  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid analysis parameters: ${details}`);
  }

  return Object.freeze(result.data);
}

/**
 * Validate the maximum ticker count of a run
 *
 * @throws ConfigurationError when the count is not an integer in [1, MAX_TICKERS_LIMIT]
 */
export function resolveMaxTickers(value: number | undefined = getConfig().batch.maxTickers): number {
  if (!Number.isInteger(value) || value < 1 || value > MAX_TICKERS_LIMIT) {
    throw new ConfigurationError(`Maximum ticker count must be an integer between 1 and ${MAX_TICKERS_LIMIT}`);
  }
  return value;
}
