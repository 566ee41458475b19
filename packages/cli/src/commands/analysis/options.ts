/**
 * Option parsing shared by the analysis commands
 * Rates are entered in percent and converted to fractions once, here.
 */

import { FileSnapshotProvider, HttpSnapshotProvider } from '@valuescope/clients';
import {
  type AnalysisParameters,
  ConfigurationError,
  createAnalysisParameters,
  getConfig,
  type ILogger,
  LoggerImpl,
  resolveMaxTickers,
  type SnapshotProvider,
} from '@valuescope/shared';
import { DEFAULT_SNAPSHOT_DIR } from '../../utils/constants.js';
import { CLIValidationError } from '../../utils/error-handling.js';

export type OutputFormat = 'table' | 'json' | 'csv';

/** Upper bounds of the percent inputs */
export const RATE_LIMITS = {
  riskFree: 20,
  marketReturn: 30,
  taxRate: 50,
  costOfDebt: 100,
} as const;

const DECIMAL = /^\d+(\.\d+)?$/;
const INTEGER = /^\d+$/;

/**
 * Arguments shared by every analysis command
 */
export const snapshotSourceArgs = {
  source: {
    type: 'string' as const,
    short: 's',
    description: `Directory of <TICKER>.json snapshots (default: ${DEFAULT_SNAPSHOT_DIR})`,
  },
  url: {
    type: 'string' as const,
    short: 'u',
    description: 'Snapshot service base URL (GET <url>/snapshots/<TICKER>)',
  },
  timeout: {
    type: 'string' as const,
    description: 'HTTP request timeout in milliseconds (default: none)',
  },
  'risk-free': {
    type: 'string' as const,
    description: 'Risk-free rate in percent, 0-20 (default: 4.35)',
  },
  'market-return': {
    type: 'string' as const,
    description: 'Expected market return in percent, 0-30 (default: 8.5)',
  },
  'tax-rate': {
    type: 'string' as const,
    description: 'Corporate tax rate in percent, 0-50 (default: 21)',
  },
  'cost-of-debt': {
    type: 'string' as const,
    description: 'Assumed pre-tax cost of debt in percent (default: 5.5)',
  },
  debug: {
    type: 'boolean' as const,
    short: 'd',
    description: 'Enable debug output',
    default: false,
  },
};

/**
 * Parse a percent input ("4.35" or "4.35%") into a fraction
 */
export function parsePercentOption(value: string | undefined, name: string, max: number): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const text = value.trim().replace(/%$/, '');
  if (!DECIMAL.test(text)) {
    throw new CLIValidationError(`${name} must be a number between 0 and ${max}`);
  }

  const parsed = Number(text);
  if (parsed < 0 || parsed > max) {
    throw new CLIValidationError(`${name} must be a number between 0 and ${max}`);
  }
  return parsed / 100;
}

function parseNonNegativeInt(value: string, name: string): number {
  if (!INTEGER.test(value.trim())) {
    throw new CLIValidationError(`${name} must be a non-negative integer`);
  }
  const parsed = Number(value.trim());
  if (!Number.isSafeInteger(parsed)) {
    throw new CLIValidationError(`${name} must be a non-negative integer`);
  }
  return parsed;
}

export function parseMaxTickers(value: string | undefined): number {
  const requested = value === undefined || value.trim() === '' ? undefined : parseNonNegativeInt(value, 'max');
  try {
    return resolveMaxTickers(requested);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new CLIValidationError(error.message, { cause: error });
    }
    throw error;
  }
}

export function parseIntervalMs(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    const configured = getConfig().batch.fetchIntervalMs;
    if (!Number.isFinite(configured) || configured < 0) {
      throw new CLIValidationError(`VALUESCOPE_FETCH_INTERVAL_MS must be a non-negative number, got ${configured}`);
    }
    return configured;
  }
  return parseNonNegativeInt(value, 'interval');
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value === 'table' || value === 'json' || value === 'csv') {
    return value;
  }
  throw new CLIValidationError('format must be one of: table, json, csv');
}

export interface RateOptionValues {
  'risk-free'?: string;
  'market-return'?: string;
  'tax-rate'?: string;
  'cost-of-debt'?: string;
}

/**
 * Build the frozen parameter set of a run from percent inputs and configured defaults
 */
export function resolveAnalysisParameters(values: RateOptionValues): AnalysisParameters {
  const overrides = {
    riskFreeRate: parsePercentOption(values['risk-free'], 'risk-free', RATE_LIMITS.riskFree),
    marketReturn: parsePercentOption(values['market-return'], 'market-return', RATE_LIMITS.marketReturn),
    taxRate: parsePercentOption(values['tax-rate'], 'tax-rate', RATE_LIMITS.taxRate),
    assumedCostOfDebt: parsePercentOption(values['cost-of-debt'], 'cost-of-debt', RATE_LIMITS.costOfDebt),
  };

  try {
    return createAnalysisParameters(overrides);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new CLIValidationError(error.message, { cause: error });
    }
    throw error;
  }
}

export interface SourceOptionValues {
  source?: string;
  url?: string;
  timeout?: string;
}

/**
 * File provider by default, HTTP provider when --url is given
 */
export function createSnapshotProvider(values: SourceOptionValues): SnapshotProvider {
  if (values.source && values.url) {
    throw new CLIValidationError('Use either --source or --url, not both');
  }

  if (values.url) {
    const timeoutMs = values.timeout ? parseNonNegativeInt(values.timeout, 'timeout') : undefined;
    return new HttpSnapshotProvider({ baseUrl: values.url, timeoutMs });
  }

  if (values.timeout) {
    throw new CLIValidationError('--timeout only applies together with --url');
  }
  return new FileSnapshotProvider({ directory: values.source ?? DEFAULT_SNAPSHOT_DIR });
}

/**
 * Logger for a batch run: warnings only (stderr), everything with --debug
 */
export function createBatchLogger(debug?: boolean): ILogger {
  return new LoggerImpl({ component: 'analysis' }, debug ? 'DEBUG' : 'WARN');
}
