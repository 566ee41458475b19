// Valuescope shared package
// Financial-metrics derivation engine, batch orchestration and ambient utilities

export * from './batch';
export type { AnalysisDefaults, AnalysisParameters, AppConfig, BatchConfig } from './config';
export {
  analysisParametersSchema,
  createAnalysisParameters,
  getConfig,
  MAX_TICKERS_LIMIT,
  resetConfig,
  resolveMaxTickers,
  setConfig,
} from './config';
export type { ErrorType } from './errors';
export {
  ConfigurationError,
  categorizeErrorType,
  getErrorMessage,
  isValuescopeError,
  SnapshotFetchError,
  SnapshotNotFoundError,
  SnapshotValidationError,
  ValuescopeError,
} from './errors';
export * from './fundamental-analysis';
export type {
  CompanyInfo,
  RawFinancialSnapshot,
  SnapshotProvider,
  StatementSeries,
  StatementTable,
} from './types/snapshot';
export { LINE_ITEMS } from './types/snapshot';
export type { ILogger, LogContext, LogLevel } from './utils/logger-interface';
export { LoggerImpl, logger } from './utils/logger';
