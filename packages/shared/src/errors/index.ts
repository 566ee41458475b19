/**
 * Unified Error Hierarchy for Valuescope
 *
 * Hard failures only. Missing inputs and zero denominators inside the
 * calculators are not errors: they surface as undefined metrics plus a
 * MetricGap entry (see fundamental-analysis/types).
 */

/**
 * Abstract base class for all Valuescope errors.
 * All domain-specific errors should extend this class.
 */
export abstract class ValuescopeError extends Error {
  /** Error code for programmatic error handling */
  abstract readonly code: string;

  constructor(
    message: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Invalid analysis parameters or environment configuration
 */
export class ConfigurationError extends ValuescopeError {
  readonly code: string = 'INVALID_CONFIGURATION';
}

/**
 * Base class for failures of the snapshot collaborator.
 * The batch orchestrator turns these into ErrorRecords.
 */
export class SnapshotFetchError extends ValuescopeError {
  readonly code: string = 'SNAPSHOT_FETCH_FAILED';

  constructor(
    message: string,
    public readonly ticker: string,
    cause?: Error
  ) {
    super(message, cause);
  }
}

/**
 * No snapshot exists for the requested ticker
 */
export class SnapshotNotFoundError extends SnapshotFetchError {
  override readonly code: string = 'SNAPSHOT_NOT_FOUND';
}

/**
 * The provider returned a document that does not match the snapshot schema
 */
export class SnapshotValidationError extends SnapshotFetchError {
  override readonly code: string = 'INVALID_SNAPSHOT';

  constructor(
    message: string,
    ticker: string,
    public readonly issues: string[] = [],
    cause?: Error
  ) {
    super(message, ticker, cause);
  }
}

/**
 * Type guard to check if an error is a ValuescopeError
 */
export function isValuescopeError(error: unknown): error is ValuescopeError {
  return error instanceof ValuescopeError;
}

/**
 * Get a safe error message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export type ErrorType =
  | 'VALIDATION_ERROR'
  | 'TIMEOUT_ERROR'
  | 'NETWORK_ERROR'
  | 'RATE_LIMIT_ERROR'
  | 'AUTH_ERROR'
  | 'NOT_FOUND_ERROR'
  | 'SERVER_ERROR'
  | 'UNKNOWN_ERROR';

/**
 * Categorize error type, by error code first and message patterns second
 */
export function categorizeErrorType(error: unknown): ErrorType {
  if (error instanceof SnapshotValidationError || error instanceof ConfigurationError) return 'VALIDATION_ERROR';
  if (error instanceof SnapshotNotFoundError) return 'NOT_FOUND_ERROR';

  const errorStr = getErrorMessage(error).toLowerCase();

  if (errorStr.includes('timeout') || errorStr.includes('timed out')) return 'TIMEOUT_ERROR';
  if (errorStr.includes('network') || errorStr.includes('econnreset') || errorStr.includes('econnrefused'))
    return 'NETWORK_ERROR';
  if (errorStr.includes('rate limit') || errorStr.includes('429')) return 'RATE_LIMIT_ERROR';
  if (errorStr.includes('401') || errorStr.includes('403') || errorStr.includes('unauthorized')) return 'AUTH_ERROR';
  if (errorStr.includes('404') || errorStr.includes('not found')) return 'NOT_FOUND_ERROR';
  if (errorStr.includes('500') || errorStr.includes('502') || errorStr.includes('503') || errorStr.includes('504'))
    return 'SERVER_ERROR';

  return 'UNKNOWN_ERROR';
}
