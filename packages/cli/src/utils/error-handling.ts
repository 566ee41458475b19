/**
 * Error Handling Utilities
 * CLI error types, exit codes and troubleshooting output
 */

import { categorizeErrorType, type ErrorType, isValuescopeError } from '@valuescope/shared';
import chalk from 'chalk';
import type { Ora } from 'ora';

export const EXIT_CODES = {
  /** Analysis ran but produced no usable result */
  FAILURE: 1,
  /** Invalid arguments; nothing was fetched */
  USAGE: 2,
} as const;

export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT_CODES.FAILURE,
    /** Already reported to the user; the entry point only sets the exit code */
    public readonly silent: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CLIError';
  }
}

export class CLIValidationError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, EXIT_CODES.USAGE, false, options);
    this.name = 'CLIValidationError';
  }
}

export const ANALYSIS_TIPS = {
  metrics: [
    'Check that --source points at a directory of <TICKER>.json snapshots, or --url at a snapshot service',
    'Ticker symbols are upper-cased before lookup (aapl reads AAPL.json)',
    'Try with --debug flag for more information',
  ],
  company: ['Check that a snapshot exists for the ticker', 'Try with --debug flag for more information'],
};

const ERROR_TYPE_TIPS: Partial<Record<ErrorType, string>> = {
  NOT_FOUND_ERROR: 'No snapshot was found for the ticker at the selected source',
  VALIDATION_ERROR: 'Snapshot cells must be numbers, numeric strings or null',
  NETWORK_ERROR: 'The snapshot service could not be reached; check --url',
  TIMEOUT_ERROR: 'The snapshot service did not answer in time; raise --timeout',
  SERVER_ERROR: 'The snapshot service reported an internal error; try again later',
};

/**
 * Tip for the failure category first, then the command's general tips
 */
export function tipsForErrorType(errorType: ErrorType, commandTips: readonly string[]): string[] {
  const specific = ERROR_TYPE_TIPS[errorType];
  return specific ? [specific, ...commandTips] : [...commandTips];
}

export function displayTroubleshootingTips(tips: readonly string[]): void {
  console.error(chalk.gray('\n💡 Troubleshooting tips:'));
  for (const tip of tips) {
    console.error(chalk.gray(`   • ${tip}`));
  }
}

/**
 * Report an unexpected command failure and rethrow it as a silent CLIError
 */
export function handleCommandError(
  error: unknown,
  spinner: Pick<Ora, 'fail' | 'stop'>,
  options: {
    failMessage: string;
    debug?: boolean;
    tips?: readonly string[];
  }
): never {
  // keep exitCode and silent of errors raised on purpose
  if (error instanceof CLIError) {
    spinner.stop();
    throw error;
  }

  spinner.fail(options.failMessage);

  const errorMessage = error instanceof Error ? error.message : String(error);
  const code = isValuescopeError(error) ? ` [${error.code}]` : '';
  console.error(chalk.red(`\nError${code}: ${errorMessage}`));

  if (options.debug && error instanceof Error && error.stack) {
    console.error(chalk.gray(`\n[DEBUG] Stack trace:\n${error.stack}`));
  }

  displayTroubleshootingTips(tipsForErrorType(categorizeErrorType(error), options.tips ?? ANALYSIS_TIPS.metrics));

  throw new CLIError(errorMessage, EXIT_CODES.FAILURE, true, { cause: error });
}
