/**
 * Metrics Analysis Helper Functions
 * Runs the batch over the requested tickers and prints the result
 */

import {
  type AnalysisParameters,
  BatchOrchestrator,
  type BatchResult,
  isErrorRecord,
  MinIntervalPacer,
  normalizeTickers,
  type Pacer,
  type SnapshotProvider,
  summarizeBatch,
} from '@valuescope/shared';
import ora from 'ora';
import { formatElapsedTime } from '../../utils/format-helpers.js';
import {
  ANALYSIS_TIPS,
  CLIError,
  CLIValidationError,
  displayTroubleshootingTips,
  EXIT_CODES,
  handleCommandError,
  tipsForErrorType,
} from '../../utils/error-handling.js';
import { OutputManager } from '../../utils/OutputManager.js';
import { renderMetricsCSV, renderMetricsJSON, renderMetricsTable } from './metrics-output.js';
import { createBatchLogger, type OutputFormat } from './options.js';

export interface MetricsRunOptions {
  tickers: string | undefined;
  maxTickers: number;
  parameters: AnalysisParameters;
  provider: SnapshotProvider;
  /** Pacer override; a MinIntervalPacer with intervalMs otherwise */
  pacer?: Pacer;
  intervalMs: number;
  format: OutputFormat;
  debug?: boolean;
}

/**
 * Normalize the ticker input, refusing an empty list
 */
export function resolveTickers(input: string | undefined, maxTickers: number, output: OutputManager): string[] {
  const all = normalizeTickers(input ?? '', Number.MAX_SAFE_INTEGER);
  if (all.length === 0) {
    throw new CLIValidationError('Please enter at least one ticker');
  }
  if (all.length > maxTickers) {
    output.warn(`Only the first ${maxTickers} of ${all.length} tickers will be processed`);
  }
  return all.slice(0, maxTickers);
}

function createPacer(intervalMs: number): Pacer {
  try {
    return new MinIntervalPacer({ minIntervalMs: intervalMs });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new CLIValidationError(error.message, { cause: error });
    }
    throw error;
  }
}

function printResult(result: BatchResult, options: MetricsRunOptions): void {
  const summary = summarizeBatch(result);
  switch (options.format) {
    case 'json':
      console.log(renderMetricsJSON(result, summary, options.parameters));
      break;
    case 'csv':
      for (const line of renderMetricsCSV(result)) console.log(line);
      break;
    default:
      console.log();
      for (const line of renderMetricsTable(result, summary)) console.log(line);
      break;
  }
}

/**
 * Main metrics analysis execution function
 *
 * @returns the batch result, for callers that post-process it
 */
export async function executeMetricsAnalysis(options: MetricsRunOptions): Promise<BatchResult> {
  const output = new OutputManager({ debug: options.debug, machineReadable: options.format !== 'table' });
  const tickers = resolveTickers(options.tickers, options.maxTickers, output);

  output.debug('Analysis parameters', { ...options.parameters });
  output.debug(`Tickers: ${tickers.join(', ')}`);

  const pacer = options.pacer ?? createPacer(options.intervalMs);

  const startTime = performance.now();
  const spinner = ora({ text: `Processing ${tickers.length} ticker(s)...`, isSilent: options.format !== 'table' }).start();
  const orchestrator = new BatchOrchestrator({
    provider: options.provider,
    pacer,
    logger: createBatchLogger(options.debug),
    onTickerStart: (ticker, index, total) => {
      spinner.text = `Processing ${ticker} (${index + 1}/${total})`;
    },
  });

  let result: BatchResult;
  try {
    result = await orchestrator.run(tickers, options.parameters);
  } catch (error) {
    handleCommandError(error, spinner, {
      failMessage: 'Metrics analysis failed',
      debug: options.debug,
      tips: ANALYSIS_TIPS.metrics,
    });
  }

  const summary = summarizeBatch(result);
  const elapsed = formatElapsedTime(performance.now() - startTime);

  if (summary.succeeded === 0) {
    spinner.fail('No valid data was obtained for any ticker');
    const failures = [...result.values()].filter(isErrorRecord);
    for (const failure of failures) {
      output.error(`${failure.ticker}: ${failure.reason}`);
    }
    const [first] = failures;
    displayTroubleshootingTips(first ? tipsForErrorType(first.errorType, ANALYSIS_TIPS.metrics) : ANALYSIS_TIPS.metrics);
    throw new CLIError('No valid data was obtained for any ticker', EXIT_CODES.FAILURE, true);
  }

  spinner.succeed(`Processed ${summary.total} ticker(s) in ${elapsed}: ${summary.succeeded} succeeded, ${summary.failed} failed`);
  printResult(result, options);
  return result;
}
