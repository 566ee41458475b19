/**
 * Company Analysis Command
 * Detail view and value-creation verdict for one ticker
 */

import {
  type AnalysisParameters,
  BatchOrchestrator,
  type DerivedMetrics,
  isErrorRecord,
  noPacing,
  normalizeTickers,
  type SnapshotProvider,
} from '@valuescope/shared';
import { define } from 'gunshi';
import ora from 'ora';
import { CLI_NAME } from '../../utils/constants.js';
import {
  ANALYSIS_TIPS,
  CLIError,
  CLIValidationError,
  displayTroubleshootingTips,
  EXIT_CODES,
  tipsForErrorType,
} from '../../utils/error-handling.js';
import { renderCompanyDetail } from './company-output.js';
import {
  createBatchLogger,
  createSnapshotProvider,
  resolveAnalysisParameters,
  snapshotSourceArgs,
} from './options.js';

export interface CompanyRunOptions {
  ticker: string | undefined;
  parameters: AnalysisParameters;
  provider: SnapshotProvider;
  json?: boolean;
  debug?: boolean;
}

/**
 * Derive and print the metrics of one company
 */
export async function executeCompanyAnalysis(options: CompanyRunOptions): Promise<DerivedMetrics> {
  const [ticker] = normalizeTickers(options.ticker ?? '', 1);
  if (!ticker) {
    throw new CLIValidationError('Please enter a ticker');
  }

  const spinner = ora({ text: `Loading ${ticker}...`, isSilent: options.json === true }).start();
  const orchestrator = new BatchOrchestrator({
    provider: options.provider,
    pacer: noPacing,
    logger: createBatchLogger(options.debug),
  });
  const result = await orchestrator.run([ticker], options.parameters);
  const outcome = result.get(ticker);

  if (!outcome || isErrorRecord(outcome)) {
    const reason = outcome?.reason ?? 'no result';
    spinner.fail(`Analysis failed for ${ticker}: ${reason}`);
    displayTroubleshootingTips(outcome ? tipsForErrorType(outcome.errorType, ANALYSIS_TIPS.company) : ANALYSIS_TIPS.company);
    throw new CLIError(`Analysis failed for ${ticker}: ${reason}`, EXIT_CODES.FAILURE, true);
  }

  spinner.stop();
  if (options.json) {
    console.log(JSON.stringify(outcome, null, 2));
  } else {
    for (const line of renderCompanyDetail(outcome)) console.log(line);
  }
  return outcome;
}

export const companyCommand = define({
  name: 'company',
  description: 'Show the detail view and value-creation verdict for one ticker',
  args: {
    ticker: {
      type: 'string',
      short: 't',
      description: 'Ticker symbol',
    },
    json: {
      type: 'boolean',
      description: 'Print the derived metrics as JSON',
      default: false,
    },
    ...snapshotSourceArgs,
  },
  examples: `
${CLI_NAME} analysis company --ticker AAPL
${CLI_NAME} analysis company -t MSFT --url http://localhost:8080/api --json
  `.trim(),
  run: async (ctx) => {
    const values = ctx.values;

    await executeCompanyAnalysis({
      ticker: values.ticker,
      parameters: resolveAnalysisParameters(values),
      provider: createSnapshotProvider(values),
      json: values.json,
      debug: values.debug,
    });
  },
});
