/**
 * Metrics Analysis Command
 * Cost of capital, ROIC/EVA, growth and cash-flow metrics for a ticker list
 */

import { define } from 'gunshi';
import { CLI_NAME } from '../../utils/constants.js';
import { executeMetricsAnalysis } from './metrics-helper.js';
import {
  createSnapshotProvider,
  parseIntervalMs,
  parseMaxTickers,
  parseOutputFormat,
  resolveAnalysisParameters,
  snapshotSourceArgs,
} from './options.js';

export const metricsCommand = define({
  name: 'metrics',
  description: 'Derive financial metrics for a list of tickers',
  args: {
    tickers: {
      type: 'string',
      short: 't',
      description: 'Tickers separated by commas or spaces (e.g. "AAPL, MSFT")',
    },
    max: {
      type: 'string',
      short: 'm',
      description: 'Maximum number of tickers to process, 1-50 (default: 10)',
    },
    interval: {
      type: 'string',
      description: 'Minimum milliseconds between snapshot requests (default: 1000)',
    },
    format: {
      type: 'string',
      short: 'f',
      description: 'Output format (table|json|csv)',
      default: 'table',
    },
    ...snapshotSourceArgs,
  },
  examples: `
# Metrics for a few tickers from ./snapshots
${CLI_NAME} analysis metrics --tickers "AAPL, MSFT, GOOG"

# Read snapshots from a service and export CSV
${CLI_NAME} analysis metrics -t AAPL,MSFT --url http://localhost:8080/api --format csv

# Custom rates (percent)
${CLI_NAME} analysis metrics -t AAPL --risk-free 4 --market-return 9 --tax-rate 25
  `.trim(),
  run: async (ctx) => {
    const values = ctx.values;

    await executeMetricsAnalysis({
      tickers: values.tickers,
      maxTickers: parseMaxTickers(values.max),
      parameters: resolveAnalysisParameters(values),
      provider: createSnapshotProvider(values),
      intervalMs: parseIntervalMs(values.interval),
      format: parseOutputFormat(values.format),
      debug: values.debug,
    });
  },
});
