/**
 * Metrics Output Functions
 * Table, CSV and JSON rendering of a batch result
 */

import {
  type AnalysisParameters,
  type BatchResult,
  type BatchSummary,
  batchResultToObject,
  type DerivedMetrics,
  type ErrorRecord,
  formatDerivedMetrics,
  isErrorRecord,
  METRIC_COLUMNS,
  NOT_AVAILABLE,
  type ValueCreationVerdict,
} from '@valuescope/shared';
import chalk from 'chalk';
import { escapeCSV, fitColumn } from '../../utils/format-helpers.js';

interface TableColumn {
  key: string;
  label: string;
  width: number;
}

/** Columns of the terminal table; CSV and JSON carry every metric */
const TABLE_COLUMNS: readonly TableColumn[] = [
  { key: 'ticker', label: 'Ticker', width: 8 },
  { key: 'name', label: 'Name', width: 24 },
  { key: 'price', label: 'Price', width: 10 },
  { key: 'pe', label: 'P/E', width: 8 },
  { key: 'pfcf', label: 'P/FCF', width: 8 },
  { key: 'roe', label: 'ROE', width: 9 },
  { key: 'roic', label: 'ROIC', width: 9 },
  { key: 'wacc', label: 'WACC', width: 9 },
  { key: 'eva', label: 'EVA', width: 16 },
  { key: 'revenueGrowth', label: 'Rev Gr.', width: 9 },
];

const TABLE_WIDTH = TABLE_COLUMNS.reduce((sum, column) => sum + column.width, 0) + 10;

const VERDICT_LABELS: Record<ValueCreationVerdict, string> = {
  creating: 'Creating',
  destroying: 'Destroying',
  'insufficient-data': NOT_AVAILABLE,
};

function colorVerdict(verdict: ValueCreationVerdict): string {
  const label = VERDICT_LABELS[verdict];
  if (verdict === 'creating') return chalk.green(label);
  if (verdict === 'destroying') return chalk.red(label);
  return chalk.gray(label);
}

function renderMetricsRow(metrics: DerivedMetrics): string {
  const formatted = formatDerivedMetrics(metrics);
  const cells = TABLE_COLUMNS.map((column) => fitColumn(formatted[column.key] ?? NOT_AVAILABLE, column.width));
  return cells.join('') + colorVerdict(metrics.valueCreation);
}

function renderErrorLine(record: ErrorRecord): string {
  return `${chalk.bold(record.ticker.padEnd(8))}${chalk.red(record.reason)} ${chalk.dim(`(${record.errorType})`)}`;
}

/**
 * Lines of the summary table, the failed tickers and the totals
 */
export function renderMetricsTable(result: BatchResult, summary: BatchSummary): string[] {
  const lines: string[] = [];
  const succeeded = [...result.values()].filter((outcome): outcome is DerivedMetrics => !isErrorRecord(outcome));
  const failed = [...result.values()].filter(isErrorRecord);

  lines.push(chalk.bold('Financial Metrics'));
  lines.push('═'.repeat(TABLE_WIDTH));
  lines.push(chalk.bold.cyan(TABLE_COLUMNS.map((column) => column.label.padEnd(column.width)).join('') + 'Value'));
  lines.push('─'.repeat(TABLE_WIDTH));
  for (const metrics of succeeded) {
    lines.push(renderMetricsRow(metrics));
  }
  lines.push('─'.repeat(TABLE_WIDTH));

  if (failed.length > 0) {
    lines.push('');
    lines.push(chalk.bold(`Failed tickers (${failed.length}):`));
    for (const record of failed) {
      lines.push(renderErrorLine(record));
    }
  }

  lines.push('');
  lines.push(`Tickers:           ${summary.total} (${summary.succeeded} succeeded, ${summary.failed} failed)`);
  lines.push(`Creating value:    ${summary.valueCreators.length > 0 ? summary.valueCreators.join(', ') : '-'}`);
  lines.push(`Destroying value:  ${summary.valueDestroyers.length > 0 ? summary.valueDestroyers.join(', ') : '-'}`);
  lines.push(chalk.dim('Value = ROIC compared with WACC; N/A when either is unavailable'));

  return lines;
}

/**
 * CSV lines: one row per ticker, every metric column plus the verdict and error reason
 */
export function renderMetricsCSV(result: BatchResult): string[] {
  const header = [...METRIC_COLUMNS.map((column) => column.label), 'Value Creation', 'Error'];
  const lines = [header.map(escapeCSV).join(',')];

  for (const [ticker, outcome] of result) {
    if (isErrorRecord(outcome)) {
      const blanks = METRIC_COLUMNS.slice(1).map(() => '');
      lines.push([escapeCSV(ticker), ...blanks, '', escapeCSV(outcome.reason)].join(','));
      continue;
    }
    const formatted = formatDerivedMetrics(outcome);
    const cells = METRIC_COLUMNS.map((column) => escapeCSV(formatted[column.key]));
    lines.push([...cells, outcome.valueCreation, ''].join(','));
  }

  return lines;
}

/**
 * JSON document with the run parameters, totals and raw outcomes (fractions, not percent)
 */
export function renderMetricsJSON(result: BatchResult, summary: BatchSummary, parameters: AnalysisParameters): string {
  return JSON.stringify({ parameters, summary, results: batchResultToObject(result) }, null, 2);
}
