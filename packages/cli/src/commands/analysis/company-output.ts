/**
 * Company Detail Output
 * Single-ticker view with the ROIC/WACC value-creation verdict
 */

import { type DerivedMetrics, formatDerivedMetrics, type MetricGap, NOT_AVAILABLE } from '@valuescope/shared';
import chalk from 'chalk';

/** Detail rows, by METRIC_COLUMNS key */
const DETAIL_ROWS: ReadonlyArray<{ key: string; label: string }> = [
  { key: 'price', label: 'Price' },
  { key: 'pe', label: 'P/E' },
  { key: 'pb', label: 'P/B' },
  { key: 'roe', label: 'ROE' },
  { key: 'roic', label: 'ROIC' },
  { key: 'wacc', label: 'WACC' },
  { key: 'eva', label: 'EVA' },
  { key: 'debtToEquity', label: 'Debt/Equity' },
  { key: 'profitMargin', label: 'Profit Margin' },
  { key: 'dividend', label: 'Dividend Est.' },
];

export function describeValueCreation(metrics: DerivedMetrics): string {
  switch (metrics.valueCreation) {
    case 'creating':
      return 'The company is creating value (ROIC > WACC)';
    case 'destroying':
      return 'The company is destroying value (ROIC < WACC)';
    default:
      return 'Insufficient data for ROIC/WACC analysis';
  }
}

function describeGap(gap: MetricGap): string {
  switch (gap.reason) {
    case 'zero_denominator':
      return `${gap.input} is zero`;
    case 'overflow':
      return `${gap.input} is out of range`;
    default:
      return `${gap.input} is missing`;
  }
}

function colorVerdict(metrics: DerivedMetrics): string {
  const text = describeValueCreation(metrics);
  if (metrics.valueCreation === 'creating') return chalk.green(`✅ ${text}`);
  if (metrics.valueCreation === 'destroying') return chalk.red(`❌ ${text}`);
  return chalk.yellow(`⚠️  ${text}`);
}

export function renderCompanyDetail(metrics: DerivedMetrics): string[] {
  const formatted = formatDerivedMetrics(metrics);
  const { profile } = metrics;
  const lines: string[] = [];

  lines.push(chalk.bold(`${profile.name} (${metrics.ticker})`));
  lines.push(
    chalk.dim(
      [profile.sector, profile.industry, profile.country].map((value) => value ?? NOT_AVAILABLE).join(' | ')
    )
  );
  lines.push('─'.repeat(40));
  for (const row of DETAIL_ROWS) {
    lines.push(`${row.label.padEnd(16)}${formatted[row.key] ?? NOT_AVAILABLE}`);
  }
  lines.push('─'.repeat(40));
  lines.push(colorVerdict(metrics));

  if (metrics.gaps.length > 0) {
    lines.push('');
    lines.push(chalk.dim('Unavailable metrics:'));
    for (const gap of metrics.gaps) {
      lines.push(chalk.dim(`  ${gap.metric}: ${describeGap(gap)}`));
    }
  }

  return lines;
}
