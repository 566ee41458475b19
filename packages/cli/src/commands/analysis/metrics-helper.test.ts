import { noPacing } from '@valuescope/shared';
import { createSnapshot, defaultParameters } from '@valuescope/shared/test-utils';
import chalk from 'chalk';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { StubSnapshotProvider } from '../../test-utils/stub-provider.js';
import { CLIError, CLIValidationError } from '../../utils/error-handling.js';
import { executeCompanyAnalysis } from './company.js';
import { executeMetricsAnalysis, type MetricsRunOptions } from './metrics-helper.js';

function printedLines(): string[] {
  return vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
}

function runOptions(overrides: Partial<MetricsRunOptions>): MetricsRunOptions {
  return {
    tickers: 'AAA',
    maxTickers: 10,
    parameters: defaultParameters,
    provider: new StubSnapshotProvider({}),
    pacer: noPacing,
    intervalMs: 0,
    format: 'json',
    ...overrides,
  };
}

describe('executeMetricsAnalysis', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('normalizes tickers and keeps failures next to results', async () => {
    const provider = new StubSnapshotProvider({ AAA: createSnapshot({ ticker: 'AAA' }) });

    const result = await executeMetricsAnalysis(runOptions({ tickers: 'aaa, zzz ;AAA', provider }));

    expect([...result.keys()]).toEqual(['AAA', 'ZZZ']);
    expect(provider.requested).toEqual(['AAA', 'ZZZ']);
    expect(result.get('ZZZ')?.kind).toBe('error');
  });

  it('prints a JSON document for --format json', async () => {
    const provider = new StubSnapshotProvider({ AAA: createSnapshot({ ticker: 'AAA' }) });

    await executeMetricsAnalysis(runOptions({ provider }));

    const printed = printedLines().join('\n');
    expect(JSON.parse(printed)).toMatchObject({
      summary: { total: 1, succeeded: 1, failed: 0, valueCreators: ['AAA'] },
    });
  });

  it('prints CSV lines for --format csv', async () => {
    const provider = new StubSnapshotProvider({ AAA: createSnapshot({ ticker: 'AAA' }) });

    await executeMetricsAnalysis(runOptions({ provider, format: 'csv' }));

    const printed = printedLines();
    expect(printed).toHaveLength(2);
    expect(printed[0]?.startsWith('Ticker,Name,Sector,')).toBe(true);
    expect(printed[1]?.startsWith('AAA,Test Industries Inc.,')).toBe(true);
  });

  it('processes only the first maxTickers tickers and warns on stderr', async () => {
    const provider = new StubSnapshotProvider({
      A: createSnapshot({ ticker: 'A' }),
      B: createSnapshot({ ticker: 'B' }),
      C: createSnapshot({ ticker: 'C' }),
    });

    const result = await executeMetricsAnalysis(runOptions({ tickers: 'A B C', maxTickers: 2, provider }));

    expect([...result.keys()]).toEqual(['A', 'B']);
    const notices = vi.mocked(console.error).mock.calls.map((call) => String(call[0]));
    expect(notices).toContain('⚠️  Only the first 2 of 3 tickers will be processed');
    expect(JSON.parse(printedLines().join('\n'))).toMatchObject({ summary: { total: 2 } });
  });

  it('refuses an empty ticker list', async () => {
    const provider = new StubSnapshotProvider({});

    await expect(executeMetricsAnalysis(runOptions({ tickers: ' , ', provider }))).rejects.toThrow(
      new CLIValidationError('Please enter at least one ticker')
    );
    expect(provider.requested).toEqual([]);
  });

  it('refuses a negative fetch interval as a usage error before fetching', async () => {
    const provider = new StubSnapshotProvider({ AAA: createSnapshot({ ticker: 'AAA' }) });

    const error = await executeMetricsAnalysis(runOptions({ provider, pacer: undefined, intervalMs: -5 })).then(
      () => undefined,
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(CLIValidationError);
    expect(error instanceof CLIError && error.exitCode).toBe(2);
    expect(error instanceof CLIError && error.message).toBe('minIntervalMs must be a non-negative number, got -5');
    expect(provider.requested).toEqual([]);
  });

  it('fails when no ticker yields data', async () => {
    const error = await executeMetricsAnalysis(runOptions({ tickers: 'X Y' })).then(
      () => undefined,
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(CLIError);
    expect(error instanceof CLIError && error.exitCode).toBe(1);
    expect(error instanceof CLIError && error.message).toBe('No valid data was obtained for any ticker');
  });
});

describe('executeCompanyAnalysis', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the derived metrics of one ticker', async () => {
    const provider = new StubSnapshotProvider({ MSFT: createSnapshot({ ticker: 'MSFT' }) });

    const metrics = await executeCompanyAnalysis({
      ticker: ' msft ',
      parameters: defaultParameters,
      provider,
      json: true,
    });

    expect(metrics.ticker).toBe('MSFT');
    expect(metrics.valueCreation).toBe('creating');
  });

  it('fails with the reason of a failed fetch', async () => {
    const provider = new StubSnapshotProvider({});

    await expect(
      executeCompanyAnalysis({ ticker: 'NOPE', parameters: defaultParameters, provider, json: true })
    ).rejects.toThrow('Analysis failed for NOPE: Snapshot not found for NOPE');
  });

  it('requires a ticker', async () => {
    await expect(
      executeCompanyAnalysis({ ticker: undefined, parameters: defaultParameters, provider: new StubSnapshotProvider({}) })
    ).rejects.toBeInstanceOf(CLIValidationError);
  });
});
