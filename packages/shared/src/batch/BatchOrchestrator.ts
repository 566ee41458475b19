/**
 * BatchOrchestrator - Runs the metric derivation over a ticker list
 *
 * Tickers are processed one at a time. A failing ticker becomes an ErrorRecord
 * and the loop moves on: there is no retry, no abort and no added timeout.
 */

import type { AnalysisParameters } from '../config';
import { categorizeErrorType, getErrorMessage } from '../errors';
import { deriveMetrics } from '../fundamental-analysis/derive';
import type { BatchResult, DerivedMetrics, ErrorRecord, TickerOutcome } from '../fundamental-analysis/types';
import type { RawFinancialSnapshot, SnapshotProvider } from '../types/snapshot';
import type { ILogger } from '../utils/logger-interface';
import { logger as defaultLogger } from '../utils/logger';
import { noPacing, type Pacer } from './pacing';

export type BatchProgressCallback = (completed: number, total: number, ticker: string, outcome: TickerOutcome) => void;

export interface BatchOrchestratorOptions {
  provider: SnapshotProvider;
  /** Spacing policy between provider calls (default: none) */
  pacer?: Pacer;
  logger?: ILogger;
  onProgress?: BatchProgressCallback;
  /** Called before each fetch, e.g. to update a status line */
  onTickerStart?: (ticker: string, index: number, total: number) => void;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  valueCreators: string[];
  valueDestroyers: string[];
}

export function isErrorRecord(outcome: TickerOutcome): outcome is ErrorRecord {
  return outcome.kind === 'error';
}

export function isDerivedMetrics(outcome: TickerOutcome): outcome is DerivedMetrics {
  return outcome.kind === 'metrics';
}

function createErrorRecord(ticker: string, error: unknown, stage: ErrorRecord['stage']): ErrorRecord {
  return Object.freeze({
    kind: 'error' as const,
    ticker,
    reason: getErrorMessage(error),
    errorType: categorizeErrorType(error),
    stage,
  });
}

/**
 * Sequential batch runner with per-ticker failure isolation
 */
export class BatchOrchestrator {
  private readonly provider: SnapshotProvider;
  private readonly pacer: Pacer;
  private readonly logger: ILogger;
  private readonly onProgress?: BatchProgressCallback;
  private readonly onTickerStart?: BatchOrchestratorOptions['onTickerStart'];

  constructor(options: BatchOrchestratorOptions) {
    this.provider = options.provider;
    this.pacer = options.pacer ?? noPacing;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'batch' });
    this.onProgress = options.onProgress;
    this.onTickerStart = options.onTickerStart;
  }

  /**
   * Process every ticker exactly once.
   *
   * @param tickers already normalized (upper-cased, deduplicated, truncated) by the caller
   * @param parameters rates held constant for the whole run
   */
  async run(tickers: readonly string[], parameters: AnalysisParameters): Promise<BatchResult> {
    const runParameters = Object.freeze({ ...parameters });
    const results = new Map<string, TickerOutcome>();
    const total = tickers.length;

    this.logger.info(`Starting batch for ${total} ticker(s)`);

    for (let i = 0; i < total; i++) {
      const ticker = tickers[i];
      if (ticker === undefined) continue;

      this.onTickerStart?.(ticker, i, total);
      const outcome = await this.processTicker(ticker, runParameters);
      results.set(ticker, outcome);
      this.onProgress?.(i + 1, total, ticker, outcome);
    }

    const summary = summarizeBatch(results);
    this.logger.info(`Batch finished: ${summary.succeeded} succeeded, ${summary.failed} failed`, {
      total: summary.total,
    });

    return results;
  }

  private async processTicker(ticker: string, parameters: AnalysisParameters): Promise<TickerOutcome> {
    let snapshot: RawFinancialSnapshot;
    try {
      await this.pacer.acquire();
      this.logger.debug('Fetching snapshot', { ticker });
      snapshot = await this.provider.fetchSnapshot(ticker);
    } catch (error) {
      const record = createErrorRecord(ticker, error, 'fetch');
      this.logger.warn(`Snapshot fetch failed for ${ticker}`, { error: record.reason, errorType: record.errorType });
      return record;
    }

    try {
      return deriveMetrics({ ...snapshot, ticker }, parameters);
    } catch (error) {
      const record = createErrorRecord(ticker, error, 'compute');
      this.logger.error(`Metric derivation failed for ${ticker}`, { error: record.reason });
      return record;
    }
  }
}

/**
 * Count outcomes and split the defined verdicts
 */
export function summarizeBatch(result: BatchResult): BatchSummary {
  const summary: BatchSummary = { total: result.size, succeeded: 0, failed: 0, valueCreators: [], valueDestroyers: [] };

  for (const [ticker, outcome] of result) {
    if (isErrorRecord(outcome)) {
      summary.failed++;
      continue;
    }
    summary.succeeded++;
    if (outcome.valueCreation === 'creating') summary.valueCreators.push(ticker);
    if (outcome.valueCreation === 'destroying') summary.valueDestroyers.push(ticker);
  }

  return summary;
}

/**
 * Convert a batch result to a plain object for JSON output
 */
export function batchResultToObject(result: BatchResult): Record<string, TickerOutcome> {
  return Object.fromEntries(result);
}
