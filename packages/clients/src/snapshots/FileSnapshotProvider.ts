import { readFile } from 'node:fs/promises';
import path from 'node:path';
import {
  type RawFinancialSnapshot,
  type SnapshotProvider,
  SnapshotFetchError,
  SnapshotNotFoundError,
  SnapshotValidationError,
} from '@valuescope/shared';
import { parseSnapshotDocument } from './schema.js';

export interface FileSnapshotProviderOptions {
  /** Directory holding one `<TICKER>.json` document per ticker */
  directory: string;
}

const SAFE_TICKER = /^[\w.^=-]+$/;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Reads snapshot documents from a local directory
 */
export class FileSnapshotProvider implements SnapshotProvider {
  readonly directory: string;

  constructor(options: FileSnapshotProviderOptions) {
    this.directory = path.resolve(options.directory);
  }

  resolvePath(ticker: string): string {
    if (!SAFE_TICKER.test(ticker) || ticker.includes('..')) {
      throw new SnapshotFetchError(`Invalid ticker symbol: ${ticker}`, ticker);
    }
    return path.join(this.directory, `${ticker}.json`);
  }

  async fetchSnapshot(ticker: string): Promise<RawFinancialSnapshot> {
    const filePath = this.resolvePath(ticker);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new SnapshotNotFoundError(`Snapshot not found for ${ticker}: ${filePath}`, ticker, error);
      }
      const cause = error instanceof Error ? error : undefined;
      throw new SnapshotFetchError(`Failed to read snapshot for ${ticker}: ${cause?.message ?? String(error)}`, ticker, cause);
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new SnapshotValidationError(
        `Invalid JSON in snapshot for ${ticker}: ${cause?.message ?? String(error)}`,
        ticker,
        [],
        cause
      );
    }

    return parseSnapshotDocument(document, ticker);
  }
}
