import {
  type RawFinancialSnapshot,
  type SnapshotProvider,
  SnapshotFetchError,
  SnapshotNotFoundError,
} from '@valuescope/shared';
import { HttpRequestError, JsonHttpClient } from '../base/http-client.js';
import { parseSnapshotDocument } from './schema.js';

export interface HttpSnapshotProviderOptions {
  /** Base URL of the snapshot service, e.g. http://localhost:8080/api */
  baseUrl: string;
  /** Per-request timeout; no timeout when omitted */
  timeoutMs?: number;
}

function describeRequestError(error: HttpRequestError): string {
  switch (error.kind) {
    case 'http':
      return `HTTP ${error.status ?? 'error'}: ${error.message}`;
    case 'network':
      return `Network error: ${error.message}`;
    default:
      return error.message;
  }
}

/**
 * Fetches snapshot documents from `<baseUrl>/snapshots/<TICKER>`.
 * One request per call: no retry and no caching.
 */
export class HttpSnapshotProvider implements SnapshotProvider {
  private readonly client: JsonHttpClient;

  constructor(options: HttpSnapshotProviderOptions) {
    this.client = new JsonHttpClient({ baseUrl: options.baseUrl, timeoutMs: options.timeoutMs });
  }

  get baseUrl(): string {
    return this.client.baseUrl;
  }

  async fetchSnapshot(ticker: string): Promise<RawFinancialSnapshot> {
    let document: unknown;
    try {
      document = await this.client.getJson(`snapshots/${encodeURIComponent(ticker)}`);
    } catch (error) {
      if (error instanceof HttpRequestError) {
        const message = `Failed to fetch snapshot for ${ticker}: ${describeRequestError(error)}`;
        if (error.status === 404) {
          throw new SnapshotNotFoundError(message, ticker, error);
        }
        throw new SnapshotFetchError(message, ticker, error);
      }
      throw error;
    }

    return parseSnapshotDocument(document, ticker);
  }
}
