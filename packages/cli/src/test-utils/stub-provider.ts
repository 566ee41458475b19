import { type RawFinancialSnapshot, type SnapshotProvider, SnapshotNotFoundError } from '@valuescope/shared';

/**
 * In-memory snapshot provider; unknown tickers are not found
 */
export class StubSnapshotProvider implements SnapshotProvider {
  readonly requested: string[] = [];

  constructor(private readonly snapshots: Record<string, RawFinancialSnapshot>) {}

  async fetchSnapshot(ticker: string): Promise<RawFinancialSnapshot> {
    this.requested.push(ticker);
    const snapshot = this.snapshots[ticker];
    if (!snapshot) {
      throw new SnapshotNotFoundError(`Snapshot not found for ${ticker}`, ticker);
    }
    return snapshot;
  }
}
