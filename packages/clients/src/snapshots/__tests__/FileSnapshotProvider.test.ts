import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { SnapshotFetchError, SnapshotNotFoundError, SnapshotValidationError } from '@valuescope/shared';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileSnapshotProvider } from '../FileSnapshotProvider.js';

describe('FileSnapshotProvider', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'valuescope-snapshots-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('reads <TICKER>.json from the directory', async () => {
    await writeFile(
      path.join(directory, 'AAPL.json'),
      JSON.stringify({
        info: { longName: 'Apple Inc.', currentPrice: 190 },
        balanceSheet: { 'Long Term Debt': [100, 90] },
      })
    );
    const provider = new FileSnapshotProvider({ directory });

    const snapshot = await provider.fetchSnapshot('AAPL');

    expect(snapshot.ticker).toBe('AAPL');
    expect(snapshot.info.currentPrice).toBe(190);
    expect(snapshot.balanceSheet['Long Term Debt']).toEqual([100, 90]);
    expect(snapshot.cashFlow).toEqual({});
  });

  it('throws SnapshotNotFoundError for a missing file', async () => {
    const provider = new FileSnapshotProvider({ directory });

    await expect(provider.fetchSnapshot('NOPE')).rejects.toBeInstanceOf(SnapshotNotFoundError);
  });

  it('throws SnapshotValidationError for malformed JSON', async () => {
    await writeFile(path.join(directory, 'BAD.json'), '{ not json');
    const provider = new FileSnapshotProvider({ directory });

    await expect(provider.fetchSnapshot('BAD')).rejects.toBeInstanceOf(SnapshotValidationError);
  });

  it('refuses ticker symbols that would leave the directory', async () => {
    const provider = new FileSnapshotProvider({ directory });

    await expect(provider.fetchSnapshot('../secret')).rejects.toBeInstanceOf(SnapshotFetchError);
    expect(() => provider.resolvePath('..')).toThrow('Invalid ticker symbol: ..');
  });

  it('resolves symbols with dots and dashes', () => {
    const provider = new FileSnapshotProvider({ directory });
    expect(provider.resolvePath('BRK-B')).toBe(path.join(directory, 'BRK-B.json'));
  });
});
