import { SnapshotValidationError } from '@valuescope/shared';
import { describe, expect, it } from 'vitest';
import { parseSnapshotDocument } from '../schema.js';

function captureValidationError(run: () => unknown): SnapshotValidationError {
  try {
    run();
  } catch (error) {
    if (error instanceof SnapshotValidationError) return error;
    throw error;
  }
  throw new Error('Expected SnapshotValidationError');
}

describe('parseSnapshotDocument', () => {
  it('reads numbers, numeric strings and null cells', () => {
    const snapshot = parseSnapshotDocument(
      {
        ticker: 'AAPL',
        info: { longName: 'Apple Inc.', currentPrice: '189.5', sharesOutstanding: 15000000000, beta: null },
        balanceSheet: { 'Long Term Debt': ['95000000000', null, 1.5e10] },
        incomeStatement: { EBIT: [1200] },
        cashFlow: {},
      },
      'AAPL'
    );

    expect(snapshot.info.longName).toBe('Apple Inc.');
    expect(snapshot.info.currentPrice).toBe(189.5);
    expect(snapshot.info.sharesOutstanding).toBe(15000000000);
    expect(snapshot.info.beta).toBeUndefined();
    expect(snapshot.balanceSheet['Long Term Debt']).toEqual([95000000000, null, 15000000000]);
    expect(snapshot.incomeStatement.EBIT).toEqual([1200]);
  });

  it('defaults missing sections to empty', () => {
    expect(parseSnapshotDocument({}, 'EMPTY')).toEqual({
      ticker: 'EMPTY',
      info: {},
      balanceSheet: {},
      incomeStatement: {},
      cashFlow: {},
    });
  });

  it('keys the snapshot by the requested ticker', () => {
    expect(parseSnapshotDocument({ ticker: 'other' }, 'MSFT').ticker).toBe('MSFT');
  });

  it('ignores unknown keys', () => {
    const snapshot = parseSnapshotDocument({ info: { website: 'https://example.test' }, recommendations: [] }, 'X');
    expect(snapshot.info).toEqual({});
    expect(Object.keys(snapshot)).toEqual(['ticker', 'info', 'balanceSheet', 'incomeStatement', 'cashFlow']);
  });

  it('rejects non-numeric text in a numeric field', () => {
    const error = captureValidationError(() => parseSnapshotDocument({ info: { beta: 'high' } }, 'BAD'));

    expect(error.ticker).toBe('BAD');
    expect(error.code).toBe('INVALID_SNAPSHOT');
    expect(error.issues).toEqual(['info.beta: Expected a numeric string']);
    expect(error.message).toBe('Invalid snapshot for BAD: info.beta: Expected a numeric string');
  });

  it('reports the path of an invalid statement cell', () => {
    const error = captureValidationError(() =>
      parseSnapshotDocument({ cashFlow: { 'Free Cash Flow': [100, 'n/a'] } }, 'BAD')
    );

    expect(error.issues).toEqual(['cashFlow.Free Cash Flow.1: Expected a numeric string']);
  });

  it('rejects a document that is not an object', () => {
    const error = captureValidationError(() => parseSnapshotDocument([1, 2], 'BAD'));
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.startsWith('(root): ')).toBe(true);
  });
});
