import { describe, expect, it } from 'vitest';
import { normalizeTickers } from '../tickers';

describe('normalizeTickers', () => {
  it('splits on commas, semicolons and whitespace', () => {
    expect(normalizeTickers('aapl, msft;goog  amzn\nnvda', 10)).toEqual(['AAPL', 'MSFT', 'GOOG', 'AMZN', 'NVDA']);
  });

  it('drops empty entries and duplicates, keeping the first occurrence', () => {
    expect(normalizeTickers(' ,AAPL,,msft, aapl ,', 10)).toEqual(['AAPL', 'MSFT']);
  });

  it('truncates to the maximum count', () => {
    expect(normalizeTickers('A B C D', 2)).toEqual(['A', 'B']);
    expect(normalizeTickers('A B', 0)).toEqual([]);
  });

  it('accepts a list of arguments', () => {
    expect(normalizeTickers(['aapl', 'msft,goog', 'AAPL'], 10)).toEqual(['AAPL', 'MSFT', 'GOOG']);
  });

  it('returns an empty list for blank input', () => {
    expect(normalizeTickers('   ', 10)).toEqual([]);
  });
});
