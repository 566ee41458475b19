/**
 * Ticker list normalization, done by the caller before a batch run
 */

const TICKER_SEPARATOR = /[\s,;]+/;

/**
 * Split, trim and upper-case a ticker list, drop empty entries and duplicates
 * (first occurrence wins, order preserved) and keep at most maxCount entries.
 */
export function normalizeTickers(input: string | readonly string[], maxCount: number): string[] {
  const raw = typeof input === 'string' ? input.split(TICKER_SEPARATOR) : input.flatMap((t) => t.split(TICKER_SEPARATOR));
  const seen = new Set<string>();
  const tickers: string[] = [];

  for (const candidate of raw) {
    const ticker = candidate.trim().toUpperCase();
    if (!ticker || seen.has(ticker)) continue;
    seen.add(ticker);
    tickers.push(ticker);
  }

  return tickers.slice(0, Math.max(0, maxCount));
}
