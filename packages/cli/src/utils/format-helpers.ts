/**
 * Format Helpers
 * Common formatting utilities for CLI commands
 */

/**
 * Format a run duration: milliseconds below one second, one decimal below a minute
 */
export function formatElapsedTime(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;

  const totalSeconds = Math.floor(ms / 1000);
  return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
}

/**
 * Quote a CSV field when it contains a delimiter, a quote or a line break
 */
export function escapeCSV(value: string | number | undefined): string {
  if (value === undefined) return '';
  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Fit text into a fixed-width column, cutting with an ellipsis when too long
 */
export function fitColumn(text: string, width: number): string {
  if (text.length <= width - 1) return text.padEnd(width);
  return `${text.slice(0, width - 2)}…`.padEnd(width);
}
