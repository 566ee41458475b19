/**
 * CLI Constants
 */

export const CLI_NAME = 'valuescope';
export const CLI_VERSION = '0.1.0';
export const CLI_DESCRIPTION = 'Cost of capital, ROIC/EVA and growth metrics for a list of tickers';

/** Snapshot directory used when neither --source nor --url is given */
export const DEFAULT_SNAPSHOT_DIR = process.env.VALUESCOPE_SNAPSHOT_DIR ?? './snapshots';
