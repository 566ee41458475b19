export * from './base/http-client.js';
export * from './snapshots/index.js';
