export type { BatchOrchestratorOptions, BatchProgressCallback, BatchSummary } from './BatchOrchestrator';
export {
  BatchOrchestrator,
  batchResultToObject,
  isDerivedMetrics,
  isErrorRecord,
  summarizeBatch,
} from './BatchOrchestrator';
export type { MinIntervalPacerOptions, Pacer } from './pacing';
export { MinIntervalPacer, noPacing } from './pacing';
export { normalizeTickers } from './tickers';
