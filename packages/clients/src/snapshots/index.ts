export type { FileSnapshotProviderOptions } from './FileSnapshotProvider.js';
export { FileSnapshotProvider } from './FileSnapshotProvider.js';
export type { HttpSnapshotProviderOptions } from './HttpSnapshotProvider.js';
export { HttpSnapshotProvider } from './HttpSnapshotProvider.js';
export type { SnapshotDocument } from './schema.js';
export { parseSnapshotDocument, SnapshotDocumentSchema } from './schema.js';
