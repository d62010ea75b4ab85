/**
 * Durable storage for effectiveness records and optimization history
 */

export type { RecordStore } from './types.js';
export { MemoryRecordStore } from './memory-store.js';
export { FileRecordStore } from './file-store.js';
export { DisabledRecordStore } from './disabled-store.js';
export { createRecordStore, type RecordStoreOptions } from './store-factory.js';
