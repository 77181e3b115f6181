/**
 * @plenar/storage
 *
 * Record stores for Plenar.
 *
 * @packageDocumentation
 */

// In-memory store
export { MemoryRecordStore } from './memory/memory-record-store.js';

// PostgreSQL storage
export * from './postgres/index.js';

export { containsJson, serializeRecord, toDocument } from './serialize.js';

// Re-export types from contracts
export type {
  RecordFilter,
  RecordStore,
  RecordStoreFactory,
  StorableRecord,
  StoredRecord,
} from '@plenar/contracts';
