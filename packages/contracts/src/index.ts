/**
 * @plenar/contracts
 *
 * Record types, store and event contracts for Bundestag XML ingestion.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Records
export * from './records/member.js';
export * from './records/printed-matter.js';
export * from './records/schema.js';

// Storage
export * from './store/record-store.js';

// Events
export * from './events/ingest-events.js';
