/**
 * Ingestion Event Hooks
 *
 * Structured progress and failure events emitted by ingestion workers.
 * Every event is keyed by the worker that produced it; turning events
 * into log lines or metrics is left to the hook implementation.
 */

import type { SchemaKind } from '../records/schema.js';

/**
 * Fields shared by every ingestion event.
 */
export interface IngestEventBase {
  workerId: string;
  /** Input file (or source label) the worker is processing */
  source: string;
  timestamp: string;
}

/**
 * Emitted when a worker picks up its input.
 */
export type WorkerStartEvent = IngestEventBase;

/**
 * Emitted once the input has been parsed and its schema detected.
 */
export interface FileParsedEvent extends IngestEventBase {
  schema: SchemaKind;
  /** Roster version, for member rosters */
  version?: string;
  durationMs: number;
}

/**
 * Emitted after a batch of records reached the store.
 */
export interface RecordsStoredEvent extends IngestEventBase {
  collection: string;
  count: number;
  /** Total records stored by this worker so far */
  total: number;
}

/**
 * Emitted when a top-level element could not be extracted.
 */
export interface RecordFailedEvent extends IngestEventBase {
  /** Zero-based position of the top-level element */
  position: number;
  error: Error;
  /** Whether the worker continues with the next element */
  skipped: boolean;
}

/**
 * Emitted when a worker finished its input.
 */
export interface WorkerCompleteEvent extends IngestEventBase {
  stored: number;
  failed: number;
  durationMs: number;
}

/**
 * Emitted when a worker gave up on its input.
 */
export interface WorkerErrorEvent extends IngestEventBase {
  error: Error;
  stored: number;
  durationMs: number;
}

/**
 * Receiver of ingestion events. All methods are optional.
 */
export interface IngestEventHooks {
  onWorkerStart?(event: WorkerStartEvent): void | Promise<void>;
  onFileParsed?(event: FileParsedEvent): void | Promise<void>;
  onRecordsStored?(event: RecordsStoredEvent): void | Promise<void>;
  onRecordFailed?(event: RecordFailedEvent): void | Promise<void>;
  onWorkerComplete?(event: WorkerCompleteEvent): void | Promise<void>;
  onWorkerError?(event: WorkerErrorEvent): void | Promise<void>;
}
