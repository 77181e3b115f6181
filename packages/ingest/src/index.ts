/**
 * @plenar/ingest
 *
 * Ingestion of Bundestag XML into a record store.
 *
 * This package provides:
 * - Layered configuration (defaults, environment, overrides)
 * - Event hooks for progress and failure reporting
 * - Markup sources (paths, gzip, buffers, text, streams)
 * - IngestionWorker (one input file into one store)
 * - runIngestion (bounded-parallel workers over many files)
 * - The plenar-ingest command line
 *
 * @packageDocumentation
 */

// Configuration
export {
  DEFAULT_INGEST_CONFIG,
  FAILURE_POLICIES,
  isFailurePolicy,
  loadIngestConfig,
  parseInteger,
  validateIngestConfig,
  type CollectionNames,
  type Environment,
  type FailurePolicy,
  type IngestConfig,
  type IngestConfigOverrides,
} from './config/ingest-config.js';

// Event hooks
export { CompositeEventHooks, NoopEventHooks, LoggingEventHooks } from './events/hooks.js';
export type {
  IngestEventHooks,
  WorkerStartEvent,
  FileParsedEvent,
  RecordsStoredEvent,
  RecordFailedEvent,
  WorkerCompleteEvent,
  WorkerErrorEvent,
} from '@plenar/contracts';

// Sources
export {
  isGzipped,
  pathSource,
  readMarkupSource,
  sourceLabel,
  type MarkupSource,
} from './source/markup-source.js';

// Worker and runner
export {
  IngestionWorker,
  type IngestionWorkerOptions,
  type WorkerResult,
  type WorkerSettings,
} from './worker/ingestion-worker.js';
export {
  runIngestion,
  type FileResult,
  type IngestionSummary,
  type RunIngestionOptions,
} from './runner/run-ingestion.js';

// CLI
export { main, parseCliArguments, USAGE, type CliDependencies } from './cli.js';
