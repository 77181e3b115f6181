/* eslint-disable @typescript-eslint/no-extraneous-class -- Namespace class for hook management */
/**
 * Ingestion Event Hooks
 *
 * Implementations of the IngestEventHooks contract: fan-out, no-op and
 * logging receivers.
 *
 * @packageDocumentation
 */

import type {
  FileParsedEvent,
  IngestEventHooks,
  RecordFailedEvent,
  RecordsStoredEvent,
  WorkerCompleteEvent,
  WorkerErrorEvent,
  WorkerStartEvent,
} from '@plenar/contracts';
import type { Logger } from '@plenar/shared';

/**
 * Composite event hooks that dispatches to multiple listeners.
 */
export class CompositeEventHooks implements IngestEventHooks {
  private readonly hooks: IngestEventHooks[];

  constructor(hooks: IngestEventHooks[]) {
    this.hooks = hooks;
  }

  async onWorkerStart(event: WorkerStartEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onWorkerStart?.(event)));
  }

  async onFileParsed(event: FileParsedEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onFileParsed?.(event)));
  }

  async onRecordsStored(event: RecordsStoredEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onRecordsStored?.(event)));
  }

  async onRecordFailed(event: RecordFailedEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onRecordFailed?.(event)));
  }

  async onWorkerComplete(event: WorkerCompleteEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onWorkerComplete?.(event)));
  }

  async onWorkerError(event: WorkerErrorEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onWorkerError?.(event)));
  }
}

/**
 * No-op event hooks (default when no hooks configured).
 */
export class NoopEventHooks implements IngestEventHooks {
  // All methods are no-ops by default (interface methods are optional)
}

/**
 * Writes ingestion events as log lines, one child logger per worker.
 */
export class LoggingEventHooks implements IngestEventHooks {
  private readonly logger: Logger;
  private readonly workerLoggers = new Map<string, Logger>();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  onWorkerStart(event: WorkerStartEvent): void {
    this.forWorker(event.workerId).info('Worker started', { source: event.source });
  }

  onFileParsed(event: FileParsedEvent): void {
    this.forWorker(event.workerId).info('File parsed', {
      source: event.source,
      schema: event.schema,
      version: event.version,
      durationMs: event.durationMs,
    });
  }

  onRecordsStored(event: RecordsStoredEvent): void {
    this.forWorker(event.workerId).debug('Records stored', {
      collection: event.collection,
      count: event.count,
      total: event.total,
    });
  }

  onRecordFailed(event: RecordFailedEvent): void {
    const logger = this.forWorker(event.workerId);
    const context = { source: event.source, position: event.position, error: event.error };
    if (event.skipped) {
      logger.warn('Record skipped', context);
    } else {
      logger.error('Record failed', context);
    }
  }

  onWorkerComplete(event: WorkerCompleteEvent): void {
    this.forWorker(event.workerId).info('Worker completed', {
      source: event.source,
      stored: event.stored,
      failed: event.failed,
      durationMs: event.durationMs,
    });
    this.workerLoggers.delete(event.workerId);
  }

  onWorkerError(event: WorkerErrorEvent): void {
    this.forWorker(event.workerId).error('Worker failed', {
      source: event.source,
      error: event.error,
      stored: event.stored,
      durationMs: event.durationMs,
    });
    this.workerLoggers.delete(event.workerId);
  }

  private forWorker(workerId: string): Logger {
    let logger = this.workerLoggers.get(workerId);
    if (!logger) {
      logger = this.logger.child({ workerId });
      this.workerLoggers.set(workerId, logger);
    }
    return logger;
  }
}
