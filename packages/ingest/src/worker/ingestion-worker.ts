/* eslint-disable @typescript-eslint/await-thenable -- Hook results may or may not be promises */
/**
 * Ingestion Worker
 *
 * Reads one input, detects its schema, walks its document stream and
 * forwards the records to a store in document order, `batchSize` at a
 * time.
 */

import type {
  IngestEventHooks,
  RecordStore,
  SchemaKind,
  StorableRecord,
} from '@plenar/contracts';
import { UnknownSchemaError } from '@plenar/shared';
import {
  detectSchema,
  memberStream,
  parseMarkup,
  printedMatterStream,
  readSchemaVersion,
  type DocumentStream,
  type ParsedTree,
} from '@plenar/extractor';
import type { IngestConfig } from '../config/ingest-config.js';
import { NoopEventHooks } from '../events/hooks.js';
import { readMarkupSource, sourceLabel, type MarkupSource } from '../source/markup-source.js';

export type WorkerSettings = Pick<
  IngestConfig,
  'collections' | 'batchSize' | 'failurePolicy' | 'lowercaseNames'
>;

export interface IngestionWorkerOptions {
  /** Worker identifier used in events */
  id: string;
  source: MarkupSource;
  store: RecordStore;
  settings: WorkerSettings;
  hooks?: IngestEventHooks;
  /** Milliseconds clock for durations */
  now?: () => number;
}

/**
 * Outcome of a worker that finished its input.
 */
export interface WorkerResult {
  workerId: string;
  source: string;
  schema: SchemaKind;
  /** Roster version, for member rosters */
  version?: string;
  collection: string;
  stored: number;
  /** Elements reported and skipped under the `skip` policy */
  failed: number;
  durationMs: number;
}

interface OpenedStream {
  schema: SchemaKind;
  version?: string;
  collection: string;
  stream: DocumentStream<StorableRecord>;
}

/**
 * IngestionWorker drives one document stream into a store.
 *
 * The worker does not open or close the store; whoever hands it over
 * keeps that responsibility.
 *
 * @example
 * ```typescript
 * const worker = new IngestionWorker({
 *   id: 'run-1/w1',
 *   source: pathSource('MDB_STAMMDATEN.XML'),
 *   store,
 *   settings: loadIngestConfig(),
 * });
 * const result = await worker.run();
 * ```
 */
export class IngestionWorker {
  private readonly id: string;
  private readonly source: MarkupSource;
  private readonly label: string;
  private readonly store: RecordStore;
  private readonly settings: WorkerSettings;
  private readonly hooks: IngestEventHooks;
  private readonly now: () => number;
  private started = false;

  constructor(options: IngestionWorkerOptions) {
    this.id = options.id;
    this.source = options.source;
    this.label = sourceLabel(options.source);
    this.store = options.store;
    this.settings = options.settings;
    this.hooks = options.hooks ?? new NoopEventHooks();
    this.now = options.now ?? Date.now;
  }

  /**
   * Process the input once.
   *
   * Under the `abort` policy the first extraction failure is rethrown
   * after the records built before it have been stored.
   */
  async run(): Promise<WorkerResult> {
    if (this.started) {
      throw new Error(`Worker ${this.id} has already run`);
    }
    this.started = true;

    const startTime = this.now();
    let stored = 0;
    let failed = 0;
    let result: WorkerResult;

    await this.hooks.onWorkerStart?.(this.eventBase());

    try {
      const tree = parseMarkup(await readMarkupSource(this.source), {
        lowercaseNames: this.settings.lowercaseNames,
      });
      const opened = this.openStream(tree);

      const parsedEvent = {
        ...this.eventBase(),
        schema: opened.schema,
        durationMs: this.now() - startTime,
      };
      await this.hooks.onFileParsed?.(
        opened.version === undefined ? parsedEvent : { ...parsedEvent, version: opened.version },
      );

      const { collection } = opened;
      let batch: StorableRecord[] = [];
      const flush = async (): Promise<void> => {
        if (batch.length === 0) {
          return;
        }
        const records = batch;
        batch = [];
        await this.store.insertMany(collection, records);
        stored += records.length;
        await this.hooks.onRecordsStored?.({
          ...this.eventBase(),
          collection,
          count: records.length,
          total: stored,
        });
      };

      for (const outcome of opened.stream) {
        if (outcome.ok) {
          batch.push(outcome.record);
          if (batch.length >= this.settings.batchSize) {
            await flush();
          }
          continue;
        }

        const skipped = this.settings.failurePolicy === 'skip';
        await this.hooks.onRecordFailed?.({
          ...this.eventBase(),
          position: outcome.position,
          error: outcome.error,
          skipped,
        });
        if (!skipped) {
          await flush();
          throw outcome.error;
        }
        failed++;
      }
      await flush();

      result = {
        workerId: this.id,
        source: this.label,
        schema: opened.schema,
        collection,
        stored,
        failed,
        durationMs: this.now() - startTime,
      };
      if (opened.version !== undefined) {
        result.version = opened.version;
      }
    } catch (error) {
      const normalized = error instanceof Error ? error : new Error(String(error));
      await this.hooks.onWorkerError?.({
        ...this.eventBase(),
        error: normalized,
        stored,
        durationMs: this.now() - startTime,
      });
      throw normalized;
    }

    await this.hooks.onWorkerComplete?.({
      ...this.eventBase(),
      stored: result.stored,
      failed: result.failed,
      durationMs: result.durationMs,
    });
    return result;
  }

  private openStream(tree: ParsedTree): OpenedStream {
    const schema = detectSchema(tree);
    switch (schema) {
      case 'member-roster':
        return {
          schema,
          version: readSchemaVersion(tree),
          collection: this.settings.collections.members,
          stream: memberStream(tree),
        };
      case 'printed-matter':
        return {
          schema,
          collection: this.settings.collections.printedMatter,
          stream: printedMatterStream(tree),
        };
      case 'unknown':
        throw new UnknownSchemaError(this.label);
    }
  }

  private eventBase() {
    return {
      workerId: this.id,
      source: this.label,
      timestamp: new Date().toISOString(),
    };
  }
}
