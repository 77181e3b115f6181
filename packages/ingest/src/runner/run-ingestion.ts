/**
 * Ingestion runner.
 *
 * Starts one IngestionWorker per source, `maxParallelism` at a time. Each
 * worker gets its own store from the factory, and the store is closed
 * whether the worker succeeded or not. A failing file never affects the
 * others. A store that fails to close is reported as `closeError` on the
 * file's result and does not change the worker's outcome.
 */

import type { IngestEventHooks, RecordStore, RecordStoreFactory } from '@plenar/contracts';
import { generateRunId, workerId as toWorkerId } from '@plenar/shared';
import type { IngestConfig } from '../config/ingest-config.js';
import { sourceLabel, type MarkupSource } from '../source/markup-source.js';
import { IngestionWorker, type WorkerResult } from '../worker/ingestion-worker.js';

export interface RunIngestionOptions {
  sources: readonly MarkupSource[];
  storeFactory: RecordStoreFactory;
  config: Pick<
    IngestConfig,
    'collections' | 'batchSize' | 'failurePolicy' | 'lowercaseNames' | 'maxParallelism'
  >;
  hooks?: IngestEventHooks;
  /** Defaults to a generated run id */
  runId?: string;
  now?: () => number;
}

/**
 * Per-file result, in source order.
 */
export type FileResult =
  | { ok: true; workerId: string; source: string; result: WorkerResult; closeError?: Error }
  | { ok: false; workerId: string; source: string; error: Error; closeError?: Error };

export interface IngestionSummary {
  runId: string;
  files: FileResult[];
  /** Records stored across all files */
  stored: number;
  /** Elements skipped across all files */
  skipped: number;
  /** Files that failed */
  failedFiles: number;
  durationMs: number;
}

export async function runIngestion(options: RunIngestionOptions): Promise<IngestionSummary> {
  const now = options.now ?? Date.now;
  const startTime = now();
  const runId = options.runId ?? generateRunId(new Date(startTime));
  const { maxParallelism } = options.config;
  const files: FileResult[] = [];

  // Execute in batches
  for (let i = 0; i < options.sources.length; i += maxParallelism) {
    const batch = options.sources.slice(i, i + maxParallelism);
    const settled = await Promise.allSettled(
      batch.map((source, offset) => runWorker(options, toWorkerId(runId, i + offset), source, now)),
    );

    settled.forEach((outcome, offset) => {
      const id = toWorkerId(runId, i + offset);
      const source = batch[offset];
      const label = source ? sourceLabel(source) : '';
      if (outcome.status === 'fulfilled') {
        files.push(outcome.value);
      } else {
        files.push({ ok: false, workerId: id, source: label, error: toError(outcome.reason) });
      }
    });
  }

  let stored = 0;
  let skipped = 0;
  let failedFiles = 0;
  for (const file of files) {
    if (file.ok) {
      stored += file.result.stored;
      skipped += file.result.failed;
    } else {
      failedFiles++;
    }
  }

  return { runId, files, stored, skipped, failedFiles, durationMs: now() - startTime };
}

async function runWorker(
  options: RunIngestionOptions,
  id: string,
  source: MarkupSource,
  now: () => number,
): Promise<FileResult> {
  const label = sourceLabel(source);
  const store: RecordStore = await options.storeFactory(id);

  let file: FileResult;
  try {
    const worker = new IngestionWorker({
      id,
      source,
      store,
      settings: options.config,
      ...(options.hooks ? { hooks: options.hooks } : {}),
      now,
    });
    file = { ok: true, workerId: id, source: label, result: await worker.run() };
  } catch (error) {
    file = { ok: false, workerId: id, source: label, error: toError(error) };
  }

  try {
    await store.close();
  } catch (error) {
    file.closeError = toError(error);
  }
  return file;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}
