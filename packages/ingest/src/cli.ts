/**
 * plenar-ingest command line.
 *
 * ```
 * plenar-ingest [--dry-run] [--policy abort|skip] [--parallel N] [--batch-size N] <file...>
 * ```
 *
 * Exit codes: 0 when every file was ingested, 1 when any file failed,
 * 2 on usage or configuration errors.
 */

import { parseArgs } from 'node:util';
import type { RecordStoreFactory } from '@plenar/contracts';
import { ConfigurationError, createLogger, type Logger } from '@plenar/shared';
import { MemoryRecordStore, createPostgresStoreFactory } from '@plenar/storage';
import {
  isFailurePolicy,
  loadIngestConfig,
  parseInteger,
  type Environment,
  type IngestConfig,
  type IngestConfigOverrides,
} from './config/ingest-config.js';
import { LoggingEventHooks } from './events/hooks.js';
import { pathSource } from './source/markup-source.js';
import { runIngestion } from './runner/run-ingestion.js';

export const USAGE =
  'Usage: plenar-ingest [--dry-run] [--policy abort|skip] [--parallel N] [--batch-size N] <file...>';

export interface CliDependencies {
  env?: Environment;
  /** Replaces the store chosen from the configuration */
  storeFactory?: RecordStoreFactory;
  /** Replaces the console logger built from the configuration */
  logger?: Logger;
}

interface ParsedArguments {
  files: string[];
  dryRun: boolean;
  overrides: IngestConfigOverrides;
}

/**
 * @throws ConfigurationError on unknown options or invalid values
 */
export function parseCliArguments(argv: readonly string[]): ParsedArguments {
  const { values, positionals } = readArguments(argv);
  const overrides: IngestConfigOverrides = {
    maxParallelism: parseInteger('--parallel', values.parallel),
    batchSize: parseInteger('--batch-size', values['batch-size']),
  };

  if (values.policy !== undefined) {
    if (!isFailurePolicy(values.policy)) {
      throw new ConfigurationError(`--policy must be abort or skip, got '${values.policy}'`);
    }
    overrides.failurePolicy = values.policy;
  }

  if (positionals.length === 0) {
    throw new ConfigurationError('No input files given');
  }

  return { files: positionals, dryRun: values['dry-run'] === true, overrides };
}

function readArguments(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        'dry-run': { type: 'boolean', default: false },
        policy: { type: 'string' },
        parallel: { type: 'string', short: 'p' },
        'batch-size': { type: 'string', short: 'b' },
      },
    });
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Run the command; resolves to the process exit code.
 */
export async function main(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  let args: ParsedArguments;
  let config: IngestConfig;
  try {
    args = parseCliArguments(argv);
    config = loadIngestConfig(deps.env ?? process.env, args.overrides);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`${error.message}\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  const logger = deps.logger ?? createLogger({ level: config.logLevel, prefix: 'plenar-ingest' });
  const storeFactory = deps.storeFactory ?? chooseStoreFactory(config, args.dryRun);

  const summary = await runIngestion({
    sources: args.files.map(pathSource),
    storeFactory,
    config,
    hooks: new LoggingEventHooks(logger),
  });

  for (const file of summary.files) {
    if (!file.ok) {
      logger.error(`Failed: ${file.source}`, { workerId: file.workerId, error: file.error });
    }
    if (file.closeError) {
      logger.warn(`Store not closed cleanly: ${file.source}`, {
        workerId: file.workerId,
        error: file.closeError,
      });
    }
  }
  logger.info('Ingestion finished', {
    runId: summary.runId,
    files: summary.files.length,
    failedFiles: summary.failedFiles,
    stored: summary.stored,
    skipped: summary.skipped,
    durationMs: summary.durationMs,
    dryRun: args.dryRun,
  });

  return summary.failedFiles > 0 ? 1 : 0;
}

function chooseStoreFactory(config: IngestConfig, dryRun: boolean): RecordStoreFactory {
  if (dryRun) {
    return () => Promise.resolve(new MemoryRecordStore());
  }
  return createPostgresStoreFactory(config.database);
}
