import { ConfigurationError, isLogLevel, type LogLevel } from '@plenar/shared';
import { COLLECTION_NAME_PATTERN, type PostgresConfig } from '@plenar/storage';

/**
 * What a worker does when a top-level element cannot be extracted.
 *
 * - `abort`: store the records built so far, then fail the file
 * - `skip`: report the element and continue with the next one
 */
export type FailurePolicy = 'abort' | 'skip';

export const FAILURE_POLICIES: readonly FailurePolicy[] = ['abort', 'skip'];

export function isFailurePolicy(value: string): value is FailurePolicy {
  return FAILURE_POLICIES.some((policy) => policy === value);
}

export interface CollectionNames {
  /** Collection receiving Member records */
  members: string;
  /** Collection receiving PrintedMatter records */
  printedMatter: string;
}

/**
 * Effective ingestion configuration.
 */
export interface IngestConfig {
  database: PostgresConfig;
  collections: CollectionNames;
  /** Records per insertMany call */
  batchSize: number;
  /** Files processed at the same time */
  maxParallelism: number;
  failurePolicy: FailurePolicy;
  logLevel: LogLevel;
  /** Lower-case element names while parsing */
  lowercaseNames: boolean;
}

/**
 * Caller overrides; undefined entries leave the lower layer in place.
 */
export interface IngestConfigOverrides {
  database?: PostgresConfig | undefined;
  collections?: { [K in keyof CollectionNames]?: CollectionNames[K] | undefined } | undefined;
  batchSize?: number | undefined;
  maxParallelism?: number | undefined;
  failurePolicy?: FailurePolicy | undefined;
  logLevel?: LogLevel | undefined;
  lowercaseNames?: boolean | undefined;
}

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Default configuration.
 */
export const DEFAULT_INGEST_CONFIG: IngestConfig = {
  database: {
    host: 'localhost',
    port: 5432,
    database: 'plenar',
    user: 'plenar',
  },
  collections: {
    members: 'mdb',
    printedMatter: 'drucksachen',
  },
  batchSize: 500,
  maxParallelism: 4,
  failurePolicy: 'abort',
  logLevel: 'info',
  lowercaseNames: true,
};

/**
 * Build the effective configuration by merging:
 * 1. Defaults
 * 2. Environment variables
 * 3. Caller overrides (CLI flags)
 *
 * The merge follows precedence: overrides > environment > defaults.
 *
 * @throws ConfigurationError when a value is out of range
 */
export function loadIngestConfig(
  env: Environment = process.env,
  overrides: IngestConfigOverrides = {},
): IngestConfig {
  const fromEnv = readEnvironment(env);

  const config: IngestConfig = {
    database: mergeDatabase([DEFAULT_INGEST_CONFIG.database, fromEnv.database, overrides.database]),
    collections: {
      members:
        overrides.collections?.members ??
        fromEnv.collections?.members ??
        DEFAULT_INGEST_CONFIG.collections.members,
      printedMatter:
        overrides.collections?.printedMatter ??
        fromEnv.collections?.printedMatter ??
        DEFAULT_INGEST_CONFIG.collections.printedMatter,
    },
    batchSize: overrides.batchSize ?? fromEnv.batchSize ?? DEFAULT_INGEST_CONFIG.batchSize,
    maxParallelism:
      overrides.maxParallelism ?? fromEnv.maxParallelism ?? DEFAULT_INGEST_CONFIG.maxParallelism,
    failurePolicy:
      overrides.failurePolicy ?? fromEnv.failurePolicy ?? DEFAULT_INGEST_CONFIG.failurePolicy,
    logLevel: overrides.logLevel ?? fromEnv.logLevel ?? DEFAULT_INGEST_CONFIG.logLevel,
    lowercaseNames: overrides.lowercaseNames ?? DEFAULT_INGEST_CONFIG.lowercaseNames,
  };

  validateIngestConfig(config);
  return config;
}

/**
 * @throws ConfigurationError on the first invalid setting
 */
export function validateIngestConfig(config: IngestConfig): void {
  requirePositiveInteger('batchSize', config.batchSize);
  requirePositiveInteger('maxParallelism', config.maxParallelism);

  if (!isFailurePolicy(config.failurePolicy)) {
    throw new ConfigurationError(`Unknown failure policy '${String(config.failurePolicy)}'`, {
      allowed: FAILURE_POLICIES,
    });
  }

  for (const [key, name] of Object.entries(config.collections)) {
    if (!COLLECTION_NAME_PATTERN.test(name)) {
      throw new ConfigurationError(`Invalid collection name '${name}' for ${key}`, { key, name });
    }
  }

  const { port } = config.database;
  if (port !== undefined && (!Number.isInteger(port) || port < 1 || port > 65535)) {
    throw new ConfigurationError(`Invalid database port ${port}`, { port });
  }
}

function readEnvironment(env: Environment): IngestConfigOverrides {
  const overrides: IngestConfigOverrides = {
    database: {
      connectionString: nonEmpty(env['DATABASE_URL']),
      host: nonEmpty(env['POSTGRES_HOST']),
      port: parseInteger('POSTGRES_PORT', env['POSTGRES_PORT']),
      database: nonEmpty(env['POSTGRES_DB']),
      user: nonEmpty(env['POSTGRES_USER']),
      password: nonEmpty(env['POSTGRES_PASSWORD']),
    },
    collections: {
      members: nonEmpty(env['PLENAR_MEMBERS_COLLECTION']),
      printedMatter: nonEmpty(env['PLENAR_PRINTED_MATTER_COLLECTION']),
    },
    batchSize: parseInteger('PLENAR_BATCH_SIZE', env['PLENAR_BATCH_SIZE']),
    maxParallelism: parseInteger('PLENAR_MAX_PARALLELISM', env['PLENAR_MAX_PARALLELISM']),
  };

  const policy = nonEmpty(env['PLENAR_FAILURE_POLICY']);
  if (policy !== undefined) {
    if (!isFailurePolicy(policy)) {
      throw new ConfigurationError(`PLENAR_FAILURE_POLICY must be one of ${FAILURE_POLICIES.join(', ')}`, {
        value: policy,
      });
    }
    overrides.failurePolicy = policy;
  }

  const level = nonEmpty(env['PLENAR_LOG_LEVEL']);
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`PLENAR_LOG_LEVEL '${level}' is not a log level`, { value: level });
    }
    overrides.logLevel = level;
  }

  return overrides;
}

/**
 * Parse a decimal integer setting; undefined when unset.
 *
 * @throws ConfigurationError when the text is not an integer
 */
export function parseInteger(name: string, value: string | undefined): number | undefined {
  const text = nonEmpty(value);
  if (text === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(text)) {
    throw new ConfigurationError(`${name} must be an integer, got '${text}'`, { name, value: text });
  }
  return Number(text);
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`, { name, value });
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Later layers win; undefined entries leave the earlier layer in place.
 */
function mergeDatabase(layers: (PostgresConfig | undefined)[]): PostgresConfig {
  const merged: PostgresConfig = {};
  for (const layer of layers) {
    if (!layer) continue;
    if (layer.connectionString !== undefined) merged.connectionString = layer.connectionString;
    if (layer.host !== undefined) merged.host = layer.host;
    if (layer.port !== undefined) merged.port = layer.port;
    if (layer.database !== undefined) merged.database = layer.database;
    if (layer.user !== undefined) merged.user = layer.user;
    if (layer.password !== undefined) merged.password = layer.password;
    if (layer.ssl !== undefined) merged.ssl = layer.ssl;
    if (layer.poolSize !== undefined) merged.poolSize = layer.poolSize;
  }
  return merged;
}
