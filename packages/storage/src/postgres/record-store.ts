/**
 * PostgreSQL Record Store
 *
 * Each collection is a table holding one JSONB document per record:
 *
 * ```sql
 * CREATE TABLE <collection> (
 *   id          uuid PRIMARY KEY DEFAULT gen_random_uuid(),
 *   seq         bigserial,
 *   record      jsonb NOT NULL,
 *   inserted_at timestamptz NOT NULL DEFAULT now()
 * )
 * ```
 *
 * Tables are created on first use. Uses the 'pg' driver directly.
 */

import { Pool, type PoolClient, type PoolConfig } from 'pg';
import type {
  RecordFilter,
  RecordStore,
  RecordStoreFactory,
  StorableRecord,
  StoredRecord,
} from '@plenar/contracts';
import { StoreError } from '@plenar/shared';
import { serializeRecord } from '../serialize.js';
import { COLLECTION_NAME_PATTERN, type PostgresConfig, type RecordRow } from './types.js';

/**
 * Codes Postgres raises when two sessions run `CREATE ... IF NOT EXISTS`
 * for the same name at once: unique_violation on the catalog and
 * duplicate_table. Either way the object exists afterwards.
 */
const CONCURRENT_CREATE_CODES: ReadonlySet<string> = new Set(['23505', '42P07']);

function isConcurrentCreate(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    CONCURRENT_CREATE_CODES.has(error.code)
  );
}

function rowToStoredRecord(row: RecordRow): StoredRecord {
  return {
    id: row.id,
    record: row.record,
    insertedAt: row.inserted_at,
  };
}

/**
 * PostgresRecordStore implements RecordStore on a pg Pool.
 *
 * The store owns the pool: close() ends it.
 *
 * @example
 * ```typescript
 * import { Pool } from 'pg';
 * import { PostgresRecordStore } from '@plenar/storage';
 *
 * const store = new PostgresRecordStore(new Pool({ connectionString: process.env.DATABASE_URL }));
 * await store.insertMany('mdb', members);
 * const women = await store.find('mdb', { biografische_angaben: { geschlecht: 'weiblich' } });
 * await store.close();
 * ```
 */
export class PostgresRecordStore implements RecordStore {
  private readonly pool: Pool;
  private readonly ensured = new Map<string, Promise<void>>();
  private closed = false;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  async insert(collection: string, record: StorableRecord): Promise<string> {
    const table = await this.ensureCollection(collection);

    try {
      const result = await this.pool.query<RecordRow>(
        `INSERT INTO ${table} (record) VALUES ($1::jsonb) RETURNING id`,
        [serializeRecord(record)],
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('no row returned');
      }
      return row.id;
    } catch (error) {
      throw new StoreError(`Failed to insert into '${collection}'`, collection, error);
    }
  }

  /**
   * Insert records in one transaction; ids come back in input order.
   */
  async insertMany(collection: string, records: readonly StorableRecord[]): Promise<string[]> {
    if (records.length === 0) {
      return [];
    }
    const table = await this.ensureCollection(collection);

    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new StoreError(`Failed to connect for '${collection}'`, collection, error);
    }

    // A connection whose rollback failed is discarded instead of returned to the pool
    let brokenConnection: Error | undefined;
    try {
      await client.query('BEGIN');
      const ids: string[] = [];
      for (const record of records) {
        const result = await client.query<RecordRow>(
          `INSERT INTO ${table} (record) VALUES ($1::jsonb) RETURNING id`,
          [serializeRecord(record)],
        );
        const row = result.rows[0];
        if (!row) {
          throw new Error('no row returned');
        }
        ids.push(row.id);
      }
      await client.query('COMMIT');
      return ids;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        brokenConnection = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      }
      throw new StoreError(
        `Failed to insert ${records.length} records into '${collection}'`,
        collection,
        error,
      );
    } finally {
      client.release(brokenConnection);
    }
  }

  /**
   * Records containing `filter` (`record @> filter`), in insertion order.
   */
  async find(collection: string, filter?: RecordFilter): Promise<StoredRecord[]> {
    const table = await this.ensureCollection(collection);

    try {
      const result = filter === undefined
        ? await this.pool.query<RecordRow>(
            `SELECT id, record, inserted_at FROM ${table} ORDER BY seq`,
          )
        : await this.pool.query<RecordRow>(
            `SELECT id, record, inserted_at FROM ${table} WHERE record @> $1::jsonb ORDER BY seq`,
            [serializeRecord(filter)],
          );
      return result.rows.map(rowToStoredRecord);
    } catch (error) {
      throw new StoreError(`Failed to query '${collection}'`, collection, error);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.pool.end();
  }

  /**
   * Create the collection table and its containment index if missing.
   *
   * @returns The quoted table name
   */
  private async ensureCollection(collection: string): Promise<string> {
    if (this.closed) {
      throw new StoreError('Record store is closed', collection);
    }
    if (!COLLECTION_NAME_PATTERN.test(collection)) {
      throw new StoreError(`Invalid collection name '${collection}'`, collection);
    }

    const table = `"${collection}"`;
    let pending = this.ensured.get(collection);
    if (pending === undefined) {
      pending = this.createCollection(collection, table);
      this.ensured.set(collection, pending);
    }

    try {
      await pending;
    } catch (error) {
      if (this.ensured.get(collection) === pending) {
        this.ensured.delete(collection);
      }
      throw new StoreError(`Failed to create collection '${collection}'`, collection, error);
    }
    return table;
  }

  private async createCollection(collection: string, table: string): Promise<void> {
    await this.runDdl(`
      CREATE TABLE IF NOT EXISTS ${table} (
        id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
        seq bigserial,
        record jsonb NOT NULL,
        inserted_at timestamptz NOT NULL DEFAULT now()
      )
    `);
    await this.runDdl(
      `CREATE INDEX IF NOT EXISTS "${collection}_record_idx" ON ${table} USING gin (record jsonb_path_ops)`,
    );
  }

  private async runDdl(sql: string): Promise<void> {
    try {
      await this.pool.query(sql);
    } catch (error) {
      if (!isConcurrentCreate(error)) {
        throw error;
      }
    }
  }
}

/**
 * Translate PostgresConfig into pg pool options.
 */
export function toPoolConfig(config: PostgresConfig): PoolConfig {
  const poolConfig: PoolConfig = { application_name: 'plenar-ingest' };
  if (config.connectionString !== undefined) poolConfig.connectionString = config.connectionString;
  if (config.host !== undefined) poolConfig.host = config.host;
  if (config.port !== undefined) poolConfig.port = config.port;
  if (config.database !== undefined) poolConfig.database = config.database;
  if (config.user !== undefined) poolConfig.user = config.user;
  if (config.password !== undefined) poolConfig.password = config.password;
  if (config.ssl !== undefined) poolConfig.ssl = config.ssl;
  if (config.poolSize !== undefined) poolConfig.max = config.poolSize;
  return poolConfig;
}

/**
 * Opens a PostgresRecordStore with its own pool for every worker.
 */
export function createPostgresStoreFactory(
  config: PostgresConfig,
  createPool: (poolConfig: PoolConfig) => Pool = (poolConfig) => new Pool(poolConfig),
): RecordStoreFactory {
  return (workerId: string) =>
    Promise.resolve(
      new PostgresRecordStore(createPool({ ...toPoolConfig(config), application_name: `plenar-ingest ${workerId}` })),
    );
}
