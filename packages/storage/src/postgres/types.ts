/**
 * PostgreSQL record store types.
 */

/**
 * PostgreSQL configuration.
 */
export interface PostgresConfig {
  connectionString?: string | undefined;
  host?: string | undefined;
  port?: number | undefined;
  database?: string | undefined;
  user?: string | undefined;
  password?: string | undefined;
  ssl?: boolean | { rejectUnauthorized: boolean } | undefined;
  poolSize?: number | undefined;
}

/**
 * Row of a collection table.
 */
export type RecordRow = {
  id: string;
  record: Record<string, unknown>;
  inserted_at: Date;
};

/**
 * Collection names become table names and must be plain identifiers.
 */
export const COLLECTION_NAME_PATTERN = /^[a-z_][a-z0-9_]{0,62}$/;
