/**
 * Document store contract.
 *
 * The extractor hands plain nested records to a RecordStore; how they are
 * serialized (JSONB, BSON, files) is up to the implementation. Each
 * ingestion worker acquires its own store and closes it when done.
 */

/**
 * A record as handed to the store: a nested mapping of strings, dates,
 * nulls, arrays and nested mappings.
 */
export type StorableRecord = object;

/**
 * A record read back from a collection.
 */
export interface StoredRecord {
  /**
   * Identifier generated by the store on insert
   */
  id: string;

  /**
   * Record content as serialized by the store (dates become ISO strings)
   */
  record: Record<string, unknown>;

  /**
   * When the record was inserted
   */
  insertedAt: Date;
}

/**
 * Filter for {@link RecordStore.find}: a partial record that stored
 * records must contain (JSON containment).
 */
export type RecordFilter = Record<string, unknown>;

/**
 * Store collaborator used by ingestion workers.
 */
export interface RecordStore {
  /**
   * Insert a single record and return its generated identifier.
   */
  insert(collection: string, record: StorableRecord): Promise<string>;

  /**
   * Insert a batch of records in order.
   * A failing call applies none of its records.
   *
   * @returns Generated identifiers, in input order
   */
  insertMany(collection: string, records: readonly StorableRecord[]): Promise<string[]>;

  /**
   * Find records containing the given filter (all records when omitted).
   */
  find(collection: string, filter?: RecordFilter): Promise<StoredRecord[]>;

  /**
   * Release the underlying connection. Further calls fail.
   */
  close(): Promise<void>;
}

/**
 * Opens one store per worker.
 */
export type RecordStoreFactory = (workerId: string) => Promise<RecordStore>;
