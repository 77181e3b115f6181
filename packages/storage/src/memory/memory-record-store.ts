/* eslint-disable @typescript-eslint/require-await -- RecordStore interface requires async methods, but memory implementation is synchronous */
import { randomUUID } from 'node:crypto';
import type { RecordFilter, RecordStore, StorableRecord, StoredRecord } from '@plenar/contracts';
import { StoreError } from '@plenar/shared';
import { containsJson, toDocument } from '../serialize.js';

/**
 * MemoryRecordStore keeps collections in process memory.
 *
 * Records are serialized like PostgresRecordStore serializes them, so
 * dates read back as ISO strings and `find` uses the same containment
 * rules. Used by tests and by dry runs.
 */
export class MemoryRecordStore implements RecordStore {
  private readonly collections = new Map<string, StoredRecord[]>();
  private readonly newId: () => string;
  private closed = false;

  constructor(options?: { newId?: () => string }) {
    this.newId = options?.newId ?? randomUUID;
  }

  async insert(collection: string, record: StorableRecord): Promise<string> {
    this.checkClosed(collection);
    const stored = this.toStored(record);
    this.collection(collection).push(stored);
    return stored.id;
  }

  async insertMany(collection: string, records: readonly StorableRecord[]): Promise<string[]> {
    this.checkClosed(collection);
    // Serialize everything first so a bad record leaves the collection untouched
    const stored = records.map((record) => this.toStored(record));
    this.collection(collection).push(...stored);
    return stored.map((entry) => entry.id);
  }

  async find(collection: string, filter?: RecordFilter): Promise<StoredRecord[]> {
    this.checkClosed(collection);
    const entries = this.collections.get(collection) ?? [];
    return filter === undefined ? [...entries] : entries.filter((entry) => containsJson(entry.record, filter));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Whether close() has been called.
   */
  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Names of the collections that received records.
   */
  collectionNames(): string[] {
    return [...this.collections.keys()];
  }

  private collection(name: string): StoredRecord[] {
    let entries = this.collections.get(name);
    if (!entries) {
      entries = [];
      this.collections.set(name, entries);
    }
    return entries;
  }

  private toStored(record: StorableRecord): StoredRecord {
    return {
      id: this.newId(),
      record: toDocument(record),
      insertedAt: new Date(),
    };
  }

  private checkClosed(collection: string): void {
    if (this.closed) {
      throw new StoreError('Record store is closed', collection);
    }
  }
}
