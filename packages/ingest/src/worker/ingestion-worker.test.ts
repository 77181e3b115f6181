import { describe, it, expect, vi } from 'vitest';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { IngestEventHooks } from '@plenar/contracts';
import {
  MalformedDateError,
  MarkupSyntaxError,
  RequiredElementMissingError,
  UnknownSchemaError,
} from '@plenar/shared';
import { MemoryRecordStore } from '@plenar/storage';
import { DEFAULT_INGEST_CONFIG } from '../config/ingest-config.js';
import { pathSource, type MarkupSource } from '../source/markup-source.js';
import { IngestionWorker, type WorkerSettings } from './ingestion-worker.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturesDir = join(__dirname, '..', '..', 'fixtures');

function fixture(name: string): MarkupSource {
  return pathSource(join(fixturesDir, name));
}

/**
 * Hooks that record the name and payload of every event.
 */
function createRecordingHooks() {
  const events: { name: string; event: Record<string, unknown> }[] = [];
  const record = (name: string) => (event: object) => {
    events.push({ name, event: Object.fromEntries(Object.entries(event)) });
  };
  const hooks: IngestEventHooks = {
    onWorkerStart: record('start'),
    onFileParsed: record('parsed'),
    onRecordsStored: record('stored'),
    onRecordFailed: record('failed'),
    onWorkerComplete: record('complete'),
    onWorkerError: record('error'),
  };
  return { hooks, events, names: () => events.map((e) => e.name) };
}

/**
 * Clock reading 1000 first, 1250 afterwards.
 */
function createClock() {
  let time = 1000;
  return () => {
    const current = time;
    time = 1250;
    return current;
  };
}

function createWorker(
  source: MarkupSource,
  overrides: Partial<WorkerSettings> = {},
  hooks?: IngestEventHooks,
) {
  const store = new MemoryRecordStore();
  const worker = new IngestionWorker({
    id: 'run-1/w1',
    source,
    store,
    settings: { ...DEFAULT_INGEST_CONFIG, ...overrides },
    ...(hooks ? { hooks } : {}),
    now: createClock(),
  });
  return { worker, store };
}

async function storedIds(store: MemoryRecordStore, collection = 'mdb'): Promise<unknown[]> {
  return (await store.find(collection)).map((entry) => entry.record['id']);
}

describe('IngestionWorker', () => {
  describe('member roster', () => {
    it('should store every member in document order', async () => {
      const { worker, store } = createWorker(fixture('roster-three.xml'));

      const result = await worker.run();

      expect(result).toEqual({
        workerId: 'run-1/w1',
        source: join(fixturesDir, 'roster-three.xml'),
        schema: 'member-roster',
        version: '1.0',
        collection: 'mdb',
        stored: 3,
        failed: 0,
        durationMs: 250,
      });
      expect(await storedIds(store)).toEqual(['11000101', '11000102', '11000103']);
    });

    it('should store members as JSON documents', async () => {
      const { worker, store } = createWorker(fixture('roster-three.xml'));

      await worker.run();
      const [first] = await store.find('mdb');

      expect(first?.record['biografische_angaben']).toMatchObject({
        geburtsdatum: '1970-01-01T00:00:00.000Z',
        sterbedatum: null,
        familienstand: [],
      });
    });

    it('should use the configured collection', async () => {
      const { worker, store } = createWorker(fixture('roster-three.xml'), {
        collections: { members: 'abgeordnete', printedMatter: 'drucksachen' },
      });

      await worker.run();

      expect(store.collectionNames()).toEqual(['abgeordnete']);
    });

    it('should insert in batches of batchSize', async () => {
      const { hooks, events } = createRecordingHooks();
      const { worker, store } = createWorker(fixture('roster-three.xml'), { batchSize: 2 }, hooks);
      const insertMany = vi.spyOn(store, 'insertMany');

      await worker.run();

      expect(insertMany.mock.calls.map(([, records]) => records.length)).toEqual([2, 1]);
      expect(
        events.filter((e) => e.name === 'stored').map((e) => [e.event['count'], e.event['total']]),
      ).toEqual([
        [2, 2],
        [1, 3],
      ]);
    });

    it('should emit events in order', async () => {
      const { hooks, names, events } = createRecordingHooks();
      const { worker } = createWorker(fixture('roster-three.xml'), {}, hooks);

      await worker.run();

      expect(names()).toEqual(['start', 'parsed', 'stored', 'complete']);
      expect(events[1]?.event).toMatchObject({ schema: 'member-roster', version: '1.0', durationMs: 250 });
      expect(events[3]?.event).toMatchObject({ workerId: 'run-1/w1', stored: 3, failed: 0 });
    });
  });

  describe('failure policies', () => {
    it('should store the records before a failure and then abort', async () => {
      const { hooks, names, events } = createRecordingHooks();
      const { worker, store } = createWorker(fixture('roster-bad-date.xml'), { failurePolicy: 'abort' }, hooks);

      await expect(worker.run()).rejects.toThrow(MalformedDateError);

      expect(await storedIds(store)).toEqual(['11000101']);
      expect(names()).toEqual(['start', 'parsed', 'failed', 'stored', 'error']);
      expect(events[2]?.event).toMatchObject({ position: 1, skipped: false });
      expect(events[4]?.event).toMatchObject({ stored: 1 });
    });

    it('should skip a failing member and continue', async () => {
      const { hooks, events } = createRecordingHooks();
      const { worker, store } = createWorker(fixture('roster-bad-date.xml'), { failurePolicy: 'skip' }, hooks);

      const result = await worker.run();

      expect(result.stored).toBe(2);
      expect(result.failed).toBe(1);
      expect(await storedIds(store)).toEqual(['11000101', '11000103']);
      const failed = events.find((e) => e.name === 'failed');
      expect(failed?.event['position']).toBe(1);
      expect(failed?.event['skipped']).toBe(true);
      expect(failed?.event['error']).toBeInstanceOf(MalformedDateError);
    });
  });

  describe('printed matter', () => {
    it('should store the document in the printed-matter collection', async () => {
      const { worker, store } = createWorker(fixture('drucksache.xml'));

      const result = await worker.run();

      expect(result.schema).toBe('printed-matter');
      expect(result.version).toBeUndefined();
      expect(result.collection).toBe('drucksachen');
      const [stored] = await store.find('drucksachen');
      expect(stored?.record).toEqual({
        wahlperiode: '20',
        dokumentart: 'Drucksache',
        drucksachetyp: 'Kleine Anfrage',
        nr: '20/100',
        datum: '2022-02-14T00:00:00.000Z',
        titel: 'Beispielfrage zu Musterverfahren',
        urheber: ['Fraktion der XYZ'],
        autor: ['Anna Probe'],
        text: 'Wir fragen die Bundesregierung.',
      });
    });

    it('should fail a document missing a required element under either policy', async () => {
      const source: MarkupSource = { kind: 'text', text: '<dokument><titel>x</titel></dokument>' };
      const { worker, store } = createWorker(source, { failurePolicy: 'abort' });

      await expect(worker.run()).rejects.toThrow(RequiredElementMissingError);
      expect(await store.find('drucksachen')).toEqual([]);
    });
  });

  describe('input errors', () => {
    it('should reject input of an unknown schema', async () => {
      const { hooks, names } = createRecordingHooks();
      const { worker } = createWorker(fixture('unknown.xml'), {}, hooks);

      await expect(worker.run()).rejects.toThrow(UnknownSchemaError);
      expect(names()).toEqual(['start', 'error']);
    });

    it('should reject malformed markup', async () => {
      const { worker } = createWorker({ kind: 'text', text: '<DOCUMENT><MDB></DOCUMENT>' });

      await expect(worker.run()).rejects.toThrow(MarkupSyntaxError);
    });

    it('should reject a roster without a version', async () => {
      const { worker } = createWorker({
        kind: 'text',
        text: '<DOCUMENT><MDB><ID>1</ID></MDB></DOCUMENT>',
      });

      await expect(worker.run()).rejects.toThrow("Required element 'version' missing in document");
    });

    it('should report the label of the source', async () => {
      const { hooks, events } = createRecordingHooks();
      const { worker } = createWorker({ kind: 'text', text: '<x/>', label: 'inline.xml' }, {}, hooks);

      await expect(worker.run()).rejects.toThrow("Cannot determine schema of 'inline.xml'");
      expect(events[0]?.event['source']).toBe('inline.xml');
    });
  });

  it('should run only once', async () => {
    const { worker } = createWorker(fixture('roster-three.xml'));
    await worker.run();

    await expect(worker.run()).rejects.toThrow('Worker run-1/w1 has already run');
  });
});
