import { describe, it, expect } from 'vitest';
import { StoreError } from '@plenar/shared';
import { MemoryRecordStore } from './memory-record-store.js';

function sequentialIds(): () => string {
  let next = 0;
  return () => `rec-${++next}`;
}

const erika = {
  id: '11000001',
  namen: [{ nachname: 'Beispiel', vorname: 'Erika' }],
  biografische_angaben: { geschlecht: 'weiblich', geburtsdatum: new Date(Date.UTC(1961, 7, 12)) },
};

const max = {
  id: '11000002',
  namen: [{ nachname: 'Mustermann', vorname: 'Max' }],
  biografische_angaben: { geschlecht: 'männlich', geburtsdatum: null },
};

describe('MemoryRecordStore', () => {
  it('should return generated ids in input order', async () => {
    const store = new MemoryRecordStore({ newId: sequentialIds() });

    expect(await store.insert('mdb', erika)).toBe('rec-1');
    expect(await store.insertMany('mdb', [max, erika])).toEqual(['rec-2', 'rec-3']);
  });

  it('should serialize dates to ISO strings', async () => {
    const store = new MemoryRecordStore();
    await store.insert('mdb', erika);

    const [stored] = await store.find('mdb');

    expect(stored?.record).toEqual({
      id: '11000001',
      namen: [{ nachname: 'Beispiel', vorname: 'Erika' }],
      biografische_angaben: { geschlecht: 'weiblich', geburtsdatum: '1961-08-12T00:00:00.000Z' },
    });
  });

  it('should keep collections apart', async () => {
    const store = new MemoryRecordStore();
    await store.insert('mdb', erika);
    await store.insert('drucksachen', { nr: '19/1234' });

    expect(await store.find('mdb')).toHaveLength(1);
    expect(store.collectionNames()).toEqual(['mdb', 'drucksachen']);
  });

  it('should return an empty list for an unknown collection', async () => {
    const store = new MemoryRecordStore();

    expect(await store.find('nothing')).toEqual([]);
  });

  describe('find with filter', () => {
    it('should match nested fields', async () => {
      const store = new MemoryRecordStore();
      await store.insertMany('mdb', [erika, max]);

      const found = await store.find('mdb', { biografische_angaben: { geschlecht: 'weiblich' } });

      expect(found.map((entry) => entry.record['id'])).toEqual(['11000001']);
    });

    it('should match array elements by containment', async () => {
      const store = new MemoryRecordStore();
      await store.insertMany('mdb', [erika, max]);

      const found = await store.find('mdb', { namen: [{ nachname: 'Mustermann' }] });

      expect(found.map((entry) => entry.record['id'])).toEqual(['11000002']);
    });

    it('should match null values', async () => {
      const store = new MemoryRecordStore();
      await store.insertMany('mdb', [erika, max]);

      const found = await store.find('mdb', { biografische_angaben: { geburtsdatum: null } });

      expect(found.map((entry) => entry.record['id'])).toEqual(['11000002']);
    });

    it('should not match a missing key', async () => {
      const store = new MemoryRecordStore();
      await store.insert('mdb', erika);

      expect(await store.find('mdb', { wahlperioden: [] })).toEqual([]);
    });
  });

  it('should apply none of a batch that cannot be serialized', async () => {
    const store = new MemoryRecordStore();
    const cyclic: Record<string, unknown> = {};
    cyclic['self'] = cyclic;

    await expect(store.insertMany('mdb', [erika, cyclic])).rejects.toThrow(TypeError);
    expect(await store.find('mdb')).toEqual([]);
  });

  it('should refuse operations after close', async () => {
    const store = new MemoryRecordStore();
    await store.close();

    expect(store.isClosed()).toBe(true);
    await expect(store.insert('mdb', erika)).rejects.toThrow(StoreError);
    await expect(store.find('mdb')).rejects.toThrow('Record store is closed');
  });
});
