import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { gzipSync } from 'node:zlib';
import { isGzipped, pathSource, readMarkupSource, sourceLabel } from './markup-source.js';

const XML = '<dokument><nr>19/1234</nr></dokument>';

describe('readMarkupSource', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'plenar-source-'));
    await writeFile(join(dir, 'plain.xml'), XML);
    await writeFile(join(dir, 'packed.xml.gz'), gzipSync(XML));
    await writeFile(join(dir, 'packed.xml'), gzipSync(XML));
    await writeFile(join(dir, 'broken.xml.gz'), XML);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a plain file', async () => {
    const data = await readMarkupSource(pathSource(join(dir, 'plain.xml')));

    expect(data.toString('utf-8')).toBe(XML);
  });

  it('should decompress a .gz file', async () => {
    const data = await readMarkupSource(pathSource(join(dir, 'packed.xml.gz')));

    expect(data.toString('utf-8')).toBe(XML);
  });

  it('should recognize gzip content without the extension', async () => {
    const data = await readMarkupSource(pathSource(join(dir, 'packed.xml')));

    expect(data.toString('utf-8')).toBe(XML);
  });

  it('should fail for a .gz file that is not compressed', async () => {
    await expect(readMarkupSource(pathSource(join(dir, 'broken.xml.gz')))).rejects.toThrow();
  });

  it('should fail for a missing file', async () => {
    await expect(readMarkupSource(pathSource(join(dir, 'missing.xml')))).rejects.toThrow(/ENOENT/);
  });

  it('should read buffers and decompress gzip buffers', async () => {
    expect((await readMarkupSource({ kind: 'buffer', data: Buffer.from(XML) })).toString()).toBe(XML);
    expect((await readMarkupSource({ kind: 'buffer', data: gzipSync(XML) })).toString()).toBe(XML);
  });

  it('should read text', async () => {
    expect((await readMarkupSource({ kind: 'text', text: XML })).toString()).toBe(XML);
  });

  it('should read byte streams chunk by chunk', async () => {
    const packed = gzipSync(XML);
    const stream = Readable.from([packed.subarray(0, 5), packed.subarray(5)]);

    expect((await readMarkupSource({ kind: 'stream', stream })).toString()).toBe(XML);
  });
});

describe('sourceLabel', () => {
  it('should use the path or the given label', () => {
    expect(sourceLabel(pathSource('/data/MDB_STAMMDATEN.XML'))).toBe('/data/MDB_STAMMDATEN.XML');
    expect(sourceLabel({ kind: 'text', text: XML, label: 'inline' })).toBe('inline');
    expect(sourceLabel({ kind: 'buffer', data: Buffer.alloc(0) })).toBe('<buffer>');
  });
});

describe('isGzipped', () => {
  it('should check the magic bytes', () => {
    expect(isGzipped(gzipSync('x'))).toBe(true);
    expect(isGzipped(Buffer.from('<x/>'))).toBe(false);
    expect(isGzipped(Buffer.alloc(0))).toBe(false);
  });
});
