/**
 * Markup sources.
 *
 * A worker reads its whole input into memory before parsing. Paths ending
 * in `.gz`, and any input starting with the gzip magic bytes, are
 * decompressed first.
 */

import { readFile } from 'node:fs/promises';
import { gunzip } from 'node:zlib';
import { promisify } from 'node:util';

const gunzipAsync = promisify(gunzip);

const GZIP_MAGIC = [0x1f, 0x8b] as const;

/**
 * Where a worker reads its markup from.
 */
export type MarkupSource =
  | { kind: 'path'; path: string }
  | { kind: 'buffer'; data: Uint8Array; label?: string }
  | { kind: 'text'; text: string; label?: string }
  | { kind: 'stream'; stream: AsyncIterable<Uint8Array | string>; label?: string };

/**
 * Path shorthand used by the CLI.
 */
export function pathSource(path: string): MarkupSource {
  return { kind: 'path', path };
}

/**
 * Name used for a source in events and results.
 */
export function sourceLabel(source: MarkupSource): string {
  switch (source.kind) {
    case 'path':
      return source.path;
    case 'buffer':
      return source.label ?? '<buffer>';
    case 'text':
      return source.label ?? '<text>';
    case 'stream':
      return source.label ?? '<stream>';
  }
}

export function isGzipped(data: Uint8Array): boolean {
  return data[0] === GZIP_MAGIC[0] && data[1] === GZIP_MAGIC[1];
}

/**
 * Read a source completely, decompressing gzip input.
 */
export async function readMarkupSource(source: MarkupSource): Promise<Buffer> {
  switch (source.kind) {
    case 'path':
      return decompress(await readFile(source.path), source.path.endsWith('.gz'));
    case 'buffer':
      return decompress(Buffer.from(source.data));
    case 'text':
      return Buffer.from(source.text, 'utf-8');
    case 'stream': {
      const chunks: Buffer[] = [];
      for await (const chunk of source.stream) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
      }
      return decompress(Buffer.concat(chunks));
    }
  }
}

async function decompress(data: Buffer, gzipped = isGzipped(data)): Promise<Buffer> {
  return gzipped ? gunzipAsync(data) : data;
}
