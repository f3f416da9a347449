/**
 * Zarr v3 documents and on-disk stores for tests
 */

import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { StoreEntry } from './MemoryZarrStore.js';

export interface ArrayDocOptions {
  encoding?: 'default' | 'v2';
  separator?: '/' | '.';
  dataType?: string;
  fillValue?: unknown;
}

export function groupDoc(extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { zarr_format: 3, node_type: 'group', attributes: {}, ...extra };
}

export function arrayDoc(
  shape: number[],
  chunkShape: number[],
  options: ArrayDocOptions = {}
): Record<string, unknown> {
  const encoding = options.encoding ?? 'default';
  return {
    zarr_format: 3,
    node_type: 'array',
    shape,
    data_type: options.dataType ?? 'float64',
    chunk_grid: { name: 'regular', configuration: { chunk_shape: chunkShape } },
    chunk_key_encoding: {
      name: encoding,
      configuration: { separator: options.separator ?? (encoding === 'default' ? '/' : '.') }
    },
    fill_value: options.fillValue ?? 0,
    codecs: [{ name: 'bytes', configuration: { endian: 'little' } }],
    attributes: {}
  };
}

/** Encoded bytes of one float64 chunk with `count` elements */
export function chunkBytes(count: number, byte = 1): Uint8Array {
  return new Uint8Array(count * 8).fill(byte);
}

export function tempDir(prefix = 'xzarrguard-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

/**
 * Write a store to disk. Keys are store-relative paths.
 */
export async function writeStore(root: string, entries: Record<string, StoreEntry>): Promise<string> {
  await mkdir(root, { recursive: true });
  for (const [key, value] of Object.entries(entries)) {
    const path = join(root, ...key.split('/'));
    await mkdir(dirname(path), { recursive: true });
    if (value instanceof Uint8Array || typeof value === 'string') {
      await writeFile(path, value);
    } else {
      await writeFile(path, `${JSON.stringify(value, null, 2)}\n`);
    }
  }
  return root;
}

/**
 * A 4x4 float64 array `temperature` in 2x2 chunks under a root group.
 * `omit` lists chunk keys (relative to the array) to leave out.
 */
export function temperatureStore(omit: string[] = []): Record<string, StoreEntry> {
  const entries: Record<string, StoreEntry> = {
    'zarr.json': groupDoc(),
    'temperature/zarr.json': arrayDoc([4, 4], [2, 2])
  };
  for (const chunk of ['c/0/0', 'c/0/1', 'c/1/0', 'c/1/1']) {
    if (!omit.includes(chunk)) {
      entries[`temperature/${chunk}`] = chunkBytes(4);
    }
  }
  return entries;
}
