/**
 * Tests for Zarr v3 hierarchy scanning
 */

import { describe, test, expect, afterEach } from 'vitest';
import { rm } from 'node:fs/promises';
import { LocalZarrStore } from '../src/backends/local-store.js';
import {
  consolidatedMetadataErrors,
  readZarrNodes,
  scanArraySpecs,
  toArraySpec,
  ArrayMetadataSchema
} from '../src/backends/zarr.js';
import { InvalidShapeError, StoreUnreadableError } from '../src/errors.js';
import { MemoryZarrStore } from './helpers/MemoryZarrStore.js';
import { arrayDoc, chunkBytes, groupDoc, tempDir, writeStore } from './helpers/fixtures.js';

const dirs: string[] = [];

async function localStore(entries: Parameters<typeof writeStore>[1]): Promise<LocalZarrStore> {
  const root = await tempDir();
  dirs.push(root);
  await writeStore(root, entries);
  return new LocalZarrStore(root);
}

afterEach(async () => {
  await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe('scanArraySpecs', () => {
  test('should find arrays in nested and implicit groups', async () => {
    const store = await localStore({
      'zarr.json': groupDoc(),
      'a/zarr.json': arrayDoc([4], [2]),
      'g/zarr.json': groupDoc(),
      'g/b/zarr.json': arrayDoc([3, 3], [2, 2]),
      'implicit/c/zarr.json': arrayDoc([1], [1])
    });

    const specs = await scanArraySpecs(store);
    expect(specs.map((spec) => spec.name)).toEqual(['a', 'g/b', 'implicit/c']);
    expect(specs[1]).toEqual({
      name: 'g/b',
      shape: [3, 3],
      chunkShape: [2, 2],
      chunkKeyEncoding: 'default',
      separator: '/'
    });
  });

  test('should not descend into array directories', async () => {
    const store = await localStore({
      'zarr.json': groupDoc(),
      'a/zarr.json': arrayDoc([4], [2]),
      'a/c/0': chunkBytes(2),
      'a/c/zarr.json': { zarr_format: 2, node_type: 'group' }
    });

    const specs = await scanArraySpecs(store);
    expect(specs.map((spec) => spec.name)).toEqual(['a']);
  });

  test('should skip the manifest directory', async () => {
    const store = await localStore({
      'zarr.json': groupDoc(),
      'a/zarr.json': arrayDoc([4], [2]),
      '.xzarrguard/manifests/zarr.json': 'not json'
    });

    expect(await store.listMetadataKeys()).toEqual(['zarr.json', 'a/zarr.json']);
  });

  test('should read arrays from their own documents when consolidated metadata is present', async () => {
    const store = new MemoryZarrStore({
      'zarr.json': groupDoc({
        consolidated_metadata: {
          kind: 'inline',
          must_understand: false,
          metadata: { x: arrayDoc([6], [4]) }
        }
      }),
      'x/zarr.json': arrayDoc([8], [4]),
      'stray/zarr.json': arrayDoc([1], [1])
    });

    const specs = await scanArraySpecs(store);
    expect(specs.map((spec) => spec.name)).toEqual(['stray', 'x']);
    expect(specs[1].shape).toEqual([8]);
  });

  test('should treat a root array as the only variable', async () => {
    const store = await localStore({
      'zarr.json': arrayDoc([4], [2]),
      'c/0': chunkBytes(2),
      'c/1': chunkBytes(2)
    });

    const specs = await scanArraySpecs(store);
    expect(specs).toHaveLength(1);
    expect(specs[0].name).toBe('');
  });

  test('should fail without a root document', async () => {
    const store = new MemoryZarrStore({ 'a/zarr.json': arrayDoc([4], [2]) });
    await expect(scanArraySpecs(store)).rejects.toThrow('No zarr.json found at the store root');
  });

  test('should reject non-v3 metadata', async () => {
    const store = new MemoryZarrStore({ 'zarr.json': { zarr_format: 2, node_type: 'group' } });
    await expect(readZarrNodes(store)).rejects.toThrow('Only zarr_format=3 is supported: zarr.json');
  });

  test('should report unparseable documents as unreadable', async () => {
    const store = new MemoryZarrStore({ 'zarr.json': groupDoc(), 'a/zarr.json': '{oops' });
    await expect(readZarrNodes(store)).rejects.toThrow(StoreUnreadableError);
  });
});

describe('consolidatedMetadataErrors', () => {
  const consolidated = (metadata: Record<string, unknown>) =>
    groupDoc({ consolidated_metadata: { kind: 'inline', must_understand: false, metadata } });

  test('should report omitted, outdated and dangling entries', async () => {
    const store = new MemoryZarrStore({
      'zarr.json': consolidated({ x: arrayDoc([6], [4]), grp: groupDoc() }),
      'x/zarr.json': arrayDoc([8], [4]),
      'stray/zarr.json': arrayDoc([1], [1])
    });

    expect(consolidatedMetadataErrors(await readZarrNodes(store))).toEqual([
      'Consolidated metadata omits array stray',
      'Consolidated metadata for x disagrees with its zarr.json',
      'Consolidated metadata lists grp, which has no zarr.json'
    ]);
  });

  test('should report a node whose type changed', async () => {
    const store = new MemoryZarrStore({
      'zarr.json': consolidated({ x: groupDoc() }),
      'x/zarr.json': arrayDoc([2], [1])
    });

    expect(consolidatedMetadataErrors(await readZarrNodes(store))).toEqual([
      'Consolidated metadata for x has node_type group, its zarr.json has array'
    ]);
  });

  test('should accept consolidated metadata that matches the documents', async () => {
    const store = new MemoryZarrStore({
      'zarr.json': consolidated({ '/g': groupDoc(), 'g/x': arrayDoc([6], [4]) }),
      'g/zarr.json': groupDoc(),
      'g/x/zarr.json': arrayDoc([6], [4])
    });

    expect(consolidatedMetadataErrors(await readZarrNodes(store))).toEqual([]);
  });

  test('should have nothing to report without consolidated metadata', async () => {
    const store = new MemoryZarrStore({ 'zarr.json': groupDoc(), 'x/zarr.json': arrayDoc([2], [1]) });
    expect(consolidatedMetadataErrors(await readZarrNodes(store))).toEqual([]);
  });
});

describe('toArraySpec', () => {
  const parse = (doc: Record<string, unknown>) => ArrayMetadataSchema.parse(doc);

  test('should default the v2 separator to a dot', () => {
    const doc = arrayDoc([4], [2]);
    const meta = parse({ ...doc, chunk_key_encoding: { name: 'v2' } });
    expect(toArraySpec('a', meta)).toMatchObject({ chunkKeyEncoding: 'v2', separator: '.' });
  });

  test('should default to the default encoding with a slash', () => {
    const { chunk_key_encoding: _ignored, ...doc } = arrayDoc([4], [2]);
    expect(toArraySpec('a', parse(doc))).toMatchObject({ chunkKeyEncoding: 'default', separator: '/' });
  });

  test('should reject irregular chunk grids', () => {
    const doc = { ...arrayDoc([4], [2]), chunk_grid: { name: 'rectilinear', configuration: { chunk_shape: [2] } } };
    expect(() => toArraySpec('a', parse(doc))).toThrow(InvalidShapeError);
  });

  test('should reject chunk shapes of the wrong rank', () => {
    expect(() => toArraySpec('a', parse(arrayDoc([4, 4], [2])))).toThrow(/rank mismatch.*\(a\/zarr\.json\)/);
  });
});
