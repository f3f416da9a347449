/**
 * Tests for store creation with no-data policies
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createStore, parseNoDataStrategy } from '../src/create.js';
import { openLocalDataset, openZarrDataset } from '../src/dataset.js';
import { InvalidCoordinateError, TargetExistsError, UnsupportedStrategyError } from '../src/errors.js';
import { checkStore } from '../src/integrity.js';
import { loadVariableManifest, manifestPath } from '../src/manifest.js';
import { MemoryZarrStore } from './helpers/MemoryZarrStore.js';
import { arrayDoc, chunkBytes, groupDoc, tempDir, temperatureStore } from './helpers/fixtures.js';

async function exists(path: string): Promise<boolean> {
  return stat(path).then(
    () => true,
    () => false
  );
}

describe('createStore', () => {
  let dir: string;
  let target: string;

  beforeEach(async () => {
    dir = await tempDir();
    target = join(dir, 'out.zarr');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  test('should copy metadata and chunks verbatim', async () => {
    const source = new MemoryZarrStore(temperatureStore());
    source.set('temperature/c/0/1', chunkBytes(4, 7));

    const report = await createStore(await openZarrDataset(source), target);
    expect(report.chunksWritten).toBe(4);
    expect(report.manifestsWritten).toEqual([]);

    const meta = JSON.parse(await readFile(join(target, 'temperature', 'zarr.json'), 'utf-8'));
    expect(meta).toEqual(arrayDoc([4, 4], [2, 2]));
    expect(new Uint8Array(await readFile(join(target, 'temperature', 'c', '0', '1')))).toEqual(chunkBytes(4, 7));
    expect((await checkStore(target)).ok).toBe(true);
  });

  test('should leave no-data chunks absent and list them in a manifest', async () => {
    const dataset = await openZarrDataset(new MemoryZarrStore(temperatureStore()));

    const report = await createStore(dataset, target, { noDataChunks: { temperature: [[1, 1]] } });
    expect(report.noDataStrategy).toBe('manifest');
    expect(report.chunksWritten).toBe(3);
    expect(report.manifestsWritten).toEqual([manifestPath(target, 'temperature')]);
    expect(report.removedChunks).toEqual({ temperature: [{ coord: [1, 1], key: 'temperature/c/1/1' }] });
    expect(await exists(join(target, 'temperature', 'c', '1', '1'))).toBe(false);

    const manifest = await loadVariableManifest(target, 'temperature');
    expect(manifest?.allowedMissing).toEqual([{ coord: [1, 1], key: 'temperature/c/1/1' }]);

    const check = await checkStore(target);
    expect(check.ok).toBe(true);
    expect(check.variables.temperature.allowed).toHaveLength(1);
  });

  test('should write fill chunks under the empty_chunks strategy', async () => {
    const dataset = await openZarrDataset(new MemoryZarrStore(temperatureStore()));

    const report = await createStore(dataset, target, {
      noDataChunks: { temperature: [[1, 1]] },
      noDataStrategy: 'empty_chunks'
    });
    expect(report.chunksWritten).toBe(4);
    expect(report.manifestsWritten).toEqual([]);
    expect(report.removedChunks).toEqual({});
    expect((await stat(join(target, 'temperature', 'c', '1', '1'))).size).toBe(32);
    expect(await exists(join(target, '.xzarrguard'))).toBe(false);
  });

  test('should materialize chunks the source never wrote', async () => {
    const dataset = await openZarrDataset(new MemoryZarrStore(temperatureStore(['c/0/1'])));

    await createStore(dataset, target);
    expect((await stat(join(target, 'temperature', 'c', '0', '1'))).size).toBe(32);
    expect((await checkStore(target)).ok).toBe(true);
  });

  test('should flag the manifest as stale once the chunk key encoding changes', async () => {
    const dataset = await openZarrDataset(new MemoryZarrStore(temperatureStore()));
    await createStore(dataset, target, { noDataChunks: { temperature: [[0, 0]] } });

    // Switch to dotted keys and move the written chunks along with them
    const array = join(target, 'temperature');
    await writeFile(join(array, 'zarr.json'), JSON.stringify(arrayDoc([4, 4], [2, 2], { separator: '.' })));
    for (const [row, col] of [
      [0, 1],
      [1, 0],
      [1, 1]
    ]) {
      await rename(join(array, 'c', String(row), String(col)), join(array, `c.${row}.${col}`));
    }

    const lenient = await checkStore(target);
    expect(lenient.ok).toBe(true);
    expect(lenient.variables.temperature.missing).toEqual([]);
    expect(lenient.variables.temperature.stale).toEqual([
      { coord: [0, 0], key: 'temperature/c/0/0', reason: 'key_mismatch' }
    ]);

    const strict = await checkStore(target, { strictStale: true });
    expect(strict.ok).toBe(false);
  });

  test('should refuse a source whose consolidated metadata is out of date', async () => {
    const source = new MemoryZarrStore({
      ...temperatureStore(),
      'zarr.json': groupDoc({
        consolidated_metadata: {
          kind: 'inline',
          must_understand: false,
          metadata: { temperature: arrayDoc([2, 2], [2, 2]) }
        }
      })
    });
    const dataset = await openZarrDataset(source);
    expect(dataset.arrays.map((array) => array.spec.shape)).toEqual([[4, 4]]);

    await expect(createStore(dataset, target)).rejects.toThrow(
      'Source consolidated metadata disagrees with its zarr.json files:\n' +
        'Consolidated metadata for temperature disagrees with its zarr.json'
    );
    expect(await exists(target)).toBe(false);
  });

  test('should copy arrays that consolidated metadata leaves out', async () => {
    const source = new MemoryZarrStore({
      ...temperatureStore(),
      'zarr.json': groupDoc({ consolidated_metadata: { kind: 'inline', must_understand: false, metadata: {} } })
    });
    const dataset = await openZarrDataset(source);

    expect(dataset.arrays.map((array) => array.spec.name)).toEqual(['temperature']);
    expect(dataset.consolidatedMetadataErrors).toEqual(['Consolidated metadata omits array temperature']);
  });

  test('should reject unknown variables before writing anything', async () => {
    const dataset = await openZarrDataset(new MemoryZarrStore(temperatureStore()));

    await expect(createStore(dataset, target, { noDataChunks: { humidity: [[0]] } })).rejects.toThrow(
      'Unknown variables in no-data chunks: humidity'
    );
    expect(await exists(target)).toBe(false);
  });

  test('should reject coordinates outside the grid before writing anything', async () => {
    const dataset = await openZarrDataset(new MemoryZarrStore(temperatureStore()));

    const promise = createStore(dataset, target, { noDataChunks: { temperature: [[2, 0]] } });
    await expect(promise).rejects.toThrow(InvalidCoordinateError);
    await expect(promise).rejects.toThrow('Chunk coord (2, 0) out of bounds for variable temperature');
    expect(await exists(target)).toBe(false);
  });

  test('should refuse an existing target unless asked to overwrite', async () => {
    const dataset = await openZarrDataset(new MemoryZarrStore(temperatureStore()));
    await mkdir(target);
    await writeFile(join(target, 'stray.txt'), 'left over');

    await expect(createStore(dataset, target)).rejects.toThrow(TargetExistsError);

    await createStore(dataset, target, { overwrite: true });
    expect(await exists(join(target, 'stray.txt'))).toBe(false);
    expect((await checkStore(target)).ok).toBe(true);
  });

  test('should produce a store that reopens as the same dataset', async () => {
    const dataset = await openZarrDataset(new MemoryZarrStore(temperatureStore()));
    await createStore(dataset, target, { noDataChunks: { temperature: [[0, 0]] } });

    const reopened = await openLocalDataset(target);
    expect(reopened.arrays.map((array) => array.spec)).toEqual(dataset.arrays.map((array) => array.spec));
    expect(await reopened.readChunk(reopened.arrays[0].spec, [0, 0])).toBeUndefined();
  });

  test('should log progress when verbose', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const dataset = await openZarrDataset(new MemoryZarrStore(temperatureStore()));

    await createStore(dataset, target, { noDataChunks: { temperature: [[1, 1]] }, verbose: true });
    expect(log).toHaveBeenCalledWith('[createStore] wrote temperature (1 no-data chunks)');
    expect(log).toHaveBeenCalledWith('[createStore] wrote 1 manifests');
  });

  test('should serialize the report with snake_case keys', async () => {
    const dataset = await openZarrDataset(new MemoryZarrStore(temperatureStore()));

    const report = await createStore(dataset, target, { noDataChunks: { temperature: [[1, 0]] } });
    expect(JSON.parse(JSON.stringify(report))).toEqual({
      store_path: target,
      no_data_strategy: 'manifest',
      ok: true,
      chunks_written: 3,
      manifests_written: [manifestPath(target, 'temperature')],
      removed_chunks: { temperature: [{ coord: [1, 0], key: 'temperature/c/1/0' }] }
    });
  });
});

describe('parseNoDataStrategy', () => {
  test('should accept the known strategies', () => {
    expect(parseNoDataStrategy('manifest')).toBe('manifest');
    expect(parseNoDataStrategy('empty_chunks')).toBe('empty_chunks');
  });

  test('should reject anything else', () => {
    expect(() => parseNoDataStrategy('zeros')).toThrow(UnsupportedStrategyError);
    expect(() => parseNoDataStrategy('zeros')).toThrow(
      'Unsupported no-data strategy "zeros". Expected "manifest" or "empty_chunks".'
    );
  });
});
