/**
 * Create integrity-checkable stores with an explicit no-data policy.
 */

import * as zarr from 'zarrita';
import { mkdir, rm, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { LocalZarrStore } from './backends/local-store.js';
import { metadataKey, toAbsolutePath } from './backends/zarr.js';
import { chunkCounts, coordInBounds, expectedChunkCoords } from './core/chunk-grid.js';
import { chunkKey } from './core/chunk-key.js';
import type { SourceArray, SourceDataset } from './dataset.js';
import {
  InvalidCoordinateError,
  StoreUnreadableError,
  TargetExistsError,
  UnsupportedStrategyError
} from './errors.js';
import { checkStore } from './integrity.js';
import { normalizeNoDataChunks, writeVariableManifest } from './manifest.js';
import { CreateReport, formatReport } from './report.js';
import { NO_DATA_STRATEGIES } from './types.js';
import type { ChunkCoord, ChunkRef, NoDataChunks, NoDataStrategy } from './types.js';
import { coordId, encodeJson, formatCoord, isMissingFileError } from './utils.js';

export interface CreateOptions {
  /** Chunks that are intentionally not written, per variable */
  noDataChunks?: NoDataChunks;
  /** Default `manifest` */
  noDataStrategy?: NoDataStrategy;
  /** Replace an existing target (default false) */
  overwrite?: boolean;
  /** Run an integrity check on the result and fail if it does not pass (default true) */
  verify?: boolean;
  /** Log progress to the console */
  verbose?: boolean;
}

type TargetArray = zarr.Array<zarr.DataType, LocalZarrStore>;

export function parseNoDataStrategy(value: string): NoDataStrategy {
  const strategy = NO_DATA_STRATEGIES.find((candidate) => candidate === value);
  if (strategy === undefined) {
    throw new UnsupportedStrategyError(value);
  }
  return strategy;
}

function assertNever(value: never): never {
  throw new UnsupportedStrategyError(String(value));
}

/**
 * Resolve declared no-data coordinates to chunk refs, rejecting unknown
 * variables and coordinates outside the grid before anything is written.
 */
function planNoData(
  dataset: SourceDataset,
  declared: Record<string, ChunkCoord[]>
): Map<string, ChunkRef[]> {
  const arrays = new Map(dataset.arrays.map((array) => [array.spec.name, array]));

  const unknown = Object.keys(declared).filter((name) => !arrays.has(name));
  if (unknown.length > 0) {
    throw new InvalidCoordinateError(`Unknown variables in no-data chunks: ${unknown.join(', ')}`);
  }

  const plan = new Map<string, ChunkRef[]>();
  for (const [variable, coords] of Object.entries(declared)) {
    if (coords.length === 0) continue;
    const source = arrays.get(variable);
    if (!source) continue;
    const { spec } = source;
    const counts = chunkCounts(spec.shape, spec.chunkShape);
    plan.set(
      variable,
      coords.map((coord) => {
        if (!coordInBounds(counts, coord)) {
          throw new InvalidCoordinateError(
            `Chunk coord ${formatCoord(coord)} out of bounds for variable ${variable}`,
            { variable }
          );
        }
        return { coord, key: chunkKey(spec, coord) };
      })
    );
  }
  return plan;
}

function numericFill(value: unknown): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'number') return value;
  if (value === 'NaN') return Number.NaN;
  if (value === 'Infinity') return Number.POSITIVE_INFINITY;
  if (value === '-Infinity') return Number.NEGATIVE_INFINITY;
  throw new StoreUnreadableError(`Unsupported fill_value: ${JSON.stringify(value)}`);
}

function bigintFill(value: unknown): bigint {
  if (value === null || value === undefined) return 0n;
  if (typeof value === 'number' || typeof value === 'string') return BigInt(value);
  throw new StoreUnreadableError(`Unsupported fill_value: ${JSON.stringify(value)}`);
}

/**
 * Physically write one chunk holding only the fill value.
 */
async function writeFillChunk(array: TargetArray, source: SourceArray, coord: ChunkCoord): Promise<void> {
  const { shape, chunkShape } = source.spec;
  const selection =
    coord.length === 0
      ? null
      : coord.map((index, dim) =>
          zarr.slice(index * chunkShape[dim], Math.min((index + 1) * chunkShape[dim], shape[dim]))
        );
  const fill = source.document.fill_value;

  if (array.is('bigint')) {
    await zarr.set(array, selection, bigintFill(fill));
    return;
  }
  if (array.is('number')) {
    await zarr.set(array, selection, numericFill(fill));
    return;
  }
  if (array.is('bool')) {
    await zarr.set(array, selection, fill === true);
    return;
  }
  throw new StoreUnreadableError(
    `Cannot materialize fill chunks for data type ${String(array.dtype)} (${source.spec.name})`,
    { variable: source.spec.name }
  );
}

async function prepareTarget(target: string, overwrite: boolean): Promise<void> {
  let exists = true;
  try {
    await stat(target);
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error;
    }
    exists = false;
  }

  if (exists) {
    if (!overwrite) {
      throw new TargetExistsError(target);
    }
    await rm(target, { recursive: true, force: true });
  }
  await mkdir(target, { recursive: true });
}

/**
 * Create a Zarr v3 store from `dataset` at `targetPath`.
 *
 * Every chunk of every array is written except declared no-data chunks,
 * which are left absent and listed in a per-variable manifest under the
 * `manifest` strategy, or written as fill-value chunks under
 * `empty_chunks`. Manifests are written only after all chunk writes have
 * succeeded. A source whose consolidated metadata is out of date is
 * refused before anything is written.
 */
export async function createStore(
  dataset: SourceDataset,
  targetPath: string,
  options: CreateOptions = {}
): Promise<CreateReport> {
  const strategy = parseNoDataStrategy(options.noDataStrategy ?? 'manifest');
  const target = resolve(targetPath);
  const log = (message: string): void => {
    if (options.verbose) console.log(`[createStore] ${message}`);
  };

  if (dataset.consolidatedMetadataErrors.length > 0) {
    throw new StoreUnreadableError(
      `Source consolidated metadata disagrees with its zarr.json files:\n${dataset.consolidatedMetadataErrors.join('\n')}`
    );
  }
  const plan = planNoData(dataset, normalizeNoDataChunks(options.noDataChunks));
  await prepareTarget(target, options.overwrite ?? false);

  const store = new LocalZarrStore(target);
  const report = new CreateReport(targetPath, strategy);

  for (const node of dataset.nodes) {
    await store.set(toAbsolutePath(metadataKey(node.path)), encodeJson(node.document));
  }
  log(`wrote metadata for ${dataset.nodes.length} nodes to ${target}`);

  const root = zarr.root(store);
  for (const source of dataset.arrays) {
    const { spec } = source;
    const noData = new Set((plan.get(spec.name) ?? []).map((ref) => coordId(ref.coord)));
    let array: TargetArray | undefined;
    const openTarget = async (): Promise<TargetArray> => {
      array ??= await zarr.open.v3(spec.name ? root.resolve(spec.name) : root, { kind: 'array' });
      return array;
    };

    for (const coord of expectedChunkCoords(spec.shape, spec.chunkShape)) {
      if (noData.has(coordId(coord))) {
        switch (strategy) {
          case 'manifest':
            continue;
          case 'empty_chunks':
            await writeFillChunk(await openTarget(), source, coord);
            report.chunksWritten += 1;
            continue;
          default:
            assertNever(strategy);
        }
      }

      const bytes = await dataset.readChunk(spec, coord);
      if (bytes) {
        await store.set(toAbsolutePath(chunkKey(spec, coord)), bytes);
      } else {
        await writeFillChunk(await openTarget(), source, coord);
      }
      report.chunksWritten += 1;
    }
    log(`wrote ${spec.name || '/'} (${noData.size} no-data chunks)`);
  }

  if (strategy === 'manifest') {
    for (const [variable, refs] of plan) {
      report.manifestsWritten.push(await writeVariableManifest(target, variable, refs));
      report.removedChunks[variable] = refs;
    }
    log(`wrote ${report.manifestsWritten.length} manifests`);
  }

  if (options.verify ?? true) {
    const integrity = await checkStore(target);
    if (!integrity.ok) {
      throw new StoreUnreadableError(`Created store failed integrity validation:\n${formatReport(integrity)}`, {
        path: target
      });
    }
  }

  return report;
}
