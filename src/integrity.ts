/**
 * Store completeness checks for local Zarr v3 stores.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { LocalZarrStore } from './backends/local-store.js';
import { arraySpecs, consolidatedMetadataErrors, readZarrNodes } from './backends/zarr.js';
import { chunkCounts, coordInBounds, expectedChunkCoords } from './core/chunk-grid.js';
import { chunkKey } from './core/chunk-key.js';
import { StoreUnreadableError, describeError, isZarrGuardError } from './errors.js';
import type { ZarrGuardError } from './errors.js';
import { loadVariableManifest } from './manifest.js';
import { IntegrityReport, IntegrityTiming, VariableIntegrity, VariableTiming } from './report.js';
import type { ArraySpec, ChunkPresence, ChunkRef } from './types.js';
import { coordId, isMissingFileError, secondsSince } from './utils.js';

export const DEFAULT_CHECK_CONCURRENCY = 32;

export interface CheckOptions {
  /** Fail the verdict on stale manifest entries too (default false) */
  strictStale?: boolean;
  /** Capture coarse timing into `report.timing` (default false) */
  timing?: boolean;
  /** Existence checker; defaults to stat calls against the local store */
  presence?: ChunkPresence;
  /** Number of existence checks in flight per variable (default 32, also used for non-finite values) */
  concurrency?: number;
}

interface CheckContext {
  storePath: string;
  presence: ChunkPresence;
  strictStale: boolean;
  concurrency: number;
  timing?: IntegrityTiming;
}

class CountingPresence implements ChunkPresence {
  calls = 0;

  constructor(private readonly inner: ChunkPresence) {}

  async exists(key: string): Promise<boolean> {
    this.calls += 1;
    try {
      return await this.inner.exists(key);
    } catch (error) {
      if (isZarrGuardError(error)) {
        throw error;
      }
      throw new StoreUnreadableError(`Cannot check chunk ${key}: ${describeError(error)}`, {
        path: key,
        cause: error
      });
    }
  }
}

function resolveConcurrency(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return DEFAULT_CHECK_CONCURRENCY;
  }
  return Math.max(1, Math.floor(value));
}

function asZarrGuardError(error: unknown, variable: string): ZarrGuardError {
  if (isZarrGuardError(error)) {
    return error;
  }
  return new StoreUnreadableError(`Cannot check ${variable}: ${describeError(error)}`, { variable, cause: error });
}

/**
 * Query presence for every expected chunk, `concurrency` keys at a time.
 * `visit` sees the chunks in grid order whatever order the checks settle in.
 */
async function scanChunks(
  spec: ArraySpec,
  presence: ChunkPresence,
  concurrency: number,
  visit: (ref: ChunkRef, exists: boolean) => void
): Promise<void> {
  let batch: ChunkRef[] = [];

  const flush = async (): Promise<void> => {
    const current = batch;
    batch = [];
    const results = await Promise.all(current.map((ref) => presence.exists(ref.key)));
    results.forEach((exists, i) => visit(current[i], exists));
  };

  for (const coord of expectedChunkCoords(spec.shape, spec.chunkShape)) {
    batch.push({ coord, key: chunkKey(spec, coord) });
    if (batch.length >= concurrency) {
      await flush();
    }
  }
  await flush();
}

async function checkVariable(spec: ArraySpec, context: CheckContext): Promise<VariableIntegrity> {
  const variable = new VariableIntegrity(spec.name);
  const timing = context.timing ? new VariableTiming() : undefined;

  let start = performance.now();
  const manifest = await loadVariableManifest(context.storePath, spec.name);
  if (timing) timing.manifestLoadS = secondsSince(start);
  variable.hasManifest = manifest !== undefined;

  // Only entries whose stored key still matches the recomputed one sanction absence
  start = performance.now();
  const counts = chunkCounts(spec.shape, spec.chunkShape);
  const sanctioned = new Map<string, ChunkRef>();
  const mismatched = new Set<string>();
  for (const entry of manifest?.allowedMissing ?? []) {
    if (!coordInBounds(counts, entry.coord)) {
      variable.stale.push({ ...entry, reason: 'out_of_grid' });
      continue;
    }
    if (entry.key !== chunkKey(spec, entry.coord)) {
      variable.stale.push({ ...entry, reason: 'key_mismatch' });
      mismatched.add(coordId(entry.coord));
      continue;
    }
    sanctioned.set(coordId(entry.coord), entry);
  }
  if (timing) timing.manifestValidateS = secondsSince(start);

  start = performance.now();
  await scanChunks(spec, context.presence, context.concurrency, (ref, exists) => {
    variable.expectedChunks += 1;
    const id = coordId(ref.coord);
    if (mismatched.has(id)) {
      return;
    }
    if (!exists && sanctioned.has(id)) {
      variable.allowed.push(ref);
    } else if (!exists) {
      variable.missing.push(ref);
    } else if (sanctioned.has(id)) {
      variable.stale.push({ ...ref, reason: 'present' });
    }
  });

  if (timing) {
    timing.chunkScanS = secondsSince(start);
    timing.expectedChunks = variable.expectedChunks;
    timing.missingChunks = variable.missing.length + variable.allowed.length;
    if (context.timing) context.timing.variables[spec.name] = timing;
  }

  variable.ok = variable.missing.length === 0 && !(context.strictStale && variable.stale.length > 0);
  return variable;
}

async function assertStoreDirectory(storePath: string): Promise<string | undefined> {
  try {
    const info = await stat(storePath);
    return info.isDirectory() ? undefined : `Store path is not a directory: ${storePath}`;
  } catch (error) {
    if (isMissingFileError(error)) {
      return `Store does not exist: ${storePath}`;
    }
    return `Cannot access store ${storePath}: ${describeError(error)}`;
  }
}

/**
 * Validate completeness of a local Zarr v3 store.
 *
 * Every expected chunk must exist unless the variable's manifest sanctions
 * its absence. Manifest entries that no longer describe the store are
 * reported as stale and only fail the check under `strictStale`.
 * Failures confined to one variable (a corrupt manifest, an unreadable
 * chunk directory) are recorded on that variable; the others are still
 * checked. Arrays are always read from their own `zarr.json` files, and
 * consolidated metadata that disagrees with them is a store-level error.
 */
export async function checkStore(storePath: string, options: CheckOptions = {}): Promise<IntegrityReport> {
  const totalStart = performance.now();
  const root = resolve(storePath);
  const strictStale = options.strictStale ?? false;
  const report = new IntegrityReport(storePath, strictStale);
  const timing = options.timing ? new IntegrityTiming() : undefined;
  report.timing = timing;

  const finish = (): IntegrityReport => {
    report.ok = report.errors.length === 0 && Object.values(report.variables).every((variable) => variable.ok);
    if (timing) timing.totalS = secondsSince(totalStart);
    return report;
  };

  const storeProblem = await assertStoreDirectory(root);
  if (storeProblem) {
    report.errors.push(storeProblem);
    return finish();
  }

  const store = new LocalZarrStore(root);
  const presence = new CountingPresence(options.presence ?? store);

  let specs: ArraySpec[];
  const scanStart = performance.now();
  try {
    const nodes = await readZarrNodes(store);
    specs = arraySpecs(nodes);
    report.errors.push(...consolidatedMetadataErrors(nodes));
  } catch (error) {
    report.errors.push(describeError(error));
    return finish();
  }
  if (timing) timing.scanSpecsS = secondsSince(scanStart);

  const context: CheckContext = {
    storePath: root,
    presence,
    strictStale,
    concurrency: resolveConcurrency(options.concurrency),
    timing,
  };

  for (const spec of specs) {
    let variable: VariableIntegrity;
    try {
      variable = await checkVariable(spec, context);
    } catch (error) {
      const failure = asZarrGuardError(error, spec.name);
      variable = new VariableIntegrity(spec.name);
      variable.error = failure.message;
      variable.errorKind = failure.kind;
      variable.ok = false;
    }
    report.variables[spec.name] = variable;
  }

  if (timing) {
    const variableTimings = Object.values(timing.variables);
    timing.manifestS = variableTimings.reduce((sum, item) => sum + item.manifestLoadS + item.manifestValidateS, 0);
    timing.chunkScanS = variableTimings.reduce((sum, item) => sum + item.chunkScanS, 0);
    timing.existsCalls = presence.calls;
  }

  return finish();
}
