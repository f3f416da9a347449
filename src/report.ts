/**
 * Report models for integrity checks and store creation, with their JSON
 * and text renderings.
 */

import type { ZarrGuardErrorKind } from './errors.js';
import type { ChunkRef, NoDataStrategy, StaleEntry } from './types.js';

export interface ChunkRefJson {
  coord: number[];
  key: string;
}

export interface StaleEntryJson extends ChunkRefJson {
  reason: StaleEntry['reason'];
}

function refToJson(ref: ChunkRef): ChunkRefJson {
  return { coord: [...ref.coord], key: ref.key };
}

export class VariableTiming {
  manifestLoadS = 0;
  manifestValidateS = 0;
  chunkScanS = 0;
  expectedChunks = 0;
  missingChunks = 0;

  toJSON() {
    return {
      manifest_load_s: this.manifestLoadS,
      manifest_validate_s: this.manifestValidateS,
      chunk_scan_s: this.chunkScanS,
      expected_chunks: this.expectedChunks,
      missing_chunks: this.missingChunks,
    };
  }
}

/**
 * Coarse timing of one `checkStore` run, in seconds
 */
export class IntegrityTiming {
  totalS = 0;
  scanSpecsS = 0;
  manifestS = 0;
  chunkScanS = 0;
  existsCalls = 0;
  readonly variables: Record<string, VariableTiming> = {};

  toJSON() {
    const variables: Record<string, ReturnType<VariableTiming['toJSON']>> = {};
    for (const [name, timing] of Object.entries(this.variables)) {
      variables[name] = timing.toJSON();
    }
    return {
      total_s: this.totalS,
      scan_specs_s: this.scanSpecsS,
      manifest_s: this.manifestS,
      chunk_scan_s: this.chunkScanS,
      exists_calls: this.existsCalls,
      variables,
    };
  }
}

/**
 * Findings for one variable.
 *
 * `missing` holds absent chunks no manifest sanctions, `allowed` the absent
 * chunks a manifest does sanction, and `stale` the manifest entries that
 * no longer describe the store.
 */
export class VariableIntegrity {
  readonly name: string;
  expectedChunks = 0;
  hasManifest = false;
  readonly missing: ChunkRef[] = [];
  readonly allowed: ChunkRef[] = [];
  readonly stale: StaleEntry[] = [];
  error?: string;
  errorKind?: ZarrGuardErrorKind;
  ok = true;

  constructor(name: string) {
    this.name = name;
  }

  toJSON() {
    return {
      name: this.name,
      ok: this.ok,
      has_manifest: this.hasManifest,
      expected_chunks: this.expectedChunks,
      missing: this.missing.map(refToJson),
      allowed: this.allowed.map(refToJson),
      stale: this.stale.map((entry): StaleEntryJson => ({ ...refToJson(entry), reason: entry.reason })),
      ...(this.error === undefined ? {} : { error: this.error }),
      ...(this.errorKind === undefined ? {} : { error_kind: this.errorKind }),
    };
  }
}

export class IntegrityReport {
  readonly storePath: string;
  readonly strictStale: boolean;
  readonly variables: Record<string, VariableIntegrity> = {};
  readonly errors: string[] = [];
  timing?: IntegrityTiming;
  ok = true;

  constructor(storePath: string, strictStale: boolean) {
    this.storePath = storePath;
    this.strictStale = strictStale;
  }

  /**
   * The verdict as a primitive, so `report == true` and `+report` follow `ok`
   */
  valueOf(): boolean {
    return this.ok;
  }

  toJSON() {
    const variables: Record<string, ReturnType<VariableIntegrity['toJSON']>> = {};
    for (const [name, variable] of Object.entries(this.variables)) {
      variables[name] = variable.toJSON();
    }
    return {
      store_path: this.storePath,
      strict_stale_manifest: this.strictStale,
      ok: this.ok,
      errors: [...this.errors],
      variables,
      ...(this.timing === undefined ? {} : { timing: this.timing.toJSON() }),
    };
  }
}

export class CreateReport {
  readonly storePath: string;
  readonly noDataStrategy: NoDataStrategy;
  readonly manifestsWritten: string[] = [];
  readonly removedChunks: Record<string, ChunkRef[]> = {};
  chunksWritten = 0;
  ok = true;

  constructor(storePath: string, noDataStrategy: NoDataStrategy) {
    this.storePath = storePath;
    this.noDataStrategy = noDataStrategy;
  }

  toJSON() {
    const removed: Record<string, ChunkRefJson[]> = {};
    for (const [name, refs] of Object.entries(this.removedChunks)) {
      removed[name] = refs.map(refToJson);
    }
    return {
      store_path: this.storePath,
      no_data_strategy: this.noDataStrategy,
      ok: this.ok,
      chunks_written: this.chunksWritten,
      manifests_written: [...this.manifestsWritten],
      removed_chunks: removed,
    };
  }
}

export interface FormatReportOptions {
  timing?: boolean;
}

function seconds(value: number): string {
  return `${value.toFixed(3)}s`;
}

/**
 * Human-readable summary: a PASS/FAIL line, one line per variable with
 * findings, error lines and an optional timing line.
 */
export function formatReport(report: IntegrityReport, options: FormatReportOptions = {}): string {
  const lines: string[] = [report.ok ? 'PASS' : 'FAIL'];

  const names = Object.keys(report.variables).sort();
  for (const name of names) {
    const variable = report.variables[name];
    const details: string[] = [];
    if (variable.missing.length > 0) {
      details.push(`missing=${variable.missing.length}`);
    }
    if (variable.stale.length > 0) {
      details.push(`stale=${variable.stale.length}`);
    }
    if (variable.error !== undefined) {
      details.push(`error=${variable.error}`);
    }
    if (details.length > 0) {
      lines.push(`${name}: ${details.join(', ')}`);
    }
  }

  for (const error of report.errors) {
    lines.push(`error: ${error}`);
  }

  if (options.timing && report.timing) {
    const timing = report.timing;
    lines.push(
      `timing: total=${seconds(timing.totalS)} scan_specs=${seconds(timing.scanSpecsS)} ` +
        `manifest=${seconds(timing.manifestS)} chunk_scan=${seconds(timing.chunkScanS)} ` +
        `exists_calls=${timing.existsCalls}`
    );
  }

  return lines.join('\n');
}
