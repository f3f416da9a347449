/**
 * xzarrguard - completeness checks for Zarr v3 stores
 *
 * Validates that every expected chunk of every array is present, or that
 * its absence is sanctioned by a per-variable manifest, and creates stores
 * that follow the same protocol.
 */

export * from './types.js';
export * from './errors.js';
export { coordId, formatCoord, compareCoords, uniqueSortedCoords } from './utils.js';

// Chunk grid
export { chunkCounts, expectedChunkCount, expectedChunkCoords, coordInBounds } from './core/chunk-grid.js';
export { CHUNK_KEY_PREFIX, encodeChunkCoord, chunkKey } from './core/chunk-key.js';

// Manifests
export {
  MANIFEST_SCHEMA_VERSION,
  MANIFEST_DIR,
  encodeManifestName,
  decodeManifestName,
  manifestPath,
  parseManifest,
  loadVariableManifest,
  serializeManifest,
  writeVariableManifest,
  normalizeNoDataChunks,
  parseNoDataChunks,
  loadNoDataChunks,
  dumpNoDataChunks
} from './manifest.js';
export type { ManifestDocument } from './manifest.js';

// Checking and creation
export { checkStore, DEFAULT_CHECK_CONCURRENCY } from './integrity.js';
export type { CheckOptions } from './integrity.js';
export { createStore, parseNoDataStrategy } from './create.js';
export type { CreateOptions } from './create.js';
export { openZarrDataset, openLocalDataset } from './dataset.js';
export type { SourceArray, SourceDataset } from './dataset.js';
export {
  IntegrityReport,
  VariableIntegrity,
  IntegrityTiming,
  VariableTiming,
  CreateReport,
  formatReport
} from './report.js';
export type { FormatReportOptions, ChunkRefJson, StaleEntryJson } from './report.js';

// Backends
export {
  ZARR_FORMAT,
  readZarrNodes,
  scanArraySpecs,
  arraySpecs,
  consolidatedMetadataErrors,
  toArraySpec,
  parseNodeMetadata
} from './backends/zarr.js';
export type { ZarrStore, ZarrNode, ArrayMetadata, GroupMetadata } from './backends/zarr.js';
export { LocalZarrStore } from './backends/local-store.js';

// Version
export const VERSION = '0.1.0';
