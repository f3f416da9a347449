/**
 * Type definitions for xzarrguard
 */

/**
 * Position of one chunk in an array's chunk grid, one index per dimension
 */
export type ChunkCoord = readonly number[];

/**
 * Zarr v3 chunk key encodings
 */
export type ChunkKeyEncodingName = 'default' | 'v2';

export type ChunkKeySeparator = '/' | '.';

/**
 * Minimal metadata needed to validate the chunks of one array
 */
export interface ArraySpec {
  /** Store-relative array path, e.g. `temperature` or `group/b` */
  name: string;
  shape: readonly number[];
  chunkShape: readonly number[];
  chunkKeyEncoding: ChunkKeyEncodingName;
  separator: ChunkKeySeparator;
}

/**
 * Reference to one logical chunk: where it sits in the grid and the
 * store-relative key it is stored under
 */
export interface ChunkRef {
  coord: ChunkCoord;
  key: string;
}

/**
 * Per-variable declaration of chunks whose absence is sanctioned
 */
export interface VariableManifest {
  schemaVersion: number;
  zarrFormat: number;
  variable: string;
  allowedMissing: ChunkRef[];
}

/**
 * Variable name -> chunk coordinates that are intentionally not written
 */
export type NoDataChunks = Record<string, readonly ChunkCoord[]>;

export const NO_DATA_STRATEGIES = ['manifest', 'empty_chunks'] as const;

/**
 * How a store represents no-data chunks:
 * - `manifest`: chunks are left absent and listed in a manifest
 * - `empty_chunks`: chunks are physically written with the fill value
 */
export type NoDataStrategy = (typeof NO_DATA_STRATEGIES)[number];

/**
 * Existence check for a chunk object. Must not read chunk contents.
 */
export interface ChunkPresence {
  exists(key: string): Promise<boolean>;
}

export type StaleReason = 'present' | 'key_mismatch' | 'out_of_grid';

export interface StaleEntry extends ChunkRef {
  reason: StaleReason;
}
