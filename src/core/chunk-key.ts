import { InvalidCoordinateError } from '../errors.js';
import type { ArraySpec, ChunkCoord } from '../types.js';

/**
 * Prefix that the `default` chunk key encoding puts in front of the indices
 */
export const CHUNK_KEY_PREFIX = 'c';

function assertCoord(spec: Pick<ArraySpec, 'name' | 'shape'>, coord: ChunkCoord): void {
  if (coord.length !== spec.shape.length) {
    throw new InvalidCoordinateError(
      `Chunk coord [${coord.join(', ')}] has rank ${coord.length}, expected ${spec.shape.length} for ${spec.name}`,
      { variable: spec.name }
    );
  }
  coord.forEach((index, dim) => {
    if (!Number.isInteger(index) || index < 0) {
      throw new InvalidCoordinateError(
        `Invalid chunk coordinate at index ${dim}: ${index} (${spec.name})`,
        { variable: spec.name }
      );
    }
  });
}

/**
 * Encode chunk indices according to the array's chunk_key_encoding, relative
 * to the array directory (`c/0/1`, `0.1`).
 */
export function encodeChunkCoord(
  spec: Pick<ArraySpec, 'name' | 'shape' | 'chunkKeyEncoding' | 'separator'>,
  coord: ChunkCoord
): string {
  assertCoord(spec, coord);

  if (spec.chunkKeyEncoding === 'v2') {
    return coord.length === 0 ? '0' : coord.join(spec.separator);
  }
  return [CHUNK_KEY_PREFIX, ...coord].join(spec.separator);
}

/**
 * Store-relative key of a chunk, e.g. `temperature/c/0/1`.
 */
export function chunkKey(
  spec: Pick<ArraySpec, 'name' | 'shape' | 'chunkKeyEncoding' | 'separator'>,
  coord: ChunkCoord
): string {
  const encoded = encodeChunkCoord(spec, coord);
  return spec.name ? `${spec.name}/${encoded}` : encoded;
}
