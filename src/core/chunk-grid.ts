import { InvalidShapeError } from '../errors.js';
import type { ChunkCoord } from '../types.js';

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Number of chunks along each dimension: `ceil(shape[d] / chunkShape[d])`.
 */
export function chunkCounts(shape: readonly number[], chunkShape: readonly number[]): number[] {
  if (shape.length !== chunkShape.length) {
    throw new InvalidShapeError(
      `Shape/chunk rank mismatch: shape has ${shape.length} dimensions, chunk shape has ${chunkShape.length}`
    );
  }

  return shape.map((size, dim) => {
    const chunk = chunkShape[dim];
    if (!isNonNegativeInteger(size)) {
      throw new InvalidShapeError(`Invalid shape component at dimension ${dim}: ${size}`);
    }
    if (!Number.isInteger(chunk) || chunk <= 0) {
      throw new InvalidShapeError(`Invalid chunk shape component at dimension ${dim}: ${chunk}`);
    }
    return Math.ceil(size / chunk);
  });
}

/**
 * Total number of chunks in the grid. Rank-0 arrays hold a single chunk.
 */
export function expectedChunkCount(shape: readonly number[], chunkShape: readonly number[]): number {
  return chunkCounts(shape, chunkShape).reduce((total, count) => total * count, 1);
}

function* walkGrid(counts: readonly number[]): Generator<ChunkCoord> {
  if (counts.some((count) => count === 0)) {
    return;
  }

  const rank = counts.length;
  const current = new Array<number>(rank).fill(0);

  while (true) {
    yield [...current];

    // Odometer step: last dimension moves fastest
    let dim = rank - 1;
    while (dim >= 0) {
      current[dim] += 1;
      if (current[dim] < counts[dim]) {
        break;
      }
      current[dim] = 0;
      dim -= 1;
    }
    if (dim < 0) {
      return;
    }
  }
}

/**
 * All chunk coordinates of a regular grid in row-major order.
 *
 * The result is lazy and restartable: every iteration walks the grid again
 * from the first coordinate, so large grids are never materialized.
 * Invalid shapes throw here, not on first iteration.
 */
export function expectedChunkCoords(
  shape: readonly number[],
  chunkShape: readonly number[]
): Iterable<ChunkCoord> {
  const counts = chunkCounts(shape, chunkShape);
  return {
    [Symbol.iterator]: () => walkGrid(counts),
  };
}

/**
 * Whether `coord` addresses a chunk inside the grid described by `counts`.
 */
export function coordInBounds(counts: readonly number[], coord: ChunkCoord): boolean {
  if (coord.length !== counts.length) {
    return false;
  }
  return coord.every((index, dim) => Number.isInteger(index) && index >= 0 && index < counts[dim]);
}
