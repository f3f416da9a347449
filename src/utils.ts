/**
 * Utility functions for xzarrguard
 */

import type { ZodError } from 'zod';
import type { ChunkCoord } from './types.js';

/**
 * Stable string identity for a coordinate, usable as a Map/Set key
 */
export function coordId(coord: ChunkCoord): string {
  return coord.join(',');
}

/**
 * Human-readable coordinate, e.g. `(0, 1)`
 */
export function formatCoord(coord: ChunkCoord): string {
  return `(${coord.join(', ')})`;
}

/**
 * Lexicographic numeric ordering; shorter coordinates sort first on ties
 */
export function compareCoords(a: ChunkCoord, b: ChunkCoord): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

/**
 * Deduplicate and sort coordinates
 */
export function uniqueSortedCoords(coords: Iterable<ChunkCoord>): ChunkCoord[] {
  const seen = new Map<string, ChunkCoord>();
  for (const coord of coords) {
    seen.set(coordId(coord), [...coord]);
  }
  return Array.from(seen.values()).sort(compareCoords);
}

/**
 * Code-unit ordering of names, independent of locale
 */
export function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * True for fs errors that mean "nothing at this path"
 */
export function isMissingFileError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

/**
 * Single-line summary of a zod validation failure
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

const textDecoder = new TextDecoder();
const textEncoder = new TextEncoder();

export function decodeJson(bytes: Uint8Array): unknown {
  return JSON.parse(textDecoder.decode(bytes));
}

export function encodeJson(value: unknown): Uint8Array {
  return textEncoder.encode(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Seconds elapsed since `start` (a `performance.now()` reading)
 */
export function secondsSince(start: number): number {
  return (performance.now() - start) / 1000;
}
