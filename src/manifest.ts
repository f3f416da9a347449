/**
 * Manifest and no-data declaration I/O.
 *
 * A manifest lists the chunks of one variable whose absence is sanctioned.
 * It lives at `<store>/.xzarrguard/manifests/<encoded-variable>.json` and is
 * always replaced as a whole.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { ZARR_FORMAT } from './backends/zarr.js';
import {
  InvalidCoordinateError,
  ManifestCorruptError,
  StoreUnreadableError,
  describeError
} from './errors.js';
import type { ChunkCoord, ChunkRef, NoDataChunks, VariableManifest } from './types.js';
import { compareNames, coordId, formatCoord, formatZodError, isMissingFileError, uniqueSortedCoords } from './utils.js';

export const MANIFEST_SCHEMA_VERSION = 1;
export const MANIFEST_DIR = join('.xzarrguard', 'manifests');

const CoordSchema = z.array(z.number().int().nonnegative());

const ManifestEntrySchema = z.object({
  coord: CoordSchema,
  key: z.string()
});

const ManifestDocumentSchema = z.object({
  schema_version: z.literal(MANIFEST_SCHEMA_VERSION),
  zarr_format: z.literal(ZARR_FORMAT),
  variable: z.string(),
  allowed_missing: z.array(ManifestEntrySchema)
});

export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>;

const NoDataDocumentSchema = z.record(z.array(CoordSchema));

// Unreserved characters of RFC 3986 stay as they are; everything else,
// including `/`, is percent-encoded.
const RESERVED_BY_ENCODE_URI_COMPONENT = /[!'()*]/g;

export function encodeManifestName(variable: string): string {
  return encodeURIComponent(variable).replace(
    RESERVED_BY_ENCODE_URI_COMPONENT,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

export function decodeManifestName(encoded: string): string {
  return decodeURIComponent(encoded);
}

export function manifestPath(storePath: string, variable: string): string {
  return join(storePath, MANIFEST_DIR, `${encodeManifestName(variable)}.json`);
}

function assertUniqueCoords(refs: readonly ChunkRef[], variable: string, path: string): void {
  const seen = new Set<string>();
  for (const ref of refs) {
    const id = coordId(ref.coord);
    if (seen.has(id)) {
      throw new ManifestCorruptError(
        `Duplicate manifest coordinate ${formatCoord(ref.coord)} for ${variable} in ${path}`,
        { variable, path }
      );
    }
    seen.add(id);
  }
}

/**
 * Validate a parsed manifest document.
 */
export function parseManifest(payload: unknown, variable: string, path: string): VariableManifest {
  const parsed = ManifestDocumentSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ManifestCorruptError(`Invalid manifest ${path}: ${formatZodError(parsed.error)}`, {
      variable,
      path
    });
  }

  const document = parsed.data;
  if (document.variable !== variable) {
    throw new ManifestCorruptError(
      `Manifest ${path} describes "${document.variable}", expected "${variable}"`,
      { variable, path }
    );
  }

  const allowedMissing = document.allowed_missing.map((entry) => ({ coord: entry.coord, key: entry.key }));
  assertUniqueCoords(allowedMissing, variable, path);

  return {
    schemaVersion: document.schema_version,
    zarrFormat: document.zarr_format,
    variable: document.variable,
    allowedMissing
  };
}

/**
 * Read the manifest of one variable. A missing file is not an error: most
 * variables have no sanctioned gaps.
 */
export async function loadVariableManifest(
  storePath: string,
  variable: string
): Promise<VariableManifest | undefined> {
  const path = manifestPath(storePath, variable);

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw new StoreUnreadableError(`Cannot read manifest ${path}: ${describeError(error)}`, {
      variable,
      path,
      cause: error
    });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new ManifestCorruptError(`Manifest is not valid JSON: ${path}`, { variable, path, cause: error });
  }

  return parseManifest(payload, variable, path);
}

/**
 * Replace a file by writing a sibling temp file and renaming it over the
 * target, so readers never see a partial document.
 */
export async function writeFileAtomic(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${process.pid}.${Date.now()}.tmp`;
  try {
    await writeFile(tmpPath, contents, 'utf-8');
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

export function serializeManifest(variable: string, refs: readonly ChunkRef[]): string {
  const payload: ManifestDocument = {
    allowed_missing: refs.map((ref) => ({ coord: [...ref.coord], key: ref.key })),
    schema_version: MANIFEST_SCHEMA_VERSION,
    variable,
    zarr_format: ZARR_FORMAT
  };
  return `${JSON.stringify(payload, null, 2)}\n`;
}

/**
 * Write the manifest of one variable, replacing any previous one in full.
 * Returns the manifest path.
 */
export async function writeVariableManifest(
  storePath: string,
  variable: string,
  refs: readonly ChunkRef[]
): Promise<string> {
  const path = manifestPath(storePath, variable);
  assertUniqueCoords(refs, variable, path);
  await writeFileAtomic(path, serializeManifest(variable, refs));
  return path;
}

/**
 * Deduplicate and sort the coordinates of every variable.
 */
export function normalizeNoDataChunks(mapping: NoDataChunks | undefined): Record<string, ChunkCoord[]> {
  const normalized: Record<string, ChunkCoord[]> = {};
  if (!mapping) {
    return normalized;
  }
  for (const variable of Object.keys(mapping).sort(compareNames)) {
    normalized[variable] = uniqueSortedCoords(mapping[variable]);
  }
  return normalized;
}

/**
 * Validate a no-data declaration document: an object mapping variable names
 * to arrays of non-negative integer tuples.
 */
export function parseNoDataChunks(payload: unknown): Record<string, ChunkCoord[]> {
  const parsed = NoDataDocumentSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidCoordinateError(
      `No-data mapping must be an object of coordinate arrays: ${formatZodError(parsed.error)}`
    );
  }
  return normalizeNoDataChunks(parsed.data);
}

export async function loadNoDataChunks(path: string): Promise<Record<string, ChunkCoord[]>> {
  const text = await readFile(path, 'utf-8');
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new InvalidCoordinateError(`No-data mapping is not valid JSON: ${path}`, { path, cause: error });
  }
  return parseNoDataChunks(payload);
}

export async function dumpNoDataChunks(path: string, mapping: NoDataChunks): Promise<void> {
  const normalized = normalizeNoDataChunks(mapping);
  const serializable: Record<string, number[][]> = {};
  for (const [variable, coords] of Object.entries(normalized)) {
    serializable[variable] = coords.map((coord) => [...coord]);
  }
  await writeFileAtomic(path, `${JSON.stringify(serializable, null, 2)}\n`);
}
