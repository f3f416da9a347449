// backends/zarr.ts
import type { AbsolutePath } from "@zarrita/storage";
import { z } from "zod";
import { chunkCounts } from "../core/chunk-grid.js";
import { InvalidShapeError, StoreUnreadableError, describeError } from "../errors.js";
import type { ArraySpec, ChunkKeySeparator } from "../types.js";
import { compareNames, decodeJson, formatZodError } from "../utils.js";

/**
 * Read side of a Zarr store as seen by the checker and the creator.
 * Keys are store-relative; `listMetadataKeys` returns every `zarr.json`
 * key of the hierarchy without descending into array chunk directories.
 */
export interface ZarrStore {
  get(key: AbsolutePath): Promise<Uint8Array | undefined>;
  listMetadataKeys(): Promise<string[]>;
}

export const ZARR_FORMAT = 3;

const ChunkKeyEncodingSchema = z
  .object({
    name: z.enum(["default", "v2"]),
    configuration: z
      .object({ separator: z.enum(["/", "."]).optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const ArrayMetadataSchema = z
  .object({
    zarr_format: z.literal(3),
    node_type: z.literal("array"),
    shape: z.array(z.number()),
    data_type: z.unknown(),
    chunk_grid: z
      .object({
        name: z.string(),
        configuration: z.object({ chunk_shape: z.array(z.number()) }).passthrough(),
      })
      .passthrough(),
    chunk_key_encoding: ChunkKeyEncodingSchema.optional(),
    fill_value: z.unknown(),
  })
  .passthrough();

export type ArrayMetadata = z.infer<typeof ArrayMetadataSchema>;

export const GroupMetadataSchema = z
  .object({
    zarr_format: z.literal(3),
    node_type: z.literal("group"),
    attributes: z.record(z.unknown()).optional(),
    consolidated_metadata: z
      .object({ metadata: z.record(z.unknown()) })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

export type GroupMetadata = z.infer<typeof GroupMetadataSchema>;

const NodeHeaderSchema = z.object({ zarr_format: z.unknown(), node_type: z.unknown() }).passthrough();

/**
 * One node of the hierarchy with its metadata document as stored
 */
export type ZarrNode =
  | { path: string; kind: "group"; document: GroupMetadata }
  | { path: string; kind: "array"; document: ArrayMetadata };

export function toAbsolutePath(key: string): AbsolutePath {
  return `/${key.replace(/^\/+/, "")}`;
}

export function metadataKey(nodePath: string): string {
  return nodePath ? `${nodePath}/zarr.json` : "zarr.json";
}

function dirname(key: string): string {
  const idx = key.lastIndexOf("/");
  return idx === -1 ? "" : key.slice(0, idx);
}

/**
 * Validate one zarr.json document. Only Zarr v3 groups and arrays are accepted.
 */
export function parseNodeMetadata(nodePath: string, payload: unknown): ZarrNode {
  const where = metadataKey(nodePath);
  const header = NodeHeaderSchema.safeParse(payload);
  if (!header.success) {
    throw new StoreUnreadableError(`Invalid metadata document: ${where}`, { path: where });
  }
  if (header.data.zarr_format !== ZARR_FORMAT) {
    throw new StoreUnreadableError(`Only zarr_format=3 is supported: ${where}`, { path: where });
  }

  if (header.data.node_type === "group") {
    const group = GroupMetadataSchema.safeParse(payload);
    if (!group.success) {
      throw new StoreUnreadableError(`Invalid group metadata in ${where}: ${formatZodError(group.error)}`, {
        path: where,
      });
    }
    return { path: nodePath, kind: "group", document: group.data };
  }

  if (header.data.node_type === "array") {
    const array = ArrayMetadataSchema.safeParse(payload);
    if (!array.success) {
      throw new StoreUnreadableError(`Invalid array metadata in ${where}: ${formatZodError(array.error)}`, {
        path: where,
      });
    }
    return { path: nodePath, kind: "array", document: array.data };
  }

  throw new StoreUnreadableError(`Unknown node_type in ${where}: ${String(header.data.node_type)}`, {
    path: where,
  });
}

async function readMetadata(store: ZarrStore, key: string): Promise<unknown | undefined> {
  const bytes = await store.get(toAbsolutePath(key));
  if (!bytes) {
    return undefined;
  }
  try {
    return decodeJson(bytes);
  } catch (error) {
    throw new StoreUnreadableError(`Metadata is not valid JSON: ${key} (${describeError(error)})`, {
      path: key,
      cause: error,
    });
  }
}

/**
 * Convert array metadata into the chunk-grid view used for validation.
 */
export function toArraySpec(name: string, meta: ArrayMetadata): ArraySpec {
  const where = metadataKey(name);
  if (meta.chunk_grid.name !== "regular") {
    throw new InvalidShapeError(`Only regular chunk grids are supported: ${where}`, { variable: name });
  }

  const shape = [...meta.shape];
  const chunkShape = [...meta.chunk_grid.configuration.chunk_shape];
  try {
    chunkCounts(shape, chunkShape);
  } catch (error) {
    throw new InvalidShapeError(`${describeError(error)} (${where})`, { variable: name, cause: error });
  }

  const encodingName = meta.chunk_key_encoding?.name ?? "default";
  const defaultSeparator: ChunkKeySeparator = encodingName === "default" ? "/" : ".";

  return {
    name,
    shape,
    chunkShape,
    chunkKeyEncoding: encodingName,
    separator: meta.chunk_key_encoding?.configuration?.separator ?? defaultSeparator,
  };
}

/**
 * Read every node of a Zarr v3 hierarchy from its `zarr.json` files.
 *
 * Inline consolidated metadata on the root group is never used in place of
 * the per-node documents; see `consolidatedMetadataErrors`.
 */
export async function readZarrNodes(store: ZarrStore): Promise<ZarrNode[]> {
  const rootPayload = await readMetadata(store, "zarr.json");
  if (rootPayload === undefined) {
    throw new StoreUnreadableError("No zarr.json found at the store root", { path: "zarr.json" });
  }
  const root = parseNodeMetadata("", rootPayload);

  const nodes: ZarrNode[] = [root];
  if (root.kind === "group") {
    const keys = (await store.listMetadataKeys())
      .map((key) => key.replace(/^\/+/, ""))
      .filter((key) => key !== "zarr.json" && key.endsWith("/zarr.json"));

    for (const key of keys) {
      const payload = await readMetadata(store, key);
      if (payload === undefined) continue;
      nodes.push(parseNodeMetadata(dirname(key), payload));
    }
  }

  return nodes.sort((a, b) => compareNames(a.path, b.path));
}

function specSignature(spec: ArraySpec): string {
  return JSON.stringify([spec.shape, spec.chunkShape, spec.chunkKeyEncoding, spec.separator]);
}

function compareConsolidatedNode(node: ZarrNode, payload: unknown): string | undefined {
  try {
    const cached = parseNodeMetadata(node.path, payload);
    if (cached.kind !== node.kind) {
      return `Consolidated metadata for ${node.path} has node_type ${cached.kind}, its zarr.json has ${node.kind}`;
    }
    if (cached.kind === "array" && node.kind === "array") {
      const listed = specSignature(toArraySpec(node.path, cached.document));
      const actual = specSignature(toArraySpec(node.path, node.document));
      if (listed !== actual) {
        return `Consolidated metadata for ${node.path} disagrees with its zarr.json`;
      }
    }
    return undefined;
  } catch (error) {
    return `Consolidated metadata for ${node.path} is invalid: ${describeError(error)}`;
  }
}

/**
 * Differences between the root group's inline consolidated metadata and the
 * `zarr.json` files of `nodes`: nodes it omits, entries without a
 * `zarr.json`, and entries whose array layout differs.
 */
export function consolidatedMetadataErrors(nodes: readonly ZarrNode[]): string[] {
  const root = nodes.find((node) => node.path === "");
  const consolidated = root?.kind === "group" ? root.document.consolidated_metadata?.metadata : undefined;
  if (!consolidated) {
    return [];
  }

  const listed = new Map<string, unknown>();
  for (const [path, payload] of Object.entries(consolidated)) {
    listed.set(path.replace(/^\/+/, "").replace(/\/+$/, ""), payload);
  }

  const errors: string[] = [];
  for (const node of nodes) {
    if (node.path === "") continue;
    if (!listed.has(node.path)) {
      errors.push(`Consolidated metadata omits ${node.kind} ${node.path}`);
      continue;
    }
    const problem = compareConsolidatedNode(node, listed.get(node.path));
    if (problem) errors.push(problem);
  }

  const onDisk = new Set(nodes.map((node) => node.path));
  for (const path of Array.from(listed.keys()).sort(compareNames)) {
    if (!onDisk.has(path)) {
      errors.push(`Consolidated metadata lists ${path}, which has no zarr.json`);
    }
  }
  return errors;
}

/**
 * Array specs of already-read nodes, sorted by name.
 */
export function arraySpecs(nodes: readonly ZarrNode[]): ArraySpec[] {
  const specs: ArraySpec[] = [];
  for (const node of nodes) {
    if (node.kind === "array") {
      specs.push(toArraySpec(node.path, node.document));
    }
  }
  return specs;
}

/**
 * Every array of the store with its chunk-grid metadata, sorted by name.
 */
export async function scanArraySpecs(store: ZarrStore): Promise<ArraySpec[]> {
  return arraySpecs(await readZarrNodes(store));
}
