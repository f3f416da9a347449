/**
 * Source datasets for store creation.
 *
 * A dataset is a Zarr v3 hierarchy seen through its metadata documents and
 * its encoded chunks. Chunks are copied without decoding, so any codec the
 * source uses is carried over unchanged.
 */

import { LocalZarrStore } from './backends/local-store.js';
import { consolidatedMetadataErrors, readZarrNodes, toAbsolutePath, toArraySpec } from './backends/zarr.js';
import type { ArrayMetadata, ZarrNode, ZarrStore } from './backends/zarr.js';
import { chunkKey } from './core/chunk-key.js';
import type { ArraySpec, ChunkCoord } from './types.js';

export interface SourceArray {
  spec: ArraySpec;
  document: ArrayMetadata;
}

export interface SourceDataset {
  /** Every group and array document, root first */
  readonly nodes: readonly ZarrNode[];
  readonly arrays: readonly SourceArray[];
  /** Where the root's inline consolidated metadata disagrees with the zarr.json files */
  readonly consolidatedMetadataErrors: readonly string[];
  /** Encoded bytes of one chunk, or undefined when the source never wrote it */
  readChunk(spec: ArraySpec, coord: ChunkCoord): Promise<Uint8Array | undefined>;
}

/**
 * Open any readable Zarr v3 store as a source dataset.
 */
export async function openZarrDataset(store: ZarrStore): Promise<SourceDataset> {
  const nodes = await readZarrNodes(store);
  const arrays: SourceArray[] = [];
  for (const node of nodes) {
    if (node.kind === 'array') {
      arrays.push({ spec: toArraySpec(node.path, node.document), document: node.document });
    }
  }

  return {
    nodes,
    arrays,
    consolidatedMetadataErrors: consolidatedMetadataErrors(nodes),
    readChunk: (spec, coord) => store.get(toAbsolutePath(chunkKey(spec, coord)))
  };
}

export function openLocalDataset(path: string): Promise<SourceDataset> {
  return openZarrDataset(new LocalZarrStore(path));
}
