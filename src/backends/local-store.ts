import { FileSystemStore } from "@zarrita/storage";
import type { AbsolutePath } from "@zarrita/storage";
import { mkdir, readdir, stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { StoreUnreadableError, describeError } from "../errors.js";
import type { ChunkPresence } from "../types.js";
import { compareNames, decodeJson, isMissingFileError } from "../utils.js";
import { toAbsolutePath, type ZarrStore } from "./zarr.js";

/**
 * Zarr v3 store on the local filesystem.
 *
 * Reads and writes go through zarrita's `FileSystemStore`; existence checks
 * stat the chunk file and never read it.
 */
export class LocalZarrStore implements ZarrStore, ChunkPresence {
  readonly root: string;
  readonly fs: FileSystemStore;

  constructor(root: string) {
    this.root = resolve(root);
    this.fs = new FileSystemStore(this.root);
  }

  /**
   * Filesystem path of a store-relative key.
   */
  resolve(key: string): string {
    const parts = key.split("/").filter((part) => part.length > 0);
    return join(this.root, ...parts);
  }

  async exists(key: string): Promise<boolean> {
    try {
      const info = await stat(this.resolve(key));
      return info.isFile();
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw new StoreUnreadableError(`Cannot stat chunk ${key}: ${describeError(error)}`, {
        path: this.resolve(key),
        cause: error,
      });
    }
  }

  async get(key: AbsolutePath): Promise<Uint8Array | undefined> {
    try {
      return await this.fs.get(key);
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      throw new StoreUnreadableError(`Cannot read ${key}: ${describeError(error)}`, {
        path: this.resolve(key),
        cause: error,
      });
    }
  }

  async set(key: AbsolutePath, value: Uint8Array): Promise<void> {
    await mkdir(dirname(this.resolve(key)), { recursive: true });
    await this.fs.set(key, value);
  }

  /**
   * Sorted names of the sub-directories under a store-relative prefix.
   * Dot-prefixed entries (such as `.xzarrguard`) are skipped.
   */
  async listDirectories(prefix: string): Promise<string[]> {
    try {
      const entries = await readdir(this.resolve(prefix), { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
        .map((entry) => entry.name)
        .sort(compareNames);
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw new StoreUnreadableError(`Cannot list ${prefix || "store root"}: ${describeError(error)}`, {
        path: this.resolve(prefix),
        cause: error,
      });
    }
  }

  /**
   * Walk the hierarchy from the root and return every `zarr.json` key.
   * Groups and directories without metadata (implicit groups) are
   * descended; arrays are not, so chunk directories are never scanned.
   */
  async listMetadataKeys(): Promise<string[]> {
    const keys: string[] = [];

    const walk = async (prefix: string): Promise<void> => {
      for (const name of await this.listDirectories(prefix)) {
        const nodePath = prefix ? `${prefix}/${name}` : name;
        const key = `${nodePath}/zarr.json`;
        const bytes = await this.get(toAbsolutePath(key));
        if (!bytes) {
          await walk(nodePath);
          continue;
        }
        keys.push(key);
        if (!isArrayDocument(bytes)) {
          await walk(nodePath);
        }
      }
    };

    const rootBytes = await this.get(toAbsolutePath("zarr.json"));
    if (rootBytes) {
      keys.push("zarr.json");
      if (isArrayDocument(rootBytes)) {
        return keys;
      }
    }
    await walk("");
    return keys;
  }
}

function isArrayDocument(bytes: Uint8Array): boolean {
  try {
    const payload = decodeJson(bytes);
    return typeof payload === "object" && payload !== null && "node_type" in payload && payload.node_type === "array";
  } catch {
    // Unparseable documents are reported when the node is read
    return false;
  }
}
