import fs from "node:fs";
import path from "node:path";
import { ensureDir } from "../config/paths.js";
import { fromFsError } from "../util/errors.js";
import { log } from "../util/logger.js";

export const INDEX_FILENAME = "backups_index.json";

export interface StorageRoot {
  readonly dir: string;
  readonly indexPath: string;
}

export function createStorageRoot(dir: string): StorageRoot {
  const resolved = path.resolve(dir);
  return { dir: resolved, indexPath: path.join(resolved, INDEX_FILENAME) };
}

export function contentPath(root: StorageRoot, backupFilename: string): string {
  return path.join(root.dir, backupFilename);
}

export function emptyIndexDocument(): string {
  return JSON.stringify({ backups: [] }, null, 2);
}

/**
 * Create the storage directory and an empty index if either is missing.
 * Safe to call before every operation.
 */
export function ensureStorageRoot(root: StorageRoot): StorageRoot {
  try {
    ensureDir(root.dir);
    if (!fs.existsSync(root.indexPath)) {
      fs.writeFileSync(root.indexPath, emptyIndexDocument(), "utf-8");
      log.debug(`Initialized storage root at ${root.dir}`);
    }
  } catch (err) {
    throw fromFsError(err, "Failed to initialize storage root", root.dir);
  }
  return root;
}
