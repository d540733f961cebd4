import fs from "node:fs";
import type { BackupContext } from "./context.js";
import { isTempFileName } from "../store/atomic.js";
import { CORRUPT_MARKER, loadIndex } from "../store/index-store.js";
import { ensureStorageRoot, INDEX_FILENAME } from "../store/root.js";
import { fromFsError } from "../util/errors.js";

/**
 * Files in the storage root that no index entry references. Reports only;
 * nothing is deleted.
 */
export function findOrphans(ctx: BackupContext): string[] {
  const root = ensureStorageRoot(ctx.root);
  const referenced = new Set(loadIndex(root).backups.map((b) => b.backup_filename));

  let names: string[];
  try {
    names = fs.readdirSync(root.dir, { withFileTypes: true })
      .filter((d) => d.isFile())
      .map((d) => d.name);
  } catch (err) {
    throw fromFsError(err, "Failed to list", root.dir);
  }

  return names
    .filter((name) =>
      name !== INDEX_FILENAME &&
      !name.startsWith(`${INDEX_FILENAME}${CORRUPT_MARKER}`) &&
      !isTempFileName(name) &&
      !referenced.has(name),
    )
    .sort();
}
