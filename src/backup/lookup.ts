import fs from "node:fs";
import type { BackupContext } from "./context.js";
import { loadIndex, requireEntry, type BackupEntry } from "../store/index-store.js";
import { contentPath, ensureStorageRoot } from "../store/root.js";
import { notFound } from "../util/errors.js";

export interface StoredBackup {
  entry: BackupEntry;
  path: string;
}

// An entry whose content file is gone is reported, never repaired.
export function locateBackup(ctx: BackupContext, id: string): StoredBackup {
  const root = ensureStorageRoot(ctx.root);
  const entry = requireEntry(loadIndex(root), id);
  const filePath = contentPath(root, entry.backup_filename);
  if (!fs.existsSync(filePath)) {
    throw notFound(`Backup file missing: ${filePath}`, filePath);
  }
  return { entry, path: filePath };
}
