import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import type { BackupContext } from "./context.js";
import { backupExtension, decodeText, parseStructured, serializeCanonical } from "./content.js";
import { atomicWriteFileSync } from "../store/atomic.js";
import { sha256File } from "../store/checksum.js";
import { findEntry, loadIndex, persistIndex, type BackupEntry, type BackupIndex } from "../store/index-store.js";
import { contentPath, ensureStorageRoot } from "../store/root.js";
import { fromFsError, notFound } from "../util/errors.js";
import { log } from "../util/logger.js";

function newBackupId(index: BackupIndex): string {
  let id = crypto.randomUUID().replace(/-/g, "");
  while (findEntry(index, id)) id = crypto.randomUUID().replace(/-/g, "");
  return id;
}

function readSource(sourcePath: string): Buffer {
  if (!fs.existsSync(sourcePath)) {
    throw notFound(`Source file does not exist: ${sourcePath}`, sourcePath);
  }
  try {
    return fs.readFileSync(sourcePath);
  } catch (err) {
    throw fromFsError(err, "Failed to read", sourcePath);
  }
}

/**
 * Store a normalized copy of a structured file and record it in the index.
 * Nothing is written when the source is missing or fails to parse.
 */
export function saveBackup(ctx: BackupContext, sourcePath: string, note?: string): BackupEntry {
  const resolved = path.resolve(sourcePath);
  const data = parseStructured(decodeText(readSource(resolved), resolved), resolved);

  const root = ensureStorageRoot(ctx.root);
  const index = loadIndex(root);

  const id = newBackupId(index);
  const backupFilename = `${id}${backupExtension(resolved)}`;
  const backupPath = contentPath(root, backupFilename);

  atomicWriteFileSync(backupPath, serializeCanonical(data));
  const checksum = sha256File(backupPath);

  const entry: BackupEntry = {
    id,
    timestamp: ctx.now().toISOString(),
    original_path: resolved,
    backup_filename: backupFilename,
    checksum,
    note: note ?? "",
  };

  persistIndex(root, { backups: [...index.backups, entry] });
  log.debug(`Saved backup ${id} of ${resolved}`);
  return entry;
}
