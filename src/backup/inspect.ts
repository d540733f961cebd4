import fs from "node:fs";
import type { BackupContext } from "./context.js";
import { decodeText, parseStructured, type JsonValue } from "./content.js";
import { locateBackup } from "./lookup.js";
import { loadIndex, sortEntries, type BackupEntry } from "../store/index-store.js";
import { ensureStorageRoot } from "../store/root.js";
import { argumentError, fromFsError } from "../util/errors.js";

export interface BackupDetails {
  metadata: BackupEntry;
  content: JsonValue;
}

export function listBackups(ctx: BackupContext, limit?: number): BackupEntry[] {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw argumentError(`limit must be a non-negative integer, got ${limit}`);
  }
  const sorted = sortEntries(loadIndex(ensureStorageRoot(ctx.root)).backups);
  return limit === undefined ? sorted : sorted.slice(0, limit);
}

export function showBackup(ctx: BackupContext, id: string): BackupDetails {
  const { entry, path } = locateBackup(ctx, id);
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(path);
  } catch (err) {
    throw fromFsError(err, "Failed to read", path);
  }
  return { metadata: entry, content: parseStructured(decodeText(bytes, path), path) };
}
