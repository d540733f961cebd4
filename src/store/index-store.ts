// Backup index — one JSON document per storage root, rewritten whole on every change

import fs from "node:fs";
import { z } from "zod";
import { atomicWriteFileSync } from "./atomic.js";
import type { StorageRoot } from "./root.js";
import { fromFsError, notFound } from "../util/errors.js";
import { log } from "../util/logger.js";

// ══════════════════════════════════════════════
// ── Types ──
// ══════════════════════════════════════════════

export const BackupEntrySchema = z.object({
  id: z.string().min(1),
  timestamp: z.string(),
  original_path: z.string(),
  backup_filename: z.string().min(1),
  checksum: z.string(),
  note: z.string().default(""),
});

export const BackupIndexSchema = z.object({
  backups: z.array(BackupEntrySchema),
});

export type BackupEntry = Readonly<z.infer<typeof BackupEntrySchema>>;

export interface BackupIndex {
  backups: BackupEntry[];
}

export const CORRUPT_MARKER = ".corrupt-";

// ══════════════════════════════════════════════
// ── Persistence ──
// ══════════════════════════════════════════════

export function serializeIndex(index: BackupIndex): string {
  return JSON.stringify({ backups: index.backups }, null, 2);
}

export function persistIndex(root: StorageRoot, index: BackupIndex): void {
  atomicWriteFileSync(root.indexPath, serializeIndex(index));
}

/**
 * Read the index. A document that fails to parse, or parses to the wrong
 * shape, is copied aside and replaced by an empty index; content files it
 * referenced are left in place as orphans.
 */
export function loadIndex(root: StorageRoot): BackupIndex {
  let raw: string;
  try {
    raw = fs.readFileSync(root.indexPath, "utf-8");
  } catch (err) {
    throw fromFsError(err, "Failed to read index", root.indexPath);
  }

  let problem: string;
  try {
    const parsed = BackupIndexSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return { backups: parsed.data.backups };
    problem = parsed.error.issues[0]?.message ?? "unexpected shape";
  } catch (err) {
    problem = String(err);
  }

  return recoverCorruptIndex(root, raw, problem);
}

function recoverCorruptIndex(root: StorageRoot, raw: string, problem: string): BackupIndex {
  const asidePath = `${root.indexPath}${CORRUPT_MARKER}${Date.now()}`;
  try {
    fs.writeFileSync(asidePath, raw, "utf-8");
  } catch (err) {
    log.warn(`Could not keep a copy of the corrupted index at ${asidePath}: ${err}`);
  }
  const empty: BackupIndex = { backups: [] };
  persistIndex(root, empty);
  log.warn(`Index file ${root.indexPath} is corrupted (${problem}). Recreated empty index; previous copy at ${asidePath}`);
  return empty;
}

// ══════════════════════════════════════════════
// ── Queries ──
// ══════════════════════════════════════════════

/**
 * Newest first by timestamp string; ties go to the later-appended entry.
 */
export function sortEntries(entries: readonly BackupEntry[]): BackupEntry[] {
  return entries
    .map((entry, position) => ({ entry, position }))
    .sort((a, b) => {
      if (a.entry.timestamp !== b.entry.timestamp) {
        return a.entry.timestamp < b.entry.timestamp ? 1 : -1;
      }
      return b.position - a.position;
    })
    .map(({ entry }) => entry);
}

export function findEntry(index: BackupIndex, id: string): BackupEntry | undefined {
  return index.backups.find((b) => b.id === id);
}

export function requireEntry(index: BackupIndex, id: string): BackupEntry {
  const entry = findEntry(index, id);
  if (!entry) throw notFound(`No backup with id ${id}`);
  return entry;
}
