// Retention — keep-N and older-than pruning over the index

import fs from "node:fs";
import type { BackupContext } from "./context.js";
import { loadIndex, persistIndex, sortEntries, type BackupEntry } from "../store/index-store.js";
import { contentPath, ensureStorageRoot, type StorageRoot } from "../store/root.js";
import { argumentError } from "../util/errors.js";
import { log } from "../util/logger.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_PREFIX = /^\d{4}-\d{2}-\d{2}/;

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw argumentError(`${name} must be a positive integer, got ${value}`);
  }
}

// Best effort: failures are logged and the batch continues.
function removeContentFile(root: StorageRoot, entry: BackupEntry): void {
  const filePath = contentPath(root, entry.backup_filename);
  try {
    if (fs.existsSync(filePath)) fs.unlinkSync(filePath);
  } catch (err) {
    log.warn(`Failed to remove backup file ${filePath}: ${err}`);
  }
}

/**
 * Epoch milliseconds of an entry timestamp, or undefined when it does not
 * read as an ISO-8601 date.
 */
export function parseTimestamp(timestamp: string): number | undefined {
  if (!ISO_PREFIX.test(timestamp)) return undefined;
  const ms = Date.parse(timestamp);
  return Number.isNaN(ms) ? undefined : ms;
}

export function pruneKeepN(ctx: BackupContext, keep: number): string[] {
  requirePositiveInteger("keep", keep);
  const root = ensureStorageRoot(ctx.root);
  const sorted = sortEntries(loadIndex(root).backups);

  const removed = sorted.slice(keep);
  for (const entry of removed) removeContentFile(root, entry);

  persistIndex(root, { backups: sorted.slice(0, keep) });
  if (removed.length > 0) log.info(`Pruned ${removed.length} backup(s), kept ${Math.min(keep, sorted.length)}`);
  return removed.map((e) => e.id);
}

/**
 * Drop every entry strictly older than `days` before now. Entries whose
 * timestamp cannot be parsed count as infinitely old.
 */
export function pruneOlderThan(ctx: BackupContext, days: number): string[] {
  requirePositiveInteger("days", days);
  const cutoff = ctx.now().getTime() - days * DAY_MS;
  const root = ensureStorageRoot(ctx.root);
  const index = loadIndex(root);

  const remaining: BackupEntry[] = [];
  const removed: BackupEntry[] = [];
  for (const entry of index.backups) {
    const ts = parseTimestamp(entry.timestamp);
    if (ts === undefined || ts < cutoff) {
      if (ts === undefined) log.debug(`Backup ${entry.id} has unparseable timestamp "${entry.timestamp}"`);
      removeContentFile(root, entry);
      removed.push(entry);
    } else {
      remaining.push(entry);
    }
  }

  persistIndex(root, { backups: remaining });
  if (removed.length > 0) log.info(`Pruned ${removed.length} backup(s) older than ${days} day(s)`);
  return removed.map((e) => e.id);
}
