import fs from "node:fs";
import path from "node:path";
import type { BackupContext } from "./context.js";
import { locateBackup } from "./lookup.js";
import { saveBackup } from "./save.js";
import { atomicWriteFileSync } from "../store/atomic.js";
import type { BackupEntry } from "../store/index-store.js";
import { fromFsError } from "../util/errors.js";
import { log } from "../util/logger.js";

export interface RestoreOptions {
  destination?: string;
  /** Overwrite an existing destination without taking a safety backup first. */
  force?: boolean;
}

export interface RestoreResult {
  path: string;
  safetyBackup?: BackupEntry;
}

export function safetyNote(destination: string, id: string): string {
  return `pre-restore of ${destination} from restore-id ${id}`;
}

/**
 * Write a stored backup's bytes over its destination. An existing destination
 * is saved as a new backup first unless `force` is set; if that save fails the
 * destination is left untouched.
 */
export function restoreBackup(ctx: BackupContext, id: string, opts: RestoreOptions = {}): RestoreResult {
  const stored = locateBackup(ctx, id);
  const destination = opts.destination ? path.resolve(opts.destination) : stored.entry.original_path;

  let safetyBackup: BackupEntry | undefined;
  if (fs.existsSync(destination) && !opts.force) {
    safetyBackup = saveBackup(ctx, destination, safetyNote(destination, id));
    log.info(`Existing ${destination} backed up as ${safetyBackup.id} before restoring`);
  }

  let data: Buffer;
  try {
    data = fs.readFileSync(stored.path);
    fs.mkdirSync(path.dirname(destination), { recursive: true });
  } catch (err) {
    throw fromFsError(err, "Failed to prepare restore of", destination);
  }
  atomicWriteFileSync(destination, data);

  log.debug(`Restored ${id} to ${destination}`);
  return { path: destination, safetyBackup };
}
