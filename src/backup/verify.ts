import type { BackupContext } from "./context.js";
import { locateBackup } from "./lookup.js";
import { sha256File } from "../store/checksum.js";
import { log } from "../util/logger.js";

/**
 * Recompute the content file's digest and compare it with the one recorded
 * at save time.
 */
export function verifyBackup(ctx: BackupContext, id: string): boolean {
  const { entry, path } = locateBackup(ctx, id);
  const current = sha256File(path);
  const ok = current === entry.checksum;
  if (!ok) log.debug(`Checksum mismatch for ${id}: expected ${entry.checksum}, got ${current}`);
  return ok;
}
