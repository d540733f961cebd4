import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { fromFsError, isMissingFileError } from "../util/errors.js";
import { log } from "../util/logger.js";

export const TEMP_SUFFIX = ".tmp";

export function tempPathFor(target: string): string {
  const tag = `${process.pid}.${crypto.randomBytes(4).toString("hex")}`;
  return path.join(path.dirname(target), `${path.basename(target)}.${tag}${TEMP_SUFFIX}`);
}

export function isTempFileName(name: string): boolean {
  return /\.\d+\.[0-9a-f]{8}\.tmp$/.test(name);
}

function existingMode(target: string): number | undefined {
  try {
    return fs.statSync(target).mode & 0o7777;
  } catch (err) {
    if (isMissingFileError(err)) return undefined;
    throw err;
  }
}

/**
 * Replace `target` with `data` so that readers see either the old file or the
 * complete new one. An existing target keeps its permission bits.
 */
export function atomicWriteFileSync(target: string, data: string | Buffer): void {
  const tmpPath = tempPathFor(target);
  try {
    const mode = existingMode(target);
    const fd = fs.openSync(tmpPath, "w", mode ?? 0o644);
    try {
      if (mode !== undefined) fs.fchmodSync(fd, mode);
      const buf = typeof data === "string" ? Buffer.from(data, "utf-8") : data;
      let offset = 0;
      while (offset < buf.length) offset += fs.writeSync(fd, buf, offset, buf.length - offset);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tmpPath, target);
  } catch (err) {
    removeTempFile(tmpPath);
    throw fromFsError(err, "Failed to write", target);
  }
}

function removeTempFile(tmpPath: string): void {
  try {
    if (fs.existsSync(tmpPath)) fs.unlinkSync(tmpPath);
  } catch (err) {
    log.warn(`Failed to remove temp file ${tmpPath}: ${err}`);
  }
}
