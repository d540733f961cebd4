import fs from "node:fs";
import crypto from "node:crypto";
import { fromFsError } from "../util/errors.js";

/**
 * SHA-256 hex digest of a buffer or string.
 */
export function sha256(data: Buffer | string): string {
  return crypto.createHash("sha256").update(data).digest("hex");
}

/**
 * SHA-256 hex digest of a file's current bytes.
 */
export function sha256File(filePath: string): string {
  let data: Buffer;
  try {
    data = fs.readFileSync(filePath);
  } catch (err) {
    throw fromFsError(err, "Failed to read", filePath);
  }
  return sha256(data);
}
