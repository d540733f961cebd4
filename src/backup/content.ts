import path from "node:path";
import JSON5 from "json5";
import { describeError, validationError } from "../util/errors.js";
import { isExactNumber, numberLiterals } from "./numbers.js";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export const DEFAULT_EXTENSION = ".json";
export const CANONICAL_INDENT = 2;

export function backupExtension(sourcePath: string): string {
  return path.extname(sourcePath) || DEFAULT_EXTENSION;
}

function isJson5(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".json5";
}

const UTF8 = new TextDecoder("utf-8", { fatal: true });

/** Decode file bytes as UTF-8, refusing malformed sequences. */
export function decodeText(bytes: Uint8Array, filePath: string): string {
  try {
    return UTF8.decode(bytes);
  } catch (err) {
    throw validationError(`${filePath} is not valid UTF-8 text`, err);
  }
}

function rejectNonFinite(key: string, value: unknown): unknown {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new Error(`value ${value} at key "${key}" has no JSON encoding`);
  }
  return value;
}

/**
 * Parse `text` as structured data. `.json5` files go through JSON5, everything
 * else must be strict JSON. Documents whose values would change on the way to
 * canonical JSON (NaN, Infinity, integers past 2^53) are refused.
 */
export function parseStructured(text: string, filePath: string): JsonValue {
  let parsed: JsonValue;
  try {
    parsed = isJson5(filePath) ? JSON5.parse(text, rejectNonFinite) : JSON.parse(text, rejectNonFinite);
  } catch (err) {
    throw validationError(`Failed to parse ${filePath} as structured data: ${describeError(err)}`, err);
  }
  const inexact = numberLiterals(text).find((literal) => !isExactNumber(literal));
  if (inexact !== undefined) {
    throw validationError(`${filePath} contains the number ${inexact}, which cannot be stored without changing its value`);
  }
  return parsed;
}

export function serializeCanonical(value: JsonValue): string {
  return JSON.stringify(value, null, CANONICAL_INDENT);
}
