export type BackupErrorKind = "NotFound" | "ValidationError" | "ArgumentError" | "IOError";

export class BackupError extends Error {
  readonly kind: BackupErrorKind;
  readonly path?: string;

  constructor(kind: BackupErrorKind, message: string, opts: { path?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "BackupError";
    this.kind = kind;
    this.path = opts.path;
  }
}

export const notFound = (message: string, path?: string): BackupError =>
  new BackupError("NotFound", message, { path });
export const validationError = (message: string, cause?: unknown): BackupError =>
  new BackupError("ValidationError", message, { cause });
export const argumentError = (message: string): BackupError =>
  new BackupError("ArgumentError", message);

export type Result<T> = { ok: true; value: T } | { ok: false; error: BackupError };

export function isBackupError(error: unknown): error is BackupError {
  return error instanceof BackupError;
}

function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isMissingFileError(error: unknown): boolean {
  return getErrorCode(error) === "ENOENT";
}

// Wraps a raw fs failure; already-classified errors pass through untouched.
export function fromFsError(error: unknown, action: string, path: string): BackupError {
  if (isBackupError(error)) return error;
  const detail = describeError(error);
  if (isMissingFileError(error)) {
    return new BackupError("NotFound", `${action} ${path}: ${detail}`, { path, cause: error });
  }
  return new BackupError("IOError", `${action} ${path}: ${detail}`, { path, cause: error });
}

export function toResult<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (isBackupError(err)) return { ok: false, error: err };
    throw err;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
