// snapconf — local backup/restore manager for JSON configuration files
// Public API exports

// Config
export { type SnapconfConfig, SnapconfConfigSchema, DEFAULT_CONFIG } from "./config/schema.js";
export { loadConfig } from "./config/loader.js";
export { resolveConfigDir, resolveConfigFilePath, resolveStorageDir, resolveDefaultStorageDir, expandTilde } from "./config/paths.js";

// Backups
export { BackupManager, type BackupManagerOptions } from "./backup/manager.js";
export { type BackupContext } from "./backup/context.js";
export { saveBackup } from "./backup/save.js";
export { listBackups, showBackup, type BackupDetails } from "./backup/inspect.js";
export { verifyBackup } from "./backup/verify.js";
export { restoreBackup, safetyNote, type RestoreOptions, type RestoreResult } from "./backup/restore.js";
export { pruneKeepN, pruneOlderThan, parseTimestamp } from "./backup/prune.js";
export { findOrphans } from "./backup/orphans.js";
export { parseStructured, serializeCanonical, backupExtension, decodeText, type JsonValue } from "./backup/content.js";
export { isExactNumber } from "./backup/numbers.js";

// Storage
export { createStorageRoot, ensureStorageRoot, INDEX_FILENAME, type StorageRoot } from "./store/root.js";
export { loadIndex, persistIndex, sortEntries, BackupEntrySchema, type BackupEntry, type BackupIndex } from "./store/index-store.js";
export { atomicWriteFileSync } from "./store/atomic.js";
export { sha256, sha256File } from "./store/checksum.js";

// Errors & logging
export { BackupError, toResult, describeError, isBackupError, type BackupErrorKind, type Result } from "./util/errors.js";
export { log, configureLogger, setVerbose, setJsonMode, setLogFile } from "./util/logger.js";
