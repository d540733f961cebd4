import type { BackupContext } from "./context.js";
import { listBackups, showBackup, type BackupDetails } from "./inspect.js";
import { findOrphans } from "./orphans.js";
import { pruneKeepN, pruneOlderThan } from "./prune.js";
import { restoreBackup, type RestoreOptions } from "./restore.js";
import { saveBackup } from "./save.js";
import { verifyBackup } from "./verify.js";
import type { BackupEntry } from "../store/index-store.js";
import { createStorageRoot, ensureStorageRoot, type StorageRoot } from "../store/root.js";

export interface BackupManagerOptions {
  /** Storage root directory holding the index and every content file. */
  root: string;
  now?: () => Date;
}

/**
 * Entry point for every backup operation against one storage root.
 *
 * Each call is a full read-modify-write of the index with no locking, so two
 * processes sharing a root can overwrite each other's index changes.
 */
export class BackupManager {
  readonly root: StorageRoot;
  private readonly ctx: BackupContext;

  constructor(opts: BackupManagerOptions) {
    this.root = createStorageRoot(opts.root);
    this.ctx = { root: this.root, now: opts.now ?? (() => new Date()) };
  }

  ensure(): StorageRoot {
    return ensureStorageRoot(this.root);
  }

  save(sourcePath: string, note?: string): BackupEntry {
    return saveBackup(this.ctx, sourcePath, note);
  }

  list(limit?: number): BackupEntry[] {
    return listBackups(this.ctx, limit);
  }

  show(id: string): BackupDetails {
    return showBackup(this.ctx, id);
  }

  verify(id: string): boolean {
    return verifyBackup(this.ctx, id);
  }

  /** Returns the absolute path that was written. */
  restore(id: string, opts: RestoreOptions = {}): string {
    return restoreBackup(this.ctx, id, opts).path;
  }

  pruneKeepN(keep: number): string[] {
    return pruneKeepN(this.ctx, keep);
  }

  pruneOlderThan(days: number): string[] {
    return pruneOlderThan(this.ctx, days);
  }

  findOrphans(): string[] {
    return findOrphans(this.ctx);
  }
}
