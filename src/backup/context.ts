import type { StorageRoot } from "../store/root.js";

export interface BackupContext {
  root: StorageRoot;
  now: () => Date;
}
