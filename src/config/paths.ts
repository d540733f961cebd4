import path from "node:path";
import os from "node:os";
import fs from "node:fs";

const APP_DIR_NAME = "snapconf";

export function expandTilde(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function resolveConfigDir(): string {
  const override = process.env.SNAPCONF_HOME?.trim();
  if (override) return expandTilde(override);
  const xdgConfig = process.env.XDG_CONFIG_HOME?.trim();
  const base = xdgConfig || path.join(os.homedir(), ".config");
  return path.join(base, APP_DIR_NAME);
}

export function resolveConfigFilePath(): string {
  const override = process.env.SNAPCONF_CONFIG?.trim();
  if (override) return expandTilde(override);
  return path.join(resolveConfigDir(), "config.json5");
}

export function resolveDefaultStorageDir(): string {
  const xdgData = process.env.XDG_DATA_HOME?.trim();
  const base = xdgData || path.join(os.homedir(), ".local", "share");
  return path.join(base, APP_DIR_NAME, "backups");
}

// Precedence: explicit flag, SNAPCONF_STORAGE, config file, XDG data dir.
export function resolveStorageDir(flag?: string, configured?: string): string {
  const chosen = flag?.trim() || process.env.SNAPCONF_STORAGE?.trim() || configured?.trim();
  return path.resolve(chosen ? expandTilde(chosen) : resolveDefaultStorageDir());
}

export function ensureDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}
