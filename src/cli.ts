#!/usr/bin/env node

import path from "node:path";
import { Command } from "commander";
import chalk from "chalk";
import { loadConfig } from "./config/loader.js";
import { resolveStorageDir } from "./config/paths.js";
import type { SnapconfConfig } from "./config/schema.js";
import { BackupManager } from "./backup/manager.js";
import type { BackupEntry } from "./store/index-store.js";
import { argumentError, describeError, isBackupError, type BackupErrorKind } from "./util/errors.js";
import { configureLogger, log } from "./util/logger.js";

type GlobalOptions = {
  storage?: string;
  config?: string;
  verbose?: boolean;
  json?: boolean;
};

const EXIT_CODES: Record<BackupErrorKind, number> = {
  NotFound: 3,
  ValidationError: 4,
  ArgumentError: 5,
  IOError: 6,
};
const EXIT_CORRUPT = 2;

function setup(cmd: Command): { manager: BackupManager; config: SnapconfConfig } {
  const opts = cmd.optsWithGlobals<GlobalOptions>();
  const config = loadConfig(opts.config);
  configureLogger({
    verbose: opts.verbose || config.logging?.verbose,
    json: opts.json || config.logging?.json,
    file: config.logging?.file,
  });
  const root = resolveStorageDir(opts.storage, config.storage?.dir);
  log.debug(`Using storage root ${root}`);
  return { manager: new BackupManager({ root }), config };
}

function run(fn: () => void): void {
  try {
    fn();
  } catch (err) {
    if (isBackupError(err)) {
      log.error(`${err.kind}: ${err.message}`);
      process.exitCode = EXIT_CODES[err.kind];
      return;
    }
    log.error(`Unexpected failure: ${describeError(err)}`);
    process.exitCode = 1;
  }
}

function toInt(value: string): number {
  return Number(value);
}

function printEntry(entry: BackupEntry): void {
  console.log(JSON.stringify(entry, null, 2));
}

const program = new Command()
  .name("snapconf")
  .description("Back up, verify and restore JSON configuration files")
  .version("0.1.0")
  .option("-s, --storage <dir>", "Backup storage directory")
  .option("--config <path>", "Config file path override")
  .option("--verbose", "Verbose output")
  .option("--json", "JSON log output");

// ── save ──
program
  .command("save <src>")
  .description("Save a backup of a JSON file")
  .option("-n, --note <text>", "Note to store with this backup")
  .action((src: string, opts: { note?: string }, cmd: Command) => run(() => {
    const { manager } = setup(cmd);
    const entry = manager.save(src, opts.note);
    console.log(chalk.green("✓ Backup saved:"));
    printEntry(entry);
  }));

// ── list ──
program
  .command("list")
  .description("List backups, newest first")
  .option("-l, --limit <n>", "Only show the N most recent backups", toInt)
  .action((opts: { limit?: number }, cmd: Command) => run(() => {
    const { manager } = setup(cmd);
    const backups = manager.list(opts.limit);
    if (backups.length === 0) {
      console.log(chalk.dim("No backups found."));
      return;
    }
    for (const b of backups) {
      const note = b.note ? `  ${chalk.dim(b.note)}` : "";
      console.log(`- ${chalk.yellow(b.id)}  ${b.timestamp}  ${path.basename(b.original_path)}${note}`);
    }
  }));

// ── show ──
program
  .command("show <id>")
  .description("Show metadata and content of a backup")
  .action((id: string, _opts: unknown, cmd: Command) => run(() => {
    const { manager } = setup(cmd);
    const details = manager.show(id);
    console.log(chalk.cyan("Metadata:"));
    printEntry(details.metadata);
    console.log();
    console.log(chalk.cyan("Content:"));
    console.log(JSON.stringify(details.content, null, 2));
  }));

// ── verify ──
program
  .command("verify <id>")
  .description("Check a backup's content against its recorded checksum")
  .action((id: string, _opts: unknown, cmd: Command) => run(() => {
    const { manager } = setup(cmd);
    if (manager.verify(id)) {
      console.log(chalk.green("OK"));
    } else {
      console.log(chalk.red("CORRUPT"));
      process.exitCode = EXIT_CORRUPT;
    }
  }));

// ── restore ──
program
  .command("restore <id>")
  .description("Restore a backup to its original path or a custom destination")
  .option("-d, --dest <path>", "Destination path (default: the original path)")
  .option("-f, --force", "Overwrite without taking a pre-restore backup")
  .action((id: string, opts: { dest?: string; force?: boolean }, cmd: Command) => run(() => {
    const { manager } = setup(cmd);
    const restored = manager.restore(id, { destination: opts.dest, force: opts.force });
    console.log(chalk.green(`✓ Restored backup ${id} -> ${restored}`));
  }));

// ── prune ──
program
  .command("prune")
  .description("Remove old backups by count or by age")
  .option("--keep <n>", "Keep the latest N backups and remove the rest", toInt)
  .option("--older-than <days>", "Remove backups older than N days", toInt)
  .action((opts: { keep?: number; olderThan?: number }, cmd: Command) => run(() => {
    const { manager, config } = setup(cmd);
    if (opts.keep !== undefined && opts.olderThan !== undefined) {
      throw argumentError("--keep and --older-than cannot be combined");
    }
    const keep = opts.keep ?? (opts.olderThan === undefined ? config.retention?.keep : undefined);
    const olderThan = opts.olderThan ?? (opts.keep === undefined ? config.retention?.olderThanDays : undefined);

    let removed: string[];
    if (keep !== undefined) {
      removed = manager.pruneKeepN(keep);
    } else if (olderThan !== undefined) {
      removed = manager.pruneOlderThan(olderThan);
    } else {
      throw argumentError("prune needs --keep or --older-than (or retention defaults in config)");
    }
    console.log(removed.length === 0 ? chalk.dim("Nothing to prune.") : `Removed backups: ${removed.join(", ")}`);
  }));

// ── orphans ──
program
  .command("orphans")
  .description("List files in the storage root that no backup references")
  .action((_opts: unknown, cmd: Command) => run(() => {
    const { manager } = setup(cmd);
    const orphans = manager.findOrphans();
    if (orphans.length === 0) {
      console.log(chalk.dim("No orphaned files."));
      return;
    }
    for (const name of orphans) console.log(path.join(manager.root.dir, name));
  }));

program.parse();
