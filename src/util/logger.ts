import chalk from "chalk";
import fs from "node:fs";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  verbose?: boolean;
  json?: boolean;
  file?: string;
}

let verbose = false;
let jsonMode = false;
let logFile: string | undefined;

export function setVerbose(v: boolean): void { verbose = v; }
export function setJsonMode(v: boolean): void { jsonMode = v; }
export function setLogFile(path: string | undefined): void { logFile = path; }

export function configureLogger(opts: LoggerOptions): void {
  if (opts.verbose !== undefined) verbose = opts.verbose;
  if (opts.json !== undefined) jsonMode = opts.json;
  if (opts.file !== undefined) logFile = opts.file;
}

const COLORS: Record<LogLevel, (s: string) => string> = {
  trace: chalk.dim,
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

function write(level: LogLevel, msg: string): void {
  if (jsonMode) {
    const line = JSON.stringify({ level, ts: new Date().toISOString(), msg });
    console.error(line);
    if (logFile) fs.appendFileSync(logFile, line + "\n");
  } else {
    console.error(COLORS[level](level), msg);
    if (logFile) fs.appendFileSync(logFile, `${new Date().toISOString()} ${level} ${msg}\n`);
  }
}

export const log = {
  trace(msg: string): void { if (verbose) write("trace", msg); },
  debug(msg: string): void { if (verbose) write("debug", msg); },
  info(msg: string): void { write("info", msg); },
  warn(msg: string): void { write("warn", msg); },
  error(msg: string): void { write("error", msg); },
};
