import fs from "node:fs";
import JSON5 from "json5";
import { SnapconfConfigSchema, DEFAULT_CONFIG, type SnapconfConfig } from "./schema.js";
import { resolveConfigFilePath, expandTilde } from "./paths.js";
import { log } from "../util/logger.js";

function mergeEnvVars(config: SnapconfConfig): SnapconfConfig {
  const envVerbose = process.env.SNAPCONF_VERBOSE?.trim();
  const envLogFile = process.env.SNAPCONF_LOG_FILE?.trim();
  if (!envVerbose && !envLogFile) return config;
  const logging = config.logging ?? { verbose: false, json: false };
  return {
    ...config,
    logging: {
      ...logging,
      ...(envVerbose ? { verbose: envVerbose === "1" || envVerbose === "true" } : {}),
      ...(envLogFile ? { file: expandTilde(envLogFile) } : {}),
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Keeps every top-level section that validates on its own.
function salvageSections(raw: unknown): SnapconfConfig {
  if (!isRecord(raw)) return {};
  const { shape } = SnapconfConfigSchema;
  const storage = shape.storage.safeParse(raw.storage);
  const retention = shape.retention.safeParse(raw.retention);
  const logging = shape.logging.safeParse(raw.logging);
  return {
    ...(storage.success && storage.data ? { storage: storage.data } : {}),
    ...(retention.success && retention.data ? { retention: retention.data } : {}),
    ...(logging.success && logging.data ? { logging: logging.data } : {}),
  };
}

export function loadConfig(overridePath?: string): SnapconfConfig {
  const configPath = overridePath ? expandTilde(overridePath) : resolveConfigFilePath();

  let raw: unknown = {};
  if (fs.existsSync(configPath)) {
    try {
      raw = JSON5.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (err) {
      log.warn(`Failed to parse config at ${configPath}: ${err}`);
    }
  } else {
    log.debug(`No config file at ${configPath}, using defaults`);
  }

  const result = SnapconfConfigSchema.safeParse(raw);
  if (!result.success) {
    log.warn(`Config validation issues: ${result.error.message}`);
    return mergeEnvVars({ ...DEFAULT_CONFIG, ...salvageSections(raw) });
  }
  return mergeEnvVars({ ...DEFAULT_CONFIG, ...result.data });
}
