import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { DEFAULT_MAX_FILENAME_LENGTH } from "./sanitizer.js";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "./run-logger.js";

const HOME = process.env.HOME ?? process.env.USERPROFILE ?? "~";

// Shortest budget that still fits "Untitled (9999).pdf"
export const MIN_FILENAME_LENGTH = 20;

export interface RenamerConfig {
  logLevel: LogLevel;
  logToFile: boolean;
  maxFilenameLength: number;
}

const DEFAULT_CONFIG: RenamerConfig = {
  logLevel: "info",
  logToFile: true,
  maxFilenameLength: DEFAULT_MAX_FILENAME_LENGTH,
};

/** Keys accepted by `config set`, mapped to their config field */
export const CONFIG_KEYS = {
  "log-level": "logLevel",
  "log-to-file": "logToFile",
  "max-filename-length": "maxFilenameLength",
} as const satisfies Record<string, keyof RenamerConfig>;

export type ConfigKey = keyof typeof CONFIG_KEYS;

/** State directory — PDF_TITLE_RENAMER_HOME wins over ~/.pdf-title-renamer */
export function stateDir(): string {
  return process.env.PDF_TITLE_RENAMER_HOME ?? join(HOME, ".pdf-title-renamer");
}

export function configPath(): string {
  return join(stateDir(), "config.json");
}

export function logsDir(): string {
  return join(stateDir(), "logs");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isValidLength(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= MIN_FILENAME_LENGTH;
}

/** Merge a parsed JSON value over the defaults, keeping only well-typed fields */
function normalize(parsed: unknown): RenamerConfig {
  const config = { ...DEFAULT_CONFIG };
  if (!isRecord(parsed)) return config;

  if (isLogLevel(parsed.logLevel)) config.logLevel = parsed.logLevel;
  if (typeof parsed.logToFile === "boolean") config.logToFile = parsed.logToFile;
  if (isValidLength(parsed.maxFilenameLength)) config.maxFilenameLength = parsed.maxFilenameLength;
  return config;
}

/** Read config from disk. Returns defaults if file doesn't exist or is malformed. */
export function loadConfig(path = configPath()): RenamerConfig {
  if (!existsSync(path)) {
    return { ...DEFAULT_CONFIG };
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return normalize(parsed);
  } catch {
    return { ...DEFAULT_CONFIG };
  }
}

/** Write config to disk. Creates parent dirs if needed. */
export function saveConfig(config: RenamerConfig, path = configPath()): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

export function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(CONFIG_KEYS, key);
}

/**
 * Apply a `config set <key> <value>` pair. Throws with the list of valid
 * values when the key or value is not accepted.
 */
export function applyConfigValue(config: RenamerConfig, key: string, value: string): RenamerConfig {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: "${key}"\nValid keys: ${Object.keys(CONFIG_KEYS).join(", ")}`);
  }

  switch (key) {
    case "log-level": {
      const level = value.toLowerCase();
      if (!isLogLevel(level)) {
        throw new Error(`Invalid log level: "${value}"\nValid levels: ${LOG_LEVELS.join(", ")}`);
      }
      return { ...config, logLevel: level };
    }
    case "log-to-file": {
      if (value !== "true" && value !== "false") {
        throw new Error(`Invalid value for log-to-file: "${value}" (use true or false)`);
      }
      return { ...config, logToFile: value === "true" };
    }
    case "max-filename-length": {
      const n = Number(value);
      if (!isValidLength(n)) {
        throw new Error(`max-filename-length must be an integer >= ${MIN_FILENAME_LENGTH}, got "${value}"`);
      }
      return { ...config, maxFilenameLength: n };
    }
  }
}

export { DEFAULT_CONFIG };
