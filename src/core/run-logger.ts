import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { randomUUID } from "node:crypto";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

export interface RunLoggerOptions {
  level?: LogLevel;
  /** Directory for the JSONL file; null keeps everything off disk */
  logDir?: string | null;
  runId?: string;
  /** Mirror records to stderr */
  echo?: boolean;
}

/**
 * RunLogger — one JSONL file per run, appended record by record.
 * Each write is appendFileSync (crash-safe — no buffering).
 */
export class RunLogger implements Logger {
  readonly runId: string;
  private readonly level: LogLevel;
  private readonly echo: boolean;
  private readonly filepath: string | null;

  constructor(options: RunLoggerOptions = {}) {
    this.runId = options.runId ?? randomUUID().slice(0, 8);
    this.level = options.level ?? "info";
    this.echo = options.echo ?? false;

    const dir = options.logDir ?? null;
    if (dir) {
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      const ts = new Date().toISOString().replace(/[:.]/g, "-");
      this.filepath = join(dir, `${ts}_${this.runId}.jsonl`);
    } else {
      this.filepath = null;
    }
  }

  /** Log file path, or null when file logging is off */
  get path(): string | null {
    return this.filepath;
  }

  enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  // The file keeps every record; the level only filters the echo
  private write(level: LogLevel, message: string, fields?: LogFields): void {
    const entry: LogEntry = {
      ...fields,
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (this.filepath) {
      appendFileSync(this.filepath, JSON.stringify(entry) + "\n", "utf-8");
    }
    if (this.echo && this.enabled(level)) {
      console.error(`${entry.timestamp} ${level.toUpperCase().padEnd(5)} ${message}`);
    }
  }

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
