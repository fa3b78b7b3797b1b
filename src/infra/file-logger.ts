import { appendFileSync, mkdirSync, readdirSync, statSync, unlinkSync } from "node:fs";
import { join } from "node:path";
import type { LoggingConfig } from "../types/config.js";
import { toError } from "./errors.js";
import { logger, type LogLevel } from "./logger.js";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_FILE_PREFIX = "pentest-orchestrator-";
const SESSIONS_DIR = "sessions";
const DAY_MS = 24 * 60 * 60 * 1000;

export interface FileLoggerOptions {
  config: LoggingConfig;
  dataDir: string;
  sessionId: string;
}

function pruneDir(dir: string, cutoff: number, matches: (name: string) => boolean): number {
  let removed = 0;
  try {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      if (!entry.isFile() || !matches(entry.name)) continue;
      const path = join(dir, entry.name);
      if (statSync(path).mtimeMs < cutoff) {
        unlinkSync(path);
        removed++;
      }
    }
  } catch (error) {
    logger.debug(`Log cleanup failed in ${dir}`, { error: toError(error).message });
  }
  return removed;
}

/**
 * Delete `pentest-orchestrator-YYYY-MM-DD.log` files and `sessions/*.log`
 * files not touched within the retention window. Other files are left alone.
 *
 * @returns number of files removed
 */
export function pruneLogs(logDir: string, retentionDays: number, now: Date = new Date()): number {
  const cutoff = now.getTime() - retentionDays * DAY_MS;
  return (
    pruneDir(logDir, cutoff, (name) => name.startsWith(LOG_FILE_PREFIX) && name.endsWith(".log")) +
    pruneDir(join(logDir, SESSIONS_DIR), cutoff, (name) => name.endsWith(".log"))
  );
}

/**
 * Daily log file under `<dataDir>/<logging.dir>`, one line per entry tagged
 * with the session id. Write failures are reported at debug level only.
 */
export class FileLogger {
  protected readonly logDir: string;
  private readonly level: LogLevel;
  private readonly sessionId: string;

  constructor(options: FileLoggerOptions) {
    this.logDir = join(options.dataDir, options.config.dir);
    this.level = options.config.fileLevel;
    this.sessionId = options.sessionId;

    mkdirSync(this.logDir, { recursive: true });
    pruneLogs(this.logDir, options.config.retentionDays);
  }

  /** Today's file; the name rolls over at midnight UTC */
  getCurrentLogFile(): string {
    return join(this.logDir, `${LOG_FILE_PREFIX}${new Date().toISOString().slice(0, 10)}.log`);
  }

  getSessionId(): string {
    return this.sessionId;
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    const suffix = data ? ` ${JSON.stringify(data)}` : "";
    this.append(
      this.getCurrentLogFile(),
      `[${new Date().toISOString()}] [${level.toUpperCase().padEnd(5)}] [${this.sessionId}] ${message}${suffix}\n`
    );
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const details =
      error instanceof Error
        ? { errorMessage: error.message, errorStack: error.stack }
        : error === undefined
          ? {}
          : { error: String(error) };
    this.log("error", message, { ...data, ...details });
  }

  protected append(file: string, content: string): void {
    try {
      appendFileSync(file, content);
    } catch (error) {
      logger.debug(`Failed to write log file ${file}`, { error: toError(error).message });
    }
  }
}

/**
 * Adds `<logDir>/sessions/<sessionId>.log`: phase transitions and outcomes of
 * one pentest session, in order. Each entry is mirrored to the daily file.
 */
export class SessionFileLogger extends FileLogger {
  private readonly sessionLogFile: string;

  constructor(options: FileLoggerOptions & { target: string }) {
    super(options);
    const sessionsDir = join(this.logDir, SESSIONS_DIR);
    mkdirSync(sessionsDir, { recursive: true });
    this.sessionLogFile = join(sessionsDir, `${options.sessionId}.log`);
    this.session(`Session started for ${options.target}`);
  }

  session(message: string, data?: Record<string, unknown>): void {
    const suffix = data ? ` ${JSON.stringify(data)}` : "";
    this.append(this.sessionLogFile, `[${new Date().toISOString()}] ${message}${suffix}\n`);
    this.info(message, data);
  }

  getSessionLogFile(): string {
    return this.sessionLogFile;
  }
}
