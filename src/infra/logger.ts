import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LoggerOptions {
  level: LogLevel;
  verbose: boolean;
}

type Colorize = (text: string) => string;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_STYLE: Record<LogLevel, { label: string; stamp: Colorize; tag: Colorize; data: Colorize }> = {
  debug: { label: "DEBUG", stamp: pc.gray, tag: pc.dim, data: pc.gray },
  info: { label: "INFO ", stamp: pc.blue, tag: pc.cyan, data: pc.gray },
  warn: { label: "WARN ", stamp: pc.yellow, tag: pc.yellow, data: pc.yellow },
  error: { label: "ERROR", stamp: pc.red, tag: pc.red, data: pc.red },
};

/** Gateway outcome labels, see describeOutcome in the tool gateway */
const OUTCOME_COLOR: Record<string, Colorize> = {
  ok: pc.green,
  simulated: pc.yellow,
  unparsed: pc.yellow,
};

/**
 * Console logger. Everything goes to stderr so that `--json` output on
 * stdout stays machine-readable.
 */
class Logger {
  private level: LogLevel = "info";
  private verbose = false;

  configure(options: Partial<LoggerOptions>): void {
    if (options.level !== undefined) {
      this.level = options.level;
    }
    if (options.verbose !== undefined) {
      this.verbose = options.verbose;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  private emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const style = LEVEL_STYLE[level];
    const line = `${style.stamp(`[${this.formatTimestamp()}]`)} ${style.tag(style.label)} ${message}`;
    const extra = data ? style.data(JSON.stringify(data)) : "";
    if (level === "warn") {
      console.warn(line, extra);
    } else {
      console.error(line, extra);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog("debug")) return;
    this.emit("debug", message, data);
  }

  /** Structured data is only shown in verbose mode */
  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog("info")) return;
    this.emit("info", message, this.verbose ? data : undefined);
  }

  success(message: string): void {
    if (!this.shouldLog("info")) return;
    console.error(`${pc.green(`[${this.formatTimestamp()}]`)} ${pc.green("✓")} ${message}`);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog("warn")) return;
    this.emit("warn", message, data);
  }

  error(message: string, error?: Error | unknown): void {
    if (!this.shouldLog("error")) return;
    this.emit("error", message);
    if (error instanceof Error && this.verbose) {
      console.error(pc.red(error.stack ?? error.message));
    }
  }

  // Session progress lines print at any level

  header(text: string): void {
    console.error("");
    console.error(pc.bold(pc.cyan(`═══ ${text} ═══`)));
    console.error("");
  }

  phase(index: number, total: number, name: string, role: string): void {
    console.error(`${pc.dim(`[${index}/${total}]`)} ${pc.bold(name)} ${pc.dim(`(${role})`)}`);
  }

  tool(name: string, target: string, outcome: string): void {
    const color = OUTCOME_COLOR[outcome] ?? pc.red;
    console.error(`  ${pc.magenta("▸")} ${name} ${pc.dim("→")} ${target} ${color(outcome)}`);
  }
}

export const logger = new Logger();
