import { TimeoutError } from "./errors.js";
import { logger } from "./logger.js";

export interface WatchdogContext {
  /** Type of operation being watched */
  operationType: string;
  startedAt: Date;
  /** Optional metadata about the operation */
  metadata: Record<string, unknown> | undefined;
}

export interface WatchdogOptions {
  /** Hard deadline in milliseconds, measured from start() */
  timeoutMs: number;
  /** Invoked once when the deadline passes while the watchdog is running */
  onTimeout: (context: WatchdogContext) => void;
}

/**
 * Deadline timer for a single operation (a tool subprocess, an advisor call).
 *
 * ```typescript
 * const watchdog = new Watchdog("tool:nmap", {
 *   timeoutMs: 600_000,
 *   onTimeout: () => child.kill("SIGTERM"),
 * });
 * watchdog.start({ target });
 * // ... when the process exits
 * watchdog.stop();
 * ```
 */
export class Watchdog {
  private timer: ReturnType<typeof setTimeout> | undefined;
  private context: WatchdogContext | undefined;
  private fired = false;

  constructor(
    private readonly operationType: string,
    private readonly options: WatchdogOptions
  ) {}

  start(metadata?: Record<string, unknown>): void {
    if (this.timer) {
      logger.warn(`Watchdog for ${this.operationType} already running, resetting`);
      this.stop();
    }

    this.fired = false;
    this.context = {
      operationType: this.operationType,
      startedAt: new Date(),
      metadata,
    };

    this.timer = setTimeout(() => this.expire(), this.options.timeoutMs);

    logger.debug(`Watchdog started for ${this.operationType}`, {
      timeoutMs: this.options.timeoutMs,
    });
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
      logger.debug(`Watchdog stopped for ${this.operationType}`, {
        elapsedMs: this.getElapsedMs(),
      });
    }
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  /** True once the deadline has passed during the current run */
  hasFired(): boolean {
    return this.fired;
  }

  getElapsedMs(): number {
    if (!this.context) {
      return 0;
    }
    return Date.now() - this.context.startedAt.getTime();
  }

  private expire(): void {
    this.timer = undefined;
    if (!this.context) {
      return;
    }
    this.fired = true;

    logger.warn(`Watchdog timeout for ${this.operationType}`, {
      elapsedMs: this.getElapsedMs(),
      timeoutMs: this.options.timeoutMs,
      metadata: this.context.metadata,
    });

    this.options.onTimeout({ ...this.context });
  }
}

/**
 * Race `fn` against a deadline. The returned promise rejects with TimeoutError
 * when the deadline passes first; `fn` keeps its AbortSignal to stop early.
 */
export async function withTimeout<T>(
  operationType: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const watchdog = new Watchdog(operationType, {
      timeoutMs,
      onTimeout: () => {
        controller.abort();
        reject(
          new TimeoutError(`${operationType} timed out after ${timeoutMs}ms`, operationType, timeoutMs)
        );
      },
    });

    watchdog.start();
    fn(controller.signal).then(
      (value) => {
        watchdog.stop();
        resolve(value);
      },
      (error: unknown) => {
        watchdog.stop();
        reject(error);
      }
    );
  });
}
