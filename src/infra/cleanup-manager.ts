import { rmSync, existsSync, unlinkSync } from "node:fs";
import { logger } from "./logger.js";

export type CleanupTaskType = "process" | "temp-file" | "temp-dir" | "custom";

export interface CleanupTask {
  id: string;
  type: CleanupTaskType;
  /** Description for logging */
  description: string;
  cleanup: () => Promise<void>;
  /** Higher runs first (default: 0) */
  priority: number;
  createdAt: Date;
}

export interface CleanupResult {
  success: string[];
  failed: Array<{ id: string; error: string }>;
}

function isMissingProcess(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ESRCH";
}

/**
 * Tracks resources that must be released if the process goes down mid-session:
 * running tool subprocesses, temporary wordlists and scratch directories.
 *
 * One manager per orchestrator context. The gateway registers a child process
 * when it spawns it and unregisters it when it exits; whatever is still
 * registered on SIGINT/SIGTERM is killed or removed.
 */
export class CleanupManager {
  private readonly tasks = new Map<string, CleanupTask>();
  private readonly signalHandlers = new Map<NodeJS.Signals, () => void>();
  private isRunning = false;
  private counter = 0;

  register(task: Omit<CleanupTask, "createdAt" | "priority"> & { priority?: number }): string {
    this.tasks.set(task.id, {
      ...task,
      priority: task.priority ?? 0,
      createdAt: new Date(),
    });
    logger.debug(`Registered cleanup task: ${task.id} (${task.type})`, {
      description: task.description,
    });
    return task.id;
  }

  unregister(taskId: string): boolean {
    return this.tasks.delete(taskId);
  }

  has(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  getTasks(): CleanupTask[] {
    return Array.from(this.tasks.values());
  }

  getTaskCount(): number {
    return this.tasks.size;
  }

  /**
   * Kill a child process on shutdown. Processes go first.
   */
  registerProcess(pid: number, description: string, signal: NodeJS.Signals = "SIGTERM"): string {
    return this.register({
      id: this.nextId("process"),
      type: "process",
      description,
      priority: 20,
      cleanup: async () => {
        try {
          process.kill(pid, signal);
        } catch (error) {
          if (!isMissingProcess(error)) {
            throw error;
          }
        }
      },
    });
  }

  registerTempFile(filePath: string): string {
    return this.register({
      id: this.nextId("temp-file"),
      type: "temp-file",
      description: `Temp file at ${filePath}`,
      cleanup: async () => {
        if (existsSync(filePath)) {
          unlinkSync(filePath);
        }
      },
    });
  }

  registerTempDir(dirPath: string): string {
    return this.register({
      id: this.nextId("temp-dir"),
      type: "temp-dir",
      description: `Temp directory at ${dirPath}`,
      cleanup: async () => {
        rmSync(dirPath, { recursive: true, force: true });
      },
    });
  }

  /**
   * Run every registered task, highest priority first. A failing task is
   * reported and stays registered; the rest still run.
   */
  async runAll(): Promise<CleanupResult> {
    const result: CleanupResult = { success: [], failed: [] };
    if (this.isRunning) {
      logger.warn("Cleanup already in progress");
      return result;
    }

    this.isRunning = true;
    try {
      const sorted = this.getTasks().sort((a, b) => b.priority - a.priority);
      if (sorted.length > 0) {
        logger.debug(`Running ${sorted.length} cleanup task(s)`);
      }

      for (const task of sorted) {
        try {
          await task.cleanup();
          result.success.push(task.id);
          this.tasks.delete(task.id);
        } catch (error) {
          const errorMsg = error instanceof Error ? error.message : String(error);
          logger.warn(`Cleanup failed for ${task.id}: ${errorMsg}`);
          result.failed.push({ id: task.id, error: errorMsg });
        }
      }
    } finally {
      this.isRunning = false;
    }

    return result;
  }

  /**
   * Run cleanup and exit on SIGINT/SIGTERM. Used by the CLI `run` and `phase`
   * commands; library callers call runAll() themselves.
   */
  installShutdownHandlers(): void {
    if (this.signalHandlers.size > 0) {
      return;
    }

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      const handler = (): void => {
        logger.info(`Received ${signal}, running cleanup...`);
        this.runAll().then(
          () => process.exit(130),
          (error: unknown) => {
            logger.error("Cleanup error during shutdown", error);
            process.exit(1);
          }
        );
      };
      this.signalHandlers.set(signal, handler);
      process.on(signal, handler);
    }
  }

  removeShutdownHandlers(): void {
    for (const [signal, handler] of this.signalHandlers) {
      process.off(signal, handler);
    }
    this.signalHandlers.clear();
  }

  clear(): void {
    this.tasks.clear();
  }

  private nextId(prefix: string): string {
    this.counter++;
    return `${prefix}-${Date.now()}-${this.counter}`;
  }
}
