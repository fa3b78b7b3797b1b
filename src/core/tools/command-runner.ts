import { spawn, type ChildProcess } from "node:child_process";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { logger } from "../../infra/logger.js";
import { Watchdog } from "../../infra/watchdog.js";
import type { CleanupManager } from "../../infra/cleanup-manager.js";
import type { CommandSpec } from "./types.js";

export interface ProcessOutcome {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  /** Set when the process could not be started at all */
  spawnError: string | null;
  durationMs: number;
  truncated: boolean;
}

export interface RunCommandOptions {
  timeoutMs: number;
  killGraceMs: number;
  maxOutputBytes: number;
  cleanup?: CleanupManager | undefined;
}

const PLACEHOLDER = /\{\{([a-z0-9_-]+)\}\}/gi;

function quoteArg(arg: string): string {
  return /[\s"'\\$`]/.test(arg) || arg.length === 0 ? JSON.stringify(arg) : arg;
}

/** Printable form of a command, with file placeholders left in place */
export function formatCommand(spec: CommandSpec): string {
  return [spec.binary, ...spec.args].map(quoteArg).join(" ");
}

/**
 * Write the spec's files into a scratch directory and substitute their paths
 */
function materialize(spec: CommandSpec): { args: string[]; dir: string | null } {
  const files = spec.files ?? {};
  if (Object.keys(files).length === 0) {
    return { args: spec.args, dir: null };
  }

  const dir = mkdtempSync(join(tmpdir(), "pentest-orch-"));
  const paths = new Map<string, string>();
  for (const [name, content] of Object.entries(files)) {
    const path = join(dir, `${name}.txt`);
    writeFileSync(path, content);
    paths.set(name, path);
  }

  const args = spec.args.map((arg) =>
    arg.replace(PLACEHOLDER, (match: string, name: string) => paths.get(name) ?? match)
  );
  return { args, dir };
}

/**
 * Run a command without a shell under a hard deadline.
 *
 * On timeout the process gets SIGTERM, then SIGKILL after `killGraceMs`.
 * Never rejects: spawn failures come back in `spawnError`.
 */
export function runCommand(spec: CommandSpec, options: RunCommandOptions): Promise<ProcessOutcome> {
  const startTime = Date.now();
  const { args, dir } = materialize(spec);
  const dirTaskId = dir ? options.cleanup?.registerTempDir(dir) : undefined;

  const removeScratch = (): void => {
    if (!dir) return;
    rmSync(dir, { recursive: true, force: true });
    if (dirTaskId) options.cleanup?.unregister(dirTaskId);
  };

  return new Promise((resolve) => {
    let proc: ChildProcess;
    let stdout = "";
    let stderr = "";
    let captured = 0;
    let truncated = false;
    let timedOut = false;
    let killTimer: ReturnType<typeof setTimeout> | undefined;
    let processTaskId: string | undefined;
    let settled = false;

    const finish = (outcome: Omit<ProcessOutcome, "durationMs" | "truncated" | "timedOut">): void => {
      if (settled) return;
      settled = true;
      watchdog.stop();
      if (killTimer) clearTimeout(killTimer);
      if (processTaskId) options.cleanup?.unregister(processTaskId);
      removeScratch();
      resolve({ ...outcome, timedOut, truncated, durationMs: Date.now() - startTime });
    };

    const watchdog = new Watchdog(`tool:${spec.binary}`, {
      timeoutMs: options.timeoutMs,
      onTimeout: () => {
        timedOut = true;
        proc.kill("SIGTERM");
        killTimer = setTimeout(() => {
          if (proc.exitCode === null && proc.signalCode === null) {
            proc.kill("SIGKILL");
          }
        }, options.killGraceMs);
      },
    });

    const capture = (chunk: Buffer, into: "stdout" | "stderr"): void => {
      const room = options.maxOutputBytes - captured;
      if (room <= 0) {
        truncated = true;
        return;
      }
      const text = (chunk.length > room ? chunk.subarray(0, room) : chunk).toString();
      if (chunk.length > room) truncated = true;
      captured += Math.min(chunk.length, room);
      if (into === "stdout") stdout += text;
      else stderr += text;
    };

    try {
      proc = spawn(spec.binary, args, {
        stdio: ["ignore", "pipe", "pipe"],
        env: { ...process.env, TERM: "dumb" },
      });
    } catch (err) {
      removeScratch();
      resolve({
        stdout: "",
        stderr: "",
        exitCode: null,
        timedOut: false,
        spawnError: err instanceof Error ? err.message : String(err),
        durationMs: Date.now() - startTime,
        truncated: false,
      });
      return;
    }

    if (proc.pid !== undefined) {
      processTaskId = options.cleanup?.registerProcess(proc.pid, `${spec.binary} (pid ${proc.pid})`);
    }
    watchdog.start({ binary: spec.binary });
    logger.debug(`Spawned ${formatCommand(spec)}`, { pid: proc.pid });

    proc.stdout?.on("data", (data: Buffer) => capture(data, "stdout"));
    proc.stderr?.on("data", (data: Buffer) => capture(data, "stderr"));

    proc.on("error", (err) => {
      finish({ stdout, stderr, exitCode: null, spawnError: err.message });
    });

    proc.on("close", (code) => {
      finish({ stdout, stderr, exitCode: code, spawnError: null });
    });
  });
}
