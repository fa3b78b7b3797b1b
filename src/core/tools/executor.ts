import { logger } from "../../infra/logger.js";
import { ParseError, toError } from "../../infra/errors.js";
import type { CleanupManager } from "../../infra/cleanup-manager.js";
import type { ToolParams } from "../../types/tool.js";
import { formatCommand, runCommand } from "./command-runner.js";
import type { CommandSpec, RunOptions, SimulatedRun, ToolAdapter, ToolRun } from "./types.js";

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  killGraceMs: 5000,
  maxOutputBytes: 10 * 1024 * 1024,
};

/**
 * Effective timeout in seconds: caller override, else configured, else the
 * adapter default; always within [1, maxTimeoutSeconds]
 */
export function resolveTimeoutSeconds(
  adapter: ToolAdapter,
  params: ToolParams,
  configured?: Record<string, number>
): number {
  const requested =
    typeof params.timeout === "number" && Number.isFinite(params.timeout)
      ? params.timeout
      : (configured?.[adapter.name] ?? adapter.defaultTimeoutSeconds);
  return Math.min(Math.max(Math.round(requested), 1), adapter.maxTimeoutSeconds);
}

/**
 * Run one adapter: simulate when the binary is missing, otherwise spawn it
 * and classify the outcome. Never throws.
 */
export async function executeAdapter(
  adapter: ToolAdapter,
  target: string,
  params: ToolParams,
  options: RunOptions & { cleanup?: CleanupManager | undefined } = DEFAULT_RUN_OPTIONS
): Promise<ToolRun> {
  const base = { toolName: adapter.name, target };

  const invalid = (error: unknown, simulated: boolean): ToolRun => ({
    ...base,
    success: false,
    output: "",
    error: `Invalid parameters: ${toError(error).message}`,
    errorKind: "ExecutionError",
    command: `${adapter.binary} ${target}`,
    exitCode: null,
    durationMs: 0,
    warnings: [],
    metadata: { ...adapter.emptyMetadata(), simulation_mode: simulated },
  });

  if (!adapter.isInstalled()) {
    let simulated: SimulatedRun;
    try {
      simulated = adapter.simulate(target, params);
    } catch (error) {
      return invalid(error, true);
    }
    logger.debug(`${adapter.binary} not installed, returning simulated ${adapter.name} result`);
    return {
      ...base,
      success: true,
      output: simulated.output,
      error: "",
      errorKind: null,
      command: simulated.command,
      exitCode: null,
      durationMs: 0,
      warnings: [`NotInstalled: ${adapter.binary} not found, result is simulated`],
      metadata: simulated.metadata,
    };
  }

  let spec: CommandSpec;
  try {
    spec = adapter.buildCommand(target, params);
  } catch (error) {
    return invalid(error, false);
  }

  const timeoutSeconds = resolveTimeoutSeconds(adapter, params, options.timeouts);
  const command = formatCommand(spec);
  const outcome = await runCommand(spec, {
    timeoutMs: timeoutSeconds * 1000,
    killGraceMs: options.killGraceMs,
    maxOutputBytes: options.maxOutputBytes,
    cleanup: options.cleanup,
  });

  const warnings = outcome.truncated ? [`Output truncated at ${options.maxOutputBytes} bytes`] : [];
  const run: ToolRun = {
    ...base,
    success: false,
    output: outcome.stdout,
    error: outcome.stderr,
    errorKind: null,
    command,
    exitCode: outcome.exitCode,
    durationMs: outcome.durationMs,
    warnings,
    metadata: { ...adapter.emptyMetadata(), simulation_mode: false },
  };

  if (outcome.timedOut) {
    return {
      ...run,
      errorKind: "TimeoutExpired",
      error: `${adapter.name} timed out after ${timeoutSeconds} seconds`,
    };
  }

  if (outcome.spawnError !== null) {
    return { ...run, errorKind: "ExecutionError", error: `Failed to start ${spec.binary}: ${outcome.spawnError}` };
  }

  if (outcome.exitCode === null || !adapter.successExitCodes.includes(outcome.exitCode)) {
    return {
      ...run,
      errorKind: "ExecutionError",
      error: outcome.stderr.trim() || `${adapter.name} exited with code ${outcome.exitCode ?? "unknown"}`,
    };
  }

  try {
    return {
      ...run,
      success: true,
      metadata: { ...adapter.parse(outcome.stdout, params), simulation_mode: false },
    };
  } catch (error) {
    const parseError =
      error instanceof ParseError
        ? error
        : new ParseError(`Unable to parse ${adapter.name} output: ${toError(error).message}`, adapter.name);
    logger.warn(parseError.message);
    // Raw output stays; metadata keeps the empty skeleton
    return { ...run, success: true, errorKind: "ParseError", error: parseError.message };
  }
}
