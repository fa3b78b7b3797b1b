import { z } from "zod";
import { logger } from "../../infra/logger.js";
import { ValidationError, isPentestOrchestratorError, toError } from "../../infra/errors.js";
import type { AuditFilter } from "../../types/audit.js";
import type { ToolParams } from "../../types/tool.js";
import { createOrchestratorContext, type OrchestratorContext } from "../../core/context.js";
import { loadConfig } from "../config/loader.js";

export interface FilterOptions {
  session?: string;
  target?: string;
  role?: string;
  tool?: string;
  failed?: boolean;
}

/**
 * Build a context from the loaded config, run `fn`, then tear it down
 */
export async function withContext<T>(
  fn: (ctx: OrchestratorContext) => Promise<T> | T,
  options: { shutdownHandlers?: boolean } = {}
): Promise<T> {
  const config = loadConfig();
  if (config.verbose) {
    logger.configure({ level: "debug", verbose: true });
  } else if (logger.getLevel() !== "debug") {
    logger.configure({ level: config.logging.consoleLevel });
  }

  const ctx = createOrchestratorContext(config);
  if (options.shutdownHandlers) {
    ctx.cleanup.installShutdownHandlers();
  }
  try {
    return await fn(ctx);
  } finally {
    await ctx.close();
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new ValidationError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export function buildFilter(options: FilterOptions): AuditFilter {
  const filter: AuditFilter = {};
  if (options.session) filter.sessionId = options.session;
  if (options.target) filter.target = options.target;
  if (options.role) filter.agentRole = options.role;
  if (options.tool) filter.tool = options.tool;
  if (options.failed) filter.success = false;
  return filter;
}

const ToolParamsSchema = z.record(
  z.object({ timeout: z.number().positive().optional() }).passthrough()
);

/** `--tool-params '{"nmap": {"scan_type": "service"}}'` */
export function parseToolParams(json: string | undefined): Record<string, ToolParams> {
  if (json === undefined) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new ValidationError("--tool-params must be valid JSON");
  }
  const result = ToolParamsSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ValidationError(`Invalid --tool-params: ${errors}`);
  }
  return result.data;
}

/** Log and exit non-zero; stacks only for errors this project did not raise */
export function fail(error: unknown): never {
  if (isPentestOrchestratorError(error)) {
    logger.error(`${error.message} (${error.code})`);
  } else {
    logger.error(toError(error).message, error);
  }
  process.exit(1);
}
