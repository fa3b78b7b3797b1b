import { logger } from "../../infra/logger.js";
import { StoreUnavailableError } from "../../infra/errors.js";
import type { CleanupManager } from "../../infra/cleanup-manager.js";
import type { ToolsConfig } from "../../types/config.js";
import type { AgentRole } from "../../types/decision.js";
import type { ToolInfo, ToolParams, ToolResult } from "../../types/tool.js";
import type { AuditLogStore } from "../audit/audit-store.js";
import { executeAdapter } from "./executor.js";
import type { ToolRegistry } from "./registry.js";
import { invalidTargetReason, type SafetyChecker } from "./safety.js";
import type { ToolRun } from "./types.js";

export interface ExecutionContext {
  agentRole?: AgentRole | undefined;
  sessionId?: string | undefined;
}

export interface ToolGatewayOptions {
  registry: ToolRegistry;
  store: AuditLogStore;
  safety: SafetyChecker;
  tools: ToolsConfig;
  cleanup?: CleanupManager | undefined;
}

/**
 * Single entry point for running security tools.
 *
 * Every call, including unknown tools and blocked targets, leaves exactly one
 * command record and one result record in the audit store. Recoverable
 * failures come back in the result; only the store's own unavailability is
 * reported as a warning rather than an error.
 */
export class ToolGateway {
  private readonly registry: ToolRegistry;
  private readonly store: AuditLogStore;
  private readonly safety: SafetyChecker;
  private readonly tools: ToolsConfig;
  private readonly cleanup: CleanupManager | undefined;

  constructor(options: ToolGatewayOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.safety = options.safety;
    this.tools = options.tools;
    this.cleanup = options.cleanup;
  }

  async execute(
    toolName: string,
    target: string,
    params: ToolParams = {},
    context: ExecutionContext = {}
  ): Promise<ToolResult> {
    const run = await this.run(toolName, target, params);
    logger.tool(run.toolName, run.target, describeOutcome(run));
    return this.record(run, context);
  }

  listTools(): ToolInfo[] {
    return this.registry.info();
  }

  private async run(toolName: string, target: string, params: ToolParams): Promise<ToolRun> {
    const adapter = this.registry.get(toolName);
    if (!adapter) {
      return {
        toolName,
        target,
        success: false,
        output: "",
        error: `Unknown tool: ${toolName}. Available: ${this.registry.names().join(", ")}`,
        errorKind: "UnknownTool",
        command: `${toolName} ${target}`,
        exitCode: null,
        durationMs: 0,
        warnings: [],
        metadata: { simulation_mode: false },
      };
    }

    const invalid = invalidTargetReason(target);
    if (invalid !== null) {
      logger.warn(`Refusing ${toolName} on ${JSON.stringify(target)}: ${invalid}`);
      return {
        toolName,
        target,
        success: false,
        output: "",
        error: `Invalid target: ${invalid}`,
        errorKind: "ExecutionError",
        command: `${adapter.binary} ${target}`,
        exitCode: null,
        durationMs: 0,
        warnings: [],
        metadata: { ...adapter.emptyMetadata(), simulation_mode: false },
      };
    }

    const verdict = this.safety.check(target);
    const safetyWarnings: string[] = [];
    if (verdict.denied) {
      const note = `SafetyWarning: ${verdict.host} matches deny-list entry ${verdict.matched ?? ""}`;
      logger.warn(`${note} (policy: ${this.safety.policy})`);
      if (this.safety.policy === "block") {
        return {
          toolName,
          target,
          success: false,
          output: "",
          error: `Target ${target} is deny-listed (${verdict.matched ?? verdict.host})`,
          errorKind: "SafetyBlocked",
          command: `${adapter.binary} ${target}`,
          exitCode: null,
          durationMs: 0,
          warnings: [note],
          metadata: { ...adapter.emptyMetadata(), simulation_mode: false },
        };
      }
      safetyWarnings.push(note);
    }

    const run = await executeAdapter(adapter, target, params, {
      killGraceMs: this.tools.killGraceMs,
      maxOutputBytes: this.tools.maxOutputBytes,
      timeouts: this.tools.timeouts,
      cleanup: this.cleanup,
    });
    return { ...run, warnings: [...safetyWarnings, ...run.warnings] };
  }

  private record(run: ToolRun, context: ExecutionContext): ToolResult {
    const sessionId = context.sessionId ?? null;
    const now = new Date();
    try {
      const stored = this.store.appendExecution(
        {
          command: run.command,
          output: run.output,
          success: run.success,
          context: {
            agentRole: context.agentRole ?? null,
            tool: run.toolName,
            sessionId,
            target: run.target,
            errorKind: run.errorKind,
          },
          executedAt: now,
        },
        { ...run, sessionId, storedAt: now }
      );
      return stored.result;
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      logger.warn(`Result of ${run.toolName} not persisted: ${error.message}`);
      return {
        ...run,
        id: null,
        sessionId,
        storedAt: null,
        warnings: [...run.warnings, `StoreUnavailable: ${error.message}`],
      };
    }
  }
}

function describeOutcome(run: ToolRun): string {
  if (run.errorKind && run.errorKind !== "ParseError") return run.errorKind;
  if (run.metadata.simulation_mode) return "simulated";
  return run.errorKind === "ParseError" ? "unparsed" : "ok";
}
