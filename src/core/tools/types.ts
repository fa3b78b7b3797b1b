import type { ToolErrorKind, ToolMetadata, ToolParams, ToolResult } from "../../types/tool.js";

/** Tool-specific metadata, without the simulation flag the gateway adds */
export type ParsedMetadata = Record<string, unknown>;

/**
 * A subprocess invocation. `{{name}}` in args is replaced with the path of the
 * matching entry in `files`, written to a scratch directory before spawning.
 */
export interface CommandSpec {
  binary: string;
  args: string[];
  files?: Record<string, string>;
}

export interface SimulatedRun {
  command: string;
  output: string;
  metadata: ToolMetadata;
}

export interface ToolAdapter {
  readonly name: string;
  readonly description: string;
  readonly binary: string;
  readonly defaultTimeoutSeconds: number;
  readonly maxTimeoutSeconds: number;
  /** Exit codes treated as a successful run */
  readonly successExitCodes: readonly number[];

  isInstalled(): boolean;
  /** Every metadata key the adapter produces, with empty values */
  emptyMetadata(): ParsedMetadata;
  /** Deterministic; clamps every option to the adapter's safety ceilings */
  buildCommand(target: string, params: ToolParams): CommandSpec;
  /** @throws ParseError when the output does not look like this tool's output */
  parse(output: string, params: ToolParams): ParsedMetadata;
  /** Plausible result for when the binary is missing; same keys as a live run */
  simulate(target: string, params: ToolParams): SimulatedRun;
  /** Build, run and parse without auditing */
  scan(target: string, params?: ToolParams): Promise<ToolResult>;
}

/** Outcome of running one adapter, before the gateway audits it */
export interface ToolRun {
  toolName: string;
  target: string;
  success: boolean;
  output: string;
  error: string;
  errorKind: ToolErrorKind | null;
  command: string;
  exitCode: number | null;
  durationMs: number;
  warnings: string[];
  metadata: ToolMetadata;
}

export interface RunOptions {
  /** Grace period between SIGTERM and SIGKILL */
  killGraceMs: number;
  maxOutputBytes: number;
  /** Default timeout overrides by tool name (seconds) */
  timeouts?: Record<string, number>;
}
