/**
 * Outcome classification for a single tool invocation.
 *
 * NotInstalled and SafetyWarning never make a result fail on their own:
 * the first turns into a simulated run, the second into an annotation.
 */
export type ToolErrorKind =
  | "NotInstalled"
  | "SafetyWarning"
  | "SafetyBlocked"
  | "TimeoutExpired"
  | "ExecutionError"
  | "ParseError"
  | "UnknownTool";

/**
 * Tool-specific structured output. Every adapter produces the same key set
 * for live and simulated runs; `simulation_mode` tells them apart.
 */
export interface ToolMetadata {
  simulation_mode: boolean;
  [key: string]: unknown;
}

/** Caller-supplied options; adapters clamp whatever they read from here */
export interface ToolParams {
  /** Timeout override in seconds */
  timeout?: number | undefined;
  [key: string]: unknown;
}

export interface ToolResult {
  /** Audit record id, null when the result could not be persisted */
  id: number | null;
  toolName: string;
  target: string;
  sessionId: string | null;
  success: boolean;
  output: string;
  error: string;
  errorKind: ToolErrorKind | null;
  command: string;
  exitCode: number | null;
  durationMs: number;
  warnings: string[];
  metadata: ToolMetadata;
  storedAt: Date | null;
}

export interface ToolInfo {
  name: string;
  description: string;
  binary: string;
  installed: boolean;
  defaultTimeoutSeconds: number;
}
