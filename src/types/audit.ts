import type { AgentRole, DecisionState, Priority, RankedCandidate } from "./decision.js";
import type { PentestScope, SessionStatus, SessionSummary } from "./session.js";
import type { ToolErrorKind, ToolResult } from "./tool.js";

// ============ Records ============

export interface DecisionRecord {
  id: number;
  sessionId: string | null;
  agentRole: AgentRole;
  target: string;
  recommendedTool: string | null;
  priority: Priority;
  reasoning: string;
  state: DecisionState;
  degraded: boolean;
  advisor: string | null;
  candidates: RankedCandidate[];
  timestamp: Date;
}

export type NewDecisionRecord = Omit<DecisionRecord, "id">;

export interface CommandContext {
  agentRole: AgentRole | null;
  tool: string;
  sessionId: string | null;
  target: string;
  errorKind: ToolErrorKind | null;
}

export interface CommandExecution {
  id: number;
  command: string;
  output: string;
  success: boolean;
  context: CommandContext;
  executedAt: Date;
}

export type NewCommandExecution = Omit<CommandExecution, "id">;

export type NewToolResult = Omit<ToolResult, "id" | "storedAt"> & { storedAt: Date };

export interface StoredExecution {
  command: CommandExecution;
  result: ToolResult;
}

export interface SessionReportRecord {
  id: number;
  sessionId: string;
  target: string;
  scope: PentestScope;
  status: SessionStatus;
  summary: SessionSummary;
  storedAt: Date;
}

export type NewSessionReport = Omit<SessionReportRecord, "id">;

// ============ Queries ============

export interface AuditFilter {
  sessionId?: string;
  target?: string;
  agentRole?: string;
  tool?: string;
  success?: boolean;
}

export const DEFAULT_QUERY_LIMIT = 50;

export interface AuditStats {
  database: string;
  connected: boolean;
  collections: {
    decisions: number;
    command_executions: number;
    tool_results: number;
    session_reports: number;
  };
  totalDocuments: number;
}

// ============ Derived ============

export type FindingSeverity = "info" | "low" | "medium" | "high" | "critical";

/** Observation extracted from tool metadata (open port, share, credential, ...) */
export interface Finding {
  tool: string;
  target: string;
  type: string;
  detail: unknown;
  simulated: boolean;
}

export interface Vulnerability {
  tool: string;
  target: string;
  description: string;
  severity: FindingSeverity;
  detail: unknown;
  simulated: boolean;
}
