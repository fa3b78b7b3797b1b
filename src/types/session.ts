import type { AgentRole, Decision } from "./decision.js";
import type { Finding, Vulnerability } from "./audit.js";
import type { ToolParams, ToolResult } from "./tool.js";

export type SessionStatus = "running" | "completed" | "error";

/** Valid status transitions; completed and error are terminal */
export const VALID_SESSION_TRANSITIONS: Record<SessionStatus, SessionStatus[]> = {
  running: ["completed", "error"],
  completed: [],
  error: [],
};

export type PhaseName = "RECON" | "VULN_ASSESSMENT" | "EXPLOITATION" | "REPORTING";

export const PHASE_ORDER: readonly PhaseName[] = [
  "RECON",
  "VULN_ASSESSMENT",
  "EXPLOITATION",
  "REPORTING",
];

export type PentestScope = "quick" | "basic" | "comprehensive";

export const PENTEST_SCOPES: readonly PentestScope[] = ["quick", "basic", "comprehensive"];

export type PhaseOutcome = "completed" | "skipped" | "error";

export interface PhaseStep {
  decision: Decision;
  result: ToolResult | null;
  findingsCount: number;
  vulnerabilitiesCount: number;
}

export interface PhaseResult {
  phase: PhaseName;
  agentRole: AgentRole;
  sessionId: string;
  target: string;
  outcome: PhaseOutcome;
  steps: PhaseStep[];
  toolsRun: string[];
  findingsCount: number;
  vulnerabilitiesCount: number;
  skipReason: string | null;
  error: string | null;
  startedAt: Date;
  completedAt: Date;
}

export interface Session {
  id: string;
  target: string;
  scope: PentestScope;
  phases: PhaseName[];
  status: SessionStatus;
  currentPhase: PhaseName | null;
  createdAt: Date;
  completedAt: Date | null;
  results: Partial<Record<PhaseName, PhaseResult>>;
  error: string | null;
}

export interface FullPentestParams {
  /** Run phases even when the engine reports nothing left (all, or a list of phases) */
  force?: boolean | PhaseName[];
  /** Override the scope profile's step limit per phase */
  maxStepsPerPhase?: number;
  /** Per-tool parameters passed to the gateway */
  toolParams?: Record<string, ToolParams>;
}

export interface SessionPhaseSummary {
  phase: PhaseName;
  outcome: PhaseOutcome;
  toolsRun: string[];
  findingsCount: number;
  vulnerabilitiesCount: number;
}

export interface SessionSummary {
  sessionId: string;
  target: string | null;
  scope: PentestScope | null;
  status: SessionStatus | "unknown";
  phases: SessionPhaseSummary[];
  toolsRun: string[];
  decisionsCount: number;
  commandsCount: number;
  findingsCount: number;
  vulnerabilitiesCount: number;
  simulatedRuns: number;
  failedRuns: number;
  findings: Finding[];
  vulnerabilities: Vulnerability[];
  startedAt: Date | null;
  completedAt: Date | null;
  error: string | null;
}
