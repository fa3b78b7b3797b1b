export type Priority = "low" | "medium" | "high";

/**
 * Engine state derived from completed-tool counts per phase.
 * SATURATED also applies when the asking role has no untried tools left.
 */
export type DecisionState = "NEEDS_RECON" | "NEEDS_VULN_SCAN" | "NEEDS_EXPLOIT_CHECK" | "SATURATED";

export type AgentRole =
  | "Reconnaissance Specialist"
  | "Vulnerability Assessment Expert"
  | "Exploitation Specialist"
  | "Security Report Analyst";

export const AGENT_ROLES: readonly AgentRole[] = [
  "Reconnaissance Specialist",
  "Vulnerability Assessment Expert",
  "Exploitation Specialist",
  "Security Report Analyst",
];

export function isAgentRole(value: string): value is AgentRole {
  return (AGENT_ROLES as readonly string[]).includes(value);
}

export interface RankedCandidate {
  tool: string;
  priority: Priority;
  /** 0-based position after ranking */
  rank: number;
}

export interface Decision {
  /** Recommended tool, null once the role has nothing left to run */
  tool: string | null;
  agentRole: AgentRole;
  target: string;
  priority: Priority;
  reasoning: string;
  state: DecisionState;
  /** True when the deterministic fallback produced the decision */
  degraded: boolean;
  /** Name of the advisor that ranked the candidates */
  advisor: string | null;
  candidates: RankedCandidate[];
  sessionId: string | null;
  timestamp: Date;
  /** Audit record id, null if the store was unavailable */
  recordId: number | null;
}
