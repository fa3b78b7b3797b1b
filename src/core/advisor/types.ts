/**
 * Types for the advisor abstraction: optional model-backed rankers the
 * decision engine consults before falling back to its fixed ordering
 */

import type { AgentRole, DecisionState, Priority } from "../../types/decision.js";

export interface AdvisorContext {
  target: string;
  agentRole: AgentRole;
  state: DecisionState;
  /** Tools the role may still run, in capability-table order */
  candidates: string[];
  completedTools: string[];
  findingsCount: number;
  vulnerabilitiesCount: number;
}

export interface AdvisorAdvice {
  tool: string;
  priority: Priority;
  reasoning: string;
  /** Preferred order of the candidates, best first */
  ranking: string[];
}

export interface AdviseOptions {
  timeoutMs: number;
  /** Aborted when the caller stops waiting */
  signal: AbortSignal;
}

export interface Advisor {
  /** Advisor name for logging and decision records */
  readonly name: string;

  /**
   * Check if the advisor is reachable/configured
   */
  isAvailable(): Promise<boolean>;

  /**
   * Rank the candidate tools. Null means the reply held no usable advice.
   */
  advise(context: AdvisorContext, options: AdviseOptions): Promise<AdvisorAdvice | null>;
}
