import { logger } from "../../infra/logger.js";
import { StoreUnavailableError, ValidationError } from "../../infra/errors.js";
import type {
  AgentRole,
  Decision,
  DecisionState,
  Priority,
  RankedCandidate,
} from "../../types/decision.js";
import type { AuditLogStore } from "../audit/audit-store.js";
import type { AdvisorChain, ChainAdvice } from "../advisor/advisor-chain.js";
import type { StateAggregator, TargetAggregate } from "../state/state-aggregator.js";
import { ROLE_CAPABILITIES, getRoleCapability, listRoles, type RoleCapability } from "./roles.js";

export interface DecideOptions {
  /** Tools to leave out even if not completed (e.g. already attempted this phase) */
  exclude?: readonly string[];
}

export interface RoleRecommendation {
  agentRole: AgentRole;
  tool: string | null;
  priority: Priority;
}

export interface StateAnalysis {
  target: string;
  state: DecisionState;
  completedTools: string[];
  toolRuns: number;
  findingsCount: number;
  vulnerabilitiesCount: number;
  /** min(completed tools × 10, 100) */
  completionPercentage: number;
  recommendations: RoleRecommendation[];
  degraded: boolean;
}

/**
 * Engine state from which phases have at least one completed tool
 */
export function deriveState(completedTools: ReadonlySet<string>): DecisionState {
  const phaseDone = (role: AgentRole): boolean =>
    ROLE_CAPABILITIES[role].primaryTools.some((tool) => completedTools.has(tool));

  if (!phaseDone("Reconnaissance Specialist")) return "NEEDS_RECON";
  if (!phaseDone("Vulnerability Assessment Expert")) return "NEEDS_VULN_SCAN";
  if (!phaseDone("Exploitation Specialist")) return "NEEDS_EXPLOIT_CHECK";
  return "SATURATED";
}

/** Capability-table order: first candidate high, the rest medium */
export function rankByPosition(candidates: readonly string[]): RankedCandidate[] {
  return candidates.map(
    (tool, rank): RankedCandidate => ({ tool, rank, priority: rank === 0 ? "high" : "medium" })
  );
}

function rankByAdvice(candidates: readonly string[], { advice }: ChainAdvice): RankedCandidate[] {
  const ordered = [advice.tool];
  for (const tool of [...advice.ranking, ...candidates]) {
    if (candidates.includes(tool) && !ordered.includes(tool)) {
      ordered.push(tool);
    }
  }
  // Followers never outrank the advisor's pick
  const follower: Priority = advice.priority === "low" ? "low" : "medium";
  return ordered.map(
    (tool, rank): RankedCandidate => ({
      tool,
      rank,
      priority: rank === 0 ? advice.priority : follower,
    })
  );
}

function remainingCandidates(
  capability: RoleCapability,
  aggregate: TargetAggregate,
  exclude: readonly string[]
): string[] {
  return capability.primaryTools.filter(
    (tool) => !aggregate.completedTools.has(tool) && !exclude.includes(tool)
  );
}

/**
 * Recommends the next tool for an agent role against a target.
 *
 * Progress comes from the state aggregator. When advisors are configured
 * they rank the remaining candidates; otherwise, or when every advisor fails,
 * the fixed capability-table order applies and the decision is marked
 * degraded. Every decision is appended to the audit log before it returns.
 */
export class TaskDecisionEngine {
  constructor(
    private readonly store: AuditLogStore,
    private readonly aggregator: StateAggregator,
    private readonly advisors: AdvisorChain | null = null
  ) {}

  async decideNextTask(
    target: string,
    agentRole: string,
    sessionId?: string,
    options: DecideOptions = {}
  ): Promise<Decision> {
    const capability = getRoleCapability(agentRole);
    if (target.trim().length === 0) {
      throw new ValidationError("Target must not be empty");
    }

    const aggregate = this.aggregator.aggregate(target, sessionId);
    const candidates = remainingCandidates(capability, aggregate, options.exclude ?? []);
    const state: DecisionState =
      candidates.length === 0 ? "SATURATED" : deriveState(aggregate.completedTools);
    const historyNote = aggregate.degraded ? " (history unavailable)" : "";

    let decision: Omit<Decision, "recordId">;
    const base = {
      agentRole: capability.role,
      target,
      state,
      sessionId: sessionId ?? null,
      timestamp: new Date(),
    };

    const chainAdvice =
      candidates.length > 0 && this.advisors !== null && this.advisors.size > 0
        ? await this.advisors.advise({
            target,
            agentRole: capability.role,
            state,
            candidates,
            completedTools: [...aggregate.completedTools],
            findingsCount: aggregate.findings.length,
            vulnerabilitiesCount: aggregate.vulnerabilities.length,
          })
        : null;

    if (candidates.length === 0) {
      decision = {
        ...base,
        tool: null,
        priority: "low",
        reasoning:
          capability.primaryTools.length === 0
            ? `SATURATED: ${capability.role} runs no tools; no further actions${historyNote}`
            : `SATURATED: ${capability.role} has tried ${capability.primaryTools.join(", ")} against ${target}; no further actions${historyNote}`,
        degraded: true,
        advisor: null,
        candidates: [],
      };
    } else if (chainAdvice) {
      const ranked = rankByAdvice(candidates, chainAdvice);
      const top = ranked[0];
      decision = {
        ...base,
        tool: top?.tool ?? null,
        priority: top?.priority ?? "medium",
        reasoning:
          chainAdvice.advice.reasoning.trim() ||
          `${chainAdvice.advisor} recommended ${chainAdvice.advice.tool}`,
        degraded: false,
        advisor: chainAdvice.advisor,
        candidates: ranked,
      };
    } else {
      const ranked = rankByPosition(candidates);
      const [first, ...rest] = candidates;
      const restNote = rest.length > 0 ? `; then ${rest.join(", ")}` : "";
      decision = {
        ...base,
        tool: first ?? null,
        priority: "high",
        reasoning: `${state}: ${first ?? "none"} is the first untried ${capability.phase} tool for ${capability.role}${restNote}${historyNote}`,
        degraded: true,
        advisor: null,
        candidates: ranked,
      };
    }

    const recordId = this.persist(decision);
    logger.debug(`Decision for ${capability.role} on ${target}: ${decision.tool ?? "none"}`, {
      priority: decision.priority,
      state: decision.state,
      degraded: decision.degraded,
    });
    return { ...decision, recordId };
  }

  /**
   * Records an override of `decision` that runs `tool` anyway, so the audit
   * log names the tool before its command is executed.
   */
  recordForcedDecision(decision: Decision, tool: string): Decision {
    const forced: Omit<Decision, "recordId"> = {
      agentRole: decision.agentRole,
      target: decision.target,
      state: decision.state,
      sessionId: decision.sessionId,
      timestamp: new Date(),
      tool,
      priority: "low",
      reasoning: `FORCED: ${tool} for ${decision.agentRole} despite ${decision.state}`,
      degraded: decision.degraded,
      advisor: null,
      candidates: [{ tool, rank: 0, priority: "low" }],
    };
    return { ...forced, recordId: this.persist(forced) };
  }

  /**
   * Progress snapshot for a target across all sessions, with the rule-based
   * recommendation for every role. Nothing is recorded.
   */
  analyzeCurrentState(target: string): StateAnalysis {
    const aggregate = this.aggregator.aggregate(target);
    const recommendations = listRoles().map((capability): RoleRecommendation => {
      const candidates = remainingCandidates(capability, aggregate, []);
      const first = candidates[0];
      return {
        agentRole: capability.role,
        tool: first ?? null,
        priority: first === undefined ? "low" : "high",
      };
    });

    return {
      target,
      state: deriveState(aggregate.completedTools),
      completedTools: [...aggregate.completedTools],
      toolRuns: aggregate.toolRuns,
      findingsCount: aggregate.findings.length,
      vulnerabilitiesCount: aggregate.vulnerabilities.length,
      completionPercentage: Math.min(aggregate.completedTools.size * 10, 100),
      recommendations,
      degraded: aggregate.degraded,
    };
  }

  private persist(decision: Omit<Decision, "recordId">): number | null {
    try {
      const record = this.store.appendDecision({
        sessionId: decision.sessionId,
        agentRole: decision.agentRole,
        target: decision.target,
        recommendedTool: decision.tool,
        priority: decision.priority,
        reasoning: decision.reasoning,
        state: decision.state,
        degraded: decision.degraded,
        advisor: decision.advisor,
        candidates: decision.candidates,
        timestamp: decision.timestamp,
      });
      return record.id;
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      logger.warn(`Decision not persisted: ${error.message}`);
      return null;
    }
  }
}
