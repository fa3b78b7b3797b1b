import { logger } from "../../infra/logger.js";
import { SessionFileLogger } from "../../infra/file-logger.js";
import { Semaphore } from "../../infra/semaphore.js";
import { StoreUnavailableError, ValidationError, toError } from "../../infra/errors.js";
import type {
  AuditFilter,
  AuditStats,
  CommandExecution,
  DecisionRecord,
  Finding,
  Vulnerability,
} from "../../types/audit.js";
import type { LoggingConfig, SessionsConfig } from "../../types/config.js";
import type { AgentRole, Decision } from "../../types/decision.js";
import {
  PHASE_ORDER,
  type FullPentestParams,
  type PhaseName,
  type PhaseResult,
  type PhaseStep,
  type Session,
  type SessionPhaseSummary,
  type SessionSummary,
} from "../../types/session.js";
import type { ToolInfo, ToolParams, ToolResult } from "../../types/tool.js";
import type { AuditLogStore } from "../audit/audit-store.js";
import { extractFindings } from "../state/state-aggregator.js";
import type { ToolGateway } from "../tools/gateway.js";
import type { TaskDecisionEngine } from "./decision-engine.js";
import { getRoleCapability, listRoles, roleForPhase, type RoleCapability } from "./roles.js";
import { getScopeProfile, type ScopeProfile } from "./scopes.js";
import { PentestSession, createSessionId } from "./session.js";

export interface SessionOrchestratorOptions {
  store: AuditLogStore;
  engine: TaskDecisionEngine;
  gateway: ToolGateway;
  sessions: SessionsConfig;
  logging: LoggingConfig;
  /** Expanded data directory, for per-session log files */
  dataDir: string;
}

export interface PhaseOptions {
  /** Run even when the engine reports nothing left for the role */
  force?: boolean;
  /** Tool steps for this phase; defaults to every tool of the role */
  maxSteps?: number | null;
  toolParams?: Record<string, ToolParams>;
}

const PHASE_ALIASES: Record<string, PhaseName> = {
  recon: "RECON",
  reconnaissance: "RECON",
  vuln: "VULN_ASSESSMENT",
  vulnerability: "VULN_ASSESSMENT",
  vulnerability_assessment: "VULN_ASSESSMENT",
  vuln_assessment: "VULN_ASSESSMENT",
  exploit: "EXPLOITATION",
  exploitation: "EXPLOITATION",
  report: "REPORTING",
  reporting: "REPORTING",
};

export function resolvePhaseName(name: string): PhaseName {
  const key = name.trim().toLowerCase().replace(/[\s-]+/g, "_");
  const phase = PHASE_ALIASES[key];
  if (!phase) {
    throw new ValidationError(`Unknown phase "${name}". Expected one of: ${PHASE_ORDER.join(", ")}`);
  }
  return phase;
}

function isForced(force: FullPentestParams["force"], phase: PhaseName): boolean {
  return Array.isArray(force) ? force.includes(phase) : force === true;
}

interface SessionRecords {
  results: ToolResult[];
  decisions: number;
  commands: number;
}

/**
 * Drives pentest sessions through RECON, VULN_ASSESSMENT, EXPLOITATION and
 * REPORTING.
 *
 * Phases run one after another; each step asks the decision engine for a
 * tool and runs it through the gateway, so every step leaves a decision, a
 * command and a result in the audit store. Sessions run concurrently up to
 * `sessions.maxConcurrent`. A phase that fails puts the session in `error`
 * and stops it; what was recorded before stays.
 */
export class SessionOrchestrator {
  private readonly store: AuditLogStore;
  private readonly engine: TaskDecisionEngine;
  private readonly gateway: ToolGateway;
  private readonly sessionsConfig: SessionsConfig;
  private readonly logging: LoggingConfig;
  private readonly dataDir: string;
  private readonly semaphore: Semaphore;
  private readonly active = new Map<string, PentestSession>();

  constructor(options: SessionOrchestratorOptions) {
    this.store = options.store;
    this.engine = options.engine;
    this.gateway = options.gateway;
    this.sessionsConfig = options.sessions;
    this.logging = options.logging;
    this.dataDir = options.dataDir;
    this.semaphore = new Semaphore(options.sessions.maxConcurrent);
  }

  // ============ Execution ============

  /**
   * Run a whole session and return its summary
   *
   * @throws ValidationError for an empty target or unknown scope
   */
  async executeFull(
    target: string,
    scope: string = this.sessionsConfig.defaultScope,
    params: FullPentestParams = {}
  ): Promise<SessionSummary> {
    assertTarget(target);
    const profile = getScopeProfile(scope);
    return this.semaphore.use(() => this.runSession(target.trim(), profile, params));
  }

  /**
   * Run one phase for an agent role, outside of a full session
   *
   * @throws ValidationError for an empty target, unknown role or unknown phase
   */
  async executePhase(
    target: string,
    agentRole: string,
    phaseName: string,
    sessionId: string = createSessionId(),
    options: PhaseOptions = {}
  ): Promise<PhaseResult> {
    assertTarget(target);
    const capability = getRoleCapability(agentRole);
    const phase = resolvePhaseName(phaseName);
    return this.semaphore.use(() =>
      this.runPhase(sessionId, target.trim(), capability, phase, options)
    );
  }

  private async runSession(
    target: string,
    profile: ScopeProfile,
    params: FullPentestParams
  ): Promise<SessionSummary> {
    const session = new PentestSession(target, profile.scope, PHASE_ORDER);
    const fileLogger = this.openSessionLog(session);
    this.active.set(session.id, session);

    logger.header(`Pentest ${target} (${profile.scope})`);
    logger.info(`Session ${session.id}`);

    try {
      for (const [index, phase] of PHASE_ORDER.entries()) {
        const role = roleForPhase(phase);
        logger.phase(index + 1, PHASE_ORDER.length, phase, role);

        if (!profile.phases.includes(phase)) {
          const reason = `${phase} is not part of the ${profile.scope} scope`;
          session.recordPhase(skippedPhase(session.id, target, phase, role, reason));
          fileLogger?.session(`Phase ${phase} skipped`, { reason });
          continue;
        }

        session.enterPhase(phase);
        fileLogger?.session(`Phase ${phase} started`, { role });
        const result = await this.runPhase(session.id, target, getRoleCapability(role), phase, {
          force: isForced(params.force, phase),
          maxSteps: params.maxStepsPerPhase ?? profile.maxStepsPerPhase,
          toolParams: params.toolParams ?? {},
        });
        session.recordPhase(result);
        fileLogger?.session(`Phase ${phase} ${result.outcome}`, {
          tools: result.toolsRun,
          findings: result.findingsCount,
          vulnerabilities: result.vulnerabilitiesCount,
        });

        if (result.outcome === "error") {
          session.fail(result.error ?? `${phase} failed`);
          break;
        }
      }

      if (!session.isTerminal()) {
        session.complete();
      }
    } catch (error) {
      // Anything past runPhase's own handling is a bookkeeping failure
      const message = toError(error).message;
      logger.error(`Session ${session.id} failed: ${message}`, error);
      if (!session.isTerminal()) {
        session.fail(message);
      }
    } finally {
      this.active.delete(session.id);
    }

    const summary = this.buildSummary(session.id, session.snapshot());
    this.saveReport(summary, session.snapshot());
    fileLogger?.session(`Session ${summary.status}`, {
      findings: summary.findingsCount,
      vulnerabilities: summary.vulnerabilitiesCount,
    });

    if (summary.status === "completed") {
      logger.success(
        `Session complete: ${summary.toolsRun.length} tool runs, ${summary.findingsCount} findings, ${summary.vulnerabilitiesCount} vulnerabilities`
      );
    }
    return summary;
  }

  private async runPhase(
    sessionId: string,
    target: string,
    capability: RoleCapability,
    phase: PhaseName,
    options: PhaseOptions
  ): Promise<PhaseResult> {
    const startedAt = new Date();
    const steps: PhaseStep[] = [];
    const attempted: string[] = [];
    let skipReason: string | null = null;

    const finish = (outcome: PhaseResult["outcome"], error: string | null): PhaseResult => {
      const ran = steps.filter((step) => step.result !== null);
      return {
        phase,
        agentRole: capability.role,
        sessionId,
        target,
        outcome,
        steps,
        toolsRun: ran.map((step) => step.decision.tool ?? ""),
        findingsCount: ran.reduce((sum, step) => sum + step.findingsCount, 0),
        vulnerabilitiesCount: ran.reduce((sum, step) => sum + step.vulnerabilitiesCount, 0),
        skipReason,
        error,
        startedAt,
        completedAt: new Date(),
      };
    };

    // Reporting assembles the session summary from the store; nothing to run
    if (capability.primaryTools.length === 0) {
      return finish("completed", null);
    }

    const toolCount = capability.primaryTools.length;
    const limit = Math.min(options.maxSteps ?? toolCount, toolCount);
    if (limit <= 0) {
      skipReason = "No tool steps allowed for this phase";
      return finish("skipped", null);
    }

    try {
      while (attempted.length < limit) {
        const decision = await this.engine.decideNextTask(target, capability.role, sessionId, {
          exclude: attempted,
        });
        const tool = this.pickTool(decision, capability, attempted, options.force === true);

        if (tool === null) {
          if (attempted.length === 0) {
            skipReason = decision.reasoning;
            steps.push({ decision, result: null, findingsCount: 0, vulnerabilitiesCount: 0 });
            logger.info(`Skipping ${phase}: ${decision.reasoning}`);
          }
          break;
        }

        const step = decision.tool === tool ? decision : this.engine.recordForcedDecision(decision, tool);
        attempted.push(tool);
        const result = await this.gateway.execute(
          tool,
          target,
          options.toolParams?.[tool] ?? {},
          { agentRole: capability.role, sessionId }
        );
        const extracted = extractFindings(result);
        steps.push({
          decision: step,
          result,
          findingsCount: extracted.findings.length,
          vulnerabilitiesCount: extracted.vulnerabilities.length,
        });
      }
    } catch (error) {
      if (error instanceof ValidationError) throw error;
      const message = toError(error).message;
      logger.error(`${phase} failed for ${target}: ${message}`, error);
      return finish("error", message);
    }

    return finish(steps.some((step) => step.result !== null) ? "completed" : "skipped", null);
  }

  /** Tool to run for a decision, or null to stop the phase */
  private pickTool(
    decision: Decision,
    capability: RoleCapability,
    attempted: readonly string[],
    force: boolean
  ): string | null {
    if (decision.priority !== "low" && decision.tool !== null) {
      return decision.tool;
    }
    if (!force) {
      return null;
    }
    if (decision.tool !== null) {
      return decision.tool;
    }
    const forced = capability.primaryTools.find((tool) => !attempted.includes(tool)) ?? null;
    if (forced) {
      logger.info(`Forcing ${forced} for ${capability.role}`);
    }
    return forced;
  }

  // ============ Reads ============

  /**
   * Summary of a session from the audit store; works for sessions that
   * finished in another process
   *
   * @throws StoreUnavailableError
   */
  getSessionSummary(sessionId: string): SessionSummary {
    const active = this.active.get(sessionId);
    const report = this.store.querySessionReports({ sessionId }, 1)[0];
    const snapshot = active?.snapshot() ?? null;
    const summary = summarize(sessionId, this.readRecords(sessionId), snapshot);

    if (!snapshot && report) {
      return {
        ...summary,
        target: summary.target ?? report.target,
        scope: report.scope,
        status: report.status,
        phases: report.summary.phases,
        startedAt: report.summary.startedAt ?? summary.startedAt,
        completedAt: report.summary.completedAt,
        error: report.summary.error,
      };
    }
    return summary;
  }

  getRecentSessions(limit = 10): SessionSummary[] {
    const running = [...this.active.keys()].map((id) => this.getSessionSummary(id));
    const finished = this.store
      .querySessionReports({}, Math.max(0, limit))
      .map((report) => this.getSessionSummary(report.sessionId));
    return [...running, ...finished].slice(0, Math.max(0, limit));
  }

  getActiveSessions(): Session[] {
    return [...this.active.values()].map((session) => session.snapshot());
  }

  getAgentActions(filter: AuditFilter = {}, limit?: number | null): DecisionRecord[] {
    return this.store.queryDecisions(filter, limit);
  }

  getCommandExecutions(filter: AuditFilter = {}, limit?: number | null): CommandExecution[] {
    return this.store.queryCommands(filter, limit);
  }

  getDatabaseStats(): AuditStats {
    return this.store.stats();
  }

  listAgents(): RoleCapability[] {
    return listRoles();
  }

  listTools(): ToolInfo[] {
    return this.gateway.listTools();
  }

  // ============ Helpers ============

  private readRecords(sessionId: string): SessionRecords {
    return {
      results: [...this.store.queryToolResults({ sessionId }, null)].reverse(),
      decisions: this.store.queryDecisions({ sessionId }, null).length,
      commands: this.store.queryCommands({ sessionId }, null).length,
    };
  }

  /** Store-backed summary; falls back to the in-memory steps when the store is down */
  private buildSummary(sessionId: string, snapshot: Session): SessionSummary {
    try {
      return summarize(sessionId, this.readRecords(sessionId), snapshot);
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      logger.warn(`Summary for ${sessionId} built from memory: ${error.message}`);
      const steps = Object.values(snapshot.results).flatMap((phase) => phase.steps);
      return summarize(
        sessionId,
        {
          results: steps.flatMap((step) => (step.result ? [step.result] : [])),
          decisions: steps.length,
          commands: steps.filter((step) => step.result !== null).length,
        },
        snapshot
      );
    }
  }

  private saveReport(summary: SessionSummary, snapshot: Session): void {
    if (snapshot.status === "running") return;
    try {
      this.store.appendSessionReport({
        sessionId: snapshot.id,
        target: snapshot.target,
        scope: snapshot.scope,
        status: snapshot.status,
        summary,
        storedAt: new Date(),
      });
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      logger.warn(`Session report for ${snapshot.id} not persisted: ${error.message}`);
    }
  }

  private openSessionLog(session: PentestSession): SessionFileLogger | null {
    if (!this.logging.enableFileLogging) return null;
    try {
      return new SessionFileLogger({
        config: this.logging,
        dataDir: this.dataDir,
        sessionId: session.id,
        target: session.target,
      });
    } catch (error) {
      logger.warn(`Session log disabled: ${toError(error).message}`);
      return null;
    }
  }
}

function assertTarget(target: string): void {
  if (target.trim().length === 0) {
    throw new ValidationError("Target must not be empty");
  }
}

function skippedPhase(
  sessionId: string,
  target: string,
  phase: PhaseName,
  agentRole: AgentRole,
  reason: string
): PhaseResult {
  const now = new Date();
  return {
    phase,
    agentRole,
    sessionId,
    target,
    outcome: "skipped",
    steps: [],
    toolsRun: [],
    findingsCount: 0,
    vulnerabilitiesCount: 0,
    skipReason: reason,
    error: null,
    startedAt: now,
    completedAt: now,
  };
}

function summarize(sessionId: string, records: SessionRecords, snapshot: Session | null): SessionSummary {
  const findings: Finding[] = [];
  const vulnerabilities: Vulnerability[] = [];
  for (const result of records.results) {
    const extracted = extractFindings(result);
    findings.push(...extracted.findings);
    vulnerabilities.push(...extracted.vulnerabilities);
  }

  const phases: SessionPhaseSummary[] = snapshot
    ? PHASE_ORDER.flatMap((phase) => {
        const result = snapshot.results[phase];
        return result
          ? [
              {
                phase,
                outcome: result.outcome,
                toolsRun: result.toolsRun,
                findingsCount: result.findingsCount,
                vulnerabilitiesCount: result.vulnerabilitiesCount,
              },
            ]
          : [];
      })
    : [];

  const first = records.results[0];
  return {
    sessionId,
    target: snapshot?.target ?? first?.target ?? null,
    scope: snapshot?.scope ?? null,
    status: snapshot?.status ?? "unknown",
    phases,
    toolsRun: records.results.map((result) => result.toolName),
    decisionsCount: records.decisions,
    commandsCount: records.commands,
    findingsCount: findings.length,
    vulnerabilitiesCount: vulnerabilities.length,
    simulatedRuns: records.results.filter((result) => result.metadata.simulation_mode).length,
    failedRuns: records.results.filter((result) => !result.success).length,
    findings,
    vulnerabilities,
    startedAt: snapshot?.createdAt ?? first?.storedAt ?? null,
    completedAt: snapshot?.completedAt ?? null,
    error: snapshot?.error ?? null,
  };
}
