import { logger } from "../infra/logger.js";
import { CircuitBreakerRegistry } from "../infra/circuit-breaker.js";
import { CleanupManager } from "../infra/cleanup-manager.js";
import { HealthChecker } from "../infra/health-check.js";
import type { Config } from "../types/config.js";
import { expandPath } from "../cli/config/loader.js";
import type { AuditLogStore } from "./audit/audit-store.js";
import { SqliteAuditStore } from "./audit/sqlite-audit-store.js";
import type { AdvisorChain } from "./advisor/advisor-chain.js";
import { createAdvisorChain } from "./advisor/advisor-factory.js";
import { TaskDecisionEngine } from "./engine/decision-engine.js";
import { SessionOrchestrator } from "./engine/session-orchestrator.js";
import { StateAggregator } from "./state/state-aggregator.js";
import { ToolGateway } from "./tools/gateway.js";
import { createDefaultRegistry, type ToolRegistry } from "./tools/registry.js";
import { SafetyChecker } from "./tools/safety.js";

/** Pre-built collaborators, mostly for tests */
export interface ContextOverrides {
  store?: AuditLogStore;
  registry?: ToolRegistry;
  advisors?: AdvisorChain;
}

export interface OrchestratorContext {
  config: Config;
  dataDir: string;
  store: AuditLogStore;
  registry: ToolRegistry;
  gateway: ToolGateway;
  aggregator: StateAggregator;
  advisors: AdvisorChain;
  engine: TaskDecisionEngine;
  orchestrator: SessionOrchestrator;
  cleanup: CleanupManager;
  breakers: CircuitBreakerRegistry;
  health: HealthChecker;
  /** Kill in-flight tools, remove temp files and close the store */
  close(): Promise<void>;
}

/**
 * Wire up every component for one process. Nothing here is global except
 * the console logger; two contexts never share state.
 *
 * @throws StoreUnavailableError when the audit database cannot be opened
 */
export function createOrchestratorContext(
  config: Config,
  overrides: ContextOverrides = {}
): OrchestratorContext {
  const dataDir = expandPath(config.dataDir);
  const cleanup = new CleanupManager();
  const breakers = new CircuitBreakerRegistry(config.hardening.circuitBreaker);

  const store = overrides.store ?? new SqliteAuditStore(dataDir);
  const registry = overrides.registry ?? createDefaultRegistry(config.tools);
  const aggregator = new StateAggregator(store);
  const advisors = overrides.advisors ?? createAdvisorChain(config.advisor, breakers, cleanup);

  const gateway = new ToolGateway({
    registry,
    store,
    safety: new SafetyChecker(config.safety),
    tools: config.tools,
    cleanup,
  });
  const engine = new TaskDecisionEngine(store, aggregator, advisors);
  const orchestrator = new SessionOrchestrator({
    store,
    engine,
    gateway,
    sessions: config.sessions,
    logging: config.logging,
    dataDir,
  });

  const health = new HealthChecker(
    { diskPath: dataDir, requiredTools: config.hardening.healthCheck.requiredTools },
    {
      store: () => store.ping(),
      tools: async () => registry.info().map(({ name, installed }) => ({ name, installed })),
      advisors: [...advisors.list()],
    }
  );

  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    const result = await cleanup.runAll();
    for (const failure of result.failed) {
      logger.warn(`Cleanup task ${failure.id} failed: ${failure.error}`);
    }
    cleanup.removeShutdownHandlers();
    store.close();
  };

  logger.debug("Orchestrator context ready", {
    dataDir,
    tools: registry.names().length,
    advisors: advisors.names,
  });

  return {
    config,
    dataDir,
    store,
    registry,
    gateway,
    aggregator,
    advisors,
    engine,
    orchestrator,
    cleanup,
    breakers,
    health,
    close,
  };
}
