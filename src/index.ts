// Pentest Orchestrator - programmatic API

export * from "./types/index.js";
export * from "./infra/index.js";

export * from "./core/audit/index.js";
export {
  StateAggregator,
  extractFindings,
  emptyAggregate,
  FINDING_KEYS,
  type ExtractedFindings,
  type TargetAggregate,
} from "./core/state/state-aggregator.js";
export * from "./core/tools/index.js";
export * from "./core/advisor/index.js";
export * from "./core/engine/index.js";
export {
  createOrchestratorContext,
  type ContextOverrides,
  type OrchestratorContext,
} from "./core/context.js";
export { loadConfig, saveConfig, getDefaultConfig, getConfigPath } from "./cli/config/loader.js";
