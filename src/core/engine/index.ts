export {
  ROLE_CAPABILITIES,
  getRoleCapability,
  roleForPhase,
  listRoles,
  type RoleCapability,
} from "./roles.js";
export { SCOPE_PROFILES, getScopeProfile, isPentestScope, type ScopeProfile } from "./scopes.js";
export {
  TaskDecisionEngine,
  deriveState,
  rankByPosition,
  type DecideOptions,
  type RoleRecommendation,
  type StateAnalysis,
} from "./decision-engine.js";
export { PentestSession, createSessionId } from "./session.js";
export {
  SessionOrchestrator,
  resolvePhaseName,
  type PhaseOptions,
  type SessionOrchestratorOptions,
} from "./session-orchestrator.js";
