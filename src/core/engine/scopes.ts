import { ValidationError } from "../../infra/errors.js";
import { PENTEST_SCOPES, type PentestScope, type PhaseName } from "../../types/session.js";

export interface ScopeProfile {
  scope: PentestScope;
  phases: readonly PhaseName[];
  /** Tool steps per phase; null runs until the role saturates */
  maxStepsPerPhase: number | null;
}

export const SCOPE_PROFILES: Readonly<Record<PentestScope, ScopeProfile>> = {
  quick: { scope: "quick", phases: ["RECON", "VULN_ASSESSMENT", "REPORTING"], maxStepsPerPhase: 1 },
  basic: {
    scope: "basic",
    phases: ["RECON", "VULN_ASSESSMENT", "EXPLOITATION", "REPORTING"],
    maxStepsPerPhase: 1,
  },
  comprehensive: {
    scope: "comprehensive",
    phases: ["RECON", "VULN_ASSESSMENT", "EXPLOITATION", "REPORTING"],
    maxStepsPerPhase: null,
  },
};

export function isPentestScope(value: string): value is PentestScope {
  return (PENTEST_SCOPES as readonly string[]).includes(value);
}

export function getScopeProfile(scope: string): ScopeProfile {
  if (!isPentestScope(scope)) {
    throw new ValidationError(`Unknown scope "${scope}". Expected one of: ${PENTEST_SCOPES.join(", ")}`);
  }
  return SCOPE_PROFILES[scope];
}
