import { ValidationError } from "../../infra/errors.js";
import { AGENT_ROLES, isAgentRole, type AgentRole } from "../../types/decision.js";
import type { PhaseName } from "../../types/session.js";

export interface RoleCapability {
  role: AgentRole;
  phase: PhaseName;
  description: string;
  capabilities: string[];
  /** Tools in preference order; earlier wins ties */
  primaryTools: readonly string[];
}

export const ROLE_CAPABILITIES: Readonly<Record<AgentRole, RoleCapability>> = {
  "Reconnaissance Specialist": {
    role: "Reconnaissance Specialist",
    phase: "RECON",
    description: "Gathers information about the target: open ports, services, shares and web server details",
    capabilities: ["network_scanning", "service_identification", "information_gathering"],
    primaryTools: ["nmap", "nikto", "enum4linux"],
  },
  "Vulnerability Assessment Expert": {
    role: "Vulnerability Assessment Expert",
    phase: "VULN_ASSESSMENT",
    description: "Identifies and analyzes security vulnerabilities with specialized scanners",
    capabilities: ["vulnerability_scanning", "web_app_testing", "risk_assessment"],
    primaryTools: ["sqlmap", "zap", "nuclei", "nikto"],
  },
  "Exploitation Specialist": {
    role: "Exploitation Specialist",
    phase: "EXPLOITATION",
    description: "Validates identified weaknesses: exploit lookup, credential and hash checks",
    capabilities: ["exploit_research", "credential_testing", "proof_of_concept"],
    primaryTools: ["metasploit", "hydra", "john"],
  },
  "Security Report Analyst": {
    role: "Security Report Analyst",
    phase: "REPORTING",
    description: "Assembles findings and vulnerabilities into the session report",
    capabilities: ["report_generation", "risk_analysis", "recommendations"],
    primaryTools: [],
  },
};

export function getRoleCapability(role: string): RoleCapability {
  if (!isAgentRole(role)) {
    throw new ValidationError(`Unknown agent role "${role}". Expected one of: ${AGENT_ROLES.join(", ")}`);
  }
  return ROLE_CAPABILITIES[role];
}

export function roleForPhase(phase: PhaseName): AgentRole {
  const match = AGENT_ROLES.find((role) => ROLE_CAPABILITIES[role].phase === phase);
  if (!match) {
    throw new ValidationError(`No agent role handles phase ${phase}`);
  }
  return match;
}

export function listRoles(): RoleCapability[] {
  return AGENT_ROLES.map((role) => ROLE_CAPABILITIES[role]);
}
