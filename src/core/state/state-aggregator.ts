import { logger } from "../../infra/logger.js";
import { toError } from "../../infra/errors.js";
import type { Finding, FindingSeverity, Vulnerability } from "../../types/audit.js";
import type { ToolResult } from "../../types/tool.js";
import type { AuditLogStore } from "../audit/audit-store.js";

/** Metadata keys whose list entries each count as one finding */
export const FINDING_KEYS = [
  "open_ports",
  "shares",
  "users",
  "found_credentials",
  "cracked_passwords",
  "exploits",
  "found_paths",
  "databases",
  "emails",
  "hosts",
] as const;

const SEVERITIES: readonly FindingSeverity[] = ["info", "low", "medium", "high", "critical"];

export interface ExtractedFindings {
  findings: Finding[];
  vulnerabilities: Vulnerability[];
}

export interface TargetAggregate {
  target: string;
  sessionId: string | null;
  /** Tools with at least one successful (live or simulated) result */
  completedTools: Set<string>;
  findings: Finding[];
  vulnerabilities: Vulnerability[];
  /** Every stored result, failures included */
  toolRuns: number;
  /** True when the store could not be read; the aggregate is then empty */
  degraded: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeSeverity(value: unknown): FindingSeverity {
  if (typeof value !== "string") return "medium";
  const lowered = value.toLowerCase();
  if (lowered === "informational") return "info";
  return SEVERITIES.find((s) => s === lowered) ?? "medium";
}

function describe(entry: unknown): string {
  if (typeof entry === "string") return entry;
  if (isRecord(entry)) {
    for (const key of ["description", "name", "title", "template", "parameter"]) {
      const value = entry[key];
      if (typeof value === "string" && value.length > 0) return value;
    }
  }
  return JSON.stringify(entry);
}

/**
 * Turn one result's metadata into findings and vulnerabilities.
 *
 * Phase results and session summaries both count through here, so the two
 * always agree.
 */
export function extractFindings(result: ToolResult): ExtractedFindings {
  const { metadata } = result;
  const simulated = metadata.simulation_mode;
  const findings: Finding[] = [];
  const vulnerabilities: Vulnerability[] = [];

  for (const type of FINDING_KEYS) {
    const entries = metadata[type];
    if (!Array.isArray(entries)) continue;
    for (const detail of entries) {
      findings.push({ tool: result.toolName, target: result.target, type, detail, simulated });
    }
  }

  const vulns = metadata["vulnerabilities"];
  if (Array.isArray(vulns)) {
    for (const detail of vulns) {
      vulnerabilities.push({
        tool: result.toolName,
        target: result.target,
        description: describe(detail),
        severity: isRecord(detail) ? normalizeSeverity(detail["severity"] ?? detail["risk"]) : "medium",
        detail,
        simulated,
      });
    }
  }

  return { findings, vulnerabilities };
}

export function emptyAggregate(target: string, sessionId: string | null, degraded: boolean): TargetAggregate {
  return {
    target,
    sessionId,
    completedTools: new Set(),
    findings: [],
    vulnerabilities: [],
    toolRuns: 0,
    degraded,
  };
}

/**
 * Read-only progress snapshot for a target, optionally narrowed to a session
 */
export class StateAggregator {
  constructor(private readonly store: AuditLogStore) {}

  aggregate(target: string, sessionId?: string): TargetAggregate {
    let results: ToolResult[];
    try {
      results = this.store.queryToolResults(
        sessionId === undefined ? { target } : { target, sessionId },
        null
      );
    } catch (error) {
      logger.warn(`State unavailable for ${target}, continuing with an empty view`, {
        error: toError(error).message,
      });
      return emptyAggregate(target, sessionId ?? null, true);
    }

    const aggregate = emptyAggregate(target, sessionId ?? null, false);
    aggregate.toolRuns = results.length;

    // Results arrive newest first; findings are listed oldest first
    for (const result of [...results].reverse()) {
      if (result.success) {
        aggregate.completedTools.add(result.toolName);
      }
      const extracted = extractFindings(result);
      aggregate.findings.push(...extracted.findings);
      aggregate.vulnerabilities.push(...extracted.vulnerabilities);
    }

    return aggregate;
  }
}
