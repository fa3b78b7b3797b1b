/**
 * Shared fixtures for core tests
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SqliteAuditStore } from "../../src/core/audit/sqlite-audit-store.js";
import type { AuditLogStore } from "../../src/core/audit/audit-store.js";
import { StoreUnavailableError } from "../../src/infra/errors.js";
import type {
  AuditStats,
  CommandExecution,
  DecisionRecord,
  NewCommandExecution,
  NewDecisionRecord,
  NewSessionReport,
  NewToolResult,
  SessionReportRecord,
  StoredExecution,
} from "../../src/types/audit.js";
import type { ToolResult } from "../../src/types/tool.js";

export function createTempStore(): {
  dataDir: string;
  store: SqliteAuditStore;
  cleanup: () => void;
} {
  const dataDir = mkdtempSync(join(tmpdir(), "pentest-orch-test-"));
  const store = new SqliteAuditStore(dataDir);
  return {
    dataDir,
    store,
    cleanup: () => {
      store.close();
      rmSync(dataDir, { recursive: true, force: true });
    },
  };
}

export function makeResult(overrides: Partial<NewToolResult> = {}): NewToolResult {
  return {
    toolName: "nmap",
    target: "scanme.example.com",
    sessionId: null,
    success: true,
    output: "",
    error: "",
    errorKind: null,
    command: "nmap -sV scanme.example.com",
    exitCode: 0,
    durationMs: 120,
    warnings: [],
    metadata: { simulation_mode: false },
    storedAt: new Date("2026-03-01T10:00:00.000Z"),
    ...overrides,
  };
}

export function makeCommand(overrides: Partial<NewCommandExecution> = {}): NewCommandExecution {
  return {
    command: "nmap -sV scanme.example.com",
    output: "",
    success: true,
    context: {
      agentRole: "Reconnaissance Specialist",
      tool: "nmap",
      sessionId: null,
      target: "scanme.example.com",
      errorKind: null,
    },
    executedAt: new Date("2026-03-01T10:00:00.000Z"),
    ...overrides,
  };
}

export function makeDecision(overrides: Partial<NewDecisionRecord> = {}): NewDecisionRecord {
  return {
    sessionId: null,
    agentRole: "Reconnaissance Specialist",
    target: "scanme.example.com",
    recommendedTool: "nmap",
    priority: "high",
    reasoning: "NEEDS_RECON: nmap is the first untried RECON tool",
    state: "NEEDS_RECON",
    degraded: true,
    advisor: null,
    candidates: [{ tool: "nmap", rank: 0, priority: "high" }],
    timestamp: new Date("2026-03-01T10:00:00.000Z"),
    ...overrides,
  };
}

/**
 * A store whose backing database is gone: every call throws
 * StoreUnavailableError and ping() reports false.
 */
export class UnavailableStore implements AuditLogStore {
  private fail(): never {
    throw new StoreUnavailableError("Failed to reach audit database");
  }

  appendDecision(_record: NewDecisionRecord): DecisionRecord {
    return this.fail();
  }
  appendCommand(_record: NewCommandExecution): CommandExecution {
    return this.fail();
  }
  appendToolResult(_record: NewToolResult): ToolResult {
    return this.fail();
  }
  appendExecution(_command: NewCommandExecution, _result: NewToolResult): StoredExecution {
    return this.fail();
  }
  appendSessionReport(_report: NewSessionReport): SessionReportRecord {
    return this.fail();
  }
  queryDecisions(): DecisionRecord[] {
    return this.fail();
  }
  queryCommands(): CommandExecution[] {
    return this.fail();
  }
  queryToolResults(): ToolResult[] {
    return this.fail();
  }
  querySessionReports(): SessionReportRecord[] {
    return this.fail();
  }
  stats(): AuditStats {
    return this.fail();
  }
  ping(): boolean {
    return false;
  }
  close(): void {}
}
