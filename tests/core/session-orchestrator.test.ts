import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SessionError, ValidationError } from "../../src/infra/errors.js";
import { createOrchestratorContext, type OrchestratorContext } from "../../src/core/context.js";
import { SqliteAuditStore } from "../../src/core/audit/sqlite-audit-store.js";
import type { AuditLogStore } from "../../src/core/audit/audit-store.js";
import { resolvePhaseName } from "../../src/core/engine/session-orchestrator.js";
import { PentestSession, createSessionId } from "../../src/core/engine/session.js";
import { getScopeProfile } from "../../src/core/engine/scopes.js";
import { createDefaultRegistry } from "../../src/core/tools/registry.js";
import { ConfigSchema, type Config } from "../../src/types/config.js";
import type { StoredExecution } from "../../src/types/audit.js";
import { makeResult, UnavailableStore } from "./helpers.js";

const TARGET = "scanme.example.com";

/** Every built-in tool pointed at a binary that does not exist, so runs are simulated */
function testConfig(dataDir: string): Config {
  const binaries = Object.fromEntries(
    createDefaultRegistry({ binaries: {} })
      .names()
      .map((name) => [name, `missing-${name}-xyz`])
  );
  return ConfigSchema.parse({
    dataDir,
    advisor: { chain: [] },
    safety: { denyList: [] },
    tools: { binaries },
  });
}

class FailingExecutionStore extends SqliteAuditStore {
  override appendExecution(): StoredExecution {
    throw new Error("disk full");
  }
}

describe("resolvePhaseName", () => {
  it("should accept aliases in any case", () => {
    expect(resolvePhaseName("Recon")).toBe("RECON");
    expect(resolvePhaseName("vulnerability-assessment")).toBe("VULN_ASSESSMENT");
    expect(resolvePhaseName(" Exploit ")).toBe("EXPLOITATION");
    expect(resolvePhaseName("REPORTING")).toBe("REPORTING");
  });

  it("should reject unknown phases", () => {
    expect(() => resolvePhaseName("pivot")).toThrow(
      'Unknown phase "pivot". Expected one of: RECON, VULN_ASSESSMENT, EXPLOITATION, REPORTING'
    );
  });
});

describe("getScopeProfile", () => {
  it("should describe each scope", () => {
    expect(getScopeProfile("quick")).toEqual({
      scope: "quick",
      phases: ["RECON", "VULN_ASSESSMENT", "REPORTING"],
      maxStepsPerPhase: 1,
    });
    expect(getScopeProfile("comprehensive").maxStepsPerPhase).toBeNull();
  });

  it("should reject an unknown scope", () => {
    expect(() => getScopeProfile("deep")).toThrow(
      'Unknown scope "deep". Expected one of: quick, basic, comprehensive'
    );
  });
});

describe("PentestSession", () => {
  it("should generate timestamped session ids", () => {
    const id = createSessionId(new Date("2026-03-01T10:00:00.000Z"));
    expect(id).toMatch(/^pt-1772359200000-[0-9a-f]{8}$/);
    expect(new PentestSession(TARGET, "basic", ["RECON"]).id).toMatch(/^pt-\d+-[0-9a-f]{8}$/);
  });

  it("should start running with no phase", () => {
    const session = new PentestSession(TARGET, "basic", ["RECON"], "s-1");
    expect(session.snapshot()).toMatchObject({
      id: "s-1",
      status: "running",
      currentPhase: null,
      completedAt: null,
      error: null,
    });
  });

  it("should keep a completed session completed", () => {
    const session = new PentestSession(TARGET, "basic", ["RECON"]);
    session.enterPhase("RECON");
    session.complete();

    expect(session.isTerminal()).toBe(true);
    expect(() => session.fail("late")).toThrow(SessionError);
    expect(() => session.enterPhase("RECON")).toThrow("Cannot enter RECON: session is completed");
    expect(session.snapshot().status).toBe("completed");
    expect(session.snapshot().error).toBeNull();
  });

  it("should record the error of a failed session", () => {
    const session = new PentestSession(TARGET, "quick", ["RECON"]);
    session.fail("boom");

    expect(session.snapshot()).toMatchObject({ status: "error", error: "boom" });
    expect(session.snapshot().completedAt).toBeInstanceOf(Date);
    expect(() => session.complete()).toThrow("Invalid transition: error → completed. Valid targets: none");
  });
});

describe("SessionOrchestrator", () => {
  let dataDir: string;
  let context: OrchestratorContext;

  function open(store?: AuditLogStore): OrchestratorContext {
    return createOrchestratorContext(testConfig(dataDir), store ? { store } : {});
  }

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    dataDir = mkdtempSync(join(tmpdir(), "pentest-orch-session-"));
    context = open();
  });

  afterEach(async () => {
    await context.close();
    rmSync(dataDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe("executeFull", () => {
    it("should run one tool per phase for the basic scope", async () => {
      const summary = await context.orchestrator.executeFull(TARGET, "basic");

      expect(summary.status).toBe("completed");
      expect(summary.scope).toBe("basic");
      expect(summary.target).toBe(TARGET);
      expect(summary.toolsRun).toEqual(["nmap", "sqlmap", "metasploit"]);
      expect(summary.phases.map((phase) => [phase.phase, phase.outcome, phase.toolsRun])).toEqual([
        ["RECON", "completed", ["nmap"]],
        ["VULN_ASSESSMENT", "completed", ["sqlmap"]],
        ["EXPLOITATION", "completed", ["metasploit"]],
        ["REPORTING", "completed", []],
      ]);
      expect(summary.decisionsCount).toBe(3);
      expect(summary.commandsCount).toBe(3);
      expect(summary.simulatedRuns).toBe(3);
      expect(summary.failedRuns).toBe(0);
      expect(summary.error).toBeNull();
    });

    it("should count findings the same way per phase and per session", async () => {
      const summary = await context.orchestrator.executeFull(TARGET, "basic");

      const phaseFindings = summary.phases.reduce((sum, phase) => sum + phase.findingsCount, 0);
      const phaseVulns = summary.phases.reduce((sum, phase) => sum + phase.vulnerabilitiesCount, 0);
      expect(summary.findingsCount).toBe(phaseFindings);
      expect(summary.vulnerabilitiesCount).toBe(phaseVulns);
      expect(summary.findings).toHaveLength(summary.findingsCount);
      expect(summary.findings.filter((finding) => finding.type === "open_ports")).toHaveLength(3);
    });

    it("should leave out exploitation for the quick scope", async () => {
      const summary = await context.orchestrator.executeFull(TARGET, "quick");

      expect(summary.toolsRun).toEqual(["nmap", "sqlmap"]);
      expect(summary.phases.find((phase) => phase.phase === "EXPLOITATION")?.outcome).toBe("skipped");
    });

    it("should run every tool once for the comprehensive scope", async () => {
      const summary = await context.orchestrator.executeFull(TARGET, "comprehensive");

      expect(summary.phases.map((phase) => phase.toolsRun)).toEqual([
        ["nmap", "nikto", "enum4linux"],
        ["sqlmap", "zap", "nuclei"],
        ["metasploit", "hydra", "john"],
        [],
      ]);
      expect(summary.toolsRun).toHaveLength(9);
      // The vulnerability phase asks once more and is told it is saturated
      expect(summary.decisionsCount).toBe(10);
    });

    it("should use the configured default scope", async () => {
      const summary = await context.orchestrator.executeFull(TARGET);
      expect(summary.scope).toBe("basic");
    });

    it("should persist a report readable after the run", async () => {
      const summary = await context.orchestrator.executeFull(TARGET, "quick");

      const reread = context.orchestrator.getSessionSummary(summary.sessionId);
      expect(reread).toMatchObject({
        sessionId: summary.sessionId,
        target: TARGET,
        scope: "quick",
        status: "completed",
        toolsRun: ["nmap", "sqlmap"],
      });
      expect(reread.phases).toEqual(summary.phases);
      expect(context.store.querySessionReports()).toHaveLength(1);
    });

    it("should list recent sessions newest first", async () => {
      const first = await context.orchestrator.executeFull(TARGET, "quick");
      const second = await context.orchestrator.executeFull("other.example.com", "quick");

      const ids = context.orchestrator.getRecentSessions(5).map((summary) => summary.sessionId);
      expect(ids).toHaveLength(2);
      expect(new Set(ids)).toEqual(new Set([first.sessionId, second.sessionId]));
      expect(context.orchestrator.getRecentSessions(1)).toHaveLength(1);
    });

    it("should reject an empty target", async () => {
      await expect(context.orchestrator.executeFull("   ")).rejects.toThrow(ValidationError);
    });

    it("should reject an unknown scope", async () => {
      await expect(context.orchestrator.executeFull(TARGET, "deep")).rejects.toThrow(
        'Unknown scope "deep"'
      );
    });

    it("should stop at the first failing phase", async () => {
      await context.close();
      const store = new FailingExecutionStore(dataDir);
      context = open(store);

      const summary = await context.orchestrator.executeFull(TARGET, "basic");

      expect(summary.status).toBe("error");
      expect(summary.error).toBe("disk full");
      expect(summary.phases).toEqual([
        {
          phase: "RECON",
          outcome: "error",
          toolsRun: [],
          findingsCount: 0,
          vulnerabilitiesCount: 0,
        },
      ]);
      expect(summary.decisionsCount).toBe(1);
      expect(context.orchestrator.getSessionSummary(summary.sessionId).status).toBe("error");
    });

    it("should finish from memory when the store is down", async () => {
      await context.close();
      context = open(new UnavailableStore());

      const summary = await context.orchestrator.executeFull(TARGET, "basic");

      expect(summary.status).toBe("completed");
      expect(summary.toolsRun).toEqual(["nmap", "sqlmap", "metasploit"]);
      expect(summary.decisionsCount).toBe(3);
      expect(summary.commandsCount).toBe(3);
    });
  });

  describe("executePhase", () => {
    it("should run the role's tools for one phase", async () => {
      const result = await context.orchestrator.executePhase(TARGET, "Reconnaissance Specialist", "recon", "s-phase");

      expect(result).toMatchObject({
        phase: "RECON",
        agentRole: "Reconnaissance Specialist",
        sessionId: "s-phase",
        outcome: "completed",
        toolsRun: ["nmap", "nikto", "enum4linux"],
        skipReason: null,
        error: null,
      });
      expect(context.store.queryToolResults({ sessionId: "s-phase" })).toHaveLength(3);
    });

    it("should skip a saturated role", async () => {
      for (const toolName of ["nmap", "nikto", "enum4linux"]) {
        context.store.appendToolResult(makeResult({ toolName, sessionId: "s-done" }));
      }

      const result = await context.orchestrator.executePhase(TARGET, "Reconnaissance Specialist", "RECON", "s-done");

      expect(result.outcome).toBe("skipped");
      expect(result.toolsRun).toEqual([]);
      expect(result.skipReason).toBe(
        "SATURATED: Reconnaissance Specialist has tried nmap, nikto, enum4linux against scanme.example.com; no further actions"
      );
      expect(result.steps).toHaveLength(1);
      expect(result.steps[0]?.result).toBeNull();
    });

    it("should run a saturated role when forced", async () => {
      for (const toolName of ["nmap", "nikto", "enum4linux"]) {
        context.store.appendToolResult(makeResult({ toolName, sessionId: "s-force" }));
      }

      const result = await context.orchestrator.executePhase(
        TARGET,
        "Reconnaissance Specialist",
        "recon",
        "s-force",
        { force: true, maxSteps: 1 }
      );

      expect(result.outcome).toBe("completed");
      expect(result.toolsRun).toEqual(["nmap"]);
      expect(result.steps[0]?.decision.tool).toBe("nmap");

      const decisions = context.store.queryDecisions({ sessionId: "s-force" });
      expect(decisions.map((record) => [record.recommendedTool, record.priority])).toEqual([
        ["nmap", "low"],
        [null, "low"],
      ]);
      expect(decisions[0]?.reasoning).toBe("FORCED: nmap for Reconnaissance Specialist despite SATURATED");
      expect(result.steps[0]?.decision.recordId).toBe(decisions[0]?.id);
      const [command] = context.store.queryCommands({ sessionId: "s-force" });
      expect(command?.context.tool).toBe("nmap");
    });

    it("should complete reporting without running a tool", async () => {
      const result = await context.orchestrator.executePhase(TARGET, "Security Report Analyst", "report");

      expect(result.outcome).toBe("completed");
      expect(result.steps).toEqual([]);
      expect(context.store.queryCommands()).toHaveLength(0);
    });

    it("should reject an unknown role", async () => {
      await expect(context.orchestrator.executePhase(TARGET, "Social Engineer", "recon")).rejects.toThrow(
        'Unknown agent role "Social Engineer"'
      );
    });

    it("should reject an unknown phase", async () => {
      await expect(
        context.orchestrator.executePhase(TARGET, "Reconnaissance Specialist", "pivot")
      ).rejects.toThrow('Unknown phase "pivot"');
    });
  });

  describe("reads", () => {
    it("should summarise an unknown session as empty", () => {
      expect(context.orchestrator.getSessionSummary("missing")).toMatchObject({
        sessionId: "missing",
        target: null,
        scope: null,
        status: "unknown",
        toolsRun: [],
        decisionsCount: 0,
      });
    });

    it("should expose decisions and commands with filters", async () => {
      await context.orchestrator.executeFull(TARGET, "quick");

      expect(context.orchestrator.getAgentActions({ agentRole: "Reconnaissance Specialist" })).toHaveLength(1);
      expect(context.orchestrator.getCommandExecutions({ target: TARGET })).toHaveLength(2);
      expect(context.orchestrator.getDatabaseStats().collections.tool_results).toBe(2);
    });

    it("should list roles and tools", () => {
      expect(context.orchestrator.listAgents().map((role) => role.phase)).toEqual([
        "RECON",
        "VULN_ASSESSMENT",
        "EXPLOITATION",
        "REPORTING",
      ]);
      expect(context.orchestrator.listTools()).toHaveLength(12);
      expect(context.orchestrator.listTools().every((tool) => !tool.installed)).toBe(true);
    });

    it("should have no active sessions once runs finish", async () => {
      await context.orchestrator.executeFull(TARGET, "quick");
      expect(context.orchestrator.getActiveSessions()).toEqual([]);
    });
  });
});

describe("createOrchestratorContext", () => {
  let dataDir: string;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    dataDir = mkdtempSync(join(tmpdir(), "pentest-orch-context-"));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("should open the store under the data directory and close it once", async () => {
    const context = createOrchestratorContext(testConfig(dataDir));

    expect(context.dataDir).toBe(dataDir);
    expect(context.store.ping()).toBe(true);
    expect(context.advisors.size).toBe(0);

    await context.close();
    await context.close();
    expect(context.store.ping()).toBe(false);
  });

  it("should use the store it is given", async () => {
    const store = new UnavailableStore();
    const context = createOrchestratorContext(testConfig(dataDir), { store });

    expect(context.store).toBe(store);
    await context.close();
  });
});
