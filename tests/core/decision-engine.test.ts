import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CircuitBreakerRegistry } from "../../src/infra/circuit-breaker.js";
import { ValidationError } from "../../src/infra/errors.js";
import { AdvisorChain } from "../../src/core/advisor/advisor-chain.js";
import type { Advisor, AdvisorAdvice, AdvisorContext } from "../../src/core/advisor/types.js";
import {
  TaskDecisionEngine,
  deriveState,
  rankByPosition,
} from "../../src/core/engine/decision-engine.js";
import { StateAggregator } from "../../src/core/state/state-aggregator.js";
import type { AuditLogStore } from "../../src/core/audit/audit-store.js";
import { createTempStore, makeResult, UnavailableStore } from "./helpers.js";

const TARGET = "scanme.example.com";
const RECON = "Reconnaissance Specialist";

class ScriptedAdvisor implements Advisor {
  readonly name = "scripted";
  contexts: AdvisorContext[] = [];

  constructor(private readonly reply: AdvisorAdvice | null) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async advise(context: AdvisorContext): Promise<AdvisorAdvice | null> {
    this.contexts.push(context);
    return this.reply;
  }
}

function engineFor(store: AuditLogStore, advisor?: Advisor): TaskDecisionEngine {
  const advisors = advisor
    ? new AdvisorChain([advisor], { timeoutMs: 1000, breakers: new CircuitBreakerRegistry() })
    : null;
  return new TaskDecisionEngine(store, new StateAggregator(store), advisors);
}

describe("deriveState", () => {
  it("should follow phase completion", () => {
    expect(deriveState(new Set())).toBe("NEEDS_RECON");
    expect(deriveState(new Set(["nmap"]))).toBe("NEEDS_VULN_SCAN");
    expect(deriveState(new Set(["nmap", "sqlmap"]))).toBe("NEEDS_EXPLOIT_CHECK");
    expect(deriveState(new Set(["nmap", "sqlmap", "john"]))).toBe("SATURATED");
  });

  it("should count a tool shared by two phases for both", () => {
    expect(deriveState(new Set(["nikto"]))).toBe("NEEDS_EXPLOIT_CHECK");
  });
});

describe("rankByPosition", () => {
  it("should rank the first candidate high and the rest medium", () => {
    expect(rankByPosition(["sqlmap", "zap"])).toEqual([
      { tool: "sqlmap", rank: 0, priority: "high" },
      { tool: "zap", rank: 1, priority: "medium" },
    ]);
  });
});

describe("TaskDecisionEngine", () => {
  let env: ReturnType<typeof createTempStore>;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    env = createTempStore();
  });

  afterEach(() => {
    env.cleanup();
    vi.restoreAllMocks();
  });

  describe("decideNextTask without advisors", () => {
    it("should start reconnaissance with nmap", async () => {
      const decision = await engineFor(env.store).decideNextTask(TARGET, RECON);

      expect(decision).toMatchObject({
        tool: "nmap",
        agentRole: RECON,
        target: TARGET,
        priority: "high",
        state: "NEEDS_RECON",
        degraded: true,
        advisor: null,
        sessionId: null,
        reasoning:
          "NEEDS_RECON: nmap is the first untried RECON tool for Reconnaissance Specialist; then nikto, enum4linux",
      });
      expect(decision.candidates).toEqual([
        { tool: "nmap", rank: 0, priority: "high" },
        { tool: "nikto", rank: 1, priority: "medium" },
        { tool: "enum4linux", rank: 2, priority: "medium" },
      ]);
    });

    it("should not screen loopback targets when deciding", async () => {
      const decision = await engineFor(env.store).decideNextTask("127.0.0.1", RECON);

      expect(decision.tool).toBe("nmap");
      expect(decision.priority).toBe("high");
    });

    it("should record every decision", async () => {
      const decision = await engineFor(env.store).decideNextTask(TARGET, RECON);

      const records = env.store.queryDecisions();
      expect(records).toHaveLength(1);
      expect(records[0]?.id).toBe(decision.recordId);
      expect(records[0]?.recommendedTool).toBe("nmap");
      expect(records[0]?.degraded).toBe(true);
    });

    it("should skip tools that already succeeded", async () => {
      env.store.appendToolResult(makeResult({ toolName: "nmap" }));

      const decision = await engineFor(env.store).decideNextTask(TARGET, RECON);

      expect(decision.tool).toBe("nikto");
      expect(decision.state).toBe("NEEDS_VULN_SCAN");
      expect(decision.reasoning).toBe(
        "NEEDS_VULN_SCAN: nikto is the first untried RECON tool for Reconnaissance Specialist; then enum4linux"
      );
    });

    it("should retry tools whose runs failed", async () => {
      env.store.appendToolResult(makeResult({ toolName: "nmap", success: false, exitCode: 1 }));

      const decision = await engineFor(env.store).decideNextTask(TARGET, RECON);

      expect(decision.tool).toBe("nmap");
    });

    it("should leave out excluded tools", async () => {
      const decision = await engineFor(env.store).decideNextTask(TARGET, RECON, undefined, {
        exclude: ["nmap"],
      });

      expect(decision.tool).toBe("nikto");
      expect(decision.state).toBe("NEEDS_RECON");
    });

    it("should report saturation once every tool has run", async () => {
      for (const toolName of ["nmap", "nikto", "enum4linux"]) {
        env.store.appendToolResult(makeResult({ toolName }));
      }

      const decision = await engineFor(env.store).decideNextTask(TARGET, RECON);

      expect(decision).toMatchObject({
        tool: null,
        priority: "low",
        state: "SATURATED",
        candidates: [],
        reasoning:
          "SATURATED: Reconnaissance Specialist has tried nmap, nikto, enum4linux against scanme.example.com; no further actions",
      });
    });

    it("should saturate the report analyst straight away", async () => {
      const decision = await engineFor(env.store).decideNextTask(TARGET, "Security Report Analyst");

      expect(decision.tool).toBeNull();
      expect(decision.reasoning).toBe(
        "SATURATED: Security Report Analyst runs no tools; no further actions"
      );
    });

    it("should narrow history to the given session", async () => {
      env.store.appendToolResult(makeResult({ toolName: "nmap", sessionId: "s1" }));
      const engine = engineFor(env.store);

      const other = await engine.decideNextTask(TARGET, RECON, "s2");
      const same = await engine.decideNextTask(TARGET, RECON, "s1");

      expect(other.tool).toBe("nmap");
      expect(other.sessionId).toBe("s2");
      expect(same.tool).toBe("nikto");
    });

    it("should give the same answer for the same history", async () => {
      env.store.appendToolResult(makeResult({ toolName: "sqlmap" }));
      const engine = engineFor(env.store);

      const first = await engine.decideNextTask(TARGET, "Vulnerability Assessment Expert");
      const second = await engine.decideNextTask(TARGET, "Vulnerability Assessment Expert");

      expect(second.tool).toBe(first.tool);
      expect(second.reasoning).toBe(first.reasoning);
      expect(second.candidates).toEqual(first.candidates);
      expect(first.tool).toBe("zap");
    });

    it("should reject an unknown role", async () => {
      await expect(engineFor(env.store).decideNextTask(TARGET, "Social Engineer")).rejects.toThrow(
        ValidationError
      );
    });

    it("should reject an empty target", async () => {
      await expect(engineFor(env.store).decideNextTask("  ", RECON)).rejects.toThrow(
        "Target must not be empty"
      );
    });

    it("should still decide when the store is down", async () => {
      const decision = await engineFor(new UnavailableStore()).decideNextTask(TARGET, RECON);

      expect(decision.tool).toBe("nmap");
      expect(decision.recordId).toBeNull();
      expect(decision.reasoning).toBe(
        "NEEDS_RECON: nmap is the first untried RECON tool for Reconnaissance Specialist; then nikto, enum4linux (history unavailable)"
      );
    });
  });

  describe("decideNextTask with advisors", () => {
    it("should follow the advisor's ranking", async () => {
      const advisor = new ScriptedAdvisor({
        tool: "nikto",
        priority: "medium",
        reasoning: "port 80 looks interesting",
        ranking: ["enum4linux"],
      });

      const decision = await engineFor(env.store, advisor).decideNextTask(TARGET, RECON);

      expect(decision).toMatchObject({
        tool: "nikto",
        priority: "medium",
        degraded: false,
        advisor: "scripted",
        reasoning: "port 80 looks interesting",
      });
      expect(decision.candidates).toEqual([
        { tool: "nikto", rank: 0, priority: "medium" },
        { tool: "enum4linux", rank: 1, priority: "medium" },
        { tool: "nmap", rank: 2, priority: "medium" },
      ]);
      expect(env.store.queryDecisions()[0]?.advisor).toBe("scripted");
    });

    it("should not rank followers above a low-priority pick", async () => {
      const advisor = new ScriptedAdvisor({ tool: "enum4linux", priority: "low", reasoning: "", ranking: [] });

      const decision = await engineFor(env.store, advisor).decideNextTask(TARGET, RECON);

      expect(decision.priority).toBe("low");
      expect(decision.candidates).toEqual([
        { tool: "enum4linux", rank: 0, priority: "low" },
        { tool: "nmap", rank: 1, priority: "low" },
        { tool: "nikto", rank: 2, priority: "low" },
      ]);
    });

    it("should pass the remaining candidates to the advisor", async () => {
      env.store.appendToolResult(makeResult({ toolName: "nmap" }));
      const advisor = new ScriptedAdvisor({ tool: "enum4linux", priority: "high", reasoning: "", ranking: [] });

      const decision = await engineFor(env.store, advisor).decideNextTask(TARGET, RECON);

      expect(advisor.contexts[0]).toMatchObject({
        candidates: ["nikto", "enum4linux"],
        completedTools: ["nmap"],
        state: "NEEDS_VULN_SCAN",
      });
      expect(decision.reasoning).toBe("scripted recommended enum4linux");
    });

    it("should fall back to the fixed order when the advisor fails", async () => {
      const decision = await engineFor(env.store, new ScriptedAdvisor(null)).decideNextTask(TARGET, RECON);

      expect(decision.tool).toBe("nmap");
      expect(decision.degraded).toBe(true);
      expect(decision.advisor).toBeNull();
    });

    it("should not ask the advisor when nothing is left", async () => {
      const advisor = new ScriptedAdvisor(null);

      await engineFor(env.store, advisor).decideNextTask(TARGET, "Security Report Analyst");

      expect(advisor.contexts).toHaveLength(0);
    });
  });

  describe("analyzeCurrentState", () => {
    it("should summarise progress and recommend per role", () => {
      env.store.appendToolResult(
        makeResult({
          toolName: "nmap",
          storedAt: new Date("2026-03-01T10:00:00.000Z"),
          metadata: { simulation_mode: false, open_ports: [{ port: 22 }, { port: 80 }] },
        })
      );
      env.store.appendToolResult(
        makeResult({ toolName: "sqlmap", storedAt: new Date("2026-03-01T10:05:00.000Z") })
      );

      const analysis = engineFor(env.store).analyzeCurrentState(TARGET);

      expect(analysis).toEqual({
        target: TARGET,
        state: "NEEDS_EXPLOIT_CHECK",
        completedTools: ["nmap", "sqlmap"],
        toolRuns: 2,
        findingsCount: 2,
        vulnerabilitiesCount: 0,
        completionPercentage: 20,
        recommendations: [
          { agentRole: "Reconnaissance Specialist", tool: "nikto", priority: "high" },
          { agentRole: "Vulnerability Assessment Expert", tool: "zap", priority: "high" },
          { agentRole: "Exploitation Specialist", tool: "metasploit", priority: "high" },
          { agentRole: "Security Report Analyst", tool: null, priority: "low" },
        ],
        degraded: false,
      });
      expect(env.store.queryDecisions()).toHaveLength(0);
    });

    it("should cap completion at 100", () => {
      const tools = ["nmap", "nikto", "enum4linux", "sqlmap", "zap", "nuclei", "metasploit", "hydra", "john", "gobuster", "dirb"];
      for (const toolName of tools) {
        env.store.appendToolResult(makeResult({ toolName }));
      }

      expect(engineFor(env.store).analyzeCurrentState(TARGET).completionPercentage).toBe(100);
    });

    it("should mark the analysis degraded when the store is down", () => {
      const analysis = engineFor(new UnavailableStore()).analyzeCurrentState(TARGET);

      expect(analysis.degraded).toBe(true);
      expect(analysis.state).toBe("NEEDS_RECON");
      expect(analysis.toolRuns).toBe(0);
    });
  });
});
