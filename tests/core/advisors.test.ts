import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createServer, type Server } from "node:http";
import { chmodSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CircuitBreakerRegistry } from "../../src/infra/circuit-breaker.js";
import { AdvisorUnavailableError } from "../../src/infra/errors.js";
import { AdvisorChain } from "../../src/core/advisor/advisor-chain.js";
import { createAdvisorChain } from "../../src/core/advisor/advisor-factory.js";
import { ClaudeCliAdvisor } from "../../src/core/advisor/claude-cli-advisor.js";
import { OllamaAdvisor } from "../../src/core/advisor/ollama-advisor.js";
import { extractFirstJsonObject, parseAdvice } from "../../src/core/advisor/parse-advice.js";
import { buildAdvicePrompt } from "../../src/core/advisor/prompts.js";
import type {
  AdviseOptions,
  Advisor,
  AdvisorAdvice,
  AdvisorContext,
} from "../../src/core/advisor/types.js";
import { AdvisorConfigSchema } from "../../src/types/config.js";

const context: AdvisorContext = {
  target: "scanme.example.com",
  agentRole: "Reconnaissance Specialist",
  state: "NEEDS_RECON",
  candidates: ["nmap", "nikto", "enum4linux"],
  completedTools: [],
  findingsCount: 0,
  vulnerabilitiesCount: 0,
};

const advice = (tool: string, overrides: Partial<AdvisorAdvice> = {}): AdvisorAdvice => ({
  tool,
  priority: "high",
  reasoning: `${tool} first`,
  ranking: [tool],
  ...overrides,
});

class FakeAdvisor implements Advisor {
  calls = 0;

  constructor(
    readonly name: string,
    private readonly reply: (options: AdviseOptions) => Promise<AdvisorAdvice | null>
  ) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  advise(_context: AdvisorContext, options: AdviseOptions): Promise<AdvisorAdvice | null> {
    this.calls++;
    return this.reply(options);
  }
}

function warnings(): string[] {
  return vi.mocked(console.warn).mock.calls.map((call) => String(call[0]));
}

function chain(advisors: Advisor[], failureThreshold = 3, timeoutMs = 1000): AdvisorChain {
  return new AdvisorChain(advisors, {
    timeoutMs,
    breakers: new CircuitBreakerRegistry({ failureThreshold }),
  });
}

describe("parseAdvice", () => {
  it("should drop thinking blocks and normalise the answer", () => {
    const reply =
      '<think>maybe {"tool": "nikto"}</think>\nAnswer: {"tool": " nmap ", "priority": "HIGH", "reasoning": "start with ports"}';
    expect(parseAdvice(reply)).toEqual({
      tool: "nmap",
      priority: "high",
      reasoning: "start with ports",
      ranking: ["nmap"],
    });
  });

  it("should drop an unterminated thinking block", () => {
    expect(parseAdvice('<think>{"tool": "nikto", "priority": "low"}')).toBeNull();
  });

  it("should keep braces that sit inside strings", () => {
    const reply =
      '{"tool": "nikto", "priority": "medium", "reasoning": "found } in banner", "ranking": ["nikto", "nmap"]} trailing';
    expect(parseAdvice(reply)).toEqual({
      tool: "nikto",
      priority: "medium",
      reasoning: "found } in banner",
      ranking: ["nikto", "nmap"],
    });
  });

  it("should default reasoning to an empty string", () => {
    expect(parseAdvice('{"tool": "nmap", "priority": "low"}')).toEqual({
      tool: "nmap",
      priority: "low",
      reasoning: "",
      ranking: ["nmap"],
    });
  });

  it("should reject replies without a valid answer", () => {
    expect(parseAdvice("run nmap first")).toBeNull();
    expect(parseAdvice('{"tool": nmap}')).toBeNull();
    expect(parseAdvice('{"tool": "nmap", "priority": "urgent"}')).toBeNull();
    expect(parseAdvice('{"priority": "high"}')).toBeNull();
    expect(parseAdvice('{"tool": "   ", "priority": "high"}')).toBeNull();
  });
});

describe("extractFirstJsonObject", () => {
  it("should return the first balanced object", () => {
    expect(extractFirstJsonObject('prefix {"a":{"b":1}} suffix {"c":2}')).toBe('{"a":{"b":1}}');
  });

  it("should handle escaped quotes inside strings", () => {
    expect(extractFirstJsonObject('{"a":"say \\"}\\" now"} x')).toBe('{"a":"say \\"}\\" now"}');
  });

  it("should return null without a complete object", () => {
    expect(extractFirstJsonObject('{"a":1')).toBeNull();
    expect(extractFirstJsonObject("no braces")).toBeNull();
  });
});

describe("buildAdvicePrompt", () => {
  it("should list candidates and completed tools", () => {
    const prompt = buildAdvicePrompt({ ...context, completedTools: ["nmap"], findingsCount: 3, vulnerabilitiesCount: 1 });
    expect(prompt).toContain("Candidate tools: nmap, nikto, enum4linux");
    expect(prompt).toContain("Tools already completed: nmap");
    expect(prompt).toContain("Findings so far: 3 (1 vulnerabilities)");
  });

  it("should say none when nothing has completed", () => {
    expect(buildAdvicePrompt(context)).toContain("Tools already completed: none");
  });
});

describe("AdvisorChain", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should answer with the first advisor that succeeds", async () => {
    const first = new FakeAdvisor("first", async () => advice("nikto"));
    const second = new FakeAdvisor("second", async () => advice("nmap"));

    const result = await chain([first, second]).advise(context);

    expect(result).toEqual({ advisor: "first", advice: advice("nikto") });
    expect(second.calls).toBe(0);
  });

  it("should fall through a failing advisor", async () => {
    const broken = new FakeAdvisor("broken", async () => {
      throw new AdvisorUnavailableError("connection refused", "broken");
    });
    const backup = new FakeAdvisor("backup", async () => advice("nmap"));

    const result = await chain([broken, backup]).advise(context);

    expect(result?.advisor).toBe("backup");
    expect(warnings()).toContainEqual(
      expect.stringContaining("Advisor broken gave no advice: connection refused")
    );
  });

  it("should treat an empty reply and a non-candidate tool as failures", async () => {
    const empty = new FakeAdvisor("empty", async () => null);
    const offList = new FakeAdvisor("off-list", async () => advice("sqlmap"));

    const result = await chain([empty, offList]).advise(context);

    expect(result).toBeNull();
    expect(warnings()).toContainEqual(
      expect.stringContaining("Advisor empty gave no advice: Reply held no valid advice")
    );
    expect(warnings()).toContainEqual(
      expect.stringContaining("Advisor off-list gave no advice: Suggested sqlmap, which is not a candidate")
    );
  });

  it("should skip an advisor whose circuit is open", async () => {
    const empty = new FakeAdvisor("empty", async () => null);
    const advisors = chain([empty], 1);

    expect(await advisors.advise(context)).toBeNull();
    expect(await advisors.advise(context)).toBeNull();

    expect(empty.calls).toBe(1);
    expect(warnings()).toContainEqual(
      expect.stringContaining("Circuit breaker open for advisor:empty")
    );
  });

  it("should move on when an advisor misses its deadline", async () => {
    let aborted = false;
    const slow = new FakeAdvisor(
      "slow",
      ({ signal }) =>
        new Promise((resolve) => {
          signal.addEventListener("abort", () => {
            aborted = true;
            resolve(null);
          });
        })
    );
    const fast = new FakeAdvisor("fast", async () => advice("enum4linux"));

    const result = await chain([slow, fast], 3, 20).advise(context);

    expect(result?.advisor).toBe("fast");
    expect(aborted).toBe(true);
    expect(warnings()).toContainEqual(
      expect.stringContaining("Advisor slow gave no advice: advisor:slow timed out after 20ms")
    );
  });

  it("should answer null with no advisors", async () => {
    const advisors = chain([]);
    expect(advisors.size).toBe(0);
    expect(await advisors.advise(context)).toBeNull();
  });
});

describe("createAdvisorChain", () => {
  it("should build advisors in configured order without duplicates", () => {
    const config = AdvisorConfigSchema.parse({
      chain: ["claude-cli", "ollama", "claude-cli", "claude-sdk"],
    });
    const advisors = createAdvisorChain(config, new CircuitBreakerRegistry());
    expect(advisors.names).toEqual(["claude-cli", "ollama", "claude-sdk"]);
  });

  it("should build an empty chain for an empty list", () => {
    const advisors = createAdvisorChain(AdvisorConfigSchema.parse({ chain: [] }), new CircuitBreakerRegistry());
    expect(advisors.size).toBe(0);
  });
});

describe("ClaudeCliAdvisor", () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), "pentest-orch-cli-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function fakeCli(body: string): string {
    const path = join(dir, "fake-claude");
    writeFileSync(path, `#!/bin/sh\n${body}\n`);
    chmodSync(path, 0o755);
    return path;
  }

  const options = (): AdviseOptions => ({ timeoutMs: 5000, signal: new AbortController().signal });

  it("should report available when --version names claude", async () => {
    const cliPath = fakeCli('echo "1.0.0 (claude)"');
    const advisor = new ClaudeCliAdvisor({ cliPath });
    expect(await advisor.isAvailable()).toBe(true);
  });

  it("should report unavailable when the binary is missing", async () => {
    const advisor = new ClaudeCliAdvisor({ cliPath: join(dir, "missing-claude") });
    expect(await advisor.isAvailable()).toBe(false);
  });

  it("should parse the printed reply", async () => {
    const cliPath = fakeCli(
      `echo '{"tool": "nikto", "priority": "Medium", "reasoning": "web server on 80"}'`
    );
    const advisor = new ClaudeCliAdvisor({ cliPath });

    expect(await advisor.advise(context, options())).toEqual({
      tool: "nikto",
      priority: "medium",
      reasoning: "web server on 80",
      ranking: ["nikto"],
    });
  });

  it("should fail on a non-zero exit", async () => {
    const cliPath = fakeCli('echo "not logged in" >&2\nexit 3');
    const advisor = new ClaudeCliAdvisor({ cliPath });

    await expect(advisor.advise(context, options())).rejects.toThrow(
      "Claude CLI exited with code 3: not logged in"
    );
  });
});

describe("OllamaAdvisor", () => {
  let server: Server;
  let baseUrl: string;
  let requests: Array<{ url: string; body: string }>;
  let replyContent: string;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    requests = [];
    replyContent = '{"tool": "enum4linux", "priority": "low", "reasoning": "smb is open"}';
    server = createServer((req, res) => {
      let body = "";
      req.on("data", (chunk: Buffer) => {
        body += chunk.toString();
      });
      req.on("end", () => {
        requests.push({ url: req.url ?? "", body });
        res.setHeader("content-type", "application/json");
        if (req.url === "/v1/models") {
          res.end(JSON.stringify({ object: "list", data: [] }));
          return;
        }
        res.end(
          JSON.stringify({
            id: "chatcmpl-test",
            object: "chat.completion",
            created: 0,
            model: "test-model",
            choices: [
              {
                index: 0,
                message: { role: "assistant", content: replyContent },
                finish_reason: "stop",
              },
            ],
          })
        );
      });
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("test server has no port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    vi.restoreAllMocks();
  });

  const advisor = (): OllamaAdvisor =>
    new OllamaAdvisor({ baseUrl: `${baseUrl}/`, model: "test-model", temperature: 0.2 });

  it("should be available when the model list answers", async () => {
    expect(await advisor().isAvailable()).toBe(true);
    expect(requests[0]?.url).toBe("/v1/models");
  });

  it("should send the prompt and parse the completion", async () => {
    const result = await advisor().advise(context, {
      timeoutMs: 5000,
      signal: new AbortController().signal,
    });

    expect(result).toEqual({
      tool: "enum4linux",
      priority: "low",
      reasoning: "smb is open",
      ranking: ["enum4linux"],
    });
    expect(requests[0]?.url).toBe("/v1/chat/completions");
    const sent: unknown = JSON.parse(requests[0]?.body ?? "{}");
    expect(sent).toMatchObject({ model: "test-model", temperature: 0.2 });
  });

  it("should answer null for a reply without JSON", async () => {
    replyContent = "I would run nmap.";
    const result = await advisor().advise(context, {
      timeoutMs: 5000,
      signal: new AbortController().signal,
    });
    expect(result).toBeNull();
  });

  it("should be unavailable when nothing listens", async () => {
    const closed = new OllamaAdvisor({
      baseUrl: "http://127.0.0.1:1",
      model: "test-model",
      temperature: 0.2,
    });
    expect(await closed.isAvailable()).toBe(false);
  });
});
