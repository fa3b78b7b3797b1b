import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { HealthChecker, type HealthCheckOptions } from "../../src/infra/health-check.js";

// Zero thresholds keep host resources out of the overall status
const quietHost: HealthCheckOptions = {
  diskPath: tmpdir(),
  diskWarningThresholdGb: 0,
  diskCriticalThresholdGb: 0,
  memoryWarningThresholdMb: 0,
};

describe("HealthChecker", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should be healthy with no probes on a quiet host", async () => {
    const result = await new HealthChecker(quietHost).check();
    expect(result.healthy).toBe(true);
    expect(result.overallStatus).toBe("ok");
    expect(result.checks.store).toBeUndefined();
    expect(result.checks.tools).toBeUndefined();
    expect(result.checks.advisors).toEqual([]);
  });

  it("should report disk space for the data directory", () => {
    const disk = new HealthChecker(quietHost).checkDiskSpace();
    expect(disk.status).toBe("ok");
    expect(disk.path).toBe(tmpdir());
    expect(disk.availableGb).toBeGreaterThanOrEqual(0);
    expect(disk.usedPercent).toBeGreaterThanOrEqual(0);
    expect(disk.usedPercent).toBeLessThanOrEqual(100);
  });

  it("should mark a missing disk path unavailable", () => {
    const disk = new HealthChecker({
      ...quietHost,
      diskPath: join(tmpdir(), "no-such-dir-for-health-check", "x"),
    }).checkDiskSpace();
    expect(disk).toEqual({
      status: "unavailable",
      availableGb: 0,
      usedPercent: 0,
      path: join(tmpdir(), "no-such-dir-for-health-check", "x"),
    });
  });

  it("should flag memory below the threshold", () => {
    const memory = new HealthChecker({
      ...quietHost,
      memoryWarningThresholdMb: Number.MAX_SAFE_INTEGER,
    }).checkMemory();
    expect(memory.status).toBe("warning");
  });

  it("should be critical when the store ping fails or throws", async () => {
    const down = await new HealthChecker(quietHost, { store: () => false }).check();
    expect(down.checks.store).toEqual({ status: "critical" });
    expect(down.overallStatus).toBe("critical");

    const broken = await new HealthChecker(quietHost, {
      store: () => {
        throw new Error("database is locked");
      },
    }).check();
    expect(broken.checks.store).toEqual({ status: "critical", error: "database is locked" });
    expect(broken.healthy).toBe(false);
  });

  it("should warn only when a required tool is missing", async () => {
    const tools = async (): Promise<Array<{ name: string; installed: boolean }>> => [
      { name: "nmap", installed: true },
      { name: "zap", installed: false },
      { name: "hydra", installed: false },
    ];

    const optional = await new HealthChecker(quietHost, { tools }).check();
    expect(optional.checks.tools).toEqual({
      status: "ok",
      installed: ["nmap"],
      missing: ["zap", "hydra"],
      missingRequired: [],
    });
    expect(optional.overallStatus).toBe("ok");

    const required = await new HealthChecker({ ...quietHost, requiredTools: ["hydra"] }, { tools }).check();
    expect(required.checks.tools?.missingRequired).toEqual(["hydra"]);
    expect(required.overallStatus).toBe("warning");
  });

  it("should downgrade an unreachable advisor to a warning", async () => {
    const result = await new HealthChecker(quietHost, {
      advisors: [
        { name: "ollama", isAvailable: async () => true },
        { name: "claude-cli", isAvailable: async () => false },
        { name: "claude-sdk", isAvailable: () => Promise.reject(new Error("no API key")) },
      ],
    }).check();

    expect(result.checks.advisors.map(({ name, status }) => ({ name, status }))).toEqual([
      { name: "ollama", status: "ok" },
      { name: "claude-cli", status: "unavailable" },
      { name: "claude-sdk", status: "unavailable" },
    ]);
    expect(result.checks.advisors[2]?.error).toBe("no API key");
    expect(result.overallStatus).toBe("warning");
  });
});
