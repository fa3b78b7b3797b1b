import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import {
  deepMerge,
  envOverrides,
  expandPath,
  getConfigPath,
  loadConfig,
  saveConfig,
} from "../../src/cli/config/loader.js";
import { ConfigurationError } from "../../src/infra/errors.js";

describe("config loader", () => {
  let dataDir: string;
  let env: Record<string, string | undefined>;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    dataDir = mkdtempSync(join(tmpdir(), "pentest-config-"));
    env = { PENTEST_ORCH_DATA_DIR: dataDir };
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("should expand a leading tilde", () => {
    expect(expandPath("~/.pentest-orchestrator")).toBe(join(homedir(), ".pentest-orchestrator"));
    expect(expandPath("/var/lib/pentest")).toBe("/var/lib/pentest");
  });

  it("should put config.json under the data directory", () => {
    expect(getConfigPath(env)).toBe(join(dataDir, "config.json"));
  });

  it("should replace arrays and merge objects", () => {
    expect(
      deepMerge(
        { safety: { policy: "warn", denyList: ["localhost", "10.0.0.0/8"] }, verbose: false },
        { safety: { denyList: ["example.org"] } }
      )
    ).toEqual({ safety: { policy: "warn", denyList: ["example.org"] }, verbose: false });
  });

  it("should map environment variables to overrides", () => {
    expect(
      envOverrides({
        PENTEST_ORCH_VERBOSE: "1",
        PENTEST_ORCH_SAFETY_POLICY: "block",
        OLLAMA_MODEL: "llama3.2",
      })
    ).toEqual({
      verbose: true,
      safety: { policy: "block" },
      advisor: { ollama: { model: "llama3.2" } },
    });
    expect(envOverrides({ PENTEST_ORCH_VERBOSE: "yes" })).toEqual({});
  });

  it("should return defaults without a config file", () => {
    const config = loadConfig(env);
    expect(config.dataDir).toBe(dataDir);
    expect(config.safety.policy).toBe("warn");
  });

  it("should let the environment win over the file", () => {
    writeFileSync(
      join(dataDir, "config.json"),
      JSON.stringify({ safety: { policy: "warn" }, sessions: { maxConcurrent: 2 } })
    );
    const config = loadConfig({ ...env, PENTEST_ORCH_SAFETY_POLICY: "block" });
    expect(config.safety.policy).toBe("block");
    expect(config.sessions.maxConcurrent).toBe(2);
  });

  it("should reject an invalid value with its path", () => {
    writeFileSync(join(dataDir, "config.json"), JSON.stringify({ sessions: { maxConcurrent: 0 } }));
    expect(() => loadConfig(env)).toThrow(ConfigurationError);
    expect(() => loadConfig(env)).toThrow(/^Invalid configuration: sessions\.maxConcurrent: /);
  });

  it("should reject a file that is not JSON", () => {
    writeFileSync(join(dataDir, "config.json"), "{ not json");
    expect(() => loadConfig(env)).toThrow(`Failed to parse config file: ${join(dataDir, "config.json")}`);
  });

  it("should reject a JSON file that is not an object", () => {
    writeFileSync(join(dataDir, "config.json"), "[1, 2]");
    expect(() => loadConfig(env)).toThrow("Config file must hold a JSON object");
  });

  it("should save merged changes and refuse invalid ones", () => {
    saveConfig({ safety: { policy: "block" } }, env);
    saveConfig({ sessions: { maxConcurrent: 5 } }, env);
    expect(JSON.parse(readFileSync(join(dataDir, "config.json"), "utf-8"))).toEqual({
      safety: { policy: "block" },
      sessions: { maxConcurrent: 5 },
    });

    expect(() => saveConfig({ safety: { policy: "ignore" } }, env)).toThrow(ConfigurationError);
    expect(loadConfig(env).safety.policy).toBe("block");
  });

  it("should create the data directory on save", () => {
    const nested = join(dataDir, "nested");
    saveConfig({ verbose: true }, { PENTEST_ORCH_DATA_DIR: nested });
    expect(existsSync(join(nested, "config.json"))).toBe(true);
  });
});
