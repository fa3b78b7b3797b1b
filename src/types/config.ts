import { z } from "zod";

export const AdvisorNameSchema = z.enum(["ollama", "claude-sdk", "claude-cli"]);

export const AdvisorConfigSchema = z.object({
  // Advisors tried in order until one answers; empty list = rule-based decisions only
  chain: z.array(AdvisorNameSchema).default(["ollama"]),
  // Per-advisor response budget (ms)
  timeoutMs: z.number().int().positive().default(30000),
  ollama: z
    .object({
      baseUrl: z.string().url().default("http://localhost:11434"),
      model: z.string().default("deepseek-r1:1.5b"),
      temperature: z.number().min(0).max(2).default(0.2),
    })
    .default({}),
  claude: z
    .object({
      // Model to use. If not specified, Claude uses its default
      model: z.string().optional(),
      // Path to claude CLI binary (default: "claude" from PATH)
      cliPath: z.string().default("claude"),
    })
    .default({}),
});

export const DEFAULT_DENY_LIST = [
  "localhost",
  "127.0.0.0/8",
  "::1",
  "10.0.0.0/8",
  "172.16.0.0/12",
  "192.168.0.0/16",
];

export const SafetyConfigSchema = z.object({
  // - "warn": annotate results for deny-listed targets and run anyway
  // - "block": refuse to run tools against deny-listed targets
  policy: z.enum(["warn", "block"]).default("warn"),
  // Hostnames, IPs or CIDR ranges
  denyList: z.array(z.string()).default(DEFAULT_DENY_LIST),
});

export const ToolsConfigSchema = z.object({
  // Binary overrides by tool name, e.g. { "nmap": "/usr/local/bin/nmap" }
  binaries: z.record(z.string()).default({}),
  // Default timeout overrides by tool name (seconds)
  timeouts: z.record(z.number().int().positive()).default({}),
  // Delay between SIGTERM and SIGKILL for a timed-out tool (ms)
  killGraceMs: z.number().int().nonnegative().default(5000),
  // Captured stdout/stderr is truncated beyond this size
  maxOutputBytes: z
    .number()
    .int()
    .positive()
    .default(10 * 1024 * 1024),
});

export const SessionsConfigSchema = z.object({
  // Sessions running at the same time on this host
  maxConcurrent: z.number().int().positive().default(3),
  defaultScope: z.enum(["quick", "basic", "comprehensive"]).default("basic"),
});

export const LoggingConfigSchema = z.object({
  // Write per-session log files under dataDir
  enableFileLogging: z.boolean().default(false),
  // Directory for log files (relative to dataDir)
  dir: z.string().default("logs"),
  // Keep logs for N days
  retentionDays: z.number().int().positive().default(30),
  // Log level for file output
  fileLevel: z.enum(["debug", "info", "warn", "error"]).default("debug"),
  // Log level for console output
  consoleLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const CircuitBreakerConfigSchema = z.object({
  // Number of consecutive failures before opening circuit
  failureThreshold: z.number().int().positive().default(3),
  // Number of successes in half-open state before closing
  successThreshold: z.number().int().positive().default(1),
  // How long to stay open before transitioning to half-open (ms)
  openDurationMs: z.number().int().positive().default(60000),
});

export const HealthCheckConfigSchema = z.object({
  // Tools whose absence is reported as a warning rather than ok
  requiredTools: z.array(z.string()).default(["nmap"]),
});

export const HardeningConfigSchema = z.object({
  circuitBreaker: CircuitBreakerConfigSchema.default({}),
  healthCheck: HealthCheckConfigSchema.default({}),
});

export const ConfigSchema = z.object({
  advisor: AdvisorConfigSchema.default({}),
  safety: SafetyConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  sessions: SessionsConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  hardening: HardeningConfigSchema.default({}),
  dataDir: z.string().default("~/.pentest-orchestrator"),
  verbose: z.boolean().default(false),
});

export type AdvisorName = z.infer<typeof AdvisorNameSchema>;
export type AdvisorConfig = z.infer<typeof AdvisorConfigSchema>;
export type SafetyConfig = z.infer<typeof SafetyConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type SessionsConfig = z.infer<typeof SessionsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type CircuitBreakerConfig = z.infer<typeof CircuitBreakerConfigSchema>;
export type HealthCheckConfig = z.infer<typeof HealthCheckConfigSchema>;
export type HardeningConfig = z.infer<typeof HardeningConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
