import { existsSync, readFileSync, mkdirSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { config as loadEnv } from "dotenv";
import { Config, ConfigSchema } from "../../types/config.js";
import { ConfigurationError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";

// Load .env file if it exists
loadEnv();

const DEFAULT_CONFIG_DIR = join(homedir(), ".pentest-orchestrator");
const CONFIG_FILE_NAME = "config.json";

type Env = Record<string, string | undefined>;
type PlainObject = Record<string, unknown>;

export function expandPath(path: string): string {
  if (path.startsWith("~")) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

export function getConfigDir(env: Env = process.env): string {
  return expandPath(env["PENTEST_ORCH_DATA_DIR"] ?? DEFAULT_CONFIG_DIR);
}

export function getConfigPath(env: Env = process.env): string {
  return join(getConfigDir(env), CONFIG_FILE_NAME);
}

export function ensureConfigDir(env: Env = process.env): void {
  const configDir = getConfigDir(env);
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    logger.debug(`Created config directory: ${configDir}`);
  }
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Nested merge; arrays and scalars from `override` replace those in `base` */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function readConfigFile(configPath: string): PlainObject {
  if (!existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse config file: ${configPath}`,
      error instanceof Error ? error : undefined
    );
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file must hold a JSON object: ${configPath}`);
  }
  logger.debug(`Loaded config from ${configPath}`);
  return parsed;
}

/** Overrides taken from environment variables */
export function envOverrides(env: Env): PlainObject {
  const overrides: PlainObject = {};

  if (env["PENTEST_ORCH_DATA_DIR"]) {
    overrides["dataDir"] = env["PENTEST_ORCH_DATA_DIR"];
  }
  if (env["PENTEST_ORCH_VERBOSE"] === "true" || env["PENTEST_ORCH_VERBOSE"] === "1") {
    overrides["verbose"] = true;
  }
  if (env["PENTEST_ORCH_SAFETY_POLICY"]) {
    overrides["safety"] = { policy: env["PENTEST_ORCH_SAFETY_POLICY"] };
  }

  const ollama: PlainObject = {};
  if (env["OLLAMA_BASE_URL"]) ollama["baseUrl"] = env["OLLAMA_BASE_URL"];
  if (env["OLLAMA_MODEL"]) ollama["model"] = env["OLLAMA_MODEL"];
  if (Object.keys(ollama).length > 0) {
    overrides["advisor"] = { ollama };
  }

  return overrides;
}

/**
 * Configuration from defaults < `<dataDir>/config.json` < environment
 *
 * @throws ConfigurationError when the file is unreadable or a value is invalid
 */
export function loadConfig(env: Env = process.env): Config {
  const merged = deepMerge(readConfigFile(getConfigPath(env)), envOverrides(env));

  // Validate and parse with defaults
  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigurationError(`Invalid configuration: ${errors}`);
  }

  return result.data;
}

/**
 * Merge `changes` into the config file, validating the result first
 */
export function saveConfig(changes: PlainObject, env: Env = process.env): void {
  ensureConfigDir(env);
  const configPath = getConfigPath(env);
  const merged = deepMerge(readConfigFile(configPath), changes);

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigurationError(`Invalid configuration: ${errors}`);
  }

  writeFileSync(configPath, JSON.stringify(merged, null, 2));
  logger.success(`Config saved to ${configPath}`);
}

export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}
