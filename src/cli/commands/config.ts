import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import { ConfigurationError } from "../../infra/errors.js";
import { loadConfig, saveConfig, getConfigPath, getDefaultConfig } from "../config/loader.js";
import { existsSync } from "node:fs";
import { fail, printJson } from "./shared.js";

/** "true"/"false", numbers and JSON arrays/objects; anything else stays a string */
function parseValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value.trim() !== "" && !Number.isNaN(Number(value))) return Number(value);
  if (value.startsWith("[") || value.startsWith("{")) {
    try {
      return JSON.parse(value);
    } catch {
      throw new ConfigurationError(`Value for a list or object must be valid JSON: ${value}`);
    }
  }
  return value;
}

export function buildUpdate(key: string, value: unknown): Record<string, unknown> {
  const parts = key.split(".").filter((part) => part.length > 0);
  const last = parts.pop();
  if (last === undefined) {
    throw new ConfigurationError(`Invalid configuration key: "${key}"`);
  }
  let update: Record<string, unknown> = { [last]: value };
  for (const part of parts.reverse()) {
    update = { [part]: update };
  }
  return update;
}

export function createConfigCommand(): Command {
  const command = new Command("config").description("View and manage configuration");

  command
    .command("show")
    .description("Show current configuration")
    .option("--json", "Output as JSON", false)
    .action((options: { json: boolean }) => {
      try {
        const config = loadConfig();

        if (options.json) {
          printJson(config);
          return;
        }

        logger.header("Pentest Orchestrator - Configuration");
        console.error(pc.dim(`Config file: ${getConfigPath()}`));
        console.error("");
        console.error(JSON.stringify(config, null, 2));
      } catch (error) {
        fail(error);
      }
    });

  command
    .command("set")
    .description("Set a configuration value")
    .argument("<key>", "Configuration key (e.g., safety.policy, advisor.ollama.model)")
    .argument("<value>", "Value to set")
    .action((key: string, value: string) => {
      try {
        const parsedValue = parseValue(value);
        saveConfig(buildUpdate(key, parsedValue));
        logger.success(`Set ${pc.cyan(key)} = ${pc.yellow(JSON.stringify(parsedValue))}`);
      } catch (error) {
        fail(error);
      }
    });

  command
    .command("init")
    .description("Initialize configuration with defaults")
    .option("-f, --force", "Overwrite existing configuration", false)
    .action((options: { force: boolean }) => {
      const configPath = getConfigPath();
      if (!options.force && existsSync(configPath)) {
        console.error(pc.yellow(`Config already exists at ${configPath}`));
        console.error(pc.dim("Use --force to overwrite"));
        return;
      }
      try {
        const { advisor, safety, sessions } = getDefaultConfig();
        saveConfig({ advisor, safety, sessions });
      } catch (error) {
        fail(error);
      }
    });

  command
    .command("path")
    .description("Show config file path")
    .action(() => {
      console.log(getConfigPath());
    });

  return command;
}
