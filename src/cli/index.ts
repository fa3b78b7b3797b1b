#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import {
  createRunCommand,
  createPhaseCommand,
  createDecideCommand,
  createSummaryCommand,
  createSessionsCommand,
  createActionsCommand,
  createCommandsCommand,
  createStatsCommand,
  createToolsCommand,
  createAgentsCommand,
  createHealthCommand,
  createConfigCommand,
} from "./commands/index.js";
import { logger } from "../infra/logger.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("pentest-orchestrator")
  .description(pc.cyan("Audited, phase-driven penetration test orchestration"))
  .version(VERSION, "-V, --version", "Output the version number")
  .option("-v, --verbose", "Enable verbose output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<{ verbose?: boolean }>();
    if (opts.verbose) {
      logger.configure({ level: "debug", verbose: true });
    }
  });

// Register commands
program.addCommand(createRunCommand());
program.addCommand(createPhaseCommand());
program.addCommand(createDecideCommand());
program.addCommand(createSummaryCommand());
program.addCommand(createSessionsCommand());
program.addCommand(createActionsCommand());
program.addCommand(createCommandsCommand());
program.addCommand(createStatsCommand());
program.addCommand(createToolsCommand());
program.addCommand(createAgentsCommand());
program.addCommand(createHealthCommand());
program.addCommand(createConfigCommand());

// Error handling
program.exitOverride((err) => {
  if (err.code === "commander.help") {
    process.exit(0);
  }
  if (err.code === "commander.version") {
    process.exit(0);
  }
  logger.error(`Command failed: ${err.message}`);
  process.exit(1);
});

// Parse and execute
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      logger.error(error.message, error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", error instanceof Error ? error : undefined);
  process.exit(1);
});
