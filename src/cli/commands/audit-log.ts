/**
 * actions / commands - read the audit log
 */

import { Command } from "commander";
import pc from "picocolors";
import { printCommands, printDecisionRecords } from "../format.js";
import { buildFilter, fail, parsePositiveInt, printJson, withContext, type FilterOptions } from "./shared.js";

interface LogOptions extends FilterOptions {
  limit: string;
  json: boolean;
}

export function createActionsCommand(): Command {
  return new Command("actions")
    .description("List agent decisions, most recent first")
    .option("--session <id>", "Filter by session")
    .option("--target <target>", "Filter by target")
    .option("--role <role>", "Filter by agent role")
    .option("-n, --limit <n>", "Maximum records", "50")
    .option("--json", "Output as JSON", false)
    .action(async (options: LogOptions) => {
      try {
        const limit = parsePositiveInt(options.limit, "--limit");
        const records = await withContext((ctx) =>
          ctx.orchestrator.getAgentActions(buildFilter(options), limit)
        );
        if (options.json) {
          printJson(records);
        } else if (records.length === 0) {
          console.error(pc.dim("No decisions recorded"));
        } else {
          printDecisionRecords(records);
        }
      } catch (error) {
        fail(error);
      }
    });
}

export function createCommandsCommand(): Command {
  return new Command("commands")
    .description("List executed tool commands, most recent first")
    .option("--session <id>", "Filter by session")
    .option("--target <target>", "Filter by target")
    .option("--role <role>", "Filter by agent role")
    .option("--tool <tool>", "Filter by tool")
    .option("--failed", "Only failed executions")
    .option("-n, --limit <n>", "Maximum records", "50")
    .option("--json", "Output as JSON", false)
    .action(async (options: LogOptions) => {
      try {
        const limit = parsePositiveInt(options.limit, "--limit");
        const records = await withContext((ctx) =>
          ctx.orchestrator.getCommandExecutions(buildFilter(options), limit)
        );
        if (options.json) {
          printJson(records);
        } else if (records.length === 0) {
          console.error(pc.dim("No commands recorded"));
        } else {
          printCommands(records);
        }
      } catch (error) {
        fail(error);
      }
    });
}
