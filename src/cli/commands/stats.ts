import { Command } from "commander";
import pc from "picocolors";
import { fail, printJson, withContext } from "./shared.js";

export function createStatsCommand(): Command {
  return new Command("stats")
    .description("Show audit database statistics")
    .option("--json", "Output as JSON", false)
    .action(async (options: { json: boolean }) => {
      try {
        const stats = await withContext((ctx) => ctx.orchestrator.getDatabaseStats());
        if (options.json) {
          printJson(stats);
          return;
        }
        console.error(pc.bold("Audit database"));
        console.error(pc.dim("─".repeat(40)));
        console.error(`  Path:            ${pc.dim(stats.database)}`);
        console.error(`  Connected:       ${stats.connected ? pc.green("yes") : pc.red("no")}`);
        console.error(`  Decisions:       ${stats.collections.decisions}`);
        console.error(`  Commands:        ${stats.collections.command_executions}`);
        console.error(`  Tool results:    ${stats.collections.tool_results}`);
        console.error(`  Session reports: ${stats.collections.session_reports}`);
        console.error(`  Total:           ${pc.cyan(String(stats.totalDocuments))}`);
      } catch (error) {
        fail(error);
      }
    });
}
