import { Command } from "commander";
import pc from "picocolors";
import { fail, printJson, withContext } from "./shared.js";

export function createToolsCommand(): Command {
  return new Command("tools")
    .description("List tool adapters and whether their binaries are installed")
    .option("--json", "Output as JSON", false)
    .action(async (options: { json: boolean }) => {
      try {
        const tools = await withContext((ctx) => ctx.orchestrator.listTools());
        if (options.json) {
          printJson(tools);
          return;
        }
        for (const tool of tools) {
          const status = tool.installed ? pc.green("installed") : pc.yellow("simulated");
          console.error(
            `  ${tool.name.padEnd(14)} ${status.padEnd(20)} ${pc.dim(`${tool.binary}, ${tool.defaultTimeoutSeconds}s`)}  ${tool.description}`
          );
        }
      } catch (error) {
        fail(error);
      }
    });
}

export function createAgentsCommand(): Command {
  return new Command("agents")
    .description("List agent roles and their tools")
    .option("--json", "Output as JSON", false)
    .action(async (options: { json: boolean }) => {
      try {
        const agents = await withContext((ctx) => ctx.orchestrator.listAgents());
        if (options.json) {
          printJson(agents);
          return;
        }
        for (const agent of agents) {
          console.error(`${pc.bold(agent.role)} ${pc.dim(`(${agent.phase})`)}`);
          console.error(`  ${agent.description}`);
          console.error(`  Tools: ${agent.primaryTools.join(", ") || pc.dim("none")}`);
        }
      } catch (error) {
        fail(error);
      }
    });
}
