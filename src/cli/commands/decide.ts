import { Command } from "commander";
import pc from "picocolors";
import { printDecision } from "../format.js";
import { fail, printJson, withContext } from "./shared.js";

interface DecideOptions {
  role: string;
  session?: string;
  analyze: boolean;
  json: boolean;
}

export function createDecideCommand(): Command {
  return new Command("decide")
    .description("Recommend the next tool for an agent role against a target")
    .argument("<target>", "Host, IP address, CIDR range or URL")
    .option("-r, --role <role>", "Agent role", "Reconnaissance Specialist")
    .option("--session <id>", "Only count tools run in this session")
    .option("--analyze", "Show the overall progress analysis instead", false)
    .option("--json", "Output as JSON", false)
    .action(async (target: string, options: DecideOptions) => {
      try {
        await withContext(async (ctx) => {
          if (options.analyze) {
            const analysis = ctx.engine.analyzeCurrentState(target);
            if (options.json) {
              printJson(analysis);
              return;
            }
            console.error(pc.bold(`Progress for ${target}: ${analysis.completionPercentage}%`));
            console.error(`  State:     ${analysis.state}`);
            console.error(`  Completed: ${analysis.completedTools.join(", ") || pc.dim("none")}`);
            console.error(`  Findings:  ${analysis.findingsCount} (${analysis.vulnerabilitiesCount} vulnerabilities)`);
            for (const rec of analysis.recommendations) {
              console.error(`  ${rec.agentRole.padEnd(34)} ${rec.tool ?? pc.dim("-")} ${pc.dim(rec.priority)}`);
            }
            return;
          }

          const decision = await ctx.engine.decideNextTask(target, options.role, options.session);
          if (options.json) {
            printJson(decision);
          } else {
            printDecision(decision);
          }
        });
      } catch (error) {
        fail(error);
      }
    });
}
