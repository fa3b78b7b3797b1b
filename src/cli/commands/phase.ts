import { Command } from "commander";
import { AGENT_ROLES } from "../../types/decision.js";
import { resolvePhaseName } from "../../core/engine/session-orchestrator.js";
import { roleForPhase } from "../../core/engine/roles.js";
import { printPhase } from "../format.js";
import { fail, parsePositiveInt, parseToolParams, printJson, withContext } from "./shared.js";

interface PhaseCommandOptions {
  role?: string;
  session?: string;
  force: boolean;
  maxSteps: string;
  toolParams?: string;
  json: boolean;
}

export function createPhaseCommand(): Command {
  return new Command("phase")
    .description("Run a single phase for one agent role")
    .argument("<target>", "Host, IP address, CIDR range or URL")
    .argument("<phase>", "recon, vuln, exploit or report")
    .option("-r, --role <role>", `Agent role (${AGENT_ROLES.join(", ")}); defaults to the phase's role`)
    .option("--session <id>", "Attach the phase to an existing session id")
    .option("-f, --force", "Run even when the engine reports nothing left", false)
    .option("--max-steps <n>", "Tool steps for the phase", "1")
    .option("--tool-params <json>", "Per-tool parameters as JSON")
    .option("--json", "Output as JSON", false)
    .action(async (target: string, phaseName: string, options: PhaseCommandOptions) => {
      try {
        const phase = resolvePhaseName(phaseName);
        const role = options.role ?? roleForPhase(phase);
        const phaseOptions = {
          force: options.force,
          maxSteps: parsePositiveInt(options.maxSteps, "--max-steps"),
          toolParams: parseToolParams(options.toolParams),
        };

        const result = await withContext(
          (ctx) => ctx.orchestrator.executePhase(target, role, phase, options.session, phaseOptions),
          { shutdownHandlers: true }
        );

        if (options.json) {
          printJson(result);
        } else {
          printPhase(result);
        }
      } catch (error) {
        fail(error);
      }
    });
}
