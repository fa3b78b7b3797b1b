/**
 * run command - full session against one target
 */

import { Command } from "commander";
import ora from "ora";
import { PENTEST_SCOPES, type PhaseName } from "../../types/session.js";
import { resolvePhaseName } from "../../core/engine/session-orchestrator.js";
import { printSummary } from "../format.js";
import { fail, parsePositiveInt, parseToolParams, printJson, withContext } from "./shared.js";

interface RunOptions {
  scope?: string;
  force?: boolean | string;
  maxSteps?: string;
  toolParams?: string;
  json: boolean;
}

function parseForce(force: RunOptions["force"]): boolean | PhaseName[] {
  if (force === undefined || typeof force === "boolean") return force ?? false;
  return force.split(",").map((phase) => resolvePhaseName(phase));
}

export function createRunCommand(): Command {
  return new Command("run")
    .description("Run a pentest session: recon, vulnerability assessment, exploitation, reporting")
    .argument("<target>", "Host, IP address, CIDR range or URL")
    .option("-s, --scope <scope>", `Scope profile (${PENTEST_SCOPES.join(", ")})`)
    .option("-f, --force [phases]", "Run phases the engine would skip (all, or a comma list)")
    .option("--max-steps <n>", "Tool steps per phase")
    .option("--tool-params <json>", "Per-tool parameters as JSON")
    .option("--json", "Output summary as JSON", false)
    .action(async (target: string, options: RunOptions) => {
      try {
        const params = {
          force: parseForce(options.force),
          toolParams: parseToolParams(options.toolParams),
          ...(options.maxSteps !== undefined
            ? { maxStepsPerPhase: parsePositiveInt(options.maxSteps, "--max-steps") }
            : {}),
        };

        const summary = await withContext(
          async (ctx) => {
            const spinner = options.json ? null : ora(`Testing ${target}...`).start();
            try {
              const result = await ctx.orchestrator.executeFull(
                target,
                options.scope ?? ctx.config.sessions.defaultScope,
                params
              );
              if (result.status === "completed") {
                spinner?.succeed(`Session ${result.sessionId} completed`);
              } else {
                spinner?.fail(`Session ${result.sessionId} ended with ${result.status}`);
              }
              return result;
            } catch (error) {
              spinner?.fail("Session failed");
              throw error;
            }
          },
          { shutdownHandlers: true }
        );

        if (options.json) {
          printJson(summary);
        } else {
          printSummary(summary);
        }
        if (summary.status === "error") process.exit(1);
      } catch (error) {
        fail(error);
      }
    });
}
