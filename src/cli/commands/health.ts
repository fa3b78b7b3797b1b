import { Command } from "commander";
import pc from "picocolors";
import type { HealthStatus } from "../../infra/health-check.js";
import { fail, printJson, withContext } from "./shared.js";

const STATUS_COLORS: Record<HealthStatus, (text: string) => string> = {
  ok: pc.green,
  warning: pc.yellow,
  critical: pc.red,
  unavailable: pc.red,
};

function badge(status: HealthStatus): string {
  return STATUS_COLORS[status](status.padEnd(11));
}

export function createHealthCommand(): Command {
  return new Command("health")
    .description("Check disk, memory, audit store, tool binaries and advisors")
    .option("--json", "Output as JSON", false)
    .action(async (options: { json: boolean }) => {
      try {
        const result = await withContext((ctx) => ctx.health.check());
        if (options.json) {
          printJson(result);
        } else {
          const { diskSpace, memory, store, tools, advisors } = result.checks;
          console.error(
            `  ${badge(diskSpace.status)} disk    ${pc.dim(`${diskSpace.availableGb.toFixed(1)} GB free at ${diskSpace.path}`)}`
          );
          console.error(
            `  ${badge(memory.status)} memory  ${pc.dim(`${memory.availableMb} MB available`)}`
          );
          if (store) {
            console.error(`  ${badge(store.status)} store   ${pc.dim(store.error ?? "reachable")}`);
          }
          if (tools) {
            const missing = tools.missing.length > 0 ? `, simulated: ${tools.missing.join(", ")}` : "";
            console.error(
              `  ${badge(tools.status)} tools   ${pc.dim(`installed: ${tools.installed.join(", ") || "none"}${missing}`)}`
            );
          }
          for (const advisor of advisors) {
            console.error(
              `  ${badge(advisor.status)} advisor ${advisor.name} ${pc.dim(advisor.error ?? `${advisor.latencyMs}ms`)}`
            );
          }
          console.error("");
          console.error(`Overall: ${STATUS_COLORS[result.overallStatus](result.overallStatus)}`);
        }
        if (result.overallStatus === "critical") process.exit(1);
      } catch (error) {
        fail(error);
      }
    });
}
