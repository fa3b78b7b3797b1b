import { Command } from "commander";
import pc from "picocolors";
import { printSummary } from "../format.js";
import { fail, parsePositiveInt, printJson, withContext } from "./shared.js";

export function createSummaryCommand(): Command {
  return new Command("summary")
    .description("Show the summary of a session")
    .argument("<sessionId>", "Session id")
    .option("--json", "Output as JSON", false)
    .action(async (sessionId: string, options: { json: boolean }) => {
      try {
        const summary = await withContext((ctx) => ctx.orchestrator.getSessionSummary(sessionId));
        if (options.json) {
          printJson(summary);
        } else {
          printSummary(summary);
        }
      } catch (error) {
        fail(error);
      }
    });
}

export function createSessionsCommand(): Command {
  return new Command("sessions")
    .description("List recent sessions")
    .option("-n, --limit <n>", "Number of sessions", "10")
    .option("--json", "Output as JSON", false)
    .action(async (options: { limit: string; json: boolean }) => {
      try {
        const limit = parsePositiveInt(options.limit, "--limit");
        const sessions = await withContext((ctx) => ctx.orchestrator.getRecentSessions(limit));
        if (options.json) {
          printJson(sessions);
          return;
        }
        if (sessions.length === 0) {
          console.error(pc.dim("No sessions recorded yet"));
          return;
        }
        for (const session of sessions) {
          console.error(
            `${pc.cyan(session.sessionId)} ${session.status.padEnd(9)} ${session.target ?? "-"} ${pc.dim(`${session.scope ?? "-"}, ${session.findingsCount} findings, ${session.vulnerabilitiesCount} vulns`)}`
          );
        }
      } catch (error) {
        fail(error);
      }
    });
}
