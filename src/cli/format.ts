import pc from "picocolors";
import type { CommandExecution, DecisionRecord } from "../types/audit.js";
import type { Decision, Priority } from "../types/decision.js";
import type { PhaseResult, SessionSummary } from "../types/session.js";

const PRIORITY_COLORS: Record<Priority, (text: string) => string> = {
  high: pc.red,
  medium: pc.yellow,
  low: pc.dim,
};

function section(title: string): void {
  console.error(pc.bold(title));
  console.error(pc.dim("─".repeat(40)));
}

function when(date: Date | null): string {
  return date ? date.toISOString() : "-";
}

export function printSummary(summary: SessionSummary): void {
  const statusColor =
    summary.status === "completed" ? pc.green : summary.status === "error" ? pc.red : pc.yellow;

  section("Session");
  console.error(`  ID:       ${pc.cyan(summary.sessionId)}`);
  console.error(`  Target:   ${summary.target ?? pc.dim("unknown")}`);
  console.error(`  Scope:    ${summary.scope ?? pc.dim("unknown")}`);
  console.error(`  Status:   ${statusColor(summary.status)}`);
  console.error(`  Started:  ${pc.dim(when(summary.startedAt))}`);
  console.error(`  Finished: ${pc.dim(when(summary.completedAt))}`);
  if (summary.error) {
    console.error(`  Error:    ${pc.red(summary.error)}`);
  }
  console.error("");

  if (summary.phases.length > 0) {
    section("Phases");
    for (const phase of summary.phases) {
      const tools = phase.toolsRun.length > 0 ? phase.toolsRun.join(", ") : pc.dim("none");
      console.error(
        `  ${phase.phase.padEnd(16)} ${phase.outcome.padEnd(10)} ${tools} ${pc.dim(`(${phase.findingsCount} findings, ${phase.vulnerabilitiesCount} vulns)`)}`
      );
    }
    console.error("");
  }

  section("Results");
  console.error(`  Tool runs:       ${summary.toolsRun.length} (${summary.simulatedRuns} simulated, ${summary.failedRuns} failed)`);
  console.error(`  Decisions:       ${summary.decisionsCount}`);
  console.error(`  Findings:        ${pc.cyan(String(summary.findingsCount))}`);
  console.error(`  Vulnerabilities: ${pc.yellow(String(summary.vulnerabilitiesCount))}`);

  for (const vuln of summary.vulnerabilities) {
    const simulated = vuln.simulated ? pc.dim(" [simulated]") : "";
    console.error(`    ${pc.yellow(vuln.severity.padEnd(8))} ${vuln.tool}: ${vuln.description}${simulated}`);
  }
}

export function printPhase(result: PhaseResult): void {
  section(`${result.phase} (${result.agentRole})`);
  console.error(`  Session: ${pc.cyan(result.sessionId)}`);
  console.error(`  Outcome: ${result.outcome}`);
  if (result.skipReason) console.error(`  Skipped: ${pc.dim(result.skipReason)}`);
  if (result.error) console.error(`  Error:   ${pc.red(result.error)}`);
  for (const step of result.steps) {
    if (!step.result) continue;
    const status = step.result.success ? pc.green("ok") : pc.red(step.result.errorKind ?? "failed");
    const simulated = step.result.metadata.simulation_mode ? pc.dim(" [simulated]") : "";
    console.error(
      `  ${pc.magenta("▸")} ${step.result.toolName} ${status}${simulated} ${pc.dim(`${step.findingsCount} findings, ${step.vulnerabilitiesCount} vulns`)}`
    );
  }
}

export function printDecision(decision: Decision): void {
  const color = PRIORITY_COLORS[decision.priority];
  section(`Next task for ${decision.agentRole}`);
  console.error(`  Tool:      ${decision.tool ? pc.cyan(decision.tool) : pc.dim("none")}`);
  console.error(`  Priority:  ${color(decision.priority)}`);
  console.error(`  State:     ${decision.state}`);
  console.error(`  Source:    ${decision.advisor ?? pc.dim("rule-based")}`);
  console.error(`  Reasoning: ${decision.reasoning}`);
}

export function printDecisionRecords(records: DecisionRecord[]): void {
  for (const record of records) {
    const color = PRIORITY_COLORS[record.priority];
    console.error(
      `${pc.dim(record.timestamp.toISOString())} ${record.agentRole} → ${record.recommendedTool ?? "-"} ${color(record.priority)} ${pc.dim(record.target)}`
    );
  }
}

export function printCommands(records: CommandExecution[]): void {
  for (const record of records) {
    const status = record.success ? pc.green("ok") : pc.red(record.context.errorKind ?? "failed");
    console.error(`${pc.dim(record.executedAt.toISOString())} ${status} ${record.command}`);
  }
}
