import type {
  AuditFilter,
  AuditStats,
  CommandExecution,
  DecisionRecord,
  NewCommandExecution,
  NewDecisionRecord,
  NewSessionReport,
  NewToolResult,
  SessionReportRecord,
  StoredExecution,
} from "../../types/audit.js";
import type { ToolResult } from "../../types/tool.js";

/**
 * Append-only log of everything the orchestrator decided and ran.
 *
 * Records are never updated or deleted. Queries return the most recent
 * records first; `limit` defaults to 50 and `null` lifts it.
 *
 * Every method throws StoreUnavailableError when the backing database fails.
 */
export interface AuditLogStore {
  appendDecision(record: NewDecisionRecord): DecisionRecord;
  appendCommand(record: NewCommandExecution): CommandExecution;
  appendToolResult(record: NewToolResult): ToolResult;
  /** Command and its result in one transaction: both are stored or neither is */
  appendExecution(command: NewCommandExecution, result: NewToolResult): StoredExecution;
  appendSessionReport(report: NewSessionReport): SessionReportRecord;

  queryDecisions(filter?: AuditFilter, limit?: number | null): DecisionRecord[];
  queryCommands(filter?: AuditFilter, limit?: number | null): CommandExecution[];
  queryToolResults(filter?: AuditFilter, limit?: number | null): ToolResult[];
  querySessionReports(filter?: AuditFilter, limit?: number | null): SessionReportRecord[];

  stats(): AuditStats;
  ping(): boolean;
  close(): void;
}
