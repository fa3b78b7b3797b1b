import Database from "better-sqlite3";
import { join } from "node:path";
import { mkdirSync, existsSync } from "node:fs";
import { logger } from "../../infra/logger.js";
import { StoreUnavailableError, toError } from "../../infra/errors.js";
import {
  DEFAULT_QUERY_LIMIT,
  type AuditFilter,
  type AuditStats,
  type CommandExecution,
  type DecisionRecord,
  type NewCommandExecution,
  type NewDecisionRecord,
  type NewSessionReport,
  type NewToolResult,
  type SessionReportRecord,
  type StoredExecution,
} from "../../types/audit.js";
import type { AgentRole, DecisionState, Priority, RankedCandidate } from "../../types/decision.js";
import type { PentestScope, SessionStatus, SessionSummary } from "../../types/session.js";
import type { ToolErrorKind, ToolMetadata, ToolResult } from "../../types/tool.js";
import type { AuditLogStore } from "./audit-store.js";

export const AUDIT_DB_FILENAME = "audit.db";

// Row types as returned by better-sqlite3
interface DecisionRow {
  id: number;
  session_id: string | null;
  agent_role: string;
  target: string;
  recommended_tool: string | null;
  priority: string;
  reasoning: string;
  state: string;
  degraded: number;
  advisor: string | null;
  candidates: string; // JSON array
  timestamp: string;
}

interface CommandRow {
  id: number;
  command: string;
  output: string;
  success: number;
  agent_role: string | null;
  tool: string;
  session_id: string | null;
  target: string;
  error_kind: string | null;
  executed_at: string;
}

interface ToolResultRow {
  id: number;
  tool_name: string;
  target: string;
  session_id: string | null;
  success: number;
  output: string;
  error: string;
  error_kind: string | null;
  command: string;
  exit_code: number | null;
  duration_ms: number;
  warnings: string; // JSON array
  metadata: string; // JSON object
  stored_at: string;
}

interface SessionReportRow {
  id: number;
  session_id: string;
  target: string;
  scope: string;
  status: string;
  summary: string; // JSON object
  stored_at: string;
}

interface CountRow {
  count: number;
}

type Table = "decisions" | "command_executions" | "tool_results" | "session_reports";

const FILTER_KEYS = ["sessionId", "target", "agentRole", "tool", "success"] as const;

/** Filter field -> column, per table. Fields a table lacks are ignored. */
const FILTER_COLUMNS: Record<Table, Partial<Record<keyof AuditFilter, string>>> = {
  decisions: {
    sessionId: "session_id",
    target: "target",
    agentRole: "agent_role",
    tool: "recommended_tool",
  },
  command_executions: {
    sessionId: "session_id",
    target: "target",
    agentRole: "agent_role",
    tool: "tool",
    success: "success",
  },
  tool_results: {
    sessionId: "session_id",
    target: "target",
    tool: "tool_name",
    success: "success",
  },
  session_reports: {
    sessionId: "session_id",
    target: "target",
  },
};

const TIMESTAMP_COLUMNS: Record<Table, string> = {
  decisions: "timestamp",
  command_executions: "executed_at",
  tool_results: "stored_at",
  session_reports: "stored_at",
};

/**
 * SqliteAuditStore - better-sqlite3 backed AuditLogStore
 *
 * One file per data directory (`<dataDir>/audit.db`), WAL journal.
 * Only INSERT and SELECT statements are issued.
 */
export class SqliteAuditStore implements AuditLogStore {
  private readonly db: Database.Database;
  private readonly dbPath: string;
  private closed = false;

  constructor(dataDir: string) {
    this.dbPath = join(dataDir, AUDIT_DB_FILENAME);
    this.db = this.open(dataDir);
    logger.debug(`SqliteAuditStore initialized with database: ${this.dbPath}`);
  }

  private open(dataDir: string): Database.Database {
    try {
      if (!existsSync(dataDir)) {
        mkdirSync(dataDir, { recursive: true });
      }
      const db = new Database(this.dbPath);
      db.pragma("journal_mode = WAL");
      this.initSchema(db);
      return db;
    } catch (error) {
      throw new StoreUnavailableError(
        `Cannot open audit database at ${this.dbPath}`,
        toError(error)
      );
    }
  }

  private initSchema(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS decisions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT,
        agent_role TEXT NOT NULL,
        target TEXT NOT NULL,
        recommended_tool TEXT,
        priority TEXT NOT NULL,
        reasoning TEXT NOT NULL,
        state TEXT NOT NULL,
        degraded INTEGER NOT NULL DEFAULT 0,
        advisor TEXT,
        candidates TEXT NOT NULL DEFAULT '[]',
        timestamp TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS command_executions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        command TEXT NOT NULL,
        output TEXT NOT NULL,
        success INTEGER NOT NULL,
        agent_role TEXT,
        tool TEXT NOT NULL,
        session_id TEXT,
        target TEXT NOT NULL,
        error_kind TEXT,
        executed_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tool_results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        tool_name TEXT NOT NULL,
        target TEXT NOT NULL,
        session_id TEXT,
        success INTEGER NOT NULL,
        output TEXT NOT NULL,
        error TEXT NOT NULL,
        error_kind TEXT,
        command TEXT NOT NULL,
        exit_code INTEGER,
        duration_ms INTEGER NOT NULL,
        warnings TEXT NOT NULL DEFAULT '[]',
        metadata TEXT NOT NULL DEFAULT '{}',
        stored_at TEXT NOT NULL
      );

      -- Snapshot written when a session reaches a terminal status
      CREATE TABLE IF NOT EXISTS session_reports (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        target TEXT NOT NULL,
        scope TEXT NOT NULL,
        status TEXT NOT NULL,
        summary TEXT NOT NULL,
        stored_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_decisions_target ON decisions(target);
      CREATE INDEX IF NOT EXISTS idx_decisions_session ON decisions(session_id);
      CREATE INDEX IF NOT EXISTS idx_commands_session ON command_executions(session_id);
      CREATE INDEX IF NOT EXISTS idx_tool_results_target ON tool_results(target);
      CREATE INDEX IF NOT EXISTS idx_tool_results_session ON tool_results(session_id);
      CREATE INDEX IF NOT EXISTS idx_session_reports_session ON session_reports(session_id);
    `);
  }

  // ============ Appends ============

  appendDecision(record: NewDecisionRecord): DecisionRecord {
    return this.guard("append decision", () => {
      const info = this.db
        .prepare(
          `
        INSERT INTO decisions (session_id, agent_role, target, recommended_tool, priority,
                               reasoning, state, degraded, advisor, candidates, timestamp)
        VALUES (@sessionId, @agentRole, @target, @recommendedTool, @priority,
                @reasoning, @state, @degraded, @advisor, @candidates, @timestamp)
      `
        )
        .run({
          sessionId: record.sessionId,
          agentRole: record.agentRole,
          target: record.target,
          recommendedTool: record.recommendedTool,
          priority: record.priority,
          reasoning: record.reasoning,
          state: record.state,
          degraded: record.degraded ? 1 : 0,
          advisor: record.advisor,
          candidates: JSON.stringify(record.candidates),
          timestamp: record.timestamp.toISOString(),
        });

      return { ...record, id: Number(info.lastInsertRowid) };
    });
  }

  appendCommand(record: NewCommandExecution): CommandExecution {
    return this.guard("append command", () => this.insertCommand(record));
  }

  appendToolResult(record: NewToolResult): ToolResult {
    return this.guard("append tool result", () => this.insertToolResult(record));
  }

  appendExecution(command: NewCommandExecution, result: NewToolResult): StoredExecution {
    return this.guard("append execution", () =>
      this.db.transaction(() => ({
        command: this.insertCommand(command),
        result: this.insertToolResult(result),
      }))()
    );
  }

  appendSessionReport(report: NewSessionReport): SessionReportRecord {
    return this.guard("append session report", () => {
      const info = this.db
        .prepare(
          `
        INSERT INTO session_reports (session_id, target, scope, status, summary, stored_at)
        VALUES (@sessionId, @target, @scope, @status, @summary, @storedAt)
      `
        )
        .run({
          sessionId: report.sessionId,
          target: report.target,
          scope: report.scope,
          status: report.status,
          summary: JSON.stringify(report.summary),
          storedAt: report.storedAt.toISOString(),
        });

      return { ...report, id: Number(info.lastInsertRowid) };
    });
  }

  private insertCommand(record: NewCommandExecution): CommandExecution {
    const info = this.db
      .prepare(
        `
      INSERT INTO command_executions (command, output, success, agent_role, tool, session_id,
                                      target, error_kind, executed_at)
      VALUES (@command, @output, @success, @agentRole, @tool, @sessionId,
              @target, @errorKind, @executedAt)
    `
      )
      .run({
        command: record.command,
        output: record.output,
        success: record.success ? 1 : 0,
        agentRole: record.context.agentRole,
        tool: record.context.tool,
        sessionId: record.context.sessionId,
        target: record.context.target,
        errorKind: record.context.errorKind,
        executedAt: record.executedAt.toISOString(),
      });

    return { ...record, id: Number(info.lastInsertRowid) };
  }

  private insertToolResult(record: NewToolResult): ToolResult {
    const info = this.db
      .prepare(
        `
      INSERT INTO tool_results (tool_name, target, session_id, success, output, error, error_kind,
                                command, exit_code, duration_ms, warnings, metadata, stored_at)
      VALUES (@toolName, @target, @sessionId, @success, @output, @error, @errorKind,
              @command, @exitCode, @durationMs, @warnings, @metadata, @storedAt)
    `
      )
      .run({
        toolName: record.toolName,
        target: record.target,
        sessionId: record.sessionId,
        success: record.success ? 1 : 0,
        output: record.output,
        error: record.error,
        errorKind: record.errorKind,
        command: record.command,
        exitCode: record.exitCode,
        durationMs: Math.round(record.durationMs),
        warnings: JSON.stringify(record.warnings),
        metadata: JSON.stringify(record.metadata),
        storedAt: record.storedAt.toISOString(),
      });

    return { ...record, id: Number(info.lastInsertRowid) };
  }

  // ============ Queries ============

  queryDecisions(filter: AuditFilter = {}, limit: number | null = DEFAULT_QUERY_LIMIT): DecisionRecord[] {
    return this.guard("query decisions", () =>
      this.select<DecisionRow>("decisions", filter, limit).map((row) => this.rowToDecision(row))
    );
  }

  queryCommands(filter: AuditFilter = {}, limit: number | null = DEFAULT_QUERY_LIMIT): CommandExecution[] {
    return this.guard("query commands", () =>
      this.select<CommandRow>("command_executions", filter, limit).map((row) =>
        this.rowToCommand(row)
      )
    );
  }

  queryToolResults(filter: AuditFilter = {}, limit: number | null = DEFAULT_QUERY_LIMIT): ToolResult[] {
    return this.guard("query tool results", () =>
      this.select<ToolResultRow>("tool_results", filter, limit).map((row) =>
        this.rowToToolResult(row)
      )
    );
  }

  querySessionReports(
    filter: AuditFilter = {},
    limit: number | null = DEFAULT_QUERY_LIMIT
  ): SessionReportRecord[] {
    return this.guard("query session reports", () =>
      this.select<SessionReportRow>("session_reports", filter, limit).map((row) =>
        this.rowToSessionReport(row)
      )
    );
  }

  private select<Row>(table: Table, filter: AuditFilter, limit: number | null): Row[] {
    const columns = FILTER_COLUMNS[table];
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    for (const key of FILTER_KEYS) {
      const column = columns[key];
      const value = filter[key];
      if (column === undefined || value === undefined) continue;
      conditions.push(`${column} = ?`);
      params.push(typeof value === "boolean" ? (value ? 1 : 0) : value);
    }

    let query = `SELECT * FROM ${table}`;
    if (conditions.length > 0) {
      query += ` WHERE ${conditions.join(" AND ")}`;
    }
    // Insertion order breaks timestamp ties
    query += ` ORDER BY ${TIMESTAMP_COLUMNS[table]} DESC, id DESC`;
    if (limit !== null) {
      query += " LIMIT ?";
      params.push(Math.max(0, Math.floor(limit)));
    }

    return this.db.prepare(query).all(...params) as Row[];
  }

  // ============ Status ============

  stats(): AuditStats {
    return this.guard("read stats", () => {
      const count = (table: Table): number =>
        (this.db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as CountRow).count;

      const collections = {
        decisions: count("decisions"),
        command_executions: count("command_executions"),
        tool_results: count("tool_results"),
        session_reports: count("session_reports"),
      };

      return {
        database: this.dbPath,
        connected: true,
        collections,
        totalDocuments:
          collections.decisions +
          collections.command_executions +
          collections.tool_results +
          collections.session_reports,
      };
    });
  }

  ping(): boolean {
    if (this.closed) {
      return false;
    }
    try {
      this.db.prepare("SELECT 1").get();
      return true;
    } catch (error) {
      logger.debug("Audit store ping failed", { error: toError(error).message });
      return false;
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  getPath(): string {
    return this.dbPath;
  }

  private guard<T>(operation: string, fn: () => T): T {
    if (this.closed) {
      throw new StoreUnavailableError(`Cannot ${operation}: audit store is closed`);
    }
    try {
      return fn();
    } catch (error) {
      throw new StoreUnavailableError(`Failed to ${operation}`, toError(error));
    }
  }

  // ============ Row mapping ============

  private rowToDecision(row: DecisionRow): DecisionRecord {
    return {
      id: row.id,
      sessionId: row.session_id,
      agentRole: row.agent_role as AgentRole,
      target: row.target,
      recommendedTool: row.recommended_tool,
      priority: row.priority as Priority,
      reasoning: row.reasoning,
      state: row.state as DecisionState,
      degraded: row.degraded === 1,
      advisor: row.advisor,
      candidates: JSON.parse(row.candidates) as RankedCandidate[],
      timestamp: new Date(row.timestamp),
    };
  }

  private rowToCommand(row: CommandRow): CommandExecution {
    return {
      id: row.id,
      command: row.command,
      output: row.output,
      success: row.success === 1,
      context: {
        agentRole: row.agent_role as AgentRole | null,
        tool: row.tool,
        sessionId: row.session_id,
        target: row.target,
        errorKind: row.error_kind as ToolErrorKind | null,
      },
      executedAt: new Date(row.executed_at),
    };
  }

  private rowToToolResult(row: ToolResultRow): ToolResult {
    return {
      id: row.id,
      toolName: row.tool_name,
      target: row.target,
      sessionId: row.session_id,
      success: row.success === 1,
      output: row.output,
      error: row.error,
      errorKind: row.error_kind as ToolErrorKind | null,
      command: row.command,
      exitCode: row.exit_code,
      durationMs: row.duration_ms,
      warnings: JSON.parse(row.warnings) as string[],
      metadata: JSON.parse(row.metadata) as ToolMetadata,
      storedAt: new Date(row.stored_at),
    };
  }

  private rowToSessionReport(row: SessionReportRow): SessionReportRecord {
    const summary = JSON.parse(row.summary) as SessionSummary;
    return {
      id: row.id,
      sessionId: row.session_id,
      target: row.target,
      scope: row.scope as PentestScope,
      status: row.status as SessionStatus,
      summary: {
        ...summary,
        // Dates come back from JSON as strings
        startedAt: summary.startedAt ? new Date(summary.startedAt) : null,
        completedAt: summary.completedAt ? new Date(summary.completedAt) : null,
      },
      storedAt: new Date(row.stored_at),
    };
  }
}
