import { randomBytes } from "node:crypto";
import { SessionError } from "../../infra/errors.js";
import {
  VALID_SESSION_TRANSITIONS,
  type PentestScope,
  type PhaseName,
  type PhaseResult,
  type Session,
  type SessionStatus,
} from "../../types/session.js";

/** `pt-<epoch ms>-<8 hex chars>` */
export function createSessionId(now: Date = new Date()): string {
  return `pt-${now.getTime()}-${randomBytes(4).toString("hex")}`;
}

/**
 * In-memory state of one orchestrated run. Status only moves forward:
 * running, then completed or error, after which nothing changes.
 */
export class PentestSession {
  readonly id: string;
  readonly createdAt = new Date();
  private status: SessionStatus = "running";
  private currentPhase: PhaseName | null = null;
  private completedAt: Date | null = null;
  private error: string | null = null;
  private readonly results: Partial<Record<PhaseName, PhaseResult>> = {};

  constructor(
    readonly target: string,
    readonly scope: PentestScope,
    readonly phases: readonly PhaseName[],
    id: string = createSessionId()
  ) {
    this.id = id;
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  isTerminal(): boolean {
    return VALID_SESSION_TRANSITIONS[this.status].length === 0;
  }

  enterPhase(phase: PhaseName): void {
    this.assertRunning(`enter ${phase}`);
    this.currentPhase = phase;
  }

  recordPhase(result: PhaseResult): void {
    this.assertRunning(`record ${result.phase}`);
    this.results[result.phase] = result;
  }

  complete(): void {
    this.transition("completed");
  }

  fail(error: string): void {
    this.transition("error");
    this.error = error;
  }

  snapshot(): Session {
    return {
      id: this.id,
      target: this.target,
      scope: this.scope,
      phases: [...this.phases],
      status: this.status,
      currentPhase: this.currentPhase,
      createdAt: this.createdAt,
      completedAt: this.completedAt,
      results: { ...this.results },
      error: this.error,
    };
  }

  private transition(to: SessionStatus): void {
    const valid = VALID_SESSION_TRANSITIONS[this.status];
    if (!valid.includes(to)) {
      throw new SessionError(
        `Invalid transition: ${this.status} → ${to}. Valid targets: ${valid.join(", ") || "none"}`,
        this.id
      );
    }
    this.status = to;
    this.completedAt = new Date();
  }

  private assertRunning(action: string): void {
    if (this.status !== "running") {
      throw new SessionError(`Cannot ${action}: session is ${this.status}`, this.id);
    }
  }
}
