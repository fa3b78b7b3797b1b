export class PentestOrchestratorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
    public readonly isRecoverable: boolean = false
  ) {
    super(message);
    this.name = "PentestOrchestratorError";
  }
}

export class ConfigurationError extends PentestOrchestratorError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIGURATION_ERROR", cause);
    this.name = "ConfigurationError";
  }
}

export class ValidationError extends PentestOrchestratorError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

/** The audit database could not be opened, read or written */
export class StoreUnavailableError extends PentestOrchestratorError {
  constructor(message: string, cause?: Error) {
    super(message, "STORE_UNAVAILABLE", cause);
    this.name = "StoreUnavailableError";
  }
}

export class AdvisorUnavailableError extends PentestOrchestratorError {
  constructor(
    message: string,
    public readonly advisor: string,
    cause?: Error
  ) {
    super(message, "ADVISOR_UNAVAILABLE", cause, true);
    this.name = "AdvisorUnavailableError";
  }
}

/** Tool output did not have the structure its parser expects */
export class ParseError extends PentestOrchestratorError {
  constructor(
    message: string,
    public readonly tool: string,
    cause?: Error
  ) {
    super(message, "PARSE_ERROR", cause, true);
    this.name = "ParseError";
  }
}

export class SessionError extends PentestOrchestratorError {
  constructor(
    message: string,
    public readonly sessionId: string,
    cause?: Error
  ) {
    super(message, "SESSION_ERROR", cause);
    this.name = "SessionError";
  }
}

export class TimeoutError extends PentestOrchestratorError {
  constructor(
    message: string,
    public readonly operationType: string,
    public readonly timeoutMs: number
  ) {
    super(message, "TIMEOUT_ERROR", undefined, true);
    this.name = "TimeoutError";
  }
}

export class CircuitOpenError extends PentestOrchestratorError {
  constructor(
    public readonly operationType: string,
    public readonly reopenAt: Date
  ) {
    super(
      `Circuit breaker open for ${operationType}, will retry at ${reopenAt.toISOString()}`,
      "CIRCUIT_OPEN",
      undefined,
      true
    );
    this.name = "CircuitOpenError";
  }
}

export function isPentestOrchestratorError(error: unknown): error is PentestOrchestratorError {
  return error instanceof PentestOrchestratorError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
