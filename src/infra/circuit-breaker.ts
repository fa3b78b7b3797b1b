import { CircuitOpenError } from "./errors.js";
import { logger } from "./logger.js";

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerOptions {
  /** Number of consecutive failures before opening the circuit (default: 3) */
  failureThreshold?: number;
  /** Number of successes in half-open state before closing (default: 1) */
  successThreshold?: number;
  /** How long to stay open before transitioning to half-open (ms, default: 60000) */
  openDurationMs?: number;
  /** Callback when circuit state changes */
  onStateChange?: (from: CircuitState, to: CircuitState, operationType: string) => void;
}

type ResolvedOptions = Required<Omit<CircuitBreakerOptions, "onStateChange">>;

const DEFAULT_OPTIONS: ResolvedOptions = {
  failureThreshold: 3,
  successThreshold: 1,
  openDurationMs: 60000,
};

/**
 * Circuit breaker guarding a flaky dependency (an advisor endpoint, mostly).
 *
 * - closed -> open: consecutive failures >= failureThreshold
 * - open -> half-open: after openDurationMs
 * - half-open -> closed: successThreshold consecutive successes
 * - half-open -> open: any failure
 *
 * While open, calls fail fast with CircuitOpenError so a dead advisor does not
 * cost its full timeout on every decision.
 */
export class CircuitBreaker {
  private state: CircuitState = "closed";
  private failureCount = 0;
  private successCount = 0;
  private openedAt: Date | undefined;
  private readonly options: ResolvedOptions;
  private readonly onStateChange: CircuitBreakerOptions["onStateChange"];

  constructor(
    private readonly operationType: string,
    options: CircuitBreakerOptions = {}
  ) {
    this.options = {
      failureThreshold: options.failureThreshold ?? DEFAULT_OPTIONS.failureThreshold,
      successThreshold: options.successThreshold ?? DEFAULT_OPTIONS.successThreshold,
      openDurationMs: options.openDurationMs ?? DEFAULT_OPTIONS.openDurationMs,
    };
    this.onStateChange = options.onStateChange;
  }

  /**
   * Run `fn` through the breaker
   *
   * @throws CircuitOpenError if the circuit is open
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.getState() === "open") {
      throw new CircuitOpenError(this.operationType, this.reopenTime());
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  getState(): CircuitState {
    if (this.state === "open" && this.openElapsed()) {
      this.transitionTo("half-open");
    }
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  /** When an open circuit lets the next call through, undefined otherwise */
  getReopenTime(): Date | undefined {
    return this.state === "open" ? this.reopenTime() : undefined;
  }

  reset(): void {
    this.transitionTo("closed");
    this.failureCount = 0;
    this.successCount = 0;
  }

  private reopenTime(): Date {
    return new Date((this.openedAt?.getTime() ?? Date.now()) + this.options.openDurationMs);
  }

  private openElapsed(): boolean {
    if (!this.openedAt) {
      return false;
    }
    return Date.now() - this.openedAt.getTime() >= this.options.openDurationMs;
  }

  private onSuccess(): void {
    if (this.state === "half-open") {
      this.successCount++;
      if (this.successCount >= this.options.successThreshold) {
        this.failureCount = 0;
        this.transitionTo("closed");
      }
      return;
    }
    this.failureCount = 0;
  }

  private onFailure(): void {
    if (this.state === "half-open") {
      this.transitionTo("open");
      return;
    }
    this.failureCount++;
    if (this.failureCount >= this.options.failureThreshold) {
      this.transitionTo("open");
    }
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state === newState) {
      return;
    }

    const oldState = this.state;
    this.state = newState;
    this.successCount = 0;

    if (newState === "open") {
      this.openedAt = new Date();
      logger.warn(`Circuit breaker OPEN for ${this.operationType}`, {
        failures: this.failureCount,
        willRetryAt: this.reopenTime().toISOString(),
      });
    } else if (newState === "half-open") {
      logger.info(`Circuit breaker half-open for ${this.operationType}, testing recovery`);
    } else {
      this.openedAt = undefined;
      logger.info(`Circuit breaker CLOSED for ${this.operationType}, recovered`);
    }

    this.onStateChange?.(oldState, newState, this.operationType);
  }
}

export interface CircuitStatus {
  state: CircuitState;
  failures: number;
  reopenAt: string | undefined;
}

/**
 * Breakers keyed by operation (one per advisor). Owned by the orchestrator
 * context, so two contexts in one process never share breaker state.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(private readonly defaultOptions: CircuitBreakerOptions = {}) {}

  get(operationType: string): CircuitBreaker {
    let breaker = this.breakers.get(operationType);
    if (!breaker) {
      breaker = new CircuitBreaker(operationType, this.defaultOptions);
      this.breakers.set(operationType, breaker);
    }
    return breaker;
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }

  getStatus(): Record<string, CircuitStatus> {
    const status: Record<string, CircuitStatus> = {};
    for (const [type, breaker] of this.breakers) {
      status[type] = {
        state: breaker.getState(),
        failures: breaker.getFailureCount(),
        reopenAt: breaker.getReopenTime()?.toISOString(),
      };
    }
    return status;
  }
}
