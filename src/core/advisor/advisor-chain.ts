import { logger } from "../../infra/logger.js";
import { AdvisorUnavailableError, toError } from "../../infra/errors.js";
import type { CircuitBreakerRegistry } from "../../infra/circuit-breaker.js";
import { withTimeout } from "../../infra/watchdog.js";
import type { Advisor, AdvisorAdvice, AdvisorContext } from "./types.js";

export interface ChainAdvice {
  advisor: string;
  advice: AdvisorAdvice;
}

export interface AdvisorChainOptions {
  /** Response budget per advisor */
  timeoutMs: number;
  breakers: CircuitBreakerRegistry;
}

/**
 * Asks advisors in order until one names a valid candidate.
 *
 * Each advisor runs under its own deadline and circuit breaker. A reply that
 * is unparseable or names a tool outside the candidates counts as a failure.
 * Nothing here throws: an exhausted chain answers null.
 */
export class AdvisorChain {
  constructor(
    private readonly advisors: readonly Advisor[],
    private readonly options: AdvisorChainOptions
  ) {}

  get names(): string[] {
    return this.advisors.map((advisor) => advisor.name);
  }

  get size(): number {
    return this.advisors.length;
  }

  list(): readonly Advisor[] {
    return this.advisors;
  }

  async advise(context: AdvisorContext): Promise<ChainAdvice | null> {
    for (const advisor of this.advisors) {
      const operation = `advisor:${advisor.name}`;
      const breaker = this.options.breakers.get(operation);
      try {
        const advice = await breaker.execute(async () => {
          const reply = await withTimeout(operation, this.options.timeoutMs, (signal) =>
            advisor.advise(context, { timeoutMs: this.options.timeoutMs, signal })
          );
          if (reply === null) {
            throw new AdvisorUnavailableError("Reply held no valid advice", advisor.name);
          }
          if (!context.candidates.includes(reply.tool)) {
            throw new AdvisorUnavailableError(
              `Suggested ${reply.tool}, which is not a candidate`,
              advisor.name
            );
          }
          return reply;
        });
        logger.debug(`Advisor ${advisor.name} chose ${advice.tool}`);
        return { advisor: advisor.name, advice };
      } catch (error) {
        logger.warn(`Advisor ${advisor.name} gave no advice: ${toError(error).message}`);
      }
    }
    return null;
  }
}
