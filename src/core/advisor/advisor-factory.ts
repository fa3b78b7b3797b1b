import type { CircuitBreakerRegistry } from "../../infra/circuit-breaker.js";
import type { CleanupManager } from "../../infra/cleanup-manager.js";
import type { AdvisorConfig, AdvisorName } from "../../types/config.js";
import { AdvisorChain } from "./advisor-chain.js";
import { ClaudeCliAdvisor } from "./claude-cli-advisor.js";
import { ClaudeSdkAdvisor } from "./claude-sdk-advisor.js";
import { OllamaAdvisor } from "./ollama-advisor.js";
import type { Advisor } from "./types.js";

export function createAdvisor(
  name: AdvisorName,
  config: AdvisorConfig,
  cleanup?: CleanupManager
): Advisor {
  switch (name) {
    case "ollama":
      return new OllamaAdvisor(config.ollama);
    case "claude-sdk":
      return new ClaudeSdkAdvisor(config.claude);
    case "claude-cli":
      return new ClaudeCliAdvisor(config.claude, cleanup);
  }
}

/**
 * Advisor chain in configured order; duplicates are dropped
 */
export function createAdvisorChain(
  config: AdvisorConfig,
  breakers: CircuitBreakerRegistry,
  cleanup?: CleanupManager
): AdvisorChain {
  const names = [...new Set(config.chain)];
  return new AdvisorChain(
    names.map((name) => createAdvisor(name, config, cleanup)),
    { timeoutMs: config.timeoutMs, breakers }
  );
}
