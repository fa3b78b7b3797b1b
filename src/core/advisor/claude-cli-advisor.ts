import { logger } from "../../infra/logger.js";
import { AdvisorUnavailableError } from "../../infra/errors.js";
import type { CleanupManager } from "../../infra/cleanup-manager.js";
import type { AdvisorConfig } from "../../types/config.js";
import { runCommand } from "../tools/command-runner.js";
import { parseAdvice } from "./parse-advice.js";
import { ADVISOR_SYSTEM_PROMPT, buildAdvicePrompt } from "./prompts.js";
import type { AdviseOptions, Advisor, AdvisorAdvice, AdvisorContext } from "./types.js";

const VERSION_TIMEOUT_MS = 5000;
const KILL_GRACE_MS = 2000;
const MAX_REPLY_BYTES = 1024 * 1024;

/**
 * Claude through the local `claude -p` CLI, using its existing login
 */
export class ClaudeCliAdvisor implements Advisor {
  readonly name = "claude-cli";

  constructor(
    private readonly config: AdvisorConfig["claude"],
    private readonly cleanup?: CleanupManager
  ) {}

  async isAvailable(): Promise<boolean> {
    const outcome = await runCommand(
      { binary: this.config.cliPath, args: ["--version"] },
      { timeoutMs: VERSION_TIMEOUT_MS, killGraceMs: KILL_GRACE_MS, maxOutputBytes: 4096 }
    );
    const available = outcome.exitCode === 0 && outcome.stdout.toLowerCase().includes("claude");
    if (available) {
      logger.debug(`Claude CLI found: ${outcome.stdout.trim()}`);
    } else {
      logger.debug(`Claude CLI not available at ${this.config.cliPath}`);
    }
    return available;
  }

  async advise(context: AdvisorContext, options: AdviseOptions): Promise<AdvisorAdvice | null> {
    const args = ["-p", `${ADVISOR_SYSTEM_PROMPT}\n\n${buildAdvicePrompt(context)}`, "--max-turns", "1"];
    if (this.config.model) {
      args.push("--model", this.config.model);
    }

    const outcome = await runCommand(
      { binary: this.config.cliPath, args },
      {
        timeoutMs: options.timeoutMs,
        killGraceMs: KILL_GRACE_MS,
        maxOutputBytes: MAX_REPLY_BYTES,
        cleanup: this.cleanup,
      }
    );

    if (outcome.spawnError !== null) {
      throw new AdvisorUnavailableError(`Failed to start Claude CLI: ${outcome.spawnError}`, this.name);
    }
    if (outcome.timedOut) {
      throw new AdvisorUnavailableError(`Claude CLI timed out after ${options.timeoutMs}ms`, this.name);
    }
    if (outcome.exitCode !== 0) {
      throw new AdvisorUnavailableError(
        `Claude CLI exited with code ${outcome.exitCode ?? "unknown"}: ${outcome.stderr.trim()}`,
        this.name
      );
    }
    return parseAdvice(outcome.stdout);
  }
}
