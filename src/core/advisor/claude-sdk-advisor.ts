import { query as sdkQuery } from "@anthropic-ai/claude-code";
import { logger } from "../../infra/logger.js";
import { AdvisorUnavailableError } from "../../infra/errors.js";
import type { AdvisorConfig } from "../../types/config.js";
import { parseAdvice } from "./parse-advice.js";
import { ADVISOR_SYSTEM_PROMPT, buildAdvicePrompt } from "./prompts.js";
import type { AdviseOptions, Advisor, AdvisorAdvice, AdvisorContext } from "./types.js";

/**
 * Claude through the Claude Code SDK, one turn and no tools.
 *
 * Requires ANTHROPIC_API_KEY in the environment.
 */
export class ClaudeSdkAdvisor implements Advisor {
  readonly name = "claude-sdk";

  constructor(private readonly config: AdvisorConfig["claude"]) {}

  async isAvailable(): Promise<boolean> {
    if (!process.env["ANTHROPIC_API_KEY"]) {
      logger.debug("Claude SDK not available: ANTHROPIC_API_KEY not set");
      return false;
    }
    return true;
  }

  async advise(context: AdvisorContext, options: AdviseOptions): Promise<AdvisorAdvice | null> {
    if (!(await this.isAvailable())) {
      throw new AdvisorUnavailableError("ANTHROPIC_API_KEY is not set", this.name);
    }

    const abortController = new AbortController();
    const abort = (): void => abortController.abort();
    options.signal.addEventListener("abort", abort, { once: true });

    try {
      type SdkOptions = NonNullable<Parameters<typeof sdkQuery>[0]["options"]>;
      const model = this.config.model;
      const sdkOptions: SdkOptions = {
        abortController,
        ...(model !== undefined ? { model } : {}),
        allowedTools: [],
        maxTurns: 1,
      };

      const response = sdkQuery({
        prompt: `${ADVISOR_SYSTEM_PROMPT}\n\n${buildAdvicePrompt(context)}`,
        options: sdkOptions,
      });

      for await (const message of response) {
        if (message.type !== "result") continue;
        if (message.subtype === "success" && !message.is_error) {
          return parseAdvice(message.result);
        }
        throw new AdvisorUnavailableError(`Claude SDK query failed: ${message.subtype}`, this.name);
      }
      throw new AdvisorUnavailableError("No result message received from SDK", this.name);
    } finally {
      options.signal.removeEventListener("abort", abort);
    }
  }
}
