import OpenAI from "openai";
import { logger } from "../../infra/logger.js";
import { AdvisorUnavailableError, toError } from "../../infra/errors.js";
import type { AdvisorConfig } from "../../types/config.js";
import { parseAdvice } from "./parse-advice.js";
import { ADVISOR_SYSTEM_PROMPT, buildAdvicePrompt } from "./prompts.js";
import type { AdviseOptions, Advisor, AdvisorAdvice, AdvisorContext } from "./types.js";

const AVAILABILITY_TIMEOUT_MS = 3000;

/**
 * Local model served by Ollama through its OpenAI-compatible endpoint
 */
export class OllamaAdvisor implements Advisor {
  readonly name = "ollama";
  private readonly client: OpenAI;

  constructor(private readonly config: AdvisorConfig["ollama"]) {
    this.client = new OpenAI({
      // Ollama ignores the key but the client requires one
      apiKey: "ollama",
      baseURL: `${config.baseUrl.replace(/\/+$/, "")}/v1`,
      maxRetries: 0,
    });
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.models.list({ timeout: AVAILABILITY_TIMEOUT_MS });
      return true;
    } catch (error) {
      logger.debug(`Ollama not available at ${this.config.baseUrl}: ${toError(error).message}`);
      return false;
    }
  }

  async advise(context: AdvisorContext, options: AdviseOptions): Promise<AdvisorAdvice | null> {
    let content: string;
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.config.model,
          temperature: this.config.temperature,
          messages: [
            { role: "system", content: ADVISOR_SYSTEM_PROMPT },
            { role: "user", content: buildAdvicePrompt(context) },
          ],
        },
        { signal: options.signal, timeout: options.timeoutMs }
      );
      content = completion.choices[0]?.message.content ?? "";
    } catch (error) {
      throw new AdvisorUnavailableError(
        `Ollama request failed: ${toError(error).message}`,
        this.name,
        toError(error)
      );
    }

    logger.debug(`Ollama replied (${content.length} chars)`);
    return parseAdvice(content);
  }
}
