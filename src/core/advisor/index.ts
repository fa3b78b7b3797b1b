export * from "./types.js";
export { parseAdvice, extractFirstJsonObject } from "./parse-advice.js";
export { ADVISOR_SYSTEM_PROMPT, buildAdvicePrompt } from "./prompts.js";
export { OllamaAdvisor } from "./ollama-advisor.js";
export { ClaudeSdkAdvisor } from "./claude-sdk-advisor.js";
export { ClaudeCliAdvisor } from "./claude-cli-advisor.js";
export { AdvisorChain, type AdvisorChainOptions, type ChainAdvice } from "./advisor-chain.js";
export { createAdvisor, createAdvisorChain } from "./advisor-factory.js";
