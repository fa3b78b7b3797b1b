import type { AdvisorContext } from "./types.js";

export const ADVISOR_SYSTEM_PROMPT = `You are a penetration testing planner. You choose the next security tool to run against an authorized target.
Answer with a single JSON object and nothing else:
{"tool": "<one of the candidate tools>", "priority": "low" | "medium" | "high", "reasoning": "<one or two sentences>", "ranking": ["<candidate>", ...]}`;

export function buildAdvicePrompt(context: AdvisorContext): string {
  const completed = context.completedTools.length > 0 ? context.completedTools.join(", ") : "none";
  return `Target: ${context.target}
Agent role: ${context.agentRole}
Engagement state: ${context.state}
Tools already completed: ${completed}
Findings so far: ${context.findingsCount} (${context.vulnerabilitiesCount} vulnerabilities)
Candidate tools: ${context.candidates.join(", ")}

Pick exactly one tool from the candidate list.`;
}
