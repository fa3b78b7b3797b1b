import { z } from "zod";
import type { AdvisorAdvice } from "./types.js";

const AdviceSchema = z.object({
  tool: z.string().trim().min(1),
  priority: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["low", "medium", "high"])
  ),
  reasoning: z.string().default(""),
  ranking: z.array(z.string()).optional(),
});

/** Drop reasoning-model scratchpads, including one left unterminated */
function stripThinking(text: string): string {
  return text.replace(/<think>[\s\S]*?(<\/think>|$)/gi, "");
}

/**
 * First balanced `{...}` in the text, skipping braces inside JSON strings
 */
export function extractFirstJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === "\\") escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === "{") depth++;
    else if (char === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Parse a model reply into advice; null when it holds no valid JSON answer
 */
export function parseAdvice(reply: string): AdvisorAdvice | null {
  const json = extractFirstJsonObject(stripThinking(reply));
  if (json === null) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return null;
  }

  const parsed = AdviceSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { tool, priority, reasoning, ranking } = parsed.data;
  return { tool, priority, reasoning, ranking: ranking ?? [tool] };
}
