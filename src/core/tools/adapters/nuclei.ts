import { ParseError } from "../../../infra/errors.js";
import type { ToolParams } from "../../../types/tool.js";
import { BaseToolAdapter, lines, urlOf, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export type NucleiMatch = {
  template_id: string;
  name: string;
  severity: string;
  type: string;
  matched_at: string;
};

export type NucleiMetadata = {
  vulnerabilities: NucleiMatch[];
  templates_matched: string[];
};

export const NUCLEI_SEVERITIES = ["info", "low", "medium", "high", "critical"] as const;

const DEFAULT_TEMPLATES = ["exposures/", "misconfiguration/"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

export class NucleiAdapter extends BaseToolAdapter<NucleiMetadata> {
  readonly name = "nuclei";
  readonly description = "Template-based vulnerability scanner";
  readonly defaultTimeoutSeconds = 600;
  readonly maxTimeoutSeconds = 900;

  constructor(options: AdapterOptions = {}) {
    super("nuclei", options);
  }

  emptyMetadata(): NucleiMetadata {
    return { vulnerabilities: [], templates_matched: [] };
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    const args = ["-u", urlOf(target), "-jsonl", "-silent", "-no-color"];

    for (const template of this.listParam(params, "templates", 10) ?? DEFAULT_TEMPLATES) {
      args.push("-t", template);
    }
    const severity = this.choiceParam(params, "severity", [...NUCLEI_SEVERITIES, "any"], "any");
    if (severity !== "any") {
      args.push("-severity", severity);
    }
    args.push(
      "-rate-limit",
      String(this.intParam(params, "rate_limit", 150, 1, 150)),
      "-c",
      String(this.intParam(params, "concurrency", 25, 1, 25))
    );
    return { binary: this.binary, args };
  }

  parse(output: string): NucleiMetadata {
    const metadata = this.emptyMetadata();
    const templates = new Set<string>();

    for (const line of lines(output)) {
      if (line.length === 0) continue;

      let record: unknown;
      try {
        record = JSON.parse(line);
      } catch (error) {
        throw new ParseError(
          `Unexpected nuclei output line: ${line.slice(0, 80)}`,
          this.name,
          error instanceof Error ? error : undefined
        );
      }
      if (!isRecord(record)) continue;

      const info = isRecord(record["info"]) ? record["info"] : {};
      const templateId = text(record["template-id"], "unknown");
      metadata.vulnerabilities.push({
        template_id: templateId,
        name: text(info["name"], templateId),
        severity: text(info["severity"], "info"),
        type: text(record["type"]),
        matched_at: text(record["matched-at"], text(record["host"])),
      });
      templates.add(templateId);
    }

    metadata.templates_matched = [...templates];
    return metadata;
  }

  protected sampleOutput(target: string): string {
    const url = urlOf(target);
    return [
      {
        "template-id": "http-missing-security-headers",
        info: { name: "HTTP Missing Security Headers", severity: "info" },
        type: "http",
        host: url,
        "matched-at": url,
      },
      {
        "template-id": "options-method",
        info: { name: "Allowed Options Method", severity: "info" },
        type: "http",
        host: url,
        "matched-at": url,
      },
    ]
      .map((match) => JSON.stringify(match))
      .join("\n");
  }
}
