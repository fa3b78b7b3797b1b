import type { ToolParams } from "../../../types/tool.js";
import type { FindingSeverity } from "../../../types/audit.js";
import { BaseToolAdapter, hostOf, lines, urlOf, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export type NiktoItem = {
  type: "finding" | "osvdb";
  description: string;
  severity: FindingSeverity;
  osvdb_id: string | null;
};

export type NiktoMetadata = {
  vulnerabilities: NiktoItem[];
  server_info: Record<string, string>;
  total_items: number;
};

const SEVERITY_KEYWORDS: Array<[FindingSeverity, string[]]> = [
  [
    "high",
    [
      "sql injection",
      "xss",
      "cross-site scripting",
      "remote code execution",
      "file inclusion",
      "directory traversal",
      "authentication bypass",
      "privilege escalation",
      "buffer overflow",
    ],
  ],
  ["medium", ["information disclosure", "configuration", "default", "version", "backup", "log", "debug", "admin"]],
  ["low", ["banner", "header", "cookie", "redirect", "robots.txt"]],
];

const SERVER_FIELDS: Record<string, string> = {
  "Target IP": "ip",
  "Target Hostname": "hostname",
  "Target Port": "port",
  "Start Time": "start_time",
  Server: "server",
};

// Summary lines, not findings
const NOISE = [/^\d+ requests?:/, /^\d+ host\(s\) tested/, /^End Time:/];

export function classifyNiktoSeverity(description: string): FindingSeverity {
  const lowered = description.toLowerCase();
  for (const [severity, keywords] of SEVERITY_KEYWORDS) {
    if (keywords.some((keyword) => lowered.includes(keyword))) {
      return severity;
    }
  }
  return "info";
}

export class NiktoAdapter extends BaseToolAdapter<NiktoMetadata> {
  readonly name = "nikto";
  readonly description = "Web server scanner for dangerous files, outdated software and misconfigurations";
  readonly defaultTimeoutSeconds = 600;
  readonly maxTimeoutSeconds = 900;
  // nikto exits 1 when it reports items
  readonly successExitCodes = [0, 1];

  constructor(options: AdapterOptions = {}) {
    super("nikto", options);
  }

  emptyMetadata(): NiktoMetadata {
    return { vulnerabilities: [], server_info: {}, total_items: 0 };
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    const maxtime = this.intParam(params, "maxtime", 300, 1, 600);
    const args = ["-h", urlOf(target), "-maxtime", `${maxtime}s`, "-nointeractive"];

    if (params["port"] !== undefined) {
      args.push("-port", String(this.intParam(params, "port", 80, 1, 65535)));
    }
    if (this.boolParam(params, "ssl") || target.toLowerCase().startsWith("https://")) {
      args.push("-ssl");
    }
    const tuning = this.stringParam(params, "tuning");
    if (tuning && /^[0-9a-cx]+$/.test(tuning)) {
      args.push("-Tuning", tuning);
    }
    if (this.boolParam(params, "no_lookup")) {
      args.push("-nolookup");
    }
    return { binary: this.binary, args };
  }

  parse(output: string): NiktoMetadata {
    const metadata = this.emptyMetadata();

    for (const line of lines(output)) {
      if (!line.startsWith("+ ")) continue;
      const body = line.slice(2);
      const colon = body.indexOf(":");
      if (colon < 0) continue;

      const label = body.slice(0, colon).trim();
      const serverField = SERVER_FIELDS[label];
      if (serverField) {
        metadata.server_info[serverField] = body.slice(colon + 1).trim();
        continue;
      }
      if (NOISE.some((pattern) => pattern.test(body))) continue;

      const osvdb = /OSVDB-(\d+)/.exec(body);
      metadata.vulnerabilities.push({
        type: osvdb ? "osvdb" : "finding",
        description: body,
        severity: classifyNiktoSeverity(body),
        osvdb_id: osvdb?.[1] ?? null,
      });
    }

    metadata.total_items = metadata.vulnerabilities.length;
    return metadata;
  }

  protected sampleOutput(target: string): string {
    return [
      "- Nikto v2.5.0",
      "---------------------------------------------------------------------------",
      `+ Target Hostname:    ${hostOf(target)}`,
      "+ Target Port:        80",
      "+ Server: Apache/2.4.41 (Ubuntu)",
      "+ /: The X-Content-Type-Options header is not set.",
      "+ /admin/: Default admin directory found.",
      "+ 7850 requests: 0 error(s) and 2 item(s) reported on remote host",
      "+ 1 host(s) tested",
    ].join("\n");
  }
}
