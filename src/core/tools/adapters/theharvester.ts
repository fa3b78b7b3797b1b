import type { ToolParams } from "../../../types/tool.js";
import { BaseToolAdapter, hostOf, lines, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export type TheHarvesterMetadata = {
  emails: string[];
  hosts: string[];
  sources: string[];
};

// Passive sources that need no API key
export const HARVESTER_SOURCES = [
  "google",
  "bing",
  "duckduckgo",
  "yahoo",
  "baidu",
  "crtsh",
  "dnsdumpster",
  "hackertarget",
  "otx",
  "rapiddns",
  "urlscan",
] as const;

const DEFAULT_SOURCES = ["google", "bing"];

type Section = "emails" | "hosts" | null;

export class TheHarvesterAdapter extends BaseToolAdapter<TheHarvesterMetadata> {
  readonly name = "theharvester";
  readonly description = "OSINT collection of e-mail addresses and hostnames for a domain";
  readonly defaultTimeoutSeconds = 300;
  readonly maxTimeoutSeconds = 600;

  constructor(options: AdapterOptions = {}) {
    super("theHarvester", options);
  }

  emptyMetadata(): TheHarvesterMetadata {
    return { emails: [], hosts: [], sources: [] };
  }

  sources(params: ToolParams): string[] {
    const requested = this.listParam(params, "sources", HARVESTER_SOURCES.length) ?? DEFAULT_SOURCES;
    const allowed = requested.filter((source) =>
      HARVESTER_SOURCES.some((known) => known === source.toLowerCase())
    );
    return allowed.length > 0 ? allowed.map((s) => s.toLowerCase()) : DEFAULT_SOURCES;
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    return {
      binary: this.binary,
      args: [
        "-d",
        hostOf(target),
        "-b",
        this.sources(params).join(","),
        "-l",
        String(this.intParam(params, "limit", 100, 1, 500)),
      ],
    };
  }

  parse(output: string, params: ToolParams): TheHarvesterMetadata {
    const metadata: TheHarvesterMetadata = { ...this.emptyMetadata(), sources: this.sources(params) };
    let section: Section = null;

    for (const line of lines(output)) {
      if (line.startsWith("[*]")) {
        section = /emails found/i.test(line) ? "emails" : /hosts found/i.test(line) ? "hosts" : null;
        continue;
      }
      if (section === null || line.length === 0 || /^-+$/.test(line)) {
        continue;
      }
      if (section === "emails" && line.includes("@")) {
        metadata.emails.push(line);
      } else if (section === "hosts") {
        metadata.hosts.push(line);
      }
    }

    return metadata;
  }

  protected sampleOutput(target: string): string {
    const domain = hostOf(target);
    return [
      `[*] Target: ${domain}`,
      "",
      "[*] Emails found: 1",
      "----------------------",
      `info@${domain}`,
      "",
      "[*] Hosts found: 2",
      "---------------------",
      `www.${domain}`,
      `mail.${domain}`,
    ].join("\n");
  }
}
