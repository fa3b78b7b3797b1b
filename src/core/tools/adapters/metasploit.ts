import { ValidationError } from "../../../infra/errors.js";
import type { ToolParams } from "../../../types/tool.js";
import { BaseToolAdapter, hostOf, lines, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export type ExploitModule = {
  name: string;
  disclosure_date: string | null;
  rank: string;
  check: boolean;
  description: string;
};

export type MetasploitMetadata = {
  exploits: ExploitModule[];
  exploit_count: number;
  search_terms: string;
};

const SAFE_TERMS = /^[\w .:/-]+$/;
const MODULE_LINE =
  /^\d+\s+((?:exploit|auxiliary)\/\S+)\s+(?:(\d{4}-\d{2}-\d{2})\s+)?(\w+)\s+(Yes|No)\s+(.+)$/;

/**
 * Module search through msfconsole. Only `search` ever runs; nothing is
 * launched against the target.
 */
export class MetasploitAdapter extends BaseToolAdapter<MetasploitMetadata> {
  readonly name = "metasploit";
  readonly description = "Metasploit module search for exploits matching discovered services";
  readonly defaultTimeoutSeconds = 120;
  readonly maxTimeoutSeconds = 300;

  constructor(options: AdapterOptions = {}) {
    super("msfconsole", options);
  }

  emptyMetadata(): MetasploitMetadata {
    return { exploits: [], exploit_count: 0, search_terms: "" };
  }

  /** Search expression: explicit terms, else discovered services, else the host */
  searchTerms(target: string, params: ToolParams): string {
    const explicit = this.stringParam(params, "search");
    const services = this.listParam(params, "services", 5);
    let terms = explicit ?? (services && services.length > 0 ? services.join(" ") : hostOf(target));

    if (!SAFE_TERMS.test(terms)) {
      throw new ValidationError(`metasploit: unsupported characters in search terms "${terms}"`);
    }
    if (!terms.includes("type:")) {
      terms = `type:exploit ${terms}`;
    }
    return terms;
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    return {
      binary: this.binary,
      args: ["-q", "-x", `search ${this.searchTerms(target, params)}; exit`],
    };
  }

  parse(output: string, params: ToolParams): MetasploitMetadata {
    const metadata = this.emptyMetadata();
    const terms = this.stringParam(params, "search");
    metadata.search_terms = terms ?? "";

    for (const line of lines(output)) {
      const module = MODULE_LINE.exec(line);
      if (!module?.[1] || !module[3] || !module[4] || !module[5]) continue;
      metadata.exploits.push({
        name: module[1],
        disclosure_date: module[2] ?? null,
        rank: module[3],
        check: module[4] === "Yes",
        description: module[5].trim(),
      });
    }

    const echoed = /^Matching Modules for (.+)$/m.exec(output);
    if (echoed?.[1] && !terms) {
      metadata.search_terms = echoed[1].trim();
    }
    metadata.exploit_count = metadata.exploits.length;
    return metadata;
  }

  protected sampleOutput(target: string, params: ToolParams): string {
    return [
      `Matching Modules for ${this.searchTerms(target, params)}`,
      "================",
      "",
      "   #  Name                                  Disclosure Date  Rank       Check  Description",
      "   -  ----                                  ---------------  ----       -----  -----------",
      "   0  exploit/unix/ftp/vsftpd_234_backdoor  2011-07-03       excellent  No     VSFTPD v2.3.4 Backdoor Command Execution",
      "   1  exploit/multi/http/apache_normalize_path_rce  2021-10-05  excellent  Yes  Apache 2.4.49/2.4.50 Traversal RCE",
    ].join("\n");
  }
}
