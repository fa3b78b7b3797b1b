import type { ToolParams } from "../../../types/tool.js";
import { BaseToolAdapter, lines, urlOf, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export type SqlInjection = {
  parameter: string;
  place: string;
  types: string[];
  titles: string[];
  severity: "high";
};

export type SqlmapMetadata = {
  vulnerabilities: SqlInjection[];
  databases: string[];
  injectable: boolean;
};

const PARAMETER_LINE = /^Parameter: (.+?) \(([^)]+)\)$/;

export class SqlmapAdapter extends BaseToolAdapter<SqlmapMetadata> {
  readonly name = "sqlmap";
  readonly description = "SQL injection detection against a URL's parameters";
  readonly defaultTimeoutSeconds = 300;
  readonly maxTimeoutSeconds = 600;

  constructor(options: AdapterOptions = {}) {
    super("sqlmap", options);
  }

  emptyMetadata(): SqlmapMetadata {
    return { vulnerabilities: [], databases: [], injectable: false };
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    const args = [
      "-u",
      urlOf(target),
      "--batch",
      "--random-agent",
      "--level",
      String(this.intParam(params, "level", 1, 1, 3)),
      "--risk",
      String(this.intParam(params, "risk", 1, 1, 2)),
      "--threads",
      String(this.intParam(params, "threads", 1, 1, 4)),
      "--delay",
      String(this.intParam(params, "delay", 1, 0, 10)),
    ];

    if (this.boolParam(params, "enumerate_dbs")) {
      args.push("--dbs");
    }
    const data = this.stringParam(params, "data");
    if (data) {
      args.push("--data", data);
    }
    const cookie = this.stringParam(params, "cookie");
    if (cookie) {
      args.push("--cookie", cookie);
    }
    return { binary: this.binary, args };
  }

  parse(output: string): SqlmapMetadata {
    const metadata = this.emptyMetadata();
    let current: SqlInjection | undefined;
    let inDatabases = false;

    for (const line of lines(output)) {
      if (inDatabases) {
        const db = /^\[\*\] (.+)$/.exec(line);
        if (db?.[1]) {
          metadata.databases.push(db[1].trim());
          continue;
        }
        inDatabases = false;
      }

      if (/^available databases/.test(line)) {
        inDatabases = true;
        continue;
      }

      const parameter = PARAMETER_LINE.exec(line);
      if (parameter?.[1] && parameter[2]) {
        current = { parameter: parameter[1], place: parameter[2], types: [], titles: [], severity: "high" };
        metadata.vulnerabilities.push(current);
        continue;
      }
      if (line === "---") {
        current = undefined;
        continue;
      }
      if (current && line.startsWith("Type:")) {
        current.types.push(line.slice(5).trim());
      } else if (current && line.startsWith("Title:")) {
        current.titles.push(line.slice(6).trim());
      } else if (/ is vulnerable/.test(line)) {
        metadata.injectable = true;
      }
    }

    if (metadata.vulnerabilities.length > 0) {
      metadata.injectable = true;
    }
    return metadata;
  }

  protected sampleOutput(target: string): string {
    return [
      `[INFO] testing connection to the target URL ${urlOf(target)}`,
      "[INFO] testing if the target URL content is stable",
      "[WARNING] GET parameter 'id' does not seem to be injectable",
      "[CRITICAL] all tested parameters do not appear to be injectable.",
    ].join("\n");
  }
}
