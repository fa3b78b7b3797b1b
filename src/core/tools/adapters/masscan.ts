import type { ToolParams } from "../../../types/tool.js";
import { BaseToolAdapter, lines, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export type MasscanPort = {
  ip: string;
  port: number;
  protocol: string;
  status: string;
};

export type MasscanMetadata = {
  open_ports: MasscanPort[];
  hosts_found: string[];
  total_ports_found: number;
  scan_rate: number;
};

const DEFAULT_PORTS = "21,22,23,25,53,80,110,135,139,143,443,445,993,995,1433,3306,3389,5432,5900,8080";
const DISCOVERED = /^Discovered open port (\d+)\/(\w+) on (\S+)/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class MasscanAdapter extends BaseToolAdapter<MasscanMetadata> {
  readonly name = "masscan";
  readonly description = "High-speed TCP port discovery across hosts and ranges";
  readonly defaultTimeoutSeconds = 300;
  readonly maxTimeoutSeconds = 600;

  constructor(options: AdapterOptions = {}) {
    super("masscan", options);
  }

  emptyMetadata(): MasscanMetadata {
    return { open_ports: [], hosts_found: [], total_ports_found: 0, scan_rate: 1000 };
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    const ports = this.listParam(params, "ports", 100)?.join(",") ?? DEFAULT_PORTS;
    const rate = this.intParam(params, "rate", 1000, 1, 10000);
    const wait = this.intParam(params, "wait", 10, 0, 30);

    const args = [target, "-p", ports, "--rate", String(rate), "--wait", String(wait)];
    if (this.boolParam(params, "randomize_hosts", true)) {
      args.push("--randomize-hosts");
    }
    for (const exclude of this.listParam(params, "exclude", 20) ?? []) {
      args.push("--exclude", exclude);
    }
    return { binary: this.binary, args };
  }

  parse(output: string, params: ToolParams): MasscanMetadata {
    const metadata: MasscanMetadata = {
      ...this.emptyMetadata(),
      scan_rate: this.intParam(params, "rate", 1000, 1, 10000),
    };
    const hosts = new Set<string>();

    for (const line of lines(output)) {
      const discovered = DISCOVERED.exec(line);
      if (discovered?.[1] && discovered[2] && discovered[3]) {
        metadata.open_ports.push({
          ip: discovered[3],
          port: Number(discovered[1]),
          protocol: discovered[2],
          status: "open",
        });
        hosts.add(discovered[3]);
        continue;
      }

      // -oJ style lines: {"ip": "...", "ports": [{"port": 80, "proto": "tcp", ...}]}
      if (line.startsWith("{")) {
        const record: unknown = JSON.parse(line.replace(/,$/, ""));
        if (!isRecord(record) || typeof record["ip"] !== "string" || !Array.isArray(record["ports"])) {
          continue;
        }
        const ip = record["ip"];
        for (const entry of record["ports"]) {
          if (!isRecord(entry) || typeof entry["port"] !== "number") continue;
          metadata.open_ports.push({
            ip,
            port: entry["port"],
            protocol: typeof entry["proto"] === "string" ? entry["proto"] : "tcp",
            status: typeof entry["status"] === "string" ? entry["status"] : "open",
          });
          hosts.add(ip);
        }
      }
    }

    metadata.hosts_found = [...hosts];
    metadata.total_ports_found = metadata.open_ports.length;
    return metadata;
  }

  protected sampleOutput(target: string): string {
    const host = target.split("/")[0] ?? target;
    return [
      "Starting masscan 1.3.2 (http://bit.ly/14GZzcT)",
      "Initiating SYN Stealth Scan",
      `Discovered open port 80/tcp on ${host}`,
      `Discovered open port 443/tcp on ${host}`,
    ].join("\n");
  }
}
