import { ParseError } from "../../../infra/errors.js";
import type { ToolParams } from "../../../types/tool.js";
import { BaseToolAdapter, lines, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export const NMAP_SCAN_TYPES = ["basic", "service", "stealth", "aggressive", "udp"] as const;
export type NmapScanType = (typeof NMAP_SCAN_TYPES)[number];

export type NmapMetadata = {
  open_ports: string[];
  services: Record<string, string>;
  os_info: string;
  scan_type: NmapScanType;
};

const SCAN_FLAGS: Record<NmapScanType, string[]> = {
  basic: ["-sT", "-p", "1-1000"],
  service: ["-sV", "-sC"],
  stealth: ["-sS", "-f"],
  aggressive: ["-A"],
  udp: ["-sU", "--top-ports", "100"],
};

// Stealth scans default to polite timing
const DEFAULT_TIMING: Record<NmapScanType, number> = {
  basic: 4,
  service: 4,
  stealth: 2,
  aggressive: 4,
  udp: 4,
};

const PORT_LINE = /^(\d+)\/(tcp|udp)\s+open(?:\|filtered)?\s+(\S+)/;

export class NmapAdapter extends BaseToolAdapter<NmapMetadata> {
  readonly name = "nmap";
  readonly description = "Network discovery, port scanning and service fingerprinting";
  readonly defaultTimeoutSeconds = 600;
  readonly maxTimeoutSeconds = 900;

  constructor(options: AdapterOptions = {}) {
    super("nmap", options);
  }

  emptyMetadata(): NmapMetadata {
    return { open_ports: [], services: {}, os_info: "", scan_type: "basic" };
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    const scanType = this.choiceParam(params, "scan_type", NMAP_SCAN_TYPES, "basic");
    const timing = this.intParam(params, "timing", DEFAULT_TIMING[scanType], 0, 4);
    const args = [...SCAN_FLAGS[scanType], `-T${timing}`];

    const ports = this.stringParam(params, "ports");
    if (ports && scanType !== "udp") {
      const index = args.indexOf("-p");
      if (index >= 0) {
        args.splice(index, 2);
      }
      args.push("-p", ports);
    }
    if (params["max_rate"] !== undefined) {
      args.push("--max-rate", String(this.intParam(params, "max_rate", 1000, 1, 1000)));
    }
    if (this.boolParam(params, "os_detection")) {
      args.push("-O");
    }
    const script = this.stringParam(params, "script");
    if (script) {
      args.push("--script", script);
    }

    args.push(target);
    return { binary: this.binary, args };
  }

  parse(output: string, params: ToolParams): NmapMetadata {
    if (output.trim().length > 0 && !output.includes("Nmap")) {
      throw new ParseError("Output is not an nmap report", this.name);
    }

    const metadata: NmapMetadata = {
      ...this.emptyMetadata(),
      scan_type: this.choiceParam(params, "scan_type", NMAP_SCAN_TYPES, "basic"),
    };

    for (const line of lines(output)) {
      const port = PORT_LINE.exec(line);
      if (port?.[1] && port[3]) {
        metadata.open_ports.push(port[1]);
        metadata.services[port[1]] = port[3];
        continue;
      }
      if (line.startsWith("OS details:") || line.startsWith("Running:") || line.startsWith("OS:")) {
        if (!metadata.os_info) {
          metadata.os_info = line.slice(line.indexOf(":") + 1).trim();
        }
      }
    }

    return metadata;
  }

  protected sampleOutput(target: string, params: ToolParams): string {
    const scanType = this.choiceParam(params, "scan_type", NMAP_SCAN_TYPES, "basic");
    const report = [
      "Starting Nmap 7.94 ( https://nmap.org )",
      `Nmap scan report for ${target}`,
      "Host is up (0.045s latency).",
      "Not shown: 997 closed tcp ports (conn-refused)",
      "PORT    STATE SERVICE",
      "22/tcp  open  ssh",
      "80/tcp  open  http",
      "443/tcp open  https",
      "",
    ];
    if (scanType === "aggressive" || this.boolParam(params, "os_detection")) {
      report.push("Running: Linux 5.X");
    }
    report.push("Nmap done: 1 IP address (1 host up) scanned in 2.15 seconds");
    return report.join("\n");
  }
}
