import type { FindingSeverity } from "../../../types/audit.js";
import type { ToolParams } from "../../../types/tool.js";
import { BaseToolAdapter, lines, urlOf, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export type ZapAlert = {
  name: string;
  plugin_id: string;
  status: string;
  severity: FindingSeverity;
  count: number;
};

export type ZapMetadata = {
  vulnerabilities: ZapAlert[];
  alerts_count: number;
  high_risk: number;
  medium_risk: number;
};

const ALERT_LINE = /^(WARN|FAIL|INFO)-(NEW|INPROG)\s*:\s*(.+?)\s*\[(\d+)\]\s*x\s*(\d+)/;

const LEVEL_SEVERITY: Record<string, FindingSeverity> = {
  FAIL: "high",
  WARN: "medium",
  INFO: "low",
};

/**
 * OWASP ZAP through its packaged baseline script (spider plus passive scan)
 */
export class ZapAdapter extends BaseToolAdapter<ZapMetadata> {
  readonly name = "zap";
  readonly description = "OWASP ZAP baseline scan: spider plus passive checks";
  readonly defaultTimeoutSeconds = 600;
  readonly maxTimeoutSeconds = 900;
  // The baseline script exits 1 on FAIL and 2 on WARN findings
  readonly successExitCodes = [0, 1, 2];

  constructor(options: AdapterOptions = {}) {
    super("zap-baseline.py", options);
  }

  emptyMetadata(): ZapMetadata {
    return { vulnerabilities: [], alerts_count: 0, high_risk: 0, medium_risk: 0 };
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    const minutes = this.intParam(params, "minutes", 5, 1, 10);
    const args = ["-t", urlOf(target), "-m", String(minutes)];
    if (this.boolParam(params, "ajax_spider")) {
      args.push("-j");
    }
    return { binary: this.binary, args };
  }

  parse(output: string): ZapMetadata {
    const metadata = this.emptyMetadata();

    for (const line of lines(output)) {
      const alert = ALERT_LINE.exec(line);
      if (!alert?.[1] || !alert[2] || !alert[3] || !alert[4] || !alert[5]) continue;

      const severity = LEVEL_SEVERITY[alert[1]] ?? "low";
      metadata.vulnerabilities.push({
        name: alert[3],
        plugin_id: alert[4],
        status: alert[2].toLowerCase(),
        severity,
        count: Number(alert[5]),
      });
      if (severity === "high") metadata.high_risk++;
      if (severity === "medium") metadata.medium_risk++;
    }

    metadata.alerts_count = metadata.vulnerabilities.length;
    return metadata;
  }

  protected sampleOutput(target: string): string {
    return [
      `Total of 12 URLs for ${urlOf(target)}`,
      "PASS: Vulnerable JS Library [10003]",
      "WARN-NEW: X-Content-Type-Options Header Missing [10021] x 4",
      "WARN-NEW: Content Security Policy (CSP) Header Not Set [10038] x 3",
      "FAIL-NEW: 0\tFAIL-INPROG: 0\tWARN-NEW: 2\tWARN-INPROG: 0\tINFO: 0\tIGNORE: 0\tPASS: 45",
    ].join("\n");
  }
}
