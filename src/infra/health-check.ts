import { freemem, totalmem } from "node:os";
import { statfsSync } from "node:fs";
import { logger } from "./logger.js";

export type HealthStatus = "ok" | "warning" | "critical" | "unavailable";

export interface DiskSpaceCheck {
  status: HealthStatus;
  availableGb: number;
  usedPercent: number;
  path: string;
}

export interface MemoryCheck {
  status: HealthStatus;
  usedMb: number;
  availableMb: number;
}

export interface StoreCheck {
  status: HealthStatus;
  error?: string;
}

export interface ToolsCheck {
  status: HealthStatus;
  installed: string[];
  missing: string[];
  /** Required tools among the missing ones */
  missingRequired: string[];
}

export interface AdvisorCheck {
  name: string;
  status: HealthStatus;
  latencyMs: number;
  error?: string;
}

export interface HealthCheckResult {
  healthy: boolean;
  overallStatus: HealthStatus;
  checks: {
    diskSpace: DiskSpaceCheck;
    memory: MemoryCheck;
    store: StoreCheck | undefined;
    tools: ToolsCheck | undefined;
    advisors: AdvisorCheck[];
  };
  timestamp: Date;
}

/** What the checker probes beyond the host itself */
export interface HealthProbes {
  store?: () => boolean;
  tools?: () => Promise<Array<{ name: string; installed: boolean }>>;
  advisors?: Array<{ name: string; isAvailable: () => Promise<boolean> }>;
}

export interface HealthCheckOptions {
  /** Path to check disk space for (the data directory) */
  diskPath: string;
  diskWarningThresholdGb?: number;
  diskCriticalThresholdGb?: number;
  memoryWarningThresholdMb?: number;
  /** Missing tools that degrade the status to warning */
  requiredTools?: string[];
}

/**
 * Pre-flight check for the `health` command: host resources, the audit store,
 * installed tool binaries and advisor reachability.
 *
 * A missing advisor is only a warning since decisions fall back to the
 * rule-based ranking; an unreachable store is critical.
 */
export class HealthChecker {
  private readonly diskWarningThresholdGb: number;
  private readonly diskCriticalThresholdGb: number;
  private readonly memoryWarningThresholdMb: number;
  private readonly requiredTools: string[];

  constructor(
    private readonly options: HealthCheckOptions,
    private readonly probes: HealthProbes = {}
  ) {
    this.diskWarningThresholdGb = options.diskWarningThresholdGb ?? 1.0;
    this.diskCriticalThresholdGb = options.diskCriticalThresholdGb ?? 0.5;
    this.memoryWarningThresholdMb = options.memoryWarningThresholdMb ?? 100;
    this.requiredTools = options.requiredTools ?? [];
  }

  async check(): Promise<HealthCheckResult> {
    const diskSpace = this.checkDiskSpace();
    const memory = this.checkMemory();
    const store = this.probes.store ? this.checkStore(this.probes.store) : undefined;
    const tools = this.probes.tools ? await this.checkTools(this.probes.tools) : undefined;
    const advisors = await Promise.all(
      (this.probes.advisors ?? []).map((advisor) => this.checkAdvisor(advisor))
    );

    const statuses: HealthStatus[] = [diskSpace.status, memory.status];
    if (store) statuses.push(store.status);
    if (tools) statuses.push(tools.status);
    // A dead advisor never makes the host critical
    for (const advisor of advisors) {
      statuses.push(advisor.status === "ok" ? "ok" : "warning");
    }

    let overallStatus: HealthStatus = "ok";
    if (statuses.includes("critical") || statuses.includes("unavailable")) {
      overallStatus = "critical";
    } else if (statuses.includes("warning")) {
      overallStatus = "warning";
    }

    return {
      healthy: overallStatus === "ok",
      overallStatus,
      checks: { diskSpace, memory, store, tools, advisors },
      timestamp: new Date(),
    };
  }

  checkDiskSpace(): DiskSpaceCheck {
    try {
      const stats = statfsSync(this.options.diskPath);
      const availableBytes = stats.bavail * stats.bsize;
      const totalBytes = stats.blocks * stats.bsize;
      const availableGb = availableBytes / (1024 * 1024 * 1024);
      const usedPercent = totalBytes > 0 ? ((totalBytes - availableBytes) / totalBytes) * 100 : 0;

      let status: HealthStatus = "ok";
      if (availableGb < this.diskCriticalThresholdGb) {
        status = "critical";
      } else if (availableGb < this.diskWarningThresholdGb) {
        status = "warning";
      }

      return {
        status,
        availableGb: Math.round(availableGb * 100) / 100,
        usedPercent: Math.round(usedPercent * 10) / 10,
        path: this.options.diskPath,
      };
    } catch (error) {
      logger.warn("Failed to check disk space", {
        error: error instanceof Error ? error.message : String(error),
      });
      return { status: "unavailable", availableGb: 0, usedPercent: 0, path: this.options.diskPath };
    }
  }

  checkMemory(): MemoryCheck {
    const totalMb = totalmem() / (1024 * 1024);
    const freeMb = freemem() / (1024 * 1024);

    return {
      status: freeMb < this.memoryWarningThresholdMb ? "warning" : "ok",
      usedMb: Math.round(totalMb - freeMb),
      availableMb: Math.round(freeMb),
    };
  }

  private checkStore(ping: () => boolean): StoreCheck {
    try {
      return { status: ping() ? "ok" : "critical" };
    } catch (error) {
      return {
        status: "critical",
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async checkTools(
    list: () => Promise<Array<{ name: string; installed: boolean }>>
  ): Promise<ToolsCheck> {
    const tools = await list();
    const installed = tools.filter((t) => t.installed).map((t) => t.name);
    const missing = tools.filter((t) => !t.installed).map((t) => t.name);
    const missingRequired = missing.filter((name) => this.requiredTools.includes(name));

    return {
      status: missingRequired.length > 0 ? "warning" : "ok",
      installed,
      missing,
      missingRequired,
    };
  }

  private async checkAdvisor(advisor: {
    name: string;
    isAvailable: () => Promise<boolean>;
  }): Promise<AdvisorCheck> {
    const startTime = Date.now();
    try {
      const available = await advisor.isAvailable();
      return {
        name: advisor.name,
        status: available ? "ok" : "unavailable",
        latencyMs: Date.now() - startTime,
      };
    } catch (error) {
      return {
        name: advisor.name,
        status: "unavailable",
        latencyMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
