import { ValidationError } from "../../infra/errors.js";
import type { ToolParams, ToolResult } from "../../types/tool.js";
import { findBinary } from "./binary.js";
import { DEFAULT_RUN_OPTIONS, executeAdapter } from "./executor.js";
import type { CommandSpec, ParsedMetadata, SimulatedRun, ToolAdapter } from "./types.js";

export interface AdapterOptions {
  /** Binary override (name on PATH or a path) */
  binary?: string | undefined;
}

/**
 * Shared plumbing for tool adapters: install check, simulation wrapping,
 * stand-alone scan() and clamped parameter readers.
 *
 * Subclasses describe the tool, build its argv, parse its stdout and produce
 * sample output for simulated runs. Simulated metadata goes through the same
 * parse() as live output so both always carry the same keys.
 */
export abstract class BaseToolAdapter<M extends ParsedMetadata> implements ToolAdapter {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly defaultTimeoutSeconds: number;
  abstract readonly maxTimeoutSeconds: number;
  readonly successExitCodes: readonly number[] = [0];
  readonly binary: string;

  constructor(defaultBinary: string, options: AdapterOptions = {}) {
    this.binary = options.binary ?? defaultBinary;
  }

  abstract emptyMetadata(): M;
  abstract buildCommand(target: string, params: ToolParams): CommandSpec;
  abstract parse(output: string, params: ToolParams): M;

  /** Representative stdout for a simulated run against `target` */
  protected abstract sampleOutput(target: string, params: ToolParams): string;

  isInstalled(): boolean {
    return findBinary(this.binary) !== null;
  }

  simulate(target: string, params: ToolParams): SimulatedRun {
    const output = this.sampleOutput(target, params);
    return {
      command: `${this.name} ${target} (simulated - ${this.binary} not installed)`,
      output,
      metadata: { ...this.parse(output, params), simulation_mode: true },
    };
  }

  async scan(target: string, params: ToolParams = {}): Promise<ToolResult> {
    const run = await executeAdapter(this, target, params, DEFAULT_RUN_OPTIONS);
    return { ...run, id: null, sessionId: null, storedAt: null };
  }

  // ============ Parameter helpers ============

  /** Integer param clamped to [min, max]; non-numbers fall back to the default */
  protected intParam(params: ToolParams, key: string, fallback: number, min: number, max: number): number {
    const raw = params[key];
    const value =
      typeof raw === "number" && Number.isFinite(raw)
        ? Math.trunc(raw)
        : typeof raw === "string" && /^-?\d+$/.test(raw.trim())
          ? Number.parseInt(raw, 10)
          : fallback;
    return Math.min(Math.max(value, min), max);
  }

  protected stringParam(params: ToolParams, key: string): string | undefined {
    const raw = params[key];
    if (raw === undefined || raw === null) return undefined;
    if (typeof raw !== "string") {
      throw new ValidationError(`${this.name}: parameter "${key}" must be a string`);
    }
    return raw.length > 0 ? raw : undefined;
  }

  protected boolParam(params: ToolParams, key: string, fallback = false): boolean {
    const raw = params[key];
    return typeof raw === "boolean" ? raw : fallback;
  }

  /** String list param, truncated to `max` entries */
  protected listParam(params: ToolParams, key: string, max: number): string[] | undefined {
    const raw = params[key];
    if (raw === undefined || raw === null) return undefined;
    const items = typeof raw === "string" ? raw.split(",") : raw;
    if (!Array.isArray(items)) {
      throw new ValidationError(`${this.name}: parameter "${key}" must be a list`);
    }
    return items
      .filter((item): item is string | number => typeof item === "string" || typeof item === "number")
      .map((item) => String(item).trim())
      .filter((item) => item.length > 0)
      .slice(0, max);
  }

  /** One of `allowed`, or the fallback */
  protected choiceParam<T extends string>(
    params: ToolParams,
    key: string,
    allowed: readonly T[],
    fallback: T
  ): T {
    const raw = params[key];
    return allowed.find((choice) => choice === raw) ?? fallback;
  }
}

/** Host part of a target: URL hostname, host:port host, or the target itself */
export function hostOf(target: string): string {
  const trimmed = target.trim();
  if (trimmed.includes("://")) {
    try {
      return new URL(trimmed).hostname.replace(/^\[|\]$/g, "");
    } catch {
      return trimmed;
    }
  }
  if (trimmed.startsWith("[")) {
    const end = trimmed.indexOf("]");
    return end > 0 ? trimmed.slice(1, end) : trimmed;
  }
  const withoutPath = trimmed.split("/")[0] ?? trimmed;
  // A single colon is host:port; several mean a bare IPv6 address
  const colons = withoutPath.split(":").length - 1;
  return colons === 1 ? (withoutPath.split(":")[0] ?? withoutPath) : withoutPath;
}

/** Target as a URL, defaulting to http:// for bare hosts */
export function urlOf(target: string): string {
  const trimmed = target.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

export function lines(output: string): string[] {
  return output.split(/\r?\n/).map((line) => line.trim());
}
