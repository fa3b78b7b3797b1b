import type { ToolsConfig } from "../../types/config.js";
import type { ToolInfo } from "../../types/tool.js";
import type { AdapterOptions } from "./base-adapter.js";
import type { ToolAdapter } from "./types.js";
import { DirsearchAdapter } from "./adapters/dirsearch.js";
import { Enum4linuxAdapter } from "./adapters/enum4linux.js";
import { HydraAdapter } from "./adapters/hydra.js";
import { JohnAdapter } from "./adapters/john.js";
import { MasscanAdapter } from "./adapters/masscan.js";
import { MetasploitAdapter } from "./adapters/metasploit.js";
import { NiktoAdapter } from "./adapters/nikto.js";
import { NmapAdapter } from "./adapters/nmap.js";
import { NucleiAdapter } from "./adapters/nuclei.js";
import { SqlmapAdapter } from "./adapters/sqlmap.js";
import { TheHarvesterAdapter } from "./adapters/theharvester.js";
import { ZapAdapter } from "./adapters/zap.js";

/**
 * Name-to-adapter lookup, fixed at construction
 */
export class ToolRegistry {
  private readonly adapters: ReadonlyMap<string, ToolAdapter>;

  constructor(adapters: readonly ToolAdapter[]) {
    const map = new Map<string, ToolAdapter>();
    for (const adapter of adapters) {
      if (map.has(adapter.name)) {
        throw new Error(`Duplicate tool adapter: ${adapter.name}`);
      }
      map.set(adapter.name, adapter);
    }
    this.adapters = map;
  }

  get(name: string): ToolAdapter | undefined {
    return this.adapters.get(name);
  }

  has(name: string): boolean {
    return this.adapters.has(name);
  }

  list(): ToolAdapter[] {
    return [...this.adapters.values()];
  }

  names(): string[] {
    return [...this.adapters.keys()];
  }

  info(): ToolInfo[] {
    return this.list().map((adapter) => ({
      name: adapter.name,
      description: adapter.description,
      binary: adapter.binary,
      installed: adapter.isInstalled(),
      defaultTimeoutSeconds: adapter.defaultTimeoutSeconds,
    }));
  }
}

type AdapterConstructor = new (options?: AdapterOptions) => ToolAdapter;

const DEFAULT_ADAPTERS: readonly AdapterConstructor[] = [
  NmapAdapter,
  MasscanAdapter,
  NiktoAdapter,
  Enum4linuxAdapter,
  SqlmapAdapter,
  ZapAdapter,
  NucleiAdapter,
  DirsearchAdapter,
  HydraAdapter,
  JohnAdapter,
  MetasploitAdapter,
  TheHarvesterAdapter,
];

/**
 * Registry with every built-in adapter, honoring per-tool binary overrides
 */
export function createDefaultRegistry(tools: Pick<ToolsConfig, "binaries">): ToolRegistry {
  return new ToolRegistry(
    DEFAULT_ADAPTERS.map((Adapter) => {
      const probe = new Adapter();
      const binary = tools.binaries[probe.name];
      return binary === undefined ? probe : new Adapter({ binary });
    })
  );
}
