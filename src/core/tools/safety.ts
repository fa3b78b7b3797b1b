import { BlockList, isIP } from "node:net";
import { logger } from "../../infra/logger.js";
import type { SafetyConfig } from "../../types/config.js";
import { hostOf } from "./base-adapter.js";

export interface SafetyVerdict {
  denied: boolean;
  /** Deny-list entry that matched */
  matched: string | null;
  /** Host the target was reduced to */
  host: string;
}

interface DenyRule {
  entry: string;
  matches(host: string): boolean;
}

function ipFamily(address: string): "ipv4" | "ipv6" | null {
  const version = isIP(address);
  return version === 4 ? "ipv4" : version === 6 ? "ipv6" : null;
}

function compileRule(entry: string): DenyRule | null {
  const trimmed = entry.trim().toLowerCase();
  if (trimmed.length === 0) return null;

  const [network = "", prefixText] = trimmed.split("/");
  const family = ipFamily(network);

  if (family) {
    const list = new BlockList();
    if (prefixText === undefined) {
      list.addAddress(network, family);
    } else {
      const prefix = Number.parseInt(prefixText, 10);
      const maxPrefix = family === "ipv4" ? 32 : 128;
      if (!Number.isInteger(prefix) || prefix < 0 || prefix > maxPrefix) {
        logger.warn(`Ignoring invalid deny-list entry: ${entry}`);
        return null;
      }
      list.addSubnet(network, prefix, family);
    }
    return {
      entry,
      matches: (host) => {
        const hostFamily = ipFamily(host);
        return hostFamily !== null && list.check(host, hostFamily);
      },
    };
  }

  // Hostname entries cover the name itself and its subdomains
  return {
    entry,
    matches: (host) => host === trimmed || host.endsWith(`.${trimmed}`),
  };
}

/**
 * Reason a target cannot be handed to a tool, or null when it can. A leading
 * "-" would be read as an option; whitespace and control characters would
 * split or corrupt the argument.
 */
export function invalidTargetReason(target: string): string | null {
  if (target.length === 0) return "target is empty";
  if (target.startsWith("-")) return 'target must not start with "-"';
  if (/[\s\p{Cc}]/u.test(target)) return "target must not contain whitespace or control characters";
  return null;
}

/**
 * Matches targets against the configured deny-list of hosts and CIDR ranges
 */
export class SafetyChecker {
  private readonly rules: DenyRule[];

  constructor(private readonly config: SafetyConfig) {
    this.rules = config.denyList.map(compileRule).filter((rule): rule is DenyRule => rule !== null);
  }

  get policy(): SafetyConfig["policy"] {
    return this.config.policy;
  }

  check(target: string): SafetyVerdict {
    const host = hostOf(target).toLowerCase().replace(/\.$/, "");
    const rule = this.rules.find((candidate) => candidate.matches(host));
    return { denied: rule !== undefined, matched: rule?.entry ?? null, host };
  }
}
