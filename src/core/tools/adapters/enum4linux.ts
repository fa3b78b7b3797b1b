import type { ToolParams } from "../../../types/tool.js";
import { BaseToolAdapter, hostOf, lines, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export type SmbShare = {
  name: string;
  type: string;
  comment: string;
};

export type Enum4linuxMetadata = {
  shares: SmbShare[];
  users: string[];
  groups: string[];
  os_info: string;
};

const SELECTIVE_FLAGS: Array<[string, string]> = [
  ["users", "-U"],
  ["shares", "-S"],
  ["groups", "-G"],
  ["password_policy", "-P"],
];

export class Enum4linuxAdapter extends BaseToolAdapter<Enum4linuxMetadata> {
  readonly name = "enum4linux";
  readonly description = "SMB/Samba enumeration of shares, users, groups and OS details";
  readonly defaultTimeoutSeconds = 120;
  readonly maxTimeoutSeconds = 300;

  constructor(options: AdapterOptions = {}) {
    super("enum4linux", options);
  }

  emptyMetadata(): Enum4linuxMetadata {
    return { shares: [], users: [], groups: [], os_info: "" };
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    const selected = SELECTIVE_FLAGS.filter(([key]) => this.boolParam(params, key)).map(([, flag]) => flag);
    const args = selected.length > 0 ? selected : ["-a"];

    const username = this.stringParam(params, "username");
    if (username) {
      args.push("-u", username, "-p", this.stringParam(params, "password") ?? "");
    }
    args.push(hostOf(target));
    return { binary: this.binary, args };
  }

  parse(output: string): Enum4linuxMetadata {
    const metadata = this.emptyMetadata();
    let inShareTable = false;

    for (const line of lines(output)) {
      if (line.startsWith("Sharename") && line.includes("Type")) {
        inShareTable = true;
        continue;
      }
      if (inShareTable) {
        if (line.length === 0) {
          inShareTable = false;
        } else if (!line.startsWith("---")) {
          const [name, type, ...comment] = line.split(/\s{2,}/);
          if (name && type) {
            metadata.shares.push({ name, type, comment: comment.join(" ") });
          }
        }
        continue;
      }

      const user = /user:\[([^\]]+)\]/.exec(line);
      if (user?.[1]) {
        metadata.users.push(user[1]);
        continue;
      }
      const group = /group:\[([^\]]+)\]/.exec(line);
      if (group?.[1]) {
        metadata.groups.push(group[1]);
        continue;
      }
      const os = /OS=\[([^\]]*)\]/.exec(line);
      if (os?.[1] && !metadata.os_info) {
        metadata.os_info = os[1];
      }
    }

    return metadata;
  }

  protected sampleOutput(target: string): string {
    return [
      `Starting enum4linux v0.9.1 against ${hostOf(target)}`,
      "Domain Name: WORKGROUP",
      "OS=[Windows 6.1] Server=[Samba 4.15.13-Ubuntu]",
      "",
      "Sharename       Type      Comment",
      "---------       ----      -------",
      "print$          Disk      Printer Drivers",
      "IPC$            IPC       IPC Service (Samba)",
      "",
      "user:[guest] rid:[0x1f5]",
      "group:[Domain Users] rid:[0x201]",
    ].join("\n");
  }
}
