import { ValidationError } from "../../../infra/errors.js";
import type { ToolParams } from "../../../types/tool.js";
import { BaseToolAdapter, hostOf, lines, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export const HYDRA_SERVICES = [
  "ssh",
  "ftp",
  "telnet",
  "smtp",
  "pop3",
  "imap",
  "mysql",
  "postgres",
  "rdp",
  "smb",
  "vnc",
  "http-get",
  "http-post-form",
] as const;
export type HydraService = (typeof HYDRA_SERVICES)[number];

export type HydraCredential = {
  host: string;
  port: number;
  service: string;
  username: string;
  password: string;
};

export type HydraMetadata = {
  found_credentials: HydraCredential[];
  attempts: number;
  service: HydraService;
};

const MAX_WORDLIST = 100;
const DEFAULT_USERS = ["admin", "root", "user", "test"];
const DEFAULT_PASSWORDS = ["admin", "password", "123456", "test"];

const CREDENTIAL_LINE = /^\[(\d+)\]\[([\w-]+)\]\s+host:\s+(\S+)\s+login:\s+(\S+)\s+password:\s*(.*)$/;
const ATTEMPTS_LINE = /(\d+) login tr(?:y|ies)/;

export class HydraAdapter extends BaseToolAdapter<HydraMetadata> {
  readonly name = "hydra";
  readonly description = "Online credential brute-forcing with small, capped wordlists";
  readonly defaultTimeoutSeconds = 300;
  readonly maxTimeoutSeconds = 600;

  constructor(options: AdapterOptions = {}) {
    super("hydra", options);
  }

  emptyMetadata(): HydraMetadata {
    return { found_credentials: [], attempts: 0, service: "ssh" };
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    const service = this.choiceParam(params, "service", HYDRA_SERVICES, "ssh");
    const args: string[] = [];
    const files: Record<string, string> = {};

    const username = this.stringParam(params, "username");
    if (username) {
      args.push("-l", username);
    } else {
      files["users"] = `${(this.listParam(params, "usernames", MAX_WORDLIST) ?? DEFAULT_USERS).join("\n")}\n`;
      args.push("-L", "{{users}}");
    }

    const password = this.stringParam(params, "password");
    if (password) {
      args.push("-p", password);
    } else {
      files["passwords"] = `${(this.listParam(params, "passwords", MAX_WORDLIST) ?? DEFAULT_PASSWORDS).join("\n")}\n`;
      args.push("-P", "{{passwords}}");
    }

    args.push("-t", String(this.intParam(params, "threads", 4, 1, 4)), "-f", "-I");
    if (params["port"] !== undefined) {
      args.push("-s", String(this.intParam(params, "port", 22, 1, 65535)));
    }

    args.push(hostOf(target), service);
    if (service === "http-get") {
      args.push(this.stringParam(params, "path") ?? "/");
    } else if (service === "http-post-form") {
      const form = this.stringParam(params, "form");
      if (!form) {
        throw new ValidationError('hydra: http-post-form needs a "form" parameter');
      }
      args.push(form);
    }

    return { binary: this.binary, args, files };
  }

  parse(output: string, params: ToolParams): HydraMetadata {
    const metadata: HydraMetadata = {
      ...this.emptyMetadata(),
      service: this.choiceParam(params, "service", HYDRA_SERVICES, "ssh"),
    };

    for (const line of lines(output)) {
      const credential = CREDENTIAL_LINE.exec(line);
      if (credential?.[1] && credential[2] && credential[3] && credential[4]) {
        metadata.found_credentials.push({
          port: Number(credential[1]),
          service: credential[2],
          host: credential[3],
          username: credential[4],
          password: (credential[5] ?? "").trim(),
        });
        continue;
      }
      const attempts = ATTEMPTS_LINE.exec(line);
      if (attempts?.[1] && metadata.attempts === 0) {
        metadata.attempts = Number(attempts[1]);
      }
    }

    return metadata;
  }

  protected sampleOutput(target: string, params: ToolParams): string {
    const service = this.choiceParam(params, "service", HYDRA_SERVICES, "ssh");
    return [
      "Hydra v9.5 (c) 2023 by van Hauser/THC & David Maciejak",
      "[DATA] max 4 tasks per 1 server, overall 4 tasks, 16 login tries (l:4/p:4), ~4 tries per task",
      `[DATA] attacking ${service}://${hostOf(target)}/`,
      "1 of 1 target completed, 0 valid password found",
    ].join("\n");
  }
}
