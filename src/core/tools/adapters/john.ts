import { ValidationError } from "../../../infra/errors.js";
import type { ToolParams } from "../../../types/tool.js";
import { BaseToolAdapter, lines, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export type CrackedPassword = {
  username: string;
  password: string;
};

export type JohnMetadata = {
  cracked_passwords: CrackedPassword[];
  total_cracked: number;
};

const CRACKED_LINE = /^(\S+)\s{2,}\((\S+)\)$/;

/**
 * John the Ripper against a hash file. The target is the hash file unless
 * `hash_file` is given.
 */
export class JohnAdapter extends BaseToolAdapter<JohnMetadata> {
  readonly name = "john";
  readonly description = "Offline password hash cracking (John the Ripper)";
  readonly defaultTimeoutSeconds = 300;
  readonly maxTimeoutSeconds = 600;

  constructor(options: AdapterOptions = {}) {
    super("john", options);
  }

  emptyMetadata(): JohnMetadata {
    return { cracked_passwords: [], total_cracked: 0 };
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    const args = [`--max-run-time=${this.intParam(params, "max_run_time", 300, 1, 300)}`];

    const wordlist = this.stringParam(params, "wordlist");
    args.push(wordlist ? `--wordlist=${wordlist}` : "--wordlist");

    const format = this.stringParam(params, "format");
    if (format) {
      if (!/^[\w-]+$/.test(format)) {
        throw new ValidationError(`john: invalid hash format "${format}"`);
      }
      args.push(`--format=${format}`);
    }

    args.push(this.stringParam(params, "hash_file") ?? target);
    return { binary: this.binary, args };
  }

  parse(output: string): JohnMetadata {
    const metadata = this.emptyMetadata();

    for (const line of lines(output)) {
      const cracked = CRACKED_LINE.exec(line);
      if (cracked?.[1] && cracked[2]) {
        metadata.cracked_passwords.push({ username: cracked[2], password: cracked[1] });
      }
    }

    metadata.total_cracked = metadata.cracked_passwords.length;
    return metadata;
  }

  protected sampleOutput(): string {
    return [
      "Using default input encoding: UTF-8",
      "Loaded 2 password hashes with 2 different salts (sha512crypt, crypt(3) $6$ [SHA512 256/256 AVX2 4x])",
      "Press 'q' or Ctrl-C to abort, almost any other key for status",
      "0g 0:00:05:00 DONE (2024-01-01 12:05) 0g/s 410.2p/s 820.4c/s 820.4C/s",
      "Session completed.",
    ].join("\n");
  }
}
