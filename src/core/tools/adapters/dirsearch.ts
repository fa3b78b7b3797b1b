import type { ToolParams } from "../../../types/tool.js";
import { BaseToolAdapter, lines, urlOf, type AdapterOptions } from "../base-adapter.js";
import type { CommandSpec } from "../types.js";

export type FoundPath = {
  path: string;
  status: number;
  size: string;
};

export type DirsearchMetadata = {
  found_paths: FoundPath[];
  total_found: number;
  status_codes: Record<string, number>;
};

const RESULT_LINE = /^(?:\[[\d:]+\]\s+)?(\d{3})\s+-\s+(\S+)\s+-\s+(\S+)/;

export class DirsearchAdapter extends BaseToolAdapter<DirsearchMetadata> {
  readonly name = "dirsearch";
  readonly description = "Web path brute-forcing for hidden files and directories";
  readonly defaultTimeoutSeconds = 300;
  readonly maxTimeoutSeconds = 600;

  constructor(options: AdapterOptions = {}) {
    super("dirsearch", options);
  }

  emptyMetadata(): DirsearchMetadata {
    return { found_paths: [], total_found: 0, status_codes: {} };
  }

  buildCommand(target: string, params: ToolParams): CommandSpec {
    const args = ["-u", urlOf(target), "-q", "-t", String(this.intParam(params, "threads", 10, 1, 50))];
    const files: Record<string, string> = {};

    const extensions = this.listParam(params, "extensions", 10);
    if (extensions && extensions.length > 0) {
      args.push("-e", extensions.join(","));
    }

    const depth = this.intParam(params, "recursion_depth", 0, 0, 3);
    if (depth > 0) {
      args.push("-r", "--max-recursion-depth", String(depth));
    }

    const wordlist = this.listParam(params, "wordlist", 500);
    if (wordlist && wordlist.length > 0) {
      files["wordlist"] = `${wordlist.join("\n")}\n`;
      args.push("-w", "{{wordlist}}");
    }

    return { binary: this.binary, args, files };
  }

  parse(output: string): DirsearchMetadata {
    const metadata = this.emptyMetadata();

    for (const line of lines(output)) {
      const match = RESULT_LINE.exec(line);
      if (!match?.[1] || !match[2] || !match[3]) continue;

      metadata.found_paths.push({ path: match[3], status: Number(match[1]), size: match[2] });
      metadata.status_codes[match[1]] = (metadata.status_codes[match[1]] ?? 0) + 1;
    }

    metadata.total_found = metadata.found_paths.length;
    return metadata;
  }

  protected sampleOutput(): string {
    return [
      "[12:00:01] 200 -    3KB - /index.php",
      "[12:00:02] 301 -  312B  - /admin  ->  /admin/",
      "[12:00:04] 403 -  277B  - /.htaccess",
    ].join("\n");
  }
}
