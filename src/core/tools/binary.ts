import { accessSync, constants, statSync } from "node:fs";
import { delimiter, isAbsolute, join } from "node:path";

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve a binary the way the shell would: paths as given, bare names via PATH
 *
 * @returns absolute path, or null when nothing executable is found
 */
export function findBinary(binary: string, pathEnv: string = process.env["PATH"] ?? ""): string | null {
  if (binary.length === 0) return null;

  if (isAbsolute(binary) || binary.includes("/")) {
    return isExecutable(binary) ? binary : null;
  }

  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, binary);
    if (isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}
