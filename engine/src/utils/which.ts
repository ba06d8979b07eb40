/**
 * desktop-repack Engine — Executable Lookup
 *
 * The `command -v` check: is an executable with this name on PATH?
 */

import * as fs from "fs";
import * as path from "path";

/** Returns the absolute path of the executable, or null if not found */
export type ExecutableLookup = (name: string) => string | null;

function isExecutableFile(filePath: string): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) return false;
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Build a lookup over the directories of a PATH string.
 */
export function createPathLookup(
  searchPath: string = process.env.PATH ?? "",
): ExecutableLookup {
  const dirs = searchPath.split(path.delimiter).filter((d) => d.length > 0);

  return (name: string) => {
    if (name.includes("/")) {
      return isExecutableFile(name) ? path.resolve(name) : null;
    }
    for (const dir of dirs) {
      const candidate = path.join(dir, name);
      if (isExecutableFile(candidate)) return candidate;
    }
    return null;
  };
}
