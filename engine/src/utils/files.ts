/**
 * desktop-repack Engine — File Search Helpers
 */

import * as fs from "fs";
import * as path from "path";

export interface FindOptions {
  /** Absolute directory paths that are not descended into */
  exclude?: string[];
  maxDepth?: number;
}

/**
 * Recursively find files whose name ends with `extension`
 * (case-insensitive). Results are sorted so the first match is stable
 * across runs.
 */
export function findFilesByExtension(
  root: string,
  extension: string,
  options: FindOptions = {},
): string[] {
  const exclude = new Set((options.exclude ?? []).map((p) => path.resolve(p)));
  const maxDepth = options.maxDepth ?? 8;
  const wanted = extension.toLowerCase();
  const found: string[] = [];

  const walk = (current: string, depth: number) => {
    if (depth > maxDepth || exclude.has(path.resolve(current))) return;
    const entries = fs
      .readdirSync(current, { withFileTypes: true })
      .sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath, depth + 1);
      } else if (entry.name.toLowerCase().endsWith(wanted)) {
        found.push(fullPath);
      }
    }
  };

  walk(root, 0);
  return found.sort();
}

/**
 * List regular files directly inside `dir` whose name matches `pattern`,
 * sorted by name. A missing directory yields an empty list.
 */
export function listMatchingFiles(dir: string, pattern: RegExp): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && pattern.test(entry.name))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/** Escape a literal string for use inside a RegExp */
export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
