/**
 * desktop-repack CLI — Clean Command
 *
 * Removes the work and output directories. The download cache is kept
 * unless --cache is given.
 */

import * as fs from "fs";
import { Command } from "commander";
import { resolvePaths, ResolvedPaths } from "../config";
import { loadRecipe } from "../recipes";
import { printInfo, printStageSuccess, colors } from "../output";

/**
 * Delete the build directories.
 *
 * @returns The directories that existed and were removed
 */
export function cleanDirectories(paths: ResolvedPaths, includeCache: boolean): string[] {
  const targets = [paths.work_dir, paths.output_dir];
  if (includeCache) {
    targets.push(paths.cache_dir);
  }

  const removed: string[] = [];
  for (const dir of targets) {
    if (!fs.existsSync(dir)) continue;
    fs.rmSync(dir, { recursive: true, force: true });
    removed.push(dir);
  }
  return removed;
}

export function registerCleanCommand(program: Command): void {
  program
    .command("clean")
    .description("Remove the work and output directories")
    .option("-r, --recipe <file>", "App recipe (YAML)")
    .option("--work-dir <dir>", "Scratch directory")
    .option("--output-dir <dir>", "Build output directory")
    .option("--cache-dir <dir>", "Installer download cache")
    .option("--cache", "Also remove the download cache", false)
    .action(
      (opts: {
        recipe?: string;
        workDir?: string;
        outputDir?: string;
        cacheDir?: string;
        cache: boolean;
      }) => {
        const recipe = loadRecipe(opts.recipe);
        const paths = resolvePaths(recipe, opts);
        const removed = cleanDirectories(paths, opts.cache);

        if (removed.length === 0) {
          printInfo("Nothing to clean.");
          return;
        }
        for (const dir of removed) {
          printStageSuccess(`Removed ${colors.dim(dir)}`);
        }
      },
    );
}
