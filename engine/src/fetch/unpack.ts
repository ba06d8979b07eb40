/**
 * desktop-repack Engine — Installer Unpacking
 *
 * The Windows installer is a 7z-readable self-extractor wrapping a NuGet
 * package (.nupkg, also a zip), which holds the app payload. Two extraction
 * passes reach it. The nested archive is located by extension because its
 * name carries the upstream version.
 */

import * as fs from "fs";
import * as path from "path";
import { AppRecipe } from "../recipe";
import { BuildContext, failStep, StepOutcome, succeed } from "../types";
import { findFilesByExtension } from "../utils/files";
import { Logger } from "../utils/logger";
import { CommandRunner, runChecked } from "../utils/process";

export interface UnpackOptions {
  context: BuildContext;
  recipe: AppRecipe;
  installerPath: string;
  runner: CommandRunner;
  logger: Logger;
}

/**
 * Find the nested archive in the work dir, skipping the binding project.
 */
export function locateNestedArchive(
  workDir: string,
  extension: string,
  exclude: string[] = [],
): string | null {
  const matches = findFilesByExtension(workDir, extension, { exclude });
  return matches.length > 0 ? matches[0] : null;
}

export async function unpackInstaller(
  options: UnpackOptions,
): Promise<StepOutcome<{ nested_archive: string }>> {
  const { context, recipe, installerPath, runner, logger } = options;
  const cwd = context.work_dir;

  logger.info({ installer: installerPath }, "Extracting installer");
  const outer = await runChecked(
    runner,
    "UNPACKING",
    "7z",
    ["x", "-y", installerPath],
    { cwd },
    `Failed to extract ${path.basename(installerPath)}`,
  );
  if (!outer.ok) return outer;

  const extension = recipe.installer.nested_extension;
  const nested = locateNestedArchive(cwd, extension, [
    path.join(cwd, recipe.binding.crate),
  ]);
  if (!nested) {
    return failStep("UNPACKING", "ARTIFACT_ERROR", `Could not find ${extension} file`, {
      searched: cwd,
    });
  }

  logger.info({ archive: nested }, "Extracting nested archive");
  const inner = await runChecked(
    runner,
    "UNPACKING",
    "7z",
    ["x", "-y", nested],
    { cwd },
    `Failed to extract ${path.basename(nested)}`,
  );
  if (!inner.ok) return inner;

  const executable = path.join(cwd, recipe.payload.executable);
  if (!fs.existsSync(executable)) {
    return failStep(
      "UNPACKING",
      "ARTIFACT_ERROR",
      `Installer payload has no ${recipe.payload.executable}`,
      { expected: executable },
    );
  }

  return succeed({ nested_archive: nested });
}
