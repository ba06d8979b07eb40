/**
 * desktop-repack Engine — Payload Repack
 *
 * Rebuilds the app's resource archive for Linux:
 *   1. copy app.asar and app.asar.unpacked into <output>/lib/<app>/
 *   2. extract app.asar to app.asar.contents
 *   3. overwrite the vendor native binding in the contents and in the
 *      unpacked tree with the stub
 *   4. copy the tray icons into the contents' resources/
 *   5. pack app.asar.contents back into app.asar
 *
 * Fail-fast, no cleanup: a failure leaves the partial tree for the next
 * build's reset to discard.
 */

import * as fs from "fs";
import * as path from "path";
import * as asar from "@electron/asar";
import { AppRecipe, appLibDir } from "../recipe";
import { BuildContext, failStep, StepOutcome, succeed } from "../types";
import { escapeRegExp, listMatchingFiles } from "../utils/files";
import { Logger } from "../utils/logger";

export interface RepackOptions {
  context: BuildContext;
  recipe: AppRecipe;
  /** The stub `.node` file */
  bindingPath: string;
  logger: Logger;
}

export interface RepackLayout {
  /** Payload resources dir inside the work dir */
  resources: string;
  /** <output>/lib/<app> */
  app_dir: string;
  archive: string;
  unpacked: string;
  contents: string;
}

export function repackLayout(context: BuildContext, recipe: AppRecipe): RepackLayout {
  const appDir = path.join(context.output_dir, "lib", appLibDir(recipe));
  const archive = path.join(appDir, recipe.payload.archive);
  return {
    resources: path.join(context.work_dir, recipe.payload.resources_dir),
    app_dir: appDir,
    archive,
    unpacked: `${archive}.unpacked`,
    contents: `${archive}.contents`,
  };
}

async function attempt(
  message: string,
  action: () => void | Promise<void>,
): Promise<StepOutcome<void>> {
  try {
    await action();
    return succeed(undefined);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    return failStep("REPACKING", "EXECUTION_ERROR", message, { error: detail });
  }
}

export async function repackPayload(
  options: RepackOptions,
): Promise<StepOutcome<{ app_archive: string }>> {
  const { context, recipe, bindingPath, logger } = options;
  const layout = repackLayout(context, recipe);
  const archiveName = recipe.payload.archive;
  const unpackedName = path.basename(layout.unpacked);
  const contentsName = path.basename(layout.contents);

  logger.info({ archive: layout.archive }, `Processing ${archiveName}`);
  fs.mkdirSync(layout.app_dir, { recursive: true });

  const steps: Array<[string, () => void | Promise<void>]> = [
    [
      `Failed to copy ${archiveName}`,
      () => fs.copyFileSync(path.join(layout.resources, archiveName), layout.archive),
    ],
    [
      `Failed to copy ${unpackedName}`,
      () =>
        fs.cpSync(path.join(layout.resources, unpackedName), layout.unpacked, {
          recursive: true,
        }),
    ],
    [
      `Failed to extract ${archiveName}`,
      () => asar.extractAll(layout.archive, layout.contents),
    ],
    [
      `Failed to copy native binding to ${contentsName}`,
      () => fs.copyFileSync(bindingPath, path.join(layout.contents, recipe.binding.target)),
    ],
    [
      `Failed to copy native binding to ${unpackedName}`,
      () => fs.copyFileSync(bindingPath, path.join(layout.unpacked, recipe.binding.target)),
    ],
  ];

  for (const [message, action] of steps) {
    const outcome = await attempt(message, action);
    if (!outcome.ok) return outcome;
  }
  logger.debug({ target: recipe.binding.target }, "Native binding replaced");

  const prefix = recipe.tray.prefix;
  const trayIcons = listMatchingFiles(layout.resources, new RegExp(`^${escapeRegExp(prefix)}`));
  if (trayIcons.length === 0) {
    return failStep("REPACKING", "ARTIFACT_ERROR", "Failed to copy tray icons", {
      expected: path.join(layout.resources, `${prefix}*`),
    });
  }

  const trayCopied = await attempt("Failed to copy tray icons", () => {
    const dest = path.join(layout.contents, "resources");
    fs.mkdirSync(dest, { recursive: true });
    for (const icon of trayIcons) {
      fs.copyFileSync(icon, path.join(dest, path.basename(icon)));
    }
  });
  if (!trayCopied.ok) return trayCopied;
  logger.debug({ count: trayIcons.length }, "Tray icons copied");

  const packed = await attempt(`Failed to repackage ${archiveName}`, async () => {
    await asar.createPackage(layout.contents, layout.archive);
    // The header read by extractAll is cached per path; drop it
    asar.uncache(layout.archive);
  });
  if (!packed.ok) return packed;

  logger.info({ archive: layout.archive }, `Repackaged ${archiveName}`);
  return succeed({ app_archive: layout.archive });
}
