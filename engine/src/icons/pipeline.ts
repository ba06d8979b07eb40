/**
 * desktop-repack Engine — Icon Pipeline
 *
 * wrestool pulls the icon group out of the Windows executable, icotool
 * splits the .ico into one PNG per resolution, and ImageMagick writes each
 * wanted size into the hicolor theme tree:
 *
 *   <output>/share/icons/hicolor/<size>x<size>/apps/<icon>.png
 *
 * A size with no extracted image, or whose conversion fails, is skipped
 * with a warning. Only the extraction itself is fatal.
 */

import * as fs from "fs";
import * as path from "path";
import { AppRecipe } from "../recipe";
import { BuildContext, IconReport, IconSkip, StepOutcome, succeed } from "../types";
import { escapeRegExp, listMatchingFiles } from "../utils/files";
import { Logger } from "../utils/logger";
import { CommandRunner, describeCommand, runChecked } from "../utils/process";

export interface IconPipelineOptions {
  context: BuildContext;
  recipe: AppRecipe;
  runner: CommandRunner;
  logger: Logger;
  /** Called once per skipped size */
  onWarning?: (message: string) => void;
}

/** Root of the icon theme fragment inside the output tree */
export function hicolorDir(outputDir: string): string {
  return path.join(outputDir, "share", "icons", "hicolor");
}

export function iconTargetPath(outputDir: string, iconName: string, size: number): string {
  return path.join(hicolorDir(outputDir), `${size}x${size}`, "apps", `${iconName}.png`);
}

/**
 * Matches the 32-bit PNG icotool extracts for `size`, e.g.
 * `claude_3_48x48x32.png`.
 */
export function iconSourcePattern(iconName: string, size: number): RegExp {
  return new RegExp(`^${escapeRegExp(iconName)}_(.*_)?${size}x${size}x32\\.png$`);
}

export async function processIcons(
  options: IconPipelineOptions,
): Promise<StepOutcome<IconReport>> {
  const { context, recipe, runner, logger, onWarning } = options;
  const cwd = context.work_dir;
  const iconName = recipe.icons.name;
  const icoFile = `${iconName}.ico`;
  const executable = path.join(cwd, recipe.payload.executable);

  logger.info({ executable }, "Extracting icon resources");
  const extracted = await runChecked(
    runner,
    "ICONS",
    "wrestool",
    ["-x", "-t", String(recipe.icons.resource_type), executable, "-o", icoFile],
    { cwd },
    `Failed to extract icons from ${path.basename(executable)}`,
  );
  if (!extracted.ok) return extracted;

  const split = await runChecked(
    runner,
    "ICONS",
    "icotool",
    ["-x", icoFile],
    { cwd },
    "Failed to convert ico file",
  );
  if (!split.ok) return split;

  const installed: number[] = [];
  const skipped: IconSkip[] = [];
  const skip = (size: number, reason: string) => {
    skipped.push({ size, reason });
    const message = `Failed to convert icon for size ${size}x${size}: ${reason}`;
    logger.warn({ size, reason }, "Icon size skipped");
    onWarning?.(message);
  };

  fs.mkdirSync(hicolorDir(context.output_dir), { recursive: true });

  for (const size of recipe.icons.sizes) {
    const target = iconTargetPath(context.output_dir, iconName, size);
    fs.mkdirSync(path.dirname(target), { recursive: true });

    const sources = listMatchingFiles(cwd, iconSourcePattern(iconName, size));
    if (sources.length === 0) {
      skip(size, "no extracted image at this size");
      continue;
    }

    const args = [sources[0], target];
    const result = await runner.run(context.image_tool, args, { cwd });
    if (result.exit_code !== 0) {
      logger.debug(
        { cmd: describeCommand(context.image_tool, args), stderr: result.stderr },
        "Image conversion failed",
      );
      skip(size, `${context.image_tool} exited with code ${result.exit_code}`);
      continue;
    }

    installed.push(size);
  }

  logger.info({ installed, skipped: skipped.length }, "Icons processed");
  return succeed({ installed, skipped });
}
