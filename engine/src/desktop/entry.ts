/**
 * desktop-repack Engine — Menu Entry and Launcher
 *
 * Writes the freedesktop menu entry and the wrapper script that starts the
 * runtime on the repacked archive:
 *
 *   <output>/share/applications/<command>.desktop
 *   <output>/bin/<command>
 */

import * as fs from "fs";
import * as path from "path";
import { AppRecipe } from "../recipe";
import { BuildContext, failStep, StepOutcome, succeed } from "../types";
import { repackLayout } from "../repack";
import { Logger } from "../utils/logger";

export function schemeMimeTypes(recipe: AppRecipe): string[] {
  return recipe.desktop.schemes.map((scheme) => `x-scheme-handler/${scheme}`);
}

export function desktopEntryPath(outputDir: string, recipe: AppRecipe): string {
  return path.join(outputDir, "share", "applications", `${recipe.desktop.command}.desktop`);
}

export function launcherPath(outputDir: string, recipe: AppRecipe): string {
  return path.join(outputDir, "bin", recipe.desktop.command);
}

export function renderDesktopEntry(recipe: AppRecipe): string {
  const lines = [
    "[Desktop Entry]",
    `Name=${recipe.name}`,
    `Exec=${recipe.desktop.command} %u`,
    `Icon=${recipe.icons.name}`,
    "Type=Application",
    "Terminal=false",
    `Categories=${recipe.desktop.categories.map((c) => `${c};`).join("")}`,
  ];
  const mimeTypes = schemeMimeTypes(recipe);
  if (mimeTypes.length > 0) {
    lines.push(`MimeType=${mimeTypes.join(";")}`);
  }
  return lines.join("\n") + "\n";
}

/**
 * Quote a string for a double-quoted bash word.
 */
export function doubleQuote(s: string): string {
  return `"${s.replace(/(["\\$`])/g, "\\$1")}"`;
}

/**
 * The wrapper script. `archivePath` is baked in as an absolute path at build
 * time; the Wayland flags are left to `${VAR:+...}` expansion, so they are
 * added only if the variable is set when the wrapper runs.
 */
export function renderLauncher(recipe: AppRecipe, archivePath: string): string {
  const { runtime, wayland_env, wayland_flags } = recipe.launcher;
  const archive = doubleQuote(path.resolve(archivePath));

  if (wayland_flags.length === 0) {
    return ["#!/bin/bash", `${runtime} ${archive} "$@"`, ""].join("\n");
  }

  return [
    "#!/bin/bash",
    `${runtime} ${archive} \\`,
    `    \${${wayland_env}:+${wayland_flags.join(" ")}} "$@"`,
    "",
  ].join("\n");
}

export interface WriteLauncherOptions {
  context: BuildContext;
  recipe: AppRecipe;
  logger: Logger;
}

export async function writeLauncherFiles(
  options: WriteLauncherOptions,
): Promise<StepOutcome<{ desktop_entry: string; launcher: string }>> {
  const { context, recipe, logger } = options;
  const entryFile = desktopEntryPath(context.output_dir, recipe);
  const launcherFile = launcherPath(context.output_dir, recipe);
  const archive = repackLayout(context, recipe).archive;

  try {
    fs.mkdirSync(path.dirname(entryFile), { recursive: true });
    fs.writeFileSync(entryFile, renderDesktopEntry(recipe), "utf-8");
    logger.info({ path: entryFile }, "Created desktop entry");

    fs.mkdirSync(path.dirname(launcherFile), { recursive: true });
    fs.writeFileSync(launcherFile, renderLauncher(recipe, archive), "utf-8");
    fs.chmodSync(launcherFile, 0o755);
    logger.info({ path: launcherFile }, "Created launcher script");
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return failStep("LAUNCHER", "EXECUTION_ERROR", "Failed to write launcher files", {
      error: message,
    });
  }

  return succeed({ desktop_entry: entryFile, launcher: launcherFile });
}
