/**
 * desktop-repack Engine — Dependency Resolver
 *
 * Precondition gate: every external executable the build drives must be on
 * PATH before anything on disk is touched. Versions are not checked.
 */

import { BindingSource, ImageTool, PackageManager } from "../types";
import { ExecutableLookup } from "../utils/which";
import {
  detectPackageManager,
  installHint,
  InstallHint,
} from "./package-manager";

/** Reported in place of the image tool when neither variant exists */
export const IMAGE_TOOL_LABEL = "ImageMagick";

export interface DependencyStatus {
  name: string;
  /** Absolute path when found */
  path: string | null;
}

export interface DependencyReport {
  /** Every tool looked up, in check order */
  checked: DependencyStatus[];
  /** Names of the missing tools (IMAGE_TOOL_LABEL for the image tool) */
  missing: string[];
  package_manager: PackageManager;
  image_tool: ImageTool | null;
  install_hint: InstallHint;
}

export interface DependencyCheckOptions {
  which: ExecutableLookup;
  binding: BindingSource;
  /** Launcher runtime from the recipe, e.g. "electron" */
  runtime: string;
}

/**
 * ImageMagick 7 ships `magick`; older releases only `convert`.
 */
export function detectImageTool(which: ExecutableLookup): ImageTool | null {
  if (which("magick")) return "magick";
  if (which("convert")) return "convert";
  return null;
}

/**
 * The executables required for a build, in the order they are checked.
 */
export function requiredTools(binding: BindingSource, runtime: string): string[] {
  const fromSource = binding.kind === "build";
  const tools = [
    "7z",
    ...(fromSource ? ["pnpm"] : []),
    "node",
    ...(fromSource ? ["cargo", "rustc"] : []),
    runtime,
    "wrestool",
    "icotool",
  ];
  // A recipe may name one of the tools above as its runtime
  return tools.filter((tool, i) => tools.indexOf(tool) === i);
}

export function checkDependencies(
  options: DependencyCheckOptions,
): DependencyReport {
  const { which, binding, runtime } = options;

  const checked: DependencyStatus[] = requiredTools(binding, runtime).map(
    (name) => ({ name, path: which(name) }),
  );
  const missing = checked.filter((d) => d.path === null).map((d) => d.name);

  const imageTool = detectImageTool(which);
  checked.push({
    name: IMAGE_TOOL_LABEL,
    path: imageTool ? which(imageTool) : null,
  });
  if (!imageTool) {
    missing.push(IMAGE_TOOL_LABEL);
  }

  const packageManager = detectPackageManager(which);

  return {
    checked,
    missing,
    package_manager: packageManager,
    image_tool: imageTool,
    install_hint: installHint(packageManager, binding.kind === "build"),
  };
}
