/**
 * desktop-repack CLI — Configuration
 *
 * Central location for CLI paths and defaults. Each directory resolves from,
 * in order: the command-line flag, an environment variable, the default.
 */

import * as path from "path";
import * as os from "os";
import type { AppRecipe, BuildOptions, EngineOptions } from "@desktop-repack/engine";

/** Recipe used when --recipe is not given */
export const DEFAULT_RECIPE_PATH = path.resolve(
  __dirname,
  "..",
  "recipes",
  "claude-desktop.yaml",
);

export const ENV_VARS = {
  workDir: "DESKTOP_REPACK_WORK_DIR",
  outputDir: "DESKTOP_REPACK_OUTPUT_DIR",
  cacheDir: "DESKTOP_REPACK_CACHE_DIR",
} as const;

const FALLBACK_WORK_DIR = "build";
const FALLBACK_OUTPUT_DIR = "dist-linux";

export interface PathFlags {
  workDir?: string;
  outputDir?: string;
  cacheDir?: string;
}

export interface ResolvedPaths {
  work_dir: string;
  output_dir: string;
  cache_dir: string;
}

type Env = Record<string, string | undefined>;

function fromEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  return value && value.trim() !== "" ? value : undefined;
}

/**
 * The persistent installer cache. Lives outside the work dir so resetting
 * the work dir never discards a download.
 */
export function defaultCacheDir(env: Env = process.env): string {
  const xdg = fromEnv(env, "XDG_CACHE_HOME");
  const base = xdg ?? path.join(os.homedir(), ".cache");
  return path.join(base, "desktop-repack", "downloads");
}

export function resolvePaths(
  recipe: AppRecipe,
  flags: PathFlags,
  env: Env = process.env,
  cwd: string = process.cwd(),
): ResolvedPaths {
  const workDir =
    flags.workDir ??
    fromEnv(env, ENV_VARS.workDir) ??
    path.join(cwd, recipe.build.work_dir ?? FALLBACK_WORK_DIR);
  const outputDir =
    flags.outputDir ??
    fromEnv(env, ENV_VARS.outputDir) ??
    path.join(cwd, recipe.build.output_dir ?? FALLBACK_OUTPUT_DIR);
  const cacheDir =
    flags.cacheDir ?? fromEnv(env, ENV_VARS.cacheDir) ?? defaultCacheDir(env);

  return {
    work_dir: path.resolve(cwd, workDir),
    output_dir: path.resolve(cwd, outputDir),
    cache_dir: path.resolve(cwd, cacheDir),
  };
}

/**
 * Build EngineOptions from CLI configuration.
 */
export function getEngineOptions(verbose: boolean = false): EngineOptions {
  return { verbose };
}

export function getBuildOptions(
  paths: ResolvedPaths,
  extra: { binding?: string; sha256?: string } = {},
): BuildOptions {
  return {
    ...paths,
    binding_path: extra.binding,
    sha256: extra.sha256,
  };
}
