/**
 * desktop-repack CLI -- Build Command
 *
 * Repacks the Windows installer into a Linux output tree. This is the
 * default command: `desktop-repack` alone runs it with the bundled recipe.
 *
 * Output:
 *
 *   Repacking Claude v0.7.8
 *
 *     ✔ Checked dependencies
 *     ✔ Prepared directories
 *     ✔ Built native binding
 *     ✔ Downloaded installer
 *     ...
 *
 *   ✔ Built Claude v0.7.8 in 1m 12s
 */

import { Command } from "commander";
import {
  AppRecipe,
  BuildError,
  BuildResult,
  BuildState,
  BuildStep,
  buildInstallInstructions,
  EngineEvent,
  RepackEngine,
} from "@desktop-repack/engine";
import { getBuildOptions, getEngineOptions, resolvePaths } from "../config";
import { loadRecipe } from "../recipes";
import {
  printSuccess,
  printError,
  printInfo,
  printHeader,
  printStageSuccess,
  printStageError,
  printStageWarn,
  printStageInfo,
  printDetail,
  printBlank,
  printCommands,
  printDebug,
  isDebugMode,
  createSpinner,
  formatState,
  formatBytes,
  formatDuration,
  formatErrorCategory,
  colors,
} from "../output";
import { printInstallInstructions } from "./instructions";

interface BuildFlags {
  recipe?: string;
  workDir?: string;
  outputDir?: string;
  cacheDir?: string;
  binding?: string;
  sha256?: string;
  verbose: boolean;
}

/** Spinner text while a step runs */
const STAGE_MESSAGES: Partial<Record<BuildState, string>> = {
  CHECKING: "Checking dependencies...",
  PREPARING: "Preparing directories...",
  BINDING: "Building native binding...",
  DOWNLOADING: "Downloading installer...",
  UNPACKING: "Unpacking installer...",
  ICONS: "Installing icons...",
  REPACKING: "Repacking app archive...",
  LAUNCHER: "Writing launcher...",
};

/** Printed once a step has completed */
const STAGE_DONE: Partial<Record<BuildState, string>> = {
  CHECKING: "Checked dependencies",
  PREPARING: "Prepared directories",
  BINDING: "Built native binding",
  DOWNLOADING: "Fetched installer",
  UNPACKING: "Unpacked installer",
  ICONS: "Installed icons",
  REPACKING: "Repacked app archive",
  LAUNCHER: "Wrote desktop entry and launcher",
};

/** Printed for the step that failed */
const STAGE_FAILED: Record<BuildStep, string> = {
  CHECKING: "Dependency check failed",
  PREPARING: "Could not prepare directories",
  BINDING: "Native binding build failed",
  DOWNLOADING: "Installer download failed",
  UNPACKING: "Unpacking failed",
  ICONS: "Icon extraction failed",
  REPACKING: "Repacking failed",
  LAUNCHER: "Writing launcher failed",
};

function stringList(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((v): v is string => typeof v === "string")
    : [];
}

function printFailure(recipe: AppRecipe, error: BuildError): void {
  printBlank();
  printError(`Failed to build ${colors.app(recipe.name)} v${colors.version(recipe.version)}`);
  printDetail("Reason", formatErrorCategory(error.category));
  printDetail("Details", error.message);
  printDetail("Step", formatState(error.step));

  if (error.category === "DEPENDENCY_ERROR") {
    const commands = stringList(error.details?.install_commands);
    printBlank();
    if (commands.length > 0) {
      printInfo("Install them with:");
      printCommands(commands);
    } else {
      printInfo("Unsupported package manager. Install the missing tools manually.");
    }
    return;
  }

  if (error.details) {
    for (const [key, value] of Object.entries(error.details)) {
      printDebug(`${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`);
    }
  }
}

function printSummary(result: BuildResult): void {
  if (result.installer) {
    const { downloaded, verified } = result.installer;
    printStageInfo(
      `Installer ${downloaded ? "downloaded" : "reused from cache"}` +
        (verified ? ", checksum verified" : ", checksum not verified"),
    );
  }
  if (result.icons) {
    printStageInfo(`Icon sizes installed: ${result.icons.installed.join(", ") || "none"}`);
    for (const skip of result.icons.skipped) {
      printDebug(`icon ${skip.size}x${skip.size} skipped: ${skip.reason}`);
    }
  }
  if (result.artifacts) {
    printDebug(`launcher: ${result.artifacts.launcher}`);
    printDebug(`desktop entry: ${result.artifacts.desktop_entry}`);
    printDebug(`app archive: ${result.artifacts.app_archive}`);
  }
}

export function registerBuildCommand(program: Command): void {
  program
    .command("build", { isDefault: true })
    .description("Repack the Windows installer into a Linux desktop app")
    .option("-r, --recipe <file>", "App recipe (YAML)")
    .option("--work-dir <dir>", "Scratch directory (reset on every build)")
    .option("--output-dir <dir>", "Output tree (reset on every build)")
    .option("--cache-dir <dir>", "Installer download cache")
    .option("--binding <file>", "Use a prebuilt native binding instead of building one")
    .option("--sha256 <hex>", "Expected SHA-256 of the installer")
    .option("--verbose", "Show detailed output", false)
    .action(async (opts: BuildFlags) => {
      // 1. Load recipe and resolve paths
      const recipe = loadRecipe(opts.recipe);
      const paths = resolvePaths(recipe, opts);

      // 2. Create engine (use debug-aware verbose mode)
      const verbose = opts.verbose || isDebugMode();
      const engine = new RepackEngine(getEngineOptions(verbose));

      printHeader(`Repacking ${colors.app(recipe.name)} v${colors.version(recipe.version)}`);
      printDebug(`work dir: ${paths.work_dir}`);
      printDebug(`output dir: ${paths.output_dir}`);
      printDebug(`cache dir: ${paths.cache_dir}`);

      // 3. Wire up progress display
      const spinner = createSpinner("Starting...");
      let lastState: BuildState | "" = "";

      engine.on((event: EngineEvent) => {
        switch (event.type) {
          case "state_change": {
            const { state, message } = event.data;
            const done = lastState ? STAGE_DONE[lastState] : undefined;
            if (done && state !== "FAILED") {
              spinner.stop();
              printStageSuccess(done);
              spinner.start();
            }
            lastState = state;

            const stageMsg = STAGE_MESSAGES[state];
            if (stageMsg) {
              spinner.text = stageMsg;
            }
            if (message) {
              printDebug(`${state}: ${message}`);
            }
            break;
          }
          case "progress": {
            const { percent, bytes_downloaded, bytes_total } = event.data;
            spinner.text =
              `Downloading installer... ${percent}% ` +
              colors.dim(`(${formatBytes(bytes_downloaded)} / ${formatBytes(bytes_total)})`);
            break;
          }
          case "warning": {
            spinner.stop();
            printStageWarn(event.data.message);
            spinner.start();
            break;
          }
        }
      });

      spinner.start();
      const startTime = Date.now();

      // 4. Run the pipeline
      try {
        const result = await engine.build(recipe, getBuildOptions(paths, opts));
        spinner.stop();
        const elapsed = Date.now() - startTime;

        if (result.final_state === "FAILED" && result.error) {
          printStageError(STAGE_FAILED[result.error.step]);
          printFailure(recipe, result.error);
          process.exit(1);
        }

        printSummary(result);
        printBlank();
        printSuccess(
          `Built ${colors.app(recipe.name)} v${colors.version(recipe.version)} in ${formatDuration(elapsed)}`,
        );
        printInfo(`Output: ${colors.bold(paths.output_dir)}`);

        if (result.context) {
          printInstallInstructions(buildInstallInstructions(result.context, recipe));
        }
      } catch (err: unknown) {
        spinner.stop();
        printBlank();
        printError("Unexpected error during build");

        if (isDebugMode()) {
          console.error(err);
        } else {
          printDetail("Message", err instanceof Error ? err.message : String(err));
          printInfo(`Use ${colors.bold("--debug")} to see the full stack trace.`);
        }
        process.exit(1);
      }
    });
}
