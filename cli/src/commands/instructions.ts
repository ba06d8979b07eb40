/**
 * desktop-repack CLI — Instructions Command
 *
 * Prints how to install an existing output tree into ~/.local.
 *
 * Usage:
 *   desktop-repack instructions                    Default recipe and paths
 *   desktop-repack instructions --output-dir <dir>
 */

import * as fs from "fs";
import { Command } from "commander";
import {
  buildInstallInstructions,
  createPathLookup,
  detectPackageManager,
  InstallInstructions,
} from "@desktop-repack/engine";
import { resolvePaths } from "../config";
import { loadRecipe } from "../recipes";
import {
  printBlank,
  printCommands,
  printError,
  printHeader,
  printInfo,
  colors,
} from "../output";

/**
 * Print the post-build instructions. Shared with the build command.
 */
export function printInstallInstructions(instructions: InstallInstructions): void {
  printHeader("To install the desktop app for the current user:");
  printCommands(instructions.copy);

  if (instructions.refresh.length > 0) {
    printBlank();
    printInfo("Then refresh the desktop database:");
    printCommands(instructions.refresh);
  }

  if (instructions.protocol.length > 0) {
    printBlank();
    printInfo("To make it open its links, register the URI scheme handler:");
    printCommands(instructions.protocol);
  }
  printBlank();
}

export function registerInstructionsCommand(program: Command): void {
  program
    .command("instructions")
    .description("Print install instructions for an existing build output")
    .option("-r, --recipe <file>", "App recipe (YAML)")
    .option("--output-dir <dir>", "Build output directory")
    .action((opts: { recipe?: string; outputDir?: string }) => {
      const recipe = loadRecipe(opts.recipe);
      const paths = resolvePaths(recipe, { outputDir: opts.outputDir });

      if (!fs.existsSync(paths.output_dir)) {
        printError(`No build output at ${colors.bold(paths.output_dir)}`);
        printInfo(`Run ${colors.bold("desktop-repack build")} first.`);
        process.exit(1);
      }

      const instructions = buildInstallInstructions(
        {
          output_dir: paths.output_dir,
          package_manager: detectPackageManager(createPathLookup()),
        },
        recipe,
      );
      printInstallInstructions(instructions);
    });
}
