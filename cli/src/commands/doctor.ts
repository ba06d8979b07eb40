/**
 * desktop-repack CLI — Doctor Command
 *
 * Checks the host for every tool a build needs, without building.
 *
 * Usage:
 *   desktop-repack doctor
 *   desktop-repack doctor --binding <file>   (prebuilt binding: no Rust, no pnpm)
 */

import { Command } from "commander";
import { bindingSourceFor, DependencyReport, RepackEngine } from "@desktop-repack/engine";
import { getEngineOptions } from "../config";
import { loadRecipe } from "../recipes";
import {
  printBlank,
  printCommands,
  printError,
  printInfo,
  printSuccess,
  printTable,
  printWarn,
  isDebugMode,
  colors,
} from "../output";

export function dependencyRows(report: DependencyReport): string[][] {
  return report.checked.map((dep) => [
    colors.app(dep.name),
    dep.path ? colors.success("found") : colors.error("missing"),
    dep.path ?? colors.dim("-"),
  ]);
}

export function registerDoctorCommand(program: Command): void {
  program
    .command("doctor")
    .description("Check that every build dependency is installed")
    .option("-r, --recipe <file>", "App recipe (YAML)")
    .option("--binding <file>", "Check for a build using this prebuilt native binding")
    .action((opts: { recipe?: string; binding?: string }) => {
      const recipe = loadRecipe(opts.recipe);
      const engine = new RepackEngine(getEngineOptions(isDebugMode()));
      const report = engine.checkDependencies(
        recipe,
        bindingSourceFor({ binding_path: opts.binding }),
      );

      printTable({ head: ["Tool", "Status", "Path"], rows: dependencyRows(report) });
      printInfo(`Package manager: ${colors.bold(report.package_manager)}`);

      if (report.missing.length === 0) {
        printSuccess("All dependencies are installed");
        return;
      }

      printBlank();
      printError(`Missing: ${report.missing.join(", ")}`);
      if (report.install_hint.supported) {
        printInfo("Install them with:");
        printCommands(report.install_hint.commands);
      } else {
        printWarn("Unsupported package manager. Install the missing tools manually.");
      }
      process.exit(1);
    });
}
