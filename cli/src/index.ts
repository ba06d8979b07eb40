#!/usr/bin/env node

/**
 * desktop-repack CLI — Entry Point
 *
 * Repackages a Windows desktop app installer as a Linux desktop app.
 *
 * Commands:
 *   desktop-repack [build]       Build the Linux output tree (default)
 *   desktop-repack doctor        Check build dependencies
 *   desktop-repack instructions  Print install instructions for a build
 *   desktop-repack clean         Remove build directories
 */

import { Command } from "commander";
import { registerBuildCommand } from "./commands/build";
import { registerDoctorCommand } from "./commands/doctor";
import { registerInstructionsCommand } from "./commands/instructions";
import { registerCleanCommand } from "./commands/clean";
import { setDebugMode } from "./output";

const program = new Command();

program
  .name("desktop-repack")
  .description("Repackage a Windows desktop app installer for Linux")
  .version("0.1.0")
  .option("--debug", "Show debug output and stack traces", false)
  .hook("preAction", () => {
    setDebugMode(program.opts<{ debug: boolean }>().debug);
  });

registerBuildCommand(program);
registerDoctorCommand(program);
registerInstructionsCommand(program);
registerCleanCommand(program);

// Parse command line
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
