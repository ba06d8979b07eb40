/**
 * desktop-repack Engine — External Command Runner
 *
 * Every external tool (7z, wrestool, icotool, ImageMagick, pnpm) is run
 * through a CommandRunner. The engine never spawns processes directly, so
 * tests can swap in a runner that fakes the tools' file output.
 */

import { spawn } from "child_process";
import { BuildStep, failStep, StepOutcome, succeed } from "../types";
import { Logger } from "./logger";

export interface CommandResult {
  /** Process exit code; -1 if the process could not be started */
  exit_code: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Working directory for the command */
  cwd: string;
}

export interface CommandRunner {
  run(
    command: string,
    args: string[],
    options: CommandOptions,
  ): Promise<CommandResult>;
}

/** Keep only the tail of long tool output for error reports */
const OUTPUT_TAIL_CHARS = 4000;

function tail(s: string): string {
  return s.length > OUTPUT_TAIL_CHARS ? s.slice(-OUTPUT_TAIL_CHARS) : s;
}

/**
 * Render a command line for log and error messages.
 */
export function describeCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"'$]/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}

/**
 * The production runner: spawns the command without a shell and resolves
 * once it exits. Never rejects; launch failures resolve with exit_code -1.
 */
export function createSpawnRunner(logger: Logger): CommandRunner {
  return {
    run(command, args, options) {
      logger.debug(
        { cmd: describeCommand(command, args), cwd: options.cwd },
        "Running command",
      );

      return new Promise<CommandResult>((resolve) => {
        const child = spawn(command, args, {
          cwd: options.cwd,
          stdio: ["ignore", "pipe", "pipe"],
        });

        let stdout = "";
        let stderr = "";
        child.stdout.on("data", (chunk: Buffer) => {
          stdout = tail(stdout + chunk.toString("utf-8"));
        });
        child.stderr.on("data", (chunk: Buffer) => {
          stderr = tail(stderr + chunk.toString("utf-8"));
        });

        child.on("close", (code) => {
          const exitCode = code ?? 1;
          logger.debug({ cmd: command, exit_code: exitCode }, "Command exited");
          resolve({ exit_code: exitCode, stdout, stderr });
        });

        child.on("error", (err) => {
          resolve({
            exit_code: -1,
            stdout,
            stderr: `Failed to launch ${command}: ${err.message}`,
          });
        });
      });
    },
  };
}

/**
 * Run a command and turn a non-zero exit into an EXECUTION_ERROR for
 * `step`, carrying `failureMessage` and the tail of the tool's stderr.
 */
export async function runChecked(
  runner: CommandRunner,
  step: BuildStep,
  command: string,
  args: string[],
  options: CommandOptions,
  failureMessage: string,
): Promise<StepOutcome<CommandResult>> {
  const result = await runner.run(command, args, options);
  if (result.exit_code !== 0) {
    return failStep(step, "EXECUTION_ERROR", failureMessage, {
      command: describeCommand(command, args),
      exit_code: result.exit_code,
      stderr: result.stderr.trim(),
    });
  }
  return succeed(result);
}
