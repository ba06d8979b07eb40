/**
 * desktop-repack Engine — Binding Builders
 *
 * Produce the `.node` file that replaces the vendor binding. Either build
 * the rendered napi-rs stub project with pnpm, or take a prebuilt file.
 */

import * as fs from "fs";
import * as path from "path";
import { AppRecipe, bindingArtifactName } from "../recipe";
import {
  BindingSource,
  BuildContext,
  failStep,
  StepOutcome,
  succeed,
} from "../types";
import { Logger } from "../utils/logger";
import { CommandRunner, runChecked } from "../utils/process";
import { renderBindingProject, writeProjectFiles } from "./emitter";

export abstract class BindingBuilder {
  /**
   * Produce the binding.
   *
   * @returns Absolute path of the `.node` file
   */
  abstract build(
    context: BuildContext,
    recipe: AppRecipe,
  ): Promise<StepOutcome<string>>;
}

export class NapiStubBuilder extends BindingBuilder {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {
    super();
  }

  async build(
    context: BuildContext,
    recipe: AppRecipe,
  ): Promise<StepOutcome<string>> {
    const crate = recipe.binding.crate;
    const projectDir = path.join(context.work_dir, crate);

    this.logger.info({ crate, dir: projectDir }, "Writing stub binding project");
    writeProjectFiles(projectDir, renderBindingProject(crate));

    const installed = await runChecked(
      this.runner,
      "BINDING",
      "pnpm",
      ["install"],
      { cwd: projectDir },
      "Failed to install dependencies for native module",
    );
    if (!installed.ok) return installed;

    this.logger.info({ crate }, "Building native module");
    const built = await runChecked(
      this.runner,
      "BINDING",
      "pnpm",
      ["run", "build"],
      { cwd: projectDir },
      "Failed to build native module",
    );
    if (!built.ok) return built;

    const artifact = path.join(projectDir, bindingArtifactName(recipe));
    if (!fs.existsSync(artifact)) {
      return failStep(
        "BINDING",
        "ARTIFACT_ERROR",
        "Native module build failed - output file not found",
        { expected: artifact },
      );
    }

    this.logger.info({ artifact }, "Native module built");
    return succeed(artifact);
  }
}

export class PrebuiltBinding extends BindingBuilder {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {
    super();
  }

  async build(): Promise<StepOutcome<string>> {
    const artifact = path.resolve(this.filePath);
    if (!fs.existsSync(artifact) || !fs.statSync(artifact).isFile()) {
      return failStep(
        "BINDING",
        "ARTIFACT_ERROR",
        `Prebuilt binding not found: ${artifact}`,
        { expected: artifact },
      );
    }
    this.logger.info({ artifact }, "Using prebuilt native binding");
    return succeed(artifact);
  }
}

export function createBindingBuilder(
  source: BindingSource,
  runner: CommandRunner,
  logger: Logger,
): BindingBuilder {
  switch (source.kind) {
    case "build":
      return new NapiStubBuilder(runner, logger);
    case "prebuilt":
      return new PrebuiltBinding(source.path, logger);
  }
}
