/**
 * desktop-repack Engine — Main Engine Class
 *
 * Orchestrates the repack pipeline, strictly in order:
 *
 *   CHECKING → PREPARING → BINDING → DOWNLOADING → UNPACKING →
 *   ICONS → REPACKING → LAUNCHER → COMPLETED
 *
 * Each step returns a StepOutcome. The first failed step ends the build
 * with FAILED and a BuildError naming that step. There is no retry and no
 * rollback.
 *
 * The engine has NO UI logic. It communicates via return values and event
 * callbacks; external tools, PATH lookup and the download are injected so
 * the pipeline can run against fakes.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { createBindingBuilder } from "./binding";
import { writeLauncherFiles } from "./desktop";
import {
  downloadFile,
  ensureInstaller,
  InstallerFetcher,
  unpackInstaller,
} from "./fetch";
import { processIcons } from "./icons";
import { AppRecipe, normalizeSha256 } from "./recipe";
import { repackPayload } from "./repack";
import { checkDependencies, DependencyReport } from "./system";
import {
  BindingSource,
  BuildArtifacts,
  BuildContext,
  BuildError,
  BuildOptions,
  BuildResult,
  BuildState,
  BuildStep,
  EngineEvent,
  EngineEventHandler,
  EngineOptions,
  failStep,
  IconReport,
  InstallerReport,
  StepOutcome,
  succeed,
} from "./types";
import { createLogger, Logger } from "./utils/logger";
import { CommandRunner, createSpawnRunner } from "./utils/process";
import { createPathLookup, ExecutableLookup } from "./utils/which";

/** Collaborators the engine drives; production defaults when omitted */
export interface EngineCollaborators {
  logger?: Logger;
  runner?: CommandRunner;
  which?: ExecutableLookup;
  fetcher?: InstallerFetcher;
}

function isInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

export function bindingSourceFor(options: Pick<BuildOptions, "binding_path">): BindingSource {
  return options.binding_path
    ? { kind: "prebuilt", path: path.resolve(options.binding_path) }
    : { kind: "build" };
}

export class RepackEngine {
  private logger: Logger;
  private runner: CommandRunner;
  private which: ExecutableLookup;
  private fetcher: InstallerFetcher;
  private eventHandlers: EngineEventHandler[] = [];

  constructor(options: EngineOptions, collaborators: EngineCollaborators = {}) {
    this.logger =
      collaborators.logger ??
      createLogger({ level: options.verbose ? "debug" : "silent" });
    this.runner = collaborators.runner ?? createSpawnRunner(this.logger);
    this.which = collaborators.which ?? createPathLookup();
    this.fetcher = collaborators.fetcher ?? downloadFile;
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this for progress output.
   */
  on(handler: EngineEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        // A broken handler must not abort the build
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn({ event: event.type, error: message }, "Event handler threw");
      }
    }
  }

  // ─── Dependency Check ────────────────────────────────────────

  /**
   * Check the host for every tool a build of `recipe` needs.
   */
  checkDependencies(recipe: AppRecipe, binding: BindingSource): DependencyReport {
    return checkDependencies({
      which: this.which,
      binding,
      runtime: recipe.launcher.runtime,
    });
  }

  // ─── Core: Build ─────────────────────────────────────────────

  async build(recipe: AppRecipe, options: BuildOptions): Promise<BuildResult> {
    const buildId = crypto.randomUUID();
    const startedAt = new Date().toISOString();
    let context: BuildContext | undefined;
    let installer: InstallerReport | undefined;
    let icons: IconReport | undefined;

    const transition = (state: BuildState, message?: string) => {
      this.emit({
        type: "state_change",
        timestamp: new Date().toISOString(),
        data: { build_id: buildId, app_id: recipe.id, state, message },
      });
    };

    const finish = (error?: BuildError, artifacts?: BuildArtifacts): BuildResult => {
      if (error) {
        this.logger.error(
          { app: recipe.id, step: error.step, category: error.category, error: error.message },
          "Build failed",
        );
      }
      transition(error ? "FAILED" : "COMPLETED", error?.message);
      return {
        build_id: buildId,
        app_id: recipe.id,
        final_state: error ? "FAILED" : "COMPLETED",
        started_at: startedAt,
        finished_at: new Date().toISOString(),
        context,
        installer,
        icons,
        artifacts,
        error,
      };
    };

    /** Enter `step`, run it, and turn a stray exception into a failed outcome */
    const runStep = async <T>(
      step: BuildStep,
      body: () => StepOutcome<T> | Promise<StepOutcome<T>>,
    ): Promise<StepOutcome<T>> => {
      transition(step);
      try {
        return await body();
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        return failStep(step, "EXECUTION_ERROR", message);
      }
    };

    transition("PENDING");
    this.logger.info(
      { app: recipe.id, version: recipe.version },
      `Starting build: ${recipe.name} v${recipe.version}`,
    );

    // ─── CHECKING ───
    const checked = await runStep("CHECKING", () => this.resolveBuildContext(recipe, options));
    if (!checked.ok) return finish(checked.error);
    context = checked.value.context;
    const sha256 = checked.value.sha256;

    // ─── PREPARING ───
    const buildContext = context;
    const prepared = await runStep("PREPARING", () => this.prepareDirectories(buildContext));
    if (!prepared.ok) return finish(prepared.error);

    // ─── BINDING ───
    const binding = await runStep("BINDING", () =>
      createBindingBuilder(buildContext.binding, this.runner, this.logger).build(
        buildContext,
        recipe,
      ),
    );
    if (!binding.ok) return finish(binding.error);

    // ─── DOWNLOADING ───
    const fetched = await runStep("DOWNLOADING", () =>
      ensureInstaller({
        recipe,
        cacheDir: buildContext.cache_dir,
        sha256,
        fetcher: this.fetcher,
        logger: this.logger,
        onProgress: (progress) =>
          this.emit({
            type: "progress",
            timestamp: new Date().toISOString(),
            data: { build_id: buildId, ...progress },
          }),
      }),
    );
    if (!fetched.ok) return finish(fetched.error);

    // ─── UNPACKING ───
    const unpacked = await runStep("UNPACKING", () =>
      unpackInstaller({
        context: buildContext,
        recipe,
        installerPath: fetched.value.file_path,
        runner: this.runner,
        logger: this.logger,
      }),
    );
    if (!unpacked.ok) return finish(unpacked.error);
    installer = { ...fetched.value, nested_archive: unpacked.value.nested_archive };

    // ─── ICONS ───
    const iconOutcome = await runStep("ICONS", () =>
      processIcons({
        context: buildContext,
        recipe,
        runner: this.runner,
        logger: this.logger,
        onWarning: (message) =>
          this.emit({
            type: "warning",
            timestamp: new Date().toISOString(),
            data: { build_id: buildId, step: "ICONS", message },
          }),
      }),
    );
    if (!iconOutcome.ok) return finish(iconOutcome.error);
    icons = iconOutcome.value;

    // ─── REPACKING ───
    const repacked = await runStep("REPACKING", () =>
      repackPayload({
        context: buildContext,
        recipe,
        bindingPath: binding.value,
        logger: this.logger,
      }),
    );
    if (!repacked.ok) return finish(repacked.error);

    // ─── LAUNCHER ───
    const launcher = await runStep("LAUNCHER", () =>
      writeLauncherFiles({ context: buildContext, recipe, logger: this.logger }),
    );
    if (!launcher.ok) return finish(launcher.error);

    this.logger.info({ app: recipe.id, output: buildContext.output_dir }, "Build complete");
    return finish(undefined, {
      binding: binding.value,
      app_archive: repacked.value.app_archive,
      desktop_entry: launcher.value.desktop_entry,
      launcher: launcher.value.launcher,
    });
  }

  /**
   * Validate the options, check dependencies and freeze the build context.
   * Nothing on disk is touched.
   */
  private resolveBuildContext(
    recipe: AppRecipe,
    options: BuildOptions,
  ): StepOutcome<{ context: BuildContext; sha256?: string }> {
    const workDir = path.resolve(options.work_dir);
    const outputDir = path.resolve(options.output_dir);
    const cacheDir = path.resolve(options.cache_dir);

    if (isInside(workDir, outputDir) || isInside(outputDir, workDir)) {
      return failStep("CHECKING", "VALIDATION_ERROR", "Work and output directories must not overlap", {
        work_dir: workDir,
        output_dir: outputDir,
      });
    }
    if (isInside(cacheDir, workDir) || isInside(cacheDir, outputDir)) {
      return failStep(
        "CHECKING",
        "VALIDATION_ERROR",
        "Download cache must live outside the work and output directories",
        { cache_dir: cacheDir },
      );
    }

    const declared = options.sha256 ?? recipe.installer.sha256;
    let sha256: string | undefined;
    if (declared !== undefined) {
      const normalized = normalizeSha256(declared);
      if (!normalized) {
        return failStep("CHECKING", "VALIDATION_ERROR", `Invalid SHA-256 hash: "${declared}"`);
      }
      sha256 = normalized;
    }

    const binding = bindingSourceFor(options);
    const report = this.checkDependencies(recipe, binding);
    if (report.missing.length > 0 || !report.image_tool) {
      return failStep(
        "CHECKING",
        "DEPENDENCY_ERROR",
        `Missing required dependencies: ${report.missing.join(" ")}`,
        {
          missing: report.missing,
          package_manager: report.package_manager,
          install_commands: report.install_hint.commands,
          supported_package_manager: report.install_hint.supported,
        },
      );
    }

    const context: BuildContext = Object.freeze({
      work_dir: workDir,
      output_dir: outputDir,
      cache_dir: cacheDir,
      package_manager: report.package_manager,
      image_tool: report.image_tool,
      binding,
    });
    this.logger.debug({ context }, "Build context resolved");
    return succeed({ context, sha256 });
  }

  /**
   * Reset the work and output dirs; the download cache is only created.
   */
  private prepareDirectories(context: BuildContext): StepOutcome<void> {
    fs.rmSync(context.work_dir, { recursive: true, force: true });
    fs.rmSync(context.output_dir, { recursive: true, force: true });
    fs.mkdirSync(context.work_dir, { recursive: true });
    fs.mkdirSync(context.output_dir, { recursive: true });
    fs.mkdirSync(context.cache_dir, { recursive: true });
    this.logger.debug(
      { work_dir: context.work_dir, output_dir: context.output_dir },
      "Build directories reset",
    );
    return succeed(undefined);
  }
}
