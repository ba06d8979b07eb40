/**
 * desktop-repack Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here, never from internal modules.
 */

// Main engine class
export { RepackEngine, bindingSourceFor } from "./engine";
export type { EngineCollaborators } from "./engine";

// All types
export type {
  AppRecipe,
  PackageManager,
  ImageTool,
  BindingSource,
  BuildContext,
  BuildState,
  BuildStep,
  ErrorCategory,
  BuildError,
  StepOutcome,
  IconSkip,
  IconReport,
  InstallerReport,
  BuildArtifacts,
  BuildResult,
  EngineOptions,
  BuildOptions,
  EngineEvent,
  EngineEventType,
  EngineEventHandler,
  StateChangeData,
  ProgressData,
  WarningData,
} from "./types";
export { succeed, failStep } from "./types";

// Recipes
export {
  RecipeSchema,
  validateRecipe,
  loadRecipeFile,
  bindingArtifactName,
  appLibDir,
  normalizeSha256,
} from "./recipe";
export type {
  AppRecipeInput,
  RecipeValidationError,
  RecipeValidationResult,
} from "./recipe";

// Utilities (exposed for CLI use)
export { createLogger } from "./utils/logger";
export type { Logger } from "./utils/logger";
export { createSpawnRunner, describeCommand } from "./utils/process";
export type { CommandRunner, CommandResult, CommandOptions } from "./utils/process";
export { createPathLookup } from "./utils/which";
export type { ExecutableLookup } from "./utils/which";

// Pipeline steps (exposed for advanced use / testing)
export {
  checkDependencies,
  detectPackageManager,
  installHint,
  requiredTools,
  DISTRO_PACKAGES,
  IMAGE_TOOL_LABEL,
} from "./system";
export type { DependencyReport, DependencyStatus, InstallHint } from "./system";

export {
  UnsupportedNativeCapabilities,
  KEYBOARD_KEYS,
  keyboardKeyCode,
  renderBindingProject,
  createBindingBuilder,
} from "./binding";
export type { NativeCapabilities, InputEmulator } from "./binding";

export { downloadFile, ensureInstaller, unpackInstaller } from "./fetch";
export type { InstallerFetcher, DownloadProgress, DownloadResult } from "./fetch";

export { processIcons, hicolorDir } from "./icons";
export { repackPayload, repackLayout } from "./repack";

export {
  buildInstallInstructions,
  renderDesktopEntry,
  renderLauncher,
  writeLauncherFiles,
  desktopEntryPath,
  launcherPath,
} from "./desktop";
export type { InstallInstructions } from "./desktop";
