/**
 * desktop-repack Engine — Core Type Definitions
 *
 * Recipe types mirror the zod schema in recipe.ts (the schema is the source
 * of truth; these are its inferred shapes re-exported under stable names).
 */

import type { AppRecipe } from "./recipe";

export type { AppRecipe };

// ─── Host Environment ────────────────────────────────────────────

export type PackageManager = "dnf" | "apt" | "unknown";
export type ImageTool = "magick" | "convert";

/**
 * Where the stub binding comes from: built from the generated napi-rs
 * project, or a prebuilt `.node` file supplied by the user.
 */
export type BindingSource =
  | { kind: "build" }
  | { kind: "prebuilt"; path: string };

/**
 * Process-wide build configuration. Resolved once per build and frozen.
 */
export interface BuildContext {
  /** Scratch directory, reset at the start of every build */
  readonly work_dir: string;
  /** Output tree (bin/, lib/, share/), reset at the start of every build */
  readonly output_dir: string;
  /** Persistent installer cache, never reset by a build */
  readonly cache_dir: string;
  readonly package_manager: PackageManager;
  readonly image_tool: ImageTool;
  readonly binding: BindingSource;
}

// ─── Build Lifecycle ─────────────────────────────────────────────

export type BuildState =
  | "PENDING"
  | "CHECKING"
  | "PREPARING"
  | "BINDING"
  | "DOWNLOADING"
  | "UNPACKING"
  | "ICONS"
  | "REPACKING"
  | "LAUNCHER"
  | "COMPLETED"
  | "FAILED";

/** The states that correspond to a pipeline step */
export type BuildStep = Exclude<BuildState, "PENDING" | "COMPLETED" | "FAILED">;

export type ErrorCategory =
  | "VALIDATION_ERROR"
  | "DEPENDENCY_ERROR"
  | "NETWORK_ERROR"
  | "INTEGRITY_ERROR"
  | "EXECUTION_ERROR"
  | "ARTIFACT_ERROR";

export interface BuildError {
  category: ErrorCategory;
  message: string;
  step: BuildStep;
  details?: Record<string, unknown>;
}

/**
 * Result of a single pipeline step. Expected failures are returned,
 * never thrown.
 */
export type StepOutcome<T = void> =
  | { ok: true; value: T }
  | { ok: false; error: BuildError };

export function succeed<T>(value: T): StepOutcome<T> {
  return { ok: true, value };
}

export function failStep<T = never>(
  step: BuildStep,
  category: ErrorCategory,
  message: string,
  details?: Record<string, unknown>,
): StepOutcome<T> {
  return { ok: false, error: { category, message, step, details } };
}

// ─── Step Reports ────────────────────────────────────────────────

export interface IconSkip {
  size: number;
  reason: string;
}

export interface IconReport {
  /** Sizes written to share/icons/hicolor/<size>x<size>/apps/ */
  installed: number[];
  skipped: IconSkip[];
}

export interface InstallerReport {
  file_path: string;
  /** False when the cached copy was reused */
  downloaded: boolean;
  /** False when the recipe declares no checksum */
  verified: boolean;
  /** The nested archive located by extension search */
  nested_archive: string;
}

export interface BuildArtifacts {
  binding: string;
  app_archive: string;
  desktop_entry: string;
  launcher: string;
}

export interface BuildResult {
  build_id: string;
  app_id: string;
  final_state: "COMPLETED" | "FAILED";
  started_at: string;
  finished_at: string;
  context?: BuildContext;
  installer?: InstallerReport;
  icons?: IconReport;
  artifacts?: BuildArtifacts;
  error?: BuildError;
}

// ─── Engine Options ──────────────────────────────────────────────

export interface EngineOptions {
  /** Enable verbose logging */
  verbose: boolean;
}

export interface BuildOptions {
  work_dir: string;
  output_dir: string;
  cache_dir: string;
  /** Use this prebuilt binding instead of building the stub */
  binding_path?: string;
  /** Overrides installer.sha256 from the recipe */
  sha256?: string;
}

// ─── Engine Events ───────────────────────────────────────────────

export type EngineEventType = "state_change" | "progress" | "warning";

export interface StateChangeData {
  build_id: string;
  app_id: string;
  state: BuildState;
  message?: string;
}

export interface ProgressData {
  build_id: string;
  bytes_downloaded: number;
  bytes_total: number;
  percent: number;
}

export interface WarningData {
  build_id: string;
  step: BuildStep;
  message: string;
}

export type EngineEvent =
  | { type: "state_change"; timestamp: string; data: StateChangeData }
  | { type: "progress"; timestamp: string; data: ProgressData }
  | { type: "warning"; timestamp: string; data: WarningData };

export type EngineEventHandler = (event: EngineEvent) => void;
