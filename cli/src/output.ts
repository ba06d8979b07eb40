/**
 * desktop-repack CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import type { BuildState, ErrorCategory } from "@desktop-repack/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  version: chalk.cyan,
  command: chalk.white,
  muted: chalk.gray,
};

// ─── Symbols ────────────────────────────────────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
  arrow: chalk.gray("\u2192"), // →
  bullet: chalk.gray("\u2022"), // •
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.log();
}

/**
 * Print an indented detail line (for sub-items under a stage).
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

/**
 * Print shell commands, one per line, indented for copy and paste.
 * Comment lines are dimmed.
 */
export function printCommands(commands: string[]): void {
  for (const cmd of commands) {
    const line = cmd.startsWith("#") ? colors.dim(cmd) : colors.command(cmd);
    console.log(`    ${line}`);
  }
}

// ─── Stage Output ───────────────────────────────────────────

/**
 * Print a completed stage line with ✔ prefix.
 *
 *   ✔ Checked dependencies
 *   ✔ Downloaded installer (cached)
 *   ✔ Installed 6 icon sizes
 */
export function printStageSuccess(msg: string): void {
  console.log(`  ${symbols.success} ${msg}`);
}

export function printStageError(msg: string): void {
  console.log(`  ${symbols.error} ${msg}`);
}

export function printStageWarn(msg: string): void {
  console.log(`  ${symbols.warn}  ${msg}`);
}

export function printStageInfo(msg: string): void {
  console.log(`  ${symbols.info} ${colors.dim(msg)}`);
}

// ─── Header / Banner ────────────────────────────────────────

/**
 * Print a bold header line, e.g.  "Repacking Claude v0.7.8"
 */
export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

export interface TableOptions {
  head: string[];
  rows: string[][];
  colWidths?: number[];
}

export function printTable({ head, rows, colWidths }: TableOptions): void {
  const table = new Table({
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ["gray"] },
    wordWrap: false,
    ...(colWidths ? { colWidths } : {}),
  });
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}

// ─── State Badge ────────────────────────────────────────────

const STATE_COLORS: Record<BuildState, chalk.Chalk> = {
  PENDING: chalk.gray,
  CHECKING: chalk.cyan,
  PREPARING: chalk.cyan,
  BINDING: chalk.yellow,
  DOWNLOADING: chalk.blue,
  UNPACKING: chalk.blue,
  ICONS: chalk.magenta,
  REPACKING: chalk.yellow,
  LAUNCHER: chalk.magenta,
  COMPLETED: chalk.green,
  FAILED: chalk.red,
};

/** Human-friendly state labels */
export const STATE_LABELS: Record<BuildState, string> = {
  PENDING: "Starting",
  CHECKING: "Checking dependencies",
  PREPARING: "Preparing directories",
  BINDING: "Building native binding",
  DOWNLOADING: "Downloading installer",
  UNPACKING: "Unpacking installer",
  ICONS: "Installing icons",
  REPACKING: "Repacking app archive",
  LAUNCHER: "Writing launcher",
  COMPLETED: "Done",
  FAILED: "Failed",
};

export function formatState(state: BuildState): string {
  return STATE_COLORS[state](STATE_LABELS[state]);
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<ErrorCategory, string> = {
  VALIDATION_ERROR: "Invalid recipe or options",
  DEPENDENCY_ERROR: "Missing required dependency",
  NETWORK_ERROR: "Network or download failure",
  INTEGRITY_ERROR: "File integrity check failed",
  EXECUTION_ERROR: "Command or file operation failed",
  ARTIFACT_ERROR: "Expected file was not produced",
};

export function formatErrorCategory(category: ErrorCategory): string {
  return ERROR_LABELS[category];
}

// ─── Byte Formatting ────────────────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
