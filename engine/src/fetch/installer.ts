/**
 * desktop-repack Engine — Cached Installer Fetch
 *
 * Idempotent: an installer already in the cache is reused without touching
 * the network.
 * - No checksum declared → any cached file is reused (logged as unverified)
 * - Checksum declared and matching → reused
 * - Checksum declared and mismatching → deleted and downloaded again
 * A fresh download lands in `<file>.part` and is renamed only when complete,
 * so an interrupted fetch never leaves a file that looks cached.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { AppRecipe } from "../recipe";
import { failStep, StepOutcome, succeed } from "../types";
import { Logger } from "../utils/logger";
import { InstallerFetcher, ProgressCallback } from "./downloader";

export interface EnsureInstallerOptions {
  recipe: AppRecipe;
  cacheDir: string;
  /** Normalized SHA-256, if integrity is to be checked */
  sha256?: string;
  fetcher: InstallerFetcher;
  onProgress?: ProgressCallback;
  logger: Logger;
}

export interface EnsuredInstaller {
  file_path: string;
  downloaded: boolean;
  verified: boolean;
}

/** Hex SHA-256 of a file, read in chunks */
export async function installerChecksum(filePath: string): Promise<string> {
  const hash = crypto.createHash("sha256");
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

/**
 * Decide whether a cached installer can be reused.
 */
export async function evaluateCachedInstaller(
  filePath: string,
  sha256: string | undefined,
  logger: Logger,
): Promise<{ reuse: boolean; verified: boolean }> {
  if (!fs.existsSync(filePath)) {
    logger.debug({ path: filePath }, "Installer not cached - download needed");
    return { reuse: false, verified: false };
  }

  if (!sha256) {
    logger.warn(
      { path: filePath },
      "Reusing cached installer without integrity check (no sha256 declared)",
    );
    return { reuse: true, verified: false };
  }

  const actual = await installerChecksum(filePath);
  if (actual === sha256) {
    logger.info({ path: filePath, sha256 }, "Cached installer checksum matches");
    return { reuse: true, verified: true };
  }

  logger.warn(
    { path: filePath, expected: sha256, actual },
    "Cached installer checksum mismatch - will redownload",
  );
  fs.unlinkSync(filePath);
  return { reuse: false, verified: false };
}

export async function ensureInstaller(
  options: EnsureInstallerOptions,
): Promise<StepOutcome<EnsuredInstaller>> {
  const { recipe, cacheDir, sha256, fetcher, onProgress, logger } = options;
  const filename = recipe.installer.filename;
  const filePath = path.join(cacheDir, filename);
  const partPath = `${filePath}.part`;

  const cached = await evaluateCachedInstaller(filePath, sha256, logger);
  if (cached.reuse) {
    return succeed({ file_path: filePath, downloaded: false, verified: cached.verified });
  }

  try {
    await fetcher(recipe.installer.url, cacheDir, path.basename(partPath), onProgress, logger);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    fs.rmSync(partPath, { force: true });
    return failStep("DOWNLOADING", "NETWORK_ERROR", `Failed to download ${recipe.name}: ${message}`, {
      url: recipe.installer.url,
    });
  }

  if (!fs.existsSync(partPath)) {
    return failStep("DOWNLOADING", "ARTIFACT_ERROR", `Download of ${filename} produced no file`, {
      expected: partPath,
    });
  }

  if (sha256) {
    const actual = await installerChecksum(partPath);
    if (actual !== sha256) {
      fs.rmSync(partPath, { force: true });
      return failStep(
        "DOWNLOADING",
        "INTEGRITY_ERROR",
        `Checksum mismatch for ${filename}`,
        { expected: sha256, actual },
      );
    }
  } else {
    logger.warn({ file: filename }, "Installer integrity not verified (no sha256 declared)");
  }

  fs.renameSync(partPath, filePath);
  return succeed({ file_path: filePath, downloaded: true, verified: sha256 !== undefined });
}
