/**
 * desktop-repack Engine — Fetch and Unpack (Barrel Export)
 */

export {
  downloadFile,
  type DownloadProgress,
  type DownloadResult,
  type InstallerFetcher,
  type ProgressCallback,
} from "./downloader";

export {
  ensureInstaller,
  installerChecksum,
  evaluateCachedInstaller,
  type EnsureInstallerOptions,
  type EnsuredInstaller,
} from "./installer";

export { unpackInstaller, locateNestedArchive, type UnpackOptions } from "./unpack";
