/**
 * desktop-repack Engine — File Downloader
 *
 * Downloads installer files with progress reporting.
 * HTTPS only; HTTP URLs are rejected, redirect targets included.
 */

import * as fs from "fs";
import * as path from "path";
import * as https from "https";
import { Logger } from "../utils/logger";

export interface DownloadProgress {
  bytes_downloaded: number;
  bytes_total: number;
  percent: number;
}

export interface DownloadResult {
  file_path: string;
  bytes_downloaded: number;
  duration_ms: number;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

/** Signature of downloadFile; the engine accepts any function of this shape */
export type InstallerFetcher = (
  url: string,
  destDir: string,
  filename: string,
  onProgress: ProgressCallback | undefined,
  logger: Logger,
) => Promise<DownloadResult>;

const MAX_REDIRECTS = 5;
const IDLE_TIMEOUT_MS = 60_000;

/**
 * Download a file from an HTTPS URL.
 *
 * @param url - HTTPS URL to download from
 * @param destDir - Directory to save the file in
 * @param filename - Filename to save as
 * @param onProgress - Progress callback
 * @param logger - Logger instance
 * @returns Download result with file path and stats
 */
export function downloadFile(
  url: string,
  destDir: string,
  filename: string,
  onProgress: ProgressCallback | undefined,
  logger: Logger,
): Promise<DownloadResult> {
  return fetchWithRedirects(url, destDir, filename, onProgress, logger, 0);
}

async function fetchWithRedirects(
  url: string,
  destDir: string,
  filename: string,
  onProgress: ProgressCallback | undefined,
  logger: Logger,
  hops: number,
): Promise<DownloadResult> {
  // Security: reject non-HTTPS URLs (redirect targets included)
  if (!url.startsWith("https://")) {
    throw new Error(`Download URL must be HTTPS. Got: ${url}`);
  }

  const destPath = path.join(destDir, filename);
  fs.mkdirSync(destDir, { recursive: true });

  logger.info({ url, dest: destPath }, "Starting download");
  const startTime = Date.now();

  return new Promise<DownloadResult>((resolve, reject) => {
    const request = https.get(url, (response) => {
      const status = response.statusCode ?? 0;

      if (status >= 300 && status < 400 && response.headers.location) {
        response.resume();
        if (hops >= MAX_REDIRECTS) {
          reject(new Error(`Too many redirects downloading ${url}`));
          return;
        }
        const redirectUrl = new URL(response.headers.location, url).toString();
        logger.debug({ redirect: redirectUrl }, "Following redirect");
        fetchWithRedirects(redirectUrl, destDir, filename, onProgress, logger, hops + 1)
          .then(resolve)
          .catch(reject);
        return;
      }

      if (status !== 200) {
        response.resume();
        reject(new Error(`Download failed: HTTP ${status} for ${url}`));
        return;
      }

      const totalBytes = parseInt(response.headers["content-length"] || "0", 10);
      let downloadedBytes = 0;

      const fileStream = fs.createWriteStream(destPath);

      response.on("data", (chunk: Buffer) => {
        downloadedBytes += chunk.length;
        if (onProgress && totalBytes > 0) {
          onProgress({
            bytes_downloaded: downloadedBytes,
            bytes_total: totalBytes,
            percent: Math.round((downloadedBytes / totalBytes) * 100),
          });
        }
      });

      response.on("aborted", () => {
        fileStream.destroy();
        reject(new Error(`Download interrupted after ${downloadedBytes} bytes: ${url}`));
      });

      response.pipe(fileStream);

      fileStream.on("finish", () => {
        fileStream.close();
        const duration = Date.now() - startTime;
        logger.info(
          { dest: destPath, bytes: downloadedBytes, duration_ms: duration },
          "Download complete",
        );
        resolve({
          file_path: destPath,
          bytes_downloaded: downloadedBytes,
          duration_ms: duration,
        });
      });

      fileStream.on("error", (err) => {
        reject(new Error(`Failed to write downloaded file: ${err.message}`));
      });
    });

    request.on("error", (err) => {
      reject(new Error(`Download request failed: ${err.message}`));
    });

    request.setTimeout(IDLE_TIMEOUT_MS, () => {
      request.destroy();
      reject(new Error(`Download timed out after ${IDLE_TIMEOUT_MS / 1000} seconds: ${url}`));
    });
  });
}
