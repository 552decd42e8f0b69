/**
 * File scanner for uploads
 */

import glob from "fast-glob";
import hasha from "hasha";
import { stat } from "node:fs/promises";
import { join, sep } from "node:path";
import type { HashAlgorithm } from "../../types/config.js";
import type {
  ScanOptions,
  ScanResult,
  SkippedFile,
  WorkItem,
} from "../../types/scanner.js";

const BYTES_PER_MB = 1024 * 1024;

// Characters a ledger line cannot hold
const UNRECORDABLE_PATH = /[|\r\n]/;

/**
 * Whether a relative path can be written to the ledger as-is
 */
export function isRecordablePath(relativePath: string): boolean {
  return !UNRECORDABLE_PATH.test(relativePath);
}

/**
 * Convert a relative path to a remote path (forward slashes, no leading slash)
 */
export function toRemotePath(relativePath: string): string {
  return relativePath.split(sep).join("/").replace(/\\/g, "/").replace(/^\/+/, "");
}

/**
 * Bytes to MiB
 */
export function bytesToMB(bytes: number): number {
  return bytes / BYTES_PER_MB;
}

/**
 * Calculate the content hash of a file
 */
export async function calculateFileHash(
  filePath: string,
  algorithm: HashAlgorithm = "md5"
): Promise<string> {
  return hasha.fromFile(filePath, { algorithm });
}

/**
 * List regular files under a directory, relative, in a stable order
 */
export async function listFiles(
  sourceDir: string,
  exclude: string[] = []
): Promise<string[]> {
  const files = await glob(["**/*"], {
    cwd: sourceDir,
    absolute: false,
    ignore: exclude,
    onlyFiles: true,
    followSymbolicLinks: false,
    dot: true, // Include dotfiles
  });

  return files.sort();
}

/**
 * Scan a directory and build the upload worklist.
 *
 * Paths the ledger cannot record and oversized files are dropped before they
 * are hashed; files whose hash is already known are dropped whatever their
 * name. The hash set is only read.
 */
export async function scanDirectory(options: ScanOptions): Promise<ScanResult> {
  const {
    sourceDir,
    maxFileSizeMB,
    knownHashes,
    hashAlgorithm = "md5",
    exclude = [],
    onSkip,
  } = options;

  const worklist: WorkItem[] = [];
  const skipped: SkippedFile[] = [];
  let totalBytes = 0;

  const skip = (file: SkippedFile): void => {
    skipped.push(file);
    onSkip?.(file);
  };

  for (const file of await listFiles(sourceDir, exclude)) {
    const absolutePath = join(sourceDir, file);
    const relativePath = toRemotePath(file);

    const { size } = await stat(absolutePath);
    const sizeMB = bytesToMB(size);

    if (!isRecordablePath(relativePath)) {
      skip({ relativePath, reason: "unrecordable-path", sizeMB });
      continue;
    }

    if (sizeMB > maxFileSizeMB) {
      skip({ relativePath, reason: "too-large", sizeMB });
      continue;
    }

    const contentHash = await calculateFileHash(absolutePath, hashAlgorithm);

    if (knownHashes.has(contentHash)) {
      skip({ relativePath, reason: "already-uploaded", sizeMB });
      continue;
    }

    worklist.push({ absolutePath, relativePath, contentHash, size });
    totalBytes += size;
  }

  return { worklist, skipped, totalBytes };
}

/**
 * Estimated upload time in seconds at a given speed (MB/s)
 */
export function estimateUploadSeconds(
  totalBytes: number,
  speedMBps: number
): number {
  if (speedMBps <= 0) {
    return Infinity;
  }
  return bytesToMB(totalBytes) / speedMBps;
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 Bytes";

  const k = 1024;
  const sizes = ["Bytes", "KB", "MB", "GB", "TB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return Math.round((bytes / Math.pow(k, i)) * 100) / 100 + " " + sizes[i];
}
