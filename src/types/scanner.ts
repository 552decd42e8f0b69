/**
 * Scanner-related type definitions
 */

import type { HashAlgorithm } from "./config.js";

/**
 * File selected for upload
 */
export interface WorkItem {
  /** Absolute path to file */
  absolutePath: string;

  /** Relative path from the source directory (forward slashes) */
  relativePath: string;

  /** Content hash */
  contentHash: string;

  /** File size in bytes */
  size: number;
}

/**
 * Why a file was left out of the worklist
 */
export type SkipReason = "too-large" | "already-uploaded" | "unrecordable-path";

/**
 * File left out of the worklist
 */
export interface SkippedFile {
  relativePath: string;
  reason: SkipReason;
  sizeMB: number;
}

/**
 * Scan options
 */
export interface ScanOptions {
  /** Directory to scan */
  sourceDir: string;

  /** Size ceiling in MiB */
  maxFileSizeMB: number;

  /** Hashes already recorded in the ledger */
  knownHashes: ReadonlySet<string>;

  /** Digest algorithm (default: md5) */
  hashAlgorithm?: HashAlgorithm;

  /** File patterns to exclude */
  exclude?: string[];

  /** Called for every skipped file */
  onSkip?: (file: SkippedFile) => void;
}

/**
 * Scan result
 */
export interface ScanResult {
  /** Files to upload, in discovery order */
  worklist: WorkItem[];

  /** Files left out */
  skipped: SkippedFile[];

  /** Sum of worklist sizes in bytes */
  totalBytes: number;
}
