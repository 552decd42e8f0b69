/**
 * Scanner module
 *
 * Directory walk, hashing and worklist selection
 */

export {
  scanDirectory,
  isRecordablePath,
  listFiles,
  calculateFileHash,
  toRemotePath,
  bytesToMB,
  estimateUploadSeconds,
  formatBytes,
} from "./file-scanner.js";

export type {
  WorkItem,
  SkippedFile,
  SkipReason,
  ScanOptions,
  ScanResult,
} from "../../types/scanner.js";
