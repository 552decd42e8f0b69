/**
 * Uploader-related type definitions
 */

import type { WorkItem } from "./scanner.js";

/**
 * Item metadata sent with every file
 */
export interface UploadMetadata {
  title: string;
  mediatype: string;
  collection: string;
  description: string;
  creator: string;
  subject: string;
  licenseUrl: string;
}

/**
 * Remote archive the uploader writes to.
 * The item is created by the service on the first file put into it.
 * Implementations throw on failure.
 */
export interface ArchiveClient {
  put(
    itemId: string,
    remotePath: string,
    localPath: string,
    metadata: UploadMetadata
  ): Promise<void>;
}

/**
 * Outcome for a single worklist item
 */
export interface UploadResult {
  item: WorkItem;

  /** Upload status */
  status: "uploaded" | "failed";

  /** Number of attempts made */
  attempts: number;

  /** Error message if failed */
  error?: string;
}

/**
 * Progress events emitted while uploading
 */
export type UploadEvent =
  | { type: "start"; item: WorkItem; index: number; total: number }
  | { type: "attempt-failed"; item: WorkItem; attempt: number; error: Error; delayMs: number }
  | { type: "succeeded"; item: WorkItem; index: number; total: number }
  | { type: "failed"; item: WorkItem; error: Error };

/**
 * Batch statistics
 */
export interface UploadStats {
  total: number;
  succeeded: number;
  failed: number;
  results: UploadResult[];

  /** Duration in milliseconds */
  duration: number;
}
