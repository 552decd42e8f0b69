/**
 * Workflow type definitions
 */

import type { PublishEvent, PublishResult } from "./publish.js";
import type { ScanResult, SkippedFile } from "./scanner.js";
import type { UploadEvent, UploadStats } from "./uploader.js";

/**
 * Questions asked during a run
 */
export interface Prompter {
  input(message: string): Promise<string>;
  confirm(message: string): Promise<boolean>;
}

/**
 * Workflow states, in the order a full run visits them
 */
export type WorkflowState =
  | "idle"
  | "scanning"
  | "await-confirm"
  | "await-uploader"
  | "uploading"
  | "rendering"
  | "await-publish"
  | "publishing"
  | "done";

/**
 * How a run ended
 */
export type WorkflowOutcome =
  | "completed"
  | "nothing-to-upload"
  | "invalid-source"
  | "cancelled"
  | "invalid-uploader"
  | "publish-misconfigured"
  | "publish-failed";

/**
 * Events emitted during a run
 */
export type WorkflowEvent =
  | { type: "state"; state: WorkflowState }
  | { type: "invalid-source"; sourceDir: string }
  | { type: "scan-skip"; file: SkippedFile }
  | { type: "scan-complete"; result: ScanResult; estimatedSeconds: number }
  | { type: "nothing-to-upload" }
  | { type: "cancelled" }
  | { type: "invalid-uploader"; message: string }
  | { type: "upload-started"; itemId: string; total: number }
  | { type: "upload"; event: UploadEvent }
  | { type: "upload-complete"; stats: UploadStats; failureLogPath: string }
  | { type: "site-generated"; sitePath: string }
  | { type: "site-skipped" }
  | { type: "pending-publish-detected"; sitePath: string }
  | { type: "publish"; event: PublishEvent }
  | { type: "published"; result: PublishResult }
  | { type: "publish-failed"; error: Error };

/**
 * Result of a run
 */
export interface WorkflowResult {
  outcome: WorkflowOutcome;

  /** States visited, in order */
  states: WorkflowState[];
  scan?: ScanResult;
  upload?: UploadStats;
  itemId?: string;
  siteGenerated: boolean;
  published?: PublishResult;
  error?: Error;
}
