/**
 * Sequential uploader
 *
 * Uploads worklist items one at a time, in order. Every attempt waits the
 * rate-limit delay first; a failed attempt waits the retry delay and tries
 * again until the retry budget is spent. One item's failure never stops
 * the batch.
 */

import type { UploadConfig } from "../../types/config.js";
import type { WorkItem } from "../../types/scanner.js";
import type {
  ArchiveClient,
  UploadEvent,
  UploadMetadata,
  UploadResult,
  UploadStats,
} from "../../types/uploader.js";
import { LocalFileMissingError } from "../errors.js";
import { appendFailureRecord } from "../ledger/failure-log.js";
import { appendLedgerEntry } from "../ledger/ledger.js";
import { RetryExhaustedError, withRetry } from "../utils/retry.js";

/**
 * Uploader options
 */
export interface UploadWorklistOptions {
  client: ArchiveClient;
  worklist: WorkItem[];
  uploader: string;
  itemId: string;
  metadata: UploadMetadata;
  settings: Pick<UploadConfig, "uploadRetries" | "rateLimitMs" | "retryDelayMs">;

  /** Ledger file, appended after every success */
  ledgerPath: string;

  /** Failure log, appended after every exhausted item */
  failureLogPath: string;

  /** Progress callback */
  onEvent?: (event: UploadEvent) => void;

  /** Clock used for ledger and failure timestamps */
  now?: () => Date;
}

/**
 * Errors that another attempt cannot fix
 */
export function isRetryableUploadError(error: Error): boolean {
  return !(error instanceof LocalFileMissingError);
}

/**
 * Upload a single item with retries, recording the outcome
 */
async function uploadItem(
  options: UploadWorklistOptions,
  item: WorkItem
): Promise<UploadResult> {
  const { client, itemId, uploader, metadata, settings, onEvent, now = () => new Date() } =
    options;

  try {
    const { attempts } = await withRetry(
      () => client.put(itemId, item.relativePath, item.absolutePath, metadata),
      {
        maxRetries: settings.uploadRetries,
        initialDelayMs: settings.retryDelayMs,
        maxDelayMs: settings.retryDelayMs,
        backoffMultiplier: 1,
        beforeAttemptMs: settings.rateLimitMs,
        shouldRetry: isRetryableUploadError,
      },
      (attempt, error, delayMs) =>
        onEvent?.({ type: "attempt-failed", item, attempt, error, delayMs })
    );

    appendLedgerEntry(options.ledgerPath, {
      itemId,
      uploader,
      relativePath: item.relativePath,
      contentHash: item.contentHash,
      timestamp: now().toISOString(),
    });

    return { item, status: "uploaded", attempts };
  } catch (error) {
    if (!(error instanceof RetryExhaustedError)) {
      throw error;
    }

    appendFailureRecord(options.failureLogPath, {
      timestamp: now().toISOString(),
      itemId,
      relativePath: item.relativePath,
      contentHash: item.contentHash,
      errorMessage: error.lastError.message,
    });
    onEvent?.({ type: "failed", item, error: error.lastError });

    return {
      item,
      status: "failed",
      attempts: error.attempts,
      error: error.lastError.message,
    };
  }
}

/**
 * Upload every worklist item in order
 */
export async function uploadWorklist(
  options: UploadWorklistOptions
): Promise<UploadStats> {
  const { worklist, onEvent } = options;
  const startTime = Date.now();
  const results: UploadResult[] = [];

  for (const [index, item] of worklist.entries()) {
    onEvent?.({ type: "start", item, index: index + 1, total: worklist.length });

    const result = await uploadItem(options, item);
    results.push(result);

    if (result.status === "uploaded") {
      onEvent?.({ type: "succeeded", item, index: index + 1, total: worklist.length });
    }
  }

  const succeeded = results.filter((r) => r.status === "uploaded").length;

  return {
    total: worklist.length,
    succeeded,
    failed: results.length - succeeded,
    results,
    duration: Date.now() - startTime,
  };
}
