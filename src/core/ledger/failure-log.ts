/**
 * Failure log
 *
 * Diagnostic record of uploads that ran out of attempts. Only counted back,
 * never parsed.
 */

import fs from "node:fs";
import path from "node:path";
import type { FailureRecord } from "../../types/ledger.js";

/**
 * Keep a free-text field on one line and out of the field separator
 */
function flatten(value: string): string {
  return value.replace(/[\r\n]+/g, " ").replace(/\|/g, "/");
}

/**
 * Format a failure record as a log line (without the trailing newline)
 */
export function formatFailureLine(record: FailureRecord): string {
  return [
    record.timestamp,
    record.itemId,
    record.relativePath,
    record.contentHash,
    record.errorMessage,
  ]
    .map(flatten)
    .join("|");
}

/**
 * Append one failure record
 */
export function appendFailureRecord(
  failureLogPath: string,
  record: FailureRecord
): void {
  fs.mkdirSync(path.dirname(failureLogPath), { recursive: true });
  fs.appendFileSync(failureLogPath, `${formatFailureLine(record)}\n`, "utf-8");
}

/**
 * Number of records in the failure log (0 when it does not exist)
 */
export function countFailureRecords(failureLogPath: string): number {
  if (!fs.existsSync(failureLogPath)) {
    return 0;
  }

  return fs
    .readFileSync(failureLogPath, "utf-8")
    .split("\n")
    .filter((line) => line.trim() !== "").length;
}
