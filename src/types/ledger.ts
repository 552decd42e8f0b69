/**
 * Ledger-related type definitions
 */

/**
 * One successfully completed upload
 */
export interface LedgerEntry {
  /** Archive item the file was uploaded into */
  itemId: string;

  /** Name given by the person who ran the upload */
  uploader: string;

  /** Path relative to the uploaded directory (forward slashes) */
  relativePath: string;

  /** Content fingerprint, the deduplication key */
  contentHash: string;

  /** ISO 8601 timestamp */
  timestamp: string;
}

/**
 * Upload that exhausted its attempts
 */
export interface FailureRecord {
  timestamp: string;
  itemId: string;
  relativePath: string;
  contentHash: string;
  errorMessage: string;
}

/**
 * Ledger totals for display
 */
export interface LedgerSummary {
  entries: number;
  items: number;
  uploaders: Record<string, number>;
}
