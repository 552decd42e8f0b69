/**
 * Error types
 */

/**
 * Base class for errors raised by archive-ledger
 */
export class ArchiveLedgerError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid or unreadable configuration
 */
export class ConfigError extends ArchiveLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

/**
 * Archive keys are not configured
 */
export class ArchiveCredentialsError extends ArchiveLedgerError {
  constructor(message: string) {
    super("ARCHIVE_CREDENTIALS_MISSING", message);
  }
}

/**
 * A worklist file disappeared before it could be uploaded.
 * Retrying cannot fix this, so it is never retried.
 */
export class LocalFileMissingError extends ArchiveLedgerError {
  readonly path: string;

  constructor(path: string) {
    super("LOCAL_FILE_MISSING", `Local file missing: ${path}`);
    this.path = path;
  }
}

/**
 * The archive rejected or failed an upload request
 */
export class ArchiveUploadError extends ArchiveLedgerError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super("ARCHIVE_UPLOAD_FAILED", message, options);
    this.statusCode = statusCode;
  }
}

/**
 * A ledger field cannot be written without breaking the line format
 */
export class LedgerFormatError extends ArchiveLedgerError {
  constructor(message: string) {
    super("LEDGER_FORMAT", message);
  }
}

/**
 * Publishing cannot start: no remote, or a remote that is not on GitHub
 */
export class PublishConfigError extends ArchiveLedgerError {
  readonly hint: string[];

  constructor(message: string, hint: string[] = []) {
    super("PUBLISH_CONFIG", message);
    this.hint = hint;
  }
}

/**
 * Publishing started but a git operation failed
 */
export class PublishError extends ArchiveLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PUBLISH_FAILED", message, options);
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
