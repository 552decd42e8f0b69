/**
 * Configuration types for archive-ledger
 */

/**
 * Hash algorithms accepted for content fingerprints
 */
export type HashAlgorithm = "md5" | "sha1" | "sha256";

/**
 * Internet Archive credentials (S3-style keys from archive.org/account/s3.php)
 */
export interface ArchiveCredentialsConfig {
  /** S3 access key */
  accessKey?: string;

  /** S3 secret key */
  secretKey?: string;
}

/**
 * Remote archive configuration
 */
export interface ArchiveConfig {
  /** S3-compatible upload endpoint */
  endpoint: string;

  /** Base URL that download links are built from */
  downloadBaseUrl: string;

  /** Collection the created items are filed under */
  collection: string;

  /** Item media type */
  mediatype: string;

  /** Subject tag */
  subject: string;

  /** License URL attached to every item */
  licenseUrl: string;
}

/**
 * Upload behaviour
 */
export interface UploadConfig {
  /** Files larger than this (MiB) are never uploaded */
  maxFileSizeMB: number;

  /** Additional attempts after the first failed one */
  uploadRetries: number;

  /** Delay before every upload attempt, in milliseconds */
  rateLimitMs: number;

  /** Delay between a failed attempt and its retry, in milliseconds */
  retryDelayMs: number;

  /** Assumed upload speed for the time estimate (MB/s) */
  uploadSpeedMBps: number;

  /** Digest used as the deduplication key */
  hashAlgorithm: HashAlgorithm;

  /** Glob patterns excluded from the scan */
  exclude: string[];
}

/**
 * Local bookkeeping files, relative to workDir
 */
export interface FilesConfig {
  /** Append-only upload ledger */
  ledger: string;

  /** Append-only failure log */
  failureLog: string;

  /** Pending-publish sentinel */
  pendingPublish: string;

  /** Rendered site document */
  site: string;
}

/**
 * GitHub Pages publishing
 */
export interface PublishConfig {
  /** Git remote the site is pushed to */
  remote: string;

  /** Branch preferred for Pages when it exists */
  pagesBranch: string;

  /** Branch used when neither the pages branch nor a remote HEAD exist */
  fallbackBranch: string;

  /** Commit message for site updates */
  commitMessage: string;
}

/**
 * Fully resolved configuration
 */
export interface ArchiveLedgerConfig {
  /** Directory the bookkeeping files and git repository live in */
  workDir: string;

  credentials: ArchiveCredentialsConfig;
  archive: ArchiveConfig;
  upload: UploadConfig;
  files: FilesConfig;
  publish: PublishConfig;
}

/**
 * Shape accepted from a user config file (everything optional)
 */
export interface UserConfig {
  workDir?: string;
  credentials?: ArchiveCredentialsConfig;
  archive?: Partial<ArchiveConfig>;
  upload?: Partial<UploadConfig>;
  files?: Partial<FilesConfig>;
  publish?: Partial<PublishConfig>;
}

/**
 * Load config options
 */
export interface LoadConfigOptions {
  /** Config file path (default: auto-discover) */
  configPath?: string;

  /** Directory to start discovery from and to resolve workDir against */
  cwd?: string;

  /** Skip loading .env files */
  skipEnvFiles?: boolean;
}

/**
 * Helper function to define config with type safety
 * Provides autocomplete and type checking in user config files
 */
export function defineConfig(config: UserConfig): UserConfig {
  return config;
}
