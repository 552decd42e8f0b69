/**
 * Config utility functions
 */

import { isAbsolute, resolve } from "node:path";
import type { ArchiveLedgerConfig } from "../../types/config.js";

/**
 * Re-export defineConfig from types for user config files
 */
export { defineConfig } from "../../types/config.js";

/**
 * Absolute paths of the bookkeeping files
 */
export function resolveFilePaths(config: Pick<ArchiveLedgerConfig, "workDir" | "files">): {
  ledger: string;
  failureLog: string;
  pendingPublish: string;
  site: string;
} {
  const at = (file: string) => (isAbsolute(file) ? file : resolve(config.workDir, file));

  return {
    ledger: at(config.files.ledger),
    failureLog: at(config.files.failureLog),
    pendingPublish: at(config.files.pendingPublish),
    site: at(config.files.site),
  };
}

/**
 * Generate example config file content
 */
export function generateExampleConfig(options: {
  collection?: string;
  maxFileSizeMB?: number;
  pagesBranch?: string;
} = {}): string {
  const { collection = "opensource", maxFileSizeMB = 500, pagesBranch = "gh-pages" } = options;

  return `/**
 * archive-ledger configuration
 *
 * Keys are read from IA_ACCESS_KEY / IA_SECRET_KEY (.env is loaded automatically).
 * Get them from https://archive.org/account/s3.php
 */
export default {
  archive: {
    collection: '${collection}',
    mediatype: 'data',
    subject: 'user-upload',
  },

  upload: {
    maxFileSizeMB: ${maxFileSizeMB},
    uploadRetries: 2,
    rateLimitMs: 10000,
    retryDelayMs: 5000,
    hashAlgorithm: 'md5',
    exclude: [],
  },

  files: {
    ledger: 'uploaded.log',
    failureLog: 'Failed.log',
    pendingPublish: '.push_state',
    site: 'index.html',
  },

  publish: {
    remote: 'origin',
    pagesBranch: '${pagesBranch}',
    fallbackBranch: 'main',
    commitMessage: 'Update GitHub Pages',
  },
};
`;
}
