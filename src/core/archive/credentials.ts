/**
 * Internet Archive credential resolution
 */

import type { ArchiveLedgerConfig } from "../../types/config.js";
import { ArchiveCredentialsError } from "../errors.js";

/**
 * Resolved S3-style key pair
 */
export interface ArchiveCredentials {
  accessKey: string;
  secretKey: string;
}

/**
 * Get archive credentials with priority order:
 * 1. Explicit credentials in config
 * 2. Environment variables (IA_ACCESS_KEY, IA_SECRET_KEY)
 */
export function getArchiveCredentials(
  config: Pick<ArchiveLedgerConfig, "credentials">,
  env: NodeJS.ProcessEnv = process.env
): ArchiveCredentials {
  const accessKey = config.credentials.accessKey || env.IA_ACCESS_KEY?.trim();
  const secretKey = config.credentials.secretKey || env.IA_SECRET_KEY?.trim();

  if (!accessKey || !secretKey) {
    throw new ArchiveCredentialsError(
      "Internet Archive keys not found. Set IA_ACCESS_KEY and IA_SECRET_KEY " +
        "(see https://archive.org/account/s3.php) or add credentials to archive-ledger.config.ts"
    );
  }

  return { accessKey, secretKey };
}

/**
 * Authorization header value understood by the archive's S3 endpoint
 */
export function lowAuthorization(credentials: ArchiveCredentials): string {
  return `LOW ${credentials.accessKey}:${credentials.secretKey}`;
}
