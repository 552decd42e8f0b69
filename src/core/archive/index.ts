/**
 * Archive module
 *
 * Internet Archive credentials and S3 client
 */

export {
  getArchiveCredentials,
  lowAuthorization,
} from "./credentials.js";
export type { ArchiveCredentials } from "./credentials.js";

export {
  S3ArchiveClient,
  createArchiveS3Client,
  archiveMetadataHeaders,
} from "./s3-archive-client.js";
