/**
 * Uploader module
 */

export {
  sanitizeName,
  formatCompactTimestamp,
  sourceName,
  createItemId,
  buildUploadMetadata,
} from "./item-id.js";

export { uploadWorklist, isRetryableUploadError } from "./uploader.js";
export type { UploadWorklistOptions } from "./uploader.js";

export type {
  ArchiveClient,
  UploadMetadata,
  UploadResult,
  UploadEvent,
  UploadStats,
} from "../../types/uploader.js";
