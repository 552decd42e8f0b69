/**
 * Archive item identifiers and metadata
 */

import { basename, resolve } from "node:path";
import type { ArchiveConfig } from "../../types/config.js";
import type { UploadMetadata } from "../../types/uploader.js";

/**
 * Replace everything outside [a-zA-Z0-9-] with underscores
 */
export function sanitizeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9-]/g, "_");
}

/**
 * Local time as YYYYMMDDHHmmss
 */
export function formatCompactTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    String(date.getFullYear()) +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

/**
 * Name of the uploaded directory as shown in titles
 */
export function sourceName(sourceDir: string): string {
  return basename(resolve(sourceDir));
}

/**
 * Item id for one run: `<uploader>_<source name>_<YYYYMMDDHHmmss>`, both
 * names sanitized
 */
export function createItemId(
  uploader: string,
  sourceDir: string,
  now: Date = new Date()
): string {
  return `${sanitizeName(uploader)}_${sanitizeName(sourceName(sourceDir))}_${formatCompactTimestamp(now)}`;
}

/**
 * Metadata attached to every file of a run
 */
export function buildUploadMetadata(
  uploader: string,
  source: string,
  archive: Pick<ArchiveConfig, "collection" | "mediatype" | "subject" | "licenseUrl">
): UploadMetadata {
  return {
    title: `${uploader}'s Upload: ${source}`,
    mediatype: archive.mediatype,
    collection: archive.collection,
    description: `Uploaded via archive-ledger by ${uploader}`,
    creator: uploader,
    subject: archive.subject,
    licenseUrl: archive.licenseUrl,
  };
}
