/**
 * Site tree built from the ledger
 */

import type { LedgerEntry } from "../../types/ledger.js";
import type { SiteFolder } from "../../types/publish.js";

/**
 * Download URL of an archived file
 */
export function downloadUrl(
  downloadBaseUrl: string,
  itemId: string,
  relativePath: string
): string {
  return `${downloadBaseUrl.replace(/\/+$/, "")}/${itemId}/${relativePath}`;
}

/**
 * Group entries by uploader, then by path segment.
 * Leaves are download URLs; a later entry for the same path replaces an earlier one.
 */
export function buildSiteTree(
  entries: LedgerEntry[],
  downloadBaseUrl: string
): Record<string, SiteFolder> {
  const tree: Record<string, SiteFolder> = {};

  for (const entry of entries) {
    const segments = entry.relativePath.split("/");
    const fileName = segments.pop() ?? entry.relativePath;

    let current = tree[entry.uploader] ?? (tree[entry.uploader] = {});
    for (const segment of segments) {
      const existing = current[segment];
      if (typeof existing === "object") {
        current = existing;
      } else {
        const folder: SiteFolder = {};
        current[segment] = folder;
        current = folder;
      }
    }

    current[fileName] = downloadUrl(downloadBaseUrl, entry.itemId, entry.relativePath);
  }

  return tree;
}
