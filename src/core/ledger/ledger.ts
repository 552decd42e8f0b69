/**
 * Upload ledger
 *
 * Append-only text file, one `itemId|uploader|relativePath|contentHash|timestamp`
 * record per line. Lines that do not have exactly five fields are ignored
 * when reading, so a torn last line from an interrupted write is harmless.
 */

import fs from "node:fs";
import path from "node:path";
import type { LedgerEntry, LedgerSummary } from "../../types/ledger.js";
import { LedgerFormatError } from "../errors.js";

/**
 * Field separator
 */
export const LEDGER_SEPARATOR = "|";

const FIELD_COUNT = 5;

/**
 * Parse a single ledger line; null when it is not a well-formed record
 */
export function parseLedgerLine(line: string): LedgerEntry | null {
  const trimmed = line.trim();
  if (!trimmed) {
    return null;
  }

  const parts = trimmed.split(LEDGER_SEPARATOR);
  if (parts.length !== FIELD_COUNT) {
    return null;
  }

  const [itemId, uploader, relativePath, contentHash, timestamp] = parts;
  return { itemId, uploader, relativePath, contentHash, timestamp };
}

/**
 * Format an entry as a ledger line (without the trailing newline)
 */
export function formatLedgerLine(entry: LedgerEntry): string {
  const fields = [
    entry.itemId,
    entry.uploader,
    entry.relativePath,
    entry.contentHash,
    entry.timestamp,
  ];

  for (const field of fields) {
    if (field.includes(LEDGER_SEPARATOR) || /[\r\n]/.test(field)) {
      throw new LedgerFormatError(
        `Ledger field cannot contain "${LEDGER_SEPARATOR}" or a line break: ${JSON.stringify(field)}`
      );
    }
  }

  return fields.join(LEDGER_SEPARATOR);
}

/**
 * Read all well-formed entries, in file order
 */
export function readLedger(ledgerPath: string): LedgerEntry[] {
  if (!fs.existsSync(ledgerPath)) {
    return [];
  }

  const content = fs.readFileSync(ledgerPath, "utf-8");
  const entries: LedgerEntry[] = [];

  for (const line of content.split("\n")) {
    const entry = parseLedgerLine(line);
    if (entry) {
      entries.push(entry);
    }
  }

  return entries;
}

/**
 * Content hashes already uploaded
 */
export function readLedgerHashes(ledgerPath: string): Set<string> {
  return new Set(readLedger(ledgerPath).map((entry) => entry.contentHash));
}

/**
 * Append one entry. The write is synchronous: the line is on disk
 * before the caller moves on to the next file.
 */
export function appendLedgerEntry(ledgerPath: string, entry: LedgerEntry): void {
  const line = formatLedgerLine(entry);
  fs.mkdirSync(path.dirname(ledgerPath), { recursive: true });
  fs.appendFileSync(ledgerPath, `${line}\n`, "utf-8");
}

/**
 * Totals for display
 */
export function summarizeLedger(entries: LedgerEntry[]): LedgerSummary {
  const uploaders: Record<string, number> = {};
  const items = new Set<string>();

  for (const entry of entries) {
    uploaders[entry.uploader] = (uploaders[entry.uploader] ?? 0) + 1;
    items.add(entry.itemId);
  }

  return {
    entries: entries.length,
    items: items.size,
    uploaders,
  };
}
