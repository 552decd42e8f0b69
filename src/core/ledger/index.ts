/**
 * Ledger module
 *
 * Upload ledger and failure log
 */

export {
  LEDGER_SEPARATOR,
  parseLedgerLine,
  formatLedgerLine,
  readLedger,
  readLedgerHashes,
  appendLedgerEntry,
  summarizeLedger,
} from "./ledger.js";

export { formatFailureLine, appendFailureRecord, countFailureRecords } from "./failure-log.js";

export type {
  LedgerEntry,
  FailureRecord,
  LedgerSummary,
} from "../../types/ledger.js";
