export { CommitmentLedger, loadLedgerOptions, verifyEntries, type CommitmentLedgerOptions } from "./ledger";
export { MemoryLedgerStore, FileLedgerStore } from "./stores";
export { LedgerError, isLedgerError, type LedgerErrorCode } from "./errors";
export { ZERO_HASH, computeEntryHash, formatTransactionId } from "./hash";
export {
  LedgerEntrySchema,
  StoredLedgerEntrySchema,
  type LedgerEntry,
  type StoredLedgerEntry,
  type LedgerStore,
  type LedgerState,
  type OperationKind,
  type ChainVerificationResult,
} from "./types";
