import { z } from "zod";

export type OperationKind = "generate" | "scan";

export type LedgerState = "empty" | "active";

const Hex64 = z.string().regex(/^[0-9a-f]{64}$/);

export const LedgerEntrySchema = z
  .object({
    sequenceNumber: z.number().int().nonnegative(),
    operationKind: z.enum(["generate", "scan"]),
    reportHash: Hex64,
    previousEntryHash: Hex64,
    entryHash: Hex64,
    timestamp: z.string().min(1),
  })
  .strict();

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

/**
 * A record as read back from a store. Any JSON object loads; fields of the
 * wrong type read as empty so that chain verification, not loading, reports
 * the entry as divergent.
 */
export const StoredLedgerEntrySchema = z
  .object({
    sequenceNumber: z.number().catch(-1),
    operationKind: z.string().catch(""),
    reportHash: z.string().catch(""),
    previousEntryHash: z.string().catch(""),
    entryHash: z.string().catch(""),
    timestamp: z.string().catch(""),
  })
  .passthrough();

export type StoredLedgerEntry = z.infer<typeof StoredLedgerEntrySchema>;

export type ChainVerificationResult =
  | { valid: true; length: number }
  | { valid: false; length: number; firstDivergentSequence: number; reason: string };

/**
 * Durable backing for a ledger. `append` must reject an entry whose sequence
 * number is not the store's current length with `ConcurrentAppendConflict`.
 */
export interface LedgerStore {
  load(): Promise<StoredLedgerEntry[]>;
  append(entry: LedgerEntry): Promise<void>;
}
