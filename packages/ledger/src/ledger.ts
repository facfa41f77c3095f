import { z } from "zod";
import { LedgerError, isLedgerError } from "./errors";
import { ZERO_HASH, computeEntryHash } from "./hash";
import {
  LedgerEntrySchema,
  type ChainVerificationResult,
  type LedgerEntry,
  type LedgerState,
  type LedgerStore,
  type OperationKind,
  type StoredLedgerEntry,
} from "./types";

const HEX64 = /^[0-9a-f]{64}$/;

export interface CommitmentLedgerOptions {
  /** Times a conflicting append is rebuilt on the fresh head before giving up. */
  maxAppendRetries?: number;
}

const RetryLimit = z
  .string()
  .trim()
  .regex(/^\d{1,3}$/, "must be a whole number from 0 to 999")
  .transform(Number);

/** Reads `LEDGER_MAX_APPEND_RETRIES`; unset or blank keeps the default. */
export function loadLedgerOptions(env: Record<string, string | undefined> = process.env): CommitmentLedgerOptions {
  const raw = env.LEDGER_MAX_APPEND_RETRIES;
  if (raw === undefined || raw.trim() === "") return {};
  const parsed = RetryLimit.safeParse(raw);
  if (!parsed.success) {
    throw new RangeError(`LEDGER_MAX_APPEND_RETRIES ${parsed.error.issues[0].message}, got "${raw}"`);
  }
  return { maxAppendRetries: parsed.data };
}

/**
 * Append-only, hash-chained record of audit commitments.
 *
 * Appends run one at a time through a promise chain, so sequence numbers are
 * contiguous within a process. A store shared with another writer reports a
 * stale head as `ConcurrentAppendConflict`; the append is rebuilt on the new
 * head up to `maxAppendRetries` times.
 */
export class CommitmentLedger {
  private readonly maxAppendRetries: number;
  private tail: Promise<unknown> = Promise.resolve();
  /** Last committed entry; `undefined` until read from the store. */
  private head: LedgerEntry | null | undefined;

  constructor(private readonly store: LedgerStore, options: CommitmentLedgerOptions = {}) {
    const retries = options.maxAppendRetries ?? 3;
    if (!Number.isInteger(retries) || retries < 0) {
      throw new RangeError(`maxAppendRetries must be a non-negative integer, got ${retries}`);
    }
    this.maxAppendRetries = retries;
  }

  append(reportHash: string, operationKind: OperationKind, timestamp: string): Promise<LedgerEntry> {
    if (!HEX64.test(reportHash)) {
      return Promise.reject(new TypeError("reportHash must be 64 lowercase hex characters"));
    }
    if (timestamp.length === 0) {
      return Promise.reject(new TypeError("timestamp must not be empty"));
    }

    const run = this.tail.then(() => this.appendNow(reportHash, operationKind, timestamp));
    // The queue only orders appends; each caller still sees its own failure.
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** Recompute the chain over the entries present when called. */
  async verifyChain(): Promise<ChainVerificationResult> {
    const result = verifyEntries(await this.read());
    if (!result.valid) {
      console.warn(`[ledger] chain diverges at sequence ${result.firstDivergentSequence}: ${result.reason}`);
    }
    return result;
  }

  async entries(): Promise<readonly StoredLedgerEntry[]> {
    return this.read();
  }

  async state(): Promise<LedgerState> {
    return (await this.read()).length === 0 ? "empty" : "active";
  }

  private async appendNow(
    reportHash: string,
    operationKind: OperationKind,
    timestamp: string
  ): Promise<LedgerEntry> {
    for (let attempt = 0; ; attempt++) {
      const head = await this.loadHead(attempt > 0);
      const previousEntryHash = head ? head.entryHash : ZERO_HASH;
      const entry: LedgerEntry = {
        sequenceNumber: head ? head.sequenceNumber + 1 : 0,
        operationKind,
        reportHash,
        previousEntryHash,
        entryHash: computeEntryHash(previousEntryHash, reportHash, operationKind, timestamp),
        timestamp,
      };

      try {
        await this.store.append(entry);
      } catch (err) {
        if (isLedgerError(err, "ConcurrentAppendConflict") && attempt < this.maxAppendRetries) {
          console.warn(`[ledger] append conflict at sequence ${entry.sequenceNumber}, retrying (${attempt + 1}/${this.maxAppendRetries})`);
          this.head = undefined;
          continue;
        }
        this.head = undefined;
        if (isLedgerError(err)) throw err;
        throw new LedgerError("StorageUnavailable", "ledger store rejected the append", { cause: err });
      }

      this.head = entry;
      console.log(`[ledger] #${entry.sequenceNumber} ${operationKind} ${entry.entryHash.slice(0, 12)}`);
      return Object.freeze({ ...entry });
    }
  }

  private async loadHead(refresh: boolean): Promise<LedgerEntry | null> {
    if (this.head === undefined || refresh) {
      const all = await this.read();
      if (all.length === 0) {
        this.head = null;
      } else {
        const parsed = LedgerEntrySchema.safeParse(all[all.length - 1]);
        if (!parsed.success) {
          throw new LedgerError(
            "StorageUnavailable",
            `ledger head at position ${all.length - 1} is not a well-formed entry; run chain verification`
          );
        }
        this.head = parsed.data;
      }
    }
    return this.head;
  }

  private async read(): Promise<StoredLedgerEntry[]> {
    try {
      return await this.store.load();
    } catch (err) {
      if (isLedgerError(err)) throw err;
      throw new LedgerError("StorageUnavailable", "ledger store could not be read", { cause: err });
    }
  }
}

export function verifyEntries(entries: readonly StoredLedgerEntry[]): ChainVerificationResult {
  const length = entries.length;
  let previous = ZERO_HASH;

  for (let i = 0; i < length; i++) {
    const e = entries[i];
    const fail = (reason: string): ChainVerificationResult => ({
      valid: false,
      length,
      firstDivergentSequence: i,
      reason,
    });

    const parsed = LedgerEntrySchema.safeParse(e);
    if (!parsed.success) {
      const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".") || "(entry)"))];
      return fail(`malformed entry: ${fields.join(", ")}`);
    }
    const entry = parsed.data;
    if (entry.sequenceNumber !== i) return fail(`expected sequence ${i}, found ${entry.sequenceNumber}`);
    if (entry.previousEntryHash !== previous) return fail("previousEntryHash does not match the preceding entry");
    const expected = computeEntryHash(entry.previousEntryHash, entry.reportHash, entry.operationKind, entry.timestamp);
    if (entry.entryHash !== expected) return fail("entryHash does not match the entry contents");
    previous = entry.entryHash;
  }

  return { valid: true, length };
}
