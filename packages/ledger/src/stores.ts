import { appendFile, mkdir, readFile, truncate } from "node:fs/promises";
import path from "node:path";
import { LedgerError } from "./errors";
import { StoredLedgerEntrySchema, type LedgerEntry, type LedgerStore, type StoredLedgerEntry } from "./types";

function conflict(entry: LedgerEntry, length: number): LedgerError {
  return new LedgerError(
    "ConcurrentAppendConflict",
    `entry ${entry.sequenceNumber} does not extend a store of length ${length}`
  );
}

// ── In-memory ──

export class MemoryLedgerStore implements LedgerStore {
  private readonly entries: LedgerEntry[] = [];

  async load(): Promise<StoredLedgerEntry[]> {
    return this.entries.map((e) => ({ ...e }));
  }

  async append(entry: LedgerEntry): Promise<void> {
    if (entry.sequenceNumber !== this.entries.length) throw conflict(entry, this.entries.length);
    this.entries.push({ ...entry });
  }

  /** Direct access for tests that need to tamper with history. */
  unsafeEntries(): LedgerEntry[] {
    return this.entries;
  }
}

// ── JSON lines file ──

interface FileSnapshot {
  entries: StoredLedgerEntry[];
  /** Byte length of the complete lines; anything after is a torn write. */
  committedBytes: number;
  totalBytes: number;
}

/**
 * One JSON entry per line. A trailing line without its newline is a write
 * that never finished: it is ignored on load and cut off on the next append.
 * A complete line that is not a JSON object makes the file unreadable.
 */
export class FileLedgerStore implements LedgerStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<StoredLedgerEntry[]> {
    return (await this.snapshot()).entries;
  }

  async append(entry: LedgerEntry): Promise<void> {
    const snap = await this.snapshot();
    if (entry.sequenceNumber !== snap.entries.length) throw conflict(entry, snap.entries.length);

    try {
      if (snap.totalBytes > snap.committedBytes) {
        console.warn(
          `[ledger] discarding ${snap.totalBytes - snap.committedBytes} byte(s) of torn write in ${this.filePath}`
        );
        await truncate(this.filePath, snap.committedBytes);
      }
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, JSON.stringify(entry) + "\n", "utf8");
    } catch (err) {
      throw new LedgerError("StorageUnavailable", `cannot write ledger file ${this.filePath}`, { cause: err });
    }
  }

  private async snapshot(): Promise<FileSnapshot> {
    let buf: Buffer;
    try {
      buf = await readFile(this.filePath);
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return { entries: [], committedBytes: 0, totalBytes: 0 };
      throw new LedgerError("StorageUnavailable", `cannot read ledger file ${this.filePath}`, { cause: err });
    }

    const committedBytes = buf.lastIndexOf(0x0a) + 1;
    const text = buf.subarray(0, committedBytes).toString("utf8");
    const entries: StoredLedgerEntry[] = [];
    const lines = text.split("\n").slice(0, -1);
    for (let i = 0; i < lines.length; i++) {
      try {
        entries.push(StoredLedgerEntrySchema.parse(JSON.parse(lines[i])));
      } catch (err) {
        throw new LedgerError(
          "StorageUnavailable",
          `ledger file ${this.filePath} has an unreadable entry on line ${i + 1}`,
          { cause: err }
        );
      }
    }
    return { entries, committedBytes, totalBytes: buf.length };
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
