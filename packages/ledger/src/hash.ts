import { createHash } from "node:crypto";
import type { OperationKind } from "./types";

export const ZERO_HASH = "0".repeat(64);

export function computeEntryHash(
  previousEntryHash: string,
  reportHash: string,
  operationKind: OperationKind,
  timestamp: string
): string {
  return createHash("sha256")
    .update(previousEntryHash + reportHash + operationKind + timestamp, "utf8")
    .digest("hex");
}

/** Caller-facing receipt id, e.g. `SCAN-TX-9F86D081884C7D65`. */
export function formatTransactionId(kind: OperationKind, entryHash: string): string {
  const prefix = kind === "generate" ? "GEN" : "SCAN";
  return `${prefix}-TX-${entryHash.slice(0, 16).toUpperCase()}`;
}
