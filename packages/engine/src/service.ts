import {
  formatTransactionId,
  type ChainVerificationResult,
  type CommitmentLedger,
  type LedgerEntry,
} from "@dispatchguard/ledger";
import { DEFAULT_POLICY } from "./config";
import { isParseError } from "./errors";
import type { ContractGenerator } from "./llm/generator";
import { analyzeContract } from "./pipeline";
import type { AuditPolicy, AuditReport, OperationKind } from "./types";

/** ISO-8601 UTC with second precision, e.g. `2026-01-05T10:00:00Z`. */
export function nowIso(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export interface AuditServiceDeps {
  ledger: CommitmentLedger;
  policy?: AuditPolicy;
  generator?: ContractGenerator;
  clock?: () => Date;
}

export interface AuditOptions {
  contractId?: string;
}

export interface AuditResult {
  report: AuditReport;
  entry: LedgerEntry;
  reportHash: string;
  transactionId: string;
}

export interface GenerateResult extends AuditResult {
  source: string;
}

export interface AuditRequest extends AuditOptions {
  source: string;
  operationKind: OperationKind;
}

export type AuditOutcome =
  | { ok: true; result: AuditResult }
  | { ok: false; error: Error };

/**
 * Audits contract source and commits each report to the ledger. A report is
 * only returned once its ledger entry is committed.
 */
export class AuditService {
  private readonly ledger: CommitmentLedger;
  private readonly policy: AuditPolicy;
  private readonly generator?: ContractGenerator;
  private readonly clock: () => Date;

  constructor(deps: AuditServiceDeps) {
    this.ledger = deps.ledger;
    this.policy = deps.policy ?? DEFAULT_POLICY;
    this.generator = deps.generator;
    this.clock = deps.clock ?? (() => new Date());
  }

  async audit(source: string, operationKind: OperationKind, options: AuditOptions = {}): Promise<AuditResult> {
    const timestamp = nowIso(this.clock());
    const { report, reportHash } = analyzeContract(source, {
      policy: this.policy,
      contractId: options.contractId,
      timestamp,
    });

    const entry = await this.ledger.append(reportHash, operationKind, timestamp);
    const transactionId = formatTransactionId(operationKind, entry.entryHash);
    console.log(
      `[audit] ${operationKind} ${report.contractId.slice(0, 16)}: ${report.findings.length} finding(s), risk ${report.riskScore}, ${transactionId}`
    );
    return { report, entry, reportHash, transactionId };
  }

  verifyLedger(): Promise<ChainVerificationResult> {
    return this.ledger.verifyChain();
  }

  /**
   * Independent audits with bounded parallelism. Outcomes keep request order;
   * one failing source does not affect the others.
   */
  async auditMany(requests: AuditRequest[], concurrency = 4): Promise<AuditOutcome[]> {
    return mapConcurrent(requests, Math.max(1, concurrency), async (req): Promise<AuditOutcome> => {
      try {
        return { ok: true, result: await this.audit(req.source, req.operationKind, { contractId: req.contractId }) };
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        console.warn(`[audit] request failed: ${error.message}`);
        return { ok: false, error };
      }
    });
  }

  /** Generated source goes through the same audit and commitment as a scan. */
  async generateAndAudit(prompt: string, options: AuditOptions = {}): Promise<GenerateResult> {
    if (!this.generator) {
      throw new Error("AuditService was constructed without a contract generator");
    }
    const source = await this.generator.generate(prompt);
    try {
      const result = await this.audit(source, "generate", options);
      return { ...result, source };
    } catch (err) {
      if (isParseError(err)) console.warn(`[audit] generated source could not be parsed: ${err.message}`);
      throw err;
    }
  }
}

async function mapConcurrent<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T, idx: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;

  async function worker() {
    while (next < items.length) {
      const idx = next++;
      results[idx] = await fn(items[idx], idx);
    }
  }

  await Promise.all(
    Array.from({ length: Math.min(concurrency, items.length) }, () => worker()),
  );
  return results;
}
