import {
  generateJsonReport,
  generateMarkdownReport,
  translateReport,
  type AuditResult,
  type AuditService,
  type LocalizedReport,
  type ReportTranslator,
} from "@dispatchguard/engine";
import type { AuditJobData } from "@dispatchguard/queue";
import type { ReportArchive } from "@dispatchguard/storage";

export interface AuditHandlerDeps {
  service: AuditService;
  archive: ReportArchive;
  /** Needed only for jobs whose report language is not English. */
  translator?: ReportTranslator;
}

export interface AuditJobResult {
  auditJobId: string;
  clientRefId?: string;
  transactionId: string;
  reportHash: string;
  sequenceNumber: number;
  riskScore: number;
  findingCount: number;
  artifacts: string[];
}

export type ProgressFn = (stage: string, pct: number) => Promise<void>;

export function truncateError(err: unknown, max = 2000): string {
  const msg = err instanceof Error ? err.message : String(err);
  return msg.length > max ? msg.slice(0, max) + "…(truncated)" : msg;
}

/**
 * Audit, commit and archive one job. Failures are re-thrown with a truncated
 * message so BullMQ's failedReason stays small.
 */
export async function handleAuditJob(
  data: AuditJobData,
  deps: AuditHandlerDeps,
  onProgress: ProgressFn = async () => {}
): Promise<AuditJobResult> {
  const { auditJobId } = data;
  try {
    // Checked before the audit commits, since a failed job is not retried.
    const translator = data.reportLanguage !== "en" ? deps.translator : undefined;
    if (data.reportLanguage !== "en" && !translator) {
      throw new Error(`No translator configured for language "${data.reportLanguage}"`);
    }

    await onProgress("auditing", 10);
    let result: AuditResult;
    let source: string;
    if (data.kind === "scan") {
      source = data.code;
      result = await deps.service.audit(data.code, "scan", { contractId: data.contractId });
    } else {
      const generated = await deps.service.generateAndAudit(data.prompt);
      source = generated.source;
      result = generated;
    }

    let localized: LocalizedReport | undefined;
    if (translator) {
      await onProgress("translating", 60);
      localized = await translateReport(result.report, translator, data.reportLanguage);
    }

    await onProgress("uploading_artifacts", 80);
    const json = {
      ...generateJsonReport(result.report, localized),
      reportHash: result.reportHash,
      transactionId: result.transactionId,
      ledgerEntry: result.entry,
      clientRefId: data.clientRefId,
    };
    const uploads = [
      await deps.archive.putArtifact(auditJobId, "report.md", generateMarkdownReport(result.report, localized), "text/markdown"),
      await deps.archive.putArtifact(auditJobId, "report.json", JSON.stringify(json, null, 2), "application/json"),
      await deps.archive.putArtifact(auditJobId, "contract.cpp", source, "text/plain"),
    ];

    await onProgress("complete", 100);
    console.log(
      `[worker] audit ${auditJobId} completed: ${result.report.findings.length} findings, ${result.transactionId}`
    );
    return {
      auditJobId,
      clientRefId: data.clientRefId,
      transactionId: result.transactionId,
      reportHash: result.reportHash,
      sequenceNumber: result.entry.sequenceNumber,
      riskScore: result.report.riskScore,
      findingCount: result.report.findings.length,
      artifacts: uploads.map((u) => u.objectKey),
    };
  } catch (err) {
    const truncated = truncateError(err);
    console.error(`[worker] audit ${auditJobId} failed:`, truncated);
    throw new Error(truncated, { cause: err });
  }
}
