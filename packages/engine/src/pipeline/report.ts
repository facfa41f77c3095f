import { createHash } from "node:crypto";
import type {
  AnalysisWarning,
  AuditPolicy,
  AuditReport,
  AuditSummary,
  Finding,
  Severity,
} from "../types";

export const CANONICAL_VERSION = "dispatch-audit/v1";

const SEVERITY_RANK: Record<Severity, number> = { critical: 0, high: 1, medium: 2, low: 3 };

/** Code-unit comparison; independent of locale. */
function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Canonical finding order: severity (critical first), then branch name, with
 * rule id, rationale and line breaking the remaining ties.
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    compareText(a.branch, b.branch) ||
    compareText(a.ruleId, b.ruleId) ||
    compareText(a.rationale, b.rationale) ||
    a.line - b.line
  );
}

export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(compareFindings);
}

export function computeRiskScore(findings: readonly Finding[], weights: AuditPolicy["weights"]): number {
  const sum = findings.reduce((acc, f) => acc + weights[f.severity], 0);
  return Math.min(100, Math.max(0, sum));
}

export function buildSummary(findings: readonly Finding[], branchCount: number): AuditSummary {
  const criticalCount = findings.filter((f) => f.severity === "critical").length;
  const highCount = findings.filter((f) => f.severity === "high").length;
  const mediumCount = findings.filter((f) => f.severity === "medium").length;
  const lowCount = findings.filter((f) => f.severity === "low").length;

  const shipReady = criticalCount === 0 && highCount === 0;

  let recommendation: string;
  if (criticalCount > 0) {
    recommendation = `Do not deploy. ${criticalCount} critical issue(s) must be resolved immediately.`;
  } else if (highCount > 0) {
    recommendation = `Do not deploy. ${highCount} high severity issue(s) require remediation.`;
  } else if (mediumCount > 0) {
    recommendation = `Deploy with caution. ${mediumCount} medium severity issue(s) should be addressed.`;
  } else {
    recommendation = "Deploy ready. No significant issues found.";
  }

  return {
    shipReady,
    totalFindings: findings.length,
    criticalCount,
    highCount,
    mediumCount,
    lowCount,
    recommendation,
    branchCount,
  };
}

export interface ComposeInput {
  contractId: string;
  findings: readonly Finding[];
  warnings: readonly AnalysisWarning[];
  sourceHash: string;
  branchCount: number;
  timestamp: string;
}

export function composeReport(input: ComposeInput, policy: AuditPolicy): AuditReport {
  const findings = sortFindings(input.findings).map((f) => Object.freeze({ ...f }));
  const report: AuditReport = {
    contractId: input.contractId,
    findings: Object.freeze(findings),
    riskScore: computeRiskScore(findings, policy.weights),
    timestamp: input.timestamp,
    sourceHash: input.sourceHash,
    summary: Object.freeze(buildSummary(findings, input.branchCount)),
    warnings: Object.freeze(input.warnings.map((w) => Object.freeze({ ...w }))),
  };
  return Object.freeze(report);
}

// ── Canonical form ──

/**
 * `["dispatch-audit/v1", contractId, riskScore, [[rule, severity, branch, rationale], ...]]`
 * as compact JSON over NFC strings. Findings are re-sorted so a report built by
 * hand canonicalizes the same as a composed one.
 */
export function canonicalizeReport(report: Pick<AuditReport, "contractId" | "findings" | "riskScore">): string {
  const nfc = (s: string) => s.normalize("NFC");
  const findings = sortFindings(report.findings).map((f) => [
    f.ruleId,
    f.severity,
    nfc(f.branch),
    nfc(f.rationale),
  ]);
  return JSON.stringify([CANONICAL_VERSION, nfc(report.contractId), report.riskScore, findings]);
}

export function sha256Hex(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

export function hashReport(report: Pick<AuditReport, "contractId" | "findings" | "riskScore">): string {
  return sha256Hex(canonicalizeReport(report));
}

// ── Translation view ──

/** Rationale strings in canonical order: the only text handed to a translator. */
export function extractTranslatablePayload(report: AuditReport): string[] {
  return report.findings.map((f) => f.rationale);
}

export interface LocalizedFinding extends Finding {
  localizedRationale: string;
}

export interface LocalizedReport {
  language: string;
  report: AuditReport;
  findings: LocalizedFinding[];
}

export function localizeReport(report: AuditReport, translations: string[], language: string): LocalizedReport {
  if (translations.length !== report.findings.length) {
    throw new RangeError(
      `expected ${report.findings.length} translated rationale(s), got ${translations.length}`
    );
  }
  return {
    language,
    report,
    findings: report.findings.map((f, i) => ({ ...f, localizedRationale: translations[i] })),
  };
}

// ── Renderings ──

export function generateMarkdownReport(report: AuditReport, localized?: LocalizedReport): string {
  const { summary } = report;
  const lines: string[] = [];

  lines.push(`# Contract Audit Report: ${report.contractId}`);
  lines.push("");
  lines.push(`**Generated:** ${report.timestamp}`);
  lines.push(`**Source SHA-256:** \`${report.sourceHash}\``);
  lines.push(`**Dispatch branches:** ${summary.branchCount}`);
  lines.push(`**Risk score:** ${report.riskScore}/100`);
  if (localized) lines.push(`**Language:** ${localized.language}`);
  lines.push("");

  lines.push("## Executive Summary");
  lines.push("");
  lines.push(
    summary.shipReady
      ? "**Verdict: DEPLOY** (no critical or high severity issues found)"
      : "**Verdict: DO NOT DEPLOY** (critical or high severity issues must be resolved first)"
  );
  lines.push("");
  lines.push(`| Severity | Count |`);
  lines.push(`|----------|-------|`);
  lines.push(`| Critical | ${summary.criticalCount} |`);
  lines.push(`| High     | ${summary.highCount} |`);
  lines.push(`| Medium   | ${summary.mediumCount} |`);
  lines.push(`| Low      | ${summary.lowCount} |`);
  lines.push(`| **Total** | **${summary.totalFindings}** |`);
  lines.push("");
  lines.push(`**Recommendation:** ${summary.recommendation}`);
  lines.push("");

  lines.push("## Findings");
  lines.push("");
  if (report.findings.length === 0) {
    lines.push("No findings.");
    lines.push("");
  }

  report.findings.forEach((finding, i) => {
    const rationale = localized?.findings[i]?.localizedRationale ?? finding.rationale;
    lines.push(`### [${finding.severity.toUpperCase()}] ${finding.ruleId} in \`${finding.branch}\``);
    lines.push("");
    lines.push(`**Line:** ${finding.line}`);
    lines.push(`**Confidence:** ${finding.confidence}`);
    lines.push("");
    lines.push(rationale);
    lines.push("");
    lines.push("---");
    lines.push("");
  });

  if (report.warnings.length > 0) {
    lines.push("## Analysis Warnings");
    lines.push("");
    for (const w of report.warnings) {
      lines.push(`- \`${w.branch}\` line ${w.line} (${w.code}): ${w.message}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

export function generateJsonReport(report: AuditReport, localized?: LocalizedReport): object {
  return {
    metadata: {
      generatedAt: report.timestamp,
      canonicalVersion: CANONICAL_VERSION,
      contractId: report.contractId,
      sourceHash: report.sourceHash,
      language: localized?.language ?? "en",
    },
    riskScore: report.riskScore,
    summary: report.summary,
    findings: report.findings.map((f, i) => ({
      ruleId: f.ruleId,
      severity: f.severity,
      branch: f.branch,
      rationale: f.rationale,
      localizedRationale: localized?.findings[i]?.localizedRationale,
      confidence: f.confidence,
      line: f.line,
    })),
    warnings: report.warnings,
  };
}
