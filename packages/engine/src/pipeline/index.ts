import { parseContract } from "./parser";
import { createPrimitiveCatalog } from "./primitives";
import { composeReport, hashReport, sha256Hex } from "./report";
import { ALL_DETECTORS } from "../detectors";
import { buildSemanticModel } from "../graphs";
import { DEFAULT_POLICY } from "../config";
import type { AuditPolicy, AuditReport, Detector, Finding, SemanticModel } from "../types";

export interface AnalyzeOptions {
  policy?: AuditPolicy;
  /** Defaults to the SHA-256 of the source text. */
  contractId?: string;
  timestamp: string;
  detectors?: Detector[];
}

export interface AnalysisResult {
  model: SemanticModel;
  report: AuditReport;
  reportHash: string;
}

/**
 * Source text to hashed report: parse, model, detect, compose.
 * Throws `ParseError` when the source cannot be modeled.
 */
export function analyzeContract(source: string, options: AnalyzeOptions): AnalysisResult {
  const policy = options.policy ?? DEFAULT_POLICY;
  const detectors = options.detectors ?? ALL_DETECTORS;

  // ── Stage 1: Parsing ──
  const unit = parseContract(source, createPrimitiveCatalog(policy.primitives));

  // ── Stage 2: Semantic model ──
  const model = buildSemanticModel(unit, policy);

  // ── Stage 3: Detection ──
  const findings: Finding[] = [];
  for (const detector of detectors) {
    findings.push(...detector.detect(model, policy));
  }

  // ── Stage 4: Report assembly ──
  const sourceHash = sha256Hex(source);
  const report = composeReport(
    {
      contractId: options.contractId ?? sourceHash,
      findings,
      warnings: model.warnings,
      sourceHash,
      branchCount: unit.branches.length,
      timestamp: options.timestamp,
    },
    policy
  );

  return { model, report, reportHash: hashReport(report) };
}

export { parseContract } from "./parser";
export { tokenize } from "./lexer";
export { BUILTIN_PRIMITIVES, DEFAULT_CATALOG, createPrimitiveCatalog, classifyCallee } from "./primitives";
export * from "./report";
