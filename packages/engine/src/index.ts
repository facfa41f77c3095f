export * from "./types";
export { ParseError, PolicyError, CollaboratorError, isParseError, type ParseErrorCode } from "./errors";
export {
  DEFAULT_POLICY,
  DEFAULT_SEVERITIES,
  DEFAULT_WEIGHTS,
  DEFAULT_SENSITIVE_KEYS,
  PolicyOverridesSchema,
  resolvePolicy,
  loadAuditPolicy,
  type PolicyOverrides,
} from "./config";
export { analyzeContract, type AnalyzeOptions, type AnalysisResult } from "./pipeline";
export { parseContract, renderExpression } from "./pipeline/parser";
export { tokenize, type Token } from "./pipeline/lexer";
export { BUILTIN_PRIMITIVES, DEFAULT_CATALOG, createPrimitiveCatalog, type PrimitiveCatalog } from "./pipeline/primitives";
export {
  CANONICAL_VERSION,
  composeReport,
  compareFindings,
  sortFindings,
  computeRiskScore,
  buildSummary,
  canonicalizeReport,
  hashReport,
  sha256Hex,
  extractTranslatablePayload,
  localizeReport,
  generateMarkdownReport,
  generateJsonReport,
  type LocalizedReport,
  type LocalizedFinding,
} from "./pipeline/report";
export { buildSemanticModel, isSensitiveKey } from "./graphs";
export { ALL_DETECTORS } from "./detectors";
export {
  AuditService,
  nowIso,
  type AuditServiceDeps,
  type AuditOptions,
  type AuditResult,
  type AuditRequest,
  type AuditOutcome,
  type GenerateResult,
} from "./service";

// ── Collaborators ──

export {
  ChatClient,
  loadChatClientConfig,
  ChatContractGenerator,
  extractContractCode,
  ChatReportTranslator,
  parseTranslation,
  translateReport,
  type ChatClientConfig,
  type ChatMessage,
  type ContractGenerator,
  type ReportTranslator,
} from "./llm";
