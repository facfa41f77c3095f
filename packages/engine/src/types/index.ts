// ── Core Types for the Dispatch Contract Audit Engine ──

export type Severity = "critical" | "high" | "medium" | "low";

export type Confidence = "certain" | "heuristic";

export type OperationKind = "generate" | "scan";

export type RuleId =
  | "ACCESS_CONTROL"
  | "INTEGER_OVERFLOW"
  | "REENTRANCY"
  | "OVERLAPPING_DISPATCH"
  | "UNREACHABLE_DISPATCH";

export const RULE_IDS: readonly RuleId[] = [
  "ACCESS_CONTROL",
  "INTEGER_OVERFLOW",
  "REENTRANCY",
  "OVERLAPPING_DISPATCH",
  "UNREACHABLE_DISPATCH",
];

export const SEVERITIES: readonly Severity[] = ["critical", "high", "medium", "low"];

// ── Primitives ──

export type PrimitiveKind =
  | "authorization-check"
  | "state-read"
  | "state-write"
  | "fund-transfer"
  | "balance-query"
  | "external-call"
  | "checked-arithmetic"
  | "param-accessor"
  | "return-setter"
  | "unknown";

export type ValueType = "bool" | "int" | "string" | "unknown";

export interface PrimitiveDescriptor {
  kind: PrimitiveKind;
  /** Type of the value the call evaluates to. */
  returns?: ValueType;
  /** Index of the state-key argument for state reads and writes. */
  keyArg?: number;
  /** Index of the amount argument for fund transfers. */
  amountArg?: number;
  /** Index of the recipient argument for fund transfers. */
  recipientArg?: number;
  /** Authorization primitives that abort on failure instead of returning a flag. */
  asserting?: boolean;
  /** Checked arithmetic operator. */
  operator?: ArithmeticOperator;
}

// ── AST ──

export type ArithmeticOperator = "add" | "sub" | "mul";

export type Expression =
  | { kind: "literal"; type: "int" | "string" | "bool" | "char"; value: string; line: number }
  | { kind: "identifier"; name: string; line: number }
  | { kind: "member"; object: Expression; property: string; line: number }
  | { kind: "index"; object: Expression; index: Expression; line: number }
  | { kind: "call"; callee: string; primitive: PrimitiveKind; args: Expression[]; line: number }
  | { kind: "unary"; operator: string; operand: Expression; line: number }
  | { kind: "binary"; operator: string; left: Expression; right: Expression; line: number }
  | { kind: "ternary"; test: Expression; consequent: Expression; alternate: Expression; line: number }
  | { kind: "cast"; type: string; operand: Expression; line: number };

export type CallExpression = Extract<Expression, { kind: "call" }>;

export type Statement =
  | { kind: "call"; call: CallExpression; line: number }
  | {
      kind: "assignment";
      target: Expression;
      /** Set when the assignment is a declaration. */
      declaredType?: string;
      /** Compound operator for `+=`, `-=`, `*=`, `++` and `--`. */
      operator?: ArithmeticOperator;
      value?: Expression;
      line: number;
    }
  | {
      kind: "conditional";
      condition: Expression;
      then: Statement[];
      else: Statement[];
      loop: boolean;
      line: number;
    }
  | { kind: "return"; value?: Expression; line: number };

export interface EntryFunction {
  name: string;
  returnType: string;
  paramType: string;
  paramName: string;
  line: number;
}

export interface FunctionBranch {
  /** Function-name literal matched by the dispatch comparison. */
  name: string;
  /** Unique within the unit: `name` for the first occurrence, `name#2`… after. */
  key: string;
  line: number;
  statements: Statement[];
  /** Non-dispatch statements of the entry body that precede this branch. */
  prelude: Statement[];
  /** Conditions conjoined with the dispatch comparison. */
  guard?: Expression;
  /** True for arms of an `else if` chain, which match mutually exclusively. */
  exclusive: boolean;
  /** Index of the `if` chain the branch belongs to. */
  chain: number;
  stateKeys: string[];
}

export type ParseDiagnosticCode = "DUPLICATE_BRANCH" | "UNKNOWN_PRIMITIVE";

export interface ParseDiagnostic {
  code: ParseDiagnosticCode;
  message: string;
  line: number;
  branch?: string;
}

export interface ContractUnit {
  source: string;
  entry: EntryFunction;
  branches: FunctionBranch[];
  /** Every non-dispatch statement of the entry body, in source order. */
  topLevel: Statement[];
  diagnostics: ParseDiagnostic[];
}

// ── Semantic Model ──

export interface PrivilegedCall {
  callee: string;
  kind: "fund-transfer" | "state-write";
  /** Rendered state key or recipient. */
  target: string;
  line: number;
  guarded: boolean;
  confidence: Confidence;
  /** The transfer amount comes from a balance query. */
  drainsBalance: boolean;
}

export interface AuthorizationFact {
  branch: string;
  /** True when every privileged call of the branch is dominated by a check. */
  guarded: boolean;
  privilegedCalls: PrivilegedCall[];
}

export interface ArithmeticOp {
  branch: string;
  operator: ArithmeticOperator;
  expression: string;
  operandTypes: [ValueType, ValueType];
  literalOnly: boolean;
  guard: "none" | "checked" | "bounds";
  confidence: Confidence;
  line: number;
}

export interface OrderingEvent {
  kind: "state-write" | "external-call" | "fund-transfer";
  callee: string;
  /** State keys the event reads from or writes to, rendered as source text. */
  domains: string[];
  line: number;
}

export interface CallOrdering {
  branch: string;
  events: OrderingEvent[];
}

export type AnalysisWarningCode = "AmbiguousAuthorization" | "LoopApproximated";

export interface AnalysisWarning {
  code: AnalysisWarningCode;
  branch: string;
  message: string;
  line: number;
}

export interface BranchModel {
  branch: FunctionBranch;
  authorization: AuthorizationFact;
  arithmetic: ArithmeticOp[];
  ordering: CallOrdering;
}

export interface SemanticModel {
  unit: ContractUnit;
  branches: BranchModel[];
  warnings: AnalysisWarning[];
}

// ── Findings & Reports ──

export interface Finding {
  ruleId: RuleId;
  severity: Severity;
  branch: string;
  rationale: string;
  confidence: Confidence;
  line: number;
}

export interface AuditSummary {
  shipReady: boolean;
  totalFindings: number;
  criticalCount: number;
  highCount: number;
  mediumCount: number;
  lowCount: number;
  recommendation: string;
  branchCount: number;
}

export interface AuditReport {
  contractId: string;
  findings: readonly Finding[];
  riskScore: number;
  timestamp: string;
  /** SHA-256 of the audited source text; not part of the canonical form. */
  sourceHash: string;
  summary: AuditSummary;
  warnings: readonly AnalysisWarning[];
}

// ── Detector Interface ──

export interface AuditPolicy {
  severities: Record<RuleId, Severity>;
  weights: Record<Severity, number>;
  /** Case-insensitive substrings that mark a state key as sensitive. */
  sensitiveKeys: string[];
  /** Additional or overriding primitive definitions by callee name. */
  primitives: Record<string, PrimitiveDescriptor>;
}

export interface Detector {
  id: RuleId;
  name: string;
  detect(model: SemanticModel, policy: AuditPolicy): Finding[];
}
