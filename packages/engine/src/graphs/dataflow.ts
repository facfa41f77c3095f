import type { AuditPolicy, CallExpression, Expression, Statement, ValueType } from "../types";
import type { PrimitiveCatalog } from "../pipeline/primitives";
import { renderExpression } from "../pipeline/parser";

export type Polarity = "positive" | "negative" | "mixed" | null;

const CALLER_FIELDS = new Set(["sender", "invocator", "caller", "originator"]);
const INT_TYPE = /\b(int|long|short|unsigned|signed|size_t|u?int\d+(_t)?|sint\d+|uint\d+)\b/;

export interface AnalysisContext {
  paramName: string;
  catalog: PrimitiveCatalog;
  policy: AuditPolicy;
}

/** What is known about a local variable across the whole branch. */
export interface LocalInfo {
  type: ValueType;
  /** State keys whose values flow into the variable. */
  stateKeys: Set<string>;
  fromBalance: boolean;
  /** Authorization polarity of the value assigned to it. */
  polarity: Polarity;
  /** The variable holds the caller identity. */
  identity: boolean;
  /** A value the caller supplies through the input record flows into it. */
  fromParams: boolean;
}

export type Env = Map<string, LocalInfo>;

export function valueTypeOf(declaredType: string): ValueType {
  const t = declaredType.replace(/\s+/g, " ");
  if (/\bbool\b/.test(t)) return "bool";
  if (/char\s*\*|string/i.test(t)) return "string";
  if (/\bchar\b/.test(t) || INT_TYPE.test(t)) return "int";
  return "unknown";
}

/**
 * Flow-insensitive symbol table: every assignment in `statements` contributes to
 * the variable's sources, in source order.
 */
export function buildEnv(statements: Statement[], ctx: AnalysisContext): Env {
  const env: Env = new Map();

  const visit = (stmts: Statement[]): void => {
    for (const s of stmts) {
      if (s.kind === "conditional") {
        visit(s.then);
        visit(s.else);
        continue;
      }
      if (s.kind !== "assignment" || s.target.kind !== "identifier") continue;

      const name = s.target.name;
      const existing = env.get(name);
      const info: LocalInfo = existing ?? {
        type: s.declaredType ? valueTypeOf(s.declaredType) : "unknown",
        stateKeys: new Set(),
        fromBalance: false,
        polarity: null,
        identity: false,
        fromParams: false,
      };
      if (s.value) {
        const sources = stateSources(s.value, env, ctx);
        sources.keys.forEach((k) => info.stateKeys.add(k));
        info.fromBalance = info.fromBalance || sources.fromBalance;
        if (info.type === "unknown") info.type = expressionType(s.value, env, ctx);
        const polarity = authPolarity(s.value, env, ctx);
        if (polarity) info.polarity = info.polarity && info.polarity !== polarity ? "mixed" : polarity;
        info.identity = info.identity || isCallerIdentity(s.value, env, ctx);
        info.fromParams = info.fromParams || isParamDerived(s.value, env, ctx);
      }
      env.set(name, info);
    }
  };

  visit(statements);
  return env;
}

// ── Expression helpers ──

export function forEachCall(expr: Expression | undefined, fn: (call: CallExpression) => void): void {
  if (!expr) return;
  switch (expr.kind) {
    case "call":
      expr.args.forEach((a) => forEachCall(a, fn));
      fn(expr);
      break;
    case "member":
      forEachCall(expr.object, fn);
      break;
    case "index":
      forEachCall(expr.object, fn);
      forEachCall(expr.index, fn);
      break;
    case "unary":
    case "cast":
      forEachCall(expr.operand, fn);
      break;
    case "binary":
      forEachCall(expr.left, fn);
      forEachCall(expr.right, fn);
      break;
    case "ternary":
      forEachCall(expr.test, fn);
      forEachCall(expr.consequent, fn);
      forEachCall(expr.alternate, fn);
      break;
  }
}

/** Calls in evaluation order, for every expression a statement evaluates itself. */
export function statementCalls(stmt: Statement): CallExpression[] {
  const out: CallExpression[] = [];
  const push = (c: CallExpression) => out.push(c);
  switch (stmt.kind) {
    case "call":
      forEachCall(stmt.call, push);
      break;
    case "assignment":
      forEachCall(stmt.value, push);
      if (stmt.target.kind !== "identifier") forEachCall(stmt.target, push);
      break;
    case "conditional":
      forEachCall(stmt.condition, push);
      break;
    case "return":
      forEachCall(stmt.value, push);
      break;
  }
  return out;
}

export function isCallerIdentity(expr: Expression, env: Env, ctx: AnalysisContext): boolean {
  if (expr.kind === "member") {
    return (
      CALLER_FIELDS.has(expr.property) &&
      expr.object.kind === "identifier" &&
      expr.object.name === ctx.paramName
    );
  }
  if (expr.kind === "identifier") return env.get(expr.name)?.identity ?? false;
  if (expr.kind === "cast") return isCallerIdentity(expr.operand, env, ctx);
  return false;
}

/** The value is, or is computed from, something the caller put in the input record. */
export function isParamDerived(expr: Expression, env: Env, ctx: AnalysisContext): boolean {
  let derived = false;
  const visit = (e: Expression): void => {
    if (derived) return;
    switch (e.kind) {
      case "identifier":
        if (e.name === ctx.paramName || env.get(e.name)?.fromParams) derived = true;
        break;
      case "call":
        if (lookupPrimitive(ctx, e.callee)?.kind === "param-accessor") derived = true;
        else e.args.forEach(visit);
        break;
      case "member":
        visit(e.object);
        break;
      case "index":
        visit(e.object);
        visit(e.index);
        break;
      case "unary":
      case "cast":
        visit(e.operand);
        break;
      case "binary":
        visit(e.left);
        visit(e.right);
        break;
      case "ternary":
        visit(e.test);
        visit(e.consequent);
        visit(e.alternate);
        break;
    }
  };
  visit(expr);
  return derived;
}

/** State keys and balance reads that flow into `expr`. */
export function stateSources(
  expr: Expression | undefined,
  env: Env,
  ctx: AnalysisContext
): { keys: Set<string>; fromBalance: boolean } {
  const keys = new Set<string>();
  let fromBalance = false;

  const visit = (e: Expression | undefined): void => {
    if (!e) return;
    switch (e.kind) {
      case "identifier": {
        const local = env.get(e.name);
        if (local) {
          local.stateKeys.forEach((k) => keys.add(k));
          fromBalance = fromBalance || local.fromBalance;
        }
        break;
      }
      case "call": {
        const desc = lookupPrimitive(ctx, e.callee);
        if (desc?.kind === "state-read" && desc.keyArg !== undefined && e.args[desc.keyArg]) {
          keys.add(stateKeyText(e.args[desc.keyArg]));
        }
        if (desc?.kind === "balance-query") fromBalance = true;
        e.args.forEach(visit);
        break;
      }
      case "member":
        visit(e.object);
        break;
      case "index":
        visit(e.object);
        visit(e.index);
        break;
      case "unary":
      case "cast":
        visit(e.operand);
        break;
      case "binary":
        visit(e.left);
        visit(e.right);
        break;
      case "ternary":
        visit(e.test);
        visit(e.consequent);
        visit(e.alternate);
        break;
    }
  };

  visit(expr);
  return { keys, fromBalance };
}

export function lookupPrimitive(ctx: AnalysisContext, callee: string) {
  return ctx.catalog.get(callee) ?? ctx.catalog.get(callee.split(".").pop() ?? callee);
}

/** State keys are compared by their literal value, or by source text otherwise. */
export function stateKeyText(expr: Expression): string {
  return expr.kind === "literal" && expr.type === "string" ? expr.value : renderExpression(expr);
}

export function expressionType(expr: Expression, env: Env, ctx: AnalysisContext): ValueType {
  switch (expr.kind) {
    case "literal":
      return expr.type === "char" ? "int" : expr.type;
    case "identifier":
      return env.get(expr.name)?.type ?? "unknown";
    case "call":
      return lookupPrimitive(ctx, expr.callee)?.returns ?? "unknown";
    case "cast":
      return valueTypeOf(expr.type);
    case "unary":
      return expr.operator === "!" ? "bool" : expressionType(expr.operand, env, ctx);
    case "binary": {
      if (["==", "!=", "<", ">", "<=", ">=", "&&", "||"].includes(expr.operator)) return "bool";
      const left = expressionType(expr.left, env, ctx);
      const right = expressionType(expr.right, env, ctx);
      if (left === "string" || right === "string") return "string";
      return left === "int" || right === "int" ? "int" : "unknown";
    }
    case "ternary": {
      const a = expressionType(expr.consequent, env, ctx);
      return a === expressionType(expr.alternate, env, ctx) ? a : "unknown";
    }
    default:
      return "unknown";
  }
}

// ── Authorization polarity ──

/**
 * Polarity of a condition with respect to authorization:
 * `positive` when the condition being true implies the caller is authorized,
 * `negative` when it being false does, `mixed` when it involves a check in a
 * way neither arm can rely on.
 */
export function authPolarity(expr: Expression, env: Env, ctx: AnalysisContext): Polarity {
  switch (expr.kind) {
    case "call": {
      const desc = lookupPrimitive(ctx, expr.callee);
      return desc?.kind === "authorization-check" ? "positive" : null;
    }
    case "identifier":
      return env.get(expr.name)?.polarity ?? null;
    case "cast":
      return authPolarity(expr.operand, env, ctx);
    case "unary":
      return expr.operator === "!" ? invert(authPolarity(expr.operand, env, ctx)) : null;
    case "binary":
      return binaryPolarity(expr, env, ctx);
    default:
      return null;
  }
}

function binaryPolarity(
  expr: Extract<Expression, { kind: "binary" }>,
  env: Env,
  ctx: AnalysisContext
): Polarity {
  const { operator, left, right } = expr;

  if (operator === "&&" || operator === "||") {
    const parts = [authPolarity(left, env, ctx), authPolarity(right, env, ctx)];
    if (parts.includes("mixed")) return "mixed";
    if (operator === "&&") {
      if (parts.includes("negative")) return "mixed";
      return parts.includes("positive") ? "positive" : null;
    }
    if (parts.includes("positive")) return "mixed";
    return parts.includes("negative") ? "negative" : null;
  }

  if (operator === "==" || operator === "!=") {
    const leftId = isCallerIdentity(left, env, ctx);
    const rightId = isCallerIdentity(right, env, ctx);
    if (leftId !== rightId) {
      if (!isTrustedIdentity(leftId ? right : left, env, ctx)) return null;
      return operator === "==" ? "positive" : "negative";
    }

    for (const [side, other] of [[left, right], [right, left]] as const) {
      if (other.kind === "literal" && other.type === "bool") {
        const inner = authPolarity(side, env, ctx);
        const truthy = (other.value === "true") === (operator === "==");
        return truthy ? inner : invert(inner);
      }
    }
  }
  return null;
}

/**
 * An identity the caller cannot choose: a literal, or a value loaded from
 * state that no input parameter feeds.
 */
function isTrustedIdentity(expr: Expression, env: Env, ctx: AnalysisContext): boolean {
  if (expr.kind === "literal") return expr.type === "string" || expr.type === "int";
  if (isParamDerived(expr, env, ctx)) return false;
  return stateSources(expr, env, ctx).keys.size > 0;
}

function invert(p: Polarity): Polarity {
  if (p === "positive") return "negative";
  if (p === "negative") return "positive";
  return p;
}

/** Identifiers and member chains compared with `<`, `>`, `<=` or `>=`. */
export function boundedNames(expr: Expression | undefined): Set<string> {
  const names = new Set<string>();
  const visit = (e: Expression | undefined, inRelation: boolean): void => {
    if (!e) return;
    switch (e.kind) {
      case "identifier":
      case "member":
        if (inRelation) names.add(renderExpression(e));
        if (e.kind === "member") visit(e.object, false);
        break;
      case "binary": {
        const relational = ["<", ">", "<=", ">="].includes(e.operator);
        visit(e.left, inRelation || relational);
        visit(e.right, inRelation || relational);
        break;
      }
      case "unary":
      case "cast":
        visit(e.operand, inRelation);
        break;
      case "call":
        e.args.forEach((a) => visit(a, inRelation));
        break;
      case "index":
        visit(e.object, inRelation);
        visit(e.index, false);
        break;
      case "ternary":
        visit(e.test, false);
        visit(e.consequent, inRelation);
        visit(e.alternate, inRelation);
        break;
    }
  };
  visit(expr, false);
  return names;
}

/** Identifiers and member chains an expression mentions. */
export function mentionedNames(expr: Expression): Set<string> {
  const names = new Set<string>();
  const visit = (e: Expression): void => {
    switch (e.kind) {
      case "identifier":
        names.add(e.name);
        break;
      case "member":
        names.add(renderExpression(e));
        visit(e.object);
        break;
      case "index":
        visit(e.object);
        visit(e.index);
        break;
      case "call":
        e.args.forEach(visit);
        break;
      case "unary":
      case "cast":
        visit(e.operand);
        break;
      case "binary":
        visit(e.left);
        visit(e.right);
        break;
      case "ternary":
        visit(e.test);
        visit(e.consequent);
        visit(e.alternate);
        break;
    }
  };
  visit(expr);
  return names;
}
