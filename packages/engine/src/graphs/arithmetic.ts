import type { ArithmeticOp, ArithmeticOperator, Expression, FunctionBranch, Statement, ValueType } from "../types";
import { renderExpression } from "../pipeline/parser";
import {
  boundedNames,
  expressionType,
  lookupPrimitive,
  mentionedNames,
  type AnalysisContext,
  type Env,
} from "./dataflow";

const BINARY_OPERATORS: Record<string, ArithmeticOperator> = { "+": "add", "-": "sub", "*": "mul" };

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

interface BoundsState {
  bounded: Set<string>;
  exits: boolean;
}

/**
 * Collect `+ - *` operations of a branch with their guard: `checked` for the
 * checked-arithmetic primitives, `bounds` when a relational comparison on one
 * of the operands dominates the operation.
 */
export function extractArithmetic(branch: FunctionBranch, env: Env, ctx: AnalysisContext): ArithmeticOp[] {
  const ops: ArithmeticOp[] = [];

  const record = (
    operator: ArithmeticOperator,
    left: Expression,
    right: Expression,
    expression: string,
    line: number,
    state: BoundsState,
    checked: boolean
  ) => {
    const operandTypes: [ValueType, ValueType] = [
      expressionType(left, env, ctx),
      expressionType(right, env, ctx),
    ];
    if (operandTypes.includes("string") || operandTypes.includes("bool")) return;

    const names = [...mentionedNames(left), ...mentionedNames(right)];
    const guard: ArithmeticOp["guard"] = checked
      ? "checked"
      : names.some((n) => state.bounded.has(n)) ? "bounds" : "none";

    ops.push({
      branch: branch.key,
      operator,
      expression,
      operandTypes,
      literalOnly: isInRangeLiteral(left) && isInRangeLiteral(right),
      guard,
      confidence: operandTypes.every((t) => t === "int") ? "certain" : "heuristic",
      line,
    });
  };

  const visitExpr = (expr: Expression | undefined, state: BoundsState): void => {
    if (!expr) return;
    switch (expr.kind) {
      case "binary": {
        visitExpr(expr.left, state);
        visitExpr(expr.right, state);
        const operator = BINARY_OPERATORS[expr.operator];
        if (operator) {
          record(operator, expr.left, expr.right, renderExpression(expr), expr.line, state, false);
        }
        break;
      }
      case "call": {
        expr.args.forEach((a) => visitExpr(a, state));
        const desc = lookupPrimitive(ctx, expr.callee);
        if (desc?.kind === "checked-arithmetic" && desc.operator && expr.args.length >= 2) {
          record(desc.operator, expr.args[0], expr.args[1], renderExpression(expr), expr.line, state, true);
        }
        break;
      }
      case "unary":
      case "cast":
        visitExpr(expr.operand, state);
        break;
      case "member":
        visitExpr(expr.object, state);
        break;
      case "index":
        visitExpr(expr.object, state);
        visitExpr(expr.index, state);
        break;
      case "ternary":
        visitExpr(expr.test, state);
        visitExpr(expr.consequent, state);
        visitExpr(expr.alternate, state);
        break;
    }
  };

  const walk = (stmts: Statement[], start: BoundsState, collect: boolean): BoundsState => {
    let state = start;
    for (const stmt of stmts) {
      if (state.exits) break;
      switch (stmt.kind) {
        case "call": {
          // Assertion-style calls such as require(amount < cap) bound their operands.
          const names = boundedNames(stmt.call);
          if (collect) visitExpr(stmt.call, state);
          state = { ...state, bounded: union(state.bounded, names) };
          break;
        }
        case "assignment":
          if (collect) {
            visitExpr(stmt.value, state);
            if (stmt.operator && stmt.value) {
              const text = `${renderExpression(stmt.target)} ${compoundSymbol(stmt.operator)} ${renderExpression(stmt.value)}`;
              record(stmt.operator, stmt.target, stmt.value, text, stmt.line, state, false);
            }
          }
          break;
        case "return":
          if (collect) visitExpr(stmt.value, state);
          state = { ...state, exits: true };
          break;
        case "conditional": {
          const inner = { ...state, bounded: union(state.bounded, boundedNames(stmt.condition)) };
          if (collect) visitExpr(stmt.condition, inner);
          const thenOut = walk(stmt.then, inner, collect);
          const elseOut = walk(stmt.else, inner, collect);
          if (stmt.loop) {
            state = inner;
          } else if (thenOut.exits && elseOut.exits) {
            state = { ...state, exits: true };
          } else if (thenOut.exits) {
            state = elseOut;
          } else if (elseOut.exits) {
            state = thenOut;
          } else {
            state = { bounded: intersect(thenOut.bounded, elseOut.bounded), exits: false };
          }
          break;
        }
      }
    }
    return state;
  };

  let state: BoundsState = { bounded: new Set(), exits: false };
  state = walk(branch.prelude, state, false);
  if (branch.guard) state = { ...state, bounded: union(state.bounded, boundedNames(branch.guard)) };
  walk(branch.statements, state, true);
  return ops;
}

function compoundSymbol(operator: ArithmeticOperator): string {
  return operator === "add" ? "+=" : operator === "sub" ? "-=" : "*=";
}

function isInRangeLiteral(expr: Expression): boolean {
  if (expr.kind === "unary" && expr.operator === "-") {
    return expr.operand.kind === "literal" && expr.operand.type === "int" && inInt64(-BigInt(expr.operand.value));
  }
  if (expr.kind === "cast") return isInRangeLiteral(expr.operand);
  if (expr.kind !== "literal") return false;
  if (expr.type === "char") return true;
  return expr.type === "int" && inInt64(BigInt(expr.value));
}

function inInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

function union(a: Set<string>, b: Set<string>): Set<string> {
  return new Set([...a, ...b]);
}

function intersect(a: Set<string>, b: Set<string>): Set<string> {
  return new Set([...a].filter((x) => b.has(x)));
}
