import type {
  AnalysisWarning,
  AuthorizationFact,
  CallExpression,
  FunctionBranch,
  PrivilegedCall,
  Statement,
} from "../types";
import { renderExpression } from "../pipeline/parser";
import {
  authPolarity,
  isCallerIdentity,
  lookupPrimitive,
  stateKeyText,
  stateSources,
  statementCalls,
  type AnalysisContext,
  type Env,
} from "./dataflow";

/**
 * Authorization dominance over the statement tree of one branch.
 *
 * Branch bodies have no loops or indirect calls, so a call is guarded when the
 * walk reaches it with a check on every path: a positive check around it, the
 * else arm of a negated check, or anything after a negated check whose then arm
 * always returns.
 */

interface FlowState {
  guarded: boolean;
  ambiguous: boolean;
  exits: boolean;
}

export interface AuthorityAnalysis {
  fact: AuthorizationFact;
  warnings: AnalysisWarning[];
}

export function analyzeAuthority(
  branch: FunctionBranch,
  env: Env,
  ctx: AnalysisContext
): AuthorityAnalysis {
  const privilegedCalls: PrivilegedCall[] = [];
  const warnings: AnalysisWarning[] = [];
  let recording = false;

  const warn = (line: number, message: string, code: AnalysisWarning["code"] = "AmbiguousAuthorization") => {
    if (warnings.some((w) => w.line === line && w.code === code)) return;
    warnings.push({ code, branch: branch.key, message, line });
  };

  const recordCall = (call: CallExpression, state: FlowState) => {
    if (!recording) return;
    const desc = lookupPrimitive(ctx, call.callee);
    if (!desc) return;

    if (desc.kind === "fund-transfer") {
      const recipient = desc.recipientArg !== undefined ? call.args[desc.recipientArg] : undefined;
      const amount = desc.amountArg !== undefined ? call.args[desc.amountArg] : undefined;
      privilegedCalls.push({
        callee: call.callee,
        kind: "fund-transfer",
        target: recipient ? renderExpression(recipient) : "",
        line: call.line,
        guarded: state.guarded,
        confidence: state.ambiguous ? "heuristic" : "certain",
        drainsBalance: stateSources(amount, env, ctx).fromBalance,
      });
      return;
    }

    if (desc.kind === "state-write" && desc.keyArg !== undefined) {
      const keyExpr = call.args[desc.keyArg];
      if (!keyExpr || isCallerIdentity(keyExpr, env, ctx)) return;
      const key = stateKeyText(keyExpr);
      if (!isSensitiveKey(key, ctx.policy.sensitiveKeys)) return;
      privilegedCalls.push({
        callee: call.callee,
        kind: "state-write",
        target: key,
        line: call.line,
        guarded: state.guarded,
        confidence: state.ambiguous ? "heuristic" : "certain",
        drainsBalance: false,
      });
    }
  };

  const walk = (stmts: Statement[], start: FlowState): FlowState => {
    let state = start;
    for (const stmt of stmts) {
      if (state.exits) break;

      for (const call of statementCalls(stmt)) recordCall(call, state);

      switch (stmt.kind) {
        case "call": {
          const desc = lookupPrimitive(ctx, stmt.call.callee);
          if (desc?.kind === "authorization-check" && desc.asserting) {
            state = { ...state, guarded: true };
          }
          break;
        }
        case "return":
          state = { ...state, exits: true };
          break;
        case "assignment":
          break;
        case "conditional":
          state = walkConditional(stmt, state);
          break;
      }
    }
    return state;
  };

  const walkConditional = (
    stmt: Extract<Statement, { kind: "conditional" }>,
    state: FlowState
  ): FlowState => {
    const polarity = authPolarity(stmt.condition, env, ctx);
    if (polarity === "mixed") {
      warn(stmt.line, `authorization check at line ${stmt.line} is combined in a way neither arm can rely on`);
    }

    const thenIn: FlowState =
      polarity === "positive" ? { ...state, guarded: true }
        : polarity === "mixed" ? { ...state, ambiguous: true }
          : state;
    const elseIn: FlowState =
      polarity === "negative" ? { ...state, guarded: true }
        : polarity === "mixed" ? { ...state, ambiguous: true }
          : state;

    const thenOut = walk(stmt.then, thenIn);

    if (stmt.loop) {
      if (recording) {
        warn(stmt.line, `loop at line ${stmt.line} analyzed as a single conditional pass`, "LoopApproximated");
      }
      // The body may run zero times, so nothing it establishes carries over.
      return thenOut.guarded === state.guarded ? state : { ...state, ambiguous: true };
    }

    const elseOut = walk(stmt.else, elseIn);

    if (thenOut.exits && elseOut.exits) return { ...state, exits: true };
    if (thenOut.exits) return elseOut;
    if (elseOut.exits) return thenOut;

    const divergent = thenOut.guarded !== elseOut.guarded;
    if (divergent && recording) {
      warn(stmt.line, `authorization at line ${stmt.line} is established on only one arm`);
    }
    return {
      guarded: thenOut.guarded && elseOut.guarded,
      ambiguous: thenOut.ambiguous || elseOut.ambiguous || divergent,
      exits: false,
    };
  };

  let state: FlowState = { guarded: false, ambiguous: false, exits: false };
  state = walk(branch.prelude, state);

  recording = true;
  if (branch.guard) {
    const polarity = authPolarity(branch.guard, env, ctx);
    if (polarity === "positive") state = { ...state, guarded: true };
    if (polarity === "mixed" || polarity === "negative") {
      warn(branch.line, `dispatch condition of "${branch.key}" combines an authorization check ambiguously`);
      state = { ...state, ambiguous: true };
    }
  }
  walk(branch.statements, state);

  return {
    fact: {
      branch: branch.key,
      guarded: privilegedCalls.every((c) => c.guarded),
      privilegedCalls,
    },
    warnings,
  };
}

export function isSensitiveKey(key: string, patterns: string[]): boolean {
  const lower = key.toLowerCase();
  return patterns.some((p) => lower.includes(p.toLowerCase()));
}
