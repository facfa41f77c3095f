import type { CallOrdering, FunctionBranch, OrderingEvent, Statement } from "../types";
import {
  lookupPrimitive,
  stateKeyText,
  stateSources,
  statementCalls,
  type AnalysisContext,
  type Env,
} from "./dataflow";

/**
 * Source-ordered state writes, fund transfers and external calls of a branch.
 * A transfer's domains are the state keys feeding its amount, its recipient and
 * the conditions that dominate it; an external call's are the keys feeding its
 * arguments.
 */
export function buildCallOrdering(branch: FunctionBranch, env: Env, ctx: AnalysisContext): CallOrdering {
  const events: OrderingEvent[] = [];

  const visit = (stmts: Statement[], checked: ReadonlySet<string>): void => {
    let dominating = checked;
    for (const stmt of stmts) {
      for (const call of statementCalls(stmt)) {
        const desc = lookupPrimitive(ctx, call.callee);
        if (!desc) continue;

        if (desc.kind === "state-write" && desc.keyArg !== undefined && call.args[desc.keyArg]) {
          events.push({
            kind: "state-write",
            callee: call.callee,
            domains: [stateKeyText(call.args[desc.keyArg])],
            line: call.line,
          });
        } else if (desc.kind === "fund-transfer") {
          const domains = new Set<string>(dominating);
          if (desc.amountArg !== undefined) {
            stateSources(call.args[desc.amountArg], env, ctx).keys.forEach((k) => domains.add(k));
          }
          const recipient = desc.recipientArg !== undefined ? call.args[desc.recipientArg] : undefined;
          if (recipient) domains.add(stateKeyText(recipient));
          events.push({ kind: "fund-transfer", callee: call.callee, domains: [...domains].sort(), line: call.line });
        } else if (desc.kind === "external-call") {
          const domains = new Set<string>();
          for (const arg of call.args) {
            stateSources(arg, env, ctx).keys.forEach((k) => domains.add(k));
          }
          events.push({ kind: "external-call", callee: call.callee, domains: [...domains].sort(), line: call.line });
        }
      }
      if (stmt.kind === "conditional") {
        const inner = new Set([...dominating, ...stateSources(stmt.condition, env, ctx).keys]);
        visit(stmt.then, inner);
        visit(stmt.else, inner);
        // An early exit makes the condition hold for everything after it.
        if (!stmt.loop && (returns(stmt.then) || returns(stmt.else))) dominating = inner;
      }
    }
  };

  visit(branch.statements, branch.guard ? stateSources(branch.guard, env, ctx).keys : new Set<string>());
  return { branch: branch.key, events };
}

function returns(stmts: Statement[]): boolean {
  return stmts.some((s) => s.kind === "return");
}

export function describeEvent(event: OrderingEvent): string {
  return `${event.callee} (line ${event.line})`;
}
