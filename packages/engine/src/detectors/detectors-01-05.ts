import type { BranchModel, Detector, Finding, FunctionBranch, SemanticModel, AuditPolicy } from "../types";
import { describeEvent } from "../graphs/call-ordering";

const DEFAULT_BRANCH = "<default>";

// ── Detector 1: Access Control ──
export const AccessControl: Detector = {
  id: "ACCESS_CONTROL",
  name: "Missing Access Control",
  detect(model: SemanticModel, policy: AuditPolicy): Finding[] {
    const findings: Finding[] = [];

    for (const bm of model.branches) {
      const unguarded = bm.authorization.privilegedCalls.filter((c) => !c.guarded);
      if (unguarded.length === 0) continue;

      const calls = unguarded.map((c) => {
        if (c.kind === "state-write") return `${c.callee}(${c.target}) at line ${c.line}`;
        const drain = c.drainsBalance ? " draining the contract balance" : "";
        return `${c.callee} at line ${c.line}${drain}`;
      });

      findings.push({
        ruleId: "ACCESS_CONTROL",
        severity: policy.severities.ACCESS_CONTROL,
        branch: bm.branch.key,
        rationale: `"${bm.branch.key}" performs ${calls.join(", ")} without a prior authorization check`,
        confidence: unguarded.every((c) => c.confidence === "certain") ? "certain" : "heuristic",
        line: unguarded[0].line,
      });
    }
    return findings;
  },
};

// ── Detector 2: Integer Overflow ──
export const IntegerOverflow: Detector = {
  id: "INTEGER_OVERFLOW",
  name: "Integer Overflow",
  detect(model: SemanticModel, policy: AuditPolicy): Finding[] {
    const findings: Finding[] = [];

    for (const bm of model.branches) {
      for (const op of bm.arithmetic) {
        if (op.guard !== "none" || op.literalOnly) continue;
        findings.push({
          ruleId: "INTEGER_OVERFLOW",
          severity: policy.severities.INTEGER_OVERFLOW,
          branch: op.branch,
          rationale: `unchecked ${op.operator} "${op.expression}" at line ${op.line} can wrap a fixed-width integer`,
          confidence: op.confidence,
          line: op.line,
        });
      }
    }
    return findings;
  },
};

// ── Detector 3: Reentrancy ──
export const Reentrancy: Detector = {
  id: "REENTRANCY",
  name: "Reentrancy (state written after external effect)",
  detect(model: SemanticModel, policy: AuditPolicy): Finding[] {
    const findings: Finding[] = [];

    for (const bm of model.branches) {
      const violation = firstLateWrite(bm);
      if (!violation) continue;
      const { effect, write, domain } = violation;
      findings.push({
        ruleId: "REENTRANCY",
        severity: policy.severities.REENTRANCY,
        branch: bm.branch.key,
        rationale: `${describeEvent(write)} updates "${domain}" after ${describeEvent(effect)} already used it`,
        confidence: "certain",
        line: write.line,
      });
    }
    return findings;
  },
};

function firstLateWrite(bm: BranchModel) {
  const events = bm.ordering.events;
  for (let i = 0; i < events.length; i++) {
    const effect = events[i];
    if (effect.kind === "state-write") continue;
    for (let j = i + 1; j < events.length; j++) {
      const write = events[j];
      if (write.kind !== "state-write") continue;
      const domain = write.domains.find((d) => effect.domains.includes(d));
      if (domain !== undefined) return { effect, write, domain };
    }
  }
  return null;
}

// ── Detector 4: Overlapping Dispatch ──
// Independent `if` chains testing the same literal both run for one call.
export const OverlappingDispatch: Detector = {
  id: "OVERLAPPING_DISPATCH",
  name: "Overlapping Dispatch Branches",
  detect(model: SemanticModel, policy: AuditPolicy): Finding[] {
    const findings: Finding[] = [];
    for (const [earlier, later] of duplicatePairs(model)) {
      if (earlier.chain === later.chain) continue;
      findings.push({
        ruleId: "OVERLAPPING_DISPATCH",
        severity: policy.severities.OVERLAPPING_DISPATCH,
        branch: later.key,
        rationale: `"${later.name}" at line ${later.line} also matches the branch at line ${earlier.line}; both run for one call`,
        confidence: earlier.guard || later.guard ? "heuristic" : "certain",
        line: later.line,
      });
    }
    return findings;
  },
};

// ── Detector 5: Unreachable Dispatch ──
export const UnreachableDispatch: Detector = {
  id: "UNREACHABLE_DISPATCH",
  name: "Unreachable Dispatch Branch",
  detect(model: SemanticModel, policy: AuditPolicy): Finding[] {
    const findings: Finding[] = [];
    for (const [earlier, later] of duplicatePairs(model)) {
      if (earlier.chain !== later.chain) continue;
      findings.push({
        ruleId: "UNREACHABLE_DISPATCH",
        severity: policy.severities.UNREACHABLE_DISPATCH,
        branch: later.key,
        rationale: `"${later.name}" at line ${later.line} is shadowed by the earlier arm at line ${earlier.line} of the same else-if chain`,
        confidence: earlier.guard ? "heuristic" : "certain",
        line: later.line,
      });
    }
    return findings;
  },
};

/** Each repeated literal paired with its closest earlier occurrence. */
function duplicatePairs(model: SemanticModel): Array<[FunctionBranch, FunctionBranch]> {
  const pairs: Array<[FunctionBranch, FunctionBranch]> = [];
  const seen = new Map<string, FunctionBranch>();
  for (const { branch } of model.branches) {
    if (branch.name === DEFAULT_BRANCH) continue;
    const earlier = seen.get(branch.name);
    if (earlier) pairs.push([earlier, branch]);
    seen.set(branch.name, branch);
  }
  return pairs;
}
