import type { AnalysisWarning, AuditPolicy, BranchModel, ContractUnit, FunctionBranch, SemanticModel } from "../types";
import { createPrimitiveCatalog } from "../pipeline/primitives";
import { analyzeAuthority } from "./authority-flow";
import { extractArithmetic } from "./arithmetic";
import { buildCallOrdering } from "./call-ordering";
import { buildEnv, type AnalysisContext } from "./dataflow";

/** Key of the pseudo-branch holding statements that run on every call. */
export const PRELUDE_BRANCH = "<prelude>";

/**
 * Walk a parsed contract into the per-branch analysis model: authorization
 * facts, arithmetic operations and call ordering. Top-level statements that
 * write state, move funds or do arithmetic are modelled as a `<prelude>` branch.
 */
export function buildSemanticModel(unit: ContractUnit, policy: AuditPolicy): SemanticModel {
  const ctx: AnalysisContext = {
    paramName: unit.entry.paramName,
    catalog: createPrimitiveCatalog(policy.primitives),
    policy,
  };

  const modelBranch = (branch: FunctionBranch): { model: BranchModel; warnings: AnalysisWarning[] } => {
    const env = buildEnv([...branch.prelude, ...branch.statements], ctx);
    const authority = analyzeAuthority(branch, env, ctx);
    return {
      model: {
        branch,
        authorization: authority.fact,
        arithmetic: extractArithmetic(branch, env, ctx),
        ordering: buildCallOrdering(branch, env, ctx),
      },
      warnings: authority.warnings,
    };
  };

  const branches: BranchModel[] = [];
  const warnings: AnalysisWarning[] = [];
  const prelude = modelBranch({
    name: PRELUDE_BRANCH,
    key: PRELUDE_BRANCH,
    line: unit.topLevel[0]?.line ?? unit.entry.line,
    statements: unit.topLevel,
    prelude: [],
    exclusive: false,
    chain: -1,
    stateKeys: [],
  });
  const { authorization, arithmetic, ordering } = prelude.model;
  if (authorization.privilegedCalls.length > 0 || arithmetic.length > 0 || ordering.events.length > 0) {
    branches.push(prelude.model);
    warnings.push(...prelude.warnings);
  }
  for (const branch of unit.branches) {
    const { model, warnings: branchWarnings } = modelBranch(branch);
    branches.push(model);
    warnings.push(...branchWarnings);
  }

  return { unit, branches, warnings };
}

export { analyzeAuthority, isSensitiveKey } from "./authority-flow";
export { extractArithmetic } from "./arithmetic";
export { buildCallOrdering } from "./call-ordering";
