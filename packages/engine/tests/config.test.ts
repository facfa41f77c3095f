import { describe, it, expect } from "vitest";
import {
  DEFAULT_POLICY,
  DEFAULT_SENSITIVE_KEYS,
  PolicyError,
  analyzeContract,
  loadAuditPolicy,
  resolvePolicy,
} from "../src";

function policyError(fn: () => unknown): PolicyError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PolicyError) return err;
    throw err;
  }
  throw new Error("expected a PolicyError");
}

describe("resolvePolicy", () => {
  it("returns the defaults without overrides", () => {
    expect(resolvePolicy()).toEqual({
      severities: {
        ACCESS_CONTROL: "critical",
        INTEGER_OVERFLOW: "high",
        REENTRANCY: "high",
        OVERLAPPING_DISPATCH: "low",
        UNREACHABLE_DISPATCH: "low",
      },
      weights: { critical: 10, high: 5, medium: 2, low: 1 },
      sensitiveKeys: DEFAULT_SENSITIVE_KEYS,
      primitives: {},
    });
    expect(DEFAULT_POLICY).toEqual(resolvePolicy());
  });

  it("merges partial severities and weights onto the defaults", () => {
    const policy = resolvePolicy({ severities: { REENTRANCY: "medium" }, weights: { medium: 4 } });
    expect(policy.severities.REENTRANCY).toBe("medium");
    expect(policy.severities.ACCESS_CONTROL).toBe("critical");
    expect(policy.weights).toEqual({ critical: 10, high: 5, medium: 4, low: 1 });
  });

  it("rejects unknown severities with the offending path", () => {
    const err = policyError(() => resolvePolicy({ severities: { ACCESS_CONTROL: "urgent" } }));
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatch(/^severities\.ACCESS_CONTROL: /);
  });

  it("rejects unknown keys", () => {
    const err = policyError(() => resolvePolicy({ colour: "red" }));
    expect(err.issues).toEqual(["(root): Unrecognized key(s) in object: 'colour'"]);
  });

  it("rejects negative weights", () => {
    const err = policyError(() => resolvePolicy({ weights: { low: -1 } }));
    expect(err.issues[0]).toMatch(/^weights\.low: /);
  });

  it("registers extra primitives for analysis", () => {
    const policy = resolvePolicy({ primitives: { pay_out: { kind: "fund-transfer", recipientArg: 0, amountArg: 1 } } });
    const source = `outputStruct main(inputStruct in) {
    outputStruct out;
    if (in.functionName == "pay") {
        pay_out(in.sender, 5);
    }
    return out;
}`;
    const result = analyzeContract(source, { policy, timestamp: "2026-01-05T10:00:00Z" });
    expect(result.report.findings.map((f) => [f.ruleId, f.line])).toEqual([["ACCESS_CONTROL", 4]]);
  });
});

describe("loadAuditPolicy", () => {
  it("reads severities, weights and sensitive keys from the environment", () => {
    const policy = loadAuditPolicy({
      AUDIT_SEVERITY_REENTRANCY: " Critical ",
      AUDIT_WEIGHT_LOW: "3",
      AUDIT_SENSITIVE_KEYS: "vault, , cap",
    });
    expect(policy.severities.REENTRANCY).toBe("critical");
    expect(policy.weights.low).toBe(3);
    expect(policy.sensitiveKeys).toEqual(["vault", "cap"]);
  });

  it("falls back to the defaults for an empty environment", () => {
    expect(loadAuditPolicy({})).toEqual(DEFAULT_POLICY);
  });

  it("fails on a weight that is not a number", () => {
    const err = policyError(() => loadAuditPolicy({ AUDIT_WEIGHT_HIGH: "lots" }));
    expect(err.issues[0]).toMatch(/^weights\.high: /);
  });
});
