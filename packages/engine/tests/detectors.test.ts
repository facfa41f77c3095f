import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import {
  ALL_DETECTORS,
  DEFAULT_POLICY,
  analyzeContract,
  buildSemanticModel,
  parseContract,
  resolvePolicy,
} from "../src";
import type { AuditPolicy, Finding } from "../src";

const TS = "2026-01-05T10:00:00Z";

const fixture = (name: string) =>
  readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), "utf8");

function findingsFor(source: string, policy: AuditPolicy = DEFAULT_POLICY): readonly Finding[] {
  return analyzeContract(source, { policy, timestamp: TS }).report.findings;
}

function contract(body: string): string {
  return `outputStruct main(inputStruct in) {\n    outputStruct out;\n${body}\n    return out;\n}\n`;
}

describe("Detector registry", () => {
  it("should have 5 detectors", () => {
    expect(ALL_DETECTORS.length).toBe(5);
  });

  it("each detector has unique id", () => {
    const ids = ALL_DETECTORS.map((d) => d.id);
    expect(new Set(ids).size).toBe(5);
  });

  it("each detector has a name", () => {
    for (const d of ALL_DETECTORS) {
      expect(d.name).toBeTruthy();
    }
  });

  it("returns nothing for a contract without branches", () => {
    const unit = parseContract("long long main(Input in) { return 0; }");
    const model = buildSemanticModel(unit, DEFAULT_POLICY);
    for (const d of ALL_DETECTORS) {
      expect(d.detect(model, DEFAULT_POLICY)).toEqual([]);
    }
  });
});

describe("AccessControl", () => {
  it("flags the unguarded balance drain exactly once", () => {
    const findings = findingsFor(fixture("tip-jar.cpp"));
    expect(findings).toEqual([
      {
        ruleId: "ACCESS_CONTROL",
        severity: "critical",
        branch: "wipe_contract_funds",
        rationale:
          '"wipe_contract_funds" performs send_funds at line 28 draining the contract balance without a prior authorization check',
        confidence: "certain",
        line: 28,
      },
    ]);
  });

  it("does not flag the voting contract", () => {
    const findings = findingsFor(fixture("voting.cpp"));
    expect(findings.filter((f) => f.ruleId === "ACCESS_CONTROL")).toEqual([]);
  });

  it("accepts a positive check around the transfer", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "pay") {
        if (is_owner(in.sender)) {
            send_funds(in.sender, 10);
        }
    }`));
    expect(findings).toEqual([]);
  });

  it("accepts an asserting check before the transfer", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "pay") {
        require_owner(in.sender);
        send_funds(in.sender, 10);
    }`));
    expect(findings).toEqual([]);
  });

  it("accepts a check conjoined with the dispatch comparison", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "pay" && is_admin(in.sender)) {
        send_funds(in.sender, 10);
    }`));
    expect(findings).toEqual([]);
  });

  it("accepts a comparison of the caller with the stored owner", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "pay") {
        char* owner = load_string_state("owner");
        if (in.sender != owner) {
            return out;
        }
        send_funds(in.sender, 10);
    }`));
    expect(findings).toEqual([]);
  });

  it("accepts a comparison of the caller with a fixed address", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "pay") {
        if (in.sender == "treasury-wallet") {
            send_funds(in.sender, 10);
        }
    }`));
    expect(findings).toEqual([]);
  });

  it("does not trust a comparison with an address the caller supplies", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "drain") {
        char* claimed = get_string_from_params(in.params, 0);
        if (in.sender == claimed) {
            send_funds(in.sender, get_contract_balance());
        }
    }`));
    expect(findings.map((f) => [f.ruleId, f.severity, f.branch, f.line])).toEqual([
      ["ACCESS_CONTROL", "critical", "drain", 7],
    ]);
  });

  it("does not trust state loaded under a caller-chosen key", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "drain") {
        char* admin = load_string_state(get_string_from_params(in.params, 0));
        if (in.sender != admin) {
            return out;
        }
        send_funds(in.sender, get_contract_balance());
    }`));
    expect(findings.map((f) => [f.ruleId, f.line])).toEqual([["ACCESS_CONTROL", 9]]);
  });

  it("reports unguarded transfers in the entry body outside any branch", () => {
    const findings = findingsFor(`outputStruct main(inputStruct in) {
    outputStruct out;
    send_funds(in.sender, get_contract_balance());
    if (in.functionName == "ping") {
        set_int_return(1);
    }
    return out;
}
`);
    expect(findings).toEqual([
      {
        ruleId: "ACCESS_CONTROL",
        severity: "critical",
        branch: "<prelude>",
        rationale:
          '"<prelude>" performs send_funds at line 3 draining the contract balance without a prior authorization check',
        confidence: "certain",
        line: 3,
      },
    ]);
  });

  it("accepts an entry-body transfer after an asserting check", () => {
    const findings = findingsFor(`outputStruct main(inputStruct in) {
    outputStruct out;
    require_owner(in.sender);
    send_funds(in.sender, get_contract_balance());
    return out;
}
`);
    expect(findings).toEqual([]);
  });

  it("flags a transfer placed on the failing arm of a check", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "pay") {
        if (!is_owner(in.sender)) {
            send_funds(in.sender, 10);
        }
    }`));
    expect(findings.map((f) => [f.ruleId, f.branch, f.confidence])).toEqual([
      ["ACCESS_CONTROL", "pay", "certain"],
    ]);
  });

  it("flags an unguarded write to a sensitive key and names it", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "set_owner") {
        char* next = get_string_from_params(in.params, 0);
        save_string_state("contract_owner", next);
    }`));
    expect(findings).toHaveLength(1);
    expect(findings[0].rationale).toBe(
      '"set_owner" performs save_string_state(contract_owner) at line 6 without a prior authorization check'
    );
  });

  it("lowers confidence when the check is combined ambiguously", () => {
    const result = analyzeContract(
      contract(`
    if (in.functionName == "pay") {
        bool promo = load_bool_state("promo_open");
        if (is_owner(in.sender) || promo) {
            send_funds(in.sender, 10);
        }
    }`),
      { timestamp: TS }
    );
    expect(result.report.findings.map((f) => [f.ruleId, f.confidence])).toEqual([["ACCESS_CONTROL", "heuristic"]]);
    expect(result.report.warnings.map((w) => [w.code, w.branch, w.line])).toEqual([["AmbiguousAuthorization", "pay", 6]]);
  });

  it("honors a severity override", () => {
    const policy = resolvePolicy({ severities: { ACCESS_CONTROL: "high" } });
    const findings = findingsFor(fixture("tip-jar.cpp"), policy);
    expect(findings.map((f) => f.severity)).toEqual(["high"]);
  });

  it("honors custom sensitive keys", () => {
    const source = contract(`
    if (in.functionName == "set_cap") {
        save_long_long_state("mint_cap", 5);
    }`);
    expect(findingsFor(source)).toEqual([]);
    const policy = resolvePolicy({ sensitiveKeys: ["cap"] });
    expect(findingsFor(source, policy).map((f) => f.ruleId)).toEqual(["ACCESS_CONTROL"]);
  });
});

describe("IntegerOverflow", () => {
  const unchecked = contract(`
    if (in.functionName == "add_points") {
        long long points = get_long_long_from_params(in.params, 0);
        long long score = load_long_long_state("score");
        save_long_long_state("score", score + points);
    }`);

  it("flags an unchecked addition exactly once", () => {
    expect(findingsFor(unchecked)).toEqual([
      {
        ruleId: "INTEGER_OVERFLOW",
        severity: "high",
        branch: "add_points",
        rationale: 'unchecked add "score + points" at line 7 can wrap a fixed-width integer',
        confidence: "certain",
        line: 7,
      },
    ]);
  });

  it("accepts the same addition behind a range comparison", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "add_points") {
        long long points = get_long_long_from_params(in.params, 0);
        long long score = load_long_long_state("score");
        if (points < 1000) {
            save_long_long_state("score", score + points);
        }
    }`));
    expect(findings).toEqual([]);
  });

  it("accepts a range comparison that exits early", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "add_points") {
        long long points = get_long_long_from_params(in.params, 0);
        if (points > 1000) {
            return out;
        }
        long long score = load_long_long_state("score");
        save_long_long_state("score", score + points);
    }`));
    expect(findings).toEqual([]);
  });

  it("accepts checked arithmetic primitives", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "add_points") {
        long long points = get_long_long_from_params(in.params, 0);
        long long score = load_long_long_state("score");
        save_long_long_state("score", safe_add(score, points));
    }`));
    expect(findings).toEqual([]);
  });

  it("ignores literal-only operations", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "limits") {
        long long cap = 1000 * 60;
        set_long_long_return(cap);
    }`));
    expect(findings).toEqual([]);
  });

  it("flags compound assignment and increments", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "bump") {
        long long n = load_long_long_state("counter");
        n += get_long_long_from_params(in.params, 0);
        n++;
        save_long_long_state("counter", n);
    }`));
    expect(findings.map((f) => f.rationale)).toEqual([
      'unchecked add "n += 1" at line 7 can wrap a fixed-width integer',
      'unchecked add "n += get_long_long_from_params(in.params, 0)" at line 6 can wrap a fixed-width integer',
    ]);
  });

  it("skips string concatenation", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "greet") {
        char* name = get_string_from_params(in.params, 0);
        set_string_return(name + "!");
    }`));
    expect(findings).toEqual([]);
  });
});

describe("Reentrancy", () => {
  it("flags a write to the transferred balance after the transfer", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "claim") {
        require_owner(in.sender);
        long long payout = load_long_long_state("pending_payout");
        send_funds(in.sender, payout);
        save_long_long_state("pending_payout", 0);
    }`));
    expect(findings).toEqual([
      {
        ruleId: "REENTRANCY",
        severity: "high",
        branch: "claim",
        rationale: 'save_long_long_state (line 8) updates "pending_payout" after send_funds (line 7) already used it',
        confidence: "certain",
        line: 8,
      },
    ]);
  });

  it("accepts the write when it precedes the transfer", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "claim") {
        require_owner(in.sender);
        long long payout = load_long_long_state("pending_payout");
        save_long_long_state("pending_payout", 0);
        send_funds(in.sender, payout);
    }`));
    expect(findings).toEqual([]);
  });

  it("ignores a transfer with no later write", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "claim") {
        require_owner(in.sender);
        send_funds(in.sender, load_long_long_state("pending_payout"));
    }`));
    expect(findings).toEqual([]);
  });

  it("ignores later writes to unrelated keys", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "claim") {
        require_owner(in.sender);
        long long payout = load_long_long_state("pending_payout");
        send_funds(in.sender, payout);
        save_bool_state("claimed_once", true);
    }`));
    expect(findings).toEqual([]);
  });

  it("flags a late write to the balance a surrounding check read", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "withdraw") {
        require_owner(in.sender);
        long long amount = get_long_long_from_params(in.params, 0);
        long long pool = load_long_long_state("pool_balance");
        if (amount <= pool) {
            send_funds(in.sender, amount);
            save_long_long_state("pool_balance", pool - amount);
        }
    }`));
    expect(findings).toEqual([
      {
        ruleId: "REENTRANCY",
        severity: "high",
        branch: "withdraw",
        rationale: 'save_long_long_state (line 10) updates "pool_balance" after send_funds (line 9) already used it',
        confidence: "certain",
        line: 10,
      },
    ]);
  });

  it("flags a late write to the balance an early-exit check read", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "withdraw") {
        require_owner(in.sender);
        long long amount = get_long_long_from_params(in.params, 0);
        long long pool = load_long_long_state("pool_balance");
        if (amount > pool) {
            return out;
        }
        send_funds(in.sender, amount);
        save_long_long_state("pool_balance", pool - amount);
    }`));
    expect(findings.map((f) => [f.ruleId, f.line])).toEqual([["REENTRANCY", 12]]);
  });

  it("flags writes after an external call fed by the same key", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "relay") {
        require_admin(in.sender);
        long long quota = load_long_long_state("relay_quota");
        call_contract("router", quota);
        save_long_long_state("relay_quota", 0);
    }`));
    expect(findings.map((f) => [f.ruleId, f.line])).toEqual([["REENTRANCY", 8]]);
  });
});

describe("Dispatch structure", () => {
  it("flags overlapping independent branches", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "ping") { set_int_return(1); }
    if (in.functionName == "ping") { set_int_return(2); }`));
    expect(findings).toEqual([
      {
        ruleId: "OVERLAPPING_DISPATCH",
        severity: "low",
        branch: "ping#2",
        rationale: '"ping" at line 5 also matches the branch at line 4; both run for one call',
        confidence: "certain",
        line: 5,
      },
    ]);
  });

  it("flags an else-if arm shadowed by an earlier arm", () => {
    const findings = findingsFor(contract(`
    if (in.functionName == "ping") { set_int_return(1); }
    else if (in.functionName == "ping") { set_int_return(2); }`));
    expect(findings.map((f) => [f.ruleId, f.branch, f.confidence])).toEqual([
      ["UNREACHABLE_DISPATCH", "ping#2", "certain"],
    ]);
  });
});
