import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import { DEFAULT_POLICY, buildSemanticModel, isSensitiveKey, parseContract, resolvePolicy } from "../src";
import type { AuditPolicy, SemanticModel } from "../src";

const fixture = (name: string) =>
  readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), "utf8");

function modelOf(source: string, policy: AuditPolicy = DEFAULT_POLICY): SemanticModel {
  return buildSemanticModel(parseContract(source), policy);
}

function branch(model: SemanticModel, key: string) {
  const found = model.branches.find((b) => b.branch.key === key);
  if (!found) throw new Error(`no branch ${key}`);
  return found;
}

describe("Authorization facts", () => {
  it("treats the rest of a branch as guarded after a negated check that returns", () => {
    const withdraw = branch(modelOf(fixture("tip-jar.cpp")), "withdraw");
    expect(withdraw.authorization).toEqual({
      branch: "withdraw",
      guarded: true,
      privilegedCalls: [
        {
          callee: "send_funds",
          kind: "fund-transfer",
          target: "in.sender",
          line: 22,
          guarded: true,
          confidence: "certain",
          drainsBalance: true,
        },
      ],
    });
  });

  it("carries an asserting check in the entry body into every later branch", () => {
    const model = modelOf(`outputStruct main(inputStruct in) {
    outputStruct out;
    require_owner(in.sender);
    if (in.functionName == "drain") {
        send_funds(in.sender, get_contract_balance());
    }
    return out;
}`);
    expect(branch(model, "drain").authorization.guarded).toBe(true);
  });

  it("never treats caller-keyed writes as privileged", () => {
    const policy = resolvePolicy({ sensitiveKeys: ["sender"] });
    const model = modelOf(
      `outputStruct main(inputStruct in) {
    outputStruct out;
    if (in.functionName == "register") {
        save_long_long_state(in.sender, 1);
    }
    return out;
}`,
      policy
    );
    expect(branch(model, "register").authorization.privilegedCalls).toEqual([]);
  });

  it("warns when a loop body is approximated", () => {
    const model = modelOf(`outputStruct main(inputStruct in) {
    outputStruct out;
    if (in.functionName == "airdrop") {
        for (int i = 0; i < 3; i++) {
            send_funds(in.sender, 1);
        }
    }
    return out;
}`);
    expect(model.warnings).toEqual([
      {
        code: "LoopApproximated",
        branch: "airdrop",
        message: "loop at line 4 analyzed as a single conditional pass",
        line: 4,
      },
    ]);
    expect(branch(model, "airdrop").authorization.guarded).toBe(false);
  });
});

describe("Arithmetic operations", () => {
  it("marks operations dominated by a range comparison as bounded", () => {
    const tip = branch(modelOf(fixture("tip-jar.cpp")), "tip");
    expect(tip.arithmetic).toEqual([
      {
        branch: "tip",
        operator: "add",
        expression: "total + amount",
        operandTypes: ["int", "int"],
        literalOnly: false,
        guard: "bounds",
        confidence: "certain",
        line: 12,
      },
    ]);
  });

  it("keeps unknown operand types at heuristic confidence", () => {
    const model = modelOf(`outputStruct main(inputStruct in) {
    outputStruct out;
    if (in.functionName == "relay") {
        auto reply = call_contract("oracle", 1);
        set_long_long_return(reply * 2);
    }
    return out;
}`);
    expect(branch(model, "relay").arithmetic.map((op) => [op.expression, op.operandTypes, op.confidence])).toEqual([
      ["reply * 2", ["unknown", "int"], "heuristic"],
    ]);
  });
});

describe("Call ordering", () => {
  it("records transfers and writes in source order with their state domains", () => {
    const model = modelOf(`outputStruct main(inputStruct in) {
    outputStruct out;
    if (in.functionName == "claim") {
        long long payout = load_long_long_state("pending_payout");
        send_funds(in.sender, payout);
        save_long_long_state("pending_payout", 0);
    }
    return out;
}`);
    expect(branch(model, "claim").ordering.events).toEqual([
      { kind: "fund-transfer", callee: "send_funds", domains: ["in.sender", "pending_payout"], line: 5 },
      { kind: "state-write", callee: "save_long_long_state", domains: ["pending_payout"], line: 6 },
    ]);
  });
});

describe("isSensitiveKey", () => {
  it("matches case-insensitive substrings", () => {
    expect(isSensitiveKey("Contract_Owner", ["owner"])).toBe(true);
    expect(isSensitiveKey("poll_question", ["owner", "fee"])).toBe(false);
  });
});
