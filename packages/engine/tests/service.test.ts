import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CommitmentLedger, MemoryLedgerStore, ZERO_HASH, formatTransactionId } from "@dispatchguard/ledger";
import {
  AuditService,
  CollaboratorError,
  ParseError,
  hashReport,
  nowIso,
  translateReport,
  type ContractGenerator,
  type ReportTranslator,
} from "../src";

const fixture = (name: string) =>
  readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), "utf8");

const CLOCK = () => new Date("2026-01-05T10:00:00.123Z");

function setup(generator?: ContractGenerator) {
  const store = new MemoryLedgerStore();
  const ledger = new CommitmentLedger(store);
  const service = new AuditService({ ledger, generator, clock: CLOCK });
  return { store, ledger, service };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("nowIso", () => {
  it("drops milliseconds", () => {
    expect(nowIso(new Date("2026-01-05T10:00:00.999Z"))).toBe("2026-01-05T10:00:00Z");
  });
});

describe("AuditService.audit", () => {
  it("commits the report hash and returns the receipt", async () => {
    const { service, ledger } = setup();
    const result = await service.audit(fixture("tip-jar.cpp"), "scan");

    expect(result.report.timestamp).toBe("2026-01-05T10:00:00Z");
    expect(result.report.contractId).toBe(result.report.sourceHash);
    expect(result.report.riskScore).toBe(10);
    expect(result.reportHash).toBe(hashReport(result.report));
    expect(result.entry).toMatchObject({
      sequenceNumber: 0,
      operationKind: "scan",
      reportHash: result.reportHash,
      previousEntryHash: ZERO_HASH,
      timestamp: "2026-01-05T10:00:00Z",
    });
    expect(result.transactionId).toBe(formatTransactionId("scan", result.entry.entryHash));
    expect(await ledger.entries()).toHaveLength(1);
  });

  it("uses the caller's contract id", async () => {
    const { service } = setup();
    const result = await service.audit(fixture("voting.cpp"), "scan", { contractId: "poll-v1" });
    expect(result.report.contractId).toBe("poll-v1");
  });

  it("commits identical reports as distinct entries", async () => {
    const { service } = setup();
    const a = await service.audit(fixture("voting.cpp"), "scan");
    const b = await service.audit(fixture("voting.cpp"), "scan");
    expect(b.reportHash).toBe(a.reportHash);
    expect(b.entry.sequenceNumber).toBe(1);
    expect(b.entry.previousEntryHash).toBe(a.entry.entryHash);
    expect(b.transactionId).not.toBe(a.transactionId);
  });

  it("commits nothing when the source cannot be parsed", async () => {
    const { service, ledger } = setup();
    await expect(service.audit("int x = 1;", "scan")).rejects.toBeInstanceOf(ParseError);
    expect(await ledger.state()).toBe("empty");
  });
});

describe("AuditService.auditMany", () => {
  it("keeps request order and isolates failures", async () => {
    const { service, ledger } = setup();
    const outcomes = await service.auditMany(
      [
        { source: fixture("tip-jar.cpp"), operationKind: "scan" },
        { source: "}", operationKind: "scan" },
        { source: fixture("voting.cpp"), operationKind: "scan", contractId: "poll" },
      ],
      2
    );

    expect(outcomes.map((o) => o.ok)).toEqual([true, false, true]);
    const failed = outcomes[1];
    if (!failed.ok) expect(failed.error).toBeInstanceOf(ParseError);
    const last = outcomes[2];
    if (last.ok) expect(last.result.report.contractId).toBe("poll");

    const entries = await ledger.entries();
    expect(entries.map((e) => e.sequenceNumber)).toEqual([0, 1]);
    expect((await service.verifyLedger()).valid).toBe(true);
  });
});

describe("AuditService.generateAndAudit", () => {
  it("audits and commits generated source as a generate operation", async () => {
    const generate = vi.fn(async () => fixture("voting.cpp"));
    const { service } = setup({ generate });

    const result = await service.generateAndAudit("a poll where each address votes once");

    expect(generate).toHaveBeenCalledWith("a poll where each address votes once");
    expect(result.source).toBe(fixture("voting.cpp"));
    expect(result.entry.operationKind).toBe("generate");
    expect(result.transactionId.startsWith("GEN-TX-")).toBe(true);
    expect(result.report.findings.map((f) => f.ruleId)).toEqual(["INTEGER_OVERFLOW"]);
  });

  it("commits nothing for unparseable generated source", async () => {
    const { service, ledger } = setup({ generate: async () => "sorry, I cannot help with that {" });
    await expect(service.generateAndAudit("a token contract")).rejects.toBeInstanceOf(ParseError);
    expect(await ledger.entries()).toHaveLength(0);
  });

  it("propagates generator failures", async () => {
    const { service } = setup({
      generate: async () => {
        throw new CollaboratorError("generator reply did not contain contract source");
      },
    });
    await expect(service.generateAndAudit("a token contract")).rejects.toBeInstanceOf(CollaboratorError);
  });

  it("requires a generator", async () => {
    const { service } = setup();
    await expect(service.generateAndAudit("a token contract")).rejects.toThrow(
      "AuditService was constructed without a contract generator"
    );
  });
});

describe("AuditService.verifyLedger", () => {
  it("reports the first tampered entry", async () => {
    const { service, store } = setup();
    await service.audit(fixture("tip-jar.cpp"), "scan");
    await service.audit(fixture("voting.cpp"), "scan");

    store.unsafeEntries()[1].reportHash = "f".repeat(64);

    expect(await service.verifyLedger()).toEqual({
      valid: false,
      length: 2,
      firstDivergentSequence: 1,
      reason: "entryHash does not match the entry contents",
    });
  });
});

describe("translateReport", () => {
  it("translates rationales and leaves the committed hash alone", async () => {
    const { service } = setup();
    const result = await service.audit(fixture("tip-jar.cpp"), "scan");
    const translator: ReportTranslator = {
      translate: vi.fn(async (texts: string[]) => texts.map((t) => `[fr] ${t}`)),
    };

    const localized = await translateReport(result.report, translator, "fr");

    expect(localized.findings[0].localizedRationale).toBe(`[fr] ${result.report.findings[0].rationale}`);
    expect(hashReport(localized.report)).toBe(result.reportHash);
  });

  it("does not call the translator for English", async () => {
    const { service } = setup();
    const result = await service.audit(fixture("tip-jar.cpp"), "scan");
    const translate = vi.fn(async (texts: string[]) => texts);

    const localized = await translateReport(result.report, { translate }, "en");

    expect(translate).not.toHaveBeenCalled();
    expect(localized.findings[0].localizedRationale).toBe(result.report.findings[0].rationale);
  });

  it("rejects a translation that drops rationales", async () => {
    const { service } = setup();
    const result = await service.audit(fixture("tip-jar.cpp"), "scan");
    await expect(translateReport(result.report, { translate: async () => [] }, "de")).rejects.toBeInstanceOf(
      CollaboratorError
    );
  });
});
