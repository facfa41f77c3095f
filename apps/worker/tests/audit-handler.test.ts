import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AuditService, ParseError, type ReportTranslator } from "@dispatchguard/engine";
import { CommitmentLedger, MemoryLedgerStore } from "@dispatchguard/ledger";
import { AuditJobDataSchema } from "@dispatchguard/queue";
import type { ReportArchive } from "@dispatchguard/storage";
import { handleAuditJob, truncateError } from "../src/audit-handler";

const DRAIN = `outputStruct main(inputStruct in) {
    outputStruct out;
    if (in.functionName == "drain") {
        send_funds(in.sender, get_contract_balance());
    }
    return out;
}
`;

class MemoryArchive implements ReportArchive {
  readonly objects = new Map<string, string>();

  async putArtifact(auditJobId: string, key: string, body: Buffer | string) {
    const objectKey = `audits/${auditJobId}/${key}`;
    const text = body.toString();
    this.objects.set(objectKey, text);
    return { objectKey, sizeBytes: Buffer.byteLength(text) };
  }

  async getSignedUrl(objectKey: string) {
    return `memory://${objectKey}`;
  }

  async deleteArtifact(objectKey: string) {
    this.objects.delete(objectKey);
  }

  read(objectKey: string): string {
    const text = this.objects.get(objectKey);
    if (text === undefined) throw new Error(`missing ${objectKey}`);
    return text;
  }
}

function setup(generate?: (prompt: string) => Promise<string>) {
  const ledger = new CommitmentLedger(new MemoryLedgerStore());
  const service = new AuditService({
    ledger,
    generator: generate ? { generate } : undefined,
    clock: () => new Date("2026-01-05T10:00:00Z"),
  });
  const archive = new MemoryArchive();
  return { ledger, service, archive };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("handleAuditJob", () => {
  it("audits, commits and archives a scan job", async () => {
    const { service, archive } = setup();
    const data = AuditJobDataSchema.parse({ kind: "scan", auditJobId: "job-1", code: DRAIN, clientRefId: "ref-7" });
    const stages: string[] = [];

    const result = await handleAuditJob(data, { service, archive }, async (stage) => {
      stages.push(stage);
    });

    expect(result).toMatchObject({
      auditJobId: "job-1",
      clientRefId: "ref-7",
      sequenceNumber: 0,
      riskScore: 10,
      findingCount: 1,
      artifacts: ["audits/job-1/report.md", "audits/job-1/report.json", "audits/job-1/contract.cpp"],
    });
    expect(result.transactionId).toMatch(/^SCAN-TX-[0-9A-F]{16}$/);
    expect(stages).toEqual(["auditing", "uploading_artifacts", "complete"]);

    const json = JSON.parse(archive.read("audits/job-1/report.json"));
    expect(json.reportHash).toBe(result.reportHash);
    expect(json.transactionId).toBe(result.transactionId);
    expect(json.clientRefId).toBe("ref-7");
    expect(archive.read("audits/job-1/contract.cpp")).toBe(DRAIN);
  });

  it("archives the generated source of a generate job", async () => {
    const { service, archive, ledger } = setup(async () => DRAIN);
    const data = AuditJobDataSchema.parse({ kind: "generate", auditJobId: "job-2", prompt: "a vault anyone can drain" });

    const result = await handleAuditJob(data, { service, archive });

    expect(result.transactionId.startsWith("GEN-TX-")).toBe(true);
    expect(archive.read("audits/job-2/contract.cpp")).toBe(DRAIN);
    expect((await ledger.entries()).map((e) => e.operationKind)).toEqual(["generate"]);
  });

  it("translates the report for other languages", async () => {
    const { service, archive } = setup();
    const translator: ReportTranslator = { translate: async (texts) => texts.map((t) => `[es] ${t}`) };
    const data = AuditJobDataSchema.parse({ kind: "scan", auditJobId: "job-3", code: DRAIN, reportLanguage: "ES" });
    const stages: string[] = [];

    await handleAuditJob(data, { service, archive, translator }, async (stage) => {
      stages.push(stage);
    });

    expect(stages).toEqual(["auditing", "translating", "uploading_artifacts", "complete"]);
    const json = JSON.parse(archive.read("audits/job-3/report.json"));
    expect(json.metadata.language).toBe("es");
    expect(json.findings[0].localizedRationale).toBe(`[es] ${json.findings[0].rationale}`);
  });

  it("fails a translated job without a translator before committing", async () => {
    const { service, archive, ledger } = setup();
    const data = AuditJobDataSchema.parse({ kind: "scan", auditJobId: "job-4", code: DRAIN, reportLanguage: "fr" });
    const stages: string[] = [];
    await expect(
      handleAuditJob(data, { service, archive }, async (stage) => {
        stages.push(stage);
      })
    ).rejects.toThrow('No translator configured for language "fr"');
    expect(stages).toEqual([]);
    expect(await ledger.state()).toBe("empty");
    expect(archive.objects.size).toBe(0);
  });

  it("keeps the parse error as the cause and archives nothing", async () => {
    const { service, archive, ledger } = setup();
    const code = "outputStruct main(inputStruct in) {\n    outputStruct out;\n    return out;\n";
    const data = AuditJobDataSchema.parse({ kind: "scan", auditJobId: "job-5", code });

    const err = await handleAuditJob(data, { service, archive }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(Error);
    if (err instanceof Error) {
      expect(err.message).toMatch(/^UnterminatedBlock \(line 1\): /);
      expect(err.cause).toBeInstanceOf(ParseError);
    }
    expect(archive.objects.size).toBe(0);
    expect(await ledger.state()).toBe("empty");
  });
});

describe("truncateError", () => {
  it("leaves short messages alone", () => {
    expect(truncateError(new Error("boom"))).toBe("boom");
    expect(truncateError("plain")).toBe("plain");
  });

  it("cuts long messages", () => {
    const out = truncateError(new Error("x".repeat(50)), 10);
    expect(out).toBe("xxxxxxxxxx…(truncated)");
  });
});
