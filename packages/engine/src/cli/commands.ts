import { readFile } from "node:fs/promises";
import {
  CommitmentLedger,
  FileLedgerStore,
  loadLedgerOptions,
  type CommitmentLedgerOptions,
} from "@dispatchguard/ledger";
import { loadAuditPolicy } from "../config";
import { isParseError } from "../errors";
import { ChatClient, loadChatClientConfig } from "../llm/chat-client";
import { ChatContractGenerator } from "../llm/generator";
import { ChatReportTranslator, translateReport } from "../llm/translator";
import { generateJsonReport, generateMarkdownReport, type LocalizedReport } from "../pipeline/report";
import { AuditService, type AuditResult } from "../service";

type Env = Record<string, string | undefined>;

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  env: Env;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
};

export const USAGE = `
Dispatch Guard CLI
══════════════════

Commands:
  scan          Audit a contract file and commit the report to the ledger
  generate      Generate a contract from a prompt, then audit and commit it
  verify        Recompute the ledger hash chain

Options:
  --file=PATH         Contract source (scan)
  --prompt=TEXT       Contract request (generate)
  --ledger=PATH       Ledger file (default: $LEDGER_PATH or ./ledger.jsonl)
  --contract-id=ID    Contract identifier (default: SHA-256 of the source)
  --format=md|json    Report format (default: md)
  --lang=CODE         Report language; anything but "en" needs LLM_API_KEY

Examples:
  npx tsx packages/engine/src/cli.ts scan --file=contract.cpp
  npx tsx packages/engine/src/cli.ts scan --file=contract.cpp --format=json --lang=fr
  npx tsx packages/engine/src/cli.ts verify --ledger=./ledger.jsonl
`;

/** Runs one command; resolves to the process exit code. */
export async function runCommand(args: string[], io: CliIO = defaultIO): Promise<number> {
  const command = args[0] || "help";

  function getOpt(name: string): string | undefined {
    const arg = args.find((a) => a.startsWith(`--${name}=`));
    return arg?.split("=").slice(1).join("=");
  }

  const ledgerPath = getOpt("ledger") || io.env.LEDGER_PATH || "./ledger.jsonl";
  let ledgerOptions: CommitmentLedgerOptions;
  try {
    ledgerOptions = loadLedgerOptions(io.env);
  } catch (err) {
    io.err(`[cli] ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  const makeService = (withGenerator: boolean) =>
    new AuditService({
      ledger: new CommitmentLedger(new FileLedgerStore(ledgerPath), ledgerOptions),
      policy: loadAuditPolicy(io.env),
      generator: withGenerator ? new ChatContractGenerator(new ChatClient(loadChatClientConfig(io.env))) : undefined,
    });

  switch (command) {
    case "scan": {
      const file = getOpt("file");
      if (!file) {
        io.err("Usage: scan --file=PATH [--format=md|json] [--lang=CODE]");
        return 1;
      }
      const source = await readFile(file, "utf8");
      return runAudit(io, () => makeService(false).audit(source, "scan", { contractId: getOpt("contract-id") }), getOpt);
    }

    case "generate": {
      const prompt = getOpt("prompt");
      if (!prompt) {
        io.err("Usage: generate --prompt=TEXT");
        return 1;
      }
      return runAudit(io, () => makeService(true).generateAndAudit(prompt, { contractId: getOpt("contract-id") }), getOpt);
    }

    case "verify": {
      const result = await makeService(false).verifyLedger();
      if (result.valid) {
        io.out(`Ledger ${ledgerPath}: valid (${result.length} entries)`);
        return 0;
      }
      io.out(
        `Ledger ${ledgerPath}: INVALID at sequence ${result.firstDivergentSequence} of ${result.length}: ${result.reason}`
      );
      return 1;
    }

    default:
      io.out(USAGE);
      return command === "help" ? 0 : 1;
  }
}

async function runAudit(
  io: CliIO,
  run: () => Promise<AuditResult>,
  getOpt: (name: string) => string | undefined
): Promise<number> {
  // Configured before the audit commits anything.
  const lang = getOpt("lang") || "en";
  const translator = lang !== "en" ? new ChatReportTranslator(new ChatClient(loadChatClientConfig(io.env))) : undefined;

  let result: AuditResult;
  try {
    result = await run();
  } catch (err) {
    if (isParseError(err)) {
      io.err(`[cli] ${err.message}`);
      return 2;
    }
    throw err;
  }

  let localized: LocalizedReport | undefined;
  if (translator) {
    localized = await translateReport(result.report, translator, lang);
  }

  if (getOpt("format") === "json") {
    const json = {
      ...generateJsonReport(result.report, localized),
      reportHash: result.reportHash,
      transactionId: result.transactionId,
      ledgerEntry: result.entry,
    };
    io.out(JSON.stringify(json, null, 2));
  } else {
    io.out(generateMarkdownReport(result.report, localized));
    io.out(`**Report hash:** \`${result.reportHash}\``);
    io.out(`**Transaction:** ${result.transactionId} (ledger #${result.entry.sequenceNumber})`);
  }
  return result.report.summary.shipReady ? 0 : 3;
}
