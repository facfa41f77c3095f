import { Job } from "bullmq";
import {
  AuditService,
  ChatClient,
  ChatContractGenerator,
  ChatReportTranslator,
  loadAuditPolicy,
  loadChatClientConfig,
} from "@dispatchguard/engine";
import { CommitmentLedger, FileLedgerStore, loadLedgerOptions } from "@dispatchguard/ledger";
import { AuditJobDataSchema, createAuditWorker, createRedisConnection, type AuditJobData } from "@dispatchguard/queue";
import { getReportArchive } from "@dispatchguard/storage";
import { handleAuditJob } from "./audit-handler";

const LEDGER_PATH = process.env.LEDGER_PATH || "/tmp/dispatchguard-storage/ledger.jsonl";
const CONCURRENCY = parseInt(process.env.WORKER_CONCURRENCY || "2", 10);
if (!Number.isInteger(CONCURRENCY) || CONCURRENCY < 1) {
  throw new RangeError(`WORKER_CONCURRENCY must be a positive integer, got "${process.env.WORKER_CONCURRENCY}"`);
}

const llmClient = process.env.LLM_API_KEY ? new ChatClient(loadChatClientConfig()) : undefined;
const service = new AuditService({
  ledger: new CommitmentLedger(new FileLedgerStore(LEDGER_PATH), loadLedgerOptions()),
  policy: loadAuditPolicy(),
  generator: llmClient ? new ChatContractGenerator(llmClient) : undefined,
});
const deps = {
  service,
  archive: getReportArchive(),
  translator: llmClient ? new ChatReportTranslator(llmClient) : undefined,
};
const redis = createRedisConnection();

console.log(`[worker] starting contract audit worker...`);
console.log(`[worker] ledger: ${LEDGER_PATH}`);
if (!llmClient) console.log("[worker] LLM_API_KEY not set: generate jobs and translations are disabled");

const worker = createAuditWorker(
  redis,
  async (job: Job<AuditJobData>) => {
    const data = AuditJobDataSchema.parse(job.data);
    return handleAuditJob(data, deps, async (_stage, pct) => {
      await job.updateProgress(pct);
    });
  },
  { concurrency: CONCURRENCY }
);

worker.on("completed", (job) => {
  console.log(`[worker] job ${job.id} completed`);
});

worker.on("failed", (job, err) => {
  console.error(`[worker] job ${job?.id} failed:`, err.message);
});

worker.on("error", (err) => {
  console.error("[worker] worker error:", err);
});

async function shutdown() {
  console.log("[worker] shutting down...");
  await worker.close();
  await redis.quit();
  process.exit(0);
}

process.on("SIGTERM", () => {
  shutdown().catch((err) => {
    console.error("[worker] shutdown failed:", err);
    process.exit(1);
  });
});

process.on("SIGINT", () => {
  shutdown().catch((err) => {
    console.error("[worker] shutdown failed:", err);
    process.exit(1);
  });
});

console.log("[worker] ready, waiting for jobs...");
