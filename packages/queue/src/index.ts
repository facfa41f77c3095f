import { Queue, Worker, Job, QueueEvents, type JobsOptions } from "bullmq";
import IORedis from "ioredis";
import { z } from "zod";

// ── Redis Connection ──
export function createRedisConnection(url = process.env.REDIS_URL ?? "redis://localhost:6379"): IORedis {
  return new IORedis(url, { maxRetriesPerRequest: null });
}

// ── Job Schemas ──
const ClientRefId = z.string().trim().min(1).max(128).optional();

export const ScanJobDataSchema = z.object({
  kind: z.literal("scan"),
  auditJobId: z.string().min(1),
  code: z.string().min(50).max(50_000),
  reportLanguage: z.string().length(2).toLowerCase().default("en"),
  contractId: z.string().min(1).optional(),
  clientRefId: ClientRefId,
});

export const GenerateJobDataSchema = z.object({
  kind: z.literal("generate"),
  auditJobId: z.string().min(1),
  prompt: z.string().min(10).max(4_000),
  reportLanguage: z.string().length(2).toLowerCase().default("en"),
  clientRefId: ClientRefId,
});

export const AuditJobDataSchema = z.discriminatedUnion("kind", [ScanJobDataSchema, GenerateJobDataSchema]);

export type AuditJobData = z.infer<typeof AuditJobDataSchema>;
/** Payload as submitted, before defaults are applied. */
export type AuditJobInput = z.input<typeof AuditJobDataSchema>;

export const AUDIT_QUEUE_NAME = "contract-audits";

// ── Queue Factory ──
export function createAuditQueue(connection: IORedis): Queue<AuditJobData> {
  return new Queue<AuditJobData>(AUDIT_QUEUE_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: { count: 200 },
      removeOnFail: { count: 100 },
      attempts: 1, // a retried audit would commit a second ledger entry
    },
  });
}

/** The part of a `Queue` that producers use. */
export interface AuditJobSink<J> {
  add(name: string, data: AuditJobData, opts?: JobsOptions): Promise<J>;
}

/**
 * Validate and enqueue under the audit job id, so a resubmitted job is not
 * audited twice. Throws a `ZodError` for payloads outside the limits.
 */
export async function enqueueAudit<J>(queue: AuditJobSink<J>, input: AuditJobInput): Promise<J> {
  const data = AuditJobDataSchema.parse(input);
  return queue.add(data.kind, data, { jobId: data.auditJobId });
}

// ── Worker Factory ──
export interface AuditWorkerOptions {
  concurrency?: number;
}

export function createAuditWorker(
  connection: IORedis,
  processor: (job: Job<AuditJobData>) => Promise<unknown>,
  options: AuditWorkerOptions = {}
): Worker<AuditJobData> {
  return new Worker<AuditJobData>(AUDIT_QUEUE_NAME, processor, {
    connection,
    concurrency: options.concurrency ?? 2,
    limiter: { max: 20, duration: 60_000 },
    removeOnComplete: { count: 1000 },
    removeOnFail: { count: 500 },
  });
}

// ── Queue Events ──
export function createQueueEvents(connection: IORedis): QueueEvents {
  return new QueueEvents(AUDIT_QUEUE_NAME, { connection });
}

// ── Health Check ──
export async function getQueueHealth(
  queue: Queue
): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);
  return { waiting, active, completed, failed, delayed };
}

export { Queue, Worker, Job, QueueEvents } from "bullmq";
export type { IORedis };
