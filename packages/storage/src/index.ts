import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";

// ── Types ──

/** Where rendered reports (Markdown, JSON, source) are kept per audit job. */
export interface ReportArchive {
  putArtifact(
    auditJobId: string,
    key: string,
    body: Buffer | string,
    contentType: string
  ): Promise<{ objectKey: string; sizeBytes: number }>;

  getSignedUrl(objectKey: string, expiresInSecs?: number): Promise<string>;

  deleteArtifact(objectKey: string): Promise<void>;
}

export interface R2Config {
  accountId: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucketName: string;
}

const SAFE_KEY = /^[A-Za-z0-9._-]+$/;

function objectKeyFor(auditJobId: string, key: string): string {
  if (!SAFE_KEY.test(auditJobId) || !SAFE_KEY.test(key) || key === ".." || auditJobId === "..") {
    throw new Error(`Invalid artifact key: ${auditJobId}/${key}`);
  }
  return `audits/${auditJobId}/${key}`;
}

// ── R2/S3 Implementation ──

export class S3ReportArchive implements ReportArchive {
  private client: S3Client;
  private bucket: string;

  /** `client` is injectable so tests can stand in for the network. */
  constructor(config: R2Config, client?: S3Client) {
    this.bucket = config.bucketName;
    this.client = client ?? new S3Client({
      region: "auto",
      endpoint: `https://${config.accountId}.r2.cloudflarestorage.com`,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });
  }

  async putArtifact(
    auditJobId: string,
    key: string,
    body: Buffer | string,
    contentType: string
  ): Promise<{ objectKey: string; sizeBytes: number }> {
    const objectKey = objectKeyFor(auditJobId, key);
    const buf = typeof body === "string" ? Buffer.from(body, "utf-8") : body;

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: objectKey,
        Body: buf,
        ContentType: contentType,
      })
    );

    return { objectKey, sizeBytes: buf.length };
  }

  async getSignedUrl(objectKey: string, expiresInSecs = 3600): Promise<string> {
    const command = new GetObjectCommand({
      Bucket: this.bucket,
      Key: objectKey,
    });
    return getSignedUrl(this.client, command, { expiresIn: expiresInSecs });
  }

  async deleteArtifact(objectKey: string): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({
        Bucket: this.bucket,
        Key: objectKey,
      })
    );
  }
}

// ── Local directory ──

export class LocalReportArchive implements ReportArchive {
  constructor(private readonly rootDir: string) {}

  async putArtifact(
    auditJobId: string,
    key: string,
    body: Buffer | string,
    _contentType: string
  ): Promise<{ objectKey: string; sizeBytes: number }> {
    const objectKey = objectKeyFor(auditJobId, key);
    const buf = typeof body === "string" ? Buffer.from(body, "utf-8") : body;
    const file = path.join(this.rootDir, objectKey);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, buf);
    return { objectKey, sizeBytes: buf.length };
  }

  /** Local artifacts have no signed URLs; returns a `file://` URL. */
  async getSignedUrl(objectKey: string): Promise<string> {
    return new URL(`file://${path.resolve(this.rootDir, objectKey)}`).href;
  }

  async deleteArtifact(objectKey: string): Promise<void> {
    await rm(path.join(this.rootDir, objectKey), { force: true });
  }

  async readArtifact(objectKey: string): Promise<Buffer> {
    return readFile(path.join(this.rootDir, objectKey));
  }
}

// ── Factory ──

let _instance: ReportArchive | null = null;

/**
 * R2 when all `R2_*` variables are set, otherwise a local directory under
 * `STORAGE_DIR`.
 */
export function getReportArchive(env: Record<string, string | undefined> = process.env): ReportArchive {
  if (_instance) return _instance;

  const accountId = env.R2_ACCOUNT_ID;
  const accessKeyId = env.R2_ACCESS_KEY_ID;
  const secretAccessKey = env.R2_SECRET_ACCESS_KEY;
  const bucketName = env.R2_BUCKET_NAME;

  if (accountId && accessKeyId && secretAccessKey && bucketName) {
    _instance = new S3ReportArchive({ accountId, accessKeyId, secretAccessKey, bucketName });
  } else {
    const dir = env.STORAGE_DIR || "/tmp/dispatchguard-storage";
    console.warn(`[storage] R2 not configured, archiving reports under ${dir}`);
    _instance = new LocalReportArchive(dir);
  }
  return _instance;
}

export type { S3Client };
