import {
  S3Client,
  PutObjectCommand,
  HeadObjectCommand,
  GetObjectCommand,
} from "@aws-sdk/client-s3";
import { Readable } from "stream";
import { z } from "zod";

const r2EnvSchema = z.object({
  R2_ACCOUNT_ID: z.string().min(1),
  R2_ACCESS_KEY_ID: z.string().min(1),
  R2_SECRET_ACCESS_KEY: z.string().min(1),
  R2_BUCKET_NAME: z.string().min(1),
  R2_CONTENT_PREFIX: z.string().default("blobs"),
});

export interface R2Config {
  accountId: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
  contentPrefix: string;
}

export interface ObjectBucket {
  client: S3Client;
  bucket: string;
}

export function loadR2Config(env: NodeJS.ProcessEnv = process.env): R2Config {
  const parsed = r2EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(
      "R2 is not configured. Set R2_ACCOUNT_ID, R2_ACCESS_KEY_ID, R2_SECRET_ACCESS_KEY, R2_BUCKET_NAME.",
    );
  }
  return {
    accountId: parsed.data.R2_ACCOUNT_ID,
    accessKeyId: parsed.data.R2_ACCESS_KEY_ID,
    secretAccessKey: parsed.data.R2_SECRET_ACCESS_KEY,
    bucket: parsed.data.R2_BUCKET_NAME,
    contentPrefix: parsed.data.R2_CONTENT_PREFIX,
  };
}

export function createBucket(config: R2Config): ObjectBucket {
  const client = new S3Client({
    region: "auto",
    endpoint: `https://${config.accountId}.r2.cloudflarestorage.com`,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  });
  return { client, bucket: config.bucket };
}

export function buildObjectKey(...segments: string[]): string {
  const key = segments
    .flatMap((s) => s.split("/"))
    .filter((s) => s.length > 0)
    .join("/");
  if (key.split("/").includes("..") || key.length > 1024) {
    throw new Error(`Invalid object key: ${key}`);
  }
  return key;
}

export async function uploadObject(
  target: ObjectBucket,
  key: string,
  body: Buffer | Uint8Array | Readable,
  contentLength: number,
  contentType: string = "application/octet-stream",
): Promise<void> {
  await target.client.send(
    new PutObjectCommand({
      Bucket: target.bucket,
      Key: key,
      Body: body,
      ContentLength: contentLength,
      ContentType: contentType,
    }),
  );
}

export async function getObjectStream(target: ObjectBucket, key: string): Promise<Readable> {
  const resp = await target.client.send(
    new GetObjectCommand({ Bucket: target.bucket, Key: key }),
  );
  if (!(resp.Body instanceof Readable)) {
    throw new Error(`Object ${key} has no readable body`);
  }
  return resp.Body;
}

export async function objectExists(target: ObjectBucket, key: string): Promise<boolean> {
  try {
    await target.client.send(
      new HeadObjectCommand({ Bucket: target.bucket, Key: key }),
    );
    return true;
  } catch (err: unknown) {
    const s3Err = err as { name?: string; $metadata?: { httpStatusCode?: number } };
    if (s3Err.name === "NotFound" || s3Err.$metadata?.httpStatusCode === 404) {
      return false;
    }
    throw err;
  }
}
