import * as fs from "fs";
import * as path from "path";
import {
  ExpiredSourceError,
  TransferFailureError,
  TransientTransferError,
  errorMessage,
} from "./errors";
import { createByteProgress } from "./progress";
import { withRetry, type RetryPolicy, type Sleeper } from "./retry-policy";

// Slow CDNs sometimes answer with an HTML interstitial; only these count as archives.
export const ARCHIVE_CONTENT_TYPES = [
  "application/binary",
  "application/zip",
  "application/x-tar",
  "application/octet-stream",
];

const INITIAL_TIMEOUT_MS = 10_000;
const TIMEOUT_STEP_MS = 10_000;
const MAX_TIMEOUT_MS = 90_000;
const MAX_TRANSIENT_RETRIES = 8;
const MAX_UNEXPECTED_RETRIES = 2;

type TransferFailureKind = "transient" | "unexpected";

export interface FetchBackupOptions {
  label?: string;
  fetchImpl?: typeof fetch;
  sleep?: Sleeper;
  remediation?: string;
}

/** Share links point at a preview page; ask for the raw file instead. */
export function toDirectDownloadUrl(sharedLink: string): string {
  const url = new URL(sharedLink);
  if (url.hostname === "dropbox.com" || url.hostname.endsWith(".dropbox.com")) {
    url.searchParams.set("dl", "1");
  }
  return url.toString();
}

/** Inactivity timeout for the request made after `retries` transient failures. */
export function timeoutForRetry(retries: number): number {
  return Math.min(INITIAL_TIMEOUT_MS + TIMEOUT_STEP_MS * retries, MAX_TIMEOUT_MS);
}

export function transientDelayMs(retry: number): number {
  return retry <= 4 ? 5_000 : 10_000;
}

export function isTransientTransferFailure(err: unknown): boolean {
  if (err instanceof TransientTransferError) return true;
  if (!(err instanceof Error)) return false;
  // undici reports refused/reset connections as TypeError("fetch failed")
  if (err instanceof TypeError) return true;
  return err.name === "AbortError" || err.name === "TimeoutError";
}

export function backupTransferPolicy(remediation?: string): RetryPolicy<TransferFailureKind> {
  return {
    classify: (err) => (isTransientTransferFailure(err) ? "transient" : "unexpected"),
    budgets: {
      transient: {
        maxRetries: MAX_TRANSIENT_RETRIES,
        delayMs: transientDelayMs,
        exhausted: (err, failures) => new ExpiredSourceError(failures, err),
      },
      unexpected: {
        maxRetries: MAX_UNEXPECTED_RETRIES,
        delayMs: () => 0,
        exhausted: (err) =>
          new TransferFailureError(`Backup download failed: ${errorMessage(err)}`, remediation, err),
      },
    },
  };
}

function localLength(filePath: string): number {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return 0;
  }
}

interface TransferParams {
  url: string;
  destinationPath: string;
  label: string;
  timeoutMs: number;
  fetchImpl: typeof fetch;
  onData: () => void;
}

/**
 * One ranged request. Appends whatever arrives to the destination file, so a
 * failed attempt leaves a prefix the next attempt resumes from.
 */
async function transferOnce(params: TransferParams): Promise<void> {
  const { url, destinationPath, label, timeoutMs, fetchImpl, onData } = params;
  let offset = localLength(destinationPath);

  const controller = new AbortController();
  let timer = setTimeout(() => controller.abort(), timeoutMs);
  const rearm = () => {
    clearTimeout(timer);
    timer = setTimeout(() => controller.abort(), timeoutMs);
  };

  try {
    const response = await fetchImpl(url, {
      headers: { Range: `bytes=${offset}-` },
      signal: controller.signal,
      redirect: "follow",
    });

    if (response.status === 416 && offset > 0) {
      await response.body?.cancel();
      console.log(`  ${label}: already complete (${offset} bytes on disk)`);
      return;
    }

    const contentType = (response.headers.get("content-type") ?? "")
      .split(";")[0]
      .trim()
      .toLowerCase();
    if (!response.ok || (response.status !== 206 && !ARCHIVE_CONTENT_TYPES.includes(contentType))) {
      await response.body?.cancel();
      const msg = `Status code: ${response.status}, content type: ${contentType || "none"}.`;
      console.warn(`  ${msg}`);
      throw new TransientTransferError(msg);
    }

    if (response.status !== 206 && offset > 0) {
      // Range ignored: the body starts from byte zero again.
      fs.truncateSync(destinationPath, 0);
      offset = 0;
    }

    if (!response.body) {
      throw new TransientTransferError("Response has no body");
    }

    const remaining = parseInt(response.headers.get("content-length") || "0", 10);
    const total = remaining > 0 ? offset + remaining : null;
    const progress = createByteProgress(`Downloading backup ${label}`, total, offset);

    const handle = await fs.promises.open(destinationPath, "a");
    try {
      const reader = response.body.getReader();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        if (value.byteLength === 0) continue;
        await handle.write(value);
        rearm();
        onData();
        progress.update(value.byteLength);
      }
    } finally {
      await handle.close();
    }

    if (total !== null && progress.current < total) {
      throw new TransientTransferError(
        `Connection closed after ${progress.current} of ${total} bytes`,
      );
    }
    progress.done();
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Resumable download of a backup archive.
 *
 * Throws `ExpiredSourceError` once transient failures exceed the retry budget,
 * and `TransferFailureError` after repeated unexpected errors.
 */
export async function fetchBackup(
  remoteRef: string,
  destinationPath: string,
  options: FetchBackupOptions = {},
): Promise<void> {
  const url = toDirectDownloadUrl(remoteRef);
  const label = options.label ?? path.basename(destinationPath);
  const fetchImpl = options.fetchImpl ?? fetch;
  fs.mkdirSync(path.dirname(destinationPath), { recursive: true });

  let transientRetries = 0;
  console.log(`  Started downloading backup ${label}`);

  await withRetry(
    (attempt) =>
      transferOnce({
        url,
        destinationPath,
        label,
        timeoutMs: timeoutForRetry(transientRetries),
        fetchImpl,
        onData: attempt.resetFailures,
      }),
    backupTransferPolicy(options.remediation),
    {
      sleep: options.sleep,
      onRetry: (event) => {
        if (event.kind === "transient") {
          transientRetries++;
          console.warn(
            `  Downloading request error, please wait... Retrying (${event.retry}/${event.maxRetries})`,
          );
        } else {
          console.warn(
            `  Error: ${errorMessage(event.error)}. Retrying (${event.retry}/${event.maxRetries})`,
          );
        }
      },
    },
  );

  console.log(`  Backup ${label} downloaded successfully`);
}
