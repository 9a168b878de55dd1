import * as fs from "fs";
import * as path from "path";
import {
  backupManifestSchema,
  type BackupManifest,
  type DatasetDescriptor,
  type MissingBlobRequest,
} from "../../shared/schema";
import { imgDir } from "../../shared/project-layout";
import type { IContentStore } from "../../server/storage";
import { buildIndex, resolveBlob, type BlobIndex } from "./blob-names";
import { HashesNotFoundError, errorMessage } from "./errors";
import { listFiles } from "./fs-utils";

/** Batch calls made per dataset before the remaining items are given up on. */
export const MAX_NARROWING_ROUNDS = 5;

export type UnresolvedReason = "not-found" | "retries-exhausted";

export interface UnresolvedItem {
  name: string;
  hash: string;
  reason: UnresolvedReason;
}

export interface ReconcileSummary {
  dataset: string;
  copied: number;
  fetched: number;
  unresolved: UnresolvedItem[];
}

export function loadManifest(manifestPath: string): BackupManifest {
  const raw: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
  const parsed = backupManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid backup manifest ${path.basename(manifestPath)}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Asks the store for every request in one call. A "hashes not found" answer
 * drops exactly the named hashes and the rest are asked for again.
 */
async function fetchMissing(
  dataset: string,
  requests: MissingBlobRequest[],
  store: IContentStore,
): Promise<{ fetched: number; unresolved: UnresolvedItem[] }> {
  let pending = requests;
  const unresolved: UnresolvedItem[] = [];
  let calls = 0;

  while (pending.length > 0) {
    if (calls >= MAX_NARROWING_ROUNDS) {
      console.warn(`  Skipping retries for dataset '${dataset}' (${pending.length} items left)`);
      for (const req of pending) {
        unresolved.push({ name: req.name, hash: req.hash, reason: "retries-exhausted" });
      }
      return { fetched: 0, unresolved };
    }
    calls++;

    try {
      await store.downloadByHashes(
        pending.map((r) => r.hash),
        pending.map((r) => r.destinationPath),
      );
      return { fetched: pending.length, unresolved };
    } catch (err: unknown) {
      if (!(err instanceof HashesNotFoundError)) throw err;

      const notFound = new Set(err.hashes);
      console.warn(
        `  Skipping ${notFound.size} files with missing hashes for dataset '${dataset}'`,
      );
      const remaining: MissingBlobRequest[] = [];
      for (const req of pending) {
        if (notFound.has(req.hash)) {
          unresolved.push({ name: req.name, hash: req.hash, reason: "not-found" });
        } else {
          remaining.push(req);
        }
      }
      pending = remaining;
    }
  }

  return { fetched: 0, unresolved };
}

export async function reconcileDataset(
  dataset: DatasetDescriptor,
  index: BlobIndex,
  poolDir: string,
  destinationFolder: string,
  store: IContentStore,
): Promise<ReconcileSummary> {
  fs.mkdirSync(destinationFolder, { recursive: true });

  let copied = 0;
  const missing: MissingBlobRequest[] = [];
  for (const image of dataset.images) {
    const destinationPath = path.join(destinationFolder, image.name);
    const source = resolveBlob(image.hash, index, poolDir);
    if (source === null) {
      missing.push({ name: image.name, hash: image.hash, destinationPath });
      continue;
    }
    fs.copyFileSync(source, destinationPath);
    copied++;
  }

  let fetched = 0;
  let unresolved: UnresolvedItem[] = [];
  if (missing.length > 0) {
    console.log(`  Dataset '${dataset.name}': ${missing.length} files not in backup, requesting them`);
    ({ fetched, unresolved } = await fetchMissing(dataset.name, missing, store));
  }

  console.log(
    `  Dataset '${dataset.name}': ${copied} copied, ${fetched} fetched, ${unresolved.length} unresolved`,
  );
  return { dataset: dataset.name, copied, fetched, unresolved };
}

/**
 * Lays out `<projectDir>/<dataset>/img/<name>` for every image in the manifest.
 */
export async function reconcileManifest(
  manifest: BackupManifest,
  poolDir: string,
  projectDir: string,
  store: IContentStore,
): Promise<ReconcileSummary[]> {
  const index = buildIndex(listFiles(poolDir));
  console.log(`  Indexed ${index.filenames.size} files in the backup pool`);

  const summaries: ReconcileSummary[] = [];
  for (const dataset of manifest.datasets) {
    try {
      summaries.push(
        await reconcileDataset(dataset, index, poolDir, imgDir(projectDir, dataset.name), store),
      );
    } catch (err: unknown) {
      console.error(`  Failed to reconcile dataset '${dataset.name}': ${errorMessage(err)}`);
      throw err;
    }
  }
  return summaries;
}
