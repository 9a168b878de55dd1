import * as fs from "fs";
import * as path from "path";
import { pipeline } from "stream/promises";
import pLimit from "p-limit";
import type { ProjectKind } from "@shared/schema";
import {
  listDatasets,
  listItems,
  annPathFor,
  metaPath,
} from "@shared/project-layout";
import {
  buildObjectKey,
  getObjectStream,
  objectExists,
  uploadObject,
  type ObjectBucket,
} from "./r2";
import {
  HashesNotFoundError,
  RemoteStoreError,
  StructuralPreconditionError,
  errorMessage,
} from "../scripts/pipeline/errors";
import { listSubdirs, walkDir } from "../scripts/pipeline/fs-utils";

/** Content-addressed blob store. Hashes and destination paths are paired by position. */
export interface IContentStore {
  /** Throws `HashesNotFoundError` naming every hash the store does not have. */
  downloadByHashes(hashes: string[], destinationPaths: string[]): Promise<void>;
}

export interface IProjectImporter {
  importProject(projectDir: string, kind: ProjectKind, projectName: string): Promise<void>;
}

export interface IArchiveStorage {
  /** Returns the reference of the stored object. */
  storeArchive(filePath: string, logicalPath: string): Promise<string>;
}

const HEAD_CONCURRENCY = 8;
const UPLOAD_CONCURRENCY = 5;

const MIME_MAP: Record<string, string> = {
  json: "application/json",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  bmp: "image/bmp",
  webp: "image/webp",
  tif: "image/tiff",
  tiff: "image/tiff",
  mp4: "video/mp4",
  avi: "video/x-msvideo",
  mov: "video/quicktime",
  nrrd: "application/octet-stream",
  pcd: "application/octet-stream",
  tar: "application/x-tar",
};

function guessMime(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase().replace(".", "");
  return MIME_MAP[ext] || "application/octet-stream";
}

export class R2ContentStore implements IContentStore {
  constructor(
    private readonly target: ObjectBucket,
    private readonly prefix: string = "blobs",
  ) {}

  async downloadByHashes(hashes: string[], destinationPaths: string[]): Promise<void> {
    if (hashes.length !== destinationPaths.length) {
      throw new RemoteStoreError(
        `Got ${hashes.length} hashes but ${destinationPaths.length} destination paths`,
      );
    }

    const limit = pLimit(HEAD_CONCURRENCY);
    let present: boolean[];
    try {
      present = await Promise.all(
        hashes.map((hash) => limit(() => objectExists(this.target, this.keyFor(hash)))),
      );
    } catch (err: unknown) {
      throw new RemoteStoreError(`Content store lookup failed: ${errorMessage(err)}`, undefined, err);
    }

    const missing = hashes.filter((_, i) => !present[i]);
    if (missing.length > 0) throw new HashesNotFoundError(missing);

    for (let i = 0; i < hashes.length; i++) {
      const destination = destinationPaths[i];
      fs.mkdirSync(path.dirname(destination), { recursive: true });
      try {
        const body = await getObjectStream(this.target, this.keyFor(hashes[i]));
        await pipeline(body, fs.createWriteStream(destination));
      } catch (err: unknown) {
        throw new RemoteStoreError(
          `Failed to download blob ${hashes[i]}: ${errorMessage(err)}`,
          undefined,
          err,
        );
      }
    }
  }

  private keyFor(hash: string): string {
    return buildObjectKey(this.prefix, hash);
  }
}

/**
 * Checks the layout a structured upload needs, throwing on the first problem.
 */
export function validateProjectTree(projectDir: string, kind: ProjectKind): void {
  if (!fs.existsSync(metaPath(projectDir))) {
    throw new StructuralPreconditionError(`Project meta not found: ${metaPath(projectDir)}`);
  }
  // only image datasets have a fixed img/ann layout
  const datasets = kind === "images" ? listDatasets(projectDir) : listSubdirs(projectDir);
  if (datasets.length === 0) {
    throw new StructuralPreconditionError(`No datasets found in ${projectDir}`);
  }
  if (kind !== "images") return;

  for (const dataset of datasets) {
    for (const item of listItems(projectDir, dataset)) {
      if (!fs.existsSync(annPathFor(projectDir, dataset, item))) {
        throw new StructuralPreconditionError(
          `Item '${item}' in dataset '${dataset}' has no annotation file`,
          dataset,
        );
      }
    }
  }
}

export class R2ProjectImporter implements IProjectImporter {
  constructor(
    private readonly target: ObjectBucket,
    private readonly prefix: string = "projects",
  ) {}

  async importProject(projectDir: string, kind: ProjectKind, projectName: string): Promise<void> {
    validateProjectTree(projectDir, kind);

    const files = walkDir(projectDir).sort();

    console.log(`  Uploading ${files.length} files of ${kind} project '${projectName}'`);

    const limit = pLimit(UPLOAD_CONCURRENCY);
    let uploaded = 0;
    await Promise.all(
      files.map((filePath) =>
        limit(async () => {
          const rel = path.relative(projectDir, filePath).split(path.sep).join("/");
          const key = buildObjectKey(this.prefix, projectName, rel);
          const size = fs.statSync(filePath).size;
          await uploadObject(this.target, key, fs.createReadStream(filePath), size, guessMime(filePath));
          uploaded++;
          if (uploaded % 100 === 0) {
            console.log(`  Progress: ${uploaded}/${files.length} uploaded`);
          }
        }),
      ),
    );
  }
}

export class R2ArchiveStorage implements IArchiveStorage {
  constructor(private readonly target: ObjectBucket) {}

  async storeArchive(filePath: string, logicalPath: string): Promise<string> {
    const key = buildObjectKey(logicalPath);
    const size = fs.statSync(filePath).size;
    await uploadObject(this.target, key, fs.createReadStream(filePath), size, guessMime(filePath));
    return key;
  }
}
