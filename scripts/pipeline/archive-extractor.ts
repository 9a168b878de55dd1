import * as fs from "fs";
import * as path from "path";
import * as tar from "tar";
import { Unzip, UnzipInflate } from "fflate";
import { reassemble } from "./archive-reassembler";
import { assertCapacity, type FreeSpaceReader } from "./disk-space";
import { ArchiveIntegrityError, errorMessage } from "./errors";
import { createByteProgress, type ByteProgress } from "./progress";

export type ArchiveFormat = "zip" | "tar";

export interface ExtractOptions {
  label?: string;
  freeSpaceReader?: FreeSpaceReader;
}

const READ_CHUNK_BYTES = 64 * 1024;

/**
 * Identifies the container from its leading bytes. Remote hosts mislabel
 * content types and file names, so neither is consulted.
 */
export function sniffArchiveFormat(filePath: string): ArchiveFormat | null {
  const header = Buffer.alloc(512);
  const fd = fs.openSync(filePath, "r");
  let read: number;
  try {
    read = fs.readSync(fd, header, 0, header.length, 0);
  } finally {
    fs.closeSync(fd);
  }

  if (read >= 4 && header[0] === 0x50 && header[1] === 0x4b) {
    const marker = `${header[2]},${header[3]}`;
    // local file header, empty archive, spanned archive
    if (marker === "3,4" || marker === "5,6" || marker === "7,8") return "zip";
  }
  if (read >= 262 && header.toString("ascii", 257, 262) === "ustar") return "tar";
  return null;
}

function entryTarget(root: string, name: string, archivePath: string): string {
  const target = path.resolve(root, name);
  const rel = path.relative(root, target);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new ArchiveIntegrityError(`Archive entry escapes destination: ${name}`, archivePath);
  }
  return target;
}

async function extractZip(archivePath: string, destinationDir: string, progress: ByteProgress): Promise<void> {
  const root = path.resolve(destinationDir);
  const open = new Map<string, number>();
  let failure: unknown = null;

  const unzipper = new Unzip((file) => {
    if (failure !== null) return;
    try {
      const target = entryTarget(root, file.name, archivePath);
      if (file.name.endsWith("/")) {
        fs.mkdirSync(target, { recursive: true });
        return;
      }
      fs.mkdirSync(path.dirname(target), { recursive: true });
      const fd = fs.openSync(target, "w");
      open.set(file.name, fd);

      file.ondata = (err, data, final) => {
        if (failure !== null) return;
        try {
          if (err) throw err;
          if (data.length > 0) {
            fs.writeSync(fd, data);
            progress.update(data.length);
          }
          if (final) {
            fs.closeSync(fd);
            open.delete(file.name);
          }
        } catch (e) {
          failure = e;
        }
      };
      file.start();
    } catch (e) {
      failure = e;
    }
  });
  unzipper.register(UnzipInflate);

  try {
    for await (const chunk of fs.createReadStream(archivePath, { highWaterMark: READ_CHUNK_BYTES })) {
      unzipper.push(chunk);
      if (failure !== null) break;
    }
    if (failure === null) unzipper.push(new Uint8Array(0), true);
  } finally {
    for (const fd of open.values()) fs.closeSync(fd);
  }

  if (failure !== null) throw failure;
  if (open.size > 0) {
    throw new Error(`Archive ended inside ${[...open.keys()].join(", ")}`);
  }
}

async function extractTar(archivePath: string, destinationDir: string, progress: ByteProgress): Promise<void> {
  await tar.x({
    file: archivePath,
    cwd: destinationDir,
    strict: true,
    onReadEntry: (entry) => progress.update(entry.size),
  });
}

/**
 * Extracts a zip or tar archive, deletes it, then reassembles and extracts any
 * split tar parts the archive contained.
 */
export async function extractArchive(
  archivePath: string,
  destinationDir: string,
  options: ExtractOptions = {},
): Promise<void> {
  await assertCapacity(archivePath, destinationDir, options.freeSpaceReader);

  const archiveName = path.basename(archivePath);
  const format = sniffArchiveFormat(archivePath);
  if (format === null) {
    throw new ArchiveIntegrityError(`Unsupported file type: ${archiveName}`, archivePath);
  }

  const label =
    options.label ?? (archiveName.includes("annotations") ? "Extracting annotations" : "Extracting files");
  console.log(`  ${label} (${format}), please wait...`);
  fs.mkdirSync(destinationDir, { recursive: true });

  const progress = createByteProgress(label, null);
  try {
    if (format === "zip") {
      await extractZip(archivePath, destinationDir, progress);
    } else {
      await extractTar(archivePath, destinationDir, progress);
    }
  } catch (err: unknown) {
    if (err instanceof ArchiveIntegrityError) throw err;
    throw new ArchiveIntegrityError(
      `Failed to extract ${archiveName} (${format}): ${errorMessage(err)}`,
      archivePath,
      err,
    );
  }
  progress.done();

  await fs.promises.rm(archivePath);

  const combined = await reassemble(destinationDir);
  if (combined) {
    await extractArchive(combined, destinationDir, { ...options, label: "Extracting combined parts" });
  }
}
