import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, vi } from "vitest";
import type { IContentStore } from "../../../server/storage";
import { HashesNotFoundError } from "../errors";
import { walkDir } from "../fs-utils";

/** Fresh temp directories per test, removed afterwards. */
export function useTempDirs(): () => string {
  const created: string[] = [];
  afterEach(() => {
    for (const dir of created.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });
  return () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "restore-test-"));
    created.push(dir);
    return dir;
  };
}

export function quietConsole(): void {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });
}

export function writeFile(filePath: string, content: string | Uint8Array): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
}

/** Relative paths of every file below `dir`, "/"-separated and sorted. */
export function treeOf(dir: string): string[] {
  return walkDir(dir)
    .map((file) => path.relative(dir, file).split(path.sep).join("/"))
    .sort();
}

/** Smallest PNG header image-size can read: signature plus IHDR. */
export function tinyPng(width: number, height: number): Buffer {
  const buf = Buffer.alloc(33);
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(buf, 0);
  buf.writeUInt32BE(13, 8);
  buf.write("IHDR", 12, "ascii");
  buf.writeUInt32BE(width, 16);
  buf.writeUInt32BE(height, 20);
  buf[24] = 8; // bit depth
  buf[25] = 6; // RGBA
  return buf;
}

/**
 * Content store backed by a map. `reportLimit` caps how many missing hashes
 * one error names, `reportInstead` names hashes that were never requested.
 */
export class MemoryContentStore implements IContentStore {
  calls: string[][] = [];

  constructor(
    private readonly blobs: Map<string, string | Uint8Array> = new Map(),
    private readonly options: { reportLimit?: number; reportInstead?: string[] } = {},
  ) {}

  async downloadByHashes(hashes: string[], destinationPaths: string[]): Promise<void> {
    this.calls.push([...hashes]);
    const missing = hashes.filter((hash) => !this.blobs.has(hash));
    if (missing.length > 0) {
      if (this.options.reportInstead) throw new HashesNotFoundError(this.options.reportInstead);
      throw new HashesNotFoundError(missing.slice(0, this.options.reportLimit ?? missing.length));
    }
    hashes.forEach((hash, i) => writeFile(destinationPaths[i], this.blobs.get(hash) ?? ""));
  }
}
