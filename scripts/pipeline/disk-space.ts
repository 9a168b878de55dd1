import * as fs from "fs";
import * as path from "path";
import { InsufficientStorageError } from "./errors";
import { formatBytes, walkDir } from "./fs-utils";

export type FreeSpaceReader = (dir: string) => Promise<number>;

export interface CapacityCheck {
  ok: boolean;
  requiredBytes: number;
  freeBytes: number;
  location: string;
}

export const statfsFreeBytes: FreeSpaceReader = async (dir) => {
  const stats = await fs.promises.statfs(dir);
  return stats.bavail * stats.bsize;
};

export function sourceSize(sourcePath: string): number {
  const abs = path.resolve(sourcePath);
  const stat = fs.statSync(abs);
  if (!stat.isDirectory()) return stat.size;
  return walkDir(abs).reduce((sum, file) => sum + fs.statSync(file).size, 0);
}

/** Closest existing ancestor of the destination's parent, else the cwd. */
export function freeSpaceLocation(destination: string): string {
  let dir = path.dirname(path.resolve(destination));
  for (;;) {
    if (fs.existsSync(dir) && fs.statSync(dir).isDirectory()) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return ".";
    dir = parent;
  }
}

/**
 * Passes only when free space is strictly greater than the source size.
 */
export async function checkCapacity(
  sourcePath: string,
  destination: string,
  readFree: FreeSpaceReader = statfsFreeBytes,
): Promise<CapacityCheck> {
  const requiredBytes = sourceSize(sourcePath);
  const location = freeSpaceLocation(destination);
  const freeBytes = await readFree(location);
  console.log(
    `  Free space: ${formatBytes(freeBytes)}, required size: ${formatBytes(requiredBytes)}`,
  );
  return { ok: freeBytes > requiredBytes, requiredBytes, freeBytes, location };
}

export async function assertCapacity(
  sourcePath: string,
  destination: string,
  readFree: FreeSpaceReader = statfsFreeBytes,
): Promise<void> {
  const check = await checkCapacity(sourcePath, destination, readFree);
  if (!check.ok) {
    throw new InsufficientStorageError(check.requiredBytes, check.freeBytes, check.location);
  }
}
