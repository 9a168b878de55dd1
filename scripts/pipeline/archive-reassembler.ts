import * as fs from "fs";
import * as path from "path";
import { pipeline } from "stream/promises";

export const COMBINED_ARCHIVE_NAME = "combined_parts.tar";

const SPLIT_TAR_PATTERN = /^.+\.tar\.\d{3}$/;

export function isTarPart(filename: string): boolean {
  return SPLIT_TAR_PATTERN.test(filename);
}

/** Split parts directly inside `directory`, in concatenation order. */
export function findTarParts(directory: string): string[] {
  if (!fs.existsSync(directory)) return [];
  return fs
    .readdirSync(directory, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isTarPart(entry.name))
    .map((entry) => entry.name)
    // fixed-width suffixes: lexical order is numeric order
    .sort()
    .map((name) => path.join(directory, name));
}

/**
 * Concatenates `<base>.tar.NNN` parts into one archive next to them. Each part is
 * deleted as soon as it has been copied. Returns null when there is nothing to do.
 */
export async function reassemble(directory: string): Promise<string | null> {
  const parts = findTarParts(directory);
  if (parts.length === 0) return null;

  const outputPath = path.join(directory, COMBINED_ARCHIVE_NAME);
  console.log(`  Combining ${parts.length} archive parts into ${COMBINED_ARCHIVE_NAME}`);

  async function* partChunks() {
    for (const part of parts) {
      for await (const chunk of fs.createReadStream(part)) yield chunk;
      await fs.promises.rm(part);
    }
  }
  await pipeline(partChunks, fs.createWriteStream(outputPath));

  return outputPath;
}
