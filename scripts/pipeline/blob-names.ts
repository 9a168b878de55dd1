import * as path from "path";

/**
 * Blobs are stored on disk under their content hash with every "/" replaced by
 * "-". Decoding turns every "-" back into "/", so a hash that already contains
 * "-" does not survive the round trip; `resolveBlob` falls back to the forward
 * encoding for those.
 */

function splitExt(name: string): [base: string, ext: string] {
  const ext = path.posix.extname(name);
  return [name.slice(0, name.length - ext.length), ext];
}

export function encodeBlobName(hash: string): string {
  const [base, ext] = splitExt(hash);
  return base.replaceAll("/", "-") + ext;
}

export function decodeBlobName(filename: string): string {
  const [base, ext] = splitExt(filename);
  return base.replaceAll("-", "/") + ext;
}

export interface BlobIndex {
  /** decoded logical key -> local filename */
  byKey: Map<string, string>;
  filenames: Set<string>;
}

export function buildIndex(localFilenames: Iterable<string>): BlobIndex {
  const byKey = new Map<string, string>();
  const filenames = new Set<string>();
  for (const filename of localFilenames) {
    byKey.set(decodeBlobName(filename), filename);
    filenames.add(filename);
  }
  return { byKey, filenames };
}

/** Local path of the blob for `hash`, or null when the pool does not have it. */
export function resolveBlob(hash: string, index: BlobIndex, poolDir: string): string | null {
  const byKey = index.byKey.get(hash);
  if (byKey !== undefined) return path.join(poolDir, byKey);

  const encoded = encodeBlobName(hash);
  if (index.filenames.has(encoded)) return path.join(poolDir, encoded);

  return null;
}
