import * as fs from "fs";
import * as path from "path";
import * as tar from "tar";
import { strToU8, zipSync } from "fflate";
import { describe, it, expect } from "vitest";
import { extractArchive, sniffArchiveFormat } from "../archive-extractor";
import { COMBINED_ARCHIVE_NAME } from "../archive-reassembler";
import { ArchiveIntegrityError, InsufficientStorageError } from "../errors";
import { quietConsole, treeOf, useTempDirs, writeFile } from "./helpers";

const plenty = async () => 1e12;

function sampleZip(): Uint8Array {
  return zipSync({
    "meta.json": strToU8('{"classes":[],"tags":[]}'),
    "ds1/img/a.txt": strToU8("hello"),
    "ds1/img/b.txt": strToU8("world ".repeat(200)),
  });
}

function tarOf(sourceDir: string, entries: string[], tarPath: string): void {
  tar.c({ file: tarPath, cwd: sourceDir, sync: true, portable: true }, entries);
}

describe("sniffArchiveFormat", () => {
  const tempDir = useTempDirs();

  it("recognizes zip and tar by content regardless of extension", () => {
    const dir = tempDir();
    writeFile(path.join(dir, "files.tar"), sampleZip());
    writeFile(path.join(dir, "src", "x.txt"), "x");
    tarOf(path.join(dir, "src"), ["x.txt"], path.join(dir, "files.zip"));
    writeFile(path.join(dir, "junk.tar"), "definitely not an archive");

    expect(sniffArchiveFormat(path.join(dir, "files.tar"))).toBe("zip");
    expect(sniffArchiveFormat(path.join(dir, "files.zip"))).toBe("tar");
    expect(sniffArchiveFormat(path.join(dir, "junk.tar"))).toBeNull();
  });
});

describe("extractArchive", () => {
  const tempDir = useTempDirs();
  quietConsole();

  it("extracts a zip and deletes it", async () => {
    const dir = tempDir();
    const archive = path.join(dir, "files.tar");
    const dest = path.join(dir, "out");
    writeFile(archive, sampleZip());

    await extractArchive(archive, dest, { freeSpaceReader: plenty });

    expect(treeOf(dest)).toEqual(["ds1/img/a.txt", "ds1/img/b.txt", "meta.json"]);
    expect(fs.readFileSync(path.join(dest, "ds1/img/a.txt"), "utf-8")).toBe("hello");
    expect(fs.existsSync(archive)).toBe(false);
  });

  it("extracts a tar", async () => {
    const dir = tempDir();
    writeFile(path.join(dir, "src", "ds1", "ann", "a.png.json"), "{}");
    writeFile(path.join(dir, "src", "meta.json"), "{}");
    const archive = path.join(dir, "annotations.tar");
    tarOf(path.join(dir, "src"), ["ds1", "meta.json"], archive);
    const dest = path.join(dir, "out");

    await extractArchive(archive, dest, { freeSpaceReader: plenty });

    expect(treeOf(dest)).toEqual(["ds1/ann/a.png.json", "meta.json"]);
    expect(fs.existsSync(archive)).toBe(false);
  });

  it("yields identical trees when the same archive is extracted twice", async () => {
    const dir = tempDir();
    const bytes = sampleZip();
    writeFile(path.join(dir, "one.zip"), bytes);
    writeFile(path.join(dir, "two.zip"), bytes);

    await extractArchive(path.join(dir, "one.zip"), path.join(dir, "a"), { freeSpaceReader: plenty });
    await extractArchive(path.join(dir, "two.zip"), path.join(dir, "b"), { freeSpaceReader: plenty });

    const treeA = treeOf(path.join(dir, "a"));
    expect(treeOf(path.join(dir, "b"))).toEqual(treeA);
    for (const rel of treeA) {
      expect(fs.readFileSync(path.join(dir, "b", rel)).equals(fs.readFileSync(path.join(dir, "a", rel)))).toBe(true);
    }
  });

  it("reassembles and extracts split tar parts found inside the archive", async () => {
    const dir = tempDir();
    writeFile(path.join(dir, "src", "ds1", "img", "x.txt"), "inner");
    const innerTar = path.join(dir, "inner.tar");
    tarOf(path.join(dir, "src"), ["ds1"], innerTar);
    const bytes = fs.readFileSync(innerTar);
    const third = Math.ceil(bytes.length / 3);
    const outer = zipSync({
      "pool.tar.000": bytes.subarray(0, third),
      "pool.tar.001": bytes.subarray(third, third * 2),
      "pool.tar.002": bytes.subarray(third * 2),
    });
    const archive = path.join(dir, "files.tar");
    writeFile(archive, outer);
    const dest = path.join(dir, "out");

    await extractArchive(archive, dest, { freeSpaceReader: plenty });

    expect(treeOf(dest)).toEqual(["ds1/img/x.txt"]);
    expect(fs.readFileSync(path.join(dest, "ds1/img/x.txt"), "utf-8")).toBe("inner");
    expect(fs.existsSync(path.join(dest, COMBINED_ARCHIVE_NAME))).toBe(false);
  });

  it("rejects files that are neither zip nor tar and keeps them", async () => {
    const dir = tempDir();
    const archive = path.join(dir, "files.tar");
    writeFile(archive, "<html>not an archive</html>");

    await expect(
      extractArchive(archive, path.join(dir, "out"), { freeSpaceReader: plenty }),
    ).rejects.toBeInstanceOf(ArchiveIntegrityError);
    expect(fs.existsSync(archive)).toBe(true);
  });

  it("rejects zip entries that escape the destination", async () => {
    const dir = tempDir();
    const archive = path.join(dir, "files.zip");
    writeFile(archive, zipSync({ "../evil.txt": strToU8("nope") }));

    await expect(
      extractArchive(archive, path.join(dir, "out"), { freeSpaceReader: plenty }),
    ).rejects.toBeInstanceOf(ArchiveIntegrityError);
    expect(fs.existsSync(path.join(dir, "evil.txt"))).toBe(false);
  });

  it("stops before extracting when the disk is too small", async () => {
    const dir = tempDir();
    const archive = path.join(dir, "files.zip");
    writeFile(archive, sampleZip());

    await expect(
      extractArchive(archive, path.join(dir, "out"), { freeSpaceReader: async () => 0 }),
    ).rejects.toBeInstanceOf(InsufficientStorageError);
    expect(fs.existsSync(archive)).toBe(true);
    expect(fs.existsSync(path.join(dir, "out"))).toBe(false);
  });
});
