import * as fs from "fs";
import * as path from "path";
import * as tar from "tar";
import { strToU8, zipSync } from "fflate";
import { describe, it, expect } from "vitest";
import type { ProjectKind } from "../../../shared/schema";
import { validateProjectTree, type IArchiveStorage, type IProjectImporter } from "../../../server/storage";
import { buildPaths, type RestoreContext } from "../config";
import {
  ACCESS_EXPIRED_MESSAGE,
  InsufficientStorageError,
  StructuralPreconditionError,
} from "../errors";
import { loadRunState } from "../progress";
import { RestorePipeline } from "../restore-pipeline";
import { MemoryContentStore, quietConsole, tinyPng, treeOf, useTempDirs } from "./helpers";

const FILES_URL = "https://backups.example.com/7/files.zip";
const ANNOTATIONS_URL = "https://backups.example.com/7/annotations.zip";
const TROUBLESHOOTING_URL = "https://docs.example.com/restore#troubleshooting";

const meta = { classes: [{ title: "car", shape: "rectangle" }], tags: [] };

function annotation(width: number, height: number) {
  return JSON.stringify({
    description: "",
    size: { height, width },
    tags: [],
    objects: [
      {
        classTitle: "car",
        geometryType: "rectangle",
        points: { exterior: [[0, 0], [1, 1]], interior: [] },
      },
    ],
  });
}

function servingArchives(archives: Record<string, Uint8Array>): typeof fetch {
  return async (input) => {
    const body = archives[String(input)];
    if (!body) return new Response("missing", { status: 404, headers: { "content-type": "text/plain" } });
    return new Response(body, {
      status: 200,
      headers: { "content-type": "application/zip", "content-length": String(body.byteLength) },
    });
  };
}

class RecordingImporter implements IProjectImporter {
  imports: { kind: ProjectKind; name: string; files: string[] }[] = [];

  async importProject(projectDir: string, kind: ProjectKind, projectName: string): Promise<void> {
    validateProjectTree(projectDir, kind);
    this.imports.push({ kind, name: projectName, files: treeOf(projectDir) });
  }
}

class RecordingArchiveStorage implements IArchiveStorage {
  stored: { logicalPath: string; entries: string[] }[] = [];

  async storeArchive(filePath: string, logicalPath: string): Promise<string> {
    const entries: string[] = [];
    tar.t({ file: filePath, sync: true, onReadEntry: (entry) => void entries.push(entry.path) });
    this.stored.push({ logicalPath, entries });
    return `stored/${logicalPath}`;
  }
}

describe("RestorePipeline", () => {
  const tempDir = useTempDirs();
  quietConsole();

  function contextFor(
    kind: ProjectKind,
    options: { downloadMode?: boolean; annotations?: boolean } = {},
  ): RestoreContext {
    return {
      projectId: 7,
      projectName: "demo",
      kind,
      runId: "run-1",
      downloadMode: options.downloadMode ?? false,
      backup: {
        filesUrl: FILES_URL,
        annotationsUrl: options.annotations === false ? undefined : ANNOTATIONS_URL,
      },
      troubleshootingUrl: TROUBLESHOOTING_URL,
      paths: buildPaths(tempDir(), 7, "demo"),
    };
  }

  function currentBackup(): Record<string, Uint8Array> {
    return {
      [FILES_URL]: zipSync({ "a-b.png": tinyPng(6, 4) }),
      [ANNOTATIONS_URL]: zipSync({
        "meta.json": strToU8(JSON.stringify(meta)),
        "hash_name_map.json": strToU8(
          JSON.stringify({
            datasets: [
              {
                name: "ds1",
                images: [
                  { hash: "a-b.png", name: "img1.png" },
                  { hash: "c-d.png", name: "img2.png" },
                ],
              },
            ],
          }),
        ),
        "ds1/ann/img1.png.json": strToU8(annotation(6, 4)),
        "ds1/ann/img2.png.json": strToU8(annotation(3, 5)),
      }),
    };
  }

  function dependencies(archives: Record<string, Uint8Array>) {
    return {
      contentStore: new MemoryContentStore(new Map([["c-d.png", tinyPng(3, 5)]])),
      importer: new RecordingImporter(),
      archiveStorage: new RecordingArchiveStorage(),
      fetchImpl: servingArchives(archives),
      sleep: async () => {},
      freeSpaceReader: async () => 1e12,
    };
  }

  it("restores a current backup and hands it to the importer", async () => {
    const ctx = contextFor("images");
    const deps = dependencies(currentBackup());

    const outcome = await new RestorePipeline(ctx, deps).run();

    expect(outcome).toEqual({ status: "completed", mode: "imported" });
    expect(deps.importer.imports).toEqual([
      {
        kind: "images",
        name: "demo",
        files: ["ds1/ann/img1.png.json", "ds1/ann/img2.png.json", "ds1/img/img1.png", "ds1/img/img2.png", "meta.json"],
      },
    ]);
    expect(deps.contentStore.calls).toEqual([["c-d.png"]]);
    expect(fs.existsSync(ctx.paths.projectDir)).toBe(false);
    expect(loadRunState(ctx.paths.runStatePath)).toMatchObject({
      runId: "run-1",
      projectId: 7,
      stage: "done",
      unresolvedItems: 0,
    });
  });

  it("packages the tree in download mode and records the output", async () => {
    const ctx = contextFor("images", { downloadMode: true });
    const deps = dependencies(currentBackup());

    const outcome = await new RestorePipeline(ctx, deps).run();

    expect(outcome).toEqual({
      status: "completed",
      mode: "packaged",
      outputReference: "stored/restore-archived-project/run-1_7_demo.tar",
    });
    expect(deps.archiveStorage.stored).toHaveLength(1);
    expect(deps.archiveStorage.stored[0].logicalPath).toBe("restore-archived-project/run-1_7_demo.tar");
    expect(deps.archiveStorage.stored[0].entries).toContain("7_demo/ds1/img/img2.png");
    expect(deps.importer.imports).toEqual([]);
    expect(fs.existsSync(ctx.paths.projectDir)).toBe(false);
    expect(fs.existsSync(`${ctx.paths.projectDir}.tar`)).toBe(false);
    expect(loadRunState(ctx.paths.runStatePath)?.outputReference).toBe(
      "stored/restore-archived-project/run-1_7_demo.tar",
    );
  });

  it("reports unresolved images without failing the run", async () => {
    const ctx = contextFor("images");
    const deps = { ...dependencies(currentBackup()), contentStore: new MemoryContentStore() };

    const pipeline = new RestorePipeline(ctx, deps);
    const outcome = await pipeline.run();

    expect(outcome).toEqual({ status: "completed", mode: "imported" });
    expect(deps.importer.imports[0].files).toEqual([
      "ds1/ann/img1.png.json",
      "ds1/img/img1.png",
      "meta.json",
    ]);
    expect(pipeline.runState.unresolvedItems).toBe(1);
  });

  it("moves a legacy backup verbatim when every dataset has annotations", async () => {
    const ctx = contextFor("images", { annotations: false });
    const deps = dependencies({
      [FILES_URL]: zipSync({
        "meta.json": strToU8(JSON.stringify(meta)),
        "ds1/img/a.png": tinyPng(6, 4),
        "ds1/ann/a.png.json": strToU8(annotation(6, 4)),
      }),
    });

    await new RestorePipeline(ctx, deps).run();

    expect(deps.importer.imports[0].files).toEqual(["ds1/ann/a.png.json", "ds1/img/a.png", "meta.json"]);
    expect(deps.contentStore.calls).toEqual([]);
  });

  it("fails a legacy backup whose dataset has no annotations", async () => {
    const ctx = contextFor("images", { annotations: false });
    const deps = dependencies({
      [FILES_URL]: zipSync({
        "meta.json": strToU8(JSON.stringify(meta)),
        "ds1/img/a.png": tinyPng(6, 4),
      }),
    });

    const run = new RestorePipeline(ctx, deps).run();

    await expect(run).rejects.toBeInstanceOf(StructuralPreconditionError);
    await expect(run).rejects.toMatchObject({
      dataset: "ds1",
      remediation: `Troubleshooting: ${TROUBLESHOOTING_URL}`,
    });
    expect(loadRunState(ctx.paths.runStatePath)?.stage).toBe("failed");
    expect(fs.existsSync(path.join(ctx.paths.poolDir, "ds1", "img", "a.png"))).toBe(true);
  });

  it("moves other project kinds without reconciling or repairing", async () => {
    const ctx = contextFor("videos", { annotations: false });
    const deps = dependencies({
      [FILES_URL]: zipSync({
        "meta.json": strToU8("{}"),
        "ds1/video/clip.mp4": strToU8("not really a video"),
      }),
    });

    const outcome = await new RestorePipeline(ctx, deps).run();

    expect(outcome).toEqual({ status: "completed", mode: "imported" });
    expect(deps.importer.imports).toEqual([
      { kind: "videos", name: "demo", files: ["ds1/video/clip.mp4", "meta.json"] },
    ]);
  });

  it("ends as expired when the backup stays unreachable", async () => {
    const ctx = contextFor("images");
    const deps = dependencies({});

    const outcome = await new RestorePipeline(ctx, deps).run();

    expect(outcome).toEqual({ status: "expired", message: ACCESS_EXPIRED_MESSAGE });
    expect(loadRunState(ctx.paths.runStatePath)?.stage).toBe("expired");
    expect(deps.importer.imports).toEqual([]);
  });

  it("stops before packaging when the disk cannot hold the archive", async () => {
    const ctx = contextFor("images", { downloadMode: true });
    let lookups = 0;
    const deps = {
      ...dependencies(currentBackup()),
      // files and annotations extraction pass, packaging fails
      freeSpaceReader: async () => (++lookups <= 2 ? 1e12 : 0),
    };

    const run = new RestorePipeline(ctx, deps).run();

    await expect(run).rejects.toBeInstanceOf(InsufficientStorageError);
    await expect(run).rejects.toMatchObject({
      remediation: expect.stringContaining(`Troubleshooting: ${TROUBLESHOOTING_URL}`),
    });
    expect(lookups).toBe(3);
    expect(deps.archiveStorage.stored).toEqual([]);
    expect(fs.existsSync(path.join(ctx.paths.projectDir, "ds1", "img", "img1.png"))).toBe(true);
    expect(fs.existsSync(`${ctx.paths.projectDir}.tar`)).toBe(false);
    expect(loadRunState(ctx.paths.runStatePath)?.stage).toBe("failed");
  });
});
