import * as fs from "fs";
import * as path from "path";
import type { RestoreStage, RunState } from "../../shared/schema";
import type { IArchiveStorage, IContentStore, IProjectImporter } from "../../server/storage";
import { repairProjectAnnotations, type RepairSummary } from "./annotation-repair";
import { extractArchive } from "./archive-extractor";
import { fetchBackup } from "./backup-fetcher";
import type { RestoreContext } from "./config";
import { loadManifest, reconcileManifest } from "./content-reconciler";
import { assertCapacity, type FreeSpaceReader } from "./disk-space";
import { ExpiredSourceError, RestoreError, errorMessage } from "./errors";
import { formatBytes } from "./fs-utils";
import { saveRunState, updateRunState } from "./progress";
import {
  discardPool,
  movePoolIntoProject,
  packageTree,
  validateLegacyPool,
} from "./project-tree";
import type { Sleeper } from "./retry-policy";

export const OUTPUT_ARCHIVE_DIR = "restore-archived-project";

export interface RestoreDependencies {
  contentStore: IContentStore;
  importer: IProjectImporter;
  archiveStorage: IArchiveStorage;
  fetchImpl?: typeof fetch;
  sleep?: Sleeper;
  freeSpaceReader?: FreeSpaceReader;
}

export type RestoreOutcome =
  | { status: "completed"; mode: "packaged"; outputReference: string }
  | { status: "completed"; mode: "imported" }
  | { status: "expired"; message: string };

export class RestorePipeline {
  private state: RunState;

  constructor(
    private readonly ctx: RestoreContext,
    private readonly deps: RestoreDependencies,
  ) {
    const now = new Date().toISOString();
    this.state = {
      runId: ctx.runId,
      projectId: ctx.projectId,
      stage: "fetching",
      startedAt: now,
      lastUpdated: now,
      unresolvedItems: 0,
    };
  }

  get runState(): Readonly<RunState> {
    return this.state;
  }

  async run(): Promise<RestoreOutcome> {
    const { paths } = this.ctx;
    fs.mkdirSync(paths.projectDir, { recursive: true });
    saveRunState(paths.runStatePath, this.state);

    try {
      await this.stage("fetching", () => this.fetchArchives());
      await this.stage("extracting-files", () =>
        extractArchive(paths.filesArchivePath, paths.poolDir, {
          label: "Extracting files",
          freeSpaceReader: this.deps.freeSpaceReader,
        }),
      );
      await this.layoutTree();

      if (this.ctx.downloadMode) {
        const outputReference = await this.stage("packaging", () => this.packageProject());
        this.mark("done", { outputReference });
        return { status: "completed", mode: "packaged", outputReference };
      }

      await this.stage("handoff", () => this.handOff());
      this.mark("done");
      return { status: "completed", mode: "imported" };
    } catch (err: unknown) {
      if (err instanceof ExpiredSourceError) {
        console.warn(`  ${err.message}`);
        this.mark("expired", { error: err.message });
        return { status: "expired", message: err.message };
      }
      this.mark("failed", { error: errorMessage(err) });
      throw this.withTroubleshooting(err);
    }
  }

  // -------------------------------------------------------------------------
  // Stages
  // -------------------------------------------------------------------------

  private async fetchArchives(): Promise<void> {
    const { backup, paths } = this.ctx;
    const options = {
      fetchImpl: this.deps.fetchImpl,
      sleep: this.deps.sleep,
      remediation: `See ${this.ctx.troubleshootingUrl}`,
    };
    await fetchBackup(backup.filesUrl, paths.filesArchivePath, { ...options, label: "files" });
    if (backup.annotationsUrl) {
      await fetchBackup(backup.annotationsUrl, paths.annotationsArchivePath, {
        ...options,
        label: "annotations",
      });
    }
  }

  private async layoutTree(): Promise<void> {
    const { kind, paths } = this.ctx;
    switch (kind) {
      case "images":
        if (this.ctx.backup.annotationsUrl) {
          await this.stage("extracting-annotations", () =>
            extractArchive(paths.annotationsArchivePath, paths.projectDir, {
              label: "Extracting annotations",
              freeSpaceReader: this.deps.freeSpaceReader,
            }),
          );
          await this.stage("reconciling", () => this.reconcile());
        } else {
          console.log("  Attempting to restore images project with an old archive format");
          await this.stage("legacy-validation", async () => {
            validateLegacyPool(paths.poolDir);
          });
          await this.stage("moving", async () => movePoolIntoProject(paths.poolDir, paths.projectDir));
        }
        await this.stage("repairing", async (): Promise<RepairSummary> =>
          repairProjectAnnotations(paths.projectDir, kind),
        );
        return;
      case "videos":
      case "volumes":
      case "point_clouds":
      case "point_cloud_episodes":
        await this.stage("moving", async () => movePoolIntoProject(paths.poolDir, paths.projectDir));
        return;
      default: {
        const unknownKind: never = kind;
        throw new RestoreError(`Unsupported project kind: ${String(unknownKind)}`);
      }
    }
  }

  private async reconcile(): Promise<void> {
    const { paths } = this.ctx;
    const manifest = loadManifest(paths.manifestPath);
    const summaries = await reconcileManifest(
      manifest,
      paths.poolDir,
      paths.projectDir,
      this.deps.contentStore,
    );
    const unresolved = summaries.reduce((sum, s) => sum + s.unresolved.length, 0);
    if (unresolved > 0) {
      console.warn(`  ${unresolved} images could not be restored from the backup or the content store`);
    }
    this.state.unresolvedItems = unresolved;
    discardPool(paths.poolDir, paths.manifestPath);
  }

  private async packageProject(): Promise<string> {
    const { paths, runId } = this.ctx;
    const tarPath = `${paths.projectDir}.tar`;
    await assertCapacity(paths.projectDir, paths.projectDir, this.deps.freeSpaceReader);

    await packageTree(paths.projectDir, tarPath);
    fs.rmSync(paths.projectDir, { recursive: true, force: true });

    const size = fs.statSync(tarPath).size;
    const logicalPath = `${OUTPUT_ARCHIVE_DIR}/${runId}_${path.basename(tarPath)}`;
    console.log(`  Uploading ${path.basename(tarPath)} (${formatBytes(size)})`);
    const outputReference = await this.deps.archiveStorage.storeArchive(tarPath, logicalPath);
    fs.rmSync(tarPath);
    console.log(`  Archive stored as ${outputReference}`);
    return outputReference;
  }

  private async handOff(): Promise<void> {
    const { kind, paths, projectName } = this.ctx;
    await this.deps.importer.importProject(paths.projectDir, kind, projectName);
    fs.rmSync(paths.projectDir, { recursive: true, force: true });
    console.log("  Project successfully restored");
  }

  // -------------------------------------------------------------------------
  // Bookkeeping
  // -------------------------------------------------------------------------

  private async stage<T>(stage: RestoreStage, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    console.log(`\n${"=".repeat(60)}`);
    console.log(`STAGE: ${stage.toUpperCase()}`);
    console.log(`${"=".repeat(60)}`);
    this.mark(stage);

    const result = await fn();

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`\nStage '${stage}' completed in ${elapsed}s`);
    return result;
  }

  private mark(stage: RestoreStage, patch: Partial<RunState> = {}): void {
    updateRunState(this.ctx.paths.runStatePath, this.state, { ...patch, stage });
  }

  private withTroubleshooting(err: unknown): RestoreError {
    const link = `Troubleshooting: ${this.ctx.troubleshootingUrl}`;
    if (err instanceof RestoreError) {
      if (!err.remediation?.includes(this.ctx.troubleshootingUrl)) {
        err.remediation = err.remediation ? `${err.remediation} ${link}` : link;
      }
      return err;
    }
    return new RestoreError(errorMessage(err), link, err);
  }
}
