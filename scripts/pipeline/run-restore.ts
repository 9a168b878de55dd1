import "dotenv/config";
import * as path from "path";
import { fileURLToPath } from "url";
import { createBucket, loadR2Config } from "../../server/r2";
import { R2ArchiveStorage, R2ContentStore, R2ProjectImporter } from "../../server/storage";
import { loadRestoreContext } from "./config";
import { RestoreError } from "./errors";
import { RestorePipeline } from "./restore-pipeline";

const __filename = fileURLToPath(import.meta.url);

export interface CliOptions {
  help: boolean;
  workDir?: string;
  downloadMode?: boolean;
}

function printUsage() {
  console.log(`
╔══════════════════════════════════════════════════════════════╗
║              ARCHIVED PROJECT RESTORE                        ║
╠══════════════════════════════════════════════════════════════╣
║                                                              ║
║  Downloads a project backup, extracts it, rebuilds the       ║
║  dataset tree from the backup manifest and either uploads    ║
║  the project or packages it as a single archive.             ║
║                                                              ║
╚══════════════════════════════════════════════════════════════╝

USAGE:
  npx tsx scripts/pipeline/run-restore.ts [options]

OPTIONS:
  --project-dir-root DIR  Where the project tree is built (default: WORK_DIR or data/restore)
  --download-mode         Package the restored project as a .tar instead of importing it
  --help, -h              Show this message

ENVIRONMENT:
  PROJECT_ID, PROJECT_NAME, PROJECT_KIND   Project being restored
  BACKUP_FILES_URL                         Share link of the files archive
  BACKUP_ANNOTATIONS_URL                   Share link of the annotations archive (optional)
  TASK_ID                                  Run id used to name the output archive
  R2_ACCOUNT_ID, R2_ACCESS_KEY_ID,
  R2_SECRET_ACCESS_KEY, R2_BUCKET_NAME     Object storage for blobs and results

STAGES:
  fetching → extracting-files → extracting-annotations | legacy-validation
  → reconciling | moving → repairing → packaging | handoff → done
`);
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { help: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg === "--project-dir-root" && args[i + 1]) {
      options.workDir = args[++i];
    } else if (arg === "--download-mode") {
      options.downloadMode = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return options;
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(err instanceof Error ? err.message : String(err));
    printUsage();
    process.exitCode = 1;
    return;
  }
  if (options.help) {
    printUsage();
    return;
  }

  const ctx = loadRestoreContext(process.env, {
    workDir: options.workDir,
    downloadMode: options.downloadMode,
  });
  const r2 = loadR2Config();
  const bucket = createBucket(r2);

  console.log(
    `\nRestoring ${ctx.kind} project '${ctx.projectName}' (id ${ctx.projectId}, run ${ctx.runId})`,
  );
  console.log(`  Project dir: ${ctx.paths.projectDir}`);

  const pipeline = new RestorePipeline(ctx, {
    contentStore: new R2ContentStore(bucket, r2.contentPrefix),
    importer: new R2ProjectImporter(bucket),
    archiveStorage: new R2ArchiveStorage(bucket),
  });
  const outcome = await pipeline.run();

  console.log(`\n${"=".repeat(60)}`);
  console.log("RESTORE COMPLETE");
  console.log(`${"=".repeat(60)}`);
  if (outcome.status === "expired") {
    console.log(`  ${outcome.message}`);
  } else if (outcome.mode === "packaged") {
    console.log(`  Output archive: ${outcome.outputReference}`);
  } else {
    console.log("  Project imported");
  }
  if (pipeline.runState.unresolvedItems > 0) {
    console.log(`  Unresolved images: ${pipeline.runState.unresolvedItems}`);
  }
}

if (process.argv[1]?.includes(path.basename(__filename))) {
  main().catch((err: unknown) => {
    console.error("Restore failed:", err instanceof Error ? err.message : err);
    if (err instanceof RestoreError && err.remediation) {
      console.error(`  ${err.remediation}`);
    }
    process.exit(1);
  });
}
