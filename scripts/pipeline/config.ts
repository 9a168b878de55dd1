import * as path from "path";
import { z } from "zod";
import { projectKindSchema, type ProjectKind } from "../../shared/schema";

export const DEFAULT_TROUBLESHOOTING_URL =
  "https://docs.example.com/restore-archived-project#troubleshooting";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .default("false")
  .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  PROJECT_ID: z.coerce.number().int().positive(),
  PROJECT_NAME: z.string().min(1),
  PROJECT_KIND: projectKindSchema.default("images"),
  TASK_ID: z.string().min(1).optional(),
  BACKUP_FILES_URL: z.string().url(),
  BACKUP_ANNOTATIONS_URL: z
    .string()
    .url()
    .optional()
    .or(z.literal("").transform(() => undefined)),
  DOWNLOAD_MODE: booleanFlag,
  WORK_DIR: z.string().min(1).default("data/restore"),
  TROUBLESHOOTING_URL: z.string().url().default(DEFAULT_TROUBLESHOOTING_URL),
});

export interface RestorePaths {
  workDir: string;
  projectDir: string;
  poolDir: string;
  manifestPath: string;
  filesArchivePath: string;
  annotationsArchivePath: string;
  runStatePath: string;
}

/**
 * Everything a run needs to know, built once and passed to each component.
 */
export interface RestoreContext {
  projectId: number;
  projectName: string;
  kind: ProjectKind;
  runId: string;
  downloadMode: boolean;
  backup: {
    filesUrl: string;
    annotationsUrl?: string;
  };
  troubleshootingUrl: string;
  paths: RestorePaths;
}

export function buildPaths(workDir: string, projectId: number, projectName: string): RestorePaths {
  const root = path.resolve(workDir);
  const projectDir = path.join(root, `${projectId}_${projectName}`);
  return {
    workDir: root,
    projectDir,
    poolDir: path.join(projectDir, "files"),
    manifestPath: path.join(projectDir, "hash_name_map.json"),
    filesArchivePath: path.join(projectDir, "files.tar"),
    annotationsArchivePath: path.join(projectDir, "annotations.tar"),
    runStatePath: path.join(root, "restore-progress.json"),
  };
}

export function loadRestoreContext(
  env: NodeJS.ProcessEnv = process.env,
  overrides: { workDir?: string; downloadMode?: boolean } = {},
): RestoreContext {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid restore configuration:\n${issues}`);
  }
  const cfg = parsed.data;
  const workDir = overrides.workDir ?? cfg.WORK_DIR;

  return {
    projectId: cfg.PROJECT_ID,
    projectName: cfg.PROJECT_NAME,
    kind: cfg.PROJECT_KIND,
    runId: cfg.TASK_ID ?? String(Date.now()),
    downloadMode: overrides.downloadMode ?? cfg.DOWNLOAD_MODE,
    backup: {
      filesUrl: cfg.BACKUP_FILES_URL,
      annotationsUrl: cfg.BACKUP_ANNOTATIONS_URL,
    },
    troubleshootingUrl: cfg.TROUBLESHOOTING_URL,
    paths: buildPaths(workDir, cfg.PROJECT_ID, cfg.PROJECT_NAME),
  };
}
