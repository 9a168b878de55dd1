import * as fs from "fs";
import * as path from "path";
import * as tar from "tar";
import { ANN_DIR } from "../../shared/project-layout";
import { StructuralPreconditionError } from "./errors";
import { isDirEmpty, listSubdirs, moveDirContents } from "./fs-utils";

/**
 * Old backups carry the project tree as-is inside the files archive. Every
 * dataset must then bring its own annotations.
 */
export function validateLegacyPool(poolDir: string): string[] {
  const datasets = listSubdirs(poolDir).sort();
  for (const dataset of datasets) {
    if (isDirEmpty(path.join(poolDir, dataset, ANN_DIR))) {
      throw new StructuralPreconditionError(
        `No annotation files were found in dataset '${dataset}' when trying to restore images project with an old archive format`,
        dataset,
      );
    }
  }
  return datasets;
}

export function movePoolIntoProject(poolDir: string, projectDir: string): void {
  console.log(`  Moving ${path.basename(poolDir)}/ into the project directory`);
  moveDirContents(poolDir, projectDir);
}

/** Removes the blob pool and the manifest once every dataset is laid out. */
export function discardPool(poolDir: string, manifestPath: string): void {
  fs.rmSync(poolDir, { recursive: true, force: true });
  fs.rmSync(manifestPath, { force: true });
}

/** Tars `projectDir` into `tarPath`, rooted at the project directory's name. */
export async function packageTree(projectDir: string, tarPath: string): Promise<void> {
  await tar.c(
    {
      file: tarPath,
      cwd: path.dirname(projectDir),
      portable: true,
    },
    [path.basename(projectDir)],
  );
}
