import * as fs from "fs";
import * as path from "path";

// <project>/meta.json
// <project>/<dataset>/img/<item>
// <project>/<dataset>/ann/<item>.json

export const META_FILE = "meta.json";
export const IMG_DIR = "img";
export const ANN_DIR = "ann";

export function metaPath(projectDir: string): string {
  return path.join(projectDir, META_FILE);
}

export function imgDir(projectDir: string, dataset: string): string {
  return path.join(projectDir, dataset, IMG_DIR);
}

export function annDir(projectDir: string, dataset: string): string {
  return path.join(projectDir, dataset, ANN_DIR);
}

export function annPathFor(projectDir: string, dataset: string, item: string): string {
  return path.join(annDir(projectDir, dataset), `${item}.json`);
}

/** Dataset directories: subdirectories holding an img/ or ann/ folder. */
export function listDatasets(projectDir: string): string[] {
  if (!fs.existsSync(projectDir)) return [];
  return fs
    .readdirSync(projectDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .filter(
      (name) =>
        fs.existsSync(imgDir(projectDir, name)) || fs.existsSync(annDir(projectDir, name)),
    )
    .sort();
}

/** Item names of a dataset, taken from its img/ directory. */
export function listItems(projectDir: string, dataset: string): string[] {
  const dir = imgDir(projectDir, dataset);
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
}

/** Annotation files whose item is missing from img/. */
export function listOrphanAnnotations(projectDir: string, dataset: string): string[] {
  const dir = annDir(projectDir, dataset);
  if (!fs.existsSync(dir)) return [];
  const items = new Set(listItems(projectDir, dataset));
  return fs
    .readdirSync(dir)
    .filter((name) => name.endsWith(".json") && !items.has(name.slice(0, -".json".length)))
    .sort();
}
