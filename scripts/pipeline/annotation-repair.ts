import * as fs from "fs";
import * as path from "path";
import { imageSize } from "image-size";
import { z } from "zod";
import {
  annotationSchema,
  imageSizeSchema,
  labelSchema,
  projectMetaSchema,
  tagSchema,
  type AnnotationRecord,
  type GeometryShape,
  type ImageSize,
  type Label,
  type ProjectKind,
  type ProjectMeta,
  type Tag,
} from "../../shared/schema";
import {
  annDir,
  annPathFor,
  imgDir,
  listDatasets,
  listItems,
  listOrphanAnnotations,
  metaPath,
} from "../../shared/project-layout";
import { AnnotationCorruptionError, StructuralPreconditionError, errorMessage } from "./errors";

export type RepairTier = "standard" | "repaired" | "placeholder";

export interface RepairResult {
  tier: RepairTier;
  record: AnnotationRecord;
  skippedObjects: number;
  skippedTags: number;
}

export interface RepairSummary {
  removedClasses: string[];
  items: number;
  standard: number;
  repaired: number;
  placeholders: number;
  /** Placeholders written for images that had no annotation file. */
  created: number;
  /** Annotations without an image size, replaced by placeholders. */
  sizeless: number;
  orphansRemoved: number;
}

// Shapes the destination project kind cannot hold.
const UNSUPPORTED_SHAPES: Record<ProjectKind, readonly GeometryShape[]> = {
  images: ["cuboid"],
  videos: [],
  volumes: [],
  point_clouds: [],
  point_cloud_episodes: [],
};

function describe(err: unknown): string {
  if (err instanceof z.ZodError) {
    const issue = err.issues[0];
    if (!issue) return "validation failed";
    const at = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${at}${issue.message}`;
  }
  return errorMessage(err);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Validation against the project meta
// ---------------------------------------------------------------------------

export function validateTag(raw: unknown, meta: ProjectMeta): Tag {
  const tag = tagSchema.parse(raw);
  const tagMeta = meta.tags.find((t) => t.name === tag.name);
  if (!tagMeta) throw new Error(`Tag '${tag.name}' is not declared in meta`);

  const value = tag.value;
  switch (tagMeta.value_type) {
    case "none":
      if (value !== undefined && value !== null) {
        throw new Error(`Tag '${tag.name}' takes no value`);
      }
      break;
    case "any_number":
      if (typeof value !== "number") throw new Error(`Tag '${tag.name}' needs a number`);
      break;
    case "any_string":
      if (typeof value !== "string") throw new Error(`Tag '${tag.name}' needs a string`);
      break;
    case "oneof_string":
      if (typeof value !== "string" || !(tagMeta.values ?? []).includes(value)) {
        throw new Error(`Tag '${tag.name}' has value outside its allowed set: ${String(value)}`);
      }
      break;
  }
  return tag;
}

export function validateLabel(raw: unknown, meta: ProjectMeta): Label {
  const label = labelSchema.parse(raw);
  const cls = meta.classes.find((c) => c.title === label.classTitle);
  if (!cls) throw new Error(`Class '${label.classTitle}' is not declared in meta`);
  if (cls.shape !== "any" && cls.shape !== label.geometryType) {
    throw new Error(
      `Class '${cls.title}' has shape ${cls.shape}, object has ${label.geometryType}`,
    );
  }
  for (const tag of label.tags) validateTag(tag, meta);
  return label;
}

/** Titles of the classes to keep, and those removed for `kind`. */
export function computeKeepClasses(
  meta: ProjectMeta,
  kind: ProjectKind,
): { keepClasses: Set<string>; removedClasses: string[] } {
  const unsupported = UNSUPPORTED_SHAPES[kind];
  const keepClasses = new Set<string>();
  const removedClasses: string[] = [];
  for (const cls of meta.classes) {
    if (unsupported.includes(cls.shape)) {
      console.warn(
        `  Class ${cls.title} has unsupported geometry type ${cls.shape}. Class will be removed from meta and all annotations.`,
      );
      removedClasses.push(cls.title);
    } else {
      keepClasses.add(cls.title);
    }
  }
  return { keepClasses, removedClasses };
}

// ---------------------------------------------------------------------------
// Tiers
// ---------------------------------------------------------------------------

function loadStandard(raw: unknown, meta: ProjectMeta, keepClasses: Set<string>): AnnotationRecord {
  const record = annotationSchema.parse(raw);
  record.objects.forEach((obj) => validateLabel(obj, meta));
  record.tags.forEach((tag) => validateTag(tag, meta));
  return { ...record, objects: record.objects.filter((obj) => keepClasses.has(obj.classTitle)) };
}

function rebuild(
  raw: unknown,
  annotationPath: string,
  meta: ProjectMeta,
  keepClasses: Set<string>,
): RepairResult {
  const annName = path.basename(annotationPath);
  if (!isRecord(raw)) throw new Error("Annotation is not a JSON object");

  if (raw.size === undefined || raw.size === null) {
    throw new AnnotationCorruptionError(
      `Image size is not found in annotation: ${annName}`,
      annotationPath,
    );
  }
  const size = imageSizeSchema.parse(raw.size);
  const description = typeof raw.description === "string" ? raw.description : "";
  const rawObjects = raw.objects ?? [];
  const rawTags = raw.tags ?? [];
  if (!Array.isArray(rawObjects)) throw new Error("'objects' is not a list");
  if (!Array.isArray(rawTags)) throw new Error("'tags' is not a list");

  const objects: Label[] = [];
  let skippedObjects = 0;
  for (const obj of rawObjects) {
    if (!isRecord(obj) || typeof obj.classTitle !== "string") {
      skippedObjects++;
      console.warn(`  Skipping malformed object in ${annName}: no class title`);
      continue;
    }
    if (!keepClasses.has(obj.classTitle)) continue;
    try {
      objects.push(validateLabel(obj, meta));
    } catch (err: unknown) {
      skippedObjects++;
      console.warn(`  Skipping invalid object in ${annName}: ${describe(err)}`);
    }
  }

  const tags: Tag[] = [];
  let skippedTags = 0;
  for (const tag of rawTags) {
    try {
      tags.push(validateTag(tag, meta));
    } catch (err: unknown) {
      skippedTags++;
      console.error(`  Skipping invalid tag in ${annName}: ${describe(err)}`);
    }
  }

  return {
    tier: "repaired",
    record: { description, size, tags, objects },
    skippedObjects,
    skippedTags,
  };
}

export function placeholderRecord(imagePath: string): AnnotationRecord {
  const dims = imageSize(imagePath);
  const size: ImageSize = imageSizeSchema.parse({ height: dims.height, width: dims.width });
  return { description: "", size, tags: [], objects: [] };
}

/**
 * Loads one annotation, degrading from a strict parse to a field-by-field
 * rebuild to an empty record sized from the image.
 *
 * @throws AnnotationCorruptionError when the record has no image size.
 */
export function loadAndFilter(
  annotationPath: string,
  meta: ProjectMeta,
  keepClasses: Set<string>,
  imagePath: string,
): RepairResult {
  let text: string | null = null;
  try {
    text = fs.readFileSync(annotationPath, "utf-8");
    const record = loadStandard(JSON.parse(text), meta, keepClasses);
    return { tier: "standard", record, skippedObjects: 0, skippedTags: 0 };
  } catch (standardErr: unknown) {
    try {
      if (text === null) throw standardErr;
      return rebuild(JSON.parse(text), annotationPath, meta, keepClasses);
    } catch (err: unknown) {
      if (err instanceof AnnotationCorruptionError) throw err;
      console.error(
        `  Annotation file is broken. ${describe(err)}. Skipping it. (${annotationPath})`,
      );
      return {
        tier: "placeholder",
        record: placeholderRecord(imagePath),
        skippedObjects: 0,
        skippedTags: 0,
      };
    }
  }
}

function writeAnnotation(annotationPath: string, record: AnnotationRecord): void {
  fs.mkdirSync(path.dirname(annotationPath), { recursive: true });
  fs.writeFileSync(annotationPath, JSON.stringify(record, null, 2));
}

export function loadProjectMeta(projectDir: string): ProjectMeta {
  const file = metaPath(projectDir);
  if (!fs.existsSync(file)) {
    throw new StructuralPreconditionError(`Project meta not found: ${file}`);
  }
  const parsed = projectMetaSchema.safeParse(JSON.parse(fs.readFileSync(file, "utf-8")));
  if (!parsed.success) {
    throw new StructuralPreconditionError(`Project meta is invalid: ${describe(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Leaves every image of the tree with a valid annotation file and drops
 * classes the project kind cannot hold from the meta and every annotation.
 */
export function repairProjectAnnotations(projectDir: string, kind: ProjectKind): RepairSummary {
  const meta = loadProjectMeta(projectDir);
  const { keepClasses, removedClasses } = computeKeepClasses(meta, kind);
  const summary: RepairSummary = {
    removedClasses,
    items: 0,
    standard: 0,
    repaired: 0,
    placeholders: 0,
    created: 0,
    sizeless: 0,
    orphansRemoved: 0,
  };

  for (const dataset of listDatasets(projectDir)) {
    for (const orphan of listOrphanAnnotations(projectDir, dataset)) {
      fs.rmSync(path.join(annDir(projectDir, dataset), orphan));
      summary.orphansRemoved++;
    }

    for (const item of listItems(projectDir, dataset)) {
      summary.items++;
      const annPath = annPathFor(projectDir, dataset, item);
      const imagePath = path.join(imgDir(projectDir, dataset), item);

      if (!fs.existsSync(annPath)) {
        writeAnnotation(annPath, placeholderRecord(imagePath));
        summary.created++;
        continue;
      }

      let result: RepairResult;
      try {
        result = loadAndFilter(annPath, meta, keepClasses, imagePath);
      } catch (err: unknown) {
        if (!(err instanceof AnnotationCorruptionError)) throw err;
        console.error(`  ${err.message}. Replacing it with an empty annotation.`);
        writeAnnotation(annPath, placeholderRecord(imagePath));
        summary.sizeless++;
        continue;
      }
      writeAnnotation(annPath, result.record);
      if (result.tier === "standard") summary.standard++;
      else if (result.tier === "repaired") summary.repaired++;
      else summary.placeholders++;
    }
  }

  const keptMeta: ProjectMeta = {
    ...meta,
    classes: meta.classes.filter((cls) => keepClasses.has(cls.title)),
  };
  fs.writeFileSync(metaPath(projectDir), JSON.stringify(keptMeta, null, 2));

  console.log(
    `  Annotations: ${summary.standard} valid, ${summary.repaired} repaired, ${summary.placeholders + summary.created + summary.sizeless} placeholders, ${summary.orphansRemoved} orphans removed`,
  );
  return summary;
}
