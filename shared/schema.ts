import { z } from "zod";

// ---------------------------------------------------------------------------
// Project kinds
// ---------------------------------------------------------------------------

export const projectKinds = [
  "images",
  "videos",
  "volumes",
  "point_clouds",
  "point_cloud_episodes",
] as const;

export type ProjectKind = (typeof projectKinds)[number];

export const projectKindSchema = z.enum(projectKinds);

// ---------------------------------------------------------------------------
// Backup manifest (hash_name_map.json)
// ---------------------------------------------------------------------------

export const imageRefSchema = z.object({
  hash: z.string().min(1),
  name: z.string().min(1),
});

export const datasetDescriptorSchema = z.object({
  name: z.string().min(1),
  images: z.array(imageRefSchema).default([]),
});

export const backupManifestSchema = z.object({
  datasets: z.array(datasetDescriptorSchema).default([]),
});

export type ImageRef = z.infer<typeof imageRefSchema>;
export type DatasetDescriptor = z.infer<typeof datasetDescriptorSchema>;
export type BackupManifest = z.infer<typeof backupManifestSchema>;

export interface MissingBlobRequest {
  name: string;
  hash: string;
  destinationPath: string;
}

// ---------------------------------------------------------------------------
// Project meta (meta.json)
// ---------------------------------------------------------------------------

export const geometryShapes = [
  "rectangle",
  "polygon",
  "line",
  "point",
  "bitmap",
  "graph",
  "cuboid",
  "any",
] as const;

export type GeometryShape = (typeof geometryShapes)[number];

export const tagValueTypes = ["none", "any_number", "any_string", "oneof_string"] as const;

export const objectClassMetaSchema = z
  .object({
    title: z.string().min(1),
    shape: z.enum(geometryShapes),
    color: z.string().optional(),
  })
  .passthrough();

export const tagMetaSchema = z
  .object({
    name: z.string().min(1),
    value_type: z.enum(tagValueTypes),
    values: z.array(z.string()).optional(),
  })
  .passthrough();

export const projectMetaSchema = z
  .object({
    classes: z.array(objectClassMetaSchema).default([]),
    tags: z.array(tagMetaSchema).default([]),
  })
  .passthrough();

export type ObjectClassMeta = z.infer<typeof objectClassMetaSchema>;
export type TagMeta = z.infer<typeof tagMetaSchema>;
export type ProjectMeta = z.infer<typeof projectMetaSchema>;

// ---------------------------------------------------------------------------
// Annotations (<dataset>/ann/<item>.json)
// ---------------------------------------------------------------------------

const coordinate = z.tuple([z.number(), z.number()]);

function pointLocations(minExterior: number, maxExterior = Infinity) {
  return z
    .object({
      exterior: z.array(coordinate),
      interior: z.array(z.array(coordinate)).default([]),
    })
    .refine(
      (p) => p.exterior.length >= minExterior && p.exterior.length <= maxExterior,
      { message: "Unexpected number of exterior points" },
    );
}

export const tagSchema = z
  .object({
    name: z.string().min(1),
    value: z.union([z.string(), z.number(), z.null()]).optional(),
  })
  .passthrough();

const labelBase = {
  classTitle: z.string().min(1),
  description: z.string().optional(),
  tags: z.array(tagSchema).default([]),
};

export const labelSchema = z.discriminatedUnion("geometryType", [
  z.object({ ...labelBase, geometryType: z.literal("rectangle"), points: pointLocations(2, 2) }).passthrough(),
  z.object({ ...labelBase, geometryType: z.literal("polygon"), points: pointLocations(3) }).passthrough(),
  z.object({ ...labelBase, geometryType: z.literal("line"), points: pointLocations(2) }).passthrough(),
  z.object({ ...labelBase, geometryType: z.literal("point"), points: pointLocations(1, 1) }).passthrough(),
  z
    .object({
      ...labelBase,
      geometryType: z.literal("bitmap"),
      bitmap: z.object({ data: z.string().min(1), origin: coordinate }),
    })
    .passthrough(),
  z
    .object({
      ...labelBase,
      geometryType: z.literal("graph"),
      nodes: z
        .record(z.object({ loc: coordinate }).passthrough())
        .refine((nodes) => Object.keys(nodes).length > 0, { message: "Graph has no nodes" }),
    })
    .passthrough(),
  z
    .object({
      ...labelBase,
      geometryType: z.literal("cuboid"),
      points: z.array(z.object({ x: z.number(), y: z.number() })).length(8),
      faces: z.array(z.array(z.number().int())).length(3),
    })
    .passthrough(),
]);

export const imageSizeSchema = z.object({
  height: z.number().int().positive(),
  width: z.number().int().positive(),
});

export const annotationSchema = z
  .object({
    description: z.string().default(""),
    size: imageSizeSchema,
    tags: z.array(tagSchema).default([]),
    objects: z.array(labelSchema).default([]),
  })
  .passthrough();

export type Tag = z.infer<typeof tagSchema>;
export type Label = z.infer<typeof labelSchema>;
export type ImageSize = z.infer<typeof imageSizeSchema>;
export type AnnotationRecord = z.infer<typeof annotationSchema>;

// ---------------------------------------------------------------------------
// Run state (restore-progress.json)
// ---------------------------------------------------------------------------

export const restoreStages = [
  "fetching",
  "extracting-files",
  "extracting-annotations",
  "legacy-validation",
  "reconciling",
  "moving",
  "repairing",
  "packaging",
  "handoff",
  "done",
  "expired",
  "failed",
] as const;

export type RestoreStage = (typeof restoreStages)[number];

export const runStateSchema = z.object({
  runId: z.string(),
  projectId: z.number().int(),
  stage: z.enum(restoreStages),
  startedAt: z.string(),
  lastUpdated: z.string(),
  outputReference: z.string().optional(),
  unresolvedItems: z.number().int().nonnegative().default(0),
  error: z.string().optional(),
});

export type RunState = z.infer<typeof runStateSchema>;
