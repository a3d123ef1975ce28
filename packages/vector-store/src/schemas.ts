import { z } from "zod";

export const INDEX_FORMAT_VERSION = 1;

export const MANIFEST_FILE = "manifest.json";
export const NODES_FILE = "nodes.json";
export const VECTORS_FILE = "vectors.json";

export const embeddingSignatureSchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1),
  dimensions: z.number().int().positive(),
});

export const manifestSchema = z.object({
  formatVersion: z.literal(INDEX_FORMAT_VERSION),
  createdAt: z.string(),
  embedding: embeddingSignatureSchema,
  nodeCount: z.number().int().nonnegative(),
});

const textNodeSchema = z.object({
  id: z.string().min(1),
  modality: z.literal("text"),
  text: z.string().min(1),
  metadata: z.object({
    pageNumber: z.number().int().positive(),
    chunkIndex: z.number().int().nonnegative(),
    startChar: z.number().int().nonnegative(),
    endChar: z.number().int().nonnegative(),
  }),
});

const tableNodeSchema = z.object({
  id: z.string().min(1),
  modality: z.literal("table_image"),
  text: z.string().min(1),
  metadata: z.object({
    imagePath: z.string().min(1),
    fileName: z.string().min(1),
    pageNumber: z.number().int().positive().nullable(),
  }),
});

export const nodesSchema = z.array(z.discriminatedUnion("modality", [textNodeSchema, tableNodeSchema]));

export const vectorsSchema = z.array(
  z.object({
    id: z.string().min(1),
    vector: z.array(z.number()),
  }),
);

export type IndexManifest = z.infer<typeof manifestSchema>;
