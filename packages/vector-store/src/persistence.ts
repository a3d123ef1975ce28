import { mkdir, mkdtemp, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import type { ZodType, ZodTypeDef } from "zod";
import type { IndexNode } from "@tablelens/types";
import { IndexCorruptError, IndexNotFoundError } from "@tablelens/errors";
import { VectorIndex } from "./vector-index.js";
import {
  INDEX_FORMAT_VERSION,
  MANIFEST_FILE,
  manifestSchema,
  NODES_FILE,
  nodesSchema,
  VECTORS_FILE,
  vectorsSchema,
  type IndexManifest,
} from "./schemas.js";

async function listDirectory(directory: string): Promise<string[] | null> {
  try {
    return await readdir(directory);
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    throw error;
  }
}

/**
 * Write the index into `directory`, replacing whatever was there.
 * Files land in a sibling temp directory first, so readers see either the
 * previous index or the new one.
 */
export async function persistIndex(index: VectorIndex, directory: string): Promise<void> {
  const target = resolve(directory);
  const parent = dirname(target);
  await mkdir(parent, { recursive: true });

  const staging = await mkdtemp(join(parent, `.${basename(target)}-staging-`));
  try {
    const manifest: IndexManifest = {
      formatVersion: INDEX_FORMAT_VERSION,
      createdAt: new Date().toISOString(),
      embedding: index.signature,
      nodeCount: index.size,
    };
    await writeFile(join(staging, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
    await writeFile(join(staging, NODES_FILE), JSON.stringify(index.nodes(), null, 2));
    await writeFile(join(staging, VECTORS_FILE), JSON.stringify(index.vectors()));

    const previous = await listDirectory(target);
    if (previous === null) {
      await rename(staging, target);
      return;
    }

    const retired = `${staging}-previous`;
    await rename(target, retired);
    await rename(staging, target);
    await rm(retired, { recursive: true, force: true });
  } catch (error: unknown) {
    await rm(staging, { recursive: true, force: true });
    throw error;
  }
}

async function readJson<T>(
  directory: string,
  file: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let raw: string;
  try {
    raw = await readFile(join(directory, file), "utf8");
  } catch (error: unknown) {
    throw new IndexCorruptError(directory, `${file} is missing or unreadable`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error: unknown) {
    throw new IndexCorruptError(directory, `${file} is not valid JSON`, { cause: error });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new IndexCorruptError(directory, `${file} does not match the index schema`, {
      details: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

/** Whether `directory` holds anything that could be an index. */
export async function indexExists(directory: string): Promise<boolean> {
  const entries = await listDirectory(directory);
  return entries !== null && entries.length > 0;
}

/**
 * Load a persisted index.
 *
 * @throws IndexNotFoundError when the directory is missing or empty
 * @throws IndexCorruptError when a file is missing, malformed, or the files disagree
 */
export async function loadIndex(directory: string): Promise<VectorIndex> {
  if (!(await indexExists(directory))) {
    throw new IndexNotFoundError(directory);
  }

  const manifest = await readJson(directory, MANIFEST_FILE, manifestSchema);
  const nodes = await readJson(directory, NODES_FILE, nodesSchema);
  const vectors = await readJson(directory, VECTORS_FILE, vectorsSchema);

  if (nodes.length !== manifest.nodeCount || vectors.length !== manifest.nodeCount) {
    throw new IndexCorruptError(
      directory,
      `manifest lists ${String(manifest.nodeCount)} nodes, found ${String(nodes.length)} nodes and ${String(vectors.length)} vectors`,
    );
  }

  const vectorById = new Map(vectors.map((record) => [record.id, record.vector]));
  const entriesToAdd: { node: IndexNode; vector: number[] }[] = [];
  for (const node of nodes) {
    const vector = vectorById.get(node.id);
    if (!vector) {
      throw new IndexCorruptError(directory, `node ${node.id} has no vector`);
    }
    if (vector.length !== manifest.embedding.dimensions) {
      throw new IndexCorruptError(
        directory,
        `vector ${node.id} has ${String(vector.length)} dimensions, manifest says ${String(manifest.embedding.dimensions)}`,
      );
    }
    entriesToAdd.push({ node, vector });
  }

  const index = new VectorIndex(manifest.embedding);
  try {
    await index.add(entriesToAdd);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IndexCorruptError(directory, reason, { cause: error });
  }
  return index;
}
