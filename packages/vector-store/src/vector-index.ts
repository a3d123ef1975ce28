import type { EmbeddingSignature, IndexNode, ScoredNode, VectorRecord } from "@tablelens/types";
import { EmbeddingMismatchError, ValidationError } from "@tablelens/errors";
import type { IVectorStore } from "./vector-store.interface.js";
import { InMemoryVectorStore } from "./in-memory-store.js";

export function sameSignature(a: EmbeddingSignature, b: EmbeddingSignature): boolean {
  return a.provider === b.provider && a.model === b.model && a.dimensions === b.dimensions;
}

export function describeSignature(signature: EmbeddingSignature): string {
  return `${signature.provider}/${signature.model} (${String(signature.dimensions)}d)`;
}

/**
 * Nodes and their vectors, tagged with the embedding space they live in.
 */
export class VectorIndex {
  private nodesById = new Map<string, IndexNode>();
  private store: IVectorStore;

  constructor(readonly signature: EmbeddingSignature, store?: IVectorStore) {
    this.store = store ?? new InMemoryVectorStore(signature.dimensions);
    if (this.store.dimensions !== signature.dimensions) {
      throw new EmbeddingMismatchError(
        `Vector store holds ${String(this.store.dimensions)}-dimensional vectors, signature says ${String(signature.dimensions)}`,
      );
    }
  }

  async add(entries: { node: IndexNode; vector: number[] }[]): Promise<void> {
    const seen = new Set<string>();
    for (const { node } of entries) {
      if (this.nodesById.has(node.id) || seen.has(node.id)) {
        throw new ValidationError(`Duplicate node id ${node.id}`, { id: node.id });
      }
      seen.add(node.id);
    }

    await this.store.upsert(entries.map(({ node, vector }) => ({ id: node.id, vector })));
    for (const { node } of entries) {
      this.nodesById.set(node.id, node);
    }
  }

  async search(vector: number[], topK: number): Promise<ScoredNode[]> {
    const hits = await this.store.search({ vector, topK });
    const results: ScoredNode[] = [];
    for (const hit of hits) {
      const node = this.nodesById.get(hit.id);
      if (node) results.push({ node, score: hit.score });
    }
    return results;
  }

  /** Nodes in insertion order. */
  nodes(): IndexNode[] {
    return [...this.nodesById.values()];
  }

  vectors(): VectorRecord[] {
    return this.store.records();
  }

  get size(): number {
    return this.nodesById.size;
  }
}
