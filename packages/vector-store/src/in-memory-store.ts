import type { VectorRecord } from "@tablelens/types";
import { EmbeddingMismatchError, ValidationError } from "@tablelens/errors";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
import { cosineSimilarity } from "./similarity.js";

/**
 * Exhaustive cosine search over vectors held in memory.
 * Map iteration order is insertion order, which gives the tie-break.
 */
export class InMemoryVectorStore implements IVectorStore {
  private vectors = new Map<string, number[]>();

  constructor(readonly dimensions: number) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new ValidationError("Vector dimensions must be a positive integer", {
        dimensions: String(dimensions),
      });
    }
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    for (const record of records) {
      this.assertDimensions(record.vector, `vector ${record.id}`);
      this.vectors.set(record.id, [...record.vector]);
    }
  }

  async search(params: VectorSearchParams): Promise<VectorSearchResult[]> {
    if (!Number.isInteger(params.topK) || params.topK < 1) {
      throw new ValidationError("topK must be a positive integer", { topK: String(params.topK) });
    }
    this.assertDimensions(params.vector, "query vector");

    const scored: VectorSearchResult[] = [];
    for (const [id, vector] of this.vectors) {
      scored.push({ id, score: cosineSimilarity(params.vector, vector) });
    }

    // Array.prototype.sort is stable
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, params.topK);
  }

  records(): VectorRecord[] {
    return [...this.vectors].map(([id, vector]) => ({ id, vector: [...vector] }));
  }

  private assertDimensions(vector: readonly number[], label: string): void {
    if (vector.length !== this.dimensions) {
      throw new EmbeddingMismatchError(
        `${label} has ${String(vector.length)} dimensions, index expects ${String(this.dimensions)}`,
      );
    }
  }
}
