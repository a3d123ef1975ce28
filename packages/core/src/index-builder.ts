import type { IndexNode } from "@tablelens/types";
import { EmbeddingMismatchError, withTimeout } from "@tablelens/errors";
import type { IEmbeddingProvider } from "@tablelens/embeddings";
import { VectorIndex } from "@tablelens/vector-store";

const EMBED_BATCH_SIZE = 64;

export interface BuildIndexOptions {
  /** Deadline for each embedding batch. */
  timeoutMs?: number;
  batchSize?: number;
}

/**
 * Embed every node's text and index it under the provider's signature.
 */
export async function buildIndex(
  nodes: IndexNode[],
  embeddings: IEmbeddingProvider,
  options: BuildIndexOptions = {},
): Promise<VectorIndex> {
  const signature = embeddings.signature();
  const batchSize = options.batchSize ?? EMBED_BATCH_SIZE;
  const index = new VectorIndex(signature);

  for (let start = 0; start < nodes.length; start += batchSize) {
    const batch = nodes.slice(start, start + batchSize);
    const texts = batch.map((node) => node.text);
    const result =
      options.timeoutMs === undefined
        ? await embeddings.batchEmbed(texts, { inputType: "document" })
        : await withTimeout("embedding batch", options.timeoutMs, (signal) =>
            embeddings.batchEmbed(texts, { inputType: "document", signal }),
          );

    if (result.embeddings.length !== batch.length) {
      throw new EmbeddingMismatchError(
        `Embedding provider returned ${String(result.embeddings.length)} vectors for ${String(batch.length)} texts`,
      );
    }

    const entries = batch.map((node, i) => {
      const vector = result.embeddings[i] ?? [];
      if (vector.length !== signature.dimensions) {
        throw new EmbeddingMismatchError(
          `Embedding for ${node.id} has ${String(vector.length)} dimensions, expected ${String(signature.dimensions)}`,
        );
      }
      return { node, vector };
    });
    await index.add(entries);
  }

  return index;
}
