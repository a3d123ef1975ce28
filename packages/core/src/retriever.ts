import type { RetrievalResult } from "@tablelens/types";
import { EmbeddingMismatchError, ValidationError, withTimeout } from "@tablelens/errors";
import type { IEmbeddingProvider } from "@tablelens/embeddings";
import { describeSignature, sameSignature, type VectorIndex } from "@tablelens/vector-store";

export interface RetrieveOptions {
  timeoutMs?: number;
}

/**
 * Retrieval: Query -> Embed -> Cosine top-k
 *
 * The query must be embedded in the same space the index was built in.
 */
export async function retrieve(
  index: VectorIndex,
  queryText: string,
  k: number,
  embeddings: IEmbeddingProvider,
  options: RetrieveOptions = {},
): Promise<RetrievalResult> {
  if (!Number.isInteger(k) || k < 1) {
    throw new ValidationError("k must be a positive integer", { k: String(k) });
  }

  const querySignature = embeddings.signature();
  if (!sameSignature(querySignature, index.signature)) {
    throw new EmbeddingMismatchError(
      `Index was built with ${describeSignature(index.signature)} but queries use ${describeSignature(querySignature)}. Re-run ingestion or restore the embedding settings.`,
      { details: { index: index.signature, query: querySignature } },
    );
  }

  const result =
    options.timeoutMs === undefined
      ? await embeddings.embed(queryText, { inputType: "query" })
      : await withTimeout("query embedding", options.timeoutMs, (signal) =>
          embeddings.embed(queryText, { inputType: "query", signal }),
        );

  const queryVector = result.embeddings[0];
  if (!queryVector || queryVector.length !== index.signature.dimensions) {
    throw new EmbeddingMismatchError(
      `Query embedding has ${String(queryVector?.length ?? 0)} dimensions, index expects ${String(index.signature.dimensions)}`,
    );
  }

  return index.search(queryVector, k);
}
