import type { IndexNode, RetrievalResult } from "@tablelens/types";
import { isTableNode } from "@tablelens/types";

export interface AssembledContext {
  context: string;
  /** Distinct table image paths in first-occurrence order. */
  sourceImages: string[];
}

function sourceLabel(node: IndexNode): string {
  return node.modality === "text"
    ? `Text (Page ${String(node.metadata.pageNumber)})`
    : `Table Image (${node.metadata.fileName})`;
}

/**
 * Concatenates retrieved nodes in retrieval order, each under a source
 * header the answer can cite.
 */
export function assembleContext(results: RetrievalResult): AssembledContext {
  const parts: string[] = [];
  const images = new Set<string>();

  for (const { node } of results) {
    parts.push(`\n--- Source: ${sourceLabel(node)} ---\n${node.text}\n`);
    if (isTableNode(node)) {
      images.add(node.metadata.imagePath);
    }
  }

  return { context: parts.join(""), sourceImages: [...images] };
}
