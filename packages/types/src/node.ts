export type NodeModality = "text" | "table_image";

export interface TextNodeMetadata {
  pageNumber: number;
  chunkIndex: number;
  startChar: number;
  endChar: number;
}

export interface TableNodeMetadata {
  imagePath: string;
  fileName: string;
  /** Null when the page could not be resolved from the artifact. */
  pageNumber: number | null;
}

export interface TextNode {
  id: string;
  modality: "text";
  text: string;
  metadata: TextNodeMetadata;
}

export interface TableNode {
  id: string;
  modality: "table_image";
  text: string;
  metadata: TableNodeMetadata;
}

export type IndexNode = TextNode | TableNode;

export interface ScoredNode {
  node: IndexNode;
  score: number;
}

export function isTableNode(node: IndexNode): node is TableNode {
  return node.modality === "table_image";
}

export function isTextNode(node: IndexNode): node is TextNode {
  return node.modality === "text";
}
