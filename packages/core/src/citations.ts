import type { CitationReport, RetrievalResult } from "@tablelens/types";
import { isTextNode } from "@tablelens/types";

const PAGE_CITATION = /\bpages?\s+(\d+(?:\s*(?:,|and|&|-)\s*\d+)*)/gi;
const TABLE_CITATION = /\b[\w-]+\.(?:png|jpe?g)\b/gi;

export interface Citations {
  pages: number[];
  tables: string[];
}

/** Page numbers and table file names named in an answer, first occurrence first. */
export function findCitations(answer: string): Citations {
  const pages = new Set<number>();
  for (const match of answer.matchAll(PAGE_CITATION)) {
    for (const digits of (match[1] ?? "").match(/\d+/g) ?? []) {
      pages.add(parseInt(digits, 10));
    }
  }

  const tables = new Set<string>();
  for (const match of answer.matchAll(TABLE_CITATION)) {
    tables.add(match[0]);
  }

  return { pages: [...pages], tables: [...tables] };
}

/**
 * Compares an answer's citations with the nodes it was given.
 * Diagnostic only; answers are never rejected.
 */
export function verifyCitations(answer: string, results: RetrievalResult): CitationReport {
  const { pages, tables } = findCitations(answer);

  const retrievedPages = new Set<number>();
  const retrievedTables = new Map<string, string>();
  for (const { node } of results) {
    if (isTextNode(node)) {
      retrievedPages.add(node.metadata.pageNumber);
    } else {
      if (node.metadata.pageNumber !== null) retrievedPages.add(node.metadata.pageNumber);
      retrievedTables.set(node.metadata.fileName, node.metadata.imagePath);
    }
  }

  const unmatchedCitations = [
    ...pages.filter((page) => !retrievedPages.has(page)).map((page) => `Page ${String(page)}`),
    ...tables.filter((table) => !retrievedTables.has(table)),
  ];
  const cited = new Set(tables);
  const uncitedImages = [...retrievedTables]
    .filter(([fileName]) => !cited.has(fileName))
    .map(([, imagePath]) => imagePath);

  return { citedPages: pages, citedTables: tables, unmatchedCitations, uncitedImages };
}
