import { describe, it, expect } from "vitest";
import type { IndexNode, RetrievalResult } from "@tablelens/types";
import { assembleContext } from "./context-assembler.js";

const TEXT: IndexNode = {
  id: "text-p22-c0",
  modality: "text",
  text: "Net sales rose 2%.",
  metadata: { pageNumber: 22, chunkIndex: 0, startChar: 0, endChar: 18 },
};

const TABLE_A: IndexNode = {
  id: "table-p4_table_0.png",
  modality: "table_image",
  text: "Columns 2024, 2023. Net sales 391,035 and 383,285.",
  metadata: { imagePath: "/tables/p4_table_0.png", fileName: "p4_table_0.png", pageNumber: 4 },
};

const TABLE_B: IndexNode = {
  id: "table-p9_table_1.png",
  modality: "table_image",
  text: "Cash 29,943.",
  metadata: { imagePath: "/tables/p9_table_1.png", fileName: "p9_table_1.png", pageNumber: 9 },
};

describe("assembleContext", () => {
  it("returns empty context for no results", () => {
    expect(assembleContext([])).toEqual({ context: "", sourceImages: [] });
  });

  it("labels each node with its source in retrieval order", () => {
    const results: RetrievalResult = [
      { node: TABLE_A, score: 0.9 },
      { node: TEXT, score: 0.8 },
    ];

    const { context } = assembleContext(results);

    expect(context).toBe(
      "\n--- Source: Table Image (p4_table_0.png) ---\nColumns 2024, 2023. Net sales 391,035 and 383,285.\n" +
        "\n--- Source: Text (Page 22) ---\nNet sales rose 2%.\n",
    );
  });

  it("lists distinct table images in first-occurrence order", () => {
    const results: RetrievalResult = [
      { node: TABLE_B, score: 0.95 },
      { node: TEXT, score: 0.9 },
      { node: TABLE_A, score: 0.85 },
      { node: TABLE_B, score: 0.85 },
    ];

    expect(assembleContext(results).sourceImages).toEqual([
      "/tables/p9_table_1.png",
      "/tables/p4_table_0.png",
    ]);
  });
});
