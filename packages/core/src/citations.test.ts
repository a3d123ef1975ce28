import { describe, it, expect } from "vitest";
import type { RetrievalResult } from "@tablelens/types";
import { findCitations, verifyCitations } from "./citations.js";

const RESULTS: RetrievalResult = [
  {
    node: {
      id: "text-p22-c0",
      modality: "text",
      text: "Revenue grew.",
      metadata: { pageNumber: 22, chunkIndex: 0, startChar: 0, endChar: 13 },
    },
    score: 0.9,
  },
  {
    node: {
      id: "table-p4_table_0.png",
      modality: "table_image",
      text: "Gross margin by segment.",
      metadata: { imagePath: "/tables/p4_table_0.png", fileName: "p4_table_0.png", pageNumber: 4 },
    },
    score: 0.8,
  },
  {
    node: {
      id: "table-p9_table_1.png",
      modality: "table_image",
      text: "Cash flows.",
      metadata: { imagePath: "/tables/p9_table_1.png", fileName: "p9_table_1.png", pageNumber: 9 },
    },
    score: 0.7,
  },
];

describe("findCitations", () => {
  it("collects pages and table files once each, in order", () => {
    const citations = findCitations(
      "Net sales were $391.0 billion (Page 22), see p4_table_0.png and pages 30 and 31. Also Page 22.",
    );

    expect(citations).toEqual({ pages: [22, 30, 31], tables: ["p4_table_0.png"] });
  });

  it("finds nothing in an uncited answer", () => {
    expect(findCitations("Revenue increased.")).toEqual({ pages: [], tables: [] });
  });
});

describe("verifyCitations", () => {
  it("reports citations without a retrieved source and images never cited", () => {
    const report = verifyCitations(
      "Revenue was up (Page 22). Margins are in p4_table_0.png; see also Page 30 and p7_table_2.png.",
      RESULTS,
    );

    expect(report).toEqual({
      citedPages: [22, 30],
      citedTables: ["p4_table_0.png", "p7_table_2.png"],
      unmatchedCitations: ["Page 30", "p7_table_2.png"],
      uncitedImages: ["/tables/p9_table_1.png"],
    });
  });

  it("accepts a page cited through a table's page", () => {
    const report = verifyCitations("Cash is on Page 9.", RESULTS);

    expect(report.unmatchedCitations).toEqual([]);
  });
});
