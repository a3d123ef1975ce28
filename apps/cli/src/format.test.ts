import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ConfigurationError, ExternalServiceError } from "@tablelens/errors";
import {
  ENV_HINT,
  formatAnswer,
  formatFatal,
  formatIngestFailure,
  formatQueryError,
  formatReport,
  NOT_INGESTED_MESSAGE,
} from "./format.js";

describe("formatAnswer", () => {
  it("lists source tables and flags missing files", () => {
    const lines = formatAnswer(
      {
        answer: "Cash was $29.9 billion (p9_table_1.png).",
        sourceImages: ["/t/p9_table_1.png", "/t/p4_table_0.png"],
        context: "",
      },
      { present: ["/t/p9_table_1.png"], missing: ["/t/p4_table_0.png"] },
    );

    expect(lines).toEqual([
      "Cash was $29.9 billion (p9_table_1.png).",
      "",
      "Source tables:",
      "  - /t/p9_table_1.png",
      "  ! Image file missing: /t/p4_table_0.png",
    ]);
  });

  it("says so when no table was retrieved", () => {
    const lines = formatAnswer(
      { answer: "Dividends rose (Page 2).", sourceImages: [], context: "" },
      { present: [], missing: [] },
    );

    expect(lines).toEqual(["Dividends rose (Page 2).", "", "No visual tables cited"]);
  });
});

describe("formatQueryError", () => {
  it("points to ingestion when nothing is indexed", () => {
    expect(formatQueryError({ code: "NOT_INGESTED", message: "No index found" })).toEqual([
      NOT_INGESTED_MESSAGE,
    ]);
  });

  it("shows the code otherwise", () => {
    expect(formatQueryError({ code: "SYNTHESIS_FAILED", message: "503 upstream unavailable" })).toEqual([
      "Query failed (SYNTHESIS_FAILED): 503 upstream unavailable",
    ]);
  });
});

describe("formatReport", () => {
  it("summarizes an ingestion run", () => {
    const lines = formatReport({
      textNodeCount: 120,
      tableArtifactCount: 3,
      tableNodeCount: 2,
      failedTables: ["p7_table_2.png"],
      persistDir: "./storage",
      embedding: { provider: "openai", model: "openai/text-embedding-3-small", dimensions: 1536 },
    });

    expect(lines).toEqual([
      "Ingestion complete.",
      "  Text nodes:    120",
      "  Table images:  3 (2 summarized, 1 failed)",
      "  Failed tables: p7_table_2.png",
      "  Index:         ./storage",
      "  Embeddings:    openai/openai/text-embedding-3-small (1536d)",
    ]);
  });
});

describe("formatFatal", () => {
  it("adds the .env hint to configuration errors", () => {
    expect(formatFatal(new ConfigurationError("OPENROUTER_API_KEY is not set."))).toEqual([
      "Error: OPENROUTER_API_KEY is not set.",
      ENV_HINT,
    ]);
  });

  it("shows operational errors alone", () => {
    expect(formatFatal(new ExternalServiceError("Detector unreachable", "table-detector"))).toEqual([
      "Error: Detector unreachable",
    ]);
  });

  it("lists every invalid setting", () => {
    const result = z.object({ CHUNK_SIZE: z.number() }).safeParse({ CHUNK_SIZE: "big" });
    if (result.success) throw new Error("expected a validation failure");

    const lines = formatFatal(result.error);

    expect(lines[0]).toBe("Invalid configuration:");
    expect(lines[1]).toBe(`  CHUNK_SIZE: ${result.error.issues[0]?.message ?? ""}`);
    expect(lines[2]).toBe(ENV_HINT);
  });
});

describe("formatIngestFailure", () => {
  it("does not repeat the hint formatFatal already added", () => {
    expect(formatIngestFailure(new ConfigurationError("OPENROUTER_API_KEY is not set."))).toEqual([
      "Error: OPENROUTER_API_KEY is not set.",
      ENV_HINT,
    ]);
  });

  it("adds the hint to operational failures", () => {
    expect(
      formatIngestFailure(new ExternalServiceError("Detector unreachable", "table-detector")),
    ).toEqual(["Error: Detector unreachable", ENV_HINT]);
  });
});
