import { describe, it, expect } from "vitest";
import { ValidationError } from "@tablelens/errors";
import type { AppConfig } from "@tablelens/types";
import { applyOverrides, parseCliArgs } from "./args.js";

describe("parseCliArgs", () => {
  it("parses each command", () => {
    expect(parseCliArgs(["--ingest"]).command).toEqual({ kind: "ingest" });
    expect(parseCliArgs(["--app"]).command).toEqual({ kind: "app" });
    expect(parseCliArgs(["--query", "  What were net sales?  "]).command).toEqual({
      kind: "query",
      question: "What were net sales?",
    });
    expect(parseCliArgs(["-h"]).command).toEqual({ kind: "help" });
  });

  it("collects path overrides", () => {
    const args = parseCliArgs(["--ingest", "--pdf", "in/report.pdf", "--storage", "out/index"]);

    expect(args.overrides).toEqual({
      pdfPath: "in/report.pdf",
      tableOutputDir: undefined,
      persistDir: "out/index",
    });
  });

  it("requires exactly one command", () => {
    expect(() => parseCliArgs([])).toThrow(ValidationError);
    expect(() => parseCliArgs(["--ingest", "--app"])).toThrow(
      "Choose exactly one of --ingest, --app or --query",
    );
  });

  it("rejects an empty question", () => {
    expect(() => parseCliArgs(["--query", "   "])).toThrow("--query needs a question");
  });

  it("rejects unknown options", () => {
    expect(() => parseCliArgs(["--ingest", "--verbose"])).toThrow(ValidationError);
  });
});

describe("applyOverrides", () => {
  it("replaces only the given paths", () => {
    const config: AppConfig = {
      ...baseConfig(),
      paths: { pdfPath: "data/report.pdf", tableOutputDir: "data/tables", persistDir: "./storage" },
    };

    const result = applyOverrides(config, { persistDir: "/tmp/index" });

    expect(result.paths).toEqual({
      pdfPath: "data/report.pdf",
      tableOutputDir: "data/tables",
      persistDir: "/tmp/index",
    });
  });
});

function baseConfig(): AppConfig {
  return {
    nodeEnv: "test",
    logLevel: "info",
    provider: {
      apiKey: "test-key",
      baseUrl: "http://localhost:4000/v1",
      llmModel: "test-llm",
      vlmModel: "test-vlm",
      requestTimeoutMs: 1000,
      maxRetries: 0,
    },
    embedding: { provider: "openai", model: "test-embed", dimensions: 8, cohereApiKey: "" },
    detector: { url: "http://localhost:8000", confidence: 0.25, renderScale: 2 },
    chunking: { strategy: "sentence", maxTokens: 1024, overlap: 200 },
    summarizer: { concurrency: 5 },
    retrieval: { topK: 15 },
    paths: { pdfPath: "", tableOutputDir: "", persistDir: "" },
  };
}
