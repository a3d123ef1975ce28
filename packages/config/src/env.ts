import { z } from "zod";
import type { AppConfig } from "@tablelens/types";
import { ConfigurationError } from "@tablelens/errors";

const intFromEnv = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Model provider ----------
    OPENROUTER_API_KEY: z.string().optional(),
    OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
    LLM_MODEL: z.string().min(1).default("openai/gpt-4o-mini"),
    VLM_MODEL: z.string().min(1).default("openai/gpt-4o-mini"),
    REQUEST_TIMEOUT_MS: intFromEnv("60000"),
    MAX_RETRIES: z
      .string()
      .default("2")
      .transform(Number)
      .pipe(z.number().int().nonnegative()),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
    EMBEDDING_MODEL: z.string().min(1).default("openai/text-embedding-3-small"),
    EMBEDDING_DIMENSIONS: intFromEnv("1536"),
    COHERE_API_KEY: z.string().optional(),

    // ---------- Table detection ----------
    DETECTOR_URL: z.string().url().default("http://localhost:8000"),
    DETECTOR_CONFIDENCE: z
      .string()
      .default("0.25")
      .transform(Number)
      .pipe(z.number().min(0).max(1)),
    RENDER_SCALE: z
      .string()
      .default("2")
      .transform(Number)
      .pipe(z.number().min(2, "RENDER_SCALE must be at least 2")),

    // ---------- Chunking ----------
    CHUNK_STRATEGY: z.enum(["sentence", "fixed"]).default("sentence"),
    CHUNK_SIZE: intFromEnv("1024"),
    CHUNK_OVERLAP: z
      .string()
      .default("200")
      .transform(Number)
      .pipe(z.number().int().nonnegative()),

    // ---------- Summarizer / retrieval ----------
    SUMMARIZER_CONCURRENCY: intFromEnv("5"),
    RETRIEVAL_TOP_K: intFromEnv("15"),

    // ---------- Paths ----------
    PDF_PATH: z.string().min(1).default("data/report.pdf"),
    TABLE_OUTPUT_DIR: z.string().min(1).default("data/processed_tables"),
    PERSIST_DIR: z.string().min(1).default("./storage"),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be less than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    provider: {
      apiKey: parsed.OPENROUTER_API_KEY ?? "",
      baseUrl: parsed.OPENROUTER_BASE_URL,
      llmModel: parsed.LLM_MODEL,
      vlmModel: parsed.VLM_MODEL,
      requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
      maxRetries: parsed.MAX_RETRIES,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      cohereApiKey: parsed.COHERE_API_KEY ?? "",
    },

    detector: {
      url: parsed.DETECTOR_URL,
      confidence: parsed.DETECTOR_CONFIDENCE,
      renderScale: parsed.RENDER_SCALE,
    },

    chunking: {
      strategy: parsed.CHUNK_STRATEGY,
      maxTokens: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },

    summarizer: {
      concurrency: parsed.SUMMARIZER_CONCURRENCY,
    },

    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
    },

    paths: {
      pdfPath: parsed.PDF_PATH,
      tableOutputDir: parsed.TABLE_OUTPUT_DIR,
      persistDir: parsed.PERSIST_DIR,
    },
  };
}

/**
 * Fail fast when a command needs the model provider but no credential is set.
 */
export function requireProviderCredential(config: AppConfig): void {
  if (config.provider.apiKey.length === 0) {
    throw new ConfigurationError("OPENROUTER_API_KEY is not set. Add it to your .env file.");
  }
  if (config.embedding.provider === "cohere" && config.embedding.cohereApiKey.length === 0) {
    throw new ConfigurationError(
      "COHERE_API_KEY is required when EMBEDDING_PROVIDER is 'cohere'.",
    );
  }
}
