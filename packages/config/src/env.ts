import { z } from "zod";
import type { AppConfig } from "@docindex/types";

// Unset and blank both mean "not configured"
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value !== undefined && value.trim() !== "" ? value.trim() : undefined));

const boost = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().positive().max(10));

/**
 * Zod schema for every recognized environment variable.
 * Each option has a default; credentials are optional here and checked per
 * component by {@link checkCredentials}.
 */
export const envSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // ---------- Credentials ----------
  OPENAI_API_KEY: optionalSecret,
  COHERE_API_KEY: optionalSecret,
  TAVILY_API_KEY: optionalSecret,
  QDRANT_URL: optionalSecret,
  QDRANT_API_KEY: optionalSecret,

  // ---------- Embeddings ----------
  EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  EMBEDDING_DIMENSION: z
    .string()
    .default("1536")
    .transform(Number)
    .pipe(z.number().int().positive()),

  // ---------- Vector index ----------
  VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
  VECTOR_INDEX_NAME: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]*$/, "VECTOR_INDEX_NAME must be lowercase letters, digits and dashes")
    .default("knowledge-docs"),
  SIMILARITY_METRIC: z.enum(["cosine", "dot", "euclidean"]).default("cosine"),

  // ---------- Chunking / indexing ----------
  CHUNK_SIZE: z.string().default("1000").transform(Number).pipe(z.number().int().positive()),
  CHUNK_OVERLAP: z.string().default("200").transform(Number).pipe(z.number().int().nonnegative()),
  TOKENIZER_ENCODING: z.string().min(1).default("cl100k_base"),
  BATCH_SIZE: z.string().default("100").transform(Number).pipe(z.number().int().positive()),
  BATCH_DELAY_MS: z
    .string()
    .default("100")
    .transform(Number)
    .pipe(z.number().int().nonnegative()),

  // ---------- Web search ----------
  WEB_CACHE_DAYS: z.string().default("7").transform(Number).pipe(z.number().positive()),
  WEB_SEARCH_QUERY_PREFIX: z.string().default(""),

  // ---------- LLM ----------
  LLM_MODEL: z.string().min(1).default("gpt-4o"),
  RESEARCH_MODEL: z.string().min(1).default("gpt-4o"),

  // ---------- Retrieval ----------
  SUMMARY_CONCURRENCY: z
    .string()
    .default("5")
    .transform(Number)
    .pipe(z.number().int().positive()),
  MAX_SUMMARIES: z.string().default("5").transform(Number).pipe(z.number().int().nonnegative()),
  SCORE_BOOST_DOC: boost("1.0"),
  SCORE_BOOST_CODE: boost("1.3"),
  SCORE_BOOST_RESEARCH: boost("1.25"),
  SCORE_BOOST_WEB: boost("1.1"),
});

const refinedEnvSchema = envSchema.refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
  message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
  path: ["CHUNK_OVERLAP"],
});

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = refinedEnvSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    openai: {
      apiKey: parsed.OPENAI_API_KEY,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL,
      dimensions: parsed.EMBEDDING_DIMENSION,
    },

    vectorStore: {
      provider: parsed.VECTOR_STORE,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
      indexName: parsed.VECTOR_INDEX_NAME,
      metric: parsed.SIMILARITY_METRIC,
    },

    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
      encoding: parsed.TOKENIZER_ENCODING,
    },

    indexing: {
      batchSize: parsed.BATCH_SIZE,
      batchDelayMs: parsed.BATCH_DELAY_MS,
    },

    webSearch: {
      tavilyApiKey: parsed.TAVILY_API_KEY,
      cacheDays: parsed.WEB_CACHE_DAYS,
      queryPrefix: parsed.WEB_SEARCH_QUERY_PREFIX,
    },

    llm: {
      model: parsed.LLM_MODEL,
      researchModel: parsed.RESEARCH_MODEL,
    },

    retrieval: {
      summaryConcurrency: parsed.SUMMARY_CONCURRENCY,
      maxSummaries: parsed.MAX_SUMMARIES,
      boosts: {
        doc: parsed.SCORE_BOOST_DOC,
        code: parsed.SCORE_BOOST_CODE,
        research: parsed.SCORE_BOOST_RESEARCH,
        web: parsed.SCORE_BOOST_WEB,
      },
    },
  };
}
