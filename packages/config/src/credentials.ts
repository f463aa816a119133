import { ConfigurationError } from "@docindex/errors";
import type { AppConfig } from "@docindex/types";

export type ComponentName = "embeddings" | "vectorStore" | "webSearch" | "llm";

/**
 * Name of the environment variable each component is missing, or `null` when
 * the component can be constructed.
 */
export type CredentialReport = Record<ComponentName, string | null>;

export function checkCredentials(config: AppConfig): CredentialReport {
  const embeddingKey =
    config.embedding.provider === "openai"
      ? { name: "OPENAI_API_KEY", value: config.openai.apiKey }
      : { name: "COHERE_API_KEY", value: config.cohere.apiKey };

  return {
    embeddings: embeddingKey.value ? null : embeddingKey.name,
    vectorStore:
      config.vectorStore.provider === "qdrant" && !config.vectorStore.qdrantUrl
        ? "QDRANT_URL"
        : null,
    webSearch: config.webSearch.tavilyApiKey ? null : "TAVILY_API_KEY",
    llm: config.openai.apiKey ? null : "OPENAI_API_KEY",
  };
}

/**
 * Return the credential or throw a {@link ConfigurationError} naming the
 * variable. Used by component factories at construction time.
 */
export function requireCredential(value: string | undefined, variable: string): string {
  if (value === undefined || value === "") {
    throw new ConfigurationError(`${variable} is required`, { details: { variable } });
  }
  return value;
}
