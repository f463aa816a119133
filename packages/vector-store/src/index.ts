import type { VectorStoreName } from "@docindex/types";
import { ConfigurationError } from "@docindex/errors";
import type { RetryOptions } from "@docindex/errors";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { InMemoryVectorStore } from "./memory-adapter.js";

export type {
  IVectorStore,
  CollectionSettings,
  CollectionStats,
  VectorMatch,
  VectorQuery,
} from "./vector-store.interface.js";
export { QdrantVectorStore, toPointId, toQdrantFilter } from "./qdrant-adapter.js";
export type { QdrantApi, QdrantStoreConfig } from "./qdrant-adapter.js";
export { InMemoryVectorStore, similarity } from "./memory-adapter.js";
export { VectorIndex, VectorIndexRegistry, connectorCollectionName } from "./vector-index.js";
export { eq, ne, and, flattenFilter, matchesFilter } from "./filter.js";
export { toPayload } from "./payload.js";

export interface VectorStoreFactoryConfig {
  provider: VectorStoreName;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  retry?: RetryOptions;
}

export function createVectorStore(config: VectorStoreFactoryConfig): IVectorStore {
  switch (config.provider) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new ConfigurationError("QDRANT_URL is required for the qdrant vector store");
      }
      return new QdrantVectorStore({
        url: config.qdrantUrl,
        apiKey: config.qdrantApiKey,
        retry: config.retry,
      });
    case "memory":
      return new InMemoryVectorStore();
    default:
      throw new ConfigurationError(`Unknown vector store: ${String(config.provider)}`);
  }
}
