import type { VectorRecord } from "@docindex/types";
import { ValidationError } from "@docindex/errors";
import type {
  CollectionSettings,
  CollectionStats,
  IVectorStore,
  VectorMatch,
  VectorQuery,
} from "./vector-store.interface.js";

/**
 * One named collection on a store. The collection is created on first use;
 * a failed creation is retried on the next call.
 */
export class VectorIndex {
  private ready: Promise<void> | null = null;

  constructor(
    private readonly store: IVectorStore,
    readonly collectionName: string,
    private readonly settings: CollectionSettings,
  ) {}

  get dimensions(): number {
    return this.settings.dimensions;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    await this.ensure();
    await this.store.upsert(this.collectionName, records);
  }

  async query(query: VectorQuery): Promise<VectorMatch[]> {
    await this.ensure();
    return this.store.query(this.collectionName, query);
  }

  async fetch(ids: string[]): Promise<VectorRecord[]> {
    await this.ensure();
    return this.store.fetch(this.collectionName, ids);
  }

  async deleteAll(): Promise<void> {
    await this.store.deleteAll(this.collectionName);
    this.ready = null;
  }

  async stats(): Promise<CollectionStats> {
    await this.ensure();
    return this.store.stats(this.collectionName);
  }

  private ensure(): Promise<void> {
    if (!this.ready) {
      this.ready = this.store.ensureCollection(this.collectionName, this.settings).catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    return this.ready;
  }
}

const CONNECTOR_ID = /^[a-z0-9][a-z0-9-]*$/;

export function connectorCollectionName(connectorId: string): string {
  if (!CONNECTOR_ID.test(connectorId)) {
    throw new ValidationError("Invalid connector id", {
      connectorId: "must be lowercase letters, digits and dashes",
    });
  }
  return `${connectorId}-docs`;
}

/** Per-connector indexes, each in its own `${connectorId}-docs` collection. */
export class VectorIndexRegistry {
  private readonly indexes = new Map<string, VectorIndex>();

  constructor(
    private readonly store: IVectorStore,
    private readonly settings: CollectionSettings,
  ) {}

  forConnector(connectorId: string): VectorIndex {
    const existing = this.indexes.get(connectorId);
    if (existing) {
      return existing;
    }
    const index = new VectorIndex(this.store, connectorCollectionName(connectorId), this.settings);
    this.indexes.set(connectorId, index);
    return index;
  }

  async drop(connectorId: string): Promise<void> {
    await this.forConnector(connectorId).deleteAll();
    this.indexes.delete(connectorId);
  }

  list(): string[] {
    return [...this.indexes.keys()];
  }
}
