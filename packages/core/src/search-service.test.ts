import { describe, it, expect } from "vitest";
import type { SourceType } from "@docindex/types";
import { InMemoryVectorStore, VectorIndex, VectorIndexRegistry, eq } from "@docindex/vector-store";
import { ServiceUnavailableError } from "@docindex/errors";
import { RetrievalRanker } from "./retrieval-ranker.js";
import { SearchService } from "./search-service.js";
import { KeywordEmbeddings, silentLogger } from "./test-fakes.js";

const settings = { dimensions: 3, metric: "cosine" as const };

function record(id: string, sourceType: SourceType, docCategory = "GENERAL") {
  return {
    id,
    vector: [1, 0, 0],
    payload: { sourceType, sourceFile: `${id}.txt`, docCategory, objectType: "General", text: id },
  };
}

async function setup() {
  const store = new InMemoryVectorStore();
  const index = new VectorIndex(store, "knowledge-docs", settings);
  await index.upsert([record("doc-1", "doc", "REST"), record("web-1", "web"), record("code-1", "code")]);
  const registry = new VectorIndexRegistry(store, settings);
  await registry.forConnector("shopify").upsert([record("shopify-1", "research")]);
  await registry.forConnector("hubspot").upsert([record("hubspot-1", "research")]);

  const service = new SearchService({
    ranker: new RetrievalRanker({
      embeddings: new KeywordEmbeddings(["invoice", "customer", "search"]),
      logger: silentLogger(),
    }),
    index,
    registry,
  });
  return service;
}

describe("SearchService", () => {
  it("search returns every source type", async () => {
    const service = await setup();
    const response = await service.search("invoice", { topK: 10 });
    expect(response.query).toBe("invoice");
    expect(response.totalResults).toBe(3);
  });

  it("searchDocsOnly excludes web records and keeps the caller's filter", async () => {
    const service = await setup();

    const all = await service.searchDocsOnly("invoice", { topK: 10 });
    expect(all.results.map((r) => r.sourceType).sort()).toEqual(["code", "doc"]);

    const rest = await service.searchDocsOnly("invoice", { topK: 10, filter: eq("docCategory", "REST") });
    expect(rest.results.map((r) => r.chunkId)).toEqual(["doc-1"]);
  });

  it("searchWebOnly returns only web records", async () => {
    const service = await setup();
    const response = await service.searchWebOnly("invoice", { topK: 10 });
    expect(response.results.map((r) => r.chunkId)).toEqual(["web-1"]);
  });

  it("searchConnectors spans the per-connector indexes", async () => {
    const service = await setup();
    const response = await service.searchConnectors(["shopify", "hubspot"], "invoice", { topK: 10 });
    expect(response.results.map((r) => r.chunkId).sort()).toEqual(["hubspot-1", "shopify-1"]);
  });

  it("a category filter returns only the matching chunks even when topK is larger", async () => {
    const store = new InMemoryVectorStore();
    const index = new VectorIndex(store, "knowledge-docs", settings);
    const records = Array.from({ length: 12 }, (_, i) =>
      record(`chunk-${String(i)}`, "doc", i === 3 || i === 8 ? "GOVERNANCE" : "REST"),
    );
    await index.upsert(records);
    const service = new SearchService({
      ranker: new RetrievalRanker({ embeddings: new KeywordEmbeddings(["invoice", "customer", "search"]), logger: silentLogger() }),
      index,
    });

    const response = await service.search("invoice", { topK: 5, filter: eq("docCategory", "GOVERNANCE") });

    expect(response.results.map((r) => r.chunkId).sort()).toEqual(["chunk-3", "chunk-8"]);
    expect(response.totalResults).toBe(2);
  });

  it("findSimilar returns the nearest other chunks, boosted", async () => {
    const index = new VectorIndex(new InMemoryVectorStore(), "knowledge-docs", settings);
    const placed = (id: string, sourceType: SourceType, vector: number[]) => ({ ...record(id, sourceType), vector });
    await index.upsert([
      placed("a", "doc", [1, 0, 0]),
      placed("b", "code", [0.8, 0.6, 0]),
      placed("c", "doc", [0, 1, 0]),
      placed("d", "doc", [0.6, 0.8, 0]),
    ]);
    const service = new SearchService({
      ranker: new RetrievalRanker({ embeddings: new KeywordEmbeddings(["invoice", "customer", "search"]), logger: silentLogger() }),
      index,
    });

    const response = await service.findSimilar("a", 2);

    expect(response.query).toBe("Similar to a");
    expect(response.results.map((r) => r.chunkId)).toEqual(["b", "d"]);
    expect(response.results[0]!.rawScore).toBeCloseTo(0.8);
    expect(response.results[0]!.score).toBe(1);
    expect(response.results[1]!.score).toBeCloseTo(0.6);
  });

  it("findSimilar returns nothing for an unknown chunk", async () => {
    const service = await setup();
    expect(await service.findSimilar("missing")).toEqual({ query: "Similar to missing", results: [], totalResults: 0 });
  });

  it("webSearch reports a missing web cache as unavailable", async () => {
    const service = await setup();
    await expect(service.webSearch("invoice")).rejects.toBeInstanceOf(ServiceUnavailableError);
  });

  it("stats reports the main index", async () => {
    const service = await setup();
    expect(await service.stats()).toEqual({ count: 3, dimensions: 3 });
  });
});
