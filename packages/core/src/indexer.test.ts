import { describe, it, expect, vi } from "vitest";
import type { Chunk, NormalizedDocument } from "@docindex/types";
import { DocumentChunker, HeuristicTokenCounter } from "@docindex/chunker";
import { InMemoryVectorStore, VectorIndex } from "@docindex/vector-store";
import { CancelledError } from "@docindex/errors";
import { Indexer } from "./indexer.js";
import { chunkPayload } from "./payload.js";
import { KeywordEmbeddings, silentLogger } from "./test-fakes.js";

// Heuristic counter: 32 characters = 8 tokens, so every paragraph is its own chunk
const PARAGRAPHS = Array.from({ length: 5 }, (_, i) =>
  `Paragraph ${String(i)} covers invoices.`.padEnd(32, "x"),
);

function doc(sourceId: string, text: string): NormalizedDocument {
  return {
    sourceId,
    text,
    metadata: { sourceType: "doc", sourceFile: sourceId, docCategory: "GENERAL", objectType: "General" },
  };
}

function setup(options: { batchSize?: number; failOn?: string } = {}) {
  const embeddings = new KeywordEmbeddings(["invoice", "customer", "search"], options.failOn);
  const index = new VectorIndex(new InMemoryVectorStore(), "knowledge-docs", {
    dimensions: 3,
    metric: "cosine",
  });
  const sleep = vi.fn().mockResolvedValue(undefined);
  const indexer = new Indexer({
    chunker: new DocumentChunker({ chunkSize: 10, overlap: 0, counter: new HeuristicTokenCounter() }),
    embeddings,
    index,
    logger: silentLogger(),
    batchSize: options.batchSize ?? 100,
    batchDelayMs: 50,
    sleep,
  });
  return { embeddings, index, sleep, indexer };
}

describe("Indexer", () => {
  it("embeds in batches and pauses only between batches", async () => {
    const { embeddings, sleep, indexer } = setup({ batchSize: 2 });

    const written = await indexer.indexDocument(doc("guide.pdf", PARAGRAPHS.join("\n\n")));

    expect(written).toBe(5);
    expect(embeddings.calls.map((batch) => batch.length)).toEqual([2, 2, 1]);
    expect(embeddings.calls[0]).toEqual([PARAGRAPHS[0], PARAGRAPHS[1]]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(50);
  });

  it("pairs each vector with its own chunk", async () => {
    const { embeddings, index, indexer } = setup();
    const document = doc("mixed.pdf", "Customer records guide.");

    await indexer.indexDocument(document);

    const [record] = await index.fetch(
      (await index.query({ vector: [0, 1, 0], topK: 1 })).map((m) => m.id),
    );
    expect(record?.vector).toEqual(embeddings.vectorFor("Customer records guide."));
    expect(record?.payload["text"]).toBe("Customer records guide.");
  });

  it("re-indexing an unchanged document does not add records", async () => {
    const { index, indexer } = setup();
    const document = doc("guide.pdf", PARAGRAPHS.join("\n\n"));

    await indexer.indexDocument(document);
    await indexer.indexDocument(document);

    expect(await index.stats()).toEqual({ count: 5, dimensions: 3 });
  });

  it("counts a failing document and carries on", async () => {
    const { indexer } = setup({ failOn: "boom" });

    const stats = await indexer.indexAll([
      doc("a.pdf", "Invoice basics."),
      doc("b.pdf", "This one goes boom."),
      doc("c.pdf", "Customer search."),
    ]);

    expect(stats).toMatchObject({
      documentsProcessed: 3,
      chunksCreated: 2,
      vectorsUpserted: 2,
      errors: 1,
      totalTokens: 2,
    });
  });

  it("stops after maxDocuments", async () => {
    const { indexer } = setup();
    const stats = await indexer.indexAll(
      [doc("a.pdf", "Invoice basics."), doc("b.pdf", "Search basics."), doc("c.pdf", "More.")],
      { maxDocuments: 2 },
    );
    expect(stats.documentsProcessed).toBe(2);
  });

  it("raises CancelledError when the signal is aborted", async () => {
    const { indexer } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      indexer.indexAll([doc("a.pdf", "Invoice basics.")], { signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
  });

  it("deleteAll empties the index", async () => {
    const { index, indexer } = setup();
    await indexer.indexDocument(doc("a.pdf", "Invoice basics."));
    await indexer.deleteAll();
    expect(await index.stats()).toEqual({ count: 0, dimensions: 3 });
  });
});

describe("chunkPayload", () => {
  it("flattens provenance, truncates text and keeps typed fields over extras", () => {
    const chunk: Chunk = {
      id: "c1",
      text: "x".repeat(1500),
      tokenCount: 375,
      metadata: {
        sourceType: "code",
        sourceFile: "Client.java",
        docCategory: "CODE",
        objectType: "General",
        language: "java",
        codeType: "class",
        component: "core",
        extra: { sourceFile: "shadow", methodCount: 4 },
        chunkIndex: 0,
        totalChunks: 1,
      },
    };

    const payload = chunkPayload(chunk);

    expect(payload).toEqual({
      sourceType: "code",
      sourceFile: "Client.java",
      docCategory: "CODE",
      objectType: "General",
      language: "java",
      codeType: "class",
      component: "core",
      methodCount: 4,
      chunkIndex: 0,
      totalChunks: 1,
      text: "x".repeat(1000),
      tokenCount: 375,
    });
  });
});
