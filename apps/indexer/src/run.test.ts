import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import type { EmbeddingResult } from "@docindex/types";
import { parseEnv } from "@docindex/config";
import { createServices } from "@docindex/core";
import { InMemoryVectorStore } from "@docindex/vector-store";
import { ServiceUnavailableError } from "@docindex/errors";
import { createLogger } from "@docindex/logger";
import { discoverFiles } from "./discover.js";
import { CODE_EXTENSIONS, RESEARCH_EXTENSIONS, formatBreakdown, runIndex } from "./run.js";
import type { IndexCommandOptions } from "./run.js";

const logger = createLogger({ level: "silent", service: "test" });

const embeddings = {
  name: "constant",
  dimensions: 2,
  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  },
  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return { embeddings: texts.map(() => [1, 0]), model: "constant", tokensUsed: texts.length, dimensions: 2 };
  },
  async healthCheck(): Promise<boolean> {
    return true;
  },
};

let root = "";

function write(relative: string, content: string): void {
  const target = path.join(root, relative);
  mkdirSync(path.dirname(target), { recursive: true });
  writeFileSync(target, content);
}

beforeAll(() => {
  root = mkdtempSync(path.join(tmpdir(), "docindex-indexer-"));
  write(
    "Acme/InvoiceRecordType.java",
    "package com.acme.records;\n\npublic class InvoiceRecordType implements RecordType {\n  public String name() { return \"invoice\"; }\n}\n",
  );
  write("docs/01_objects/invoice.json", JSON.stringify({ metadata: { version: "1" }, fields: ["id", "total"] }));
  write("notes.md", "# Notes\n\nInvoices are exported nightly and reconciled against the ledger.\n");
  write("short.md", "# Tiny\n");
  write("README.md", "# Readme that should never be indexed, even though it is long enough.\n");
  write("package.json", "{}");
  write("node_modules/dep/Ignored.java", "public class Ignored { /* long enough to pass the size check */ }");
});

afterAll(() => {
  rmSync(root, { recursive: true, force: true });
});

function options(overrides: Partial<IndexCommandOptions> = {}): IndexCommandOptions {
  return { dir: root, source: "all", deleteAll: false, dryRun: false, ...overrides };
}

function services(withEmbeddings = true) {
  const config = parseEnv({ NODE_ENV: "test", VECTOR_STORE: "memory", EMBEDDING_DIMENSION: "2" });
  return createServices(config, logger, {
    embeddings: withEmbeddings ? embeddings : null,
    vectorStore: new InMemoryVectorStore(),
    sleep: async () => undefined,
  });
}

describe("discoverFiles", () => {
  it("lists files in path order and skips dependency folders and manifests", async () => {
    const files = await discoverFiles(root, new Set([...CODE_EXTENSIONS, ...RESEARCH_EXTENSIONS]));
    const found = files.map((file) => path.relative(root, file));

    expect(found).toEqual([
      path.join("Acme", "InvoiceRecordType.java"),
      path.join("docs", "01_objects", "invoice.json"),
      "notes.md",
      "short.md",
    ]);
  });
});

describe("runIndex", () => {
  it("prints the estimate on a dry run without embedding", async () => {
    const lines: string[] = [];
    const outcome = await runIndex(options({ dryRun: true }), services(false), {
      logger,
      print: (line) => lines.push(line),
    });

    expect(outcome.mode).toBe("dry-run");
    expect(lines[0]).toBe("Dry run (source: all)");
    expect(lines[1]).toBe("Documents: 3 (code: 1, research: 2)");
  });

  it("limits the dry run to one source kind", async () => {
    const outcome = await runIndex(options({ dryRun: true, source: "code" }), services(false), {
      logger,
      print: () => {},
    });

    expect(outcome.mode === "dry-run" && outcome.bySource).toEqual({ code: 1 });
  });

  it("indexes every discovered document", async () => {
    const container = services();
    const lines: string[] = [];
    const outcome = await runIndex(options(), container, { logger, print: (line) => lines.push(line) });

    expect(outcome.mode).toBe("index");
    if (outcome.mode !== "index") return;
    expect(outcome.stats.documentsProcessed).toBe(3);
    expect(outcome.stats.errors).toBe(0);
    const stats = await container.index?.stats();
    expect(stats?.count).toBe(outcome.stats.vectorsUpserted);
    expect(lines[0]).toBe("Documents processed: 3");
  });

  it("stops at --max-docs", async () => {
    const outcome = await runIndex(options({ maxDocs: 1 }), services(), { logger, print: () => {} });

    expect(outcome.mode === "index" && outcome.stats.documentsProcessed).toBe(1);
  });

  it("clears the collection first with --delete-all", async () => {
    const container = services();
    await container.index?.upsert([{ id: "stale", vector: [0, 1], payload: { text: "old" } }]);

    await runIndex(options({ deleteAll: true, source: "research" }), container, { logger, print: () => {} });

    expect(await container.index?.fetch(["stale"])).toEqual([]);
  });

  it("needs an embedding provider to index", async () => {
    await expect(runIndex(options(), services(false), { logger, print: () => {} })).rejects.toBeInstanceOf(
      ServiceUnavailableError,
    );
  });
});

describe("formatBreakdown", () => {
  it("lists non-zero counts in source order", () => {
    expect(formatBreakdown({ research: 2, doc: 1, web: 0 })).toBe("doc: 1, research: 2");
  });
});
