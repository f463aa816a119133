import { describe, it, expect } from "vitest";
import type { NormalizedDocument } from "@docindex/types";
import { RecursiveChunker } from "./recursive-chunker.js";
import { DocumentChunker, detectSection } from "./document-chunker.js";
import { TiktokenCounter, type ITokenCounter } from "./token-counter.js";
import { chunkId } from "./chunk-id.js";

const wordCounter: ITokenCounter = {
  degraded: false,
  count: (text) => text.split(/\s+/).filter((word) => word.length > 0).length,
};

const charCounter: ITokenCounter = {
  degraded: false,
  count: (text) => text.length,
};

function words(from: number, to: number): string {
  const list: string[] = [];
  for (let i = from; i < to; i++) {
    list.push(`w${String(i)}`);
  }
  return list.join(" ");
}

describe("RecursiveChunker", () => {
  it("has strategy 'recursive'", () => {
    expect(new RecursiveChunker(wordCounter).strategy).toBe("recursive");
  });

  it("splits 2500 tokens into three overlapping chunks", () => {
    const chunker = new RecursiveChunker(wordCounter);

    const results = chunker.split(words(0, 2500), { chunkSize: 1000, overlap: 200 });

    expect(results).toEqual([words(0, 1000), words(800, 1800), words(1600, 2500)]);
    for (const chunk of results) {
      expect(wordCounter.count(chunk)).toBeLessThanOrEqual(1000);
    }
  });

  it("starts each chunk with the tail of the previous one", () => {
    const results = new RecursiveChunker(wordCounter).split(words(0, 2500), {
      chunkSize: 1000,
      overlap: 200,
    });

    const first = results[0]!.split(" ");
    const second = results[1]!.split(" ");
    expect(second.slice(0, 200)).toEqual(first.slice(-200));
  });

  it("returns text within budget as one unmodified chunk", () => {
    const text = "  Short text\n";

    expect(new RecursiveChunker(wordCounter).split(text, { chunkSize: 100, overlap: 10 })).toEqual([
      text,
    ]);
  });

  it("returns nothing for empty or blank text", () => {
    const chunker = new RecursiveChunker(wordCounter);

    expect(chunker.split("", { chunkSize: 10, overlap: 2 })).toEqual([]);
    expect(chunker.split(" \n\n ", { chunkSize: 10, overlap: 2 })).toEqual([]);
  });

  it("prefers paragraph boundaries", () => {
    const text = "aaa bbb\n\nccc ddd\n\neee fff";

    const results = new RecursiveChunker(wordCounter).split(text, { chunkSize: 3, overlap: 0 });

    expect(results).toEqual(["aaa bbb", "ccc ddd", "eee fff"]);
  });

  it("falls back to character splits when there is no separator", () => {
    const results = new RecursiveChunker(charCounter).split("abcdefghijklmnopqrstuvwxyz", {
      chunkSize: 10,
      overlap: 2,
    });

    expect(results).toEqual(["abcdefghij", "ijklmnopqr", "qrstuvwxyz"]);
  });

  it("is deterministic", () => {
    const chunker = new RecursiveChunker(wordCounter);
    const text = `${words(0, 300)}\n\n${words(300, 700)}. ${words(700, 900)}`;

    expect(chunker.split(text, { chunkSize: 120, overlap: 20 })).toEqual(
      chunker.split(text, { chunkSize: 120, overlap: 20 }),
    );
  });

  it("keeps every chunk within the token budget", () => {
    const counter = new TiktokenCounter();
    const paragraphs: string[] = [];
    for (let p = 0; p < 12; p++) {
      const sentences: string[] = [];
      for (let s = 0; s < 15; s++) {
        sentences.push(`Record type ${String(p)} exposes field ${String(s)} for saved searches.`);
      }
      paragraphs.push(sentences.join(" "));
    }

    const results = new RecursiveChunker(counter).split(paragraphs.join("\n\n"), {
      chunkSize: 100,
      overlap: 20,
    });

    expect(results.length).toBeGreaterThan(1);
    for (const chunk of results) {
      expect(counter.count(chunk)).toBeLessThanOrEqual(100);
    }
  });
});

describe("TiktokenCounter", () => {
  it("counts BPE tokens", () => {
    const counter = new TiktokenCounter("cl100k_base");

    expect(counter.count("hello world")).toBe(2);
    expect(counter.count("")).toBe(0);
    expect(counter.degraded).toBe(false);
  });

  it("falls back to length / 4 for an unknown encoding", () => {
    const counter = new TiktokenCounter("not-an-encoding");

    expect(counter.count("abcdefghij")).toBe(2);
    expect(counter.degraded).toBe(true);
  });
});

describe("chunkId", () => {
  it("hashes source, index and leading text", () => {
    expect(chunkId("guide.pdf", 0, "hello")).toBe("27b44c5ad1269f3aa1f00d8ab13950eb");
  });

  it("is pure and 32 hex characters long", () => {
    const id = chunkId("a.java", 3, "class A {}");

    expect(id).toMatch(/^[0-9a-f]{32}$/);
    expect(chunkId("a.java", 3, "class A {}")).toBe(id);
  });

  it("differs by index for identical text", () => {
    expect(chunkId("a.md", 0, "same")).not.toBe(chunkId("a.md", 1, "same"));
  });

  it("only uses the first 100 characters of text", () => {
    const prefix = "x".repeat(100);

    expect(chunkId("a.md", 0, `${prefix}one`)).toBe(chunkId("a.md", 0, `${prefix}two`));
  });
});

describe("DocumentChunker", () => {
  const doc: NormalizedDocument = {
    sourceId: "guide.pdf:p2",
    text: words(0, 2500),
    metadata: {
      sourceType: "doc",
      sourceFile: "guide.pdf",
      docCategory: "GOVERNANCE",
      objectType: "General",
      pageNumber: 2,
    },
  };

  it("attaches ids, token counts and positions", () => {
    const chunker = new DocumentChunker({ chunkSize: 1000, overlap: 200, counter: wordCounter });

    const chunks = chunker.chunk(doc);

    expect(chunks).toHaveLength(3);
    expect(chunks[1]!.id).toBe(chunkId("guide.pdf:p2", 1, words(800, 1800)));
    expect(chunks[1]!.tokenCount).toBe(1000);
    expect(chunks[2]!.tokenCount).toBe(900);
    expect(chunks[2]!.metadata).toEqual({
      ...doc.metadata,
      chunkIndex: 2,
      totalChunks: 3,
    });
  });

  it("labels research chunks with the section they contain", () => {
    const chunker = new DocumentChunker({ chunkSize: 1000, overlap: 0, counter: wordCounter });

    const [chunk] = chunker.chunk({
      sourceId: "acme_research.md",
      text: "# Acme\n\n## 4. Rate Limits\n\nAcme allows 10 requests per second.",
      metadata: {
        sourceType: "research",
        sourceFile: "acme_research.md",
        docCategory: "RESEARCH",
        objectType: "General",
        format: "markdown",
      },
    });

    expect(chunk!.metadata.sourceType === "research" && chunk!.metadata.section).toBe(
      "4. Rate Limits",
    );
  });

  it("estimates chunk counts with an overlap factor", () => {
    const chunker = new DocumentChunker({ chunkSize: 1000, overlap: 200, counter: wordCounter });

    expect(chunker.estimate([doc, { ...doc, text: words(0, 500) }])).toEqual({
      documents: 2,
      characters: doc.text.length + words(0, 500).length,
      tokens: 3000,
      estimatedChunks: 3,
    });
  });

  it("rejects overlap not smaller than chunk size", () => {
    expect(() => new DocumentChunker({ chunkSize: 100, overlap: 100, counter: wordCounter })).toThrow(
      RangeError,
    );
  });
});

describe("detectSection", () => {
  it("returns undefined without a numbered heading", () => {
    expect(detectSection("## Overview\ntext")).toBeUndefined();
    expect(detectSection("##  12.  Error Handling \nmore")).toBe("12. Error Handling");
  });
});
