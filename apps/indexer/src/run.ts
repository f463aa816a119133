import type { ChunkingEstimate, IndexingStats, NormalizedDocument, SourceType } from "@docindex/types";
import { requireService } from "@docindex/core";
import type { ServiceContainer } from "@docindex/core";
import { CodeNormalizer, ResearchNormalizer, normalizeAll } from "@docindex/normalizer";
import type { NormalizeStats, SourceFile } from "@docindex/normalizer";
import type { Logger } from "@docindex/logger";
import { readSources } from "./discover.js";

export type SourceSelection = "code" | "research" | "all";

export const SOURCE_SELECTIONS: readonly SourceSelection[] = ["code", "research", "all"];

export const CODE_EXTENSIONS: ReadonlySet<string> = new Set([".java"]);
export const RESEARCH_EXTENSIONS: ReadonlySet<string> = new Set([".json", ".md"]);

const SOURCE_ORDER: readonly SourceType[] = ["doc", "code", "research", "web"];
const PROGRESS_EVERY = 50;

export interface IndexCommandOptions {
  dir: string;
  source: SourceSelection;
  maxDocs?: number;
  deleteAll: boolean;
  dryRun: boolean;
  /** Product name used in generated code descriptions. */
  subject?: string;
}

export type IndexOutcome =
  | {
      mode: "dry-run";
      bySource: Partial<Record<SourceType, number>>;
      estimate: ChunkingEstimate;
    }
  | {
      mode: "index";
      stats: IndexingStats;
      sources: NormalizeStats;
    };

export interface RunContext {
  logger: Logger;
  print: (line: string) => void;
  signal?: AbortSignal;
}

const describeSource = (source: SourceFile): string => source.path;

/** Normalized documents for the selected source kinds, code first. */
export async function* loadDocuments(
  options: Pick<IndexCommandOptions, "dir" | "source" | "subject">,
  logger: Logger,
  stats: NormalizeStats,
): AsyncGenerator<NormalizedDocument> {
  if (options.source !== "research") {
    yield* normalizeAll(
      new CodeNormalizer({ subject: options.subject }),
      readSources(options.dir, CODE_EXTENSIONS),
      logger,
      describeSource,
      stats,
    );
  }
  if (options.source !== "code") {
    yield* normalizeAll(
      new ResearchNormalizer(),
      readSources(options.dir, RESEARCH_EXTENSIONS),
      logger,
      describeSource,
      stats,
    );
  }
}

export function formatBreakdown(bySource: Partial<Record<SourceType, number>>): string {
  return SOURCE_ORDER.flatMap((type) => {
    const count = bySource[type];
    return count ? [`${type}: ${String(count)}`] : [];
  }).join(", ");
}

export async function runIndex(
  options: IndexCommandOptions,
  services: ServiceContainer,
  context: RunContext,
): Promise<IndexOutcome> {
  const { logger, print, signal } = context;
  const sources: NormalizeStats = { sources: 0, documents: 0, skipped: 0 };

  if (options.dryRun) {
    const documents: NormalizedDocument[] = [];
    const bySource: Partial<Record<SourceType, number>> = {};
    for await (const document of loadDocuments(options, logger, sources)) {
      if (options.maxDocs !== undefined && documents.length >= options.maxDocs) {
        break;
      }
      documents.push(document);
      const type = document.metadata.sourceType;
      bySource[type] = (bySource[type] ?? 0) + 1;
    }
    const estimate = services.chunker.estimate(documents);

    print(`Dry run (source: ${options.source})`);
    print(`Documents: ${String(estimate.documents)} (${formatBreakdown(bySource)})`);
    print(`Characters: ${String(estimate.characters)}`);
    print(`Tokens: ${String(estimate.tokens)}`);
    print(`Estimated chunks: ${String(estimate.estimatedChunks)}`);
    return { mode: "dry-run", bySource, estimate };
  }

  const indexer = requireService(services, "indexer");
  if (options.deleteAll) {
    await indexer.deleteAll();
  }

  const stats = await indexer.indexAll(loadDocuments(options, logger, sources), {
    maxDocuments: options.maxDocs,
    signal,
    onProgress: (processed) => {
      if (processed % PROGRESS_EVERY === 0) {
        logger.info({ processed }, "Indexing progress");
      }
    },
  });
  const collection = await indexer.stats();

  print(`Documents processed: ${String(stats.documentsProcessed)}`);
  print(`Vectors upserted: ${String(stats.vectorsUpserted)}`);
  print(`Errors: ${String(stats.errors)}`);
  print(`Sources skipped: ${String(sources.skipped)}`);
  print(`Collection size: ${String(collection.count)}`);
  return { mode: "index", stats, sources };
}
