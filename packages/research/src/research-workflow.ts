import type {
  JobProgress,
  NormalizedDocument,
  ResearchJobResult,
  ResearchReport,
  ResearchRequest,
} from "@docindex/types";
import type { DocumentChunker } from "@docindex/chunker";
import type { IEmbeddingProvider } from "@docindex/embeddings";
import type { VectorIndexRegistry } from "@docindex/vector-store";
import { Indexer } from "@docindex/core";
import { CancelledError } from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import type { ResearchGenerator } from "./research-generator.js";

export interface ResearchWorkflowOptions {
  generator: ResearchGenerator;
  chunker: DocumentChunker;
  embeddings: IEmbeddingProvider;
  registry: VectorIndexRegistry;
  logger: Logger;
  batchSize?: number;
  batchDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ResearchRunOptions {
  signal?: AbortSignal;
  onProgress?: (progress: JobProgress) => void;
}

export function reportDocument(report: ResearchReport): NormalizedDocument {
  const sourceFile = `${report.connectorId}-research.md`;
  return {
    sourceId: sourceFile,
    text: report.markdown,
    metadata: {
      sourceType: "research",
      format: "markdown",
      sourceFile,
      docCategory: "RESEARCH",
      objectType: "General",
      connectorId: report.connectorId,
      connectorName: report.connectorName,
      extra: { generatedAt: report.generatedAt },
    },
  };
}

/** Generate a connector report, then index it into that connector's collection. */
export class ResearchWorkflow {
  constructor(private readonly options: ResearchWorkflowOptions) {}

  async run(request: ResearchRequest, runOptions: ResearchRunOptions = {}): Promise<ResearchJobResult> {
    const { generator, chunker, embeddings, registry, logger } = this.options;
    const report = await generator.generate(request, runOptions);

    if (runOptions.signal?.aborted) {
      throw new CancelledError(`Research for ${request.connectorId} cancelled before indexing`);
    }

    const indexer = new Indexer({
      chunker,
      embeddings,
      index: registry.forConnector(request.connectorId),
      logger,
      batchSize: this.options.batchSize,
      batchDelayMs: this.options.batchDelayMs,
      sleep: this.options.sleep,
    });
    const vectorsUpserted = await indexer.indexDocument(reportDocument(report));

    logger.info({ connectorId: request.connectorId, vectorsUpserted }, "Research report indexed");
    return { report, vectorsUpserted };
  }
}
