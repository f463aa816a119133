import type { JobSnapshot, ResearchJobResult, ResearchRequest } from "@docindex/types";
import { loggedRetry, requireService } from "@docindex/core";
import type { ServiceContainer } from "@docindex/core";
import { OpenAICompletionProvider } from "@docindex/llm";
import type { ICompletionProvider } from "@docindex/llm";
import { connectorCollectionName } from "@docindex/vector-store";
import { ServiceUnavailableError } from "@docindex/errors";
import { createChildLogger } from "@docindex/logger";
import { JobSupervisor } from "./job-supervisor.js";
import { ResearchGenerator } from "./research-generator.js";
import { ResearchWorkflow } from "./research-workflow.js";

export type ResearchSnapshot = JobSnapshot<ResearchJobResult>;

/** Runs one research job per connector in the background. */
export class ResearchService {
  constructor(
    private readonly workflow: ResearchWorkflow,
    private readonly supervisor: JobSupervisor<ResearchJobResult>,
  ) {}

  start(request: ResearchRequest): ResearchSnapshot {
    connectorCollectionName(request.connectorId);
    return this.supervisor.start(request.connectorId, ({ signal, reportProgress }) =>
      this.workflow.run(request, { signal, onProgress: reportProgress }),
    );
  }

  cancel(connectorId: string): boolean {
    return this.supervisor.cancel(connectorId);
  }

  status(connectorId: string): ResearchSnapshot | undefined {
    return this.supervisor.get(connectorId);
  }

  wait(connectorId: string): Promise<ResearchSnapshot | undefined> {
    return this.supervisor.wait(connectorId);
  }

  list(): ResearchSnapshot[] {
    return this.supervisor.list();
  }

  shutdown(): Promise<void> {
    return this.supervisor.shutdown();
  }
}

export interface ResearchServiceOverrides {
  llm?: ICompletionProvider | null;
  sectionDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Build the research service on top of a container. Needs a completion model,
 * embeddings and a vector store; web search is optional. Running jobs are
 * cancelled when the container closes.
 */
export function createResearchServices(
  container: ServiceContainer,
  overrides: ResearchServiceOverrides = {},
): ResearchService {
  const { config, logger } = container;
  const llm =
    overrides.llm !== undefined
      ? overrides.llm
      : config.openai.apiKey
        ? new OpenAICompletionProvider({
            apiKey: config.openai.apiKey,
            model: config.llm.researchModel,
            retry: loggedRetry(createChildLogger(logger, { component: "research-llm" })),
          })
        : null;
  if (!llm) {
    throw new ServiceUnavailableError("research", "research is not initialized (set OPENAI_API_KEY)");
  }
  const embeddings = requireService(container, "embeddings");
  const registry = requireService(container, "connectorIndexes");

  const generator = new ResearchGenerator({
    llm,
    webSearch: container.webSearch,
    logger: createChildLogger(logger, { component: "research-generator" }),
    sectionDelayMs: overrides.sectionDelayMs,
    sleep: overrides.sleep,
  });
  const workflow = new ResearchWorkflow({
    generator,
    chunker: container.chunker,
    embeddings,
    registry,
    logger: createChildLogger(logger, { component: "research-workflow" }),
    batchSize: config.indexing.batchSize,
    batchDelayMs: config.indexing.batchDelayMs,
    sleep: overrides.sleep,
  });
  const supervisor = new JobSupervisor<ResearchJobResult>({
    logger: createChildLogger(logger, { component: "job-supervisor" }),
  });

  const service = new ResearchService(workflow, supervisor);
  container.onClose(() => service.shutdown());
  return service;
}
