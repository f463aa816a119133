import type {
  ContextFormat,
  DocSource,
  MetadataFilter,
  RagAnswer,
  SearchResult,
  WebSearchResult,
  WebSource,
} from "@docindex/types";
import type { ICompletionProvider } from "@docindex/llm";
import type { Logger } from "@docindex/logger";
import { assembleContext, fromSearchResult, fromWebResult } from "./context-assembler.js";
import type { SearchService } from "./search-service.js";
import type { WebSearchCache } from "./web-search-cache.js";

export const NO_CONTEXT_ANSWER =
  "I couldn't find relevant documentation to answer this question. Please try rephrasing or make sure the documentation has been indexed.";

const PREVIEW_LENGTH = 500;

export const DEFAULT_SYSTEM_PROMPT = `You are a documentation assistant. Answer questions about APIs, objects, integrations and best practices using the provided context.

Guidelines:
1. Only answer from the provided context. If it does not contain the answer, say so.
2. Cite the source documents or URLs you relied on.
3. Include code examples for technical questions when the context supports them.
4. Call out limits, permissions and governance constraints precisely.`;

export interface AskOptions {
  topK?: number;
  filter?: MetadataFilter;
  /** Run a web search alongside the docs search. */
  includeWeb?: boolean;
  forceWebRefresh?: boolean;
}

export interface RagOrchestratorOptions {
  search: SearchService;
  llm: ICompletionProvider;
  logger: Logger;
  webCache?: WebSearchCache | null;
  format?: ContextFormat;
  systemPrompt?: string;
}

export function preview(context: string): string {
  return context.length > PREVIEW_LENGTH ? `${context.slice(0, PREVIEW_LENGTH)}...` : context;
}

function docSources(results: readonly SearchResult[]): DocSource[] {
  const seen = new Set<string>();
  const sources: DocSource[] = [];
  for (const result of results) {
    if (result.sourceType === "web" || seen.has(result.sourceFile)) continue;
    seen.add(result.sourceFile);
    sources.push({
      sourceFile: result.sourceFile,
      docCategory: result.docCategory,
      sourceType: result.sourceType,
      score: result.score,
    });
  }
  return sources;
}

function webSources(docs: readonly SearchResult[], web: readonly WebSearchResult[]): WebSource[] {
  const seen = new Set<string>();
  const sources: WebSource[] = [];
  const candidates = [
    ...docs.flatMap((r) =>
      r.sourceType === "web" && r.url ? [{ url: r.url, title: r.title ?? r.sourceFile, score: r.score }] : [],
    ),
    ...web.map((r) => ({ url: r.url, title: r.title, score: r.score })),
  ];
  for (const candidate of candidates) {
    if (seen.has(candidate.url)) continue;
    seen.add(candidate.url);
    sources.push(candidate);
  }
  return sources;
}

/** Retrieval-augmented answering with per-source attribution. */
export class RagOrchestrator {
  private readonly search: SearchService;
  private readonly llm: ICompletionProvider;
  private readonly logger: Logger;
  private readonly webCache: WebSearchCache | null;
  private readonly format: ContextFormat;
  private readonly systemPrompt: string;

  constructor(options: RagOrchestratorOptions) {
    this.search = options.search;
    this.llm = options.llm;
    this.logger = options.logger;
    this.webCache = options.webCache ?? null;
    this.format = options.format ?? "plain";
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
  }

  async ask(question: string, options: AskOptions = {}): Promise<RagAnswer> {
    const topK = options.topK ?? 5;
    const withWeb = options.includeWeb === true && this.webCache !== null;

    // With live web results requested, cached web records come from the cache instead
    const [docs, web] = await Promise.all([
      withWeb
        ? this.search.searchDocsOnly(question, { topK, filter: options.filter })
        : this.search.search(question, { topK, filter: options.filter }),
      withWeb && this.webCache
        ? this.webCache.search(question, { topK, forceRefresh: options.forceWebRefresh })
        : Promise.resolve(null),
    ]);

    const webResults = web?.results ?? [];
    if (docs.results.length === 0 && webResults.length === 0) {
      return { question, answer: NO_CONTEXT_ANSWER, docSources: [], webSources: [], contextPreview: "" };
    }

    const context = assembleContext(
      [...docs.results.map(fromSearchResult), ...webResults.map(fromWebResult)],
      this.format,
    );

    const completion = await this.llm.complete(
      this.systemPrompt,
      `Based on the following documentation context, answer the question.\n\nCONTEXT:\n${context}\n\nQUESTION: ${question}`,
      { temperature: 0.1 },
    );
    this.logger.debug(
      { docs: docs.results.length, web: webResults.length, tokensUsed: completion.tokensUsed },
      "Answered question",
    );

    return {
      question,
      answer: completion.text,
      docSources: docSources(docs.results),
      webSources: webSources(docs.results, webResults),
      contextPreview: preview(context),
    };
  }
}
