import type { JobProgress, ResearchReport, ResearchRequest, ResearchSection } from "@docindex/types";
import type { ICompletionProvider } from "@docindex/llm";
import type { IWebSearchProvider } from "@docindex/web-search";
import { CancelledError } from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import { fillTemplate, loadSections } from "./sections.js";

export const RESEARCH_SYSTEM_PROMPT = `You are a technical writer documenting how to build a data connector for an external platform.
Write production-grade research in Markdown.
Quote exact values from the documentation: OAuth scopes, permission names, rate limits.
Cite web search results inline as [web:1], [web:2].
Cover read and extraction paths only.
When something is not documented, write "N/A - not documented".`;

export const WEB_SEARCH_UNAVAILABLE = "Web search not available";

const WEB_RESULTS_PER_SECTION = 5;
const WEB_EXCERPT_LENGTH = 500;

export interface ResearchGeneratorOptions {
  llm: ICompletionProvider;
  /** `null` runs without web context. */
  webSearch: IWebSearchProvider | null;
  logger: Logger;
  sections?: readonly ResearchSection[];
  /** Pause between sections, to stay under provider rate limits. */
  sectionDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  onProgress?: (progress: JobProgress) => void;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function sectionHeading(section: ResearchSection): string {
  return `## ${section.number}. ${section.title}`;
}

/**
 * Writes a connector research report one section at a time: a live web
 * search for context, then one completion per section. A failed section is
 * reported inline and the run continues.
 */
export class ResearchGenerator {
  private readonly llm: ICompletionProvider;
  private readonly webSearch: IWebSearchProvider | null;
  private readonly logger: Logger;
  private readonly sections: readonly ResearchSection[];
  private readonly sectionDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(options: ResearchGeneratorOptions) {
    this.llm = options.llm;
    this.webSearch = options.webSearch;
    this.logger = options.logger;
    this.sections = options.sections ?? loadSections();
    this.sectionDelayMs = options.sectionDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  get sectionCount(): number {
    return this.sections.length;
  }

  async generate(request: ResearchRequest, options: GenerateOptions = {}): Promise<ResearchReport> {
    const { signal, onProgress } = options;
    const total = this.sections.length;
    const parts = [this.header(request)];
    let sectionsCompleted = 0;
    let sectionsFailed = 0;
    let phase: number | null = null;

    for (const [i, section] of this.sections.entries()) {
      if (i > 0 && this.sectionDelayMs > 0) {
        await this.sleep(this.sectionDelayMs);
      }
      // A cancel during the pause stops here.
      if (signal?.aborted) {
        throw new CancelledError(`Research for ${request.connectorId} cancelled`, {
          details: { completed: i, total },
        });
      }
      onProgress?.({ completed: i, total, current: `${section.number}. ${section.title}` });

      if (section.phase !== phase) {
        phase = section.phase;
        parts.push(`# Phase ${section.phase} - ${section.phaseName}`);
      }

      try {
        const body = await this.writeSection(section, request, signal);
        parts.push(`${sectionHeading(section)}\n\n${body.trim()}`);
        sectionsCompleted++;
      } catch (error: unknown) {
        if (signal?.aborted) {
          throw new CancelledError(`Research for ${request.connectorId} cancelled`, {
            details: { completed: i, total },
          });
        }
        sectionsFailed++;
        this.logger.error(
          { err: error, connectorId: request.connectorId, section: section.number },
          "Research section failed",
        );
        parts.push(`${sectionHeading(section)}\n\n**Error generating section:** ${errorMessage(error)}`);
      }
    }

    onProgress?.({ completed: total, total });
    parts.push(this.footer());

    this.logger.info(
      { connectorId: request.connectorId, sectionsCompleted, sectionsFailed },
      "Research report generated",
    );

    return {
      connectorId: request.connectorId,
      connectorName: request.connectorName,
      markdown: parts.join("\n\n"),
      sectionsCompleted,
      sectionsFailed,
      generatedAt: this.now().toISOString(),
    };
  }

  private async writeSection(
    section: ResearchSection,
    request: ResearchRequest,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    const webContext = await this.searchWeb(fillTemplate(section.searchQuery, request.connectorName));
    const questions = section.questions
      .map((question) => `- ${fillTemplate(question, request.connectorName)}`)
      .join("\n");

    const lines = [
      `Write section ${section.number}: ${section.title} of the research document for the ${request.connectorName} connector.`,
      `Phase: ${section.phaseName}`,
    ];
    if (request.description) {
      lines.push(`Connector description: ${request.description}`);
    }
    if (request.apiDocsUrl) {
      lines.push(`API documentation: ${request.apiDocsUrl}`);
    }
    lines.push(
      "",
      "Questions to answer:",
      questions,
      "",
      "Web search results:",
      webContext,
      "",
      `Use numbered subsection headers (${section.number}.1, ${section.number}.2) and tables where they help.`,
    );

    const result = await this.llm.complete(RESEARCH_SYSTEM_PROMPT, lines.join("\n"), {
      temperature: 0.3,
      maxTokens: 3000,
      signal,
    });
    return result.text;
  }

  private async searchWeb(query: string): Promise<string> {
    if (!this.webSearch) {
      return WEB_SEARCH_UNAVAILABLE;
    }
    try {
      const hits = await this.webSearch.search(query, {
        maxResults: WEB_RESULTS_PER_SECTION,
        depth: "advanced",
      });
      if (hits.length === 0) {
        return "No results found";
      }
      return hits
        .map(
          (hit, i) =>
            `[web:${i + 1}] ${hit.title}\nURL: ${hit.url}\nContent: ${hit.content.slice(0, WEB_EXCERPT_LENGTH)}`,
        )
        .join("\n\n");
    } catch (error: unknown) {
      this.logger.warn({ err: error, query }, "Research web search failed");
      return `Web search error: ${errorMessage(error)}`;
    }
  }

  private header(request: ResearchRequest): string {
    const lines = [
      `# Connector Research: ${request.connectorName}`,
      "",
      `**Connector ID:** ${request.connectorId}`,
      `**Generated:** ${this.now().toISOString().slice(0, 10)}`,
    ];
    if (request.description) {
      lines.push(`**Description:** ${request.description}`);
    }
    if (request.apiDocsUrl) {
      lines.push(`**API documentation:** ${request.apiDocsUrl}`);
    }
    return lines.join("\n");
  }

  private footer(): string {
    const web = this.webSearch ? `live web search (${this.webSearch.name})` : "no web search";
    return `## Sources and Methodology\n\nGenerated with ${web} and the ${this.llm.model} completion model.`;
  }
}
