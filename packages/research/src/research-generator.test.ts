import { describe, it, expect, vi } from "vitest";
import type { JobProgress, ResearchSection } from "@docindex/types";
import { CancelledError } from "@docindex/errors";
import { ResearchGenerator, WEB_SEARCH_UNAVAILABLE } from "./research-generator.js";
import { loadSections } from "./sections.js";
import { ScriptedCompletion, StubWebSearch, silentLogger } from "./test-fakes.js";

const sections: ResearchSection[] = [
  {
    number: 1,
    title: "Overview",
    phase: 1,
    phaseName: "Platform",
    searchQuery: "{connector} API Overview documentation",
    questions: ["What does {connector} do?"],
  },
  {
    number: 2,
    title: "Sandbox",
    phase: 1,
    phaseName: "Platform",
    searchQuery: "{connector} API Sandbox documentation",
    questions: ["Does {connector} have a sandbox?"],
  },
  {
    number: 3,
    title: "Authentication",
    phase: 2,
    phaseName: "Access",
    searchQuery: "{connector} API Authentication documentation",
    questions: ["Which scopes does {connector} need?"],
  },
];

const request = { connectorId: "acme", connectorName: "Acme" };
const fixedNow = () => new Date("2026-03-01T12:00:00.000Z");

function generator(
  llm: ScriptedCompletion,
  webSearch: StubWebSearch | null = new StubWebSearch([]),
  sleep = vi.fn(async (_ms: number) => {}),
) {
  return new ResearchGenerator({
    llm,
    webSearch,
    logger: silentLogger(),
    sections,
    sleep,
    now: fixedNow,
  });
}

describe("ResearchGenerator", () => {
  it("writes every section under its phase heading", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const llm = new ScriptedCompletion(() => "  body text  ");

    const report = await generator(llm, null, sleep).generate(request);

    expect(report.sectionsCompleted).toBe(3);
    expect(report.sectionsFailed).toBe(0);
    expect(report.generatedAt).toBe("2026-03-01T12:00:00.000Z");
    expect(report.markdown.startsWith("# Connector Research: Acme\n\n**Connector ID:** acme\n**Generated:** 2026-03-01")).toBe(true);
    expect(report.markdown).toContain(
      "# Phase 1 - Platform\n\n## 1. Overview\n\nbody text\n\n## 2. Sandbox\n\nbody text\n\n# Phase 2 - Access\n\n## 3. Authentication\n\nbody text",
    );
    expect(report.markdown.split("# Phase 1 - Platform")).toHaveLength(2);
    expect(sleep.mock.calls).toEqual([[1000], [1000]]);
  });

  it("builds the prompt from the questions and the web results", async () => {
    const web = new StubWebSearch([
      { url: "https://acme.test/docs", title: "Acme docs", content: "Acme syncs invoices.", score: 0.9 },
    ]);
    const llm = new ScriptedCompletion(() => "ok");

    await generator(llm, web).generate(request);

    expect(web.queries[0]).toEqual({
      query: "Acme API Overview documentation",
      options: { maxResults: 5, depth: "advanced" },
    });
    const first = llm.calls[0]!;
    expect(first.user).toContain("Write section 1: Overview of the research document for the Acme connector.");
    expect(first.user).toContain("Questions to answer:\n- What does Acme do?");
    expect(first.user).toContain("[web:1] Acme docs\nURL: https://acme.test/docs\nContent: Acme syncs invoices.");
    expect(first.options).toMatchObject({ temperature: 0.3, maxTokens: 3000 });
  });

  it("notes missing or failing web search in the prompt", async () => {
    const offline = new ScriptedCompletion(() => "ok");
    const report = await generator(offline, null).generate(request);
    expect(offline.calls[0]!.user).toContain(`Web search results:\n${WEB_SEARCH_UNAVAILABLE}`);
    expect(report.markdown).toContain("Generated with no web search and the scripted-1 completion model.");

    const broken = new ScriptedCompletion(() => "ok");
    await generator(broken, new StubWebSearch(new Error("boom"))).generate(request);
    expect(broken.calls[0]!.user).toContain("Web search results:\nWeb search error: boom");
  });

  it("reports a failed section inline and keeps going", async () => {
    const llm = new ScriptedCompletion((user) => {
      if (user.includes("Write section 2:")) {
        throw new Error("quota exceeded");
      }
      return "fine";
    });

    const report = await generator(llm).generate(request);

    expect(report.sectionsCompleted).toBe(2);
    expect(report.sectionsFailed).toBe(1);
    expect(report.markdown).toContain("## 2. Sandbox\n\n**Error generating section:** quota exceeded");
    expect(report.markdown).toContain("## 3. Authentication\n\nfine");
  });

  it("stops between sections once cancelled", async () => {
    const controller = new AbortController();
    const llm = new ScriptedCompletion(() => {
      controller.abort();
      return "partial";
    });

    await expect(generator(llm).generate(request, { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(llm.calls).toHaveLength(1);
  });

  it("makes no further calls when cancelled during the pause", async () => {
    const controller = new AbortController();
    const web = new StubWebSearch([]);
    const llm = new ScriptedCompletion(() => "ok");
    const sleep = vi.fn(async (_ms: number) => {
      controller.abort();
    });

    await expect(
      generator(llm, web, sleep).generate(request, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(web.queries).toHaveLength(1);
    expect(llm.calls).toHaveLength(1);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("reports progress before each section and at the end", async () => {
    const progress: JobProgress[] = [];
    await generator(new ScriptedCompletion(() => "ok")).generate(request, {
      onProgress: (p) => progress.push(p),
    });

    expect(progress).toEqual([
      { completed: 0, total: 3, current: "1. Overview" },
      { completed: 1, total: 3, current: "2. Sandbox" },
      { completed: 2, total: 3, current: "3. Authentication" },
      { completed: 3, total: 3 },
    ]);
  });
});

describe("loadSections", () => {
  it("loads the numbered section catalogue", () => {
    const loaded = loadSections();
    expect(loaded.map((s) => s.number)).toEqual(Array.from({ length: 18 }, (_, i) => i + 1));
    expect(loaded.every((s) => s.searchQuery.includes("{connector}"))).toBe(true);
  });
});
