import type { ContextFormat, SearchResult, WebSearchResult } from "@docindex/types";

export type ContextEntry =
  | { kind: "doc"; sourceFile: string; text: string }
  | { kind: "web"; title: string; url: string; text: string };

export const CONTEXT_SEPARATOR = "\n\n---\n\n";

export function fromSearchResult(result: SearchResult): ContextEntry {
  if (result.sourceType === "web" && result.url) {
    return { kind: "web", title: result.title ?? result.sourceFile, url: result.url, text: result.text };
  }
  return { kind: "doc", sourceFile: result.sourceFile, text: result.text };
}

export function fromWebResult(result: WebSearchResult): ContextEntry {
  return { kind: "web", title: result.title, url: result.url, text: result.content };
}

/**
 * Format retrieved entries for a completion prompt, with one attribution
 * line per entry.
 *
 * - plain: `[Doc Source: file]` / `[Web Source: title]` blocks split by `---`
 * - markdown: numbered `###` sections under a heading
 * - xml: `<document>` elements inside `<context>`
 */
export function assembleContext(entries: readonly ContextEntry[], format: ContextFormat = "plain"): string {
  if (entries.length === 0) return "";

  switch (format) {
    case "xml":
      return assembleXml(entries);
    case "markdown":
      return assembleMarkdown(entries);
    case "plain":
      return assemblePlain(entries);
  }
}

function assemblePlain(entries: readonly ContextEntry[]): string {
  const parts = entries.map((entry) =>
    entry.kind === "web"
      ? `[Web Source: ${entry.title}]\nURL: ${entry.url}\n${entry.text}`
      : `[Doc Source: ${entry.sourceFile}]\n${entry.text}`,
  );
  return parts.join(CONTEXT_SEPARATOR);
}

function assembleMarkdown(entries: readonly ContextEntry[]): string {
  const parts = entries.map((entry, i) =>
    entry.kind === "web"
      ? `### Source ${String(i + 1)}: ${entry.title}\n\nURL: ${entry.url}\n\n${entry.text}`
      : `### Source ${String(i + 1)}: ${entry.sourceFile}\n\n${entry.text}`,
  );
  return `## Retrieved Context\n\n${parts.join(CONTEXT_SEPARATOR)}`;
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;");
}

function assembleXml(entries: readonly ContextEntry[]): string {
  const parts = entries.map((entry, i) => {
    const source =
      entry.kind === "web"
        ? `type="web" source="${escapeAttribute(entry.title)}" url="${escapeAttribute(entry.url)}"`
        : `type="doc" source="${escapeAttribute(entry.sourceFile)}"`;
    return `<document index="${String(i + 1)}" ${source}>\n${entry.text}\n</document>`;
  });
  return `<context>\n${parts.join("\n")}\n</context>`;
}
