import path from "node:path";
import type { MetadataValue, NormalizedDocument, ResearchProvenance } from "@docindex/types";
import type { IDocumentNormalizer, SourceFile } from "./normalizer.interface.js";
import { DEFAULT_OBJECT_TYPE, researchCategory } from "./categorize.js";

const MAX_STRING_ITEMS = 20;
const MAX_OBJECT_ITEMS = 10;

function titleCase(key: string): string {
  return key
    .replace(/_/g, " ")
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function scalar(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Render parsed JSON as indented `Key: value` lines. String lists are
 * inlined (first 20); object lists are expanded (first 10).
 */
export function jsonToText(data: unknown, depth = 0): string {
  const indent = "  ".repeat(depth);
  const lines: string[] = [];

  if (isRecord(data)) {
    for (const [key, value] of Object.entries(data)) {
      const label = titleCase(key);
      if (isRecord(value)) {
        lines.push(`${indent}${label}:`, jsonToText(value, depth + 1));
      } else if (Array.isArray(value)) {
        lines.push(...renderList(label, value, depth));
      } else {
        lines.push(`${indent}${label}: ${scalar(value)}`);
      }
    }
  } else if (Array.isArray(data)) {
    for (const item of data.slice(0, MAX_OBJECT_ITEMS)) {
      lines.push(jsonToText(item, depth));
    }
    if (data.length > MAX_OBJECT_ITEMS) {
      lines.push(`${indent}... and ${String(data.length - MAX_OBJECT_ITEMS)} more items`);
    }
  } else {
    lines.push(`${indent}${scalar(data)}`);
  }

  return lines.join("\n");
}

function renderList(label: string, list: unknown[], depth: number): string[] {
  const indent = "  ".repeat(depth);

  if (list.length === 0) {
    return [`${indent}${label}: (empty)`];
  }

  if (list.every((item): item is string => typeof item === "string")) {
    let items = list.slice(0, MAX_STRING_ITEMS).join(", ");
    if (list.length > MAX_STRING_ITEMS) {
      items += ` ... (+${String(list.length - MAX_STRING_ITEMS)} more)`;
    }
    return [`${indent}${label}: ${items}`];
  }

  if (list.every(isRecord)) {
    const lines = [`${indent}${label} (${String(list.length)} items):`];
    for (const item of list.slice(0, MAX_OBJECT_ITEMS)) {
      lines.push(jsonToText(item, depth + 1));
    }
    if (list.length > MAX_OBJECT_ITEMS) {
      lines.push(`${indent}  ... and ${String(list.length - MAX_OBJECT_ITEMS)} more items`);
    }
    return lines;
  }

  return [`${indent}${label}: ${JSON.stringify(list)}`];
}

export interface ResearchNormalizerOptions {
  /** Markdown files shorter than this are skipped. Default: 50 */
  minLength?: number;
}

/** JSON and Markdown research reports. */
export class ResearchNormalizer implements IDocumentNormalizer<SourceFile> {
  readonly kind = "research";
  private readonly minLength: number;

  constructor(options: ResearchNormalizerOptions = {}) {
    this.minLength = options.minLength ?? 50;
  }

  async *extract(source: SourceFile): AsyncGenerator<NormalizedDocument> {
    const extension = path.extname(source.path).toLowerCase();
    if (extension === ".json") {
      yield this.fromJson(source);
    } else if (extension === ".md") {
      if (source.content.length < this.minLength) {
        return;
      }
      yield this.fromMarkdown(source);
    } else {
      throw new Error(`Unsupported research file type: ${extension || "(none)"}`);
    }
  }

  private fromJson(source: SourceFile): NormalizedDocument {
    const filename = path.basename(source.path);
    const stem = path.basename(source.path, path.extname(source.path));
    const category = researchCategory(source.path);
    const data: unknown = JSON.parse(source.content);

    const extra: Record<string, MetadataValue> = {
      filePath: source.path,
      categoryDescription: category.description,
    };
    if (isRecord(data)) {
      const meta = data["metadata"];
      if (isRecord(meta)) {
        extra["docVersion"] = scalar(meta["version"] ?? "");
        extra["generated"] = scalar(meta["generated"] ?? "");
      }
    }

    const header = [
      `# Research Document: ${stem}`,
      `Category: ${category.docCategory}`,
      `Description: ${category.description}`,
      `File: ${filename}`,
      "",
      "## Content",
      "",
    ].join("\n");

    return {
      sourceId: filename,
      text: header + jsonToText(data),
      metadata: this.metadata(filename, category.docCategory, "json", extra),
    };
  }

  private fromMarkdown(source: SourceFile): NormalizedDocument {
    const filename = path.basename(source.path);
    const stem = path.basename(source.path, path.extname(source.path));
    const category = researchCategory(source.path);

    const extra: Record<string, MetadataValue> = {
      filePath: source.path,
      categoryDescription: category.description,
      sectionCount: (source.content.match(/^##\s+/gm) ?? []).length,
    };
    const title = /^#\s+(.+)$/m.exec(source.content)?.[1];
    if (title) {
      extra["title"] = title.trim();
    }

    const header = [
      `Research Document: ${stem}`,
      `Category: ${category.docCategory}`,
      "Type: Markdown Documentation",
      "",
    ].join("\n");

    return {
      sourceId: filename,
      text: header + source.content.trim(),
      metadata: this.metadata(filename, category.docCategory, "markdown", extra),
    };
  }

  private metadata(
    sourceFile: string,
    docCategory: string,
    format: ResearchProvenance["format"],
    extra: Record<string, MetadataValue>,
  ): ResearchProvenance {
    return {
      sourceType: "research",
      sourceFile,
      docCategory,
      objectType: DEFAULT_OBJECT_TYPE,
      format,
      extra,
    };
  }
}
