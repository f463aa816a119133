import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Classification } from "@docindex/types";

const taxonomySchema = z.object({
  categories: z.array(z.object({ name: z.string(), keywords: z.array(z.string()).min(1) })),
  objectTypes: z.array(z.string()),
  researchDirectories: z.array(
    z.object({ directory: z.string(), category: z.string(), description: z.string() }),
  ),
});

export type Taxonomy = z.infer<typeof taxonomySchema>;

export const DEFAULT_CATEGORY = "GENERAL";
export const DEFAULT_OBJECT_TYPE = "General";

// Only the head of the body is scanned for category keywords
const CONTENT_SCAN_LENGTH = 500;

let cached: Taxonomy | null = null;

export function loadTaxonomy(): Taxonomy {
  if (!cached) {
    const raw = readFileSync(new URL("./categories.json", import.meta.url), "utf8");
    cached = taxonomySchema.parse(JSON.parse(raw));
  }
  return cached;
}

/**
 * Keyword classifier. The first category with a keyword in the file name or
 * the opening of the content wins; the object type comes from the file name.
 */
export function categorizeDocument(
  filename: string,
  content = "",
  taxonomy: Taxonomy = loadTaxonomy(),
): Classification {
  const name = filename.toLowerCase();
  const head = content.slice(0, CONTENT_SCAN_LENGTH).toLowerCase();

  let docCategory = DEFAULT_CATEGORY;
  for (const category of taxonomy.categories) {
    const hit = category.keywords.some((keyword) => {
      const needle = keyword.toLowerCase();
      return name.includes(needle) || head.includes(needle);
    });
    if (hit) {
      docCategory = category.name;
      break;
    }
  }

  if (docCategory === DEFAULT_CATEGORY && (name.includes("_rest") || name.includes("rest."))) {
    docCategory = "REST";
  }

  const objectType =
    taxonomy.objectTypes.find((object) => name.includes(object.toLowerCase())) ??
    DEFAULT_OBJECT_TYPE;

  return { docCategory, objectType };
}

export interface ResearchCategory {
  docCategory: string;
  description: string;
}

/** Numbered research directories (`05_api_limits/...`) map to fixed categories. */
export function researchCategory(
  path: string,
  taxonomy: Taxonomy = loadTaxonomy(),
): ResearchCategory {
  const entry = taxonomy.researchDirectories.find((dir) => path.includes(dir.directory));
  return entry
    ? { docCategory: entry.category, description: entry.description }
    : { docCategory: "RESEARCH", description: "Research documentation" };
}
