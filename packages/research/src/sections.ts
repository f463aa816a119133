import { readFileSync } from "node:fs";
import { z } from "zod";
import type { ResearchSection } from "@docindex/types";

const sectionsSchema = z.object({
  sections: z
    .array(
      z.object({
        number: z.number().int().positive(),
        title: z.string().min(1),
        phase: z.number().int().positive(),
        phaseName: z.string().min(1),
        searchQuery: z.string().min(1),
        questions: z.array(z.string().min(1)).min(1),
      }),
    )
    .min(1),
});

let cached: ResearchSection[] | null = null;

export function loadSections(): ResearchSection[] {
  if (!cached) {
    const raw = readFileSync(new URL("./sections.json", import.meta.url), "utf8");
    cached = sectionsSchema.parse(JSON.parse(raw)).sections;
  }
  return cached;
}

/** Replace every `{connector}` placeholder with the connector name. */
export function fillTemplate(template: string, connectorName: string): string {
  return template.replaceAll("{connector}", connectorName);
}
