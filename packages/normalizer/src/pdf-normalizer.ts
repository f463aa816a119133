import type { DocProvenance, NormalizedDocument } from "@docindex/types";
import type { IDocumentNormalizer, PdfSource } from "./normalizer.interface.js";
import { categorizeDocument } from "./categorize.js";

export interface PdfNormalizerOptions {
  /** `page` yields one document per page, `document` one per file. Default: page */
  mode?: "page" | "document";
  /** Header and footer boilerplate removed from every page. */
  boilerplate?: readonly RegExp[];
  /** Whole documents at or below this length are skipped. Default: 100 */
  minDocumentLength?: number;
}

const DEFAULT_BOILERPLATE: readonly RegExp[] = [/Page \d+ of \d+/g];

// Control characters other than tab and newline
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F]/g;

export function cleanPdfText(text: string, boilerplate: readonly RegExp[] = DEFAULT_BOILERPLATE): string {
  let cleaned = text.replace(/ +/g, " ").replace(/\n{3,}/g, "\n\n");
  for (const pattern of boilerplate) {
    cleaned = cleaned.replace(pattern, "");
  }
  return cleaned.replace(CONTROL_CHARS, "").trim();
}

export class PdfNormalizer implements IDocumentNormalizer<PdfSource> {
  readonly kind = "doc";
  private readonly mode: "page" | "document";
  private readonly boilerplate: readonly RegExp[];
  private readonly minDocumentLength: number;

  constructor(options: PdfNormalizerOptions = {}) {
    this.mode = options.mode ?? "page";
    this.boilerplate = options.boilerplate ?? DEFAULT_BOILERPLATE;
    this.minDocumentLength = options.minDocumentLength ?? 100;
  }

  async *extract(source: PdfSource): AsyncGenerator<NormalizedDocument> {
    const pageCount = source.pages.length;

    if (this.mode === "document") {
      const text = cleanPdfText(source.pages.join("\n\n"), this.boilerplate);
      if (text.length <= this.minDocumentLength) {
        return;
      }
      yield {
        sourceId: source.filename,
        text,
        metadata: this.metadata(source.filename, text, { pageCount }),
      };
      return;
    }

    // Classification is per file, so every page of a file shares it
    const fileClass = categorizeDocument(source.filename);
    for (const [i, raw] of source.pages.entries()) {
      const text = cleanPdfText(raw, this.boilerplate);
      if (text.length === 0) {
        continue;
      }
      const pageNumber = i + 1;
      yield {
        sourceId: `${source.filename}:p${String(pageNumber)}`,
        text,
        metadata: {
          sourceType: "doc",
          sourceFile: source.filename,
          ...fileClass,
          pageNumber,
          pageCount,
        },
      };
    }
  }

  private metadata(
    filename: string,
    text: string,
    position: Pick<DocProvenance, "pageCount">,
  ): DocProvenance {
    return {
      sourceType: "doc",
      sourceFile: filename,
      ...categorizeDocument(filename, text.slice(0, 1000)),
      ...position,
    };
  }
}
