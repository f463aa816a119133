import type { NormalizedDocument, SourceType } from "@docindex/types";

/** A file handed over by whatever reads the disk or the network. */
export interface SourceFile {
  path: string;
  content: string;
}

/** Page texts already pulled out of a PDF by an external extractor. */
export interface PdfSource {
  filename: string;
  pages: readonly string[];
}

export interface IDocumentNormalizer<TSource> {
  readonly kind: SourceType;
  /** Lazily yields one normalized document per page, file or section. */
  extract(source: TSource): AsyncIterable<NormalizedDocument>;
}
