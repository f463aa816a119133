import type { Logger } from "@docindex/logger";
import type { NormalizedDocument } from "@docindex/types";
import type { IDocumentNormalizer } from "./normalizer.interface.js";

export interface NormalizeStats {
  sources: number;
  documents: number;
  skipped: number;
}

/**
 * Run a normalizer over many sources. A source that throws is logged and
 * skipped; the rest of the batch continues.
 */
export async function* normalizeAll<TSource>(
  normalizer: IDocumentNormalizer<TSource>,
  sources: Iterable<TSource> | AsyncIterable<TSource>,
  logger: Logger,
  describe: (source: TSource) => string,
  stats: NormalizeStats = { sources: 0, documents: 0, skipped: 0 },
): AsyncGenerator<NormalizedDocument> {
  for await (const source of sources) {
    stats.sources++;
    try {
      for await (const document of normalizer.extract(source)) {
        stats.documents++;
        yield document;
      }
    } catch (error: unknown) {
      stats.skipped++;
      logger.warn(
        { err: error, source: describe(source), kind: normalizer.kind },
        "Extraction failed, skipping source",
      );
    }
  }
}
