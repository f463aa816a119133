export type { IDocumentNormalizer, SourceFile, PdfSource } from "./normalizer.interface.js";
export { PdfNormalizer, cleanPdfText } from "./pdf-normalizer.js";
export type { PdfNormalizerOptions } from "./pdf-normalizer.js";
export {
  CodeNormalizer,
  extractJavaFacts,
  extractEnumValues,
  cleanJavaCode,
  describeCode,
} from "./code-normalizer.js";
export type { CodeNormalizerOptions, JavaFacts } from "./code-normalizer.js";
export { ResearchNormalizer, jsonToText } from "./research-normalizer.js";
export type { ResearchNormalizerOptions } from "./research-normalizer.js";
export {
  categorizeDocument,
  researchCategory,
  loadTaxonomy,
  DEFAULT_CATEGORY,
  DEFAULT_OBJECT_TYPE,
} from "./categorize.js";
export type { Taxonomy, ResearchCategory } from "./categorize.js";
export { normalizeAll } from "./normalize-all.js";
export type { NormalizeStats } from "./normalize-all.js";
