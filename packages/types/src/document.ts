export type SourceType = "doc" | "code" | "research" | "web";

export type MetadataValue = string | number | boolean;

interface BaseMetadata {
  sourceFile: string;
  docCategory: string;
  objectType: string;
  /** Open side-map for provenance that has no dedicated field. */
  extra?: Record<string, MetadataValue>;
}

export interface DocProvenance extends BaseMetadata {
  sourceType: "doc";
  pageNumber?: number;
  pageCount?: number;
}

export type CodeType = "class" | "interface" | "enum" | "abstract_class";

export type CodeComponent =
  | "search"
  | "record_type"
  | "object_definition"
  | "authentication"
  | "configuration"
  | "utility"
  | "core";

export interface CodeProvenance extends BaseMetadata {
  sourceType: "code";
  language: string;
  codeType: CodeType;
  component: CodeComponent;
  className?: string;
  packageName?: string;
}

export interface ResearchProvenance extends BaseMetadata {
  sourceType: "research";
  format: "json" | "markdown";
  section?: string;
  connectorId?: string;
  connectorName?: string;
}

export interface WebProvenance extends BaseMetadata {
  sourceType: "web";
  url: string;
  title: string;
  /** ISO-8601 timestamp of the live search that produced the entry. */
  searchDate: string;
  searchQuery: string;
}

export type DocumentMetadata = DocProvenance | CodeProvenance | ResearchProvenance | WebProvenance;

export interface NormalizedDocument {
  /** Stable identifier: file name, or a composite key such as `file.pdf:p3`. */
  sourceId: string;
  text: string;
  metadata: DocumentMetadata;
}

export interface Classification {
  docCategory: string;
  objectType: string;
}
