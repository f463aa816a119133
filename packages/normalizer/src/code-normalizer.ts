import path from "node:path";
import type {
  CodeComponent,
  CodeProvenance,
  CodeType,
  MetadataValue,
  NormalizedDocument,
} from "@docindex/types";
import type { IDocumentNormalizer, SourceFile } from "./normalizer.interface.js";
import { DEFAULT_OBJECT_TYPE } from "./categorize.js";

export interface CodeNormalizerOptions {
  /** Product name used in the descriptive header. Default: "Connector" */
  subject?: string;
  /** Vendor prefix stripped from record-type class names, e.g. "Acme" in AcmeInvoiceRecordType. */
  classPrefix?: string;
  /** Files shorter than this are skipped. Default: 50 */
  minLength?: number;
}

export interface JavaFacts {
  packageName?: string;
  className?: string;
  codeType: CodeType;
  component: CodeComponent;
  objectType: string;
  implements?: string;
  extends?: string;
  methodCount: number;
  enumValues: string[];
}

const MAX_ENUM_VALUES = 20;
const MAX_DESCRIPTION = 300;

function detectCodeType(content: string): CodeType {
  if (content.includes("enum ")) return "enum";
  if (content.includes("interface ")) return "interface";
  if (content.includes("abstract class ")) return "abstract_class";
  return "class";
}

function detectComponent(
  filename: string,
  classPrefix: string,
): { component: CodeComponent; objectType: string } {
  const name = filename.toLowerCase();

  if (name.includes("search")) {
    const match = /^(\w+?)(?:Internal)?Search\.java$/.exec(filename);
    return { component: "search", objectType: match?.[1] ?? DEFAULT_OBJECT_TYPE };
  }
  if (name.includes("objecttype")) {
    return { component: "object_definition", objectType: DEFAULT_OBJECT_TYPE };
  }
  if (name.includes("record") || name.includes("type")) {
    const match = /^(\w+?)RecordType\.java$/.exec(filename);
    let objectType = match?.[1] ?? DEFAULT_OBJECT_TYPE;
    if (classPrefix && objectType.startsWith(classPrefix) && objectType !== classPrefix) {
      objectType = objectType.slice(classPrefix.length);
    }
    return { component: "record_type", objectType };
  }
  if (name.includes("auth") || name.includes("credential")) {
    return { component: "authentication", objectType: DEFAULT_OBJECT_TYPE };
  }
  if (name.includes("config")) {
    return { component: "configuration", objectType: DEFAULT_OBJECT_TYPE };
  }
  if (name.includes("util") || name.includes("helper")) {
    return { component: "utility", objectType: DEFAULT_OBJECT_TYPE };
  }
  return { component: "core", objectType: DEFAULT_OBJECT_TYPE };
}

export function extractEnumValues(content: string): string[] {
  const body = /enum\s+\w+[^{]*\{([^}]+)/.exec(content)?.[1];
  if (!body) {
    return [];
  }
  return Array.from(body.matchAll(/^\s*([A-Z][A-Z0-9_]*)\s*(?:\([^)]*\))?\s*[,;]/gm), (m) =>
    String(m[1]),
  );
}

export function extractJavaFacts(content: string, filename: string, classPrefix = ""): JavaFacts {
  const codeType = detectCodeType(content);
  const { component, objectType } = detectComponent(filename, classPrefix);

  return {
    packageName: /package\s+([\w.]+);/.exec(content)?.[1],
    className: /(?:public\s+)?(?:abstract\s+)?(?:class|interface|enum)\s+(\w+)/.exec(content)?.[1],
    codeType,
    component,
    objectType,
    implements: /implements\s+([\w,\s<>]+)(?:\s*\{|$)/.exec(content)?.[1]?.trim(),
    extends: /extends\s+(\w+)/.exec(content)?.[1],
    methodCount: Array.from(
      content.matchAll(/(?:public|private|protected)\s+(?:static\s+)?[\w<>,\s]+\s+\w+\s*\(/g),
    ).length,
    enumValues: codeType === "enum" ? extractEnumValues(content) : [],
  };
}

export function cleanJavaCode(content: string): string {
  return content
    .replace(/^\/\*[\s\S]*?\*\/\s*/, "")
    .replace(/\/\*\*/g, "\n/**")
    .replace(/\/\/[-=]+\s*\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .replace(/[ \t]+/g, " ")
    .trim();
}

export function describeCode(content: string, facts: JavaFacts, subject: string): string {
  const lines = [
    `${subject} ${facts.codeType}: ${facts.className ?? "Unknown"}`,
    `Component: ${facts.component}`,
  ];

  if (facts.objectType !== DEFAULT_OBJECT_TYPE) {
    lines.push(`Object Type: ${facts.objectType}`);
  }
  if (facts.enumValues.length > 0) {
    lines.push(
      `Defines ${String(facts.enumValues.length)} values: ${facts.enumValues.slice(0, MAX_ENUM_VALUES).join(", ")}`,
    );
  }
  if (facts.implements) {
    lines.push(`Implements: ${facts.implements}`);
  }
  if (facts.extends) {
    lines.push(`Extends: ${facts.extends}`);
  }

  const javadoc = /\/\*\*\s*([\s\S]*?)\*\/\s*(?:public|abstract)/.exec(content)?.[1];
  if (javadoc) {
    const description = javadoc
      .split("\n")
      .map((line) => line.replace(/^\s*\*\s?/, "").trim())
      .filter((line) => line.length > 0)
      .join(" ")
      .replace(/@\w+.*/, "")
      .trim();
    if (description.length > 20) {
      lines.push(`Description: ${description.slice(0, MAX_DESCRIPTION)}`);
    }
  }

  return `${lines.join("\n")}\n\n`;
}

/**
 * Java sources: a descriptive header built from the class shape, followed by
 * the code with its license banner and divider comments removed.
 */
export class CodeNormalizer implements IDocumentNormalizer<SourceFile> {
  readonly kind = "code";
  private readonly subject: string;
  private readonly classPrefix: string;
  private readonly minLength: number;

  constructor(options: CodeNormalizerOptions = {}) {
    this.subject = options.subject ?? "Connector";
    this.classPrefix = options.classPrefix ?? "";
    this.minLength = options.minLength ?? 50;
  }

  async *extract(source: SourceFile): AsyncGenerator<NormalizedDocument> {
    if (source.content.length < this.minLength) {
      return;
    }

    const filename = path.basename(source.path);
    const facts = extractJavaFacts(source.content, filename, this.classPrefix);
    const text = describeCode(source.content, facts, this.subject) + cleanJavaCode(source.content);

    const extra: Record<string, MetadataValue> = {
      filePath: source.path,
      methodCount: facts.methodCount,
    };
    if (facts.implements) extra["implements"] = facts.implements;
    if (facts.extends) extra["extends"] = facts.extends;
    if (facts.enumValues.length > 0) {
      extra["enumValues"] = facts.enumValues.slice(0, MAX_ENUM_VALUES).join(", ");
      extra["enumCount"] = facts.enumValues.length;
    }

    const metadata: CodeProvenance = {
      sourceType: "code",
      sourceFile: filename,
      docCategory: "CODE",
      objectType: facts.objectType,
      language: "java",
      codeType: facts.codeType,
      component: facts.component,
      ...(facts.className ? { className: facts.className } : {}),
      ...(facts.packageName ? { packageName: facts.packageName } : {}),
      extra,
    };

    yield { sourceId: filename, text, metadata };
  }
}
