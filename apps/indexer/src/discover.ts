import { readFile } from "node:fs/promises";
import fg from "fast-glob";
import type { SourceFile } from "@docindex/normalizer";

export const IGNORED_PATTERNS: readonly string[] = [
  "**/node_modules/**",
  "**/.git/**",
  "**/package.json",
  "**/README.md",
];

/** Absolute paths under `root` with a wanted extension, sorted by path. */
export async function discoverFiles(root: string, extensions: ReadonlySet<string>): Promise<string[]> {
  const patterns = [...extensions].map((extension) => `**/*${extension}`);
  const entries = await fg(patterns, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
    ignore: [...IGNORED_PATTERNS],
  });
  return entries.sort();
}

export async function* readSources(
  root: string,
  extensions: ReadonlySet<string>,
): AsyncGenerator<SourceFile> {
  for (const filePath of await discoverFiles(root, extensions)) {
    yield { path: filePath, content: await readFile(filePath, "utf8") };
  }
}
