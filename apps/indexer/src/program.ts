import { Command, InvalidArgumentError, Option } from "commander";
import { SOURCE_SELECTIONS } from "./run.js";
import type { IndexCommandOptions, SourceSelection } from "./run.js";

interface RawOptions {
  dir: string;
  source: string;
  maxDocs?: number;
  deleteAll: boolean;
  dryRun: boolean;
  subject?: string;
}

function isSourceSelection(value: string): value is SourceSelection {
  return SOURCE_SELECTIONS.some((selection) => selection === value);
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

export function createIndexProgram(action: (options: IndexCommandOptions) => Promise<void>): Command {
  return new Command("docindex-index")
    .description("Normalize, chunk, embed and upsert code and research files")
    .requiredOption("--dir <path>", "directory to scan")
    .addOption(
      new Option("--source <type>", "source kinds to index").choices(SOURCE_SELECTIONS).default("all"),
    )
    .option("--max-docs <n>", "stop after this many documents", parsePositiveInt)
    .option("--delete-all", "delete every vector in the collection first", false)
    .option("--dry-run", "print the chunk estimate without embedding anything", false)
    .option("--subject <name>", "product name used in code descriptions")
    .action(async (raw: RawOptions) => {
      const source = isSourceSelection(raw.source) ? raw.source : "all";
      await action({
        dir: raw.dir,
        source,
        maxDocs: raw.maxDocs,
        deleteAll: raw.deleteAll,
        dryRun: raw.dryRun,
        subject: raw.subject,
      });
    });
}
