import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import { createIndexProgram, parsePositiveInt } from "./program.js";
import type { IndexCommandOptions } from "./run.js";

async function parse(args: string[]): Promise<IndexCommandOptions | undefined> {
  let received: IndexCommandOptions | undefined;
  const program = createIndexProgram(async (options) => {
    received = options;
  })
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
  await program.parseAsync(args, { from: "user" });
  return received;
}

describe("createIndexProgram", () => {
  it("applies defaults", async () => {
    expect(await parse(["--dir", "./sources"])).toEqual({
      dir: "./sources",
      source: "all",
      maxDocs: undefined,
      deleteAll: false,
      dryRun: false,
      subject: undefined,
    });
  });

  it("reads every flag", async () => {
    expect(
      await parse(["--dir", "src", "--source", "code", "--max-docs", "10", "--delete-all", "--dry-run", "--subject", "Acme"]),
    ).toEqual({ dir: "src", source: "code", maxDocs: 10, deleteAll: true, dryRun: true, subject: "Acme" });
  });

  it("rejects an unknown source kind", async () => {
    await expect(parse(["--dir", "src", "--source", "pdf"])).rejects.toBeInstanceOf(CommanderError);
  });

  it("requires --dir", async () => {
    await expect(parse([])).rejects.toBeInstanceOf(CommanderError);
  });
});

describe("parsePositiveInt", () => {
  it("accepts positive integers only", () => {
    expect(parsePositiveInt("25")).toBe(25);
    expect(() => parsePositiveInt("0")).toThrow("must be a positive integer");
    expect(() => parsePositiveInt("1.5")).toThrow("must be a positive integer");
  });
});
