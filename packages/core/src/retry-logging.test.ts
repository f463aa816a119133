import { afterEach, describe, it, expect, vi } from "vitest";
import { withRetry } from "@docindex/errors";
import { createLogger } from "@docindex/logger";
import { loggedRetry } from "./retry-logging.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loggedRetry", () => {
  it("reports each retry through the logger instead of the console", async () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: "warn",
      service: "test",
      destination: { write: (line: string) => void lines.push(line) },
    });
    const consoleWarn = vi.spyOn(console, "warn").mockImplementation(() => {});
    let calls = 0;

    const result = await withRetry(async () => {
      calls++;
      if (calls === 1) {
        throw new Error("socket hang up");
      }
      return "ok";
    }, loggedRetry(logger, { baseDelayMs: 1, maxDelayMs: 1 }));

    expect(result).toBe("ok");
    expect(consoleWarn).not.toHaveBeenCalled();
    expect(lines).toHaveLength(1);
    const record: unknown = JSON.parse(lines[0]!);
    expect(record).toMatchObject({ level: 40, attempt: 1, msg: "Upstream call failed, retrying" });
  });
});
