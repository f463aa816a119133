import { describe, it, expect } from "vitest";
import type { MetadataFilter } from "@docindex/types";
import { ValidationError } from "@docindex/errors";
import { and, eq, ne } from "@docindex/vector-store";
import { validateFilter } from "./filter-validator.js";

describe("validateFilter", () => {
  it("accepts allowlisted equality filters", () => {
    expect(() => validateFilter(eq("docCategory", "REST"))).not.toThrow();
  });

  it("accepts nested conjunctions", () => {
    expect(() =>
      validateFilter(and(ne("sourceType", "web"), and(eq("objectType", "Invoice"), eq("pageNumber", 3)))),
    ).not.toThrow();
  });

  it("rejects unknown filter fields", () => {
    expect(() => validateFilter(eq("unknownField", "value"))).toThrow(
      /Invalid filter field: "unknownField"/,
    );
  });

  it("rejects unknown fields hidden inside a conjunction", () => {
    expect(() => validateFilter(and(eq("sourceType", "doc"), ne("$where", "1")))).toThrow(
      ValidationError,
    );
  });

  it("rejects non-scalar values from untyped callers", () => {
    const parsed: unknown = JSON.parse('{"op":"eq","field":"url","value":{"$gt":""}}');
    const filter: MetadataFilter = Object.assign(eq("url", ""), parsed);
    expect(() => validateFilter(filter)).toThrow(/must be a scalar/);
  });
});
