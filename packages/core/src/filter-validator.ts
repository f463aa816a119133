import type { MetadataFilter } from "@docindex/types";
import { FILTER_FIELD_ALLOWLIST } from "@docindex/types";
import { ValidationError } from "@docindex/errors";

const allowedFields = new Set<string>(FILTER_FIELD_ALLOWLIST);

/**
 * Allowlist-only filter validation. Rejects unknown fields and non-scalar
 * values before a filter reaches the vector store.
 */
export function validateFilter(filter: MetadataFilter): void {
  if (filter.op === "and") {
    for (const inner of filter.filters) {
      validateFilter(inner);
    }
    return;
  }

  if (!allowedFields.has(filter.field)) {
    throw new ValidationError(
      `Invalid filter field: "${filter.field}". Allowed fields: ${[...allowedFields].join(", ")}`,
      { [filter.field]: "not filterable" },
    );
  }

  const valueType = typeof filter.value;
  if (valueType !== "string" && valueType !== "number" && valueType !== "boolean") {
    throw new ValidationError(`Filter value for "${filter.field}" must be a scalar`, {
      [filter.field]: "must be a string, number or boolean",
    });
  }
}
