import type { FilterValue, MetadataFilter, Payload } from "@docindex/types";

export function eq(field: string, value: FilterValue): MetadataFilter {
  return { op: "eq", field, value };
}

export function ne(field: string, value: FilterValue): MetadataFilter {
  return { op: "ne", field, value };
}

/** Conjunction; undefined operands are dropped so optional caller filters compose. */
export function and(...filters: (MetadataFilter | undefined)[]): MetadataFilter {
  const present = filters.filter((filter): filter is MetadataFilter => filter !== undefined);
  if (present.length === 1 && present[0]) {
    return present[0];
  }
  return { op: "and", filters: present };
}

export type Predicate = { op: "eq" | "ne"; field: string; value: FilterValue };

/** Flatten nested conjunctions into a list of leaf predicates. */
export function flattenFilter(filter: MetadataFilter): Predicate[] {
  if (filter.op === "and") {
    return filter.filters.flatMap(flattenFilter);
  }
  return [filter];
}

export function matchesFilter(payload: Payload, filter: MetadataFilter | undefined): boolean {
  if (!filter) {
    return true;
  }
  return flattenFilter(filter).every((predicate) => {
    const value = payload[predicate.field];
    return predicate.op === "eq" ? value === predicate.value : value !== predicate.value;
  });
}
