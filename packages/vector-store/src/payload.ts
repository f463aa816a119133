import type { Payload } from "@docindex/types";

/** Keep the scalar entries of a payload returned by a backend. */
export function toPayload(raw: Record<string, unknown> | null | undefined): Payload {
  const payload: Payload = {};
  if (!raw) {
    return payload;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      payload[key] = value;
    }
  }
  return payload;
}

export function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number");
}
