import type { Chunk, Payload, PayloadValue, SourceType } from "@docindex/types";

export const PAYLOAD_TEXT_LIMIT = 1000;

function isPayloadValue(value: unknown): value is PayloadValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

/**
 * Flatten chunk provenance into a vector payload. `extra` entries are spread
 * first so they can never shadow a typed field.
 */
export function chunkPayload(chunk: Chunk): Payload {
  const { extra, ...fields } = chunk.metadata;
  const payload: Payload = { ...extra };
  const entries: [string, unknown][] = Object.entries(fields);
  for (const [key, value] of entries) {
    if (isPayloadValue(value)) {
      payload[key] = value;
    }
  }
  payload["text"] = chunk.text.slice(0, PAYLOAD_TEXT_LIMIT);
  payload["tokenCount"] = chunk.tokenCount;
  return payload;
}

export function readString(payload: Payload, key: string, fallback = ""): string {
  const value = payload[key];
  return typeof value === "string" ? value : fallback;
}

function isSourceType(value: unknown): value is SourceType {
  return value === "doc" || value === "code" || value === "research" || value === "web";
}

/** Records written before `sourceType` existed count as documentation. */
export function readSourceType(payload: Payload): SourceType {
  const value = payload["sourceType"];
  return isSourceType(value) ? value : "doc";
}
