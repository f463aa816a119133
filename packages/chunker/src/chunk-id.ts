import crypto from "node:crypto";

export const CHUNK_ID_LENGTH = 32;
const ID_TEXT_PREFIX = 100;

/**
 * Content-addressed chunk identity: the first 32 hex characters of
 * SHA-256(`sourceId:index:text[0..100)`).
 */
export function chunkId(sourceId: string, index: number, text: string): string {
  return crypto
    .createHash("sha256")
    .update(`${sourceId}:${String(index)}:${text.slice(0, ID_TEXT_PREFIX)}`)
    .digest("hex")
    .slice(0, CHUNK_ID_LENGTH);
}
