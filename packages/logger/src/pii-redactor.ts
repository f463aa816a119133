/**
 * PII Redaction Logic
 *
 * Detects and redacts credentials and email addresses in log output.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
  "cookie",
  "accesstoken",
  "bearer",
  "tavilyapikey",
  "qdrantapikey",
]);

/**
 * Regex to detect email addresses inside string values.
 */
const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/**
 * Determine whether a key name represents a sensitive field.
 */
function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair.
 *
 * - If the key matches a known sensitive field name the entire value is replaced
 *   with "[REDACTED]".
 * - If the value is a string that contains email-like patterns, those patterns
 *   are replaced with "[REDACTED]".
 *
 * @param key   - The property name being logged.
 * @param value - The property value being logged.
 * @returns The (possibly redacted) value.
 */
export function redactValue(key: string, value: unknown): unknown {
  // Full redaction for sensitive keys
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  // Partial redaction: strip emails from string values
  if (typeof value === "string" && EMAIL_REGEX.test(value)) {
    // Reset lastIndex because the regex is global
    EMAIL_REGEX.lastIndex = 0;
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Apply {@link redactValue} to every top-level field of a log record.
 * Used as Pino's `formatters.log` hook.
 */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = redactValue(key, value);
  }
  return result;
}

/**
 * List of JSON-path strings suitable for Pino's `redact` option.
 * These cover the most common top-level property names that carry secrets.
 */
const SENSITIVE_PATHS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "accessToken",
  "tavilyApiKey",
  "qdrantApiKey",
];

export const REDACT_PATHS: string[] = [
  ...SENSITIVE_PATHS,
  // One level of nesting (e.g. config.openai.apiKey is logged as openai.apiKey)
  ...SENSITIVE_PATHS.map((path) => `*.${path}`),
];
