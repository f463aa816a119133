import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactRecord } from "./pii-redactor.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to "debug" in development and "info" elsewhere. */
  level?: string;
  /** Attached to every line as `name`. */
  service?: string;
  /** Human-readable output through pino-pretty. Defaults to NODE_ENV === "development". */
  pretty?: boolean;
  /** Write JSON lines here instead of stdout; disables pretty output. */
  destination?: DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

const PRETTY_TRANSPORT: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
  },
};

/**
 * Root logger for a process. Credential paths are censored by pino's redact
 * option; `redactRecord` masks sensitive keys and email addresses in every
 * remaining top-level field.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pretty = options.destination === undefined && (options.pretty ?? isDevelopment());

  const settings: pino.LoggerOptions = {
    level: options.level ?? (isDevelopment() ? "debug" : "info"),
    name: options.service ?? "docindex",
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    formatters: { log: redactRecord },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty ? { transport: PRETTY_TRANSPORT } : {}),
  };

  return options.destination ? pino(settings, options.destination) : pino(settings);
}

/** Child logger with scoped bindings such as `component` or `jobId`. */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
