import { parseEnv } from "@docindex/config";
import { createServices } from "@docindex/core";
import { CancelledError } from "@docindex/errors";
import { createLogger } from "@docindex/logger";
import { createIndexProgram } from "./program.js";
import { runIndex } from "./run.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "indexer" });
  const services = createServices(config, logger);
  const controller = new AbortController();

  const interrupt = (): void => {
    logger.warn("Interrupted, stopping after the current document");
    controller.abort();
  };
  process.once("SIGINT", interrupt);
  process.once("SIGTERM", interrupt);

  const program = createIndexProgram(async (options) => {
    try {
      await runIndex(options, services, {
        logger,
        signal: controller.signal,
        print: (line) => console.log(line),
      });
    } finally {
      await services.close();
    }
  });
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof CancelledError) {
    console.warn("[indexer] Cancelled:", err.message);
    process.exit(130);
  }
  console.error("[indexer] Fatal error:", err);
  process.exit(1);
});
