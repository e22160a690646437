import { startRestServer } from "./rest/server.js";
import { logger, pruneOldLogs } from "./logging.js";
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { nyseCalendar } from "./pipeline/calendar.js";
import { createPipeline } from "./pipeline/orchestrator.js";
import { YahooMarketDataSource } from "./providers/yahoo.js";

async function main() {
  logger.info({ pid: process.pid }, "Equity analytics service starting");

  // Validate configuration early
  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  // Prune old log files (keep 30 days)
  pruneOldLogs();

  const calendar = nyseCalendar();
  const pipeline = createPipeline({
    source: new YahooMarketDataSource({ timeoutMs: config.yahoo.timeoutMs }),
    calendar,
    config: config.pipeline,
  });

  const server = await startRestServer(
    { pipeline, calendar, defaults: config.defaults, apiKey: config.rest.apiKey },
    config.rest.port,
  );

  // Graceful shutdown
  const shutdown = () => {
    logger.info("Shutting down...");
    server.close((err) => {
      if (err) logger.error({ err }, "Error while closing REST server");
      process.exit(0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled promise rejection");
  });
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
