#!/usr/bin/env node
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { logger } from "./logging.js";
import { addDays, marketAwareEndDate, nyseCalendar } from "./pipeline/calendar.js";
import { CancelledError } from "./pipeline/errors.js";
import { createPipeline } from "./pipeline/orchestrator.js";
import { YahooMarketDataSource } from "./providers/yahoo.js";
import { anySucceeded, formatResult } from "./report.js";

interface CliArgs {
  symbols: string[];
  start?: string;
  end?: string;
}

function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { symbols: [] };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--start" || arg === "--end") {
      const value = argv[i + 1];
      if (!value) throw new Error(`${arg} requires a YYYY-MM-DD value`);
      if (arg === "--start") args.start = value;
      else args.end = value;
      i++;
    } else {
      args.symbols.push(...arg.split(",").filter((s) => s.length > 0));
    }
  }
  return args;
}

async function main(): Promise<number> {
  const validation = validateConfig(config);
  if (validation.errors.length > 0) {
    for (const error of validation.errors) logger.error(error);
    return 2;
  }

  const args = parseArgs(process.argv.slice(2));
  const calendar = nyseCalendar();
  const end = args.end ?? marketAwareEndDate(new Date(), calendar);
  const start = args.start ?? addDays(end, -config.defaults.lookbackDays);
  const symbols = args.symbols.length > 0 ? args.symbols : config.defaults.symbols;

  const pipeline = createPipeline({
    source: new YahooMarketDataSource({ timeoutMs: config.yahoo.timeoutMs }),
    calendar,
    config: config.pipeline,
  });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new CancelledError("Interrupted")));

  const result = await pipeline.run(symbols, { start, end }, { signal: controller.signal });
  process.stdout.write(`${formatResult(result)}\n`);
  return anySucceeded(result) ? 0 : 1;
}

main().then(
  (code) => process.exit(code),
  (err) => {
    logger.fatal({ err }, "Fatal error");
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(2);
  },
);
