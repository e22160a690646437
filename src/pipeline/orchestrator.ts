import { logPipeline, logValidate } from "../logging.js";
import { nyseCalendar, type TradingCalendar } from "./calendar.js";
import { parsePipelineConfig, type PipelineConfig, type PipelineConfigInput } from "./config.js";
import { InputError, SymbolTimeoutError, ValidationRejectedError, toFailure } from "./errors.js";
import { createFetcher, resolveTradingRange } from "./fetcher.js";
import { computeAnalytics } from "./processor.js";
import { createSemaphore } from "./semaphore.js";
import { summarizeFrame } from "./summary.js";
import type { Sleep } from "./timing.js";
import type { DateRange, MarketDataSource, PipelineResult, SymbolOutcome, Ticker } from "./types.js";
import { validate } from "./validator.js";

export interface PipelineDeps {
  readonly source: MarketDataSource;
  /** Defaults to the NYSE holiday calendar */
  readonly calendar?: TradingCalendar;
  readonly config?: PipelineConfigInput;
  /** Clock for staleness checks and timestamps */
  readonly now?: () => Date;
  readonly sleep?: Sleep;
}

export interface RunOptions {
  readonly signal?: AbortSignal;
}

export interface Pipeline {
  readonly config: PipelineConfig;
  /**
   * Fetch, validate and analyze every symbol. Never rejects for a single
   * symbol's failure; only an empty symbol list or an unusable range throws.
   */
  run(symbols: readonly string[], range: DateRange, options?: RunOptions): Promise<PipelineResult>;
}

/** Throws ConfigError before any work starts when the configuration is invalid. */
export function createPipeline(deps: PipelineDeps): Pipeline {
  const config = parsePipelineConfig(deps.config ?? {});
  const calendar = deps.calendar ?? nyseCalendar();
  const now = deps.now ?? (() => new Date());
  const limiter = createSemaphore(config.maxFetchConcurrency);
  const fetcher = createFetcher({ source: deps.source, calendar, limiter, sleep: deps.sleep });
  const summaryWindow = config.windows[0];
  // A series must outlast the largest window's warmup by at least one bar, or
  // analytics would come back empty
  const validatorConfig = { ...config, minBars: Math.max(config.minBars, config.windows[config.windows.length - 1] + 1) };

  async function runSymbol(symbol: Ticker, range: DateRange, parent?: AbortSignal): Promise<[Ticker, SymbolOutcome]> {
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parent?.reason);
    if (parent?.aborted) controller.abort(parent.reason);
    else parent?.addEventListener("abort", onParentAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new SymbolTimeoutError(symbol, config.perSymbolTimeoutMs)),
      config.perSymbolTimeoutMs,
    );

    try {
      const fetched = await fetcher.fetch({ symbol, start: range.start, end: range.end }, config, controller.signal);
      if (!fetched.ok) throw fetched.error;

      const report = validate(fetched.series, validatorConfig, { calendar, now: now() });
      if (!report.accepted || !report.cleanedSeries) {
        logValidate.info({ symbol, issues: report.issues.length }, "Series rejected");
        throw new ValidationRejectedError(symbol, report.issues);
      }

      const cleaned = report.cleanedSeries;
      const frame = computeAnalytics(fetched.series.symbol, cleaned, config.windows);
      const summary = summarizeFrame(frame, cleaned, summaryWindow);
      const warnings = report.issues.filter((issue) => issue.severity !== "fatal");
      logPipeline.info(
        { symbol, attempts: fetched.attempts, bars: cleaned.length, rows: frame.rows.length, warnings: warnings.length },
        "Symbol processed",
      );
      return [symbol, { status: "ok", frame, summary, warnings, attempts: fetched.attempts }];
    } catch (err) {
      const failure = toFailure(err);
      logPipeline.warn({ symbol, kind: failure.kind, attempts: failure.attempts }, failure.message);
      return [symbol, { status: "failed", failure }];
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  }

  async function run(symbols: readonly string[], range: DateRange, options: RunOptions = {}): Promise<PipelineResult> {
    const keys = [...new Set(symbols.map((s) => s.trim().toUpperCase()).filter((s) => s.length > 0))];
    if (keys.length === 0) throw new InputError("At least one symbol is required");
    const tradingRange = resolveTradingRange(calendar, range);

    const startedAt = now().toISOString();
    logPipeline.info(
      { symbols: keys.length, start: tradingRange.start, end: tradingRange.end, concurrency: config.maxFetchConcurrency },
      "Pipeline run started",
    );

    const pairs = await Promise.all(keys.map((symbol) => runSymbol(symbol, tradingRange, options.signal)));
    const perSymbol: Record<Ticker, SymbolOutcome> = {};
    for (const [symbol, outcome] of pairs) perSymbol[symbol] = outcome;

    const failed = pairs.filter(([, outcome]) => outcome.status === "failed").length;
    logPipeline.info({ succeeded: pairs.length - failed, failed }, "Pipeline run finished");

    return { range: tradingRange, startedAt, finishedAt: now().toISOString(), perSymbol };
  }

  return { config, run };
}
