import { logFetch } from "../logging.js";
import { clampToTradingDays, isIsoDate, type TradingCalendar } from "./calendar.js";
import {
  CancelledError,
  FetchFailedError,
  InputError,
  PermanentFetchError,
  PipelineError,
  TransientFetchError,
} from "./errors.js";
import { createSemaphore, type Release, type Semaphore } from "./semaphore.js";
import { backoffDelay, raceAbort, sleep as defaultSleep, type Sleep } from "./timing.js";
import type {
  DateRange,
  IsoDate,
  MarketDataSource,
  PriceBar,
  RawSeries,
  SourceOutcome,
  Ticker,
} from "./types.js";

const SYMBOL_RE = /^[A-Z0-9^][A-Z0-9.\-=^]{0,14}$/;

export function normalizeSymbol(raw: string): Ticker {
  const symbol = raw.trim().toUpperCase();
  if (!SYMBOL_RE.test(symbol)) {
    throw new InputError(`Invalid symbol: "${raw}"`);
  }
  return symbol;
}

/** Validate a requested range and snap it onto the trading calendar. */
export function resolveTradingRange(calendar: TradingCalendar, range: DateRange): DateRange {
  if (!isIsoDate(range.start) || !isIsoDate(range.end)) {
    throw new InputError(`Dates must be YYYY-MM-DD, got ${range.start}..${range.end}`);
  }
  if (range.start > range.end) {
    throw new InputError(`Start date ${range.start} is after end date ${range.end}`);
  }
  const clamped = clampToTradingDays(calendar, range);
  if (!clamped) {
    throw new InputError(`No trading days between ${range.start} and ${range.end}`);
  }
  return clamped;
}

export interface FetchRequest {
  readonly symbol: string;
  readonly start: IsoDate;
  readonly end: IsoDate;
}

export interface RetryPolicy {
  readonly maxRetries: number;
  readonly backoffBaseMs: number;
  readonly backoffCapMs: number;
}

export type FetchResult =
  | { readonly ok: true; readonly series: RawSeries; readonly attempts: number }
  | { readonly ok: false; readonly error: PipelineError; readonly attempts: number };

export interface FetcherDeps {
  readonly source: MarketDataSource;
  readonly calendar: TradingCalendar;
  /** Shared across every fetch of a pipeline; bounds concurrent provider calls */
  readonly limiter?: Semaphore;
  readonly sleep?: Sleep;
}

export interface Fetcher {
  fetch(request: FetchRequest, policy: RetryPolicy, signal?: AbortSignal): Promise<FetchResult>;
}

export function byDate(a: PriceBar, b: PriceBar): number {
  return a.date < b.date ? -1 : a.date > b.date ? 1 : 0;
}

export function createFetcher(deps: FetcherDeps): Fetcher {
  const { source, calendar } = deps;
  const limiter = deps.limiter ?? createSemaphore(Number.MAX_SAFE_INTEGER);
  const sleep = deps.sleep ?? defaultSleep;

  // Providers are meant to return outcomes, but a throw is folded into a transient one
  async function invokeSource(symbol: Ticker, range: DateRange, signal?: AbortSignal): Promise<SourceOutcome> {
    try {
      return await source.getHistory(symbol, range.start, range.end, signal);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logFetch.warn({ symbol, source: source.id, err: message }, "Source threw instead of returning an outcome");
      return { status: "transient", reason: "network", message };
    }
  }

  async function fetch(request: FetchRequest, policy: RetryPolicy, signal?: AbortSignal): Promise<FetchResult> {
    let symbol: Ticker;
    let range: DateRange;
    try {
      symbol = normalizeSymbol(request.symbol);
      range = resolveTradingRange(calendar, request);
    } catch (err) {
      if (err instanceof InputError) return { ok: false, error: err, attempts: 0 };
      throw err;
    }

    let attempts = 0;
    let lastTransient: TransientFetchError | undefined;
    const failed = (error: PipelineError): FetchResult => ({ ok: false, error, attempts });
    const aborted = (err: unknown): FetchResult =>
      failed(err instanceof PipelineError ? err : new CancelledError());

    for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
      if (signal?.aborted) return aborted(signal.reason);

      let release: Release;
      try {
        release = await limiter.acquire(signal);
      } catch (err) {
        return aborted(err);
      }

      attempts++;
      // The permit follows the provider call, not our wait on it: an abandoned
      // call still counts against the limit until the source settles it.
      const call = invokeSource(symbol, range, signal);
      void call.finally(release);
      let outcome: SourceOutcome;
      try {
        outcome = await raceAbort(call, signal);
      } catch (err) {
        return aborted(err);
      }

      if (outcome.status === "permanent") {
        logFetch.warn({ symbol, reason: outcome.reason, attempts }, "Permanent fetch failure — not retrying");
        return failed(new PermanentFetchError(outcome.reason, outcome.message, attempts));
      }

      if (outcome.status === "ok") {
        const bars = outcome.bars
          .filter((bar) => bar.date >= range.start && bar.date <= range.end)
          .sort(byDate);
        if (bars.length > 0) {
          logFetch.debug({ symbol, bars: bars.length, attempts }, "Fetched series");
          return { ok: true, series: { symbol, start: range.start, end: range.end, bars }, attempts };
        }
        lastTransient = new TransientFetchError(
          "empty",
          `${source.id} returned no bars for ${symbol} between ${range.start} and ${range.end}`,
        );
      } else {
        lastTransient = new TransientFetchError(outcome.reason, outcome.message);
      }

      if (attempt < policy.maxRetries) {
        const delay = backoffDelay(attempt, policy.backoffBaseMs, policy.backoffCapMs);
        logFetch.warn(
          { symbol, attempt: attempt + 1, reason: lastTransient.reason, delay_ms: delay },
          `Fetch attempt ${attempt + 1} failed, retrying in ${delay}ms: ${lastTransient.message}`,
        );
        try {
          await sleep(delay, signal);
        } catch (err) {
          return aborted(err);
        }
      }
    }

    return failed(new FetchFailedError(attempts, lastTransient ?? new TransientFetchError("network", "no attempt made")));
  }

  return { fetch };
}
