import YahooFinance from "yahoo-finance2";
import { logFetch } from "../logging.js";
import { addDays, toIsoDate } from "../pipeline/calendar.js";
import { withTimeout } from "../pipeline/timing.js";
import type { IsoDate, MarketDataSource, PriceBar, SourceOutcome, Ticker } from "../pipeline/types.js";

const yf = new YahooFinance({ suppressNotices: ["yahooSurvey"] });

const DEFAULT_TIMEOUT_MS = 8000;

/** Shape of a daily row from `chart()`; Yahoo leaves fields null on halted or partial days. */
interface ChartRow {
  readonly date: Date;
  readonly open: number | null;
  readonly high: number | null;
  readonly low: number | null;
  readonly close: number | null;
  readonly volume: number | null;
}

export function toPriceBar(row: ChartRow): PriceBar | null {
  const { open, high, low, close, volume } = row;
  if (open === null || high === null || low === null || close === null || volume === null) return null;
  return { date: toIsoDate(row.date), open, high, low, close, volume };
}

// Yahoo reports everything as Error messages; the wording is all there is to branch on
const PERMANENT_PATTERNS = [/not found/i, /no data found/i, /invalid/i, /delisted/i];
const RATE_LIMIT_PATTERNS = [/too many requests/i, /\b429\b/];

export function classifyYahooError(err: unknown): SourceOutcome {
  const message = err instanceof Error ? err.message : String(err);
  if (PERMANENT_PATTERNS.some((re) => re.test(message))) {
    return { status: "permanent", reason: "unknown_symbol", message };
  }
  if (RATE_LIMIT_PATTERNS.some((re) => re.test(message))) {
    return { status: "transient", reason: "rate_limit", message };
  }
  if (/timed out/i.test(message)) {
    return { status: "transient", reason: "timeout", message };
  }
  return { status: "transient", reason: "network", message };
}

export interface YahooSourceOptions {
  /** Upper bound on a single chart() request */
  readonly timeoutMs?: number;
}

/** Daily bars from Yahoo Finance. Never throws; every failure becomes a SourceOutcome. */
export class YahooMarketDataSource implements MarketDataSource {
  readonly id = "yahoo";
  private readonly timeoutMs: number;

  constructor(options: YahooSourceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** `signal` aborts the underlying HTTP request, not just our wait on it. */
  async getHistory(symbol: Ticker, start: IsoDate, end: IsoDate, signal?: AbortSignal): Promise<SourceOutcome> {
    try {
      const chart = await withTimeout(
        yf.chart(
          symbol,
          {
            period1: start,
            // period2 is exclusive
            period2: addDays(end, 1),
            interval: "1d",
          },
          { fetchOptions: { signal } },
        ),
        this.timeoutMs,
        `Yahoo chart(${symbol})`,
      );

      const rows: readonly ChartRow[] = chart.quotes;
      const bars: PriceBar[] = [];
      for (const row of rows) {
        const bar = toPriceBar(row);
        if (bar) bars.push(bar);
      }
      if (bars.length < rows.length) {
        logFetch.debug({ symbol, skipped: rows.length - bars.length }, "Skipped Yahoo rows with missing fields");
      }
      return { status: "ok", bars };
    } catch (err) {
      const outcome = classifyYahooError(err);
      logFetch.debug({ symbol, status: outcome.status, err: err instanceof Error ? err.message : String(err) }, "Yahoo chart request failed");
      return outcome;
    }
  }
}
