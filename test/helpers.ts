import { createHolidayCalendar, type TradingCalendar } from "../src/pipeline/calendar.js";
import type { IsoDate, MarketDataSource, PriceBar, SourceOutcome, Ticker } from "../src/pipeline/types.js";

/** Monday–Friday calendar with optional closures. */
export function weekdayCalendar(holidays: IsoDate[] = []): TradingCalendar {
  return createHolidayCalendar(holidays);
}

/** A valid bar around `close`; override any field to break it. */
export function bar(date: IsoDate, close: number, overrides: Partial<PriceBar> = {}): PriceBar {
  return { date, open: close, high: close + 1, low: close - 1, close, volume: 1000, ...overrides };
}

/** `count` consecutive trading days starting at `start` (or the next trading day). */
export function tradingDays(calendar: TradingCalendar, start: IsoDate, count: number): IsoDate[] {
  const days: IsoDate[] = [];
  let cursor = calendar.isTradingDay(start) ? start : calendar.nextTradingDay(start);
  while (days.length < count) {
    days.push(cursor);
    cursor = calendar.nextTradingDay(cursor);
  }
  return days;
}

/** 100, 101, 100, 101, … — small regular moves that never trip anomaly detection. */
export function alternatingCloses(count: number): number[] {
  return Array.from({ length: count }, (_, i) => (i % 2 === 0 ? 100 : 101));
}

export function barsFor(dates: readonly IsoDate[], closes: readonly number[]): PriceBar[] {
  return dates.map((date, i) => bar(date, closes[i]));
}

export interface SourceCall {
  readonly symbol: Ticker;
  readonly start: IsoDate;
  readonly end: IsoDate;
}

type Handler = (call: SourceCall, callIndex: number, signal?: AbortSignal) => SourceOutcome | Promise<SourceOutcome>;

/** In-process MarketDataSource that records calls and peak concurrency. */
export class FakeSource implements MarketDataSource {
  readonly id = "fake";
  readonly calls: SourceCall[] = [];
  active = 0;
  maxActive = 0;

  constructor(private readonly handler: Handler) {}

  async getHistory(symbol: Ticker, start: IsoDate, end: IsoDate, signal?: AbortSignal): Promise<SourceOutcome> {
    const call = { symbol, start, end };
    this.calls.push(call);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      return await this.handler(call, this.calls.length - 1, signal);
    } finally {
      this.active--;
    }
  }

  callsFor(symbol: Ticker): SourceCall[] {
    return this.calls.filter((c) => c.symbol === symbol);
  }
}

/** Outcome with alternating closes for every trading day of the call's range. */
export function fullSeries(calendar: TradingCalendar, call: SourceCall): SourceOutcome {
  const dates = calendar.tradingDaysBetween(call.start, call.end);
  return { status: "ok", bars: barsFor(dates, alternatingCloses(dates.length)) };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** A promise that never settles. */
export function hang<T>(): Promise<T> {
  return new Promise<T>(() => {});
}
