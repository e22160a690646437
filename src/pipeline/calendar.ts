import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { DateRange, IsoDate } from "./types.js";

const DAY_MS = 86_400_000;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

// ── Date helpers (UTC calendar arithmetic, no time-of-day) ───────────────

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_RE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function toIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return toIsoDate(d);
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / DAY_MS);
}

function isWeekend(date: IsoDate): boolean {
  const day = new Date(`${date}T00:00:00Z`).getUTCDay();
  return day === 0 || day === 6;
}

// ── Calendar ─────────────────────────────────────────────────────────────

/**
 * Authoritative set of trading days for a market. Implementations must be
 * pure so fetchers and validators can be tested against a fake calendar.
 */
export interface TradingCalendar {
  isTradingDay(date: IsoDate): boolean;
  /** Latest trading day strictly before `date`. */
  priorTradingDay(date: IsoDate): IsoDate;
  /** Earliest trading day strictly after `date`. */
  nextTradingDay(date: IsoDate): IsoDate;
  /** Trading days in [start, end], ascending. */
  tradingDaysBetween(start: IsoDate, end: IsoDate): IsoDate[];
}

/** Weekday calendar minus the given full-day closures. */
export function createHolidayCalendar(holidays: Iterable<IsoDate>): TradingCalendar {
  const closed = new Set(holidays);

  const isTradingDay = (date: IsoDate): boolean => !isWeekend(date) && !closed.has(date);

  function step(date: IsoDate, direction: 1 | -1): IsoDate {
    let cursor = addDays(date, direction);
    // A run of weekends and holidays never spans more than a couple of weeks
    while (!isTradingDay(cursor)) cursor = addDays(cursor, direction);
    return cursor;
  }

  return {
    isTradingDay,
    priorTradingDay: (date) => step(date, -1),
    nextTradingDay: (date) => step(date, 1),
    tradingDaysBetween(start, end) {
      const days: IsoDate[] = [];
      for (let cursor = start; cursor <= end; cursor = addDays(cursor, 1)) {
        if (isTradingDay(cursor)) days.push(cursor);
      }
      return days;
    },
  };
}

/**
 * Snap a requested range onto trading days: the end moves back to the prior
 * trading day, the start forward to the next one. Returns null when no
 * trading day remains.
 */
export function clampToTradingDays(calendar: TradingCalendar, range: DateRange): DateRange | null {
  const end = calendar.isTradingDay(range.end) ? range.end : calendar.priorTradingDay(range.end);
  const start = calendar.isTradingDay(range.start) ? range.start : calendar.nextTradingDay(range.start);
  return start <= end ? { start, end } : null;
}

// ── NYSE ─────────────────────────────────────────────────────────────────

const HolidayFileSchema = z.object({
  market: z.string(),
  timezone: z.string(),
  holidays: z.record(z.string().regex(ISO_DATE_RE), z.string()),
});

export type HolidayFile = z.infer<typeof HolidayFileSchema>;

// data/ sits at the repo root: two levels up from src/pipeline, three from dist/src/pipeline
const HOLIDAY_FILE_CANDIDATES = ["../../data/nyse-holidays.json", "../../../data/nyse-holidays.json"];

export function loadHolidayFile(): HolidayFile {
  for (const candidate of HOLIDAY_FILE_CANDIDATES) {
    const filePath = fileURLToPath(new URL(candidate, import.meta.url));
    if (existsSync(filePath)) {
      return HolidayFileSchema.parse(JSON.parse(readFileSync(filePath, "utf-8")));
    }
  }
  throw new Error("nyse-holidays.json not found");
}

let nyse: TradingCalendar | null = null;

/** NYSE calendar from data/nyse-holidays.json; dates outside the table fall back to weekdays. */
export function nyseCalendar(): TradingCalendar {
  if (!nyse) nyse = createHolidayCalendar(Object.keys(loadHolidayFile().holidays));
  return nyse;
}

// ── Market clock ─────────────────────────────────────────────────────────

const MARKET_TZ = "America/New_York";
const CLOSE_MINUTES = 16 * 60;

export type MarketSession = "pre-market" | "regular" | "after-hours" | "closed";

function easternClock(now: Date): { date: IsoDate; minutes: number } {
  const et = new Date(now.toLocaleString("en-US", { timeZone: MARKET_TZ }));
  const date = [
    et.getFullYear(),
    String(et.getMonth() + 1).padStart(2, "0"),
    String(et.getDate()).padStart(2, "0"),
  ].join("-");
  return { date, minutes: et.getHours() * 60 + et.getMinutes() };
}

export function getMarketSession(now: Date, calendar: TradingCalendar): MarketSession {
  const { date, minutes } = easternClock(now);
  if (!calendar.isTradingDay(date)) return "closed";
  if (minutes >= 240 && minutes < 570) return "pre-market";
  if (minutes >= 570 && minutes < CLOSE_MINUTES) return "regular";
  if (minutes >= CLOSE_MINUTES && minutes < 1200) return "after-hours";
  return "closed";
}

/**
 * Latest session with a final close: today once the bell has rung in New York,
 * otherwise the previous day, then snapped back to a trading day.
 */
export function marketAwareEndDate(now: Date, calendar: TradingCalendar): IsoDate {
  const { date, minutes } = easternClock(now);
  const candidate = minutes >= CLOSE_MINUTES ? date : addDays(date, -1);
  return calendar.isTradingDay(candidate) ? candidate : calendar.priorTradingDay(candidate);
}
