import { getMarketSession, marketAwareEndDate, type MarketSession, type TradingCalendar } from "../pipeline/calendar.js";
import type { IsoDate } from "../pipeline/types.js";

export interface ServiceStatus {
  readonly status: "ready";
  /** Wall clock in New York, for humans */
  readonly easternTime: string;
  readonly marketSession: MarketSession;
  /** End date a request without `end` will use */
  readonly defaultEndDate: IsoDate;
  readonly marketData: string;
  readonly timestamp: string;
}

export function getStatus(now: Date, calendar: TradingCalendar): ServiceStatus {
  const easternTime = now.toLocaleString("en-US", {
    timeZone: "America/New_York",
    weekday: "short", year: "numeric", month: "short", day: "numeric",
    hour: "2-digit", minute: "2-digit", second: "2-digit", hour12: true,
  });
  return {
    status: "ready",
    easternTime,
    marketSession: getMarketSession(now, calendar),
    defaultEndDate: marketAwareEndDate(now, calendar),
    marketData: "yahoo-finance (daily bars)",
    timestamp: now.toISOString(),
  };
}
