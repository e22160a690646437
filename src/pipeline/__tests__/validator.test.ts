import { describe, it, expect } from "vitest";
import { alternatingCloses, bar, barsFor, tradingDays, weekdayCalendar } from "../../../test/helpers.js";
import { DEFAULT_PIPELINE_CONFIG } from "../config.js";
import type { PriceBar, RawSeries } from "../types.js";
import { barProblem, validate } from "../validator.js";

const calendar = weekdayCalendar();
const config = DEFAULT_PIPELINE_CONFIG;

// 2024-01-02 .. 2024-01-15
const days = tradingDays(calendar, "2024-01-02", 10);
const context = { calendar, now: new Date("2024-01-16T21:00:00Z") };

function series(bars: PriceBar[], start = days[0], end = days[days.length - 1]): RawSeries {
  return { symbol: "TEST", start, end, bars };
}

describe("barProblem", () => {
  it("accepts a well-formed bar", () => {
    expect(barProblem(bar("2024-01-02", 100))).toBeNull();
  });

  it("names the broken invariant", () => {
    expect(barProblem(bar("2024-01-02", 100, { open: 0 }))).toBe("non-positive price");
    expect(barProblem(bar("2024-01-02", 100, { close: NaN }))).toBe("non-finite price");
    expect(barProblem(bar("2024-01-02", 100, { volume: -5 }))).toBe("invalid volume -5");
    expect(barProblem({ date: "2024-01-02", open: 100, high: 102, low: 101, close: 100.5, volume: 10 })).toBe(
      "OHLC ordering violated (o=100 h=102 l=101 c=100.5)",
    );
  });
});

describe("validate", () => {
  it("accepts a clean series with no issues", () => {
    const report = validate(series(barsFor(days, alternatingCloses(10))), config, context);
    expect(report.accepted).toBe(true);
    expect(report.issues).toEqual([]);
    expect(report.cleanedSeries).toHaveLength(10);
  });

  it("flags a +500% day as an anomaly and keeps the bar", () => {
    const closes = alternatingCloses(10);
    closes[7] = 600; // +500% over the 100 before it
    const report = validate(series(barsFor(days, closes)), config, context);

    expect(report.accepted).toBe(true);
    const anomalies = report.issues.filter((i) => i.kind === "anomaly");
    expect(anomalies.map((i) => i.date)).toEqual([days[7]]);
    expect(anomalies[0].severity).toBe("warning");
    expect(anomalies[0].message).toBe(
      `Return of 500.00% on ${days[7]} exceeds 100% in one day (possible split or bad print; not corrected)`,
    );
    expect(report.cleanedSeries?.map((b) => b.close)).toEqual(closes);
  });

  it("flags a move far outside the trailing volatility and keeps the bar", () => {
    // ±1% chop, then +4% (within 5σ), then +20% (well outside it)
    const closes = [100, 101, 100, 101, 100, 101, 105.04, 126.048, 127.31, 126.05];
    const report = validate(series(barsFor(days, closes)), config, context);

    expect(report.accepted).toBe(true);
    const anomalies = report.issues.filter((i) => i.kind === "anomaly");
    expect(anomalies).toEqual([
      {
        kind: "anomaly",
        severity: "warning",
        date: days[7],
        message: `Return of 20.00% on ${days[7]} exceeds 5 standard deviations of the trailing 6 returns (possible split or bad print; not corrected)`,
      },
    ]);
    expect(report.cleanedSeries?.map((b) => b.close)).toEqual(closes);
  });

  it("flags any move after a perfectly flat stretch", () => {
    const closes = [100, 100, 100, 100, 100, 100, 100, 101, 101, 101];
    const report = validate(series(barsFor(days, closes)), config, context);
    expect(report.issues.filter((i) => i.kind === "anomaly").map((i) => i.date)).toEqual([days[7]]);
  });

  it("keeps the first of duplicated dates and warns once per date", () => {
    const bars = barsFor(days, alternatingCloses(10));
    bars.push(bar(days[1], 555), bar(days[1], 556));
    const report = validate(series(bars), config, context);

    expect(report.issues).toEqual([
      {
        kind: "duplicate",
        severity: "warning",
        date: days[1],
        message: `Duplicate bars for ${days[1]}; kept the first valid copy`,
      },
    ]);
    expect(report.cleanedSeries?.[1].close).toBe(101);
    expect(report.cleanedSeries).toHaveLength(10);
  });

  it("prefers a later sane copy over a broken first one", () => {
    const bars = barsFor(days, alternatingCloses(10));
    bars[1] = { ...bars[1], close: -1 };
    bars.push(bar(days[1], 101));
    const report = validate(series(bars), config, context);

    expect(report.accepted).toBe(true);
    expect(report.issues.map((i) => [i.kind, i.date])).toEqual([["duplicate", days[1]]]);
    expect(report.cleanedSeries?.map((b) => b.date)).toEqual(days);
    expect(report.cleanedSeries?.[1].close).toBe(101);
  });

  it("drops bars outside the range or on closed days", () => {
    const bars = [...barsFor(days, alternatingCloses(10)), bar("2024-01-20", 100), bar("2024-01-06", 100)];
    const report = validate(series(bars), config, context);

    expect(report.issues.map((i) => [i.kind, i.date])).toEqual([
      ["non_trading_day", "2024-01-06"],
      ["out_of_range", "2024-01-20"],
    ]);
    expect(report.accepted).toBe(true);
    expect(report.cleanedSeries?.map((b) => b.date)).toEqual(days);
  });

  it("drops an invalid bar and reports the hole it leaves", () => {
    const long = tradingDays(calendar, "2024-01-02", 30);
    const bars = barsFor(long, alternatingCloses(30));
    bars[10] = { ...bars[10], low: bars[10].close + 0.5 };
    const end = long[29];
    const report = validate(series(bars, long[0], end), config, { calendar, now: new Date(`${end}T21:00:00Z`) });

    expect(report.accepted).toBe(true);
    expect(report.issues.map((i) => [i.kind, i.severity, i.date])).toEqual([
      ["invalid_bar", "error", long[10]],
      ["gap", "warning", long[10]],
    ]);
    expect(report.cleanedSeries).toHaveLength(29);
  });

  it("rejects a series with too many invalid bars", () => {
    const bars = barsFor(days, alternatingCloses(10));
    bars[4] = { ...bars[4], close: -1 };
    const report = validate(series(bars), config, context);

    expect(report.accepted).toBe(false);
    expect(report.cleanedSeries).toBeNull();
    const fatal = report.issues.filter((i) => i.severity === "fatal");
    expect(fatal.map((i) => i.kind)).toEqual(["too_many_invalid_bars"]);
    expect(fatal[0].message).toBe("1 of 10 bars failed price sanity (limit 5.0%)");
  });

  it("rejects when the missing fraction exceeds the threshold", () => {
    const bars = barsFor(days, alternatingCloses(10)).filter((_, i) => i !== 3 && i !== 6);
    const report = validate(series(bars), config, context);

    expect(report.accepted).toBe(false);
    expect(report.issues).toEqual([
      {
        kind: "incomplete",
        severity: "fatal",
        range: { start: days[0], end: days[9] },
        message: "2 of 10 trading days missing (20.0%, limit 10.0%)",
      },
    ]);
  });

  it("tolerates gaps at the threshold and groups contiguous ones", () => {
    const long = tradingDays(calendar, "2024-01-02", 30);
    const bars = barsFor(long, alternatingCloses(30)).filter((_, i) => i !== 12 && i !== 13);
    const end = long[29];
    const report = validate(series(bars, long[0], end), config, { calendar, now: new Date(`${end}T21:00:00Z`) });

    expect(report.accepted).toBe(true);
    expect(report.issues).toEqual([
      {
        kind: "gap",
        severity: "warning",
        range: { start: long[12], end: long[13] },
        message: `Missing 2 trading days ${long[12]}..${long[13]}`,
      },
    ]);
  });

  it("warns when the latest bar is stale", () => {
    const report = validate(series(barsFor(days, alternatingCloses(10))), config, {
      calendar,
      now: new Date("2024-01-25T12:00:00Z"),
    });
    expect(report.accepted).toBe(true);
    expect(report.issues).toEqual([
      { kind: "stale", severity: "warning", date: "2024-01-15", message: "Latest bar 2024-01-15 is 10 days old (limit 5)" },
    ]);
  });

  it("rejects an empty series", () => {
    const report = validate(series([]), config, context);
    expect(report.accepted).toBe(false);
    expect(report.issues.map((i) => [i.kind, i.severity])).toEqual([["empty", "fatal"]]);
  });

  it("rejects fewer bars than minBars", () => {
    const report = validate(series([bar(days[9], 100)], days[9], days[9]), config, context);
    expect(report.accepted).toBe(false);
    expect(report.issues.map((i) => i.kind)).toEqual(["insufficient_history"]);
  });

  it("does not modify its input", () => {
    const bars = [bar(days[2], 100), bar(days[0], 101), bar(days[1], 100)];
    const snapshot = structuredClone(bars);
    validate(series(bars, days[0], days[2]), config, context);
    expect(bars).toEqual(snapshot);
  });

  it("only ever returns bars that satisfy the price invariant", () => {
    const bars = barsFor(days, alternatingCloses(10));
    bars[2] = { ...bars[2], high: 1 };
    const report = validate(series(bars), { ...config, maxInvalidBarFraction: 0.5, completenessThreshold: 0.5 }, context);
    expect(report.accepted).toBe(true);
    expect(report.cleanedSeries?.every((b) => barProblem(b) === null)).toBe(true);
  });
});
