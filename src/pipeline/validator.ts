import { daysBetween, isIsoDate, toIsoDate, type TradingCalendar } from "./calendar.js";
import type { PipelineConfig } from "./config.js";
import { byDate } from "./fetcher.js";
import { sampleStd } from "./stats.js";
import type { IsoDate, Issue, PriceBar, RawSeries, ValidationReport } from "./types.js";

export type ValidatorConfig = Pick<
  PipelineConfig,
  | "completenessThreshold"
  | "stalenessMaxDays"
  | "anomalyK"
  | "anomalyWindow"
  | "extremeReturnThreshold"
  | "maxInvalidBarFraction"
  | "minBars"
>;

export interface ValidationContext {
  readonly calendar: TradingCalendar;
  /** Reference point for staleness */
  readonly now: Date;
}

/** Fewest trailing returns the k-sigma rule needs before it fires */
const MIN_ANOMALY_HISTORY = 5;

/** Why a bar breaks the PriceBar invariant, or null if it holds. */
export function barProblem(bar: PriceBar): string | null {
  const { open, high, low, close, volume } = bar;
  const prices = [open, high, low, close];
  if (!prices.every(Number.isFinite)) return "non-finite price";
  if (prices.some((p) => p <= 0)) return "non-positive price";
  if (!Number.isFinite(volume) || volume < 0) return `invalid volume ${volume}`;
  if (low > Math.min(open, close) || high < Math.max(open, close)) {
    return `OHLC ordering violated (o=${open} h=${high} l=${low} c=${close})`;
  }
  return null;
}

/** Group missing trading days into runs that are contiguous on the calendar. */
function missingRuns(expected: readonly IsoDate[], present: ReadonlySet<IsoDate>): IsoDate[][] {
  const runs: IsoDate[][] = [];
  let current: IsoDate[] = [];
  for (const day of expected) {
    if (present.has(day)) {
      if (current.length > 0) runs.push(current);
      current = [];
    } else {
      current.push(day);
    }
  }
  if (current.length > 0) runs.push(current);
  return runs;
}

function detectAnomalies(bars: readonly PriceBar[], config: ValidatorConfig): Issue[] {
  const issues: Issue[] = [];
  const returns: number[] = [];
  const minHistory = Math.min(config.anomalyWindow, MIN_ANOMALY_HISTORY);

  for (let i = 1; i < bars.length; i++) {
    const r = (bars[i].close - bars[i - 1].close) / bars[i - 1].close;
    const trailing = returns.slice(-config.anomalyWindow);
    returns.push(r);

    let reason: string | null = null;
    if (Math.abs(r) > config.extremeReturnThreshold) {
      reason = `exceeds ${(config.extremeReturnThreshold * 100).toFixed(0)}% in one day`;
    } else if (trailing.length >= minHistory) {
      const std = sampleStd(trailing);
      if (std === 0 ? r !== 0 : Math.abs(r) > config.anomalyK * std) {
        reason = `exceeds ${config.anomalyK} standard deviations of the trailing ${trailing.length} returns`;
      }
    }

    if (reason) {
      issues.push({
        kind: "anomaly",
        severity: "warning",
        date: bars[i].date,
        message: `Return of ${(r * 100).toFixed(2)}% on ${bars[i].date} ${reason} (possible split or bad print; not corrected)`,
      });
    }
  }
  return issues;
}

/**
 * Data-quality gate between fetch and analytics. Pure: the raw series is not
 * modified and the report carries its own cleaned copy.
 */
export function validate(raw: RawSeries, config: ValidatorConfig, context: ValidationContext): ValidationReport {
  const { calendar } = context;
  const issues: Issue[] = [];
  const sorted = [...raw.bars].sort(byDate);

  // 1. Dates: malformed, outside the request, or not a session
  const malformed: PriceBar[] = [];
  const candidates: PriceBar[] = [];
  for (const bar of sorted) {
    if (!isIsoDate(bar.date)) {
      malformed.push(bar);
    } else if (bar.date < raw.start || bar.date > raw.end) {
      issues.push({
        kind: "out_of_range",
        severity: "warning",
        date: bar.date,
        message: `Bar dated ${bar.date} is outside ${raw.start}..${raw.end}; dropped`,
      });
    } else if (!calendar.isTradingDay(bar.date)) {
      issues.push({
        kind: "non_trading_day",
        severity: "warning",
        date: bar.date,
        message: `Bar dated ${bar.date} falls on a non-trading day; dropped`,
      });
    } else {
      candidates.push(bar);
    }
  }

  // 2. Duplicates: the first copy that passes price sanity wins, else the first
  const deduped: PriceBar[] = [];
  for (const bar of candidates) {
    const prev = deduped.at(-1);
    if (prev && prev.date === bar.date) {
      const lastIssue = issues.at(-1);
      if (!(lastIssue?.kind === "duplicate" && lastIssue.date === bar.date)) {
        issues.push({
          kind: "duplicate",
          severity: "warning",
          date: bar.date,
          message: `Duplicate bars for ${bar.date}; kept the first valid copy`,
        });
      }
      if (barProblem(prev) !== null && barProblem(bar) === null) deduped[deduped.length - 1] = bar;
      continue;
    }
    deduped.push(bar);
  }

  // 3. Price sanity: drop offending bars, reject the series if too many go
  const cleaned: PriceBar[] = [];
  for (const bar of malformed) {
    issues.push({ kind: "invalid_bar", severity: "error", message: `Unparseable bar date "${bar.date}"; dropped` });
  }
  for (const bar of deduped) {
    const problem = barProblem(bar);
    if (problem) {
      issues.push({ kind: "invalid_bar", severity: "error", date: bar.date, message: `${bar.date}: ${problem}; dropped` });
    } else {
      cleaned.push(bar);
    }
  }
  const considered = deduped.length + malformed.length;
  const dropped = considered - cleaned.length;
  if (considered > 0 && dropped / considered > config.maxInvalidBarFraction) {
    issues.push({
      kind: "too_many_invalid_bars",
      severity: "fatal",
      range: { start: raw.start, end: raw.end },
      message: `${dropped} of ${considered} bars failed price sanity (limit ${(config.maxInvalidBarFraction * 100).toFixed(1)}%)`,
    });
  }

  // 4. Enough left to work with
  if (cleaned.length === 0) {
    issues.push({
      kind: "empty",
      severity: "fatal",
      range: { start: raw.start, end: raw.end },
      message: `No usable bars between ${raw.start} and ${raw.end}`,
    });
  } else if (cleaned.length < config.minBars) {
    issues.push({
      kind: "insufficient_history",
      severity: "fatal",
      range: { start: raw.start, end: raw.end },
      message: `Only ${cleaned.length} usable bars; at least ${config.minBars} required`,
    });
  }

  if (cleaned.length > 0) {
    // 5. Completeness against the calendar; gaps are reported, never filled
    const expected = calendar.tradingDaysBetween(raw.start, raw.end);
    if (expected.length > 0) {
      const present = new Set(cleaned.map((bar) => bar.date));
      const runs = missingRuns(expected, present);
      const missing = runs.reduce((sum, run) => sum + run.length, 0);
      const fraction = missing / expected.length;
      if (fraction > config.completenessThreshold) {
        issues.push({
          kind: "incomplete",
          severity: "fatal",
          range: { start: raw.start, end: raw.end },
          message: `${missing} of ${expected.length} trading days missing (${(fraction * 100).toFixed(1)}%, limit ${(config.completenessThreshold * 100).toFixed(1)}%)`,
        });
      } else {
        for (const run of runs) {
          const start = run[0];
          const end = run[run.length - 1];
          issues.push(
            run.length === 1
              ? { kind: "gap", severity: "warning", date: start, message: `Missing trading day ${start}` }
              : {
                  kind: "gap",
                  severity: "warning",
                  range: { start, end },
                  message: `Missing ${run.length} trading days ${start}..${end}`,
                },
          );
        }
      }
    }

    // 6. Staleness
    const last = cleaned[cleaned.length - 1];
    const age = daysBetween(last.date, toIsoDate(context.now));
    if (age > config.stalenessMaxDays) {
      issues.push({
        kind: "stale",
        severity: "warning",
        date: last.date,
        message: `Latest bar ${last.date} is ${age} days old (limit ${config.stalenessMaxDays})`,
      });
    }

    // 7. Return anomalies: flagged, kept
    issues.push(...detectAnomalies(cleaned, config));
  }

  const accepted = !issues.some((issue) => issue.severity === "fatal");
  return {
    symbol: raw.symbol,
    accepted,
    issues,
    cleanedSeries: accepted ? cleaned : null,
  };
}
