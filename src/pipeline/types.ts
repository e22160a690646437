/** Calendar date, "YYYY-MM-DD". */
export type IsoDate = string;

/** Upper-cased ticker, e.g. "AAPL" or "BRK-B". */
export type Ticker = string;

export interface DateRange {
  readonly start: IsoDate;
  readonly end: IsoDate;
}

/** One trading-day observation. */
export interface PriceBar {
  readonly date: IsoDate;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/** Bars as returned by a source: may hold gaps, duplicates and out-of-range dates. */
export interface RawSeries {
  readonly symbol: Ticker;
  readonly start: IsoDate;
  readonly end: IsoDate;
  readonly bars: readonly PriceBar[];
}

// ── Market data source ───────────────────────────────────────────────────

export type TransientReason = "timeout" | "rate_limit" | "network" | "empty";
export type PermanentReason = "unknown_symbol" | "bad_request";

/**
 * Tagged outcome of a single provider call. Providers never throw for
 * expected failures; the fetcher branches on `status`.
 */
export type SourceOutcome =
  | { readonly status: "ok"; readonly bars: readonly PriceBar[] }
  | { readonly status: "transient"; readonly reason: TransientReason; readonly message: string }
  | { readonly status: "permanent"; readonly reason: PermanentReason; readonly message: string };

export interface MarketDataSource {
  readonly id: string;
  getHistory(symbol: Ticker, start: IsoDate, end: IsoDate, signal?: AbortSignal): Promise<SourceOutcome>;
}

// ── Validation ───────────────────────────────────────────────────────────

export type IssueKind =
  | "incomplete"
  | "gap"
  | "duplicate"
  | "stale"
  | "invalid_bar"
  | "too_many_invalid_bars"
  | "out_of_range"
  | "non_trading_day"
  | "anomaly"
  | "empty"
  | "insufficient_history";

/** `error` drops a single bar; `fatal` rejects the whole series. */
export type IssueSeverity = "warning" | "error" | "fatal";

export interface Issue {
  readonly kind: IssueKind;
  readonly severity: IssueSeverity;
  readonly date?: IsoDate;
  readonly range?: DateRange;
  readonly message: string;
}

export interface ValidationReport {
  readonly symbol: Ticker;
  readonly accepted: boolean;
  readonly issues: readonly Issue[];
  /** null when the series was rejected */
  readonly cleanedSeries: readonly PriceBar[] | null;
}

// ── Analytics ────────────────────────────────────────────────────────────

export interface WindowMetrics {
  readonly closeMean: number;
  readonly closeStd: number;
  readonly returnMean: number;
  /** Rolling volatility of daily returns */
  readonly returnStd: number;
  /** null when returnStd is exactly 0 */
  readonly riskRatio: number | null;
  readonly annualizedRiskRatio: number | null;
  /** (max - min) / max of closes over the window */
  readonly rangeDrawdown: number;
  readonly riskScore: number;
}

export interface AnalyticsRow {
  readonly date: IsoDate;
  readonly close: number;
  readonly dailyReturn: number;
  readonly cumulativeReturn: number;
  readonly drawdown: number;
  /** Keyed by window size, e.g. byWindow["21"] */
  readonly byWindow: Readonly<Record<string, WindowMetrics>>;
}

export interface AnalyticsFrame {
  readonly symbol: Ticker;
  readonly windows: readonly number[];
  /** Leading bars omitted for lack of history */
  readonly warmup: number;
  readonly rows: readonly AnalyticsRow[];
}

// ── Results ──────────────────────────────────────────────────────────────

export type RiskLevel = "High" | "Moderate" | "Low";

export interface RiskFactor {
  readonly level: RiskLevel;
  readonly description: string;
}

export interface RiskProfile {
  readonly volatility: RiskFactor;
  readonly drawdown: RiskFactor;
  readonly consistency: RiskFactor;
}

/** Means over every analytics row of the period. */
export interface PeriodAverages {
  /** Rolling return std of the summary window */
  readonly volatility: number;
  /** Rolling mean daily return of the summary window */
  readonly returnMean: number;
  /** Over the rows where it is defined; null when it never is */
  readonly annualizedRiskRatio: number | null;
  /** Range drawdown of the largest window */
  readonly rangeDrawdown: number;
  readonly riskScore: number;
}

export interface SymbolSummary {
  readonly symbol: Ticker;
  readonly periodStart: IsoDate;
  readonly periodEnd: IsoDate;
  readonly periodDays: number;
  readonly avgClose: number;
  readonly avgDailyReturn: number | null;
  readonly totalReturn: number | null;
  /** Deepest drawdown from running peak over the whole cleaned series */
  readonly maxDrawdown: number;
  /** Window the `latest` metrics refer to */
  readonly window: number;
  readonly latest: (WindowMetrics & { readonly date: IsoDate }) | null;
  readonly averages: PeriodAverages | null;
  /** Classified from `averages` */
  readonly risk: RiskProfile | null;
}

export type FailureKind = "input" | "fetch_failed" | "permanent" | "rejected" | "timeout" | "cancelled";

export interface SymbolFailure {
  readonly kind: FailureKind;
  readonly message: string;
  readonly attempts?: number;
  readonly issues?: readonly Issue[];
}

export type SymbolOutcome =
  | {
      readonly status: "ok";
      readonly frame: AnalyticsFrame;
      readonly summary: SymbolSummary;
      readonly warnings: readonly Issue[];
      readonly attempts: number;
    }
  | { readonly status: "failed"; readonly failure: SymbolFailure };

export interface PipelineResult {
  readonly range: DateRange;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly perSymbol: Readonly<Record<Ticker, SymbolOutcome>>;
}
