import { mean } from "./stats.js";
import type { AnalyticsFrame, PeriodAverages, PriceBar, RiskFactor, RiskProfile, SymbolSummary } from "./types.js";

// Risk bands (daily return volatility, range drawdown, annualized risk ratio)
const HIGH_VOLATILITY = 0.08;
const MODERATE_VOLATILITY = 0.05;
const HIGH_DRAWDOWN = 0.2;
const MODERATE_DRAWDOWN = 0.1;
const WEAK_RISK_RATIO = 0.5;
const FAIR_RISK_RATIO = 1.0;

export interface RiskInputs {
  /** Daily return std of the summary window */
  readonly volatility: number;
  /** Range drawdown of the largest window */
  readonly rangeDrawdown: number;
  readonly annualizedRiskRatio: number | null;
}

const pct = (x: number): string => `${(x * 100).toFixed(1)}%`;

export function classifyRisk(inputs: RiskInputs): RiskProfile {
  const { volatility: vol, rangeDrawdown: dd, annualizedRiskRatio: ratio } = inputs;

  const volatility: RiskFactor =
    vol > HIGH_VOLATILITY
      ? { level: "High", description: `Significant price swings (${pct(vol)} volatility)` }
      : vol > MODERATE_VOLATILITY
        ? { level: "Moderate", description: `Moderate price fluctuations (${pct(vol)} volatility)` }
        : { level: "Low", description: `Relatively stable price movements (${pct(vol)} volatility)` };

  const drawdown: RiskFactor =
    dd > HIGH_DRAWDOWN
      ? { level: "High", description: `Large peak-to-trough declines (${pct(dd)})` }
      : dd > MODERATE_DRAWDOWN
        ? { level: "Moderate", description: `Moderate downside exposure (${pct(dd)})` }
        : { level: "Low", description: `Limited downside risk (${pct(dd)})` };

  // A flat window has no defined risk ratio; nothing inconsistent about it
  let consistency: RiskFactor;
  if (ratio === null) {
    consistency = { level: "Low", description: "No return variation in the window" };
  } else if (ratio < WEAK_RISK_RATIO) {
    consistency = { level: "High", description: `Inconsistent return patterns (risk ratio ${ratio.toFixed(2)})` };
  } else if (ratio < FAIR_RISK_RATIO) {
    consistency = { level: "Moderate", description: `Moderately consistent returns (risk ratio ${ratio.toFixed(2)})` };
  } else {
    consistency = { level: "Low", description: `Consistent return generation (risk ratio ${ratio.toFixed(2)})` };
  }

  return { volatility, drawdown, consistency };
}

/** Period means of the rolling metrics; null when the frame has no rows. */
export function averageMetrics(frame: AnalyticsFrame, window: number): PeriodAverages | null {
  const key = String(window);
  const largestKey = String(frame.windows[frame.windows.length - 1]);
  const own = frame.rows.map((row) => row.byWindow[key]).filter((m) => m !== undefined);
  const largest = frame.rows.map((row) => row.byWindow[largestKey]).filter((m) => m !== undefined);
  if (own.length === 0 || largest.length === 0) return null;

  const ratios = own.flatMap((m) => (m.annualizedRiskRatio === null ? [] : [m.annualizedRiskRatio]));
  return {
    volatility: mean(own.map((m) => m.returnStd)),
    returnMean: mean(own.map((m) => m.returnMean)),
    annualizedRiskRatio: ratios.length > 0 ? mean(ratios) : null,
    rangeDrawdown: mean(largest.map((m) => m.rangeDrawdown)),
    riskScore: mean(own.map((m) => m.riskScore)),
  };
}

/**
 * Whole-period statistics for one symbol, the latest rolling metrics for
 * `window`, and a risk profile from the period averages. `cleaned` is the
 * series the frame was computed from.
 */
export function summarizeFrame(frame: AnalyticsFrame, cleaned: readonly PriceBar[], window: number): SymbolSummary {
  const closes = cleaned.map((bar) => bar.close);
  const returns: number[] = [];
  let peak = closes[0];
  let maxDrawdown = 0;
  for (let i = 0; i < closes.length; i++) {
    if (i > 0) returns.push((closes[i] - closes[i - 1]) / closes[i - 1]);
    peak = Math.max(peak, closes[i]);
    maxDrawdown = Math.min(maxDrawdown, closes[i] / peak - 1);
  }

  const last = frame.rows.at(-1);
  const metrics = last?.byWindow[String(window)];
  const averages = averageMetrics(frame, window);

  return {
    symbol: frame.symbol,
    periodStart: cleaned[0].date,
    periodEnd: cleaned[cleaned.length - 1].date,
    periodDays: cleaned.length,
    avgClose: mean(closes),
    avgDailyReturn: returns.length > 0 ? mean(returns) : null,
    totalReturn: closes.length > 1 ? closes[closes.length - 1] / closes[0] - 1 : null,
    maxDrawdown,
    window,
    latest: last && metrics ? { date: last.date, ...metrics } : null,
    averages,
    risk: averages
      ? classifyRisk({
          volatility: averages.volatility,
          rangeDrawdown: averages.rangeDrawdown,
          annualizedRiskRatio: averages.annualizedRiskRatio,
        })
      : null,
  };
}

/** Riskiest first by latest risk score; summaries without one sort last, then by symbol. */
export function rankByRisk(summaries: readonly SymbolSummary[]): SymbolSummary[] {
  return [...summaries].sort((a, b) => {
    const ra = a.latest?.riskScore;
    const rb = b.latest?.riskScore;
    if (ra !== undefined && rb !== undefined && ra !== rb) return rb - ra;
    if (ra === undefined && rb !== undefined) return 1;
    if (ra !== undefined && rb === undefined) return -1;
    return a.symbol.localeCompare(b.symbol);
  });
}
