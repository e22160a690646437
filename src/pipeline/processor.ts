import { InputError } from "./errors.js";
import { mean, sampleStd } from "./stats.js";
import type { AnalyticsFrame, AnalyticsRow, PriceBar, Ticker, WindowMetrics } from "./types.js";

const TRADING_DAYS_PER_YEAR = 252;

// Weights of the composite risk score
const VOLATILITY_WEIGHT = 0.7;
const RANGE_DRAWDOWN_WEIGHT = 0.3;

export function normalizeWindows(windows: readonly number[]): number[] {
  const bad = windows.filter((w) => !Number.isInteger(w) || w < 2);
  if (windows.length === 0 || bad.length > 0) {
    throw new InputError(`Window sizes must be integers >= 2, got [${windows.join(", ")}]`);
  }
  return [...new Set(windows)].sort((a, b) => a - b);
}

function windowMetrics(closes: readonly number[], returns: readonly number[]): WindowMetrics {
  const returnMean = mean(returns);
  const returnStd = sampleStd(returns);
  const riskRatio = returnStd === 0 ? null : returnMean / returnStd;
  const max = Math.max(...closes);
  const min = Math.min(...closes);
  const rangeDrawdown = (max - min) / max;

  return {
    closeMean: mean(closes),
    closeStd: sampleStd(closes),
    returnMean,
    returnStd,
    riskRatio,
    annualizedRiskRatio: riskRatio === null ? null : riskRatio * Math.sqrt(TRADING_DAYS_PER_YEAR),
    rangeDrawdown,
    riskScore: VOLATILITY_WEIGHT * returnStd + RANGE_DRAWDOWN_WEIGHT * rangeDrawdown,
  };
}

/**
 * Rolling analytics over a cleaned, ascending series. Rows begin once the
 * largest window has a full history, so every row carries every window.
 *
 * Deterministic and side-effect free; the input is not modified.
 */
export function computeAnalytics(symbol: Ticker, cleaned: readonly PriceBar[], windows: readonly number[]): AnalyticsFrame {
  const sizes = normalizeWindows(windows);
  const warmup = sizes[sizes.length - 1];
  const closes = cleaned.map((bar) => bar.close);

  // returns[j] is the return into bar j + 1
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    returns.push((closes[i] - closes[i - 1]) / closes[i - 1]);
  }

  const rows: AnalyticsRow[] = [];
  let growth = 1;
  let peak = closes.length > 0 ? closes[0] : 0;

  for (let i = 1; i < closes.length; i++) {
    const dailyReturn = returns[i - 1];
    growth *= 1 + dailyReturn;
    peak = Math.max(peak, closes[i]);
    if (i < warmup) continue;

    const byWindow: Record<string, WindowMetrics> = {};
    for (const w of sizes) {
      byWindow[String(w)] = windowMetrics(closes.slice(i - w + 1, i + 1), returns.slice(i - w, i));
    }

    rows.push({
      date: cleaned[i].date,
      close: closes[i],
      dailyReturn,
      cumulativeReturn: growth - 1,
      drawdown: closes[i] / peak - 1,
      byWindow,
    });
  }

  return { symbol, windows: sizes, warmup, rows };
}
