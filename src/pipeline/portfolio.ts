import { mean } from "./stats.js";
import type { SymbolSummary, Ticker } from "./types.js";

// Regime thresholds over the selection
const BULL_POSITIVE_SHARE = 0.7;
const BULL_AVG_RETURN = 0.1;
const BEAR_POSITIVE_SHARE = 0.4;
const HIGH_AVG_VOLATILITY = 0.08;

const ELEVATED_RISK_SCORE = 0.08;
const RELATIVE_RETURN_GAP = 0.05;
const TOP_N = 3;
const FALLBACK_VOLATILITY = 0.05;

export type RegimeName = "Bull Market" | "Bear Market" | "High Volatility" | "Neutral Market";

export interface MarketRegime {
  readonly regime: RegimeName;
  readonly confidence: "High" | "Medium";
  readonly description: string;
  readonly characteristics: string;
}

export type InsightKind =
  | "top_risk_adjusted"
  | "top_return"
  | "most_stable"
  | "risk_concentration"
  | "risk_distribution"
  | "relative_performance"
  | "risk_efficiency"
  | "risk_mismatch";

export interface Insight {
  readonly kind: InsightKind;
  readonly message: string;
}

/** 0-100 scores, one decimal. */
export interface QualityMetrics {
  readonly consistency: number;
  readonly efficiency: number;
  readonly growth: number;
  readonly overall: number;
}

export interface SelectionContext {
  readonly avgReturn: number;
  readonly avgVolatility: number;
}

export interface PortfolioAnalysis {
  /** Null for an empty selection */
  readonly regime: MarketRegime | null;
  readonly insights: readonly Insight[];
  readonly symbols: Readonly<Record<Ticker, { readonly quality: QualityMetrics; readonly context: readonly Insight[] }>>;
}

const pct0 = (x: number): string => `${(x * 100).toFixed(0)}%`;
const pct1 = (x: number): string => `${(x * 100).toFixed(1)}%`;

const clampScore = (x: number): number => Math.round(Math.min(100, Math.max(0, x)) * 10) / 10;

function defined(values: ReadonlyArray<number | null | undefined>): number[] {
  return values.flatMap((v) => (v === null || v === undefined ? [] : [v]));
}

/** Mean over the values present; `fallback` when none are. */
function meanOf(values: ReadonlyArray<number | null | undefined>, fallback: number): number {
  const present = defined(values);
  return present.length > 0 ? mean(present) : fallback;
}

export function selectionContext(summaries: readonly SymbolSummary[]): SelectionContext {
  return {
    avgReturn: meanOf(summaries.map((s) => s.totalReturn), 0),
    avgVolatility: meanOf(summaries.map((s) => s.averages?.volatility), FALLBACK_VOLATILITY),
  };
}

/**
 * Direction of the selection as a whole. Breadth and average return decide
 * bull or bear; failing both, average volatility decides between a volatile
 * and a neutral market.
 */
export function detectMarketRegime(summaries: readonly SymbolSummary[]): MarketRegime | null {
  if (summaries.length === 0) return null;

  const positiveShare = summaries.filter((s) => s.totalReturn !== null && s.totalReturn > 0).length / summaries.length;
  const { avgReturn, avgVolatility } = selectionContext(summaries);
  const breadth = `${pct0(positiveShare)} of stocks positive with ${pct1(avgReturn)} average return`;

  if (positiveShare > BULL_POSITIVE_SHARE && avgReturn > BULL_AVG_RETURN) {
    return {
      regime: "Bull Market",
      confidence: "High",
      description: breadth,
      characteristics: "Broad-based gains with strong momentum",
    };
  }
  if (positiveShare < BEAR_POSITIVE_SHARE && avgReturn < 0) {
    return {
      regime: "Bear Market",
      confidence: "High",
      description: breadth,
      characteristics: "Widespread declines across holdings",
    };
  }
  if (avgVolatility > HIGH_AVG_VOLATILITY) {
    return {
      regime: "High Volatility",
      confidence: "Medium",
      description: `Average volatility at ${pct1(avgVolatility)}`,
      characteristics: "Elevated uncertainty and price swings",
    };
  }
  return {
    regime: "Neutral Market",
    confidence: "Medium",
    description: `${pct0(positiveShare)} positive stocks, ${pct1(avgVolatility)} average volatility`,
    characteristics: "Mixed signals with no clear directional bias",
  };
}

function pick(
  summaries: readonly SymbolSummary[],
  value: (s: SymbolSummary) => number | null | undefined,
  order: "desc" | "asc",
): Ticker[] {
  const scored = summaries.flatMap((s) => {
    const v = value(s);
    return v === null || v === undefined ? [] : [{ symbol: s.symbol, v }];
  });
  scored.sort((a, b) => (order === "desc" ? b.v - a.v : a.v - b.v) || a.symbol.localeCompare(b.symbol));
  return scored.slice(0, TOP_N).map((x) => x.symbol);
}

/** Leaders of the selection and how risk is spread across it. Factual only. */
export function portfolioInsights(summaries: readonly SymbolSummary[]): Insight[] {
  if (summaries.length === 0) return [];
  const insights: Insight[] = [];

  const topRatio = pick(summaries, (s) => s.averages?.annualizedRiskRatio, "desc");
  if (topRatio.length > 0) {
    insights.push({
      kind: "top_risk_adjusted",
      message: `Highest risk-adjusted returns: ${topRatio.join(", ")} show the best risk ratios in the selection`,
    });
  }
  const topReturn = pick(summaries, (s) => s.totalReturn, "desc");
  if (topReturn.length > 0) {
    insights.push({
      kind: "top_return",
      message: `Top absolute returns: ${topReturn.join(", ")} delivered the highest total returns`,
    });
  }
  const stable = pick(summaries, (s) => s.averages?.riskScore, "asc");
  if (stable.length > 0) {
    insights.push({
      kind: "most_stable",
      message: `Most stable: ${stable.join(", ")} exhibit the lowest risk scores`,
    });
  }

  const total = summaries.length;
  const elevated = summaries.filter((s) => (s.averages?.riskScore ?? 0) > ELEVATED_RISK_SCORE).length;
  const share = `${((elevated / total) * 100).toFixed(0)}% of the selection (${elevated}/${total} stocks) shows elevated risk`;
  if (elevated / total > 0.5) {
    insights.push({ kind: "risk_concentration", message: `Risk concentration: ${share}` });
  } else if (elevated > 0) {
    insights.push({ kind: "risk_distribution", message: `Risk distribution: ${share}` });
  } else {
    insights.push({
      kind: "risk_distribution",
      message: "Risk distribution: all selected stocks show moderate to low risk",
    });
  }
  return insights;
}

/** How one symbol did against the selection it was run with. */
export function performanceContext(summary: SymbolSummary, context: SelectionContext): Insight[] {
  const insights: Insight[] = [];
  const { symbol } = summary;
  const totalReturn = summary.totalReturn ?? 0;
  const volatility = summary.averages?.volatility ?? 0;

  const gap = totalReturn - context.avgReturn;
  if (Math.abs(gap) > RELATIVE_RETURN_GAP) {
    const direction = gap > 0 ? "outperformed" : "underperformed";
    insights.push({
      kind: "relative_performance",
      message: `${symbol} ${direction} the selection average by ${pct1(Math.abs(gap))}`,
    });
  }

  if (volatility < context.avgVolatility * 0.8 && totalReturn > context.avgReturn) {
    insights.push({
      kind: "risk_efficiency",
      message: `${symbol} achieved above-average returns (${pct1(totalReturn)}) with below-average risk (${pct1(volatility)})`,
    });
  } else if (volatility > context.avgVolatility * 1.2 && totalReturn < context.avgReturn) {
    insights.push({
      kind: "risk_mismatch",
      message: `${symbol} shows higher risk (${pct1(volatility)}) than average but lower returns (${pct1(totalReturn)})`,
    });
  }
  return insights;
}

/**
 * Consistency from the average annualized risk ratio, efficiency as total
 * return per unit of average risk score, growth from the annualized average
 * daily return. Overall weights them 40/40/20.
 */
export function qualityMetrics(summary: SymbolSummary): QualityMetrics {
  const avg = summary.averages;
  const ratio = avg?.annualizedRiskRatio ?? 0;
  const riskScore = avg?.riskScore ?? 0;
  const totalReturn = summary.totalReturn ?? 0;
  const dailyMean = avg?.returnMean ?? 0;

  const consistency = Math.min(100, Math.max(0, (ratio + 1) * 40));
  const efficiency = riskScore > 0 ? Math.min(100, Math.max(0, (totalReturn / riskScore) * 5)) : 0;
  const growth = Math.min(100, Math.max(0, (dailyMean * 252 + 0.1) * 200));
  const overall = consistency * 0.4 + efficiency * 0.4 + growth * 0.2;

  return {
    consistency: clampScore(consistency),
    efficiency: clampScore(efficiency),
    growth: clampScore(growth),
    overall: clampScore(overall),
  };
}

export function analyzePortfolio(summaries: readonly SymbolSummary[]): PortfolioAnalysis {
  const context = selectionContext(summaries);
  const symbols: Record<Ticker, { quality: QualityMetrics; context: Insight[] }> = {};
  for (const summary of summaries) {
    symbols[summary.symbol] = { quality: qualityMetrics(summary), context: performanceContext(summary, context) };
  }
  return { regime: detectMarketRegime(summaries), insights: portfolioInsights(summaries), symbols };
}
