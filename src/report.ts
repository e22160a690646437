import { analyzePortfolio, type QualityMetrics } from "./pipeline/portfolio.js";
import { rankByRisk } from "./pipeline/summary.js";
import type { PipelineResult, SymbolSummary } from "./pipeline/types.js";

const pct = (x: number | null | undefined): string => (x === null || x === undefined ? "n/a" : `${(x * 100).toFixed(2)}%`);
const num = (x: number | null | undefined): string => (x === null || x === undefined ? "n/a" : x.toFixed(2));

function summaryLine(s: SymbolSummary, quality: QualityMetrics | undefined): string {
  const risk = s.risk ? `${s.risk.volatility.level}/${s.risk.drawdown.level}/${s.risk.consistency.level}` : "n/a";
  return [
    s.symbol.padEnd(8),
    `${s.periodStart}..${s.periodEnd}`,
    `days=${s.periodDays}`,
    `total=${pct(s.totalReturn)}`,
    `maxDD=${pct(s.maxDrawdown)}`,
    `vol${s.window}=${pct(s.latest?.returnStd)}`,
    `ratio=${num(s.latest?.annualizedRiskRatio)}`,
    `score=${s.latest ? s.latest.riskScore.toFixed(4) : "n/a"}`,
    `quality=${s.averages && quality ? quality.overall.toFixed(1) : "n/a"}`,
    `risk=${risk}`,
  ].join("  ");
}

/**
 * Plain-text run report: ranked summaries, the selection's regime and
 * insights, then one line per failed symbol.
 */
export function formatResult(result: PipelineResult): string {
  const lines = [`Range ${result.range.start}..${result.range.end}`];
  const summaries: SymbolSummary[] = [];
  const failures: string[] = [];
  for (const [symbol, outcome] of Object.entries(result.perSymbol)) {
    if (outcome.status === "ok") {
      summaries.push(outcome.summary);
    } else {
      failures.push(`${symbol.padEnd(8)}  FAILED (${outcome.failure.kind}): ${outcome.failure.message}`);
    }
  }
  const portfolio = analyzePortfolio(summaries);
  for (const summary of rankByRisk(summaries)) lines.push(summaryLine(summary, portfolio.symbols[summary.symbol]?.quality));
  if (portfolio.regime) {
    const { regime, confidence, description } = portfolio.regime;
    lines.push(`Regime    ${regime} (${confidence} confidence): ${description}`);
  }
  for (const insight of portfolio.insights) lines.push(`  ${insight.message}`);
  lines.push(...failures);
  return lines.join("\n");
}

/** True when at least one symbol produced analytics. */
export function anySucceeded(result: PipelineResult): boolean {
  return Object.values(result.perSymbol).some((outcome) => outcome.status === "ok");
}
