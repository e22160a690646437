import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { logRest } from "../logging.js";
import { addDays, marketAwareEndDate, type TradingCalendar } from "../pipeline/calendar.js";
import { CancelledError, ConfigError, InputError } from "../pipeline/errors.js";
import type { Pipeline } from "../pipeline/orchestrator.js";
import { analyzePortfolio } from "../pipeline/portfolio.js";
import { rankByRisk } from "../pipeline/summary.js";
import type { DateRange, PipelineResult, SymbolFailure, SymbolSummary, Ticker } from "../pipeline/types.js";
import { getStatus } from "../providers/status.js";

export interface RouteDeps {
  readonly pipeline: Pipeline;
  readonly calendar: TradingCalendar;
  readonly defaults: { readonly symbols: readonly string[]; readonly lookbackDays: number };
  readonly now?: () => Date;
}

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "dates must be YYYY-MM-DD");

const analyticsQuerySchema = z.object({
  symbols: z.string().trim().max(500).optional(),
  start: isoDate.optional(),
  end: isoDate.optional(),
});

export interface AnalyticsRequest {
  readonly symbols: string[];
  readonly range: DateRange;
}

/** Fill in defaults: configured symbols, the last completed session, and the lookback window. */
export function resolveAnalyticsRequest(query: unknown, deps: RouteDeps, now: Date): AnalyticsRequest {
  const parsed = analyticsQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new InputError(parsed.error.issues[0]?.message ?? "Invalid query params");
  }
  const { symbols, start, end } = parsed.data;
  const list = symbols ? symbols.split(",").map((s) => s.trim()).filter((s) => s.length > 0) : [];
  const resolvedEnd = end ?? marketAwareEndDate(now, deps.calendar);
  return {
    symbols: list.length > 0 ? list : [...deps.defaults.symbols],
    range: { start: start ?? addDays(resolvedEnd, -deps.defaults.lookbackDays), end: resolvedEnd },
  };
}

export function createRouter(deps: RouteDeps): Router {
  const router = Router();
  const now = deps.now ?? (() => new Date());

  /** Run the pipeline for this request; a client that hangs up cancels the run. */
  async function runForRequest(req: Request, res: Response): Promise<PipelineResult> {
    const { symbols, range } = resolveAnalyticsRequest(req.query, deps, now());
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) controller.abort(new CancelledError("Client disconnected"));
    };
    res.on("close", onClose);
    try {
      return await deps.pipeline.run(symbols, range, { signal: controller.signal });
    } finally {
      res.off("close", onClose);
    }
  }

  function sendError(res: Response, e: unknown): void {
    if (e instanceof InputError) {
      res.status(400).json({ error: e.message });
      return;
    }
    const message = e instanceof Error ? e.message : String(e);
    logRest.error({ err: message, config: e instanceof ConfigError }, "Analytics request failed");
    res.status(500).json({ error: message });
  }

  // GET /api/status
  router.get("/status", (_req, res) => {
    res.json(getStatus(now(), deps.calendar));
  });

  // GET /api/analytics?symbols=AAPL,MSFT&start=&end=
  router.get("/analytics", async (req, res) => {
    try {
      res.json(await runForRequest(req, res));
    } catch (e) {
      sendError(res, e);
    }
  });

  // GET /api/summary — riskiest first, selection outlook and failures alongside
  router.get("/summary", async (req, res) => {
    try {
      const result = await runForRequest(req, res);
      const summaries: SymbolSummary[] = [];
      const failures: Record<Ticker, SymbolFailure> = {};
      for (const [symbol, outcome] of Object.entries(result.perSymbol)) {
        if (outcome.status === "ok") summaries.push(outcome.summary);
        else failures[symbol] = outcome.failure;
      }
      res.json({
        range: result.range,
        count: summaries.length,
        summaries: rankByRisk(summaries),
        portfolio: analyzePortfolio(summaries),
        failures,
      });
    } catch (e) {
      sendError(res, e);
    }
  });

  return router;
}
