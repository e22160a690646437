import { describe, it, expect } from "vitest";
import { FakeSource, bar, delay, fullSeries, hang, weekdayCalendar, type SourceCall } from "../../../test/helpers.js";
import { ConfigError, InputError } from "../errors.js";
import { createPipeline, type PipelineDeps } from "../orchestrator.js";
import type { PipelineConfigInput } from "../config.js";
import type { SourceOutcome, SymbolOutcome } from "../types.js";

const calendar = weekdayCalendar();
// 10 trading days
const range = { start: "2024-01-02", end: "2024-01-15" };
const now = () => new Date("2024-01-16T21:00:00Z");
const fast: PipelineConfigInput = { windows: [2, 3], backoffBaseMs: 0, backoffCapMs: 0 };

function pipelineWith(source: FakeSource, config: PipelineConfigInput = fast, extra: Partial<PipelineDeps> = {}) {
  return createPipeline({ source, calendar, config, now, ...extra });
}

function failure(outcome: SymbolOutcome | undefined) {
  if (outcome?.status !== "failed") throw new Error(`expected a failed outcome, got ${outcome?.status}`);
  return outcome.failure;
}

const perSymbolSource = (handlers: Record<string, (call: SourceCall) => SourceOutcome | Promise<SourceOutcome>>) =>
  new FakeSource((call) => {
    const handler = handlers[call.symbol];
    return handler ? handler(call) : fullSeries(calendar, call);
  });

describe("createPipeline", () => {
  it("rejects an invalid configuration before running anything", () => {
    const source = new FakeSource((call) => fullSeries(calendar, call));
    expect(() => pipelineWith(source, { windows: [1] })).toThrow(ConfigError);
    expect(() => pipelineWith(source, { maxFetchConcurrency: 0, perSymbolTimeoutMs: -1 })).toThrow(
      "Invalid pipeline configuration: maxFetchConcurrency: Number must be greater than or equal to 1; perSymbolTimeoutMs: Number must be greater than 0",
    );
  });

  it("rejects an empty symbol list or an unusable range", async () => {
    const pipeline = pipelineWith(new FakeSource((call) => fullSeries(calendar, call)));
    await expect(pipeline.run([], range)).rejects.toBeInstanceOf(InputError);
    await expect(pipeline.run(["  "], range)).rejects.toThrow("At least one symbol is required");
    await expect(pipeline.run(["AAPL"], { start: "2024-01-15", end: "2024-01-02" })).rejects.toBeInstanceOf(InputError);
  });
});

describe("pipeline.run", () => {
  it("isolates failures per symbol", async () => {
    const source = perSymbolSource({
      BAD: () => ({ status: "permanent", reason: "unknown_symbol", message: "Not Found" }),
      FLAKY: () => ({ status: "transient", reason: "network", message: "socket hang up" }),
    });
    const result = await pipelineWith(source).run(["AAPL", "BAD", "FLAKY"], range);

    expect(Object.keys(result.perSymbol)).toEqual(["AAPL", "BAD", "FLAKY"]);

    const aapl = result.perSymbol.AAPL;
    expect(aapl.status).toBe("ok");
    if (aapl.status === "ok") {
      expect(aapl.attempts).toBe(1);
      expect(aapl.frame.rows).toHaveLength(7);
      expect(aapl.warnings).toEqual([]);
      expect(aapl.summary.window).toBe(2);
      expect(aapl.summary.periodDays).toBe(10);
    }

    expect(failure(result.perSymbol.BAD)).toEqual({ kind: "permanent", message: "Not Found", attempts: 1 });
    expect(failure(result.perSymbol.FLAKY)).toEqual({
      kind: "fetch_failed",
      message: "Fetch failed after 4 attempts: socket hang up",
      attempts: 4,
    });
    expect(source.callsFor("FLAKY")).toHaveLength(4);
    expect(source.callsFor("BAD")).toHaveLength(1);
  });

  it("reports a series rejected by validation with its issues", async () => {
    const source = perSymbolSource({
      HOLEY: (call) => {
        const full = fullSeries(calendar, call);
        return full.status === "ok" ? { status: "ok", bars: full.bars.filter((_, i) => i !== 3 && i !== 6) } : full;
      },
    });
    const result = await pipelineWith(source).run(["HOLEY"], range);
    const holey = failure(result.perSymbol.HOLEY);

    expect(holey.kind).toBe("rejected");
    expect(holey.message).toBe("HOLEY rejected by validation: 2 of 10 trading days missing (20.0%, limit 10.0%)");
    expect(holey.issues?.map((i) => i.kind)).toEqual(["incomplete"]);
  });

  it("passes validation warnings through on success", async () => {
    const source = perSymbolSource({
      DUP: (call) => {
        const full = fullSeries(calendar, call);
        return full.status === "ok" ? { status: "ok", bars: [...full.bars, bar("2024-01-03", 500)] } : full;
      },
    });
    const result = await pipelineWith(source).run(["DUP"], range);
    const dup = result.perSymbol.DUP;
    expect(dup.status).toBe("ok");
    if (dup.status === "ok") {
      expect(dup.warnings.map((w) => [w.kind, w.date])).toEqual([["duplicate", "2024-01-03"]]);
    }
  });

  it("rejects a clean series too short for the largest window instead of returning empty analytics", async () => {
    const source = new FakeSource((call) => fullSeries(calendar, call));
    const result = await pipelineWith(source, { backoffBaseMs: 0, backoffCapMs: 0 }).run(["SHORT"], range);
    const short = failure(result.perSymbol.SHORT);

    expect(short.kind).toBe("rejected");
    expect(short.message).toBe("SHORT rejected by validation: Only 10 usable bars; at least 64 required");
    expect(short.issues?.map((i) => [i.kind, i.severity])).toEqual([["insufficient_history", "fatal"]]);
  });

  it("accepts a series exactly one bar longer than the largest window", async () => {
    const source = new FakeSource((call) => fullSeries(calendar, call));
    const result = await pipelineWith(source, { ...fast, windows: [2, 9] }).run(["EDGE"], range);
    const edge = result.perSymbol.EDGE;
    expect(edge.status).toBe("ok");
    if (edge.status === "ok") expect(edge.frame.rows).toHaveLength(1);
  });

  it("normalizes and deduplicates symbols, and reports malformed ones as input failures", async () => {
    const source = new FakeSource((call) => fullSeries(calendar, call));
    const result = await pipelineWith(source).run(["aapl", "AAPL ", "NOT VALID"], range);

    expect(Object.keys(result.perSymbol)).toEqual(["AAPL", "NOT VALID"]);
    expect(failure(result.perSymbol["NOT VALID"])).toEqual({ kind: "input", message: 'Invalid symbol: "NOT VALID"' });
    expect(source.calls).toHaveLength(1);
  });

  it("reports the clamped range and timestamps", async () => {
    const source = new FakeSource((call) => fullSeries(calendar, call));
    const result = await pipelineWith(source).run(["AAPL"], { start: "2023-12-30", end: "2024-01-14" });
    expect(result.range).toEqual({ start: "2024-01-01", end: "2024-01-12" });
    expect(result.startedAt).toBe("2024-01-16T21:00:00.000Z");
    expect(result.finishedAt).toBe("2024-01-16T21:00:00.000Z");
  });

  it("times out a slow symbol without holding up the others", async () => {
    const source = perSymbolSource({ SLOW: () => hang<SourceOutcome>() });
    const result = await pipelineWith(source, { ...fast, perSymbolTimeoutMs: 20 }).run(["SLOW", "AAPL"], range);

    expect(failure(result.perSymbol.SLOW)).toEqual({
      kind: "timeout",
      message: "SLOW exceeded the 20ms per-symbol time limit",
    });
    expect(result.perSymbol.AAPL.status).toBe("ok");
  });

  it("cancels in-flight symbols when the caller aborts", async () => {
    const source = new FakeSource(() => hang<SourceOutcome>());
    const controller = new AbortController();
    const pending = pipelineWith(source).run(["AAPL", "MSFT"], range, { signal: controller.signal });
    await delay(1);
    controller.abort();
    const result = await pending;

    for (const symbol of ["AAPL", "MSFT"]) {
      expect(failure(result.perSymbol[symbol])).toEqual({ kind: "cancelled", message: "Request cancelled" });
    }
  });

  it("starts nothing when the signal is already aborted", async () => {
    const source = new FakeSource((call) => fullSeries(calendar, call));
    const controller = new AbortController();
    controller.abort();
    const result = await pipelineWith(source).run(["AAPL", "MSFT"], range, { signal: controller.signal });

    expect(source.calls).toHaveLength(0);
    expect(failure(result.perSymbol.AAPL).kind).toBe("cancelled");
  });

  it("bounds concurrent source calls across symbols", async () => {
    const source = new FakeSource(async (call) => {
      await delay(5);
      return fullSeries(calendar, call);
    });
    const symbols = ["A", "B", "C", "D", "E"];
    const result = await pipelineWith(source, { ...fast, maxFetchConcurrency: 2 }).run(symbols, range);

    expect(source.maxActive).toBe(2);
    expect(Object.values(result.perSymbol).every((o) => o.status === "ok")).toBe(true);
  });

  it("keeps a timed-out call's permit until the source lets go of it", async () => {
    // SLOW ignores its abort signal and settles well after the symbol timed out
    const source = perSymbolSource({
      SLOW: async (call) => {
        await delay(40);
        return fullSeries(calendar, call);
      },
    });
    const result = await pipelineWith(source, { ...fast, maxFetchConcurrency: 1, perSymbolTimeoutMs: 20 }).run(
      ["SLOW", "FAST"],
      range,
    );

    expect(failure(result.perSymbol.SLOW).kind).toBe("timeout");
    expect(failure(result.perSymbol.FAST)).toEqual({
      kind: "timeout",
      message: "FAST exceeded the 20ms per-symbol time limit",
    });
    expect(source.callsFor("FAST")).toHaveLength(0);
    expect(source.maxActive).toBe(1);
  });

  it("produces the same analytics on a repeated run", async () => {
    const source = new FakeSource((call) => fullSeries(calendar, call));
    const pipeline = pipelineWith(source);
    const first = await pipeline.run(["AAPL"], range);
    const second = await pipeline.run(["AAPL"], range);
    expect(second.perSymbol).toEqual(first.perSymbol);
  });
});
