import dotenv from "dotenv";
import type { PipelineConfigInput } from "./pipeline/config.js";

dotenv.config();

type Env = Readonly<Record<string, string | undefined>>;

// Unset or blank → undefined so the pipeline schema applies its default
function num(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  return raw ? Number(raw) : undefined;
}

function list(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function loadConfig(env: Env = process.env) {
  const windows = list(env.PIPELINE_WINDOWS);
  const pipeline: PipelineConfigInput = {
    maxRetries: num(env, "PIPELINE_MAX_RETRIES"),
    backoffBaseMs: num(env, "PIPELINE_BACKOFF_BASE_MS"),
    backoffCapMs: num(env, "PIPELINE_BACKOFF_CAP_MS"),
    completenessThreshold: num(env, "PIPELINE_COMPLETENESS_THRESHOLD"),
    stalenessMaxDays: num(env, "PIPELINE_STALENESS_MAX_DAYS"),
    anomalyK: num(env, "PIPELINE_ANOMALY_K"),
    anomalyWindow: num(env, "PIPELINE_ANOMALY_WINDOW"),
    extremeReturnThreshold: num(env, "PIPELINE_EXTREME_RETURN_THRESHOLD"),
    maxInvalidBarFraction: num(env, "PIPELINE_MAX_INVALID_BAR_FRACTION"),
    minBars: num(env, "PIPELINE_MIN_BARS"),
    windows: windows.length > 0 ? windows.map(Number) : undefined,
    maxFetchConcurrency: num(env, "PIPELINE_MAX_FETCH_CONCURRENCY"),
    perSymbolTimeoutMs: num(env, "PIPELINE_PER_SYMBOL_TIMEOUT_MS"),
  };

  return {
    rest: {
      port: parseInt(env.REST_PORT ?? "3000", 10),
      apiKey: env.REST_API_KEY ?? "",
    },
    yahoo: {
      timeoutMs: parseInt(env.YAHOO_REQUEST_TIMEOUT_MS ?? "8000", 10),
    },
    defaults: {
      symbols: list(env.DEFAULT_SYMBOLS ?? "AAPL,MSFT,GOOGL").map((s) => s.toUpperCase()),
      lookbackDays: parseInt(env.DEFAULT_LOOKBACK_DAYS ?? "365", 10),
    },
    pipeline,
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();
