import type { AppConfig } from "./config.js";
import { checkPipelineConfig } from "./pipeline/config.js";

/** `errors` stop startup; `warnings` are logged and ignored. */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

const MIN_API_KEY_LENGTH = 16;

/**
 * Startup checks over the loaded configuration: REST port range, API key
 * presence and length, Yahoo timeout, default request, and every pipeline
 * option against the pipeline schema.
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { rest, yahoo, defaults } = cfg;

  if (!Number.isInteger(rest.port) || rest.port < 1 || rest.port > 65535) {
    errors.push(`REST port must be between 1 and 65535, got ${rest.port}`);
  }

  if (!rest.apiKey) {
    warnings.push("REST_API_KEY is not set; the REST API is unauthenticated");
  } else if (rest.apiKey.length < MIN_API_KEY_LENGTH) {
    warnings.push(`REST API key is only ${rest.apiKey.length} characters (recommended: at least ${MIN_API_KEY_LENGTH})`);
  }

  const positive: ReadonlyArray<[string, number]> = [
    ["yahoo.timeoutMs", yahoo.timeoutMs],
    ["defaults.lookbackDays", defaults.lookbackDays],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) errors.push(`${name} must be positive, got ${value}`);
  }

  if (defaults.symbols.length === 0) {
    warnings.push("DEFAULT_SYMBOLS is empty; requests must name their symbols");
  }

  errors.push(...checkPipelineConfig(cfg.pipeline).map((problem) => `pipeline.${problem}`));

  return { errors, warnings };
}
