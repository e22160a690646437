import { z } from "zod";
import { ConfigError } from "./errors.js";

/**
 * Recognized pipeline options. Every option has a documented default, so an
 * empty object is a valid configuration.
 */
export const PipelineConfigSchema = z
  .object({
    /** Retries after the first attempt (total attempts = maxRetries + 1) */
    maxRetries: z.number().int().min(0).default(3),
    /** First backoff delay; doubles each retry */
    backoffBaseMs: z.number().int().min(0).default(3000),
    backoffCapMs: z.number().int().min(0).default(30_000),
    /** Largest tolerated fraction of missing trading days before rejection */
    completenessThreshold: z.number().min(0).max(1).default(0.1),
    stalenessMaxDays: z.number().int().min(0).default(5),
    /** Anomaly when |return| > anomalyK × trailing std */
    anomalyK: z.number().positive().default(5),
    anomalyWindow: z.number().int().min(2).default(21),
    /** Absolute single-day move always flagged (1 = 100%) */
    extremeReturnThreshold: z.number().positive().default(1),
    /** Largest tolerated fraction of bars dropped for failing price sanity */
    maxInvalidBarFraction: z.number().min(0).max(1).default(0.05),
    minBars: z.number().int().min(1).default(2),
    windows: z
      .array(z.number().int().min(2, "window sizes must be at least 2"))
      .min(1)
      .default([21, 63])
      .transform((ws) => [...new Set(ws)].sort((a, b) => a - b)),
    maxFetchConcurrency: z.number().int().min(1).default(4),
    perSymbolTimeoutMs: z.number().int().positive().default(120_000),
  })
  .refine((c) => c.backoffCapMs >= c.backoffBaseMs, {
    message: "backoffCapMs must be >= backoffBaseMs",
    path: ["backoffCapMs"],
  });

export type PipelineConfig = z.output<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = PipelineConfigSchema.parse({});

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
}

/** Human-readable problems, one per failing option. Empty when valid. */
export function checkPipelineConfig(input: unknown): string[] {
  const parsed = PipelineConfigSchema.safeParse(input);
  return parsed.success ? [] : describeIssues(parsed.error);
}

export function parsePipelineConfig(input: unknown = {}): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(input);
  if (!parsed.success) throw new ConfigError(describeIssues(parsed.error));
  return parsed.data;
}
