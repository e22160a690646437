import type { FailureKind, Issue, PermanentReason, SymbolFailure, TransientReason } from "./types.js";

export type PipelineErrorKind =
  | "input"
  | "transient_fetch"
  | "fetch_failed"
  | "permanent_fetch"
  | "validation_rejected"
  | "config"
  | "timeout"
  | "cancelled";

/**
 * Base class for every error the pipeline produces. `kind` is the
 * discriminator callers branch on; `instanceof` works as well.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid symbol or date range. Never retried. */
export class InputError extends PipelineError {
  readonly kind = "input";
}

/** One failed provider call that may succeed on retry. */
export class TransientFetchError extends PipelineError {
  readonly kind = "transient_fetch";

  constructor(
    readonly reason: TransientReason,
    message: string,
  ) {
    super(message);
  }
}

/** Transient failures persisted through every retry. */
export class FetchFailedError extends PipelineError {
  readonly kind = "fetch_failed";

  constructor(
    readonly attempts: number,
    readonly lastError: TransientFetchError,
  ) {
    super(`Fetch failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${lastError.message}`);
  }
}

/** Unknown symbol or malformed request. Surfaced without retry. */
export class PermanentFetchError extends PipelineError {
  readonly kind = "permanent_fetch";

  constructor(
    readonly reason: PermanentReason,
    message: string,
    readonly attempts: number = 1,
  ) {
    super(message);
  }
}

/** A normal, reportable outcome: the series failed data-quality checks. */
export class ValidationRejectedError extends PipelineError {
  readonly kind = "validation_rejected";

  constructor(
    readonly symbol: string,
    readonly issues: readonly Issue[],
  ) {
    const fatal = issues.filter((i) => i.severity === "fatal").map((i) => i.message);
    super(`${symbol} rejected by validation: ${fatal.join("; ")}`);
  }
}

/** Raised while constructing the pipeline, before any symbol runs. */
export class ConfigError extends PipelineError {
  readonly kind = "config";

  constructor(readonly problems: readonly string[]) {
    super(`Invalid pipeline configuration: ${problems.join("; ")}`);
  }
}

export class SymbolTimeoutError extends PipelineError {
  readonly kind = "timeout";

  constructor(
    readonly symbol: string,
    readonly timeoutMs: number,
  ) {
    super(`${symbol} exceeded the ${timeoutMs}ms per-symbol time limit`);
  }
}

export class CancelledError extends PipelineError {
  readonly kind = "cancelled";

  constructor(message = "Request cancelled") {
    super(message);
  }
}

const FAILURE_KIND: Record<PipelineErrorKind, FailureKind> = {
  input: "input",
  transient_fetch: "fetch_failed",
  fetch_failed: "fetch_failed",
  permanent_fetch: "permanent",
  validation_rejected: "rejected",
  config: "input",
  timeout: "timeout",
  cancelled: "cancelled",
};

/** Flatten any thrown value into the structured failure stored in a PipelineResult. */
export function toFailure(err: unknown): SymbolFailure {
  if (err instanceof PipelineError) {
    const base = { kind: FAILURE_KIND[err.kind], message: err.message };
    if (err instanceof FetchFailedError || err instanceof PermanentFetchError) {
      return { ...base, attempts: err.attempts };
    }
    if (err instanceof ValidationRejectedError) {
      return { ...base, issues: err.issues };
    }
    return base;
  }
  // Anything else is a bug in a collaborator; report it as a fetch failure rather than crash the run
  const message = err instanceof Error ? err.message : String(err);
  return { kind: "fetch_failed", message: `Unexpected error: ${message}` };
}

/** The error an aborted signal carries, or a generic cancellation. */
export function abortReason(signal: AbortSignal): PipelineError {
  return signal.reason instanceof PipelineError ? signal.reason : new CancelledError();
}
