export type PipelineErrorCode =
  | "BAD_REQUEST"
  | "REQUEST_NOT_FOUND"
  | "CONFIGURATION"
  | "STALE_TRANSITION"
  | "TRANSIENT_STAGE_FAILURE"
  | "PERMANENT_STAGE_FAILURE"
  | "LEASE_EXPIRED"
  | "CAPACITY_EXCEEDED"
  | "STORE_INIT_FAILED"
  | "STORE_NOT_INITIALIZED"
  | "IO_ERROR"
  | "INTERNAL";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly details?: unknown;

  constructor(code: PipelineErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
    this.details = details;
  }

  toJSON(): { code: PipelineErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

/**
 * Network failure, worker 5xx or timeout. Absorbed by the retry loop.
 */
export class TransientStageError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super("TRANSIENT_STAGE_FAILURE", message, details);
    this.name = "TransientStageError";
  }
}

/**
 * The stage explicitly rejected its input. Never retried.
 */
export class PermanentStageError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super("PERMANENT_STAGE_FAILURE", message, details);
    this.name = "PermanentStageError";
  }
}

/**
 * Optimistic-concurrency conflict on the ledger. Callers re-read and retry;
 * it is never surfaced to the submitter.
 */
export class StaleTransitionError extends PipelineError {
  readonly requestId: string;
  readonly expectedState: string;
  readonly actualState: string | undefined;

  constructor(requestId: string, expectedState: string, actualState: string | undefined) {
    super(
      "STALE_TRANSITION",
      `Request ${requestId} is ${actualState ?? "missing"}, expected ${expectedState}`,
      { requestId, expectedState, actualState }
    );
    this.name = "StaleTransitionError";
    this.requestId = requestId;
    this.expectedState = expectedState;
    this.actualState = actualState;
  }
}

/**
 * Unknown stage or malformed pipeline order. Fatal at startup.
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super("CONFIGURATION", message, details);
    this.name = "ConfigurationError";
  }
}

/**
 * Informational: a lease ran out while its request was still in progress.
 * Drives the recovery sweep and is not reported as a failure on its own.
 */
export class LeaseExpiredError extends PipelineError {
  constructor(requestId: string, holderId: string, expiredAt: string) {
    super("LEASE_EXPIRED", `Lease on ${requestId} held by ${holderId} expired at ${expiredAt}`, {
      requestId,
      holderId,
      expiredAt
    });
    this.name = "LeaseExpiredError";
  }
}

export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  if (err instanceof Error) {
    if (err.name === "ZodError") {
      const issues = "issues" in err ? err.issues : undefined;
      return new PipelineError("BAD_REQUEST", "Validation error", { issues });
    }
    return new PipelineError("INTERNAL", err.message, { name: err.name, stack: err.stack });
  }
  return new PipelineError("INTERNAL", "Unknown error", { err });
}

/**
 * True for failures the retry policy may retry.
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof PermanentStageError) return false;
  if (err instanceof ConfigurationError) return false;
  return true;
}
