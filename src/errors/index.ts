/**
 * Error types.
 *
 * Venue failures are classified so callers can decide between retrying,
 * waiting, giving up on a leg, or stopping the process. Order rejections
 * and timeouts during execution are leg states, not exceptions; these
 * classes cover transport, data freshness, configuration and the naked
 * exposure escalation.
 */

/** Base error for everything raised by the engine */
export class ArbitrageEngineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ArbitrageEngineError";
  }
}

/** Network blip or 5xx from a venue. Safe to retry with backoff. */
export class TransientVenueError extends ArbitrageEngineError {
  constructor(
    message: string,
    public readonly venue: string,
    public readonly statusCode?: number,
    context?: Record<string, unknown>
  ) {
    super(message, "TRANSIENT_VENUE_ERROR", { venue, statusCode, ...context });
    this.name = "TransientVenueError";
  }
}

/** Venue asked us to slow down. Waiting is not counted as a failure. */
export class RateLimitedError extends ArbitrageEngineError {
  constructor(
    message: string,
    public readonly venue: string,
    public readonly retryAfterMs: number,
    context?: Record<string, unknown>
  ) {
    super(message, "RATE_LIMITED", { venue, retryAfterMs, ...context });
    this.name = "RateLimitedError";
  }
}

/** Venue refused an order. Terminal for the leg that raised it. */
export class RejectedOrderError extends ArbitrageEngineError {
  constructor(
    message: string,
    public readonly venue: string,
    public readonly reason: string,
    context?: Record<string, unknown>
  ) {
    super(message, "ORDER_REJECTED", { venue, reason, ...context });
    this.name = "RejectedOrderError";
  }
}

/** Snapshot older than the freshness window */
export class StaleDataError extends ArbitrageEngineError {
  constructor(
    message: string,
    public readonly ageMs: number,
    context?: Record<string, unknown>
  ) {
    super(message, "STALE_DATA", { ageMs, ...context });
    this.name = "StaleDataError";
  }
}

/** Invalid configuration. Fatal at startup. */
export class ConfigurationError extends ArbitrageEngineError {
  constructor(
    message: string,
    public readonly field: string,
    context?: Record<string, unknown>
  ) {
    super(message, "CONFIGURATION_ERROR", { field, ...context });
    this.name = "ConfigurationError";
  }
}

/** Leg 1 filled and leg 2 could not hedge it */
export class NakedExposureError extends ArbitrageEngineError {
  constructor(
    message: string,
    public readonly attemptId: string,
    public readonly venue: string,
    public readonly size: number,
    context?: Record<string, unknown>
  ) {
    super(message, "NAKED_EXPOSURE", { attemptId, venue, size, ...context });
    this.name = "NakedExposureError";
  }
}

export function isArbitrageEngineError(
  error: unknown
): error is ArbitrageEngineError {
  return error instanceof ArbitrageEngineError;
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}

/** A venue call did not complete within its deadline */
export class OperationTimeoutError extends ArbitrageEngineError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(message, "TIMEOUT", { timeoutMs, ...context });
    this.name = "OperationTimeoutError";
  }
}
