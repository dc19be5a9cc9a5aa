/**
 * Retry policy for venue calls.
 *
 * - TransientVenueError: exponential backoff, bounded by maxAttempts
 * - RateLimitedError: wait the venue's hint; does not consume an attempt,
 *   bounded by maxRateLimitWaits
 * - anything else: rethrown immediately
 */

import { RateLimitedError, TransientVenueError } from "../errors";
import { sleep } from "./timeout";

export interface RetryOptions {
  /** Total tries for transient failures, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Rate-limit waits tolerated before giving up */
  maxRateLimitWaits: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2000,
  maxRateLimitWaits: 3,
};

export type RetryEvent =
  | { kind: "transient"; attempt: number; delayMs: number; error: TransientVenueError }
  | { kind: "rate_limited"; wait: number; delayMs: number; error: RateLimitedError };

/**
 * Backoff delay before retry number `attempt` (1-based).
 */
export function backoffDelay(attempt: number, options: RetryOptions): number {
  return Math.min(options.baseDelayMs * 2 ** (attempt - 1), options.maxDelayMs);
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS,
  onRetry?: (event: RetryEvent) => void
): Promise<T> {
  let attempt = 0;
  let rateLimitWaits = 0;

  for (;;) {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof RateLimitedError) {
        rateLimitWaits++;
        if (rateLimitWaits > options.maxRateLimitWaits) throw error;
        const delayMs = error.retryAfterMs;
        onRetry?.({ kind: "rate_limited", wait: rateLimitWaits, delayMs, error });
        await sleep(delayMs);
        continue;
      }
      if (error instanceof TransientVenueError) {
        attempt++;
        if (attempt >= options.maxAttempts) throw error;
        const delayMs = backoffDelay(attempt, options);
        onRetry?.({ kind: "transient", attempt, delayMs, error });
        await sleep(delayMs);
        continue;
      }
      throw error;
    }
  }
}
