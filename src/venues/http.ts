/**
 * JSON over HTTP for venue market data.
 *
 * Maps transport failures onto the engine's error kinds:
 * - network error, timeout, 5xx → TransientVenueError
 * - 429 → RateLimitedError (Retry-After honoured)
 * - other non-2xx → ArbitrageEngineError
 */

import { ArbitrageEngineError, RateLimitedError, TransientVenueError, getErrorMessage } from "../errors";

export interface FetchJsonOptions {
  venue: string;
  timeoutMs: number;
}

export interface JsonResponse {
  data: unknown;
  headers: Headers;
}

/** Wait used when a 429 carries no Retry-After */
const DEFAULT_RETRY_AFTER_MS = 1000;

export function parseRetryAfter(value: string | null): number {
  if (value === null) return DEFAULT_RETRY_AFTER_MS;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const date = Date.parse(value);
  if (Number.isFinite(date)) return Math.max(0, date - Date.now());
  return DEFAULT_RETRY_AFTER_MS;
}

export async function fetchJson(url: string, options: FetchJsonOptions): Promise<JsonResponse> {
  const controller = new AbortController();
  // The deadline covers reading the body as well as the headers
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
  try {
    return await requestJson(url, options, controller.signal);
  } finally {
    clearTimeout(timeoutId);
  }
}

async function requestJson(
  url: string,
  options: FetchJsonOptions,
  signal: AbortSignal
): Promise<JsonResponse> {
  let response: Response;
  try {
    response = await fetch(url, {
      signal,
      headers: { Accept: "application/json" },
    });
  } catch (error) {
    throw new TransientVenueError(
      `${options.venue} request failed: ${getErrorMessage(error)}`,
      options.venue,
      undefined,
      { url }
    );
  }

  if (response.status === 429) {
    throw new RateLimitedError(
      `${options.venue} rate limited`,
      options.venue,
      parseRetryAfter(response.headers.get("retry-after")),
      { url }
    );
  }
  if (response.status >= 500) {
    throw new TransientVenueError(
      `${options.venue} returned ${response.status}`,
      options.venue,
      response.status,
      { url }
    );
  }
  if (!response.ok) {
    throw new ArbitrageEngineError(`${options.venue} returned ${response.status}`, "VENUE_HTTP_ERROR", {
      venue: options.venue,
      statusCode: response.status,
      url,
    });
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    throw new TransientVenueError(
      `${options.venue} sent an unreadable body: ${getErrorMessage(error)}`,
      options.venue,
      response.status,
      { url }
    );
  }
  return { data, headers: response.headers };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
