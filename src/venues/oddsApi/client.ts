/**
 * The Odds API v4 client.
 *
 * One request returns lines from every bookmaker in the requested
 * regions; each bookmaker becomes its own odds venue. Credits are
 * tracked from the x-requests-remaining header and requests are refused
 * once fewer than MIN_CREDITS remain. The cost of each request
 * (x-requests-last) is reported through `onCreditsUsed`.
 */

import { ArbitrageEngineError } from "../../errors";
import { isValidAmericanOdds } from "../../fees/odds";
import type { OddsLine, OddsMarketType, OddsOutcome } from "../../markets/types";
import { fetchJson } from "../http";
import type { OddsVenueClient } from "../types";
import { MARKET_KEYS, marketTypeForKey, parseEventsResponse, type OddsApiEventRaw } from "./types";

export interface OddsApiClientOptions {
  apiKey: string;
  /** API host URL */
  host?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  clock?: () => number;
  /** Credits charged for each request */
  onCreditsUsed?: (credits: number) => void;
}

const DEFAULT_HOST = "https://api.the-odds-api.com";

/** Requests are refused below this many remaining credits */
export const MIN_CREDITS = 10;

function toOutcome(name: string, price: number, point: number | undefined): OddsOutcome {
  return point === undefined ? { name, price } : { name, price, point };
}

/**
 * Flatten events into one two-way line per bookmaker and market.
 * Three-way markets and invalid prices are skipped.
 *
 * @param ts - Observation time stamped on every line
 */
export function parseOddsEvents(events: readonly OddsApiEventRaw[], ts: number): OddsLine[] {
  const lines: OddsLine[] = [];

  for (const event of events) {
    const startTime = Date.parse(event.commence_time);
    if (!Number.isFinite(startTime)) continue;

    for (const bookmaker of event.bookmakers) {
      for (const market of bookmaker.markets) {
        const marketType = marketTypeForKey(market.key);
        if (!marketType || market.outcomes.length !== 2) continue;
        const [first, second] = market.outcomes;
        if (!isValidAmericanOdds(first.price) || !isValidAmericanOdds(second.price)) continue;

        lines.push({
          id: `${event.id}:${bookmaker.key}:${market.key}`,
          venue: bookmaker.key,
          eventId: event.id,
          category: event.sport_key,
          homeTeam: event.home_team,
          awayTeam: event.away_team,
          startTime,
          marketType,
          outcomes: [
            toOutcome(first.name, first.price, first.point),
            toOutcome(second.name, second.price, second.point),
          ],
          ts,
        });
      }
    }
  }
  return lines;
}

export class OddsApiClient implements OddsVenueClient {
  readonly name = "the-odds-api";
  private apiKey: string;
  private host: string;
  private timeout: number;
  private clock: () => number;
  private onCreditsUsed: ((credits: number) => void) | null;
  private creditsRemaining: number | null = null;

  constructor(options: OddsApiClientOptions) {
    this.apiKey = options.apiKey;
    this.host = (options.host || DEFAULT_HOST).replace(/\/$/, "");
    this.timeout = options.timeout || 10_000;
    this.clock = options.clock ?? Date.now;
    this.onCreditsUsed = options.onCreditsUsed ?? null;
  }

  get credits(): number | null {
    return this.creditsRemaining;
  }

  /**
   * Current lines for a sport across the requested regions.
   *
   * @throws ArbitrageEngineError (CREDITS_EXHAUSTED) below MIN_CREDITS
   */
  async getLines(
    sport: string,
    regions: string[],
    marketTypes: OddsMarketType[]
  ): Promise<OddsLine[]> {
    this.checkCredits();

    const params = new URLSearchParams({
      apiKey: this.apiKey,
      regions: regions.join(","),
      markets: marketTypes.map((type) => MARKET_KEYS[type]).join(","),
      oddsFormat: "american",
      dateFormat: "iso",
    });
    const { data, headers } = await fetchJson(
      `${this.host}/v4/sports/${encodeURIComponent(sport)}/odds?${params}`,
      { venue: this.name, timeoutMs: this.timeout }
    );

    const remaining = headers.get("x-requests-remaining");
    if (remaining !== null && Number.isFinite(Number(remaining))) {
      this.creditsRemaining = Number(remaining);
    }
    const used = Number(headers.get("x-requests-last") ?? Number.NaN);
    if (this.onCreditsUsed && Number.isFinite(used) && used > 0) {
      this.onCreditsUsed(used);
    }

    return parseOddsEvents(parseEventsResponse(data), this.clock());
  }

  private checkCredits(): void {
    if (this.creditsRemaining !== null && this.creditsRemaining < MIN_CREDITS) {
      throw new ArbitrageEngineError(
        `Odds API credits nearly exhausted: ${this.creditsRemaining} remaining`,
        "CREDITS_EXHAUSTED",
        { creditsRemaining: this.creditsRemaining }
      );
    }
  }
}
