/**
 * Kalshi API client for market data.
 *
 * Discovers open game-winner markets per sport and reads their order
 * books. Read-only: order placement goes through an OrderRouter.
 */

import { fetchJson } from "../http";
import type { ExchangeClient, InstrumentFilter } from "../types";
import type { Instrument } from "../../markets/types";
import { loadTeams, resolveTeamName, type TeamTable } from "../../markets/teamNames";
import { normalizeName } from "../../markets/similarity";
import { normalizeKalshiOrderbook, type OrderBook } from "../../normalization";
import {
  type KalshiMarketRaw,
  KALSHI_GAME_SERIES,
  parseMarketsResponse,
  parseOrderbookResponse,
} from "./types";

export interface KalshiClientOptions {
  /** Kalshi API host URL */
  host?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  teams?: TeamTable;
  clock?: () => number;
}

const DEFAULT_HOST = "https://api.elections.kalshi.com";

/** Pages of 500 markets read per series per scan */
const MAX_PAGES = 5;

/**
 * Split "Oklahoma City at Denver Winner?" into away and home.
 *
 * @returns [away, home] or null for any other title shape
 */
export function parseGameTitle(title: string): [string, string] | null {
  const stripped = title.replace(/\s+winner\??\s*$/i, "").trim();
  const match = /^(.+?)\s+(?:at|@|vs\.?)\s+(.+)$/i.exec(stripped);
  if (!match) return null;
  return [match[1].trim(), match[2].trim()];
}

function compact(text: string): string {
  return normalizeName(text).replace(/ /g, "");
}

/**
 * Team the YES side pays on: the yes_sub_title if it names a participant,
 * else the ticker suffix ("...-OKC") resolved against the participants.
 */
function resolveSubject(
  raw: KalshiMarketRaw,
  participants: [string, string],
  category: string,
  teams: TeamTable
): string | null {
  const canonical = (name: string) => resolveTeamName(name, category, teams) ?? name;

  if (raw.yes_sub_title) {
    const subject = canonical(raw.yes_sub_title);
    if (participants.includes(subject)) return subject;
  }

  const suffix = raw.ticker.split("-").pop() ?? "";
  if (suffix.length === 0) return null;

  const resolved = resolveTeamName(suffix, category, teams);
  if (resolved && participants.includes(resolved)) return resolved;

  const code = suffix.toLowerCase();
  const byCode = participants.filter((name) => compact(name).includes(code));
  return byCode.length === 1 ? byCode[0] : null;
}

/**
 * Convert a raw game-winner market to an Instrument.
 *
 * @returns null when the market is not an open game-winner contract
 */
export function parseKalshiMarket(
  raw: KalshiMarketRaw,
  category: string,
  teams: TeamTable = loadTeams()
): Instrument | null {
  if (raw.status !== "active" && raw.status !== "open") return null;

  const names = parseGameTitle(raw.title);
  if (!names) return null;
  const participants: [string, string] = [
    resolveTeamName(names[0], category, teams) ?? names[0],
    resolveTeamName(names[1], category, teams) ?? names[1],
  ];
  if (participants[0] === participants[1]) return null;

  const subject = resolveSubject(raw, participants, category, teams);
  if (!subject) return null;

  // Settlement follows the game; the scheduled time is the best start estimate
  const startTime = Date.parse(
    raw.occurrence_datetime ?? raw.expected_expiration_time ?? raw.close_time
  );
  if (!Number.isFinite(startTime)) return null;

  return {
    id: raw.ticker,
    venue: "kalshi",
    category,
    title: raw.title,
    participants,
    subject,
    marketType: "winner",
    startTime,
  };
}

export function parseKalshiMarkets(
  markets: readonly KalshiMarketRaw[],
  category: string,
  teams: TeamTable = loadTeams()
): Instrument[] {
  const instruments: Instrument[] = [];
  for (const raw of markets) {
    const instrument = parseKalshiMarket(raw, category, teams);
    if (instrument) instruments.push(instrument);
  }
  return instruments;
}

/**
 * Client for Kalshi's public market data.
 */
export class KalshiClient implements ExchangeClient {
  readonly venue = "kalshi";
  private host: string;
  private timeout: number;
  private teams: TeamTable | undefined;
  private clock: () => number;

  constructor(options: KalshiClientOptions = {}) {
    this.host = (options.host || DEFAULT_HOST).replace(/\/$/, "");
    this.timeout = options.timeout || 10_000;
    this.teams = options.teams;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Open game-winner instruments for the requested sports.
   * Sports without a known series are skipped.
   */
  async getInstruments(filter: InstrumentFilter): Promise<Instrument[]> {
    const categories = filter.categories ?? Object.keys(KALSHI_GAME_SERIES);
    const teams = this.teams ?? loadTeams();
    const instruments: Instrument[] = [];

    for (const category of categories) {
      const series = KALSHI_GAME_SERIES[category];
      if (!series) continue;
      const markets = await this.getOpenMarkets(series);
      instruments.push(...parseKalshiMarkets(markets, category, teams));
    }
    return instruments;
  }

  /**
   * Get open markets for a series, following the pagination cursor.
   *
   * @param seriesTicker - Series ticker (e.g., "KXNBAGAME")
   */
  async getOpenMarkets(seriesTicker: string): Promise<KalshiMarketRaw[]> {
    const markets: KalshiMarketRaw[] = [];
    let cursor: string | null = null;

    for (let page = 0; page < MAX_PAGES; page++) {
      const params = new URLSearchParams({
        series_ticker: seriesTicker,
        status: "open",
        limit: "500",
      });
      if (cursor) params.set("cursor", cursor);

      const { data } = await fetchJson(`${this.host}/trade-api/v2/markets?${params}`, {
        venue: this.venue,
        timeoutMs: this.timeout,
      });
      const parsed = parseMarketsResponse(data);
      markets.push(...parsed.markets);
      if (!parsed.cursor || parsed.markets.length === 0) break;
      cursor = parsed.cursor;
    }
    return markets;
  }

  /**
   * Top of book for a market, stamped with the fetch time.
   */
  async getOrderbook(ticker: string): Promise<OrderBook> {
    const { data } = await fetchJson(
      `${this.host}/trade-api/v2/markets/${encodeURIComponent(ticker)}/orderbook`,
      { venue: this.venue, timeoutMs: this.timeout }
    );
    return normalizeKalshiOrderbook(parseOrderbookResponse(data), ticker, this.clock(), this.venue);
  }
}
