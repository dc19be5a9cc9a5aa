/**
 * Type definitions for Kalshi market data.
 */

import { isRecord } from "../http";
import type { KalshiOrderbookPayload, KalshiPriceLevel } from "../../normalization";

/**
 * Raw market data from the Kalshi API (fields the engine reads).
 */
export interface KalshiMarketRaw {
  /** Market ticker (e.g., "KXNBAGAME-26FEB01OKCDEN-OKC") */
  ticker: string;
  /** Event ticker (e.g., "KXNBAGAME-26FEB01OKCDEN") */
  event_ticker: string;
  /** Market status (e.g., "active", "closed", "settled") */
  status: string;
  /** Market title (e.g., "Oklahoma City at Denver Winner?") */
  title: string;
  /** Team the YES side pays on, when provided */
  yes_sub_title?: string;
  /** When trading closes (ISO 8601) */
  close_time: string;
  /** Expected settlement time (ISO 8601) */
  expected_expiration_time?: string;
  /** Scheduled event time (ISO 8601) */
  occurrence_datetime?: string;
}

/**
 * Sport key → Kalshi game-winner series.
 */
export const KALSHI_GAME_SERIES: Readonly<Record<string, string>> = {
  basketball_nba: "KXNBAGAME",
  icehockey_nhl: "KXNHLGAME",
  americanfootball_nfl: "KXNFLGAME",
};

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function isKalshiMarketRaw(value: unknown): value is KalshiMarketRaw {
  return (
    isRecord(value) &&
    typeof value.ticker === "string" &&
    typeof value.event_ticker === "string" &&
    typeof value.status === "string" &&
    typeof value.title === "string" &&
    typeof value.close_time === "string"
  );
}

/**
 * Markets and pagination cursor of a /markets response.
 */
export function parseMarketsResponse(data: unknown): { markets: KalshiMarketRaw[]; cursor: string | null } {
  if (!isRecord(data) || !Array.isArray(data.markets)) {
    return { markets: [], cursor: null };
  }
  const markets: KalshiMarketRaw[] = [];
  for (const item of data.markets) {
    if (!isKalshiMarketRaw(item)) continue;
    markets.push({
      ticker: item.ticker,
      event_ticker: item.event_ticker,
      status: item.status,
      title: item.title,
      yes_sub_title: optionalString(item.yes_sub_title),
      close_time: item.close_time,
      expected_expiration_time: optionalString(item.expected_expiration_time),
      occurrence_datetime: optionalString(item.occurrence_datetime),
    });
  }
  return { markets, cursor: optionalString(data.cursor) ?? null };
}

function parseLevels(value: unknown): KalshiPriceLevel[] {
  if (!Array.isArray(value)) return [];
  const levels: KalshiPriceLevel[] = [];
  for (const level of value) {
    if (!Array.isArray(level) || level.length < 2) continue;
    const [price, size] = level;
    if (typeof price === "number" && typeof size === "number") {
      levels.push([price, size]);
    }
  }
  return levels;
}

/**
 * Bid ladders of an /orderbook response. Empty sides come back as null.
 */
export function parseOrderbookResponse(data: unknown): KalshiOrderbookPayload {
  if (!isRecord(data) || !isRecord(data.orderbook)) return { yes: null, no: null };
  return {
    yes: parseLevels(data.orderbook.yes),
    no: parseLevels(data.orderbook.no),
  };
}
