/**
 * Type definitions for The Odds API v4.
 */

import { isRecord } from "../http";
import type { OddsMarketType } from "../../markets/types";

export interface OddsApiOutcomeRaw {
  name: string;
  /** American odds (oddsFormat=american) */
  price: number;
  point?: number;
}

export interface OddsApiMarketRaw {
  /** "h2h" | "spreads" | "totals" */
  key: string;
  outcomes: OddsApiOutcomeRaw[];
}

export interface OddsApiBookmakerRaw {
  /** Bookmaker key (e.g., "draftkings") */
  key: string;
  title: string;
  markets: OddsApiMarketRaw[];
}

export interface OddsApiEventRaw {
  id: string;
  sport_key: string;
  /** ISO 8601 start time */
  commence_time: string;
  home_team: string;
  away_team: string;
  bookmakers: OddsApiBookmakerRaw[];
}

export const MARKET_KEYS: Readonly<Record<OddsMarketType, string>> = {
  moneyline: "h2h",
  spread: "spreads",
  total: "totals",
};

export function marketTypeForKey(key: string): OddsMarketType | null {
  switch (key) {
    case "h2h":
      return "moneyline";
    case "spreads":
      return "spread";
    case "totals":
      return "total";
    default:
      return null;
  }
}

function parseOutcome(value: unknown): OddsApiOutcomeRaw | null {
  if (!isRecord(value)) return null;
  if (typeof value.name !== "string" || typeof value.price !== "number") return null;
  return {
    name: value.name,
    price: value.price,
    point: typeof value.point === "number" ? value.point : undefined,
  };
}

function parseMarket(value: unknown): OddsApiMarketRaw | null {
  if (!isRecord(value) || typeof value.key !== "string" || !Array.isArray(value.outcomes)) {
    return null;
  }
  const outcomes: OddsApiOutcomeRaw[] = [];
  for (const item of value.outcomes) {
    const outcome = parseOutcome(item);
    if (outcome) outcomes.push(outcome);
  }
  return { key: value.key, outcomes };
}

function parseBookmaker(value: unknown): OddsApiBookmakerRaw | null {
  if (!isRecord(value) || typeof value.key !== "string" || !Array.isArray(value.markets)) {
    return null;
  }
  const markets: OddsApiMarketRaw[] = [];
  for (const item of value.markets) {
    const market = parseMarket(item);
    if (market) markets.push(market);
  }
  return {
    key: value.key,
    title: typeof value.title === "string" ? value.title : value.key,
    markets,
  };
}

/**
 * Events of an /odds response. Malformed entries are dropped.
 */
export function parseEventsResponse(data: unknown): OddsApiEventRaw[] {
  if (!Array.isArray(data)) return [];
  const events: OddsApiEventRaw[] = [];
  for (const value of data) {
    if (
      !isRecord(value) ||
      typeof value.id !== "string" ||
      typeof value.sport_key !== "string" ||
      typeof value.commence_time !== "string" ||
      typeof value.home_team !== "string" ||
      typeof value.away_team !== "string"
    ) {
      continue;
    }
    const bookmakers: OddsApiBookmakerRaw[] = [];
    for (const item of Array.isArray(value.bookmakers) ? value.bookmakers : []) {
      const bookmaker = parseBookmaker(item);
      if (bookmaker) bookmakers.push(bookmaker);
    }
    events.push({
      id: value.id,
      sport_key: value.sport_key,
      commence_time: value.commence_time,
      home_team: value.home_team,
      away_team: value.away_team,
      bookmakers,
    });
  }
  return events;
}
