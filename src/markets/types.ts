/**
 * Market types for cross-venue matching.
 */

import type { Side } from "../normalization/types";

/** Exchange contract kinds */
export type ExchangeMarketType = "winner" | "spread" | "total";

/** Odds-venue line kinds */
export type OddsMarketType = "moneyline" | "spread" | "total";

/**
 * Exchange-side contract definition. Side A pays when `subject` happens.
 */
export interface Instrument {
  id: string;
  venue: string;
  /** Sport key, e.g. "basketball_nba" */
  category: string;
  title: string;
  /** Participants as listed by the venue: [away, home] */
  participants: [string, string];
  /** Team name for winner/spread contracts, "over" | "under" for totals */
  subject: string;
  marketType: ExchangeMarketType;
  /** Spread or total line; spread points are from the subject's perspective */
  point?: number;
  /** Scheduled start in Unix milliseconds */
  startTime: number;
}

export interface OddsOutcome {
  /** Team name, or "Over" / "Under" */
  name: string;
  /** American odds */
  price: number;
  point?: number;
  /** Largest accepted stake in dollars, when the venue publishes one */
  maxStake?: number;
}

/**
 * One two-way line from one odds venue.
 */
export interface OddsLine {
  id: string;
  /** Bookmaker key, e.g. "draftkings" */
  venue: string;
  eventId: string;
  category: string;
  homeTeam: string;
  awayTeam: string;
  startTime: number;
  marketType: OddsMarketType;
  outcomes: [OddsOutcome, OddsOutcome];
  /** Last update in Unix milliseconds */
  ts: number;
}

/**
 * Why a line was accepted.
 */
export interface MatchBasis {
  nameSimilarity: number;
  timeProximity: number;
  marketTypes: [ExchangeMarketType, OddsMarketType];
}

export interface MatchedLine {
  line: OddsLine;
  confidence: number;
  basis: MatchBasis;
  /** Odds outcome corresponding to each exchange side */
  outcomeFor: Record<Side, OddsOutcome>;
}

/**
 * Exchange instrument with the odds-venue lines judged to be the same
 * market (at most one per odds venue). Rebuilt every cycle.
 */
export interface MatchedPair {
  /** Stable identity across cycles: the exchange instrument id */
  key: string;
  instrument: Instrument;
  lines: MatchedLine[];
  /** Best line confidence */
  confidence: number;
}

export interface MatchWeights {
  name: number;
  time: number;
  type: number;
}

export interface MatcherOptions {
  /** Minimum confidence to accept a line (0-1) */
  threshold: number;
  /** Start-time tolerance window (ms) */
  timeToleranceMs: number;
  weights: MatchWeights;
}

export const DEFAULT_MATCHER_OPTIONS: MatcherOptions = {
  threshold: 0.85,
  timeToleranceMs: 3 * 60 * 60 * 1000,
  weights: { name: 0.6, time: 0.3, type: 0.1 },
};
