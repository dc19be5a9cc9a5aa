/**
 * Kalshi orderbook normalization.
 *
 * Kalshi only publishes BIDS. Asks are implied:
 * - YES ask = (100 - best NO bid) / 100
 * - NO ask = (100 - best YES bid) / 100
 *
 * A bid to buy NO at X cents is an offer to sell YES at (100 - X).
 * YES maps to side A, NO to side B.
 */

import type { BookSide, OrderBook } from "./types";

/** [priceCents, contracts] */
export type KalshiPriceLevel = [number, number];

export interface KalshiOrderbookPayload {
  yes?: KalshiPriceLevel[] | null;
  no?: KalshiPriceLevel[] | null;
}

/**
 * Convert Kalshi cents to decimal (0-1 range).
 */
export function centsToDecimal(cents: number): number {
  return Math.round(cents) / 100;
}

/**
 * Highest-priced bid level, or null for an empty side.
 */
export function getBestBid(
  levels: readonly KalshiPriceLevel[] | null | undefined
): KalshiPriceLevel | null {
  if (!levels || levels.length === 0) return null;
  let best = levels[0];
  for (const level of levels) {
    if (level[0] > best[0]) best = level;
  }
  return best;
}

function bookSide(
  ownBid: KalshiPriceLevel | null,
  oppositeBid: KalshiPriceLevel | null
): BookSide {
  return {
    bid: ownBid ? centsToDecimal(ownBid[0]) : 0,
    bidSize: ownBid ? ownBid[1] : 0,
    ask: oppositeBid ? centsToDecimal(100 - oppositeBid[0]) : 1,
    askSize: oppositeBid ? oppositeBid[1] : 0,
  };
}

/**
 * Normalize a Kalshi REST orderbook to top of book.
 *
 * @example
 * // YES bids up to 42c, NO bids up to 56c
 * // => side A ask 0.44 (from the NO bid), side B ask 0.58 (from the YES bid)
 */
export function normalizeKalshiOrderbook(
  payload: KalshiOrderbookPayload,
  instrumentId: string,
  ts: number = Date.now(),
  venue: string = "kalshi"
): OrderBook {
  const bestYesBid = getBestBid(payload.yes);
  const bestNoBid = getBestBid(payload.no);

  return {
    venue,
    instrumentId,
    sides: {
      A: bookSide(bestYesBid, bestNoBid),
      B: bookSide(bestNoBid, bestYesBid),
    },
    ts,
  };
}
