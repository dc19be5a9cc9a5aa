/**
 * Quote types shared by both venue kinds.
 *
 * The exchange quotes probabilities (0-1), odds venues quote American
 * odds. A binary instrument has two sides: A (the instrument's subject,
 * YES on the exchange) and B (its complement).
 */

export type Side = "A" | "B";

export type QuotePrice =
  | { kind: "probability"; value: number }
  | { kind: "american"; value: number };

/**
 * Price observation from one venue for one side of an instrument.
 * Immutable once observed.
 */
export interface Quote {
  readonly venue: string;
  readonly instrumentId: string;
  readonly side: Side;
  readonly price: QuotePrice;
  /** Observation time in Unix milliseconds */
  readonly ts: number;
  /** Contracts available at this price (Infinity when the venue publishes no limit) */
  readonly size: number;
}

/**
 * Quote with derived probabilities. Recomputed on demand, never stored.
 */
export interface NormalizedQuote {
  readonly quote: Quote;
  /** Raw implied probability (vig included) */
  readonly impliedProb: number;
  /** Implied probability after vig removal */
  readonly fairProb: number;
  /** Fair probability after the venue's fee */
  readonly feeAdjustedProb: number;
}

/**
 * Best level per side of an exchange order book.
 */
export interface BookSide {
  /** Best bid price (0-1), 0 when empty */
  bid: number;
  bidSize: number;
  /** Best ask price (0-1), 1 when empty */
  ask: number;
  askSize: number;
}

/**
 * Top of book for one exchange instrument.
 */
export interface OrderBook {
  venue: string;
  instrumentId: string;
  sides: Record<Side, BookSide>;
  /** Snapshot time in Unix milliseconds */
  ts: number;
}

export function oppositeSide(side: Side): Side {
  return side === "A" ? "B" : "A";
}

/**
 * Check if a book side has a tradable ask.
 */
export function hasAsk(side: BookSide): boolean {
  return side.ask > 0 && side.ask < 1 && side.askSize > 0;
}

/**
 * Ask-side quote for one side of an exchange book.
 */
export function askQuote(book: OrderBook, side: Side): Quote {
  const top = book.sides[side];
  return {
    venue: book.venue,
    instrumentId: book.instrumentId,
    side,
    price: { kind: "probability", value: top.ask },
    ts: book.ts,
    size: top.askSize,
  };
}
