/**
 * Venue interfaces consumed by the engine.
 *
 * Market data is always available. Order placement is a capability: a
 * venue trades only when an OrderRouter is registered for it. Transport
 * and authentication live behind these interfaces.
 */

import type { Instrument, OddsLine, OddsMarketType } from "../markets/types";
import type { OrderBook, QuotePrice, Side } from "../normalization/types";

export interface InstrumentFilter {
  /** Sport keys to include; all when omitted */
  categories?: string[];
}

/**
 * Binary-outcome exchange market data.
 */
export interface ExchangeClient {
  readonly venue: string;
  getInstruments(filter: InstrumentFilter): Promise<Instrument[]>;
  getOrderbook(instrumentId: string): Promise<OrderBook>;
}

/**
 * Fixed-odds line feed. One feed may serve several bookmaker venues;
 * each returned line names its own venue.
 */
export interface OddsVenueClient {
  readonly name: string;
  getLines(
    sport: string,
    regions: string[],
    marketTypes: OddsMarketType[]
  ): Promise<OddsLine[]>;
}

export type OrderStatus =
  | "open"
  | "filled"
  | "partially_filled"
  | "cancelled"
  | "rejected";

export interface OrderRequest {
  /** Idempotency key; resubmits after a transient failure reuse it */
  clientOrderId: string;
  venue: string;
  /** Exchange ticker or odds line id */
  instrumentId: string;
  /** Exchange side bought, or the exchange side an odds outcome stands for */
  side: Side;
  /** Odds outcome name for odds-venue bets */
  outcome?: string;
  /** Limit price: probability on the exchange, American odds on odds venues */
  price: QuotePrice;
  /** Contracts ($1 payout units) */
  size: number;
  /** Liquidity displayed at the limit price when the order was planned */
  displayedSize?: number;
}

export interface OrderHandle {
  venue: string;
  orderId: string;
  clientOrderId: string;
}

export interface OrderState {
  status: OrderStatus;
  filledSize: number;
  /** Average fill price as a probability, null before any fill */
  avgPrice: number | null;
  reason?: string;
}

/**
 * Order placement for one venue.
 *
 * placeOrder throws RejectedOrderError on refusal, TransientVenueError when
 * the order was not accepted for transport reasons, RateLimitedError when
 * throttled.
 */
export interface OrderRouter {
  placeOrder(request: OrderRequest): Promise<OrderHandle>;
  getOrderStatus(handle: OrderHandle): Promise<OrderState>;
  cancelOrder(handle: OrderHandle): Promise<void>;
}

export function isTerminalStatus(status: OrderStatus): boolean {
  return status === "filled" || status === "cancelled" || status === "rejected";
}
