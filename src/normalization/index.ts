/**
 * Normalization module exports.
 */

// Types
export {
  type Side,
  type Quote,
  type QuotePrice,
  type NormalizedQuote,
  type BookSide,
  type OrderBook,
  oppositeSide,
  hasAsk,
  askQuote,
} from "./types";

// Quote normalization
export {
  priceToProbability,
  normalizeExchangeQuote,
  normalizeOddsPair,
  quoteAgeMs,
} from "./quotes";

// Kalshi normalization
export {
  type KalshiPriceLevel,
  type KalshiOrderbookPayload,
  centsToDecimal,
  getBestBid,
  normalizeKalshiOrderbook,
} from "./normalizeKalshi";
