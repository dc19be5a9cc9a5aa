/**
 * Quote normalization: raw venue price → implied, fair and fee-adjusted
 * probabilities.
 */

import type { FeeModel } from "../fees/feeEngine";
import { feeAdjustedExchangePrice, feeAdjustedOddsProb } from "../fees/feeEngine";
import { americanToImplied, devigProportional } from "../fees/odds";
import type { NormalizedQuote, Quote, QuotePrice } from "./types";

/**
 * Implied probability of a price in either representation.
 */
export function priceToProbability(price: QuotePrice): number {
  return price.kind === "probability" ? price.value : americanToImplied(price.value);
}

/**
 * Normalize an exchange ask. Fees raise the effective price.
 */
export function normalizeExchangeQuote(
  quote: Quote,
  fees: FeeModel,
  qty: number = 1
): NormalizedQuote {
  const implied = priceToProbability(quote.price);
  return {
    quote,
    impliedProb: implied,
    fairProb: implied,
    feeAdjustedProb: feeAdjustedExchangePrice(fees, implied, qty),
  };
}

/**
 * Normalize both sides of a two-way odds-venue market, removing the vig
 * proportionally. Fees lower the effective probability.
 */
export function normalizeOddsPair(
  quoteA: Quote,
  quoteB: Quote,
  fees: FeeModel,
  qty: number = 1
): [NormalizedQuote, NormalizedQuote] {
  const impliedA = priceToProbability(quoteA.price);
  const impliedB = priceToProbability(quoteB.price);
  const { fairA, fairB } = devigProportional(impliedA, impliedB);

  return [
    {
      quote: quoteA,
      impliedProb: impliedA,
      fairProb: fairA,
      feeAdjustedProb: feeAdjustedOddsProb(fees, fairA, qty),
    },
    {
      quote: quoteB,
      impliedProb: impliedB,
      fairProb: fairB,
      feeAdjustedProb: feeAdjustedOddsProb(fees, fairB, qty),
    },
  ];
}

/**
 * Age of a quote relative to `now`.
 */
export function quoteAgeMs(quote: Quote, now: number = Date.now()): number {
  return now - quote.ts;
}
