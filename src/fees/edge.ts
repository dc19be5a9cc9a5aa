/**
 * Edge calculation for exchange ↔ odds-venue opportunities.
 *
 * One direction = buy the exchange contract on side S and back the
 * opposite outcome at the odds venue.
 *
 *   edgeGross = q - p
 *   edgeNet   = q_adj - p_adj
 *
 * p is the exchange ask for S, q the de-vigged odds-venue probability of
 * the outcome opposite to S. p_adj adds the exchange fee per contract,
 * q_adj subtracts the odds venue's fee per contract. A positive edge
 * means the exchange contract is cheap relative to the odds venue.
 */

import type { FeeModel } from "./feeEngine";
import { feeAdjustedExchangePrice, feeAdjustedOddsProb } from "./feeEngine";

/**
 * Result of edge calculation.
 */
export interface EdgeResult {
  /** Exchange ask including fees */
  exchangePriceAdj: number;
  /** Odds-venue hedge probability net of fees */
  hedgeProbAdj: number;
  /** Edge before fees */
  edgeGross: number;
  /** Edge after fees */
  edgeNet: number;
  /** edgeNet > 0 */
  profitable: boolean;
}

export interface EdgeInput {
  /** Exchange ask for side S (0-1) */
  exchangeAsk: number;
  /** De-vigged odds-venue probability of the outcome opposite to S */
  hedgeFairProb: number;
  exchangeFees: FeeModel;
  oddsFees: FeeModel;
  /** Contracts used to amortize rounded fees */
  qty?: number;
}

/**
 * Compute gross and net edge for one direction.
 *
 * @example
 * // Exchange ask 0.35, hedge probability 0.45, no fees
 * computeEdge({ exchangeAsk: 0.35, hedgeFairProb: 0.45, exchangeFees: NO_FEES, oddsFees: NO_FEES })
 * // => { edgeGross: 0.10, edgeNet: 0.10, ... }
 */
export function computeEdge(input: EdgeInput): EdgeResult {
  const qty = input.qty ?? 1;
  const exchangePriceAdj = feeAdjustedExchangePrice(
    input.exchangeFees,
    input.exchangeAsk,
    qty
  );
  const hedgeProbAdj = feeAdjustedOddsProb(input.oddsFees, input.hedgeFairProb, qty);

  const edgeGross = input.hedgeFairProb - input.exchangeAsk;
  const edgeNet = hedgeProbAdj - exchangePriceAdj;

  return {
    exchangePriceAdj,
    hedgeProbAdj,
    edgeGross,
    edgeNet,
    profitable: edgeNet > 0,
  };
}
