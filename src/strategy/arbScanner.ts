/**
 * Arbitrage detection - pure function over one matched pair.
 *
 * For every matched odds line and every exchange side S:
 *   1. de-vig the odds line, take the probability of the outcome opposite S
 *   2. fee-adjust both sides
 *   3. edge = hedge probability - exchange ask
 * Directions that clear the minimum edge are sized against liquidity and
 * remaining venue capacity. When several odds venues are equivalent the
 * venue selector picks one; otherwise the best edge wins.
 *
 * No side effects, no I/O.
 */

import { computeEdge } from "../fees/edge";
import { StaleDataError } from "../errors";
import type { MatchedLine, MatchedPair, OddsOutcome } from "../markets/types";
import {
  type OrderBook,
  type Quote,
  type Side,
  hasAsk,
  normalizeOddsPair,
  oppositeSide,
} from "../normalization";
import type {
  DetectionContext,
  DetectionResult,
  Opportunity,
  PlannedLeg,
} from "./types";

const SIDES: readonly Side[] = ["A", "B"];

/**
 * Generate a unique opportunity ID.
 */
export function generateOpportunityId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `opp_${timestamp}_${random}`;
}

function outcomeQuote(line: MatchedLine, side: Side, outcome: OddsOutcome): Quote {
  return {
    venue: line.line.venue,
    instrumentId: line.line.id,
    side,
    price: { kind: "american", value: outcome.price },
    ts: line.line.ts,
    size: Number.POSITIVE_INFINITY,
  };
}

/**
 * Contracts an odds outcome can absorb given its published stake limit.
 */
function oddsLiquidity(outcome: OddsOutcome, unitCost: number): number {
  if (outcome.maxStake === undefined) return Number.POSITIVE_INFINITY;
  return Math.floor(outcome.maxStake / unitCost);
}

/**
 * Largest size satisfying liquidity, per-venue caps and global headroom.
 */
export function computeMaxSize(
  exchangeLeg: { venue: string; unitCost: number; availableSize: number },
  oddsLeg: { venue: string; unitCost: number; availableSize: number },
  context: Pick<DetectionContext, "capacity" | "maxContracts">
): number {
  const limits: number[] = [
    exchangeLeg.availableSize,
    oddsLeg.availableSize,
    context.maxContracts,
  ];

  for (const leg of [exchangeLeg, oddsLeg]) {
    const capacity = context.capacity.capacityFor(leg.venue);
    limits.push(capacity.perBetCap / leg.unitCost);
    limits.push(capacity.remainingDaily / leg.unitCost);
  }

  limits.push(context.capacity.globalHeadroom() / (exchangeLeg.unitCost + oddsLeg.unitCost));

  const size = Math.floor(Math.min(...limits) + 1e-9);
  return Math.max(0, size);
}

/**
 * Execution order: less liquid leg first, then slower-to-confirm first.
 */
export function orderLegs(a: PlannedLeg, b: PlannedLeg): [PlannedLeg, PlannedLeg] {
  if (a.availableSize !== b.availableSize) {
    return a.availableSize < b.availableSize ? [a, b] : [b, a];
  }
  if (a.expectedConfirmMs !== b.expectedConfirmMs) {
    return a.expectedConfirmMs > b.expectedConfirmMs ? [a, b] : [b, a];
  }
  return [a, b];
}

/**
 * Evaluate one direction (buy exchange side S) against one line.
 */
function evaluateDirection(
  pair: MatchedPair,
  book: OrderBook,
  line: MatchedLine,
  side: Side,
  context: DetectionContext,
  now: number
): Opportunity | null {
  const top = book.sides[side];
  if (!hasAsk(top)) return null;

  const hedgeSide = oppositeSide(side);
  const sameOutcome = line.outcomeFor[side];
  const hedgeOutcome = line.outcomeFor[hedgeSide];

  const [, hedgeQuote] = normalizeOddsPair(
    outcomeQuote(line, side, sameOutcome),
    outcomeQuote(line, hedgeSide, hedgeOutcome),
    context.oddsFees(line.line.venue)
  );

  const edge = computeEdge({
    exchangeAsk: top.ask,
    hedgeFairProb: hedgeQuote.fairProb,
    exchangeFees: context.exchangeFees,
    oddsFees: context.oddsFees(line.line.venue),
  });
  if (edge.edgeNet < context.minEdge) return null;

  const oddsVenue = line.line.venue;
  const hedgeUnitCost = hedgeQuote.impliedProb;

  const exchangeLeg: PlannedLeg = {
    role: "exchange",
    venue: book.venue,
    instrumentId: book.instrumentId,
    side,
    price: { kind: "probability", value: top.ask },
    unitCost: top.ask,
    size: 0,
    availableSize: top.askSize,
    expectedConfirmMs: context.venues.expectedConfirmMs(book.venue),
  };
  const oddsLeg: PlannedLeg = {
    role: "odds",
    venue: oddsVenue,
    instrumentId: line.line.id,
    side: hedgeSide,
    outcome: hedgeOutcome.name,
    price: { kind: "american", value: hedgeOutcome.price },
    unitCost: hedgeUnitCost,
    size: 0,
    availableSize: oddsLiquidity(hedgeOutcome, hedgeUnitCost),
    expectedConfirmMs: context.venues.expectedConfirmMs(oddsVenue),
  };

  const maxSize = computeMaxSize(exchangeLeg, oddsLeg, context);
  if (maxSize < 1) return null;

  exchangeLeg.size = maxSize;
  oddsLeg.size = maxSize;

  return {
    id: generateOpportunityId(),
    pairKey: pair.key,
    direction: side,
    oddsVenue,
    oddsLineId: line.line.id,
    edgeGross: edge.edgeGross,
    edgeNet: edge.edgeNet,
    maxSize,
    confidence: line.confidence,
    detectedAt: now,
    plan: orderLegs(exchangeLeg, oddsLeg),
    executable: context.venues.canTrade(book.venue) && context.venues.canTrade(oddsVenue),
    reason:
      `Buy ${pair.instrument.id} side ${side} @ ${top.ask.toFixed(3)}, ` +
      `hedge ${hedgeOutcome.name} @ ${oddsVenue} ${hedgeOutcome.price}`,
  };
}

/**
 * Detect the best opportunity for a matched pair.
 *
 * @throws StaleDataError when the exchange book is older than the freshness window
 */
export function detectOpportunity(
  pair: MatchedPair,
  book: OrderBook,
  context: DetectionContext,
  now: number = Date.now()
): DetectionResult {
  const bookAge = now - book.ts;
  if (bookAge > context.quoteFreshnessMs) {
    throw new StaleDataError(
      `Order book for ${book.instrumentId} is ${bookAge}ms old`,
      bookAge,
      { instrumentId: book.instrumentId }
    );
  }

  let staleLines = 0;
  const candidates: Opportunity[] = [];

  for (const line of pair.lines) {
    if (now - line.line.ts > context.quoteFreshnessMs) {
      staleLines++;
      continue;
    }
    for (const side of SIDES) {
      const opportunity = evaluateDirection(pair, book, line, side, context, now);
      if (opportunity) candidates.push(opportunity);
    }
  }

  if (candidates.length === 0) {
    return {
      opportunity: null,
      reason: staleLines === pair.lines.length ? "All odds lines stale" : "No edge above minimum",
      staleLines,
      candidates: 0,
    };
  }

  // Best direction per venue, then venues within tolerance of the overall best
  const bestPerVenue = new Map<string, Opportunity>();
  for (const candidate of candidates) {
    const current = bestPerVenue.get(candidate.oddsVenue);
    if (!current || candidate.edgeNet > current.edgeNet) {
      bestPerVenue.set(candidate.oddsVenue, candidate);
    }
  }
  const ranked = [...bestPerVenue.values()].sort((a, b) => b.edgeNet - a.edgeNet);
  const best = ranked[0];
  const equivalent = ranked.filter(
    (candidate) => best.edgeNet - candidate.edgeNet <= context.equivalentEdgeTolerance
  );

  const chosen =
    equivalent.length > 1 && context.selector
      ? context.selector.selectVenue(equivalent)
      : best;

  return {
    opportunity: chosen,
    reason: chosen.reason,
    staleLines,
    candidates: candidates.length,
  };
}
