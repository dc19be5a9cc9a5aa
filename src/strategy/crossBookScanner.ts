/**
 * Cross-book detection between odds venues.
 *
 * Arbitrage: for each two-way market (moneyline, spread at one line,
 * total at one line) take the best price per side across venues. When
 * the two best prices sit on different venues and their implied
 * probabilities sum below 1, staking each side in proportion to its
 * implied probability returns the same payout either way.
 *
 * Value bets: an outcome priced by enough venues gets a consensus
 * probability (mean implied). A venue whose implied probability is
 * below consensus by at least the minimum edge is flagged.
 *
 * Report-only: nothing here is dispatched. No side effects, no I/O.
 */

import { americanToImplied, isValidAmericanOdds } from "../fees/odds";
import type { OddsLine, OddsOutcome } from "../markets/types";
import {
  DEFAULT_CROSS_BOOK_OPTIONS,
  type CrossBookLeg,
  type CrossBookOpportunity,
  type CrossBookOptions,
} from "./types";

/** Value-bet edge at which the full leg stake is used */
const FULL_STAKE_VALUE_EDGE = 0.1;

interface PricedOutcome {
  line: OddsLine;
  outcome: OddsOutcome;
  impliedProb: number;
}

interface MarketGroup {
  key: string;
  line: OddsLine;
  /** Side keys in the order the first line listed them */
  sides: [string, string];
  prices: Map<string, PricedOutcome[]>;
}

function roundCents(dollars: number): number {
  return Math.round(dollars * 100) / 100;
}

function sideKey(outcome: OddsOutcome): string {
  const name = outcome.name.trim().toLowerCase();
  return outcome.point === undefined ? name : `${name}|${outcome.point}`;
}

function marketKey(line: OddsLine, sides: readonly string[]): string {
  return `${line.eventId}|${line.marketType}|${[...sides].sort().join("/")}`;
}

function toLeg(priced: PricedOutcome, stake: number): CrossBookLeg {
  const leg: CrossBookLeg = {
    venue: priced.line.venue,
    lineId: priced.line.id,
    outcome: priced.outcome.name,
    price: priced.outcome.price,
    impliedProb: priced.impliedProb,
    stake,
  };
  if (priced.outcome.point !== undefined) leg.point = priced.outcome.point;
  return leg;
}

function usable(line: OddsLine, now: number, maxAgeMs: number): boolean {
  if (now - line.ts > maxAgeMs) return false;
  return line.outcomes.every((outcome) => isValidAmericanOdds(outcome.price));
}

/**
 * Group fresh lines into two-way markets keyed by event, type and sides.
 */
function groupMarkets(
  lines: readonly OddsLine[],
  now: number,
  maxAgeMs: number
): MarketGroup[] {
  const groups = new Map<string, MarketGroup>();

  for (const line of lines) {
    if (!usable(line, now, maxAgeMs)) continue;

    const sides: [string, string] = [sideKey(line.outcomes[0]), sideKey(line.outcomes[1])];
    if (sides[0] === sides[1]) continue;

    const key = marketKey(line, sides);
    let group = groups.get(key);
    if (!group) {
      group = { key, line, sides, prices: new Map<string, PricedOutcome[]>([[sides[0], []], [sides[1], []]]) };
      groups.set(key, group);
    }

    for (const outcome of line.outcomes) {
      group.prices.get(sideKey(outcome))?.push({
        line,
        outcome,
        impliedProb: americanToImplied(outcome.price),
      });
    }
  }

  return [...groups.values()];
}

function bestPrice(prices: readonly PricedOutcome[]): PricedOutcome | null {
  let best: PricedOutcome | null = null;
  for (const priced of prices) {
    if (!best || priced.impliedProb < best.impliedProb) best = priced;
  }
  return best;
}

/**
 * Two-outcome arbitrages across venues.
 */
export function detectCrossBookArbs(
  lines: readonly OddsLine[],
  now: number,
  options: CrossBookOptions = DEFAULT_CROSS_BOOK_OPTIONS
): CrossBookOpportunity[] {
  const found: CrossBookOpportunity[] = [];

  for (const group of groupMarkets(lines, now, options.maxAgeMs)) {
    const first = bestPrice(group.prices.get(group.sides[0]) ?? []);
    const second = bestPrice(group.prices.get(group.sides[1]) ?? []);
    if (!first || !second) continue;
    if (first.line.venue === second.line.venue) continue;

    const sum = first.impliedProb + second.impliedProb;
    const edge = 1 - sum;
    if (edge < options.minArbEdge) continue;

    // Equal payout on either side, then scaled so no stake exceeds the leg cap
    const rawStakes = [first, second].map((priced) => (options.maxArbTotal * priced.impliedProb) / sum);
    const scale = Math.min(1, options.maxLegStake / Math.max(...rawStakes));
    const total = options.maxArbTotal * scale;
    const legs = [first, second].map((priced, i) => toLeg(priced, roundCents(rawStakes[i] * scale)));

    found.push({
      id: `arbitrage:${group.key}`,
      strategy: "arbitrage",
      eventId: group.line.eventId,
      category: group.line.category,
      marketType: group.line.marketType,
      edge,
      legs,
      totalStake: roundCents(legs.reduce((acc, leg) => acc + leg.stake, 0)),
      guaranteedProfit: roundCents(total / sum - total),
      detectedAt: now,
      expiresAt: group.line.startTime,
    });
  }

  return found;
}

/**
 * Outcomes priced above the cross-venue consensus.
 */
export function detectValueBets(
  lines: readonly OddsLine[],
  now: number,
  options: CrossBookOptions = DEFAULT_CROSS_BOOK_OPTIONS
): CrossBookOpportunity[] {
  const found: CrossBookOpportunity[] = [];

  for (const group of groupMarkets(lines, now, options.maxAgeMs)) {
    for (const side of group.sides) {
      const prices = group.prices.get(side) ?? [];
      const venues = new Set(prices.map((priced) => priced.line.venue));
      if (venues.size < options.minConsensusBooks) continue;

      const consensus = prices.reduce((acc, priced) => acc + priced.impliedProb, 0) / prices.length;

      for (const priced of prices) {
        const edge = consensus - priced.impliedProb;
        if (edge < options.minValueEdge) continue;

        const stake = roundCents(options.maxLegStake * Math.min(edge / FULL_STAKE_VALUE_EDGE, 1));
        found.push({
          id: `value_bet:${group.key}|${side}|${priced.line.venue}`,
          strategy: "value_bet",
          eventId: group.line.eventId,
          category: group.line.category,
          marketType: group.line.marketType,
          edge,
          legs: [toLeg(priced, stake)],
          totalStake: stake,
          guaranteedProfit: 0,
          consensusProb: consensus,
          detectedAt: now,
          expiresAt: group.line.startTime,
        });
      }
    }
  }

  return found;
}

/**
 * Arbitrages and value bets, best edge first.
 */
export function scanCrossBook(
  lines: readonly OddsLine[],
  now: number,
  options: CrossBookOptions = DEFAULT_CROSS_BOOK_OPTIONS
): CrossBookOpportunity[] {
  return [...detectCrossBookArbs(lines, now, options), ...detectValueBets(lines, now, options)].sort(
    (a, b) => b.edge - a.edge
  );
}
