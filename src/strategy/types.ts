/**
 * Strategy types for exchange ↔ odds-venue arbitrage.
 */

import type { FeeModel } from "../fees/feeEngine";
import type { OddsMarketType } from "../markets/types";
import type { QuotePrice, Side } from "../normalization/types";

export type LegRole = "exchange" | "odds";

/**
 * One leg of an execution plan.
 */
export interface PlannedLeg {
  role: LegRole;
  venue: string;
  /** Exchange ticker or odds line id */
  instrumentId: string;
  /** Exchange side bought, or the exchange side this odds outcome stands for */
  side: Side;
  /** Odds outcome name (odds legs only) */
  outcome?: string;
  /** Limit price as quoted by the venue */
  price: QuotePrice;
  /** Cost per contract as a probability (ask, or raw implied for odds) */
  unitCost: number;
  /** Contracts to trade */
  size: number;
  /** Liquidity observed when the plan was built */
  availableSize: number;
  /** Typical time for the venue to confirm a fill */
  expectedConfirmMs: number;
}

/**
 * Detected arbitrage opportunity. Legs are in execution order.
 */
export interface Opportunity {
  id: string;
  /** MatchedPair key */
  pairKey: string;
  /** Exchange side bought */
  direction: Side;
  oddsVenue: string;
  oddsLineId: string;
  edgeGross: number;
  edgeNet: number;
  /** Contracts per leg */
  maxSize: number;
  confidence: number;
  detectedAt: number;
  plan: [PlannedLeg, PlannedLeg];
  /** False when a leg's venue cannot take orders (reported only) */
  executable: boolean;
  /** Human-readable reason for logging */
  reason: string;
}

/**
 * Remaining room at one venue, in dollars.
 */
export interface VenueCapacity {
  perBetCap: number;
  remainingDaily: number;
}

/**
 * Capacity view used to size plans.
 */
export interface CapacityProvider {
  capacityFor(venue: string): VenueCapacity;
  globalHeadroom(): number;
}

/**
 * Picks one of several opportunities whose edges are equivalent.
 */
export interface VenueSelector {
  selectVenue(candidates: readonly Opportunity[]): Opportunity;
}

/**
 * Capabilities and latency profile per venue.
 */
export interface VenueDirectory {
  canTrade(venue: string): boolean;
  expectedConfirmMs(venue: string): number;
}

/**
 * Detection parameters for a scan.
 */
export interface DetectionContext {
  minEdge: number;
  /** Maximum snapshot age accepted (ms) */
  quoteFreshnessMs: number;
  /** Edges within this distance of the best count as equivalent */
  equivalentEdgeTolerance: number;
  /** Hard cap on contracts per leg */
  maxContracts: number;
  exchangeFees: FeeModel;
  oddsFees(venue: string): FeeModel;
  capacity: CapacityProvider;
  venues: VenueDirectory;
  selector?: VenueSelector;
}

/**
 * Result of one detection pass over a matched pair.
 */
export interface DetectionResult {
  opportunity: Opportunity | null;
  /** Why no opportunity was emitted, or a summary of the one that was */
  reason: string;
  /** Lines skipped because their snapshot was stale */
  staleLines: number;
  /** Directions that cleared the edge threshold before venue selection */
  candidates: number;
}

// === Cross-book (odds venue against odds venue) ===

export type CrossBookStrategy = "arbitrage" | "value_bet";

/**
 * One stake on one odds venue.
 */
export interface CrossBookLeg {
  venue: string;
  lineId: string;
  outcome: string;
  point?: number;
  /** American odds */
  price: number;
  impliedProb: number;
  /** Dollars */
  stake: number;
}

/**
 * Report-only opportunity between odds venues. Never dispatched: the
 * engine places orders on the exchange leg only.
 */
export interface CrossBookOpportunity {
  id: string;
  strategy: CrossBookStrategy;
  eventId: string;
  category: string;
  marketType: OddsMarketType;
  /** Arbitrage: 1 - sum of implied; value bet: consensus - implied */
  edge: number;
  legs: CrossBookLeg[];
  totalStake: number;
  /** Arbitrage profit locked in at `totalStake`; 0 for value bets */
  guaranteedProfit: number;
  /** Mean implied probability across venues, value bets only */
  consensusProb?: number;
  detectedAt: number;
  expiresAt: number;
}

export interface CrossBookOptions {
  /** Minimum arbitrage edge (1 - sum of implied) */
  minArbEdge: number;
  /** Minimum value-bet edge over consensus */
  minValueEdge: number;
  /** Venues needed to form a consensus */
  minConsensusBooks: number;
  /** Stake across both legs of an arbitrage ($) */
  maxArbTotal: number;
  /** Largest single stake ($) */
  maxLegStake: number;
  /** Lines older than this are skipped (ms) */
  maxAgeMs: number;
}

export const DEFAULT_CROSS_BOOK_OPTIONS: CrossBookOptions = {
  minArbEdge: 0.005,
  minValueEdge: 0.05,
  minConsensusBooks: 3,
  maxArbTotal: 100,
  maxLegStake: 50,
  maxAgeMs: 5000,
};
