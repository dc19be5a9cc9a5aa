/**
 * Exposure and position types.
 */

import type { Side } from "../normalization/types";
import type { LegRole } from "../strategy/types";

export type PositionKind = "hedged" | "partial_hedge" | "naked";

export type PositionStatus = "open" | "settled" | "closed";

/**
 * One filled leg held in a position.
 */
export interface PositionLeg {
  role: LegRole;
  venue: string;
  instrumentId: string;
  /** Exchange side whose occurrence pays this leg */
  side: Side;
  outcome?: string;
  /** Contracts ($1 payout each) */
  size: number;
  /** Average price paid per contract (0-1) */
  unitCost: number;
  /** Fees paid in dollars */
  fees: number;
}

export interface Position {
  id: string;
  attemptId: string;
  pairKey: string;
  kind: PositionKind;
  legs: PositionLeg[];
  /** Contracts covered on both venues */
  hedgedSize: number;
  /** Contracts held on one venue only */
  unhedgedSize: number;
  /** Dollars paid for all legs, fees excluded */
  cost: number;
  fees: number;
  /** Guaranteed P&L of a fully hedged position, null otherwise */
  lockedPnl: number | null;
  status: PositionStatus;
  realizedPnl: number | null;
  openedAt: number;
  closedAt: number | null;
}

export interface VenueFlag {
  reason: string;
  since: number;
}

/**
 * Exposure bookkeeping for one venue. Daily fields reset at UTC midnight.
 */
export interface VenueExposure {
  venue: string;
  /** Dollars currently deployed in open positions */
  openNotional: number;
  /** Dollars reserved by attempts in flight */
  pendingNotional: number;
  /** Dollars traded today */
  dailyVolume: number;
  dailyRealizedPnl: number;
  /** Throttle/ban flag; persists across days until cleared */
  flag: VenueFlag | null;
  lastActivityTs: number | null;
}

export interface ReservationLeg {
  venue: string;
  notional: number;
}

/**
 * Exposure held for an attempt between the pre-trade check and its
 * terminal accounting.
 */
export interface Reservation {
  id: string;
  opportunityId: string;
  legs: ReservationLeg[];
  createdAt: number;
}

export interface LedgerSnapshot {
  dayStart: number;
  venues: Record<string, VenueExposure>;
  positions: Position[];
  reservations: Reservation[];
  globalOpenNotional: number;
  globalPendingNotional: number;
  dailyRealizedPnl: number;
  cumulativeRealizedPnl: number;
  highWaterMark: number;
  /** Sum of locked P&L over open hedged positions */
  unrealizedPnl: number;
}
