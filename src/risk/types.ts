/**
 * Risk types.
 */

import type { Reservation } from "../state/types";

/**
 * Result of a guard check.
 */
export type GuardResult =
  | { pass: true }
  | { pass: false; reason: string };

/**
 * Dollar caps for one venue.
 */
export interface VenueLimits {
  /** Maximum notional of a single leg */
  perBetCap: number;
  /** Maximum notional traded per UTC day */
  dailyVolumeCap: number;
}

export interface RiskLimits {
  defaultVenueLimits: VenueLimits;
  /** Per-venue overrides of the defaults */
  venueLimits: Record<string, Partial<VenueLimits>>;
  /** Maximum open plus in-flight notional across all venues */
  maxGlobalExposure: number;
  /** Daily realized loss that trips the kill switch (positive dollars) */
  maxDailyLoss: number;
  /** Drawdown from the realized P&L high-water mark that trips the kill switch */
  maxDrawdown: number;
  /** Smallest plan size worth executing (contracts) */
  minActionableSize: number;
  /** Opportunities older than this are rejected (ms) */
  staleMs: number;
  /** Leg-2 rejections within the window that flag a venue */
  throttleRejectCount: number;
  throttleWindowMs: number;
}

/**
 * Leg figures the pre-trade guards need.
 */
export interface PreTradeLeg {
  venue: string;
  notional: number;
  flagReason: string | null;
  perBetCap: number;
  /** Today's volume plus in-flight reservations */
  dailyVolumeUsed: number;
  dailyVolumeCap: number;
}

/**
 * Everything the pre-trade guards look at, captured at one instant.
 */
export interface PreTradeContext {
  halted: boolean;
  haltReason: string | null;
  opportunityAgeMs: number;
  staleMs: number;
  executable: boolean;
  size: number;
  minActionableSize: number;
  legs: PreTradeLeg[];
  /** Open plus in-flight notional across venues */
  globalExposure: number;
  maxGlobalExposure: number;
  estimatedCost: number;
  /** Bankroll left for new attempts; null when no bankroll is tracked */
  availableBankroll: number | null;
  dailyRealizedPnl: number;
  worstCaseLoss: number;
  maxDailyLoss: number;
}

export type ReservationDecision =
  | { pass: true; reservation: Reservation }
  | { pass: false; reason: string };

export interface KillSwitchStatus {
  halted: boolean;
  reason: string | null;
  since: number | null;
}
