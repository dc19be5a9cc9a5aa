/**
 * Execution types for legged cross-venue execution.
 *
 * Leg 1 goes first; leg 2 is sized to leg 1's actual fill and submitted
 * only once leg 1 has reached a terminal state.
 */

import type { OrderHandle } from "../venues/types";
import type { Opportunity, PlannedLeg } from "../strategy/types";
import type { RetryOptions } from "../utils/retry";

/**
 * Status of a single leg order.
 */
export type LegState =
  | "pending"
  | "submitted"
  | "filled"
  | "partially_filled"
  | "rejected"
  | "timed_out"
  | "cancelled";

/**
 * Attempt state machine.
 *
 * planned → leg1_submitted → leg1_{filled|partial_fill|rejected|timed_out|cancelled}
 *   → leg2_submitted → both_filled | leg2_{partial_fill|rejected|timed_out}
 */
export type AttemptState =
  | "planned"
  | "leg1_submitted"
  | "leg1_filled"
  | "leg1_partial_fill"
  | "leg1_rejected"
  | "leg1_timed_out"
  | "leg1_cancelled"
  | "leg2_submitted"
  | "both_filled"
  | "leg2_partial_fill"
  | "leg2_rejected"
  | "leg2_timed_out";

/**
 * Terminal outcome of an attempt.
 */
export type AttemptOutcome =
  /** Both legs filled for the same size */
  | "both_filled"
  /** Leg 2 hedged part of leg 1; the residual stays open */
  | "leg2_partial_fill"
  /** Leg 1 filled nothing; nothing is held */
  | "abandoned"
  /** Leg 1 filled, leg 2 filled nothing */
  | "naked_exposure"
  /** Cancelled by the caller before leg 1 filled anything */
  | "cancelled"
  /** Never started: risk veto, stale, cooldown or pair busy */
  | "rejected_pretrade";

/**
 * Execution details for a single leg.
 */
export interface LegExecution {
  leg: PlannedLeg;
  state: LegState;
  requestedSize: number;
  filledSize: number;
  /** Average fill price as a probability */
  avgPrice: number | null;
  clientOrderId: string | null;
  handle: OrderHandle | null;
  submitTs: number | null;
  endTs: number | null;
  error: string | null;
}

export interface StateTransition {
  state: AttemptState;
  ts: number;
}

/**
 * Complete record of one execution attempt. Frozen once terminal.
 */
export interface ExecutionAttempt {
  id: string;
  opportunity: Opportunity;
  state: AttemptState;
  outcome: AttemptOutcome | null;
  leg1: LegExecution;
  leg2: LegExecution;
  transitions: StateTransition[];
  startTs: number;
  endTs: number | null;
  expectedEdgeNet: number;
  /** Edge at the achieved prices, null unless both legs filled something */
  realizedEdge: number | null;
  hedgedSize: number;
  unhedgedSize: number;
  /** Position opened by this attempt, if any */
  positionId: string | null;
  dryRun: boolean;
  error: string | null;
}

/**
 * Result of an execution attempt.
 */
export interface ExecutionResult {
  /** Both legs filled something and nothing is naked */
  success: boolean;
  attempt: ExecutionAttempt;
  error: string | null;
}

export interface CoordinatorOptions {
  leg1TimeoutMs: number;
  leg2TimeoutMs: number;
  /** Interval between order status polls */
  pollIntervalMs: number;
  retry: RetryOptions;
  /** Per-pair pause after a successful attempt */
  cooldownMsAfterSuccess: number;
  /** Per-pair pause after a failed attempt */
  cooldownMsAfterFailure: number;
}

/**
 * Generate a unique attempt ID.
 */
export function generateAttemptId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `exec_${timestamp}_${random}`;
}

/**
 * Generate a unique client order ID.
 */
export function generateClientOrderId(venue: string, leg: 1 | 2): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 6);
  return `${venue}_L${leg}_${timestamp}_${random}`;
}

export function createLegExecution(leg: PlannedLeg, requestedSize: number): LegExecution {
  return {
    leg,
    state: "pending",
    requestedSize,
    filledSize: 0,
    avgPrice: null,
    clientOrderId: null,
    handle: null,
    submitTs: null,
    endTs: null,
    error: null,
  };
}

export function isSuccessfulOutcome(outcome: AttemptOutcome | null): boolean {
  return outcome === "both_filled" || outcome === "leg2_partial_fill";
}

/**
 * Deep-freeze a terminal attempt so later code cannot edit history.
 */
export function freezeAttempt(attempt: ExecutionAttempt): ExecutionAttempt {
  Object.freeze(attempt.leg1.leg);
  Object.freeze(attempt.leg2.leg);
  Object.freeze(attempt.leg1);
  Object.freeze(attempt.leg2);
  Object.freeze(attempt.transitions);
  return Object.freeze(attempt);
}
