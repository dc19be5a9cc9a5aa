/**
 * Execution-specific structured logging.
 *
 * Logs to both console (formatted) and file (structured JSON).
 */

import type { Opportunity } from "../strategy/types";
import type { ExecutionAttempt, LegExecution } from "../execution/types";
import { formatTimestamp } from "./logger";
import { logEntry } from "./fileLogger";

/**
 * Format price for display.
 */
function formatPrice(price: number | null): string {
  return price === null ? "-" : price.toFixed(4);
}

/**
 * Format dollar amount for display.
 */
function formatDollars(amount: number): string {
  const sign = amount >= 0 ? "+" : "-";
  return `${sign}$${Math.abs(amount).toFixed(4)}`;
}

function legSummary(leg: LegExecution): Record<string, unknown> {
  return {
    venue: leg.leg.venue,
    role: leg.leg.role,
    instrumentId: leg.leg.instrumentId,
    side: leg.leg.side,
    outcome: leg.leg.outcome,
    state: leg.state,
    requestedSize: leg.requestedSize,
    filledSize: leg.filledSize,
    avgPrice: leg.avgPrice,
    orderId: leg.handle?.orderId ?? null,
    error: leg.error,
  };
}

/**
 * Log opportunity detected.
 */
export function logOpportunityDetected(opp: Opportunity): void {
  logEntry("OPPORTUNITY", {
    id: opp.id,
    pairKey: opp.pairKey,
    direction: opp.direction,
    oddsVenue: opp.oddsVenue,
    edgeGross: opp.edgeGross,
    edgeNet: opp.edgeNet,
    maxSize: opp.maxSize,
    executable: opp.executable,
    legs: opp.plan.map((leg) => ({
      venue: leg.venue,
      role: leg.role,
      side: leg.side,
      unitCost: leg.unitCost,
      size: leg.size,
    })),
  });
}

/**
 * Log execution start.
 */
export function logExecutionStart(attempt: ExecutionAttempt): void {
  const [first, second] = attempt.opportunity.plan;

  console.log("");
  console.log(`[${formatTimestamp()}] EXECUTION START id=${attempt.id}${attempt.dryRun ? " (dry run)" : ""}`);
  console.log(`  Pair: ${attempt.opportunity.pairKey}`);
  console.log(`  Expected edge: ${attempt.expectedEdgeNet.toFixed(4)}`);
  console.log(`  Leg 1: ${first.venue.toUpperCase()} ${first.role} @ ${formatPrice(first.unitCost)} x${first.size}`);
  console.log(`  Leg 2: ${second.venue.toUpperCase()} ${second.role} @ ${formatPrice(second.unitCost)}`);

  logEntry("EXECUTION_START", {
    attemptId: attempt.id,
    pairKey: attempt.opportunity.pairKey,
    opportunityId: attempt.opportunity.id,
    expectedEdgeNet: attempt.expectedEdgeNet,
    dryRun: attempt.dryRun,
  });
}

/**
 * Log leg submission.
 */
export function logLegSubmit(attemptId: string, legNumber: 1 | 2, leg: LegExecution): void {
  console.log(
    `[${formatTimestamp()}] LEG ${legNumber} SUBMIT -> ${leg.leg.venue.toUpperCase()} ` +
      `${leg.leg.role} x${leg.requestedSize} @ ${formatPrice(leg.leg.unitCost)}`
  );
  logEntry("LEG_SUBMIT", {
    attemptId,
    leg: legNumber,
    clientOrderId: leg.clientOrderId,
    ...legSummary(leg),
  });
}

/**
 * Log leg terminal state.
 */
export function logLegResult(
  attemptId: string,
  legNumber: 1 | 2,
  leg: LegExecution
): void {
  const latency = leg.submitTs !== null && leg.endTs !== null ? leg.endTs - leg.submitTs : null;
  console.log(
    `[${formatTimestamp()}] LEG ${legNumber} ${leg.state.toUpperCase()} ` +
      `${leg.filledSize}/${leg.requestedSize} @ ${formatPrice(leg.avgPrice)}` +
      (latency !== null ? ` (${latency}ms)` : "") +
      (leg.error ? ` - ${leg.error}` : "")
  );
  logEntry("LEG_RESULT", {
    attemptId,
    leg: legNumber,
    latencyMs: latency,
    ...legSummary(leg),
  });
}

/**
 * Log execution completion.
 */
export function logExecutionComplete(attempt: ExecutionAttempt): void {
  const duration = attempt.endTs !== null ? attempt.endTs - attempt.startTs : null;
  console.log(
    `[${formatTimestamp()}] EXECUTION ${String(attempt.outcome).toUpperCase()} id=${attempt.id} ` +
      `hedged=${attempt.hedgedSize} unhedged=${attempt.unhedgedSize}` +
      (attempt.realizedEdge !== null ? ` realized edge=${formatDollars(attempt.realizedEdge)}` : "") +
      (duration !== null ? ` (${duration}ms)` : "")
  );
  console.log("");

  logEntry("EXECUTION_COMPLETE", {
    attemptId: attempt.id,
    pairKey: attempt.opportunity.pairKey,
    outcome: attempt.outcome,
    state: attempt.state,
    expectedEdgeNet: attempt.expectedEdgeNet,
    realizedEdge: attempt.realizedEdge,
    hedgedSize: attempt.hedgedSize,
    unhedgedSize: attempt.unhedgedSize,
    durationMs: duration,
    leg1: legSummary(attempt.leg1),
    leg2: legSummary(attempt.leg2),
    error: attempt.error,
  });
}

/**
 * Log naked exposure (always console.error).
 */
export function logNakedExposure(attempt: ExecutionAttempt): void {
  console.error("");
  console.error("!".repeat(70));
  console.error(`[${formatTimestamp()}] NAKED EXPOSURE id=${attempt.id}`);
  console.error(
    `  ${attempt.leg1.leg.venue.toUpperCase()} holds ${attempt.unhedgedSize} unhedged ` +
      `@ ${formatPrice(attempt.leg1.avgPrice)}; leg 2 at ${attempt.leg2.leg.venue} ${attempt.leg2.state}`
  );
  console.error("!".repeat(70));
  console.error("");

  logEntry("NAKED_EXPOSURE", {
    attemptId: attempt.id,
    pairKey: attempt.opportunity.pairKey,
    size: attempt.unhedgedSize,
    leg1: legSummary(attempt.leg1),
    leg2: legSummary(attempt.leg2),
  });
}

/**
 * Log a venue flagged for throttling.
 */
export function logVenueFlagged(venue: string, reason: string): void {
  console.warn(`[${formatTimestamp()}] VENUE FLAGGED ${venue}: ${reason}`);
  logEntry("VENUE_FLAGGED", { venue, reason });
}

/**
 * Log kill switch trigger.
 */
export function logKillSwitch(reason: string, dailyRealizedPnl: number, drawdown: number): void {
  console.error("");
  console.error("!".repeat(70));
  console.error(`[${formatTimestamp()}] KILL SWITCH TRIGGERED`);
  console.error(`  Reason: ${reason}`);
  console.error(`  Daily P&L: ${formatDollars(dailyRealizedPnl)} | Drawdown: $${drawdown.toFixed(2)}`);
  console.error("!".repeat(70));
  console.error("");

  logEntry("KILL_SWITCH", { reason, dailyRealizedPnl, drawdown });
}

export function logKillSwitchReset(previousReason: string | null): void {
  console.log(`[${formatTimestamp()}] KILL SWITCH RESET (was: ${previousReason ?? "n/a"})`);
  logEntry("KILL_SWITCH_RESET", { previousReason });
}

export function logPositionSettled(positionId: string, realizedPnl: number, how: string): void {
  console.log(
    `[${formatTimestamp()}] POSITION ${how.toUpperCase()} ${positionId} realized=${formatDollars(realizedPnl)}`
  );
  logEntry("POSITION_SETTLED", { positionId, realizedPnl, how });
}

/**
 * Log error during execution.
 */
export function logExecutionError(attemptId: string | null, error: string, details?: Record<string, unknown>): void {
  console.error(`[${formatTimestamp()}] EXECUTION ERROR${attemptId ? ` id=${attemptId}` : ""}: ${error}`);
  logEntry("ERROR", { attemptId, error, ...details });
}
