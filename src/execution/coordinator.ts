/**
 * Legging execution coordinator.
 *
 * Runs one opportunity as a saga:
 * 1. Reserve exposure through the risk manager (rejected_pretrade on veto)
 * 2. Leg 1: place, poll until filled or the deadline, cancel, re-verify
 *    - Nothing filled: abandoned (or cancelled on request)
 * 3. Leg 2 sized to leg 1's actual fill, same place/poll/cancel cycle
 *    - Full fill: both_filled
 *    - Partial: leg2_partial_fill, residual held as a partial hedge
 *    - Nothing: naked_exposure, critical alert and a naked position
 * 4. Hand the terminal attempt to the portfolio, start the pair cooldown
 *
 * At most one attempt per pair is in flight; pairs run concurrently.
 */

import type { AlertSink } from "../alerts/types";
import {
  NakedExposureError,
  OperationTimeoutError,
  RejectedOrderError,
  getErrorMessage,
} from "../errors";
import {
  logExecutionComplete,
  logExecutionStart,
  logLegResult,
  logLegSubmit,
  logNakedExposure,
} from "../logging/executionLogger";
import type { Logger } from "../logging/logger";
import { incrementAttempts, recordLatency } from "../logging/metrics";
import type { PortfolioManager } from "../portfolio/portfolioManager";
import type { RiskManager } from "../risk/riskManager";
import type { Reservation } from "../state/types";
import type { Opportunity } from "../strategy/types";
import { withRetry } from "../utils/retry";
import { sleep, withTimeout } from "../utils/timeout";
import type { OrderHandle, OrderRequest, OrderRouter, OrderState } from "../venues/types";
import {
  type AttemptOutcome,
  type AttemptState,
  type CoordinatorOptions,
  type ExecutionAttempt,
  type ExecutionResult,
  type LegExecution,
  type LegState,
  createLegExecution,
  freezeAttempt,
  generateAttemptId,
  generateClientOrderId,
  isSuccessfulOutcome,
} from "./types";
import type { VenueRegistry } from "./venueRegistry";

export const DEFAULT_COORDINATOR_OPTIONS: CoordinatorOptions = {
  leg1TimeoutMs: 3000,
  leg2TimeoutMs: 10000,
  pollIntervalMs: 250,
  retry: { maxAttempts: 3, baseDelayMs: 200, maxDelayMs: 2000, maxRateLimitWaits: 3 },
  cooldownMsAfterSuccess: 1000,
  cooldownMsAfterFailure: 3000,
};

/** Completed attempts kept for status queries */
const MAX_RECENT_ATTEMPTS = 100;

export interface CoordinatorDeps {
  registry: VenueRegistry;
  risk: RiskManager;
  portfolio: PortfolioManager;
  alerts: AlertSink;
  logger: Logger;
  options?: Partial<CoordinatorOptions>;
  /** Called once per terminal attempt (persistence) */
  onAttempt?: (attempt: ExecutionAttempt) => void;
}

interface InFlight {
  attempt: ExecutionAttempt;
  controller: AbortController;
}

interface LegRun {
  /** The venue itself refused the order */
  venueRejected: boolean;
}

function leg1AttemptState(state: LegState): AttemptState {
  switch (state) {
    case "filled":
      return "leg1_filled";
    case "partially_filled":
      return "leg1_partial_fill";
    case "rejected":
      return "leg1_rejected";
    case "cancelled":
      return "leg1_cancelled";
    default:
      return "leg1_timed_out";
  }
}

function copyAttempt(attempt: ExecutionAttempt): ExecutionAttempt {
  return {
    ...attempt,
    leg1: { ...attempt.leg1 },
    leg2: { ...attempt.leg2 },
    transitions: attempt.transitions.map((transition) => ({ ...transition })),
  };
}

export class LeggingCoordinator {
  private readonly registry: VenueRegistry;
  private readonly risk: RiskManager;
  private readonly portfolio: PortfolioManager;
  private readonly alerts: AlertSink;
  private readonly logger: Logger;
  private readonly options: CoordinatorOptions;
  private readonly onAttempt?: (attempt: ExecutionAttempt) => void;

  private readonly inFlight = new Map<string, InFlight>();
  private readonly cooldownUntil = new Map<string, number>();
  private readonly recent: ExecutionAttempt[] = [];

  constructor(deps: CoordinatorDeps) {
    this.registry = deps.registry;
    this.risk = deps.risk;
    this.portfolio = deps.portfolio;
    this.alerts = deps.alerts;
    this.logger = deps.logger;
    this.options = { ...DEFAULT_COORDINATOR_OPTIONS, ...deps.options };
    this.onAttempt = deps.onAttempt;
  }

  isBusy(pairKey: string): boolean {
    return this.inFlight.has(pairKey);
  }

  isInCooldown(pairKey: string, now: number = Date.now()): boolean {
    const until = this.cooldownUntil.get(pairKey);
    if (until === undefined) return false;
    if (now < until) return true;
    this.cooldownUntil.delete(pairKey);
    return false;
  }

  /**
   * Forget cooldowns that have run out.
   */
  pruneCooldowns(now: number = Date.now()): void {
    for (const [pairKey, until] of this.cooldownUntil) {
      if (now >= until) this.cooldownUntil.delete(pairKey);
    }
  }

  /** Pairs with a cooldown on record */
  get cooldownCount(): number {
    return this.cooldownUntil.size;
  }

  getOpenAttempts(): ExecutionAttempt[] {
    return [...this.inFlight.values()].map((entry) => copyAttempt(entry.attempt));
  }

  /**
   * Most recent terminal attempts, newest first.
   */
  getRecentAttempts(): ExecutionAttempt[] {
    return [...this.recent].reverse();
  }

  /**
   * Cancel a pair's in-flight attempt. Only possible while leg 1 has no fill.
   */
  cancel(pairKey: string): boolean {
    const entry = this.inFlight.get(pairKey);
    if (!entry) return false;

    const { attempt, controller } = entry;
    const leg1Pending = attempt.state === "planned" || attempt.state === "leg1_submitted";
    if (!leg1Pending || attempt.leg1.filledSize > 0 || controller.signal.aborted) return false;

    controller.abort();
    this.logger.info(`Cancel requested for ${attempt.id}`, { pairKey });
    return true;
  }

  /**
   * Execute an opportunity to a terminal outcome.
   */
  async execute(opportunity: Opportunity): Promise<ExecutionResult> {
    const pairKey = opportunity.pairKey;

    if (this.inFlight.has(pairKey)) {
      return this.rejectPretrade(opportunity, "Pair already has an attempt in flight");
    }
    if (this.isInCooldown(pairKey)) {
      return this.rejectPretrade(opportunity, "Pair is in cooldown");
    }

    const attempt = this.createAttempt(opportunity);
    const controller = new AbortController();
    this.inFlight.set(pairKey, { attempt, controller });

    try {
      const decision = await this.risk.reserve(opportunity);
      if (!decision.pass) {
        this.logger.debug(`Pre-trade rejected ${opportunity.id}`, { reason: decision.reason });
        return this.finish(attempt, "rejected_pretrade", null, decision.reason);
      }
      return await this.runLegs(attempt, decision.reservation, controller.signal);
    } finally {
      this.inFlight.delete(pairKey);
    }
  }

  private async runLegs(
    attempt: ExecutionAttempt,
    reservation: Reservation,
    signal: AbortSignal
  ): Promise<ExecutionResult> {
    logExecutionStart(attempt);

    // === Leg 1 ===
    this.transition(attempt, "leg1_submitted");
    await this.runLeg(attempt, attempt.leg1, 1, this.options.leg1TimeoutMs, signal);
    const leg1 = attempt.leg1;
    this.transition(attempt, leg1AttemptState(leg1.state));

    if (leg1.filledSize === 0) {
      const outcome: AttemptOutcome = leg1.state === "cancelled" ? "cancelled" : "abandoned";
      return this.finish(attempt, outcome, reservation, leg1.error);
    }

    // === Leg 2, sized to what leg 1 actually filled ===
    const leg2 = attempt.leg2;
    leg2.requestedSize = leg1.filledSize;
    this.transition(attempt, "leg2_submitted");
    const leg2Run = await this.runLeg(attempt, leg2, 2, this.options.leg2TimeoutMs);

    if (leg1.endTs !== null && leg2.submitTs !== null) {
      recordLatency("leg1ToLeg2", leg2.submitTs - leg1.endTs);
    }

    if (leg2.filledSize >= leg2.requestedSize) {
      this.transition(attempt, "both_filled");
      return this.finish(attempt, "both_filled", reservation, null);
    }

    if (leg2.filledSize > 0) {
      this.transition(attempt, "leg2_partial_fill");
      this.logger.warn(`Leg 2 partially filled for ${attempt.id}`, {
        hedged: leg2.filledSize,
        residual: leg1.filledSize - leg2.filledSize,
      });
      return this.finish(attempt, "leg2_partial_fill", reservation, leg2.error);
    }

    this.transition(attempt, leg2.state === "timed_out" ? "leg2_timed_out" : "leg2_rejected");
    if (leg2Run.venueRejected) {
      await this.risk.recordLeg2Rejection(leg2.leg.venue, leg2.error ?? "rejected");
    }

    const naked = new NakedExposureError(
      `Leg 2 ${leg2.state} at ${leg2.leg.venue}; ${leg1.filledSize} contracts unhedged at ${leg1.leg.venue}`,
      attempt.id,
      leg1.leg.venue,
      leg1.filledSize,
      { pairKey: attempt.opportunity.pairKey, leg2Error: leg2.error }
    );
    return this.finish(attempt, "naked_exposure", reservation, naked.message, naked);
  }

  /**
   * Drive one leg to a terminal state. Never throws for venue outcomes.
   */
  private async runLeg(
    attempt: ExecutionAttempt,
    execution: LegExecution,
    legNumber: 1 | 2,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<LegRun> {
    const leg = execution.leg;
    const deadline = Date.now() + timeoutMs;

    if (signal?.aborted) {
      this.endLeg(attempt, execution, legNumber, "cancelled", "Cancelled before submission");
      return { venueRejected: false };
    }

    const router = this.registry.routerFor(leg.venue);
    if (!router) {
      this.endLeg(attempt, execution, legNumber, "rejected", `${leg.venue} cannot take orders`);
      return { venueRejected: false };
    }

    const request: OrderRequest = {
      clientOrderId: generateClientOrderId(leg.venue, legNumber),
      venue: leg.venue,
      instrumentId: leg.instrumentId,
      side: leg.side,
      outcome: leg.outcome,
      price: leg.price,
      size: execution.requestedSize,
      displayedSize: leg.availableSize,
    };
    execution.clientOrderId = request.clientOrderId;
    execution.state = "submitted";
    execution.submitTs = Date.now();
    logLegSubmit(attempt.id, legNumber, execution);

    // --- Placement ---
    const placement = withRetry(() => router.placeOrder(request), this.options.retry, (event) => {
      this.logger.warn(`Retrying leg ${legNumber} placement at ${leg.venue}`, {
        kind: event.kind,
        delayMs: event.delayMs,
        error: event.error.message,
      });
    });

    let handle: OrderHandle;
    try {
      handle = await withTimeout(placement, timeoutMs, `Leg ${legNumber} placement at ${leg.venue}`);
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        // An order accepted after the deadline is cancelled as soon as its handle arrives
        placement
          .then((late) => router.cancelOrder(late))
          .catch((lateError: unknown) => {
            this.logger.warn(`Late placement cleanup failed at ${leg.venue}`, {
              error: getErrorMessage(lateError),
            });
          });
        this.endLeg(attempt, execution, legNumber, "timed_out", error.message);
        return { venueRejected: false };
      }
      const venueRejected = error instanceof RejectedOrderError;
      const message = venueRejected ? `${error.message} (${error.reason})` : getErrorMessage(error);
      this.endLeg(attempt, execution, legNumber, "rejected", message);
      return { venueRejected };
    }
    execution.handle = handle;

    // --- Fill polling ---
    let last = await this.pollUntil(router, handle, execution.requestedSize, deadline, signal);
    const terminal = last !== null && (last.status === "filled" || last.status === "rejected" || last.status === "cancelled");

    if (!terminal) {
      // Cancel, then re-verify: a fill that raced the cancel is honoured
      try {
        await withTimeout(router.cancelOrder(handle), this.options.leg1TimeoutMs, `Cancel at ${leg.venue}`);
      } catch (error) {
        this.logger.warn(`Cancel failed at ${leg.venue}`, { orderId: handle.orderId, error: getErrorMessage(error) });
      }
      last = (await this.fetchStatus(router, handle)) ?? last;
    }

    const filledSize = Math.min(last?.filledSize ?? 0, execution.requestedSize);
    execution.filledSize = filledSize;
    execution.avgPrice = filledSize > 0 ? (last?.avgPrice ?? null) : null;

    let state: LegState;
    if (filledSize >= execution.requestedSize) {
      state = "filled";
    } else if (filledSize > 0) {
      state = "partially_filled";
    } else if (last?.status === "rejected") {
      state = "rejected";
    } else if (signal?.aborted) {
      state = "cancelled";
    } else if (last?.status === "cancelled" && terminal) {
      state = "rejected";
    } else {
      state = "timed_out";
    }

    const reason =
      state === "filled" || state === "partially_filled"
        ? null
        : (last?.reason ?? (state === "timed_out" ? `No fill within ${timeoutMs}ms` : state));
    this.endLeg(attempt, execution, legNumber, state, reason);

    if (filledSize > 0 && execution.submitTs !== null && execution.endTs !== null) {
      recordLatency(legNumber === 1 ? "leg1Fill" : "leg2Fill", execution.endTs - execution.submitTs);
    }
    return { venueRejected: state === "rejected" };
  }

  /**
   * Poll an order until it is terminal, the deadline passes or the
   * attempt is cancelled. Returns the last status seen.
   */
  private async pollUntil(
    router: OrderRouter,
    handle: OrderHandle,
    requestedSize: number,
    deadline: number,
    signal?: AbortSignal
  ): Promise<OrderState | null> {
    let last: OrderState | null = null;

    for (;;) {
      const status = await this.fetchStatus(router, handle);
      if (status) last = status;

      if (last) {
        if (last.status === "rejected" || last.status === "cancelled") return last;
        if (last.status === "filled" || last.filledSize >= requestedSize) {
          return { ...last, status: "filled" };
        }
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0 || signal?.aborted) return last;
      await sleep(Math.min(this.options.pollIntervalMs, remaining));
    }
  }

  private async fetchStatus(router: OrderRouter, handle: OrderHandle): Promise<OrderState | null> {
    try {
      return await withRetry(() => router.getOrderStatus(handle), this.options.retry);
    } catch (error) {
      this.logger.warn(`Order status unavailable at ${handle.venue}`, {
        orderId: handle.orderId,
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  private endLeg(
    attempt: ExecutionAttempt,
    execution: LegExecution,
    legNumber: 1 | 2,
    state: LegState,
    error: string | null
  ): void {
    execution.state = state;
    execution.error = error;
    execution.endTs = Date.now();
    logLegResult(attempt.id, legNumber, execution);
  }

  private createAttempt(opportunity: Opportunity): ExecutionAttempt {
    const now = Date.now();
    const [first, second] = opportunity.plan;
    return {
      id: generateAttemptId(),
      opportunity,
      state: "planned",
      outcome: null,
      leg1: createLegExecution(first, opportunity.maxSize),
      leg2: createLegExecution(second, 0),
      transitions: [{ state: "planned", ts: now }],
      startTs: now,
      endTs: null,
      expectedEdgeNet: opportunity.edgeNet,
      realizedEdge: null,
      hedgedSize: 0,
      unhedgedSize: 0,
      positionId: null,
      dryRun: this.registry.dryRun,
      error: null,
    };
  }

  private transition(attempt: ExecutionAttempt, state: AttemptState): void {
    attempt.state = state;
    attempt.transitions.push({ state, ts: Date.now() });
  }

  private rejectPretrade(opportunity: Opportunity, reason: string): ExecutionResult {
    const attempt = this.createAttempt(opportunity);
    attempt.outcome = "rejected_pretrade";
    attempt.endTs = attempt.startTs;
    attempt.error = reason;
    this.logger.debug(`Pre-trade rejected ${opportunity.id}`, { reason });
    return this.complete(attempt);
  }

  /**
   * Terminal bookkeeping shared by every outcome past the reservation step.
   */
  private async finish(
    attempt: ExecutionAttempt,
    outcome: AttemptOutcome,
    reservation: Reservation | null,
    error: string | null,
    naked?: NakedExposureError
  ): Promise<ExecutionResult> {
    const { leg1, leg2 } = attempt;
    attempt.outcome = outcome;
    attempt.error = error;
    attempt.endTs = Date.now();
    attempt.hedgedSize = Math.min(leg1.filledSize, leg2.filledSize);
    attempt.unhedgedSize = leg1.filledSize - attempt.hedgedSize;

    if (leg1.avgPrice !== null && leg2.avgPrice !== null) {
      const exchange = leg1.leg.role === "exchange" ? leg1.avgPrice : leg2.avgPrice;
      const odds = leg1.leg.role === "odds" ? leg1.avgPrice : leg2.avgPrice;
      attempt.realizedEdge = odds - exchange;
    }

    if (reservation) {
      const position = await this.portfolio.recordAttempt(attempt, reservation);
      attempt.positionId = position?.id ?? null;
    }

    if (naked) {
      logNakedExposure(attempt);
      this.logger.error(naked.message, naked.context);
      this.alerts.notify("critical", `NAKED EXPOSURE: ${naked.message}`, {
        attemptId: attempt.id,
        positionId: attempt.positionId,
        venue: naked.venue,
        size: naked.size,
      });
    }

    if (outcome !== "rejected_pretrade") {
      const cooldown = isSuccessfulOutcome(outcome)
        ? this.options.cooldownMsAfterSuccess
        : this.options.cooldownMsAfterFailure;
      this.pruneCooldowns(attempt.endTs);
      this.cooldownUntil.set(attempt.opportunity.pairKey, attempt.endTs + cooldown);
      recordLatency("totalExecution", attempt.endTs - attempt.startTs);
      logExecutionComplete(attempt);
    }

    return this.complete(attempt);
  }

  private complete(attempt: ExecutionAttempt): ExecutionResult {
    const frozen = freezeAttempt(attempt);
    incrementAttempts(frozen.outcome ?? "rejected_pretrade");

    this.recent.push(frozen);
    if (this.recent.length > MAX_RECENT_ATTEMPTS) this.recent.shift();

    if (this.onAttempt) {
      try {
        this.onAttempt(frozen);
      } catch (error) {
        this.logger.warn("Attempt listener failed", { attemptId: frozen.id, error: getErrorMessage(error) });
      }
    }

    return {
      success: isSuccessfulOutcome(frozen.outcome),
      attempt: frozen,
      error: frozen.error,
    };
  }
}
