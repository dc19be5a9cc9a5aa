/**
 * Risk manager.
 *
 * Owns the kill switch and the pre-trade decision. Reservations are
 * checked and written inside one ledger transaction so two concurrent
 * attempts can never both pass against the same headroom.
 *
 * Also serves detection: per-venue capacity for sizing, and venue
 * rotation when several odds venues offer an equivalent edge.
 */

import type { AlertSink } from "../alerts/types";
import type { Logger } from "../logging/logger";
import { logKillSwitch, logKillSwitchReset, logVenueFlagged } from "../logging/executionLogger";
import type { ExposureLedger } from "../state/exposureLedger";
import type { LedgerSnapshot, ReservationLeg, VenueExposure } from "../state/types";
import type {
  CapacityProvider,
  Opportunity,
  VenueCapacity,
  VenueSelector,
} from "../strategy/types";
import { checkKillSwitch, runPreTradeGuards } from "./guards";
import { ThrottleDetector } from "./throttleDetector";
import type {
  GuardResult,
  KillSwitchStatus,
  PreTradeContext,
  ReservationDecision,
  RiskLimits,
  VenueLimits,
} from "./types";

/**
 * Read access the pre-trade evaluation needs. Satisfied by a ledger
 * writer inside a transaction, or by `snapshotView` outside one.
 */
export interface ExposureView {
  venue(venue: string): VenueExposure;
  globalOpenNotional(): number;
  globalPendingNotional(): number;
  dailyRealizedPnl(): number;
  cumulativeRealizedPnl(): number;
}

export function snapshotView(snapshot: LedgerSnapshot): ExposureView {
  return {
    venue: (venue) =>
      snapshot.venues[venue] ?? {
        venue,
        openNotional: 0,
        pendingNotional: 0,
        dailyVolume: 0,
        dailyRealizedPnl: 0,
        flag: null,
        lastActivityTs: null,
      },
    globalOpenNotional: () => snapshot.globalOpenNotional,
    globalPendingNotional: () => snapshot.globalPendingNotional,
    dailyRealizedPnl: () => snapshot.dailyRealizedPnl,
    cumulativeRealizedPnl: () => snapshot.cumulativeRealizedPnl,
  };
}

/**
 * Generate a unique reservation ID.
 */
export function generateReservationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `res_${timestamp}_${random}`;
}

/**
 * Dollars at risk per leg of a plan.
 */
export function planNotionals(opportunity: Opportunity): ReservationLeg[] {
  return opportunity.plan.map((leg) => ({
    venue: leg.venue,
    notional: leg.size * leg.unitCost,
  }));
}

/**
 * Loss if only the costlier leg fills and its side loses.
 */
export function worstCaseLoss(opportunity: Opportunity): number {
  return Math.max(...planNotionals(opportunity).map((leg) => leg.notional));
}

/**
 * Capital set aside for trading, before realized P&L.
 */
export interface BankrollSource {
  bankrollCapital(): number;
}

export interface RiskManagerDeps {
  limits: RiskLimits;
  ledger: ExposureLedger;
  alerts: AlertSink;
  logger: Logger;
  /** Without one, attempts are not checked against the bankroll */
  bankroll?: BankrollSource;
  clock?: () => number;
}

export class RiskManager implements CapacityProvider, VenueSelector {
  private readonly limits: RiskLimits;
  private readonly ledger: ExposureLedger;
  private readonly alerts: AlertSink;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly throttle: ThrottleDetector;
  private readonly bankroll: BankrollSource | null;
  private killSwitch: KillSwitchStatus = { halted: false, reason: null, since: null };

  constructor(deps: RiskManagerDeps) {
    this.limits = deps.limits;
    this.ledger = deps.ledger;
    this.alerts = deps.alerts;
    this.logger = deps.logger;
    this.clock = deps.clock ?? Date.now;
    this.bankroll = deps.bankroll ?? null;
    this.throttle = new ThrottleDetector(
      deps.limits.throttleRejectCount,
      deps.limits.throttleWindowMs
    );
  }

  // === Kill switch ===

  isHalted(): boolean {
    return this.killSwitch.halted;
  }

  checkKillSwitch(): GuardResult {
    return checkKillSwitch(this.killSwitch.halted, this.killSwitch.reason);
  }

  getKillSwitchStatus(): KillSwitchStatus {
    return { ...this.killSwitch };
  }

  /**
   * Trip the kill switch when realized losses breach a limit.
   *
   * @returns Whether trading is halted afterwards
   */
  evaluateKillSwitch(snapshot: LedgerSnapshot = this.ledger.snapshot(this.clock())): boolean {
    if (this.killSwitch.halted) return true;

    if (snapshot.dailyRealizedPnl <= -this.limits.maxDailyLoss) {
      this.trip(
        `Daily loss $${(-snapshot.dailyRealizedPnl).toFixed(2)} reached limit $${this.limits.maxDailyLoss.toFixed(2)}`,
        snapshot
      );
    } else if (snapshot.highWaterMark - snapshot.cumulativeRealizedPnl >= this.limits.maxDrawdown) {
      this.trip(
        `Drawdown $${(snapshot.highWaterMark - snapshot.cumulativeRealizedPnl).toFixed(2)} reached limit $${this.limits.maxDrawdown.toFixed(2)}`,
        snapshot
      );
    }
    return this.killSwitch.halted;
  }

  /**
   * Halt all new attempts until `resetKillSwitch`.
   */
  trip(reason: string, snapshot: LedgerSnapshot = this.ledger.snapshot(this.clock())): void {
    if (this.killSwitch.halted) return;
    this.killSwitch = { halted: true, reason, since: this.clock() };

    const drawdown = snapshot.highWaterMark - snapshot.cumulativeRealizedPnl;
    logKillSwitch(reason, snapshot.dailyRealizedPnl, drawdown);
    this.alerts.notify("critical", `Kill switch tripped: ${reason}`, {
      dailyRealizedPnl: snapshot.dailyRealizedPnl,
      drawdown,
    });
  }

  resetKillSwitch(): void {
    if (!this.killSwitch.halted) return;
    logKillSwitchReset(this.killSwitch.reason);
    this.logger.info("Kill switch reset", { previousReason: this.killSwitch.reason });
    this.killSwitch = { halted: false, reason: null, since: null };
  }

  // === Pre-trade ===

  /**
   * Bankroll capital plus realized P&L, minus open and in-flight notional.
   * Null when no bankroll is tracked.
   */
  availableBankroll(view: ExposureView): number | null {
    if (!this.bankroll) return null;
    return (
      this.bankroll.bankrollCapital() +
      view.cumulativeRealizedPnl() -
      view.globalOpenNotional() -
      view.globalPendingNotional()
    );
  }

  limitsFor(venue: string): VenueLimits {
    return { ...this.limits.defaultVenueLimits, ...this.limits.venueLimits[venue] };
  }

  /**
   * Run every pre-trade guard against an exposure view.
   */
  evaluate(opportunity: Opportunity, view: ExposureView, now: number): GuardResult {
    const notionals = planNotionals(opportunity);
    const context: PreTradeContext = {
      halted: this.killSwitch.halted,
      haltReason: this.killSwitch.reason,
      opportunityAgeMs: now - opportunity.detectedAt,
      staleMs: this.limits.staleMs,
      executable: opportunity.executable,
      size: opportunity.maxSize,
      minActionableSize: this.limits.minActionableSize,
      legs: notionals.map((leg) => {
        const exposure = view.venue(leg.venue);
        const limits = this.limitsFor(leg.venue);
        return {
          venue: leg.venue,
          notional: leg.notional,
          flagReason: exposure.flag?.reason ?? null,
          perBetCap: limits.perBetCap,
          dailyVolumeUsed: exposure.dailyVolume + exposure.pendingNotional,
          dailyVolumeCap: limits.dailyVolumeCap,
        };
      }),
      globalExposure: view.globalOpenNotional() + view.globalPendingNotional(),
      maxGlobalExposure: this.limits.maxGlobalExposure,
      estimatedCost: notionals.reduce((sum, leg) => sum + leg.notional, 0),
      availableBankroll: this.availableBankroll(view),
      dailyRealizedPnl: view.dailyRealizedPnl(),
      worstCaseLoss: worstCaseLoss(opportunity),
      maxDailyLoss: this.limits.maxDailyLoss,
    };
    return runPreTradeGuards(context);
  }

  /**
   * Check an opportunity and, if it passes, reserve its notional.
   */
  async reserve(opportunity: Opportunity): Promise<ReservationDecision> {
    const killSwitch = this.checkKillSwitch();
    if (!killSwitch.pass) return killSwitch;

    return this.ledger.transact((writer): ReservationDecision => {
      const result = this.evaluate(opportunity, writer, writer.now);
      if (!result.pass) return result;
      const reservation = writer.reserve(
        generateReservationId(),
        opportunity.id,
        planNotionals(opportunity)
      );
      return { pass: true, reservation };
    });
  }

  release(reservationId: string): Promise<boolean> {
    return this.ledger.transact((writer) => writer.release(reservationId));
  }

  // === Capacity ===

  capacityFor(venue: string): VenueCapacity {
    const exposure = this.ledger.venue(venue, this.clock());
    const limits = this.limitsFor(venue);
    return {
      perBetCap: limits.perBetCap,
      remainingDaily: Math.max(
        0,
        limits.dailyVolumeCap - exposure.dailyVolume - exposure.pendingNotional
      ),
    };
  }

  globalHeadroom(): number {
    const snapshot = this.ledger.snapshot(this.clock());
    return Math.max(
      0,
      this.limits.maxGlobalExposure - snapshot.globalOpenNotional - snapshot.globalPendingNotional
    );
  }

  /**
   * Rotate across equivalent odds venues: most remaining daily room,
   * then least recently used, then largest per-bet cap.
   */
  selectVenue(candidates: readonly Opportunity[]): Opportunity {
    const snapshot = this.ledger.snapshot(this.clock());
    const view = snapshotView(snapshot);

    const scored = candidates.map((opportunity) => {
      const exposure = view.venue(opportunity.oddsVenue);
      const limits = this.limitsFor(opportunity.oddsVenue);
      return {
        opportunity,
        headroom: limits.dailyVolumeCap - exposure.dailyVolume - exposure.pendingNotional,
        lastActivity: exposure.lastActivityTs ?? Number.NEGATIVE_INFINITY,
        perBetCap: limits.perBetCap,
      };
    });

    scored.sort(
      (a, b) =>
        b.headroom - a.headroom ||
        a.lastActivity - b.lastActivity ||
        b.perBetCap - a.perBetCap
    );
    return scored[0].opportunity;
  }

  // === Throttling ===

  /**
   * Count a leg-2 rejection; flag the venue once the threshold is reached.
   *
   * @returns true when this rejection flagged the venue
   */
  async recordLeg2Rejection(venue: string, reason: string, now: number = this.clock()): Promise<boolean> {
    if (!this.throttle.record(venue, now)) return false;

    const count = this.throttle.count(venue, now);
    const flagReason = `${count} leg-2 rejections within ${this.limits.throttleWindowMs}ms (last: ${reason})`;
    await this.ledger.transact((writer) => {
      writer.flag(venue, flagReason);
    });
    this.throttle.reset(venue);

    logVenueFlagged(venue, flagReason);
    this.logger.warn(`Venue ${venue} flagged`, { reason: flagReason });
    return true;
  }

  /**
   * Manually clear a throttle flag.
   */
  async clearVenueFlag(venue: string): Promise<boolean> {
    const cleared = await this.ledger.transact((writer) => writer.clearFlag(venue));
    if (cleared) {
      this.throttle.reset(venue);
      this.logger.info(`Venue ${venue} flag cleared`);
    }
    return cleared;
  }
}
