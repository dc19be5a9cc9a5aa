/**
 * Budget tracker.
 *
 * Splits the project budget into three buckets:
 * - API budget: market-data subscription and credit spend
 * - Bankroll: capital the engine may put at risk
 * - Reserve: held back until the strategy has a settled track record
 *
 * Realized P&L and open notional come from the exposure ledger; the
 * tracker only owns the allocation and the API spend. Reserve moves to
 * the bankroll in bounded steps once enough positions have settled in
 * profit.
 */

import type { AlertSink } from "../alerts/types";
import { ArbitrageEngineError } from "../errors";
import type { Logger } from "../logging/logger";
import type { BankrollSource } from "../risk/riskManager";
import type { ExposureLedger } from "../state/exposureLedger";

export interface BudgetAllocation {
  apiBudget: number;
  bankroll: number;
  reserve: number;
  /** Dollars per market-data credit; 0 leaves credit use unpriced */
  creditCost: number;
}

export interface BudgetSummary {
  totalBudget: number;
  apiBudget: number;
  apiSpent: number;
  apiRemaining: number;
  bankroll: number;
  reserve: number;
  /** Bankroll plus cumulative realized P&L */
  activeBankroll: number;
  /** Open plus in-flight notional */
  committed: number;
  availableBankroll: number;
  settledPositions: number;
  canTrade: boolean;
  canReleaseReserve: boolean;
}

/** Largest single move from reserve to bankroll ($) */
export const MAX_RESERVE_RELEASE = 100;

/** Settled positions required before reserve can be released */
export const MIN_SETTLED_FOR_RELEASE = 10;

/** Smallest available bankroll that still allows trading ($) */
export const MIN_TRADING_BANKROLL = 2;

export interface BudgetTrackerDeps {
  allocation: BudgetAllocation;
  ledger: ExposureLedger;
  alerts: AlertSink;
  logger: Logger;
  clock?: () => number;
}

export class BudgetTracker implements BankrollSource {
  private readonly ledger: ExposureLedger;
  private readonly alerts: AlertSink;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly apiBudget: number;
  private readonly creditCost: number;
  private bankroll: number;
  private reserve: number;
  private apiSpent = 0;
  private apiOverrunAlerted = false;

  constructor(deps: BudgetTrackerDeps) {
    const { allocation } = deps;
    const amounts: Array<[string, number]> = [
      ["apiBudget", allocation.apiBudget],
      ["bankroll", allocation.bankroll],
      ["reserve", allocation.reserve],
      ["creditCost", allocation.creditCost],
    ];
    for (const [field, value] of amounts) {
      if (!(value >= 0)) {
        throw new RangeError(`Budget ${field} must be non-negative, got ${value}`);
      }
    }
    this.ledger = deps.ledger;
    this.alerts = deps.alerts;
    this.logger = deps.logger;
    this.clock = deps.clock ?? Date.now;
    this.apiBudget = allocation.apiBudget;
    this.creditCost = allocation.creditCost;
    this.bankroll = allocation.bankroll;
    this.reserve = allocation.reserve;
  }

  bankrollCapital(): number {
    return this.bankroll;
  }

  // === API spend ===

  recordApiSpend(amount: number): void {
    if (!(amount >= 0)) {
      throw new ArbitrageEngineError(`API spend must be non-negative, got ${amount}`, "INVALID_AMOUNT", {
        amount,
      });
    }
    this.apiSpent += amount;

    const remaining = this.apiBudget - this.apiSpent;
    if (remaining < 0 && !this.apiOverrunAlerted) {
      this.apiOverrunAlerted = true;
      this.logger.warn("API budget exceeded", {
        spent: Number(this.apiSpent.toFixed(2)),
        budget: this.apiBudget,
      });
      this.alerts.notify(
        "warning",
        `API budget exceeded: $${this.apiSpent.toFixed(2)} spent of $${this.apiBudget.toFixed(2)}`
      );
    }
  }

  /**
   * Price market-data credits at the configured cost.
   */
  recordApiCredits(credits: number): void {
    if (this.creditCost === 0 || credits <= 0) return;
    this.recordApiSpend(credits * this.creditCost);
  }

  // === Reserve ===

  canReleaseReserve(): boolean {
    const snapshot = this.ledger.snapshot(this.clock());
    return (
      this.reserve > 0 &&
      this.settledCount() >= MIN_SETTLED_FOR_RELEASE &&
      snapshot.cumulativeRealizedPnl > 0
    );
  }

  /**
   * Move up to MAX_RESERVE_RELEASE from reserve to bankroll.
   *
   * @returns Dollars released (0 when the policy does not allow it yet)
   */
  releaseFromReserve(amount: number): number {
    if (!this.canReleaseReserve()) {
      this.logger.warn("Reserve release refused", {
        settledPositions: this.settledCount(),
        cumulativeRealizedPnl: this.ledger.snapshot(this.clock()).cumulativeRealizedPnl,
      });
      return 0;
    }

    const released = Math.min(amount, MAX_RESERVE_RELEASE, this.reserve);
    if (!(released > 0)) return 0;

    this.reserve -= released;
    this.bankroll += released;
    this.logger.info(`Released $${released.toFixed(2)} from reserve`, {
      reserve: this.reserve,
      bankroll: this.bankroll,
    });
    return released;
  }

  // === Queries ===

  summary(): BudgetSummary {
    const snapshot = this.ledger.snapshot(this.clock());
    const activeBankroll = this.bankroll + snapshot.cumulativeRealizedPnl;
    const committed = snapshot.globalOpenNotional + snapshot.globalPendingNotional;
    const availableBankroll = activeBankroll - committed;

    return {
      totalBudget: this.apiBudget + this.bankroll + this.reserve,
      apiBudget: this.apiBudget,
      apiSpent: this.apiSpent,
      apiRemaining: this.apiBudget - this.apiSpent,
      bankroll: this.bankroll,
      reserve: this.reserve,
      activeBankroll,
      committed,
      availableBankroll,
      settledPositions: this.settledCount(),
      canTrade: availableBankroll >= MIN_TRADING_BANKROLL,
      canReleaseReserve: this.canReleaseReserve(),
    };
  }

  private settledCount(): number {
    return this.ledger
      .snapshot(this.clock())
      .positions.filter((position) => position.status !== "open").length;
  }
}
