/**
 * Portfolio manager.
 *
 * Turns terminal attempts into positions, and settles or closes them.
 * Every change lands in the exposure ledger inside a transaction; the
 * kill switch is re-evaluated after each realization.
 */

import { ArbitrageEngineError } from "../errors";
import type { ExecutionAttempt, LegExecution } from "../execution/types";
import { estimateLegFee, type FeeModel } from "../fees/feeEngine";
import { logPositionSettled } from "../logging/executionLogger";
import type { Logger } from "../logging/logger";
import type { Side } from "../normalization/types";
import type { RiskManager } from "../risk/riskManager";
import type { ExposureLedger, LedgerWriter } from "../state/exposureLedger";
import type { Position, PositionKind, PositionLeg, Reservation } from "../state/types";

export type SettlementResult = Side | "void";

export interface PnlSummary {
  dailyRealized: number;
  cumulativeRealized: number;
  /** Locked P&L of open fully hedged positions */
  unrealized: number;
  highWaterMark: number;
  drawdown: number;
  openPositions: number;
}

export interface PortfolioDeps {
  ledger: ExposureLedger;
  risk: RiskManager;
  logger: Logger;
  feeFor(venue: string): FeeModel;
  clock?: () => number;
}

/**
 * Generate a unique position ID.
 */
export function generatePositionId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `pos_${timestamp}_${random}`;
}

export function classifyPosition(hedgedSize: number, unhedgedSize: number): PositionKind {
  if (unhedgedSize === 0) return "hedged";
  return hedgedSize > 0 ? "partial_hedge" : "naked";
}

function legCost(leg: PositionLeg): number {
  return leg.size * leg.unitCost;
}

export class PortfolioManager {
  private readonly ledger: ExposureLedger;
  private readonly risk: RiskManager;
  private readonly logger: Logger;
  private readonly feeFor: (venue: string) => FeeModel;

  constructor(deps: PortfolioDeps) {
    this.ledger = deps.ledger;
    this.risk = deps.risk;
    this.logger = deps.logger;
    this.feeFor = deps.feeFor;
  }

  /**
   * Account for a terminal attempt: release its reservation, book traded
   * volume, and open a position for whatever filled.
   *
   * @returns The new position, or null when nothing filled
   */
  async recordAttempt(
    attempt: ExecutionAttempt,
    reservation: Reservation | null
  ): Promise<Position | null> {
    return this.ledger.transact((writer) => {
      if (reservation) writer.release(reservation.id);

      const legs: PositionLeg[] = [];
      for (const execution of [attempt.leg1, attempt.leg2]) {
        const leg = this.toPositionLeg(execution);
        if (!leg) continue;
        writer.recordTrade(leg.venue, legCost(leg));
        legs.push(leg);
      }
      if (legs.length === 0) return null;

      const hedgedSize = Math.min(attempt.leg1.filledSize, attempt.leg2.filledSize);
      const unhedgedSize = Math.abs(attempt.leg1.filledSize - attempt.leg2.filledSize);
      const cost = legs.reduce((sum, leg) => sum + legCost(leg), 0);
      const fees = legs.reduce((sum, leg) => sum + leg.fees, 0);

      const position: Position = {
        id: generatePositionId(),
        attemptId: attempt.id,
        pairKey: attempt.opportunity.pairKey,
        kind: classifyPosition(hedgedSize, unhedgedSize),
        legs,
        hedgedSize,
        unhedgedSize,
        cost,
        fees,
        lockedPnl: unhedgedSize === 0 ? hedgedSize - cost - fees : null,
        status: "open",
        realizedPnl: null,
        openedAt: writer.now,
        closedAt: null,
      };
      writer.addPosition(position);

      this.logger.info(`Position opened ${position.id}`, {
        kind: position.kind,
        hedgedSize,
        unhedgedSize,
        cost: Number(cost.toFixed(4)),
        lockedPnl: position.lockedPnl,
      });
      return { ...position, legs: position.legs.map((leg) => ({ ...leg })) };
    });
  }

  /**
   * Settle a position on the event result. A void refunds stakes; fees stay paid.
   */
  async settlePosition(positionId: string, result: SettlementResult): Promise<number> {
    const realized = await this.ledger.transact((writer) => {
      const position = this.openPosition(writer, positionId);
      let total = 0;
      for (const leg of position.legs) {
        const payout = result === "void" ? legCost(leg) : leg.side === result ? leg.size : 0;
        const pnl = payout - legCost(leg) - leg.fees;
        writer.realize(leg.venue, pnl);
        writer.releaseNotional(leg.venue, legCost(leg));
        total += pnl;
      }
      position.status = "settled";
      position.realizedPnl = total;
      position.closedAt = writer.now;
      return total;
    });

    logPositionSettled(positionId, realized, result === "void" ? "voided" : "settled");
    this.risk.evaluateKillSwitch();
    return realized;
  }

  /**
   * Close a position early for a total exit value, split across legs by cost.
   */
  async closePosition(positionId: string, exitValue: number): Promise<number> {
    const realized = await this.ledger.transact((writer) => {
      const position = this.openPosition(writer, positionId);
      let total = 0;
      for (const leg of position.legs) {
        const share =
          position.cost > 0 ? legCost(leg) / position.cost : 1 / position.legs.length;
        const pnl = exitValue * share - legCost(leg) - leg.fees;
        writer.realize(leg.venue, pnl);
        writer.releaseNotional(leg.venue, legCost(leg));
        total += pnl;
      }
      position.status = "closed";
      position.realizedPnl = total;
      position.closedAt = writer.now;
      return total;
    });

    logPositionSettled(positionId, realized, "closed");
    this.risk.evaluateKillSwitch();
    return realized;
  }

  getPositions(status?: Position["status"]): Position[] {
    const positions = this.ledger.snapshot().positions;
    return status ? positions.filter((position) => position.status === status) : positions;
  }

  getPnl(): PnlSummary {
    const snapshot = this.ledger.snapshot();
    return {
      dailyRealized: snapshot.dailyRealizedPnl,
      cumulativeRealized: snapshot.cumulativeRealizedPnl,
      unrealized: snapshot.unrealizedPnl,
      highWaterMark: snapshot.highWaterMark,
      drawdown: snapshot.highWaterMark - snapshot.cumulativeRealizedPnl,
      openPositions: snapshot.positions.filter((position) => position.status === "open").length,
    };
  }

  private toPositionLeg(execution: LegExecution): PositionLeg | null {
    if (execution.filledSize <= 0 || execution.avgPrice === null) return null;
    return {
      role: execution.leg.role,
      venue: execution.leg.venue,
      instrumentId: execution.leg.instrumentId,
      side: execution.leg.side,
      outcome: execution.leg.outcome,
      size: execution.filledSize,
      unitCost: execution.avgPrice,
      fees: estimateLegFee(
        this.feeFor(execution.leg.venue),
        execution.avgPrice,
        execution.filledSize
      ),
    };
  }

  private openPosition(writer: LedgerWriter, positionId: string): Position {
    const position = writer.position(positionId);
    if (!position) {
      throw new ArbitrageEngineError(`Unknown position ${positionId}`, "POSITION_NOT_FOUND", {
        positionId,
      });
    }
    if (position.status !== "open") {
      throw new ArbitrageEngineError(
        `Position ${positionId} is already ${position.status}`,
        "POSITION_NOT_OPEN",
        { positionId }
      );
    }
    return position;
  }
}
