/**
 * Scan cycle: fetch → match → detect → dispatch.
 *
 * Each cycle reads exchange instruments and odds lines, matches them into
 * pairs, runs detection per pair against a fresh order book, keeps the
 * latest opportunity per pair in the OpportunityBook and hands fresh ones
 * to the legging coordinator. Odds lines are also compared across odds
 * venues for report-only arbitrages and value bets. A failed fetch
 * degrades the cycle (those
 * pairs or venues are skipped) but never stops it. Dispatch stops while
 * the kill switch is tripped; scanning and reporting continue.
 */

import { StaleDataError, getErrorMessage } from "../errors";
import type { LeggingCoordinator } from "../execution/coordinator";
import type { ExecutionAttempt } from "../execution/types";
import { logExecutionError, logOpportunityDetected } from "../logging/executionLogger";
import type { Logger, StatusReport } from "../logging/logger";
import { incrementOpportunities, incrementScanCycles, recordLatency } from "../logging/metrics";
import type { PersistenceSink, ScanRecord } from "../logging/persistence";
import { matchMarkets } from "../markets/matcher";
import type { TeamTable } from "../markets/teamNames";
import type {
  Instrument,
  MatchedPair,
  MatcherOptions,
  OddsLine,
  OddsMarketType,
} from "../markets/types";
import type { BudgetSummary, BudgetTracker } from "../portfolio/budgetTracker";
import type { PnlSummary, PortfolioManager } from "../portfolio/portfolioManager";
import type { RiskManager } from "../risk/riskManager";
import type { KillSwitchStatus } from "../risk/types";
import type { ExposureLedger } from "../state/exposureLedger";
import type { Position, VenueExposure } from "../state/types";
import { detectOpportunity } from "../strategy/arbScanner";
import { scanCrossBook } from "../strategy/crossBookScanner";
import { OpportunityBook } from "../strategy/opportunityBook";
import type {
  CrossBookOpportunity,
  CrossBookOptions,
  DetectionContext,
  DetectionResult,
  Opportunity,
} from "../strategy/types";
import type { OrderBook } from "../normalization/types";
import { withRetry, type RetryOptions } from "../utils/retry";
import type { ExchangeClient, OddsVenueClient } from "../venues/types";

export interface PipelineOptions {
  sports: string[];
  regions: string[];
  marketTypes: OddsMarketType[];
  scanIntervalMs: number;
  /** Opportunities older than this are never dispatched (ms) */
  staleMs: number;
  edgeNoiseThreshold: number;
  matcher: MatcherOptions;
  retry: RetryOptions;
  crossBook: CrossBookOptions;
}

export interface PipelineDeps {
  exchange: ExchangeClient;
  odds: OddsVenueClient;
  coordinator: LeggingCoordinator;
  risk: RiskManager;
  portfolio: PortfolioManager;
  ledger: ExposureLedger;
  budget: BudgetTracker;
  detection: DetectionContext;
  persistence: PersistenceSink;
  logger: Logger;
  options: PipelineOptions;
  teams?: TeamTable;
  clock?: () => number;
}

export type ScanSummary = Omit<ScanRecord, "type">;

interface PairScan {
  opportunity: boolean;
  staleBook: boolean;
  staleLines: number;
}

export type PipelineEvent =
  | { type: "SCAN_COMPLETED"; summary: ScanSummary }
  | { type: "OPPORTUNITY"; opportunity: Opportunity }
  | { type: "DISPATCHED"; opportunity: Opportunity }
  | { type: "CROSS_BOOK"; opportunity: CrossBookOpportunity }
  | { type: "ERROR"; context: string; error: Error };

export type PipelineEventHandler = (event: PipelineEvent) => void;

/**
 * Everything the status API and reports read.
 */
export interface PipelineSnapshot {
  ts: number;
  cycles: number;
  pairs: number;
  lastScan: ScanSummary | null;
  opportunities: Opportunity[];
  /** Latest cross-book scan, best edge first */
  crossBook: CrossBookOpportunity[];
  openAttempts: ExecutionAttempt[];
  recentAttempts: ExecutionAttempt[];
  exposure: Record<string, VenueExposure>;
  positions: Position[];
  pnl: PnlSummary;
  killSwitch: KillSwitchStatus;
  budget: BudgetSummary;
}

export class ArbitragePipeline {
  private readonly deps: PipelineDeps;
  private readonly clock: () => number;
  private readonly book: OpportunityBook;
  private readonly handlers: PipelineEventHandler[] = [];
  private readonly executions = new Set<Promise<void>>();

  private timer: ReturnType<typeof setInterval> | null = null;
  private currentScan: Promise<void> | null = null;
  private cycles = 0;
  private lastPairs = 0;
  private lastScan: ScanSummary | null = null;
  private crossBook: CrossBookOpportunity[] = [];
  private haltLogged = false;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? Date.now;
    this.book = new OpportunityBook({
      staleMs: deps.options.staleMs,
      edgeNoiseThreshold: deps.options.edgeNoiseThreshold,
    });
  }

  onEvent(handler: PipelineEventHandler): void {
    this.handlers.push(handler);
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Run one full cycle.
   */
  async runOnce(): Promise<ScanSummary> {
    const { logger, options } = this.deps;
    const start = this.clock();
    const failures: string[] = [];

    const instruments = await this.fetchInstruments(failures);
    const lines = await this.fetchLines(failures);
    this.reportCrossBook(lines, this.clock());
    const pairs = matchMarkets(instruments, lines, options.matcher, this.deps.teams);

    // Pairs are scanned concurrently; each opportunity is handed to the
    // coordinator as soon as it is booked
    const settled = await Promise.allSettled(pairs.map((pair) => this.scanPair(pair, failures)));

    let opportunities = 0;
    let staleLines = 0;
    let staleBooks = 0;
    settled.forEach((result, index) => {
      if (result.status === "rejected") {
        const pairKey = pairs[index].key;
        failures.push(`detect:${pairKey}`);
        this.emitError(`detect ${pairKey}`, result.reason);
        return;
      }
      if (result.value.opportunity) opportunities++;
      if (result.value.staleBook) staleBooks++;
      staleLines += result.value.staleLines;
    });
    incrementOpportunities(opportunities);

    // Entries kept from earlier cycles (busy or cooling pairs)
    this.book.pruneStale(this.clock());
    this.dispatchPending();

    const end = this.clock();
    const summary: ScanSummary = {
      ts: start,
      instruments: instruments.length,
      lines: lines.length,
      pairs: pairs.length,
      opportunities,
      staleLines,
      staleBooks,
      crossBook: this.crossBook.length,
      failures,
      durationMs: end - start,
    };

    this.cycles++;
    this.lastPairs = pairs.length;
    this.lastScan = summary;
    recordLatency("scanCycle", summary.durationMs);
    incrementScanCycles(failures.length > 0);
    this.deps.persistence.append({ type: "scan", ...summary });
    this.emit({ type: "SCAN_COMPLETED", summary });

    logger.debug(
      `Scan: ${instruments.length} instruments, ${lines.length} lines, ${pairs.length} pairs, ` +
        `${opportunities} opportunities (${summary.durationMs}ms)`
    );
    return summary;
  }

  /**
   * Scan every scanIntervalMs. A tick that lands while the previous scan
   * is still running is skipped.
   */
  start(): void {
    if (this.timer) return;

    const tick = (): void => {
      if (this.currentScan) {
        this.deps.logger.debug("Previous scan still running, skipping tick");
        return;
      }
      this.currentScan = this.runOnce()
        .then(() => undefined)
        .catch((error: unknown) => {
          this.emitError("scan", error);
        })
        .finally(() => {
          this.currentScan = null;
        });
    };

    this.timer = setInterval(tick, this.deps.options.scanIntervalMs);
    tick();
    this.deps.logger.info(`Pipeline started (every ${this.deps.options.scanIntervalMs}ms)`);
  }

  /**
   * Stop scanning and wait for the running scan and executions to finish.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.currentScan) await this.currentScan;
    await Promise.allSettled([...this.executions]);
    this.deps.logger.info("Pipeline stopped");
  }

  /**
   * Wait for every dispatched execution to reach a terminal state.
   */
  async settled(): Promise<void> {
    await Promise.allSettled([...this.executions]);
  }

  getSnapshot(): PipelineSnapshot {
    const now = this.clock();
    const ledger = this.deps.ledger.snapshot(now);
    return {
      ts: now,
      cycles: this.cycles,
      pairs: this.lastPairs,
      lastScan: this.lastScan,
      opportunities: this.book.snapshot(),
      crossBook: [...this.crossBook],
      openAttempts: this.deps.coordinator.getOpenAttempts(),
      recentAttempts: this.deps.coordinator.getRecentAttempts(),
      exposure: ledger.venues,
      positions: ledger.positions,
      pnl: this.deps.portfolio.getPnl(),
      killSwitch: this.deps.risk.getKillSwitchStatus(),
      budget: this.deps.budget.summary(),
    };
  }

  statusReport(): StatusReport {
    const snapshot = this.getSnapshot();
    const ledger = this.deps.ledger.snapshot(snapshot.ts);
    return {
      cycles: snapshot.cycles,
      pairs: snapshot.pairs,
      openOpportunities: snapshot.opportunities.length,
      openAttempts: snapshot.openAttempts.length,
      globalExposure: ledger.globalOpenNotional + ledger.globalPendingNotional,
      dailyRealizedPnl: snapshot.pnl.dailyRealized,
      cumulativeRealizedPnl: snapshot.pnl.cumulativeRealized,
      halted: snapshot.killSwitch.halted,
    };
  }

  // === Private ===

  /**
   * Fetch the pair's order book, detect, book the result and dispatch it.
   */
  private async scanPair(pair: MatchedPair, failures: string[]): Promise<PairScan> {
    const { logger, options } = this.deps;

    let orderBook: OrderBook;
    try {
      orderBook = await withRetry(
        () => this.deps.exchange.getOrderbook(pair.instrument.id),
        options.retry
      );
    } catch (error) {
      failures.push(`orderbook:${pair.instrument.id}`);
      this.emitError(`orderbook ${pair.instrument.id}`, error);
      return { opportunity: false, staleBook: false, staleLines: 0 };
    }

    const now = this.clock();
    let result: DetectionResult;
    try {
      result = detectOpportunity(pair, orderBook, this.deps.detection, now);
    } catch (error) {
      if (error instanceof StaleDataError) {
        logger.debug(`Skipping ${pair.key}: ${error.message}`);
        return { opportunity: false, staleBook: true, staleLines: 0 };
      }
      throw error;
    }

    if (!result.opportunity) {
      this.book.discard(pair.key);
      return { opportunity: false, staleBook: false, staleLines: result.staleLines };
    }

    const outcome = this.book.upsert(result.opportunity, now);
    if (outcome !== "kept") {
      logger.logOpportunity(result.opportunity);
      logOpportunityDetected(result.opportunity);
      this.deps.persistence.append({ type: "opportunity", ts: now, opportunity: result.opportunity });
      this.emit({ type: "OPPORTUNITY", opportunity: result.opportunity });
    }
    if (!this.deps.risk.isHalted()) this.dispatchReady(pair.key, this.clock());
    return { opportunity: true, staleBook: false, staleLines: result.staleLines };
  }

  /**
   * Compare lines across odds venues. Opportunities already reported in
   * the previous cycle are not logged or persisted again.
   */
  private reportCrossBook(lines: readonly OddsLine[], now: number): void {
    const previous = new Set(this.crossBook.map((opportunity) => opportunity.id));
    this.crossBook = scanCrossBook(lines, now, this.deps.options.crossBook);

    for (const opportunity of this.crossBook) {
      if (previous.has(opportunity.id)) continue;
      this.deps.logger.info(
        `Cross-book ${opportunity.strategy} on ${opportunity.eventId}: edge ${(opportunity.edge * 100).toFixed(2)}%`,
        {
          marketType: opportunity.marketType,
          venues: opportunity.legs.map((leg) => leg.venue),
          totalStake: opportunity.totalStake,
        }
      );
      this.deps.persistence.append({ type: "cross_book", ts: now, opportunity });
      this.emit({ type: "CROSS_BOOK", opportunity });
    }
  }

  private async fetchInstruments(failures: string[]): Promise<Instrument[]> {
    const { exchange, options } = this.deps;
    try {
      return await withRetry(
        () => exchange.getInstruments({ categories: options.sports }),
        options.retry
      );
    } catch (error) {
      failures.push(`instruments:${exchange.venue}`);
      this.emitError(`${exchange.venue} instruments`, error);
      return [];
    }
  }

  private async fetchLines(failures: string[]): Promise<OddsLine[]> {
    const { odds, options } = this.deps;
    const lines: OddsLine[] = [];
    for (const sport of options.sports) {
      try {
        const sportLines = await withRetry(
          () => odds.getLines(sport, options.regions, options.marketTypes),
          options.retry
        );
        lines.push(...sportLines);
      } catch (error) {
        failures.push(`lines:${odds.name}:${sport}`);
        this.emitError(`${odds.name} ${sport} lines`, error);
      }
    }
    return lines;
  }

  private dispatchPending(): void {
    const { risk, logger } = this.deps;

    if (risk.isHalted()) {
      if (!this.haltLogged) {
        logger.warn("Kill switch tripped; opportunities are reported but not executed");
        this.haltLogged = true;
      }
      return;
    }
    this.haltLogged = false;

    const now = this.clock();
    for (const pairKey of this.book.pendingKeys(now)) {
      this.dispatchReady(pairKey, now);
    }
  }

  private dispatchReady(pairKey: string, now: number): void {
    const { coordinator } = this.deps;
    // Busy or cooling pairs keep their entry for a later cycle
    if (coordinator.isBusy(pairKey) || coordinator.isInCooldown(pairKey, now)) return;
    const opportunity = this.book.take(pairKey, now);
    if (!opportunity) return;
    this.dispatch(opportunity);
  }

  private dispatch(opportunity: Opportunity): void {
    this.emit({ type: "DISPATCHED", opportunity });

    const run = this.deps.coordinator
      .execute(opportunity)
      .then((result) => {
        if (result.attempt.outcome === "rejected_pretrade") {
          this.deps.logger.debug(`Attempt on ${opportunity.pairKey} rejected: ${result.error}`);
        }
      })
      .catch((error: unknown) => {
        logExecutionError(null, getErrorMessage(error), { pairKey: opportunity.pairKey });
        this.emitError(`execute ${opportunity.pairKey}`, error);
      })
      .finally(() => {
        this.executions.delete(run);
      });
    this.executions.add(run);
  }

  private emit(event: PipelineEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        this.deps.logger.error(`Pipeline event handler failed: ${getErrorMessage(error)}`);
      }
    }
  }

  private emitError(context: string, error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.deps.logger.warn(`${context} failed: ${err.message}`);
    this.emit({ type: "ERROR", context, error: err });
  }
}
