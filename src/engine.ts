/**
 * Engine composition.
 *
 * Builds the collaborators in dependency order: ledger → budget → risk →
 * portfolio → venues → coordinator → pipeline. Market-data clients and
 * sinks can be swapped for fakes.
 */

import { createAlertSink, type AlertSink } from "./alerts";
import { oddsFeeModel, type Config } from "./config/config";
import { RISK_PARAMS } from "./config/riskParams";
import { ConfigurationError } from "./errors";
import { LeggingCoordinator } from "./execution/coordinator";
import { PaperRouter } from "./execution/paperVenue";
import type { ExecutionAttempt } from "./execution/types";
import { VenueRegistry } from "./execution/venueRegistry";
import { KALSHI_FEES, type FeeModel } from "./fees/feeEngine";
import type { Logger } from "./logging/logger";
import { JsonlPersistenceSink, type PersistenceSink } from "./logging/persistence";
import { ArbitragePipeline } from "./pipeline/scanCycle";
import { BudgetTracker } from "./portfolio/budgetTracker";
import { PortfolioManager } from "./portfolio/portfolioManager";
import { RiskManager } from "./risk/riskManager";
import { ExposureLedger } from "./state/exposureLedger";
import type { DetectionContext } from "./strategy/types";
import { KalshiClient } from "./venues/kalshi/client";
import { OddsApiClient } from "./venues/oddsApi/client";
import type { ExchangeClient, OddsVenueClient, OrderRouter } from "./venues/types";

export interface EngineOverrides {
  exchange?: ExchangeClient;
  odds?: OddsVenueClient;
  /** Live order router for the exchange */
  exchangeRouter?: OrderRouter;
  alerts?: AlertSink;
  persistence?: PersistenceSink;
  clock?: () => number;
}

export interface Engine {
  ledger: ExposureLedger;
  risk: RiskManager;
  portfolio: PortfolioManager;
  budget: BudgetTracker;
  registry: VenueRegistry;
  coordinator: LeggingCoordinator;
  pipeline: ArbitragePipeline;
  alerts: AlertSink;
  persistence: PersistenceSink;
}

export function buildEngine(config: Config, logger: Logger, overrides: EngineOverrides = {}): Engine {
  const clock = overrides.clock ?? Date.now;

  const alerts = overrides.alerts ?? createAlertSink(
    { botToken: config.telegramBotToken, chatId: config.telegramChatId },
    logger
  );
  const persistence = overrides.persistence ?? new JsonlPersistenceSink(config.logDir, logger);

  const ledger = new ExposureLedger(clock);
  const budget = new BudgetTracker({ allocation: config.budget, ledger, alerts, logger, clock });
  const risk = new RiskManager({ limits: config.risk, ledger, alerts, logger, clock, bankroll: budget });

  const exchange = overrides.exchange ?? new KalshiClient({ host: config.kalshiApiHost });
  let odds = overrides.odds;
  if (!odds) {
    if (!config.oddsApiKey) {
      throw new ConfigurationError("ODDS_API_KEY is required to read sportsbook lines", "ODDS_API_KEY");
    }
    odds = new OddsApiClient({
      apiKey: config.oddsApiKey,
      host: config.oddsApiHost,
      onCreditsUsed: (credits) => budget.recordApiCredits(credits),
    });
  }

  const oddsFees = oddsFeeModel(config);
  const feeFor = (venue: string): FeeModel => (venue === exchange.venue ? KALSHI_FEES : oddsFees);

  const portfolio = new PortfolioManager({ ledger, risk, logger, feeFor, clock });

  const registry = new VenueRegistry({
    dryRun: config.dryRun,
    paperRouter: new PaperRouter(),
    defaultConfirmMs: RISK_PARAMS.oddsVenueConfirmMs,
  });
  registry.register(exchange.venue, RISK_PARAMS.exchangeConfirmMs, overrides.exchangeRouter ?? null);

  if (!config.dryRun && !registry.canTrade(exchange.venue)) {
    throw new ConfigurationError(
      `Live trading needs an order router for ${exchange.venue}; set DRY_RUN=true`,
      "DRY_RUN"
    );
  }

  const coordinator = new LeggingCoordinator({
    registry,
    risk,
    portfolio,
    alerts,
    logger,
    options: config.execution,
    onAttempt: (attempt: ExecutionAttempt) => {
      persistence.append({ type: "attempt", ts: attempt.endTs ?? clock(), attempt });
    },
  });

  const detection: DetectionContext = {
    minEdge: config.detection.minEdge,
    quoteFreshnessMs: config.detection.quoteFreshnessMs,
    equivalentEdgeTolerance: config.detection.equivalentEdgeTolerance,
    maxContracts: config.detection.maxContracts,
    exchangeFees: KALSHI_FEES,
    oddsFees: () => oddsFees,
    capacity: risk,
    venues: registry,
    selector: risk,
  };

  const pipeline = new ArbitragePipeline({
    exchange,
    odds,
    coordinator,
    risk,
    portfolio,
    ledger,
    budget,
    detection,
    persistence,
    logger,
    clock,
    options: {
      sports: config.sports,
      regions: config.oddsRegions,
      marketTypes: config.oddsMarkets,
      scanIntervalMs: config.scanIntervalMs,
      staleMs: config.risk.staleMs,
      edgeNoiseThreshold: config.detection.edgeNoiseThreshold,
      matcher: config.matcher,
      retry: config.execution.retry,
      crossBook: config.crossBook,
    },
  });

  return { ledger, risk, portfolio, budget, registry, coordinator, pipeline, alerts, persistence };
}
