/**
 * Main entry point for the arbitrage engine.
 *
 * Composes all modules:
 * - Config loading and validation
 * - Engine (ledger, risk, portfolio, venues, coordinator, pipeline)
 * - Status API (optional)
 * - Periodic status logging
 */

import type { Server } from "node:http";
import { TelegramAlertSink } from "./alerts";
import { startStatusServer } from "./api/server";
import { loadConfig, loadEnvFile, validateConfig } from "./config/config";
import { buildEngine, type Engine } from "./engine";
import { getErrorMessage } from "./errors";
import { configureFileLogging } from "./logging/fileLogger";
import { createLogger, type Logger } from "./logging/logger";
import { getMetricsSummary } from "./logging/metrics";
import { JsonlPersistenceSink } from "./logging/persistence";

/**
 * Main application state.
 */
interface AppState {
  logger: Logger;
  engine: Engine | null;
  server: Server | null;
  statusTimer: ReturnType<typeof setInterval> | null;
  running: boolean;
}

const state: AppState = {
  logger: createLogger("info"),
  engine: null,
  server: null,
  statusTimer: null,
  running: false,
};

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Graceful shutdown.
 *
 * Stops scanning, waits for in-flight attempts, then flushes alerts and
 * records. Open positions are logged for manual follow-up.
 */
async function shutdown(): Promise<void> {
  if (!state.running) return;
  state.running = false;

  state.logger.info("Shutting down...");
  if (state.statusTimer) {
    clearInterval(state.statusTimer);
    state.statusTimer = null;
  }

  const engine = state.engine;
  if (engine) {
    await engine.pipeline.stop();

    const open = engine.portfolio.getPositions("open");
    if (open.length > 0) {
      state.logger.warn(`[SHUTDOWN] ${open.length} open positions remain`, {
        positions: open.map((position) => ({
          id: position.id,
          kind: position.kind,
          unhedgedSize: position.unhedgedSize,
        })),
      });
    }

    if (engine.alerts instanceof TelegramAlertSink) await engine.alerts.flush();
    if (engine.persistence instanceof JsonlPersistenceSink) await engine.persistence.flush();
  }

  if (state.server) {
    await closeServer(state.server);
    state.server = null;
  }

  state.logger.info("Shutdown complete");
}

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  validateConfig(config);

  state.logger = createLogger(config.logLevel);
  configureFileLogging({ enabled: true, dir: config.logDir });

  state.logger.info("Starting arbitrage engine...");
  state.logger.info(`Mode: ${config.dryRun ? "DRY RUN" : "LIVE"}`);
  if (!config.dryRun) {
    state.logger.warn("!!! LIVE TRADING MODE - Real orders will be placed !!!");
  }
  state.logger.info(
    `Risk params: perBet=$${config.risk.defaultVenueLimits.perBetCap}, ` +
      `daily=$${config.risk.defaultVenueLimits.dailyVolumeCap}, ` +
      `global=$${config.risk.maxGlobalExposure}, minEdge=${config.detection.minEdge}`
  );
  state.logger.info(`Sports: ${config.sports.join(", ")} (${config.oddsMarkets.join(", ")})`);
  state.logger.info(
    `Budget: api=$${config.budget.apiBudget}, bankroll=$${config.budget.bankroll}, reserve=$${config.budget.reserve}`
  );

  const engine = buildEngine(config, state.logger);
  state.engine = engine;

  engine.pipeline.onEvent((event) => {
    if (event.type === "DISPATCHED") {
      state.logger.debug(`Dispatched ${event.opportunity.id} on ${event.opportunity.pairKey}`);
    }
  });

  if (config.statusPort !== null) {
    state.server = await startStatusServer(engine.pipeline, config.statusPort, state.logger);
  }

  const onSignal = (signal: string): void => {
    state.logger.info(`Received ${signal}`);
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        state.logger.error(`Shutdown failed: ${getErrorMessage(error)}`);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  state.running = true;
  state.statusTimer = setInterval(() => {
    state.logger.logStatus(engine.pipeline.statusReport());
    state.logger.info(getMetricsSummary());
  }, config.statusReportIntervalMs);

  engine.pipeline.start();
  state.logger.info("Engine is running. Press Ctrl+C to stop.");
}

// Run
main().catch((error: unknown) => {
  state.logger.error(`Fatal error: ${getErrorMessage(error)}`);
  process.exit(1);
});
