/**
 * Structured logger for the arbitrage engine.
 *
 * Provides:
 * - Leveled logging (debug, info, warn, error)
 * - Opportunity banners
 * - Periodic status reports
 */

import type { Opportunity } from "../strategy/types";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Figures printed by the periodic status line.
 */
export interface StatusReport {
  cycles: number;
  pairs: number;
  openOpportunities: number;
  openAttempts: number;
  globalExposure: number;
  dailyRealizedPnl: number;
  cumulativeRealizedPnl: number;
  halted: boolean;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(msg: string, data?: object): void;
  info(msg: string, data?: object): void;
  warn(msg: string, data?: object): void;
  error(msg: string, data?: object): void;

  /** Log an opportunity detection */
  logOpportunity(opp: Opportunity): void;

  /** Log periodic status report */
  logStatus(report: StatusReport): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Format a timestamp for logging.
 */
export function formatTimestamp(now: Date = new Date()): string {
  return now.toISOString().replace("T", " ").substring(0, 19);
}

function formatData(data?: object): string {
  if (!data) return "";
  try {
    return " " + JSON.stringify(data);
  } catch {
    return " [unserializable]";
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(level: LogLevel = "info"): Logger {
  const minLevel = LOG_LEVEL_VALUES[level];

  function log(msgLevel: LogLevel, prefix: string, msg: string, data?: object): void {
    if (LOG_LEVEL_VALUES[msgLevel] < minLevel) return;
    const line = `[${formatTimestamp()}] ${prefix} ${msg}${formatData(data)}`;
    if (msgLevel === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  return {
    debug(msg: string, data?: object) {
      log("debug", "[DEBUG]", msg, data);
    },

    info(msg: string, data?: object) {
      log("info", "[INFO]", msg, data);
    },

    warn(msg: string, data?: object) {
      log("warn", "[WARN]", msg, data);
    },

    error(msg: string, data?: object) {
      log("error", "[ERROR]", msg, data);
    },

    logOpportunity(opp: Opportunity) {
      if (LOG_LEVEL_VALUES.info < minLevel) return;
      const [first, second] = opp.plan;
      console.log("");
      console.log("=".repeat(60));
      console.log(`[${formatTimestamp()}] [OPPORTUNITY] ${opp.executable ? "ARBITRAGE FOUND" : "DETECT ONLY"}`);
      console.log(`  ${opp.reason}`);
      console.log(
        `  Edge: gross=${opp.edgeGross.toFixed(4)} net=${opp.edgeNet.toFixed(4)} | ` +
          `Size: ${opp.maxSize} | Match: ${opp.confidence.toFixed(2)}`
      );
      console.log(`  Leg 1: ${first.venue} ${first.role} @ ${first.unitCost.toFixed(3)} x${first.size}`);
      console.log(`  Leg 2: ${second.venue} ${second.role} @ ${second.unitCost.toFixed(3)} x${second.size}`);
      console.log("=".repeat(60));
      console.log("");
    },

    logStatus(report: StatusReport) {
      if (LOG_LEVEL_VALUES.info < minLevel) return;
      console.log(
        `[${formatTimestamp()}] [STATUS] cycles=${report.cycles} pairs=${report.pairs} ` +
          `opportunities=${report.openOpportunities} attempts=${report.openAttempts} ` +
          `exposure=$${report.globalExposure.toFixed(2)} ` +
          `pnl(day)=$${report.dailyRealizedPnl.toFixed(2)} pnl(total)=$${report.cumulativeRealizedPnl.toFixed(2)}` +
          (report.halted ? " HALTED" : "")
      );
    },
  };
}

/**
 * Logger that discards everything.
 */
export function createSilentLogger(): Logger {
  const noop = () => {};
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    logOpportunity: noop,
    logStatus: noop,
  };
}
