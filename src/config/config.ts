/**
 * Configuration module for the arbitrage engine.
 *
 * Loads configuration from environment variables (`.env` is read with
 * dotenv), falling back to RISK_PARAMS and DEFAULTS.
 */

import { config as dotenvConfig } from "dotenv";
import { join } from "node:path";
import { ConfigurationError } from "../errors";
import type { FeeModel } from "../fees/feeEngine";
import { type LogLevel, isLogLevel } from "../logging/logger";
import type { MatcherOptions, OddsMarketType } from "../markets/types";
import { DEFAULT_MATCHER_OPTIONS } from "../markets/types";
import type { BudgetAllocation } from "../portfolio/budgetTracker";
import type { RiskLimits } from "../risk/types";
import type { CoordinatorOptions } from "../execution/types";
import type { CrossBookOptions } from "../strategy/types";
import { DEFAULT_RETRY_OPTIONS } from "../utils/retry";
import { RISK_PARAMS } from "./riskParams";

export const DEFAULTS = {
  kalshiApiHost: "https://api.elections.kalshi.com",
  oddsApiHost: "https://api.the-odds-api.com",
  sports: ["basketball_nba", "icehockey_nhl", "americanfootball_nfl"],
  oddsRegions: ["us"],
  oddsMarkets: ["moneyline"],
  scanIntervalMs: 2000,
  statusReportIntervalMs: 60_000,
} as const;

export interface DetectionSettings {
  minEdge: number;
  quoteFreshnessMs: number;
  equivalentEdgeTolerance: number;
  edgeNoiseThreshold: number;
  maxContracts: number;
  /** Commission charged by odds venues on winnings (0-1) */
  oddsCommissionRate: number;
}

export interface Config {
  logLevel: LogLevel;
  /** Paper-trade every venue instead of placing real orders */
  dryRun: boolean;
  logDir: string;
  /** Status API port, null when disabled */
  statusPort: number | null;
  scanIntervalMs: number;
  statusReportIntervalMs: number;

  kalshiApiHost: string;
  oddsApiHost: string;
  oddsApiKey: string | null;
  sports: string[];
  oddsRegions: string[];
  /** Odds-venue line kinds to request; each costs API credits */
  oddsMarkets: OddsMarketType[];

  telegramBotToken: string | null;
  telegramChatId: string | null;

  detection: DetectionSettings;
  matcher: MatcherOptions;
  risk: RiskLimits;
  execution: CoordinatorOptions;
  /** Report-only detection between odds venues */
  crossBook: CrossBookOptions;
  budget: BudgetAllocation;
}

type Env = Record<string, string | undefined>;

/**
 * Read `.env` into process.env (existing variables win).
 */
export function loadEnvFile(path?: string): void {
  dotenvConfig(path ? { path } : undefined);
}

function readString(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`, name);
  }
  return value;
}

const ODDS_MARKET_TYPES: readonly OddsMarketType[] = ["moneyline", "spread", "total"];

function isOddsMarketType(value: string): value is OddsMarketType {
  return ODDS_MARKET_TYPES.some((type) => type === value);
}

function readMarketTypes(env: Env, name: string, fallback: readonly OddsMarketType[]): OddsMarketType[] {
  const types: OddsMarketType[] = [];
  for (const item of readList(env, name, fallback)) {
    const value = item.toLowerCase();
    if (!isOddsMarketType(value)) {
      throw new ConfigurationError(`${name} entries must be moneyline, spread or total, got "${item}"`, name);
    }
    types.push(value);
  }
  return types;
}

function readList(env: Env, name: string, fallback: readonly string[]): string[] {
  const raw = readString(env, name);
  if (raw === null) return [...fallback];
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Load configuration from environment variables.
 *
 * Environment variables:
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 * - DRY_RUN: paper trading (default: true, set "false" for live)
 * - LOG_DIR: execution logs and JSONL records (default: ./logs)
 * - STATUS_PORT: status API port (default: disabled)
 * - SCAN_INTERVAL_MS, MIN_EDGE, MATCH_THRESHOLD, STALE_MS
 * - LEG1_TIMEOUT_MS, LEG2_TIMEOUT_MS
 * - MAX_DAILY_LOSS, MAX_DRAWDOWN, MAX_GLOBAL_EXPOSURE, PER_BET_CAP,
 *   DAILY_VOLUME_CAP, MIN_ACTIONABLE_SIZE
 * - ODDS_COMMISSION_RATE: commission odds venues take on winnings (default: 0)
 * - CROSS_BOOK_MIN_EDGE, VALUE_BET_MIN_EDGE: report-only odds-venue detection
 * - API_BUDGET, BANKROLL, RESERVE: budget split in dollars
 * - ODDS_API_CREDIT_COST: dollars per Odds API credit (default: 0, unpriced)
 * - SPORTS, ODDS_REGIONS, ODDS_MARKETS: comma-separated
 * - ODDS_API_KEY, ODDS_API_HOST, KALSHI_API_HOST
 * - TELEGRAM_BOT_TOKEN, TELEGRAM_CHAT_ID
 *
 * @throws ConfigurationError when a numeric variable does not parse
 */
export function loadConfig(env: Env = process.env): Config {
  const logLevelRaw = (readString(env, "LOG_LEVEL") ?? "info").toLowerCase();
  if (!isLogLevel(logLevelRaw)) {
    throw new ConfigurationError(`LOG_LEVEL must be debug, info, warn or error, got "${logLevelRaw}"`, "LOG_LEVEL");
  }

  // Default to true for safety - must explicitly set to "false" to disable
  const dryRun = readString(env, "DRY_RUN")?.toLowerCase() !== "false";

  const statusPortRaw = readString(env, "STATUS_PORT");

  return {
    logLevel: logLevelRaw,
    dryRun,
    logDir: readString(env, "LOG_DIR") ?? join(process.cwd(), "logs"),
    statusPort: statusPortRaw === null ? null : readNumber(env, "STATUS_PORT", 0),
    scanIntervalMs: readNumber(env, "SCAN_INTERVAL_MS", DEFAULTS.scanIntervalMs),
    statusReportIntervalMs: DEFAULTS.statusReportIntervalMs,

    kalshiApiHost: (readString(env, "KALSHI_API_HOST") ?? DEFAULTS.kalshiApiHost).replace(/\/$/, ""),
    oddsApiHost: (readString(env, "ODDS_API_HOST") ?? DEFAULTS.oddsApiHost).replace(/\/$/, ""),
    oddsApiKey: readString(env, "ODDS_API_KEY"),
    sports: readList(env, "SPORTS", DEFAULTS.sports),
    oddsRegions: readList(env, "ODDS_REGIONS", DEFAULTS.oddsRegions),
    oddsMarkets: readMarketTypes(env, "ODDS_MARKETS", DEFAULTS.oddsMarkets),

    telegramBotToken: readString(env, "TELEGRAM_BOT_TOKEN"),
    telegramChatId: readString(env, "TELEGRAM_CHAT_ID"),

    detection: {
      minEdge: readNumber(env, "MIN_EDGE", RISK_PARAMS.minEdgeNet),
      quoteFreshnessMs: RISK_PARAMS.quoteFreshnessMs,
      equivalentEdgeTolerance: RISK_PARAMS.equivalentEdgeTolerance,
      edgeNoiseThreshold: RISK_PARAMS.edgeNoiseThreshold,
      maxContracts: RISK_PARAMS.maxContractsPerTrade,
      oddsCommissionRate: readNumber(env, "ODDS_COMMISSION_RATE", 0),
    },
    matcher: {
      ...DEFAULT_MATCHER_OPTIONS,
      threshold: readNumber(env, "MATCH_THRESHOLD", DEFAULT_MATCHER_OPTIONS.threshold),
    },
    risk: {
      defaultVenueLimits: {
        perBetCap: readNumber(env, "PER_BET_CAP", RISK_PARAMS.perBetCap),
        dailyVolumeCap: readNumber(env, "DAILY_VOLUME_CAP", RISK_PARAMS.dailyVolumeCap),
      },
      venueLimits: {},
      maxGlobalExposure: readNumber(env, "MAX_GLOBAL_EXPOSURE", RISK_PARAMS.maxGlobalExposure),
      maxDailyLoss: readNumber(env, "MAX_DAILY_LOSS", RISK_PARAMS.maxDailyLoss),
      maxDrawdown: readNumber(env, "MAX_DRAWDOWN", RISK_PARAMS.maxDrawdown),
      minActionableSize: readNumber(env, "MIN_ACTIONABLE_SIZE", RISK_PARAMS.minActionableSize),
      staleMs: readNumber(env, "STALE_MS", RISK_PARAMS.staleMs),
      throttleRejectCount: RISK_PARAMS.throttleRejectCount,
      throttleWindowMs: RISK_PARAMS.throttleWindowMs,
    },
    execution: {
      leg1TimeoutMs: readNumber(env, "LEG1_TIMEOUT_MS", RISK_PARAMS.leg1TimeoutMs),
      leg2TimeoutMs: readNumber(env, "LEG2_TIMEOUT_MS", RISK_PARAMS.leg2TimeoutMs),
      pollIntervalMs: RISK_PARAMS.pollIntervalMs,
      retry: { ...DEFAULT_RETRY_OPTIONS },
      cooldownMsAfterSuccess: RISK_PARAMS.cooldownMsAfterSuccess,
      cooldownMsAfterFailure: RISK_PARAMS.cooldownMsAfterFailure,
    },
    crossBook: {
      minArbEdge: readNumber(env, "CROSS_BOOK_MIN_EDGE", RISK_PARAMS.crossBookMinEdge),
      minValueEdge: readNumber(env, "VALUE_BET_MIN_EDGE", RISK_PARAMS.valueBetMinEdge),
      minConsensusBooks: RISK_PARAMS.valueBetMinBooks,
      maxArbTotal: RISK_PARAMS.crossBookMaxTotal,
      maxLegStake: RISK_PARAMS.crossBookMaxLegStake,
      maxAgeMs: RISK_PARAMS.quoteFreshnessMs,
    },
    budget: {
      apiBudget: readNumber(env, "API_BUDGET", RISK_PARAMS.apiBudget),
      bankroll: readNumber(env, "BANKROLL", RISK_PARAMS.bankroll),
      reserve: readNumber(env, "RESERVE", RISK_PARAMS.reserve),
      creditCost: readNumber(env, "ODDS_API_CREDIT_COST", 0),
    },
  };
}

/**
 * Reject caps and thresholds the engine cannot run with.
 *
 * @throws ConfigurationError naming the first offending field
 */
export function validateConfig(config: Config): void {
  const positive: Array<[string, number]> = [
    ["SCAN_INTERVAL_MS", config.scanIntervalMs],
    ["PER_BET_CAP", config.risk.defaultVenueLimits.perBetCap],
    ["DAILY_VOLUME_CAP", config.risk.defaultVenueLimits.dailyVolumeCap],
    ["MAX_GLOBAL_EXPOSURE", config.risk.maxGlobalExposure],
    ["MAX_DAILY_LOSS", config.risk.maxDailyLoss],
    ["MAX_DRAWDOWN", config.risk.maxDrawdown],
    ["MIN_ACTIONABLE_SIZE", config.risk.minActionableSize],
    ["STALE_MS", config.risk.staleMs],
    ["LEG1_TIMEOUT_MS", config.execution.leg1TimeoutMs],
    ["LEG2_TIMEOUT_MS", config.execution.leg2TimeoutMs],
  ];
  for (const [field, value] of positive) {
    if (!(value > 0)) {
      throw new ConfigurationError(`${field} must be positive, got ${value}`, field);
    }
  }

  const unitInterval: Array<[string, number]> = [
    ["MIN_EDGE", config.detection.minEdge],
    ["MATCH_THRESHOLD", config.matcher.threshold],
    ["ODDS_COMMISSION_RATE", config.detection.oddsCommissionRate],
    ["CROSS_BOOK_MIN_EDGE", config.crossBook.minArbEdge],
    ["VALUE_BET_MIN_EDGE", config.crossBook.minValueEdge],
  ];
  for (const [field, value] of unitInterval) {
    if (!(value >= 0 && value <= 1)) {
      throw new ConfigurationError(`${field} must be within [0, 1], got ${value}`, field);
    }
  }

  const nonNegative: Array<[string, number]> = [
    ["API_BUDGET", config.budget.apiBudget],
    ["BANKROLL", config.budget.bankroll],
    ["RESERVE", config.budget.reserve],
    ["ODDS_API_CREDIT_COST", config.budget.creditCost],
  ];
  for (const [field, value] of nonNegative) {
    if (!(value >= 0)) {
      throw new ConfigurationError(`${field} must not be negative, got ${value}`, field);
    }
  }

  if (config.risk.defaultVenueLimits.perBetCap > config.risk.defaultVenueLimits.dailyVolumeCap) {
    throw new ConfigurationError(
      "PER_BET_CAP cannot exceed DAILY_VOLUME_CAP",
      "PER_BET_CAP",
      {
        perBetCap: config.risk.defaultVenueLimits.perBetCap,
        dailyVolumeCap: config.risk.defaultVenueLimits.dailyVolumeCap,
      }
    );
  }

  if (config.statusPort !== null && !(Number.isInteger(config.statusPort) && config.statusPort > 0 && config.statusPort < 65536)) {
    throw new ConfigurationError(`STATUS_PORT must be a TCP port, got ${config.statusPort}`, "STATUS_PORT");
  }

  if (config.sports.length === 0) {
    throw new ConfigurationError("SPORTS must name at least one sport key", "SPORTS");
  }

  if (config.oddsMarkets.length === 0) {
    throw new ConfigurationError("ODDS_MARKETS must name at least one market", "ODDS_MARKETS");
  }
}

/**
 * Fee model for an odds venue under this configuration.
 */
export function oddsFeeModel(config: Config): FeeModel {
  return config.detection.oddsCommissionRate > 0
    ? { kind: "commission", rate: config.detection.oddsCommissionRate }
    : { kind: "none" };
}
