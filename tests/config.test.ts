import { describe, test, expect } from "vitest";
import { loadConfig, oddsFeeModel, validateConfig } from "../src/config/config";
import { ConfigurationError } from "../src/errors";

function configError(fn: () => unknown): ConfigurationError | null {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  return null;
}

describe("loadConfig", () => {
  test("defaults are a safe dry run", () => {
    const config = loadConfig({});
    expect(config.dryRun).toBe(true);
    expect(config.logLevel).toBe("info");
    expect(config.statusPort).toBeNull();
    expect(config.oddsApiKey).toBeNull();
    expect(config.sports).toEqual(["basketball_nba", "icehockey_nhl", "americanfootball_nfl"]);
    expect(config.detection.minEdge).toBe(0.02);
    expect(config.risk.defaultVenueLimits).toEqual({ perBetCap: 50, dailyVolumeCap: 250 });
    expect(config.execution.leg1TimeoutMs).toBe(3000);
    expect(config.oddsMarkets).toEqual(["moneyline"]);
    expect(config.budget).toEqual({ apiBudget: 60, bankroll: 200, reserve: 740, creditCost: 0 });
    expect(config.crossBook.minArbEdge).toBe(0.005);
    expect(config.crossBook.minValueEdge).toBe(0.05);
    expect(() => validateConfig(config)).not.toThrow();
  });

  test("only DRY_RUN=false goes live", () => {
    expect(loadConfig({ DRY_RUN: "FALSE" }).dryRun).toBe(false);
    expect(loadConfig({ DRY_RUN: "no" }).dryRun).toBe(true);
  });

  test("reads lists, numbers and hosts from the environment", () => {
    const config = loadConfig({
      LOG_LEVEL: "DEBUG",
      SPORTS: " basketball_nba , icehockey_nhl,,",
      MIN_EDGE: "0.03",
      STATUS_PORT: "8080",
      KALSHI_API_HOST: "http://localhost:9000/",
      ODDS_API_KEY: "test-key",
    });
    expect(config.logLevel).toBe("debug");
    expect(config.sports).toEqual(["basketball_nba", "icehockey_nhl"]);
    expect(config.detection.minEdge).toBe(0.03);
    expect(config.statusPort).toBe(8080);
    expect(config.kalshiApiHost).toBe("http://localhost:9000");
    expect(config.oddsApiKey).toBe("test-key");
  });

  test("odds markets are read case-insensitively", () => {
    expect(loadConfig({ ODDS_MARKETS: "Moneyline, TOTAL" }).oddsMarkets).toEqual(["moneyline", "total"]);
  });

  test("unparseable values name the variable", () => {
    expect(configError(() => loadConfig({ MIN_EDGE: "abc" }))?.field).toBe("MIN_EDGE");
    expect(configError(() => loadConfig({ LOG_LEVEL: "verbose" }))?.field).toBe("LOG_LEVEL");
    expect(configError(() => loadConfig({ ODDS_MARKETS: "moneyline,props" }))?.field).toBe("ODDS_MARKETS");
  });
});

describe("validateConfig", () => {
  test.each([
    [{ MAX_DAILY_LOSS: "0" }, "MAX_DAILY_LOSS"],
    [{ MIN_EDGE: "1.5" }, "MIN_EDGE"],
    [{ PER_BET_CAP: "300" }, "PER_BET_CAP"],
    [{ STATUS_PORT: "70000" }, "STATUS_PORT"],
    [{ SPORTS: "," }, "SPORTS"],
    [{ BANKROLL: "-5" }, "BANKROLL"],
    [{ VALUE_BET_MIN_EDGE: "2" }, "VALUE_BET_MIN_EDGE"],
  ])("rejects %o", (env, field) => {
    const error = configError(() => validateConfig(loadConfig(env)));
    expect(error?.field).toBe(field);
  });

  test("message states the bound", () => {
    expect(configError(() => validateConfig(loadConfig({ MAX_DAILY_LOSS: "0" })))?.message).toBe(
      "MAX_DAILY_LOSS must be positive, got 0"
    );
  });
});

describe("oddsFeeModel", () => {
  test("commission only when configured", () => {
    expect(oddsFeeModel(loadConfig({}))).toEqual({ kind: "none" });
    expect(oddsFeeModel(loadConfig({ ODDS_COMMISSION_RATE: "0.02" }))).toEqual({ kind: "commission", rate: 0.02 });
  });
});
