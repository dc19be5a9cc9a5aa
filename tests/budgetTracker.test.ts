import { describe, test, expect } from "vitest";
import { ArbitrageEngineError } from "../src/errors";
import { NO_FEES } from "../src/fees/feeEngine";
import { createSilentLogger } from "../src/logging/logger";
import { BudgetTracker, type BudgetAllocation } from "../src/portfolio/budgetTracker";
import { PortfolioManager } from "../src/portfolio/portfolioManager";
import { RiskManager } from "../src/risk/riskManager";
import { ExposureLedger } from "../src/state/exposureLedger";
import { RecordingAlertSink, T0, TEST_LIMITS, TestClock, makeAttempt } from "./fixtures";

const ALLOCATION: BudgetAllocation = { apiBudget: 60, bankroll: 200, reserve: 740, creditCost: 0 };

function setup(allocation: BudgetAllocation = ALLOCATION) {
  const clock = new TestClock(T0);
  const ledger = new ExposureLedger(clock.read);
  const alerts = new RecordingAlertSink();
  const logger = createSilentLogger();
  const budget = new BudgetTracker({ allocation, ledger, alerts, logger, clock: clock.read });
  const risk = new RiskManager({
    limits: TEST_LIMITS,
    ledger,
    alerts,
    logger,
    clock: clock.read,
    bankroll: budget,
  });
  const portfolio = new PortfolioManager({ ledger, risk, logger, feeFor: () => NO_FEES });
  return { ledger, alerts, budget, portfolio };
}

/**
 * Open and settle `count` hedged positions. Each costs $8 for a $10 payout.
 */
async function settleWinners(portfolio: PortfolioManager, count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    const position = await portfolio.recordAttempt(makeAttempt({ leg1: 10, leg2: 10 }), null);
    if (!position) throw new Error("expected a position");
    await portfolio.settlePosition(position.id, "A");
  }
}

describe("BudgetTracker", () => {
  test("rejects a negative allocation", () => {
    expect(() => setup({ ...ALLOCATION, reserve: -1 })).toThrow(
      "Budget reserve must be non-negative, got -1"
    );
  });

  test("alerts once when API spend passes the budget", () => {
    const { alerts, budget } = setup();

    budget.recordApiSpend(45);
    expect(alerts.alerts).toEqual([]);

    budget.recordApiSpend(20);
    budget.recordApiSpend(5);

    expect(alerts.alerts).toHaveLength(1);
    expect(alerts.alerts[0]).toMatchObject({
      severity: "warning",
      message: "API budget exceeded: $65.00 spent of $60.00",
    });
    expect(budget.summary()).toMatchObject({ apiSpent: 70, apiRemaining: -10 });
  });

  test("negative spend is refused", () => {
    const { budget } = setup();

    expect(() => budget.recordApiSpend(-1)).toThrow(ArbitrageEngineError);
  });

  test("credits are priced only when a credit cost is configured", () => {
    const unpriced = setup().budget;
    unpriced.recordApiCredits(30);
    expect(unpriced.summary().apiSpent).toBe(0);

    const priced = setup({ ...ALLOCATION, creditCost: 0.5 }).budget;
    priced.recordApiCredits(30);
    priced.recordApiCredits(0);
    expect(priced.summary().apiSpent).toBe(15);
  });

  test("open notional is committed against the bankroll", async () => {
    const { budget, portfolio } = setup();
    await portfolio.recordAttempt(makeAttempt({ leg1: 10, leg2: 10 }), null);

    expect(budget.summary()).toMatchObject({
      totalBudget: 1000,
      bankroll: 200,
      activeBankroll: 200,
      committed: 8,
      availableBankroll: 192,
      settledPositions: 0,
      canTrade: true,
      canReleaseReserve: false,
    });
  });

  test("reserve stays locked until enough positions settle in profit", async () => {
    const { budget, portfolio } = setup();
    await settleWinners(portfolio, 9);

    expect(budget.canReleaseReserve()).toBe(false);
    expect(budget.releaseFromReserve(50)).toBe(0);
    expect(budget.bankrollCapital()).toBe(200);

    await settleWinners(portfolio, 1);

    expect(budget.canReleaseReserve()).toBe(true);
    expect(budget.releaseFromReserve(50)).toBe(50);
    expect(budget.bankrollCapital()).toBe(250);
    expect(budget.summary().reserve).toBe(690);
  });

  test("a single release is capped", async () => {
    const { budget, portfolio } = setup();
    await settleWinners(portfolio, 10);

    expect(budget.releaseFromReserve(500)).toBe(100);
    expect(budget.summary()).toMatchObject({ bankroll: 300, reserve: 640, settledPositions: 10 });
  });
});
