import { describe, test, expect } from "vitest";
import { ArbitrageEngineError } from "../src/errors";
import { KALSHI_FEES, NO_FEES } from "../src/fees/feeEngine";
import { createSilentLogger } from "../src/logging/logger";
import { PortfolioManager, classifyPosition } from "../src/portfolio/portfolioManager";
import { RiskManager } from "../src/risk/riskManager";
import type { RiskLimits } from "../src/risk/types";
import { ExposureLedger } from "../src/state/exposureLedger";
import type { Reservation } from "../src/state/types";
import { RecordingAlertSink, T0, TEST_LIMITS, TestClock, makeAttempt } from "./fixtures";

function setup(limits: RiskLimits = TEST_LIMITS) {
  const clock = new TestClock(T0);
  const ledger = new ExposureLedger(clock.read);
  const alerts = new RecordingAlertSink();
  const logger = createSilentLogger();
  const risk = new RiskManager({ limits, ledger, alerts, logger, clock: clock.read });
  const portfolio = new PortfolioManager({
    ledger,
    risk,
    logger,
    feeFor: (venue) => (venue === "kalshi" ? KALSHI_FEES : NO_FEES),
  });
  return { ledger, alerts, risk, portfolio };
}

async function reserve(ledger: ExposureLedger): Promise<Reservation> {
  return ledger.transact((writer) =>
    writer.reserve("res_test", "opp_test", [
      { venue: "kalshi", notional: 4 },
      { venue: "draftkings", notional: 4 },
    ])
  );
}

describe("classifyPosition", () => {
  test("hedged, partial and naked", () => {
    expect(classifyPosition(10, 0)).toBe("hedged");
    expect(classifyPosition(6, 4)).toBe("partial_hedge");
    expect(classifyPosition(0, 10)).toBe("naked");
  });
});

describe("PortfolioManager", () => {
  test("a fully hedged attempt opens a hedged position and releases its reservation", async () => {
    const { ledger, portfolio } = setup();
    const reservation = await reserve(ledger);

    const position = await portfolio.recordAttempt(makeAttempt({ leg1: 10, leg2: 10 }), reservation);

    expect(position).not.toBeNull();
    if (!position) return;
    expect(position.kind).toBe("hedged");
    expect(position.hedgedSize).toBe(10);
    expect(position.unhedgedSize).toBe(0);
    expect(position.cost).toBe(8);
    // 0.07 * 10 * 0.4 * 0.6 = 0.168, rounded up to the cent
    expect(position.fees).toBe(0.17);
    expect(position.lockedPnl).toBeCloseTo(1.83, 10);

    const snapshot = ledger.snapshot();
    expect(snapshot.globalPendingNotional).toBe(0);
    expect(snapshot.venues.kalshi.openNotional).toBe(4);
    expect(snapshot.venues.draftkings.dailyVolume).toBe(4);
    expect(portfolio.getPnl()).toMatchObject({ openPositions: 1, dailyRealized: 0 });
    expect(portfolio.getPnl().unrealized).toBeCloseTo(1.83, 10);
  });

  test("partial and naked fills keep the residual", async () => {
    const { portfolio } = setup();
    const partial = await portfolio.recordAttempt(makeAttempt({ leg1: 10, leg2: 6 }), null);
    expect(partial).toMatchObject({ kind: "partial_hedge", hedgedSize: 6, unhedgedSize: 4, lockedPnl: null });
    expect(partial?.cost).toBeCloseTo(6.4, 10);

    const naked = await portfolio.recordAttempt(makeAttempt({ leg1: 10, leg2: 0 }), null);
    expect(naked).toMatchObject({ kind: "naked", hedgedSize: 0, unhedgedSize: 10 });
    expect(naked?.legs.map((leg) => leg.venue)).toEqual(["kalshi"]);
  });

  test("an attempt with no fills opens nothing", async () => {
    const { ledger, portfolio } = setup();
    const reservation = await reserve(ledger);
    expect(await portfolio.recordAttempt(makeAttempt({ leg1: 0, leg2: 0 }), reservation)).toBeNull();
    expect(ledger.snapshot().globalPendingNotional).toBe(0);
    expect(portfolio.getPositions()).toEqual([]);
  });

  test("settlement realizes the locked P&L and frees notional", async () => {
    const { ledger, portfolio } = setup();
    const position = await portfolio.recordAttempt(makeAttempt({ leg1: 10, leg2: 10 }), null);
    if (!position) throw new Error("expected a position");

    const realized = await portfolio.settlePosition(position.id, "A");
    expect(realized).toBeCloseTo(1.83, 10);

    const snapshot = ledger.snapshot();
    expect(snapshot.globalOpenNotional).toBe(0);
    expect(snapshot.venues.kalshi.dailyRealizedPnl).toBeCloseTo(5.83, 10);
    expect(snapshot.venues.draftkings.dailyRealizedPnl).toBe(-4);
    expect(portfolio.getPositions("settled")).toHaveLength(1);
    expect(portfolio.getPnl().unrealized).toBe(0);
  });

  test("a void refunds stakes but not fees", async () => {
    const { portfolio } = setup();
    const position = await portfolio.recordAttempt(makeAttempt({ leg1: 10, leg2: 10 }), null);
    if (!position) throw new Error("expected a position");
    expect(await portfolio.settlePosition(position.id, "void")).toBeCloseTo(-0.17, 10);
  });

  test("closing splits the exit value across legs by cost", async () => {
    const { ledger, portfolio } = setup();
    const position = await portfolio.recordAttempt(makeAttempt({ leg1: 10, leg2: 10 }), null);
    if (!position) throw new Error("expected a position");

    expect(await portfolio.closePosition(position.id, 9)).toBeCloseTo(0.83, 10);
    expect(ledger.snapshot().venues.draftkings.dailyRealizedPnl).toBeCloseTo(0.5, 10);
    expect(portfolio.getPositions("closed")).toHaveLength(1);
  });

  test("settling twice or settling an unknown position throws", async () => {
    const { portfolio } = setup();
    const position = await portfolio.recordAttempt(makeAttempt({ leg1: 10, leg2: 10 }), null);
    if (!position) throw new Error("expected a position");
    await portfolio.settlePosition(position.id, "B");

    await expect(portfolio.settlePosition(position.id, "B")).rejects.toMatchObject({
      code: "POSITION_NOT_OPEN",
    });
    await expect(portfolio.closePosition("pos_missing", 1)).rejects.toBeInstanceOf(ArbitrageEngineError);
  });

  test("a realized loss past the daily limit trips the kill switch", async () => {
    const { alerts, risk, portfolio } = setup({ ...TEST_LIMITS, maxDailyLoss: 3 });
    const position = await portfolio.recordAttempt(makeAttempt({ leg1: 10, leg2: 0 }), null);
    if (!position) throw new Error("expected a position");

    const realized = await portfolio.settlePosition(position.id, "B");
    expect(realized).toBeCloseTo(-4.17, 10);
    expect(risk.isHalted()).toBe(true);
    expect(alerts.alerts.map((alert) => alert.severity)).toEqual(["critical"]);
  });
});
