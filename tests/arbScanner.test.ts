import { describe, test, expect, vi } from "vitest";
import { StaleDataError } from "../src/errors";
import { NO_FEES } from "../src/fees/feeEngine";
import { computeMaxSize, detectOpportunity, orderLegs } from "../src/strategy/arbScanner";
import type { DetectionContext, Opportunity } from "../src/strategy/types";
import { T0, allVenuesTrade, fixedCapacity, makeBook, makeLeg, makePair } from "./fixtures";

function context(overrides: Partial<DetectionContext> = {}): DetectionContext {
  return {
    minEdge: 0.02,
    quoteFreshnessMs: 5000,
    equivalentEdgeTolerance: 0.005,
    maxContracts: 500,
    exchangeFees: NO_FEES,
    oddsFees: () => NO_FEES,
    capacity: fixedCapacity(),
    venues: allVenuesTrade,
    ...overrides,
  };
}

const THUNDER = "Oklahoma City Thunder";
const NUGGETS = "Denver Nuggets";

describe("detectOpportunity", () => {
  test("fair prices on both venues leave no edge", () => {
    // Ask 0.40 on A; the complement at +150 implies 0.40 in a vig-free market
    const pair = makePair([
      { venue: "draftkings", subject: { name: THUNDER, price: -150 }, other: { name: NUGGETS, price: 150 } },
    ]);
    const result = detectOpportunity(pair, makeBook(0.4, 0.62), context(), T0);

    expect(result.opportunity).toBeNull();
    expect(result.reason).toBe("No edge above minimum");
    expect(result.candidates).toBe(0);
  });

  test("cheap exchange contract against the odds-venue complement emits an opportunity", () => {
    // Complement at +122 implies 100/222 ≈ 0.45 with no vig
    const pair = makePair([
      { venue: "draftkings", subject: { name: THUNDER, price: -122 }, other: { name: NUGGETS, price: 122 } },
    ]);
    const result = detectOpportunity(pair, makeBook(0.35, 0.67), context({ minEdge: 0.05 }), T0);
    const opportunity = result.opportunity;

    expect(opportunity).not.toBeNull();
    if (!opportunity) return;
    expect(opportunity.direction).toBe("A");
    expect(opportunity.edgeGross).toBeCloseTo(100 / 222 - 0.35, 10);
    expect(opportunity.edgeNet).toBeCloseTo(0.1, 2);
    expect(opportunity.detectedAt).toBe(T0);
    expect(opportunity.executable).toBe(true);

    const [leg1, leg2] = opportunity.plan;
    expect(leg1.role).toBe("exchange");
    expect(leg1.side).toBe("A");
    expect(leg1.price).toEqual({ kind: "probability", value: 0.35 });
    expect(leg2.role).toBe("odds");
    expect(leg2.side).toBe("B");
    expect(leg2.outcome).toBe(NUGGETS);
    expect(leg2.price).toEqual({ kind: "american", value: 122 });
    expect(leg2.unitCost).toBeCloseTo(100 / 222, 10);
    expect(opportunity.maxSize).toBe(100);
    expect(leg1.size).toBe(100);
    expect(leg2.size).toBe(100);
  });

  test("max size never exceeds displayed exchange liquidity", () => {
    const pair = makePair([
      { venue: "draftkings", subject: { name: THUNDER, price: -122 }, other: { name: NUGGETS, price: 122 } },
    ]);
    for (const askSize of [1, 7, 40, 100, 1000]) {
      const result = detectOpportunity(pair, makeBook(0.35, 0.67, { a: askSize }), context(), T0);
      expect(result.opportunity?.maxSize).toBeLessThanOrEqual(askSize);
    }
    // With deep liquidity the odds venue's per-bet cap binds: 50 / (100/222) = 111
    const deep = detectOpportunity(pair, makeBook(0.35, 0.67, { a: 1000 }), context(), T0);
    expect(deep.opportunity?.maxSize).toBe(111);
  });

  test("a published stake limit makes the odds leg go first", () => {
    const pair = makePair([
      {
        venue: "draftkings",
        subject: { name: THUNDER, price: -122 },
        other: { name: NUGGETS, price: 122, maxStake: 20 },
      },
    ]);
    const result = detectOpportunity(pair, makeBook(0.35, 0.67), context(), T0);

    expect(result.opportunity?.plan[0].role).toBe("odds");
    expect(result.opportunity?.maxSize).toBe(44);
  });

  test("a stale order book raises StaleDataError", () => {
    const pair = makePair([
      { venue: "draftkings", subject: { name: THUNDER, price: -122 }, other: { name: NUGGETS, price: 122 } },
    ]);
    expect(() =>
      detectOpportunity(pair, makeBook(0.35, 0.67, {}, T0 - 6000), context(), T0)
    ).toThrow(StaleDataError);
  });

  test("stale odds lines are skipped", () => {
    const pair = makePair(
      [{ venue: "draftkings", subject: { name: THUNDER, price: -122 }, other: { name: NUGGETS, price: 122 } }],
      T0 - 6000
    );
    const result = detectOpportunity(pair, makeBook(0.35, 0.67), context(), T0);
    expect(result.opportunity).toBeNull();
    expect(result.staleLines).toBe(1);
    expect(result.reason).toBe("All odds lines stale");
  });

  test("equivalent venues go to the selector", () => {
    const pair = makePair([
      { venue: "draftkings", subject: { name: THUNDER, price: -122 }, other: { name: NUGGETS, price: 122 } },
      { venue: "fanduel", subject: { name: THUNDER, price: -121 }, other: { name: NUGGETS, price: 121 } },
    ]);
    const selectVenue = vi.fn(
      (candidates: readonly Opportunity[]) =>
        candidates.find((c) => c.oddsVenue === "draftkings") ?? candidates[0]
    );

    const withSelector = detectOpportunity(pair, makeBook(0.35, 0.67), context({ selector: { selectVenue } }), T0);
    expect(selectVenue).toHaveBeenCalledTimes(1);
    expect(selectVenue.mock.calls[0][0]).toHaveLength(2);
    expect(withSelector.opportunity?.oddsVenue).toBe("draftkings");

    const bestOnly = detectOpportunity(pair, makeBook(0.35, 0.67), context(), T0);
    expect(bestOnly.opportunity?.oddsVenue).toBe("fanduel");
  });

  test("opportunities on venues that cannot trade are report-only", () => {
    const pair = makePair([
      { venue: "draftkings", subject: { name: THUNDER, price: -122 }, other: { name: NUGGETS, price: 122 } },
    ]);
    const result = detectOpportunity(
      pair,
      makeBook(0.35, 0.67),
      context({ venues: { canTrade: (venue) => venue === "kalshi", expectedConfirmMs: () => 1000 } }),
      T0
    );
    expect(result.opportunity?.executable).toBe(false);
  });
});

describe("computeMaxSize", () => {
  test("takes the tightest of liquidity, caps and headroom", () => {
    const size = computeMaxSize(
      { venue: "kalshi", unitCost: 0.5, availableSize: 1000 },
      { venue: "draftkings", unitCost: 0.5, availableSize: 1000 },
      { capacity: fixedCapacity(50, 250, 500), maxContracts: 500 }
    );
    expect(size).toBe(100);
  });

  test("is zero when a venue has no room left", () => {
    const size = computeMaxSize(
      { venue: "kalshi", unitCost: 0.5, availableSize: 1000 },
      { venue: "draftkings", unitCost: 0.5, availableSize: 1000 },
      { capacity: fixedCapacity(50, 0, 500), maxContracts: 500 }
    );
    expect(size).toBe(0);
  });
});

describe("orderLegs", () => {
  test("less liquid leg first", () => {
    const thin = makeLeg({ venue: "thin", availableSize: 5 });
    const deep = makeLeg({ venue: "deep", availableSize: 50 });
    expect(orderLegs(deep, thin).map((leg) => leg.venue)).toEqual(["thin", "deep"]);
  });

  test("slower-to-confirm leg first on equal liquidity", () => {
    const fast = makeLeg({ venue: "fast", expectedConfirmMs: 200 });
    const slow = makeLeg({ venue: "slow", expectedConfirmMs: 3000 });
    expect(orderLegs(fast, slow).map((leg) => leg.venue)).toEqual(["slow", "fast"]);
  });
});
