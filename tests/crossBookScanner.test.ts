import { describe, test, expect } from "vitest";
import type { OddsLine, OddsOutcome } from "../src/markets/types";
import {
  detectCrossBookArbs,
  detectValueBets,
  scanCrossBook,
} from "../src/strategy/crossBookScanner";
import { T0, makeLine } from "./fixtures";

const THUNDER = "Oklahoma City Thunder";
const NUGGETS = "Denver Nuggets";

function moneyline(venue: string, thunder: number, nuggets: number): OddsLine {
  return makeLine({
    id: `evt1:${venue}:h2h`,
    venue,
    outcomes: [
      { name: THUNDER, price: thunder },
      { name: NUGGETS, price: nuggets },
    ],
  });
}

function twoWay(
  venue: string,
  marketType: OddsLine["marketType"],
  outcomes: [OddsOutcome, OddsOutcome]
): OddsLine {
  return makeLine({ id: `evt1:${venue}:${marketType}`, venue, marketType, outcomes });
}

describe("detectCrossBookArbs", () => {
  test("best prices on different books that sum below one form an arbitrage", () => {
    // Thunder +110 at A (0.476190), Nuggets +105 at B (0.487805): sum 0.963995
    const lines = [moneyline("book_a", 110, -130), moneyline("book_b", -120, 105)];

    const [arb, ...rest] = detectCrossBookArbs(lines, T0);

    expect(rest).toHaveLength(0);
    expect(arb.strategy).toBe("arbitrage");
    expect(arb.edge).toBeCloseTo(0.036005, 5);
    expect(arb.legs.map((leg) => [leg.venue, leg.outcome, leg.stake])).toEqual([
      ["book_a", THUNDER, 48.81],
      ["book_b", NUGGETS, 50],
    ]);
    expect(arb.totalStake).toBe(98.81);
    expect(arb.guaranteedProfit).toBe(3.69);
    expect(arb.expiresAt).toBe(lines[0].startTime);
  });

  test("a single book never arbitrages against itself", () => {
    expect(detectCrossBookArbs([moneyline("book_a", 110, -130)], T0)).toEqual([]);
  });

  test("lines older than the freshness window are skipped", () => {
    const lines = [
      moneyline("book_a", 110, -130),
      { ...moneyline("book_b", -120, 105), ts: T0 - 10_000 },
    ];

    expect(detectCrossBookArbs(lines, T0)).toEqual([]);
  });

  test("spreads only pair lines quoted at the same points", () => {
    const lines = [
      twoWay("book_a", "spread", [
        { name: THUNDER, price: 105, point: -4.5 },
        { name: NUGGETS, price: -125, point: 4.5 },
      ]),
      twoWay("book_b", "spread", [
        { name: THUNDER, price: -120, point: -4.5 },
        { name: NUGGETS, price: 110, point: 4.5 },
      ]),
      twoWay("book_c", "spread", [
        { name: THUNDER, price: 150, point: -6.5 },
        { name: NUGGETS, price: 150, point: 6.5 },
      ]),
    ];

    const arbs = detectCrossBookArbs(lines, T0);

    expect(arbs).toHaveLength(1);
    expect(arbs[0].legs.map((leg) => [leg.venue, leg.point])).toEqual([
      ["book_a", -4.5],
      ["book_b", 4.5],
    ]);
  });

  test("totals pair the over and under at one line", () => {
    const lines = [
      twoWay("book_a", "total", [
        { name: "Over", price: 105, point: 220.5 },
        { name: "Under", price: -125, point: 220.5 },
      ]),
      twoWay("book_b", "total", [
        { name: "Over", price: -125, point: 220.5 },
        { name: "Under", price: 105, point: 220.5 },
      ]),
    ];

    const arbs = detectCrossBookArbs(lines, T0);

    expect(arbs).toHaveLength(1);
    expect(arbs[0].edge).toBeCloseTo(0.02439, 5);
    expect(arbs[0].legs.map((leg) => [leg.venue, leg.outcome])).toEqual([
      ["book_a", "Over"],
      ["book_b", "Under"],
    ]);
  });
});

describe("detectValueBets", () => {
  test("flags the book priced well above consensus", () => {
    // Thunder: 0.523810, 0.523810, 0.434783 -> consensus 0.494134
    const lines = [
      moneyline("book_a", -110, -110),
      moneyline("book_b", -110, -110),
      moneyline("book_c", 130, -150),
    ];

    const bets = detectValueBets(lines, T0);

    expect(bets).toHaveLength(1);
    expect(bets[0].legs[0].venue).toBe("book_c");
    expect(bets[0].legs[0].outcome).toBe(THUNDER);
    expect(bets[0].edge).toBeCloseTo(0.059351, 5);
    expect(bets[0].consensusProb).toBeCloseTo(0.494134, 5);
    expect(bets[0].totalStake).toBe(29.68);
    expect(bets[0].guaranteedProfit).toBe(0);
  });

  test("two books are not enough for a consensus", () => {
    const lines = [moneyline("book_a", -110, -110), moneyline("book_c", 130, -150)];

    expect(detectValueBets(lines, T0)).toEqual([]);
  });
});

describe("scanCrossBook", () => {
  test("returns arbitrages and value bets ordered by edge", () => {
    const lines = [
      moneyline("book_a", -110, -110),
      moneyline("book_b", -110, -110),
      moneyline("book_c", 130, -150),
    ];

    const found = scanCrossBook(lines, T0);

    // Thunder +130 at C with Nuggets -110: 0.434783 + 0.523810 = 0.958593
    expect(found.map((opportunity) => opportunity.strategy)).toEqual(["value_bet", "arbitrage"]);
    expect(found[1].edge).toBeCloseTo(0.041407, 5);
  });
});
