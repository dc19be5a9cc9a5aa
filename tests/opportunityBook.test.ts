import { describe, test, expect } from "vitest";
import { OpportunityBook } from "../src/strategy/opportunityBook";
import { T0, makeOpportunity } from "./fixtures";

function book(): OpportunityBook {
  return new OpportunityBook({ staleMs: 2000, edgeNoiseThreshold: 0.005 });
}

describe("OpportunityBook", () => {
  test("keeps near-duplicates and replaces material changes", () => {
    const b = book();
    expect(b.upsert(makeOpportunity({ id: "a", edgeNet: 0.05 }), T0)).toBe("inserted");
    expect(b.upsert(makeOpportunity({ id: "b", edgeNet: 0.053 }), T0 + 100)).toBe("kept");
    expect(b.upsert(makeOpportunity({ id: "c", edgeNet: 0.07 }), T0 + 200)).toBe("replaced");
    expect(b.upsert(makeOpportunity({ id: "d", edgeNet: 0.07, oddsVenue: "fanduel" }), T0 + 300)).toBe(
      "replaced"
    );
    expect(b.size).toBe(1);
    expect(b.snapshot()[0].id).toBe("d");
  });

  test("a smaller fresh size replaces the entry at an unchanged edge", () => {
    const b = book();
    b.upsert(makeOpportunity({ id: "deep", edgeNet: 0.1, maxSize: 100 }), T0);
    expect(b.upsert(makeOpportunity({ id: "thin", edgeNet: 0.1, maxSize: 5 }), T0 + 100)).toBe("replaced");
    expect(b.upsert(makeOpportunity({ id: "deeper", edgeNet: 0.1, maxSize: 50 }), T0 + 200)).toBe("kept");

    const taken = b.take("KXNBAGAME-26FEB01OKCDEN-OKC", T0 + 300);
    expect(taken?.id).toBe("thin");
    expect(taken?.maxSize).toBe(5);
    expect(taken?.plan.map((leg) => leg.size)).toEqual([5, 5]);
  });

  test("a stale entry is replaced even by an equal edge", () => {
    const b = book();
    b.upsert(makeOpportunity({ id: "old", detectedAt: T0 }), T0);
    const outcome = b.upsert(makeOpportunity({ id: "new", detectedAt: T0 + 2500 }), T0 + 2500);
    expect(outcome).toBe("replaced");
  });

  test("take hands an opportunity out once", () => {
    const b = book();
    b.upsert(makeOpportunity(), T0);
    expect(b.take("KXNBAGAME-26FEB01OKCDEN-OKC", T0 + 1000)?.id).toBe("opp_test");
    expect(b.take("KXNBAGAME-26FEB01OKCDEN-OKC", T0 + 1000)).toBeNull();
  });

  test("an opportunity older than the staleness bound is never handed out", () => {
    const b = book();
    b.upsert(makeOpportunity({ detectedAt: T0 }), T0);
    expect(b.pendingKeys(T0 + 2001)).toEqual([]);
    expect(b.take("KXNBAGAME-26FEB01OKCDEN-OKC", T0 + 2001)).toBeNull();
    expect(b.size).toBe(0);
  });

  test("pendingKeys skips report-only opportunities", () => {
    const b = book();
    b.upsert(makeOpportunity({ pairKey: "live" }), T0);
    b.upsert(makeOpportunity({ pairKey: "report", executable: false }), T0);
    expect(b.pendingKeys(T0)).toEqual(["live"]);
  });

  test("pruneStale drops old entries", () => {
    const b = book();
    b.upsert(makeOpportunity({ pairKey: "old", detectedAt: T0 - 5000 }), T0 - 5000);
    b.upsert(makeOpportunity({ pairKey: "fresh", detectedAt: T0 }), T0);
    expect(b.pruneStale(T0)).toBe(1);
    expect(b.snapshot().map((o) => o.pairKey)).toEqual(["fresh"]);
  });
});
