import type { AlertSeverity, AlertSink } from "../src/alerts/types";
import { createLegExecution, type ExecutionAttempt, type LegExecution } from "../src/execution/types";
import type { Instrument, MatchedLine, MatchedPair, OddsLine, OddsOutcome } from "../src/markets/types";
import type { OrderBook } from "../src/normalization/types";
import type { RiskLimits } from "../src/risk/types";
import type {
  CapacityProvider,
  Opportunity,
  PlannedLeg,
  VenueDirectory,
} from "../src/strategy/types";

export const T0 = Date.UTC(2026, 1, 1, 18, 0, 0);

export function makeInstrument(overrides: Partial<Instrument> = {}): Instrument {
  return {
    id: "KXNBAGAME-26FEB01OKCDEN-OKC",
    venue: "kalshi",
    category: "basketball_nba",
    title: "Oklahoma City at Denver Winner?",
    participants: ["Oklahoma City Thunder", "Denver Nuggets"],
    subject: "Oklahoma City Thunder",
    marketType: "winner",
    startTime: T0 + 3 * 60 * 60 * 1000,
    ...overrides,
  };
}

export function makeLine(overrides: Partial<OddsLine> = {}): OddsLine {
  return {
    id: "evt1:draftkings:h2h",
    venue: "draftkings",
    eventId: "evt1",
    category: "basketball_nba",
    homeTeam: "Denver Nuggets",
    awayTeam: "Oklahoma City Thunder",
    startTime: T0 + 3 * 60 * 60 * 1000,
    marketType: "moneyline",
    outcomes: [
      { name: "Oklahoma City Thunder", price: -150 },
      { name: "Denver Nuggets", price: 150 },
    ],
    ts: T0,
    ...overrides,
  };
}

/**
 * Pair with one line per given venue. `subject` pays on side A.
 */
export function makePair(
  lines: Array<{ venue: string; subject: OddsOutcome; other: OddsOutcome }>,
  ts: number = T0
): MatchedPair {
  const instrument = makeInstrument();
  const matched: MatchedLine[] = lines.map(({ venue, subject, other }) => ({
    line: makeLine({
      id: `evt1:${venue}:h2h`,
      venue,
      outcomes: [subject, other],
      ts,
    }),
    confidence: 0.95,
    basis: { nameSimilarity: 1, timeProximity: 1, marketTypes: ["winner", "moneyline"] },
    outcomeFor: { A: subject, B: other },
  }));
  return { key: instrument.id, instrument, lines: matched, confidence: 0.95 };
}

export function makeBook(
  askA: number,
  askB: number,
  sizes: { a?: number; b?: number } = {},
  ts: number = T0
): OrderBook {
  return {
    venue: "kalshi",
    instrumentId: "KXNBAGAME-26FEB01OKCDEN-OKC",
    sides: {
      A: { bid: 0, bidSize: 0, ask: askA, askSize: sizes.a ?? 100 },
      B: { bid: 0, bidSize: 0, ask: askB, askSize: sizes.b ?? 100 },
    },
    ts,
  };
}

export function fixedCapacity(
  perBetCap: number = 50,
  remainingDaily: number = 250,
  headroom: number = 500
): CapacityProvider {
  return {
    capacityFor: () => ({ perBetCap, remainingDaily }),
    globalHeadroom: () => headroom,
  };
}

export const allVenuesTrade: VenueDirectory = {
  canTrade: () => true,
  expectedConfirmMs: (venue) => (venue === "kalshi" ? 500 : 2000),
};

export function makeLeg(overrides: Partial<PlannedLeg> = {}): PlannedLeg {
  return {
    role: "exchange",
    venue: "kalshi",
    instrumentId: "KXNBAGAME-26FEB01OKCDEN-OKC",
    side: "A",
    price: { kind: "probability", value: 0.4 },
    unitCost: 0.4,
    size: 10,
    availableSize: 10,
    expectedConfirmMs: 500,
    ...overrides,
  };
}

/**
 * Exchange buy of side A at 0.40 hedged with side B at +150 (0.40), 10 contracts.
 */
export function makeOpportunity(overrides: Partial<Opportunity> = {}): Opportunity {
  const size = overrides.maxSize ?? 10;
  return {
    id: "opp_test",
    pairKey: "KXNBAGAME-26FEB01OKCDEN-OKC",
    direction: "A",
    oddsVenue: "draftkings",
    oddsLineId: "evt1:draftkings:h2h",
    edgeGross: 0.05,
    edgeNet: 0.05,
    maxSize: size,
    confidence: 0.95,
    detectedAt: T0,
    plan: [
      makeLeg({ size }),
      makeLeg({
        role: "odds",
        venue: "draftkings",
        instrumentId: "evt1:draftkings:h2h",
        side: "B",
        outcome: "Denver Nuggets",
        price: { kind: "american", value: 150 },
        unitCost: 0.4,
        size,
        availableSize: Number.POSITIVE_INFINITY,
        expectedConfirmMs: 2000,
      }),
    ],
    executable: true,
    reason: "test",
    ...overrides,
  };
}

export interface RecordedAlert {
  severity: AlertSeverity;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Alert sink that keeps everything it is given.
 */
export class RecordingAlertSink implements AlertSink {
  readonly alerts: RecordedAlert[] = [];

  notify(severity: AlertSeverity, message: string, context?: Record<string, unknown>): void {
    this.alerts.push({ severity, message, context });
  }
}

export const TEST_LIMITS: RiskLimits = {
  defaultVenueLimits: { perBetCap: 50, dailyVolumeCap: 250 },
  venueLimits: {},
  maxGlobalExposure: 500,
  maxDailyLoss: 50,
  maxDrawdown: 100,
  minActionableSize: 1,
  staleMs: 2000,
  throttleRejectCount: 3,
  throttleWindowMs: 600_000,
};

/**
 * Mutable clock for tests.
 */
export class TestClock {
  constructor(public now: number = T0) {}

  readonly read = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

function filledLeg(planned: PlannedLeg, requested: number, filled: number): LegExecution {
  return {
    ...createLegExecution(planned, requested),
    state: filled >= requested ? "filled" : filled > 0 ? "partially_filled" : "rejected",
    filledSize: filled,
    avgPrice: filled > 0 ? planned.unitCost : null,
  };
}

/**
 * Terminal attempt with the given fills, priced at the plan's unit costs.
 */
export function makeAttempt(
  fills: { leg1: number; leg2: number },
  opportunity: Opportunity = makeOpportunity()
): ExecutionAttempt {
  const [first, second] = opportunity.plan;
  const hedgedSize = Math.min(fills.leg1, fills.leg2);
  return {
    id: "exec_test",
    opportunity,
    state: fills.leg2 >= fills.leg1 ? "both_filled" : fills.leg2 > 0 ? "leg2_partial_fill" : "leg2_rejected",
    outcome: fills.leg2 >= fills.leg1 ? "both_filled" : fills.leg2 > 0 ? "leg2_partial_fill" : "naked_exposure",
    leg1: filledLeg(first, opportunity.maxSize, fills.leg1),
    leg2: filledLeg(second, fills.leg1, fills.leg2),
    transitions: [{ state: "planned", ts: T0 }],
    startTs: T0,
    endTs: T0 + 100,
    expectedEdgeNet: opportunity.edgeNet,
    realizedEdge: null,
    hedgedSize,
    unhedgedSize: fills.leg1 - hedgedSize,
    positionId: null,
    dryRun: false,
    error: null,
  };
}
