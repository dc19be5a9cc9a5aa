/**
 * Default risk and execution parameters.
 *
 * Every value can be overridden through the environment (see config.ts).
 * Dollar amounts are per UTC day where noted.
 */

export const RISK_PARAMS = {
  /** Minimum net edge (probability points) required to emit an opportunity */
  minEdgeNet: 0.02,
  /** Edges within this distance of the best count as equivalent venues */
  equivalentEdgeTolerance: 0.005,
  /** Edge changes at or below this do not replace an unconsumed opportunity */
  edgeNoiseThreshold: 0.005,
  /** Maximum contracts per leg (hard cap for dynamic sizing) */
  maxContractsPerTrade: 500,
  /** Snapshots older than this are not used for detection (ms) */
  quoteFreshnessMs: 5000,
  /** Opportunities older than this are never executed (ms) */
  staleMs: 2000,

  /** Maximum notional of a single leg ($) */
  perBetCap: 50,
  /** Maximum notional traded per venue per day ($) */
  dailyVolumeCap: 250,
  /** Maximum open plus in-flight notional across venues ($) */
  maxGlobalExposure: 500,
  /** Daily realized loss that trips the kill switch ($) */
  maxDailyLoss: 50,
  /** Drawdown from the realized P&L high-water mark that trips the kill switch ($) */
  maxDrawdown: 100,
  /** Smallest plan worth executing (contracts) */
  minActionableSize: 1,
  /** Leg-2 rejections at one venue within the window that flag it */
  throttleRejectCount: 3,
  throttleWindowMs: 10 * 60 * 1000,

  /** Leg 1 fill wait; leg 1 is the thinner side (ms) */
  leg1TimeoutMs: 3000,
  /** Leg 2 fill wait (ms) */
  leg2TimeoutMs: 10000,
  /** Order status poll interval (ms) */
  pollIntervalMs: 250,
  /** Per-pair pause after a successful attempt (ms) */
  cooldownMsAfterSuccess: 1000,
  /** Per-pair pause after a failed attempt (ms) */
  cooldownMsAfterFailure: 3000,

  /** Minimum edge (1 - sum of implied) for a report-only arbitrage between odds venues */
  crossBookMinEdge: 0.005,
  /** Minimum edge over the cross-venue consensus for a value bet */
  valueBetMinEdge: 0.05,
  /** Odds venues needed to form a consensus */
  valueBetMinBooks: 3,
  /** Stake across both legs of a cross-book arbitrage ($) */
  crossBookMaxTotal: 100,
  /** Largest single cross-book stake ($) */
  crossBookMaxLegStake: 50,

  /** Market-data spend allowance ($) */
  apiBudget: 60,
  /** Capital the engine may commit ($) */
  bankroll: 200,
  /** Capital held back until the record supports releasing it ($) */
  reserve: 740,

  /** Typical fill confirmation latency per venue kind (ms) */
  exchangeConfirmMs: 500,
  oddsVenueConfirmMs: 2000,
} as const;

export type RiskParams = typeof RISK_PARAMS;
