/**
 * Metrics tracking module.
 *
 * Provides:
 * - Latency statistics (leg fills, leg 1 → leg 2, total execution, scan cycle)
 * - Counters (scans, opportunities, attempts by outcome)
 * - Metrics summary for periodic status logging
 */

import type { AttemptOutcome } from "../execution/types";

/**
 * Latency statistics for a specific metric.
 */
export interface LatencyStats {
  /** Minimum latency in ms */
  min: number;
  /** Maximum latency in ms */
  max: number;
  /** Average latency in ms */
  avg: number;
  /** 99th percentile latency in ms */
  p99: number;
  /** Number of samples */
  count: number;
}

export interface EngineCounters {
  scanCycles: number;
  scanFailures: number;
  opportunitiesDetected: number;
  attempts: Record<AttemptOutcome, number>;
}

export interface AllLatencyStats {
  scanCycle: LatencyStats;
  leg1Fill: LatencyStats;
  leg2Fill: LatencyStats;
  leg1ToLeg2: LatencyStats;
  totalExecution: LatencyStats;
}

type LatencyMetric = keyof AllLatencyStats;

/** Maximum samples to keep per metric (rolling window) */
const MAX_SAMPLES = 1000;

function emptyAttemptCounts(): Record<AttemptOutcome, number> {
  return {
    both_filled: 0,
    leg2_partial_fill: 0,
    abandoned: 0,
    naked_exposure: 0,
    cancelled: 0,
    rejected_pretrade: 0,
  };
}

const samples: Record<LatencyMetric, number[]> = {
  scanCycle: [],
  leg1Fill: [],
  leg2Fill: [],
  leg1ToLeg2: [],
  totalExecution: [],
};

const counters: EngineCounters = {
  scanCycles: 0,
  scanFailures: 0,
  opportunitiesDetected: 0,
  attempts: emptyAttemptCounts(),
};

/**
 * Calculate statistics from an array of samples.
 */
function calculateStats(arr: readonly number[]): LatencyStats {
  if (arr.length === 0) {
    return { min: 0, max: 0, avg: 0, p99: 0, count: 0 };
  }

  const sorted = [...arr].sort((a, b) => a - b);
  const sum = arr.reduce((acc, val) => acc + val, 0);
  const p99Index = Math.min(Math.floor(arr.length * 0.99), sorted.length - 1);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: sum / arr.length,
    p99: sorted[p99Index],
    count: arr.length,
  };
}

// === Recording functions ===

export function recordLatency(metric: LatencyMetric, ms: number): void {
  const arr = samples[metric];
  arr.push(ms);
  if (arr.length > MAX_SAMPLES) {
    arr.shift();
  }
}

export function incrementScanCycles(failed: boolean = false): void {
  counters.scanCycles++;
  if (failed) counters.scanFailures++;
}

export function incrementOpportunities(count: number = 1): void {
  counters.opportunitiesDetected += count;
}

export function incrementAttempts(outcome: AttemptOutcome): void {
  counters.attempts[outcome]++;
}

// === Query functions ===

export function getLatencyStats(): AllLatencyStats {
  return {
    scanCycle: calculateStats(samples.scanCycle),
    leg1Fill: calculateStats(samples.leg1Fill),
    leg2Fill: calculateStats(samples.leg2Fill),
    leg1ToLeg2: calculateStats(samples.leg1ToLeg2),
    totalExecution: calculateStats(samples.totalExecution),
  };
}

export function getCounters(): EngineCounters {
  return { ...counters, attempts: { ...counters.attempts } };
}

/**
 * Get a formatted metrics summary string for logging.
 */
export function getMetricsSummary(): string {
  const stats = getLatencyStats();
  const c = counters;
  const lines: string[] = [];

  lines.push("=== Engine Metrics ===");
  lines.push(`Scans: ${c.scanCycles} (${c.scanFailures} failed)`);
  lines.push(`Opportunities: ${c.opportunitiesDetected}`);
  lines.push(
    `Attempts: both_filled=${c.attempts.both_filled} partial=${c.attempts.leg2_partial_fill} ` +
      `abandoned=${c.attempts.abandoned} naked=${c.attempts.naked_exposure} ` +
      `cancelled=${c.attempts.cancelled} ` +
      `rejected=${c.attempts.rejected_pretrade}`
  );

  const labels: ReadonlyArray<[LatencyMetric, string]> = [
    ["scanCycle", "Scan cycle"],
    ["leg1Fill", "Leg 1 submit->fill"],
    ["leg2Fill", "Leg 2 submit->fill"],
    ["leg1ToLeg2", "Leg 1 -> Leg 2"],
    ["totalExecution", "Total execution"],
  ];

  for (const [metric, label] of labels) {
    const stat = stats[metric];
    if (stat.count === 0) continue;
    lines.push(
      `${label}: avg=${stat.avg.toFixed(1)}ms, p99=${stat.p99.toFixed(1)}ms, n=${stat.count}`
    );
  }

  return lines.join("\n");
}

/**
 * Reset all metrics (for testing or new session).
 */
export function resetMetrics(): void {
  for (const arr of Object.values(samples)) {
    arr.length = 0;
  }
  counters.scanCycles = 0;
  counters.scanFailures = 0;
  counters.opportunitiesDetected = 0;
  counters.attempts = emptyAttemptCounts();
}
