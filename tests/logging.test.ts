import { afterEach, describe, test, expect, vi } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { formatLogEntry } from "../src/logging/fileLogger";
import { createLogger, createSilentLogger } from "../src/logging/logger";
import {
  getMetricsSummary,
  incrementAttempts,
  incrementOpportunities,
  incrementScanCycles,
  recordLatency,
  resetMetrics,
} from "../src/logging/metrics";
import { JsonlPersistenceSink, type ScanRecord } from "../src/logging/persistence";
import { T0 } from "./fixtures";

function scanRecord(ts: number): ScanRecord {
  return {
    type: "scan",
    ts,
    instruments: 2,
    lines: 3,
    pairs: 1,
    opportunities: 0,
    staleLines: 0,
    staleBooks: 0,
    crossBook: 0,
    failures: [],
    durationMs: 12,
  };
}

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("drops messages below the level and prints data as JSON", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger("warn");

    logger.info("hidden");
    logger.warn("venue slow", { venue: "kalshi" });

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toMatch(/\[WARN\] venue slow \{"venue":"kalshi"\}$/);
  });
});

describe("formatLogEntry", () => {
  test("one line per entry", () => {
    expect(
      formatLogEntry({ timestamp: "2026-02-01T18:00:00.000Z", type: "ERROR", data: { attemptId: "exec_1" } })
    ).toBe('[2026-02-01T18:00:00.000Z] [ERROR] {"attemptId":"exec_1"}\n');
  });
});

describe("metrics", () => {
  test("summary lists counters and recorded latencies", () => {
    resetMetrics();
    incrementScanCycles();
    incrementScanCycles(true);
    incrementOpportunities(2);
    incrementAttempts("both_filled");
    recordLatency("scanCycle", 10);
    recordLatency("scanCycle", 30);

    expect(getMetricsSummary().split("\n")).toEqual([
      "=== Engine Metrics ===",
      "Scans: 2 (1 failed)",
      "Opportunities: 2",
      "Attempts: both_filled=1 partial=0 abandoned=0 naked=0 cancelled=0 rejected=0",
      "Scan cycle: avg=20.0ms, p99=30.0ms, n=2",
    ]);
  });
});

describe("JsonlPersistenceSink", () => {
  test("appends one JSON line per record into a file per UTC day", async () => {
    const dir = await mkdtemp(join(tmpdir(), "arb-records-"));
    try {
      const sink = new JsonlPersistenceSink(dir, createSilentLogger());
      const nextDay = T0 + 24 * 60 * 60 * 1000;
      sink.append(scanRecord(T0));
      sink.append(scanRecord(T0 + 1000));
      sink.append(scanRecord(nextDay));
      await sink.flush();

      expect(sink.filePathFor(T0)).toBe(join(dir, "records_2026-02-01.jsonl"));
      const first = (await readFile(sink.filePathFor(T0), "utf-8")).trim().split("\n");
      expect(first.map((line) => JSON.parse(line))).toEqual([scanRecord(T0), scanRecord(T0 + 1000)]);
      const second = await readFile(join(dir, "records_2026-02-02.jsonl"), "utf-8");
      expect(JSON.parse(second)).toEqual(scanRecord(nextDay));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
