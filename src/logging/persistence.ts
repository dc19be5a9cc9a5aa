/**
 * Append-only record of scans, opportunities, cross-book reports and
 * attempts for replay.
 *
 * One JSON object per line, one file per UTC day:
 * <dir>/records_YYYY-MM-DD.jsonl
 *
 * Never read back while the engine runs.
 */

import { join } from "node:path";
import { appendFile, mkdir } from "node:fs/promises";
import type { ExecutionAttempt } from "../execution/types";
import type { CrossBookOpportunity, Opportunity } from "../strategy/types";
import { formatDay } from "../time/day";
import type { Logger } from "./logger";

export interface ScanRecord {
  type: "scan";
  ts: number;
  instruments: number;
  lines: number;
  pairs: number;
  opportunities: number;
  staleLines: number;
  staleBooks: number;
  /** Report-only opportunities between odds venues */
  crossBook: number;
  failures: string[];
  durationMs: number;
}

export interface OpportunityRecord {
  type: "opportunity";
  ts: number;
  opportunity: Opportunity;
}

export interface AttemptRecord {
  type: "attempt";
  ts: number;
  attempt: ExecutionAttempt;
}

export interface CrossBookRecord {
  type: "cross_book";
  ts: number;
  opportunity: CrossBookOpportunity;
}

export type PersistenceRecord = ScanRecord | OpportunityRecord | AttemptRecord | CrossBookRecord;

export interface PersistenceSink {
  /** Queue a record; never blocks the caller */
  append(record: PersistenceRecord): void;
}

export class JsonlPersistenceSink implements PersistenceSink {
  private chain: Promise<void> = Promise.resolve();

  constructor(
    private readonly dir: string,
    private readonly logger: Logger
  ) {}

  filePathFor(ts: number): string {
    return join(this.dir, `records_${formatDay(ts)}.jsonl`);
  }

  append(record: PersistenceRecord): void {
    const line = JSON.stringify(record) + "\n";
    const filePath = this.filePathFor(record.ts);

    // Chained so lines land in call order
    this.chain = this.chain
      .then(async () => {
        await mkdir(this.dir, { recursive: true });
        await appendFile(filePath, line, { encoding: "utf-8" });
      })
      .catch((error: unknown) => {
        this.logger.error(`Failed to persist ${record.type} record`, {
          filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      });
  }

  /**
   * Resolves once every queued record has been written (or failed).
   */
  flush(): Promise<void> {
    return this.chain;
  }
}

/**
 * Sink that drops everything (persistence disabled).
 */
export class NullPersistenceSink implements PersistenceSink {
  append(_record: PersistenceRecord): void {}
}
