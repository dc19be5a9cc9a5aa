/**
 * Latest unconsumed opportunity per matched pair.
 *
 * Entries are replaced only on a material edge change (or when the old
 * one went stale, now points at another venue or side, or is larger than
 * the liquidity just seen), so the same market is not re-dispatched on
 * every scan. `take` hands an opportunity
 * out once; anything older than the staleness window is dropped rather
 * than returned.
 */

import type { Opportunity } from "./types";

export interface OpportunityBookOptions {
  /** Opportunities older than this are never handed out (ms) */
  staleMs: number;
  /** Edge changes at or below this are treated as noise */
  edgeNoiseThreshold: number;
}

export type UpsertOutcome = "inserted" | "replaced" | "kept";

export class OpportunityBook {
  private readonly entries = new Map<string, Opportunity>();

  constructor(private readonly options: OpportunityBookOptions) {}

  isStale(opportunity: Opportunity, now: number = Date.now()): boolean {
    return now - opportunity.detectedAt > this.options.staleMs;
  }

  /**
   * Record a freshly detected opportunity for its pair.
   */
  upsert(opportunity: Opportunity, now: number = Date.now()): UpsertOutcome {
    const existing = this.entries.get(opportunity.pairKey);
    if (!existing) {
      this.entries.set(opportunity.pairKey, opportunity);
      return "inserted";
    }

    const materiallyDifferent =
      this.isStale(existing, now) ||
      existing.oddsVenue !== opportunity.oddsVenue ||
      existing.direction !== opportunity.direction ||
      existing.executable !== opportunity.executable ||
      opportunity.maxSize < existing.maxSize ||
      Math.abs(existing.edgeNet - opportunity.edgeNet) > this.options.edgeNoiseThreshold;

    if (!materiallyDifferent) return "kept";

    this.entries.set(opportunity.pairKey, opportunity);
    return "replaced";
  }

  /**
   * Remove and return the pair's opportunity if it is still fresh.
   */
  take(pairKey: string, now: number = Date.now()): Opportunity | null {
    const opportunity = this.entries.get(pairKey);
    if (!opportunity) return null;
    this.entries.delete(pairKey);
    return this.isStale(opportunity, now) ? null : opportunity;
  }

  /**
   * Drop the pair's entry without consuming it (e.g. the market vanished).
   */
  discard(pairKey: string): boolean {
    return this.entries.delete(pairKey);
  }

  /**
   * Drop every stale entry.
   *
   * @returns Number of entries dropped
   */
  pruneStale(now: number = Date.now()): number {
    let dropped = 0;
    for (const [pairKey, opportunity] of this.entries) {
      if (this.isStale(opportunity, now)) {
        this.entries.delete(pairKey);
        dropped++;
      }
    }
    return dropped;
  }

  /**
   * Pair keys with a fresh, executable opportunity waiting.
   */
  pendingKeys(now: number = Date.now()): string[] {
    const keys: string[] = [];
    for (const [pairKey, opportunity] of this.entries) {
      if (opportunity.executable && !this.isStale(opportunity, now)) {
        keys.push(pairKey);
      }
    }
    return keys;
  }

  /**
   * Copies of all entries, best edge first.
   */
  snapshot(): Opportunity[] {
    return [...this.entries.values()]
      .map((opportunity) => ({
        ...opportunity,
        plan: [{ ...opportunity.plan[0] }, { ...opportunity.plan[1] }] satisfies Opportunity["plan"],
      }))
      .sort((a, b) => b.edgeNet - a.edgeNet);
  }

  get size(): number {
    return this.entries.size;
  }
}
