/**
 * Exposure ledger - the only shared mutable state in the engine.
 *
 * Tracks per venue:
 * - Open notional and in-flight reservations
 * - Daily volume and realized P&L (reset at UTC midnight)
 * - Throttle/ban flags
 * and globally the open positions and the cumulative P&L high-water mark.
 *
 * Every read-modify-write goes through `transact`, which serializes
 * writers behind one async mutex. `snapshot` hands readers a copy.
 */

import { AsyncMutex } from "../utils/mutex";
import { getDayStart } from "../time/day";
import type {
  LedgerSnapshot,
  Position,
  Reservation,
  ReservationLeg,
  VenueExposure,
  VenueFlag,
} from "./types";

interface LedgerState {
  dayStart: number;
  venues: Map<string, VenueExposure>;
  positions: Map<string, Position>;
  reservations: Map<string, Reservation>;
  cumulativeRealizedPnl: number;
  highWaterMark: number;
}

function emptyVenue(venue: string): VenueExposure {
  return {
    venue,
    openNotional: 0,
    pendingNotional: 0,
    dailyVolume: 0,
    dailyRealizedPnl: 0,
    flag: null,
    lastActivityTs: null,
  };
}

function copyPosition(position: Position): Position {
  return { ...position, legs: position.legs.map((leg) => ({ ...leg })) };
}

/**
 * Write access handed to a transaction. Only valid inside `transact`.
 */
export class LedgerWriter {
  constructor(
    private readonly state: LedgerState,
    readonly now: number
  ) {}

  venue(venue: string): VenueExposure {
    let exposure = this.state.venues.get(venue);
    if (!exposure) {
      exposure = emptyVenue(venue);
      this.state.venues.set(venue, exposure);
    }
    return exposure;
  }

  globalOpenNotional(): number {
    let total = 0;
    for (const exposure of this.state.venues.values()) total += exposure.openNotional;
    return total;
  }

  globalPendingNotional(): number {
    let total = 0;
    for (const exposure of this.state.venues.values()) total += exposure.pendingNotional;
    return total;
  }

  dailyRealizedPnl(): number {
    let total = 0;
    for (const exposure of this.state.venues.values()) total += exposure.dailyRealizedPnl;
    return total;
  }

  cumulativeRealizedPnl(): number {
    return this.state.cumulativeRealizedPnl;
  }

  reserve(id: string, opportunityId: string, legs: ReservationLeg[]): Reservation {
    const reservation: Reservation = {
      id,
      opportunityId,
      legs: legs.map((leg) => ({ ...leg })),
      createdAt: this.now,
    };
    for (const leg of legs) {
      this.venue(leg.venue).pendingNotional += leg.notional;
    }
    this.state.reservations.set(id, reservation);
    return reservation;
  }

  /**
   * @returns false when the reservation was already released
   */
  release(id: string): boolean {
    const reservation = this.state.reservations.get(id);
    if (!reservation) return false;
    for (const leg of reservation.legs) {
      const exposure = this.venue(leg.venue);
      exposure.pendingNotional = Math.max(0, exposure.pendingNotional - leg.notional);
    }
    this.state.reservations.delete(id);
    return true;
  }

  /**
   * Record traded dollars at a venue (volume and open notional).
   */
  recordTrade(venue: string, notional: number): void {
    const exposure = this.venue(venue);
    exposure.dailyVolume += notional;
    exposure.openNotional += notional;
    exposure.lastActivityTs = this.now;
  }

  /**
   * Remove notional from a venue when a position settles or closes.
   */
  releaseNotional(venue: string, notional: number): void {
    const exposure = this.venue(venue);
    exposure.openNotional = Math.max(0, exposure.openNotional - notional);
  }

  touch(venue: string): void {
    this.venue(venue).lastActivityTs = this.now;
  }

  realize(venue: string, pnl: number): void {
    this.venue(venue).dailyRealizedPnl += pnl;
    this.state.cumulativeRealizedPnl += pnl;
    this.state.highWaterMark = Math.max(
      this.state.highWaterMark,
      this.state.cumulativeRealizedPnl
    );
  }

  addPosition(position: Position): void {
    this.state.positions.set(position.id, position);
  }

  position(id: string): Position | undefined {
    return this.state.positions.get(id);
  }

  flag(venue: string, reason: string): VenueFlag {
    const flag: VenueFlag = { reason, since: this.now };
    this.venue(venue).flag = flag;
    return flag;
  }

  clearFlag(venue: string): boolean {
    const exposure = this.state.venues.get(venue);
    if (!exposure || !exposure.flag) return false;
    exposure.flag = null;
    return true;
  }
}

export class ExposureLedger {
  private readonly mutex = new AsyncMutex();
  private readonly state: LedgerState;

  constructor(private readonly clock: () => number = Date.now) {
    this.state = {
      dayStart: getDayStart(clock()),
      venues: new Map(),
      positions: new Map(),
      reservations: new Map(),
      cumulativeRealizedPnl: 0,
      highWaterMark: 0,
    };
  }

  /**
   * Run a read-modify-write under the ledger lock.
   */
  transact<T>(fn: (writer: LedgerWriter) => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => {
      const now = this.clock();
      this.rollover(now);
      return fn(new LedgerWriter(this.state, now));
    });
  }

  /**
   * Point-in-time copy. Daily fields read as zero once the day has
   * rolled over, even before the next write resets them.
   */
  snapshot(now: number = this.clock()): LedgerSnapshot {
    const dayStart = getDayStart(now);
    const newDay = dayStart !== this.state.dayStart;

    const venues: Record<string, VenueExposure> = {};
    let globalOpenNotional = 0;
    let globalPendingNotional = 0;
    let dailyRealizedPnl = 0;

    for (const [venue, exposure] of this.state.venues) {
      const copy: VenueExposure = {
        ...exposure,
        flag: exposure.flag ? { ...exposure.flag } : null,
        dailyVolume: newDay ? 0 : exposure.dailyVolume,
        dailyRealizedPnl: newDay ? 0 : exposure.dailyRealizedPnl,
      };
      venues[venue] = copy;
      globalOpenNotional += copy.openNotional;
      globalPendingNotional += copy.pendingNotional;
      dailyRealizedPnl += copy.dailyRealizedPnl;
    }

    const positions = [...this.state.positions.values()].map(copyPosition);
    const unrealizedPnl = positions
      .filter((position) => position.status === "open" && position.lockedPnl !== null)
      .reduce((sum, position) => sum + (position.lockedPnl ?? 0), 0);

    return {
      dayStart,
      venues,
      positions,
      reservations: [...this.state.reservations.values()].map((reservation) => ({
        ...reservation,
        legs: reservation.legs.map((leg) => ({ ...leg })),
      })),
      globalOpenNotional,
      globalPendingNotional,
      dailyRealizedPnl,
      cumulativeRealizedPnl: this.state.cumulativeRealizedPnl,
      highWaterMark: this.state.highWaterMark,
      unrealizedPnl,
    };
  }

  venue(venue: string, now: number = this.clock()): VenueExposure {
    return this.snapshot(now).venues[venue] ?? emptyVenue(venue);
  }

  private rollover(now: number): void {
    const dayStart = getDayStart(now);
    if (dayStart === this.state.dayStart) return;

    this.state.dayStart = dayStart;
    for (const exposure of this.state.venues.values()) {
      exposure.dailyVolume = 0;
      exposure.dailyRealizedPnl = 0;
    }
  }
}
