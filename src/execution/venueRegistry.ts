/**
 * Venue registry.
 *
 * Knows which venues can take orders and how long each usually takes to
 * confirm a fill. In dry-run mode every venue routes to the paper router.
 */

import type { VenueDirectory } from "../strategy/types";
import type { OrderRouter } from "../venues/types";

export interface VenueRegistryOptions {
  dryRun: boolean;
  /** Router used for every venue in dry-run mode */
  paperRouter: OrderRouter;
  /** Confirmation latency assumed for venues without a profile (ms) */
  defaultConfirmMs: number;
}

interface VenueProfile {
  router: OrderRouter | null;
  expectedConfirmMs: number;
}

export class VenueRegistry implements VenueDirectory {
  private readonly profiles = new Map<string, VenueProfile>();

  constructor(private readonly options: VenueRegistryOptions) {}

  /**
   * Register a venue. Without a router it is read-only.
   */
  register(venue: string, expectedConfirmMs: number, router: OrderRouter | null = null): void {
    this.profiles.set(venue, { router, expectedConfirmMs });
  }

  get dryRun(): boolean {
    return this.options.dryRun;
  }

  canTrade(venue: string): boolean {
    return this.routerFor(venue) !== null;
  }

  expectedConfirmMs(venue: string): number {
    return this.profiles.get(venue)?.expectedConfirmMs ?? this.options.defaultConfirmMs;
  }

  routerFor(venue: string): OrderRouter | null {
    if (this.options.dryRun) return this.options.paperRouter;
    return this.profiles.get(venue)?.router ?? null;
  }

  venues(): string[] {
    return [...this.profiles.keys()];
  }
}
