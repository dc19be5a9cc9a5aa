/**
 * Ban/throttle detection.
 *
 * Counts leg-2 rejections per venue inside a sliding window. Reaching the
 * threshold signals that the venue is limiting the account.
 */
export class ThrottleDetector {
  private readonly rejections = new Map<string, number[]>();

  constructor(
    private readonly threshold: number,
    private readonly windowMs: number
  ) {}

  /**
   * Record a rejection.
   *
   * @returns true when the venue has reached the threshold
   */
  record(venue: string, now: number = Date.now()): boolean {
    const recent = this.prune(venue, now);
    recent.push(now);
    this.rejections.set(venue, recent);
    return recent.length >= this.threshold;
  }

  count(venue: string, now: number = Date.now()): number {
    return this.prune(venue, now).length;
  }

  reset(venue: string): void {
    this.rejections.delete(venue);
  }

  private prune(venue: string, now: number): number[] {
    const cutoff = now - this.windowMs;
    return (this.rejections.get(venue) ?? []).filter((ts) => ts > cutoff);
  }
}
