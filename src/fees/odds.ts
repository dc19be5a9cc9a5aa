/**
 * Odds conversion.
 *
 * American odds to implied probability and back, decimal odds, and
 * proportional vig removal across a two-way market.
 *
 *   negative odds: p = |odds| / (|odds| + 100)
 *   positive odds: p = 100 / (odds + 100)
 *
 * +100 and -100 both denote even money; conversion back from p = 0.5
 * returns -100.
 */

/**
 * Fair probabilities after removing the bookmaker margin.
 */
export interface DevigResult {
  fairA: number;
  fairB: number;
  /** Sum of raw implied probabilities minus 1 */
  overround: number;
}

export function isValidAmericanOdds(odds: number): boolean {
  return Number.isFinite(odds) && Math.abs(odds) >= 100;
}

/**
 * Convert American odds to implied probability.
 *
 * @example
 * americanToImplied(-150) // 0.6
 * americanToImplied(150)  // 0.4
 */
export function americanToImplied(odds: number): number {
  if (!isValidAmericanOdds(odds)) {
    throw new RangeError(`Invalid American odds: ${odds}`);
  }
  if (odds < 0) {
    return -odds / (-odds + 100);
  }
  return 100 / (odds + 100);
}

/**
 * Convert an implied probability to integer American odds.
 *
 * @throws RangeError when p is not strictly between 0 and 1
 */
export function impliedToAmerican(p: number): number {
  if (!Number.isFinite(p) || p <= 0 || p >= 1) {
    throw new RangeError(`Probability must be in (0, 1), got ${p}`);
  }
  if (p >= 0.5) {
    return -Math.round((p * 100) / (1 - p));
  }
  return Math.round((100 * (1 - p)) / p);
}

/**
 * Convert American odds to decimal odds (total return per $1 staked).
 */
export function americanToDecimal(odds: number): number {
  if (!isValidAmericanOdds(odds)) {
    throw new RangeError(`Invalid American odds: ${odds}`);
  }
  if (odds > 0) {
    return 1 + odds / 100;
  }
  return 1 + 100 / -odds;
}

export function decimalToImplied(decimalOdds: number): number {
  if (!Number.isFinite(decimalOdds) || decimalOdds <= 1) {
    throw new RangeError(`Decimal odds must be > 1, got ${decimalOdds}`);
  }
  return 1 / decimalOdds;
}

/**
 * Strip the vig from a two-way market by proportional normalization.
 *
 * @example
 * devigProportional(0.6, 0.5)
 * // => { fairA: 0.5454..., fairB: 0.4545..., overround: 0.1 }
 */
export function devigProportional(impliedA: number, impliedB: number): DevigResult {
  if (!(impliedA > 0) || !(impliedB > 0)) {
    throw new RangeError(
      `Implied probabilities must be positive, got ${impliedA} and ${impliedB}`
    );
  }
  const total = impliedA + impliedB;
  return {
    fairA: impliedA / total,
    fairB: impliedB / total,
    overround: total - 1,
  };
}
