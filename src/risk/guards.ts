/**
 * Pre-trade guard conditions.
 *
 * Pure functions that check whether an opportunity may be executed.
 * All guards return { pass: true } or { pass: false, reason: string }.
 */

import type { GuardResult, PreTradeContext } from "./types";

/**
 * Kill switch halts everything until reset.
 */
export function checkKillSwitch(halted: boolean, reason: string | null): GuardResult {
  if (!halted) {
    return { pass: true };
  }
  return {
    pass: false,
    reason: `Kill switch active${reason ? `: ${reason}` : ""}`,
  };
}

/**
 * Opportunities older than the staleness window are never executed.
 */
export function checkFresh(ageMs: number, staleMs: number): GuardResult {
  if (ageMs <= staleMs) {
    return { pass: true };
  }
  return {
    pass: false,
    reason: `Opportunity is ${ageMs}ms old (max ${staleMs}ms)`,
  };
}

export function checkExecutable(executable: boolean): GuardResult {
  if (executable) {
    return { pass: true };
  }
  return { pass: false, reason: "A leg venue cannot take orders" };
}

export function checkVenueNotFlagged(venue: string, flagReason: string | null): GuardResult {
  if (flagReason === null) {
    return { pass: true };
  }
  return {
    pass: false,
    reason: `${venue} is flagged: ${flagReason}`,
  };
}

/**
 * Check if the plan is large enough to act on.
 */
export function checkMinSize(size: number, minSize: number): GuardResult {
  if (size >= minSize) {
    return { pass: true };
  }
  return {
    pass: false,
    reason: `Size ${size} < minimum actionable ${minSize}`,
  };
}

export function checkPerBetCap(venue: string, notional: number, cap: number): GuardResult {
  if (notional <= cap) {
    return { pass: true };
  }
  return {
    pass: false,
    reason: `${venue} bet $${notional.toFixed(2)} > per-bet cap $${cap.toFixed(2)}`,
  };
}

export function checkDailyVolume(
  venue: string,
  used: number,
  notional: number,
  cap: number
): GuardResult {
  const projected = used + notional;
  if (projected <= cap) {
    return { pass: true };
  }
  return {
    pass: false,
    reason: `${venue} daily volume $${used.toFixed(2)} + $${notional.toFixed(2)} = $${projected.toFixed(2)} > cap $${cap.toFixed(2)}`,
  };
}

/**
 * Check if adding this trade stays within global exposure.
 */
export function checkNotional(
  currentNotional: number,
  maxNotional: number,
  estimatedCost: number
): GuardResult {
  const newTotal = currentNotional + estimatedCost;
  if (newTotal <= maxNotional) {
    return { pass: true };
  }
  return {
    pass: false,
    reason: `Exposure ${currentNotional.toFixed(2)} + ${estimatedCost.toFixed(2)} = ${newTotal.toFixed(2)} > max ${maxNotional.toFixed(2)}`,
  };
}

export function checkBankroll(estimatedCost: number, available: number | null): GuardResult {
  if (available === null || estimatedCost <= available) {
    return { pass: true };
  }
  return {
    pass: false,
    reason: `Cost $${estimatedCost.toFixed(2)} > available bankroll $${available.toFixed(2)}`,
  };
}

/**
 * Check that the attempt's worst case cannot breach the daily loss limit.
 *
 * @example
 * // Limit $50, already -$48, worst case $5 → -$53 breaches
 * checkDailyLoss(-48, 5, 50) // { pass: false, ... }
 */
export function checkDailyLoss(
  dailyRealizedPnl: number,
  worstCaseLoss: number,
  maxDailyLoss: number
): GuardResult {
  const projected = dailyRealizedPnl - worstCaseLoss;
  if (-projected < maxDailyLoss) {
    return { pass: true };
  }
  return {
    pass: false,
    reason:
      `Daily P&L $${dailyRealizedPnl.toFixed(2)} with worst case -$${worstCaseLoss.toFixed(2)} ` +
      `would reach -$${(-projected).toFixed(2)} (limit -$${maxDailyLoss.toFixed(2)})`,
  };
}

/**
 * Run all pre-trade guards.
 *
 * Returns the first failing guard result, or { pass: true } if all pass.
 */
export function runPreTradeGuards(context: PreTradeContext): GuardResult {
  // Kill switch takes priority
  const killSwitchResult = checkKillSwitch(context.halted, context.haltReason);
  if (!killSwitchResult.pass) return killSwitchResult;

  const freshResult = checkFresh(context.opportunityAgeMs, context.staleMs);
  if (!freshResult.pass) return freshResult;

  const executableResult = checkExecutable(context.executable);
  if (!executableResult.pass) return executableResult;

  for (const leg of context.legs) {
    const flagResult = checkVenueNotFlagged(leg.venue, leg.flagReason);
    if (!flagResult.pass) return flagResult;
  }

  const sizeResult = checkMinSize(context.size, context.minActionableSize);
  if (!sizeResult.pass) return sizeResult;

  for (const leg of context.legs) {
    const betResult = checkPerBetCap(leg.venue, leg.notional, leg.perBetCap);
    if (!betResult.pass) return betResult;

    const volumeResult = checkDailyVolume(
      leg.venue,
      leg.dailyVolumeUsed,
      leg.notional,
      leg.dailyVolumeCap
    );
    if (!volumeResult.pass) return volumeResult;
  }

  const notionalResult = checkNotional(
    context.globalExposure,
    context.maxGlobalExposure,
    context.estimatedCost
  );
  if (!notionalResult.pass) return notionalResult;

  const bankrollResult = checkBankroll(context.estimatedCost, context.availableBankroll);
  if (!bankrollResult.pass) return bankrollResult;

  return checkDailyLoss(context.dailyRealizedPnl, context.worstCaseLoss, context.maxDailyLoss);
}
