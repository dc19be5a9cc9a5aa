/**
 * Fee estimation per venue.
 *
 * Exchange (Kalshi-style): fee = ceil_cents(rate * contracts * price * (1 - price))
 *   - Parabolic: max fee at price=0.50, zero at extremes
 *   - Rounded up to nearest cent ($0.01)
 *
 * Commission venues: rate * contracts * (1 - price)
 *   - Charged on net winnings of a contract bought at `price`
 *
 * Sportsbooks with the margin built into their prices use the `none` model;
 * the margin is removed by de-vigging instead.
 */

export type FeeModel =
  | { kind: "none" }
  | { kind: "kalshi"; rate: number }
  | { kind: "commission"; rate: number };

export const KALSHI_FEE_RATE = 0.07;

export const NO_FEES: FeeModel = { kind: "none" };

export const KALSHI_FEES: FeeModel = { kind: "kalshi", rate: KALSHI_FEE_RATE };

/**
 * Round up to nearest cent ($0.01).
 */
function ceilCents(dollars: number): number {
  return Math.ceil(dollars * 100) / 100;
}

/**
 * Estimate the exchange fee for one leg.
 *
 * Max fee at price = 0.50: ceil_cents(0.07 * 1 * 0.25) = $0.02
 *
 * @param price - Fill price (0-1)
 * @param qty - Number of contracts
 */
export function estimateKalshiFee(
  price: number,
  qty: number,
  rate: number = KALSHI_FEE_RATE
): number {
  const raw = rate * qty * price * (1 - price);
  return ceilCents(raw);
}

/**
 * Estimate the fee in dollars for a leg of `qty` contracts at `price`.
 */
export function estimateLegFee(model: FeeModel, price: number, qty: number): number {
  if (qty <= 0) return 0;
  switch (model.kind) {
    case "none":
      return 0;
    case "kalshi":
      return estimateKalshiFee(price, qty, model.rate);
    case "commission":
      return model.rate * qty * (1 - price);
  }
}

/**
 * Fee per contract, amortized over the leg size.
 */
export function feePerContract(model: FeeModel, price: number, qty: number = 1): number {
  const size = Math.max(1, qty);
  return estimateLegFee(model, price, size) / size;
}

export function exchangeFeePerContract(
  model: FeeModel,
  price: number,
  qty: number = 1
): number {
  return feePerContract(model, price, qty);
}

/**
 * Effective price paid for an exchange contract once fees are included.
 */
export function feeAdjustedExchangePrice(
  model: FeeModel,
  price: number,
  qty: number = 1
): number {
  return price + exchangeFeePerContract(model, price, qty);
}

/**
 * Odds-venue probability net of the venue's fee. Fees lower the value
 * of the hedge side, so they are subtracted.
 */
export function feeAdjustedOddsProb(
  model: FeeModel,
  prob: number,
  qty: number = 1
): number {
  return prob - feePerContract(model, prob, qty);
}

export function describeFeeModel(model: FeeModel): string {
  switch (model.kind) {
    case "none":
      return "none";
    case "kalshi":
      return `kalshi(${model.rate})`;
    case "commission":
      return `commission(${model.rate})`;
  }
}
