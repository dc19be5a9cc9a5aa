/**
 * Paper trading router.
 *
 * Fills every order immediately at its limit price, up to the liquidity
 * displayed when it was planned. Used for dry runs, where it stands in
 * for every venue.
 */

import { RejectedOrderError } from "../errors";
import { priceToProbability } from "../normalization";
import type { OrderHandle, OrderRequest, OrderRouter, OrderState } from "../venues/types";
import { isTerminalStatus } from "../venues/types";

export interface PaperRouterOptions {
  /** Share of each order that fills (0-1) */
  fillFraction?: number;
}

export class PaperRouter implements OrderRouter {
  private readonly orders = new Map<string, OrderState>();
  private readonly fillFraction: number;
  private sequence = 0;

  constructor(options: PaperRouterOptions = {}) {
    this.fillFraction = Math.min(1, Math.max(0, options.fillFraction ?? 1));
  }

  async placeOrder(request: OrderRequest): Promise<OrderHandle> {
    if (request.size <= 0) {
      throw new RejectedOrderError(
        `Paper order size must be positive, got ${request.size}`,
        request.venue,
        "invalid_size"
      );
    }

    const displayed = request.displayedSize ?? Number.POSITIVE_INFINITY;
    const filledSize = Math.floor(Math.min(request.size * this.fillFraction, displayed));
    const state: OrderState =
      filledSize === 0
        ? { status: "open", filledSize: 0, avgPrice: null }
        : {
            status: filledSize === request.size ? "filled" : "partially_filled",
            filledSize,
            avgPrice: priceToProbability(request.price),
          };

    const orderId = `paper_${++this.sequence}`;
    this.orders.set(orderId, state);
    return { venue: request.venue, orderId, clientOrderId: request.clientOrderId };
  }

  async getOrderStatus(handle: OrderHandle): Promise<OrderState> {
    const state = this.orders.get(handle.orderId);
    if (!state) {
      return { status: "rejected", filledSize: 0, avgPrice: null, reason: "unknown order" };
    }
    return { ...state };
  }

  async cancelOrder(handle: OrderHandle): Promise<void> {
    const state = this.orders.get(handle.orderId);
    if (!state || isTerminalStatus(state.status)) return;
    this.orders.set(handle.orderId, { ...state, status: "cancelled" });
  }
}
