import { logger } from "../logger.js";
import { Order, canTransition } from "../models/order.js";
import { loadOrdersFromCsv } from "../loaders/csv-loader.js";

export type CancelOutcome =
  | { ok: true; order: Order }
  | { ok: false; reason: "not_found" }
  | { ok: false; reason: "invalid_transition"; order: Order };

/**
 * In-memory order table, seeded once and owned exclusively by this store.
 *
 * Every mutation is a synchronous check-and-set, so two requests cancelling
 * the same order are serialized by the event loop and only one can observe
 * `processing`.
 */
export class OrderStore {
  private orders = new Map<string, Order>();

  constructor(orders: Iterable<Order>) {
    for (const order of orders) {
      const orderId = order.order_id.trim();
      if (!this.orders.has(orderId)) {
        this.orders.set(orderId, { ...order, order_id: orderId });
      }
    }
  }

  static async fromCsv(filePath: string): Promise<OrderStore> {
    const store = new OrderStore(await loadOrdersFromCsv(filePath));
    logger.info({ filePath, orders: store.size }, "Order store loaded");
    return store;
  }

  get size(): number {
    return this.orders.size;
  }

  get(orderId: string): Order | null {
    const order = this.orders.get(orderId.trim());
    return order ? { ...order } : null;
  }

  list(): Order[] {
    return Array.from(this.orders.values(), (order) => ({ ...order }));
  }

  cancel(orderId: string): CancelOutcome {
    const order = this.orders.get(orderId.trim());

    if (!order) {
      logger.warn({ orderId }, "Order not found for cancellation");
      return { ok: false, reason: "not_found" };
    }

    if (!canTransition(order.status, "canceled")) {
      logger.debug(
        { orderId, status: order.status },
        "Order cannot be cancelled from its current status",
      );
      return { ok: false, reason: "invalid_transition", order: { ...order } };
    }

    order.status = "canceled";
    logger.info({ orderId }, "Order cancelled successfully");
    return { ok: true, order: { ...order } };
  }
}
