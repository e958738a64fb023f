import { describe, test, expect, beforeEach } from "vitest";
import { OrderSchema, canTransition } from "../../src/models/order.js";
import { OrderStore } from "../../src/database/index.js";
import { sampleOrders } from "../helpers.js";

describe("Order model", () => {
  test("should validate a valid order", () => {
    const result = OrderSchema.safeParse({
      order_id: "12345",
      status: "processing",
      item: "Wireless Mouse",
    });
    expect(result.success).toBe(true);
  });

  test("should reject an unknown status", () => {
    const result = OrderSchema.safeParse({
      order_id: "12345",
      status: "delivered",
      item: "Wireless Mouse",
    });
    expect(result.success).toBe(false);
  });

  test("should reject an empty order id", () => {
    const result = OrderSchema.safeParse({
      order_id: "  ",
      status: "shipped",
      item: "Wireless Mouse",
    });
    expect(result.success).toBe(false);
  });

  test("should only allow processing -> canceled", () => {
    expect(canTransition("processing", "canceled")).toBe(true);
    expect(canTransition("shipped", "canceled")).toBe(false);
    expect(canTransition("canceled", "canceled")).toBe(false);
    expect(canTransition("canceled", "processing")).toBe(false);
    expect(canTransition("processing", "shipped")).toBe(false);
  });
});

describe("OrderStore", () => {
  let store: OrderStore;

  beforeEach(() => {
    store = new OrderStore(sampleOrders());
  });

  describe("get", () => {
    test("should return an existing order", () => {
      expect(store.get("12345")).toEqual({
        order_id: "12345",
        status: "processing",
        item: "Wireless Mouse",
      });
    });

    test("should trim the order id", () => {
      expect(store.get(" 23456 ")?.status).toBe("shipped");
    });

    test("should return null for an unknown order", () => {
      expect(store.get("99999")).toBeNull();
    });

    test("should not change state when checking", () => {
      store.get("12345");
      store.get("12345");
      expect(store.get("12345")?.status).toBe("processing");
    });

    test("should return a copy that cannot mutate the store", () => {
      const order = store.get("12345");
      expect(order).not.toBeNull();
      if (order) {
        order.status = "shipped";
      }
      expect(store.get("12345")?.status).toBe("processing");
    });
  });

  describe("cancel", () => {
    test("should cancel a processing order exactly once", () => {
      const first = store.cancel("12345");
      expect(first).toEqual({
        ok: true,
        order: {
          order_id: "12345",
          status: "canceled",
          item: "Wireless Mouse",
        },
      });

      const second = store.cancel("12345");
      expect(second).toEqual({
        ok: false,
        reason: "invalid_transition",
        order: {
          order_id: "12345",
          status: "canceled",
          item: "Wireless Mouse",
        },
      });
      expect(store.get("12345")?.status).toBe("canceled");
    });

    test("should refuse to cancel a shipped order", () => {
      const outcome = store.cancel("23456");
      expect(outcome.ok).toBe(false);
      expect(outcome.ok === false && outcome.reason).toBe("invalid_transition");
      expect(store.get("23456")?.status).toBe("shipped");
    });

    test("should refuse to cancel an already canceled order", () => {
      const outcome = store.cancel("34567");
      expect(outcome).toMatchObject({ ok: false, reason: "invalid_transition" });
      expect(store.get("34567")?.status).toBe("canceled");
    });

    test("should report not_found for an unknown order", () => {
      expect(store.cancel("99999")).toEqual({ ok: false, reason: "not_found" });
    });

    test("should leave other orders untouched", () => {
      store.cancel("12345");
      expect(store.get("45678")?.status).toBe("processing");
    });
  });

  test("should keep the first row when ids repeat", () => {
    const duplicated = new OrderStore([
      { order_id: "1", status: "processing", item: "First" },
      { order_id: "1", status: "shipped", item: "Second" },
    ]);
    expect(duplicated.size).toBe(1);
    expect(duplicated.get("1")?.item).toBe("First");
  });

  test("should list orders in load order", () => {
    expect(store.list().map((order) => order.order_id)).toEqual([
      "12345",
      "23456",
      "34567",
      "45678",
    ]);
  });
});
