import { describe, test, expect } from "vitest";
import { fileURLToPath } from "url";
import {
  loadOrdersFromCsv,
  parseOrdersCsv,
} from "../../src/loaders/csv-loader.js";
import { OrderStore } from "../../src/database/index.js";

const fixturePath = fileURLToPath(
  new URL("../fixtures/orders.csv", import.meta.url),
);

describe("CSV order loader", () => {
  test("should parse valid rows and ignore extra columns", () => {
    const orders = parseOrdersCsv(
      "order_id,status,item,warehouse\n42,shipped,Keyboard,north\n",
    );
    expect(orders).toEqual([
      { order_id: "42", status: "shipped", item: "Keyboard" },
    ]);
  });

  test("should return no orders for a header-only file", () => {
    expect(parseOrdersCsv("order_id,status,item\n")).toEqual([]);
  });

  test("should skip incomplete rows and unknown statuses", async () => {
    const orders = await loadOrdersFromCsv(fixturePath);

    expect(orders).toEqual([
      { order_id: "1001", status: "processing", item: "Phone Case" },
      { order_id: "1002", status: "shipped", item: "Charger" },
      { order_id: "1003", status: "canceled", item: "Cable" },
      { order_id: "1001", status: "shipped", item: "Duplicate Row" },
      { order_id: "1006", status: "processing", item: "Padded Row" },
    ]);
  });

  test("should build a store where the first duplicate wins", async () => {
    const store = await OrderStore.fromCsv(fixturePath);

    expect(store.size).toBe(4);
    expect(store.get("1001")).toEqual({
      order_id: "1001",
      status: "processing",
      item: "Phone Case",
    });
  });

  test("should fail with the path when the file is missing", async () => {
    await expect(loadOrdersFromCsv("/nonexistent/orders.csv")).rejects.toThrow(
      "Order CSV not found at /nonexistent/orders.csv",
    );
  });
});
