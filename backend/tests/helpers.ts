import type { Order } from "../src/models/order.js";

export function sampleOrders(): Order[] {
  return [
    { order_id: "12345", status: "processing", item: "Wireless Mouse" },
    { order_id: "23456", status: "shipped", item: "Mechanical Keyboard" },
    { order_id: "34567", status: "canceled", item: "USB-C Hub" },
    { order_id: "45678", status: "processing", item: "27-inch Monitor" },
  ];
}
