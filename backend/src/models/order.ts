import { z } from "zod";

export const OrderStatusSchema = z.enum(["processing", "shipped", "canceled"]);

export const OrderSchema = z.object({
  order_id: z.string().trim().min(1),
  status: OrderStatusSchema,
  item: z.string().trim().min(1).describe("Product associated with the order"),
});

export type OrderStatus = z.infer<typeof OrderStatusSchema>;
export type Order = z.infer<typeof OrderSchema>;

// shipped and canceled are terminal
const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  processing: ["canceled"],
  shipped: [],
  canceled: [],
};

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}
