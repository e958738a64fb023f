import { z } from "zod";
import type { Order, OrderStatus } from "./order.js";

export type OrderAction = "check" | "cancel";

export type ToolResult =
  | {
      action: OrderAction;
      order_id: string;
      status: OrderStatus;
      order: Order;
    }
  | {
      action: OrderAction;
      order_id: string;
      error: "not_found";
    }
  | {
      action: "cancel";
      order_id: string;
      error: "invalid_transition";
      status: OrderStatus;
      order: Order;
    };

export interface Message {
  readonly role: "user" | "assistant";
  readonly content: string;
  readonly tool_result?: ToolResult;
}

export interface ChatTurn {
  assistant: Message;
  tool_result?: ToolResult;
}

export const ConversationIdSchema = z.string().uuid();

export const SendMessageRequestSchema = z.object({
  content: z.string().trim().min(1, "content must not be empty"),
});
