import type { Message, OrderAction } from "../models/conversation.js";

export type UnrecognizedReason =
  | "missing_order_id"
  | "no_tool_call"
  | "invalid_tool_call"
  | "external_unavailable";

export type Intent =
  | { kind: "action"; action: OrderAction; orderId: string }
  | { kind: "unrecognized"; reason: UnrecognizedReason };

/**
 * Maps free text to an order action. Implementations never reject for
 * problems with the user's input; those come back as `unrecognized`.
 */
export interface IntentResolver {
  readonly mode: "mock" | "openai";
  resolve(text: string, history: readonly Message[]): Promise<Intent>;
}
