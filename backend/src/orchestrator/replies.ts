import type { UnrecognizedReason } from "../agents/types.js";
import type { ToolResult } from "../models/conversation.js";

export function replyForToolResult(result: ToolResult): string {
  if (!("error" in result)) {
    return result.action === "cancel"
      ? `Order ${result.order_id} has been canceled successfully.`
      : `Order ${result.order_id} is currently ${result.status}.`;
  }

  switch (result.error) {
    case "not_found":
      return `I couldn't find an order with ID ${result.order_id}.`;
    case "invalid_transition":
      return `Order ${result.order_id} cannot be canceled because it is ${result.status}.`;
  }
}

export function replyForUnrecognized(reason: UnrecognizedReason): string {
  switch (reason) {
    case "missing_order_id":
      return "Please provide an order ID.";
    case "no_tool_call":
    case "invalid_tool_call":
    case "external_unavailable":
      return "Sorry, I can only check or cancel orders. Please tell me what you'd like to do and include your order ID.";
  }
}
