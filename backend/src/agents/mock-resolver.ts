import type { Message } from "../models/conversation.js";
import type { Intent, IntentResolver } from "./types.js";

// First standalone run of digits: "order #12345" -> "12345"
const ORDER_ID_PATTERN = /\b(\d+)\b/;

// Whole word only, so "has it been canceled?" stays a status check
const CANCEL_PATTERN = /\bcancel\b/i;

export function extractOrderId(text: string): string | null {
  const match = text.match(ORDER_ID_PATTERN);
  return match ? match[1] : null;
}

/**
 * Credential-free resolver that reads intent straight from the message text.
 */
export class MockIntentResolver implements IntentResolver {
  readonly mode = "mock" as const;

  async resolve(text: string, _history: readonly Message[]): Promise<Intent> {
    const orderId = extractOrderId(text);
    if (orderId === null) {
      return { kind: "unrecognized", reason: "missing_order_id" };
    }

    return {
      kind: "action",
      action: CANCEL_PATTERN.test(text) ? "cancel" : "check",
      orderId,
    };
  }
}
