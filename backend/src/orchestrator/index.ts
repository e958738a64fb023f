import type { Intent, IntentResolver } from "../agents/types.js";
import { ConversationStore, OrderStore } from "../database/index.js";
import { logger } from "../logger.js";
import type {
  ChatTurn,
  Message,
  OrderAction,
  ToolResult,
} from "../models/conversation.js";
import { replyForToolResult, replyForUnrecognized } from "./replies.js";

export class Orchestrator {
  private orderStore: OrderStore;
  private conversationStore: ConversationStore;
  private resolver: IntentResolver;

  constructor(
    orderStore: OrderStore,
    conversationStore: ConversationStore,
    resolver: IntentResolver,
  ) {
    this.orderStore = orderStore;
    this.conversationStore = conversationStore;
    this.resolver = resolver;
    logger.debug({ mode: resolver.mode }, "Orchestrator initialized");
  }

  get mode(): IntentResolver["mode"] {
    return this.resolver.mode;
  }

  createConversation(): string {
    return this.conversationStore.create();
  }

  getMessages(conversationId: string): Message[] | null {
    return this.conversationStore.list(conversationId);
  }

  /**
   * Runs one chat turn under the conversation's lock, so the user message
   * and its reply are always adjacent in the history. Resolves to null for
   * an unknown conversation.
   */
  async processMessage(
    conversationId: string,
    content: string,
  ): Promise<ChatTurn | null> {
    return this.conversationStore.runExclusive(conversationId, async () => {
      const startTime = Date.now();
      const history = this.conversationStore.list(conversationId) ?? [];

      this.conversationStore.append(conversationId, { role: "user", content });

      const intent = await this.resolver.resolve(content, history);
      const turn = this.applyIntent(intent);

      this.conversationStore.append(conversationId, turn.assistant);

      logger.info(
        {
          conversationId,
          intent: intent.kind === "action" ? intent.action : intent.reason,
          latency: Date.now() - startTime,
        },
        "Message processed",
      );
      return turn;
    });
  }

  private applyIntent(intent: Intent): ChatTurn {
    switch (intent.kind) {
      case "action": {
        const toolResult = this.runAction(intent.action, intent.orderId);
        return {
          assistant: {
            role: "assistant",
            content: replyForToolResult(toolResult),
            tool_result: toolResult,
          },
          tool_result: toolResult,
        };
      }
      case "unrecognized":
        return {
          assistant: {
            role: "assistant",
            content: replyForUnrecognized(intent.reason),
          },
        };
    }
  }

  private runAction(action: OrderAction, orderId: string): ToolResult {
    switch (action) {
      case "check": {
        const order = this.orderStore.get(orderId);
        return order
          ? { action, order_id: orderId, status: order.status, order }
          : { action, order_id: orderId, error: "not_found" };
      }
      case "cancel": {
        const outcome = this.orderStore.cancel(orderId);
        if (outcome.ok) {
          return {
            action,
            order_id: orderId,
            status: outcome.order.status,
            order: outcome.order,
          };
        }
        return outcome.reason === "not_found"
          ? { action, order_id: orderId, error: "not_found" }
          : {
              action,
              order_id: orderId,
              error: "invalid_transition",
              status: outcome.order.status,
              order: outcome.order,
            };
      }
    }
  }
}
