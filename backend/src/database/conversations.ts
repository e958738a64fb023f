import { Mutex } from "async-mutex";
import { v4 as uuidv4 } from "uuid";
import { logger } from "../logger.js";
import type { Message, ToolResult } from "../models/conversation.js";

function freezeToolResult(result: ToolResult): ToolResult {
  return "order" in result
    ? Object.freeze({ ...result, order: Object.freeze({ ...result.order }) })
    : Object.freeze({ ...result });
}

interface ConversationRecord {
  messages: Message[];
  mutex: Mutex;
}

export class ConversationStore {
  private conversations = new Map<string, ConversationRecord>();

  create(): string {
    const conversationId = uuidv4();
    this.conversations.set(conversationId, {
      messages: [],
      mutex: new Mutex(),
    });
    logger.debug({ conversationId }, "Conversation created");
    return conversationId;
  }

  has(conversationId: string): boolean {
    return this.conversations.has(conversationId);
  }

  list(conversationId: string): Message[] | null {
    const conversation = this.conversations.get(conversationId);
    return conversation ? [...conversation.messages] : null;
  }

  append(conversationId: string, message: Message): boolean {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) {
      return false;
    }

    conversation.messages.push(
      Object.freeze({
        ...message,
        ...(message.tool_result && {
          tool_result: freezeToolResult(message.tool_result),
        }),
      }),
    );
    return true;
  }

  /**
   * Runs `fn` while holding the conversation's lock. Resolves to null when
   * the conversation does not exist.
   */
  async runExclusive<T>(
    conversationId: string,
    fn: () => Promise<T>,
  ): Promise<T | null> {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) {
      return null;
    }
    return conversation.mutex.runExclusive(fn);
  }
}
