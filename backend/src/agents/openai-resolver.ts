import {
  ChatPromptTemplate,
  MessagesPlaceholder,
} from "@langchain/core/prompts";
import {
  AIMessage,
  HumanMessage,
  type AIMessageChunk,
  type BaseMessage,
} from "@langchain/core/messages";
import type { ToolCall } from "@langchain/core/messages/tool";
import type { Runnable } from "@langchain/core/runnables";
import type { BaseLanguageModelInput } from "@langchain/core/language_models/base";
import { z } from "zod";
import { componentLogger } from "../logger.js";
import type { Message, OrderAction } from "../models/conversation.js";
import type { Intent, IntentResolver } from "./types.js";

const logger = componentLogger("openai-resolver");

const OrderIdArgsSchema = z.object({
  order_id: z
    .union([z.string(), z.number()])
    .transform((value) => String(value).trim())
    .pipe(z.string().min(1)),
});

const TOOL_ACTIONS: Record<string, OrderAction> = {
  find_order: "check",
  cancel_order: "cancel",
};

export const ORDER_TOOLS = [
  {
    name: "find_order",
    description:
      "Look up an order by its ID. Use this when the user asks about the status of an order.",
    schema: z.object({
      order_id: z.string().describe("The ID of the order to look up"),
    }),
  },
  {
    name: "cancel_order",
    description:
      "Cancel an existing order. Only orders that are still processing can be cancelled.",
    schema: z.object({
      order_id: z.string().describe("The ID of the order to cancel"),
    }),
  },
];

const SYSTEM_PROMPT = `You are an order assistant. You can do exactly two things:
1. Look up an order with the find_order tool
2. Cancel an order with the cancel_order tool

Always answer by calling one of the tools with the order ID the user gave.
Never invent order IDs or order data. If the user has not given an order ID,
do not call a tool.`;

const prompt = ChatPromptTemplate.fromMessages([
  ["system", SYSTEM_PROMPT],
  new MessagesPlaceholder("history"),
  ["human", "{question}"],
]);

/** A chat model with ORDER_TOOLS already bound. */
export type ToolCallingModel = Runnable<BaseLanguageModelInput, AIMessageChunk>;

function toChatHistory(history: readonly Message[]): BaseMessage[] {
  return history.map((message) =>
    message.role === "user"
      ? new HumanMessage(message.content)
      : new AIMessage(message.content),
  );
}

export function intentFromToolCalls(toolCalls: readonly ToolCall[]): Intent {
  const [toolCall] = toolCalls;
  if (!toolCall) {
    return { kind: "unrecognized", reason: "no_tool_call" };
  }

  const action = TOOL_ACTIONS[toolCall.name];
  const args = OrderIdArgsSchema.safeParse(toolCall.args);
  if (!action || !args.success) {
    logger.warn(
      { tool: toolCall.name, args: toolCall.args },
      "Model returned an unusable tool call",
    );
    return { kind: "unrecognized", reason: "invalid_tool_call" };
  }

  return { kind: "action", action, orderId: args.data.order_id };
}

/**
 * Delegates intent extraction to a function-calling model. The model only
 * picks a tool and its arguments; executing the action is left to the caller.
 */
export class OpenAIIntentResolver implements IntentResolver {
  readonly mode = "openai" as const;

  constructor(
    private readonly model: ToolCallingModel,
    private readonly timeoutMs: number,
  ) {}

  async resolve(text: string, history: readonly Message[]): Promise<Intent> {
    const startTime = Date.now();

    try {
      const chain = prompt.pipe(this.model);
      const response = await chain.invoke(
        { history: toChatHistory(history), question: text },
        { signal: AbortSignal.timeout(this.timeoutMs) },
      );
      const intent = intentFromToolCalls(response.tool_calls ?? []);

      logger.debug(
        { intent, latency: Date.now() - startTime },
        "Intent resolved by model",
      );
      return intent;
    } catch (error) {
      logger.warn(
        { error, latency: Date.now() - startTime },
        "Intent model unavailable, treating message as unrecognized",
      );
      return { kind: "unrecognized", reason: "external_unavailable" };
    }
  }
}
