import { Config } from "../config/env.js";
import { logger } from "../logger.js";
import { createOpenAILLM } from "../llm/providers/openai.js";
import { MockIntentResolver } from "./mock-resolver.js";
import { ORDER_TOOLS, OpenAIIntentResolver } from "./openai-resolver.js";
import type { IntentResolver } from "./types.js";

export { MockIntentResolver, extractOrderId } from "./mock-resolver.js";
export {
  OpenAIIntentResolver,
  ORDER_TOOLS,
  intentFromToolCalls,
  type ToolCallingModel,
} from "./openai-resolver.js";
export type { Intent, IntentResolver, UnrecognizedReason } from "./types.js";

/**
 * Picks the resolver strategy once, at start-up. Running without an API key
 * is a fully supported mode.
 */
export function createIntentResolver(config: Config): IntentResolver {
  if (!config.openaiApiKey) {
    logger.info("No OpenAI API key configured, using mock intent resolver");
    return new MockIntentResolver();
  }

  const model = createOpenAILLM(config).bindTools(ORDER_TOOLS);
  logger.info({ model: config.llmModel }, "Using OpenAI intent resolver");
  return new OpenAIIntentResolver(model, config.llmTimeoutMs);
}
