import { ChatOpenAI } from "@langchain/openai";
import { Config } from "../../config/env.js";
import { logger } from "../../logger.js";

export function createOpenAILLM(config: Config): ChatOpenAI {
  if (!config.openaiApiKey) {
    throw new Error("OpenAI API key is required");
  }

  const llm = new ChatOpenAI({
    apiKey: config.openaiApiKey,
    model: config.llmModel,
    temperature: 0, // Intent extraction has to be repeatable
    timeout: config.llmTimeoutMs,
    maxRetries: 0,
  });

  logger.debug(
    {
      provider: "openai",
      model: config.llmModel,
      timeoutMs: config.llmTimeoutMs,
    },
    "OpenAI LLM instance created",
  );
  return llm;
}
