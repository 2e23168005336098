import { ChatOpenAI } from "@langchain/openai";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { Config } from "../../config/env.js";
import { logger } from "../../logger.js";

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
}

export function createOpenAILLM(config: Config, options?: LLMOptions): BaseChatModel {
  if (!config.openaiApiKey) {
    throw new Error("OpenAI API key is required");
  }

  const temperature = options?.temperature ?? 0.7;

  const llm = new ChatOpenAI({
    apiKey: config.openaiApiKey,
    model: config.llmModel,
    temperature,
    maxTokens: options?.maxTokens,
    timeout: config.llmTimeoutMs,
    // One retry on transient provider failures; the turn itself never retries.
    maxRetries: 1,
  });

  logger.debug(
    {
      provider: "openai",
      model: config.llmModel,
      temperature,
      maxTokens: options?.maxTokens,
    },
    "OpenAI LLM instance created",
  );
  return llm;
}
