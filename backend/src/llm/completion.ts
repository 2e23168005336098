import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage } from "@langchain/core/messages";
import { AssistantError } from "../errors.js";
import { logger } from "../logger.js";
import { withTimeout } from "../utils/timeout.js";
import type { LLMOptions } from "./providers/openai.js";

export interface CompletionRequest {
  maxTokens: number;
  temperature: number;
}

/**
 * Text-in, text-out completion. Implementations reject with a
 * `CompletionError` whose `kind` tells a provider failure apart from
 * an empty answer.
 */
export interface CompletionProvider {
  complete(prompt: string, request: CompletionRequest): Promise<string>;
}

export type CompletionFailureKind = "provider" | "empty_output";

export class CompletionError extends AssistantError {
  readonly kind: CompletionFailureKind;

  constructor(kind: CompletionFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, "internal", options);
    this.name = "CompletionError";
    this.kind = kind;
  }
}

export type ChatModelFactory = (options: LLMOptions) => BaseChatModel;

/**
 * Adapts LangChain chat models to `CompletionProvider`. One model instance is
 * kept per (temperature, maxTokens) pair.
 */
export class ChatModelCompletionProvider implements CompletionProvider {
  private models = new Map<string, BaseChatModel>();

  constructor(
    private readonly createModel: ChatModelFactory,
    private readonly timeoutMs: number,
  ) {}

  private modelFor(request: CompletionRequest): BaseChatModel {
    const key = `${request.temperature}:${request.maxTokens}`;
    let model = this.models.get(key);
    if (!model) {
      model = this.createModel({
        temperature: request.temperature,
        maxTokens: request.maxTokens,
      });
      this.models.set(key, model);
    }
    return model;
  }

  async complete(prompt: string, request: CompletionRequest): Promise<string> {
    const model = this.modelFor(request);
    const startTime = Date.now();

    let text: string;
    try {
      const response = await withTimeout(
        model.invoke([new HumanMessage(prompt)]),
        this.timeoutMs,
        "Completion request",
      );
      text = response.text.trim();
    } catch (error) {
      logger.error({ error, durationMs: Date.now() - startTime }, "Completion provider call failed");
      throw new CompletionError(
        "provider",
        `completion provider error: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    if (!text) {
      throw new CompletionError("empty_output", "completion provider returned an empty response");
    }

    logger.debug(
      { responseLength: text.length, durationMs: Date.now() - startTime },
      "Completion received",
    );
    return text;
  }
}
