import { SynthesisError, errorMessage, type ErrorCategory } from "../errors.js";
import type { CompletionProvider } from "../llm/completion.js";
import { componentLogger } from "../logger.js";
import type { KnowledgeHit } from "../models/faq.js";
import type { TurnState } from "../orchestrator/state.js";
import { responsePrompt } from "../prompts/response.js";
import type { ResponseTemplates } from "../prompts/templates.js";
import { renderHistoryContext } from "../session/history.js";
import { formatTrackingResult } from "../tracking/format.js";
import type { TrackingResult } from "../tracking/types.js";

const logger = componentLogger("response-synthesizer");

export const NO_FAQ_ENTRIES = "No relevant FAQ entries found.";

export interface ResponseSynthesizerOptions {
  businessName: string;
  supportEmail: string;
  temperature?: number;
  maxTokens?: number;
}

export function selectErrorTemplate(
  category: ErrorCategory | undefined,
  templates: ResponseTemplates,
): string {
  switch (category) {
    case "tracking":
      return templates.trackingNotFound;
    case "retrieval":
      return templates.noResults;
    default:
      return templates.apology;
  }
}

function formatHits(hits: readonly KnowledgeHit[]): string {
  const lines = ["=== FAQ KNOWLEDGE BASE RESULTS ===", ""];
  if (hits.length === 0) {
    lines.push(NO_FAQ_ENTRIES);
    return lines.join("\n");
  }

  hits.forEach((hit, position) => {
    lines.push(
      `FAQ ${position + 1} (Relevance: ${Math.round(hit.score * 100)}%):`,
      `Question: ${hit.question}`,
      `Answer: ${hit.answer}`,
      `Category: ${hit.category}`,
      "",
    );
  });
  return lines.join("\n").trimEnd();
}

function formatTracking(result: TrackingResult): string {
  const lines = ["=== DHL TRACKING RESULTS ===", ""];
  if (result.success) {
    lines.push(formatTrackingResult(result));
  } else {
    lines.push(
      `Tracking Error: ${result.error}`,
      "Tracking number may be invalid or not found in system.",
    );
  }
  return lines.join("\n");
}

/**
 * Renders tool output for the synthesis prompt. Inside a turn a failed lookup
 * never gets here (it routes to the error handler); the failure rendering
 * serves direct callers that pass a failed tracking result.
 */
export function formatToolResults(state: TurnState, businessName: string): string {
  const sections: string[] = [];
  if (state.retrievalResults !== undefined) {
    sections.push(formatHits(state.retrievalResults));
  }
  if (state.trackingResult !== undefined) {
    sections.push(formatTracking(state.trackingResult));
  }

  if (sections.length === 0) {
    return `No tool results available. Respond based on general knowledge about ${businessName} and do not invent specific facts.`;
  }
  return sections.join("\n\n");
}

/**
 * Produces the final reply. Greetings and faulted turns use canned
 * templates; everything else goes to the completion provider.
 */
export class ResponseSynthesizer {
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly completion: CompletionProvider,
    private readonly templates: ResponseTemplates,
    private readonly options: ResponseSynthesizerOptions,
  ) {
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 1000;
  }

  get responseTemplates(): ResponseTemplates {
    return this.templates;
  }

  async synthesize(state: TurnState): Promise<string> {
    if (state.intent === "greeting") {
      logger.info("Using greeting template");
      return this.templates.greeting;
    }

    if (state.error) {
      logger.warn({ errorCategory: state.errorCategory }, "Using error template");
      return selectErrorTemplate(state.errorCategory, this.templates);
    }

    const prompt = await responsePrompt.format({
      businessName: this.options.businessName,
      supportEmail: this.options.supportEmail,
      userMessage: state.userMessage,
      intent: state.intent ?? "unknown",
      toolResults: formatToolResults(state, this.options.businessName),
      context: renderHistoryContext(state.history),
    });

    try {
      const reply = await this.completion.complete(prompt, {
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });
      logger.info({ length: reply.length }, "Response generated");
      return reply;
    } catch (error) {
      throw new SynthesisError(errorMessage(error), { cause: error });
    }
  }
}
