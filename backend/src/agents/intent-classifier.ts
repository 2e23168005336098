import { ClassificationError, errorMessage } from "../errors.js";
import type { CompletionProvider } from "../llm/completion.js";
import { componentLogger } from "../logger.js";
import { coerceIntent, type Intent } from "../orchestrator/state.js";
import { intentPrompt } from "../prompts/intent.js";
import { renderHistoryContext, type Message } from "../session/history.js";
import { parseJsonObject } from "../utils/json-output.js";

const logger = componentLogger("intent-classifier");

const TRACKING_VOCABULARY = /\b(track|tracking|shipment|shipping|delivery|deliver|package|parcel)\b/i;
const CANDIDATE_TOKEN = /^[A-Za-z0-9]{8,39}$/;

export interface IntentDecision {
  intent: Intent;
  confidence: number;
  trackingNumber?: string;
  faqQuery?: string;
}

export interface IntentClassifierOptions {
  businessName: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Pulls a carrier code out of free text: the first 8-39 character
 * alphanumeric token containing a digit, or, when the message talks about
 * tracking, the first all-uppercase token of that length.
 */
export function extractTrackingNumber(message: string): string | undefined {
  const tokens = message.split(/[^A-Za-z0-9]+/).filter((token) => CANDIDATE_TOKEN.test(token));

  const codeLike = tokens.find((token) => /\d/.test(token));
  if (codeLike) {
    return codeLike;
  }
  if (TRACKING_VOCABULARY.test(message)) {
    return tokens.find((token) => /^[A-Z0-9]+$/.test(token));
  }
  return undefined;
}

function toConfidence(value: unknown): number {
  const numeric = typeof value === "string" ? Number.parseFloat(value) : value;
  if (typeof numeric !== "number" || Number.isNaN(numeric)) {
    return 0;
  }
  return Math.min(1, Math.max(0, numeric));
}

function toOptionalText(value: unknown): string | undefined {
  if (typeof value !== "string" && typeof value !== "number") {
    return undefined;
  }
  const text = String(value).trim();
  return text && text.toLowerCase() !== "null" ? text : undefined;
}

export function toIntentDecision(raw: Record<string, unknown>, message: string): IntentDecision {
  const intent = coerceIntent(raw.intent);
  const decision: IntentDecision = { intent, confidence: toConfidence(raw.confidence) };

  const trackingNumber =
    toOptionalText(raw.tracking_number) ??
    (intent === "dhl_tracking" ? extractTrackingNumber(message) : undefined);
  if (trackingNumber) {
    decision.trackingNumber = trackingNumber;
  }

  const faqQuery = toOptionalText(raw.faq_query) ?? (intent === "faq" ? message : undefined);
  if (faqQuery) {
    decision.faqQuery = faqQuery;
  }

  return decision;
}

export class IntentClassifier {
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly completion: CompletionProvider,
    private readonly options: IntentClassifierOptions,
  ) {
    this.temperature = options.temperature ?? 0.3;
    this.maxTokens = options.maxTokens ?? 500;
  }

  async classify(message: string, history: readonly Message[]): Promise<IntentDecision> {
    logger.info({ message: message.substring(0, 50) }, "Analyzing intent");

    const prompt = await intentPrompt.format({
      userMessage: message,
      context: renderHistoryContext(history),
      businessName: this.options.businessName,
    });

    let output: string;
    try {
      output = await this.completion.complete(prompt, {
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });
    } catch (error) {
      throw new ClassificationError(errorMessage(error), { cause: error });
    }

    const parsed = parseJsonObject(output);
    if (!parsed.ok) {
      throw new ClassificationError(parsed.error);
    }

    const decision = toIntentDecision(parsed.value, message);
    logger.info(
      {
        intent: decision.intent,
        confidence: decision.confidence,
        strategy: parsed.strategy,
        trackingNumber: decision.trackingNumber,
      },
      "Intent detected",
    );
    return decision;
  }
}
