import { errorCategory, errorMessage, type ErrorCategory } from "../errors.js";
import type { KnowledgeHit } from "../models/faq.js";
import type { Message } from "../session/history.js";
import type { TrackingResult } from "../tracking/types.js";

export const INTENTS = ["faq", "dhl_tracking", "greeting", "general_chat", "unknown"] as const;

export type Intent = (typeof INTENTS)[number];

export function coerceIntent(value: unknown): Intent {
  if (typeof value !== "string") {
    return "unknown";
  }
  const normalized = value.trim().toLowerCase();
  return INTENTS.find((intent) => intent === normalized) ?? "unknown";
}

export type ToolName = "knowledge_retriever" | "shipment_tracker";

/**
 * Per-turn record. Nodes never mutate it; each returns a new state and the
 * orchestrator alone decides where it goes next.
 */
export interface TurnState {
  readonly userMessage: string;
  readonly history: readonly Message[];
  readonly sessionId: string;
  readonly intent?: Intent;
  readonly confidence: number;
  readonly trackingNumber?: string;
  readonly faqQuery?: string;
  readonly retrievalResults?: readonly KnowledgeHit[];
  readonly trackingResult?: TrackingResult;
  readonly finalResponse: string;
  readonly toolsUsed: readonly ToolName[];
  readonly error?: string;
  readonly errorCategory?: ErrorCategory;
}

export function createInitialState(
  userMessage: string,
  sessionId: string,
  history: readonly Message[] = [],
): TurnState {
  return {
    userMessage,
    history,
    sessionId,
    confidence: 0,
    finalResponse: "",
    toolsUsed: [],
  };
}

export function withTool(state: TurnState, tool: ToolName): TurnState {
  if (state.toolsUsed.includes(tool)) {
    return state;
  }
  return { ...state, toolsUsed: [...state.toolsUsed, tool] };
}

export function withError(state: TurnState, error: unknown): TurnState {
  return { ...state, error: errorMessage(error), errorCategory: errorCategory(error) };
}
