import type { ErrorCategory } from "../errors.js";
import type { Message } from "../session/history.js";
import type { TraceParent } from "../utils/langfuse.js";
import type { Intent, ToolName } from "./state.js";

export const MAX_MESSAGE_LENGTH = 2000;

/** Length in user-visible characters, so surrogate pairs count once. */
export function messageLength(message: string): number {
  return [...message].length;
}

export interface TurnResult {
  reply: string;
  sessionId: string;
  elapsedMs: number;
  intent: Intent;
  confidence: number;
  toolsUsed: ToolName[];
  /** Prior history plus this exchange, capped to the sliding window. */
  history: Message[];
  error?: string;
  errorCategory?: ErrorCategory;
}

export interface ExecuteOptions {
  trace?: TraceParent;
}
