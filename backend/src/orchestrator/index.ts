import { SynthesisError, ValidationError, errorCategory, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ResponseTemplates } from "../prompts/templates.js";
import { HISTORY_LIMIT, appendToHistory, createMessage, type Message } from "../session/history.js";
import { endSpan, startSpan, type TraceParent } from "../utils/langfuse.js";
import { TimeoutError, withTimeout } from "../utils/timeout.js";
import { ENTRY_NODE, nextNode, type NodeName, type TurnNodes } from "./graph.js";
import { createTurnNodes, type TurnServices } from "./nodes.js";
import { createInitialState, type TurnState } from "./state.js";
import {
  MAX_MESSAGE_LENGTH,
  messageLength,
  type ExecuteOptions,
  type TurnResult,
} from "./types.js";

export interface TurnOrchestratorOptions {
  /** Wall-clock budget for a whole turn; overrun ends the turn with the apology template. */
  turnTimeoutMs?: number;
  clock?: () => Date;
}

export function validateTurnInput(message: string, sessionId: string): void {
  if (typeof message !== "string" || typeof sessionId !== "string") {
    throw new ValidationError("Invalid turn input: message and sessionId must be strings");
  }

  const details: string[] = [];
  if (!message.trim()) {
    details.push("message must not be blank");
  }
  if (messageLength(message) > MAX_MESSAGE_LENGTH) {
    details.push(`message must be at most ${MAX_MESSAGE_LENGTH} characters`);
  }
  if (!sessionId.trim()) {
    details.push("sessionId must not be blank");
  }
  if (details.length > 0) {
    throw new ValidationError(`Invalid turn input: ${details.join(", ")}`, details);
  }
}

function historyWindow(history: readonly Message[] | null | undefined): Message[] {
  return Array.isArray(history) ? history.slice(-HISTORY_LIMIT) : [];
}

export class TurnOrchestrator {
  private readonly nodes: TurnNodes;
  private readonly templates: ResponseTemplates;
  private readonly turnTimeoutMs?: number;
  private readonly clock: () => Date;

  constructor(services: TurnServices, options: TurnOrchestratorOptions = {}) {
    this.nodes = createTurnNodes(services);
    this.templates = services.templates;
    this.turnTimeoutMs = options.turnTimeoutMs;
    this.clock = options.clock ?? (() => new Date());
    logger.debug({ turnTimeoutMs: this.turnTimeoutMs }, "Turn orchestrator initialized");
  }

  private async runNode(name: NodeName, state: TurnState, trace?: TraceParent): Promise<TurnState> {
    const span = startSpan(trace, name, { intent: state.intent, toolsUsed: state.toolsUsed });
    logger.info({ node: name, sessionId: state.sessionId }, "Entering node");

    const next = await this.nodes[name](state);

    endSpan(
      span,
      {
        intent: next.intent,
        confidence: next.confidence,
        toolsUsed: next.toolsUsed,
        errorCategory: next.errorCategory,
      },
      next.error !== undefined && next.error !== state.error,
    );
    return next;
  }

  private async runGraph(initial: TurnState, trace?: TraceParent): Promise<TurnState> {
    let state = initial;
    let node: NodeName | null = ENTRY_NODE;
    while (node) {
      state = await this.runNode(node, state, trace);
      node = nextNode(node, state);
    }

    if (!state.finalResponse) {
      logger.warn("Turn finished without a reply, using apology template");
      return { ...state, finalResponse: this.templates.apology };
    }
    return state;
  }

  private closeTurn(history: readonly Message[], message: string, reply: string): Message[] {
    if (typeof message !== "string") {
      return [...history];
    }
    const now = this.clock();
    return appendToHistory(
      history,
      createMessage("user", message, now),
      createMessage("assistant", reply, now),
    );
  }

  /**
   * Runs one turn. Never rejects: any failure ends in a canned reply with
   * `intent` "unknown", no tools and `error` set.
   */
  async execute(
    message: string,
    sessionId: string,
    history: readonly Message[] = [],
    options: ExecuteOptions = {},
  ): Promise<TurnResult> {
    const startTime = Date.now();
    let priorHistory: Message[] = [];
    let turnSpan: ReturnType<typeof startSpan>;

    try {
      priorHistory = historyWindow(history);
      validateTurnInput(message, sessionId);

      turnSpan = startSpan(options.trace, "turn", {
        sessionId,
        messageLength: messageLength(message),
        historyLength: priorHistory.length,
      });
      logger.info(
        { sessionId, message: message.substring(0, 100), historyLength: priorHistory.length },
        "Processing turn",
      );

      const initial = createInitialState(message, sessionId, priorHistory);
      const graph = this.runGraph(initial, turnSpan ?? options.trace);
      const final = this.turnTimeoutMs
        ? await withTimeout(graph, this.turnTimeoutMs, "Turn")
        : await graph;

      const elapsedMs = Date.now() - startTime;
      const result: TurnResult = {
        reply: final.finalResponse,
        sessionId,
        elapsedMs,
        intent: final.intent ?? "unknown",
        confidence: final.confidence,
        toolsUsed: [...final.toolsUsed],
        history: this.closeTurn(priorHistory, message, final.finalResponse),
      };
      if (final.error) {
        result.error = final.error;
        result.errorCategory = final.errorCategory;
        logger.warn({ sessionId, error: final.error }, "Turn completed with error");
      }

      logger.info(
        { sessionId, intent: result.intent, toolsUsed: result.toolsUsed, elapsedMs },
        "Turn completed",
      );
      endSpan(turnSpan, { intent: result.intent, toolsUsed: result.toolsUsed, elapsedMs });
      return result;
    } catch (caught) {
      // A blown turn budget counts as a synthesis failure.
      const error =
        caught instanceof TimeoutError
          ? new SynthesisError(caught.message, { cause: caught })
          : caught;
      const reply =
        caught instanceof TimeoutError ? this.templates.apology : this.templates.technicalDifficulties;

      logger.error({ error, sessionId }, "Turn failed");
      const elapsedMs = Date.now() - startTime;
      endSpan(turnSpan, { error: errorMessage(error), elapsedMs }, true);

      return {
        reply,
        sessionId,
        elapsedMs,
        intent: "unknown",
        confidence: 0,
        toolsUsed: [],
        history: this.closeTurn(priorHistory, message, reply),
        error: errorMessage(error),
        errorCategory: errorCategory(error),
      };
    }
  }
}

export { createTurnNodes, type TurnServices } from "./nodes.js";
export { nextNode, routeAfterIntent, routeAfterTool, type NodeName } from "./graph.js";
export {
  INTENTS,
  coerceIntent,
  createInitialState,
  type Intent,
  type ToolName,
  type TurnState,
} from "./state.js";
export { MAX_MESSAGE_LENGTH, messageLength, type ExecuteOptions, type TurnResult } from "./types.js";
