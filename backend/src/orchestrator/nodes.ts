import type { IntentClassifier } from "../agents/intent-classifier.js";
import { selectErrorTemplate, type ResponseSynthesizer } from "../agents/response-synthesizer.js";
import {
  AssistantError,
  RetrievalError,
  TrackingProviderError,
  errorMessage,
} from "../errors.js";
import { componentLogger } from "../logger.js";
import type { ResponseTemplates } from "../prompts/templates.js";
import type { KnowledgeRetriever } from "../retrievers/knowledge-retriever.js";
import { trackingFailure, type ShipmentTracker } from "../tracking/shipment-tracker.js";
import type { TurnNodes } from "./graph.js";
import { withError, withTool, type TurnState } from "./state.js";

const logger = componentLogger("turn-nodes");

export interface TurnServices {
  classifier: IntentClassifier;
  retriever: KnowledgeRetriever;
  tracker: ShipmentTracker;
  synthesizer: ResponseSynthesizer;
  templates: ResponseTemplates;
}

export function createTurnNodes(services: TurnServices): TurnNodes {
  const { classifier, retriever, tracker, synthesizer, templates } = services;

  return {
    async intent_analysis(state: TurnState): Promise<TurnState> {
      try {
        const decision = await classifier.classify(state.userMessage, state.history);
        return {
          ...state,
          intent: decision.intent,
          confidence: decision.confidence,
          trackingNumber: decision.trackingNumber,
          faqQuery: decision.faqQuery,
        };
      } catch (error) {
        logger.error({ error }, "Intent analysis failed");
        return { ...withError(state, error), intent: "unknown", confidence: 0 };
      }
    },

    async knowledge_retrieval(state: TurnState): Promise<TurnState> {
      const next = withTool(state, "knowledge_retriever");
      const query = state.faqQuery ?? state.userMessage;
      try {
        const hits = await retriever.retrieve(query);
        logger.info({ count: hits.length }, "Knowledge retrieval finished");
        return { ...next, retrievalResults: hits };
      } catch (error) {
        logger.error({ error }, "Knowledge retrieval failed");
        const failure =
          error instanceof AssistantError
            ? error
            : new RetrievalError(errorMessage(error), { cause: error });
        return withError(next, failure);
      }
    },

    async shipment_tracking(state: TurnState): Promise<TurnState> {
      const next = withTool(state, "shipment_tracker");
      const trackingNumber = state.trackingNumber ?? "";
      try {
        const result = await tracker.track(trackingNumber);
        logger.info({ trackingNumber, status: result.status }, "Shipment tracked");
        return { ...next, trackingResult: result };
      } catch (error) {
        logger.warn({ error, trackingNumber }, "Shipment tracking failed");
        const failure =
          error instanceof AssistantError
            ? error
            : new TrackingProviderError(trackingNumber, "UpstreamError", errorMessage(error), {
                cause: error,
              });
        return {
          ...withError(next, failure),
          trackingResult: trackingFailure(trackingNumber, failure),
        };
      }
    },

    async response_synthesis(state: TurnState): Promise<TurnState> {
      try {
        return { ...state, finalResponse: await synthesizer.synthesize(state) };
      } catch (error) {
        logger.error({ error }, "Response synthesis failed");
        return { ...withError(state, error), finalResponse: templates.apology };
      }
    },

    async error_handling(state: TurnState): Promise<TurnState> {
      logger.error({ error: state.error, errorCategory: state.errorCategory }, "Turn faulted");
      return { ...state, finalResponse: selectErrorTemplate(state.errorCategory, templates) };
    },
  };
}
