import { logger } from "../logger.js";
import type { TurnState } from "./state.js";

export type NodeName =
  | "intent_analysis"
  | "knowledge_retrieval"
  | "shipment_tracking"
  | "response_synthesis"
  | "error_handling";

export const ENTRY_NODE: NodeName = "intent_analysis";

export type TurnNode = (state: TurnState) => Promise<TurnState>;
export type TurnNodes = Record<NodeName, TurnNode>;

export function routeAfterIntent(state: TurnState): NodeName {
  if (state.error) {
    logger.info({ errorCategory: state.errorCategory }, "Routing to error handling");
    return "error_handling";
  }

  switch (state.intent) {
    case "faq":
      logger.info("Routing to knowledge retrieval");
      return "knowledge_retrieval";
    case "dhl_tracking":
      logger.info("Routing to shipment tracking");
      return "shipment_tracking";
    default:
      logger.info({ intent: state.intent }, "Routing directly to response synthesis");
      return "response_synthesis";
  }
}

export function routeAfterTool(state: TurnState): NodeName {
  if (state.error) {
    logger.info({ errorCategory: state.errorCategory }, "Routing to error handling after tool");
    return "error_handling";
  }
  logger.info("Routing to response synthesis after tool");
  return "response_synthesis";
}

/** Next node after `current`, or `null` once a terminal node has run. */
export function nextNode(current: NodeName, state: TurnState): NodeName | null {
  switch (current) {
    case "intent_analysis":
      return routeAfterIntent(state);
    case "knowledge_retrieval":
    case "shipment_tracking":
      return routeAfterTool(state);
    case "response_synthesis":
    case "error_handling":
      return null;
  }
}
