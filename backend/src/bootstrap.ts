import { IntentClassifier } from "./agents/intent-classifier.js";
import { ResponseSynthesizer } from "./agents/response-synthesizer.js";
import type { Config } from "./config/env.js";
import {
  LangChainEmbeddingProvider,
  createOpenAIEmbeddings,
  type EmbeddingProvider,
} from "./embeddings/index.js";
import { FaqIngestor, NamespaceLock } from "./ingestion/index.js";
import {
  ChatModelCompletionProvider,
  createOpenAILLM,
  type CompletionProvider,
} from "./llm/index.js";
import { logger } from "./logger.js";
import { TurnOrchestrator } from "./orchestrator/index.js";
import { buildTemplates, type ResponseTemplates } from "./prompts/templates.js";
import { createKnowledgeRetriever } from "./retrievers/index.js";
import type { KnowledgeRetriever } from "./retrievers/knowledge-retriever.js";
import { InMemorySessionStore, type SessionStore } from "./session/session-store.js";
import { createShipmentTracker } from "./tracking/index.js";
import type { ShipmentTracker } from "./tracking/shipment-tracker.js";
import { getDataPath } from "./utils/paths.js";
import { createVectorIndex } from "./vector-stores/index.js";
import type { VectorIndex } from "./vector-stores/types.js";

export interface KnowledgeServices {
  embeddings: EmbeddingProvider;
  index: VectorIndex;
  retriever: KnowledgeRetriever;
  ingestor: FaqIngestor;
}

export interface AssistantServices extends KnowledgeServices {
  completion: CompletionProvider;
  tracker: ShipmentTracker;
  templates: ResponseTemplates;
  orchestrator: TurnOrchestrator;
  sessions: SessionStore;
}

export function createKnowledgeServices(config: Config): KnowledgeServices {
  const embeddings = new LangChainEmbeddingProvider(
    createOpenAIEmbeddings(config),
    config.embeddingDimension,
    config.retrievalTimeoutMs,
  );
  const index = createVectorIndex(config, embeddings);

  return {
    embeddings,
    index,
    retriever: createKnowledgeRetriever(config, embeddings, index),
    ingestor: new FaqIngestor(
      embeddings,
      index,
      new NamespaceLock({ lockDir: config.lockDir ?? getDataPath(".locks") }),
      config.knowledgeNamespace,
    ),
  };
}

export function createAssistantServices(config: Config): AssistantServices {
  const knowledge = createKnowledgeServices(config);
  const completion = new ChatModelCompletionProvider(
    (options) => createOpenAILLM(config, options),
    config.llmTimeoutMs,
  );
  const templates = buildTemplates({
    businessName: config.businessName,
    supportEmail: config.supportEmail,
  });
  const tracker = createShipmentTracker(config);

  const orchestrator = new TurnOrchestrator(
    {
      classifier: new IntentClassifier(completion, {
        businessName: config.businessName,
        temperature: config.classifierTemperature,
      }),
      retriever: knowledge.retriever,
      tracker,
      synthesizer: new ResponseSynthesizer(completion, templates, {
        businessName: config.businessName,
        supportEmail: config.supportEmail,
        temperature: config.synthesisTemperature,
      }),
      templates,
    },
    { turnTimeoutMs: config.turnTimeoutMs },
  );

  logger.info(
    {
      vectorStore: config.vectorStoreType,
      namespace: config.knowledgeNamespace,
      mockTracking: tracker.mockMode,
    },
    "Assistant services created",
  );

  return {
    ...knowledge,
    completion,
    tracker,
    templates,
    orchestrator,
    sessions: new InMemorySessionStore(),
  };
}
